import { z } from 'zod';

import { MalformedEventError } from './errors.js';

// S3 sends keys URL encoded with spaces as '+'
const ObjectKey = z
  .string()
  .min(1)
  .transform((key, ctx) => {
    try {
      return decodeURIComponent(key.replace(/\+/g, ' '));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Cannot decode object key ${key}: ${reason}` });

      return z.NEVER;
    }
  });

const UploadEventRecord = z.object({
  eventTime: z.string().datetime({ offset: true, local: true }),
  s3: z.object({
    bucket: z.object({
      name: z.string().min(1),
    }),
    object: z.object({
      key: ObjectKey,
      size: z.number().int().nonnegative(),
    }),
  }),
});

const UploadEventSchema = z.object({
  Records: z.array(UploadEventRecord),
});

export type UploadRecord = {
  bucketName: string;
  objectKey: string;
  objectSize: number;
  eventTime: string;
};

export const parseUploadEvent = (event: unknown): UploadRecord[] => {
  const result = UploadEventSchema.safeParse(event);
  if (!result.success) {
    throw new MalformedEventError(result.error.issues.map((issue) => `${issue.path.join('.') || 'event'}: ${issue.message}`));
  }

  return result.data.Records.map((record) => ({
    bucketName: record.s3.bucket.name,
    objectKey: record.s3.object.key,
    objectSize: record.s3.object.size,
    eventTime: record.eventTime,
  }));
};
