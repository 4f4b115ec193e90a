import { z } from 'zod';

const optionalString = z.preprocess((value) => (value === '' ? undefined : value), z.string().optional());

const EnvSchema = z.object({
  METADATA_TABLE_NAME: z.string().min(1).default('FileMetadata'),
  METADATA_KEY_ATTRIBUTE: z.string().min(1).default('FileName'),
  NOTIFICATION_TOPIC_ARN: optionalString,
  AWS_REGION: optionalString,
});

export type Config = {
  tableName: string;
  keyAttribute: string;
  // Unset means notifications are disabled
  topicArn?: string;
  region?: string;
};

export const loadConfig = (env: Record<string, string | undefined> = process.env): Config => {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }

  const { METADATA_TABLE_NAME, METADATA_KEY_ATTRIBUTE, NOTIFICATION_TOPIC_ARN, AWS_REGION } = result.data;

  return {
    tableName: METADATA_TABLE_NAME,
    keyAttribute: METADATA_KEY_ATTRIBUTE,
    topicArn: NOTIFICATION_TOPIC_ARN,
    region: AWS_REGION,
  };
};
