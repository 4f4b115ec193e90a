import { type MetadataStore, toFileMetadataRecord } from './metadata-store.js';
import { formatUploadNotification, type Notifier } from './notifications.js';
import { parseUploadEvent } from './upload-event.js';

type UploadHandlerDeps = {
  store: MetadataStore;
  // Omitted when no notification topic is configured
  notifier?: Notifier;
};

export type UploadHandlerResult = {
  statusCode: number;
  body: string;
};

/**
 * Builds the handler for a batch of S3 object-created notifications.
 *
 * The whole batch is validated before anything is written. Records are then
 * processed one at a time in batch order and the first failure aborts the rest.
 * Nothing written before a failure is rolled back; a retried batch overwrites
 * the same keys.
 */
export const createUploadHandler =
  ({ store, notifier }: UploadHandlerDeps) =>
  async (event: unknown): Promise<UploadHandlerResult> => {
    console.debug('Upload event:', JSON.stringify(event, null, 2));

    const uploads = parseUploadEvent(event);

    for (const upload of uploads) {
      const metadata = toFileMetadataRecord(upload);

      await store.put(metadata);
      console.log(`Stored metadata for ${metadata.fileName} from ${metadata.bucketName}`);

      if (notifier) {
        await notifier.publish(formatUploadNotification(metadata));
        console.log(`Sent upload notification for ${metadata.fileName}`);
      }
    }

    return {
      statusCode: 200,
      body: JSON.stringify('File processed successfully!'),
    };
  };
