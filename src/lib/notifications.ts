import { PublishCommand, type PublishCommandInput, SNSClient } from '@aws-sdk/client-sns';

import type { Config } from './config.js';
import { DependencyCallError } from './errors.js';
import type { FileMetadataRecord } from './metadata-store.js';

const UPLOAD_NOTIFICATION_SUBJECT = 'New File Upload Alert';

export type NotificationMessage = {
  subject: string;
  body: string;
};

export type Notifier = {
  publish: (message: NotificationMessage) => Promise<void>;
};

export const formatUploadNotification = ({ fileName, bucketName, fileSize, uploadTime }: FileMetadataRecord): NotificationMessage => ({
  subject: UPLOAD_NOTIFICATION_SUBJECT,
  body: [
    '📂 New file uploaded!',
    '',
    `File: ${fileName}`,
    `Bucket: ${bucketName}`,
    `Size: ${fileSize} bytes`,
    `Uploaded at: ${uploadTime}`,
  ].join('\n'),
});

export const createSnsNotifier = (client: SNSClient, topicArn: string): Notifier => ({
  publish: async ({ subject, body }) => {
    const params: PublishCommandInput = {
      TopicArn: topicArn,
      Subject: subject,
      Message: body,
    };

    try {
      await client.send(new PublishCommand(params));
    } catch (err) {
      throw new DependencyCallError('notification-service', `Failed to publish "${subject}" to ${topicArn}`, { cause: err });
    }
  },
});

// No topic means notifications are disabled
export const createNotifier = ({ topicArn, region }: Pick<Config, 'topicArn' | 'region'>): Notifier | undefined => {
  if (!topicArn) {
    return undefined;
  }

  return createSnsNotifier(new SNSClient({ region }), topicArn);
};
