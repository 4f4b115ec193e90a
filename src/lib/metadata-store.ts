import { type DynamoDBClient, PutItemCommand, type PutItemCommandInput } from '@aws-sdk/client-dynamodb';

import { DependencyCallError } from './errors.js';
import type { UploadRecord } from './upload-event.js';

export type FileMetadataRecord = {
  fileName: string;
  bucketName: string;
  fileSize: number;
  uploadTime: string;
};

export type MetadataStore = {
  // Inserts the record, replacing any existing record with the same fileName
  put: (record: FileMetadataRecord) => Promise<void>;
};

export const toFileMetadataRecord = ({ objectKey, bucketName, objectSize, eventTime }: UploadRecord): FileMetadataRecord => ({
  fileName: objectKey,
  bucketName,
  fileSize: objectSize,
  uploadTime: eventTime,
});

type DynamoMetadataStoreOptions = {
  tableName: string;
  keyAttribute: string;
};

export const createDynamoMetadataStore = (client: DynamoDBClient, { tableName, keyAttribute }: DynamoMetadataStoreOptions): MetadataStore => ({
  put: async (record) => {
    // No ConditionExpression, PutItem replaces the whole item
    const params: PutItemCommandInput = {
      TableName: tableName,
      Item: {
        [keyAttribute]: { S: record.fileName },
        BucketName: { S: record.bucketName },
        FileSize: { N: record.fileSize.toString() },
        UploadTime: { S: record.uploadTime },
      },
    };

    try {
      await client.send(new PutItemCommand(params));
    } catch (err) {
      throw new DependencyCallError('metadata-store', `Failed to store metadata for ${record.fileName} in ${tableName}`, { cause: err });
    }
  },
});
