import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import type { Handler } from 'aws-lambda';

import * as Sentry from '@sentry/aws-serverless';

import './lib/sentry.js';

import { loadConfig } from './lib/config.js';
import { createDynamoMetadataStore } from './lib/metadata-store.js';
import { createNotifier } from './lib/notifications.js';
import { createUploadHandler } from './lib/upload-handler.js';

const config = loadConfig(process.env);

const dynamodb = new DynamoDBClient({ region: config.region });
const store = createDynamoMetadataStore(dynamodb, { tableName: config.tableName, keyAttribute: config.keyAttribute });

const notifier = createNotifier(config);
if (!notifier) {
  console.log('NOTIFICATION_TOPIC_ARN not set, upload notifications are disabled');
}

export const handler: Handler = Sentry.wrapHandler(createUploadHandler({ store, notifier }));
