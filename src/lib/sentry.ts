import * as Sentry from '@sentry/aws-serverless';

import { tagDependencyErrors } from './sentry-events.js';

if (!process.env.SENTRY_DSN) {
  throw new Error('Missing SENTRY_DSN');
}

if (!process.env.SENTRY_RELEASE) {
  throw new Error('Missing SENTRY_RELEASE');
}

if (!process.env.FILE_METADATA_ENV) {
  throw new Error('Missing FILE_METADATA_ENV');
}

Sentry.init({
  dsn: process.env.SENTRY_DSN,
  environment: process.env.FILE_METADATA_ENV,
  release: process.env.SENTRY_RELEASE,
  tracesSampleRate: 1.0,
  beforeSend: tagDependencyErrors,
});
