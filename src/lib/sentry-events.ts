import type * as Sentry from '@sentry/aws-serverless';

import { DependencyCallError } from './errors.js';

type BeforeSend = NonNullable<NonNullable<Parameters<typeof Sentry.init>[0]>['beforeSend']>;
type SentryErrorEvent = Parameters<BeforeSend>[0];
type SentryEventHint = Parameters<BeforeSend>[1];

// Groups failures by the AWS service that rejected the call
export const tagDependencyErrors = (event: SentryErrorEvent, hint: SentryEventHint): SentryErrorEvent => {
  const error = hint?.originalException;
  if (error instanceof DependencyCallError) {
    return { ...event, tags: { ...event.tags, dependency: error.dependency } };
  }

  return event;
};
