// =====================================================
// Sentry Instrumentation
// =====================================================
// Must be imported before any other application code.
// Initializes Sentry error tracking for the ingestion CLI.

import * as Sentry from '@sentry/node';
import { config } from './config';

if (config.sentry.dsn) {
  Sentry.init({
    dsn: config.sentry.dsn,
    environment: config.sentry.environment,
    release: `scoutline-ingest@${process.env.npm_package_version || '0.1.0'}`,
    sendDefaultPii: false,
  });
}
