export type * from './types.js';

export {
  createRequestId,
  withLogContext,
  getLogContext,
} from './context.js';

export {
  createLogger,
  initObservability,
} from './logger.js';

export {
  redactUrl,
  redactSecrets,
  safeSnippet,
} from './redaction.js';
