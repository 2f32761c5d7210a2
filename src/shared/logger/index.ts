export {
  logInfo,
  logError,
  logWarn,
  logDebug,
  logFatal,
  masking,
  formatMessage,
  AuthErrorCode,
  SystemErrorCode,
  BusinessErrorCode,
  createAuthError,
  createSystemError,
} from './logger';

export type { LogLevel } from './logger';

export {
  AuthError,
  SystemError,
  BusinessError,
  createErrorFactory,
} from './error-factory';
