import { createErrorFactory, type ErrorLogger } from './error-factory';

// =============================================================================
// LOGGER CONFIGURATION
// =============================================================================

const isDevelopment = process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'it';

// タイムスタンプのタイムゾーン（未指定時はUTC）
const logTimeZone = process.env.LOG_TIMEZONE || 'UTC';

// ANSIカラーコード
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

export type LogLevel = 'info' | 'error' | 'warn' | 'debug' | 'fatal';

// ログレベルごとの色設定
const levelColors: Record<LogLevel, string> = {
  info: colors.green,
  error: colors.red,
  warn: colors.yellow,
  debug: colors.cyan,
  fatal: colors.red + colors.bright,
};

const formatTimestamp = (): string => {
  const now = new Date();
  const d = now.toLocaleString('ja-JP', { timeZone: logTimeZone });
  const [datePart, timePart] = d.split(' ');
  const millis = String(now.getMilliseconds()).padStart(3, '0');
  return `${datePart.replace(/\//g, '-')} ${timePart}.${millis}`;
};

// 秘匿性のある情報に対してマスクする
export const masking = (data: string): string => {
  let masked = data;

  // JSON 形式のシークレット値をマスク
  masked = masked.replace(
    /("(password|client_secret|access_token|refresh_token|api_key|token)"\s*:\s*)"[^"]*"/gi,
    '$1"****"',
  );

  // x-www-form-urlencoded 形式のシークレット値をマスク
  masked = masked.replace(
    /\b(password|client_secret|access_token|refresh_token|api_key)\s*=\s*[^&\s]*/gi,
    '$1=****',
  );

  // JSON 形式の Authorization: Bearer をマスク
  masked = masked.replace(
    /("Authorization"\s*:\s*")((?:Bearer|Token|Basic)\s+)[^"]*(")/gi,
    '$1$2****$3',
  );

  return masked;
};

// シンプルなログ出力関数
export const formatMessage = (level: LogLevel, message: string, data?: unknown): string => {
  const timestamp = formatTimestamp();
  const dataStr = data ? ` ${masking(JSON.stringify(data))}` : '';

  if (isDevelopment) {
    return `${colors.gray}[${timestamp}]${colors.reset} ${levelColors[level]}[${level.toUpperCase()}]${colors.reset} ${message}${dataStr}`;
  } else {
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${dataStr}`;
  }
};

// ログ出力関数
export const logInfo = (message: string, data?: unknown) => {
  console.log(formatMessage('info', message, data));
};

export const logError = (message: string, error?: unknown) => {
  console.error(formatMessage('error', message, error));
};

export const logWarn = (message: string, data?: unknown) => {
  console.warn(formatMessage('warn', message, data));
};

export const logDebug = (message: string, data?: unknown) => {
  if (isDevelopment) {
    console.debug(formatMessage('debug', message, data));
  }
};

export const logFatal = (message: string, error?: unknown) => {
  console.error(formatMessage('fatal', message, error));
};

// エラーコード定義
export enum AuthErrorCode {
  INVALID_TOKEN = 'AUTH_002',
  TOKEN_EXPIRED = 'AUTH_003',
  MISSING_AUTH_HEADER = 'AUTH_007',
}

export enum SystemErrorCode {
  INTERNAL_SERVER_ERROR = 'SYS_001',
  ENVIRONMENT_VARIABLE_MISSING = 'SYS_009',
  DUPLICATE_OPERATION = 'SYS_013',
}

export enum BusinessErrorCode {
  MALFORMED_ADDRESS = 'BIZ_007',
  PROBE_CANCELLED = 'BIZ_008',
}

// エラーファクトリー（console.logベース）
const consoleLogger: ErrorLogger = {
  error: (data, message) => logError(message, data),
  warn: (data, message) => logWarn(message, data),
};

const { createAuthError, createSystemError } = createErrorFactory(consoleLogger);

export { createAuthError, createSystemError };
