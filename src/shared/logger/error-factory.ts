// エラー生成時にログを出力するためのロガー
export interface ErrorLogger {
  error: (data: Record<string, unknown>, message: string) => void;
  warn: (data: Record<string, unknown>, message: string) => void;
}

// カスタムエラークラス
export class AuthError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 401
  ) {
    super(message);
    this.name = 'AuthError';
  }
}

export class SystemError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 500
  ) {
    super(message);
    this.name = 'SystemError';
  }
}

export class BusinessError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 400
  ) {
    super(message);
    this.name = 'BusinessError';
  }
}

// エラーファクトリー関数
export const createErrorFactory = (logger: ErrorLogger) => {
  return {
    createAuthError: (code: string, message: string, statusCode: number = 401): AuthError => {
      const error = new AuthError(code, message, statusCode);
      logger.warn({ code, statusCode }, message);
      return error;
    },

    createSystemError: (code: string, message: string, statusCode: number = 500): SystemError => {
      const error = new SystemError(code, message, statusCode);
      logger.error({ code, statusCode }, message);
      return error;
    },
  };
};
