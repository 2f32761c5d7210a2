import * as dotenv from 'dotenv';
import { createSystemError, SystemErrorCode } from '../logger';

// 環境変数ファイルの読み込み
dotenv.config();

// 環境変数取得関数
export const getEnvVariable = (key: string): string => {
  const value = process.env[key];
  if (!value) {
    throw createSystemError(
      SystemErrorCode.ENVIRONMENT_VARIABLE_MISSING,
      `Environment variable ${key} is not set`
    );
  }
  return value;
};

// 環境変数取得関数（デフォルト値付き）
export const getEnvVariableWithDefault = (key: string, defaultValue: string): string => {
  return process.env[key] || defaultValue;
};
