import { z } from 'zod';
import { getEnvVariableWithDefault } from './environment';

// setTimeout に渡せる最大の遅延（これを超えると 1ms に丸められる）
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

const intervalMsSchema = z.coerce.number().int().positive().max(MAX_TIMER_DELAY_MS);

// アプリケーション設定のスキーマ（環境変数の文字列を数値へ変換して検証する）
const appConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535),
  CORS_ORIGIN: z.string().min(1),
  REQUEST_SIZE_LIMIT: z.string().min(1),
  PROBE_INTERVAL_MS: intervalMsSchema,
  PROBE_LOG_INTERVAL_MS: intervalMsSchema,
  JWT_ISSUER: z.string().min(1),
  JWT_AUDIENCE: z.string().min(1),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

export const parseAppConfig = (raw: Record<keyof AppConfig, string>): AppConfig => appConfigSchema.parse(raw);

// アプリケーション設定
export const APP_CONFIG = parseAppConfig({
  // サーバー設定
  PORT: getEnvVariableWithDefault('PORT', '7070'),
  // 制御APIを呼び出すフロントエンド/運用ツールのオリジン
  CORS_ORIGIN: getEnvVariableWithDefault('CORS_ORIGIN', 'http://localhost:3000'),

  // リクエスト設定
  REQUEST_SIZE_LIMIT: getEnvVariableWithDefault('REQUEST_SIZE_LIMIT', '100kb'),

  // 疎通確認の設定
  PROBE_INTERVAL_MS: getEnvVariableWithDefault('PROBE_INTERVAL_MS', '100'),
  PROBE_LOG_INTERVAL_MS: getEnvVariableWithDefault('PROBE_LOG_INTERVAL_MS', '1000'),

  // サービス間JWTの検証設定（シークレットはリクエスト毎に PROBE_JWT_SECRET から取得）
  JWT_ISSUER: getEnvVariableWithDefault('PROBE_JWT_ISSUER', 'probe-control'),
  JWT_AUDIENCE: getEnvVariableWithDefault('PROBE_JWT_AUDIENCE', 'probe-dispatcher'),
});
