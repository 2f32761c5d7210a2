import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { APP_CONFIG } from '../config';
import { getEnvVariable } from '../config/environment';
import { logError, logWarn, createAuthError, AuthError, AuthErrorCode } from '../logger';

// 制御元サービスが発行するトークンのクレーム
const serviceClaimsSchema = z.object({
  client_id: z.string().min(1),
  iss: z.string().optional(),
  aud: z.union([z.string(), z.array(z.string())]).optional(),
  exp: z.number().optional(),
});

/**
 * S2S JWT認証ミドルウェア
 *
 * 疎通確認の開始・キャンセルを行う制御元サービスからのリクエストのみを受け入れる
 */
export const requireS2SAuth = (req: Request, res: Response, next: NextFunction): void => {
  try {
    // Authorization ヘッダの取得
    const authHeader = req.headers.authorization || '';
    const token = authHeader.startsWith('Bearer ') ? authHeader.slice(7) : '';

    if (!token) {
      logWarn('Missing S2S JWT token', { path: req.path });
      throw createAuthError(
        AuthErrorCode.MISSING_AUTH_HEADER,
        'Missing service token'
      );
    }

    // JWT検証（署名・発行者・対象・有効期限）
    const secret = getEnvVariable('PROBE_JWT_SECRET');
    const decoded = jwt.verify(token, secret, {
      algorithms: ['HS256'],
      issuer: APP_CONFIG.JWT_ISSUER,
      audience: APP_CONFIG.JWT_AUDIENCE,
    });

    // 必須クレームの検証
    const claims = serviceClaimsSchema.safeParse(decoded);
    if (!claims.success) {
      logWarn('Invalid claims in S2S JWT', { path: req.path });
      throw createAuthError(
        AuthErrorCode.INVALID_TOKEN,
        'Invalid client'
      );
    }

    // リクエストに認証情報を付与
    res.locals.operatorId = `SERVICE:${claims.data.client_id}`;

    next();
  } catch (error: unknown) {
    if (error instanceof jwt.TokenExpiredError) {
      logWarn('Expired S2S JWT token', { path: req.path });
      res.status(401).json({
        error: 'Unauthorized',
        message: 'Token expired',
        code: AuthErrorCode.TOKEN_EXPIRED,
      });
      return;
    }

    if (error instanceof jwt.JsonWebTokenError) {
      logWarn('Invalid S2S JWT token', { error: error.message, path: req.path });
      res.status(401).json({
        error: 'Unauthorized',
        message: 'Invalid service token',
      });
      return;
    }

    // カスタムエラーの場合
    if (error instanceof AuthError) {
      res.status(error.statusCode).json({
        error: error.name,
        message: error.message,
        code: error.code,
      });
      return;
    }

    // その他のエラー（シークレット未設定など）
    logError('S2S JWT authentication error', {
      error: error instanceof Error ? error.message : String(error),
      path: req.path,
    });
    res.status(401).json({
      error: 'Unauthorized',
      message: 'Authentication failed',
    });
  }
};
