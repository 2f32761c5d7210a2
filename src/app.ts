import express from 'express';
import cors from 'cors';
import morgan from 'morgan';
import helmet from 'helmet';
import router from './routes';
import { logError, logInfo } from './shared/logger';
import { APP_CONFIG } from './shared/config';

const app = express();

// セキュリティミドルウェア
app.use(helmet());

// CORS設定
app.use(cors({
  origin: APP_CONFIG.CORS_ORIGIN,
}));

// ログ出力
app.use(morgan('combined'));

// JSON解析
app.use(express.json({ limit: APP_CONFIG.REQUEST_SIZE_LIMIT }));

// リクエスト毎にログを出力（疎通確認は長時間かかるため、レスポンス完了時に出力する）
const outputRequest = (req: express.Request, res: express.Response, next: express.NextFunction) => {
  const startedAt = Date.now();

  res.on('finish', () => {
    const loginfo = {
      request: {
        url: req.originalUrl,
        method: req.method,
        body: req.body,
        header: req.headers,
        operatorId: res.locals.operatorId,
      },
      response: {
        statusCode: res.statusCode,
        durationMs: Date.now() - startedAt,
      },
    };

    logInfo('[operation]', loginfo);
  });

  next();
};

app.use(outputRequest);


// ルーターをマウント
app.use('/', router);


// エラーハンドリング
// eslint-disable-next-line @typescript-eslint/no-unused-vars
app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
  const error = err instanceof Error ? err : new Error(String(err));
  logError('Unhandled request error', { url: req.originalUrl, message: error.message, stack: error.stack });
  res.status(500).json({ error: 'Internal Server Error' });
});

export default app;
