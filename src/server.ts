import app from './app';
import { logInfo, logError } from './shared/logger';
import { APP_CONFIG } from './shared/config';

// サーバー起動
const PORT = APP_CONFIG.PORT;

const startServer = () => {
  const server = app.listen(PORT, () => {
    logInfo(`Server is running on port ${PORT}`);
  });

  server.on('error', (error) => {
    logError('Failed to start server', { message: error.message, stack: error.stack });
    process.exit(1);
  });

  // 停止シグナルで新規接続の受付を止める（実行中の疎通確認はクライアント切断でキャンセルされる）
  const shutdown = (signal: NodeJS.Signals) => {
    logInfo('Shutting down server', { signal });
    server.close((error) => {
      if (error) {
        logError('Failed to close server', { message: error.message });
        process.exitCode = 1;
      }
    });
    server.closeAllConnections();
  };

  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);
};

startServer();
