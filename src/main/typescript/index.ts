/**
 * INPUT: 環境變數（.env）
 * OUTPUT: Express HTTP 伺服器（問答 + 管理 API）
 * POS: 應用程式進入點，載入設定、啟動解析引擎後開始監聽
 */

import dotenv from 'dotenv';
dotenv.config();

import { loadSettings } from './config/settings';
import { createResolver } from './services/engine';
import { createApp } from './app';

async function main(): Promise<void> {
  const settings = loadSettings();
  const resolver = createResolver(settings);
  await resolver.start();

  const app = createApp(resolver, settings.adminApiKey);
  const server = app.listen(settings.port, () => {
    console.log(`🚀 文件問答引擎 啟動成功`);
    console.log(`📡 伺服器運行於 http://localhost:${settings.port}`);
    console.log(`💡 健康檢查：http://localhost:${settings.port}/health`);
  });

  const shutdown = (): void => {
    console.log('[index] 收到結束訊號，關閉中...');
    resolver.close();
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err) => {
  console.error('[index] 啟動失敗:', err);
  process.exit(1);
});
