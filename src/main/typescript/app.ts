/**
 * INPUT: 已啟動的 Resolver、Admin API 金鑰
 * OUTPUT: Express app（問答 + 管理 + 健康檢查路由）
 * POS: 應用組裝層，與 listen 分離以便測試直接掛載
 */

import express, { Request, Response, NextFunction, Express } from 'express';
import { Resolver } from './services/resolver';
import { createAskRouter } from './api/ask';
import { createAdminRouter } from './api/admin';

export type AppEngine = Pick<
  Resolver,
  | 'resolve'
  | 'healthCheck'
  | 'clearExpiredCache'
  | 'clearAllCache'
  | 'rebuildStructuredIndex'
  | 'rebuildVectorIndex'
  | 'reloadCorpus'
>;

export function createApp(engine: AppEngine, adminApiKey: string): Express {
  const app = express();
  app.use(express.json());

  // Admin API 金鑰驗證中介層（未設定金鑰則一律拒絕）
  function adminAuth(req: Request, res: Response, next: NextFunction): void {
    const key = req.headers['x-admin-api-key'];
    if (!adminApiKey || key !== adminApiKey) {
      res.status(401).json({ success: false, message: '未授權：缺少或錯誤的 Admin API Key' });
      return;
    }
    next();
  }

  app.use('/api/admin', adminAuth, createAdminRouter(engine));
  app.use('/api', createAskRouter(engine));

  // 健康檢查
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', ...engine.healthCheck() });
  });

  return app;
}
