/**
 * INPUT: 管理 API（清除快取、重建索引、重新載入語料）
 * OUTPUT: { success, ... } 操作結果
 * POS: API 層，供維運工具呼叫的管理路由（由進入點掛上 Admin API 金鑰驗證）
 */

import { Router, Request, Response } from 'express';
import { Resolver } from '../services/resolver';
import { PathNotAllowedError } from '../models/errors';

export type AdminEngine = Pick<
  Resolver,
  'clearExpiredCache' | 'clearAllCache' | 'rebuildStructuredIndex' | 'rebuildVectorIndex' | 'reloadCorpus'
>;

/** body.path 選填；有給就必須是非空字串 */
function readOptionalPath(body: unknown): { valid: true; path?: string } | { valid: false; error: string } {
  if (!body || typeof body !== 'object') return { valid: true };
  const p = (body as Record<string, unknown>)['path'];
  if (p === undefined) return { valid: true };
  if (typeof p !== 'string' || !p.trim()) {
    return { valid: false, error: 'path 必須為非空字串' };
  }
  return { valid: true, path: p.trim() };
}

function respondFailure(res: Response, action: string, err: unknown): void {
  if (err instanceof PathNotAllowedError) {
    res.status(400).json({ success: false, message: err.message });
    return;
  }
  console.error(`[admin] ${action}失敗:`, err);
  res.status(500).json({ success: false, message: `${action}失敗，請查看伺服器紀錄` });
}

export function createAdminRouter(engine: AdminEngine): Router {
  const router = Router();

  // ─── 快取 ───────────────────────────────────────────────────

  router.post('/cache/clear-expired', async (_req: Request, res: Response): Promise<void> => {
    try {
      const removed = await engine.clearExpiredCache();
      res.json({ success: true, removed });
    } catch (err) {
      respondFailure(res, '清除過期快取', err);
    }
  });

  router.post('/cache/clear', async (_req: Request, res: Response): Promise<void> => {
    try {
      const removed = await engine.clearAllCache();
      res.json({ success: true, removed });
    } catch (err) {
      respondFailure(res, '清除快取', err);
    }
  });

  // ─── 索引重建 ────────────────────────────────────────────────

  router.post('/structured-index/rebuild', async (req: Request, res: Response): Promise<void> => {
    const input = readOptionalPath(req.body);
    if (!input.valid) {
      res.status(400).json({ success: false, message: input.error });
      return;
    }
    try {
      const loaded = await engine.rebuildStructuredIndex(input.path);
      res.json({ success: true, loaded });
    } catch (err) {
      respondFailure(res, '重建結構化索引', err);
    }
  });

  router.post('/vector-index/rebuild', async (req: Request, res: Response): Promise<void> => {
    const input = readOptionalPath(req.body);
    if (!input.valid) {
      res.status(400).json({ success: false, message: input.error });
      return;
    }
    try {
      const loaded = await engine.rebuildVectorIndex(input.path);
      res.json({ success: true, loaded });
    } catch (err) {
      respondFailure(res, '重建向量索引', err);
    }
  });

  router.post('/corpus/reload', async (req: Request, res: Response): Promise<void> => {
    const input = readOptionalPath(req.body);
    if (!input.valid) {
      res.status(400).json({ success: false, message: input.error });
      return;
    }
    try {
      const loaded = await engine.reloadCorpus(input.path ? [input.path] : undefined);
      res.json({ success: true, loaded });
    } catch (err) {
      respondFailure(res, '重新載入語料', err);
    }
  });

  return router;
}
