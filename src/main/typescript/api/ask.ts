/**
 * INPUT: POST /api/ask（{ question }）
 * OUTPUT: { success: true, answer, source, confidence, elapsedMs }
 * POS: API 層，路由 + 欄位驗證，呼叫 Resolver 執行分層解析
 */

import { Router, Request, Response } from 'express';
import { Resolver } from '../services/resolver';
import { QueryValidationError } from '../models/errors';
import { ResolutionResult } from '../models/resolution';

export interface AskResponse extends ResolutionResult {
  success: true;
}

export interface ErrorResponse {
  success: false;
  message: string;
}

export type AskEngine = Pick<Resolver, 'resolve'>;

// ─── 欄位驗證 ─────────────────────────────────────────────────

function readQuestion(body: unknown): { valid: true; question: string } | { valid: false; error: string } {
  if (!body || typeof body !== 'object') {
    return { valid: false, error: '請求體必須為 JSON 物件' };
  }
  const question = (body as Record<string, unknown>)['question'];
  if (typeof question !== 'string' || !question.trim()) {
    return { valid: false, error: 'question 為必填字串' };
  }
  return { valid: true, question };
}

// ─── POST /api/ask ─────────────────────────────────────────────

export function createAskRouter(engine: AskEngine): Router {
  const router = Router();

  router.post('/ask', async (req: Request, res: Response): Promise<void> => {
    const validation = readQuestion(req.body);
    if (!validation.valid) {
      const errResp: ErrorResponse = { success: false, message: validation.error };
      res.status(400).json(errResp);
      return;
    }

    try {
      const result = await engine.resolve(validation.question);
      const body: AskResponse = { success: true, ...result };
      res.json(body);
    } catch (err) {
      if (err instanceof QueryValidationError) {
        const errResp: ErrorResponse = { success: false, message: err.message };
        res.status(400).json(errResp);
        return;
      }
      console.error('[ask] 問答執行錯誤:', err);
      const errResp: ErrorResponse = { success: false, message: '問答服務異常，請稍後再試' };
      res.status(500).json(errResp);
    }
  });

  return router;
}
