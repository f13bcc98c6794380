/**
 * INPUT: 使用者輸入的問題（任意型別）、要讀取的資料檔路徑
 * OUTPUT: 驗證結果（合法且清理過的問題 / 解析後的路徑，或錯誤訊息）
 * POS: 工具模組，進入解析流程前的輸入驗證與資料檔路徑限制；不合法即拒絕，不做隱性修正
 */

import { promises as fsp } from 'fs';
import * as path from 'path';

const DEFAULT_MAX_LENGTH = 2000;

/** 可疑內容：路徑穿越、腳本注入、程式碼執行、檔案協定 */
const SUSPICIOUS_PATTERNS: RegExp[] = [
  /\.\.\//,
  /\.\.\\/,
  /<script/i,
  /javascript:/i,
  /eval\(/i,
  /exec\(/i,
  /import\s+/i,
  /__.*__/,
  /file:\/\//i,
  /ftp:\/\//i,
];

/** 允許字母、數字、空白與常見標點，其餘字元移除 */
const DISALLOWED_CHARS = /[^\p{L}\p{N}_\s\-:.,?!@#$%^&*()+=[\]{}|;'"/<>]/gu;

export type QueryValidation = { valid: true; query: string } | { valid: false; error: string };

export function validateQuery(raw: unknown, maxLength = DEFAULT_MAX_LENGTH): QueryValidation {
  if (typeof raw !== 'string') {
    return { valid: false, error: 'question 必須為字串' };
  }

  const trimmed = raw.trim();
  if (!trimmed) {
    return { valid: false, error: 'question 不得為空白' };
  }
  if (trimmed.length > maxLength) {
    return { valid: false, error: `question 不得超過 ${maxLength} 字` };
  }

  for (const pattern of SUSPICIOUS_PATTERNS) {
    if (pattern.test(trimmed)) {
      console.warn(`[validators] 問題含可疑內容：${pattern.source}`);
      return { valid: false, error: 'question 含有不允許的內容' };
    }
  }

  const sanitized = trimmed.replace(DISALLOWED_CHARS, '').trim();
  if (!sanitized) {
    return { valid: false, error: 'question 清理後沒有可查詢的內容' };
  }

  return { valid: true, query: sanitized };
}

// ─── 資料檔路徑限制 ────────────────────────────────────────────

export type PathValidation = { valid: true; path: string } | { valid: false; error: string };

function isInside(candidate: string, root: string): boolean {
  const rel = path.relative(root, candidate);
  return rel !== '' && rel !== '..' && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

/** 路徑（含符號連結解析後）必須位於 root 目錄之下 */
export async function validatePathWithin(candidate: string, root: string): Promise<PathValidation> {
  const resolved = path.resolve(candidate);
  const resolvedRoot = path.resolve(root);
  const rejected: PathValidation = { valid: false, error: `路徑不在允許的目錄內：${candidate}` };
  if (!isInside(resolved, resolvedRoot)) return rejected;

  let realCandidate: string;
  let realRoot: string;
  try {
    [realCandidate, realRoot] = await Promise.all([fsp.realpath(resolved), fsp.realpath(resolvedRoot)]);
  } catch {
    // 檔案不存在：只做字面檢查，讀檔時再回報錯誤
    return { valid: true, path: resolved };
  }
  if (!isInside(realCandidate, realRoot)) {
    console.warn(`[validators] 符號連結指向允許目錄之外：${candidate}`);
    return rejected;
  }
  return { valid: true, path: resolved };
}
