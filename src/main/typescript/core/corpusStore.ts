/**
 * INPUT: 候選語料檔路徑清單（依序嘗試）、允許的語料目錄
 * OUTPUT: 全文備援所需的語料快照（loaded + text）
 * POS: 核心模組，優先載入第一個可讀且非空的扁平化文字檔，重新載入時整份替換
 */

import { promises as fsp } from 'fs';
import { ComponentHealth } from '../models/resolution';
import { errorMessage } from '../models/errors';
import { validatePathWithin } from '../utils/validators';

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);

/** UTF-8（去除 BOM）；出現無法解碼的位元組時改以 latin1 解讀 */
export function decodeCorpusText(bytes: Buffer): string {
  const body = bytes.subarray(0, UTF8_BOM.length).equals(UTF8_BOM) ? bytes.subarray(UTF8_BOM.length) : bytes;
  const text = body.toString('utf-8');
  return text.includes('\uFFFD') ? body.toString('latin1') : text;
}

export interface CorpusSnapshot {
  loaded: boolean;
  path: string | null;
  text: string;
}

const NOT_LOADED: CorpusSnapshot = { loaded: false, path: null, text: '' };

export class CorpusStore {
  private snapshot: CorpusSnapshot = NOT_LOADED;
  private lastLoadDurationMs: number | null = null;
  private lastError: string | undefined;

  /** root 有值時，只讀取位於該目錄下的檔案 */
  constructor(
    private candidatePaths: string[],
    private readonly root?: string,
  ) {}

  get current(): CorpusSnapshot {
    return this.snapshot;
  }

  /** 依序讀取候選路徑；皆失敗則標記未載入 */
  async load(paths: string[] = this.candidatePaths): Promise<CorpusSnapshot> {
    const startedAt = Date.now();
    this.candidatePaths = paths;
    const failures: string[] = [];
    let firstEmpty: string | null = null;

    for (const p of paths) {
      if (this.root !== undefined) {
        const check = await validatePathWithin(p, this.root);
        if (!check.valid) {
          failures.push(check.error);
          continue;
        }
      }
      try {
        const text = decodeCorpusText(await fsp.readFile(p));
        if (!text.trim()) {
          firstEmpty = firstEmpty ?? p;
          continue;
        }
        return this.publish({ loaded: true, path: p, text }, startedAt);
      } catch (err) {
        failures.push(`${p}：${errorMessage(err)}`);
      }
    }

    // 只有空檔可讀：語料已載入但沒有內容，後續查詢為 not_found 而非 no_data
    if (firstEmpty !== null) {
      return this.publish({ loaded: true, path: firstEmpty, text: '' }, startedAt);
    }

    this.snapshot = NOT_LOADED;
    this.lastError = failures.length > 0 ? failures.join('；') : '未設定語料路徑';
    this.lastLoadDurationMs = Date.now() - startedAt;
    console.warn(`[corpusStore] 找不到可讀的語料檔：${this.lastError}`);
    return this.snapshot;
  }

  private publish(next: CorpusSnapshot, startedAt: number): CorpusSnapshot {
    this.snapshot = next;
    this.lastError = undefined;
    this.lastLoadDurationMs = Date.now() - startedAt;
    console.log(`[corpusStore] 已載入 ${next.text.length} 字元（${next.path}）`);
    return next;
  }

  health(): ComponentHealth {
    return {
      loaded: this.snapshot.loaded,
      lastLoadDurationMs: this.lastLoadDurationMs,
      ...(this.lastError ? { lastError: this.lastError } : {}),
    };
  }
}
