/**
 * INPUT: 問題字串、答案、來源層級
 * OUTPUT: CacheLookup（命中 / 未命中）、過期清理、全部清除
 * POS: 核心模組，檔案式回應快取（每個正規化問題一個 JSON 檔），TTL 過期視同不存在
 *
 * 寫入先寫暫存檔再 rename 發佈，讀取端只會看到舊檔或完整新檔。
 * 過期清理先 rename 取得記錄再判斷，不會刪到清理途中才發佈的新記錄。
 * 所有 I/O 與解析錯誤皆吞掉並記錄，快取不影響解析正確性。
 */

import { createHash, randomBytes } from 'crypto';
import { promises as fsp } from 'fs';
import * as path from 'path';
import { CacheEntry, CacheLookup, ResolutionSource, isResolutionSource } from '../models/resolution';
import { errorMessage } from '../models/errors';

const RECORD_EXT = '.json';
const TEMP_EXT = '.tmp';

export interface ResponseCacheOptions {
  dir: string;
  ttlMs: number;
  now?: () => number;
}

/** 小寫 + 去除前後空白 */
export function normalizeQuery(query: string): string {
  return query.toLowerCase().trim();
}

export function cacheKeyFor(query: string): string {
  return createHash('md5').update(normalizeQuery(query)).digest('hex');
}

function hasErrorCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

function isNotFound(err: unknown): boolean {
  return hasErrorCode(err, 'ENOENT');
}

function isAlreadyExists(err: unknown): boolean {
  return hasErrorCode(err, 'EEXIST');
}

/** 驗證磁碟記錄形狀，不合法回傳 null */
function parseEntry(raw: string): CacheEntry | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof data !== 'object' || data === null) return null;
  const rec = data as Record<string, unknown>;
  if (
    typeof rec['key'] !== 'string' ||
    typeof rec['query'] !== 'string' ||
    typeof rec['answer'] !== 'string' ||
    !isResolutionSource(rec['source']) ||
    typeof rec['createdAt'] !== 'string' ||
    Number.isNaN(Date.parse(rec['createdAt']))
  ) {
    return null;
  }
  return {
    key: rec['key'],
    query: rec['query'],
    answer: rec['answer'],
    source: rec['source'],
    createdAt: rec['createdAt'],
  };
}

export class ResponseCache {
  private readonly dir: string;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: ResponseCacheOptions) {
    this.dir = options.dir;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  private recordPath(key: string): string {
    return path.join(this.dir, `${key}${RECORD_EXT}`);
  }

  private isFresh(entry: CacheEntry): boolean {
    return this.now() - Date.parse(entry.createdAt) < this.ttlMs;
  }

  async get(query: string): Promise<CacheLookup> {
    const key = cacheKeyFor(query);
    let raw: string;
    try {
      raw = await fsp.readFile(this.recordPath(key), 'utf-8');
    } catch (err) {
      if (!isNotFound(err)) {
        console.warn(`[responseCache] 讀取快取失敗，視為未命中：${errorMessage(err)}`);
      }
      return { found: false };
    }

    const entry = parseEntry(raw);
    if (!entry || entry.key !== key) {
      console.warn(`[responseCache] 快取記錄損毀，視為未命中：${key}`);
      return { found: false };
    }
    if (!this.isFresh(entry)) return { found: false };
    return { found: true, entry };
  }

  async set(query: string, answer: string, source: ResolutionSource): Promise<void> {
    const key = cacheKeyFor(query);
    const entry: CacheEntry = {
      key,
      query,
      answer,
      source,
      createdAt: new Date(this.now()).toISOString(),
    };
    const target = this.recordPath(key);
    const temp = `${target}.${process.pid}.${randomBytes(6).toString('hex')}${TEMP_EXT}`;

    try {
      await fsp.mkdir(this.dir, { recursive: true });
      await fsp.writeFile(temp, JSON.stringify(entry, null, 2), 'utf-8');
      await fsp.rename(temp, target);
    } catch (err) {
      console.warn(`[responseCache] 寫入快取失敗（已忽略）：${errorMessage(err)}`);
      await fsp.rm(temp, { force: true }).catch(() => undefined);
    }
  }

  private async listFiles(): Promise<string[]> {
    try {
      return await fsp.readdir(this.dir);
    } catch (err) {
      if (!isNotFound(err)) {
        console.warn(`[responseCache] 無法列出快取目錄：${errorMessage(err)}`);
      }
      return [];
    }
  }

  private async remove(file: string): Promise<boolean> {
    try {
      await fsp.unlink(path.join(this.dir, file));
      return true;
    } catch (err) {
      // 並行清理或覆寫造成的 ENOENT 不算錯誤
      if (!isNotFound(err)) {
        console.warn(`[responseCache] 刪除 ${file} 失敗：${errorMessage(err)}`);
      }
      return false;
    }
  }

  /** 移除過期與損毀記錄，回傳移除筆數 */
  async clearExpired(): Promise<number> {
    let removed = 0;
    for (const file of await this.listFiles()) {
      if (!file.endsWith(RECORD_EXT)) continue;
      if (await this.sweepRecord(file)) removed++;
    }
    if (removed > 0) console.log(`[responseCache] 清除 ${removed} 筆過期快取`);
    return removed;
  }

  /**
   * 先把記錄 rename 成暫存名稱再判斷，並行 set 發佈的新記錄不會被誤刪。
   * 仍有效的記錄以 link 放回；原位置已有新記錄（EEXIST）時以新記錄為準。
   */
  private async sweepRecord(file: string): Promise<boolean> {
    const target = path.join(this.dir, file);
    const claim = `${target}.${process.pid}.${randomBytes(6).toString('hex')}${TEMP_EXT}`;
    try {
      await fsp.rename(target, claim);
    } catch (err) {
      if (!isNotFound(err)) {
        console.warn(`[responseCache] 無法鎖定 ${file}：${errorMessage(err)}`);
      }
      return false;
    }

    let raw: string | null = null;
    try {
      raw = await fsp.readFile(claim, 'utf-8');
    } catch (err) {
      console.warn(`[responseCache] 讀取 ${file} 失敗：${errorMessage(err)}`);
    }
    const entry = raw === null ? null : parseEntry(raw);
    const keep = raw === null || (entry !== null && this.isFresh(entry));

    if (keep) {
      try {
        await fsp.link(claim, target);
      } catch (err) {
        if (!isAlreadyExists(err) && !isNotFound(err)) {
          console.warn(`[responseCache] 無法放回 ${file}：${errorMessage(err)}`);
        }
      }
    }
    await fsp.rm(claim, { force: true }).catch((err: unknown) => {
      console.warn(`[responseCache] 刪除暫存 ${claim} 失敗：${errorMessage(err)}`);
    });
    return !keep;
  }

  /** 無條件清除所有記錄（含殘留暫存檔），回傳移除筆數 */
  async clearAll(): Promise<number> {
    let removed = 0;
    for (const file of await this.listFiles()) {
      if (!file.endsWith(RECORD_EXT) && !file.endsWith(TEMP_EXT)) continue;
      if ((await this.remove(file)) && file.endsWith(RECORD_EXT)) removed++;
    }
    console.log(`[responseCache] 已清除全部快取（${removed} 筆）`);
    return removed;
  }
}
