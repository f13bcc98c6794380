/**
 * 測試：ResponseCache，讀寫、TTL、損毀記錄、並行寫入不讀到半截資料、清理
 */

import * as fs from 'fs';
import * as path from 'path';
import { ResponseCache, cacheKeyFor, normalizeQuery } from '../core/responseCache';
import { makeTempDir, removeDir, silenceConsole } from './helpers/fixtures';

let dir: string;
let clock: number;

function makeCache(ttlMs = 60_000): ResponseCache {
  return new ResponseCache({ dir, ttlMs, now: () => clock });
}

beforeEach(() => {
  silenceConsole();
  dir = makeTempDir('cache-');
  clock = Date.parse('2026-01-01T00:00:00.000Z');
});

afterEach(() => {
  jest.restoreAllMocks();
  removeDir(dir);
});

// ─── 正規化與 key ───────────────────────────────────────────────

describe('normalizeQuery / cacheKeyFor', () => {
  test('小寫並去除前後空白', () => {
    expect(normalizeQuery('  Show Buckets  ')).toBe('show buckets');
  });

  test('大小寫與空白不同的問題得到相同 key', () => {
    expect(cacheKeyFor('  Purge Bucket ')).toBe(cacheKeyFor('purge bucket'));
  });

  test('key 為 32 字元十六進位 MD5', () => {
    expect(cacheKeyFor('purge bucket')).toMatch(/^[0-9a-f]{32}$/);
  });
});

// ─── get / set ─────────────────────────────────────────────────

describe('ResponseCache get / set', () => {
  test('set 後立即 get 取回相同答案與來源', async () => {
    const cache = makeCache();
    await cache.set('How do I purge a bucket?', 'Use the purge command.', 'vector');
    const hit = await cache.get('How do I purge a bucket?');
    expect(hit.found).toBe(true);
    if (hit.found) {
      expect(hit.entry.answer).toBe('Use the purge command.');
      expect(hit.entry.source).toBe('vector');
      expect(hit.entry.query).toBe('How do I purge a bucket?');
      expect(hit.entry.createdAt).toBe('2026-01-01T00:00:00.000Z');
    }
  });

  test('正規化後相同的問題命中同一筆', async () => {
    const cache = makeCache();
    await cache.set('Show Buckets', 'three buckets', 'quick_search');
    const hit = await cache.get('  show buckets ');
    expect(hit.found).toBe(true);
  });

  test('不存在的 key → 未命中', async () => {
    const cache = makeCache();
    expect(await cache.get('never asked')).toEqual({ found: false });
  });

  test('快取目錄不存在 → 未命中且不拋例外', async () => {
    const cache = new ResponseCache({ dir: path.join(dir, 'missing'), ttlMs: 1000 });
    await expect(cache.get('anything')).resolves.toEqual({ found: false });
  });

  test('後寫者覆蓋先寫者', async () => {
    const cache = makeCache();
    await cache.set('q', 'first', 'vector');
    await cache.set('q', 'second', 'txt_fallback');
    const hit = await cache.get('q');
    expect(hit.found && hit.entry.answer).toBe('second');
  });
});

// ─── TTL ───────────────────────────────────────────────────────

describe('ResponseCache TTL', () => {
  test('未滿 TTL 命中；剛好滿 TTL 即視為不存在', async () => {
    const cache = makeCache(1000);
    await cache.set('q', 'answer', 'vector');

    clock += 999;
    expect((await cache.get('q')).found).toBe(true);

    clock += 1;
    expect((await cache.get('q')).found).toBe(false);
  });
});

// ─── 損毀記錄 ──────────────────────────────────────────────────

describe('ResponseCache 損毀記錄', () => {
  test('非 JSON 內容 → 未命中', async () => {
    const cache = makeCache();
    fs.writeFileSync(path.join(dir, `${cacheKeyFor('q')}.json`), '{"key": "trunc', 'utf-8');
    await expect(cache.get('q')).resolves.toEqual({ found: false });
  });

  test('欄位缺漏或來源不合法 → 未命中', async () => {
    const cache = makeCache();
    const key = cacheKeyFor('q');
    fs.writeFileSync(
      path.join(dir, `${key}.json`),
      JSON.stringify({ key, query: 'q', answer: 'a', source: 'oracle', createdAt: new Date(clock).toISOString() }),
      'utf-8',
    );
    await expect(cache.get('q')).resolves.toEqual({ found: false });
  });

  test('記錄內 key 與檔名不符 → 未命中', async () => {
    const cache = makeCache();
    fs.writeFileSync(
      path.join(dir, `${cacheKeyFor('q')}.json`),
      JSON.stringify({
        key: cacheKeyFor('other'),
        query: 'other',
        answer: 'a',
        source: 'vector',
        createdAt: new Date(clock).toISOString(),
      }),
      'utf-8',
    );
    await expect(cache.get('q')).resolves.toEqual({ found: false });
  });

  test('寫入失敗（目錄路徑是檔案）→ 吞掉錯誤，之後仍為未命中', async () => {
    const filePath = path.join(dir, 'not-a-dir');
    fs.writeFileSync(filePath, 'x', 'utf-8');
    const cache = new ResponseCache({ dir: path.join(filePath, 'nested'), ttlMs: 1000 });
    await expect(cache.set('q', 'a', 'vector')).resolves.toBeUndefined();
    await expect(cache.get('q')).resolves.toEqual({ found: false });
  });
});

// ─── 並行寫入原子性 ────────────────────────────────────────────

describe('ResponseCache 原子性', () => {
  test('同一問題並行 set / get 只會讀到完整的舊值或新值', async () => {
    const cache = makeCache();
    const answers = ['A', 'B', 'C', 'D'].map((ch) => ch.repeat(200_000));
    await cache.set('hot question', answers[0], 'vector');

    const ops: Promise<unknown>[] = [];
    const reads: Promise<{ found: boolean; answer?: string }>[] = [];
    for (let round = 0; round < 5; round++) {
      for (const answer of answers) {
        ops.push(cache.set('hot question', answer, 'vector'));
        reads.push(
          cache.get('hot question').then((hit) => (hit.found ? { found: true, answer: hit.entry.answer } : { found: false })),
        );
      }
    }
    await Promise.all(ops);
    const results = await Promise.all(reads);

    for (const r of results) {
      expect(r.found).toBe(true);
      expect(answers).toContain(r.answer);
    }
    // 發佈後不殘留暫存檔
    expect(fs.readdirSync(dir).filter((f) => f.endsWith('.tmp'))).toEqual([]);
  });

  test('不同問題並行寫入互不干擾', async () => {
    const cache = makeCache();
    const queries = Array.from({ length: 20 }, (_, i) => `question ${i}`);
    await Promise.all(queries.map((q) => cache.set(q, `answer for ${q}`, 'txt_fallback')));
    for (const q of queries) {
      const hit = await cache.get(q);
      expect(hit.found && hit.entry.answer).toBe(`answer for ${q}`);
    }
  });
});

// ─── 清理 ──────────────────────────────────────────────────────

describe('ResponseCache clearExpired / clearAll', () => {
  test('clearExpired 只移除過期與損毀記錄', async () => {
    const cache = makeCache(1000);
    await cache.set('old', 'old answer', 'vector');
    clock += 600;
    await cache.set('fresh', 'fresh answer', 'vector');
    fs.writeFileSync(path.join(dir, `${cacheKeyFor('broken')}.json`), 'not json', 'utf-8');
    clock += 500;

    const removed = await cache.clearExpired();

    expect(removed).toBe(2);
    expect((await cache.get('fresh')).found).toBe(true);
    expect(fs.readdirSync(dir)).toEqual([`${cacheKeyFor('fresh')}.json`]);
  });

  test('清理讀取記錄後才發佈的新記錄不會被刪除', async () => {
    const cache = makeCache(1000);
    await cache.set('q', 'stale', 'vector');
    clock += 2000;

    const realReadFile = fs.promises.readFile;
    jest.spyOn(fs.promises, 'readFile').mockImplementationOnce(async (file, options) => {
      const raw = await realReadFile(file, options);
      await cache.set('q', 'fresh', 'vector');
      return raw;
    });

    expect(await cache.clearExpired()).toBe(1);
    const hit = await cache.get('q');
    expect(hit.found && hit.entry.answer).toBe('fresh');
    expect(fs.readdirSync(dir)).toEqual([`${cacheKeyFor('q')}.json`]);
  });

  test('未過期記錄在清理途中被覆寫 → 保留較新的記錄', async () => {
    const cache = makeCache(1000);
    await cache.set('q', 'older', 'vector');

    const realReadFile = fs.promises.readFile;
    jest.spyOn(fs.promises, 'readFile').mockImplementationOnce(async (file, options) => {
      const raw = await realReadFile(file, options);
      await cache.set('q', 'newer', 'vector');
      return raw;
    });

    expect(await cache.clearExpired()).toBe(0);
    const hit = await cache.get('q');
    expect(hit.found && hit.entry.answer).toBe('newer');
    expect(fs.readdirSync(dir)).toEqual([`${cacheKeyFor('q')}.json`]);
  });

  test('clearExpired 在目錄不存在時回傳 0', async () => {
    const cache = new ResponseCache({ dir: path.join(dir, 'missing'), ttlMs: 1000 });
    await expect(cache.clearExpired()).resolves.toBe(0);
  });

  test('clearAll 清除全部記錄', async () => {
    const cache = makeCache();
    await cache.set('q1', 'a1', 'vector');
    await cache.set('q2', 'a2', 'quick_search');

    expect(await cache.clearAll()).toBe(2);
    expect((await cache.get('q1')).found).toBe(false);
    expect((await cache.get('q2')).found).toBe(false);
  });

  test('clearExpired 與 set / get 並行時不拋例外', async () => {
    const cache = makeCache(1000);
    await Promise.all([
      cache.set('a', '1', 'vector'),
      cache.clearExpired(),
      cache.get('a'),
      cache.set('b', '2', 'vector'),
      cache.clearAll(),
      cache.clearExpired(),
    ]);
    expect(fs.readdirSync(dir).filter((f) => f.endsWith('.tmp'))).toEqual([]);
  });
});
