/**
 * 測試：StructuredIndex，屬性擷取、閘門、聯集查詢、關鍵字備援、重建
 */

import { StructuredIndex, extractAttributes, isBucketQuery } from '../core/structuredIndex';
import { AttributeKind } from '../models/resolution';
import { makeTempDir, removeDir, silenceConsole, writeFile } from './helpers/fixtures';

const METADATA = [
  'department: engineering | name: logs-bucket',
  'department: finance | name: ledger-archive | label: retention:7y',
  'label: prod | bucket: web-assets',
  '',
  'dept: engineering | bucket name: build-cache',
].join('\n');

let dir: string;
let metadataPath: string;

beforeEach(() => {
  silenceConsole();
  dir = makeTempDir('index-');
  metadataPath = writeFile(dir, 'metadata.txt', METADATA);
});

afterEach(() => {
  jest.restoreAllMocks();
  removeDir(dir);
});

async function buildIndex(options: { maxResults?: number; keywordFallback?: boolean } = {}): Promise<StructuredIndex> {
  const index = new StructuredIndex({ maxResults: options.maxResults ?? 20, keywordFallback: options.keywordFallback });
  await index.build(metadataPath);
  return index;
}

/** 每個屬性桶：值 → 行號 */
function bucketContents(index: StructuredIndex): Record<AttributeKind, Record<string, number[]>> {
  const contents = (kind: AttributeKind): Record<string, number[]> =>
    Object.fromEntries(index.bucketKeys(kind).map((key) => [key, index.lookup(kind, key).map((l) => l.lineNumber)]));
  return { department: contents('department'), label: contents('label'), resourceName: contents('resourceName') };
}

function lineNumbers(index: StructuredIndex, query: string): number[] {
  const result = index.quickSearch(query);
  return result.found ? result.lines.map((l) => l.lineNumber) : [];
}

// ─── 屬性擷取 ──────────────────────────────────────────────────

describe('extractAttributes', () => {
  test('擷取部門與名稱', () => {
    expect(extractAttributes('department: engineering | name: logs-bucket')).toEqual({
      department: ['engineering'],
      resourceName: ['logs-bucket'],
    });
  });

  test('標籤值可含冒號', () => {
    expect(extractAttributes('label: retention:7y').label).toEqual(['retention:7y']);
  });

  test('沒有屬性的行回傳空物件', () => {
    expect(extractAttributes('just some prose')).toEqual({});
  });
});

// ─── 閘門 ──────────────────────────────────────────────────────

describe('isBucketQuery', () => {
  test.each([
    'department: engineering',
    'Dept: finance',
    'label: prod',
    'name: logs-bucket',
    'bucket name: build-cache',
    'show buckets with department: engineering',
  ])('帶屬性標記 → true：%s', (q) => {
    expect(isBucketQuery(q)).toBe(true);
  });

  test.each([
    'How do I purge a bucket?',
    'what is the department of logs',
    'rename the bucket',
    'how to purge bucket in Cloudian',
  ])('一般問題 → false：%s', (q) => {
    expect(isBucketQuery(q)).toBe(false);
  });
});

// ─── build / quickSearch ──────────────────────────────────────

describe('StructuredIndex build', () => {
  test('建立後啟用，行號含空白行但空白行不入索引', async () => {
    const index = await buildIndex();
    expect(index.enabled).toBe(true);
    expect(index.lineCount).toBe(4);
    expect(index.lookup('department', 'engineering').map((l) => l.lineNumber)).toEqual([1, 5]);
    expect(index.lookup('resourceName', 'build-cache').map((l) => l.lineNumber)).toEqual([5]);
  });

  test('lookup 不分大小寫', async () => {
    const index = await buildIndex();
    expect(index.lookup('department', ' Engineering ')).toHaveLength(2);
  });

  test('檔案不存在 → 停用並記錄錯誤', async () => {
    const index = new StructuredIndex({ maxResults: 20 });
    const ok = await index.build(`${dir}/missing.txt`);
    expect(ok).toBe(false);
    expect(index.enabled).toBe(false);
    expect(index.quickSearch('department: engineering')).toEqual({ found: false });
    expect(index.health().loaded).toBe(false);
    expect(index.health().lastError).toBeDefined();
  });

  test('重複建立同一檔案：各桶的值與行號完全相同', async () => {
    const index = await buildIndex();
    const before = bucketContents(index);
    expect(before).toEqual({
      department: { engineering: [1, 5], finance: [2] },
      label: { 'retention:7y': [2], prod: [3] },
      resourceName: { 'logs-bucket': [1], 'ledger-archive': [2], 'web-assets': [3], 'build-cache': [5] },
    });

    await index.build(metadataPath);

    expect(bucketContents(index)).toEqual(before);
    expect(index.lineCount).toBe(4);
  });

  test('重建為新檔案時整批替換', async () => {
    const index = await buildIndex();
    const nextPath = writeFile(dir, 'next.txt', 'department: legal | name: contracts');
    await index.build(nextPath);
    expect(index.path).toBe(nextPath);
    expect(index.lookup('department', 'engineering')).toEqual([]);
    expect(index.lookup('department', 'legal').map((l) => l.lineNumber)).toEqual([1]);
  });

  test('設定 root 時拒絕目錄外的檔案，且保留現有索引', async () => {
    const outside = makeTempDir('outside-');
    try {
      const foreign = writeFile(outside, 'foreign.txt', 'department: legal | name: contracts');
      const index = new StructuredIndex({ maxResults: 20, root: dir });
      expect(await index.build(metadataPath)).toBe(true);

      expect(await index.build(foreign)).toBe(false);

      expect(index.path).toBe(metadataPath);
      expect(index.enabled).toBe(true);
      expect(index.lookup('department', 'legal')).toEqual([]);
      expect(index.health().lastError).toContain('路徑不在允許的目錄內');
    } finally {
      removeDir(outside);
    }
  });

  test('重建失敗時清空舊資料', async () => {
    const index = await buildIndex();
    await index.build(`${dir}/gone.txt`);
    expect(index.lineCount).toBe(0);
    expect(index.enabled).toBe(false);
  });
});

describe('StructuredIndex quickSearch', () => {
  test('部門查詢回傳所有命中行與格式化文字', async () => {
    const index = await buildIndex();
    const result = index.quickSearch('department: engineering');
    expect(result).toEqual({
      found: true,
      lines: expect.any(Array),
      text:
        'Line 1: department: engineering | name: logs-bucket\n' +
        'Line 5: dept: engineering | bucket name: build-cache',
    });
  });

  test('多種屬性取聯集，依部門、標籤、名稱順序', async () => {
    const index = await buildIndex();
    expect(lineNumbers(index, 'label: prod or name: logs-bucket')).toEqual([3, 1]);
  });

  test('同一行多次命中只出現一次', async () => {
    const index = await buildIndex();
    expect(lineNumbers(index, 'bucket: web-assets label: prod')).toEqual([3]);
  });

  test('結果數量受 maxResults 限制', async () => {
    const index = await buildIndex({ maxResults: 1 });
    expect(lineNumbers(index, 'department: engineering')).toEqual([1]);
  });

  test('不帶屬性標記的問題不進入本層', async () => {
    const index = await buildIndex({ keywordFallback: true });
    expect(index.quickSearch('How do I purge the logs-bucket?')).toEqual({ found: false });
  });

  test('通過閘門但無命中：預設不做關鍵字掃描', async () => {
    const index = await buildIndex();
    expect(index.quickSearch('department: marketing')).toEqual({ found: false });
  });

  test('通過閘門但無命中：開啟後以第一個有命中的關鍵詞掃描', async () => {
    const index = await buildIndex({ keywordFallback: true });
    expect(lineNumbers(index, 'department: marketing')).toEqual([1, 2]);
  });
});
