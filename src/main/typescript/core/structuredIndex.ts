/**
 * INPUT: 扁平化的儲存桶中繼資料文字檔（每行一筆）
 * OUTPUT: QuickSearchResult（部門 / 標籤 / 資源名稱倒排索引查詢）
 * POS: 核心模組，啟動時一次建好的記憶體倒排索引；重建為整批替換，不做增量修補
 */

import { promises as fsp } from 'fs';
import { AttributeKind, ComponentHealth, IndexedLine, QuickSearchResult } from '../models/resolution';
import { errorMessage } from '../models/errors';
import { validatePathWithin } from '../utils/validators';

// ─── 屬性擷取規則（皆套用於小寫後的文字） ──────────────────────

const ATTRIBUTE_PATTERNS: Record<AttributeKind, RegExp> = {
  department: /(?:dept|department)\s*:?\s*"?([\w\-\s]+)"?/g,
  label: /label\s*:?\s*"?([\w\-:.]+)"?/g,
  resourceName: /(?:bucket(?:\s*name)?|name)\s*:?\s*"?([a-z0-9_\-.]+)"?/g,
};

/** 查詢端擷取：必須帶冒號，避免 "purge bucket in ..." 被誤判為名稱 */
const QUERY_PATTERNS: Record<AttributeKind, RegExp> = {
  department: /\b(?:dept|department)\s*:\s*"?([\w\-\s]+)"?/,
  label: /\blabel\s*:\s*"?([\w\-:.]+)"?/,
  resourceName: /\b(?:bucket(?:\s*name)?|name)\s*:\s*"?([a-z0-9_\-.]+)"?/,
};

/** 閘門：只有明確帶「屬性:」標記的查詢才進入本層 */
const GATE_PATTERNS: RegExp[] = [
  /\b(?:dept|department)\s*:/,
  /\blabel\s*:/,
  /\b(?:bucket(?:\s*name)?|name)\s*:/,
];

const ATTRIBUTE_KINDS: AttributeKind[] = ['department', 'label', 'resourceName'];

export function extractAttributes(lowerLine: string): Partial<Record<AttributeKind, string[]>> {
  const tags: Partial<Record<AttributeKind, string[]>> = {};
  for (const kind of ATTRIBUTE_KINDS) {
    const values: string[] = [];
    for (const m of lowerLine.matchAll(ATTRIBUTE_PATTERNS[kind])) {
      const value = (m[1] ?? '').trim();
      if (value && !values.includes(value)) values.push(value);
    }
    if (values.length > 0) tags[kind] = values;
  }
  return tags;
}

export function isBucketQuery(query: string): boolean {
  const lower = query.toLowerCase();
  return GATE_PATTERNS.some((p) => p.test(lower));
}

export function formatIndexedLines(lines: IndexedLine[]): string {
  return lines.map((l) => `Line ${l.lineNumber}: ${l.rawText}`).join('\n');
}

// ─── 索引快照（建好後不可變） ──────────────────────────────────

interface IndexSnapshot {
  lines: IndexedLine[];
  buckets: Record<AttributeKind, Map<string, IndexedLine[]>>;
}

function emptySnapshot(): IndexSnapshot {
  return {
    lines: [],
    buckets: { department: new Map(), label: new Map(), resourceName: new Map() },
  };
}

function buildSnapshot(content: string): IndexSnapshot {
  const snapshot = emptySnapshot();
  const rows = content.split(/\r?\n/);

  rows.forEach((row, idx) => {
    const rawText = row.trim();
    if (!rawText) return;
    const line: IndexedLine = {
      lineNumber: idx + 1,
      rawText,
      tags: extractAttributes(rawText.toLowerCase()),
    };
    snapshot.lines.push(line);

    for (const kind of ATTRIBUTE_KINDS) {
      for (const value of line.tags[kind] ?? []) {
        const bucket = snapshot.buckets[kind].get(value);
        if (bucket) bucket.push(line);
        else snapshot.buckets[kind].set(value, [line]);
      }
    }
  });

  return snapshot;
}

export interface StructuredIndexOptions {
  maxResults: number;
  keywordFallback?: boolean;
  /** 有值時只接受此目錄下的中繼資料檔 */
  root?: string;
}

export class StructuredIndex {
  private snapshot: IndexSnapshot = emptySnapshot();
  private enabledFlag = false;
  private sourcePath: string | null = null;
  private lastLoadDurationMs: number | null = null;
  private lastError: string | undefined;
  private readonly maxResults: number;
  private readonly keywordFallback: boolean;
  private readonly root: string | undefined;

  constructor(options: StructuredIndexOptions) {
    this.maxResults = options.maxResults;
    this.keywordFallback = options.keywordFallback ?? false;
    this.root = options.root;
  }

  get enabled(): boolean {
    return this.enabledFlag;
  }

  get path(): string | null {
    return this.sourcePath;
  }

  /** 讀檔建索引；失敗則停用（不保留半成品）。路徑不在允許目錄內時不動現有索引 */
  async build(filePath: string): Promise<boolean> {
    if (this.root !== undefined) {
      const check = await validatePathWithin(filePath, this.root);
      if (!check.valid) {
        this.lastError = check.error;
        console.warn(`[structuredIndex] 拒絕建立索引：${check.error}`);
        return false;
      }
    }
    const startedAt = Date.now();
    this.sourcePath = filePath;
    try {
      const content = await fsp.readFile(filePath, 'utf-8');
      const next = buildSnapshot(content);
      // 單次指派，讀取端只會看到舊快照或新快照
      this.snapshot = next;
      this.enabledFlag = true;
      this.lastError = undefined;
      this.lastLoadDurationMs = Date.now() - startedAt;
      console.log(
        `[structuredIndex] 索引建立完成：${next.lines.length} 行，` +
          `${next.buckets.department.size} 個部門，${next.buckets.label.size} 個標籤，` +
          `${next.buckets.resourceName.size} 個名稱（${this.lastLoadDurationMs}ms）`,
      );
      return true;
    } catch (err) {
      this.snapshot = emptySnapshot();
      this.enabledFlag = false;
      this.lastError = errorMessage(err);
      this.lastLoadDurationMs = Date.now() - startedAt;
      console.warn(`[structuredIndex] 無法建立索引（${filePath}），本層停用：${this.lastError}`);
      return false;
    }
  }

  /** 單一屬性桶查詢 */
  lookup(kind: AttributeKind, value: string): IndexedLine[] {
    return this.snapshot.buckets[kind].get(value.toLowerCase().trim()) ?? [];
  }

  /** 目前各桶內容（供除錯與冪等性比對） */
  bucketKeys(kind: AttributeKind): string[] {
    return Array.from(this.snapshot.buckets[kind].keys());
  }

  get lineCount(): number {
    return this.snapshot.lines.length;
  }

  quickSearch(query: string): QuickSearchResult {
    if (!this.enabledFlag || !isBucketQuery(query)) return { found: false };

    const snapshot = this.snapshot;
    const lower = query.toLowerCase();
    const hits: IndexedLine[] = [];

    for (const kind of ATTRIBUTE_KINDS) {
      const m = QUERY_PATTERNS[kind].exec(lower);
      const value = m?.[1]?.trim();
      if (value) hits.push(...(snapshot.buckets[kind].get(value) ?? []));
    }

    if (hits.length === 0 && this.keywordFallback) {
      hits.push(...this.scanKeywords(snapshot, lower));
    }

    // 依行號去重，保留首次出現順序
    const seen = new Set<number>();
    const unique: IndexedLine[] = [];
    for (const line of hits) {
      if (seen.has(line.lineNumber)) continue;
      seen.add(line.lineNumber);
      unique.push(line);
      if (unique.length >= this.maxResults) break;
    }

    if (unique.length === 0) return { found: false };
    return { found: true, lines: unique, text: formatIndexedLines(unique) };
  }

  /** O(行數) 線性掃描：取第一個有命中的關鍵詞 */
  private scanKeywords(snapshot: IndexSnapshot, lowerQuery: string): IndexedLine[] {
    const keywords = lowerQuery.match(/[\w\-:.]+/g) ?? [];
    for (const keyword of keywords) {
      if (keyword.length <= 2) continue;
      const matched: IndexedLine[] = [];
      for (const line of snapshot.lines) {
        if (line.rawText.toLowerCase().includes(keyword)) {
          matched.push(line);
          if (matched.length >= this.maxResults) break;
        }
      }
      if (matched.length > 0) return matched;
    }
    return [];
  }

  health(): ComponentHealth {
    return {
      loaded: this.enabledFlag,
      lastLoadDurationMs: this.lastLoadDurationMs,
      ...(this.lastError ? { lastError: this.lastError } : {}),
    };
  }
}
