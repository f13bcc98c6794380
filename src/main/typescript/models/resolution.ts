/**
 * INPUT: 無（純型別定義）
 * OUTPUT: 分層查詢解析引擎所需的所有 TypeScript 型別
 * POS: 型別層，供 core / services / api 共用
 */

// ─── 解析來源與信心度 ──────────────────────────────────────────

export const RESOLUTION_SOURCES = [
  'cache',
  'quick_search',
  'quick_search_raw',
  'quick_search_timeout_raw',
  'vector',
  'vector_llm',
  'vector_snippets_fallback',
  'txt_fallback',
  'txt_fallback_raw',
  'not_found',
  'no_data',
] as const;

export type ResolutionSource = (typeof RESOLUTION_SOURCES)[number];

/** 各來源對應的信心度（離快取越遠越低） */
export const SOURCE_CONFIDENCE: Record<ResolutionSource, number> = {
  cache: 1.0,
  quick_search: 0.9,
  quick_search_raw: 0.7,
  quick_search_timeout_raw: 0.7,
  vector: 0.8,
  vector_llm: 0.8,
  vector_snippets_fallback: 0.65,
  txt_fallback: 0.6,
  txt_fallback_raw: 0.5,
  not_found: 0.0,
  no_data: 0.0,
};

/** 不寫入快取的終端來源（新文件上傳後需立即可查） */
export const UNCACHEABLE_SOURCES: ReadonlySet<ResolutionSource> = new Set<ResolutionSource>([
  'not_found',
  'no_data',
]);

export function isResolutionSource(value: unknown): value is ResolutionSource {
  return typeof value === 'string' && (RESOLUTION_SOURCES as readonly string[]).includes(value);
}

// ─── 快取條目 ──────────────────────────────────────────────────

export interface CacheEntry {
  key: string;               // 正規化問題的 MD5
  query: string;
  answer: string;
  source: ResolutionSource;  // 產生答案的層級
  createdAt: string;         // ISO 時間字串
}

export type CacheLookup = { found: true; entry: CacheEntry } | { found: false };

// ─── 結構化索引 ────────────────────────────────────────────────

export type AttributeKind = 'department' | 'label' | 'resourceName';

export interface IndexedLine {
  lineNumber: number;        // 原始檔案行號（從 1 起算）
  rawText: string;           // 去除前後空白的原始內容
  tags: Partial<Record<AttributeKind, string[]>>;
}

export type QuickSearchResult =
  | { found: true; lines: IndexedLine[]; text: string }
  | { found: false };

// ─── 向量檢索 ──────────────────────────────────────────────────

export interface DocumentChunk {
  id: string;
  sourceId: string;          // 來源文件識別（通常為檔名）
  content: string;           // 段落全文
  embedding: number[];
}

export interface ScoredChunk {
  chunk: DocumentChunk;
  score: number;             // 餘弦相似度
}

/** 持久化相似度索引的檔案格式 */
export interface PersistedVectorIndex {
  model: string;
  dims: number;
  items: DocumentChunk[];
}

// ─── 全文備援 ──────────────────────────────────────────────────

export interface FallbackMatch {
  lineNumber: number;
  text: string;
  score: 1 | 2 | 3;          // 3=完整片語, 2=多詞共現, 1=單詞
}

export interface FallbackSearchResult {
  matches: FallbackMatch[];
  text: string;
}

// ─── 解析結果 ──────────────────────────────────────────────────

export interface ResolutionResult {
  answer: string;
  source: ResolutionSource;
  confidence: number;        // 0.0 ~ 1.0
  elapsedMs: number;
}

// ─── 健康檢查 ──────────────────────────────────────────────────

export interface ComponentHealth {
  loaded: boolean;
  lastLoadDurationMs: number | null;
  lastError?: string;
}

export interface SourceStats {
  count: number;
  totalMs: number;
  averageMs: number;
  minMs: number;
  maxMs: number;
}

export interface HealthReport {
  components: Record<string, ComponentHealth>;
  stats: Partial<Record<ResolutionSource, SourceStats>>;
}
