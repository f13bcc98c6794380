/**
 * INPUT: 環境變數（.env，由進入點以 dotenv 載入）
 * OUTPUT: Settings（型別化、唯讀的引擎設定）
 * POS: 設定層，所有路徑、時限、上限集中於此，其餘模組只接收 Settings
 */

import * as path from 'path';

export interface Settings {
  docsPath: string;                 // 語料與中繼資料檔只能位於此目錄下
  dataPath: string;                 // 向量索引檔只能位於此目錄下
  metadataTxtPath: string;          // StructuredIndex.build 的來源
  corpusTxtPaths: string[];         // 全文備援語料候選路徑（依序取第一個可讀檔）
  vectorIndexPath: string;
  cacheDir: string;
  cacheTtlMs: number;
  cacheSweepIntervalMs: number;
  quickSearchMaxResults: number;
  quickSearchKeywordFallback: boolean;
  vectorSearchK: number;
  vectorSearchTimeoutMs: number;
  llmTimeoutMs: number;
  llmModel: string;
  llmMaxTokens: number;
  maxContextChars: number;
  snippetChars: number;
  fallbackMaxResults: number;
  maxQueryLength: number;
  anthropicApiKey: string;
  embeddingApiUrl: string;
  embeddingModel: string;
  embeddingApiKey: string;
  port: number;
  adminApiKey: string;
}

type Env = Record<string, string | undefined>;

// ─── 解析輔助 ──────────────────────────────────────────────────

function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name];
  return raw !== undefined && raw.trim() !== '' ? raw.trim() : fallback;
}

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0) {
    console.warn(`[settings] ${name}="${raw}" 不是合法的非負數，改用預設值 ${fallback}`);
    return fallback;
  }
  return n;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const v = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(v)) return true;
  if (['0', 'false', 'no', 'off'].includes(v)) return false;
  console.warn(`[settings] ${name}="${raw}" 不是合法的布林值，改用預設值 ${fallback}`);
  return fallback;
}

function readList(env: Env, name: string, fallback: string[]): string[] {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  return raw.split(',').map((p) => p.trim()).filter((p) => p.length > 0);
}

// ─── 載入設定 ──────────────────────────────────────────────────

export function loadSettings(env: Env = process.env): Settings {
  const docsPath = readString(env, 'DOCS_PATH', 'docs');
  const dataPath = readString(env, 'DATA_PATH', 'data');
  const metadataTxtPath = readString(
    env,
    'METADATA_TXT_PATH',
    path.join(docsPath, 'sample_bucket_metadata_converted.txt'),
  );

  return Object.freeze({
    docsPath,
    dataPath,
    metadataTxtPath,
    corpusTxtPaths: readList(env, 'CORPUS_TXT_PATHS', [
      metadataTxtPath,
      path.join(docsPath, 'bucket_metadata.txt'),
      path.join(docsPath, 'metadata.txt'),
    ]),
    vectorIndexPath: readString(env, 'VECTOR_INDEX_PATH', path.join(dataPath, 'vector-index.json')),
    cacheDir: readString(env, 'CACHE_DIR', 'cache'),
    cacheTtlMs: readNumber(env, 'CACHE_TTL_HOURS', 24) * 60 * 60 * 1000,
    cacheSweepIntervalMs: readNumber(env, 'CACHE_SWEEP_INTERVAL_MINUTES', 30) * 60 * 1000,
    quickSearchMaxResults: Math.floor(readNumber(env, 'QUICK_SEARCH_MAX_RESULTS', 20)),
    quickSearchKeywordFallback: readBoolean(env, 'QUICK_SEARCH_ENABLE_KEYWORD_FALLBACK', false),
    vectorSearchK: Math.floor(readNumber(env, 'VECTOR_SEARCH_K', 3)),
    vectorSearchTimeoutMs: readNumber(env, 'VECTOR_SEARCH_TIMEOUT_SECONDS', 10) * 1000,
    llmTimeoutMs: readNumber(env, 'LLM_TIMEOUT_SECONDS', 30) * 1000,
    llmModel: readString(env, 'LLM_MODEL', 'claude-sonnet-4-6'),
    llmMaxTokens: Math.floor(readNumber(env, 'LLM_MAX_TOKENS', 1024)),
    maxContextChars: Math.floor(readNumber(env, 'MAX_CONTEXT_CHARS', 4000)),
    snippetChars: Math.floor(readNumber(env, 'SNIPPET_CHARS', 500)),
    fallbackMaxResults: Math.floor(readNumber(env, 'FALLBACK_MAX_RESULTS', 10)),
    maxQueryLength: Math.floor(readNumber(env, 'MAX_QUERY_LENGTH', 2000)),
    anthropicApiKey: readString(env, 'ANTHROPIC_API_KEY', ''),
    embeddingApiUrl: readString(env, 'EMBEDDING_API_URL', 'https://api.openai.com/v1/embeddings'),
    embeddingModel: readString(env, 'EMBEDDING_MODEL', 'text-embedding-3-small'),
    embeddingApiKey: readString(env, 'OPENAI_API_KEY', ''),
    port: Math.floor(readNumber(env, 'PORT', 3000)),
    adminApiKey: readString(env, 'ADMIN_API_KEY', ''),
  });
}
