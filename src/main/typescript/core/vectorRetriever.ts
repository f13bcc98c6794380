/**
 * INPUT: 持久化相似度索引（JSON：model / dims / items）+ EmbeddingClient
 * OUTPUT: ScoredChunk[]（與查詢向量餘弦相似度最高的 K 段）
 * POS: 核心模組，索引單次載入（single-flight）後常駐；查詢一律經 runBounded 限時
 *
 * 載入失敗不覆蓋先前成功的索引；從未成功載入時狀態為 unavailable，由解析器跳往下一層。
 */

import { promises as fsp } from 'fs';
import { ComponentHealth, DocumentChunk, PersistedVectorIndex, ScoredChunk } from '../models/resolution';
import { ResourceUnavailableError, StageTimeoutError, errorMessage } from '../models/errors';
import { EmbeddingClient } from '../services/embeddingClient';
import { runBounded } from './boundedCall';
import { validatePathWithin } from '../utils/validators';

// ─── 向量運算 ──────────────────────────────────────────────────

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let na = 0;
  let nb = 0;
  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  return na && nb ? dot / (Math.sqrt(na) * Math.sqrt(nb)) : 0;
}

export function topK(queryVec: number[], items: DocumentChunk[], k: number): ScoredChunk[] {
  return items
    .map((chunk) => ({ chunk, score: cosineSimilarity(queryVec, chunk.embedding) }))
    .sort((a, b) => b.score - a.score)
    .slice(0, Math.max(0, k));
}

// ─── 索引檔驗證 ────────────────────────────────────────────────

function isChunk(value: unknown): value is DocumentChunk {
  if (typeof value !== 'object' || value === null) return false;
  const c = value as Record<string, unknown>;
  return (
    typeof c['id'] === 'string' &&
    typeof c['sourceId'] === 'string' &&
    typeof c['content'] === 'string' &&
    Array.isArray(c['embedding']) &&
    c['embedding'].every((v) => typeof v === 'number')
  );
}

export function parseVectorIndex(raw: string): PersistedVectorIndex {
  const data: unknown = JSON.parse(raw);
  if (typeof data !== 'object' || data === null) {
    throw new Error('索引檔不是 JSON 物件');
  }
  const d = data as Record<string, unknown>;
  if (typeof d['model'] !== 'string' || typeof d['dims'] !== 'number' || !Array.isArray(d['items'])) {
    throw new Error('索引檔缺少 model / dims / items');
  }
  const dims = d['dims'];
  const items: DocumentChunk[] = [];
  for (const item of d['items']) {
    if (!isChunk(item)) throw new Error('索引檔含有格式錯誤的段落');
    if (item.embedding.length !== dims) {
      throw new Error(`段落 ${item.id} 維度 ${item.embedding.length} 與索引維度 ${dims} 不符`);
    }
    items.push(item);
  }
  return { model: d['model'], dims, items };
}

// ─── VectorRetriever ───────────────────────────────────────────

export interface VectorRetrieverOptions {
  indexPath: string;
  embedder: EmbeddingClient;
  /** 有值時只載入此目錄下的索引檔 */
  root?: string;
}

export class VectorRetriever {
  private index: PersistedVectorIndex | null = null;
  private inflight: Promise<PersistedVectorIndex | null> | null = null;
  private indexPath: string;
  private readonly embedder: EmbeddingClient;
  private readonly root: string | undefined;
  private lastLoadDurationMs: number | null = null;
  private lastError: string | undefined;

  constructor(options: VectorRetrieverOptions) {
    this.indexPath = options.indexPath;
    this.embedder = options.embedder;
    this.root = options.root;
  }

  get available(): boolean {
    return this.index !== null;
  }

  get chunkCount(): number {
    return this.index?.items.length ?? 0;
  }

  /** 首次使用時載入；已載入則直接回傳，載入中則共用同一個 promise */
  async load(): Promise<boolean> {
    if (this.index) return true;
    return (await this.loadOnce(this.indexPath)) !== null;
  }

  /** 重新載入（索引重建後）；失敗時保留舊索引。重疊的 reload 依序各讀自己的路徑 */
  async reload(indexPath: string = this.indexPath): Promise<boolean> {
    while (this.inflight) await this.inflight;
    this.indexPath = indexPath;
    const previous = this.index;
    const loaded = await this.loadOnce(indexPath, true);
    return loaded !== null && loaded !== previous;
  }

  private loadOnce(indexPath: string, force = false): Promise<PersistedVectorIndex | null> {
    if (this.inflight) return this.inflight;
    if (this.index && !force) return Promise.resolve(this.index);

    this.inflight = this.readIndex(indexPath).finally(() => {
      this.inflight = null;
    });
    return this.inflight;
  }

  private async readIndex(indexPath: string): Promise<PersistedVectorIndex | null> {
    const startedAt = Date.now();
    try {
      if (this.root !== undefined) {
        const check = await validatePathWithin(indexPath, this.root);
        if (!check.valid) throw new Error(check.error);
      }
      const parsed = parseVectorIndex(await fsp.readFile(indexPath, 'utf-8'));
      if (parsed.model !== this.embedder.model) {
        console.warn(
          `[vectorRetriever] 索引模型 ${parsed.model} 與查詢模型 ${this.embedder.model} 不同，相似度可能失準`,
        );
      }
      this.index = parsed;
      this.lastError = undefined;
      this.lastLoadDurationMs = Date.now() - startedAt;
      console.log(
        `[vectorRetriever] 向量索引載入完成：${parsed.items.length} 段，${parsed.dims} 維（${this.lastLoadDurationMs}ms）`,
      );
      return parsed;
    } catch (err) {
      this.lastError = errorMessage(err);
      this.lastLoadDurationMs = Date.now() - startedAt;
      console.error(`[vectorRetriever] 向量索引載入失敗（${indexPath}）：${this.lastError}`);
      return this.index;
    }
  }

  /**
   * 查詢最相近的 k 段。
   * @throws ResourceUnavailableError 索引不可用
   * @throws StageTimeoutError 嵌入 / 搜尋超過時限（與「零結果」區分）
   */
  async search(query: string, k: number, timeoutMs: number): Promise<ScoredChunk[]> {
    if (!(await this.load()) || !this.index) {
      throw new ResourceUnavailableError('vectorRetriever', this.lastError ?? '索引未載入');
    }
    const index = this.index;

    const outcome = await runBounded('vector_search', timeoutMs, async (signal) => {
      const queryVec = await this.embedder.embed(query, signal);
      if (queryVec.length !== index.dims) {
        throw new Error(`查詢向量維度 ${queryVec.length} 與索引維度 ${index.dims} 不符`);
      }
      return topK(queryVec, index.items, k);
    });

    if (outcome.status === 'timeout') throw new StageTimeoutError('vector_search', timeoutMs);
    if (outcome.status === 'error') throw outcome.error;
    return outcome.value;
  }

  health(): ComponentHealth {
    return {
      loaded: this.index !== null,
      lastLoadDurationMs: this.lastLoadDurationMs,
      ...(this.lastError ? { lastError: this.lastError } : {}),
    };
  }
}
