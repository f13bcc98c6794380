/**
 * INPUT: 使用者問題（字串）
 * OUTPUT: ResolutionResult（答案 + 來源層級 + 信心度 + 耗時）
 * POS: 服務層，分層解析主流程：快取 → 結構化索引 → 向量檢索 → 全文備援 → 終端
 *
 * 線性串接、不回頭：任一層產出非空答案（含降級的原始資料）即停止。
 * 除了不合法的輸入（QueryValidationError），所有失敗都轉成 source / confidence，不拋例外。
 */

import {
  HealthReport,
  ResolutionResult,
  ResolutionSource,
  SOURCE_CONFIDENCE,
  ScoredChunk,
  SourceStats,
  UNCACHEABLE_SOURCES,
} from '../models/resolution';
import { PathNotAllowedError, QueryValidationError, StageTimeoutError, errorMessage } from '../models/errors';
import { ResponseCache } from '../core/responseCache';
import { StructuredIndex } from '../core/structuredIndex';
import { VectorRetriever } from '../core/vectorRetriever';
import { CorpusStore } from '../core/corpusStore';
import { searchFallbackText } from '../core/fullTextFallback';
import { Generator } from './generator';
import { validatePathWithin, validateQuery } from '../utils/validators';
import { formatChunkSnippets } from '../utils/textFormatter';

// ─── 常數設定 ──────────────────────────────────────────────────

export const NOT_FOUND_ANSWER = 'No relevant information found for your question.';
export const NO_DATA_ANSWER = 'No data available to answer your question.';

export interface ResolverLimits {
  docsPath: string;
  dataPath: string;
  metadataTxtPath: string;
  corpusTxtPaths: string[];
  vectorIndexPath: string;
  vectorSearchK: number;
  vectorSearchTimeoutMs: number;
  llmTimeoutMs: number;
  snippetChars: number;
  fallbackMaxResults: number;
  maxQueryLength: number;
  cacheSweepIntervalMs: number;
}

export interface ResolverDeps {
  cache: ResponseCache;
  structuredIndex: StructuredIndex;
  vectorRetriever: VectorRetriever;
  corpus: CorpusStore;
  generator: Generator;
  limits: ResolverLimits;
}

interface TierAnswer {
  answer: string;
  source: ResolutionSource;
}

export class Resolver {
  private readonly cache: ResponseCache;
  private readonly structuredIndex: StructuredIndex;
  private readonly vectorRetriever: VectorRetriever;
  private readonly corpus: CorpusStore;
  private readonly generator: Generator;
  private readonly limits: ResolverLimits;
  private readonly stats = new Map<ResolutionSource, SourceStats>();
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(deps: ResolverDeps) {
    this.cache = deps.cache;
    this.structuredIndex = deps.structuredIndex;
    this.vectorRetriever = deps.vectorRetriever;
    this.corpus = deps.corpus;
    this.generator = deps.generator;
    this.limits = deps.limits;
  }

  // ─── 生命週期 ────────────────────────────────────────────────

  /** 建立結構化索引、載入語料、預熱向量索引，並排程過期清理 */
  async start(): Promise<void> {
    await Promise.all([
      this.structuredIndex.build(this.limits.metadataTxtPath),
      this.corpus.load(this.limits.corpusTxtPaths),
      this.vectorRetriever.load(),
    ]);

    if (this.limits.cacheSweepIntervalMs > 0 && !this.sweepTimer) {
      this.sweepTimer = setInterval(() => {
        this.cache.clearExpired().catch((err) => {
          console.error('[resolver] 定期清理快取失敗:', err);
        });
      }, this.limits.cacheSweepIntervalMs);
      this.sweepTimer.unref();
    }
  }

  close(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  // ─── 主流程 ──────────────────────────────────────────────────

  async resolve(rawQuery: string): Promise<ResolutionResult> {
    const validation = validateQuery(rawQuery, this.limits.maxQueryLength);
    if (!validation.valid) {
      throw new QueryValidationError(validation.error);
    }
    const query = validation.query;
    const startedAt = Date.now();

    // 1. 快取命中直接回傳
    const cached = await this.cache.get(query);
    if (cached.found) {
      console.log(`[resolver] 快取命中：${query.slice(0, 30)}`);
      return this.finish(query, { answer: cached.entry.answer, source: 'cache' }, startedAt);
    }

    // 2 ~ 4. 依序嘗試各層，第一個有答案的層即為結果
    const tiers: Array<(q: string) => Promise<TierAnswer | null>> = [
      (q) => this.tryStructuredIndex(q),
      (q) => this.tryVectorRetrieval(q),
      (q) => this.tryFullTextFallback(q),
    ];
    for (const tier of tiers) {
      const answer = await tier(query);
      if (answer && answer.answer.trim()) {
        return this.finish(query, answer, startedAt);
      }
    }

    // 5. 終端：完全沒有資料來源 → no_data；有資料但無命中 → not_found
    const noData =
      !this.corpus.current.loaded && !this.structuredIndex.enabled && !this.vectorRetriever.available;
    return this.finish(
      query,
      noData
        ? { answer: NO_DATA_ANSWER, source: 'no_data' }
        : { answer: NOT_FOUND_ANSWER, source: 'not_found' },
      startedAt,
    );
  }

  private async tryStructuredIndex(query: string): Promise<TierAnswer | null> {
    const hit = this.structuredIndex.quickSearch(query);
    if (!hit.found) return null;
    console.log(`[resolver] 結構化索引命中 ${hit.lines.length} 行`);

    const outcome = await this.generator.format(query, hit.text, 'metadata', this.limits.llmTimeoutMs);
    switch (outcome.status) {
      case 'ok':
        return { answer: outcome.value, source: 'quick_search' };
      case 'timeout':
        return { answer: hit.text, source: 'quick_search_timeout_raw' };
      case 'error':
        return { answer: hit.text, source: 'quick_search_raw' };
    }
  }

  private async tryVectorRetrieval(query: string): Promise<TierAnswer | null> {
    let chunks: ScoredChunk[];
    try {
      chunks = await this.vectorRetriever.search(
        query,
        this.limits.vectorSearchK,
        this.limits.vectorSearchTimeoutMs,
      );
    } catch (err) {
      const kind = err instanceof StageTimeoutError ? '逾時' : '失敗';
      console.warn(`[resolver] 向量檢索${kind}，改用全文備援：${errorMessage(err)}`);
      return null;
    }
    if (chunks.length === 0) {
      console.log('[resolver] 向量檢索無結果');
      return null;
    }

    const outcome = await this.generator.synthesize(query, chunks, this.limits.llmTimeoutMs);
    if (outcome.status === 'ok') {
      return { answer: outcome.value, source: 'vector' };
    }
    // 生成失敗或逾時：降級為原始段落
    return {
      answer: formatChunkSnippets(chunks, this.limits.snippetChars),
      source: 'vector_snippets_fallback',
    };
  }

  private async tryFullTextFallback(query: string): Promise<TierAnswer | null> {
    const corpus = this.corpus.current;
    if (!corpus.loaded) return null;

    const result = searchFallbackText(query, corpus.text, this.limits.fallbackMaxResults);
    if (result.matches.length === 0) {
      console.log(`[resolver] 全文備援無命中：${query.slice(0, 50)}`);
      return null;
    }
    console.log(`[resolver] 全文備援命中 ${result.matches.length} 行`);

    const outcome = await this.generator.format(query, result.text, 'document', this.limits.llmTimeoutMs);
    if (outcome.status === 'ok') {
      return { answer: outcome.value, source: 'txt_fallback' };
    }
    return { answer: result.text, source: 'txt_fallback_raw' };
  }

  private async finish(query: string, tier: TierAnswer, startedAt: number): Promise<ResolutionResult> {
    if (tier.source !== 'cache' && !UNCACHEABLE_SOURCES.has(tier.source)) {
      await this.cache.set(query, tier.answer, tier.source);
    }
    const elapsedMs = Date.now() - startedAt;
    this.recordTiming(tier.source, elapsedMs);
    console.log(`[resolver] 來源 ${tier.source}，耗時 ${elapsedMs}ms`);
    return {
      answer: tier.answer,
      source: tier.source,
      confidence: SOURCE_CONFIDENCE[tier.source],
      elapsedMs,
    };
  }

  private recordTiming(source: ResolutionSource, elapsedMs: number): void {
    const prev = this.stats.get(source);
    if (!prev) {
      this.stats.set(source, { count: 1, totalMs: elapsedMs, averageMs: elapsedMs, minMs: elapsedMs, maxMs: elapsedMs });
      return;
    }
    const count = prev.count + 1;
    const totalMs = prev.totalMs + elapsedMs;
    this.stats.set(source, {
      count,
      totalMs,
      averageMs: totalMs / count,
      minMs: Math.min(prev.minMs, elapsedMs),
      maxMs: Math.max(prev.maxMs, elapsedMs),
    });
  }

  // ─── 管理操作 ────────────────────────────────────────────────

  clearExpiredCache(): Promise<number> {
    return this.cache.clearExpired();
  }

  clearAllCache(): Promise<number> {
    return this.cache.clearAll();
  }

  /** @throws PathNotAllowedError 檔案不在語料目錄下 */
  async rebuildStructuredIndex(filePath: string = this.limits.metadataTxtPath): Promise<boolean> {
    await this.assertPathWithin(filePath, this.limits.docsPath);
    return this.structuredIndex.build(filePath);
  }

  /** @throws PathNotAllowedError 檔案不在資料目錄下 */
  async rebuildVectorIndex(indexPath: string = this.limits.vectorIndexPath): Promise<boolean> {
    await this.assertPathWithin(indexPath, this.limits.dataPath);
    return this.vectorRetriever.reload(indexPath);
  }

  /** @throws PathNotAllowedError 任一候選檔不在語料目錄下 */
  async reloadCorpus(paths: string[] = this.limits.corpusTxtPaths): Promise<boolean> {
    for (const p of paths) {
      await this.assertPathWithin(p, this.limits.docsPath);
    }
    return (await this.corpus.load(paths)).loaded;
  }

  private async assertPathWithin(filePath: string, root: string): Promise<void> {
    const check = await validatePathWithin(filePath, root);
    if (!check.valid) {
      console.warn(`[resolver] 拒絕管理操作：${check.error}`);
      throw new PathNotAllowedError(check.error);
    }
  }

  healthCheck(): HealthReport {
    return {
      components: {
        structuredIndex: this.structuredIndex.health(),
        vectorRetriever: this.vectorRetriever.health(),
        corpus: this.corpus.health(),
      },
      stats: Object.fromEntries(this.stats),
    };
  }
}
