/**
 * INPUT: Settings（+ 選填的生成後端 / 嵌入用戶端替身）
 * OUTPUT: 組裝完成、尚未啟動的 Resolver
 * POS: 服務層，依設定建立快取、索引、檢索器與生成器並注入 Resolver
 */

import { Settings } from '../config/settings';
import { ResponseCache } from '../core/responseCache';
import { StructuredIndex } from '../core/structuredIndex';
import { VectorRetriever } from '../core/vectorRetriever';
import { CorpusStore } from '../core/corpusStore';
import { Generator, TextBackend, createAnthropicBackend } from './generator';
import { EmbeddingClient, createHttpEmbeddingClient } from './embeddingClient';
import { Resolver } from './resolver';

export interface EngineOverrides {
  backend?: TextBackend;
  embedder?: EmbeddingClient;
  now?: () => number;
}

export function createResolver(settings: Settings, overrides: EngineOverrides = {}): Resolver {
  const backend =
    overrides.backend ??
    createAnthropicBackend({
      apiKey: settings.anthropicApiKey,
      model: settings.llmModel,
      maxTokens: settings.llmMaxTokens,
    });

  const embedder =
    overrides.embedder ??
    createHttpEmbeddingClient({
      url: settings.embeddingApiUrl,
      model: settings.embeddingModel,
      apiKey: settings.embeddingApiKey,
    });

  return new Resolver({
    cache: new ResponseCache({ dir: settings.cacheDir, ttlMs: settings.cacheTtlMs, now: overrides.now }),
    structuredIndex: new StructuredIndex({
      maxResults: settings.quickSearchMaxResults,
      keywordFallback: settings.quickSearchKeywordFallback,
      root: settings.docsPath,
    }),
    vectorRetriever: new VectorRetriever({ indexPath: settings.vectorIndexPath, embedder, root: settings.dataPath }),
    corpus: new CorpusStore(settings.corpusTxtPaths, settings.docsPath),
    generator: new Generator({ backend, maxContextChars: settings.maxContextChars }),
    limits: {
      docsPath: settings.docsPath,
      dataPath: settings.dataPath,
      metadataTxtPath: settings.metadataTxtPath,
      corpusTxtPaths: settings.corpusTxtPaths,
      vectorIndexPath: settings.vectorIndexPath,
      vectorSearchK: settings.vectorSearchK,
      vectorSearchTimeoutMs: settings.vectorSearchTimeoutMs,
      llmTimeoutMs: settings.llmTimeoutMs,
      snippetChars: settings.snippetChars,
      fallbackMaxResults: settings.fallbackMaxResults,
      maxQueryLength: settings.maxQueryLength,
      cacheSweepIntervalMs: settings.cacheSweepIntervalMs,
    },
  });
}
