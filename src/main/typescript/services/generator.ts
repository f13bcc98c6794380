/**
 * INPUT: 問題 + 檢索到的上下文（快速查詢行、向量段落、全文備援行）
 * OUTPUT: BoundedOutcome<string>（生成答案 / 逾時 / 錯誤）
 * POS: 服務層，以 Claude 將檢索結果整理為自然語言答案；每次呼叫皆限時、不重試
 */

import Anthropic from '@anthropic-ai/sdk';
import { ScoredChunk } from '../models/resolution';
import { BoundedOutcome, runBounded } from '../core/boundedCall';
import { buildContextWindow } from '../utils/textFormatter';

// ─── 後端介面（測試時替換為假實作） ─────────────────────────────

export interface GenerationRequest {
  system: string;
  prompt: string;
}

export interface TextBackend {
  complete(request: GenerationRequest, signal: AbortSignal): Promise<string>;
}

export interface AnthropicBackendOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
}

export function createAnthropicBackend(options: AnthropicBackendOptions): TextBackend {
  // maxRetries: 0，每層只嘗試一次，重試交給解析器的層級串接
  const client = new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });

  return {
    async complete(request: GenerationRequest, signal: AbortSignal): Promise<string> {
      const message = await client.messages.create(
        {
          model: options.model,
          max_tokens: options.maxTokens,
          system: request.system,
          messages: [{ role: 'user', content: request.prompt }],
        },
        { signal },
      );

      const text = message.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('')
        .trim();
      if (!text) {
        throw new Error('Claude 回應格式異常（無文字內容）');
      }
      return text;
    },
  };
}

// ─── 提示詞 ────────────────────────────────────────────────────

const SYSTEM_PROMPT = `You are an assistant for operators of an on-premises S3-compatible object storage platform.
Answer strictly from the reference material supplied with each question.
Rules:
1. Quote exact names, values, commands and line references from the material.
2. If the material does not contain the answer, say so plainly; never invent settings or commands.
3. Lead with the direct answer, then details, then caveats.`;

export type FormatKind = 'metadata' | 'document';

function buildFormatPrompt(query: string, context: string, kind: FormatKind): string {
  const heading = kind === 'metadata' ? 'Based on this bucket information:' : 'Based on this information:';
  return `${heading}
${context}

Question: ${query}
Answer:`;
}

function buildSynthesisPrompt(query: string, context: string): string {
  return `Use the following excerpts from the documentation to answer the question at the end.
If the excerpts do not contain the answer, say that you don't know.

${context}

Question: ${query}
Answer:`;
}

// ─── Generator ─────────────────────────────────────────────────

export interface GeneratorOptions {
  backend: TextBackend;
  maxContextChars: number;
}

export class Generator {
  private readonly backend: TextBackend;
  private readonly maxContextChars: number;

  constructor(options: GeneratorOptions) {
    this.backend = options.backend;
    this.maxContextChars = options.maxContextChars;
  }

  /** 單次限時呼叫；空白回應視為錯誤 */
  async invoke(stage: string, prompt: string, timeoutMs: number): Promise<BoundedOutcome<string>> {
    const outcome = await runBounded(stage, timeoutMs, async (signal) => {
      const text = (await this.backend.complete({ system: SYSTEM_PROMPT, prompt }, signal)).trim();
      if (!text) throw new Error('生成結果為空白');
      return text;
    });
    if (outcome.status === 'error') {
      console.error(`[generator] ${stage} 生成失敗：`, outcome.error);
    }
    return outcome;
  }

  /** 將快速查詢行或全文備援行整理為答案 */
  format(query: string, context: string, kind: FormatKind, timeoutMs: number): Promise<BoundedOutcome<string>> {
    const stage = kind === 'metadata' ? 'format_quick_search' : 'format_fallback';
    return this.invoke(stage, buildFormatPrompt(query, context, kind), timeoutMs);
  }

  /** 以長度受限的上下文視窗合成向量檢索答案 */
  synthesize(query: string, chunks: ScoredChunk[], timeoutMs: number): Promise<BoundedOutcome<string>> {
    const context = buildContextWindow(chunks, this.maxContextChars);
    return this.invoke('synthesize_vector', buildSynthesisPrompt(query, context), timeoutMs);
  }
}
