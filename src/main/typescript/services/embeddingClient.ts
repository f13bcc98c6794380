/**
 * INPUT: 查詢文字 + AbortSignal
 * OUTPUT: 查詢向量（number[]）
 * POS: 服務層，呼叫 OpenAI 相容的 embeddings API；向量檢索層透過 EmbeddingClient 介面注入
 */

export interface EmbeddingClient {
  readonly model: string;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export interface HttpEmbeddingOptions {
  url: string;
  model: string;
  apiKey: string;
}

/** 非 2xx 時盡量讀出回應內容 */
async function safeText(res: Response): Promise<string> {
  try {
    return await res.text();
  } catch {
    return '<no body>';
  }
}

function extractEmbedding(json: unknown): number[] | null {
  if (typeof json !== 'object' || json === null || !('data' in json) || !Array.isArray(json.data)) {
    return null;
  }
  const first: unknown = json.data[0];
  if (typeof first !== 'object' || first === null || !('embedding' in first)) return null;
  const vec: unknown = first.embedding;
  if (!Array.isArray(vec) || !vec.every((v): v is number => typeof v === 'number')) return null;
  return vec;
}

export function createHttpEmbeddingClient(options: HttpEmbeddingOptions): EmbeddingClient {
  return {
    model: options.model,
    async embed(text: string, signal?: AbortSignal): Promise<number[]> {
      if (!options.apiKey) {
        throw new Error('缺少 embeddings API 金鑰（OPENAI_API_KEY）');
      }
      const res = await fetch(options.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${options.apiKey}`,
        },
        body: JSON.stringify({ model: options.model, input: text }),
        signal,
      });

      if (!res.ok) {
        throw new Error(`Embeddings API 回傳錯誤 ${res.status}：${await safeText(res)}`);
      }

      const vec = extractEmbedding(await res.json());
      if (!vec) throw new Error('Embeddings API 回應格式異常');
      return vec;
    },
  };
}
