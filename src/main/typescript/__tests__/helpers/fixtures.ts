/**
 * 測試共用：暫存目錄、假生成後端、假嵌入用戶端
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { GenerationRequest, TextBackend } from '../../services/generator';
import { EmbeddingClient } from '../../services/embeddingClient';
import { PersistedVectorIndex } from '../../models/resolution';

// ─── 暫存目錄 ───────────────────────────────────────────────────

export function makeTempDir(prefix = 'tiered-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFile(dir: string, name: string, content: string): string {
  const p = path.join(dir, name);
  fs.writeFileSync(p, content, 'utf-8');
  return p;
}

export function writeVectorIndex(dir: string, name: string, index: PersistedVectorIndex): string {
  return writeFile(dir, name, JSON.stringify(index));
}

/** 測試時關閉 console 輸出 */
export function silenceConsole(): void {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
}

// ─── 假生成後端 ─────────────────────────────────────────────────

export type BackendBehavior = 'ok' | 'error' | 'hang' | 'empty';

export class FakeBackend implements TextBackend {
  readonly calls: GenerationRequest[] = [];
  readonly signals: AbortSignal[] = [];

  constructor(
    private readonly behavior: BackendBehavior = 'ok',
    private readonly reply = 'generated answer',
  ) {}

  complete(request: GenerationRequest, signal: AbortSignal): Promise<string> {
    this.calls.push(request);
    this.signals.push(signal);
    switch (this.behavior) {
      case 'ok':
        return Promise.resolve(this.reply);
      case 'empty':
        return Promise.resolve('   ');
      case 'error':
        return Promise.reject(new Error('backend unavailable'));
      case 'hang':
        return new Promise<string>(() => undefined);
    }
  }
}

// ─── 假嵌入用戶端 ───────────────────────────────────────────────

export class FakeEmbedder implements EmbeddingClient {
  readonly model = 'test-embed';
  calls = 0;

  constructor(private readonly vector: number[] | 'hang') {}

  embed(_text: string, _signal?: AbortSignal): Promise<number[]> {
    this.calls++;
    if (this.vector === 'hang') return new Promise<number[]>(() => undefined);
    return Promise.resolve(this.vector);
  }
}

export const SAMPLE_VECTOR_INDEX: PersistedVectorIndex = {
  model: 'test-embed',
  dims: 3,
  items: [
    { id: 'a', sourceId: 'purge-guide.pdf', content: 'Use the admin console to purge a bucket.', embedding: [1, 0, 0] },
    { id: 'b', sourceId: 'network.pdf', content: 'Configure load balancer health checks.', embedding: [0, 1, 0] },
    { id: 'c', sourceId: 'versioning.pdf', content: 'Versioned buckets keep older object copies.', embedding: [0.9, 0.1, 0] },
  ],
};
