/**
 * INPUT: 向量檢索段落、PDF 轉出的原始文字
 * OUTPUT: 壓縮空白、依字詞邊界截斷後的片段
 * POS: 工具模組，生成失敗時降級顯示原始段落用
 */

import { ScoredChunk } from '../models/resolution';

/** 合併連續空白 */
export function compactWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * 截斷至 maxChars；若最後一個空白落在 80% 之後則切在該處，避免切斷單字
 */
export function truncateAtWord(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  let cut = text.slice(0, maxChars);
  const lastSpace = cut.lastIndexOf(' ');
  if (lastSpace > maxChars * 0.8) cut = cut.slice(0, lastSpace);
  return `${cut}...`;
}

export function formatSnippet(text: string, maxChars: number): string {
  return truncateAtWord(compactWhitespace(text), maxChars);
}

/** [1] source: 內容... 以空行分隔 */
export function formatChunkSnippets(chunks: ScoredChunk[], maxChars: number): string {
  return chunks
    .map(({ chunk }, idx) => `[${idx + 1}] ${chunk.sourceId}: ${formatSnippet(chunk.content, maxChars)}`)
    .join('\n\n');
}

/**
 * 組合送給生成模型的上下文，總長度不超過 maxChars；
 * 放不下的段落直接截斷，之後的段落不再加入
 */
export function buildContextWindow(chunks: ScoredChunk[], maxChars: number): string {
  const parts: string[] = [];
  let used = 0;
  for (const [idx, { chunk }] of chunks.entries()) {
    const block = `[${idx + 1}] (${chunk.sourceId})\n${chunk.content.trim()}`;
    const separator = parts.length > 0 ? 2 : 0;
    const remaining = maxChars - used - separator;
    if (remaining <= 0) break;
    if (block.length <= remaining) {
      parts.push(block);
      used += separator + block.length;
      continue;
    }
    parts.push(block.slice(0, remaining));
    break;
  }
  return parts.join('\n\n');
}
