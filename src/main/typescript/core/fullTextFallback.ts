/**
 * INPUT: 問題字串 + 扁平化語料全文
 * OUTPUT: FallbackSearchResult（依完整片語 > 多詞共現 > 單詞排序的命中行）
 * POS: 核心模組，最後一層線性關鍵字掃描；純函式、無共享狀態、不拋例外
 */

import { FallbackMatch, FallbackSearchResult } from '../models/resolution';

const EMPTY_RESULT: FallbackSearchResult = { matches: [], text: '' };

function scoreLine(lineLower: string, queryLower: string, terms: string[]): FallbackMatch['score'] | null {
  if (lineLower.includes(queryLower)) return 3;
  if (terms.length > 1 && terms.filter((t) => lineLower.includes(t)).length >= 2) return 2;
  if (terms.some((t) => t.length > 2 && lineLower.includes(t))) return 1;
  return null;
}

export function formatFallbackMatches(matches: FallbackMatch[]): string {
  return matches.map((m) => `Line ${m.lineNumber}: ${m.text}`).join('\n');
}

export function searchFallbackText(query: string, corpus: string, maxResults = 10): FallbackSearchResult {
  const queryLower = query.toLowerCase().trim();
  if (!queryLower || !corpus || maxResults <= 0) return EMPTY_RESULT;

  const terms = queryLower.split(/\s+/).filter((t) => t.length > 0);
  const matches: FallbackMatch[] = [];

  corpus.split('\n').forEach((line, idx) => {
    const score = scoreLine(line.toLowerCase(), queryLower, terms);
    if (score !== null) {
      matches.push({ lineNumber: idx + 1, text: line.trim(), score });
    }
  });

  // Array.prototype.sort 為穩定排序，同分時保留原始行序
  matches.sort((a, b) => b.score - a.score);
  const top = matches.slice(0, maxResults);
  return { matches: top, text: formatFallbackMatches(top) };
}
