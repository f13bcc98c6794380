/**
 * 測試：searchFallbackText，分數規則、排序、上限
 */

import { searchFallbackText } from '../core/fullTextFallback';

const CORPUS = [
  'How to purge a bucket using the admin console',
  'Bucket versioning can be enabled per bucket',
  'Purge operations are irreversible',
  'Storage policies control replication',
].join('\n');

describe('searchFallbackText', () => {
  test('完整片語 3 分優先，其次多詞共現 2 分', () => {
    const result = searchFallbackText('purge a bucket', CORPUS);
    expect(result.matches).toEqual([
      { lineNumber: 1, text: 'How to purge a bucket using the admin console', score: 3 },
      { lineNumber: 2, text: 'Bucket versioning can be enabled per bucket', score: 2 },
      { lineNumber: 3, text: 'Purge operations are irreversible', score: 2 },
    ]);
    expect(result.text).toBe(
      'Line 1: How to purge a bucket using the admin console\n' +
        'Line 2: Bucket versioning can be enabled per bucket\n' +
        'Line 3: Purge operations are irreversible',
    );
  });

  test('單一長度超過 2 的詞命中得 1 分', () => {
    expect(searchFallbackText('replication xyz', CORPUS).matches).toEqual([
      { lineNumber: 4, text: 'Storage policies control replication', score: 1 },
    ]);
  });

  test('不分大小寫', () => {
    expect(searchFallbackText('PURGE OPERATIONS', CORPUS).matches[0]).toEqual({
      lineNumber: 3,
      text: 'Purge operations are irreversible',
      score: 3,
    });
  });

  test('依 maxResults 截斷', () => {
    const result = searchFallbackText('purge a bucket', CORPUS, 1);
    expect(result.matches.map((m) => m.lineNumber)).toEqual([1]);
    expect(result.text).toBe('Line 1: How to purge a bucket using the admin console');
  });

  test('行號以原始語料計算（含空白行）', () => {
    const result = searchFallbackText('replication', '\n\nreplication factor is 3');
    expect(result.matches).toEqual([{ lineNumber: 3, text: 'replication factor is 3', score: 3 }]);
  });

  test('沒有命中 → 空結果', () => {
    expect(searchFallbackText('kubernetes', CORPUS)).toEqual({ matches: [], text: '' });
  });

  test('空白問題或空語料 → 空結果', () => {
    expect(searchFallbackText('   ', CORPUS)).toEqual({ matches: [], text: '' });
    expect(searchFallbackText('purge', '')).toEqual({ matches: [], text: '' });
  });
});
