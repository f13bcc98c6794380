/**
 * INPUT: 可取消的非同步工作（接收 AbortSignal）+ 時限
 * OUTPUT: BoundedOutcome（ok / timeout / error 三選一）
 * POS: 核心模組，所有外部呼叫（向量檢索、文字生成）共用的限時執行原語
 */

import { StageTimeoutError } from '../models/errors';

export type BoundedOutcome<T> =
  | { status: 'ok'; value: T; elapsedMs: number }
  | { status: 'timeout'; elapsedMs: number }
  | { status: 'error'; error: unknown; elapsedMs: number };

/**
 * 以單一工作與截止時間賽跑。
 * 逾時即中止（abort）並放棄工作結果，不再等待；之後工作若 reject 也不會成為未處理的 rejection。
 */
export async function runBounded<T>(
  stage: string,
  timeoutMs: number,
  work: (signal: AbortSignal) => Promise<T>,
): Promise<BoundedOutcome<T>> {
  const startedAt = Date.now();
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), timeoutMs);
  });

  let task: Promise<{ value: T }>;
  try {
    task = work(controller.signal).then((value) => ({ value }));
  } catch (err) {
    // 同步拋出的錯誤與非同步錯誤一視同仁
    task = Promise.reject(err);
  }
  // 逾時後被放棄的工作仍可能 reject
  task.catch(() => undefined);

  try {
    const winner = await Promise.race([task, deadline]);
    if (winner === 'timeout') {
      controller.abort(new StageTimeoutError(stage, timeoutMs));
      console.warn(`[boundedCall] ${stage} 逾時（${timeoutMs}ms），放棄結果`);
      return { status: 'timeout', elapsedMs: Date.now() - startedAt };
    }
    return { status: 'ok', value: winner.value, elapsedMs: Date.now() - startedAt };
  } catch (error) {
    return { status: 'error', error, elapsedMs: Date.now() - startedAt };
  } finally {
    clearTimeout(timer);
  }
}
