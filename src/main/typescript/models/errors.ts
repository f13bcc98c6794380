/**
 * INPUT: 無
 * OUTPUT: 引擎錯誤類別（輸入驗證 / 路徑限制 / 階段逾時 / 資源不可用）
 * POS: 資料模型層，解析流程只有 QueryValidationError 會傳到呼叫端；管理操作另有 PathNotAllowedError
 */

/** 查詢字串不合法（空白、過長、可疑內容），在進入解析流程前拒絕 */
export class QueryValidationError extends Error {
  readonly code = 'INVALID_QUERY';

  constructor(message: string) {
    super(message);
    this.name = 'QueryValidationError';
  }
}

/** 管理操作指定的資料檔不在允許的目錄內 */
export class PathNotAllowedError extends Error {
  readonly code = 'PATH_NOT_ALLOWED';

  constructor(message: string) {
    super(message);
    this.name = 'PathNotAllowedError';
  }
}

/** 單一階段（向量檢索、文字生成）超過時限 */
export class StageTimeoutError extends Error {
  readonly code = 'STAGE_TIMEOUT';

  constructor(readonly stage: string, readonly timeoutMs: number) {
    super(`${stage} 逾時（${timeoutMs}ms）`);
    this.name = 'StageTimeoutError';
  }
}

/** 索引或模型尚未載入、檔案不存在 */
export class ResourceUnavailableError extends Error {
  readonly code = 'RESOURCE_UNAVAILABLE';

  constructor(readonly resource: string, reason: string) {
    super(`${resource} 無法使用：${reason}`);
    this.name = 'ResourceUnavailableError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
