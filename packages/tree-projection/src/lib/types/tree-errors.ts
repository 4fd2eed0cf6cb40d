/** Contract violations reported by a projection. */
export interface TreeProjectionErrorInfo {
  scope: 'source-event' | 'configuration' | 'filter';
  reason: 'invalid-range' | 'invalid-field' | 'predicate-failed';
  message: string;
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class TreeProjectionError extends Error {
  readonly scope: TreeProjectionErrorInfo['scope'];
  readonly reason: TreeProjectionErrorInfo['reason'];
  readonly context?: Record<string, unknown>;

  constructor(info: TreeProjectionErrorInfo) {
    super(info.message, { cause: info.cause });
    this.name = 'TreeProjectionError';
    this.scope = info.scope;
    this.reason = info.reason;
    this.context = info.context;
  }
}
