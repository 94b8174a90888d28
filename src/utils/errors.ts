export class TimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/** Remote session backend failed; always handled inside the session store. */
export class StoreUnavailableError extends Error {
  constructor(operation: string, cause: unknown) {
    super(`remote store ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = "StoreUnavailableError";
  }
}

export class CallbackDeliveryError extends Error {
  readonly retryable: boolean;
  readonly status?: number;

  constructor(message: string, retryable: boolean, status?: number) {
    super(message);
    this.name = "CallbackDeliveryError";
    this.retryable = retryable;
    this.status = status;
  }
}
