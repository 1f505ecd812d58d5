/** Base class for every failure a watch run can raise. */
export class WatchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The pricing catalog could not be retrieved or parsed. Fatal. */
export class FetchError extends WatchError {
  readonly status: number | null;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status ?? null;
  }
}

/** Webhook delivery failed. Logged, never fatal. */
export class NotifyError extends WatchError {
  readonly status: number | null;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status ?? null;
  }
}

/**
 * The snapshot file could not be read or written.
 * `recoverable` errors come from a corrupt file and fall back to an empty catalog.
 */
export class StoreError extends WatchError {
  readonly recoverable: boolean;

  constructor(message: string, options?: { cause?: unknown; recoverable?: boolean }) {
    super(message, options);
    this.recoverable = options?.recoverable ?? false;
  }
}
