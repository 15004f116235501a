export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

/** Options accepted by every network-facing operation */
export interface CallOptions {
  /** Aborts the operation at its next suspension point */
  signal?: AbortSignal | undefined;
}
