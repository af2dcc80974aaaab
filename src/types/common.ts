/**
 * Result wrapper for operations that report failure instead of throwing.
 */
export interface Result<T> {
  success: boolean;
  data?: T;
  error?: FractionErrorInfo;
}

/**
 * Structured error carried by a failed Result.
 */
export interface FractionErrorInfo {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Logger interface for approximation and conversion instrumentation.
 *
 * Implement this interface to receive debug, info, and error logs
 * from the mediant search and the exposure modules.
 * Defaults to undefined (no logging).
 */
export interface Logger {
  /** Debug-level log for search convergence and conversions. */
  debug(msg: string, data?: unknown): void;
  /** Info-level log for client setup. */
  info(msg: string, data?: unknown): void;
  /** Error-level log for rejected input. */
  error(msg: string, err?: unknown): void;
}

/**
 * Three-way comparison outcome.
 */
export type Ordering = -1 | 0 | 1;
