import { ApiError } from "../errors.js";

/** How long wait-style operations poll when the caller gives no timeout. */
export const DEFAULT_UI_WAIT_MS = 10_000;

/** Round-trip ceiling the snippet RPC channel tolerates. */
export const DEFAULT_RPC_TIMEOUT_MS = 60_000;

export interface Duration {
  minutes?: number;
  seconds?: number;
  milliseconds?: number;
}

/** A bare number is read as milliseconds. */
export type TimeUnit = number | Duration;

/**
 * Normalize a time value to whole milliseconds (fractions are truncated)
 */
export function toMilliseconds(value: TimeUnit): number {
  const ms =
    typeof value === "number"
      ? value
      : (value.minutes ?? 0) * 60_000 + (value.seconds ?? 0) * 1000 + (value.milliseconds ?? 0);

  if (!Number.isFinite(ms) || ms < 0) {
    throw new ApiError(`Invalid time value: ${JSON.stringify(value)}`, { value });
  }
  return Math.trunc(ms);
}

/**
 * Reject waits that could outlive the RPC channel itself; the transport would
 * report those as a generic timeout instead of "not found".
 */
export function assertWithinRpcTimeout(timeoutMs: number, rpcTimeoutMs: number, operation: string): void {
  if (timeoutMs >= rpcTimeoutMs) {
    throw new ApiError(
      `The timeout must be shorter than the RPC timeout of ${rpcTimeoutMs} ms (got ${timeoutMs} ms)`,
      { operation, timeoutMs, rpcTimeoutMs }
    );
  }
}

/**
 * Convert and guard in one step; returns the value to put on the wire
 */
export function guardedTimeout(timeout: TimeUnit, rpcTimeoutMs: number, operation: string): number {
  const timeoutMs = toMilliseconds(timeout);
  assertWithinRpcTimeout(timeoutMs, rpcTimeoutMs, operation);
  return timeoutMs;
}
