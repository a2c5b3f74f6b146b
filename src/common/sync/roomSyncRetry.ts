// src/common/sync/roomSyncRetry.ts

import type { RoomSyncFailure, RoomSyncResult } from '~/common/sync/roomSyncTransport';

const MAX_RETRY_DELAY_MS = 30_000;

export interface RetryPolicy {
  /** Extra attempts after the first one. */
  retries: number;

  /** Base delay, doubled per attempt (capped at 30s). 0 retries immediately. */
  delayMs?: number;

  onRetry?: (attempt: number, failure: RoomSyncFailure) => void;
}

/**
 * Retryable = the transport said so. A version mismatch is a protocol signal, never a transient error.
 */
export function isRetryableFailure(result: RoomSyncResult<unknown>): boolean {
  if (result.ok) return false;
  if (result.kind === 'version') return false;
  return result.retryable === true;
}

export function retryDelayMs(attempt: number, baseDelayMs: number): number {
  if (baseDelayMs <= 0) return 0;
  return Math.min(baseDelayMs * Math.pow(2, attempt - 1), MAX_RETRY_DELAY_MS);
}

function waitMs(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export async function withRetry<T>(attempt: () => Promise<RoomSyncResult<T>>, policy: RetryPolicy): Promise<RoomSyncResult<T>> {
  const { retries, delayMs = 0, onRetry } = policy;

  let result = await attempt();

  for (let n = 1; n <= retries; n++) {
    if (result.ok || !isRetryableFailure(result)) break;

    onRetry?.(n, result);

    const delay = retryDelayMs(n, delayMs);
    if (delay > 0) await waitMs(delay);

    result = await attempt();
  }

  return result;
}
