// src/common/sync/roomSyncTransport.ts

/**
 * Failure classes crossing the transport boundary.
 *
 * - 'version': the server predates the endpoint. Never retried; callers switch to the legacy protocol.
 * - 'http' / 'network' / 'timeout': transport trouble. `retryable` says whether another attempt makes sense.
 * - 'rpc': the legacy method call returned an error object.
 * - 'decode': a response arrived but did not have the expected shape.
 */
export type RoomSyncErrorKind = 'version' | 'http' | 'network' | 'timeout' | 'rpc' | 'decode';

export interface RoomSyncFailure {
  ok: false;
  kind: RoomSyncErrorKind;

  /** Human-readable, for logs. */
  error: string;

  status?: number;
  retryable?: boolean;

  /**
   * Parsed response body (if any).
   * Useful for debugging.
   */
  body?: unknown;
}

/**
 * Transport result wrapper.
 */
export type RoomSyncResult<T> =
  | { ok: true; value: T }
  | RoomSyncFailure;

/**
 * A typed REST request. `parse` validates the JSON body; null means "unexpected shape".
 */
export interface RoomSyncRequest<T> {
  name: string;
  method: 'GET' | 'POST';
  path: string;
  query?: Record<string, string>;
  body?: unknown;

  /** Oldest server version that serves this endpoint. */
  requiredVersion: string;

  parse: (json: unknown) => T | null;
}

export interface RoomSyncFetchOptions {
  /**
   * Extra attempts after the first one, for retryable failures only.
   * A version mismatch is never retried.
   */
  retryOnError?: number;
}

export interface RoomSyncTransport {
  fetch<T>(request: RoomSyncRequest<T>, options?: RoomSyncFetchOptions): Promise<RoomSyncResult<T>>;
}

export function versionMismatch(request: Pick<RoomSyncRequest<unknown>, 'name' | 'requiredVersion'>, serverVersion: string | null): RoomSyncFailure {
  return {
    ok: false,
    kind: 'version',
    error: serverVersion
      ? `${request.name} requires server ${request.requiredVersion} (server is ${serverVersion})`
      : `${request.name} is not served by this server`,
    retryable: false,
  };
}
