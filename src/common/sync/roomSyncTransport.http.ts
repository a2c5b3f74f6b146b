// src/common/sync/roomSyncTransport.http.ts

import type { AuthCredentials } from '~/common/auth/authSession';
import { roomSyncConfig } from '~/common/config/roomSyncConfig';

import { ServerInfoSchema } from '~/common/sync/roomSyncRequests';
import { withRetry } from '~/common/sync/roomSyncRetry';
import { versionMismatch } from '~/common/sync/roomSyncTransport';
import type { RoomSyncFetchOptions, RoomSyncRequest, RoomSyncResult, RoomSyncTransport } from '~/common/sync/roomSyncTransport';

export interface RoomSyncHttpTransportOptions {
  /** Server origin, e.g. https://chat.example.com */
  baseUrl?: string;

  /** Read on every request, so a re-login is picked up without recreating the transport. */
  credentials?: () => AuthCredentials | null;

  /**
   * Known server version. When omitted, it is discovered from /api/info and re-checked
   * after `versionTtlMs`, so a server upgrade re-enables the typed path;
   * when null, no version gate is applied (a 404 still reports a mismatch).
   */
  serverVersion?: string | null;
  versionTtlMs?: number;

  timeoutMs?: number;
  retryDelayMs?: number;
  debug?: boolean;
}

function isRetryableHttpStatus(status: number): boolean {
  // conservative retry policy
  return status === 429 || (status >= 500 && status <= 599);
}

/**
 * Compare dotted versions numerically ('0.62.0' vs '0.61.2').
 * Pre-release / build suffixes are ignored ('0.62.0-rc.1' counts as 0.62.0).
 */
export function isVersionAtLeast(version: string, required: string): boolean {
  const parse = (v: string) => v.split(/[-+]/)[0].split('.').map(part => Number.parseInt(part, 10) || 0);
  const a = parse(version);
  const b = parse(required);

  for (let i = 0; i < Math.max(a.length, b.length); i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    if (x !== y) return x > y;
  }
  return true;
}

async function readJsonSafely(res: Response): Promise<unknown> {
  // Some errors might return non-JSON. We try JSON first, then fall back to text.
  const ct = res.headers.get('content-type') || '';
  if (ct.includes('application/json')) {
    try {
      return await res.json();
    } catch {
      return null;
    }
  }

  try {
    const text = await res.text();
    return text ? { error: text } : null;
  } catch {
    return null;
  }
}

function errorMessageFromBody(body: unknown): string | null {
  if (!body || typeof body !== 'object') return null;
  const error = 'error' in body ? body.error : undefined;
  return typeof error === 'string' && error ? error : null;
}

export function createRoomSyncTransportHttp(options: RoomSyncHttpTransportOptions = {}): RoomSyncTransport {
  const baseUrl = options.baseUrl ?? roomSyncConfig.serverUrl;
  const timeoutMs = options.timeoutMs ?? roomSyncConfig.http.requestTimeoutMs;
  const retryDelayMs = options.retryDelayMs ?? roomSyncConfig.http.retryDelayMs;
  const debug = options.debug ?? roomSyncConfig.debug;
  const versionTtlMs = options.versionTtlMs ?? roomSyncConfig.http.versionTtlMs;
  const credentials = options.credentials ?? (() => null);

  const knownVersion = options.serverVersion;
  let discovered: { version: string | null; at: number } | null = null;

  function log(...args: unknown[]) {
    if (debug) console.log(...args);
  }

  async function doFetchJson(path: string, init: RequestInit, query?: Record<string, string>): Promise<RoomSyncResult<unknown>> {
    const url = new URL(path, baseUrl);
    for (const [key, value] of Object.entries(query ?? {}))
      url.searchParams.set(key, value);

    const auth = credentials();

    try {
      const res = await fetch(url, {
        ...init,
        headers: {
          'Content-Type': 'application/json',
          ...(auth ? { 'X-Auth-Token': auth.token, 'X-User-Id': auth.userId } : {}),
        },
        signal: AbortSignal.timeout(timeoutMs),
      });

      if (!res.ok) {
        const body = await readJsonSafely(res);
        const msg = errorMessageFromBody(body) || `http ${res.status} ${res.statusText}`;

        return {
          ok: false,
          // servers that predate an endpoint answer 404 for it
          kind: res.status === 404 ? 'version' : 'http',
          error: msg,
          status: res.status,
          retryable: isRetryableHttpStatus(res.status),
          body,
        };
      }

      // OK
      return { ok: true, value: await res.json() };
    } catch (err: unknown) {
      if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError'))
        return { ok: false, kind: 'timeout', error: `request timed out after ${timeoutMs}ms`, retryable: true };

      // network / DNS / offline / invalid JSON on a 2xx
      return {
        ok: false,
        kind: err instanceof SyntaxError ? 'decode' : 'network',
        error: err instanceof Error ? err.message : 'network error',
        retryable: !(err instanceof SyntaxError),
      };
    }
  }

  async function resolveServerVersion(): Promise<string | null> {
    if (knownVersion !== undefined) return knownVersion;
    if (discovered && Date.now() - discovered.at < versionTtlMs) return discovered.version;

    const res = await doFetchJson('/api/info', { method: 'GET' });
    if (!res.ok) {
      // unknown for now; ask again next time
      log(`[sync] http: server version lookup failed: ${res.error}`);
      return null;
    }

    const info = ServerInfoSchema.safeParse(res.value);
    discovered = { version: info.success ? info.data.version : null, at: Date.now() };
    log(`[sync] http: server version ${discovered.version ?? 'unknown'}`);
    return discovered.version;
  }

  async function attempt<T>(request: RoomSyncRequest<T>): Promise<RoomSyncResult<T>> {
    const res = await doFetchJson(
      request.path,
      {
        method: request.method,
        ...(request.body !== undefined ? { body: JSON.stringify(request.body) } : {}),
      },
      request.query,
    );

    if (!res.ok) {
      if (res.kind === 'version') return { ...versionMismatch(request, null), status: res.status, body: res.body };
      return res;
    }

    const value = request.parse(res.value);
    if (value === null)
      return { ok: false, kind: 'decode', error: `${request.name}: unexpected response shape`, retryable: false, body: res.value };

    return { ok: true, value };
  }

  return {
    fetch: async <T>(request: RoomSyncRequest<T>, fetchOptions: RoomSyncFetchOptions = {}): Promise<RoomSyncResult<T>> => {
      const version = await resolveServerVersion();
      if (version && !isVersionAtLeast(version, request.requiredVersion)) {
        log(`[sync] http: ${request.name} skipped, server ${version} < ${request.requiredVersion}`);
        return versionMismatch(request, version);
      }

      return withRetry(() => attempt(request), {
        retries: fetchOptions.retryOnError ?? 0,
        delayMs: retryDelayMs,
        onRetry: (n, failure) => log(`[sync] http: retry ${n} for ${request.name} after: ${failure.error}`),
      });
    },
  };
}
