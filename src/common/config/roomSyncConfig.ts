// src/common/config/roomSyncConfig.ts

export function envInt(name: string, def: number): number {
  const raw = process.env[name];
  if (!raw) return def;
  const n = Number(raw);
  return Number.isFinite(n) && n >= 0 ? Math.floor(n) : def;
}

export function envBool(name: string, def: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) return def;
  return raw === '1' || raw.toLowerCase() === 'true' || raw.toLowerCase() === 'yes';
}

export function envString(name: string, def: string): string {
  const raw = process.env[name];
  return raw === undefined || raw.trim() === '' ? def : raw.trim();
}

/**
 * Centralized sync defaults (env-overridable).
 * Components take these as defaults; every value can also be passed explicitly.
 */
export const roomSyncConfig = {
  // REST base URL, e.g. https://chat.example.com
  serverUrl: envString('ROOMSYNC_SERVER_URL', 'http://localhost:3000'),

  // Legacy method-call socket, e.g. wss://chat.example.com/websocket
  socketUrl: envString('ROOMSYNC_SOCKET_URL', 'ws://localhost:3000/websocket'),

  // Partition of the persisted local store.
  userNamespace: envString('ROOMSYNC_USER_NAMESPACE', 'default'),

  // ---- Typed REST path ----
  http: {
    // extra attempts after the first one, for transient failures only
    retryOnError: envInt('ROOMSYNC_RETRY_ON_ERROR', 3),
    retryDelayMs: envInt('ROOMSYNC_RETRY_DELAY_MS', 500),
    requestTimeoutMs: envInt('ROOMSYNC_REQUEST_TIMEOUT_MS', 15_000),
    // a discovered server version is looked up again after this long
    versionTtlMs: envInt('ROOMSYNC_VERSION_TTL_MS', 10 * 60_000),
  },

  // ---- Legacy socket path (no retry) ----
  rpc: {
    callTimeoutMs: envInt('ROOMSYNC_RPC_TIMEOUT_MS', 15_000),
  },

  // ---- Background agent ----
  agent: {
    // 0 disables the interval; syncNow() still works
    intervalMs: envInt('ROOMSYNC_SYNC_INTERVAL_MS', 60_000),
  },

  debug: envBool('ROOMSYNC_DEBUG', false),
};
