// src/common/auth/userNamespace.ts

import { roomSyncConfig } from '~/common/config/roomSyncConfig';

/**
 * Local user namespace.
 *
 * This is NOT authentication.
 * It only partitions persisted client storage so two users on the same machine
 * do not share a local rooms store.
 */

export const RS_NAMESPACE_DEFAULT = 'default';

/** Keep the namespace safe for use inside storage keys / file names. */
export function normalizeUserNamespace(raw: string): string {
  // allow UUIDs / cuids / simple strings; replace anything else
  return raw.trim().replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, 128) || RS_NAMESPACE_DEFAULT;
}

/**
 * Returns the namespace used to scope persisted stores.
 * Must be synchronous (stores may be created at module import time).
 */
export function getBootUserNamespace(): string {
  return normalizeUserNamespace(roomSyncConfig.userNamespace);
}

/**
 * Build a per-user storage key. Example:
 *  baseKey='app-rooms' -> 'app-rooms:default' (or ':<userId>')
 */
export function makeUserScopedKey(baseKey: string, namespace: string = getBootUserNamespace()): string {
  return `${baseKey}:${normalizeUserNamespace(namespace)}`;
}
