// src/common/sync/roomSyncBootstrap.ts

import { roomSyncConfig } from '~/common/config/roomSyncConfig';
import type { RoomsLocalStore } from '~/common/stores/rooms/store-rooms';

import { createLegacyRpcChannel } from '~/common/sync/legacyRpcChannel';
import type { LegacyRpcChannel } from '~/common/sync/legacyRpcChannel';
import { startRoomSyncAgent } from '~/common/sync/roomSyncAgent';
import type { RoomSyncAgent } from '~/common/sync/roomSyncAgent';
import { createRoomSyncClient } from '~/common/sync/roomSyncClient';
import type { RoomSyncClient } from '~/common/sync/roomSyncClient';
import { createRoomSyncTransportHttp } from '~/common/sync/roomSyncTransport.http';

export interface RoomSyncBootstrapOptions {
  store: RoomsLocalStore;
  serverUrl?: string;
  socketUrl?: string;

  /** Known server version; omitted = discovered from /api/info. */
  serverVersion?: string | null;

  intervalMs?: number;
  debug?: boolean;
}

export interface RoomSync {
  client: RoomSyncClient;
  agent: RoomSyncAgent;
  legacy: LegacyRpcChannel;
  shutdown(): Promise<void>;
}

/**
 * Wire transports, client and agent around one store.
 * Both transports read credentials from the store's current session on use,
 * so switching sessions does not require a new bootstrap.
 */
export function bootstrapRoomSync(options: RoomSyncBootstrapOptions): RoomSync {
  const { store, debug = roomSyncConfig.debug } = options;

  const transport = createRoomSyncTransportHttp({
    baseUrl: options.serverUrl,
    serverVersion: options.serverVersion,
    credentials: () => {
      const session = store.currentSession();
      return session ? { userId: session.userId, token: session.token } : null;
    },
    debug,
  });

  const legacy = createLegacyRpcChannel({
    url: options.socketUrl,
    resumeToken: () => store.currentSession()?.token ?? null,
    debug,
  });

  const client = createRoomSyncClient({ transport, legacy, store, debug });
  const agent = startRoomSyncAgent({ client, store, intervalMs: options.intervalMs, debug });

  return {
    client,
    agent,
    legacy,
    shutdown: async () => {
      agent.stop();
      await legacy.close();
    },
  };
}
