// src/common/sync/markAsReadFallback.ts

import type { DRoomId } from '~/common/stores/rooms/rooms.subscription';
import type { RoomsLocalStore } from '~/common/stores/rooms/store-rooms';

import type { LegacyRpcChannel } from '~/common/sync/legacyRpcChannel';

/**
 * Advances read state on servers without `subscriptions.read`.
 * Resolves true when the read was acknowledged.
 */
export type MarkAsReadFallback = (rid: DRoomId) => Promise<boolean>;

export interface LegacyMarkAsReadOptions {
  channel: LegacyRpcChannel;
  store: RoomsLocalStore;
  debug?: boolean;
}

/**
 * Default fallback: the legacy `readMessages` method, then clear the local counters
 * so the room stops showing as unread before the next subscriptions sync.
 */
export function createLegacyMarkAsRead(options: LegacyMarkAsReadOptions): MarkAsReadFallback {
  const { channel, store, debug = false } = options;

  function log(...args: unknown[]) {
    if (debug) console.log(...args);
  }

  return async (rid) => {
    const res = await channel.call('readMessages', [rid]);
    if (!res.ok) {
      log(`[sync] mark as read (legacy) failed rid=${rid}: ${res.error}`);
      return false;
    }

    // the socket is logged in as the current session
    await store.execute(tx => {
      const session = tx.currentSession();
      const subscription = session ? tx.findSubscription(session.id, rid) : null;
      if (!subscription) return;

      tx.addSubscriptions([{
        ...subscription,
        unread: 0,
        alert: false,
        userMentions: 0,
        groupMentions: 0,
      }]);
    });

    log(`[sync] mark as read (legacy) rid=${rid}`);
    return true;
  };
}
