// src/common/privacy/purgeLocalUserData.ts

import type { RoomsLocalStore } from '~/common/stores/rooms/store-rooms';

/**
 * Sign-out purge: drop the session, its watermark and every subscription row synced for it,
 * soft-removed ones included. Other sessions' rows for the same rooms are untouched.
 *
 * Unlike a sync "remove" (which only clears ownership), this deletes rows.
 * When no session is left, the persisted copy is removed as well.
 */
export async function purgeLocalRoomData(store: RoomsLocalStore, sessionId: string): Promise<void> {
  store.forgetSession(sessionId);

  if (Object.keys(store.getState().sessions).length === 0)
    await store.clearPersisted();
}
