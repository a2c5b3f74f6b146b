// src/common/sync/roomSyncAgent.ts

import { roomSyncConfig } from '~/common/config/roomSyncConfig';
import type { RoomsLocalStore } from '~/common/stores/rooms/store-rooms';

import type { RoomSyncClient, RoomSyncOutcome } from '~/common/sync/roomSyncClient';

export interface RoomSyncAgentOptions {
  client: RoomSyncClient;
  store: RoomsLocalStore;

  /** 0 = no timer, only syncNow(). */
  intervalMs?: number;

  onCycle?: (result: RoomSyncCycleResult) => void;
  debug?: boolean;
}

export interface RoomSyncCycleResult {
  subscriptions: RoomSyncOutcome;
  rooms: RoomSyncOutcome;
}

export interface RoomSyncAgent {
  /** Runs a cycle now; if one is in flight, returns that one. */
  syncNow(): Promise<RoomSyncCycleResult>;
  stop(): void;
}

/**
 * Background sync loop.
 *
 * A cycle reads the session watermark once and uses it for both fetches:
 * - subscriptions first: only they may create rows
 * - rooms second: enrichment of what the subscriptions fetch just created or updated
 * Cycles never overlap.
 */
export function startRoomSyncAgent(options: RoomSyncAgentOptions): RoomSyncAgent {
  const { client, store, onCycle, debug = roomSyncConfig.debug } = options;
  const intervalMs = options.intervalMs ?? roomSyncConfig.agent.intervalMs;

  let inFlight: Promise<RoomSyncCycleResult> | null = null;
  let timer: ReturnType<typeof setInterval> | null = null;
  let stopped = false;

  function log(...args: unknown[]) {
    if (debug) console.log(...args);
  }

  async function runCycle(): Promise<RoomSyncCycleResult> {
    const session = store.currentSession();
    if (!session) {
      const skipped: RoomSyncOutcome = { status: 'skipped', via: 'api', reason: 'no-session' };
      return { subscriptions: skipped, rooms: skipped };
    }

    const updatedSince = session.lastSubscriptionFetch !== null ? new Date(session.lastSubscriptionFetch) : null;
    log(`[sync] agent: cycle start session=${session.id} updatedSince=${updatedSince?.toISOString() ?? 'full'}`);

    const subscriptions = await client.fetchSubscriptions(updatedSince, { sessionId: session.id });
    const rooms = await client.fetchRooms(updatedSince, { sessionId: session.id });

    log(`[sync] agent: cycle done subscriptions=${subscriptions.status} rooms=${rooms.status}`);
    return { subscriptions, rooms };
  }

  function syncNow(): Promise<RoomSyncCycleResult> {
    if (inFlight) return inFlight;

    const cycle = runCycle()
      .then(result => {
        onCycle?.(result);
        return result;
      })
      .finally(() => {
        inFlight = null;
      });

    inFlight = cycle;
    return cycle;
  }

  if (intervalMs > 0) {
    timer = setInterval(() => {
      if (stopped) return;
      syncNow().catch((err: unknown) => {
        console.warn('[sync] agent: cycle failed', err);
      });
    }, intervalMs);
    // a pending sync never keeps the process alive
    timer.unref();
  }

  return {
    syncNow,
    stop: () => {
      stopped = true;
      if (timer) clearInterval(timer);
      timer = null;
    },
  };
}
