// src/common/sync/roomSyncClient.ts

import { roomSyncConfig } from '~/common/config/roomSyncConfig';
import type { DRoomId } from '~/common/stores/rooms/rooms.subscription';
import type { RoomsLocalStore } from '~/common/stores/rooms/store-rooms';

import type { LegacyRpcChannel } from '~/common/sync/legacyRpcChannel';
import { createLegacyMarkAsRead } from '~/common/sync/markAsReadFallback';
import type { MarkAsReadFallback } from '~/common/sync/markAsReadFallback';
import { decodeDeltaBatch, decodeRoomRecord, decodeSubscriptionRecord, encodeLegacyDate, readLegacyDelta } from '~/common/sync/roomSyncCodec';
import type { DeltaBatch, RoomRecord, SubscriptionRecord } from '~/common/sync/roomSyncCodec';
import { backdateWatermark, mergeRoomDelta, mergeSubscriptionDelta } from '~/common/sync/roomSyncMerge';
import { roomsRequest, subscriptionReadRequest, subscriptionsRequest } from '~/common/sync/roomSyncRequests';
import type { RoomSyncErrorKind, RoomSyncTransport } from '~/common/sync/roomSyncTransport';

export type RoomSyncVia = 'api' | 'legacy';

/**
 * Every sync call ends in exactly one of these, and `onComplete` (when given) fires exactly once with it.
 *
 * - applied: the batch was merged and committed
 * - skipped: nothing to do this cycle (server said no, no session, or a transient transport error on the typed path)
 * - failed: the legacy path could not be completed, or the store refused the transaction
 */
export type RoomSyncOutcome =
  | {
    status: 'applied';
    via: RoomSyncVia;
    touched: number;
    removed: number;
    dropped: number;
    invalid: number;
    watermark: number | null;
  }
  | {
    status: 'skipped';
    via: RoomSyncVia;
    reason: 'unsuccessful' | 'no-session' | 'transport-error';
    error?: string;
  }
  | {
    status: 'failed';
    via: RoomSyncVia;
    kind: RoomSyncErrorKind | 'store';
    error: string;
  };

export type MarkAsReadOutcome = 'acknowledged' | 'fallback' | 'dropped';

export interface RoomSyncCallOptions {
  /** Defaults to the store's current session, resolved when the call starts. */
  sessionId?: string;
  onComplete?: (outcome: RoomSyncOutcome) => void;
}

export interface RoomSyncClientOptions {
  transport: RoomSyncTransport;
  legacy: LegacyRpcChannel;
  store: RoomsLocalStore;

  /** Defaults to the legacy `readMessages` call plus a local counter reset. */
  markAsReadFallback?: MarkAsReadFallback;

  /** Extra attempts on the typed path. */
  retryOnError?: number;

  /** Server-aligned clock, epoch ms. */
  now?: () => number;

  debug?: boolean;
}

export interface RoomSyncClient {
  markAsRead(rid: DRoomId): Promise<MarkAsReadOutcome>;

  fetchSubscriptions(updatedSince: Date | null, options?: RoomSyncCallOptions): Promise<RoomSyncOutcome>;
  fetchRooms(updatedSince: Date | null, options?: RoomSyncCallOptions): Promise<RoomSyncOutcome>;

  // legacy protocol, for servers without the REST endpoints
  fetchSubscriptionsFallback(updatedSince: Date | null, options?: RoomSyncCallOptions): Promise<RoomSyncOutcome>;
  fetchRoomsFallback(updatedSince: Date | null, options?: RoomSyncCallOptions): Promise<RoomSyncOutcome>;
}

function legacyParams(updatedSince: Date | null): unknown[] {
  return updatedSince ? [encodeLegacyDate(updatedSince)] : [];
}

export function createRoomSyncClient(options: RoomSyncClientOptions): RoomSyncClient {
  const {
    transport,
    legacy,
    store,
    retryOnError = roomSyncConfig.http.retryOnError,
    now = () => Date.now(),
    debug = roomSyncConfig.debug,
  } = options;

  const markAsReadFallback = options.markAsReadFallback ?? createLegacyMarkAsRead({ channel: legacy, store, debug });

  function log(...args: unknown[]) {
    if (debug) console.log(...args);
  }

  function resolveSessionId(callOptions: RoomSyncCallOptions): string | null {
    return callOptions.sessionId ?? store.currentSession()?.id ?? null;
  }

  async function complete(via: RoomSyncVia, run: () => Promise<RoomSyncOutcome>, callOptions: RoomSyncCallOptions): Promise<RoomSyncOutcome> {
    let outcome: RoomSyncOutcome;
    try {
      outcome = await run();
    } catch (err: unknown) {
      // only store transactions throw; transports return results
      const error = err instanceof Error ? err.message : String(err);
      console.warn('[sync] store transaction failed; nothing was committed', { via, error });
      outcome = { status: 'failed', via, kind: 'store', error };
    }

    try {
      callOptions.onComplete?.(outcome);
    } catch (err: unknown) {
      // the outcome is already committed; a failing callback does not change it
      console.warn('[sync] onComplete callback threw', { via, status: outcome.status, error: err instanceof Error ? err.message : String(err) });
    }
    return outcome;
  }

  // ---- Shared merge steps ----

  async function applySubscriptions(
    via: RoomSyncVia,
    sessionId: string,
    decoded: { batch: DeltaBatch<SubscriptionRecord>; invalid: number },
  ): Promise<RoomSyncOutcome> {
    const merged = await store.execute(tx => {
      const session = tx.getSession(sessionId);
      if (!session) return null;
      return mergeSubscriptionDelta(tx, decoded.batch, session, now());
    });

    if (!merged) return { status: 'skipped', via, reason: 'no-session' };

    log(`[sync] subscriptions (${via}): upserted=${merged.upserted} removed=${merged.removed} unresolved=${merged.unresolved} invalid=${decoded.invalid} watermark=${merged.watermark}`);
    return {
      status: 'applied',
      via,
      touched: merged.upserted + merged.removed,
      removed: merged.removed,
      dropped: merged.unresolved,
      invalid: decoded.invalid,
      watermark: merged.watermark,
    };
  }

  /**
   * Two commits on purpose: the backdate may land without the enrichment (worst case,
   * one extra second of subscriptions is fetched again), never the other way around.
   */
  async function applyRooms(
    via: RoomSyncVia,
    sessionId: string | null,
    decoded: { batch: Pick<DeltaBatch<RoomRecord>, 'list' | 'update'>; invalid: number },
  ): Promise<RoomSyncOutcome> {
    const watermark = sessionId
      ? await store.execute(tx => backdateWatermark(tx, sessionId, now()))
      : null;

    const merged = await store.execute(tx => {
      const partition = sessionId && tx.getSession(sessionId) ? sessionId : null;
      return mergeRoomDelta(tx, decoded.batch, partition);
    });

    log(`[sync] rooms (${via}): enriched=${merged.enriched} dropped=${merged.dropped} invalid=${decoded.invalid}`);
    return {
      status: 'applied',
      via,
      touched: merged.enriched,
      removed: 0,
      dropped: merged.dropped,
      invalid: decoded.invalid,
      watermark,
    };
  }

  // ---- Legacy paths ----

  async function runSubscriptionsFallback(updatedSince: Date | null, sessionId: string | null): Promise<RoomSyncOutcome> {
    if (!sessionId) return { status: 'skipped', via: 'legacy', reason: 'no-session' };

    const res = await legacy.call('subscriptions/get', legacyParams(updatedSince));
    if (!res.ok) {
      log(`[sync] subscriptions (legacy) failed: ${res.error}`);
      return { status: 'failed', via: 'legacy', kind: res.kind, error: res.error };
    }

    const decoded = decodeDeltaBatch(readLegacyDelta(res.value), decodeSubscriptionRecord);
    return applySubscriptions('legacy', sessionId, decoded);
  }

  async function runRoomsFallback(updatedSince: Date | null, sessionId: string | null): Promise<RoomSyncOutcome> {
    const res = await legacy.call('rooms/get', legacyParams(updatedSince));
    if (!res.ok) {
      log(`[sync] rooms (legacy) failed: ${res.error}`);
      return { status: 'failed', via: 'legacy', kind: res.kind, error: res.error };
    }

    // the legacy rooms result has no remove group
    const { list, update } = readLegacyDelta(res.value);
    const decoded = decodeDeltaBatch({ list, update }, decodeRoomRecord);
    return applyRooms('legacy', sessionId, decoded);
  }

  // ---- Typed paths ----

  async function runSubscriptions(updatedSince: Date | null, sessionId: string | null): Promise<RoomSyncOutcome> {
    if (!sessionId) return { status: 'skipped', via: 'api', reason: 'no-session' };

    const res = await transport.fetch(subscriptionsRequest(updatedSince), { retryOnError });
    if (!res.ok) {
      if (res.kind === 'version') {
        log(`[sync] subscriptions: ${res.error}; switching to legacy protocol`);
        return runSubscriptionsFallback(updatedSince, sessionId);
      }
      log(`[sync] subscriptions: dropped after transport error: ${res.error}`);
      return { status: 'skipped', via: 'api', reason: 'transport-error', error: res.error };
    }

    if (res.value.success !== true) return { status: 'skipped', via: 'api', reason: 'unsuccessful' };

    return applySubscriptions('api', sessionId, decodeDeltaBatch(res.value, decodeSubscriptionRecord));
  }

  async function runRooms(updatedSince: Date | null, sessionId: string | null): Promise<RoomSyncOutcome> {
    const res = await transport.fetch(roomsRequest(updatedSince), { retryOnError });
    if (!res.ok) {
      if (res.kind === 'version') {
        log(`[sync] rooms: ${res.error}; switching to legacy protocol`);
        return runRoomsFallback(updatedSince, sessionId);
      }
      log(`[sync] rooms: dropped after transport error: ${res.error}`);
      return { status: 'skipped', via: 'api', reason: 'transport-error', error: res.error };
    }

    if (res.value.success !== true) return { status: 'skipped', via: 'api', reason: 'unsuccessful' };

    const { list, update } = res.value;
    return applyRooms('api', sessionId, decodeDeltaBatch({ list, update }, decodeRoomRecord));
  }

  async function markAsRead(rid: DRoomId): Promise<MarkAsReadOutcome> {
    const res = await transport.fetch(subscriptionReadRequest(rid));
    if (res.ok) return 'acknowledged';

    if (res.kind !== 'version') {
      // fire-and-forget: not retried, not surfaced
      log(`[sync] mark as read dropped rid=${rid}: ${res.error}`);
      return 'dropped';
    }

    try {
      return (await markAsReadFallback(rid)) ? 'fallback' : 'dropped';
    } catch (err: unknown) {
      console.warn('[sync] mark as read fallback failed', { rid, error: err instanceof Error ? err.message : String(err) });
      return 'dropped';
    }
  }

  return {
    markAsRead,

    fetchSubscriptions: (updatedSince, callOptions = {}) =>
      complete('api', () => runSubscriptions(updatedSince, resolveSessionId(callOptions)), callOptions),

    fetchRooms: (updatedSince, callOptions = {}) =>
      complete('api', () => runRooms(updatedSince, resolveSessionId(callOptions)), callOptions),

    fetchSubscriptionsFallback: (updatedSince, callOptions = {}) =>
      complete('legacy', () => runSubscriptionsFallback(updatedSince, resolveSessionId(callOptions)), callOptions),

    fetchRoomsFallback: (updatedSince, callOptions = {}) =>
      complete('legacy', () => runRoomsFallback(updatedSince, resolveSessionId(callOptions)), callOptions),
  };
}
