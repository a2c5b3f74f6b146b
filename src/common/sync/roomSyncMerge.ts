// src/common/sync/roomSyncMerge.ts

import type { DAuthSession } from '~/common/auth/authSession';
import { createEmptySubscription } from '~/common/stores/rooms/rooms.subscription';
import type { DSubscription } from '~/common/stores/rooms/rooms.subscription';
import type { RoomsTransaction } from '~/common/stores/rooms/store-rooms';

import { applyRoomRecord, applySubscriptionRecord } from '~/common/sync/roomSyncCodec';
import type { DeltaBatch, RoomRecord, SubscriptionRecord } from '~/common/sync/roomSyncCodec';

/** Rooms fetches backdate the watermark by this much, so the next subscriptions fetch re-covers the boundary. */
export const WATERMARK_BACKDATE_MS = 1000;

export interface SubscriptionMergeResult {
  upserted: number;
  removed: number;

  /** Records with only a document _id that matches no local row. */
  unresolved: number;

  watermark: number;
}

export interface RoomMergeResult {
  enriched: number;
  dropped: number;
}

/**
 * Merge a subscriptions delta batch inside one transaction, within the session's rows.
 *
 * - list, then update: get-or-create by rid, owned by `session`
 * - remove: get-or-create by rid, ownership cleared (the row stays)
 * - a record without rid is resolved through the stored document id; it cannot create a row
 * - watermark: advanced to `now`, never moved backwards
 *
 * Reads go through the transaction, so a record touched twice in the same batch
 * sees its own earlier write (last writer in batch order wins).
 * The caller commits: batch and watermark land together or not at all.
 */
export function mergeSubscriptionDelta(
  tx: RoomsTransaction,
  batch: DeltaBatch<SubscriptionRecord>,
  session: DAuthSession,
  now: number,
): SubscriptionMergeResult {
  let upserted = 0;
  let removed = 0;
  let unresolved = 0;

  function resolve(record: SubscriptionRecord): DSubscription | null {
    if (record.rid !== undefined)
      return tx.findSubscription(session.id, record.rid) ?? createEmptySubscription(session.id, record.rid);
    if (record._id !== undefined)
      return tx.findSubscriptionByServerId(session.id, record._id);
    return null;
  }

  function queue(record: SubscriptionRecord, authId: string | null): boolean {
    const existing = resolve(record);
    if (!existing) {
      unresolved++;
      return false;
    }

    tx.addSubscriptions([{ ...applySubscriptionRecord(existing, record), authId }]);
    return true;
  }

  for (const record of [...batch.list, ...batch.update])
    if (queue(record, session.id)) upserted++;

  for (const record of batch.remove)
    if (queue(record, null)) removed++;

  const previous = session.lastSubscriptionFetch ?? Number.NEGATIVE_INFINITY;
  const watermark = Math.max(previous, now);
  tx.addSession({ ...session, lastSubscriptionFetch: watermark });

  return { upserted, removed, unresolved, watermark };
}

/**
 * Enrich existing subscriptions with room payloads (list, then update).
 * Rooms never create subscriptions: a room with no matching row is dropped.
 * With a session, only that session's rows are enriched; without one, every session's row for the room.
 */
export function mergeRoomDelta(
  tx: RoomsTransaction,
  batch: Pick<DeltaBatch<RoomRecord>, 'list' | 'update'>,
  sessionId: string | null,
): RoomMergeResult {
  let enriched = 0;
  let dropped = 0;

  for (const room of [...batch.list, ...batch.update]) {
    let targets: DSubscription[];
    if (sessionId !== null) {
      const row = tx.findSubscription(sessionId, room._id);
      targets = row ? [row] : [];
    } else {
      targets = tx.findRoomSubscriptions(room._id);
    }

    if (!targets.length) {
      dropped++;
      continue;
    }

    tx.addSubscriptions(targets.map(target => applyRoomRecord(target, room)));
    enriched++;
  }

  return { enriched, dropped };
}

/**
 * Set the watermark to `now - 1s`. Deliberately not monotonic: this is the
 * rooms path making sure the next subscriptions fetch does not skip the boundary second.
 * Returns the new watermark, or null when the session does not exist.
 */
export function backdateWatermark(tx: RoomsTransaction, sessionId: string, now: number): number | null {
  const session = tx.getSession(sessionId);
  if (!session) return null;

  const watermark = now - WATERMARK_BACKDATE_MS;
  tx.addSession({ ...session, lastSubscriptionFetch: watermark });
  return watermark;
}
