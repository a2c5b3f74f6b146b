// src/common/sync/roomSyncCodec.ts

import { z } from 'zod';

import type { DLastMessage, DSubscription } from '~/common/stores/rooms/rooms.subscription';

/**
 * Wire records from both protocol generations are loosely typed JSON.
 * Policy:
 * - an identity is required: a record without one is skipped
 *   (subscriptions: rid or the document _id; removals often carry only `{ _id, _deletedAt }`)
 * - any other field that fails validation is ignored (treated as absent)
 * - absent fields never overwrite what we already have locally
 */

// ---- Dates ----

/**
 * Dates arrive as ISO strings (REST), `{ $date: ms }` (legacy socket) or raw epoch ms.
 * Normalized to epoch ms.
 */
export const WireDateSchema = z.union([
  z.object({ $date: z.number().finite() }).transform(v => v.$date),
  z.number().finite(),
  z.string().transform((v, ctx) => {
    const ms = Date.parse(v);
    if (Number.isNaN(ms)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid date: ${v}` });
      return z.NEVER;
    }
    return ms;
  }),
]);

export interface LegacyDate {
  $date: number;
}

export function encodeLegacyDate(date: Date): LegacyDate {
  return { $date: date.getTime() };
}

function lenient<T extends z.ZodTypeAny>(schema: T) {
  return schema.optional().catch(undefined);
}

const lenientDate = lenient(WireDateSchema.nullable());
const lenientCount = lenient(z.number().int().nonnegative());

// ---- Records ----

export const SubscriptionRecordSchema = z.object({
  rid: lenient(z.string().min(1)),
  _id: lenient(z.string().min(1)),
  name: lenient(z.string()),
  fname: lenient(z.string().nullable()),
  t: lenient(z.string()),
  open: lenient(z.boolean()),
  alert: lenient(z.boolean()),
  f: lenient(z.boolean()),
  unread: lenientCount,
  userMentions: lenientCount,
  groupMentions: lenientCount,
  ls: lenientDate,
  _updatedAt: lenientDate,
  roles: lenient(z.array(z.string())),
}).refine(record => record.rid !== undefined || record._id !== undefined, {
  message: 'subscription record without rid or _id',
});

export type SubscriptionRecord = z.infer<typeof SubscriptionRecordSchema>;

const LastMessageRecordSchema = z.object({
  _id: z.string().min(1),
  msg: lenient(z.string()),
  u: lenient(z.object({ username: lenient(z.string()) })),
  ts: lenientDate,
});

export const RoomRecordSchema = z.object({
  _id: z.string().min(1),
  topic: lenient(z.string().nullable()),
  description: lenient(z.string().nullable()),
  announcement: lenient(z.string().nullable()),
  ro: lenient(z.boolean()),
  u: lenient(z.object({ _id: z.string() })),
  _updatedAt: lenientDate,
  lastMessage: lenient(LastMessageRecordSchema.nullable()),
});

export type RoomRecord = z.infer<typeof RoomRecordSchema>;

export function decodeSubscriptionRecord(raw: unknown): SubscriptionRecord | null {
  const parsed = SubscriptionRecordSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function decodeRoomRecord(raw: unknown): RoomRecord | null {
  const parsed = RoomRecordSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

// ---- Delta batches ----

export interface DeltaBatch<T> {
  list: T[];
  update: T[];
  remove: T[];
}

export interface RawDeltaBatch {
  list?: readonly unknown[];
  update?: readonly unknown[];
  remove?: readonly unknown[];
}

export interface DecodedDeltaBatch<T> {
  batch: DeltaBatch<T>;
  invalid: number;
}

export function decodeDeltaBatch<T>(raw: RawDeltaBatch, decode: (record: unknown) => T | null): DecodedDeltaBatch<T> {
  let invalid = 0;

  function decodeGroup(group: readonly unknown[] | undefined): T[] {
    const out: T[] = [];
    for (const record of group ?? []) {
      const decoded = decode(record);
      if (decoded === null) invalid++;
      else out.push(decoded);
    }
    return out;
  }

  return {
    batch: {
      list: decodeGroup(raw.list),
      update: decodeGroup(raw.update),
      remove: decodeGroup(raw.remove),
    },
    invalid,
  };
}

const RecordArraySchema = z.array(z.unknown());

/**
 * Legacy method results come in two shapes:
 * - an array: the full list (first sync)
 * - { update: [...], remove: [...] }: incremental
 * Anything else carries nothing to merge.
 */
export function readLegacyDelta(result: unknown): RawDeltaBatch {
  const asList = RecordArraySchema.safeParse(result);
  if (asList.success) return { list: asList.data };

  const asDelta = z.object({
    update: RecordArraySchema.optional().catch(undefined),
    remove: RecordArraySchema.optional().catch(undefined),
  }).safeParse(result);

  if (!asDelta.success) return {};
  return { update: asDelta.data.update, remove: asDelta.data.remove };
}

// ---- Mapping onto local records ----

export function applySubscriptionRecord(target: DSubscription, record: SubscriptionRecord): DSubscription {
  const next: DSubscription = { ...target, rid: record.rid ?? target.rid };

  if (record._id !== undefined) next.id = record._id;
  if (record.name !== undefined) next.name = record.name;
  if (record.fname !== undefined) next.fname = record.fname;
  if (record.t !== undefined) next.type = record.t;
  if (record.open !== undefined) next.open = record.open;
  if (record.alert !== undefined) next.alert = record.alert;
  if (record.f !== undefined) next.favorite = record.f;
  if (record.unread !== undefined) next.unread = record.unread;
  if (record.userMentions !== undefined) next.userMentions = record.userMentions;
  if (record.groupMentions !== undefined) next.groupMentions = record.groupMentions;
  if (record.ls !== undefined) next.lastSeen = record.ls;
  if (record._updatedAt !== undefined) next.updatedAt = record._updatedAt;
  if (record.roles !== undefined) next.roles = [...record.roles];

  return next;
}

function toLastMessage(record: NonNullable<RoomRecord['lastMessage']>): DLastMessage {
  return {
    id: record._id,
    text: record.msg ?? '',
    username: record.u?.username ?? null,
    ts: record.ts ?? null,
  };
}

/**
 * Room payloads only enrich an existing subscription; they never change its identity or ownership.
 */
export function applyRoomRecord(target: DSubscription, room: RoomRecord): DSubscription {
  const next: DSubscription = { ...target };

  if (room.topic !== undefined) next.roomTopic = room.topic;
  if (room.description !== undefined) next.roomDescription = room.description;
  if (room.announcement !== undefined) next.roomAnnouncement = room.announcement;
  if (room.ro !== undefined) next.roomReadOnly = room.ro;
  if (room.u !== undefined) next.roomOwnerId = room.u._id;
  if (room._updatedAt !== undefined) next.roomUpdatedAt = room._updatedAt;
  if (room.lastMessage !== undefined) next.roomLastMessage = room.lastMessage ? toLastMessage(room.lastMessage) : null;

  return next;
}
