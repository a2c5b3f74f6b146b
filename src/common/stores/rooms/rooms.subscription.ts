// src/common/stores/rooms/rooms.subscription.ts

export type DRoomId = string;

/**
 * Room type as sent by the server:
 * 'c' public channel, 'p' private group, 'd' direct message, 'l' livechat.
 * Unknown values are kept as-is.
 */
export type DRoomType = string;

export interface DLastMessage {
  id: string;
  text: string;
  username: string | null;
  ts: number | null; // epoch ms
}

/** Store key of a subscription row: one row per room per session. */
export type DSubscriptionKey = string;

export function subscriptionKey(sessionId: string, rid: DRoomId): DSubscriptionKey {
  return `${sessionId}/${rid}`;
}

/**
 * Local subscription record (one per room id per session).
 *
 * Timestamps are epoch milliseconds, so the persisted JSON does not depend on Date revival.
 */
export interface DSubscription {
  rid: DRoomId;

  // session the row was synced for; unlike authId, a removal does not clear it
  sessionId: string;

  // server-side subscription document id; removals may carry only this
  id: string | null;

  /**
   * Active ownership link, equal to sessionId while the user is in the room.
   * null = soft-removed: the user left the room, but we keep the row (history, re-association).
   */
  authId: string | null;

  name: string;
  fname: string | null;
  type: DRoomType;

  open: boolean;
  alert: boolean;
  favorite: boolean;

  unread: number;
  userMentions: number;
  groupMentions: number;

  lastSeen: number | null;
  updatedAt: number | null;
  roles: string[];

  // ---- room enrichment (only written by rooms fetches) ----
  roomTopic: string | null;
  roomDescription: string | null;
  roomAnnouncement: string | null;
  roomReadOnly: boolean;
  roomOwnerId: string | null;
  roomUpdatedAt: number | null;
  roomLastMessage: DLastMessage | null;
}

export function createEmptySubscription(sessionId: string, rid: DRoomId): DSubscription {
  return {
    rid,
    sessionId,
    id: null,
    authId: null,
    name: '',
    fname: null,
    type: 'c',
    open: true,
    alert: false,
    favorite: false,
    unread: 0,
    userMentions: 0,
    groupMentions: 0,
    lastSeen: null,
    updatedAt: null,
    roles: [],
    roomTopic: null,
    roomDescription: null,
    roomAnnouncement: null,
    roomReadOnly: false,
    roomOwnerId: null,
    roomUpdatedAt: null,
    roomLastMessage: null,
  };
}
