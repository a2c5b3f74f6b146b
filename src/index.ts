// src/index.ts

export { createAuthSession } from '~/common/auth/authSession';
export type { AuthCredentials, DAuthSession } from '~/common/auth/authSession';
export { makeUserScopedKey, normalizeUserNamespace } from '~/common/auth/userNamespace';
export { roomSyncConfig } from '~/common/config/roomSyncConfig';
export { purgeLocalRoomData } from '~/common/privacy/purgeLocalUserData';

export { createFileStateStorage } from '~/common/stores/fileStateStorage';
export { createEmptySubscription, subscriptionKey } from '~/common/stores/rooms/rooms.subscription';
export type { DLastMessage, DRoomId, DRoomType, DSubscription, DSubscriptionKey } from '~/common/stores/rooms/rooms.subscription';
export { createMemoryStateStorage, createRoomsLocalStore } from '~/common/stores/rooms/store-rooms';
export type { RoomsLocalStore, RoomsLocalStoreOptions, RoomsState, RoomsTransaction } from '~/common/stores/rooms/store-rooms';

export { createLegacyRpcChannel } from '~/common/sync/legacyRpcChannel';
export type { LegacyRpcChannel, LegacyRpcChannelOptions } from '~/common/sync/legacyRpcChannel';
export { createLegacyMarkAsRead } from '~/common/sync/markAsReadFallback';
export type { MarkAsReadFallback } from '~/common/sync/markAsReadFallback';
export { startRoomSyncAgent } from '~/common/sync/roomSyncAgent';
export type { RoomSyncAgent, RoomSyncAgentOptions, RoomSyncCycleResult } from '~/common/sync/roomSyncAgent';
export { bootstrapRoomSync } from '~/common/sync/roomSyncBootstrap';
export type { RoomSync, RoomSyncBootstrapOptions } from '~/common/sync/roomSyncBootstrap';
export { createRoomSyncClient } from '~/common/sync/roomSyncClient';
export type { MarkAsReadOutcome, RoomSyncCallOptions, RoomSyncClient, RoomSyncClientOptions, RoomSyncOutcome } from '~/common/sync/roomSyncClient';
export { createRoomSyncTransportHttp, isVersionAtLeast } from '~/common/sync/roomSyncTransport.http';
export type { RoomSyncHttpTransportOptions } from '~/common/sync/roomSyncTransport.http';
export type { RoomSyncErrorKind, RoomSyncFailure, RoomSyncRequest, RoomSyncResult, RoomSyncTransport } from '~/common/sync/roomSyncTransport';
