// src/common/sync/roomSyncRequests.ts

import { z } from 'zod';

import type { DRoomId } from '~/common/stores/rooms/rooms.subscription';
import type { RoomSyncRequest } from '~/common/sync/roomSyncTransport';

const RecordArraySchema = z.array(z.unknown());

/**
 * `success` stays optional: a body without it parses, and is then treated as "nothing to merge".
 */
export const DeltaResponseSchema = z.object({
  success: z.boolean().optional(),
  list: RecordArraySchema.optional(),
  update: RecordArraySchema.optional(),
  remove: RecordArraySchema.optional(),
});

export type SubscriptionsResponse = z.infer<typeof DeltaResponseSchema>;
export type RoomsResponse = z.infer<typeof DeltaResponseSchema>;

export const SuccessResponseSchema = z.object({
  success: z.boolean().optional(),
});

export type SuccessResponse = z.infer<typeof SuccessResponseSchema>;

function parseWith<S extends z.ZodTypeAny>(schema: S) {
  return (json: unknown): z.infer<S> | null => {
    const parsed = schema.safeParse(json);
    return parsed.success ? parsed.data : null;
  };
}

function updatedSinceQuery(updatedSince: Date | null): Record<string, string> | undefined {
  return updatedSince ? { updatedSince: updatedSince.toISOString() } : undefined;
}

export function subscriptionsRequest(updatedSince: Date | null): RoomSyncRequest<SubscriptionsResponse> {
  return {
    name: 'subscriptions.get',
    method: 'GET',
    path: '/api/v1/subscriptions.get',
    query: updatedSinceQuery(updatedSince),
    requiredVersion: '0.60.0',
    parse: parseWith(DeltaResponseSchema),
  };
}

export function roomsRequest(updatedSince: Date | null): RoomSyncRequest<RoomsResponse> {
  return {
    name: 'rooms.get',
    method: 'GET',
    path: '/api/v1/rooms.get',
    query: updatedSinceQuery(updatedSince),
    requiredVersion: '0.62.0',
    parse: parseWith(DeltaResponseSchema),
  };
}

export function subscriptionReadRequest(rid: DRoomId): RoomSyncRequest<SuccessResponse> {
  return {
    name: 'subscriptions.read',
    method: 'POST',
    path: '/api/v1/subscriptions.read',
    body: { rid },
    requiredVersion: '0.61.0',
    parse: parseWith(SuccessResponseSchema),
  };
}

export const ServerInfoSchema = z.object({
  version: z.string().min(1),
});
