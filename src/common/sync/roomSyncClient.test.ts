import { beforeEach, describe, expect, it, vi } from 'vitest';

import { createAuthSession } from '~/common/auth/authSession';
import { createRoomsLocalStore } from '~/common/stores/rooms/store-rooms';
import type { RoomsLocalStore } from '~/common/stores/rooms/store-rooms';

import type { LegacyRpcChannel } from '~/common/sync/legacyRpcChannel';
import { createRoomSyncClient } from '~/common/sync/roomSyncClient';
import type { RoomSyncClientOptions, RoomSyncOutcome } from '~/common/sync/roomSyncClient';
import type { RoomSyncFailure, RoomSyncFetchOptions, RoomSyncRequest, RoomSyncResult, RoomSyncTransport } from '~/common/sync/roomSyncTransport';

const SESSION_ID = 'session-1';
const NOW = 50_000;

const versionError: RoomSyncFailure = { ok: false, kind: 'version', error: 'server too old', retryable: false };
const networkError: RoomSyncFailure = { ok: false, kind: 'network', error: 'offline', retryable: true };

type ScriptStep = { body: unknown } | RoomSyncFailure;

/**
 * Scripted transport: one step per request name, bodies go through the request's own parser.
 */
function createScriptedTransport() {
  const script = new Map<string, ScriptStep>();
  const calls: { name: string; options?: RoomSyncFetchOptions }[] = [];

  const transport: RoomSyncTransport = {
    fetch: async <T>(request: RoomSyncRequest<T>, options?: RoomSyncFetchOptions): Promise<RoomSyncResult<T>> => {
      calls.push({ name: request.name, options });

      const step = script.get(request.name);
      if (!step) return networkError;
      if ('ok' in step) return step;

      const value = request.parse(step.body);
      return value === null ? { ok: false, kind: 'decode', error: 'unexpected shape' } : { ok: true, value };
    },
  };

  return { transport, script, calls };
}

function createFakeLegacy() {
  const call = vi.fn<(method: string, params: readonly unknown[]) => Promise<RoomSyncResult<unknown>>>();
  const legacy: LegacyRpcChannel = { call, close: async () => undefined };
  return { legacy, call };
}

let store: RoomsLocalStore;
let scripted: ReturnType<typeof createScriptedTransport>;
let fakeLegacy: ReturnType<typeof createFakeLegacy>;

function row(rid: string, sessionId: string = SESSION_ID) {
  return store.getSubscription(sessionId, rid);
}

function createClient(overrides: Partial<RoomSyncClientOptions> = {}) {
  return createRoomSyncClient({
    transport: scripted.transport,
    legacy: fakeLegacy.legacy,
    store,
    retryOnError: 3,
    now: () => NOW,
    ...overrides,
  });
}

beforeEach(() => {
  store = createRoomsLocalStore({ name: 'test-rooms' });
  store.setSession(createAuthSession(SESSION_ID, 'http://chat.test', { userId: 'u1', token: 'test-token' }));
  scripted = createScriptedTransport();
  fakeLegacy = createFakeLegacy();
});

describe('fetchSubscriptions', () => {
  it('runs a full sync into the store, owned by the session', async () => {
    scripted.script.set('subscriptions.get', { body: { success: true, list: [{ rid: 'r1' }, { rid: 'r2' }] } });
    const onComplete = vi.fn<(outcome: RoomSyncOutcome) => void>();

    const outcome = await createClient().fetchSubscriptions(null, { onComplete });

    expect(outcome).toEqual({ status: 'applied', via: 'api', touched: 2, removed: 0, dropped: 0, invalid: 0, watermark: NOW });
    expect(onComplete).toHaveBeenCalledTimes(1);
    expect(onComplete).toHaveBeenCalledWith(outcome);

    expect(Object.keys(store.getState().subscriptions)).toEqual([`${SESSION_ID}/r1`, `${SESSION_ID}/r2`]);
    expect(row('r1')?.authId).toBe(SESSION_ID);
    expect(row('r2')?.authId).toBe(SESSION_ID);
    expect(store.currentSession()?.lastSubscriptionFetch).toBe(NOW);
  });

  it('asks the transport for bounded retry', async () => {
    scripted.script.set('subscriptions.get', { body: { success: true } });

    await createClient().fetchSubscriptions(null);

    expect(scripted.calls).toEqual([{ name: 'subscriptions.get', options: { retryOnError: 3 } }]);
  });

  it('soft-removes on a later sync and leaves other rooms alone', async () => {
    const client = createClient();
    scripted.script.set('subscriptions.get', { body: { success: true, list: [{ rid: 'r1', name: 'general' }, { rid: 'r2', name: 'random' }] } });
    await client.fetchSubscriptions(null);

    scripted.script.set('subscriptions.get', { body: { success: true, remove: [{ rid: 'r1' }] } });
    const outcome = await client.fetchSubscriptions(new Date(NOW));

    expect(outcome).toMatchObject({ status: 'applied', touched: 1, removed: 1 });
    expect(row('r1')?.authId).toBeNull();
    expect(row('r1')?.name).toBe('general');
    expect(row('r2')?.authId).toBe(SESSION_ID);
  });

  it('skips when the server reports success=false or omits it', async () => {
    const client = createClient();

    scripted.script.set('subscriptions.get', { body: { success: false, list: [{ rid: 'r1' }] } });
    const onComplete = vi.fn();
    expect(await client.fetchSubscriptions(null, { onComplete })).toEqual({ status: 'skipped', via: 'api', reason: 'unsuccessful' });
    expect(onComplete).toHaveBeenCalledTimes(1);

    scripted.script.set('subscriptions.get', { body: { list: [{ rid: 'r1' }] } });
    expect(await client.fetchSubscriptions(null)).toEqual({ status: 'skipped', via: 'api', reason: 'unsuccessful' });

    expect(store.getState().subscriptions).toEqual({});
    expect(store.currentSession()?.lastSubscriptionFetch).toBeNull();
  });

  it('reports other transport errors as skipped, without fallback or mutation', async () => {
    scripted.script.set('subscriptions.get', networkError);
    const onComplete = vi.fn();

    const outcome = await createClient().fetchSubscriptions(null, { onComplete });

    expect(outcome).toEqual({ status: 'skipped', via: 'api', reason: 'transport-error', error: 'offline' });
    expect(onComplete).toHaveBeenCalledWith(outcome);
    expect(fakeLegacy.call).not.toHaveBeenCalled();
    expect(store.getState().subscriptions).toEqual({});
  });

  it('skips without a network call when there is no session', async () => {
    store.forgetSession(SESSION_ID);

    const outcome = await createClient().fetchSubscriptions(null);

    expect(outcome).toEqual({ status: 'skipped', via: 'api', reason: 'no-session' });
    expect(scripted.calls).toEqual([]);
  });

  it('uses an explicit session over the current one', async () => {
    store.setSession(createAuthSession('session-2', 'http://chat.test', { userId: 'u2', token: 'test-token-2' }), false);
    scripted.script.set('subscriptions.get', { body: { success: true, update: [{ rid: 'r1' }] } });

    await createClient().fetchSubscriptions(null, { sessionId: 'session-2' });

    expect(row('r1', 'session-2')?.authId).toBe('session-2');
    expect(row('r1')).toBeNull();
    expect(store.getState().sessions['session-2'].lastSubscriptionFetch).toBe(NOW);
    expect(store.currentSession()?.lastSubscriptionFetch).toBeNull();
  });

  it('falls back to the legacy protocol exactly once on a version mismatch', async () => {
    scripted.script.set('subscriptions.get', versionError);
    fakeLegacy.call.mockResolvedValue({ ok: true, value: { update: [{ rid: 'r1' }], remove: [{ rid: 'r2' }] } });
    const onComplete = vi.fn();

    const outcome = await createClient().fetchSubscriptions(new Date(1000), { onComplete });

    expect(fakeLegacy.call).toHaveBeenCalledTimes(1);
    expect(fakeLegacy.call).toHaveBeenCalledWith('subscriptions/get', [{ $date: 1000 }]);
    expect(scripted.calls).toHaveLength(1);
    expect(outcome).toEqual({ status: 'applied', via: 'legacy', touched: 2, removed: 1, dropped: 0, invalid: 0, watermark: NOW });
    expect(onComplete).toHaveBeenCalledTimes(1);

    expect(row('r1')?.authId).toBe(SESSION_ID);
    expect(row('r2')?.authId).toBeNull();
  });

  it('reports a failed legacy fallback without touching the store', async () => {
    scripted.script.set('subscriptions.get', versionError);
    fakeLegacy.call.mockResolvedValue({ ok: false, kind: 'rpc', error: 'subscriptions/get: not allowed', retryable: false });

    const outcome = await createClient().fetchSubscriptions(null);

    expect(outcome).toEqual({ status: 'failed', via: 'legacy', kind: 'rpc', error: 'subscriptions/get: not allowed' });
    expect(fakeLegacy.call).toHaveBeenCalledTimes(1);
    expect(store.getState().subscriptions).toEqual({});
    expect(store.currentSession()?.lastSubscriptionFetch).toBeNull();
  });

  it('reports a store failure as failed', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    scripted.script.set('subscriptions.get', { body: { success: true, list: [{ rid: 'r1' }] } });
    const brokenStore: RoomsLocalStore = {
      ...store,
      execute: async () => {
        throw new Error('disk full');
      },
    };

    const outcome = await createClient({ store: brokenStore }).fetchSubscriptions(null);

    expect(outcome).toEqual({ status: 'failed', via: 'api', kind: 'store', error: 'disk full' });
    warn.mockRestore();
  });
});

describe('fetchSubscriptionsFallback', () => {
  it('reads a full list from a top-level array and sends no date param', async () => {
    fakeLegacy.call.mockResolvedValue({ ok: true, value: [{ rid: 'r1', name: 'general' }, { rid: 'r2' }] });

    const outcome = await createClient().fetchSubscriptionsFallback(null);

    expect(fakeLegacy.call).toHaveBeenCalledWith('subscriptions/get', []);
    expect(outcome).toMatchObject({ status: 'applied', via: 'legacy', touched: 2, removed: 0 });
    expect(row('r1')?.name).toBe('general');
    expect(store.currentSession()?.lastSubscriptionFetch).toBe(NOW);
  });

  it('updates existing rows in place (get-or-create)', async () => {
    fakeLegacy.call.mockResolvedValueOnce({ ok: true, value: [{ rid: 'r1', name: 'general', unread: 2 }] });
    fakeLegacy.call.mockResolvedValueOnce({ ok: true, value: { update: [{ rid: 'r1', unread: 0 }] } });
    const client = createClient();

    await client.fetchSubscriptionsFallback(null);
    await client.fetchSubscriptionsFallback(new Date(NOW));

    expect(row('r1')).toMatchObject({ name: 'general', unread: 0 });
    expect(Object.keys(store.getState().subscriptions)).toEqual([`${SESSION_ID}/r1`]);
  });
});

describe('fetchRooms', () => {
  async function seedSubscriptions(client: ReturnType<typeof createClient>) {
    scripted.script.set('subscriptions.get', { body: { success: true, list: [{ rid: 'r1' }] } });
    await client.fetchSubscriptions(null);
  }

  it('enriches existing subscriptions only, and backdates the watermark', async () => {
    const client = createClient();
    await seedSubscriptions(client);

    scripted.script.set('rooms.get', { body: { success: true, list: [{ _id: 'r1', topic: 'planning' }], update: [{ _id: 'stranger', topic: 'x' }] } });
    const onComplete = vi.fn();
    const outcome = await client.fetchRooms(null, { onComplete });

    expect(outcome).toEqual({ status: 'applied', via: 'api', touched: 1, removed: 0, dropped: 1, invalid: 0, watermark: NOW - 1000 });
    expect(onComplete).toHaveBeenCalledTimes(1);
    expect(Object.keys(store.getState().subscriptions)).toEqual([`${SESSION_ID}/r1`]);
    expect(row('r1')?.roomTopic).toBe('planning');
    expect(store.currentSession()?.lastSubscriptionFetch).toBe(NOW - 1000);
  });

  it('falls back to rooms/get with the same updatedSince', async () => {
    const client = createClient();
    await seedSubscriptions(client);

    scripted.script.set('rooms.get', versionError);
    fakeLegacy.call.mockResolvedValue({ ok: true, value: { update: [{ _id: 'r1', ro: true }, { _id: 'r9', ro: true }] } });

    const outcome = await client.fetchRooms(new Date(2000));

    expect(fakeLegacy.call).toHaveBeenCalledTimes(1);
    expect(fakeLegacy.call).toHaveBeenCalledWith('rooms/get', [{ $date: 2000 }]);
    expect(outcome).toEqual({ status: 'applied', via: 'legacy', touched: 1, removed: 0, dropped: 1, invalid: 0, watermark: NOW - 1000 });
    expect(row('r1')?.roomReadOnly).toBe(true);
    expect(row('r9')).toBeNull();
  });

  it('still enriches for an unknown session, leaving the watermark alone', async () => {
    const client = createClient();
    await seedSubscriptions(client);

    scripted.script.set('rooms.get', { body: { success: true, update: [{ _id: 'r1', topic: 'offline edit' }] } });
    const outcome = await client.fetchRooms(null, { sessionId: 'gone' });

    expect(outcome).toMatchObject({ status: 'applied', touched: 1, watermark: null });
    expect(row('r1')?.roomTopic).toBe('offline edit');
    expect(store.currentSession()?.lastSubscriptionFetch).toBe(NOW);
  });

  it('reports a failed legacy rooms fetch without touching the watermark', async () => {
    const client = createClient();
    await seedSubscriptions(client);

    scripted.script.set('rooms.get', versionError);
    fakeLegacy.call.mockResolvedValue({ ok: false, kind: 'network', error: 'socket closed', retryable: true });

    const outcome = await client.fetchRooms(null);

    expect(outcome).toEqual({ status: 'failed', via: 'legacy', kind: 'network', error: 'socket closed' });
    expect(store.currentSession()?.lastSubscriptionFetch).toBe(NOW);
  });

  it('skips on success=false', async () => {
    scripted.script.set('rooms.get', { body: { success: false } });

    expect(await createClient().fetchRooms(null)).toEqual({ status: 'skipped', via: 'api', reason: 'unsuccessful' });
    expect(store.currentSession()?.lastSubscriptionFetch).toBeNull();
  });
});

describe('markAsRead', () => {
  it('acknowledges through the typed API', async () => {
    scripted.script.set('subscriptions.read', { body: { success: true } });
    const fallback = vi.fn(async () => true);

    expect(await createClient({ markAsReadFallback: fallback }).markAsRead('r1')).toBe('acknowledged');
    expect(fallback).not.toHaveBeenCalled();
    expect(scripted.calls).toEqual([{ name: 'subscriptions.read', options: undefined }]);
  });

  it('uses the fallback on a version mismatch', async () => {
    scripted.script.set('subscriptions.read', versionError);
    const fallback = vi.fn(async (_rid: string) => true);

    expect(await createClient({ markAsReadFallback: fallback }).markAsRead('r1')).toBe('fallback');
    expect(fallback).toHaveBeenCalledWith('r1');
  });

  it('drops other errors silently', async () => {
    scripted.script.set('subscriptions.read', networkError);
    const fallback = vi.fn(async () => true);

    expect(await createClient({ markAsReadFallback: fallback }).markAsRead('r1')).toBe('dropped');
    expect(fallback).not.toHaveBeenCalled();
  });

  it('drops when the fallback fails or throws', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    scripted.script.set('subscriptions.read', versionError);

    expect(await createClient({ markAsReadFallback: async () => false }).markAsRead('r1')).toBe('dropped');
    expect(await createClient({
      markAsReadFallback: async () => {
        throw new Error('socket gone');
      },
    }).markAsRead('r1')).toBe('dropped');

    warn.mockRestore();
  });

  it('defaults to the legacy readMessages call', async () => {
    scripted.script.set('subscriptions.read', versionError);
    fakeLegacy.call.mockResolvedValue({ ok: true, value: null });

    expect(await createClient().markAsRead('r1')).toBe('fallback');
    expect(fakeLegacy.call).toHaveBeenCalledWith('readMessages', ['r1']);
  });
});

describe('removals keyed by document id', () => {
  it('clears ownership on the typed path', async () => {
    const client = createClient();
    scripted.script.set('subscriptions.get', { body: { success: true, list: [{ _id: 's1', rid: 'r1', name: 'general' }] } });
    await client.fetchSubscriptions(null);

    scripted.script.set('subscriptions.get', { body: { success: true, remove: [{ _id: 's1', _deletedAt: '1970-01-01T00:00:49.000Z' }] } });
    const outcome = await client.fetchSubscriptions(new Date(NOW));

    expect(outcome).toEqual({ status: 'applied', via: 'api', touched: 1, removed: 1, dropped: 0, invalid: 0, watermark: NOW });
    expect(row('r1')).toMatchObject({ authId: null, name: 'general' });
  });

  it('clears ownership on the legacy path', async () => {
    fakeLegacy.call.mockResolvedValueOnce({ ok: true, value: [{ _id: 's1', rid: 'r1' }] });
    fakeLegacy.call.mockResolvedValueOnce({ ok: true, value: { update: [], remove: [{ _id: 's1', _deletedAt: { $date: 49_000 } }] } });
    const client = createClient();

    await client.fetchSubscriptionsFallback(null);
    const outcome = await client.fetchSubscriptionsFallback(new Date(NOW));

    expect(outcome).toEqual({ status: 'applied', via: 'legacy', touched: 1, removed: 1, dropped: 0, invalid: 0, watermark: NOW });
    expect(row('r1')?.authId).toBeNull();
  });

  it('reports a document id matching no row as dropped', async () => {
    scripted.script.set('subscriptions.get', { body: { success: true, remove: [{ _id: 'unknown' }] } });

    const outcome = await createClient().fetchSubscriptions(null);

    expect(outcome).toEqual({ status: 'applied', via: 'api', touched: 0, removed: 0, dropped: 1, invalid: 0, watermark: NOW });
    expect(store.getState().subscriptions).toEqual({});
  });
});

describe('several sessions', () => {
  it('keeps rows of a shared room id apart', async () => {
    store.setSession(createAuthSession('session-2', 'http://chat.test', { userId: 'u2', token: 'test-token-2' }), false);
    const client = createClient();

    scripted.script.set('subscriptions.get', { body: { success: true, list: [{ rid: 'GENERAL', name: 'first-general' }] } });
    await client.fetchSubscriptions(null);
    scripted.script.set('subscriptions.get', { body: { success: true, list: [{ rid: 'GENERAL', name: 'second-general' }] } });
    await client.fetchSubscriptions(null, { sessionId: 'session-2' });
    scripted.script.set('subscriptions.get', { body: { success: true, remove: [{ rid: 'GENERAL' }] } });
    await client.fetchSubscriptions(new Date(NOW), { sessionId: 'session-2' });

    expect(row('GENERAL')).toMatchObject({ authId: SESSION_ID, name: 'first-general' });
    expect(row('GENERAL', 'session-2')).toMatchObject({ authId: null, name: 'second-general' });
  });
});

describe('onComplete', () => {
  it('a throwing callback does not change the outcome', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    scripted.script.set('subscriptions.get', { body: { success: true, list: [{ rid: 'r1' }] } });

    const outcome = await createClient().fetchSubscriptions(null, {
      onComplete: () => {
        throw new Error('listener bug');
      },
    });

    expect(outcome).toMatchObject({ status: 'applied', touched: 1 });
    expect(row('r1')?.authId).toBe(SESSION_ID);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });
});

describe('fetchRoomsFallback', () => {
  it('enriches without a session and leaves every watermark alone', async () => {
    const client = createClient();
    scripted.script.set('subscriptions.get', { body: { success: true, list: [{ rid: 'r1' }] } });
    await client.fetchSubscriptions(null);
    store.setCurrentSession(null);

    fakeLegacy.call.mockResolvedValue({ ok: true, value: { update: [{ _id: 'r1', topic: 'no session' }] } });
    const onComplete = vi.fn();
    const outcome = await client.fetchRoomsFallback(null, { onComplete });

    expect(fakeLegacy.call).toHaveBeenCalledWith('rooms/get', []);
    expect(outcome).toEqual({ status: 'applied', via: 'legacy', touched: 1, removed: 0, dropped: 0, invalid: 0, watermark: null });
    expect(onComplete).toHaveBeenCalledTimes(1);
    expect(row('r1')?.roomTopic).toBe('no session');
    expect(store.getState().sessions[SESSION_ID].lastSubscriptionFetch).toBe(NOW);
  });
});
