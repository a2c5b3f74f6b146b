// src/common/stores/rooms/store-rooms.ts

import { createStore } from 'zustand/vanilla';
import { createJSONStorage, persist } from 'zustand/middleware';
import type { StateStorage } from 'zustand/middleware';

import type { DAuthSession } from '~/common/auth/authSession';
import { makeUserScopedKey } from '~/common/auth/userNamespace';
import { subscriptionKey } from '~/common/stores/rooms/rooms.subscription';
import type { DRoomId, DSubscription, DSubscriptionKey } from '~/common/stores/rooms/rooms.subscription';

export interface RoomsState {
  /**
   * Subscriptions by `subscriptionKey(sessionId, rid)`. Rows are never deleted by sync;
   * a removal only clears `authId` (see DSubscription.authId).
   */
  subscriptions: Record<DSubscriptionKey, DSubscription>;

  sessions: Record<string, DAuthSession>;
  currentSessionId: string | null;
}

interface RoomsActions {
  setSession: (session: DAuthSession, makeCurrent?: boolean) => void;
  setCurrentSession: (sessionId: string | null) => void;

  /** Replaces both tables in one state update. Only used by transactions. */
  commitTransaction: (next: Pick<RoomsState, 'subscriptions' | 'sessions'>) => void;

  /**
   * Hard delete of a session and every row synced for it (soft-removed ones included).
   * Sign-out only: sync itself never deletes rows.
   */
  forgetSession: (sessionId: string) => void;
}

export type RoomsStore = RoomsState & RoomsActions;

/**
 * Write scope handed to `execute`.
 * Reads see the writes made earlier in the same transaction.
 * Returned objects are copies: changes only land through addSubscriptions/addSession.
 */
export interface RoomsTransaction {
  findSubscription(sessionId: string, rid: DRoomId): DSubscription | null;

  /** Lookup by the server-side subscription document id, within one session. */
  findSubscriptionByServerId(sessionId: string, id: string): DSubscription | null;

  /** Every session's row for a room. */
  findRoomSubscriptions(rid: DRoomId): DSubscription[];

  /** Add or replace by identity (sessionId, rid). */
  addSubscriptions(subscriptions: readonly DSubscription[]): void;

  getSession(sessionId: string): DAuthSession | null;
  currentSession(): DAuthSession | null;
  addSession(session: DAuthSession): void;
}

export interface RoomsLocalStore {
  /**
   * Run `fn` against a draft and commit everything it wrote as one state update.
   * If `fn` throws, nothing is committed and the promise rejects.
   */
  execute<T>(fn: (tx: RoomsTransaction) => T): Promise<T>;

  getState(): RoomsState;
  getSubscription(sessionId: string, rid: DRoomId): DSubscription | null;
  currentSession(): DAuthSession | null;

  setSession(session: DAuthSession, makeCurrent?: boolean): void;
  setCurrentSession(sessionId: string | null): void;
  forgetSession(sessionId: string): void;

  /** Drops the persisted copy (the in-memory state is left alone). */
  clearPersisted(): Promise<void>;

  subscribe(listener: (state: RoomsState, prev: RoomsState) => void): () => void;
}

export interface RoomsLocalStoreOptions {
  /** Defaults to an in-memory storage (nothing survives the process). */
  storage?: StateStorage;

  /** Persisted key. Defaults to the user-scoped 'app-rooms' key. */
  name?: string;
}

/**
 * Minimal in-memory StateStorage.
 */
export function createMemoryStateStorage(seed?: Record<string, string>): StateStorage {
  const items = new Map<string, string>(Object.entries(seed ?? {}));
  return {
    getItem: (name) => items.get(name) ?? null,
    setItem: (name, value) => {
      items.set(name, value);
    },
    removeItem: (name) => {
      items.delete(name);
    },
  };
}

function cloneSubscription(subscription: DSubscription): DSubscription {
  return structuredClone(subscription);
}

function createRoomsStoreApi(storage: StateStorage, name: string) {
  return createStore<RoomsStore>()(
    persist(
      (set) => ({
        subscriptions: {},
        sessions: {},
        currentSessionId: null,

        setSession: (session, makeCurrent = true) =>
          set(state => ({
            sessions: {
              ...state.sessions,
              [session.id]: { ...session },
            },
            currentSessionId: makeCurrent ? session.id : state.currentSessionId,
          })),

        setCurrentSession: (sessionId) =>
          set({ currentSessionId: sessionId }),

        commitTransaction: (next) =>
          set({
            subscriptions: next.subscriptions,
            sessions: next.sessions,
          }),

        forgetSession: (sessionId) =>
          set(state => {
            const { [sessionId]: _removed, ...sessions } = state.sessions;

            const subscriptions: Record<DSubscriptionKey, DSubscription> = {};
            for (const [key, subscription] of Object.entries(state.subscriptions)) {
              if (subscription.sessionId === sessionId) continue;
              subscriptions[key] = subscription;
            }

            return {
              sessions,
              subscriptions,
              currentSessionId: state.currentSessionId === sessionId ? null : state.currentSessionId,
            };
          }),
      }),
      {
        name,
        version: 1,
        storage: createJSONStorage(() => storage),
        partialize: (state) => ({
          subscriptions: state.subscriptions,
          sessions: state.sessions,
          currentSessionId: state.currentSessionId,
        }),
      },
    ),
  );
}

export function createRoomsLocalStore(options: RoomsLocalStoreOptions = {}): RoomsLocalStore {
  const storage = options.storage ?? createMemoryStateStorage();
  const name = options.name ?? makeUserScopedKey('app-rooms');

  const api = createRoomsStoreApi(storage, name);

  function currentSessionOf(state: RoomsState): DAuthSession | null {
    if (!state.currentSessionId) return null;
    return state.sessions[state.currentSessionId] ?? null;
  }

  async function execute<T>(fn: (tx: RoomsTransaction) => T): Promise<T> {
    // Snapshot, mutate drafts, commit once. There is no await between snapshot and commit,
    // so concurrent transactions are serialized by the event loop.
    const base = api.getState();
    const subscriptions: Record<DSubscriptionKey, DSubscription> = { ...base.subscriptions };
    const sessions: Record<string, DAuthSession> = { ...base.sessions };

    const tx: RoomsTransaction = {
      findSubscription: (sessionId, rid) => {
        const found = subscriptions[subscriptionKey(sessionId, rid)];
        return found ? cloneSubscription(found) : null;
      },
      findSubscriptionByServerId: (sessionId, id) => {
        const found = Object.values(subscriptions).find(row => row.sessionId === sessionId && row.id === id);
        return found ? cloneSubscription(found) : null;
      },
      findRoomSubscriptions: (rid) =>
        Object.values(subscriptions).filter(row => row.rid === rid).map(cloneSubscription),
      addSubscriptions: (list) => {
        for (const subscription of list)
          subscriptions[subscriptionKey(subscription.sessionId, subscription.rid)] = cloneSubscription(subscription);
      },
      getSession: (sessionId) => {
        const found = sessions[sessionId];
        return found ? { ...found } : null;
      },
      currentSession: () => {
        if (!base.currentSessionId) return null;
        const found = sessions[base.currentSessionId];
        return found ? { ...found } : null;
      },
      addSession: (session) => {
        sessions[session.id] = { ...session };
      },
    };

    const result = fn(tx);
    api.getState().commitTransaction({ subscriptions, sessions });
    return result;
  }

  return {
    execute,
    getState: () => api.getState(),
    getSubscription: (sessionId, rid) => api.getState().subscriptions[subscriptionKey(sessionId, rid)] ?? null,
    currentSession: () => currentSessionOf(api.getState()),
    setSession: (session, makeCurrent) => api.getState().setSession(session, makeCurrent),
    setCurrentSession: (sessionId) => api.getState().setCurrentSession(sessionId),
    forgetSession: (sessionId) => api.getState().forgetSession(sessionId),
    clearPersisted: async () => {
      await api.persist.clearStorage();
    },
    subscribe: (listener) => api.subscribe(listener),
  };
}
