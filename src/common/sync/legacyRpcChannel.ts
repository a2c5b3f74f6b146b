// src/common/sync/legacyRpcChannel.ts

import WebSocket from 'ws';
import { z } from 'zod';

import { roomSyncConfig } from '~/common/config/roomSyncConfig';
import type { RoomSyncFailure, RoomSyncResult } from '~/common/sync/roomSyncTransport';

/**
 * Method-call channel over a persistent socket, used for servers that predate the REST endpoints.
 *
 * Wire:
 *   -> { msg: 'connect', version: '1', support: [...] }    <- { msg: 'connected', session }
 *   -> { msg: 'method', id, method, params }                <- { msg: 'result', id, result } | { msg: 'result', id, error }
 *   <- { msg: 'ping', id? }                                 -> { msg: 'pong', id? }
 *
 * The socket is opened lazily on the first call and reused. When a resume token is available,
 * the channel logs in right after the handshake, before any queued call is sent.
 * The token is read again before every call: when it changed (another session became current),
 * the socket is replaced, so a call never runs as the previous user.
 * No retry: a failed call is reported and the caller decides.
 */
export interface LegacyRpcChannel {
  call(method: string, params: readonly unknown[]): Promise<RoomSyncResult<unknown>>;
  close(): Promise<void>;
}

export interface LegacyRpcChannelOptions {
  url?: string;

  /** Read before every call; a different value than the one logged in with reconnects. */
  resumeToken?: () => string | null;

  /** Per call, and for the connect handshake. */
  callTimeoutMs?: number;

  debug?: boolean;
}

export const LEGACY_PROTOCOL_VERSION = '1';
const LEGACY_SUPPORTED_VERSIONS = ['1', 'pre2', 'pre1'];

const LegacyMessageSchema = z.object({
  msg: z.string(),
  id: z.string().optional(),
  result: z.unknown().optional(),
  error: z.unknown().optional(),
}).passthrough();

type LegacyMessage = z.infer<typeof LegacyMessageSchema>;

const LegacyErrorSchema = z.object({
  error: z.union([z.string(), z.number()]).optional(),
  reason: z.string().optional(),
  message: z.string().optional(),
});

interface PendingCall {
  method: string;
  resolve: (result: RoomSyncResult<unknown>) => void;
  timer: ReturnType<typeof setTimeout>;
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export function describeLegacyError(error: unknown): string {
  const parsed = LegacyErrorSchema.safeParse(error);
  if (!parsed.success) return 'method error';
  const { error: code, reason, message } = parsed.data;
  return message ?? reason ?? (code !== undefined ? String(code) : 'method error');
}

export function createLegacyRpcChannel(options: LegacyRpcChannelOptions = {}): LegacyRpcChannel {
  const url = options.url ?? roomSyncConfig.socketUrl;
  const callTimeoutMs = options.callTimeoutMs ?? roomSyncConfig.rpc.callTimeoutMs;
  const debug = options.debug ?? roomSyncConfig.debug;
  const resumeToken = options.resumeToken ?? (() => null);

  let socket: WebSocket | null = null;
  let ready: Promise<RoomSyncResult<void>> | null = null;
  let readyToken: string | null = null;
  let nextCallId = 0;

  const pending = new Map<string, PendingCall>();

  function log(...args: unknown[]) {
    if (debug) console.log(...args);
  }

  function failPending(failure: RoomSyncFailure) {
    for (const [, call] of pending) {
      clearTimeout(call.timer);
      call.resolve(failure);
    }
    pending.clear();
  }

  function send(ws: WebSocket, message: Record<string, unknown>) {
    ws.send(JSON.stringify(message));
  }

  function sendMethod(ws: WebSocket, method: string, params: readonly unknown[]): Promise<RoomSyncResult<unknown>> {
    const id = String(++nextCallId);

    return new Promise(resolve => {
      const timer = setTimeout(() => {
        pending.delete(id);
        resolve({ ok: false, kind: 'timeout', error: `${method} timed out after ${callTimeoutMs}ms`, retryable: true });
      }, callTimeoutMs);

      pending.set(id, { method, resolve, timer });
      send(ws, { msg: 'method', id, method, params });
      log(`[sync] rpc: -> ${method} id=${id}`);
    });
  }

  function handleResult(message: LegacyMessage) {
    if (!message.id) return;
    const call = pending.get(message.id);
    if (!call) return;

    clearTimeout(call.timer);
    pending.delete(message.id);

    if (message.error !== undefined) {
      call.resolve({ ok: false, kind: 'rpc', error: `${call.method}: ${describeLegacyError(message.error)}`, retryable: false, body: message.error });
      return;
    }

    call.resolve({ ok: true, value: message.result ?? null });
  }

  function dropSocket(reason: string) {
    const ws = socket;
    socket = null;
    ready = null;
    failPending({ ok: false, kind: 'network', error: reason, retryable: true });
    ws?.close();
  }

  function connect(): Promise<RoomSyncResult<void>> {
    const token = resumeToken();
    if (ready && readyToken === token) return ready;

    if (ready) {
      log('[sync] rpc: session changed; reconnecting');
      dropSocket('session changed');
    }
    readyToken = token;

    const connecting = new Promise<RoomSyncResult<void>>(resolve => {
      const ws = new WebSocket(url);
      socket = ws;

      let settled = false;
      const settle = (result: RoomSyncResult<void>) => {
        if (settled) return;
        settled = true;
        clearTimeout(handshakeTimer);
        if (!result.ok && ready === connecting) ready = null;
        resolve(result);
      };

      const handshakeTimer = setTimeout(() => {
        settle({ ok: false, kind: 'timeout', error: `connect timed out after ${callTimeoutMs}ms`, retryable: true });
        ws.terminate();
      }, callTimeoutMs);

      ws.on('open', () => {
        send(ws, { msg: 'connect', version: LEGACY_PROTOCOL_VERSION, support: LEGACY_SUPPORTED_VERSIONS });
      });

      ws.on('message', (data) => {
        let message: LegacyMessage;
        try {
          const parsed = LegacyMessageSchema.safeParse(JSON.parse(rawDataToString(data)));
          if (!parsed.success) return;
          message = parsed.data;
        } catch {
          log('[sync] rpc: ignored non-JSON frame');
          return;
        }

        switch (message.msg) {
          case 'connected': {
            if (!token) {
              settle({ ok: true, value: undefined });
              return;
            }
            void sendMethod(ws, 'login', [{ resume: token }]).then(login => {
              if (login.ok) {
                settle({ ok: true, value: undefined });
                return;
              }
              settle({ ...login, error: `login failed: ${login.error}` });
              ws.close();
            });
            return;
          }

          case 'failed':
            settle({ ok: false, kind: 'version', error: 'server refused the socket protocol version', retryable: false, body: message });
            ws.close();
            return;

          case 'ping':
            send(ws, message.id ? { msg: 'pong', id: message.id } : { msg: 'pong' });
            return;

          case 'result':
            handleResult(message);
            return;

          default:
            // subscriptions / collection updates are not consumed by this channel
            return;
        }
      });

      ws.on('error', (err) => {
        log(`[sync] rpc: socket error: ${err.message}`);
        settle({ ok: false, kind: 'network', error: err.message || 'socket error', retryable: true });
      });

      ws.on('close', () => {
        if (socket === ws) {
          socket = null;
          ready = null;
          failPending({ ok: false, kind: 'network', error: 'socket closed', retryable: true });
        }
        settle({ ok: false, kind: 'network', error: 'socket closed during handshake', retryable: true });
      });
    });

    ready = connecting;
    return connecting;
  }

  return {
    call: async (method, params) => {
      const connection = await connect();
      if (!connection.ok) return connection;

      const ws = socket;
      if (!ws || ws.readyState !== WebSocket.OPEN)
        return { ok: false, kind: 'network', error: 'socket not open', retryable: true };

      return sendMethod(ws, method, params);
    },

    close: async () => {
      const ws = socket;
      socket = null;
      ready = null;
      failPending({ ok: false, kind: 'network', error: 'channel closed', retryable: false });

      if (!ws || ws.readyState === WebSocket.CLOSED) return;

      await new Promise<void>(resolve => {
        ws.once('close', () => resolve());
        ws.close();
      });
    },
  };
}
