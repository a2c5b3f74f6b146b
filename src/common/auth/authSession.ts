// src/common/auth/authSession.ts

/**
 * An authenticated session against one server.
 *
 * Credentials are used by both the REST transport (headers) and the legacy socket (resume login).
 * `lastSubscriptionFetch` is the sync watermark: deltas up to this point have been merged.
 */
export interface DAuthSession {
  id: string;
  serverUrl: string;
  userId: string;
  token: string;

  lastSubscriptionFetch: number | null; // epoch ms
}

export interface AuthCredentials {
  userId: string;
  token: string;
}

export function createAuthSession(id: string, serverUrl: string, credentials: AuthCredentials): DAuthSession {
  return {
    id,
    serverUrl,
    userId: credentials.userId,
    token: credentials.token,
    lastSubscriptionFetch: null,
  };
}
