/**
 * Supabase identity
 *
 * IdentityProvider backed by the Supabase auth session. Sessions created
 * with signInAnonymously() report isAnonymous and are never synced.
 */

import type { Session, SupabaseClient } from "@supabase/supabase-js";
import {
  createSnapshotChannel,
  type SnapshotStream,
  type Unsubscribe,
} from "../sync/snapshot-stream.js";
import type { AuthSnapshot, IdentityProvider } from "../sync/types.js";

export interface SupabaseIdentity extends IdentityProvider {
  /** Resolves once the stored session (if any) has been read */
  ready: () => Promise<void>;
  /** Exchange a refresh token for a session */
  signInWithRefreshToken: (refreshToken: string) => Promise<Session>;
  /**
   * Called with every new refresh token. Tokens are single use, so a
   * headless client must store each one to sign in again later.
   */
  onRefreshToken: (listener: (refreshToken: string) => void) => Unsubscribe;
  dispose: () => void;
}

export function snapshotFromSession(session: Session | null): AuthSnapshot {
  const user = session?.user;
  return {
    principalId: user?.id ?? null,
    isAnonymous: user?.is_anonymous ?? false,
  };
}

export function createSupabaseIdentity(client: SupabaseClient): SupabaseIdentity {
  let current: AuthSnapshot = { principalId: null, isAnonymous: false };
  const channel = createSnapshotChannel<AuthSnapshot>();
  channel.publish(current);

  function update(next: AuthSnapshot): void {
    if (
      next.principalId === current.principalId &&
      next.isAnonymous === current.isAnonymous
    ) {
      return;
    }
    current = next;
    channel.publish(next);
  }

  const tokenListeners = new Set<(refreshToken: string) => void>();
  let lastRefreshToken: string | null = null;

  function rotate(session: Session): void {
    const token = session.refresh_token;
    if (!token || token === lastRefreshToken) return;
    lastRefreshToken = token;
    for (const listener of Array.from(tokenListeners)) {
      try {
        listener(token);
      } catch (err) {
        console.error("[SupabaseIdentity] Refresh token listener failed:", err);
      }
    }
  }

  const { data } = client.auth.onAuthStateChange((event, session) => {
    update(snapshotFromSession(session));
    if (session && (event === "TOKEN_REFRESHED" || event === "SIGNED_IN")) {
      rotate(session);
    }
  });

  const initialized = client.auth
    .getSession()
    .then(({ data: sessionData, error }) => {
      if (error) {
        console.error("[SupabaseIdentity] Could not read session:", error.message);
        return;
      }
      update(snapshotFromSession(sessionData.session));
    })
    .catch((err: unknown) => {
      console.error("[SupabaseIdentity] Could not read session:", err);
    });

  async function signInWithRefreshToken(refreshToken: string): Promise<Session> {
    const { data: refreshed, error } = await client.auth.refreshSession({
      refresh_token: refreshToken,
    });
    if (error || !refreshed.session) {
      throw new Error(error?.message ?? "No session returned for refresh token");
    }
    update(snapshotFromSession(refreshed.session));
    rotate(refreshed.session);
    return refreshed.session;
  }

  return {
    currentPrincipalId: () => current.principalId,
    isAnonymous: () => current.isAnonymous,
    authStateChanges: (): SnapshotStream<AuthSnapshot> => channel,
    ready: () => initialized,
    signInWithRefreshToken,
    onRefreshToken: (listener) => {
      tokenListeners.add(listener);
      return () => {
        tokenListeners.delete(listener);
      };
    },
    dispose: () => {
      data.subscription.unsubscribe();
      tokenListeners.clear();
      channel.close();
    },
  };
}
