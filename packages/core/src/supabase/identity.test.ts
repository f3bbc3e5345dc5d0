/**
 * Supabase identity tests
 */

import { describe, it, expect, vi } from "vitest";
import type { Session, SupabaseClient } from "@supabase/supabase-js";
import { createSupabaseIdentity, snapshotFromSession } from "./identity.js";
import type { AuthSnapshot } from "../sync/types.js";

function createSession(
  userId: string,
  isAnonymous = false,
  refreshToken = "test-refresh-token"
): Session {
  return {
    access_token: "test-access-token",
    refresh_token: refreshToken,
    expires_in: 3600,
    token_type: "bearer",
    user: {
      id: userId,
      app_metadata: {},
      user_metadata: {},
      aud: "authenticated",
      created_at: "2024-01-01T00:00:00.000Z",
      is_anonymous: isAnonymous,
    },
  };
}

type AuthCallback = (event: string, session: Session | null) => void;

function createMockSupabase(initialSession: Session | null = null) {
  let callback: AuthCallback = () => {};
  const unsubscribe = vi.fn();
  const auth = {
    onAuthStateChange: vi.fn((cb: AuthCallback) => {
      callback = cb;
      return { data: { subscription: { unsubscribe } } };
    }),
    getSession: vi.fn().mockResolvedValue({ data: { session: initialSession }, error: null }),
    refreshSession: vi.fn(),
  };
  return {
    client: { auth } as unknown as SupabaseClient,
    auth,
    unsubscribe,
    emit: (session: Session | null, event = "SIGNED_IN") => callback(event, session),
  };
}

describe("snapshotFromSession", () => {
  it("maps a missing session to signed out", () => {
    expect(snapshotFromSession(null)).toEqual({ principalId: null, isAnonymous: false });
  });

  it("reads the anonymous flag", () => {
    expect(snapshotFromSession(createSession("anon-1", true))).toEqual({
      principalId: "anon-1",
      isAnonymous: true,
    });
  });
});

describe("createSupabaseIdentity", () => {
  it("loads the stored session", async () => {
    const { client } = createMockSupabase(createSession("user-1"));
    const identity = createSupabaseIdentity(client);

    expect(identity.currentPrincipalId()).toBeNull();
    await identity.ready();

    expect(identity.currentPrincipalId()).toBe("user-1");
    expect(identity.isAnonymous()).toBe(false);
  });

  it("publishes auth changes, skipping repeats", async () => {
    const mock = createMockSupabase();
    const identity = createSupabaseIdentity(mock.client);
    await identity.ready();
    const seen: AuthSnapshot[] = [];
    identity.authStateChanges().subscribe({ next: (snapshot) => seen.push(snapshot) });

    mock.emit(createSession("user-1"));
    mock.emit(createSession("user-1")); // token refresh
    mock.emit(null);

    expect(seen).toEqual([
      { principalId: null, isAnonymous: false },
      { principalId: "user-1", isAnonymous: false },
      { principalId: null, isAnonymous: false },
    ]);
  });

  it("signs in with a refresh token", async () => {
    const mock = createMockSupabase();
    const session = createSession("user-1");
    mock.auth.refreshSession.mockResolvedValue({ data: { session, user: session.user }, error: null });
    const identity = createSupabaseIdentity(mock.client);

    const result = await identity.signInWithRefreshToken("test-refresh-token");

    expect(mock.auth.refreshSession).toHaveBeenCalledWith({ refresh_token: "test-refresh-token" });
    expect(result).toBe(session);
    expect(identity.currentPrincipalId()).toBe("user-1");
  });

  it("throws when the refresh token is rejected", async () => {
    const mock = createMockSupabase();
    mock.auth.refreshSession.mockResolvedValue({
      data: { session: null, user: null },
      error: { message: "Invalid Refresh Token" },
    });
    const identity = createSupabaseIdentity(mock.client);

    await expect(identity.signInWithRefreshToken("expired")).rejects.toThrow("Invalid Refresh Token");
  });

  it("reports each rotated refresh token once", async () => {
    const mock = createMockSupabase();
    const session = createSession("user-1", false, "token-2");
    mock.auth.refreshSession.mockResolvedValue({ data: { session, user: session.user }, error: null });
    const identity = createSupabaseIdentity(mock.client);
    const tokens: string[] = [];
    identity.onRefreshToken((token) => tokens.push(token));

    await identity.signInWithRefreshToken("token-1");
    mock.emit(session, "TOKEN_REFRESHED");
    mock.emit(createSession("user-1", false, "token-3"), "TOKEN_REFRESHED");
    mock.emit(createSession("user-1", false, "token-4"), "USER_UPDATED");

    expect(tokens).toEqual(["token-2", "token-3"]);
  });

  it("stops reporting tokens after unsubscribe", () => {
    const mock = createMockSupabase();
    const identity = createSupabaseIdentity(mock.client);
    const tokens: string[] = [];
    const unsubscribe = identity.onRefreshToken((token) => tokens.push(token));

    unsubscribe();
    mock.emit(createSession("user-1", false, "token-2"), "TOKEN_REFRESHED");

    expect(tokens).toEqual([]);
  });

  it("unsubscribes from auth events on dispose", () => {
    const mock = createMockSupabase();
    const identity = createSupabaseIdentity(mock.client);

    identity.dispose();

    expect(mock.unsubscribe).toHaveBeenCalled();
  });
});
