/**
 * Sync lifecycle
 *
 * Starts and stops the sync service in response to auth changes and to the
 * host app moving between foreground and background. Hosts call onResume()
 * and onBackground() themselves; nothing here knows about a UI framework.
 */

import type { SyncService } from "./sync-service.js";
import { consumeSerially, type SerialConsumer } from "./snapshot-stream.js";
import type { AuthSnapshot, IdentityProvider } from "./types.js";

export interface SyncLifecycleOptions {
  service: SyncService;
  identity: IdentityProvider;
  /** Stop syncing while in the background (default: true) */
  pauseInBackground?: boolean;
}

export interface SyncLifecycle {
  /** Follow identity.authStateChanges() */
  attach: () => void;
  /** Stop following auth changes and stop sync */
  detach: () => void;
  onAuthChanged: (snapshot: AuthSnapshot) => void;
  onResume: () => void;
  onBackground: () => void;
}

/**
 * Anonymous users keep their lists on this device only.
 */
function canSync(snapshot: AuthSnapshot): snapshot is AuthSnapshot & { principalId: string } {
  return snapshot.principalId !== null && !snapshot.isAnonymous;
}

export function createSyncLifecycle(options: SyncLifecycleOptions): SyncLifecycle {
  const { service, identity, pauseInBackground = true } = options;

  let authConsumer: SerialConsumer | null = null;
  let syncingFor: string | null = null;

  function onAuthChanged(snapshot: AuthSnapshot): void {
    if (!canSync(snapshot)) {
      if (syncingFor !== null || service.isRunning()) {
        console.log("[Lifecycle] Signed out or anonymous, stopping sync");
        service.stopSync();
      }
      syncingFor = null;
      return;
    }

    // Token refreshes re-emit the same principal
    if (snapshot.principalId === syncingFor && service.isRunning()) {
      return;
    }

    syncingFor = snapshot.principalId;
    service.startSync("auth");
  }

  function onResume(): void {
    const snapshot: AuthSnapshot = {
      principalId: identity.currentPrincipalId(),
      isAnonymous: identity.isAnonymous(),
    };
    if (!canSync(snapshot)) return;
    if (service.getStatus() === "syncing" || service.isRunning()) return;

    syncingFor = snapshot.principalId;
    service.startSync("resume");
  }

  function onBackground(): void {
    if (!pauseInBackground) return;
    service.stopSync();
  }

  function attach(): void {
    if (authConsumer) return;
    authConsumer = consumeSerially(identity.authStateChanges(), {
      onSnapshot: async (snapshot) => onAuthChanged(snapshot),
      onStreamError: (err) => console.error("[Lifecycle] Auth stream failed:", err),
      onHandlerError: (err) => console.error("[Lifecycle] Auth change handling failed:", err),
    });
  }

  function detach(): void {
    authConsumer?.cancel();
    authConsumer = null;
    syncingFor = null;
    service.stopSync();
  }

  return { attach, detach, onAuthChanged, onResume, onBackground };
}
