/**
 * Sync Module
 *
 * Local-first sync between an on-device store and a shared remote store.
 */

export {
  type SyncAction,
  type SyncTimestamps,
  SYNC_TIMESTAMP_TOLERANCE_MS,
  determineSyncAction,
  mergeLists,
  mergeItems,
  retainPendingTombstones,
  unionMembers,
} from "./conflict-resolver.js";

export {
  shouldUpdateLocal,
  itemSetsEqual,
  itemsEqual,
  sameInstant,
} from "./change-detector.js";

export {
  type StoreResult,
  ok,
  fail,
  attempt,
  errorMessage,
} from "./result.js";

export {
  type Unsubscribe,
  type SnapshotObserver,
  type SnapshotStream,
  type SnapshotChannel,
  type SerialConsumer,
  type SerialConsumerHandlers,
  type ValueStore,
  createSnapshotChannel,
  consumeSerially,
  createValueStore,
} from "./snapshot-stream.js";

export {
  type SyncState,
  type SyncStateStore,
  SyncStateSchema,
  SYNC_STATE_FILE,
  createEmptySyncState,
  createFileSyncStateStore,
  createMemorySyncStateStore,
  markPushComplete,
  markPullComplete,
  markSyncError,
} from "./sync-state.js";

export {
  type SyncStatus,
  type SyncService,
  type SyncServiceOptions,
  createSyncService,
} from "./sync-service.js";

export {
  type SyncLifecycle,
  type SyncLifecycleOptions,
  createSyncLifecycle,
} from "./lifecycle.js";

export type {
  LocalListStore,
  RemoteListStore,
  AuthSnapshot,
  IdentityProvider,
} from "./types.js";
