/**
 * @listsync/core
 *
 * Shared list model, local store and the sync engine that keeps it
 * converged with Supabase.
 */

// Schema
export * from "./schema/index.js";

// Local storage
export * from "./store/index.js";

// Sync engine
export * from "./sync/index.js";

// Supabase adapters
export * from "./supabase/index.js";
