/**
 * listsync configuration
 *
 * Reads/writes ~/.listsync/config.json. Environment variables win over the
 * file for the connection settings. Unknown keys (the telemetry section)
 * are preserved on save.
 */

import { existsSync, readFileSync, writeFileSync, mkdirSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { z } from "zod";

export const ConfigSchema = z
  .object({
    supabaseUrl: z.string().url().optional(),
    supabaseAnonKey: z.string().min(1).optional(),
    refreshToken: z.string().min(1).optional(),
    pauseInBackground: z.boolean().optional(),
  })
  .passthrough();

export type ListSyncConfig = z.infer<typeof ConfigSchema>;

let configDir = join(homedir(), ".listsync");

/**
 * Override config directory (for testing)
 */
export function setConfigDir(dir: string): void {
  configDir = dir;
}

export function getConfigDir(): string {
  return configDir;
}

export function getConfigFile(): string {
  return join(configDir, "config.json");
}

/**
 * Where the CLI keeps its local lists
 */
export function getListsFile(): string {
  return join(configDir, "lists.json");
}

/**
 * Load configuration. A missing or invalid file loads as empty.
 */
export function loadConfig(): ListSyncConfig {
  const configFile = getConfigFile();
  if (!existsSync(configFile)) {
    return {};
  }

  try {
    const parsed = ConfigSchema.safeParse(JSON.parse(readFileSync(configFile, "utf-8")));
    if (parsed.success) {
      return parsed.data;
    }
    console.error(`[Config] Ignoring invalid ${configFile}: ${parsed.error.issues[0]?.message}`);
    return {};
  } catch {
    return {};
  }
}

export function saveConfig(config: ListSyncConfig): void {
  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true, mode: 0o700 });
  }
  writeFileSync(getConfigFile(), JSON.stringify(config, null, 2), { mode: 0o600 });
}

/**
 * Merge fields into the stored config
 */
export function updateConfig(patch: Partial<ListSyncConfig>): ListSyncConfig {
  const next = { ...loadConfig(), ...patch };
  saveConfig(next);
  return next;
}

export function getSupabaseUrl(): string {
  const fromEnv = process.env.SUPABASE_URL;
  if (fromEnv) return fromEnv;

  const config = loadConfig();
  if (config.supabaseUrl) return config.supabaseUrl;

  throw new Error(
    "Missing SUPABASE_URL. Set the environment variable or run: listsync config set supabaseUrl <url>"
  );
}

export function getSupabaseAnonKey(): string {
  const fromEnv = process.env.SUPABASE_ANON_KEY;
  if (fromEnv) return fromEnv;

  const config = loadConfig();
  if (config.supabaseAnonKey) return config.supabaseAnonKey;

  throw new Error(
    "Missing SUPABASE_ANON_KEY. Set the environment variable or run: listsync config set supabaseAnonKey <key>"
  );
}

export function getRefreshToken(): string | null {
  return process.env.LISTSYNC_REFRESH_TOKEN || loadConfig().refreshToken || null;
}

export function getPauseInBackground(): boolean {
  return loadConfig().pauseInBackground ?? true;
}
