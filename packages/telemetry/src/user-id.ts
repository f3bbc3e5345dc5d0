/**
 * Anonymous user ID generation for telemetry
 *
 * Uses SHA-256 hash of a per-device id so events can be grouped by
 * installation without identifying the person or their account.
 */

import { createHash, randomUUID } from "crypto";
import { existsSync, readFileSync, writeFileSync, mkdirSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { z } from "zod";

let configDir = join(homedir(), ".listsync");

const DEVICE_FILE = "device.json";

const DeviceFileSchema = z.object({
  deviceId: z.string().min(1),
});

/**
 * Override config directory (for testing)
 */
export function setConfigDir(dir: string): void {
  configDir = dir;
}

export function getConfigDir(): string {
  return configDir;
}

/**
 * Read the device id, creating device.json on first use.
 */
export function getDeviceId(): string {
  const deviceFile = join(configDir, DEVICE_FILE);

  if (existsSync(deviceFile)) {
    try {
      const parsed = DeviceFileSchema.safeParse(
        JSON.parse(readFileSync(deviceFile, "utf-8"))
      );
      if (parsed.success) {
        return parsed.data.deviceId;
      }
    } catch {
      // Unreadable, replace it below
    }
  }

  const deviceId = randomUUID();
  try {
    if (!existsSync(configDir)) {
      mkdirSync(configDir, { recursive: true, mode: 0o700 });
    }
    writeFileSync(deviceFile, JSON.stringify({ deviceId }, null, 2), {
      mode: 0o600,
    });
  } catch (error) {
    console.error("[telemetry] Failed to save device id:", error);
  }
  return deviceId;
}

/**
 * Stable anonymous user ID for this device.
 *
 * @returns 16-character hex string (SHA-256 truncated)
 */
export function getAnonymousUserId(): string {
  return hashForAnonymity(getDeviceId());
}

/**
 * Generate a deterministic hash for any input
 */
export function hashForAnonymity(input: string): string {
  const hash = createHash("sha256");
  hash.update(`listsync:${input}`);
  return hash.digest("hex").slice(0, 16);
}
