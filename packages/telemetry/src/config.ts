/**
 * Telemetry configuration management
 *
 * Reads/writes the "telemetry" key of ~/.listsync/config.json
 * Default: telemetry is ON (enabled: true)
 */

import { existsSync, readFileSync, writeFileSync, mkdirSync } from "fs";
import { dirname, join } from "path";
import { z } from "zod";
import { getConfigDir } from "./user-id.js";

export const TelemetryConfigSchema = z.object({
  enabled: z.boolean().default(true),
  anonymousId: z.string().optional(),
});

export type TelemetryConfig = z.infer<typeof TelemetryConfigSchema>;

const ConfigFileSchema = z.record(z.unknown());

function getConfigFile(): string {
  return join(getConfigDir(), "config.json");
}

function readConfigFile(configFile: string): Record<string, unknown> {
  if (!existsSync(configFile)) {
    return {};
  }
  try {
    const parsed = ConfigFileSchema.safeParse(
      JSON.parse(readFileSync(configFile, "utf-8"))
    );
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}

/**
 * Load telemetry configuration with defaults applied
 */
export function loadTelemetryConfig(): TelemetryConfig {
  const section = readConfigFile(getConfigFile()).telemetry;
  const parsed = TelemetryConfigSchema.safeParse(section ?? {});
  return parsed.success ? parsed.data : { enabled: true };
}

/**
 * Save telemetry configuration
 *
 * Merges with existing config to preserve other settings
 */
export function saveTelemetryConfig(config: TelemetryConfig): void {
  const configFile = getConfigFile();
  const dir = dirname(configFile);

  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }

  const existingConfig = readConfigFile(configFile);
  existingConfig.telemetry = config;
  writeFileSync(configFile, JSON.stringify(existingConfig, null, 2), {
    mode: 0o600,
  });
}

export function isTelemetryEnabled(): boolean {
  return loadTelemetryConfig().enabled;
}
