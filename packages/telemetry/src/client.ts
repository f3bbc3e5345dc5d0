/**
 * Telemetry client - PostHog wrapper with privacy controls
 *
 * Features:
 * - ON by default, opt-out via config
 * - Anonymous user ID (SHA-256 hashed device id)
 * - Graceful degradation (failures don't break the app)
 * - Singleton pattern for easy access
 */

import { PostHog } from "posthog-node";
import { loadTelemetryConfig, saveTelemetryConfig } from "./config.js";
import { getAnonymousUserId } from "./user-id.js";
import type { TelemetryEvent, TelemetrySink } from "./events.js";

const POSTHOG_API_KEY = process.env.POSTHOG_API_KEY || "";
const POSTHOG_HOST = process.env.POSTHOG_HOST || "https://us.i.posthog.com";

const LIB_NAME = "@listsync/telemetry";
const LIB_VERSION = "0.1.0";

export interface TelemetryClientOptions {
  /** Override enabled state (ignores config) */
  enabled?: boolean;
  /** Force a specific user ID (for testing) */
  forceUserId?: string;
  /** PostHog API key override */
  apiKey?: string;
  /** PostHog host override */
  host?: string;
}

function createPostHog(apiKey: string, host: string): PostHog | null {
  if (!apiKey) {
    return null;
  }
  return new PostHog(apiKey, {
    host,
    flushAt: 10, // Batch events
    flushInterval: 5000,
  });
}

export class TelemetryClient implements TelemetrySink {
  private client: PostHog | null = null;
  private userId: string;
  private enabled: boolean;
  private surface: string = "unknown";
  private readonly apiKey: string;
  private readonly host: string;

  constructor(options: TelemetryClientOptions = {}) {
    const config = loadTelemetryConfig();

    this.enabled = options.enabled ?? config.enabled;
    this.apiKey = options.apiKey || POSTHOG_API_KEY;
    this.host = options.host || POSTHOG_HOST;
    this.userId =
      options.forceUserId || config.anonymousId || getAnonymousUserId();

    // Keep the anonymous ID stable across sessions
    if (!config.anonymousId && this.enabled) {
      saveTelemetryConfig({ ...config, anonymousId: this.userId });
    }

    if (this.enabled) {
      this.connect();
    }
  }

  private connect(): void {
    try {
      this.client = createPostHog(this.apiKey, this.host);
    } catch (error) {
      console.error("[telemetry] Failed to initialize PostHog:", error);
      this.enabled = false;
    }
  }

  /**
   * Set the reporting surface (e.g. "cli")
   */
  setSurface(surface: string): void {
    this.surface = surface;
  }

  track(event: TelemetryEvent): void {
    if (!this.enabled || !this.client) {
      return;
    }

    try {
      this.client.capture({
        distinctId: this.userId,
        event: event.event,
        properties: {
          ...event.properties,
          $lib: LIB_NAME,
          $lib_version: LIB_VERSION,
          surface: this.surface,
        },
      });
    } catch (error) {
      console.error("[telemetry] Failed to track event:", error);
    }
  }

  /**
   * Track a CLI command outcome (convenience method)
   */
  trackCommand(command: string, success: boolean): void {
    this.track({
      event: "cli.command_run",
      properties: { command, success },
    });
  }

  /**
   * Opt out of telemetry
   */
  async disable(): Promise<void> {
    this.enabled = false;
    saveTelemetryConfig({ enabled: false, anonymousId: this.userId });
    await this.shutdown();
  }

  /**
   * Opt back into telemetry
   */
  enable(): void {
    this.enabled = true;
    saveTelemetryConfig({ enabled: true, anonymousId: this.userId });

    if (!this.client) {
      this.connect();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * True when events actually leave the process
   */
  isConnected(): boolean {
    return this.client !== null;
  }

  getUserId(): string {
    return this.userId;
  }

  /**
   * Flush pending events and close client
   * MUST be called before process exit
   */
  async shutdown(): Promise<void> {
    if (this.client) {
      try {
        await this.client.shutdown();
      } catch (error) {
        console.error("[telemetry] Failed to shutdown:", error);
      }
      this.client = null;
    }
  }
}

// --- Singleton instance for convenience ---

let globalClient: TelemetryClient | null = null;

export function getTelemetryClient(): TelemetryClient {
  if (!globalClient) {
    globalClient = new TelemetryClient();
  }
  return globalClient;
}

/**
 * Initialize telemetry with options
 * Call this early in your app to configure the client
 */
export function initTelemetry(options: TelemetryClientOptions = {}): TelemetryClient {
  globalClient = new TelemetryClient(options);
  return globalClient;
}

/**
 * Shutdown global telemetry client
 * Call before process exit to flush pending events
 */
export async function shutdownTelemetry(): Promise<void> {
  if (globalClient) {
    await globalClient.shutdown();
    globalClient = null;
  }
}

/**
 * Reset global client (for testing)
 */
export function resetTelemetryClient(): void {
  globalClient = null;
}
