import { existsSync } from "node:fs";
import { join } from "node:path";
import { config } from "dotenv";
import { DEFAULT_MAX_INFLIGHT_WRITES } from "./controller/write-pool";
import { DEFAULT_CLIENT_QUEUE_SIZE } from "./hub/client";
import { createLogger } from "./lib/logger";

const log = createLogger("env");

/**
 * Load .env file from config directory if it exists.
 */
export function loadEnv(configDir: string): void {
  const envPath = join(configDir, ".env");

  if (existsSync(envPath)) {
    config({ path: envPath });
    log.info({ envPath }, "loaded .env");
  }
}

function positiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isInteger(value) || value < 1) {
    log.warn({ name, raw, fallback }, "ignoring invalid value");
    return fallback;
  }
  return value;
}

/**
 * Maximum concurrent bulk writes to the snapshot store.
 * Default: 4.
 */
export function getMaxInFlightWrites(): number {
  return positiveInt("DOCKWATCH_MAX_INFLIGHT_WRITES", DEFAULT_MAX_INFLIGHT_WRITES);
}

/**
 * Frames buffered per WebSocket client before the oldest are dropped.
 * Default: 256.
 */
export function getClientQueueSize(): number {
  return positiveInt("DOCKWATCH_CLIENT_QUEUE_SIZE", DEFAULT_CLIENT_QUEUE_SIZE);
}

/**
 * Log lines replayed when a log stream opens.
 * Default: 100.
 */
export function getLogTail(): number {
  return positiveInt("DOCKWATCH_LOG_TAIL", 100);
}
