import { existsSync, mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

export const APP_NAME = "dockwatch";

/**
 * XDG Base Directory paths with environment variable overrides.
 *
 * Priority: DOCKWATCH_* env > XDG_* env > XDG defaults
 */
export function getXdgPaths() {
  const home = homedir();

  const xdgDataHome =
    process.env.XDG_DATA_HOME || join(home, ".local", "share");
  const xdgConfigHome = process.env.XDG_CONFIG_HOME || join(home, ".config");
  const xdgStateHome =
    process.env.XDG_STATE_HOME || join(home, ".local", "state");

  return {
    // DOCKWATCH_DATA_DIR > XDG_DATA_HOME/dockwatch (database)
    dataDir: process.env.DOCKWATCH_DATA_DIR || join(xdgDataHome, APP_NAME),

    // DOCKWATCH_CONFIG_DIR > XDG_CONFIG_HOME/dockwatch (.env)
    configDir:
      process.env.DOCKWATCH_CONFIG_DIR || join(xdgConfigHome, APP_NAME),

    // DOCKWATCH_STATE_DIR > XDG_STATE_HOME/dockwatch (logs, runtime state)
    stateDir: process.env.DOCKWATCH_STATE_DIR || join(xdgStateHome, APP_NAME),
  };
}

export interface Config {
  port: number;
  host: string;
  dataDir: string;
  configDir: string;
  stateDir: string;
  dockerSocket?: string;
}

/**
 * Parse CLI arguments and environment variables to build config.
 *
 * Priority: CLI args > DOCKWATCH_* env > XDG env > XDG defaults
 */
export function parseConfig(args: string[]): Config {
  const xdg = getXdgPaths();

  const config: Config = {
    port: Number.parseInt(process.env.DOCKWATCH_PORT || "8080", 10),
    host: process.env.DOCKWATCH_HOST || "0.0.0.0",
    dataDir: xdg.dataDir,
    configDir: xdg.configDir,
    stateDir: xdg.stateDir,
    dockerSocket: process.env.DOCKWATCH_DOCKER_SOCKET,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case "--port":
        if (nextArg) {
          config.port = Number.parseInt(nextArg, 10);
          i++;
        }
        break;
      case "--host":
        if (nextArg) {
          config.host = nextArg;
          i++;
        }
        break;
      case "--data-dir":
        if (nextArg) {
          config.dataDir = nextArg;
          i++;
        }
        break;
      case "--config-dir":
        if (nextArg) {
          config.configDir = nextArg;
          i++;
        }
        break;
      case "--state-dir":
        if (nextArg) {
          config.stateDir = nextArg;
          i++;
        }
        break;
      case "--docker-socket":
        if (nextArg) {
          config.dockerSocket = nextArg;
          i++;
        }
        break;
    }
  }

  return config;
}

/**
 * Paths derived from config directories.
 */
export interface DataPaths {
  dataDir: string;
  configDir: string;
  stateDir: string;
  dbPath: string;
  migrationsDir: string;
}

export const MIGRATIONS_DIR = fileURLToPath(
  new URL("./db/migrations", import.meta.url),
);

/**
 * Ensure all directories exist and return resolved paths.
 */
export function ensureDataDirs(config: Config): DataPaths {
  for (const dir of [config.dataDir, config.configDir, config.stateDir]) {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  return {
    dataDir: config.dataDir,
    configDir: config.configDir,
    stateDir: config.stateDir,
    dbPath:
      process.env.DOCKWATCH_DB_PATH || join(config.dataDir, "dockwatch.db"),
    migrationsDir: MIGRATIONS_DIR,
  };
}
