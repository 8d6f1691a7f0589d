import { serve } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import { createApp } from "./app";
import { ensureDataDirs, parseConfig } from "./config";
import { Controller } from "./controller/controller";
import { createDatabase } from "./db/connection";
import { runMigrations } from "./db/migrate";
import { createDockerClient, resolveDockerSocket } from "./docker/client";
import { DockerEngine } from "./docker/engine";
import { DockerEventSource } from "./docker/events";
import { DockerHostInspector } from "./docker/host";
import { DockerStreamFactory } from "./docker/streams";
import {
  getClientQueueSize,
  getLogTail,
  getMaxInFlightWrites,
  loadEnv,
} from "./env";
import { Hub } from "./hub/hub";
import { ContainerStore } from "./inventory/container-store";
import { ImageStore } from "./inventory/image-store";
import { createLogger } from "./lib/logger";
import { VERSION } from "./routes/health";
import { SnapshotService } from "./services/snapshot.service";
import { createStreamHandler } from "./ws/handler";

const log = createLogger("server");

async function main() {
  const config = parseConfig(process.argv.slice(2));

  log.info({ version: VERSION }, "dockwatch starting");
  log.info(
    {
      dataDir: config.dataDir,
      configDir: config.configDir,
      stateDir: config.stateDir,
    },
    "directories",
  );

  const paths = ensureDataDirs(config);
  loadEnv(paths.configDir);

  log.info({ dbPath: paths.dbPath }, "database");
  const { db, sqlite } = createDatabase(paths.dbPath);
  log.info("running migrations");
  runMigrations(sqlite, paths.migrationsDir);

  const socketPath = resolveDockerSocket(config.dockerSocket);
  log.info({ socketPath }, "docker");
  const docker = createDockerClient(socketPath);
  const engine = new DockerEngine(docker);

  const containers = new ContainerStore(engine);
  const images = new ImageStore(engine);
  const snapshotService = new SnapshotService(db);
  const controller = new Controller({
    host: new DockerHostInspector(docker),
    events: new DockerEventSource(docker),
    images,
    containers,
    sink: snapshotService,
    maxInFlightWrites: getMaxInFlightWrites(),
  });

  // Inventory or event source failures abort startup
  await controller.init();
  log.info({ containers: containers.list().length }, "controller started");

  const hub = new Hub({
    containers,
    streams: new DockerStreamFactory(docker, { logTail: getLogTail() }),
    clientQueueSize: getClientQueueSize(),
  });
  const hubLoop = hub.run().catch((err) => {
    log.fatal({ err }, "hub loop failed");
    process.exit(1);
  });

  const app = createApp({
    services: { db, controller, containers, images, snapshotService, hub },
  });

  const { injectWebSocket, upgradeWebSocket } = createNodeWebSocket({ app });
  app.get("/ws/stream", createStreamHandler(upgradeWebSocket, { hub }));

  const server = serve({
    fetch: app.fetch,
    port: config.port,
    hostname: config.host,
  });
  injectWebSocket(server);

  log.info({ host: config.host, port: config.port }, "server listening");

  let stopping = false;
  const shutdown = async (code = 0, err?: unknown) => {
    if (stopping) return;
    stopping = true;

    if (err) {
      log.fatal({ err }, "fatal error");
    } else {
      log.info("shutting down");
    }

    try {
      hub.close();
      await hubLoop;
      await controller.quit();
      server.close();
      sqlite.close();
    } catch (cleanupErr) {
      log.error({ err: cleanupErr }, "cleanup failed");
    }

    setTimeout(() => process.exit(code), 250).unref();
  };

  const onShutdown = (code: number, err?: unknown) => {
    shutdown(code, err).catch((shutdownErr) => {
      log.error({ err: shutdownErr }, "shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGINT", () => onShutdown(0));
  process.on("SIGTERM", () => onShutdown(0));
  process.on("uncaughtException", (err) => onShutdown(1, err));
  process.on("unhandledRejection", (reason) => onShutdown(1, reason));
}

main().catch((err) => {
  log.fatal({ err }, "failed to start");
  process.exit(1);
});
