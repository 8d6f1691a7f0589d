import { Hono } from "hono";
import { cors } from "hono/cors";
import { requestId } from "hono/request-id";
import { type Env as PinoEnv, pinoLogger } from "hono-pino";
import type { Controller } from "./controller/controller";
import type { AppDatabase } from "./db/connection";
import type { Hub } from "./hub/hub";
import type { ContainerInventory, ImageInventory } from "./inventory/types";
import { rootLogger } from "./lib/logger";
import { containersRoutes } from "./routes/containers";
import { healthRoutes } from "./routes/health";
import { hostRoutes } from "./routes/host";
import type { SnapshotService } from "./services/snapshot.service";

export interface AppServices {
  db: AppDatabase;
  controller: Pick<Controller, "about" | "volumes">;
  containers: ContainerInventory;
  images: ImageInventory;
  snapshotService: SnapshotService;
  hub: Pick<Hub, "stats">;
}

export type AppEnv = PinoEnv & {
  Variables: AppServices;
};

export interface CreateAppOptions {
  services: AppServices;
}

export function createApp(options: CreateAppOptions): Hono<AppEnv> {
  const { services } = options;
  const app = new Hono<AppEnv>();

  // Inject services into context
  app.use("*", async (c, next) => {
    c.set("db", services.db);
    c.set("controller", services.controller);
    c.set("containers", services.containers);
    c.set("images", services.images);
    c.set("snapshotService", services.snapshotService);
    c.set("hub", services.hub);
    await next();
  });

  app.use("*", requestId());
  app.use(
    "*",
    pinoLogger({
      pino: rootLogger,
      http: {
        referRequestIdKey: "requestId",
        onReqMessage: () => "request start",
        onResMessage: () => "request end",
        responseTime: true,
      },
    }),
  );
  app.use("*", cors());

  app.onError((err, c) => {
    const logger = c.get("logger");
    logger.error(
      { err, path: c.req.path, method: c.req.method },
      "unhandled error",
    );
    return c.json({ data: null, error: "Internal server error" }, 500);
  });

  app.route("/", healthRoutes());
  app.route("/api", hostRoutes());
  app.route("/api/containers", containersRoutes());

  return app;
}
