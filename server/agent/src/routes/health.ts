import { Hono } from "hono";
import type { AppEnv } from "../app";

export const VERSION = "0.1.0";
const COMMIT = process.env.GIT_COMMIT ?? "dev";

export function healthRoutes(): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/health", (c) => {
    return c.json({ ok: true, version: VERSION, commit: COMMIT });
  });

  // Agent info at /api root
  app.get("/api", (c) => {
    return c.json({
      name: "dockwatch",
      version: VERSION,
      commit: COMMIT,
      endpoints: {
        health: "GET /health",
        about: "GET /api/about",
        volumes: "GET /api/volumes",
        containers: "GET /api/containers",
        container: "GET /api/containers/:id",
        history: "GET /api/containers/:id/history",
        images: "GET /api/images",
        hub: "GET /api/hub",
        stream: "WS /ws/stream",
      },
    });
  });

  return app;
}
