import { Hono } from "hono";
import type { AppEnv } from "../app";

export function containersRoutes(): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/", (c) => {
    const containers = c.get("containers");
    return c.json({ data: containers.list(), error: null });
  });

  // Accepts a full id, a name or an unambiguous id prefix
  app.get("/:id", (c) => {
    const container = c.get("containers").get(c.req.param("id"));
    if (!container) {
      return c.json({ data: null, error: "Container not found" }, 404);
    }
    return c.json({ data: container, error: null });
  });

  // Last persisted snapshot, kept after the container is removed
  app.get("/:id/history", (c) => {
    const id = c.req.param("id");
    const snapshots = c.get("snapshotService");
    const resolved = c.get("containers").get(id)?.id ?? id;
    const snapshot = snapshots.get(resolved);
    if (!snapshot) {
      return c.json({ data: null, error: "No snapshot for container" }, 404);
    }
    return c.json({ data: snapshot, error: null });
  });

  return app;
}
