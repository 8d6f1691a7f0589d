import { Hono } from "hono";
import type { AppEnv } from "../app";

/**
 * Host summary, volumes, images and hub state.
 */
export function hostRoutes(): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/about", (c) => {
    return c.json({ data: c.get("controller").about, error: null });
  });

  app.get("/volumes", (c) => {
    return c.json({ data: c.get("controller").volumes, error: null });
  });

  app.get("/images", (c) => {
    return c.json({ data: c.get("images").list(), error: null });
  });

  app.get("/hub", (c) => {
    return c.json({ data: c.get("hub").stats(), error: null });
  });

  return app;
}
