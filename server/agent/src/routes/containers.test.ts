import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type AppServices, createApp } from "../app";
import { createTestServices } from "../test-helpers";

describe("Container Routes", () => {
  let services: AppServices;
  let sqlite: Awaited<ReturnType<typeof createTestServices>>["sqlite"];

  beforeEach(async () => {
    const result = await createTestServices();
    services = result.services;
    sqlite = result.sqlite;
  });

  afterEach(() => {
    sqlite.close();
  });

  describe("GET /api/containers", () => {
    it("lists containers by name", async () => {
      const app = createApp({ services });
      const res = await app.request("/api/containers");

      expect(res.status).toBe(200);
      const json = await res.json();
      expect(json.error).toBeNull();
      expect(json.data.map((c: { name: string }) => c.name)).toEqual([
        "db",
        "web",
      ]);
    });
  });

  describe("GET /api/containers/:id", () => {
    it("resolves a name", async () => {
      const app = createApp({ services });
      const res = await app.request("/api/containers/web");

      expect(res.status).toBe(200);
      const json = await res.json();
      expect(json.data.id).toBe("aaa111");
      expect(json.data.image).toBe("nginx:1.27");
    });

    it("returns 404 for an unknown container", async () => {
      const app = createApp({ services });
      const res = await app.request("/api/containers/ghost");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        data: null,
        error: "Container not found",
      });
    });
  });

  describe("GET /api/containers/:id/history", () => {
    it("returns the persisted snapshot", async () => {
      const web = services.containers.get("web");
      if (!web) throw new Error("fixture missing");
      await services.snapshotService.bulkWrite([web]);

      const app = createApp({ services });
      const res = await app.request("/api/containers/web/history");

      expect(res.status).toBe(200);
      const json = await res.json();
      expect(json.data.id).toBe("aaa111");
      expect(json.data.writeCount).toBe(1);
    });

    it("keeps answering after the container is removed", async () => {
      const web = services.containers.get("web");
      if (!web) throw new Error("fixture missing");
      await services.containers.remove("aaa111");
      await services.snapshotService.bulkWrite([web]);

      const app = createApp({ services });
      const res = await app.request("/api/containers/aaa111/history");

      expect(res.status).toBe(200);
      const json = await res.json();
      expect(json.data.state).toBe("removed");
    });

    it("returns 404 when nothing was persisted", async () => {
      const app = createApp({ services });
      const res = await app.request("/api/containers/db/history");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        data: null,
        error: "No snapshot for container",
      });
    });
  });
});
