import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { AppDatabase } from "../db/connection";
import { SinkWriteError } from "../lib/errors";
import { createTestDatabase, makeContainer } from "../test-helpers";
import { SnapshotService } from "./snapshot.service";

describe("SnapshotService", () => {
  let db: AppDatabase;
  let sqlite: ReturnType<typeof createTestDatabase>["sqlite"];
  let service: SnapshotService;

  beforeEach(() => {
    const result = createTestDatabase();
    db = result.db;
    sqlite = result.sqlite;
    service = new SnapshotService(db);
  });

  afterEach(() => {
    sqlite.close();
  });

  describe("bulkWrite", () => {
    it("inserts a snapshot per container", async () => {
      await service.bulkWrite([
        makeContainer({ id: "c1", name: "web" }),
        makeContainer({ id: "c2", name: "db", state: "stopped" }),
      ]);

      expect(service.get("c2")?.state).toBe("stopped");
      expect(service.get("c1")).toEqual({
        id: "c1",
        name: "web",
        image: "nginx:1.27",
        imageId: "sha256:img1",
        state: "running",
        status: "Up 2 minutes",
        createdAt: "2024-01-01T00:00:00.000Z",
        updatedAt: "2024-01-01T00:00:00.000Z",
        writeCount: 1,
      });
    });

    it("updates an existing snapshot and counts the writes", async () => {
      await service.bulkWrite([makeContainer({ id: "c1" })]);
      await service.bulkWrite([
        makeContainer({
          id: "c1",
          state: "removed",
          status: "removed",
          createdAt: "2030-01-01T00:00:00.000Z",
          updatedAt: "2024-01-02T00:00:00.000Z",
        }),
      ]);

      const snapshot = service.get("c1");
      expect(snapshot?.state).toBe("removed");
      expect(snapshot?.updatedAt).toBe("2024-01-02T00:00:00.000Z");
      // Creation time comes from the first write
      expect(snapshot?.createdAt).toBe("2024-01-01T00:00:00.000Z");
      expect(snapshot?.writeCount).toBe(2);
    });

    it("does nothing for an empty batch", async () => {
      await service.bulkWrite([]);
      const rows = sqlite
        .prepare("SELECT COUNT(*) AS count FROM container_snapshots")
        .get();
      expect(rows).toEqual({ count: 0 });
    });

    it("raises a SinkWriteError when the database fails", async () => {
      const broken = createTestDatabase();
      const brokenService = new SnapshotService(broken.db);
      broken.sqlite.close();

      const err = await brokenService
        .bulkWrite([makeContainer({ id: "c1" })])
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(SinkWriteError);
      if (!(err instanceof SinkWriteError)) return;
      expect(err.message).toBe("[Sink] [Items: 1] bulk write failed");
      expect(err.itemCount).toBe(1);
      expect(err.cause).toBeInstanceOf(Error);
    });
  });

  it("returns undefined for an unknown container", () => {
    expect(service.get("missing")).toBeUndefined();
  });
});
