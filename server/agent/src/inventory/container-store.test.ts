import { beforeEach, describe, expect, it } from "vitest";
import { InventoryError, isNotFound } from "../lib/errors";
import { FakeEngine, makeSummary } from "../test-helpers";
import { ContainerStore } from "./container-store";
import { ImageStore } from "./image-store";
import type { ContainerRecord } from "./types";

describe("ContainerStore", () => {
  let engine: FakeEngine;
  let store: ContainerStore;
  let feed: AsyncIterator<ContainerRecord[]>;

  async function nextBatch(): Promise<string[]> {
    const result = await feed.next();
    if (result.done) throw new Error("feed closed");
    return result.value.map((record) => `${record.id}:${record.state}`);
  }

  beforeEach(() => {
    engine = new FakeEngine();
    engine.containers = [
      makeSummary({ id: "aaa111", name: "web" }),
      makeSummary({ id: "aab222", name: "db", state: "stopped", status: "Exited (0)" }),
    ];
    store = new ContainerStore(engine);
    feed = store.broadcast()[Symbol.asyncIterator]();
  });

  describe("init", () => {
    it("loads every container and publishes them as one batch", async () => {
      await store.init();

      expect(store.list().map((c) => c.name)).toEqual(["db", "web"]);
      expect(await nextBatch()).toEqual(["aaa111:running", "aab222:stopped"]);
    });

    it("names digest-only images after their first tag", async () => {
      engine.containers = [
        makeSummary({ id: "c1", image: "sha256:img1", imageId: "sha256:img1" }),
      ];
      engine.images = [
        {
          id: "sha256:img1",
          tags: ["nginx:1.27", "nginx:latest"],
          size: 10,
          createdAt: "2024-01-01T00:00:00.000Z",
        },
      ];
      const images = new ImageStore(engine);
      await images.init();

      await store.init(images.byId);

      expect(store.get("c1")?.image).toBe("nginx:1.27");
    });

    it("wraps engine failures", async () => {
      engine.failNext = new Error("socket hang up");

      await expect(store.init()).rejects.toThrow(
        new InventoryError("socket hang up", "init"),
      );
    });
  });

  describe("get", () => {
    beforeEach(async () => {
      await store.init();
    });

    it("finds by id, name or unique id prefix", () => {
      expect(store.get("aaa111")?.name).toBe("web");
      expect(store.get("db")?.id).toBe("aab222");
      expect(store.get("aaa")?.id).toBe("aaa111");
    });

    it("refuses an ambiguous prefix", () => {
      expect(store.get("aa")).toBeUndefined();
      expect(store.get("")).toBeUndefined();
      expect(store.get("zzz")).toBeUndefined();
    });
  });

  describe("mutations", () => {
    beforeEach(async () => {
      await store.init();
      await nextBatch();
    });

    it("updates a known container in place on add", async () => {
      const before = store.get("aab222");
      engine.containers[1] = makeSummary({
        id: "aab222",
        name: "db",
        status: "running",
      });

      await store.add("aab222");

      expect(store.get("aab222")).toBe(before);
      expect(before?.state).toBe("running");
      expect(await nextBatch()).toEqual(["aab222:running"]);
    });

    it("tracks a new container on add", async () => {
      engine.containers.push(makeSummary({ id: "ccc333", name: "worker" }));

      await store.add("ccc333");

      expect(store.list().map((c) => c.name)).toEqual(["db", "web", "worker"]);
      expect(await nextBatch()).toEqual(["ccc333:running"]);
    });

    it("rejects an add the engine cannot inspect", async () => {
      const err = await store.add("ghost").catch((e: unknown) => e);

      expect(err).toBeInstanceOf(InventoryError);
      if (!(err instanceof InventoryError)) return;
      expect(err.message).toBe(
        "[Op: add] [Container: ghost] no such container: ghost",
      );
      expect(err.operation).toBe("add");
      expect(err.containerId).toBe("ghost");
      expect(isNotFound(err.cause)).toBe(true);
    });

    it("marks a container stopped and refreshes its status", async () => {
      engine.containers[0] = makeSummary({
        id: "aaa111",
        name: "web",
        state: "stopped",
        status: "Exited (137) 1 second ago",
      });

      await store.stop("web");

      expect(store.get("aaa111")).toMatchObject({
        state: "stopped",
        status: "Exited (137) 1 second ago",
      });
      expect(await nextBatch()).toEqual(["aaa111:stopped"]);
    });

    it("rejects stop and remove for untracked containers", async () => {
      await expect(store.stop("ghost")).rejects.toThrow(
        "[Op: stop] [Container: ghost] container not tracked",
      );
      await expect(store.remove("ghost")).rejects.toThrow(
        "[Op: remove] [Container: ghost] container not tracked",
      );
    });

    it("forgets a removed container but publishes its last state", async () => {
      const record = store.get("aaa111");

      await store.remove("aaa111");

      expect(store.get("aaa111")).toBeUndefined();
      expect(record?.state).toBe("removed");
      expect(await nextBatch()).toEqual(["aaa111:removed"]);
    });

    it("publishes the state each batch was taken in", async () => {
      await store.stop("aaa111");
      await store.remove("aaa111");

      expect(await nextBatch()).toEqual(["aaa111:stopped"]);
      expect(await nextBatch()).toEqual(["aaa111:removed"]);
    });

    it("publishes batches in mutation order", async () => {
      engine.containers.push(makeSummary({ id: "ccc333", name: "worker" }));

      await store.stop("aaa111");
      await store.add("ccc333");
      await store.remove("aab222");

      expect(await nextBatch()).toEqual(["aaa111:stopped"]);
      expect(await nextBatch()).toEqual(["ccc333:running"]);
      expect(await nextBatch()).toEqual(["aab222:removed"]);
    });
  });

  it("ends the broadcast on close", async () => {
    store.close();
    expect(await feed.next()).toEqual({ done: true, value: undefined });
  });
});
