import type { About, HostInspector, Volume } from "../docker/host";
import type { EngineEvent, EventSource } from "../docker/events";
import type {
  ContainerInventory,
  ImageInventory,
  ImageLookup,
} from "../inventory/types";
import { isNotFound } from "../lib/errors";
import { createLogger } from "../lib/logger";
import type { PersistenceSink } from "../services/snapshot.service";
import { DEFAULT_MAX_INFLIGHT_WRITES, WritePool } from "./write-pool";

const log = createLogger("controller");

type LifecycleAction = "add" | "stop" | "remove";

/** Container event statuses that mutate the inventory. */
const LIFECYCLE_ACTIONS = new Map<string, LifecycleAction>([
  ["start", "add"],
  ["stop", "stop"],
  ["destroy", "remove"],
]);

export interface ControllerDeps {
  host: HostInspector;
  events: EventSource;
  images: ImageInventory & { init(): Promise<void> };
  containers: ContainerInventory & { init(imageById?: ImageLookup): Promise<void> };
  sink: PersistenceSink;
  maxInFlightWrites?: number;
}

const EMPTY_ABOUT: About = {
  version: "",
  apiVersion: "",
  os: "",
  imageCount: 0,
  containerCount: 0,
};

/**
 * Keeps the inventory in step with engine events and relays inventory
 * changes to the persistence sink.
 *
 * Inventory mutations triggered by events are fire-and-forget: a failure is
 * logged and the inventory stays out of step until the next event for that
 * container.
 */
export class Controller {
  about: About = { ...EMPTY_ABOUT };
  volumes: Volume[] = [];
  private pool: WritePool;
  private tasks: Promise<void>[] = [];

  constructor(private deps: ControllerDeps) {
    this.pool = new WritePool(
      deps.maxInFlightWrites ?? DEFAULT_MAX_INFLIGHT_WRITES,
      (err) => log.error({ err }, "bulk write failed"),
    );
  }

  /**
   * Start the controller. Summary and volume failures are logged; event
   * source and inventory failures abort startup.
   */
  async init(): Promise<void> {
    log.info("starting");

    await this.refreshAbout();
    try {
      await this.updateVolumes();
    } catch (err) {
      log.warn({ err }, "volumes might not be complete");
    }

    await this.deps.events.init();
    this.track("events", this.handleEvents());

    try {
      await this.deps.images.init();
    } catch (err) {
      log.error({ err }, "images failed to init");
      throw err;
    }

    try {
      await this.deps.containers.init(this.deps.images.byId);
    } catch (err) {
      log.error({ err }, "containers failed to init");
      throw err;
    }

    this.track("relay", this.relayBroadcasts());
  }

  async updateAbout(): Promise<void> {
    this.about = await this.deps.host.about();
  }

  async updateVolumes(): Promise<void> {
    this.volumes = await this.deps.host.volumes();
  }

  /**
   * Consume engine events until the source closes.
   */
  async handleEvents(): Promise<void> {
    log.info("running event handler");
    for await (const event of this.deps.events.get()) {
      await this.handleEvent(event);
    }
    log.info("event handler stopped");
  }

  /**
   * Dispatch one engine event. Only container events are handled; the host
   * summary is refreshed after each of them.
   */
  async handleEvent(event: EngineEvent): Promise<void> {
    if (event.type !== "container") return;

    const action = LIFECYCLE_ACTIONS.get(event.status);
    if (action) {
      await this.execute(action, event);
    } else {
      log.warn(
        { status: event.status, cid: event.id },
        "event is unknown or not implemented",
      );
    }

    await this.refreshAbout();
  }

  /**
   * Forward every inventory batch to the sink through the write pool.
   */
  async relayBroadcasts(): Promise<void> {
    for await (const items of this.deps.containers.broadcast()) {
      await this.pool.submit(() => this.deps.sink.bulkWrite(items));
    }
    log.info("feed writer left");
  }

  /** Writes currently in progress. */
  get pendingWrites(): number {
    return this.pool.active;
  }

  /**
   * Stop consuming events and wait for the loops and in-flight writes.
   */
  async quit(): Promise<void> {
    this.deps.events.close();
    this.deps.containers.close();
    await Promise.all(this.tasks);
    await this.pool.drain();
    log.info("quit");
  }

  private track(name: string, task: Promise<void>): void {
    this.tasks.push(
      task.catch((err) => {
        log.error({ err, task: name }, "background task failed");
      }),
    );
  }

  private async execute(
    action: LifecycleAction,
    event: EngineEvent,
  ): Promise<void> {
    try {
      await this.deps.containers[action](event.id);
      log.info({ status: event.status, cid: event.id }, "event applied");
    } catch (err) {
      const cause = err instanceof Error ? err.cause : err;
      if (isNotFound(cause)) {
        log.warn(
          { status: event.status, cid: event.id },
          "container vanished before the event was applied",
        );
        return;
      }
      log.error(
        { err, status: event.status, cid: event.id },
        "event failed to apply",
      );
    }
  }

  private async refreshAbout(): Promise<void> {
    try {
      await this.updateAbout();
    } catch (err) {
      log.warn({ err }, "about might not be complete");
    }
  }
}
