import { InventoryError } from "../lib/errors";
import { createLogger } from "../lib/logger";
import type { ImageInventory, ImageRecord, InventoryEngine } from "./types";

const log = createLogger("images");

export class ImageStore implements ImageInventory {
  private images = new Map<string, ImageRecord>();

  constructor(private engine: InventoryEngine) {}

  async init(): Promise<void> {
    let images: ImageRecord[];
    try {
      images = await this.engine.listImages();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new InventoryError(message, "init", undefined, { cause: err });
    }

    this.images.clear();
    for (const image of images) {
      this.images.set(image.id, image);
    }
    log.info({ count: this.images.size }, "images loaded");
  }

  list(): ImageRecord[] {
    return [...this.images.values()];
  }

  byId = (id: string): ImageRecord | undefined => this.images.get(id);
}
