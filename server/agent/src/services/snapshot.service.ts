import { eq, sql } from "drizzle-orm";
import type { AppDatabase } from "../db/connection";
import { type ContainerSnapshot, containerSnapshots } from "../db/schema";
import type { ContainerRecord } from "../inventory/types";
import { SinkWriteError } from "../lib/errors";

export interface PersistenceSink {
  bulkWrite(items: ContainerRecord[]): Promise<void>;
}

/**
 * Persists the last known state of every container. Each bulk write is one
 * transaction of upserts keyed by container id.
 */
export class SnapshotService implements PersistenceSink {
  constructor(private db: AppDatabase) {}

  async bulkWrite(items: ContainerRecord[]): Promise<void> {
    if (items.length === 0) return;

    try {
      this.db.transaction((tx) => {
        for (const item of items) {
          const row = {
            id: item.id,
            name: item.name,
            image: item.image,
            imageId: item.imageId,
            state: item.state,
            status: item.status,
            createdAt: item.createdAt,
            updatedAt: item.updatedAt,
          };
          tx.insert(containerSnapshots)
            .values(row)
            .onConflictDoUpdate({
              target: containerSnapshots.id,
              set: {
                name: row.name,
                image: row.image,
                imageId: row.imageId,
                state: row.state,
                status: row.status,
                updatedAt: row.updatedAt,
                writeCount: sql`${containerSnapshots.writeCount} + 1`,
              },
            })
            .run();
        }
      });
    } catch (err) {
      throw new SinkWriteError("bulk write failed", items.length, {
        cause: err,
      });
    }
  }

  get(id: string): ContainerSnapshot | undefined {
    return this.db
      .select()
      .from(containerSnapshots)
      .where(eq(containerSnapshots.id, id))
      .get();
  }
}
