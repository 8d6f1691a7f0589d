import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

// -- container snapshots (last known state per container) -----
export const containerSnapshots = sqliteTable("container_snapshots", {
  id: text("id").primaryKey(),
  name: text("name").notNull(),
  image: text("image").notNull(),
  imageId: text("image_id").notNull(),
  state: text("state", { enum: ["running", "stopped", "removed"] }).notNull(),
  status: text("status").notNull(),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at").notNull(),
  writeCount: integer("write_count").notNull().default(1),
});

export type ContainerSnapshot = typeof containerSnapshots.$inferSelect;
