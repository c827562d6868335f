import { z } from "zod";
import { pgTable, text, uuid, timestamp, varchar, index } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";

// Uploaded videos. `videoUrl` holds the "{bucket},{key}" object reference, never a
// playable URL; playback URLs are signed per read.
export const videos = pgTable(
  "videos",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    userId: varchar("user_id", { length: 255 }).notNull(),
    title: varchar("title", { length: 200 }).notNull(),
    description: text("description").notNull().default(""),
    thumbnailUrl: varchar("thumbnail_url", { length: 1000 }),
    videoUrl: varchar("video_url", { length: 1000 }),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => ({
    userIdx: index("IDX_videos_user").on(table.userId, table.createdAt),
  })
);

export const insertVideoSchema = createInsertSchema(videos, {
  title: (schema) => schema.title.trim().min(1).max(200),
  description: (schema) => schema.description.max(5000),
}).pick({
  title: true,
  description: true,
});

export type VideoRow = typeof videos.$inferSelect;
export type InsertVideoRow = typeof videos.$inferInsert;
export type CreateVideoInput = z.infer<typeof insertVideoSchema>;
