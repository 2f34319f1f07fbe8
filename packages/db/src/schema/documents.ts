import { pgTable, text, timestamp, jsonb, integer, pgEnum } from "drizzle-orm/pg-core";

export const documentStatusEnum = pgEnum("document_status", [
  "pending",
  "chunked",
  "indexed",
  "failed",
  "cancelled",
]);

export const documents = pgTable("documents", {
  id: text("id").primaryKey(),
  sourcePath: text("source_path").notNull(),
  mimeType: text("mime_type").notNull().default("text/plain"),
  permissions: jsonb("permissions").$type<string[]>().notNull().default([]),
  status: documentStatusEnum("status").notNull().default("pending"),
  chunkCount: integer("chunk_count").notNull().default(0),
  error: text("error"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});
