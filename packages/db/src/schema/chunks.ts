import {
  pgTable,
  text,
  timestamp,
  jsonb,
  integer,
  boolean,
  pgEnum,
  uniqueIndex,
  index,
} from "drizzle-orm/pg-core";
import { documents } from "./documents.js";

export const chunkTypeEnum = pgEnum("chunk_type", ["paragraph", "table", "image", "mixed"]);

export const chunks = pgTable(
  "chunks",
  {
    id: text("id").primaryKey(),
    documentId: text("document_id")
      .notNull()
      .references(() => documents.id, { onDelete: "cascade" }),
    orderIndex: integer("order_index").notNull(),
    type: chunkTypeEnum("type").notNull(),
    text: text("text").notNull(),
    tokenEstimate: integer("token_estimate").notNull(),
    page: integer("page"),
    pages: jsonb("pages").$type<number[]>().notNull(),
    sectionPath: jsonb("section_path").$type<string[]>().notNull(),
    permissions: jsonb("permissions").$type<string[]>().notNull(),
    oversized: boolean("oversized").notNull().default(false),
    overlap: integer("overlap").notNull().default(0),
    sourceBlockIds: jsonb("source_block_ids").$type<string[]>().notNull(),
    rowStart: integer("row_start"),
    rowEnd: integer("row_end"),
    imageHandle: text("image_handle"),
    // Delivery ledger: set once, when the chunk is claimed for embedding
    deliveredAt: timestamp("delivered_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    documentOrderIdx: uniqueIndex("chunks_document_order_idx").on(table.documentId, table.orderIndex),
    undeliveredIdx: index("chunks_undelivered_idx").on(table.documentId, table.deliveredAt),
  }),
);
