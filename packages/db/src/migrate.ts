import { sql } from "drizzle-orm";
import type { DbClient } from "./client.js";

/**
 * DDL for the documents and chunks tables, one statement per entry. Every
 * statement is idempotent so the list can run at each worker start.
 */
const SCHEMA_STATEMENTS = [
  `
    DO $$ BEGIN
      CREATE TYPE document_status AS ENUM ('pending', 'chunked', 'indexed', 'failed', 'cancelled');
      EXCEPTION WHEN duplicate_object THEN NULL;
    END $$;
  `,
  `
    DO $$ BEGIN
      CREATE TYPE chunk_type AS ENUM ('paragraph', 'table', 'image', 'mixed');
      EXCEPTION WHEN duplicate_object THEN NULL;
    END $$;
  `,
  `
    CREATE TABLE IF NOT EXISTS documents (
      id text PRIMARY KEY,
      source_path text NOT NULL,
      mime_type text NOT NULL DEFAULT 'text/plain',
      permissions jsonb NOT NULL DEFAULT '[]'::jsonb,
      status document_status NOT NULL DEFAULT 'pending',
      chunk_count integer NOT NULL DEFAULT 0,
      error text,
      created_at timestamptz NOT NULL DEFAULT now(),
      updated_at timestamptz NOT NULL DEFAULT now()
    );
  `,
  `
    CREATE TABLE IF NOT EXISTS chunks (
      id text PRIMARY KEY,
      document_id text NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
      order_index integer NOT NULL,
      type chunk_type NOT NULL,
      text text NOT NULL,
      token_estimate integer NOT NULL,
      page integer,
      pages jsonb NOT NULL,
      section_path jsonb NOT NULL,
      permissions jsonb NOT NULL,
      oversized boolean NOT NULL DEFAULT false,
      overlap integer NOT NULL DEFAULT 0,
      source_block_ids jsonb NOT NULL,
      row_start integer,
      row_end integer,
      image_handle text,
      delivered_at timestamptz,
      created_at timestamptz NOT NULL DEFAULT now()
    );
  `,
  `
    CREATE UNIQUE INDEX IF NOT EXISTS chunks_document_order_idx ON chunks (document_id, order_index);
  `,
  `
    CREATE INDEX IF NOT EXISTS chunks_undelivered_idx ON chunks (document_id, delivered_at);
  `,
];

export function getSchemaStatements(): string[] {
  return SCHEMA_STATEMENTS.map((statement) => statement.trim());
}

export async function applySchema(db: DbClient): Promise<void> {
  for (const statement of getSchemaStatements()) {
    await db.execute(sql.raw(statement));
  }
}
