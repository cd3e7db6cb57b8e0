import type pg from 'pg';

export const DDL_CREATE_SEGMENTS_TABLE = `
CREATE TABLE IF NOT EXISTS segments (
  segment_id   UUID         PRIMARY KEY,
  name         VARCHAR(255) NOT NULL,
  filters      JSONB        NOT NULL,
  created_at   TIMESTAMPTZ  NOT NULL DEFAULT NOW()
)
`.trim();

export const DDL_CREATE_CREATED_AT_INDEX = `
CREATE INDEX IF NOT EXISTS idx_segments_created_at
  ON segments (created_at)
`.trim();

export async function applySchema(client: pg.ClientBase): Promise<void> {
  await client.query(DDL_CREATE_SEGMENTS_TABLE);
  await client.query(DDL_CREATE_CREATED_AT_INDEX);
}
