import type pg from 'pg';
import { SegmentStoreError } from '../domain/errors.js';
import type { Segment } from '../domain/segment.js';
import type { SegmentRepository } from './repository.js';
import { applySchema } from './schema.js';
import { mapRow } from './row-mapper.js';
import type { SegmentRow } from './row-mapper.js';

export interface SegmentRepositoryConfig {
  pool: pg.Pool;
}

const SELECT_COLUMNS = 'segment_id, name, filters, created_at';

export class PostgresSegmentRepository implements SegmentRepository {
  private readonly pool: pg.Pool;

  constructor(config: SegmentRepositoryConfig) {
    this.pool = config.pool;
  }

  async initializeSchema(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await applySchema(client);
    } finally {
      client.release();
    }
  }

  async insert(segment: Segment): Promise<Segment> {
    const sql = `INSERT INTO segments (segment_id, name, filters, created_at)
      VALUES ($1, $2, $3::jsonb, $4)
      RETURNING ${SELECT_COLUMNS}`;
    const params = [segment.segmentId, segment.name, JSON.stringify(segment.filters), segment.createdAt];
    const rows = await this.run(sql, params, 'Failed to insert segment');
    const row = rows[0];
    if (row === undefined) {
      throw new SegmentStoreError(`Insert of segment '${segment.segmentId}' returned no row`);
    }
    return mapRow(row);
  }

  async findById(segmentId: string): Promise<Segment | null> {
    const rows = await this.run(
      `SELECT ${SELECT_COLUMNS} FROM segments WHERE segment_id = $1`,
      [segmentId],
      'Failed to load segment',
    );
    const row = rows[0];
    return row === undefined ? null : mapRow(row);
  }

  async list(): Promise<Segment[]> {
    const rows = await this.run(
      `SELECT ${SELECT_COLUMNS} FROM segments ORDER BY created_at ASC, segment_id ASC`,
      [],
      'Failed to list segments',
    );
    return rows.map(mapRow);
  }

  async delete(segmentId: string): Promise<boolean> {
    let result: pg.QueryResult;
    try {
      result = await this.pool.query('DELETE FROM segments WHERE segment_id = $1', [segmentId]);
    } catch (err) {
      throw new SegmentStoreError(`Failed to delete segment: ${String(err)}`, err);
    }
    return result.rowCount !== null && result.rowCount > 0;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async run(sql: string, params: unknown[], failure: string): Promise<SegmentRow[]> {
    let result: pg.QueryResult<SegmentRow>;
    try {
      result = await this.pool.query<SegmentRow>(sql, params);
    } catch (err) {
      throw new SegmentStoreError(`${failure}: ${String(err)}`, err);
    }
    return result.rows;
  }
}
