import pg from 'pg';
import { PostgresSegmentRepository } from './segments/postgres-repository.js';
import type { SegmentRepository } from './segments/repository.js';

export function createRepository(connectionString: string): SegmentRepository {
  return new PostgresSegmentRepository({ pool: new pg.Pool({ connectionString }) });
}
