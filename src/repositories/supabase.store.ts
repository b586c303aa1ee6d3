import { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { AtomicStore, TransactFn, TransactResult } from '../types/store.types';
import { AppError, ErrorCode } from '../types/error.types';
import { logger } from '../config/logger';

// Database row (record is validated separately by `parse`)
const storeRowSchema = z.object({
  id: z.string(),
  version: z.number().int(),
  record: z.unknown(),
});

type StoreRow = z.infer<typeof storeRowSchema>;

const UNIQUE_VIOLATION = '23505';

/**
 * Supabase-backed AtomicStore
 *
 * Table layout (see sql/listings.sql): `id text primary key, version int, record jsonb`.
 *
 * Concurrency approach:
 * - `transact` reads (record, version), computes the next record, then issues
 *   `UPDATE ... WHERE id = $1 AND version = $read` bumping the version
 * - Zero updated rows means another writer got there first → `conflict`
 * - Creating an absent key is an INSERT; a unique violation is also a `conflict`
 *
 * Records are validated with `parse` when read, so a malformed row surfaces as a fault.
 */
export class SupabaseAtomicStore<T> implements AtomicStore<T> {
  constructor(
    private client: SupabaseClient,
    private table: string,
    private parse: (raw: unknown) => T
  ) {}

  async get(key: string): Promise<T | null> {
    const row = await this.findRow(key);
    return row ? this.parse(row.record) : null;
  }

  async put(key: string, value: T): Promise<void> {
    const existing = await this.findRow(key);

    const { error } = await this.client.from(this.table).upsert({
      id: key,
      version: (existing?.version ?? 0) + 1,
      record: value,
      updated_at: new Date().toISOString(),
    });

    if (error) {
      logger.error('Failed to write record', { table: this.table, key, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to write record: ${error.message}`, 500);
    }
  }

  async transact(key: string, fn: TransactFn<T>): Promise<TransactResult<T>> {
    const row = await this.findRow(key);
    const current = row ? this.parse(row.record) : null;

    const next = fn(current);
    if (next === null) {
      return { status: 'aborted' };
    }

    if (!row) {
      return this.insertIfAbsent(key, next);
    }

    const { data, error } = await this.client
      .from(this.table)
      .update({
        version: row.version + 1,
        record: next,
        updated_at: new Date().toISOString(),
      })
      .eq('id', key)
      .eq('version', row.version)
      .select('id, version, record');

    if (error) {
      logger.error('Failed to commit transaction', { table: this.table, key, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to commit transaction: ${error.message}`, 500);
    }

    if (!Array.isArray(data) || data.length === 0) {
      logger.debug('Transaction conflict', { table: this.table, key, readVersion: row.version });
      return { status: 'conflict' };
    }

    return { status: 'committed', value: next };
  }

  async list(): Promise<T[]> {
    const { data, error } = await this.client.from(this.table).select('id, version, record');

    if (error) {
      logger.error('Failed to list records', { table: this.table, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to list records: ${error.message}`, 500);
    }

    return z
      .array(storeRowSchema)
      .parse(data ?? [])
      .map((row) => this.parse(row.record));
  }

  private async insertIfAbsent(key: string, value: T): Promise<TransactResult<T>> {
    const { error } = await this.client.from(this.table).insert({
      id: key,
      version: 1,
      record: value,
      updated_at: new Date().toISOString(),
    });

    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        return { status: 'conflict' };
      }
      logger.error('Failed to insert record', { table: this.table, key, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to insert record: ${error.message}`, 500);
    }

    return { status: 'committed', value };
  }

  private async findRow(key: string): Promise<StoreRow | null> {
    const { data, error } = await this.client
      .from(this.table)
      .select('id, version, record')
      .eq('id', key)
      .maybeSingle();

    if (error) {
      logger.error('Failed to read record', { table: this.table, key, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to read record: ${error.message}`, 500);
    }

    return data ? storeRowSchema.parse(data) : null;
  }
}
