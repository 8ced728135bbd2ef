import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { logger } from '../utils/logger';
import type { RecordStore, Row, TableName } from './store';

const PAGE_SIZE = 1000;

const RowsSchema = z.array(z.record(z.unknown()));

export class SupabaseStore implements RecordStore {
  constructor(private readonly db: SupabaseClient) {}

  async upsert(table: TableName, rows: Row[], conflictKey: string): Promise<void> {
    if (rows.length === 0) return;

    const { error } = await this.db
      .from(table)
      .upsert(rows, { onConflict: conflictKey });

    if (error) {
      logger.error(`Failed to upsert ${rows.length} ${table} rows: ${error.message}`);
      throw new Error(error.message);
    }
    logger.debug(`Upserted ${rows.length} ${table} rows`);
  }

  async fetchAll(table: TableName, columns: string): Promise<Row[]> {
    const rows: Row[] = [];

    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await this.db
        .from(table)
        .select(columns)
        .range(from, from + PAGE_SIZE - 1);

      if (error) {
        logger.error(`Failed to read ${table}: ${error.message}`);
        throw new Error(error.message);
      }

      const page = RowsSchema.parse(data ?? []);
      rows.push(...page);
      if (page.length < PAGE_SIZE) break;
    }

    logger.debug(`Read ${rows.length} ${table} rows`);
    return rows;
  }
}
