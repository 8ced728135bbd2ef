import type { RecordStore, Row, TableName } from './store';

/** In-process store with upsert semantics; backs `--dry-run` and the tests. */
export class MemoryStore implements RecordStore {
  private readonly tables = new Map<TableName, Map<string, Row>>();

  async upsert(table: TableName, rows: Row[], conflictKey: string): Promise<void> {
    const columns = conflictKey.split(',').map((c) => c.trim());
    const stored = this.table(table);

    for (const row of rows) {
      const key = JSON.stringify(columns.map((c) => row[c] ?? null));
      stored.set(key, { ...stored.get(key), ...row });
    }
  }

  async fetchAll(table: TableName, columns: string): Promise<Row[]> {
    const rows = this.rows(table);
    if (columns.trim() === '*') return rows;

    const wanted = columns.split(',').map((c) => c.trim());
    return rows.map((row) => Object.fromEntries(wanted.map((c) => [c, row[c] ?? null])));
  }

  rows(table: TableName): Row[] {
    return [...this.table(table).values()].map((row) => ({ ...row }));
  }

  count(table: TableName): number {
    return this.table(table).size;
  }

  private table(name: TableName): Map<string, Row> {
    let stored = this.tables.get(name);
    if (!stored) {
      stored = new Map();
      this.tables.set(name, stored);
    }
    return stored;
  }
}
