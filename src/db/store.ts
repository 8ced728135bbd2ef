export type Row = Record<string, unknown>;

export type TableName = 'events' | 'players' | 'matches' | 'lineups';

/** Natural key each table is upserted on. */
export const CONFLICT_KEYS: Record<TableName, string> = {
  events: 'event_id',
  players: 'player_id',
  matches: 'match_id',
  lineups: 'match_id,team_id,player_id',
};

export interface RecordStore {
  /** Insert-or-update on `conflictKey`; repeating a call leaves the same state. */
  upsert(table: TableName, rows: Row[], conflictKey: string): Promise<void>;
  fetchAll(table: TableName, columns: string): Promise<Row[]>;
}
