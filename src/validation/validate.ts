import type { z } from 'zod';
import { RecordKind, SchemaError } from '../errors';
import type { NormalizedMatch } from '../normalize';
import {
  EventRecord,
  EventRecordSchema,
  LineupRecord,
  LineupRecordSchema,
  MatchRecord,
  MatchRecordSchema,
  PlayerRecord,
  PlayerRecordSchema,
} from './schemas';

export interface ValidatedMatch {
  events: EventRecord[];
  players: PlayerRecord[];
  match: MatchRecord;
  lineups: LineupRecord[];
}

export function validateRecord<S extends z.ZodTypeAny>(
  schema: S,
  kind: RecordKind,
  draft: unknown,
  matchId: number
): z.infer<S> {
  const result = schema.safeParse(draft);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new SchemaError(kind, issue.path.join('.') || '(root)', matchId, issue.message);
  }
  return result.data;
}

// One upsert cannot touch the same conflict key twice, so repeats are rejected here.
function assertUnique<T>(
  records: T[],
  key: (record: T) => string | number,
  kind: RecordKind,
  field: string,
  matchId: number
): T[] {
  const seen = new Set<string | number>();
  for (const record of records) {
    const value = key(record);
    if (seen.has(value)) {
      throw new SchemaError(kind, field, matchId, `duplicate ${value}`);
    }
    seen.add(value);
  }
  return records;
}

/** Validate every record of one match; the first violation aborts the match. */
export function validateMatch(normalized: NormalizedMatch, matchId: number): ValidatedMatch {
  const events = normalized.events.map((e) => validateRecord(EventRecordSchema, 'event', e, matchId));
  const players = normalized.players.map((p) => validateRecord(PlayerRecordSchema, 'player', p, matchId));
  const match = validateRecord(MatchRecordSchema, 'match', normalized.match, matchId);
  const lineups = normalized.lineups.map((l) => validateRecord(LineupRecordSchema, 'lineup', l, matchId));

  return {
    events: assertUnique(events, (e) => e.event_id, 'event', 'event_id', matchId),
    players: assertUnique(players, (p) => p.player_id, 'player', 'player_id', matchId),
    match,
    lineups: assertUnique(lineups, (l) => `${l.team_id}/${l.player_id}`, 'lineup', 'team_id,player_id', matchId),
  };
}
