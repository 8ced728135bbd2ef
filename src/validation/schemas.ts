import { z } from 'zod';

const int = z.number().int();
const optionalFloat = z.number().finite().nullable();

export const QualifierSchema = z.record(z.unknown());

export const EventRecordSchema = z.object({
  event_id: int,
  match_id: int,
  minute: int,
  second: optionalFloat,
  expanded_minute: int,
  team_id: int,
  player_id: int,
  related_player_id: optionalFloat,
  x: z.number().finite(),
  y: z.number().finite(),
  end_x: optionalFloat,
  end_y: optionalFloat,
  qualifiers: z.array(QualifierSchema),
  is_touch: z.boolean(),
  blocked_x: optionalFloat,
  blocked_y: optionalFloat,
  goal_mouth_z: optionalFloat,
  goal_mouth_y: optionalFloat,
  is_shot: z.boolean(),
  card_type: z.boolean(),
  is_goal: z.boolean(),
  type: z.string(),
  outcome_type: z.string(),
  period: z.string(),
});

export const PlayerRecordSchema = z.object({
  player_id: int,
  shirt_no: int,
  name: z.string(),
  age: int,
  height: int,
  weight: int,
  team_id: int,
});

export const MatchRecordSchema = z.object({
  match_id: int,
  match_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'must be YYYY-MM-DD'),
  home_score: int,
  away_score: int,
  home_team_name: z.string(),
  away_team_name: z.string(),
  match_minutes: int,
  match_minutes_expanded: int,
  region: z.string().nullable(),
  competition: z.string().nullable(),
  season: z.string().nullable(),
});

export const LineupRecordSchema = z.object({
  match_id: int,
  team_id: int,
  player_id: int,
  player_name: z.string(),
  player_position: z.string(),
  field: z.string(),
  first_eleven: z.boolean(),
  subbed_in_player_id: optionalFloat,
  subbed_out_period: z.string().nullable(),
  subbed_out_expanded_min: optionalFloat,
  subbed_in_period: z.string().nullable(),
  subbed_in_expanded_min: optionalFloat,
  subbed_out_player_id: optionalFloat,
});

export type EventRecord = z.infer<typeof EventRecordSchema>;
export type PlayerRecord = z.infer<typeof PlayerRecordSchema>;
export type MatchRecord = z.infer<typeof MatchRecordSchema>;
export type LineupRecord = z.infer<typeof LineupRecordSchema>;

/** Normalizer output before validation: every column present, values unchecked. */
export type Draft<T> = { [K in keyof T]: unknown };
