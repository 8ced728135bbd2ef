import type { MatchUrlInfo } from '../parsers/url';
import type { MatchPayload } from '../types/payload';
import type { Draft, MatchRecord } from '../validation/schemas';
import { toInt } from './fields';

export interface Score {
  home: number;
  away: number;
}

/** `"3 : 1"` → `{ home: 3, away: 1 }`; anything else → undefined. */
export function parseScore(score: unknown): Score | undefined {
  if (typeof score !== 'string') return undefined;
  const parts = score.trim().split(/\s*:\s*/);
  if (parts.length !== 2 || !parts.every((p) => /^\d+$/.test(p))) return undefined;
  return { home: parseInt(parts[0], 10), away: parseInt(parts[1], 10) };
}

export function extractMatch(payload: MatchPayload, info: MatchUrlInfo): Draft<MatchRecord> {
  const score = parseScore(payload.score);
  return {
    match_id: info.matchId,
    match_date: typeof payload.startDate === 'string' ? payload.startDate.slice(0, 10) : undefined,
    home_score: score?.home,
    away_score: score?.away,
    home_team_name: payload.home.name,
    away_team_name: payload.away.name,
    match_minutes: toInt(payload.maxMinute),
    match_minutes_expanded: toInt(payload.expandedMaxMinute),
    region: info.region,
    competition: info.competition,
    season: info.season,
  };
}
