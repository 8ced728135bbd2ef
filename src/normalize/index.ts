import type { MatchUrlInfo } from '../parsers/url';
import type { MatchPayload } from '../types/payload';
import type { Draft, EventRecord, LineupRecord, MatchRecord, PlayerRecord } from '../validation/schemas';
import { extractEvents } from './events';
import { extractLineups } from './lineups';
import { extractMatch } from './match';
import { extractPlayers } from './players';

export interface NormalizedMatch {
  events: Draft<EventRecord>[];
  players: Draft<PlayerRecord>[];
  match: Draft<MatchRecord>;
  lineups: Draft<LineupRecord>[];
}

/**
 * Split one match-centre payload into the four table shapes.
 * Identity and competition fields come from the URL, never the payload.
 */
export function normalizeMatchPayload(payload: MatchPayload, info: MatchUrlInfo): NormalizedMatch {
  const teams = [payload.home, payload.away];
  return {
    events: extractEvents(payload.events, info.matchId),
    players: extractPlayers(teams),
    match: extractMatch(payload, info),
    lineups: extractLineups(info.matchId, teams),
  };
}
