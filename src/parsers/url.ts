import { ParseError } from '../errors';
import { logger } from '../utils/logger';

export interface MatchUrlInfo {
  matchId: number;
  region: string | null;
  competition: string | null;
  season: string | null;
}

// /England-Premier-League-2023-2024-Arsenal-Chelsea → England / Premier-League / 2023-2024
const COMPETITION_PATTERN = /\/([^/-]+)-([^/]+)-(\d{4}-\d{4})-/;

/**
 * Match pages look like `/Matches/{id}/Live/{Region}-{Competition}-{Season}-{Home}-{Away}`,
 * so the id is always the third segment from the end.
 */
export function parseMatchId(url: string): number {
  const segments = url.split('/');
  const raw = segments[segments.length - 3];
  if (raw === undefined || !/^\d+$/.test(raw)) {
    throw new ParseError(`No match id in URL path`, url);
  }
  return parseInt(raw, 10);
}

export function parseMatchUrl(url: string): MatchUrlInfo {
  const matchId = parseMatchId(url);
  const match = url.match(COMPETITION_PATTERN);
  if (!match) {
    logger.warn(`Region/competition/season pattern not found in URL: ${url}`);
    return { matchId, region: null, competition: null, season: null };
  }
  return { matchId, region: match[1], competition: match[2], season: match[3] };
}
