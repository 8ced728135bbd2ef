import { load } from 'cheerio';
import { ParseError } from '../errors';
import { errorMessage } from '../utils/retry';
import { MatchPayload, MatchPayloadSchema } from '../types/payload';
import { validateRecord } from '../validation/validate';

export const PAYLOAD_MARKER = 'matchCentreData';

const ASSIGNMENT = `${PAYLOAD_MARKER}: `;
const TERMINATOR = ',\n';

export type PayloadResult =
  | { found: true; payload: unknown }
  | { found: false };

/**
 * Pull the inline match-centre JSON out of a rendered match page.
 *
 * A page without the marker script (or with a `null` assignment, which the
 * site emits for fixtures not yet played) yields `{ found: false }`.
 * A marker script that cannot be decoded throws ParseError.
 */
export function extractMatchPayload(html: string, url: string): PayloadResult {
  const $ = load(html);
  const script = $('script')
    .toArray()
    .map((el) => $(el).text())
    .find((text) => text.includes(PAYLOAD_MARKER));

  if (script === undefined) {
    return { found: false };
  }

  const start = script.indexOf(ASSIGNMENT);
  if (start < 0) {
    throw new ParseError(`Found ${PAYLOAD_MARKER} script without an assignment`, url);
  }

  const body = script.slice(start + ASSIGNMENT.length);
  const end = body.indexOf(TERMINATOR);
  if (end < 0) {
    throw new ParseError(`Unterminated ${PAYLOAD_MARKER} assignment`, url);
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(body.slice(0, end));
  } catch (err) {
    throw new ParseError(`Malformed ${PAYLOAD_MARKER} JSON: ${errorMessage(err)}`, url, err);
  }

  if (decoded === null) {
    return { found: false };
  }
  return { found: true, payload: decoded };
}

export function decodeMatchPayload(raw: unknown, matchId: number): MatchPayload {
  return validateRecord(MatchPayloadSchema, 'payload', raw, matchId);
}
