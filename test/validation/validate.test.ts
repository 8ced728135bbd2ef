import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SchemaError } from '../../src/errors';
import { normalizeMatchPayload } from '../../src/normalize';
import { decodeMatchPayload } from '../../src/parsers/payload';
import { parseMatchUrl } from '../../src/parsers/url';
import { PlayerRecordSchema } from '../../src/validation/schemas';
import { validateMatch, validateRecord } from '../../src/validation/validate';
import { buildPayload, MATCH_URL } from '../helpers/payload';

function normalize(payload: Record<string, unknown>) {
  const info = parseMatchUrl(MATCH_URL);
  return normalizeMatchPayload(decodeMatchPayload(payload, info.matchId), info);
}

function schemaError(kind: string, field: string) {
  return (err: unknown) => err instanceof SchemaError && err.kind === kind && err.field === field && err.matchId === 1821689;
}

describe('validateMatch', () => {
  it('accepts a complete match', () => {
    const records = validateMatch(normalize(buildPayload()), 1821689);
    assert.equal(records.events.length, 3);
    assert.equal(records.players.length, 4);
    assert.equal(records.lineups.length, 4);
    assert.equal(records.match.home_score, 3);
  });

  it('rejects an event without coordinates', () => {
    const normalized = normalize(buildPayload());
    normalized.events[0] = { ...normalized.events[0], x: null };
    assert.throws(() => validateMatch(normalized, 1821689), schemaError('event', 'x'));
  });

  it('rejects a match without a score', () => {
    const payload = { ...buildPayload(), score: 'vs' };
    assert.throws(() => validateMatch(normalize(payload), 1821689), schemaError('match', 'home_score'));
  });

  it('rejects a date that is not a calendar day', () => {
    const payload = { ...buildPayload(), startDate: 'soon' };
    assert.throws(() => validateMatch(normalize(payload), 1821689), schemaError('match', 'match_date'));
  });
});

describe('validateMatch uniqueness', () => {
  it('rejects an event id repeated within the match', () => {
    const payload = buildPayload();
    const events = decodeMatchPayload(payload, 1821689).events;
    const repeated = { ...payload, events: [...events, events[1]] };
    assert.throws(
      () => validateMatch(normalize(repeated), 1821689),
      { name: 'SchemaError', message: 'Invalid event record for match 1821689: event_id duplicate 9002' }
    );
  });

  it('rejects a player listed twice', () => {
    const payload = buildPayload();
    const { home } = decodeMatchPayload(payload, 1821689);
    const repeated = { ...payload, home: { ...home, players: [...home.players, home.players[0]] } };
    assert.throws(() => validateMatch(normalize(repeated), 1821689), schemaError('player', 'player_id'));
  });

  it('rejects a lineup row repeated for the same team and player', () => {
    const normalized = normalize(buildPayload());
    normalized.lineups.push({ ...normalized.lineups[0] });
    assert.throws(
      () => validateMatch(normalized, 1821689),
      { name: 'SchemaError', message: 'Invalid lineup record for match 1821689: team_id,player_id duplicate 13/101' }
    );
  });

  it('keys lineup rows on team and player', () => {
    const records = validateMatch(normalize(buildPayload()), 1821689);
    assert.deepEqual(
      records.lineups.map((l) => `${l.team_id}/${l.player_id}`),
      ['13/101', '13/102', '13/103', '15/201']
    );
  });
});

describe('validateRecord', () => {
  it('drops keys the table does not have', () => {
    const record = validateRecord(
      PlayerRecordSchema,
      'player',
      { player_id: 1, shirt_no: 2, name: 'Test Player', age: 20, height: 180, weight: 70, team_id: 3, extra: true },
      1821689
    );
    assert.deepEqual(record, { player_id: 1, shirt_no: 2, name: 'Test Player', age: 20, height: 180, weight: 70, team_id: 3 });
  });

  it('reports the first failing field in the message', () => {
    assert.throws(
      () => validateRecord(PlayerRecordSchema, 'player', { player_id: 1 }, 1821689),
      { name: 'SchemaError', message: 'Invalid player record for match 1821689: shirt_no Required' }
    );
  });
});
