import type { RawRecord } from '../types/payload';
import type { Draft, EventRecord } from '../validation/schemas';
import { displayName, toBool, toFloat, toInt } from './fields';

// Payload spelling → column name. Keys already in column form are kept as-is.
const EVENT_FIELD_RENAMES = new Map<string, keyof EventRecord>([
  ['id', 'event_id'],
  ['expandedMinute', 'expanded_minute'],
  ['outcomeType', 'outcome_type'],
  ['isTouch', 'is_touch'],
  ['playerId', 'player_id'],
  ['teamId', 'team_id'],
  ['endX', 'end_x'],
  ['endY', 'end_y'],
  ['blockedX', 'blocked_x'],
  ['blockedY', 'blocked_y'],
  ['goalMouthZ', 'goal_mouth_z'],
  ['goalMouthY', 'goal_mouth_y'],
  ['isShot', 'is_shot'],
  ['isGoal', 'is_goal'],
  ['cardType', 'card_type'],
  ['relatedPlayerId', 'related_player_id'],
]);

// `eventId` is a per-team sequence number; `id` is the stable identifier.
const DROPPED_FIELDS = new Set(['eventId']);

export const EXCLUDED_EVENT_TYPES = new Set(['OffsideGiven']);

function renameFields(raw: RawRecord): RawRecord {
  const renamed: RawRecord = {};
  for (const [key, value] of Object.entries(raw)) {
    if (DROPPED_FIELDS.has(key)) continue;
    renamed[EVENT_FIELD_RENAMES.get(key) ?? key] = value;
  }
  return renamed;
}

/**
 * Events without a player are period markers and other administrative
 * entries, so they are dropped along with excluded types.
 */
export function extractEvents(events: RawRecord[], matchId: number): Draft<EventRecord>[] {
  const drafts: Draft<EventRecord>[] = [];

  for (const raw of events) {
    if (toInt(raw.playerId) === undefined) continue;

    const e = renameFields(raw);
    const type = displayName(e.type);
    if (typeof type === 'string' && EXCLUDED_EVENT_TYPES.has(type)) continue;

    drafts.push({
      event_id: toInt(e.event_id),
      match_id: matchId,
      minute: toInt(e.minute),
      second: toFloat(e.second),
      expanded_minute: toInt(e.expanded_minute),
      team_id: toInt(e.team_id),
      player_id: toInt(e.player_id),
      related_player_id: toFloat(e.related_player_id),
      x: toFloat(e.x),
      y: toFloat(e.y),
      end_x: toFloat(e.end_x),
      end_y: toFloat(e.end_y),
      qualifiers: e.qualifiers ?? [],
      is_touch: e.is_touch,
      blocked_x: toFloat(e.blocked_x),
      blocked_y: toFloat(e.blocked_y),
      goal_mouth_z: toFloat(e.goal_mouth_z),
      goal_mouth_y: toFloat(e.goal_mouth_y),
      is_shot: toBool(e.is_shot, false),
      // The payload carries a card descriptor only on booking events.
      card_type: toBool(e.card_type, false),
      is_goal: toBool(e.is_goal, false),
      type,
      outcome_type: displayName(e.outcome_type),
      period: displayName(e.period),
    });
  }

  return drafts;
}
