import type { TeamBlock } from '../types/payload';
import type { Draft, LineupRecord } from '../validation/schemas';
import { displayName, toBool, toFloat, toInt } from './fields';

export function extractLineups(matchId: number, teams: TeamBlock[]): Draft<LineupRecord>[] {
  return teams.flatMap((team) => {
    const teamId = toInt(team.teamId);
    return team.players.map((player) => ({
      match_id: matchId,
      team_id: teamId,
      player_id: toInt(player.playerId),
      player_name: player.name,
      player_position: player.position,
      field: player.field,
      first_eleven: toBool(player.isFirstEleven, false),
      subbed_in_player_id: toFloat(player.subbedInPlayerId),
      subbed_out_period: displayName(player.subbedOutPeriod),
      subbed_out_expanded_min: toFloat(player.subbedOutExpandedMinute),
      subbed_in_period: displayName(player.subbedInPeriod),
      subbed_in_expanded_min: toFloat(player.subbedInExpandedMinute),
      subbed_out_player_id: toFloat(player.subbedOutPlayerId),
    }));
  });
}
