import type { TeamBlock } from '../types/payload';
import type { Draft, PlayerRecord } from '../validation/schemas';
import { toInt } from './fields';

export function extractPlayers(teams: TeamBlock[]): Draft<PlayerRecord>[] {
  return teams.flatMap((team) => {
    const teamId = toInt(team.teamId);
    return team.players.map((player) => ({
      player_id: toInt(player.playerId),
      shirt_no: toInt(player.shirtNo),
      name: player.name,
      age: toInt(player.age),
      height: toInt(player.height),
      weight: toInt(player.weight),
      team_id: teamId,
    }));
  });
}
