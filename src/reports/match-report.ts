import { z } from 'zod';
import type { RecordStore } from '../db/store';

const StoredMatchSchema = z.object({
  match_id: z.number(),
  match_date: z.string(),
  home_team_name: z.string(),
  away_team_name: z.string(),
  home_score: z.number(),
  away_score: z.number(),
  competition: z.string().nullable(),
  season: z.string().nullable(),
});

const StoredEventSchema = z.object({
  match_id: z.number(),
  is_shot: z.boolean(),
  is_goal: z.boolean(),
});

export interface MatchReportRow {
  matchId: number;
  date: string;
  fixture: string;
  score: string;
  events: number;
  shots: number;
  goals: number;
}

// Stored competition/season come from the URL slug: "Premier-League", "2023-2024".
function toSlugForm(value: string): string {
  return value.trim().replace(/[\s/]+/g, '-');
}

export interface ReportFilter {
  competition?: string;
  season?: string;
}

/** Per-match event, shot and goal totals for what is already stored, oldest first. */
export async function buildMatchReport(store: RecordStore, filter: ReportFilter = {}): Promise<MatchReportRow[]> {
  const competition = filter.competition && toSlugForm(filter.competition);
  const season = filter.season && toSlugForm(filter.season);

  const matches = z
    .array(StoredMatchSchema)
    .parse(await store.fetchAll('matches', Object.keys(StoredMatchSchema.shape).join(',')))
    .filter((m) => !competition || m.competition === competition)
    .filter((m) => !season || m.season === season);

  const events = z
    .array(StoredEventSchema)
    .parse(await store.fetchAll('events', Object.keys(StoredEventSchema.shape).join(',')));

  const totals = new Map<number, { events: number; shots: number; goals: number }>();
  for (const event of events) {
    const t = totals.get(event.match_id) ?? { events: 0, shots: 0, goals: 0 };
    t.events++;
    if (event.is_shot) t.shots++;
    if (event.is_goal) t.goals++;
    totals.set(event.match_id, t);
  }

  return matches
    .sort((a, b) => a.match_date.localeCompare(b.match_date) || a.match_id - b.match_id)
    .map((m) => {
      const t = totals.get(m.match_id) ?? { events: 0, shots: 0, goals: 0 };
      return {
        matchId: m.match_id,
        date: m.match_date,
        fixture: `${m.home_team_name} vs ${m.away_team_name}`,
        score: `${m.home_score} : ${m.away_score}`,
        ...t,
      };
    });
}
