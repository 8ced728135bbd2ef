export interface CompetitionPolicy {
  /** Stages of the season to walk; all stages when omitted. */
  includeStage?: (label: string) => boolean;
}

export interface LeagueNameOverride {
  hrefIncludes: string;
  name: string;
}

const groupOrFinalStage = (label: string) =>
  label.includes('Group Stages') || label.includes('Final Stage');

export const COMPETITION_POLICIES: Record<string, CompetitionPolicy> = {
  'Champions League': { includeStage: groupOrFinalStage },
  'Europa League': { includeStage: groupOrFinalStage },
  // Conference groups duplicate the regular-season fixtures.
  'Major League Soccer': { includeStage: (label) => !label.includes('Grp. ') },
};

// The popular-tournaments list labels the Russian top flight as plain "Premier League".
export const LEAGUE_NAME_OVERRIDES: LeagueNameOverride[] = [
  { hrefIncludes: 'Russia', name: 'Russian Premier League' },
];

export function shouldVisitStage(
  competition: string,
  label: string,
  policies: Record<string, CompetitionPolicy> = COMPETITION_POLICIES
): boolean {
  const policy = policies[competition];
  return policy?.includeStage ? policy.includeStage(label) : true;
}

export function leagueDisplayName(
  name: string,
  href: string,
  overrides: LeagueNameOverride[] = LEAGUE_NAME_OVERRIDES
): string {
  return overrides.find((o) => href.includes(o.hrefIncludes))?.name ?? name;
}
