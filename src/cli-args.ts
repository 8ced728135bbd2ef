export const COMMANDS = ['leagues', 'matches', 'scrape', 'team', 'match', 'report'] as const;
export type Command = (typeof COMMANDS)[number];
export type BrowserCommand = Exclude<Command, 'report'>;

export interface CliArgs {
  command: string;
  competition?: string;
  season?: string;
  url?: string;
  limit?: number;
  headed: boolean;
  debug: boolean;
  dryRun: boolean;
}

/** What a browser command will crawl, resolved before any browser starts. */
export type CrawlTarget =
  | { kind: 'leagues' }
  | { kind: 'competition'; competition: string; season: string }
  | { kind: 'match'; url: string }
  | { kind: 'team'; url: string };

export function parseArgs(argv: string[] = process.argv.slice(2)): CliArgs {
  const result: CliArgs = {
    command: argv[0] || '',
    headed: false,
    debug: false,
    dryRun: false,
  };

  for (let i = 1; i < argv.length; i++) {
    switch (argv[i]) {
      case '--competition':
        result.competition = argv[++i];
        break;
      case '--season':
        result.season = argv[++i];
        break;
      case '--url':
        result.url = argv[++i];
        break;
      case '--limit':
        result.limit = parseInt(argv[++i], 10);
        break;
      case '--headed':
        result.headed = true;
        break;
      case '--debug':
        result.debug = true;
        break;
      case '--dry-run':
        result.dryRun = true;
        break;
    }
  }

  return result;
}

export function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

export function requireOption(value: string | undefined, flag: string): string {
  if (!value) throw new Error(`Missing required option ${flag}`);
  return value;
}

export async function resolveTarget(
  command: BrowserCommand,
  args: CliArgs,
  promptForUrl: () => Promise<string>
): Promise<CrawlTarget> {
  switch (command) {
    case 'leagues':
      return { kind: 'leagues' };
    case 'match':
      return { kind: 'match', url: requireOption(args.url, '--url') };
    case 'team':
      return { kind: 'team', url: requireOption(args.url || (await promptForUrl()), '--url') };
    case 'matches':
    case 'scrape':
      return {
        kind: 'competition',
        competition: requireOption(args.competition, '--competition'),
        season: requireOption(args.season, '--season'),
      };
  }
}
