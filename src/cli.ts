#!/usr/bin/env node
import { createInterface } from 'node:readline/promises';
import { ENV } from './config/env';
import { launchBrowser } from './browser/launcher';
import type { WebSession } from './browser/session';
import { createSupabase } from './db/client';
import { MemoryStore } from './db/memory';
import type { RecordStore } from './db/store';
import { SupabaseStore } from './db/writer';
import { CompetitionNavigator } from './navigation/navigator';
import { BatchSummary, ScrapeOrchestrator } from './pipeline/orchestrator';
import { buildMatchReport } from './reports/match-report';
import { BrowserCommand, CliArgs, isCommand, parseArgs, resolveTarget } from './cli-args';
import { logger } from './utils/logger';
import { errorMessage } from './utils/retry';

// ── Wiring ──

function createStore(dryRun: boolean): RecordStore {
  if (dryRun) {
    logger.info('Dry run: records are kept in memory only');
    return new MemoryStore();
  }
  return new SupabaseStore(createSupabase());
}

function createNavigator(session: WebSession): CompetitionNavigator {
  return new CompetitionNavigator(session, {
    baseUrl: ENV.BASE_URL,
    renderDelayMs: ENV.RENDER_DELAY_MS,
    paginationDelayMs: ENV.PAGINATION_DELAY_MS,
    noDataTitle: ENV.NO_DATA_TITLE,
    maxPages: ENV.MAX_LISTING_PAGES,
  });
}

function createOrchestrator(session: WebSession, store: RecordStore): ScrapeOrchestrator {
  return new ScrapeOrchestrator(session, store, {
    matchDelayMs: ENV.MATCH_DELAY_MS,
    matchTimeoutMs: ENV.MATCH_TIMEOUT_MS,
    navigationRetries: ENV.MAX_RETRIES,
    retryDelayMs: ENV.RETRY_DELAY_MS,
  });
}

async function promptForUrl(): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question('Team fixtures URL: ')).trim();
  } finally {
    rl.close();
  }
}

function logSummary(summary: BatchSummary): number {
  logger.info(`\n${'='.repeat(60)}`);
  logger.info('Scrape Complete!');
  logger.info(`${'='.repeat(60)}`);
  logger.info(`Matches: ${summary.total}`);
  logger.info(`Stored: ${summary.stored}`);
  logger.info(`No match centre data: ${summary.noPayload}`);

  if (summary.failures.length > 0) {
    logger.warn(`Batch completed with ${summary.failures.length} per-match failures`);
    for (const failure of summary.failures) {
      logger.warn(`  ${failure.url}: ${failure.error}`);
    }
    return 2;
  }
  return 0;
}

// ── Commands ──

async function runReport(args: CliArgs): Promise<number> {
  const rows = await buildMatchReport(createStore(args.dryRun), {
    competition: args.competition,
    season: args.season,
  });
  for (const row of rows) {
    logger.info(`${row.date} ${row.fixture} ${row.score} | events ${row.events} | shots ${row.shots} | goals ${row.goals}`);
  }
  logger.info(`${rows.length} matches`);
  return 0;
}

async function runBrowserCommand(command: BrowserCommand, args: CliArgs): Promise<number> {
  const target = await resolveTarget(command, args, promptForUrl);
  const store = command === 'leagues' || command === 'matches' ? null : createStore(args.dryRun);
  const browser = await launchBrowser(args.headed);

  try {
    const navigator = createNavigator(browser.session);

    if (target.kind === 'leagues') {
      for (const [name, url] of await navigator.listCompetitions()) {
        logger.info(`${name}: ${url}`);
      }
      return 0;
    }

    let urls: string[];
    if (target.kind === 'match') {
      urls = [target.url];
    } else if (target.kind === 'team') {
      urls = await navigator.collectTeamFixtures(target.url);
    } else {
      urls = await navigator.collectCompetition(target.competition, target.season);
    }

    if (args.limit !== undefined && args.limit > 0) {
      urls = urls.slice(0, args.limit);
    }

    if (!store) {
      for (const url of urls) logger.info(url);
      return 0;
    }

    const summary = await createOrchestrator(browser.session, store).run(urls);
    return logSummary(summary);
  } finally {
    await browser.close();
  }
}

function printUsage(): void {
  console.log(`
Usage: npm run cli -- <command> [options]

Commands:
  leagues           List competitions on the league index
  matches           List match URLs for a competition season
  scrape            Scrape every match of a competition season
  team              Scrape the fixtures on a team fixtures page (prompts for the URL)
  match             Scrape a single match centre URL
  report            Summarise stored matches and events

Options:
  --competition "Name"   Competition as listed on the league index
  --season "2023/2024"   Season label as shown in the season selector
  --url <url>            Match URL (match) or team fixtures URL (team)
  --limit <n>            Only process the first n matches
  --dry-run              Keep records in memory instead of Supabase
  --headed               Show browser window (non-headless)
  --debug                Enable debug logging

Examples:
  npm run cli -- leagues
  npm run cli -- matches --competition "Bundesliga" --season "2023/2024"
  npm run cli -- scrape --competition "Bundesliga" --season "2023/2024"
  npm run cli -- team --url "https://www.whoscored.com/Teams/13/Fixtures/England-Arsenal"
  npm run cli -- report --competition "Premier League" --season "2023/2024"
  `);
}

// ── Entry Point ──

async function main(): Promise<number> {
  const args = parseArgs();

  if (args.debug) {
    process.env.LOG_LEVEL = 'debug';
  }

  const { command } = args;
  if (!isCommand(command)) {
    printUsage();
    return 0;
  }

  return command === 'report' ? runReport(args) : runBrowserCommand(command, args);
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    logger.error(`Run aborted: ${errorMessage(err)}`);
    process.exit(1);
  });
