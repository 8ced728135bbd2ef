import type { WebSession } from '../browser/session';
import { CONFLICT_KEYS, RecordStore, Row, TableName } from '../db/store';
import { SinkError } from '../errors';
import { normalizeMatchPayload } from '../normalize';
import { decodeMatchPayload, extractMatchPayload } from '../parsers/payload';
import { parseMatchUrl } from '../parsers/url';
import { delay } from '../utils/delay';
import { logger } from '../utils/logger';
import { errorMessage, withRetry } from '../utils/retry';
import { withTimeout } from '../utils/timeout';
import { validateMatch, ValidatedMatch } from '../validation/validate';

export interface OrchestratorOptions {
  /** Pause between consecutive matches. */
  matchDelayMs: number;
  /** Budget for one match, page load through the last upsert. */
  matchTimeoutMs: number;
  /** Extra attempts at loading a match page. */
  navigationRetries: number;
  retryDelayMs: number;
}

export type MatchOutcome = 'stored' | 'no-payload';

export interface MatchFailure {
  url: string;
  error: string;
}

export interface BatchSummary {
  total: number;
  stored: number;
  noPayload: number;
  failures: MatchFailure[];
}

// Retried once before the match is given up on.
const SINK_RETRIES = 1;

export class ScrapeOrchestrator {
  constructor(
    private readonly session: WebSession,
    private readonly store: RecordStore,
    private readonly options: OrchestratorOptions
  ) {}

  async run(urls: string[]): Promise<BatchSummary> {
    const summary: BatchSummary = { total: urls.length, stored: 0, noPayload: 0, failures: [] };

    for (let i = 0; i < urls.length; i++) {
      const url = urls[i];
      logger.info(`[${i + 1}/${urls.length}] ${url}`);

      try {
        const outcome = await this.scrapeMatch(url);
        if (outcome === 'stored') {
          summary.stored++;
          logger.info('Success');
        } else {
          summary.noPayload++;
        }
      } catch (err) {
        logger.error(`Error processing data for URL ${url}: ${errorMessage(err)}`);
        summary.failures.push({ url, error: errorMessage(err) });
      }

      if (i < urls.length - 1) {
        await delay(this.options.matchDelayMs);
      }
    }

    return summary;
  }

  scrapeMatch(url: string): Promise<MatchOutcome> {
    return withTimeout((signal) => this.process(url, signal), this.options.matchTimeoutMs, `Match ${url}`);
  }

  // Every await is followed by a signal check: a timed-out match must not read
  // the page or write rows once the batch has moved on to the next URL.
  private async process(url: string, signal: AbortSignal): Promise<MatchOutcome> {
    const info = parseMatchUrl(url);

    await withRetry(
      () => {
        signal.throwIfAborted();
        return this.session.navigate(url);
      },
      `Load ${url}`,
      this.options.navigationRetries,
      this.options.retryDelayMs
    );
    signal.throwIfAborted();

    const html = await this.session.content();
    signal.throwIfAborted();

    const result = extractMatchPayload(html, url);
    if (!result.found) {
      logger.warn(`No match centre data found for URL: ${url}`);
      return 'no-payload';
    }

    const payload = decodeMatchPayload(result.payload, info.matchId);
    const records = validateMatch(normalizeMatchPayload(payload, info), info.matchId);
    await this.persist(records, info.matchId, signal);

    logger.debug(
      `Match ${info.matchId}: ${records.events.length} events, ${records.players.length} players, ${records.lineups.length} lineup rows`
    );
    return 'stored';
  }

  private async persist(records: ValidatedMatch, matchId: number, signal: AbortSignal): Promise<void> {
    await this.upsert('events', records.events, matchId, signal);
    await this.upsert('players', records.players, matchId, signal);
    await this.upsert('matches', [records.match], matchId, signal);
    await this.upsert('lineups', records.lineups, matchId, signal);
  }

  private async upsert(table: TableName, rows: Row[], matchId: number, signal: AbortSignal): Promise<void> {
    signal.throwIfAborted();
    try {
      await withRetry(
        () => {
          signal.throwIfAborted();
          return this.store.upsert(table, rows, CONFLICT_KEYS[table]);
        },
        `Upsert ${table} for match ${matchId}`,
        SINK_RETRIES,
        this.options.retryDelayMs
      );
    } catch (err) {
      throw new SinkError(table, matchId, err);
    }
  }
}
