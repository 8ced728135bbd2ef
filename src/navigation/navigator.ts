import type { SessionElement, WebSession } from '../browser/session';
import {
  COMPETITION_POLICIES,
  CompetitionPolicy,
  LEAGUE_NAME_OVERRIDES,
  LeagueNameOverride,
  leagueDisplayName,
  shouldVisitStage,
} from '../config/competitions';
import { NavigationError } from '../errors';
import { extractMatchLink, resolveMatchLinks } from '../parsers/listing';
import { delay } from '../utils/delay';
import { logger } from '../utils/logger';

export type NavigatorState =
  | 'Idle'
  | 'AtLeagueIndex'
  | 'AtCompetitionPage'
  | 'SeasonSelected'
  | 'StageSelected'
  | 'PaginatingMonth'
  | 'Done';

export interface NavigatorOptions {
  baseUrl: string;
  renderDelayMs: number;
  paginationDelayMs: number;
  /** Title of the "previous" control once the listing has no earlier data. */
  noDataTitle: string;
  /** Upper bound on listing pages per stage. */
  maxPages: number;
  policies?: Record<string, CompetitionPolicy>;
  nameOverrides?: LeagueNameOverride[];
}

export const SELECTORS = {
  tournaments: '#popular-tournaments-list li a',
  seasons: '#seasons',
  seasonOptions: '#seasons option',
  stages: '#stages',
  stageOptions: '#stages option',
  rows: '.divtable-row',
  previous: '#date-controller > a:first-of-type',
} as const;

const DISABLED_CLASS = 'is-disabled';

async function isDisabled(control: SessionElement): Promise<boolean> {
  const classes = (await control.attribute('class')) || '';
  return classes.split(/\s+/).includes(DISABLED_CLASS);
}

/**
 * Walks league index → competition → season → stages → monthly fixture
 * listings on a single session and returns every match-centre URL found.
 */
export class CompetitionNavigator {
  private current: NavigatorState = 'Idle';

  constructor(
    private readonly session: WebSession,
    private readonly options: NavigatorOptions
  ) {}

  get state(): NavigatorState {
    return this.current;
  }

  async listCompetitions(indexUrl: string = this.options.baseUrl): Promise<Map<string, string>> {
    await this.session.navigate(indexUrl);
    this.enter('AtLeagueIndex');

    const overrides = this.options.nameOverrides ?? LEAGUE_NAME_OVERRIDES;
    const competitions = new Map<string, string>();

    for (const link of await this.session.findElements(SELECTORS.tournaments)) {
      const href = await link.attribute('href');
      if (!href) continue;
      const url = new URL(href, this.options.baseUrl).toString();
      competitions.set(leagueDisplayName(await link.text(), url, overrides), url);
    }

    logger.info(`Found ${competitions.size} competitions`);
    return competitions;
  }

  /** Resolve a competition by name from the league index, then collect its matches. */
  async collectCompetition(competition: string, season: string): Promise<string[]> {
    const competitions = await this.listCompetitions();
    const url = competitions.get(competition);
    if (!url) {
      throw new NavigationError(`Competition "${competition}" not found`, [...competitions.keys()]);
    }
    return this.collectMatchUrls(url, competition, season);
  }

  async collectMatchUrls(competitionUrl: string, competition: string, season: string): Promise<string[]> {
    await this.session.navigate(competitionUrl);
    await delay(this.options.renderDelayMs);
    this.enter('AtCompetitionPage');

    const seasons = await this.readOptionLabels(SELECTORS.seasonOptions);
    if (!seasons.includes(season)) {
      throw new NavigationError(`Season "${season}" not found for ${competition}`, seasons);
    }

    await this.session.selectOption(SELECTORS.seasons, season);
    await delay(this.options.renderDelayMs);
    this.enter('SeasonSelected');

    const hrefs: string[] = [];
    const stageSelector = await this.session.findElement(SELECTORS.stages);

    if (!stageSelector) {
      hrefs.push(...(await this.paginateMonths()));
    } else {
      const policies = this.options.policies ?? COMPETITION_POLICIES;
      for (const stage of await this.readOptionLabels(SELECTORS.stageOptions)) {
        if (!shouldVisitStage(competition, stage, policies)) {
          logger.debug(`Skipping stage: ${stage}`);
          continue;
        }
        logger.info(`Stage: ${stage}`);
        await this.session.selectOption(SELECTORS.stages, stage);
        await delay(this.options.renderDelayMs);
        this.enter('StageSelected');
        hrefs.push(...(await this.paginateMonths()));
      }
    }

    this.enter('Done');
    const urls = resolveMatchLinks(hrefs, this.options.baseUrl);
    logger.info(`Found ${urls.length} unique matches for ${competition} ${season}`);
    return urls;
  }

  /** Match links listed on a team's fixtures page. */
  async collectTeamFixtures(fixturesUrl: string): Promise<string[]> {
    await this.session.navigate(fixturesUrl);
    await delay(this.options.renderDelayMs);
    this.enter('AtCompetitionPage');

    const hrefs = await this.readRows(await this.session.findElements(SELECTORS.rows));

    this.enter('Done');
    const urls = resolveMatchLinks(hrefs, this.options.baseUrl);
    logger.info(`Found ${urls.length} fixtures with match centre links`);
    return urls;
  }

  /**
   * Read the visible month, step back one month, repeat. Stops at a disabled
   * "previous" control or once it reports no earlier data; when that report
   * appears after a click, the page just reached still has unread rows.
   */
  private async paginateMonths(): Promise<string[]> {
    this.enter('PaginatingMonth');
    await this.session.executeScript('window.scrollTo(0, 400)');

    const hrefs: string[] = [];

    for (let page = 0; page < this.options.maxPages; page++) {
      const rows = await this.session.findElements(SELECTORS.rows);
      const previous = await this.session.findElement(SELECTORS.previous);

      if (!previous) {
        hrefs.push(...(await this.readRows(rows)));
        return hrefs;
      }

      if (rows.length === 0) {
        if ((await isDisabled(previous)) || (await this.reportsNoData(previous))) return hrefs;
        await previous.click();
        await delay(this.options.paginationDelayMs);
        continue;
      }

      hrefs.push(...(await this.readRows(rows)));
      if (await isDisabled(previous)) return hrefs;

      await previous.click();
      await delay(this.options.paginationDelayMs);

      const boundary = await this.session.findElement(SELECTORS.previous);
      if (boundary && (await this.reportsNoData(boundary))) {
        hrefs.push(...(await this.readRows(await this.session.findElements(SELECTORS.rows))));
        return hrefs;
      }
    }

    logger.warn(`Stopped paginating after ${this.options.maxPages} pages`);
    return hrefs;
  }

  private async reportsNoData(control: SessionElement): Promise<boolean> {
    return (await control.attribute('title')) === this.options.noDataTitle;
  }

  private async readRows(rows: SessionElement[]): Promise<string[]> {
    const hrefs: string[] = [];
    for (const row of rows) {
      const href = extractMatchLink(await row.innerHTML());
      if (href) hrefs.push(href);
    }
    return hrefs;
  }

  private async readOptionLabels(selector: string): Promise<string[]> {
    const labels: string[] = [];
    for (const option of await this.session.findElements(selector)) {
      labels.push(await option.text());
    }
    return labels;
  }

  private enter(state: NavigatorState): void {
    logger.debug(`Navigator: ${this.current} -> ${state}`);
    this.current = state;
  }
}
