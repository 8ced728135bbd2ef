import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { NavigationError } from '../../src/errors';
import { CompetitionNavigator, NavigatorOptions } from '../../src/navigation/navigator';
import { FakeSession, FakeSite, NO_DATA_TITLE, row } from '../helpers/fake-session';

const BASE_URL = 'https://www.whoscored.com';
const COMPETITION_URL = `${BASE_URL}/Regions/81/Tournaments/3/Germany-Bundesliga`;

const options: NavigatorOptions = {
  baseUrl: BASE_URL,
  renderDelayMs: 0,
  paginationDelayMs: 0,
  noDataTitle: NO_DATA_TITLE,
  maxPages: 240,
};

function href(id: number): string {
  return `/Matches/${id}/Live/Germany-Bundesliga-2023-2024-Home-Away`;
}

function url(id: number): string {
  return `${BASE_URL}${href(id)}`;
}

function navigatorFor(site: FakeSite, overrides: Partial<NavigatorOptions> = {}) {
  const session = new FakeSession({ seasons: ['2023/2024', '2022/2023'], ...site });
  return { session, navigator: new CompetitionNavigator(session, { ...options, ...overrides }) };
}

describe('CompetitionNavigator.collectMatchUrls', () => {
  it('walks back month by month and reads the month that reports no earlier data', async () => {
    const { session, navigator } = navigatorFor({
      listings: {
        '': {
          months: [[row(href(3)), row(href(4))], [row(href(2)), row(href(3))], [row(href(1)), row()]],
          boundary: 'no-data',
        },
      },
    });

    const urls = await navigator.collectMatchUrls(COMPETITION_URL, 'Bundesliga', '2023/2024');

    assert.deepEqual(urls, [url(3), url(4), url(2), url(1)]);
    assert.equal(session.clicks, 2);
    assert.deepEqual(session.selectedSeasons, ['2023/2024']);
    assert.equal(navigator.state, 'Done');
  });

  it('steps over empty months and stops at a disabled control', async () => {
    const { session, navigator } = navigatorFor({
      listings: { '': { months: [[row(href(2))], [], [row(href(1))]], boundary: 'disabled' } },
    });

    const urls = await navigator.collectMatchUrls(COMPETITION_URL, 'Bundesliga', '2023/2024');

    assert.deepEqual(urls, [url(2), url(1)]);
    assert.equal(session.clicks, 2);
  });

  it('stops when the first month is already the earliest', async () => {
    const { session, navigator } = navigatorFor({
      listings: { '': { months: [[row(href(5))]], boundary: 'disabled' } },
    });

    assert.deepEqual(await navigator.collectMatchUrls(COMPETITION_URL, 'Bundesliga', '2023/2024'), [url(5)]);
    assert.equal(session.clicks, 0);
  });

  it('stops on an empty month that reports no earlier data', async () => {
    const { session, navigator } = navigatorFor({ listings: { '': { months: [[]], boundary: 'no-data' } } });

    assert.deepEqual(await navigator.collectMatchUrls(COMPETITION_URL, 'Bundesliga', '2023/2024'), []);
    assert.equal(session.clicks, 0);
  });

  it('gives up after the page cap when the listing never ends', async () => {
    const { session, navigator } = navigatorFor(
      { listings: { '': { months: [[row(href(1))], [row(href(2))]], boundary: 'none' } } },
      { maxPages: 5 }
    );

    const urls = await navigator.collectMatchUrls(COMPETITION_URL, 'Bundesliga', '2023/2024');

    assert.deepEqual(urls, [url(1), url(2)]);
    assert.equal(session.clicks, 5);
  });

  it('lists the available seasons when the requested one is missing', async () => {
    const { navigator } = navigatorFor({});

    await assert.rejects(navigator.collectMatchUrls(COMPETITION_URL, 'Bundesliga', '2019/2020'), (err: unknown) => {
      assert.ok(err instanceof NavigationError);
      assert.deepEqual(err.available, ['2023/2024', '2022/2023']);
      assert.equal(err.message, 'Season "2019/2020" not found for Bundesliga. Available: 2023/2024, 2022/2023');
      return true;
    });
    assert.equal(navigator.state, 'AtCompetitionPage');
  });

  it('visits only the stages the competition policy allows', async () => {
    const stages = ['Champions League Qualification', 'Champions League Group Stages', 'Champions League Final Stage'];
    const { session, navigator } = navigatorFor({
      stages,
      listings: {
        'Champions League Qualification': { months: [[row(href(10))]], boundary: 'disabled' },
        'Champions League Group Stages': { months: [[row(href(20)), row(href(21))]], boundary: 'disabled' },
        'Champions League Final Stage': { months: [[row(href(30))]], boundary: 'disabled' },
      },
    });

    const urls = await navigator.collectMatchUrls(COMPETITION_URL, 'Champions League', '2023/2024');

    assert.deepEqual(session.selectedStages, ['Champions League Group Stages', 'Champions League Final Stage']);
    assert.deepEqual(urls, [url(20), url(21), url(30)]);
  });

  it('skips MLS conference groups', async () => {
    const { session, navigator } = navigatorFor({
      stages: ['Major League Soccer', 'Major League Soccer Grp. East'],
      listings: {
        'Major League Soccer': { months: [[row(href(40))]], boundary: 'disabled' },
        'Major League Soccer Grp. East': { months: [[row(href(41))]], boundary: 'disabled' },
      },
    });

    const urls = await navigator.collectMatchUrls(COMPETITION_URL, 'Major League Soccer', '2023/2024');

    assert.deepEqual(session.selectedStages, ['Major League Soccer']);
    assert.deepEqual(urls, [url(40)]);
  });
});

describe('CompetitionNavigator.listCompetitions', () => {
  const tournaments = [
    { name: 'Premier League', href: '/Regions/252/Tournaments/2/England-Premier-League' },
    { name: 'Bundesliga', href: '/Regions/81/Tournaments/3/Germany-Bundesliga' },
    { name: 'Premier League', href: '/Regions/182/Tournaments/77/Russia-Premier-League' },
  ];

  it('maps display names to absolute competition URLs', async () => {
    const { session, navigator } = navigatorFor({ tournaments });

    const competitions = await navigator.listCompetitions();

    assert.deepEqual([...competitions], [
      ['Premier League', `${BASE_URL}/Regions/252/Tournaments/2/England-Premier-League`],
      ['Bundesliga', COMPETITION_URL],
      ['Russian Premier League', `${BASE_URL}/Regions/182/Tournaments/77/Russia-Premier-League`],
    ]);
    assert.deepEqual(session.navigations, [BASE_URL]);
    assert.equal(navigator.state, 'AtLeagueIndex');
  });

  it('resolves a competition by name before collecting', async () => {
    const { session, navigator } = navigatorFor({
      tournaments,
      listings: { '': { months: [[row(href(7))]], boundary: 'disabled' } },
    });

    const urls = await navigator.collectCompetition('Bundesliga', '2023/2024');

    assert.deepEqual(urls, [url(7)]);
    assert.deepEqual(session.navigations, [BASE_URL, COMPETITION_URL]);
  });

  it('rejects an unknown competition', async () => {
    const { navigator } = navigatorFor({ tournaments });

    await assert.rejects(navigator.collectCompetition('Serie A', '2023/2024'), {
      name: 'NavigationError',
      message: 'Competition "Serie A" not found. Available: Premier League, Bundesliga, Russian Premier League',
    });
  });
});

describe('CompetitionNavigator.collectTeamFixtures', () => {
  it('reads the fixture rows of a team page', async () => {
    const { navigator } = navigatorFor({
      listings: { '': { months: [[row(href(8)), row(), row(href(9)), row(href(8))]], boundary: 'none' } },
    });

    const urls = await navigator.collectTeamFixtures(`${BASE_URL}/Teams/13/Fixtures/England-Arsenal`);

    assert.deepEqual(urls, [url(8), url(9)]);
    assert.equal(navigator.state, 'Done');
  });
});
