import { readFileSync } from 'fs';
import { join } from 'path';
import { ConfigService } from '@nestjs/config';
import { MockAgent } from 'undici';
import { StatsFetcherService } from './stats-fetcher.service';

const ORIGIN = 'https://stats.example.test';
const PATH = '/gameResult.do?method=statByNumber';

// EUC-KR encoded copy of the statistics page: count for n is 1000 + 3n
const eucKrPage = readFileSync(join(__dirname, '__fixtures__', 'stat-by-number.euc-kr.html'));

describe('StatsFetcherService', () => {
  let mockAgent: MockAgent;
  let fetcher: StatsFetcherService;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();

    const config = new ConfigService({
      STATS_URL: `${ORIGIN}${PATH}`,
      STATS_REFERER: `${ORIGIN}/`,
      STATS_TIMEOUT_MS: '2000',
    });
    fetcher = new StatsFetcherService(config, mockAgent);
  });

  afterEach(async () => {
    await fetcher.onModuleDestroy();
  });

  it('decodes the page as EUC-KR', async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: PATH, method: 'GET' })
      .reply(200, eucKrPage, { headers: { 'content-type': 'text/html; charset=euc-kr' } });

    const result = await fetcher.fetchPage();

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toContain('<title>번호별 통계 | 로또 6/45</title>');
    expect(result.value).toContain('<th>당첨횟수</th>');
  });

  it('sends a browser user agent', async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({
        path: PATH,
        method: 'GET',
        headers: {
          'user-agent': (value: string) => value.startsWith('Mozilla/5.0'),
          'accept-language': (value: string) => value.startsWith('ko-KR'),
        },
      })
      .reply(200, eucKrPage);

    const result = await fetcher.fetchPage();

    expect(result.ok).toBe(true);
  });

  it('parses the live table into 45 records', async () => {
    mockAgent.get(ORIGIN).intercept({ path: PATH, method: 'GET' }).reply(200, eucKrPage);

    const result = await fetcher.fetchStats();

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toHaveLength(45);
    expect(result.value[0]).toEqual({ number: 1, count: 1003 });
    expect(result.value[33]).toEqual({ number: 34, count: 1102 });
    expect(result.value[44]).toEqual({ number: 45, count: 1135 });
  });

  it('reports a non-2xx status', async () => {
    mockAgent.get(ORIGIN).intercept({ path: PATH, method: 'GET' }).reply(503, 'Service Unavailable');

    expect(await fetcher.fetchStats()).toEqual({ ok: false, error: { kind: 'http-status', status: 503 } });
  });

  it('reports a transport failure instead of throwing', async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: PATH, method: 'GET' })
      .replyWithError(new Error('connect ECONNREFUSED'));

    const result = await fetcher.fetchStats();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('transport');
  });

  it('reports a timeout as a transport failure', async () => {
    const impatient = new StatsFetcherService(
      new ConfigService({ STATS_URL: `${ORIGIN}${PATH}`, STATS_TIMEOUT_MS: '50' }),
      mockAgent,
    );
    mockAgent.get(ORIGIN).intercept({ path: PATH, method: 'GET' }).reply(200, eucKrPage).delay(2000);

    expect(await impatient.fetchPage()).toEqual({
      ok: false,
      error: { kind: 'transport', message: 'timed out after 50ms' },
    });
  });

  it('reports a page without the statistics table', async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: PATH, method: 'GET' })
      .reply(200, '<html><body><p>maintenance</p></body></html>');

    expect(await fetcher.fetchStats()).toEqual({ ok: false, error: { kind: 'table-not-found' } });
  });
});
