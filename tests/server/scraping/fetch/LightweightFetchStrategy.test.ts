import { AxiosError } from 'axios';
import type { HttpGetClient } from '../../../../src/server/config/httpClient.js';
import { LightweightFetchStrategy } from '../../../../src/server/services/scraping/fetch/LightweightFetchStrategy.js';

const USER_AGENT = 'TestBot/1.0';

function strategyWith(get: HttpGetClient['get']) {
  const httpClient: HttpGetClient = { get };
  return new LightweightFetchStrategy({ userAgent: USER_AGENT, httpClient });
}

describe('LightweightFetchStrategy', () => {
  it('parses a successful page and sends the crawler user agent', async () => {
    const get = jest.fn<ReturnType<HttpGetClient['get']>, Parameters<HttpGetClient['get']>>().mockResolvedValue({
      status: 200,
      data: '<html><head><title>Permits</title></head><body><p>Work permit details</p><a href="/visa">Visa</a></body></html>',
    });
    const strategy = strategyWith(get);

    const outcome = await strategy.fetch('https://example.org/permits', 5000);

    expect(outcome).toEqual({
      ok: true,
      status: 200,
      url: 'https://example.org/permits',
      title: 'Permits',
      contentText: 'Work permit details\nVisa',
      contentRaw:
        '<html><head><title>Permits</title></head><body><p>Work permit details</p><a href="/visa">Visa</a></body></html>',
      links: ['https://example.org/visa'],
      breadcrumbs: [],
      attachments: [],
    });
    expect(get).toHaveBeenCalledWith('https://example.org/permits', {
      timeout: 5000,
      headers: { 'User-Agent': USER_AGENT, Accept: 'text/html,application/xhtml+xml' },
    });
    expect(strategy.name).toBe('lightweight');
  });

  it.each([
    { status: 404, kind: 'notFound' },
    { status: 410, kind: 'notFound' },
    { status: 403, kind: 'blocked' },
    { status: 429, kind: 'blocked' },
    { status: 500, kind: 'other' },
  ])('reports HTTP $status as $kind', async ({ status, kind }) => {
    const strategy = strategyWith(async () => ({ status, data: '' }));
    await expect(strategy.fetch('https://example.org/x', 1000)).resolves.toEqual({
      ok: false,
      kind,
      status,
      message: `HTTP ${status}`,
    });
  });

  it('reports axios timeouts as timeout failures', async () => {
    const strategy = strategyWith(async () => {
      throw new AxiosError('timeout of 1000ms exceeded', 'ECONNABORTED');
    });
    await expect(strategy.fetch('https://example.org/slow', 1000)).resolves.toEqual({
      ok: false,
      kind: 'timeout',
      message: 'Timed out after 1000ms',
    });
  });

  it('reports other errors without throwing', async () => {
    const strategy = strategyWith(async () => {
      throw new Error('socket hang up');
    });
    await expect(strategy.fetch('https://example.org/x', 1000)).resolves.toEqual({
      ok: false,
      kind: 'other',
      message: 'socket hang up',
    });
  });
});
