import { afterEach, describe, it, expect, vi } from 'vitest';
import { PolymarketClient, toGammaEvent, toGammaMarket } from '../polymarket/client';
import { OpenMeteoClient } from '../weather/open-meteo-client';
import { buildUrl, fetchJson } from '../utils/http';
import { ApiRequestError } from '../errors';
import { jsonResponse } from './helpers/factories';

afterEach(() => {
  vi.unstubAllGlobals();
});

function stubFetch(handler: (url: string) => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (url: string) => handler(url));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('http helpers', () => {
  it('repeats array parameters', () => {
    expect(buildUrl('https://gamma.test/markets', { id: ['1', '2'], closed: false })).toBe(
      'https://gamma.test/markets?id=1&id=2&closed=false'
    );
  });

  it('raises ApiRequestError on HTTP errors', async () => {
    stubFetch(() => jsonResponse({ error: 'boom' }, 503));
    await expect(fetchJson('https://gamma.test/events', 1000)).rejects.toMatchObject({
      name: 'ApiRequestError',
      code: 'API_REQUEST_FAILED',
      status: 503,
      url: 'https://gamma.test/events',
    });
  });

  it('raises ApiRequestError on network failures', async () => {
    stubFetch(() => {
      throw new TypeError('fetch failed');
    });
    await expect(fetchJson('https://gamma.test/events', 1000)).rejects.toBeInstanceOf(ApiRequestError);
  });
});

describe('toGammaMarket', () => {
  it('normalizes ids and list fields', () => {
    expect(
      toGammaMarket({ id: 7, question: 'Q?', outcomes: ['Yes', 'No'], bestAsk: 0.2, bestBid: null, active: true })
    ).toEqual({
      id: '7',
      question: 'Q?',
      conditionId: undefined,
      slug: undefined,
      groupItemTitle: undefined,
      outcomes: '["Yes","No"]',
      outcomePrices: undefined,
      bestBid: null,
      bestAsk: 0.2,
      active: true,
      closed: undefined,
    });
  });

  it('drops records without an id or question', () => {
    expect(toGammaMarket({ question: 'Q?' })).toBeNull();
    expect(toGammaMarket({ id: '1' })).toBeNull();
    expect(toGammaMarket('nope')).toBeNull();
  });
});

describe('toGammaMarket warnings', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('warns for each dropped market', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(toGammaMarket({ id: 5 })).toBeNull();

    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toContain('Skipping market 5: missing id or question');
  });
});

describe('toGammaEvent', () => {
  it('requires a title', () => {
    expect(toGammaEvent({ markets: [] })).toBeNull();
    expect(toGammaEvent({ title: 'T' })?.markets).toEqual([]);
  });
});

describe('PolymarketClient', () => {
  const client = new PolymarketClient({
    gammaApiUrl: 'https://gamma.test',
    weatherTagId: '84',
    requestTimeoutMs: 1000,
  });

  const listing = [
    {
      id: 10,
      title: 'Highest temperature in NYC on January 15?',
      markets: [
        { id: '1', question: 'Will it be 41°F or below?' },
        { id: '2', question: 'Will it be 42°F or higher?' },
      ],
    },
    { id: 11, title: 'Hurricane season landfall?', markets: [] },
  ];

  it('lists temperature events with refreshed quotes', async () => {
    const fetchMock = stubFetch(url =>
      url.includes('/events')
        ? jsonResponse(listing)
        : jsonResponse([
            { id: '1', question: 'Will it be 41°F or below?', bestAsk: '0.20', bestBid: '0.18' },
            { id: '2', question: 'Will it be 42°F or higher?', bestAsk: '0.70', bestBid: '0.65' },
          ])
    );

    const events = await client.getWeatherEvents();

    expect(fetchMock.mock.calls.map(call => call[0])).toEqual([
      'https://gamma.test/events?tag_id=84&active=true&closed=false&limit=50&order=startDate&ascending=true',
      'https://gamma.test/markets?id=1&id=2',
    ]);
    expect(events).toHaveLength(1);
    expect(events[0].id).toBe('10');
    expect(events[0].markets.map(m => m.bestAsk)).toEqual(['0.20', '0.70']);
  });

  it('keeps the embedded markets when the refresh fails', async () => {
    stubFetch(url => (url.includes('/events') ? jsonResponse(listing) : jsonResponse({}, 500)));

    const [event] = await client.getWeatherEvents();
    expect(event.markets.map(m => m.id)).toEqual(['1', '2']);
    expect(event.markets[0].bestAsk).toBeUndefined();
  });

  it('returns no events when the listing fails', async () => {
    stubFetch(() => jsonResponse({ error: 'down' }, 502));
    expect(await client.getWeatherEvents()).toEqual([]);
  });
});

describe('OpenMeteoClient', () => {
  const client = new OpenMeteoClient({
    geocodingUrl: 'https://geo.test/v1/search',
    forecastUrl: 'https://forecast.test/v1/forecast',
    historicalForecastUrl: 'https://history.test/v1/forecast',
    archiveUrl: 'https://archive.test/v1/archive',
    requestTimeoutMs: 1000,
  });
  const coords = { latitude: 40.7128, longitude: -74.006 };

  it('geocodes a city', async () => {
    const fetchMock = stubFetch(() => jsonResponse({ results: [{ name: 'New York', latitude: 40.7128, longitude: -74.006 }] }));

    expect(await client.getCoordinates('New York')).toEqual(coords);
    expect(fetchMock.mock.calls[0][0]).toBe('https://geo.test/v1/search?name=New+York&count=1&language=en&format=json');
  });

  it('returns null for unknown cities', async () => {
    stubFetch(() => jsonResponse({ generationtime_ms: 0.5 }));
    expect(await client.getCoordinates('Atlantis')).toBeNull();
  });

  it('reads the daily forecast for one date', async () => {
    const fetchMock = stubFetch(() =>
      jsonResponse({
        daily: { time: ['2026-01-15'], temperature_2m_max: [5.9], temperature_2m_min: [-1.2] },
      })
    );

    expect(await client.getDailyForecast(coords, '2026-01-15')).toEqual({ maxTemp: 5.9, minTemp: -1.2 });
    const url = new URL(fetchMock.mock.calls[0][0]);
    expect(url.searchParams.get('start_date')).toBe('2026-01-15');
    expect(url.searchParams.get('end_date')).toBe('2026-01-15');
    expect(url.searchParams.get('daily')).toBe('temperature_2m_max,temperature_2m_min');
  });

  it('returns null when the forecast has no value', async () => {
    stubFetch(() =>
      jsonResponse({ daily: { time: ['2026-01-15'], temperature_2m_max: [null], temperature_2m_min: [-1.2] } })
    );
    expect(await client.getDailyForecast(coords, '2026-01-15')).toBeNull();
  });

  it('returns null when the request fails', async () => {
    stubFetch(() => jsonResponse({ reason: 'out of range' }, 400));
    expect(await client.getDailyForecast(coords, '2030-01-15')).toBeNull();
  });

  it('reads observed highs from the archive', async () => {
    const fetchMock = stubFetch(() =>
      jsonResponse({ daily: { time: ['2026-02-01', '2026-02-02'], temperature_2m_max: [3.1, null] } })
    );

    expect(await client.getObservedMax(coords, '2026-02-01', '2026-02-02')).toEqual({
      dates: ['2026-02-01', '2026-02-02'],
      values: [3.1, null],
    });
    expect(fetchMock.mock.calls[0][0]).toMatch(/^https:\/\/archive\.test\/v1\/archive\?/);
  });

  it('reads past forecasts from the historical forecast API', async () => {
    const fetchMock = stubFetch(() =>
      jsonResponse({ daily: { time: ['2026-02-01'], temperature_2m_max: [2.5] } })
    );

    expect(await client.getHistoricalForecastMax(coords, '2026-02-01', '2026-02-01')).toEqual({
      dates: ['2026-02-01'],
      values: [2.5],
    });
    expect(fetchMock.mock.calls[0][0]).toMatch(/^https:\/\/history\.test\/v1\/forecast\?/);
  });
});
