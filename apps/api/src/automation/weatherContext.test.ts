import { describe, it, expect, beforeEach, vi } from 'vitest';
import { WeatherContextProvider, WeatherSource, parseWeatherResponse } from './weatherContext';

const seconds = (s: number) => s * 1000;

function sourceReturning(...answers: Array<unknown | Error>): WeatherSource & { calls: number } {
  const source = {
    calls: 0,
    async fetchCurrent(): Promise<unknown> {
      const answer = answers[Math.min(source.calls, answers.length - 1)];
      source.calls++;
      if (answer instanceof Error) {
        throw answer;
      }
      return answer;
    },
  };
  return source;
}

const sunny = { status_ok: true, condition: 'Clear', temp: 31.5, humidity: 55 };
const rainy = { status_ok: true, condition: 'Rain', temp: 24, humidity: 92 };

describe('parseWeatherResponse', () => {
  it('accepts a well-formed ok response', () => {
    expect(parseWeatherResponse(sunny)).toEqual({ ok: true, response: sunny });
  });

  it('treats a non-ok status as a failure', () => {
    expect(parseWeatherResponse({ status_ok: false, reason: 'city not found' })).toEqual({
      ok: false,
      reason: 'city not found',
    });
  });

  it('treats missing fields as a failure', () => {
    const result = parseWeatherResponse({ status_ok: true, condition: 'Clear', temp: 20 });
    expect(result.ok).toBe(false);
  });

  it('treats non-numeric fields as a failure', () => {
    expect(parseWeatherResponse({ ...sunny, humidity: '55' }).ok).toBe(false);
    expect(parseWeatherResponse(null).ok).toBe(false);
  });
});

describe('WeatherContextProvider', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('starts from the default snapshot', () => {
    const provider = new WeatherContextProvider(sourceReturning(sunny));
    expect(provider.current()).toEqual({
      condition: 'Unknown',
      outsideTemp: 30,
      outsideHumidity: 70,
      fetchedAt: null,
    });
  });

  it('fetches on first use, even at time zero', async () => {
    const source = sourceReturning(sunny);
    const provider = new WeatherContextProvider(source);

    const snapshot = await provider.context(0);

    expect(source.calls).toBe(1);
    expect(snapshot).toEqual({ condition: 'Clear', outsideTemp: 31.5, outsideHumidity: 55, fetchedAt: 0 });
  });

  it('serves the cache for calls inside the refresh interval', async () => {
    const source = sourceReturning(sunny, rainy);
    const provider = new WeatherContextProvider(source);

    await provider.context(seconds(1000));
    const cached = await provider.context(seconds(1001));

    expect(source.calls).toBe(1);
    expect(cached.condition).toBe('Clear');
  });

  it('refreshes once per call when calls are more than the interval apart', async () => {
    const source = sourceReturning(sunny, rainy);
    const provider = new WeatherContextProvider(source);

    await provider.context(seconds(1000));
    const refreshed = await provider.context(seconds(1601));

    expect(source.calls).toBe(2);
    expect(refreshed).toEqual({ condition: 'Rain', outsideTemp: 24, outsideHumidity: 92, fetchedAt: seconds(1601) });
  });

  it('keeps the last numbers and falls back to clouds when the lookup throws', async () => {
    const source = sourceReturning(sunny, new Error('socket hang up'));
    const provider = new WeatherContextProvider(source);

    await provider.context(0);
    const degraded = await provider.context(seconds(700));

    expect(degraded).toEqual({ condition: 'Clouds', outsideTemp: 31.5, outsideHumidity: 55, fetchedAt: seconds(700) });
  });

  it('throttles failed lookups exactly like successful ones', async () => {
    const source = sourceReturning(new Error('timeout of 10000ms exceeded'));
    const provider = new WeatherContextProvider(source);

    const first = await provider.context(0);
    await provider.context(seconds(599));
    await provider.context(seconds(300));

    expect(source.calls).toBe(1);
    expect(first).toEqual({ condition: 'Clouds', outsideTemp: 30, outsideHumidity: 70, fetchedAt: 0 });

    await provider.context(seconds(600));
    expect(source.calls).toBe(2);
  });

  it('degrades on a malformed payload without rejecting', async () => {
    const provider = new WeatherContextProvider(sourceReturning({ unexpected: true }));
    await expect(provider.context(0)).resolves.toMatchObject({ condition: 'Clouds', fetchedAt: 0 });
  });
});
