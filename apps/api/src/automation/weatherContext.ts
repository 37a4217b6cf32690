import { WeatherFailureResponseSchema, WeatherResponse, WeatherResponseSchema } from './schema';
import {
  INITIAL_OUTSIDE_HUMIDITY_PERCENT,
  INITIAL_OUTSIDE_TEMP_CELSIUS,
  INITIAL_WEATHER_CONDITION,
  WEATHER_FALLBACK_CONDITION,
  WEATHER_REFRESH_INTERVAL_MS,
} from './constants';

export interface WeatherSnapshot {
  condition: string;
  outsideTemp: number;
  outsideHumidity: number;
  fetchedAt: number | null; // epoch ms, null until the first refresh attempt
}

/**
 * Anything that can answer "what is the weather right now".
 * The resolved value is validated against WeatherResponseSchema by the provider.
 */
export interface WeatherSource {
  fetchCurrent(): Promise<unknown>;
}

export type WeatherFetchResult =
  | { ok: true; response: WeatherResponse }
  | { ok: false; reason: string };

export function parseWeatherResponse(raw: unknown): WeatherFetchResult {
  const parsed = WeatherResponseSchema.safeParse(raw);
  if (parsed.success) {
    return { ok: true, response: parsed.data };
  }
  const failure = WeatherFailureResponseSchema.safeParse(raw);
  if (failure.success) {
    return { ok: false, reason: failure.data.reason ?? 'Weather source reported a non-ok status' };
  }
  const issue = parsed.error.issues[0];
  const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'response';
  return { ok: false, reason: `Malformed weather response (${where}: ${issue?.message ?? 'invalid'})` };
}

export async function fetchWeather(source: WeatherSource): Promise<WeatherFetchResult> {
  try {
    return parseWeatherResponse(await source.fetchCurrent());
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : 'Unknown error' };
  }
}

export function initialWeatherSnapshot(): WeatherSnapshot {
  return {
    condition: INITIAL_WEATHER_CONDITION,
    outsideTemp: INITIAL_OUTSIDE_TEMP_CELSIUS,
    outsideHumidity: INITIAL_OUTSIDE_HUMIDITY_PERCENT,
    fetchedAt: null,
  };
}

/**
 * Time-throttled weather cache for a single plant.
 *
 * A refresh is attempted at most once per refresh interval. Failed refreshes
 * count against the same interval as successful ones, fall back to a fixed
 * condition and keep the last known temperature and humidity.
 */
export class WeatherContextProvider {
  private snapshot: WeatherSnapshot;

  constructor(
    private readonly source: WeatherSource,
    private readonly refreshIntervalMs: number = WEATHER_REFRESH_INTERVAL_MS,
    initial: WeatherSnapshot = initialWeatherSnapshot()
  ) {
    this.snapshot = { ...initial };
  }

  current(): WeatherSnapshot {
    return { ...this.snapshot };
  }

  isStale(now: number): boolean {
    return this.snapshot.fetchedAt === null || now - this.snapshot.fetchedAt >= this.refreshIntervalMs;
  }

  async context(now: number): Promise<WeatherSnapshot> {
    if (!this.isStale(now)) {
      return this.current();
    }

    const result = await fetchWeather(this.source);

    if (result.ok) {
      this.snapshot = {
        condition: result.response.condition,
        outsideTemp: result.response.temp,
        outsideHumidity: result.response.humidity,
        fetchedAt: now,
      };
      console.log(`[weather] Updated: ${this.snapshot.condition}, ${this.snapshot.outsideTemp}°C, ${this.snapshot.outsideHumidity}%`);
    } else {
      this.snapshot = {
        ...this.snapshot,
        condition: WEATHER_FALLBACK_CONDITION,
        fetchedAt: now,
      };
      console.warn(`[weather] Lookup failed, using fallback condition "${WEATHER_FALLBACK_CONDITION}": ${result.reason}`);
    }

    return this.current();
  }
}
