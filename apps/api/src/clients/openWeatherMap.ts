import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { WeatherSource } from '../automation/weatherContext';
import type { WeatherFailureResponse, WeatherResponse } from '../automation/schema';

export interface OpenWeatherMapOptions {
  apiKey: string | null;
  city: string;
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * Subset of the /weather (current conditions) payload we rely on.
 * `cod` is a number on success and sometimes a string on errors.
 */
const CurrentWeatherPayloadSchema = z.object({
  cod: z.union([z.number(), z.string()]),
  message: z.string().optional(),
  weather: z.array(z.object({ main: z.string() })).optional(),
  main: z
    .object({
      temp: z.number(),
      humidity: z.number(),
    })
    .optional(),
});

/**
 * Map a current-weather payload to the normalized weather response.
 * Returns status_ok=false when the payload reports an error or lacks fields.
 */
export function normalizeCurrentWeather(data: unknown): WeatherResponse | WeatherFailureResponse {
  const parsed = CurrentWeatherPayloadSchema.safeParse(data);
  if (!parsed.success) {
    return { status_ok: false, reason: 'Invalid response structure from OpenWeatherMap API' };
  }

  const payload = parsed.data;
  if (Number(payload.cod) !== 200) {
    return { status_ok: false, reason: `OpenWeatherMap API returned code ${payload.cod}: ${payload.message || 'Unknown error'}` };
  }

  const condition = payload.weather?.[0]?.main;
  if (!condition || !payload.main) {
    return { status_ok: false, reason: 'OpenWeatherMap response is missing weather or main fields' };
  }

  return {
    status_ok: true,
    condition,
    temp: payload.main.temp,
    humidity: payload.main.humidity,
  };
}

export class OpenWeatherMapClient implements WeatherSource {
  private client: AxiosInstance;
  private apiKey: string | null;
  private city: string;

  constructor(options: OpenWeatherMapOptions, client?: AxiosInstance) {
    this.apiKey = options.apiKey;
    this.city = options.city;

    this.client = client ?? axios.create({
      baseURL: options.baseUrl ?? 'https://api.openweathermap.org/data/2.5',
      timeout: options.timeoutMs ?? 10000,
      headers: {
        'Accept': 'application/json',
      },
    });
  }

  /**
   * Fetch current conditions for the configured city (metric units)
   */
  async fetchCurrent(): Promise<WeatherResponse | WeatherFailureResponse> {
    if (!this.apiKey) {
      throw new Error('OpenWeatherMap API key not configured');
    }

    try {
      const response = await this.client.get('/weather', {
        params: {
          q: this.city,
          appid: this.apiKey,
          units: 'metric',
        },
      });

      return normalizeCurrentWeather(response.data);
    } catch (error) {
      throw new Error(`Failed to fetch current weather for ${this.city}: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }
}
