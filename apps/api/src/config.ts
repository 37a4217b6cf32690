export interface AppConfig {
  port: number;
  apiToken: string | null;
  weather: {
    apiKey: string | null;
    city: string;
    baseUrl: string;
    timeoutMs: number;
  };
  plantIdleTtlMinutes: number;
  schedulerTimezone: string;
}

type Env = Record<string, string | undefined>;

function getEnv(env: Env, key: string): string {
  const value = env[key];
  return typeof value === 'string' ? value.trim() : '';
}

function parseIntegerEnv(env: Env, key: string, defaultValue: number, options?: { min?: number; max?: number }): number {
  const raw = getEnv(env, key);
  const parsed = raw ? Number.parseInt(raw, 10) : Number.NaN;
  if (!Number.isFinite(parsed)) return defaultValue;
  let value = parsed;
  if (typeof options?.min === 'number') value = Math.max(options.min, value);
  if (typeof options?.max === 'number') value = Math.min(options.max, value);
  return value;
}

/**
 * Build the app config from environment variables.
 * dotenv is loaded by the server before this runs.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: parseIntegerEnv(env, 'PORT', 3001, { min: 1, max: 65535 }),
    apiToken: getEnv(env, 'API_TOKEN') || null,
    weather: {
      apiKey: getEnv(env, 'OPENWEATHER_API_KEY') || null,
      city: getEnv(env, 'WEATHER_CITY') || 'Kuala Lumpur',
      baseUrl: getEnv(env, 'WEATHER_BASE_URL') || 'https://api.openweathermap.org/data/2.5',
      timeoutMs: parseIntegerEnv(env, 'WEATHER_TIMEOUT_MS', 10000, { min: 500, max: 60000 }),
    },
    plantIdleTtlMinutes: parseIntegerEnv(env, 'PLANT_IDLE_TTL_MINUTES', 1440, { min: 1 }),
    schedulerTimezone: getEnv(env, 'SCHEDULER_TIMEZONE') || 'UTC',
  };
}
