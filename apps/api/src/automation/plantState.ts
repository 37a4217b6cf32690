import { SensorSmoother } from './smoother';
import { PumpController } from './pump';
import { WeatherContextProvider, WeatherSource } from './weatherContext';
import type { DecisionRecord } from '../transport/publisher';

/**
 * Everything one plant owns. Never shared between plants.
 */
export interface PlantState {
  plantId: string;
  smoother: SensorSmoother;
  weather: WeatherContextProvider;
  pump: PumpController;
  lastRecord: DecisionRecord | null;
}

/**
 * Overrides for the refresh interval and pulse limit. The server never sets
 * these (both are fixed policy); tests shorten them to drive timing paths.
 */
export interface PlantStateOptions {
  weatherRefreshIntervalMs?: number;
  maxPulseMs?: number;
}

export function createPlantState(
  plantId: string,
  weatherSource: WeatherSource,
  options: PlantStateOptions = {}
): PlantState {
  return {
    plantId,
    smoother: new SensorSmoother(),
    weather: new WeatherContextProvider(weatherSource, options.weatherRefreshIntervalMs),
    pump: new PumpController(options.maxPulseMs),
    lastRecord: null,
  };
}
