import { SensorSample, SensorSampleSchema } from './schema';
import { InvalidInputError } from './errors';
import { decide, Decision } from './engine';
import type { PlantState } from './plantState';
import type { WeatherSnapshot } from './weatherContext';
import type { DecisionPublisher, DecisionRecord } from '../transport/publisher';
import {
  ALERTS,
  BATTERY_LEVEL_PLACEHOLDER,
  DECISION_EVENT,
  MIN_SOIL_SAMPLES,
} from './constants';

export type CycleOutcome =
  | { status: 'rejected'; error: InvalidInputError }
  | { status: 'warming_up'; soilSamples: number }
  | { status: 'published'; record: DecisionRecord; decision: Decision };

export interface CycleDependencies {
  publisher: DecisionPublisher;
  clock?: () => number; // epoch ms, defaults to Date.now
}

/**
 * Round to `decimals` places, ties to the even neighbour (30.25 -> 30.2, 30.75 -> 30.8)
 */
export function roundHalfEven(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;

  if (fraction > 0.5) return (floor + 1) / factor;
  if (fraction < 0.5) return floor / factor;
  return (floor % 2 === 0 ? floor : floor + 1) / factor;
}

function formatClock(now: number): string {
  const date = new Date(now);
  return [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map(part => part.toString().padStart(2, '0'))
    .join(':');
}

export function validateSample(input: unknown): SensorSample {
  const parsed = SensorSampleSchema.safeParse(input);
  if (!parsed.success) {
    throw InvalidInputError.fromZodIssues('Invalid sensor sample', parsed.error.issues);
  }
  return parsed.data;
}

export function buildDecisionRecord(args: {
  now: number;
  sample: SensorSample;
  averages: { soil: number; temp: number; light: number };
  weather: WeatherSnapshot;
  decision: Decision;
  pumpActive: boolean;
  alert: string;
}): DecisionRecord {
  const { now, sample, averages, weather, decision, pumpActive, alert } = args;

  return {
    timestamp: formatClock(now),
    sensors: {
      soil: roundHalfEven(averages.soil, 1),
      temp: roundHalfEven(averages.temp, 1),
      light: roundHalfEven(averages.light, 1),
      npk: `${sample.nitrogen}-${sample.phosphorus}-${sample.potassium}`,
    },
    weather: {
      condition: weather.condition,
      temp: weather.outsideTemp,
      humidity: weather.outsideHumidity,
      vpd: decision.vpd.status === 'computed' ? roundHalfEven(decision.vpd.value, 2) : 0,
      vpd_status: decision.vpd.status,
    },
    system: {
      pump_active: pumpActive,
      algorithm_state: decision.label,
      alert,
      battery_level: BATTERY_LEVEL_PLACEHOLDER,
    },
  };
}

/**
 * Run one telemetry cycle for a plant: smooth, refresh weather, decide,
 * drive the pump and publish.
 *
 * Callers must not run two cycles for the same plant at once.
 * The clock is read again after the weather refresh, so a slow lookup
 * counts against the pump's pulse limit.
 */
export async function runCycle(
  state: PlantState,
  input: unknown,
  deps: CycleDependencies
): Promise<CycleOutcome> {
  const clock = deps.clock ?? Date.now;

  let sample: SensorSample;
  try {
    sample = validateSample(input);
  } catch (error) {
    if (error instanceof InvalidInputError) {
      console.warn(`[cycle] Rejected sample for plant ${state.plantId}:`, error.issues);
      return { status: 'rejected', error };
    }
    throw error;
  }

  const { smoother } = state;
  smoother.observe('soil', sample.soil_moisture);
  smoother.observe('temperature', sample.temperature);
  smoother.observe('light', sample.light_intensity);

  const avgSoil = smoother.mean('soil');
  const avgTemp = smoother.mean('temperature');
  const avgLight = smoother.mean('light');
  const soilSamples = smoother.count('soil');

  if (soilSamples < MIN_SOIL_SAMPLES || avgSoil === null || avgTemp === null || avgLight === null) {
    return { status: 'warming_up', soilSamples };
  }

  const weather = await state.weather.context(clock());
  const now = clock();

  const decision = decide(
    { avgSoil, avgTemp, nitrogen: sample.nitrogen, potassium: sample.potassium },
    weather
  );

  const pump = state.pump.apply(decision, now);

  const record = buildDecisionRecord({
    now,
    sample,
    averages: { soil: avgSoil, temp: avgTemp, light: avgLight },
    weather,
    decision,
    pumpActive: pump.pumpActive,
    alert: pump.timedOut ? ALERTS.pumpTimeout : decision.alert,
  });

  state.lastRecord = record;
  await deps.publisher.publish(DECISION_EVENT, record, { plantId: state.plantId });

  return { status: 'published', record, decision };
}
