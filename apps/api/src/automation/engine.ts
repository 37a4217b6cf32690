import { calculateVpd, VpdReading } from './vpd';
import type { WeatherSnapshot } from './weatherContext';
import {
  ALERTS,
  DEFAULT_WATERING_THRESHOLD_PERCENT,
  HEAT_STRESS_THRESHOLD_CELSIUS,
  HIGH_TRANSPIRATION_VPD_KPA,
  HIGH_VPD_WATERING_THRESHOLD_PERCENT,
  NUTRIENT_BURN_THRESHOLD_PPM,
  RAIN_CONDITION,
  RAIN_WATERING_THRESHOLD_PERCENT,
  SOIL_SATURATION_THRESHOLD_PERCENT,
} from './constants';

export type DecisionLabel =
  | 'Optimal'
  | 'SaturationLock'
  | 'HeatStress'
  | 'SalinityRisk'
  | 'RainingPassive'
  | 'HighTranspiration'
  | 'CriticalPulseIrrigation';

export interface DecisionInputs {
  avgSoil: number;
  avgTemp: number;
  nitrogen: number;
  potassium: number;
}

export interface SafetyVerdict {
  lock: boolean;
  label: DecisionLabel;
  alert: string;
}

export interface IntelligenceVerdict {
  label: DecisionLabel;
  pumpRequest: boolean;
  threshold: number;
  vpd: VpdReading;
}

export interface Decision {
  label: DecisionLabel;
  alert: string;
  lock: boolean;
  pumpRequest: boolean;
  threshold: number | null; // null when the intelligence layer was skipped
  vpd: VpdReading;
}

interface SafetyRule {
  label: DecisionLabel;
  alert: string;
  matches: (inputs: DecisionInputs) => boolean;
}

/**
 * Safety interlocks in priority order. Only the first match applies.
 */
const SAFETY_RULES: readonly SafetyRule[] = [
  {
    label: 'SaturationLock',
    alert: ALERTS.saturation,
    matches: ({ avgSoil }) => avgSoil > SOIL_SATURATION_THRESHOLD_PERCENT,
  },
  {
    label: 'HeatStress',
    alert: ALERTS.heatStress,
    matches: ({ avgTemp }) => avgTemp > HEAT_STRESS_THRESHOLD_CELSIUS,
  },
  {
    label: 'SalinityRisk',
    alert: ALERTS.salinity,
    matches: ({ nitrogen, potassium }) =>
      nitrogen > NUTRIENT_BURN_THRESHOLD_PPM || potassium > NUTRIENT_BURN_THRESHOLD_PPM,
  },
];

export function evaluateSafety(inputs: DecisionInputs): SafetyVerdict {
  const rule = SAFETY_RULES.find(candidate => candidate.matches(inputs));
  if (rule) {
    return { lock: true, label: rule.label, alert: rule.alert };
  }
  return { lock: false, label: 'Optimal', alert: ALERTS.normal };
}

/**
 * VPD-informed watering threshold. Rain lowers the threshold, dry air raises it.
 * The critical check runs last and overrides either adjustment's label.
 */
export function evaluateIntelligence(
  avgSoil: number,
  avgTemp: number,
  weather: Pick<WeatherSnapshot, 'condition' | 'outsideHumidity'>
): IntelligenceVerdict {
  const vpd = calculateVpd(avgTemp, weather.outsideHumidity);
  let threshold = DEFAULT_WATERING_THRESHOLD_PERCENT;
  let label: DecisionLabel = 'Optimal';

  if (weather.condition === RAIN_CONDITION) {
    threshold = RAIN_WATERING_THRESHOLD_PERCENT;
    label = 'RainingPassive';
  } else if (vpd.status === 'computed' && vpd.value > HIGH_TRANSPIRATION_VPD_KPA) {
    threshold = HIGH_VPD_WATERING_THRESHOLD_PERCENT;
    label = 'HighTranspiration';
  }

  if (avgSoil < threshold) {
    return { label: 'CriticalPulseIrrigation', pumpRequest: true, threshold, vpd };
  }

  return { label, pumpRequest: false, threshold, vpd };
}

/**
 * Evaluate both layers for one cycle
 */
export function decide(
  inputs: DecisionInputs,
  weather: Pick<WeatherSnapshot, 'condition' | 'outsideHumidity'>
): Decision {
  const safety = evaluateSafety(inputs);

  if (safety.lock) {
    return {
      label: safety.label,
      alert: safety.alert,
      lock: true,
      pumpRequest: false,
      threshold: null,
      vpd: { status: 'not_computed' },
    };
  }

  const intelligence = evaluateIntelligence(inputs.avgSoil, inputs.avgTemp, weather);

  return {
    label: intelligence.label,
    alert: safety.alert,
    lock: false,
    pumpRequest: intelligence.pumpRequest,
    threshold: intelligence.threshold,
    vpd: intelligence.vpd,
  };
}
