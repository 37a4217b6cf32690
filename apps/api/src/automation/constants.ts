/**
 * Irrigation policy constants
 * These are fixed policy, not per-plant settings
 */

// Safety layer thresholds
export const SOIL_SATURATION_THRESHOLD_PERCENT = 80;
export const HEAT_STRESS_THRESHOLD_CELSIUS = 35;
export const NUTRIENT_BURN_THRESHOLD_PPM = 200; // Applies to nitrogen and potassium

// Intelligence layer thresholds (soil moisture %)
export const DEFAULT_WATERING_THRESHOLD_PERCENT = 40;
export const RAIN_WATERING_THRESHOLD_PERCENT = 20;
export const HIGH_VPD_WATERING_THRESHOLD_PERCENT = 50;
export const HIGH_TRANSPIRATION_VPD_KPA = 1.2;
export const RAIN_CONDITION = 'Rain';

// Smoothing
export const SMOOTHING_WINDOW_SIZE = 5;
export const MIN_SOIL_SAMPLES = 2;

// Weather context
export const WEATHER_REFRESH_INTERVAL_MS = 600 * 1000;
export const WEATHER_FALLBACK_CONDITION = 'Clouds';
export const INITIAL_WEATHER_CONDITION = 'Unknown';
export const INITIAL_OUTSIDE_TEMP_CELSIUS = 30;
export const INITIAL_OUTSIDE_HUMIDITY_PERCENT = 70;

// Pump pulse limit
export const PUMP_MAX_PULSE_MS = 10 * 1000;

// Simulated until the device reports a real battery reading
export const BATTERY_LEVEL_PLACEHOLDER = 85;

export const DECISION_EVENT = 'system_update';

export const ALERTS = {
  saturation: 'Soil too wet! Pump disabled.',
  heatStress: 'High Temp! Watering paused.',
  salinity: 'Nutrient Burn Risk! Flush soil.',
  normal: 'System Normal',
  pumpTimeout: 'Pump Timeout (Safety)',
} as const;
