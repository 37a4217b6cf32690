/**
 * Vapor pressure deficit in kPa, from air temperature (°C) and relative humidity (%).
 * Uses the Tetens form of the saturation vapor pressure curve.
 */

export type VpdReading =
  | { status: 'computed'; value: number }
  | { status: 'not_computed' }
  | { status: 'unavailable'; reason: string };

const TETENS_A = 0.6108;
const TETENS_B = 17.27;
const TETENS_C = 237.3;

export function calculateVpd(temperature: number, humidity: number): VpdReading {
  const denominator = temperature + TETENS_C;
  if (denominator === 0) {
    return { status: 'unavailable', reason: `temperature ${temperature} is outside the VPD domain` };
  }

  const saturation = TETENS_A * Math.exp((TETENS_B * temperature) / denominator);
  const actual = saturation * (humidity / 100);
  const value = saturation - actual;

  if (!Number.isFinite(value)) {
    return { status: 'unavailable', reason: `VPD is not finite for temperature=${temperature} humidity=${humidity}` };
  }

  return { status: 'computed', value };
}
