import { describe, it, expect } from 'vitest';
import { decide, evaluateIntelligence, evaluateSafety } from './engine';

const clearSky = { condition: 'Clear', outsideHumidity: 70 };

describe('evaluateSafety', () => {
  it('locks on saturated soil before checking heat', () => {
    const verdict = evaluateSafety({ avgSoil: 85, avgTemp: 40, nitrogen: 50, potassium: 50 });
    expect(verdict).toEqual({ lock: true, label: 'SaturationLock', alert: 'Soil too wet! Pump disabled.' });
  });

  it('locks on heat stress before checking nutrients', () => {
    const verdict = evaluateSafety({ avgSoil: 50, avgTemp: 36, nitrogen: 250, potassium: 50 });
    expect(verdict).toEqual({ lock: true, label: 'HeatStress', alert: 'High Temp! Watering paused.' });
  });

  it('locks on high nitrogen or potassium', () => {
    expect(evaluateSafety({ avgSoil: 50, avgTemp: 25, nitrogen: 201, potassium: 10 }).label).toBe('SalinityRisk');
    expect(evaluateSafety({ avgSoil: 50, avgTemp: 25, nitrogen: 10, potassium: 201 }).alert).toBe(
      'Nutrient Burn Risk! Flush soil.'
    );
  });

  it('treats thresholds as exclusive', () => {
    const verdict = evaluateSafety({ avgSoil: 80, avgTemp: 35, nitrogen: 200, potassium: 200 });
    expect(verdict).toEqual({ lock: false, label: 'Optimal', alert: 'System Normal' });
  });
});

describe('evaluateIntelligence', () => {
  it('uses the default threshold in calm conditions', () => {
    const verdict = evaluateIntelligence(45, 28, clearSky);
    expect(verdict.threshold).toBe(40);
    expect(verdict.label).toBe('Optimal');
    expect(verdict.pumpRequest).toBe(false);
  });

  it('raises the threshold when transpiration is high', () => {
    // vpd(30, 40) is about 2.55 kPa
    const verdict = evaluateIntelligence(45, 30, { condition: 'Clear', outsideHumidity: 40 });
    expect(verdict.threshold).toBe(50);
    expect(verdict.label).toBe('CriticalPulseIrrigation');
    expect(verdict.pumpRequest).toBe(true);
  });

  it('keeps the high transpiration label when soil is wet enough', () => {
    const verdict = evaluateIntelligence(60, 30, { condition: 'Clear', outsideHumidity: 40 });
    expect(verdict.label).toBe('HighTranspiration');
    expect(verdict.pumpRequest).toBe(false);
  });

  it('lowers the threshold when it rains, even in dry air', () => {
    const verdict = evaluateIntelligence(30, 30, { condition: 'Rain', outsideHumidity: 40 });
    expect(verdict.threshold).toBe(20);
    expect(verdict.label).toBe('RainingPassive');
    expect(verdict.pumpRequest).toBe(false);
  });

  it('still pulses when soil is below the rain threshold', () => {
    const verdict = evaluateIntelligence(15, 25, { condition: 'Rain', outsideHumidity: 90 });
    expect(verdict.label).toBe('CriticalPulseIrrigation');
    expect(verdict.pumpRequest).toBe(true);
  });

  it('ignores the VPD adjustment when VPD is unavailable', () => {
    const verdict = evaluateIntelligence(45, -237.3, clearSky);
    expect(verdict.vpd.status).toBe('unavailable');
    expect(verdict.threshold).toBe(40);
    expect(verdict.label).toBe('Optimal');
  });
});

describe('decide', () => {
  it('skips the intelligence layer when locked', () => {
    const decision = decide({ avgSoil: 10, avgTemp: 40, nitrogen: 50, potassium: 50 }, clearSky);
    expect(decision).toEqual({
      label: 'HeatStress',
      alert: 'High Temp! Watering paused.',
      lock: true,
      pumpRequest: false,
      threshold: null,
      vpd: { status: 'not_computed' },
    });
  });

  it('requests a pulse for dry soil in calm weather', () => {
    const decision = decide({ avgSoil: 30, avgTemp: 28, nitrogen: 50, potassium: 50 }, clearSky);
    expect(decision.lock).toBe(false);
    expect(decision.pumpRequest).toBe(true);
    expect(decision.label).toBe('CriticalPulseIrrigation');
    expect(decision.alert).toBe('System Normal');
    expect(decision.threshold).toBe(40);
    expect(decision.vpd.status).toBe('computed');
  });
});
