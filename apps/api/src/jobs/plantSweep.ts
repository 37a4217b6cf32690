import type { PlantRegistry } from '../plants/registry';

/**
 * Forget plants that have stopped reporting, so their smoothing windows,
 * weather cache and pump state do not accumulate forever.
 */
export function sweepIdlePlants(registry: PlantRegistry, idleTtlMinutes: number, now: number = Date.now()): string[] {
  const evicted = registry.evictIdle(now, idleTtlMinutes * 60 * 1000);

  if (evicted.length > 0) {
    console.log(`Evicted ${evicted.length} idle plant(s): ${evicted.join(', ')}`);
  }

  return evicted;
}
