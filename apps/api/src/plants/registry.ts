import { createPlantState, PlantState, PlantStateOptions } from '../automation/plantState';
import type { WeatherSource } from '../automation/weatherContext';

interface PlantEntry {
  state: PlantState;
  tail: Promise<void>;
  pending: number;
  lastActivityAt: number;
}

/**
 * Owns per-plant state and serializes work for each plant.
 *
 * Tasks for the same plant run one at a time in the order they were queued.
 * Tasks for different plants do not wait on each other.
 */
export class PlantRegistry {
  private plants = new Map<string, PlantEntry>();

  constructor(
    private readonly weatherSource: WeatherSource,
    private readonly options: PlantStateOptions = {},
    private readonly clock: () => number = Date.now
  ) {}

  has(plantId: string): boolean {
    return this.plants.has(plantId);
  }

  get(plantId: string): PlantState | null {
    return this.plants.get(plantId)?.state ?? null;
  }

  size(): number {
    return this.plants.size;
  }

  run<T>(plantId: string, task: (state: PlantState) => Promise<T>): Promise<T> {
    const entry = this.getOrCreate(plantId);
    entry.pending++;
    entry.lastActivityAt = this.clock();

    const result = entry.tail.then(() => task(entry.state));

    // A failure belongs to its caller; the next queued task still runs
    entry.tail = result.then(
      () => this.settle(entry),
      () => this.settle(entry)
    );

    return result;
  }

  /**
   * Drop plants with no queued work and no activity within ttlMs.
   * Returns the evicted plant IDs.
   */
  evictIdle(now: number, ttlMs: number): string[] {
    const evicted: string[] = [];
    for (const [plantId, entry] of this.plants) {
      if (entry.pending === 0 && now - entry.lastActivityAt > ttlMs) {
        this.plants.delete(plantId);
        evicted.push(plantId);
      }
    }
    return evicted;
  }

  private settle(entry: PlantEntry): void {
    entry.pending--;
    entry.lastActivityAt = this.clock();
  }

  private getOrCreate(plantId: string): PlantEntry {
    let entry = this.plants.get(plantId);
    if (!entry) {
      entry = {
        state: createPlantState(plantId, this.weatherSource, this.options),
        tail: Promise.resolve(),
        pending: 0,
        lastActivityAt: this.clock(),
      };
      this.plants.set(plantId, entry);
      console.log(`[plants] Registered plant ${plantId}`);
    }
    return entry;
  }
}
