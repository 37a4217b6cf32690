import { describe, it, expect, beforeEach, vi } from 'vitest';
import { PlantRegistry } from './registry';
import type { WeatherSource } from '../automation/weatherContext';

const weather: WeatherSource = {
  fetchCurrent: async () => ({ status_ok: true, condition: 'Clear', temp: 25, humidity: 60 }),
};

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('PlantRegistry', () => {
  let now: number;
  let registry: PlantRegistry;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    now = 0;
    registry = new PlantRegistry(weather, {}, () => now);
  });

  it('creates state lazily and keeps it per plant', async () => {
    expect(registry.get('basil')).toBeNull();

    const first = await registry.run('basil', async state => state);
    const second = await registry.run('basil', async state => state);
    const other = await registry.run('mint', async state => state);

    expect(first).toBe(second);
    expect(other).not.toBe(first);
    expect(other.plantId).toBe('mint');
    expect(registry.size()).toBe(2);
  });

  it('runs tasks for one plant one at a time, in order', async () => {
    const order: string[] = [];
    const gate = deferred();

    const slow = registry.run('basil', async () => {
      order.push('slow:start');
      await gate.promise;
      order.push('slow:end');
    });
    const fast = registry.run('basil', async () => {
      order.push('fast');
    });

    await Promise.resolve();
    expect(order).toEqual(['slow:start']);

    gate.resolve();
    await Promise.all([slow, fast]);
    expect(order).toEqual(['slow:start', 'slow:end', 'fast']);
  });

  it('does not hold one plant behind another', async () => {
    const gate = deferred();
    const blocked = registry.run('basil', () => gate.promise);

    await expect(registry.run('mint', async () => 'done')).resolves.toBe('done');

    gate.resolve();
    await blocked;
  });

  it('keeps the queue moving after a failed task', async () => {
    const failing = registry.run('basil', async () => {
      throw new Error('boom');
    });
    const next = registry.run('basil', async () => 'recovered');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('recovered');
  });

  it('evicts plants idle past the ttl', async () => {
    await registry.run('basil', async () => undefined);
    now = 5000;
    await registry.run('mint', async () => undefined);

    now = 12000;
    expect(registry.evictIdle(now, 10000)).toEqual(['basil']);
    expect(registry.has('basil')).toBe(false);
    expect(registry.has('mint')).toBe(true);
  });

  it('never evicts a plant with queued work', async () => {
    const gate = deferred();
    const pending = registry.run('basil', () => gate.promise);

    expect(registry.evictIdle(60000, 1000)).toEqual([]);

    gate.resolve();
    await pending;
  });
});
