import { SMOOTHING_WINDOW_SIZE } from './constants';

export type SensorChannel = 'soil' | 'temperature' | 'light';

/**
 * Fixed-capacity FIFO of recent readings.
 * Appending past capacity drops the oldest value.
 */
export class SmoothingWindow {
  private values: number[] = [];

  constructor(private readonly capacity: number = SMOOTHING_WINDOW_SIZE) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`Smoothing window capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(value: number): void {
    this.values.push(value);
    if (this.values.length > this.capacity) {
      this.values.shift();
    }
  }

  /**
   * Arithmetic mean of whatever is currently in the window, or null when empty
   */
  mean(): number | null {
    if (this.values.length === 0) {
      return null;
    }
    return this.values.reduce((a, b) => a + b, 0) / this.values.length;
  }

  size(): number {
    return this.values.length;
  }

  contents(): number[] {
    return [...this.values];
  }
}

export class SensorSmoother {
  private windows: Record<SensorChannel, SmoothingWindow>;

  constructor(capacity: number = SMOOTHING_WINDOW_SIZE) {
    this.windows = {
      soil: new SmoothingWindow(capacity),
      temperature: new SmoothingWindow(capacity),
      light: new SmoothingWindow(capacity),
    };
  }

  observe(channel: SensorChannel, value: number): void {
    this.windows[channel].push(value);
  }

  mean(channel: SensorChannel): number | null {
    return this.windows[channel].mean();
  }

  count(channel: SensorChannel): number {
    return this.windows[channel].size();
  }
}
