import { PUMP_MAX_PULSE_MS } from './constants';

export type PumpStatus = 'idle' | 'running';

export interface PumpState {
  status: PumpStatus;
  activationStartedAt: number | null; // epoch ms of the last idle -> running edge
}

export interface PumpCommand {
  pumpRequest: boolean;
  lock: boolean;
}

export interface PumpTransition {
  from: PumpStatus;
  to: PumpStatus;
  pumpActive: boolean;
  timedOut: boolean;
}

/**
 * Pulse irrigation state machine.
 *
 * A single activation may run for at most PUMP_MAX_PULSE_MS. The timeout is
 * checked before any other signal; a new activation needs a fresh idle -> running edge.
 */
export class PumpController {
  private state: PumpState = { status: 'idle', activationStartedAt: null };

  constructor(private readonly maxPulseMs: number = PUMP_MAX_PULSE_MS) {}

  getState(): PumpState {
    return { ...this.state };
  }

  isActive(): boolean {
    return this.state.status === 'running';
  }

  apply(command: PumpCommand, now: number): PumpTransition {
    const from = this.state.status;
    const wantsWater = command.pumpRequest && !command.lock;

    if (from === 'idle') {
      if (wantsWater) {
        this.state = { status: 'running', activationStartedAt: now };
      }
      return this.transition(from, false);
    }

    const startedAt = this.state.activationStartedAt ?? now;
    if (now - startedAt > this.maxPulseMs) {
      console.warn(`[pump] Pulse exceeded ${this.maxPulseMs}ms, forcing pump off`);
      this.state = { status: 'idle', activationStartedAt: startedAt };
      return this.transition(from, true);
    }

    if (!wantsWater) {
      this.state = { status: 'idle', activationStartedAt: startedAt };
    }
    return this.transition(from, false);
  }

  private transition(from: PumpStatus, timedOut: boolean): PumpTransition {
    return {
      from,
      to: this.state.status,
      pumpActive: this.state.status === 'running',
      timedOut,
    };
  }
}
