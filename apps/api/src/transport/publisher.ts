import type { DecisionLabel } from '../automation/engine';
import type { DECISION_EVENT } from '../automation/constants';

export type VpdStatus = 'computed' | 'not_computed' | 'unavailable';

/**
 * Wire shape of one cycle's decision, as pushed to dashboards
 */
export interface DecisionRecord {
  timestamp: string; // HH:MM:SS, local time
  sensors: {
    soil: number;
    temp: number;
    light: number;
    npk: string;
  };
  weather: {
    condition: string;
    temp: number;
    humidity: number;
    vpd: number;
    vpd_status: VpdStatus;
  };
  system: {
    pump_active: boolean;
    algorithm_state: DecisionLabel;
    alert: string;
    battery_level: number;
  };
}

export type DecisionEvent = typeof DECISION_EVENT;

export interface PublishContext {
  plantId: string;
}

export interface DecisionPublisher {
  publish(event: DecisionEvent, record: DecisionRecord, context: PublishContext): void | Promise<void>;
}

/**
 * Publisher that writes a one-line summary per decision to the console.
 * Stands in for the real-time transport when none is attached.
 */
export class ConsolePublisher implements DecisionPublisher {
  publish(event: DecisionEvent, record: DecisionRecord, context: PublishContext): void {
    console.log(
      `[publish] ${event} plant=${context.plantId} state=${record.system.algorithm_state} ` +
      `pump=${record.system.pump_active ? 'on' : 'off'} soil=${record.sensors.soil} ` +
      `vpd=${record.weather.vpd} alert="${record.system.alert}"`
    );
  }
}
