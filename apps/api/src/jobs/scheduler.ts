import * as cron from 'node-cron';
import { sweepIdlePlants } from './plantSweep';
import type { PlantRegistry } from '../plants/registry';

let sweepJob: cron.ScheduledTask | null = null;

export interface SchedulerOptions {
  idleTtlMinutes: number;
  timezone: string;
}

export function startScheduler(registry: PlantRegistry, options: SchedulerOptions): void {
  console.log('Starting job scheduler...');

  if (sweepJob) {
    console.warn('[scheduler] Already running, restarting');
    stopScheduler();
  }

  // Idle plant sweep: every 15 minutes
  sweepJob = cron.schedule('*/15 * * * *', () => {
    try {
      sweepIdlePlants(registry, options.idleTtlMinutes);
    } catch (error) {
      console.error('[scheduler] Idle plant sweep failed:', error);
    }
  }, {
    scheduled: true,
    timezone: options.timezone,
  });

  console.log('Job scheduler started');
  console.log(`  - Idle plant sweep: every 15 minutes (ttl ${options.idleTtlMinutes} minutes)`);
}

export function stopScheduler(): void {
  if (sweepJob) {
    sweepJob.stop();
    sweepJob = null;
  }
  console.log('Job scheduler stopped');
}
