/**
 * Monitor Daemon — periodic sweep and persistence
 *
 * Provides:
 * 1. A fixed-interval escalation sweep
 * 2. Flushing of dirty user state before each sweep and on stop
 * 3. Status reporting for the admin API
 */

import pino from 'pino';
import { EventEmitter } from 'events';

import type { EscalationEngine, SweepReport } from './escalation-engine.js';
import type { UserRegistry } from '../registry/user-registry.js';
import { errorMessage } from '../shared/types.js';

const logger = pino({ name: 'guard:daemon', level: process.env['LOG_LEVEL'] ?? 'info' });

// ─── Configuration ───────────────────────────────────────────

export interface MonitorDaemonConfig {
  /** Seconds between sweeps. */
  checkIntervalSeconds: number;
  /** Run a sweep immediately on start. */
  sweepOnStart: boolean;
}

export const DEFAULT_CONFIG: MonitorDaemonConfig = {
  checkIntervalSeconds: 3600, // 1 hour
  sweepOnStart: false,
};

// ─── Types ───────────────────────────────────────────────────

export interface DaemonStatus {
  running: boolean;
  sweeping: boolean;
  checkIntervalSeconds: number;
  startedAt: Date | null;
  lastSweepAt: Date | null;
  lastReport: SweepReport | null;
  sweepCount: number;
  skippedTicks: number;
  users: number;
}

// ─── Monitor Daemon Class ────────────────────────────────────

export class MonitorDaemon extends EventEmitter {
  private readonly config: MonitorDaemonConfig;
  private readonly engine: EscalationEngine;
  private readonly registry: UserRegistry;

  private interval?: ReturnType<typeof setInterval>;
  private inFlight: Promise<SweepReport | null> | null = null;
  private isRunning = false;
  private startedAt: Date | null = null;

  // Metrics
  private sweepCount = 0;
  private skippedTicks = 0;
  private lastSweepAt: Date | null = null;
  private lastReport: SweepReport | null = null;

  constructor(engine: EscalationEngine, registry: UserRegistry, config: Partial<MonitorDaemonConfig> = {}) {
    super();
    this.engine = engine;
    this.registry = registry;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  // ─── Lifecycle ───────────────────────────────────────────────

  /**
   * Start the sweep timer
   */
  start(): void {
    if (this.isRunning) {
      logger.warn('Monitor daemon already running');
      return;
    }

    logger.info({ config: this.config }, 'Starting monitor daemon');
    this.isRunning = true;
    this.startedAt = new Date();

    this.interval = setInterval(() => {
      void this.tick();
    }, this.config.checkIntervalSeconds * 1000);

    if (this.config.sweepOnStart) {
      void this.tick();
    }
  }

  /**
   * Stop the timer, wait for a running sweep and flush state
   */
  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    logger.info('Stopping monitor daemon');

    if (this.interval) {
      clearInterval(this.interval);
      this.interval = undefined;
    }
    this.isRunning = false;

    if (this.inFlight) {
      await this.inFlight;
    }
    await this.registry.flush();
  }

  // ─── Sweeping ────────────────────────────────────────────────

  /**
   * Flush pending changes, then run one sweep.
   * Returns null when a previous sweep is still running. Never rejects.
   */
  async tick(): Promise<SweepReport | null> {
    if (this.inFlight) {
      this.skippedTicks++;
      logger.warn('Previous sweep still running, skipping tick');
      this.emit('tick:skipped');
      return null;
    }

    this.inFlight = this.runSweep();
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  getStatus(): DaemonStatus {
    return {
      running: this.isRunning,
      sweeping: this.inFlight !== null,
      checkIntervalSeconds: this.config.checkIntervalSeconds,
      startedAt: this.startedAt,
      lastSweepAt: this.lastSweepAt,
      lastReport: this.lastReport,
      sweepCount: this.sweepCount,
      skippedTicks: this.skippedTicks,
      users: this.registry.count(),
    };
  }

  private async runSweep(): Promise<SweepReport | null> {
    try {
      await this.registry.flush();
      const report = await this.engine.sweep();

      this.sweepCount++;
      this.lastSweepAt = new Date();
      this.lastReport = report;
      this.emit('sweep:complete', report);
      return report;
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Sweep failed');
      this.emit('sweep:error', error instanceof Error ? error : new Error(errorMessage(error)));
      return null;
    }
  }
}

export default MonitorDaemon;
