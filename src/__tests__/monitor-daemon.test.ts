/**
 * Unit tests for MonitorDaemon
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { MonitorDaemon } from '../engine/monitor-daemon.js';
import { EscalationEngine, type SweepReport } from '../engine/escalation-engine.js';
import { UserRegistry } from '../registry/user-registry.js';
import { UserStore } from '../storage/user-store.js';
import { BotRegistry } from '../channels/chat-channel.js';

function emptyReport(): SweepReport {
  return { evaluated: 0, warned: [], escalated: [], skipped: [], failed: [], durationMs: 0 };
}

describe('MonitorDaemon', () => {
  let dir: string;
  let registry: UserRegistry;
  let engine: EscalationEngine;
  let daemon: MonitorDaemon;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'guard-daemon-'));
    registry = new UserRegistry(new UserStore(join(dir, 'users.json')));
    engine = new EscalationEngine({ registry, bots: new BotRegistry(), email: { notify: () => false } });
    daemon = new MonitorDaemon(engine, registry, { checkIntervalSeconds: 60 });
  });

  afterEach(async () => {
    await daemon.stop();
    vi.useRealTimers();
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  describe('tick', () => {
    it('should run a sweep and record it', async () => {
      registry.registerOrCheckin('10001', { botId: '900', groupId: null });
      const completed: SweepReport[] = [];
      daemon.on('sweep:complete', (report: SweepReport) => completed.push(report));

      const report = await daemon.tick();

      expect(report?.evaluated).toBe(1);
      expect(completed).toEqual([report]);
      const status = daemon.getStatus();
      expect(status.sweepCount).toBe(1);
      expect(status.lastReport).toBe(report);
      expect(status.lastSweepAt).toBeInstanceOf(Date);
      expect(status.users).toBe(1);
    });

    it('should flush pending changes before sweeping', async () => {
      registry.registerOrCheckin('10001', { botId: '900', groupId: null });

      await daemon.tick();

      expect(registry.isDirty()).toBe(false);
    });

    it('should skip a tick while a sweep is running', async () => {
      let finish: (report: SweepReport) => void = () => undefined;
      vi.spyOn(engine, 'sweep').mockImplementation(
        () => new Promise<SweepReport>((resolve) => { finish = resolve; })
      );
      const skipped = vi.fn();
      daemon.on('tick:skipped', skipped);

      const first = daemon.tick();
      await new Promise((resolve) => setImmediate(resolve));
      expect(daemon.getStatus().sweeping).toBe(true);

      expect(await daemon.tick()).toBeNull();
      expect(skipped).toHaveBeenCalledTimes(1);
      expect(daemon.getStatus().skippedTicks).toBe(1);

      finish(emptyReport());
      expect(await first).toEqual(emptyReport());
      expect(daemon.getStatus().sweeping).toBe(false);
      expect(engine.sweep).toHaveBeenCalledTimes(1);
    });

    it('should report a failed sweep without rejecting', async () => {
      vi.spyOn(engine, 'sweep').mockRejectedValueOnce(new Error('boom'));
      const errors: Error[] = [];
      daemon.on('sweep:error', (error: Error) => errors.push(error));

      expect(await daemon.tick()).toBeNull();

      expect(errors.map((e) => e.message)).toEqual(['boom']);
      expect(daemon.getStatus().sweepCount).toBe(0);
    });
  });

  describe('lifecycle', () => {
    it('should sweep on every interval', async () => {
      vi.useFakeTimers();
      const sweep = vi.spyOn(engine, 'sweep').mockResolvedValue(emptyReport());

      daemon.start();
      expect(daemon.getStatus().running).toBe(true);
      expect(sweep).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(60_000);
      expect(sweep).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(120_000);
      expect(sweep).toHaveBeenCalledTimes(3);
    });

    it('should sweep at once when asked to', async () => {
      const sweep = vi.spyOn(engine, 'sweep').mockResolvedValue(emptyReport());
      const eager = new MonitorDaemon(engine, registry, { checkIntervalSeconds: 60, sweepOnStart: true });

      eager.start();
      await eager.stop();

      expect(sweep).toHaveBeenCalledTimes(1);
    });

    it('should flush on stop', async () => {
      daemon.start();
      registry.registerOrCheckin('10001', { botId: '900', groupId: null });

      await daemon.stop();

      expect(registry.isDirty()).toBe(false);
      expect(daemon.getStatus().running).toBe(false);
    });
  });
});
