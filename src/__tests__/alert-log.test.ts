/**
 * Unit tests for AlertLog
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { AlertLog } from '../audit/alert-log.js';

describe('AlertLog', () => {
  let dir: string;
  let log: AlertLog;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'guard-alert-log-'));
    log = new AlertLog({ databasePath: join(dir, 'nested', 'alerts.db'), batchSize: 10 });
  });

  afterEach(() => {
    log.close();
    rmSync(dir, { recursive: true, force: true });
  });

  describe('Initialization', () => {
    it('should create the database directory', () => {
      expect(existsSync(join(dir, 'nested', 'alerts.db'))).toBe(true);
      expect(log.isInitialized()).toBe(true);
    });

    it('should log a startup event', () => {
      expect(log.query({ type: 'system_startup' })).toHaveLength(1);
    });
  });

  describe('Recording', () => {
    it('should store every field', () => {
      log.record({
        type: 'notification_failed',
        userId: '10001',
        channel: 'direct',
        target: '20002',
        detail: 'not a friend',
      });

      const [entry] = log.query({ type: 'notification_failed' });

      expect(entry).toMatchObject({
        type: 'notification_failed',
        userId: '10001',
        channel: 'direct',
        target: '20002',
        detail: 'not a friend',
      });
      expect(entry?.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(entry?.levelBefore).toBeUndefined();
    });

    it('should store level transitions', () => {
      log.record({ type: 'stage2_escalation', userId: '10001', levelBefore: 1, levelAfter: 2 });

      const [entry] = log.query({ userId: '10001' });

      expect(entry?.levelBefore).toBe(1);
      expect(entry?.levelAfter).toBe(2);
    });

    it('should count the startup event with recorded ones', () => {
      for (let i = 0; i < 12; i++) {
        log.record({ type: 'notification_sent', userId: '10001', channel: 'direct' });
      }
      expect(log.getCount()).toBe(13);
    });
  });

  describe('Querying', () => {
    beforeEach(() => {
      log.record({ type: 'stage1_warning', userId: '10001', levelBefore: 0, levelAfter: 1 });
      log.record({ type: 'notification_sent', userId: '10001', channel: 'email' });
      log.record({ type: 'stage2_escalation', userId: '10001', levelBefore: 1, levelAfter: 2 });
      log.record({ type: 'stage1_warning', userId: '10002', levelBefore: 0, levelAfter: 1 });
    });

    it('should filter by user and type list', () => {
      const entries = log.query({ userId: '10001', types: ['stage1_warning', 'stage2_escalation'], orderDir: 'asc' });
      expect(entries.map((e) => e.type)).toEqual(['stage1_warning', 'stage2_escalation']);
    });

    it('should filter by channel', () => {
      expect(log.query({ channel: 'email' })).toHaveLength(1);
    });

    it('should return newest first by default', () => {
      const entries = log.query({ userId: '10001' });
      expect(entries.map((e) => e.type)).toEqual(['stage2_escalation', 'notification_sent', 'stage1_warning']);
    });

    it('should apply limit and offset', () => {
      const entries = log.query({ userId: '10001', limit: 1, offset: 1 });
      expect(entries.map((e) => e.type)).toEqual(['notification_sent']);
    });

    it('should return the latest transition for a user', () => {
      expect(log.lastTransition('10001')?.type).toBe('stage2_escalation');
      expect(log.lastTransition('10002')?.type).toBe('stage1_warning');
      expect(log.lastTransition('99999')).toBeNull();
    });

    it('should aggregate stats', () => {
      log.record({ type: 'notification_failed', userId: '10002', channel: 'direct' });

      const stats = log.getStats();

      expect(stats.totalEvents).toBe(6);
      expect(stats.byType['stage1_warning']).toBe(2);
      expect(stats.byChannel).toEqual({ email: 1, direct: 1 });
      expect(stats.failedNotifications).toBe(1);
    });
  });

  describe('Retention', () => {
    it('should keep recent entries', () => {
      log.record({ type: 'sweep_complete' });
      expect(log.purgeOldEntries()).toBe(0);
      expect(log.getCount()).toBe(2);
    });
  });

  describe('Close', () => {
    it('should persist a shutdown event across reopen', () => {
      const path = join(dir, 'nested', 'alerts.db');
      log.close();

      const reopened = new AlertLog({ databasePath: path });
      const types = reopened.query({ orderDir: 'asc' }).map((e) => e.type);
      reopened.close();

      expect(types).toEqual(['system_startup', 'system_shutdown', 'system_startup']);
    });
  });
});
