/**
 * Unit tests for UserStore
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { UserStore, fromPersisted, toPersisted } from '../storage/user-store.js';
import { AlertLevel, type UserRecord } from '../shared/types.js';

function makeRecord(overrides: Partial<UserRecord> = {}): UserRecord {
  return {
    userId: '10001',
    binding: { botId: '900', groupId: '5555' },
    emergencyContact: '20002',
    email: null,
    maxMissingDays: 3,
    lastActive: 1_700_000_000_000,
    alertLevel: AlertLevel.NORMAL,
    customWarnMessage: null,
    customEmergMessage: null,
    smtp: null,
    ...overrides,
  };
}

describe('UserStore', () => {
  let dir: string;
  let filePath: string;
  let store: UserStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'guard-user-store-'));
    filePath = join(dir, 'users.json');
    store = new UserStore(filePath);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should load an empty table when the file is missing', () => {
    expect(store.load().size).toBe(0);
  });

  it('should round-trip records through disk', async () => {
    const records = [
      makeRecord(),
      makeRecord({
        userId: '10002',
        binding: { botId: '900', groupId: null },
        emergencyContact: null,
        email: 'someone@example.com',
        maxMissingDays: 0.5,
        alertLevel: AlertLevel.WARNED,
        customWarnMessage: 'Hey {uid}',
        smtp: { host: 'smtp.example.com', port: 587 },
      }),
    ];

    await store.save(records);
    const loaded = store.load();

    expect(loaded.get('10001')).toEqual(records[0]);
    expect(loaded.get('10002')).toEqual(records[1]);
  });

  it('should keep the document unchanged across load and save', async () => {
    const doc = {
      '10001': {
        user_id: '10001',
        bot_id: '900',
        max_missing_days: 2,
        last_active: 1_700_000_000_000,
        alert_level: 1,
        group_id: '5555',
        emergency_contact: '20002',
      },
    };
    writeFileSync(filePath, JSON.stringify(doc));

    await store.save(store.load().values());

    expect(JSON.parse(readFileSync(filePath, 'utf-8'))).toEqual(doc);
  });

  it('should convert legacy second timestamps to milliseconds', () => {
    writeFileSync(
      filePath,
      JSON.stringify({ '10001': { user_id: 10001, bot_id: 900, last_active: 1_700_000_000.5 } })
    );

    const record = store.load().get('10001');

    expect(record?.lastActive).toBe(1_700_000_000_500);
    expect(record?.binding.botId).toBe('900');
    expect(record?.maxMissingDays).toBe(3);
    expect(record?.alertLevel).toBe(AlertLevel.NORMAL);
  });

  it('should load empty-string fields as unset', () => {
    writeFileSync(
      filePath,
      JSON.stringify({
        '10001': { user_id: '10001', bot_id: '900', group_id: '', emergency_contact: '', last_active: 1_700_000_000_000 },
      })
    );

    const record = store.load().get('10001');

    expect(record?.binding.groupId).toBeNull();
    expect(record?.emergencyContact).toBeNull();
  });

  it('should set aside undecodable records and keep the rest', () => {
    writeFileSync(
      filePath,
      JSON.stringify({
        '10001': { user_id: '10001', bot_id: '900', last_active: 1_700_000_000_000 },
        '10002': { user_id: '10002', bot_id: '900', last_active: 'yesterday' },
      })
    );

    const loaded = store.load();

    expect(loaded.size).toBe(1);
    expect(loaded.has('10001')).toBe(true);
    expect(store.unreadableKeys()).toEqual(['10002']);
  });

  it('should write undecodable records back unchanged', async () => {
    const unreadable = { user_id: '10002', bot_id: '900', alert_level: 7, last_active: 1_700_000_000_000 };
    writeFileSync(filePath, JSON.stringify({ '10002': unreadable }));

    const loaded = store.load();
    await store.save([...loaded.values(), makeRecord()]);

    expect(JSON.parse(readFileSync(filePath, 'utf-8'))['10002']).toEqual(unreadable);
  });

  it('should coerce numbers written as text', () => {
    writeFileSync(
      filePath,
      JSON.stringify({
        '10001': { user_id: '10001', bot_id: '900', max_missing_days: '0.5', last_active: '1700000000000', alert_level: '1' },
      })
    );

    const record = store.load().get('10001');

    expect(record?.maxMissingDays).toBe(0.5);
    expect(record?.lastActive).toBe(1_700_000_000_000);
    expect(record?.alertLevel).toBe(AlertLevel.WARNED);
  });

  it('should start the clock at load time when last_active is missing', () => {
    writeFileSync(filePath, JSON.stringify({ '10001': { user_id: '10001', bot_id: '900', last_active: null } }));

    expect(store.load(1_700_000_123_000).get('10001')?.lastActive).toBe(1_700_000_123_000);
  });

  it('should recover from a corrupt document', () => {
    writeFileSync(filePath, 'not json at all');

    const result = store.loadWithInfo();

    expect(result.recovered).toBe(true);
    expect(result.data.size).toBe(0);
  });

  describe('mapping', () => {
    it('should omit unset optional fields', () => {
      const row = toPersisted(makeRecord({ binding: { botId: '900', groupId: null }, emergencyContact: null }));
      expect(row).toEqual({
        user_id: '10001',
        bot_id: '900',
        max_missing_days: 3,
        last_active: 1_700_000_000_000,
        alert_level: 0,
      });
    });

    it('should use the key when user_id is missing', () => {
      const record = fromPersisted('30003', { bot_id: '900', last_active: 1_700_000_000_000 });
      expect(record?.userId).toBe('30003');
    });

    it('should leave out-of-range alert levels undecoded', () => {
      expect(fromPersisted('30003', { bot_id: '900', last_active: 1, alert_level: 5 })).toBeNull();
    });
  });
});
