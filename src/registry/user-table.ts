/**
 * UserTable — the single owned in-memory copy of all user records.
 *
 * Callers never hold live references: reads return copies and writes go
 * through `upsert` / `update`, which run synchronously so a record is
 * never observed half-updated. A version counter tracks unsaved changes.
 */

import { cloneRecord, type UserRecord } from '../shared/types.js';

export class UserTable {
  private readonly records = new Map<string, UserRecord>();
  private version = 0;
  private savedVersion = 0;

  get size(): number {
    return this.records.size;
  }

  has(userId: string): boolean {
    return this.records.has(userId);
  }

  get(userId: string): UserRecord | null {
    const record = this.records.get(userId);
    return record ? cloneRecord(record) : null;
  }

  upsert(record: UserRecord): void {
    this.records.set(record.userId, cloneRecord(record));
    this.version++;
  }

  /**
   * Mutates a record in place. The mutator must be synchronous.
   * Returns the updated copy, or null when the user is unknown.
   */
  update(userId: string, mutate: (record: UserRecord) => void): UserRecord | null {
    const record = this.records.get(userId);
    if (!record) return null;
    mutate(record);
    this.version++;
    return cloneRecord(record);
  }

  /** Ids captured now; later registrations are not part of the snapshot. */
  snapshotIds(): string[] {
    return Array.from(this.records.keys());
  }

  values(): UserRecord[] {
    return Array.from(this.records.values(), cloneRecord);
  }

  /** Replaces all contents with freshly loaded records; the result counts as saved. */
  replaceAll(records: Map<string, UserRecord>): void {
    this.records.clear();
    for (const [userId, record] of records) {
      this.records.set(userId, cloneRecord(record));
    }
    this.version++;
    this.savedVersion = this.version;
  }

  // ─── Dirty Tracking ──────────────────────────────────────────

  getVersion(): number {
    return this.version;
  }

  isDirty(): boolean {
    return this.version !== this.savedVersion;
  }

  markDirty(): void {
    this.version++;
  }

  /** Records that everything up to `version` is on disk. */
  markSaved(version: number): void {
    if (version > this.savedVersion) {
      this.savedVersion = version;
    }
  }
}

export default UserTable;
