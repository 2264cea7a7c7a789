import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import type { InstanceLease, LeaseStore } from '../types/index.js';
import { leasesEqual } from './lease-store.js';

interface LeaseRow {
  owner_id: string;
  acquired_at: number;
  heartbeat_at: number;
  expires_at: number;
}

const LEASE_NAME = 'poller';

function rowToLease(row: LeaseRow | undefined): InstanceLease | undefined {
  if (!row) return undefined;
  return {
    ownerId: row.owner_id,
    acquiredAt: row.acquired_at,
    heartbeatAt: row.heartbeat_at,
    expiresAt: row.expires_at,
  };
}

/**
 * Lease kept as a single row. The swap runs in an IMMEDIATE transaction, so
 * the write lock is taken before the row is read.
 */
export class SqliteLeaseStore implements LeaseStore {
  private db: Database.Database;

  constructor(path: string) {
    if (path !== ':memory:') {
      mkdirSync(dirname(path), { recursive: true });
    }
    this.db = new Database(path);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('busy_timeout = 1000');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS instance_lease (
        name TEXT PRIMARY KEY,
        owner_id TEXT NOT NULL,
        acquired_at INTEGER NOT NULL,
        heartbeat_at INTEGER NOT NULL,
        expires_at INTEGER NOT NULL
      );
    `);
  }

  async read(): Promise<InstanceLease | undefined> {
    return this.readRow();
  }

  async compareAndSwap(expected: InstanceLease | undefined, next: InstanceLease | undefined): Promise<boolean> {
    const swap = this.db.transaction((): boolean => {
      if (!leasesEqual(this.readRow(), expected)) return false;
      if (next) {
        this.db
          .prepare(
            `INSERT OR REPLACE INTO instance_lease (name, owner_id, acquired_at, heartbeat_at, expires_at)
             VALUES (@name, @ownerId, @acquiredAt, @heartbeatAt, @expiresAt)`,
          )
          .run({ name: LEASE_NAME, ...next });
      } else {
        this.db.prepare(`DELETE FROM instance_lease WHERE name = ?`).run(LEASE_NAME);
      }
      return true;
    });
    return swap.immediate();
  }

  close(): void {
    this.db.close();
  }

  private readRow(): InstanceLease | undefined {
    const row = this.db
      .prepare(`SELECT owner_id, acquired_at, heartbeat_at, expires_at FROM instance_lease WHERE name = ?`)
      .get(LEASE_NAME) as LeaseRow | undefined;
    return rowToLease(row);
  }
}
