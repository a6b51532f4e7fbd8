import type { Database } from "better-sqlite3";

export interface UserSettings {
  userId: string;
  enabled: boolean;
  filter: string | null;
  filterEnabled: boolean;
}

interface UserRow {
  user_id: string;
  enabled: number;
  filter: string | null;
  filter_enabled: number;
}

export class UserStore {
  private db: Database;

  constructor(db: Database) {
    this.db = db;
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS user_settings (
        user_id TEXT PRIMARY KEY,
        enabled INTEGER NOT NULL DEFAULT 0,
        filter TEXT,
        filter_enabled INTEGER NOT NULL DEFAULT 0,
        updated_at TEXT NOT NULL
      )
    `);
  }

  get(userId: string): UserSettings {
    const row = this.db
      .prepare<[string], UserRow>(
        `SELECT user_id, enabled, filter, filter_enabled FROM user_settings WHERE user_id = ?`
      )
      .get(userId);
    return row ? this.rowToSettings(row) : { userId, enabled: false, filter: null, filterEnabled: false };
  }

  setEnabled(userId: string, enabled: boolean): void {
    this.db
      .prepare(
        `INSERT INTO user_settings (user_id, enabled, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(user_id) DO UPDATE SET enabled = excluded.enabled, updated_at = excluded.updated_at`
      )
      .run(userId, enabled ? 1 : 0, new Date().toISOString());
  }

  /** Stores a new filter and turns it on. */
  setFilter(userId: string, filter: string): void {
    this.db
      .prepare(
        `INSERT INTO user_settings (user_id, filter, filter_enabled, updated_at) VALUES (?, ?, 1, ?)
         ON CONFLICT(user_id) DO UPDATE SET filter = excluded.filter, filter_enabled = 1, updated_at = excluded.updated_at`
      )
      .run(userId, filter, new Date().toISOString());
  }

  setFilterEnabled(userId: string, enabled: boolean): void {
    this.db
      .prepare(
        `INSERT INTO user_settings (user_id, filter_enabled, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(user_id) DO UPDATE SET filter_enabled = excluded.filter_enabled, updated_at = excluded.updated_at`
      )
      .run(userId, enabled ? 1 : 0, new Date().toISOString());
  }

  countEnabled(): number {
    const row = this.db
      .prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM user_settings WHERE enabled = 1`)
      .get();
    return row?.count ?? 0;
  }

  private rowToSettings(row: UserRow): UserSettings {
    return {
      userId: row.user_id,
      enabled: row.enabled === 1,
      filter: row.filter,
      filterEnabled: row.filter_enabled === 1,
    };
  }
}
