import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import path from 'path';
import type { InstanceRecord, User } from './models';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT UNIQUE NOT NULL,
    password_hash TEXT NOT NULL,
    role TEXT DEFAULT 'admin',
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    last_login DATETIME
  );

  CREATE TABLE IF NOT EXISTS instances (
    name TEXT PRIMARY KEY,
    domain TEXT NOT NULL,
    has_enterprise INTEGER NOT NULL DEFAULT 0,
    ssl_enabled INTEGER NOT NULL DEFAULT 0,
    http_port INTEGER NOT NULL,
    gevent_port INTEGER NOT NULL,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );
`;

export interface NewInstanceRecord {
  name: string;
  domain: string;
  hasEnterprise: boolean;
  sslEnabled: boolean;
  httpPort: number;
  geventPort: number;
}

export type Store = ReturnType<typeof createStore>;

/**
 * Open (creating if needed) the metadata database. Pass `:memory:` in tests.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.exec(SCHEMA);
  return db;
}

// Helper functions for database operations
export function createStore(db: Database.Database) {
  return {
    // Users
    getUserByUsername: (username: string) =>
      db.prepare<[string], User>('SELECT * FROM users WHERE username = ?').get(username),

    createUser: (username: string, passwordHash: string, role = 'admin') =>
      db.prepare('INSERT INTO users (username, password_hash, role) VALUES (?, ?, ?)').run(username, passwordHash, role),

    updateUserPassword: (username: string, passwordHash: string) =>
      db.prepare('UPDATE users SET password_hash = ? WHERE username = ?').run(passwordHash, username),

    updateUserLastLogin: (userId: number) =>
      db.prepare('UPDATE users SET last_login = CURRENT_TIMESTAMP WHERE id = ?').run(userId),

    // Instances
    getAllInstances: () =>
      db.prepare<[], InstanceRecord>('SELECT * FROM instances ORDER BY name').all(),

    getInstance: (name: string) =>
      db.prepare<[string], InstanceRecord>('SELECT * FROM instances WHERE name = ?').get(name),

    saveInstance: (record: NewInstanceRecord) =>
      db.prepare(`
        INSERT OR REPLACE INTO instances (name, domain, has_enterprise, ssl_enabled, http_port, gevent_port)
        VALUES (?, ?, ?, ?, ?, ?)
      `).run(
        record.name,
        record.domain,
        record.hasEnterprise ? 1 : 0,
        record.sslEnabled ? 1 : 0,
        record.httpPort,
        record.geventPort
      ),

    deleteInstance: (name: string) =>
      db.prepare('DELETE FROM instances WHERE name = ?').run(name),
  };
}
