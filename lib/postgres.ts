import type { CommandRunner } from './exec';
import { DatabaseError, errorMessage } from './errors';

export interface DatabaseAdmin {
  roleExists(role: string): Promise<boolean>;
  createRole(role: string, password: string, options?: { superuser?: boolean }): Promise<void>;
  /** Names of every database whose owner is `role`. */
  listOwnedDatabases(role: string): Promise<string[]>;
  terminateConnections(database: string): Promise<void>;
  dropDatabase(database: string): Promise<void>;
  dropRole(role: string): Promise<void>;
}

export function quoteIdentifier(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Administers the local cluster as the `postgres` OS user through psql.
 * SQL is written to psql's stdin so passwords never show up in argv.
 */
export class PsqlDatabaseAdmin implements DatabaseAdmin {
  constructor(private runner: CommandRunner, private superuser = 'postgres') {}

  private async query(sql: string, description: string): Promise<string[]> {
    try {
      const { stdout } = await this.runner.run(
        'psql',
        ['-X', '-q', '-t', '-A', '-v', 'ON_ERROR_STOP=1', '-d', 'postgres'],
        { asUser: this.superuser, input: sql }
      );
      return stdout
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
    } catch (error) {
      throw new DatabaseError(`Failed to ${description}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async roleExists(role: string): Promise<boolean> {
    const rows = await this.query(
      `SELECT 1 FROM pg_roles WHERE rolname = ${quoteLiteral(role)};`,
      `look up role "${role}"`
    );
    return rows.length > 0;
  }

  async createRole(role: string, password: string, options: { superuser?: boolean } = {}): Promise<void> {
    if (await this.roleExists(role)) {
      throw new DatabaseError(`PostgreSQL role "${role}" already exists`);
    }
    const attributes = options.superuser ? 'LOGIN CREATEDB SUPERUSER' : 'LOGIN CREATEDB';
    await this.query(
      `CREATE ROLE ${quoteIdentifier(role)} WITH ${attributes} PASSWORD ${quoteLiteral(password)};`,
      `create role "${role}"`
    );
  }

  listOwnedDatabases(role: string): Promise<string[]> {
    return this.query(
      `SELECT datname FROM pg_database WHERE datdba = (SELECT oid FROM pg_roles WHERE rolname = ${quoteLiteral(role)}) ORDER BY datname;`,
      `list databases owned by "${role}"`
    );
  }

  async terminateConnections(database: string): Promise<void> {
    await this.query(
      `SELECT pg_terminate_backend(pid) FROM pg_stat_activity WHERE datname = ${quoteLiteral(database)} AND pid <> pg_backend_pid();`,
      `terminate connections to "${database}"`
    );
  }

  async dropDatabase(database: string): Promise<void> {
    await this.query(`DROP DATABASE IF EXISTS ${quoteIdentifier(database)};`, `drop database "${database}"`);
  }

  async dropRole(role: string): Promise<void> {
    await this.query(`DROP ROLE IF EXISTS ${quoteIdentifier(role)};`, `drop role "${role}"`);
  }
}
