/**
 * In-process stand-in for the shared database server's catalog
 */

import type { ServerCatalogRepository } from '../../repositories/server/index.js';

type Operation = keyof Omit<ServerCatalogRepository, 'close'>;

/**
 * Error shaped like the ones pg raises, with a SQLSTATE code
 */
export function pgError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

export class InMemoryServerCatalog implements ServerCatalogRepository {
  online = true;
  readonly databases = new Set<string>(['postgres']);
  /** role name to password */
  readonly roles = new Map<string, string>();
  /** `database:<db>:<role>` and `schema:<db>.<schema>:<role>` entries */
  readonly grants = new Set<string>();
  readonly calls: Operation[] = [];

  private readonly failures = new Map<Operation, Error>();
  private readonly hidden = new Set<string>();

  /**
   * Make the next call of `operation` fail with `error`
   */
  failNext(operation: Operation, error: Error): void {
    this.failures.set(operation, error);
  }

  /**
   * Create the object behind the caller's back after its next existence
   * check, the way a concurrent provisioner would
   */
  raceOn(kind: 'database' | 'role', name: string, password = 'other-secret'): void {
    if (kind === 'database') {
      this.databases.add(name);
    } else {
      this.roles.set(name, password);
    }
    this.hidden.add(`${kind}:${name}`);
  }

  async ping(): Promise<boolean> {
    this.record('ping');
    return this.online;
  }

  async databaseExists(name: string): Promise<boolean> {
    this.record('databaseExists');
    if (this.hidden.delete(`database:${name}`)) return false;
    return this.databases.has(name);
  }

  async createDatabase(name: string): Promise<void> {
    this.record('createDatabase');
    if (this.databases.has(name)) {
      throw pgError('42P04', `database "${name}" already exists`);
    }
    this.databases.add(name);
  }

  async roleExists(name: string): Promise<boolean> {
    this.record('roleExists');
    if (this.hidden.delete(`role:${name}`)) return false;
    return this.roles.has(name);
  }

  async createRole(name: string, password: string): Promise<void> {
    this.record('createRole');
    if (this.roles.has(name)) {
      throw pgError('42710', `role "${name}" already exists`);
    }
    this.roles.set(name, password);
  }

  async grantDatabasePrivileges(database: string, role: string): Promise<void> {
    this.record('grantDatabasePrivileges');
    this.grants.add(`database:${database}:${role}`);
  }

  async grantSchemaPrivileges(
    database: string,
    role: string,
    schema = 'public'
  ): Promise<void> {
    this.record('grantSchemaPrivileges');
    this.grants.add(`schema:${database}.${schema}:${role}`);
  }

  async close(): Promise<void> {}

  /**
   * Comparable snapshot of everything the server holds
   */
  state(): { databases: string[]; roles: [string, string][]; grants: string[] } {
    return {
      databases: [...this.databases].sort(),
      roles: [...this.roles.entries()].sort(),
      grants: [...this.grants].sort(),
    };
  }

  private record(operation: Operation): void {
    this.calls.push(operation);
    if (operation !== 'ping' && !this.online) {
      throw pgError('ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:5432');
    }
    const failure = this.failures.get(operation);
    if (failure) {
      this.failures.delete(operation);
      throw failure;
    }
  }
}
