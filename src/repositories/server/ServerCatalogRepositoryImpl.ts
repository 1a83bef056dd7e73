/**
 * Server catalog repository implementation
 */

import { Kysely, sql } from 'kysely';
import { closeDatabase, testConnection } from '../../database/connection.js';
import type { ServerCatalog } from '../../database/types.js';
import type { ServerCatalogRepository } from './ServerCatalogRepository.js';

/**
 * Opens an admin connection to another database on the same server
 */
export type DatabaseConnector = (database: string) => Kysely<unknown>;

/**
 * Concrete implementation of ServerCatalogRepository using Kysely
 */
export class ServerCatalogRepositoryImpl implements ServerCatalogRepository {
  constructor(
    private readonly db: Kysely<ServerCatalog>,
    private readonly connectTo: DatabaseConnector
  ) {}

  async ping(): Promise<boolean> {
    return testConnection(this.db);
  }

  async databaseExists(name: string): Promise<boolean> {
    const row = await this.db
      .selectFrom('pg_database')
      .select('datname')
      .where('datname', '=', name)
      .executeTakeFirst();

    return row !== undefined;
  }

  async createDatabase(name: string): Promise<void> {
    // CREATE DATABASE takes no bind parameters and cannot run in a transaction
    await sql`CREATE DATABASE ${sql.id(name)}`.execute(this.db);
  }

  async roleExists(name: string): Promise<boolean> {
    const row = await this.db
      .selectFrom('pg_roles')
      .select('rolname')
      .where('rolname', '=', name)
      .executeTakeFirst();

    return row !== undefined;
  }

  async createRole(name: string, password: string): Promise<void> {
    await sql`CREATE ROLE ${sql.id(name)} WITH LOGIN ENCRYPTED PASSWORD ${sql.lit(password)}`.execute(
      this.db
    );
  }

  async grantDatabasePrivileges(database: string, role: string): Promise<void> {
    await sql`GRANT ALL PRIVILEGES ON DATABASE ${sql.id(database)} TO ${sql.id(role)}`.execute(
      this.db
    );
  }

  async grantSchemaPrivileges(
    database: string,
    role: string,
    schema = 'public'
  ): Promise<void> {
    const tenantDb = this.connectTo(database);
    try {
      await sql`GRANT ALL ON SCHEMA ${sql.id(schema)} TO ${sql.id(role)}`.execute(
        tenantDb
      );
    } finally {
      await closeDatabase(tenantDb);
    }
  }

  async close(): Promise<void> {
    await closeDatabase(this.db);
  }
}
