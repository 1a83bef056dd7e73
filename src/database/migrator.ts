import {
  DEFAULT_MIGRATION_TABLE,
  Migrator,
  type Kysely,
  type MigrationProvider,
  type MigrationResultSet,
} from 'kysely';
import type { Config } from '../config/env.js';
import type { TenantIdentity } from '../types/tenant.js';
import logger from '../utils/logger.js';
import { tenantConnectionOptions } from './connection.js';
import { createDatabase } from './index.js';
import {
  StampingMigrationProvider,
  TenantMigrationProvider,
} from './migrationProvider.js';
import type { TenantDatabase } from './types.js';

/**
 * Name of the table that records applied migrations
 */
export const MIGRATION_HISTORY_TABLE = DEFAULT_MIGRATION_TABLE;

export interface MigrationStatus {
  name: string;
  executedAt?: Date;
}

/**
 * Applies or records tenant migrations
 */
export interface MigrationRunner {
  /**
   * Run all pending migrations
   * @returns names of the migrations executed by this call
   */
  migrateToLatest(): Promise<string[]>;

  /**
   * Record every pending migration as applied without executing it
   * @returns names of the migrations recorded by this call
   */
  stampToLatest(): Promise<string[]>;

  /**
   * Get list of executed and pending migrations
   */
  getStatus(): Promise<MigrationStatus[]>;
}

/**
 * Read-only view of a tenant database's catalog
 */
export interface SchemaInspector {
  listTables(): Promise<string[]>;
  listColumns(table: string): Promise<string[]>;
}

/**
 * One connection to a tenant database; `close` releases it
 */
export interface TenantSchemaSession {
  inspector: SchemaInspector;
  runner: MigrationRunner;
  close(): Promise<void>;
}

export type TenantSchemaConnector = (
  identity: TenantIdentity
) => TenantSchemaSession;

function unwrap(label: string, resultSet: MigrationResultSet): string[] {
  const { error, results } = resultSet;
  const applied: string[] = [];

  results?.forEach((it) => {
    if (it.status === 'Success') {
      applied.push(it.migrationName);
      logger.debug(`migration "${it.migrationName}" ${label}`);
    } else if (it.status === 'Error') {
      logger.error(`failed to execute migration "${it.migrationName}"`);
    }
  });

  if (error) {
    throw error instanceof Error ? error : new Error(String(error));
  }
  return applied;
}

export class KyselyMigrationRunner implements MigrationRunner {
  private readonly provider: MigrationProvider;

  constructor(
    private readonly db: Kysely<any>,
    provider?: MigrationProvider
  ) {
    this.provider = provider ?? new TenantMigrationProvider();
  }

  async migrateToLatest(): Promise<string[]> {
    const migrator = new Migrator({ db: this.db, provider: this.provider });
    return unwrap('was executed successfully', await migrator.migrateToLatest());
  }

  async stampToLatest(): Promise<string[]> {
    const migrator = new Migrator({
      db: this.db,
      provider: new StampingMigrationProvider(this.provider),
    });
    return unwrap('was stamped as applied', await migrator.migrateToLatest());
  }

  async getStatus(): Promise<MigrationStatus[]> {
    const migrator = new Migrator({ db: this.db, provider: this.provider });
    const migrations = await migrator.getMigrations();
    return migrations.map((migration) => ({
      name: migration.name,
      executedAt: migration.executedAt,
    }));
  }
}

export class KyselySchemaInspector implements SchemaInspector {
  constructor(private readonly db: Kysely<TenantDatabase>) {}

  async listTables(): Promise<string[]> {
    const rows = await this.db
      .selectFrom('information_schema.tables')
      .select('table_name')
      .where('table_schema', '=', 'public')
      .orderBy('table_name')
      .execute();
    return rows.map((row) => row.table_name);
  }

  async listColumns(table: string): Promise<string[]> {
    const rows = await this.db
      .selectFrom('information_schema.columns')
      .select('column_name')
      .where('table_schema', '=', 'public')
      .where('table_name', '=', table)
      .execute();
    return rows.map((row) => row.column_name);
  }
}

/**
 * Connect to a tenant database as the tenant's own role
 */
export function createTenantSchemaConnector(
  config: Config
): TenantSchemaConnector {
  return (identity) => {
    const db = createDatabase<TenantDatabase>(
      tenantConnectionOptions(config, identity)
    );
    return {
      inspector: new KyselySchemaInspector(db),
      runner: new KyselyMigrationRunner(db),
      close: () => db.destroy(),
    };
  };
}
