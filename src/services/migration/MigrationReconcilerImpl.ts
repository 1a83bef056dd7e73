/**
 * Migration reconciler implementation
 */

import type {
  MigrationStatus,
  SchemaInspector,
  TenantSchemaConnector,
  TenantSchemaSession,
} from '../../database/migrator.js';
import { EXPECTED_COLUMNS, EXPECTED_TABLES } from '../../database/schema.js';
import { MigrationAmbiguityError } from '../../types/errors.js';
import type { TenantIdentity } from '../../types/tenant.js';
import logger from '../../utils/logger.js';
import type {
  MigrationReconciler,
  MigrationState,
  ReconcileResult,
} from './MigrationReconciler.js';

export interface ExpectedSchema {
  tables: readonly string[];
  columns: Readonly<Record<string, readonly string[]>>;
}

const LATEST_SCHEMA: ExpectedSchema = {
  tables: EXPECTED_TABLES,
  columns: EXPECTED_COLUMNS,
};

/**
 * Concrete implementation of MigrationReconciler.
 * Decides between running migrations and stamping history; it never
 * guesses when the schema is only partly there.
 */
export class MigrationReconcilerImpl implements MigrationReconciler {
  constructor(
    private readonly connect: TenantSchemaConnector,
    private readonly expected: ExpectedSchema = LATEST_SCHEMA
  ) {}

  async computeMigrationState(
    identity: TenantIdentity
  ): Promise<MigrationState> {
    return this.withSession(identity, async (session) => {
      const tables = new Set(await session.inspector.listTables());
      const statuses = await session.runner.getStatus();

      const presentTables = this.expected.tables.filter((t) => tables.has(t));
      const missingTables = this.expected.tables.filter((t) => !tables.has(t));

      return {
        schemaObjectsExist: presentTables.length > 0,
        migrationHistoryTracked: statuses.some(
          (status) => status.executedAt !== undefined
        ),
        presentTables,
        missingTables,
      };
    });
  }

  async reconcile(
    identity: TenantIdentity,
    state: MigrationState
  ): Promise<ReconcileResult> {
    const log = logger.child({ tenant: identity.name });

    if (state.migrationHistoryTracked) {
      return this.withSession(identity, async (session) => {
        const applied = await session.runner.migrateToLatest();
        await this.verifyTablesPresent(identity, session.inspector);
        log.info(
          applied.length > 0
            ? 'Applied pending migrations'
            : 'Schema is up to date',
          { migrations: applied }
        );
        return {
          action: applied.length > 0 ? 'migrated' : 'up-to-date',
          migrations: applied,
        };
      });
    }

    if (state.schemaObjectsExist && state.missingTables.length > 0) {
      throw new MigrationAmbiguityError(
        'Partial schema without migration history; operator action required',
        {
          tenant: identity.name,
          presentTables: state.presentTables,
          missingTables: state.missingTables,
        }
      );
    }

    if (!state.schemaObjectsExist) {
      return this.withSession(identity, async (session) => {
        const applied = await session.runner.migrateToLatest();
        await this.verifyTablesPresent(identity, session.inspector);
        log.info('Created schema from scratch', { migrations: applied });
        return { action: 'migrated', migrations: applied };
      });
    }

    return this.withSession(identity, async (session) => {
      await this.verifyFingerprint(identity, session.inspector);
      const stamped = await session.runner.stampToLatest();
      log.warn(
        'Schema exists without migration history; recorded migrations as applied without running them',
        { migrations: stamped }
      );
      return { action: 'stamped', migrations: stamped };
    });
  }

  async getStatus(identity: TenantIdentity): Promise<MigrationStatus[]> {
    return this.withSession(identity, (session) => session.runner.getStatus());
  }

  /**
   * After migrating, every expected table must exist. A history that claims
   * a table the database lacks contradicts the schema.
   */
  private async verifyTablesPresent(
    identity: TenantIdentity,
    inspector: SchemaInspector
  ): Promise<void> {
    const tables = new Set(await inspector.listTables());
    const missingTables = this.expected.tables.filter((t) => !tables.has(t));
    if (missingTables.length > 0) {
      throw new MigrationAmbiguityError(
        'Migration history does not match the schema; operator action required',
        { tenant: identity.name, missingTables }
      );
    }
  }

  /**
   * Every column the latest migration creates must be present before
   * history is stamped. Extra columns are tolerated.
   */
  private async verifyFingerprint(
    identity: TenantIdentity,
    inspector: SchemaInspector
  ): Promise<void> {
    for (const table of this.expected.tables) {
      const expectedColumns = this.expected.columns[table] ?? [];
      const actual = new Set(await inspector.listColumns(table));

      const missingColumns = expectedColumns.filter((c) => !actual.has(c));
      if (missingColumns.length > 0) {
        throw new MigrationAmbiguityError(
          `Table ${table} does not match the latest migration; refusing to stamp history`,
          { tenant: identity.name, table, missingColumns }
        );
      }

      const extraColumns = [...actual].filter(
        (c) => !expectedColumns.includes(c)
      );
      if (extraColumns.length > 0) {
        logger.warn('Table has columns no migration created', {
          tenant: identity.name,
          table,
          extraColumns,
        });
      }
    }
  }

  private async withSession<T>(
    identity: TenantIdentity,
    work: (session: TenantSchemaSession) => Promise<T>
  ): Promise<T> {
    const session = this.connect(identity);
    try {
      return await work(session);
    } finally {
      await session.close();
    }
  }
}
