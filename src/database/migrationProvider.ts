import type { Migration, MigrationProvider } from 'kysely';
import * as m001 from './migrations/001_create_users_table.js';
import * as m002 from './migrations/002_add_users_updated_at_trigger.js';

/**
 * Tenant migrations, imported directly so that compiled and TypeScript
 * sources resolve them the same way
 */
export const TENANT_MIGRATIONS: Readonly<Record<string, Migration>> = {
  '001_create_users_table': m001,
  '002_add_users_updated_at_trigger': m002,
};

export const TENANT_MIGRATION_NAMES: readonly string[] =
  Object.keys(TENANT_MIGRATIONS).sort();

export class TenantMigrationProvider implements MigrationProvider {
  constructor(
    private readonly migrations: Readonly<Record<string, Migration>> = TENANT_MIGRATIONS
  ) {}

  async getMigrations(): Promise<Record<string, Migration>> {
    return { ...this.migrations };
  }
}

/**
 * Same names as the wrapped provider, but every `up` is a no-op. Running the
 * migrator over it records the migrations as applied without touching the
 * schema.
 */
export class StampingMigrationProvider implements MigrationProvider {
  constructor(private readonly inner: MigrationProvider) {}

  async getMigrations(): Promise<Record<string, Migration>> {
    const migrations = await this.inner.getMigrations();
    const stamped: Record<string, Migration> = {};
    for (const name of Object.keys(migrations)) {
      stamped[name] = { up: async () => {} };
    }
    return stamped;
  }
}
