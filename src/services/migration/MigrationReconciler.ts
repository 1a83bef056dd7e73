/**
 * Migration reconciler interface
 */

import type { MigrationStatus } from '../../database/migrator.js';
import type { TenantIdentity } from '../../types/tenant.js';

/**
 * Physical schema against recorded migration history for one tenant database
 */
export interface MigrationState {
  schemaObjectsExist: boolean;
  migrationHistoryTracked: boolean;
  /** Expected tables found in the database */
  presentTables: string[];
  /** Expected tables not found */
  missingTables: string[];
}

export type ReconcileAction = 'migrated' | 'stamped' | 'up-to-date';

export interface ReconcileResult {
  action: ReconcileAction;
  /** Migrations executed or stamped by this call */
  migrations: string[];
}

export interface MigrationReconciler {
  computeMigrationState(identity: TenantIdentity): Promise<MigrationState>;

  /**
   * Bring migration history in line with the schema.
   * @throws MigrationAmbiguityError when the schema cannot be classified
   */
  reconcile(
    identity: TenantIdentity,
    state: MigrationState
  ): Promise<ReconcileResult>;

  /**
   * Executed and pending migrations of the tenant database
   */
  getStatus(identity: TenantIdentity): Promise<MigrationStatus[]>;
}
