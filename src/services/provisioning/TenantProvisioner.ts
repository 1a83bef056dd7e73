/**
 * Tenant provisioner interface
 */

import type { TenantIdentity } from '../../types/tenant.js';

/**
 * What one ensureTenantDatabase call changed on the shared server
 */
export interface ProvisioningResult {
  tenant: string;
  databaseName: string;
  roleName: string;
  /** false when the database already existed */
  databaseCreated: boolean;
  /** false when the role already existed; its credential was left as is */
  roleCreated: boolean;
}

/**
 * Guarantees each tenant an isolated database and login role on the shared
 * server without destroying existing tenant data
 */
export interface TenantProvisioner {
  /**
   * Start the shared server if needed and wait until it accepts queries
   * @throws ResourceUnavailableError when the server is not ready in time
   */
  ensureServerRunning(): Promise<void>;

  /**
   * Create the tenant's database and role if missing, then grant the role
   * full privileges on both. Safe to repeat and to run concurrently.
   * @throws ProvisioningError for any failure other than "already exists"
   */
  ensureTenantDatabase(identity: TenantIdentity): Promise<ProvisioningResult>;
}
