/**
 * Tenant identity and the resource names derived from it
 */

/**
 * One isolated service instance on the shared server. `name` is the
 * idempotency key for everything provisioned on its behalf.
 */
export interface TenantIdentity {
  name: string;
  credentialSecret: string;
}

export type DeploymentMode = 'production' | 'staging';

/**
 * Names of the per-tenant resources on the shared server and the runtime
 */
export interface TenantResourceNames {
  databaseName: string;
  roleName: string;
  projectName: string;
  networkName: string;
}

/**
 * Derive resource names from a tenant slug. Hyphens become underscores in SQL
 * identifiers; the compose project keeps the slug as is.
 */
export function resourceNamesFor(tenantName: string): TenantResourceNames {
  const base = tenantName.replace(/-/g, '_');
  return {
    databaseName: `${base}_db`,
    roleName: `${base}_user`,
    projectName: tenantName,
    networkName: `${base}_network`,
  };
}

/**
 * Connection string handed to the tenant's service
 */
export function tenantDatabaseUrl(
  identity: TenantIdentity,
  server: { host: string; port: number }
): string {
  const { databaseName, roleName } = resourceNamesFor(identity.name);
  const password = encodeURIComponent(identity.credentialSecret);
  return `postgresql://${roleName}:${password}@${server.host}:${server.port}/${databaseName}`;
}
