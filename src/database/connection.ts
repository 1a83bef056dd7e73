import { sql } from 'kysely';
import type { Kysely } from 'kysely';
import type { Config } from '../config/env.js';
import { resourceNamesFor } from '../types/tenant.js';
import type { TenantIdentity } from '../types/tenant.js';
import logger from '../utils/logger.js';
import type { ConnectionOptions } from './index.js';

/**
 * Admin connection to the maintenance database of the shared server
 */
export function adminConnectionOptions(
  config: Config,
  database = 'postgres'
): ConnectionOptions {
  return {
    host: config.SHARED_DB_HOST,
    port: config.SHARED_DB_PORT,
    user: config.SHARED_DB_ADMIN_USER,
    password: config.SHARED_DB_ADMIN_PASSWORD,
    database,
  };
}

/**
 * Connection to a tenant database as the tenant's own role
 */
export function tenantConnectionOptions(
  config: Config,
  identity: TenantIdentity
): ConnectionOptions {
  const { databaseName, roleName } = resourceNamesFor(identity.name);
  return {
    host: config.SHARED_DB_HOST,
    port: config.SHARED_DB_PORT,
    user: roleName,
    password: identity.credentialSecret,
    database: databaseName,
  };
}

/**
 * Test database connectivity
 * @returns true if a trivial query succeeds
 */
export async function testConnection<DB>(db: Kysely<DB>): Promise<boolean> {
  try {
    await sql`SELECT 1`.execute(db);
    return true;
  } catch (error) {
    logger.debug('Database connection failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

/**
 * Gracefully shutdown database connections
 */
export async function closeDatabase<DB>(db: Kysely<DB>): Promise<void> {
  try {
    await db.destroy();
  } catch (error) {
    logger.error('Error closing database connections', { error });
    throw error;
  }
}
