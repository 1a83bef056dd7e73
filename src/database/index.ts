import { Kysely, PostgresDialect } from 'kysely';
import { Pool } from 'pg';
import logger from '../utils/logger.js';
import { redactSql } from '../utils/sanitizer.js';

/**
 * Where and as whom to connect
 */
export interface ConnectionOptions {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  max?: number;
}

/**
 * Create and configure a connection pool
 */
const createPool = (options: ConnectionOptions) => {
  return new Pool({
    host: options.host,
    port: options.port,
    user: options.user,
    password: options.password,
    database: options.database,
    max: options.max ?? 2,
    // Additional pool configuration
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });
};

/**
 * Initialize a Kysely instance with PostgreSQL dialect. The orchestrator talks
 * to several databases on the same server, so there is no global instance.
 */
export function createDatabase<DB>(options: ConnectionOptions): Kysely<DB> {
  return new Kysely<DB>({
    dialect: new PostgresDialect({
      pool: createPool(options),
    }),
    log(event) {
      if (event.level === 'query') {
        logger.debug('Query', {
          database: options.database,
          sql: redactSql(event.query.sql),
          durationMs: event.queryDurationMillis,
        });
      } else {
        logger.debug('Query failed', {
          database: options.database,
          sql: redactSql(event.query.sql),
          error: event.error instanceof Error ? event.error.message : String(event.error),
        });
      }
    },
  });
}

/**
 * Export database types for use in other modules
 */
export * from './types.js';
