import type { ColumnType, Generated } from 'kysely';

/**
 * Tables owned by a tenant's service inside its own database
 */

/**
 * Database table schema for users
 */
export interface UsersTable {
  // Serial primary key
  id: Generated<number>;

  // Chat platform user id (bigint comes back from pg as a string)
  telegram_id: ColumnType<string, string | number, string | number>;

  username: string | null;
  first_name: string | null;
  last_name: string | null;

  is_active: Generated<boolean>;

  language_code: string | null;

  // Timestamps with automatic management
  created_at: ColumnType<Date, string | undefined, never>;
  updated_at: ColumnType<Date, string | undefined, string>;
}

/**
 * Subset of information_schema the reconciler reads
 */
export interface InformationSchemaTablesView {
  table_schema: string;
  table_name: string;
}

export interface InformationSchemaColumnsView {
  table_schema: string;
  table_name: string;
  column_name: string;
}

/**
 * Database schema interface of a tenant database
 */
export interface TenantDatabase {
  users: UsersTable;
  'information_schema.tables': InformationSchemaTablesView;
  'information_schema.columns': InformationSchemaColumnsView;
}

/**
 * Catalogs of the shared server read through the admin connection
 */
export interface PgDatabaseCatalog {
  datname: string;
}

export interface PgRolesCatalog {
  rolname: string;
}

export interface ServerCatalog {
  pg_database: PgDatabaseCatalog;
  pg_roles: PgRolesCatalog;
}

