/**
 * Server catalog repository interface
 */

/**
 * Reads and mutates the catalog of the shared database server. Every
 * mutation is safe to repeat once the object exists, except the create
 * calls, which fail with the server's "already exists" error.
 */
export interface ServerCatalogRepository {
  /**
   * Run a trivial query
   * @returns false when the server cannot be reached
   */
  ping(): Promise<boolean>;

  databaseExists(name: string): Promise<boolean>;

  createDatabase(name: string): Promise<void>;

  roleExists(name: string): Promise<boolean>;

  /**
   * Create a login role. Never called for a role that already exists.
   */
  createRole(name: string, password: string): Promise<void>;

  grantDatabasePrivileges(database: string, role: string): Promise<void>;

  /**
   * Grant all privileges on a schema inside `database` to `role`
   */
  grantSchemaPrivileges(
    database: string,
    role: string,
    schema?: string
  ): Promise<void>;

  /**
   * Release connections
   */
  close(): Promise<void>;
}
