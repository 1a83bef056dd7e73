/**
 * Tenant provisioner implementation
 */

import type { ServerCatalogRepository } from '../../repositories/server/index.js';
import type {
  ContainerRuntime,
  ServiceTarget,
} from '../../runtime/ContainerRuntime.js';
import {
  ProvisioningError,
  ResourceUnavailableError,
  classifyError,
  getErrorCode,
  isAlreadyExistsError,
} from '../../types/errors.js';
import { resourceNamesFor, type TenantIdentity } from '../../types/tenant.js';
import logger from '../../utils/logger.js';
import { pollUntil, type Sleep } from '../../utils/retry.js';
import type { ResourceProber } from '../probe/index.js';
import type { ProvisioningResult, TenantProvisioner } from './TenantProvisioner.js';

export interface SharedServerOptions {
  /** Compose project running the shared server */
  target: ServiceTarget;
  readyMaxAttempts: number;
  readyIntervalMs: number;
  sleep?: Sleep;
}

type ObjectKind = 'database' | 'role';

/**
 * Concrete implementation of TenantProvisioner.
 * Every mutation is phrased as "ensure exists": check the catalog, create when
 * missing, and treat the server's "already exists" error as a concurrent
 * creator having won the race.
 */
export class TenantProvisionerImpl implements TenantProvisioner {
  constructor(
    private readonly catalog: ServerCatalogRepository,
    private readonly prober: ResourceProber,
    private readonly runtime: ContainerRuntime,
    private readonly server: SharedServerOptions
  ) {}

  async ensureServerRunning(): Promise<void> {
    if (await this.prober.isDatabaseServerReady()) {
      logger.debug('Shared database server already accepting connections');
      return;
    }

    const { target } = this.server;
    try {
      if (!(await this.runtime.isRunning(target))) {
        logger.info('Starting shared database server', {
          project: target.project,
        });
        await this.runtime.start(target);
      }
    } catch (error) {
      throw new ResourceUnavailableError(
        'Shared database server could not be started',
        { project: target.project },
        error
      );
    }

    const result = await pollUntil(() => this.prober.isDatabaseServerReady(), {
      maxAttempts: this.server.readyMaxAttempts,
      intervalMs: this.server.readyIntervalMs,
      sleep: this.server.sleep,
      onRetry: (attempt) =>
        logger.info('Waiting for shared database server', {
          attempt,
          maxAttempts: this.server.readyMaxAttempts,
        }),
    });

    if (!result.ok) {
      throw new ResourceUnavailableError(
        `Shared database server not ready after ${result.attempts} attempts`,
        { attempts: result.attempts, elapsedMs: result.elapsedMs }
      );
    }

    logger.info('Shared database server is ready', {
      attempts: result.attempts,
    });
  }

  async ensureTenantDatabase(
    identity: TenantIdentity
  ): Promise<ProvisioningResult> {
    const { databaseName, roleName } = resourceNamesFor(identity.name);
    const log = logger.child({ tenant: identity.name });

    const databaseCreated = await this.ensureExists(
      'database',
      databaseName,
      () => this.catalog.databaseExists(databaseName),
      () => this.catalog.createDatabase(databaseName)
    );
    log.info(databaseCreated ? 'Created database' : 'Database already exists', {
      databaseName,
    });

    // An existing role keeps its credential: the running service still uses it
    const roleCreated = await this.ensureExists(
      'role',
      roleName,
      () => this.catalog.roleExists(roleName),
      () => this.catalog.createRole(roleName, identity.credentialSecret)
    );
    log.info(roleCreated ? 'Created role' : 'Role already exists', {
      roleName,
    });

    try {
      await this.catalog.grantDatabasePrivileges(databaseName, roleName);
      await this.catalog.grantSchemaPrivileges(databaseName, roleName);
    } catch (error) {
      throw this.wrap(`Failed to grant privileges to ${roleName}`, error, {
        databaseName,
        roleName,
      });
    }
    log.info('Granted privileges', { databaseName, roleName });

    return {
      tenant: identity.name,
      databaseName,
      roleName,
      databaseCreated,
      roleCreated,
    };
  }

  /**
   * @returns true when this call created the object
   */
  private async ensureExists(
    kind: ObjectKind,
    name: string,
    exists: () => Promise<boolean>,
    create: () => Promise<void>
  ): Promise<boolean> {
    try {
      if (await exists()) {
        return false;
      }
    } catch (error) {
      throw this.wrap(`Failed to look up ${kind} ${name}`, error, { kind, name });
    }

    try {
      await create();
      return true;
    } catch (error) {
      if (isAlreadyExistsError(error)) {
        logger.info(`Concurrent run created ${kind} first`, {
          name,
          code: getErrorCode(error),
        });
        return false;
      }
      throw this.wrap(`Failed to create ${kind} ${name}`, error, { kind, name });
    }
  }

  private wrap(
    message: string,
    error: unknown,
    context: Record<string, unknown>
  ): Error {
    const classified = classifyError(error);
    if (classified instanceof ResourceUnavailableError) {
      return classified;
    }
    return new ProvisioningError(
      `${message}: ${classified.message}`,
      { ...context, code: getErrorCode(error) },
      error
    );
  }
}
