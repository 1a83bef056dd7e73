/**
 * Wires the orchestrator's components from validated configuration
 */

import path from 'path';
import type { Config } from './config/env.js';
import { serviceDatabaseHost } from './config/env.js';
import { adminConnectionOptions } from './database/connection.js';
import { createDatabase, type ServerCatalog } from './database/index.js';
import { createTenantSchemaConnector } from './database/migrator.js';
import { DeploymentPipeline } from './deployment/DeploymentPipeline.js';
import { SnapshotStore } from './deployment/SnapshotStore.js';
import { ServerCatalogRepositoryImpl } from './repositories/server/index.js';
import type { ServiceTarget } from './runtime/ContainerRuntime.js';
import { DockerComposeRuntime } from './runtime/DockerComposeRuntime.js';
import { MigrationReconcilerImpl } from './services/migration/index.js';
import { ResourceProberImpl } from './services/probe/index.js';
import { TenantProvisionerImpl } from './services/provisioning/index.js';

/**
 * Compose project that runs the shared database server
 */
export function sharedServerTarget(config: Config): ServiceTarget {
  const composeFile = path.resolve(config.SHARED_DB_COMPOSE_FILE);
  return {
    project: config.SHARED_DB_PROJECT,
    directory: path.dirname(composeFile),
    composeFile,
  };
}

export function createOrchestrator(config: Config) {
  const adminDb = createDatabase<ServerCatalog>(adminConnectionOptions(config));
  const catalog = new ServerCatalogRepositoryImpl(adminDb, (database) =>
    createDatabase<unknown>({ ...adminConnectionOptions(config, database), max: 1 })
  );

  const runtime = new DockerComposeRuntime({ binary: config.DOCKER_BIN });
  const prober = new ResourceProberImpl(catalog, runtime, {
    requestTimeoutMs: config.HEALTH_REQUEST_TIMEOUT_MS,
  });
  const provisioner = new TenantProvisionerImpl(catalog, prober, runtime, {
    target: sharedServerTarget(config),
    readyMaxAttempts: config.DB_READY_MAX_ATTEMPTS,
    readyIntervalMs: config.DB_READY_INTERVAL_MS,
  });
  const reconciler = new MigrationReconcilerImpl(
    createTenantSchemaConnector(config)
  );
  const snapshots = new SnapshotStore(config.DEPLOY_STATE_DIR);

  const pipeline = new DeploymentPipeline(
    { prober, provisioner, reconciler, runtime, snapshots },
    {
      databaseHost: serviceDatabaseHost(config),
      databasePort: config.SHARED_DB_PORT,
      stopTimeoutSeconds: config.STOP_TIMEOUT_SECONDS,
      pullAttempts: config.IMAGE_PULL_ATTEMPTS,
      pullIntervalMs: config.IMAGE_PULL_INTERVAL_MS,
      healthUrl: config.HEALTH_URL,
      healthTimeoutMs: config.HEALTH_TIMEOUT_MS,
      healthIntervalMs: config.HEALTH_INTERVAL_MS,
    }
  );

  return {
    config,
    catalog,
    runtime,
    prober,
    provisioner,
    reconciler,
    snapshots,
    pipeline,
    /**
     * Release the admin connection pool
     */
    close: () => catalog.close(),
  };
}
