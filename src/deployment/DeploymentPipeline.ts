/**
 * Drives one tenant through a deploy-or-rollback cycle.
 *
 * The transition table lives in states.ts; this class only runs the entry
 * action of each state and feeds the outcome back into `nextState`.
 */

import fs from 'fs-extra';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { ContainerRuntime, ServiceTarget } from '../runtime/ContainerRuntime.js';
import type { ResourceProber } from '../services/probe/index.js';
import { assertHttpEndpoint, healthEndpointFor } from '../services/probe/index.js';
import type {
  ProvisioningResult,
  TenantProvisioner,
} from '../services/provisioning/index.js';
import type {
  MigrationReconciler,
  ReconcileResult,
} from '../services/migration/index.js';
import {
  DeploymentError,
  HealthCheckTimeoutError,
  ResourceUnavailableError,
  SnapshotError,
  ValidationError,
  classifyError,
  errorMessage,
} from '../types/errors.js';
import {
  resourceNamesFor,
  tenantDatabaseUrl,
  type TenantIdentity,
} from '../types/tenant.js';
import logger, { type Logger } from '../utils/logger.js';
import { pollUntil, retry, sleep, type Clock, type Sleep } from '../utils/retry.js';
import {
  formatZodError,
  validateDeployRequest,
  type DeployRequest,
  type DeployArguments,
} from '../validation/deploy/index.js';
import {
  renderEnvironmentFile,
  writeEnvironmentFile,
} from './environmentFile.js';
import type { TenantLayout } from './layout.js';
import { writeReleaseManifest } from './releaseManifest.js';
import type { DeploymentSnapshot, SnapshotStore } from './SnapshotStore.js';
import {
  EXIT_CODES,
  INITIAL_STATE,
  isTerminal,
  nextState,
  type ActiveState,
  type DeploymentState,
  type StepOutcome,
  type TerminalState,
} from './states.js';

export interface PipelineDependencies {
  prober: ResourceProber;
  provisioner: TenantProvisioner;
  reconciler: MigrationReconciler;
  runtime: ContainerRuntime;
  snapshots: SnapshotStore;
}

export interface PipelineSettings {
  /** Database host and port as seen from the tenant's service */
  databaseHost: string;
  databasePort: number;
  /** Compose file inside the deployment directory, if not the default */
  composeFile?: string;
  stopTimeoutSeconds: number;
  pullAttempts: number;
  pullIntervalMs: number;
  /** Health URL template; `{tenant}` is replaced */
  healthUrl: string;
  healthTimeoutMs: number;
  healthIntervalMs: number;
  sleep?: Sleep;
  now?: Clock;
}

export interface StepRecord {
  state: ActiveState;
  outcome: StepOutcome;
  durationMs: number;
  error?: string;
}

export interface DeploymentReport {
  attemptId: string;
  tenant: string;
  image?: string;
  finalState: TerminalState;
  /** The forward state whose failure ended or rolled back the attempt */
  failedState?: ActiveState;
  error?: DeploymentError;
  /** Why RollingBack itself failed */
  rollbackError?: DeploymentError;
  steps: StepRecord[];
  durationMs: number;
  exitCode: number;
  snapshot: DeploymentSnapshot | null;
  provisioning?: ProvisioningResult;
  migrations?: ReconcileResult;
  /** Set when pruning was requested after success */
  pruned?: boolean;
}

/**
 * Everything known once Validating has passed
 */
interface PreparedAttempt {
  request: DeployRequest;
  identity: TenantIdentity;
  layout: TenantLayout;
  target: ServiceTarget;
  healthEndpoint: string;
}

interface AttemptContext {
  attemptId: string;
  input: DeployArguments;
  log: Logger;
  prepared?: PreparedAttempt;
  snapshot: DeploymentSnapshot | null;
  provisioning?: ProvisioningResult;
  migrations?: ReconcileResult;
}

export class DeploymentPipeline {
  private readonly sleep: Sleep;
  private readonly now: Clock;

  constructor(
    private readonly deps: PipelineDependencies,
    private readonly settings: PipelineSettings
  ) {
    this.sleep = settings.sleep ?? sleep;
    this.now = settings.now ?? Date.now;
  }

  async run(input: DeployArguments): Promise<DeploymentReport> {
    const attemptId = uuidv4();
    const startedAt = this.now();
    const ctx: AttemptContext = {
      attemptId,
      input,
      log: logger.child({ tenant: input.tenant, attemptId }),
      snapshot: null,
    };

    const steps: StepRecord[] = [];
    let failedState: ActiveState | undefined;
    let error: DeploymentError | undefined;
    let rollbackError: DeploymentError | undefined;

    ctx.log.info('Deployment started', { image: input.image, mode: input.mode });

    let state: DeploymentState = INITIAL_STATE;
    while (!isTerminal(state)) {
      const current: ActiveState = state;
      const stepStartedAt = this.now();
      ctx.log.info(`→ ${current}`, { state: current });

      let outcome: StepOutcome;
      let stepError: DeploymentError | undefined;
      try {
        await this.enter(current, ctx);
        outcome = 'success';
      } catch (caught) {
        outcome = 'failure';
        stepError = classifyError(caught);
      }

      const durationMs = this.now() - stepStartedAt;
      steps.push({
        state: current,
        outcome,
        durationMs,
        error: stepError?.message,
      });

      if (stepError) {
        ctx.log.error(`✗ ${current} failed`, {
          state: current,
          durationMs,
          errorType: stepError.type,
          error: stepError.message,
          context: stepError.context,
          requiresOperator: stepError.requiresOperator,
        });
        if (current === 'RollingBack') {
          rollbackError = stepError;
        } else {
          failedState = current;
          error = stepError;
        }
      } else {
        ctx.log.info(`✓ ${current}`, { state: current, durationMs });
      }

      state = nextState(current, outcome);
    }

    const report: DeploymentReport = {
      attemptId,
      tenant: input.tenant,
      image: ctx.prepared?.request.image ?? input.image,
      finalState: state,
      failedState,
      error,
      rollbackError,
      steps,
      durationMs: 0,
      exitCode: EXIT_CODES[state],
      snapshot: ctx.snapshot,
      provisioning: ctx.provisioning,
      migrations: ctx.migrations,
    };

    if (state === 'Succeeded' && ctx.prepared?.request.prune) {
      report.pruned = await this.prune(ctx.log);
    }

    report.durationMs = this.now() - startedAt;
    ctx.log.log(
      state === 'Succeeded' ? 'info' : 'error',
      `Deployment finished: ${state}`,
      {
        finalState: state,
        failedState,
        durationMs: report.durationMs,
        exitCode: report.exitCode,
      }
    );
    return report;
  }

  private async enter(state: ActiveState, ctx: AttemptContext): Promise<void> {
    switch (state) {
      case 'Validating':
        ctx.prepared = await this.validate(ctx.input);
        return;
      case 'BackingUp':
        ctx.snapshot = await this.deps.snapshots.capture(
          this.prepared(ctx).identity.name
        );
        return;
      case 'StoppingOld':
        await this.stopService(this.prepared(ctx).target, ctx.log);
        return;
      case 'Provisioning':
        await this.deps.provisioner.ensureServerRunning();
        ctx.provisioning = await this.deps.provisioner.ensureTenantDatabase(
          this.prepared(ctx).identity
        );
        return;
      case 'Migrating': {
        const { identity } = this.prepared(ctx);
        const migrationState =
          await this.deps.reconciler.computeMigrationState(identity);
        ctx.log.info('Migration state', { ...migrationState });
        ctx.migrations = await this.deps.reconciler.reconcile(
          identity,
          migrationState
        );
        return;
      }
      case 'Starting':
        await this.start(ctx);
        return;
      case 'HealthChecking':
        await this.waitForHealthy(this.prepared(ctx), ctx.log, 'New instance');
        return;
      case 'RollingBack':
        await this.rollBack(ctx);
        return;
    }
  }

  private prepared(ctx: AttemptContext): PreparedAttempt {
    if (!ctx.prepared) {
      throw new Error('Attempt was not validated');
    }
    return ctx.prepared;
  }

  /**
   * Inputs and preconditions only; nothing is changed here
   */
  private async validate(input: DeployArguments): Promise<PreparedAttempt> {
    let request: DeployRequest;
    try {
      request = validateDeployRequest(input);
    } catch (error) {
      if (error instanceof z.ZodError) {
        throw new ValidationError(formatZodError(error), {
          issues: error.issues.map((issue) => issue.path.join('.')),
        });
      }
      throw error;
    }

    const healthEndpoint = healthEndpointFor(
      request.healthUrl ?? this.settings.healthUrl,
      request.tenant
    );
    assertHttpEndpoint(healthEndpoint);

    if (request.bundleDir && !(await fs.pathExists(request.bundleDir))) {
      throw new ValidationError('Release bundle directory does not exist', {
        bundleDir: request.bundleDir,
      });
    }

    if (!(await this.deps.prober.isContainerRuntimeAvailable())) {
      throw new ResourceUnavailableError('Container runtime is not available');
    }

    const layout = this.deps.snapshots.layout(request.tenant);
    return {
      request,
      identity: {
        name: request.tenant,
        credentialSecret: request.credentialSecret,
      },
      layout,
      target: {
        project: resourceNamesFor(request.tenant).projectName,
        directory: layout.currentDir,
        composeFile: this.settings.composeFile,
      },
      healthEndpoint,
    };
  }

  /**
   * Graceful stop within the timeout, then kill
   */
  private async stopService(target: ServiceTarget, log: Logger): Promise<void> {
    if (!(await this.deps.runtime.isRunning(target))) {
      log.info('No running instance to stop', { project: target.project });
      return;
    }

    try {
      await this.deps.runtime.stop(target, this.settings.stopTimeoutSeconds);
      log.info('Stopped running instance', { project: target.project });
    } catch (error) {
      log.warn('Graceful stop failed, forcing', {
        project: target.project,
        error: errorMessage(error),
      });
      await this.deps.runtime.kill(target);
    }
  }

  private async start(ctx: AttemptContext): Promise<void> {
    const { request, identity, layout, target } = this.prepared(ctx);
    const { roleName, networkName } = resourceNamesFor(identity.name);

    if (request.bundleDir) {
      await fs.copy(request.bundleDir, layout.currentDir, { overwrite: true });
      ctx.log.info('Installed release bundle', { bundleDir: request.bundleDir });
    }

    const generatedAt = new Date(this.now());
    await writeEnvironmentFile(
      layout.envFile,
      renderEnvironmentFile({
        tenant: identity.name,
        mode: request.mode,
        image: request.image,
        networkName,
        databaseUrl: tenantDatabaseUrl(identity, {
          host: this.settings.databaseHost,
          port: this.settings.databasePort,
        }),
        databaseUser: roleName,
        credentialSecret: identity.credentialSecret,
        features: request.features,
        generatedAt,
      })
    );
    await writeReleaseManifest(layout.releaseFile, {
      tenant: identity.name,
      image: request.image,
      mode: request.mode,
      attemptId: ctx.attemptId,
      deployedAt: generatedAt.toISOString(),
    });

    await retry(() => this.deps.runtime.pull(target), {
      attempts: this.settings.pullAttempts,
      intervalMs: this.settings.pullIntervalMs,
      sleep: this.sleep,
      onRetry: (attempt, error) =>
        ctx.log.warn('Image pull failed, retrying', {
          attempt,
          maxAttempts: this.settings.pullAttempts,
          error: errorMessage(error),
        }),
    });

    await this.deps.runtime.start(target);
    ctx.log.info('Started new instance', { image: request.image });
  }

  private async waitForHealthy(
    prepared: PreparedAttempt,
    log: Logger,
    label: string
  ): Promise<void> {
    const endpoint = prepared.healthEndpoint;
    const result = await pollUntil(
      () => this.deps.prober.isServiceHealthy(endpoint),
      {
        timeoutMs: this.settings.healthTimeoutMs,
        intervalMs: this.settings.healthIntervalMs,
        sleep: this.sleep,
        now: this.now,
        onRetry: (attempt) =>
          log.debug('Waiting for health endpoint', { endpoint, attempt }),
      }
    );

    if (!result.ok) {
      throw new HealthCheckTimeoutError(
        `${label} did not become healthy within ${this.settings.healthTimeoutMs}ms`,
        { endpoint, attempts: result.attempts, elapsedMs: result.elapsedMs }
      );
    }
    log.info(`${label} is healthy`, {
      endpoint,
      attempts: result.attempts,
      elapsedMs: result.elapsedMs,
    });
  }

  /**
   * Stop the new instance, restore the snapshot and relaunch what ran before.
   * The database is never touched.
   */
  private async rollBack(ctx: AttemptContext): Promise<void> {
    const prepared = this.prepared(ctx);
    await this.stopService(prepared.target, ctx.log);

    if (!ctx.snapshot) {
      throw new SnapshotError('No snapshot to roll back to', {
        tenant: prepared.identity.name,
      });
    }

    const restored = await this.deps.snapshots.restore(prepared.identity.name);
    await this.deps.runtime.start(prepared.target);
    ctx.log.info('Relaunched previous instance', {
      image: restored.release?.image,
    });

    await this.waitForHealthy(prepared, ctx.log, 'Restored instance');
  }

  /**
   * Failures here never change the outcome of a successful deployment
   */
  private async prune(log: Logger): Promise<boolean> {
    try {
      await this.deps.runtime.prune();
      log.info('Pruned unused container resources');
      return true;
    } catch (error) {
      log.warn('Pruning failed', { error: errorMessage(error) });
      return false;
    }
  }
}
