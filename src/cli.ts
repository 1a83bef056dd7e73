/**
 * tenantctl - Commander program definition
 *
 * deploy     - one deploy-or-rollback attempt for a tenant
 * db         - shared server start and tenant provisioning
 * migrate    - reconcile a tenant database with its migrations
 * probe      - readiness of the database server, runtime and a tenant
 * status     - what a tenant currently runs and what it can roll back to
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import type { DeploymentReport, DeploymentPipeline } from './deployment/DeploymentPipeline.js';
import { formatReport } from './deployment/report.js';
import { readReleaseManifest } from './deployment/releaseManifest.js';
import type { SnapshotStore } from './deployment/SnapshotStore.js';
import { EXIT_CODES, type TerminalState } from './deployment/states.js';
import type { ContainerRuntime } from './runtime/ContainerRuntime.js';
import type { MigrationReconciler } from './services/migration/index.js';
import { healthEndpointFor, type ResourceProber } from './services/probe/index.js';
import type { TenantProvisioner } from './services/provisioning/index.js';
import { ValidationError, classifyError } from './types/errors.js';
import { resourceNamesFor, type TenantIdentity } from './types/tenant.js';
import logger from './utils/logger.js';
import {
  formatZodError,
  validateTenantIdentityRequest,
} from './validation/deploy/index.js';

/**
 * Environment variable read when --credential is not given
 */
export const CREDENTIAL_ENV_VAR = 'TENANT_DB_PASSWORD';

/**
 * What the commands need from a wired orchestrator
 */
export interface CliContext {
  healthUrl: string;
  pipeline: Pick<DeploymentPipeline, 'run'>;
  provisioner: TenantProvisioner;
  reconciler: MigrationReconciler;
  prober: ResourceProber;
  runtime: Pick<ContainerRuntime, 'isRunning'>;
  snapshots: Pick<SnapshotStore, 'layout' | 'load'>;
  close(): Promise<void>;
}

export interface CliOptions {
  /** Opens a context per command; nothing connects before a command runs */
  open: () => CliContext;
  env?: NodeJS.ProcessEnv;
  print?: (line: string) => void;
}

interface CredentialOption {
  credential?: string;
}

interface DeployOptions extends CredentialOption {
  image: string;
  mode?: string;
  bundle?: string;
  healthUrl?: string;
  feature: string[];
  prune?: boolean;
  json?: boolean;
}

const HEADLINE_COLORS: Record<TerminalState, (text: string) => string> = {
  Succeeded: chalk.green,
  RolledBack: chalk.yellow,
  Failed: chalk.red,
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createCLI(options: CliOptions): Command {
  const env = options.env ?? process.env;
  const print = options.print ?? ((line: string) => console.log(line));

  const credentialFrom = (opts: CredentialOption): string | undefined =>
    opts.credential ?? env[CREDENTIAL_ENV_VAR];

  /**
   * Run one command against a fresh context and turn any error into a
   * printed message and a failing exit code
   */
  async function withContext(
    work: (ctx: CliContext) => Promise<void>
  ): Promise<void> {
    let ctx: CliContext | undefined;
    try {
      ctx = options.open();
      await work(ctx);
    } catch (error) {
      const classified = classifyError(error);
      logger.debug('Command failed', { error: classified.toJSON() });
      print(chalk.red(`[${classified.type}] ${classified.message}`));
      if (classified.requiresOperator) {
        print(chalk.yellow('Operator action required'));
      }
      process.exitCode = EXIT_CODES.Failed;
    } finally {
      await ctx?.close();
    }
  }

  const program = new Command();

  program
    .name('tenantctl')
    .description('Deploy tenant services onto a shared PostgreSQL server')
    .version('1.0.0');

  // ========================================================================
  // deploy
  // ========================================================================
  program
    .command('deploy')
    .description('Deploy an image for a tenant, rolling back on failure')
    .argument('<tenant>', 'Tenant name')
    .requiredOption('-i, --image <ref>', 'Container image to deploy')
    .option('-m, --mode <mode>', 'production or staging')
    .option('-c, --credential <secret>', `Tenant database credential (default: $${CREDENTIAL_ENV_VAR})`)
    .option('-b, --bundle <dir>', 'Release bundle copied into the deployment directory')
    .option('--health-url <url>', 'Health endpoint; {tenant} is replaced')
    .option('-f, --feature <KEY=VALUE>', 'Feature toggle (repeatable)', collect, [])
    .option('--prune', 'Prune unused images and networks after success')
    .option('-j, --json', 'Print the report as JSON')
    .action(async (tenant: string, opts: DeployOptions) => {
      await withContext(async (ctx) => {
        const report = await ctx.pipeline.run({
          tenant,
          credentialSecret: credentialFrom(opts),
          image: opts.image,
          mode: opts.mode,
          bundleDir: opts.bundle,
          healthUrl: opts.healthUrl,
          features: opts.feature,
          prune: opts.prune ?? false,
        });
        printReport(report, opts.json ?? false);
        process.exitCode = report.exitCode;
      });
    });

  // ========================================================================
  // db
  // ========================================================================
  const db = program
    .command('db')
    .description('Shared database server and tenant provisioning');

  db.command('start')
    .description('Start the shared server if needed and wait until it is ready')
    .action(async () => {
      await withContext(async (ctx) => {
        await ctx.provisioner.ensureServerRunning();
        print(chalk.green('Shared database server is ready'));
      });
    });

  db.command('provision')
    .description('Ensure the tenant database and role exist')
    .argument('<tenant>', 'Tenant name')
    .option('-c, --credential <secret>', 'Tenant database credential')
    .action(async (tenant: string, opts: CredentialOption) => {
      await withContext(async (ctx) => {
        const identity = identityFrom(tenant, credentialFrom(opts));
        await ctx.provisioner.ensureServerRunning();
        const result = await ctx.provisioner.ensureTenantDatabase(identity);
        print(
          `Database ${result.databaseName}: ${result.databaseCreated ? 'created' : 'exists'}`
        );
        print(`Role ${result.roleName}: ${result.roleCreated ? 'created' : 'exists'}`);
      });
    });

  // ========================================================================
  // migrate
  // ========================================================================
  program
    .command('migrate')
    .description('Run, stamp or report the tenant database migrations')
    .argument('<tenant>', 'Tenant name')
    .option('-c, --credential <secret>', 'Tenant database credential')
    .option('-s, --status', 'Only report the migration state')
    .action(async (tenant: string, opts: CredentialOption & { status?: boolean }) => {
      await withContext(async (ctx) => {
        const identity = identityFrom(tenant, credentialFrom(opts));
        const state = await ctx.reconciler.computeMigrationState(identity);

        if (opts.status) {
          print(
            `Tables present: ${state.presentTables.join(', ') || 'none'}; history tracked: ${state.migrationHistoryTracked ? 'yes' : 'no'}`
          );
          const statuses = await ctx.reconciler.getStatus(identity);
          for (const status of statuses) {
            print(
              status.executedAt
                ? `${chalk.green('applied')}  ${status.name}  ${status.executedAt.toISOString()}`
                : `${chalk.yellow('pending')}  ${status.name}`
            );
          }
          return;
        }

        const result = await ctx.reconciler.reconcile(identity, state);
        print(`Migrations: ${result.action} (${result.migrations.join(', ') || 'none'})`);
      });
    });

  // ========================================================================
  // probe
  // ========================================================================
  program
    .command('probe')
    .description('Check the database server, the container runtime and a tenant')
    .argument('[tenant]', 'Tenant whose health endpoint is checked')
    .option('--health-url <url>', 'Health endpoint to check; {tenant} is replaced')
    .action(async (tenant: string | undefined, opts: { healthUrl?: string }) => {
      await withContext(async (ctx) => {
        const checks: Array<[string, boolean]> = [
          ['Database server', await ctx.prober.isDatabaseServerReady()],
          ['Container runtime', await ctx.prober.isContainerRuntimeAvailable()],
        ];
        if (tenant || opts.healthUrl) {
          const endpoint = healthEndpointFor(opts.healthUrl ?? ctx.healthUrl, tenant ?? '');
          checks.push([
            tenant ? `Service ${tenant}` : 'Service',
            await ctx.prober.isServiceHealthy(endpoint),
          ]);
        }

        for (const [label, ok] of checks) {
          print(`${label.padEnd(20)}${ok ? chalk.green('ready') : chalk.red('not ready')}`);
        }
        if (checks.some(([, ok]) => !ok)) {
          process.exitCode = EXIT_CODES.Failed;
        }
      });
    });

  // ========================================================================
  // status
  // ========================================================================
  program
    .command('status')
    .description('Show the running release and the rollback snapshot of a tenant')
    .argument('<tenant>', 'Tenant name')
    .action(async (tenant: string) => {
      await withContext(async (ctx) => {
        const layout = ctx.snapshots.layout(tenant);
        const release = await readReleaseManifest(layout.releaseFile);
        const running = await ctx.runtime.isRunning({
          project: resourceNamesFor(tenant).projectName,
          directory: layout.currentDir,
        });
        const snapshot = await ctx.snapshots.load(tenant);

        print(
          release
            ? `Release: ${release.image} (${release.mode}) deployed ${release.deployedAt}`
            : 'Release: none'
        );
        print(`Running: ${running ? chalk.green('yes') : chalk.red('no')}`);
        print(
          snapshot
            ? `Snapshot: ${snapshot.release?.image ?? 'unknown image'} taken ${snapshot.timestamp}`
            : 'Snapshot: none'
        );
      });
    });

  function printReport(report: DeploymentReport, json: boolean): void {
    if (json) {
      print(JSON.stringify(report, null, 2));
      return;
    }
    const [headline = '', ...rest] = formatReport(report).split('\n');
    print(HEADLINE_COLORS[report.finalState](headline));
    for (const line of rest) {
      print(line);
    }
  }

  return program;
}

function identityFrom(tenant: string, credentialSecret: string | undefined): TenantIdentity {
  try {
    const request = validateTenantIdentityRequest({ tenant, credentialSecret });
    return { name: request.tenant, credentialSecret: request.credentialSecret };
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new ValidationError(formatZodError(error));
    }
    throw error;
  }
}
