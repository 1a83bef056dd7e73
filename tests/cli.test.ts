import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { createCLI, type CliContext } from '../src/cli.js';
import type { DeploymentReport } from '../src/deployment/DeploymentPipeline.js';
import { tenantLayout } from '../src/deployment/layout.js';
import { HealthCheckTimeoutError } from '../src/types/errors.js';
import type { TenantIdentity } from '../src/types/tenant.js';

const stripAnsi = (text: string) => text.replace(/\u001b\[[0-9;]*m/g, '');

describe('tenantctl', () => {
  let lines: string[];
  let close: Mock<[], Promise<void>>;
  let context: CliContext;

  const report: DeploymentReport = {
    attemptId: '0b6a3f9e-6f0e-4a57-9d67-3c1f0c6a1d01',
    tenant: 'acme',
    image: 'acme-bot:2.0.0',
    finalState: 'RolledBack',
    failedState: 'HealthChecking',
    error: new HealthCheckTimeoutError(
      'New instance did not become healthy within 120000ms'
    ),
    steps: [],
    durationMs: 1500,
    exitCode: 2,
    snapshot: null,
  };

  beforeEach(() => {
    lines = [];
    close = vi.fn(async () => {});
    context = {
      healthUrl: 'http://{tenant}.internal:8000/health',
      pipeline: { run: vi.fn(async () => report) },
      provisioner: {
        ensureServerRunning: vi.fn(async () => {}),
        ensureTenantDatabase: vi.fn(async (identity: TenantIdentity) => ({
          tenant: identity.name,
          databaseName: 'acme_db',
          roleName: 'acme_user',
          databaseCreated: true,
          roleCreated: false,
        })),
      },
      reconciler: {
        computeMigrationState: vi.fn(async () => ({
          schemaObjectsExist: false,
          migrationHistoryTracked: false,
          presentTables: [],
          missingTables: ['users'],
        })),
        reconcile: vi.fn(async () => ({
          action: 'migrated' as const,
          migrations: ['001_create_users_table', '002_add_users_updated_at_trigger'],
        })),
        getStatus: vi.fn(async () => [
          {
            name: '001_create_users_table',
            executedAt: new Date('2026-01-01T00:00:00.000Z'),
          },
          { name: '002_add_users_updated_at_trigger' },
        ]),
      },
      prober: {
        isDatabaseServerReady: vi.fn(async () => true),
        isContainerRuntimeAvailable: vi.fn(async () => false),
        isServiceHealthy: vi.fn(async () => true),
      },
      runtime: { isRunning: vi.fn(async () => false) },
      snapshots: {
        layout: (tenant: string) => tenantLayout('/nonexistent-state', tenant),
        load: vi.fn(async () => null),
      },
      close,
    };
  });

  afterEach(() => {
    process.exitCode = undefined;
  });

  const run = async (args: string[], env: NodeJS.ProcessEnv = {}) => {
    const program = createCLI({
      open: () => context,
      env,
      print: (line) => lines.push(stripAnsi(line)),
    });
    await program.parseAsync(args, { from: 'user' });
  };

  describe('deploy', () => {
    it('should pass the parsed arguments to the pipeline', async () => {
      await run(
        ['deploy', 'acme', '-i', 'acme-bot:2.0.0', '-m', 'staging', '-f', 'A=1', '-f', 'B=2', '--prune'],
        { TENANT_DB_PASSWORD: 'test-secret' }
      );

      expect(context.pipeline.run).toHaveBeenCalledWith({
        tenant: 'acme',
        credentialSecret: 'test-secret',
        image: 'acme-bot:2.0.0',
        mode: 'staging',
        bundleDir: undefined,
        healthUrl: undefined,
        features: ['A=1', 'B=2'],
        prune: true,
      });
      expect(close).toHaveBeenCalledTimes(1);
    });

    it('should print the report and exit with its code', async () => {
      await run(['deploy', 'acme', '-i', 'acme-bot:2.0.0', '-c', 'test-secret']);

      expect(lines).toEqual([
        'Deployment 0b6a3f9e-6f0e-4a57-9d67-3c1f0c6a1d01 of acme: RolledBack',
        'Failed in HealthChecking: [HEALTH_CHECK_TIMEOUT] New instance did not become healthy within 120000ms',
        'Steps:',
        'Total: 1.5s',
      ]);
      expect(process.exitCode).toBe(2);
    });

    it('should prefer --credential over the environment', async () => {
      await run(
        ['deploy', 'acme', '-i', 'acme-bot:2.0.0', '-m', 'production', '-c', 'cli-secret'],
        { TENANT_DB_PASSWORD: 'env-secret' }
      );

      expect(context.pipeline.run).toHaveBeenCalledWith(
        expect.objectContaining({ credentialSecret: 'cli-secret', mode: 'production' })
      );
    });

    it('should leave the mode for validation when --mode is absent', async () => {
      await run(['deploy', 'acme', '-i', 'acme-bot:2.0.0', '-c', 'test-secret']);

      const [args] = vi.mocked(context.pipeline.run).mock.calls[0] ?? [];
      expect(args?.mode).toBeUndefined();
    });
  });

  describe('db provision', () => {
    it('should start the server and ensure the tenant resources', async () => {
      await run(['db', 'provision', 'acme', '-c', 'test-secret']);

      expect(context.provisioner.ensureServerRunning).toHaveBeenCalledTimes(1);
      expect(context.provisioner.ensureTenantDatabase).toHaveBeenCalledWith({
        name: 'acme',
        credentialSecret: 'test-secret',
      });
      expect(lines).toEqual(['Database acme_db: created', 'Role acme_user: exists']);
      expect(process.exitCode).toBeUndefined();
    });

    it('should reject an invalid tenant name before touching the server', async () => {
      await run(['db', 'provision', 'Acme', '-c', 'test-secret']);

      expect(context.provisioner.ensureServerRunning).not.toHaveBeenCalled();
      expect(lines).toEqual([
        '[VALIDATION] tenant: Tenant name must start with a letter and contain only lowercase letters, numbers, and hyphens (cannot end with a hyphen)',
      ]);
      expect(process.exitCode).toBe(1);
      expect(close).toHaveBeenCalledTimes(1);
    });
  });

  describe('migrate', () => {
    it('should reconcile and print the outcome', async () => {
      await run(['migrate', 'acme', '-c', 'test-secret']);

      expect(lines).toEqual([
        'Migrations: migrated (001_create_users_table, 002_add_users_updated_at_trigger)',
      ]);
    });

    it('should list applied and pending migrations with --status', async () => {
      await run(['migrate', 'acme', '--status'], { TENANT_DB_PASSWORD: 'test-secret' });

      expect(context.reconciler.reconcile).not.toHaveBeenCalled();
      expect(lines).toEqual([
        'Tables present: none; history tracked: no',
        'applied  001_create_users_table  2026-01-01T00:00:00.000Z',
        'pending  002_add_users_updated_at_trigger',
      ]);
    });

    it('should require a credential', async () => {
      await run(['migrate', 'acme']);

      expect(lines).toEqual(['[VALIDATION] credentialSecret: Credential is required']);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('probe', () => {
    it('should report each resource and fail when one is not ready', async () => {
      await run(['probe', 'acme']);

      expect(context.prober.isServiceHealthy).toHaveBeenCalledWith(
        'http://acme.internal:8000/health'
      );
      expect(lines).toEqual([
        'Database server     ready',
        'Container runtime   not ready',
        'Service acme        ready',
      ]);
      expect(process.exitCode).toBe(1);
    });

    it('should check an explicit health URL', async () => {
      await run(['probe', '--health-url', 'https://bots.example.com/health']);

      expect(context.prober.isServiceHealthy).toHaveBeenCalledWith(
        'https://bots.example.com/health'
      );
      expect(lines[2]).toBe('Service             ready');
    });

    it('should skip the service check without a tenant or URL', async () => {
      await run(['probe']);

      expect(context.prober.isServiceHealthy).not.toHaveBeenCalled();
      expect(lines).toHaveLength(2);
    });
  });

  describe('status', () => {
    it('should report a tenant that was never deployed', async () => {
      await run(['status', 'acme']);

      expect(context.runtime.isRunning).toHaveBeenCalledWith({
        project: 'acme',
        directory: '/nonexistent-state/acme/current',
      });
      expect(lines).toEqual(['Release: none', 'Running: no', 'Snapshot: none']);
    });
  });
});
