import fs from 'fs-extra';
import { RuntimeCommandError } from '../types/errors.js';
import logger from '../utils/logger.js';
import { runCommand, type CommandRunner } from '../utils/exec.js';
import type { ContainerRuntime, ServiceTarget } from './ContainerRuntime.js';

export interface DockerComposeRuntimeOptions {
  /** Docker CLI binary */
  binary?: string;
  runner?: CommandRunner;
  /** Upper bound for a single command */
  commandTimeoutMs?: number;
}

/**
 * ContainerRuntime backed by the `docker compose` CLI
 */
export class DockerComposeRuntime implements ContainerRuntime {
  private readonly binary: string;
  private readonly runner: CommandRunner;
  private readonly commandTimeoutMs: number;

  constructor(options: DockerComposeRuntimeOptions = {}) {
    this.binary = options.binary ?? 'docker';
    this.runner = options.runner ?? runCommand;
    this.commandTimeoutMs = options.commandTimeoutMs ?? 10 * 60 * 1000;
  }

  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.runner(
        this.binary,
        ['info', '--format', '{{.ServerVersion}}'],
        { timeoutMs: 15000 }
      );
      return result.code === 0;
    } catch (error) {
      logger.debug('Container runtime probe failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  async isRunning(target: ServiceTarget): Promise<boolean> {
    const stdout = await this.compose(target, [
      'ps',
      '--status',
      'running',
      '--quiet',
    ]);
    return stdout.trim().length > 0;
  }

  async start(target: ServiceTarget): Promise<void> {
    await this.compose(target, ['up', '-d', '--remove-orphans']);
  }

  async stop(target: ServiceTarget, timeoutSeconds: number): Promise<void> {
    await this.compose(target, ['down', '--timeout', String(timeoutSeconds)]);
  }

  async kill(target: ServiceTarget): Promise<void> {
    await this.compose(target, ['kill']);
    await this.compose(target, ['down', '--timeout', '5']);
  }

  async pull(target: ServiceTarget): Promise<void> {
    await this.compose(target, ['pull']);
  }

  async prune(): Promise<void> {
    // Volumes are left alone: the shared database keeps its data in one
    await this.exec(['image', 'prune', '-f', '--filter', 'until=72h']);
    await this.exec(['network', 'prune', '-f']);
  }

  private async compose(
    target: ServiceTarget,
    args: string[]
  ): Promise<string> {
    const base = ['compose', '-p', target.project];
    if (target.composeFile) {
      base.push('-f', target.composeFile);
    }

    // A project that was never deployed has no directory yet; compose still
    // answers `ps` and `down` by project name
    const cwd = (await fs.pathExists(target.directory))
      ? target.directory
      : undefined;

    return this.exec([...base, ...args], cwd);
  }

  private async exec(args: string[], cwd?: string): Promise<string> {
    const command = `${this.binary} ${args.join(' ')}`;
    logger.debug('Running container runtime command', { command, cwd });

    const result = await this.runner(this.binary, args, {
      cwd,
      timeoutMs: this.commandTimeoutMs,
    });

    if (result.code !== 0) {
      throw new RuntimeCommandError(`Command failed: ${command}`, {
        command,
        code: result.code,
        stderr: result.stderr.trim(),
      });
    }

    logger.debug('Container runtime command finished', {
      command,
      durationMs: result.duration,
    });
    return result.stdout;
  }
}
