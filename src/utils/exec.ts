import { spawn } from 'child_process';

export interface CommandResult {
  stdout: string;
  stderr: string;
  code: number;
  duration: number;
}

export interface CommandOptions {
  cwd?: string;
  timeoutMs?: number;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Run a command without a shell and collect its output. Resolves with the
 * exit code; rejects only when the process cannot be spawned or times out.
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  const startTime = Date.now();

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    if (options.timeoutMs !== undefined && options.timeoutMs > 0) {
      const limit = options.timeoutMs;
      timeoutId = global.setTimeout(() => {
        child.kill('SIGKILL');
        reject(
          new Error(
            `Command timed out after ${limit}ms: ${command} ${args.join(' ')}`
          )
        );
      }, limit);
    }

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', (error) => {
      clearTimeout(timeoutId);
      reject(error);
    });

    child.on('close', (code) => {
      clearTimeout(timeoutId);
      resolve({
        stdout,
        stderr,
        code: code ?? 1,
        duration: Date.now() - startTime,
      });
    });
  });
};
