import { spawn } from 'child_process';
import { ExternalToolError } from './errors';

export interface RunOptions {
  cwd?: string;
  /** Written to the child's stdin, then stdin is closed. */
  input?: string;
  /** Run through `sudo -u <user> -H`. */
  asUser?: string;
  /** 0 or undefined disables the timeout. */
  timeoutMs?: number;
}

export interface RunResult {
  stdout: string;
  stderr: string;
}

/**
 * Every external tool (apt, psql, systemctl, nginx, certbot, pip) is reached
 * through this interface so tests can record calls and inject failures.
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<RunResult>;
  commandExists(command: string): Promise<boolean>;
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args]
    .map((part) => (/^[\w@%+=:,./-]+$/.test(part) ? part : `'${part.replace(/'/g, `'\\''`)}'`))
    .join(' ');
}

export class ProcessRunner implements CommandRunner {
  constructor(private defaultTimeoutMs = 0) {}

  run(command: string, args: string[], options: RunOptions = {}): Promise<RunResult> {
    const { cwd, input, asUser, timeoutMs = this.defaultTimeoutMs } = options;
    const [file, argv]: [string, string[]] = asUser
      ? ['sudo', ['-u', asUser, '-H', command, ...args]]
      : [command, args];
    const display = formatCommand(file, argv);

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;

      const child = spawn(file, argv, {
        cwd,
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      const timer = timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill('SIGTERM');
          }, timeoutMs)
        : undefined;

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code) => {
        if (timer) clearTimeout(timer);
        if (timedOut) {
          reject(new ExternalToolError(display, null, `timed out after ${timeoutMs}ms\n${stderr}`));
        } else if (code === 0) {
          resolve({ stdout, stderr });
        } else {
          reject(new ExternalToolError(display, code, stderr));
        }
      });

      child.on('error', (error) => {
        if (timer) clearTimeout(timer);
        reject(new ExternalToolError(display, null, error.message, { cause: error }));
      });

      child.stdin.on('error', (error: NodeJS.ErrnoException) => {
        // EPIPE: the child exited before reading; close reports its status
        if (error.code === 'EPIPE') return;
        reject(new ExternalToolError(display, null, error.message, { cause: error }));
      });

      if (input !== undefined) {
        child.stdin.end(input);
      } else {
        child.stdin.end();
      }
    });
  }

  async commandExists(command: string): Promise<boolean> {
    try {
      await this.run('sh', ['-c', 'command -v "$1"', 'sh', command]);
      return true;
    } catch (error) {
      if (error instanceof ExternalToolError && error.status !== null) return false;
      throw error;
    }
  }
}
