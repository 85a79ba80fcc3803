import path from 'path';
import type { CommandRunner } from './exec';
import { DependencyError, errorMessage } from './errors';

export interface RuntimeInstaller {
  /**
   * Create a virtualenv at `venvDir` owned by `user` and install the
   * requirements file plus any extra packages into it.
   */
  createEnvironment(options: {
    venvDir: string;
    user: string;
    requirementsFile: string;
    extraPackages?: string[];
  }): Promise<void>;
}

export class VirtualenvInstaller implements RuntimeInstaller {
  constructor(private runner: CommandRunner, private pythonVersion: string) {}

  async createEnvironment(options: {
    venvDir: string;
    user: string;
    requirementsFile: string;
    extraPackages?: string[];
  }): Promise<void> {
    const { venvDir, user, requirementsFile, extraPackages = [] } = options;
    const pip = path.join(venvDir, 'bin', 'pip');

    const steps: Array<[string, string[]]> = [
      [`python${this.pythonVersion}`, ['-m', 'venv', venvDir]],
      [pip, ['install', '--upgrade', 'pip']],
      [pip, ['install', 'wheel']],
      [pip, ['install', '-r', requirementsFile]],
    ];
    if (extraPackages.length > 0) {
      steps.push([pip, ['install', ...extraPackages]]);
    }

    for (const [command, args] of steps) {
      try {
        await this.runner.run(command, args, { asUser: user });
      } catch (error) {
        throw new DependencyError(`Failed to prepare Python environment at ${venvDir}: ${errorMessage(error)}`, { cause: error });
      }
    }
  }
}
