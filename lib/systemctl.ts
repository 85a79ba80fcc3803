import { promises as fs } from 'fs';
import path from 'path';
import type { CommandRunner } from './exec';
import { isMissing } from './registry';

export type ActiveState = 'active' | 'inactive' | 'failed' | 'activating' | 'deactivating' | 'reloading' | 'unknown';

export interface UnitStatus {
  unit: string;
  loaded: boolean;
  active: ActiveState;
  enabled: boolean;
  description: string;
  mainPid?: number;
}

export interface UnitDefinition {
  description: string;
  user: string;
  group?: string;
  workingDirectory: string;
  execStart: string[];
}

export interface ServiceManager {
  installUnit(unitFile: string, definition: UnitDefinition): Promise<void>;
  removeUnit(unitFile: string): Promise<boolean>;
  daemonReload(): Promise<void>;
  isLoaded(unit: string): Promise<boolean>;
  enable(unit: string): Promise<void>;
  disable(unit: string): Promise<void>;
  start(unit: string): Promise<void>;
  stop(unit: string): Promise<void>;
  restart(unit: string): Promise<void>;
  getStatus(unit: string): Promise<UnitStatus>;
}

const ACTIVE_STATES: readonly ActiveState[] = ['active', 'inactive', 'failed', 'activating', 'deactivating', 'reloading'];

function assertUnitValue(field: string, value: string): void {
  if (/[\r\n]/.test(value)) {
    throw new Error(`Unit ${field} must be a single line`);
  }
}

export function renderUnit(definition: UnitDefinition): string {
  const { description, user, group = user, workingDirectory, execStart } = definition;
  const command = execStart.join(' ');
  for (const [field, value] of Object.entries({ description, user, group, workingDirectory, command })) {
    assertUnitValue(field, value);
  }

  return `[Unit]
Description=${description}
After=network.target

[Service]
Type=simple
User=${user}
Group=${group}
ExecStart=${command}
WorkingDirectory=${workingDirectory}
StandardOutput=journal+console
Restart=on-failure

[Install]
WantedBy=multi-user.target
`;
}

export function parseSystemctlShow(output: string): Record<string, string> {
  const properties: Record<string, string> = {};

  output.split('\n').forEach(line => {
    const [key, ...valueParts] = line.split('=');
    if (key && valueParts.length > 0) {
      properties[key] = valueParts.join('=');
    }
  });

  return properties;
}

export class SystemctlManager implements ServiceManager {
  constructor(private runner: CommandRunner) {}

  private async systemctl(...args: string[]): Promise<string> {
    const { stdout } = await this.runner.run('systemctl', args);
    return stdout;
  }

  async installUnit(unitFile: string, definition: UnitDefinition): Promise<void> {
    await fs.mkdir(path.dirname(unitFile), { recursive: true });
    await fs.writeFile(unitFile, renderUnit(definition), { mode: 0o644 });
    await this.daemonReload();
  }

  // Returns false when there was no unit file to delete
  async removeUnit(unitFile: string): Promise<boolean> {
    try {
      await fs.access(unitFile);
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
    await fs.rm(unitFile, { force: true });
    await this.daemonReload();
    return true;
  }

  async daemonReload(): Promise<void> {
    await this.systemctl('daemon-reload');
  }

  async isLoaded(unit: string): Promise<boolean> {
    const output = await this.systemctl('show', '-p', 'LoadState', '--value', unit);
    return output.trim() === 'loaded';
  }

  async enable(unit: string): Promise<void> {
    await this.systemctl('enable', unit);
  }

  async disable(unit: string): Promise<void> {
    await this.systemctl('disable', unit);
  }

  async start(unit: string): Promise<void> {
    await this.systemctl('start', unit);
  }

  async stop(unit: string): Promise<void> {
    await this.systemctl('stop', unit);
  }

  async restart(unit: string): Promise<void> {
    await this.systemctl('restart', unit);
  }

  async getStatus(unit: string): Promise<UnitStatus> {
    const output = await this.systemctl(
      'show',
      '-p', 'LoadState',
      '-p', 'ActiveState',
      '-p', 'UnitFileState',
      '-p', 'Description',
      '-p', 'MainPID',
      unit
    );
    const properties = parseSystemctlShow(output);
    const active = ACTIVE_STATES.find((state) => state === properties.ActiveState) ?? 'unknown';
    const mainPid = parseInt(properties.MainPID ?? '', 10);

    return {
      unit,
      loaded: properties.LoadState === 'loaded',
      active,
      enabled: properties.UnitFileState === 'enabled',
      description: properties.Description ?? '',
      ...(mainPid > 0 ? { mainPid } : {}),
    };
  }
}
