import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { CertificateIssuer } from '../lib/certbot';
import { loadConfig, type HostConfig } from '../lib/config';
import { DatabaseError, DependencyError, ExternalToolError } from '../lib/errors';
import type { CommandRunner, RunOptions, RunResult } from '../lib/exec';
import { formatCommand } from '../lib/exec';
import type { SourceFetcher } from '../lib/git';
import type { HostEnvironment, Logger } from '../lib/host';
import { NginxManager, type TlsCertificate } from '../lib/nginx';
import type { PortProbe } from '../lib/ports';
import type { DatabaseAdmin } from '../lib/postgres';
import { renderUnit, type ServiceManager, type UnitDefinition, type UnitStatus } from '../lib/systemctl';
import type { RuntimeInstaller } from '../lib/virtualenv';

export interface RecordedCommand {
  command: string;
  args: string[];
  options: RunOptions;
}

type Responder = (command: string, args: string[], options: RunOptions) => RunResult | Error | undefined;

/** Records every command; answers from `responders`, else succeeds silently. */
export class FakeRunner implements CommandRunner {
  calls: RecordedCommand[] = [];
  missing = new Set<string>();
  private responders: Responder[] = [];

  respond(responder: Responder): this {
    this.responders.push(responder);
    return this;
  }

  failWhen(predicate: (line: string) => boolean, stderr = 'boom'): this {
    return this.respond((command, args) => {
      const line = formatCommand(command, args);
      return predicate(line) ? new ExternalToolError(line, 1, stderr) : undefined;
    });
  }

  lines(): string[] {
    return this.calls.map(({ command, args }) => formatCommand(command, args));
  }

  async run(command: string, args: string[], options: RunOptions = {}): Promise<RunResult> {
    this.calls.push({ command, args, options });
    for (const responder of this.responders) {
      const result = responder(command, args, options);
      if (result instanceof Error) throw result;
      if (result) return result;
    }
    return { stdout: '', stderr: '' };
  }

  async commandExists(command: string): Promise<boolean> {
    return !this.missing.has(command);
  }
}

export class FakeDatabaseAdmin implements DatabaseAdmin {
  roles = new Map<string, { password: string; superuser: boolean }>();
  /** database name -> owner role */
  databases = new Map<string, string>();
  terminated: string[] = [];

  async roleExists(role: string): Promise<boolean> {
    return this.roles.has(role);
  }

  async createRole(role: string, password: string, options: { superuser?: boolean } = {}): Promise<void> {
    if (this.roles.has(role)) {
      throw new DatabaseError(`PostgreSQL role "${role}" already exists`);
    }
    this.roles.set(role, { password, superuser: options.superuser ?? false });
  }

  async listOwnedDatabases(role: string): Promise<string[]> {
    return [...this.databases.entries()]
      .filter(([, owner]) => owner === role)
      .map(([db]) => db)
      .sort();
  }

  async terminateConnections(database: string): Promise<void> {
    this.terminated.push(database);
  }

  async dropDatabase(database: string): Promise<void> {
    this.databases.delete(database);
  }

  async dropRole(role: string): Promise<void> {
    this.roles.delete(role);
  }
}

/** Writes real unit files so tests can inspect them; tracks unit state in memory. */
export class FakeServiceManager implements ServiceManager {
  loaded = new Set<string>();
  enabled = new Set<string>();
  running = new Set<string>();
  reloads = 0;

  async installUnit(unitFile: string, definition: UnitDefinition): Promise<void> {
    await fs.mkdir(path.dirname(unitFile), { recursive: true });
    await fs.writeFile(unitFile, renderUnit(definition));
    this.loaded.add(path.basename(unitFile));
    await this.daemonReload();
  }

  async removeUnit(unitFile: string): Promise<boolean> {
    try {
      await fs.rm(unitFile);
    } catch {
      return false;
    }
    this.loaded.delete(path.basename(unitFile));
    await this.daemonReload();
    return true;
  }

  async daemonReload(): Promise<void> {
    this.reloads++;
  }

  async isLoaded(unit: string): Promise<boolean> {
    return this.loaded.has(unit);
  }

  async enable(unit: string): Promise<void> {
    this.enabled.add(unit);
  }

  async disable(unit: string): Promise<void> {
    this.enabled.delete(unit);
  }

  async start(unit: string): Promise<void> {
    this.running.add(unit);
  }

  async stop(unit: string): Promise<void> {
    this.running.delete(unit);
  }

  async restart(unit: string): Promise<void> {
    this.running.add(unit);
  }

  async getStatus(unit: string): Promise<UnitStatus> {
    return {
      unit,
      loaded: this.loaded.has(unit),
      active: this.running.has(unit) ? 'active' : 'inactive',
      enabled: this.enabled.has(unit),
      description: '',
    };
  }
}

export class FakeRuntimeInstaller implements RuntimeInstaller {
  created: string[] = [];
  failure?: string;

  async createEnvironment(options: { venvDir: string }): Promise<void> {
    if (this.failure) {
      throw new DependencyError(this.failure);
    }
    await fs.mkdir(path.join(options.venvDir, 'bin'), { recursive: true });
    this.created.push(options.venvDir);
  }
}

export class FakeSourceFetcher implements SourceFetcher {
  clones: Array<{ repository: string; destination: string; branch: string }> = [];

  async clone(repository: string, destination: string, branch: string): Promise<void> {
    await fs.mkdir(destination, { recursive: true });
    this.clones.push({ repository, destination, branch });
  }
}

export class FakePortProbe implements PortProbe {
  busy = new Set<number>();
  probed: number[] = [];

  async isInUse(port: number): Promise<boolean> {
    this.probed.push(port);
    return this.busy.has(port);
  }
}

export class FakeCertificateIssuer implements CertificateIssuer {
  issued: Array<{ domain: string; email: string }> = [];

  async issue(domain: string, email: string): Promise<TlsCertificate> {
    this.issued.push({ domain, email });
    return {
      certificate: `/etc/letsencrypt/live/${domain}/fullchain.pem`,
      certificateKey: `/etc/letsencrypt/live/${domain}/privkey.pem`,
    };
  }
}

export const silentLogger: Logger = {
  log: () => {},
  warn: () => {},
  error: () => {},
};

export interface FakeHost extends HostEnvironment {
  root: string;
  runner: FakeRunner;
  database: FakeDatabaseAdmin;
  services: FakeServiceManager;
  certificates: FakeCertificateIssuer;
  runtime: FakeRuntimeInstaller;
  sources: FakeSourceFetcher;
  ports: FakePortProbe;
}

/** Host layout rooted in a fresh temp directory. */
export async function createFakeHost(overrides: Partial<HostConfig> = {}): Promise<FakeHost> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'odoo-host-'));
  const at = (...parts: string[]) => path.join(root, ...parts);

  const config: HostConfig = {
    ...loadConfig({}),
    homeDir: at('odoo'),
    baseCodeDir: at('odoo'),
    instancesDir: at('odoo', 'instances'),
    configDir: at('etc'),
    systemdDir: at('etc', 'systemd', 'system'),
    logDir: at('var', 'log', 'odoo'),
    nginxAvailableDir: at('etc', 'nginx', 'sites-available'),
    nginxEnabledDir: at('etc', 'nginx', 'sites-enabled'),
    nginxConfDir: at('etc', 'nginx', 'conf.d'),
    nginxLogDir: at('var', 'log', 'nginx'),
    letsencryptLiveDir: at('etc', 'letsencrypt', 'live'),
    dbPath: ':memory:',
    ...overrides,
  };

  const runner = new FakeRunner();
  return {
    root,
    config,
    runner,
    database: new FakeDatabaseAdmin(),
    services: new FakeServiceManager(),
    proxy: new NginxManager(runner, path.join(config.nginxConfDir, 'odoo-websocket-upgrade.conf')),
    certificates: new FakeCertificateIssuer(),
    runtime: new FakeRuntimeInstaller(),
    sources: new FakeSourceFetcher(),
    ports: new FakePortProbe(),
    logger: silentLogger,
  };
}

export async function removeFakeHost(host: FakeHost): Promise<void> {
  await fs.rm(host.root, { recursive: true, force: true });
}
