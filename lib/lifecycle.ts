import { promises as fs } from 'fs';
import path from 'path';
import { generateSecret } from './credentials';
import type { NewInstanceRecord } from './db';
import { NotFoundError, OperationCancelledError, ValidationError } from './errors';
import type { HostEnvironment } from './host';
import type { InstanceRecord } from './models';
import { renderOdooConfig } from './odoo-config';
import { findFreePort } from './ports';
import { Provisioner } from './provisioner';
import {
  assertValidDomain,
  assertValidEmail,
  assertValidName,
  InstanceRegistry,
  isMissing,
  type InstancePaths,
  type InstancePorts,
} from './registry';
import type { UnitStatus } from './systemctl';

export interface CreateInstanceRequest {
  name: string;
  domain: string;
  enterprise?: boolean;
  ssl?: boolean;
  /** Required when `ssl` is set; passed to the ACME account. */
  email?: string;
}

export interface CreatedInstance {
  name: string;
  domain: string;
  url: string;
  httpPort: number;
  geventPort: number;
  serviceName: string;
  paths: InstancePaths;
  enterprise: boolean;
  ssl: boolean;
  dbUser: string;
  dbPassword: string;
  adminPassword: string;
}

export interface RemoveOptions {
  /** Asked once, before anything is deleted. Anything but `true` aborts. */
  confirm: (name: string) => Promise<boolean> | boolean;
}

export interface RemovalReport {
  name: string;
  stoppedService: boolean;
  removedUnit: boolean;
  droppedDatabases: string[];
  droppedRole: boolean;
  removedFiles: string[];
  removedProxy: boolean;
}

export interface InstanceStatus {
  name: string;
  paths: InstancePaths;
  ports: InstancePorts | null;
  unit: UnitStatus;
  record?: InstanceRecord;
}

/** Where instance metadata is kept; the config directory stays authoritative. */
export interface InstanceStore {
  saveInstance(record: NewInstanceRecord): unknown;
  deleteInstance(name: string): unknown;
  getInstance(name: string): InstanceRecord | undefined;
}

const SECRET_LENGTH = 16;
const DEFAULT_DATABASE = 'postgres';

async function exists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch (error) {
    if (isMissing(error)) return false;
    throw error;
  }
}

/**
 * Creates, lists and removes Odoo instances. Steps run strictly in order and
 * the first failure aborts the rest; nothing already done is undone, so a
 * failed create is cleaned up with `remove`.
 */
export class InstanceManager {
  readonly registry: InstanceRegistry;
  private provisioner: Provisioner;

  constructor(private host: HostEnvironment, private store?: InstanceStore) {
    this.registry = new InstanceRegistry(host.config);
    this.provisioner = new Provisioner(host);
  }

  list(): Promise<string[]> {
    return this.registry.listInstances();
  }

  /** Throws NotFoundError unless `name` has a config file in the registry. */
  async resolveRegistered(name: string): Promise<string> {
    if (!(await this.registry.has(name))) {
      throw new NotFoundError(`Instance '${name}' not found.`);
    }
    return name;
  }

  // Store metadata only; systemd is not consulted
  describe(name: string): InstanceRecord | undefined {
    return this.store?.getInstance(name);
  }

  async status(name: string): Promise<InstanceStatus> {
    await this.resolveRegistered(name);
    const paths = this.registry.resolve(name);
    const [ports, unit] = await Promise.all([
      this.registry.readPorts(name),
      this.host.services.getStatus(`${paths.serviceName}.service`),
    ]);
    const record = this.store?.getInstance(name);
    return { name, paths, ports, unit, ...(record ? { record } : {}) };
  }

  private async chown(target: string, recursive = false): Promise<void> {
    const user = this.host.config.serviceUser;
    const args = recursive ? ['-R', `${user}:${user}`, target] : [`${user}:${user}`, target];
    await this.host.runner.run('chown', args);
  }

  async create(request: CreateInstanceRequest): Promise<CreatedInstance> {
    const { config, database, sources, runtime, services, proxy, certificates, ports, logger } = this.host;
    const { name, domain, enterprise = false, ssl = false } = request;

    assertValidName(name);
    assertValidDomain(domain);
    let email = '';
    if (ssl) {
      if (!request.email) {
        throw new ValidationError('An email address is required to request an SSL certificate.');
      }
      assertValidEmail(request.email);
      email = request.email;
    }

    const paths = this.registry.resolve(name);
    const unit = `${paths.serviceName}.service`;
    await this.provisioner.ensureInstanceTooling();

    const adminPassword = generateSecret(SECRET_LENGTH);
    const dbPassword = generateSecret(SECRET_LENGTH);
    logger.log('Superadmin and database passwords generated.');

    await database.createRole(name, dbPassword);
    logger.log(`PostgreSQL user '${name}' created.`);

    await fs.mkdir(paths.customAddonsDir, { recursive: true });
    if (enterprise) {
      await fs.mkdir(path.dirname(paths.enterpriseAddonsDir), { recursive: true });
      await sources.clone(config.enterpriseRepository, paths.enterpriseAddonsDir, config.odooBranch);
      logger.log(`Enterprise code cloned into '${paths.enterpriseAddonsDir}'.`);
    }
    await this.chown(paths.instanceDir, true);

    await runtime.createEnvironment({
      venvDir: paths.venvDir,
      user: config.serviceUser,
      requirementsFile: path.join(config.baseCodeDir, 'requirements.txt'),
      extraPackages: ['gevent'],
    });
    logger.log(`Virtual environment created at '${paths.venvDir}'.`);

    const reserved = await this.registry.reservedPorts();
    const httpPort = await findFreePort(ports, config.baseHttpPort, { exclude: reserved });
    const geventPort = await findFreePort(ports, config.baseGeventPort, { exclude: [...reserved, httpPort] });

    const addonsPaths = [path.join(config.baseCodeDir, 'addons'), paths.customAddonsDir];
    if (enterprise) addonsPaths.push(paths.enterpriseAddonsDir);

    await fs.mkdir(path.dirname(paths.configFile), { recursive: true });
    await fs.writeFile(
      paths.configFile,
      renderOdooConfig({
        adminPassword,
        dbHost: config.dbHost,
        dbUser: name,
        dbPassword,
        addonsPaths,
        httpPort,
        geventPort,
        logFile: paths.logFile,
        limits: config.limits,
        proxyMode: ssl,
      }),
      { mode: 0o600 }
    );
    await fs.chmod(paths.configFile, 0o600);
    await this.chown(paths.configFile);
    logger.log(`Configuration file created at '${paths.configFile}'.`);

    await fs.mkdir(config.logDir, { recursive: true });
    await this.chown(config.logDir);

    await services.installUnit(paths.unitFile, {
      description: `Odoo18 - ${name}`,
      user: config.serviceUser,
      workingDirectory: config.baseCodeDir,
      execStart: [
        path.join(paths.venvDir, 'bin', 'python'),
        path.join(config.baseCodeDir, 'odoo-bin'),
        '-c',
        paths.configFile,
      ],
    });
    await services.enable(unit);
    await services.start(unit);
    logger.log(`Service '${unit}' created and started.`);

    const site = { paths, domain, httpPort, geventPort };
    await proxy.ensureUpgradeMap();
    await proxy.writeSite(site);
    await proxy.enableSite(paths);
    await proxy.testConfig();
    await proxy.reload();
    logger.log(`Nginx configuration created at '${paths.nginxAvailable}'.`);

    if (ssl) {
      logger.log('Obtaining SSL certificate with Certbot...');
      const tls = await certificates.issue(domain, email);
      await proxy.writeSite({ ...site, tls });
      await proxy.testConfig();
      await proxy.reload();
      logger.log('Nginx configuration updated with SSL.');
    }

    this.store?.saveInstance({ name, domain, hasEnterprise: enterprise, sslEnabled: ssl, httpPort, geventPort });

    return {
      name,
      domain,
      url: `${ssl ? 'https' : 'http'}://${domain}`,
      httpPort,
      geventPort,
      serviceName: unit,
      paths,
      enterprise,
      ssl,
      dbUser: name,
      dbPassword,
      adminPassword,
    };
  }

  /**
   * Delete everything derivable from `name`. Each step checks before it
   * deletes, so removing an already removed instance is a no-op.
   */
  async remove(name: string, options: RemoveOptions): Promise<RemovalReport> {
    const { database, services, proxy, logger } = this.host;
    const paths = this.registry.resolve(name);
    const unit = `${paths.serviceName}.service`;

    if ((await options.confirm(name)) !== true) {
      throw new OperationCancelledError();
    }

    logger.log(`Deleting Odoo instance '${name}'...`);
    const report: RemovalReport = {
      name,
      stoppedService: false,
      removedUnit: false,
      droppedDatabases: [],
      droppedRole: false,
      removedFiles: [],
      removedProxy: false,
    };

    if (await services.isLoaded(unit)) {
      logger.log(`* Stopping and disabling the Odoo service for ${name}`);
      await services.stop(unit);
      await services.disable(unit);
      report.stoppedService = true;
    }

    report.removedUnit = await services.removeUnit(paths.unitFile);
    if (report.removedUnit) logger.log('* Removed the systemd service file');

    for (const db of await database.listOwnedDatabases(name)) {
      if (db === DEFAULT_DATABASE) {
        logger.log(`* Skipping the default '${DEFAULT_DATABASE}' database.`);
        continue;
      }
      logger.log(`* Terminating active connections to database "${db}"`);
      await database.terminateConnections(db);
      logger.log(`* Dropping database "${db}"`);
      await database.dropDatabase(db);
      report.droppedDatabases.push(db);
    }

    if (await database.roleExists(name)) {
      logger.log(`* Dropping the PostgreSQL user '${name}'`);
      await database.dropRole(name);
      report.droppedRole = true;
    }

    for (const target of [paths.configFile, paths.instanceDir, paths.logFile]) {
      if (await exists(target)) {
        await fs.rm(target, { recursive: true, force: true });
        report.removedFiles.push(target);
        logger.log(`* Removed ${target}`);
      }
    }

    report.removedProxy = await proxy.removeSite(paths);
    if (report.removedProxy) {
      logger.log('* Removed Nginx configuration');
      await proxy.reload();
    }

    this.store?.deleteInstance(name);
    logger.log(`Instance '${name}' has been successfully deleted!`);
    return report;
  }
}
