import { promises as fs } from 'fs';
import path from 'path';
import type { HostConfig } from './config';
import { NotFoundError, ValidationError } from './errors';
import { parseOdooConfig } from './odoo-config';

const NAME_PATTERN = /^[A-Za-z0-9_-]+$/;
const DOMAIN_PATTERN = /^[A-Za-z0-9.-]+$/;
const EMAIL_PATTERN = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;

export interface InstancePaths {
  name: string;
  /** systemd unit name, also the config file stem. */
  serviceName: string;
  instanceDir: string;
  customAddonsDir: string;
  enterpriseAddonsDir: string;
  venvDir: string;
  configFile: string;
  unitFile: string;
  logFile: string;
  nginxAvailable: string;
  nginxEnabled: string;
  nginxAccessLog: string;
  nginxErrorLog: string;
  upstream: string;
  chatUpstream: string;
}

export interface InstancePorts {
  httpPort: number;
  geventPort: number;
}

export function validateName(candidate: string): boolean {
  return NAME_PATTERN.test(candidate);
}

export function validateDomain(candidate: string): boolean {
  if (candidate.length > 253 || !DOMAIN_PATTERN.test(candidate)) return false;
  return candidate.split('.').every((label) => label.length > 0 && label.length <= 63);
}

export function validateEmail(candidate: string): boolean {
  return EMAIL_PATTERN.test(candidate);
}

export function assertValidName(candidate: string): void {
  if (!validateName(candidate)) {
    throw new ValidationError('Invalid instance name. Only letters, numbers, underscores, and dashes are allowed.');
  }
}

export function assertValidDomain(candidate: string): void {
  if (!validateDomain(candidate)) {
    throw new ValidationError(`Invalid domain name: "${candidate}"`);
  }
}

export function assertValidEmail(candidate: string): void {
  if (!validateEmail(candidate)) {
    throw new ValidationError(`Invalid email address: "${candidate}"`);
  }
}

/**
 * Single source of truth for instance naming. Everything an instance owns
 * on disk or in systemd/nginx is derived here from its name.
 */
export class InstanceRegistry {
  private readonly prefix: string;
  private readonly suffix = '.conf';

  constructor(private config: HostConfig) {
    this.prefix = `${config.serviceUser}-`;
  }

  resolve(name: string): InstancePaths {
    assertValidName(name);

    const { config } = this;
    const serviceName = `${this.prefix}${name}`;
    const instanceDir = path.join(config.instancesDir, name);

    return {
      name,
      serviceName,
      instanceDir,
      customAddonsDir: path.join(instanceDir, 'custom', 'addons'),
      enterpriseAddonsDir: path.join(instanceDir, 'enterprise', 'addons'),
      venvDir: path.join(instanceDir, 'venv'),
      configFile: path.join(config.configDir, `${serviceName}${this.suffix}`),
      unitFile: path.join(config.systemdDir, `${serviceName}.service`),
      logFile: path.join(config.logDir, `${name}.log`),
      nginxAvailable: path.join(config.nginxAvailableDir, serviceName),
      nginxEnabled: path.join(config.nginxEnabledDir, serviceName),
      nginxAccessLog: path.join(config.nginxLogDir, `${serviceName}.access.log`),
      nginxErrorLog: path.join(config.nginxLogDir, `${serviceName}.error.log`),
      upstream: `odoo_${name}`,
      chatUpstream: `odoochat_${name}`,
    };
  }

  async listInstances(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.config.configDir);
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }

    return entries
      .filter((entry) => entry.startsWith(this.prefix) && entry.endsWith(this.suffix))
      .map((entry) => entry.slice(this.prefix.length, entry.length - this.suffix.length))
      .filter(validateName)
      .sort();
  }

  async requireInstances(): Promise<string[]> {
    const names = await this.listInstances();
    if (names.length === 0) {
      throw new NotFoundError('No existing Odoo instances found.');
    }
    return names;
  }

  /** Pick an instance by its position in the current listing. */
  async select(index: number): Promise<string> {
    const names = await this.requireInstances();
    const name = Number.isInteger(index) ? names[index] : undefined;
    if (name === undefined) {
      throw new NotFoundError('Invalid selection.');
    }
    return name;
  }

  async has(name: string): Promise<boolean> {
    if (!validateName(name)) return false;
    const names = await this.listInstances();
    return names.includes(name);
  }

  async readPorts(name: string): Promise<InstancePorts | null> {
    const { configFile } = this.resolve(name);
    let content: string;
    try {
      content = await fs.readFile(configFile, 'utf-8');
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }

    const options = parseOdooConfig(content);
    const httpPort = Number(options.http_port);
    const geventPort = Number(options.gevent_port);
    if (!Number.isInteger(httpPort) || !Number.isInteger(geventPort)) return null;
    return { httpPort, geventPort };
  }

  /** Ports recorded by every registered instance, running or not. */
  async reservedPorts(): Promise<Set<number>> {
    const reserved = new Set<number>();
    for (const name of await this.listInstances()) {
      const ports = await this.readPorts(name);
      if (ports) {
        reserved.add(ports.httpPort);
        reserved.add(ports.geventPort);
      }
    }
    return reserved;
  }
}

export function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
