import path from 'path';
import { CertbotIssuer, type CertificateIssuer } from './certbot';
import type { HostConfig } from './config';
import { ProcessRunner, type CommandRunner } from './exec';
import { GitSourceFetcher, type SourceFetcher } from './git';
import { NginxManager, type ProxyManager } from './nginx';
import { BindPortProbe, type PortProbe } from './ports';
import { PsqlDatabaseAdmin, type DatabaseAdmin } from './postgres';
import { SystemctlManager, type ServiceManager } from './systemctl';
import { VirtualenvInstaller, type RuntimeInstaller } from './virtualenv';

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

/**
 * Everything an operation may touch on the host. The shared directories
 * live in `config`; each external tool sits behind its own port so tests
 * can swap in fakes.
 */
export interface HostEnvironment {
  config: HostConfig;
  runner: CommandRunner;
  database: DatabaseAdmin;
  services: ServiceManager;
  proxy: ProxyManager;
  certificates: CertificateIssuer;
  runtime: RuntimeInstaller;
  sources: SourceFetcher;
  ports: PortProbe;
  logger: Logger;
}

export function createHostEnvironment(config: HostConfig, logger: Logger = console): HostEnvironment {
  const runner = new ProcessRunner(config.commandTimeoutMs);

  return {
    config,
    runner,
    database: new PsqlDatabaseAdmin(runner),
    services: new SystemctlManager(runner),
    proxy: new NginxManager(runner, path.join(config.nginxConfDir, `${config.serviceUser}-websocket-upgrade.conf`)),
    certificates: new CertbotIssuer(runner, config.letsencryptLiveDir),
    runtime: new VirtualenvInstaller(runner, config.pythonVersion),
    sources: new GitSourceFetcher(),
    ports: new BindPortProbe(config.portProbeHost),
    logger,
  };
}
