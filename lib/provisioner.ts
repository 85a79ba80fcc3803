import { promises as fs } from 'fs';
import path from 'path';
import { ExternalToolError } from './errors';
import type { HostEnvironment } from './host';

const SECURITY_PACKAGES = ['openssh-server', 'fail2ban'];

const BUILD_PACKAGES = [
  'python3-pip', 'python3-dev', 'python3-venv', 'git', 'build-essential',
  'libxml2-dev', 'libxslt1-dev', 'zlib1g-dev', 'libsasl2-dev', 'libldap2-dev',
  'libssl-dev', 'libffi-dev', 'libjpeg-dev', 'libpq-dev', 'liblcms2-dev',
  'libblas-dev', 'libatlas-base-dev', 'node-less',
];

const REPORT_PACKAGES = [
  'fontconfig', 'libxrender1', 'libxext6', 'libfreetype6', 'libx11-6',
  'xfonts-75dpi', 'xfonts-base', 'wkhtmltopdf',
];

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Brings the host to the state instance creation expects. Every step checks
 * first and does nothing when already satisfied, so it is safe to re-run.
 */
export class Provisioner {
  constructor(private host: HostEnvironment) {}

  private async apt(...args: string[]): Promise<void> {
    await this.host.runner.run('apt-get', args);
  }

  private async aptInstall(packages: string[]): Promise<void> {
    await this.apt('install', '-y', ...packages);
  }

  async ensurePython(version = this.host.config.pythonVersion): Promise<boolean> {
    const { runner, logger } = this.host;
    if (await runner.commandExists(`python${version}`)) return false;

    logger.log(`Python ${version} is not installed. Installing Python ${version}...`);
    await this.apt('update');
    await this.aptInstall(['software-properties-common']);
    await runner.run('add-apt-repository', ['ppa:deadsnakes/ppa', '-y']);
    await this.apt('update');
    await this.aptInstall([`python${version}`, `python${version}-venv`, `python${version}-dev`]);
    return true;
  }

  async ensureCertbot(): Promise<boolean> {
    const { runner, logger } = this.host;
    if (await runner.commandExists('certbot')) return false;

    logger.log('Certbot is not installed. Installing Certbot...');
    await this.apt('update');
    await this.aptInstall(['certbot', 'python3-certbot-nginx']);
    return true;
  }

  async ensureNginx(): Promise<boolean> {
    const { runner, services, logger } = this.host;
    if (await runner.commandExists('nginx')) return false;

    logger.log('Nginx is not installed. Installing Nginx...');
    await this.apt('update');
    await this.aptInstall(['nginx']);
    await services.enable('nginx');
    await services.start('nginx');
    return true;
  }

  /** Tooling every `create` needs; each step is skipped when its tool is installed. */
  async ensureInstanceTooling(): Promise<void> {
    await this.ensurePython();
    await this.ensureCertbot();
    await this.ensureNginx();
  }

  private async userExists(user: string): Promise<boolean> {
    try {
      await this.host.runner.run('id', ['-u', user]);
      return true;
    } catch (error) {
      if (error instanceof ExternalToolError && error.status !== null) return false;
      throw error;
    }
  }

  /**
   * One-shot host installation: system packages, PostgreSQL with the
   * service role, the service OS user, the shared Odoo checkout and its
   * virtualenv, report rendering tools, then the per-instance tooling.
   */
  async installHost(options: { dbPassword: string }): Promise<void> {
    const { config, runner, database, services, sources, runtime, logger } = this.host;
    const user = config.serviceUser;

    logger.log('Updating the server...');
    await this.apt('update');
    await this.apt('upgrade', '-y');

    logger.log('Installing and configuring security measures...');
    await this.aptInstall(SECURITY_PACKAGES);
    await services.start('fail2ban');
    await services.enable('fail2ban');

    logger.log('Installing required packages and libraries...');
    await this.aptInstall(BUILD_PACKAGES);

    if (!(await runner.commandExists('lessc'))) {
      logger.log('Installing Node.js, less and less-plugin-clean-css...');
      await this.aptInstall(['nodejs', 'npm']);
      await runner.run('npm', ['install', '-g', 'less', 'less-plugin-clean-css']);
    }

    logger.log('Installing PostgreSQL...');
    await this.aptInstall(['postgresql']);

    if (await database.roleExists(user)) {
      logger.log(`PostgreSQL role '${user}' already exists`);
    } else {
      logger.log(`Creating PostgreSQL user for ${user}...`);
      await database.createRole(user, options.dbPassword, { superuser: true });
    }

    if (!(await this.userExists(user))) {
      logger.log(`Creating system user ${user}...`);
      await runner.run('adduser', ['--system', `--home=${config.homeDir}`, '--group', user]);
    }

    if (!(await exists(path.join(config.baseCodeDir, 'odoo-bin')))) {
      logger.log(`Cloning Odoo ${config.odooBranch} into ${config.baseCodeDir}...`);
      await sources.clone(config.odooRepository, config.baseCodeDir, config.odooBranch);
      await runner.run('chown', ['-R', `${user}:${user}`, config.baseCodeDir]);
    }

    const baseVenv = path.join(config.homeDir, 'venv');
    if (!(await exists(path.join(baseVenv, 'bin', 'python')))) {
      logger.log('Creating Python virtual environment...');
      await runtime.createEnvironment({
        venvDir: baseVenv,
        user,
        requirementsFile: path.join(config.baseCodeDir, 'requirements.txt'),
      });
    }

    if (!(await runner.commandExists('wkhtmltopdf'))) {
      logger.log('Installing wkhtmltopdf...');
      await this.aptInstall(REPORT_PACKAGES);
    }

    await this.ensureInstanceTooling();
    logger.log('Host installation complete.');
  }
}
