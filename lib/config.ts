import path from 'path';

export interface ResourceLimits {
  limitMemoryHard: number;
  limitMemorySoft: number;
  limitRequest: number;
  limitTimeCpu: number;
  limitTimeReal: number;
  maxCronThreads: number;
  workers: number;
}

export interface HostConfig {
  /** OS user (and group) that owns instance files and runs the services. */
  serviceUser: string;
  homeDir: string;
  /** Checkout of the Odoo source shared by every instance. */
  baseCodeDir: string;
  instancesDir: string;
  configDir: string;
  systemdDir: string;
  logDir: string;
  nginxAvailableDir: string;
  nginxEnabledDir: string;
  nginxConfDir: string;
  nginxLogDir: string;
  letsencryptLiveDir: string;
  baseHttpPort: number;
  baseGeventPort: number;
  portProbeHost: string;
  pythonVersion: string;
  odooRepository: string;
  odooBranch: string;
  enterpriseRepository: string;
  dbHost: string;
  dbPath: string;
  controlPort: number;
  commandTimeoutMs: number;
  limits: ResourceLimits;
}

export const DEFAULT_LIMITS: ResourceLimits = {
  limitMemoryHard: 2677721600,
  limitMemorySoft: 1829145600,
  limitRequest: 8192,
  limitTimeCpu: 600,
  limitTimeReal: 1200,
  maxCronThreads: 1,
  workers: 2,
};

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${key} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function readPort(env: Env, key: string, fallback: number): number {
  const value = readInt(env, key, fallback);
  if (value < 1 || value > 65535) {
    throw new Error(`${key} must be between 1 and 65535, got ${value}`);
  }
  return value;
}

/**
 * Resolve the host layout from environment variables. Entry points load
 * `.env` through dotenv before calling this.
 */
export function loadConfig(env: Env = process.env): HostConfig {
  const serviceUser = env.ODOO_USER || 'odoo';
  const homeDir = env.ODOO_HOME || '/odoo';

  return {
    serviceUser,
    homeDir,
    baseCodeDir: env.ODOO_BASE_CODE || homeDir,
    instancesDir: env.INSTANCES_DIR || path.join(homeDir, 'instances'),
    configDir: env.CONFIG_DIR || '/etc',
    systemdDir: env.SYSTEMD_DIR || '/etc/systemd/system',
    logDir: env.LOG_DIR || path.join('/var/log', serviceUser),
    nginxAvailableDir: env.NGINX_AVAILABLE_DIR || '/etc/nginx/sites-available',
    nginxEnabledDir: env.NGINX_ENABLED_DIR || '/etc/nginx/sites-enabled',
    nginxConfDir: env.NGINX_CONF_DIR || '/etc/nginx/conf.d',
    nginxLogDir: env.NGINX_LOG_DIR || '/var/log/nginx',
    letsencryptLiveDir: env.LETSENCRYPT_LIVE_DIR || '/etc/letsencrypt/live',
    baseHttpPort: readPort(env, 'BASE_HTTP_PORT', 8069),
    baseGeventPort: readPort(env, 'BASE_GEVENT_PORT', 8072),
    portProbeHost: env.PORT_PROBE_HOST || '0.0.0.0',
    pythonVersion: env.PYTHON_VERSION || '3.11',
    odooRepository: env.ODOO_REPO || 'https://www.github.com/odoo/odoo',
    odooBranch: env.ODOO_BRANCH || '18.0',
    enterpriseRepository: env.ENTERPRISE_REPO || 'https://www.github.com/odoo/enterprise',
    dbHost: env.ODOO_DB_HOST || 'localhost',
    dbPath: env.DB_PATH || '/var/lib/odoo-host/data.db',
    controlPort: readPort(env, 'PORT', 3000),
    commandTimeoutMs: readInt(env, 'COMMAND_TIMEOUT_MS', 30 * 60 * 1000),
    limits: {
      limitMemoryHard: readInt(env, 'LIMIT_MEMORY_HARD', DEFAULT_LIMITS.limitMemoryHard),
      limitMemorySoft: readInt(env, 'LIMIT_MEMORY_SOFT', DEFAULT_LIMITS.limitMemorySoft),
      limitRequest: readInt(env, 'LIMIT_REQUEST', DEFAULT_LIMITS.limitRequest),
      limitTimeCpu: readInt(env, 'LIMIT_TIME_CPU', DEFAULT_LIMITS.limitTimeCpu),
      limitTimeReal: readInt(env, 'LIMIT_TIME_REAL', DEFAULT_LIMITS.limitTimeReal),
      maxCronThreads: readInt(env, 'MAX_CRON_THREADS', DEFAULT_LIMITS.maxCronThreads),
      workers: readInt(env, 'WORKERS', DEFAULT_LIMITS.workers),
    },
  };
}
