import type { ResourceLimits } from './config';

export interface OdooConfig {
  adminPassword: string;
  dbHost: string;
  dbUser: string;
  dbPassword: string;
  addonsPaths: string[];
  httpPort: number;
  geventPort: number;
  logFile: string;
  limits: ResourceLimits;
  /** Adds proxy_mode and a host-based dbfilter for TLS-terminated instances. */
  proxyMode: boolean;
}

type OptionValue = string | number | boolean;

function formatValue(key: string, value: OptionValue): string {
  const text = typeof value === 'boolean' ? (value ? 'True' : 'False') : String(value);
  if (/[\r\n]/.test(text)) {
    throw new Error(`Config value for ${key} must be a single line`);
  }
  return text;
}

/** Render the `[options]` file odoo-bin reads with `-c`. */
export function renderOdooConfig(config: OdooConfig): string {
  const { limits } = config;
  const options: Array<[string, OptionValue]> = [
    ['admin_passwd', config.adminPassword],
    ['db_host', config.dbHost],
    ['db_user', config.dbUser],
    ['db_password', config.dbPassword],
    ['addons_path', config.addonsPaths.join(',')],
    ['http_port', config.httpPort],
    ['gevent_port', config.geventPort],
    ['logfile', config.logFile],
    ['limit_memory_hard', limits.limitMemoryHard],
    ['limit_memory_soft', limits.limitMemorySoft],
    ['limit_request', limits.limitRequest],
    ['limit_time_cpu', limits.limitTimeCpu],
    ['limit_time_real', limits.limitTimeReal],
    ['max_cron_threads', limits.maxCronThreads],
    ['workers', limits.workers],
  ];

  if (config.proxyMode) {
    options.push(['proxy_mode', true]);
    options.push(['dbfilter', '^%h$']);
  }

  const lines = ['[options]', ...options.map(([key, value]) => `${key} = ${formatValue(key, value)}`)];
  return lines.join('\n') + '\n';
}

/** Read the `[options]` section back into a flat key/value map. */
export function parseOdooConfig(content: string): Record<string, string> {
  const options: Record<string, string> = {};
  let section = '';

  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (!line || line.startsWith(';') || line.startsWith('#')) continue;

    const header = line.match(/^\[(.+)\]$/);
    if (header) {
      section = header[1];
      continue;
    }

    if (section !== 'options') continue;
    const eq = line.indexOf('=');
    if (eq === -1) continue;
    options[line.slice(0, eq).trim()] = line.slice(eq + 1).trim();
  }

  return options;
}
