import type { CreatedInstance, InstanceStatus, RemovalReport } from './lifecycle';

const RULE = '-----------------------------------------------------------';

/** Operator-facing summary printed after a successful create. */
export function formatCreatedInstance(instance: CreatedInstance): string {
  const { paths, serviceName } = instance;
  const lines = [
    RULE,
    `Odoo instance '${instance.name}' has been created successfully!`,
    RULE,
    'Service information:',
    `  Service name: ${serviceName}`,
    `  Configuration file: ${paths.configFile}`,
    `  Log file: ${paths.logFile}`,
    `  HTTP port: ${instance.httpPort}`,
    `  Gevent port: ${instance.geventPort}`,
    '',
    `Custom addons folder: ${paths.customAddonsDir}`,
  ];
  if (instance.enterprise) {
    lines.push(`Enterprise addons folder: ${paths.enterpriseAddonsDir}`);
  }
  lines.push(
    '',
    'Database information:',
    `  Database user: ${instance.dbUser}`,
    `  Database password: ${instance.dbPassword}`,
    '',
    'Superadmin information:',
    `  Superadmin password: ${instance.adminPassword}`,
    '',
    'Manage the Odoo service with the following commands:',
    `  Start:   sudo systemctl start ${serviceName}`,
    `  Stop:    sudo systemctl stop ${serviceName}`,
    `  Restart: sudo systemctl restart ${serviceName}`,
    '',
    `Nginx configuration file: ${paths.nginxAvailable}`,
    `Access URL: ${instance.url}`,
    RULE
  );
  return lines.join('\n');
}

export function formatInstanceList(names: string[]): string {
  if (names.length === 0) return 'No existing Odoo instances found.';
  return ['Available Odoo instances:', ...names.map((name, i) => `${i}) ${name}`)].join('\n');
}

export function formatStatus(status: InstanceStatus): string {
  const { unit, ports, record } = status;
  const lines = [
    `Instance: ${status.name}`,
    `  Service: ${unit.unit} (${unit.loaded ? unit.active : 'not loaded'}${unit.enabled ? ', enabled' : ''})`,
  ];
  if (unit.mainPid) lines.push(`  Main PID: ${unit.mainPid}`);
  if (ports) lines.push(`  Ports: http ${ports.httpPort}, gevent ${ports.geventPort}`);
  if (record) {
    lines.push(`  Domain: ${record.domain}${record.ssl_enabled ? ' (SSL)' : ''}`);
    lines.push(`  Enterprise: ${record.has_enterprise ? 'yes' : 'no'}`);
  }
  lines.push(`  Configuration file: ${status.paths.configFile}`);
  return lines.join('\n');
}

export function formatRemovalReport(report: RemovalReport): string {
  const lines = [RULE, `Instance '${report.name}' has been successfully deleted!`, RULE];
  if (report.droppedDatabases.length > 0) {
    lines.splice(1, 0, `Dropped databases: ${report.droppedDatabases.join(', ')}`);
  }
  return lines.join('\n');
}
