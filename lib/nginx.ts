import { promises as fs } from 'fs';
import path from 'path';
import type { CommandRunner } from './exec';
import type { InstancePaths } from './registry';
import { isMissing } from './registry';

/**
 * nginx configuration as data. Sites are built as directive trees and only
 * turned into text by `renderDirectives`, which quotes every argument, so an
 * instance name or domain can never open a block or end a directive early.
 */
export type NginxNode =
  | { comment: string }
  | { name: string; args?: Array<string | number>; block?: NginxNode[] };

export interface TlsCertificate {
  certificate: string;
  certificateKey: string;
}

export interface ProxySite {
  paths: InstancePaths;
  domain: string;
  httpPort: number;
  geventPort: number;
  tls?: TlsCertificate;
}

export interface ProxyManager {
  /** Write the shared `$connection_upgrade` map once per host. */
  ensureUpgradeMap(): Promise<void>;
  writeSite(site: ProxySite): Promise<void>;
  enableSite(paths: InstancePaths): Promise<void>;
  /** Returns true when anything was deleted. */
  removeSite(paths: InstancePaths): Promise<boolean>;
  testConfig(): Promise<void>;
  reload(): Promise<void>;
}

const INDENT = '    ';

function renderArg(arg: string | number): string {
  const text = String(arg);
  if (/[\r\n]/.test(text)) {
    throw new Error(`nginx arguments must be a single line: ${JSON.stringify(text)}`);
  }
  if (/^[^\s;{}"'\\#]+$/.test(text)) return text;
  return `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function renderDirectives(nodes: NginxNode[], depth = 0): string {
  const pad = INDENT.repeat(depth);
  const lines: string[] = [];

  for (const node of nodes) {
    if ('comment' in node) {
      lines.push(`${pad}# ${node.comment}`);
      continue;
    }
    const head = [node.name, ...(node.args ?? []).map(renderArg)].join(' ');
    if (node.block) {
      lines.push(`${pad}${head} {`);
      lines.push(renderDirectives(node.block, depth + 1));
      lines.push(`${pad}}`);
    } else {
      lines.push(`${pad}${head};`);
    }
  }

  return lines.filter((line) => line.length > 0).join('\n');
}

const d = (name: string, ...args: Array<string | number>): NginxNode => ({ name, args });
const block = (name: string, args: Array<string | number>, children: NginxNode[]): NginxNode => ({ name, args, block: children });

function forwardedHeaders(hostVariable: string): NginxNode[] {
  return [
    d('proxy_set_header', 'X-Forwarded-Host', hostVariable),
    d('proxy_set_header', 'X-Forwarded-For', '$proxy_add_x_forwarded_for'),
    d('proxy_set_header', 'X-Forwarded-Proto', '$scheme'),
    d('proxy_set_header', 'X-Real-IP', '$remote_addr'),
  ];
}

const proxyTimeouts: NginxNode[] = [
  d('proxy_read_timeout', '720s'),
  d('proxy_connect_timeout', '720s'),
  d('proxy_send_timeout', '720s'),
];

const secureResponse: NginxNode[] = [
  d('add_header', 'Strict-Transport-Security', 'max-age=31536000; includeSubDomains'),
  d('proxy_cookie_flags', 'session_id', 'samesite=lax', 'secure'),
];

function websocketLocation(site: ProxySite, hostVariable: string, extra: NginxNode[]): NginxNode {
  return block('location', ['/websocket'], [
    d('proxy_pass', `http://${site.paths.chatUpstream}`),
    d('proxy_set_header', 'Upgrade', '$http_upgrade'),
    d('proxy_set_header', 'Connection', '$connection_upgrade'),
    ...forwardedHeaders(hostVariable),
    ...extra,
  ]);
}

export function buildUpgradeMap(): NginxNode[] {
  return [
    block('map', ['$http_upgrade', '$connection_upgrade'], [
      d('default', 'upgrade'),
      d("''", 'close'),
    ]),
  ];
}

export function buildSiteConfig(site: ProxySite): NginxNode[] {
  const { paths, domain, httpPort, geventPort, tls } = site;
  const upstreams: NginxNode[] = [
    { comment: `Odoo instance ${paths.name}` },
    block('upstream', [paths.upstream], [d('server', `127.0.0.1:${httpPort}`)]),
    block('upstream', [paths.chatUpstream], [d('server', `127.0.0.1:${geventPort}`)]),
  ];
  const logs = [d('access_log', paths.nginxAccessLog), d('error_log', paths.nginxErrorLog)];

  if (!tls) {
    return [
      ...upstreams,
      block('server', [], [
        d('listen', 80),
        d('server_name', domain),
        ...logs,
        ...proxyTimeouts,
        ...forwardedHeaders('$host'),
        d('proxy_redirect', 'off'),
        block('location', ['/'], [d('proxy_pass', `http://${paths.upstream}`)]),
        websocketLocation(site, '$host', []),
        block('location', ['~*', '/web/static/'], [
          d('proxy_cache_valid', 200, '90m'),
          d('proxy_buffering', 'on'),
          d('expires', 864000),
          d('proxy_pass', `http://${paths.upstream}`),
        ]),
      ]),
    ];
  }

  return [
    ...upstreams,
    { comment: 'http -> https' },
    block('server', [], [
      d('listen', 80),
      d('server_name', domain),
      d('rewrite', '^(.*)', 'https://$host$1', 'permanent'),
    ]),
    block('server', [], [
      d('listen', 443, 'ssl'),
      d('server_name', domain),
      ...proxyTimeouts,
      d('ssl_certificate', tls.certificate),
      d('ssl_certificate_key', tls.certificateKey),
      d('ssl_session_timeout', '30m'),
      d('ssl_protocols', 'TLSv1.2', 'TLSv1.3'),
      d('ssl_ciphers', 'HIGH:!aNULL:!MD5'),
      d('ssl_prefer_server_ciphers', 'off'),
      ...logs,
      websocketLocation(site, '$http_host', secureResponse),
      block('location', ['/'], [
        ...forwardedHeaders('$http_host'),
        d('proxy_redirect', 'off'),
        d('proxy_pass', `http://${paths.upstream}`),
        ...secureResponse,
      ]),
      d('gzip_types', 'text/css', 'text/scss', 'text/plain', 'text/xml', 'application/xml', 'application/json', 'application/javascript'),
      d('gzip', 'on'),
    ]),
  ];
}

export function renderSite(site: ProxySite): string {
  return renderDirectives(buildSiteConfig(site)) + '\n';
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch (error) {
    if (isMissing(error)) return false;
    throw error;
  }
}

export class NginxManager implements ProxyManager {
  constructor(
    private runner: CommandRunner,
    private upgradeMapFile: string
  ) {}

  async ensureUpgradeMap(): Promise<void> {
    if (await pathExists(this.upgradeMapFile)) return;
    await fs.mkdir(path.dirname(this.upgradeMapFile), { recursive: true });
    await fs.writeFile(this.upgradeMapFile, renderDirectives(buildUpgradeMap()) + '\n', { mode: 0o644 });
  }

  async writeSite(site: ProxySite): Promise<void> {
    await fs.mkdir(path.dirname(site.paths.nginxAvailable), { recursive: true });
    await fs.writeFile(site.paths.nginxAvailable, renderSite(site), { mode: 0o644 });
  }

  async enableSite(paths: InstancePaths): Promise<void> {
    if (await pathExists(paths.nginxEnabled)) return;
    await fs.mkdir(path.dirname(paths.nginxEnabled), { recursive: true });
    await fs.symlink(paths.nginxAvailable, paths.nginxEnabled);
  }

  async removeSite(paths: InstancePaths): Promise<boolean> {
    let removed = false;
    for (const file of [paths.nginxEnabled, paths.nginxAvailable]) {
      if (await pathExists(file)) {
        await fs.rm(file, { force: true });
        removed = true;
      }
    }
    return removed;
  }

  async testConfig(): Promise<void> {
    await this.runner.run('nginx', ['-t']);
  }

  async reload(): Promise<void> {
    await this.runner.run('systemctl', ['reload', 'nginx']);
  }
}
