import net from 'net';
import { PortExhaustedError } from './errors';

export const MAX_PORT = 65535;

export interface PortProbe {
  isInUse(port: number): Promise<boolean>;
}

/**
 * Probes by binding a throwaway server. A bind that succeeds is closed
 * immediately, so the port is only known to be free at the instant of the
 * probe: two concurrent creates can pick the same port.
 */
export class BindPortProbe implements PortProbe {
  constructor(private host = '0.0.0.0') {}

  isInUse(port: number): Promise<boolean> {
    return new Promise((resolve, reject) => {
      const server = net.createServer();
      server.unref();

      server.once('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE' || error.code === 'EACCES') {
          resolve(true);
        } else {
          reject(error);
        }
      });

      server.listen({ port, host: this.host, exclusive: true }, () => {
        server.close(() => resolve(false));
      });
    });
  }
}

export interface FindPortOptions {
  /** Ports to skip even when nothing listens on them. */
  exclude?: Iterable<number>;
  max?: number;
}

export async function findFreePort(probe: PortProbe, base: number, options: FindPortOptions = {}): Promise<number> {
  const max = Math.min(options.max ?? MAX_PORT, MAX_PORT);
  const exclude = new Set(options.exclude ?? []);

  if (!Number.isInteger(base) || base < 1) {
    throw new RangeError(`Base port must be a positive integer, got ${base}`);
  }

  for (let port = base; port <= max; port++) {
    if (exclude.has(port)) continue;
    if (!(await probe.isInUse(port))) return port;
  }

  throw new PortExhaustedError(base, max);
}
