import path from 'path';
import type { CommandRunner } from './exec';
import type { TlsCertificate } from './nginx';

export interface CertificateIssuer {
  /** Obtain (or reuse) a certificate for `domain` and return its file paths. */
  issue(domain: string, email: string): Promise<TlsCertificate>;
}

export class CertbotIssuer implements CertificateIssuer {
  constructor(private runner: CommandRunner, private liveDir: string) {}

  async issue(domain: string, email: string): Promise<TlsCertificate> {
    await this.runner.run('certbot', [
      'certonly',
      '--nginx',
      '-d', domain,
      '--non-interactive',
      '--agree-tos',
      '--email', email,
    ]);

    return {
      certificate: path.join(this.liveDir, domain, 'fullchain.pem'),
      certificateKey: path.join(this.liveDir, domain, 'privkey.pem'),
    };
  }
}
