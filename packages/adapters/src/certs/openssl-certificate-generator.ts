import { spawnSync } from 'node:child_process';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import {
  ProvisioningError,
  errorCode,
  type CertificateGeneratorPort,
  type GeneratedCredentials,
} from '@cellsim/domain';

const OPENSSL_HINT =
  'Install OpenSSL and make sure `openssl` is on PATH (e.g. `apt install openssl` or `winget install ShiningLight.OpenSSL`).';

interface OpensslResult {
  code: number;
  out: string;
  err: string;
  missing: boolean;
}

export interface OpensslCertificateGeneratorOptions {
  /** openssl executable, default `openssl` */
  binary?: string;
  validityDays?: number;
}

/**
 * P-256 key + self-signed X.509 certificate with `CN=<deviceId>`, produced
 * by the openssl CLI in a throwaway directory.
 */
export class OpensslCertificateGenerator implements CertificateGeneratorPort {
  private readonly binary: string;
  private readonly validityDays: number;

  constructor(opts: OpensslCertificateGeneratorOptions = {}) {
    this.binary = opts.binary ?? 'openssl';
    this.validityDays = opts.validityDays ?? 3650;
  }

  async generate(deviceId: string): Promise<GeneratedCredentials> {
    const tmp = await mkdtemp(path.join(tmpdir(), 'cellsim-cert-'));
    const keyPath = path.join(tmp, 'device.key.pem');
    const certPath = path.join(tmp, 'device.cert.pem');
    try {
      this.run(['ecparam', '-genkey', '-name', 'prime256v1', '-noout', '-out', keyPath], 'key generation');
      this.run(
        [
          'req', '-new', '-x509',
          '-key', keyPath,
          '-out', certPath,
          '-days', String(this.validityDays),
          '-subj', `/CN=${deviceId}`,
        ],
        'certificate signing',
      );
      const [privateKey, certificate] = await Promise.all([
        readFile(keyPath, 'utf8'),
        readFile(certPath, 'utf8'),
      ]);
      return { privateKey, certificate };
    } finally {
      await rm(tmp, { recursive: true, force: true });
    }
  }

  private run(args: string[], step: string): void {
    const r = this.openssl(args);
    if (r.missing) {
      throw new ProvisioningError(`openssl not found (${this.binary})`, OPENSSL_HINT);
    }
    if (r.code !== 0) {
      throw new ProvisioningError(`openssl ${step} failed: ${(r.err || r.out).trim()}`, OPENSSL_HINT);
    }
  }

  private openssl(args: string[]): OpensslResult {
    const res = spawnSync(this.binary, args, { encoding: 'utf8' });
    const missing = errorCode(res.error) === 'ENOENT';
    return { code: res.status ?? 1, out: res.stdout ?? '', err: res.stderr ?? '', missing };
  }
}
