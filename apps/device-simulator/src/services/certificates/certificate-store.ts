import { X509Certificate, createPrivateKey } from 'node:crypto';
import {
  ProvisioningError,
  errorMessage,
  type CertificateBundle,
  type CertificateGeneratorPort,
  type CredentialFilesPort,
  type RootCaSourcePort,
} from '@cellsim/domain';

/**
 * Owns the device key pair, its self-signed certificate and the broker root
 * CA. Callers compose `loadOrNone` and `createAndPersist`; `ensureBundle`
 * does exactly that.
 */
export class CertificateStore {
  constructor(
    private readonly files: CredentialFilesPort,
    private readonly generator: CertificateGeneratorPort,
    private readonly rootCaSource: RootCaSourcePort,
  ) {}

  /** Cached bundle for `deviceId`, or null when nothing is cached yet. */
  async loadOrNone(deviceId: string): Promise<CertificateBundle | null> {
    const { privateKey, certificate } = await this.files.readCredentials(deviceId);
    if (privateKey === null && certificate === null) return null;

    const hint = `Delete the ${deviceId}.key.pem / ${deviceId}.cert.pem files in the certs directory to regenerate.`;
    if (privateKey === null || certificate === null) {
      throw new ProvisioningError(`credential cache for ${deviceId} is incomplete`, hint);
    }
    validatePair(deviceId, privateKey, certificate, hint);

    const rootCa = await this.ensureRootCa();
    return { privateKey, certificate, rootCa };
  }

  async createAndPersist(deviceId: string): Promise<CertificateBundle> {
    console.log(`[certs] generating key pair and self-signed certificate for ${deviceId}`);
    const rootCa = await this.ensureRootCa();
    const generated = await this.generator.generate(deviceId);
    await this.files.writeCredentials(deviceId, generated);
    return { ...generated, rootCa };
  }

  async ensureBundle(deviceId: string): Promise<CertificateBundle> {
    const cached = await this.loadOrNone(deviceId);
    if (cached) {
      console.log('[certs] device certificates already exist, reusing');
      return cached;
    }
    return this.createAndPersist(deviceId);
  }

  private async ensureRootCa(): Promise<string> {
    const cached = await this.files.readRootCa();
    if (cached !== null) return cached;
    console.log('[certs] downloading root CA');
    const pem = await this.rootCaSource.fetchRootCa();
    await this.files.writeRootCa(pem);
    return pem;
  }
}

function validatePair(deviceId: string, privateKey: string, certificate: string, hint: string): void {
  let cert: X509Certificate;
  try {
    createPrivateKey(privateKey);
    cert = new X509Certificate(certificate);
  } catch (err) {
    throw new ProvisioningError(`credential cache for ${deviceId} is corrupt: ${errorMessage(err)}`, hint, {
      cause: err,
    });
  }
  const cn = /(?:^|\n)CN=([^\n]*)/.exec(cert.subject)?.[1];
  if (cn !== deviceId) {
    throw new ProvisioningError(`cached certificate is for ${cn ?? 'an unknown subject'}, not ${deviceId}`, hint);
  }
  if (!cert.checkPrivateKey(createPrivateKey(privateKey))) {
    throw new ProvisioningError(`cached key and certificate for ${deviceId} do not match`, hint);
  }
}
