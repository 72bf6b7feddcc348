import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import {
  ProvisioningError,
  errorCode,
  errorMessage,
  type CredentialFilesPort,
  type GeneratedCredentials,
  type StoredCredentials,
} from '@cellsim/domain';

export const ROOT_CA_FILENAME = 'AmazonRootCA1.pem';

/** Secrets are owner read/write only. */
const SECRET_MODE = 0o600;

/**
 * Per-device PEM files under one directory:
 * `<id>.key.pem`, `<id>.cert.pem` and the shared root CA.
 */
export class FileCredentialStore implements CredentialFilesPort {
  constructor(private readonly certsDir: string) {}

  keyPath(deviceId: string): string {
    return path.join(this.certsDir, `${deviceId}.key.pem`);
  }

  certPath(deviceId: string): string {
    return path.join(this.certsDir, `${deviceId}.cert.pem`);
  }

  rootCaPath(): string {
    return path.join(this.certsDir, ROOT_CA_FILENAME);
  }

  async readCredentials(deviceId: string): Promise<StoredCredentials> {
    const [privateKey, certificate] = await Promise.all([
      readOptional(this.keyPath(deviceId)),
      readOptional(this.certPath(deviceId)),
    ]);
    return { privateKey, certificate };
  }

  async writeCredentials(deviceId: string, credentials: GeneratedCredentials): Promise<void> {
    await this.ensureDir();
    await writeFile(this.keyPath(deviceId), credentials.privateKey, { mode: SECRET_MODE });
    await writeFile(this.certPath(deviceId), credentials.certificate, { mode: SECRET_MODE });
    console.log(`[certs] key:  ${this.keyPath(deviceId)}`);
    console.log(`[certs] cert: ${this.certPath(deviceId)}`);
  }

  async readRootCa(): Promise<string | null> {
    return readOptional(this.rootCaPath());
  }

  async writeRootCa(pem: string): Promise<void> {
    await this.ensureDir();
    await writeFile(this.rootCaPath(), pem, { mode: 0o644 });
    console.log(`[certs] saved ${this.rootCaPath()}`);
  }

  private async ensureDir(): Promise<void> {
    await mkdir(this.certsDir, { recursive: true, mode: 0o700 });
  }
}

async function readOptional(file: string): Promise<string | null> {
  try {
    return await readFile(file, 'utf8');
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return null;
    throw new ProvisioningError(`cannot read ${file}: ${errorMessage(err)}`, 'Check the certs directory permissions.', {
      cause: err,
    });
  }
}
