import type { ConnectionInfo } from '../../entities/device-identity.js';

export interface GeneratedCredentials {
  readonly privateKey: string;
  readonly certificate: string;
}

/** Produces a fresh key pair and self-signed certificate for a device id. */
export interface CertificateGeneratorPort {
  generate(deviceId: string): Promise<GeneratedCredentials>;
}

export interface RootCaSourcePort {
  fetchRootCa(): Promise<string>;
}

/** Raw per-device PEM files. `null` members mean the file is absent. */
export interface StoredCredentials {
  readonly privateKey: string | null;
  readonly certificate: string | null;
}

export interface CredentialFilesPort {
  readCredentials(deviceId: string): Promise<StoredCredentials>;
  writeCredentials(deviceId: string, credentials: GeneratedCredentials): Promise<void>;
  readRootCa(): Promise<string | null>;
  writeRootCa(pem: string): Promise<void>;
}

export interface ConnectionInfoCachePort {
  /** Returns the cached info for `deviceId`, or null when absent, stale or unreadable. */
  load(deviceId: string): Promise<ConnectionInfo | null>;
  save(info: ConnectionInfo): Promise<void>;
  clear(deviceId: string): Promise<void>;
}
