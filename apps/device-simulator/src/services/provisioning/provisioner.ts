import {
  DirectoryError,
  errorMessage,
  type CloudDirectoryPort,
  type ConnectionInfo,
  type ConnectionInfoCachePort,
  type DeviceIdentity,
} from '@cellsim/domain';
import { DeviceSessionContext } from '../../context/device-session-context.js';
import type { CertificateStore } from '../certificates/certificate-store.js';

export interface ProvisionerOptions {
  registrationAttempts?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/** The part of CertificateStore provisioning relies on. */
export type BundleSource = Pick<CertificateStore, 'ensureBundle' | 'loadOrNone'>;

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Resolves device identity into a ready-to-connect context: credentials
 * from the certificate store, routing from the cache or a fresh
 * registration.
 */
export class Provisioner {
  private readonly attempts: number;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly certificates: BundleSource,
    private readonly directory: CloudDirectoryPort,
    private readonly cache: ConnectionInfoCachePort,
    opts: ProvisionerOptions = {},
  ) {
    this.attempts = opts.registrationAttempts ?? 3;
    this.retryDelayMs = opts.retryDelayMs ?? 2_000;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  async prepare(identity: DeviceIdentity): Promise<DeviceSessionContext> {
    console.log(`[provision] setting up device ${identity.deviceId}`);
    const bundle = await this.certificates.ensureBundle(identity.deviceId);
    const context = new DeviceSessionContext(identity, bundle, this.cache);
    await this.resolve(context);
    return context;
  }

  /** Credentials only; for diagnostics, which must not generate anything. */
  async loadExisting(identity: DeviceIdentity): Promise<DeviceSessionContext | null> {
    const bundle = await this.certificates.loadOrNone(identity.deviceId);
    if (!bundle) return null;
    const context = new DeviceSessionContext(identity, bundle, this.cache);
    await context.loadConnectionInfo();
    return context;
  }

  /** Cached connection info, or a (retried) registration when there is none. */
  async resolve(context: DeviceSessionContext): Promise<ConnectionInfo> {
    const cached = context.connectionInfo ?? (await context.loadConnectionInfo());
    if (cached) return cached;

    const info = await this.registerWithRetry(context);
    await context.saveConnectionInfo(info);
    console.log(`[provision] broker ${info.brokerHost}:${info.brokerPort}`);
    console.log(`[provision] d2c ${info.topics.d2c}`);
    console.log(`[provision] c2d ${info.topics.c2d}`);
    return info;
  }

  private async registerWithRetry(context: DeviceSessionContext): Promise<ConnectionInfo> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      try {
        console.log(`[provision] registering ${context.deviceId} (attempt ${attempt}/${this.attempts})`);
        return await this.directory.register(context.deviceId, context.bundle.certificate);
      } catch (err) {
        if (!(err instanceof DirectoryError)) throw err;
        lastError = err;
        console.warn(`[provision] registration failed: ${errorMessage(err)}`);
        if (attempt < this.attempts) await this.sleep(this.retryDelayMs);
      }
    }
    throw lastError;
  }
}
