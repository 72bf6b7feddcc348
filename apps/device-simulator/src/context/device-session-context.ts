import type {
  CertificateBundle,
  ConnectionInfo,
  ConnectionInfoCachePort,
  DeviceIdentity,
} from '@cellsim/domain';

/**
 * Everything a session needs to know about the device, passed explicitly
 * instead of being read from ambient files.
 */
export class DeviceSessionContext {
  private info: ConnectionInfo | null = null;

  constructor(
    readonly identity: DeviceIdentity,
    readonly bundle: CertificateBundle,
    private readonly cache: ConnectionInfoCachePort,
  ) {}

  get deviceId(): string {
    return this.identity.deviceId;
  }

  get connectionInfo(): ConnectionInfo | null {
    return this.info;
  }

  /** Adopt the cached info if it exists and belongs to this device. */
  async loadConnectionInfo(): Promise<ConnectionInfo | null> {
    const cached = await this.cache.load(this.deviceId);
    this.info = cached && cached.deviceId === this.deviceId ? cached : null;
    return this.info;
  }

  async saveConnectionInfo(info: ConnectionInfo): Promise<void> {
    this.info = info;
    await this.cache.save(info);
  }

  /** Forget routing after an identity conflict so the next attempt re-registers. */
  async invalidateConnectionInfo(): Promise<void> {
    this.info = null;
    await this.cache.clear(this.deviceId);
  }
}
