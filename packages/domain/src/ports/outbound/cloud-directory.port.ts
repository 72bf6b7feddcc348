import type { AccountInfo, ConnectionInfo, DeviceStatus } from '../../entities/device-identity.js';

/**
 * Device-management REST endpoint. Implementations throw `DirectoryError`
 * on timeout or non-2xx and never retry.
 */
export interface CloudDirectoryPort {
  /** Idempotent upsert; an already-registered device is not an error. */
  register(deviceId: string, certificatePem: string): Promise<ConnectionInfo>;
  /** Routing for an already onboarded device: GETs only, nothing is created. */
  lookup(deviceId: string): Promise<ConnectionInfo>;
  fetchStatus(deviceId: string): Promise<DeviceStatus>;
  getAccount(): Promise<AccountInfo>;
}
