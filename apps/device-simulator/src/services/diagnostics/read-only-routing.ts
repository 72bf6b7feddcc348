import type { CloudDirectoryPort, ConnectionInfo, ConnectionInfoCachePort } from '@cellsim/domain';
import type { DeviceSessionContext } from '../../context/device-session-context.js';
import type { ConnectionInfoResolver } from '../session/session-manager.js';

/**
 * Routing for diagnostics: the cache if it has an entry, otherwise the
 * account and device shadow. Never onboards the device.
 */
export class ReadOnlyConnectionResolver implements ConnectionInfoResolver {
  constructor(private readonly directory: Pick<CloudDirectoryPort, 'lookup'>) {}

  async resolve(context: DeviceSessionContext): Promise<ConnectionInfo> {
    const cached = context.connectionInfo ?? (await context.loadConnectionInfo());
    if (cached) return cached;
    console.log('[diag] no cached connection info, reading it from the account and device shadow');
    return this.directory.lookup(context.deviceId);
  }
}

/** Reads through to the real cache; writes and clears leave it as it was. */
export class ReadOnlyConnectionCache implements ConnectionInfoCachePort {
  constructor(private readonly inner: ConnectionInfoCachePort) {}

  load(deviceId: string): Promise<ConnectionInfo | null> {
    return this.inner.load(deviceId);
  }

  async save(info: ConnectionInfo): Promise<void> {
    console.log(`[diag] not caching connection info for ${info.deviceId}`);
  }

  async clear(deviceId: string): Promise<void> {
    console.log(`[diag] keeping cached connection info for ${deviceId}`);
  }
}
