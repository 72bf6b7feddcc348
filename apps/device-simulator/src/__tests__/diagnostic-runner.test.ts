/**
 * DiagnosticRunner ordering: each probe runs only if the previous passed.
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import {
  DiagnosticStepError,
  DirectoryError,
  type AccountInfo,
  type CertificateBundle,
  type CloudDirectoryPort,
  type ConnectionInfo,
  type DeviceStatus,
} from '@cellsim/domain';
import type { DeviceSessionContext } from '../context/device-session-context.js';
import { DiagnosticRunner } from '../services/diagnostics/diagnostic-runner.js';
import { ReadOnlyConnectionCache, ReadOnlyConnectionResolver } from '../services/diagnostics/read-only-routing.js';
import { Provisioner } from '../services/provisioning/provisioner.js';
import { SessionManager } from '../services/session/session-manager.js';
import {
  BUNDLE,
  DEVICE_ID,
  FakeLink,
  FakeTransport,
  MemoryConnectionCache,
  connectionInfo,
  sessionContext,
} from './helpers/fakes.js';

const STATUS: DeviceStatus = { id: DEVICE_ID, connected: false, state: { reported: {} }, tags: ['sim'] };

let transport: FakeTransport;
let fetchStatus: jest.Mock<(deviceId: string) => Promise<DeviceStatus>>;
let loadContext: jest.Mock<() => Promise<DeviceSessionContext | null>>;
let resolve: jest.Mock<(context: DeviceSessionContext) => Promise<ConnectionInfo>>;
let sessions: SessionManager[];
/** runs once per observed second; lets a test drop the link mid-window */
let onTick: (second: number) => void;

function runner(): DiagnosticRunner {
  let second = 0;
  return new DiagnosticRunner(
    {
      deviceId: DEVICE_ID,
      directory: { fetchStatus },
      loadContext,
      resolver: { resolve },
      createSession: (context) => {
        const s = new SessionManager(transport, context, { resolve }, {
          autoReconnect: false,
          backoff: { baseMs: 1, capMs: 1, maxAttempts: 1 },
          sleep: async () => undefined,
        });
        sessions.push(s);
        return s;
      },
    },
    {
      sleep: async () => {
        second++;
        onTick(second);
      },
    },
  );
}

beforeEach(() => {
  transport = new FakeTransport();
  fetchStatus = jest.fn<(deviceId: string) => Promise<DeviceStatus>>(async () => STATUS);
  loadContext = jest.fn<() => Promise<DeviceSessionContext | null>>(async () =>
    sessionContext(new MemoryConnectionCache(connectionInfo())),
  );
  resolve = jest.fn<(context: DeviceSessionContext) => Promise<ConnectionInfo>>(async () => connectionInfo());
  sessions = [];
  onTick = () => undefined;
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('DiagnosticRunner', () => {
  it('passes all three steps in order and closes the session', async () => {
    const report = await runner().run();

    expect(report.ok).toBe(true);
    expect(report.rootCause).toBeNull();
    expect(report.steps.map((s) => [s.step, s.ok])).toEqual([
      ['rest-status', true],
      ['transport', true],
      ['subscribe', true],
    ]);
    expect(report.steps[1]?.detail).toBe('connection held for 10s');
    expect(report.steps[2]?.detail).toBe(`subscribed to prod/team-1/m/d/${DEVICE_ID}/+/r`);
    expect(transport.lastLink.subscriptions).toEqual([`prod/team-1/m/d/${DEVICE_ID}/+/r`]);
    expect(transport.lastLink.ended).toBe(true);
    expect(sessions[0]?.state).toBe('disconnected');
  });

  it('never opens the transport when the REST status check fails', async () => {
    fetchStatus.mockRejectedValueOnce(new DirectoryError('HTTP 404: device not found', 404, '{}'));

    const report = await runner().run();

    expect(report.ok).toBe(false);
    expect(report.steps).toHaveLength(1);
    expect(report.rootCause).toBeInstanceOf(DiagnosticStepError);
    expect(report.rootCause).toMatchObject({ step: 'rest-status', message: 'HTTP 404: device not found' });
    expect(loadContext).not.toHaveBeenCalled();
    expect(transport.opens).toEqual([]);
  });

  it('fails the transport step when no credentials are stored', async () => {
    loadContext.mockResolvedValueOnce(null);

    const report = await runner().run();

    expect(report.rootCause).toMatchObject({
      step: 'transport',
      message: 'no stored credentials; run once without --diag to provision',
    });
    expect(transport.opens).toEqual([]);
  });

  it('fails the transport step when the broker refuses the connection', async () => {
    transport.queue({ reason: 'not_authorized', code: 135 });

    const report = await runner().run();

    expect(report.steps.map((s) => s.step)).toEqual(['rest-status', 'transport']);
    expect(report.rootCause?.step).toBe('transport');
    expect(transport.opens).toHaveLength(1);
  });

  it('detects a connection dropped during the observation window and skips subscribe', async () => {
    const link = new FakeLink();
    transport.queue(link);
    onTick = (second) => {
      if (second === 4) link.drop({ reason: 'not_authorized', code: 135 });
    };

    const report = await runner().run();

    expect(report.rootCause?.step).toBe('transport');
    expect(report.rootCause?.message).toBe(
      'connection dropped after 4s without subscribing or publishing; check the certificate and IoT policy',
    );
    expect(link.subscriptions).toEqual([]);
    expect(sessions[0]?.state).toBe('disconnected');
  });

  it('fails the subscribe step when the broker drops the link after subscribing', async () => {
    const link = new FakeLink();
    transport.queue(link);
    onTick = (second) => {
      if (second === 11) link.drop({ reason: 'not_authorized', code: 135 });
    };

    const report = await runner().run();

    expect(report.steps.map((s) => [s.step, s.ok])).toEqual([
      ['rest-status', true],
      ['transport', true],
      ['subscribe', false],
    ]);
    expect(report.rootCause?.message).toBe(
      'connection dropped after subscribing; the device is not authorised for its c2d topic',
    );
  });

  it('fails the subscribe step when the subscription is refused', async () => {
    const link = new FakeLink();
    link.subscribeFailure = new Error('subscription rejected (reason 0x87)');
    transport.queue(link);

    const report = await runner().run();

    expect(report.rootCause).toMatchObject({ step: 'subscribe', message: 'subscription rejected (reason 0x87)' });
  });
});

describe('DiagnosticRunner with read-only routing', () => {
  let register: jest.Mock<(deviceId: string, certificatePem: string) => Promise<ConnectionInfo>>;
  let lookup: jest.Mock<(deviceId: string) => Promise<ConnectionInfo>>;
  let cache: MemoryConnectionCache;

  function wiredRunner(): DiagnosticRunner {
    const directory: CloudDirectoryPort = {
      register,
      lookup,
      fetchStatus,
      getAccount: jest.fn<() => Promise<AccountInfo>>(),
    };
    const certificates = {
      ensureBundle: jest.fn<(deviceId: string) => Promise<CertificateBundle>>(async () => BUNDLE),
      loadOrNone: jest.fn<(deviceId: string) => Promise<CertificateBundle | null>>(async () => BUNDLE),
    };
    const provisioner = new Provisioner(certificates, directory, new ReadOnlyConnectionCache(cache));
    const resolver = new ReadOnlyConnectionResolver(directory);
    return new DiagnosticRunner(
      {
        deviceId: DEVICE_ID,
        directory,
        loadContext: () => provisioner.loadExisting({ deviceId: DEVICE_ID, apiKey: 'test-key' }),
        resolver,
        createSession: (context) =>
          new SessionManager(transport, context, resolver, {
            autoReconnect: false,
            backoff: { baseMs: 1, capMs: 1, maxAttempts: 1 },
            sleep: async () => undefined,
          }),
      },
      { sleep: async () => undefined },
    );
  }

  beforeEach(() => {
    register = jest.fn<(deviceId: string, certificatePem: string) => Promise<ConnectionInfo>>(async () =>
      connectionInfo('registered.cloud.test'),
    );
    lookup = jest.fn<(deviceId: string) => Promise<ConnectionInfo>>(async () => connectionInfo('looked-up.cloud.test'));
    cache = new MemoryConnectionCache();
  });

  it('reads routing from the directory without onboarding when nothing is cached', async () => {
    const report = await wiredRunner().run();

    expect(report.ok).toBe(true);
    expect(register).not.toHaveBeenCalled();
    expect(lookup).toHaveBeenCalledWith(DEVICE_ID);
    expect(transport.opens[0]?.host).toBe('looked-up.cloud.test');
    expect(cache.saved).toEqual([]);
  });

  it('uses cached routing without calling the directory', async () => {
    cache = new MemoryConnectionCache(connectionInfo('cached.cloud.test'));

    const report = await wiredRunner().run();

    expect(report.ok).toBe(true);
    expect(lookup).not.toHaveBeenCalled();
    expect(transport.opens[0]?.host).toBe('cached.cloud.test');
  });

  it('leaves the cache in place when the broker reports an identity conflict', async () => {
    cache = new MemoryConnectionCache(connectionInfo('cached.cloud.test'));
    transport.queue({ reason: 'not_authorized', code: 135 });

    const report = await wiredRunner().run();

    expect(report.rootCause?.step).toBe('transport');
    expect(cache.cleared).toBe(0);
    expect(await cache.load(DEVICE_ID)).toEqual(connectionInfo('cached.cloud.test'));
    expect(register).not.toHaveBeenCalled();
  });
});
