/**
 * NormalRunner wired to real session, scheduler and control handler over the
 * fake transport.
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { DeterministicClock, SeededRng } from '@cellsim/adapters';
import { ConnectionError } from '@cellsim/domain';
import { CommandBus } from '../commands/command-bus.js';
import { NormalRunner, deviceInfoMessage } from '../runners/normal-runner.js';
import { ControlHandler } from '../services/control/control-handler.js';
import { RouteInterpolator } from '../services/route/route-interpolator.js';
import { SessionManager } from '../services/session/session-manager.js';
import { TelemetryScheduler } from '../services/telemetry/telemetry-scheduler.js';
import { TemperatureModel } from '../services/telemetry/temperature-model.js';
import {
  BUNDLE,
  DEVICE_ID,
  FakeTransport,
  connectionInfo,
  noSleep,
  sessionContext,
} from './helpers/fakes.js';

const TS = 1_760_000_000_000;
const C2D = `prod/team-1/m/d/${DEVICE_ID}/cmd/r`;
const flush = () => new Promise((r) => setImmediate(r));

let transport: FakeTransport;
let session: SessionManager;
let scheduler: TelemetryScheduler;
let bus: CommandBus;
let runner: NormalRunner;

function sent(): Array<{ appId: string; data: unknown }> {
  return transport.lastLink.published.map((p) => JSON.parse(p.payload));
}

beforeEach(async () => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);

  const clock = new DeterministicClock(TS);
  transport = new FakeTransport();
  session = new SessionManager(transport, sessionContext(), { resolve: async () => connectionInfo() }, {
    backoff: { baseMs: 1, capMs: 1, maxAttempts: 1 },
    sleep: noSleep,
  });
  await session.connect(BUNDLE, connectionInfo());

  const route = new RouteInterpolator(new SeededRng(5));
  scheduler = new TelemetryScheduler(
    session,
    route,
    new TemperatureModel(new SeededRng(6), { base: 22, variation: 5 }),
    clock,
    { locationInterval: 300, counterEnable: false },
    { temperatureIntervalSeconds: 300 },
  );
  const control = new ControlHandler(
    DEVICE_ID,
    { publishRaw: (m) => session.publishRaw(m), applyConfig: (p) => scheduler.applyConfig(p) },
    clock,
  );
  bus = new CommandBus();
  runner = new NormalRunner({ session, scheduler, control, route, bus, clock, appVersion: '1.2.3' });
});

afterEach(async () => {
  await runner.shutdown();
  jest.restoreAllMocks();
});

describe('NormalRunner', () => {
  it('subscribes, announces the device and sends the startup alert', async () => {
    const done = runner.run();
    await flush();

    expect(transport.lastLink.subscriptions).toEqual([`prod/team-1/m/d/${DEVICE_ID}/+/r`]);
    expect(sent()).toEqual([
      JSON.parse(JSON.stringify(deviceInfoMessage(TS, '1.2.3', { locationInterval: 300, counterEnable: false }))),
      { appId: 'ALERT', ts: TS, data: { type: 1, value: 0, description: 'Device simulator started' } },
    ]);
    expect(scheduler.running).toBe(true);

    bus.submit('quit', 'internal');
    await done;
  });

  it('serves queued commands and shuts down cleanly on quit', async () => {
    const done = runner.run();
    await flush();

    bus.submit('alert', 'api');
    bus.submit('counter', 'keyboard');
    bus.submit('quit', 'keyboard');
    await done;

    expect(sent().slice(2)).toEqual([
      { appId: 'ALERT', ts: TS, data: { type: 0, value: 0, description: 'Button pressed' } },
      { appId: 'COUNT', ts: TS, data: 0 },
    ]);
    expect(scheduler.running).toBe(false);
    expect(session.state).toBe('disconnected');
    expect(transport.lastLink.ended).toBe(true);
    expect(bus.submit('gnss', 'api')).toBe(false);
  });

  it('answers c2d requests while running', async () => {
    const done = runner.run();
    await flush();

    transport.lastLink.deliver(C2D, JSON.stringify({ appId: 'CONFIG', data: { counterEnable: true } }));
    transport.lastLink.deliver(C2D, JSON.stringify({ appId: 'MODEM', messageType: 'CMD', data: 'AT+CGSN' }));

    expect(scheduler.deviceConfig).toEqual({ locationInterval: 300, counterEnable: true });
    expect(sent().slice(2)).toEqual([{ appId: 'MODEM', messageType: 'DATA', ts: TS, data: DEVICE_ID }]);

    bus.submit('quit', 'internal');
    await done;
  });

  it('rejects with the ConnectionError when the session gives up', async () => {
    const done = runner.run();
    await flush();

    transport.queue({ reason: 'network_error' });
    transport.lastLink.drop({ reason: 'network_error' });

    await expect(done).rejects.toBeInstanceOf(ConnectionError);
    expect(scheduler.running).toBe(false);
  });
});
