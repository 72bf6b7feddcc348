import type { Server } from 'node:http';
import {
  errorMessage,
  type Clock,
  type ConnectionError,
  type DeviceConfig,
  type DeviceInfoMessage,
} from '@cellsim/domain';
import type { CommandBus, QueuedCommand } from '../commands/command-bus.js';
import type { KeyboardProducer } from '../commands/keyboard.js';
import { SIM_IMSI, type ControlHandler } from '../services/control/control-handler.js';
import type { RouteInterpolator } from '../services/route/route-interpolator.js';
import type { SessionManager } from '../services/session/session-manager.js';
import { STARTUP_ALERT, type TelemetryScheduler } from '../services/telemetry/telemetry-scheduler.js';

export interface NormalRunnerDeps {
  session: SessionManager;
  scheduler: TelemetryScheduler;
  control: ControlHandler;
  route: RouteInterpolator;
  bus: CommandBus;
  clock: Clock;
  appVersion: string;
  /** command producers, started once telemetry is running */
  startKeyboard?: () => KeyboardProducer;
  startControlApi?: () => Promise<Server>;
  stopControlApi?: (server: Server) => Promise<void>;
}

export function deviceInfoMessage(ts: number, appVersion: string, config: Readonly<DeviceConfig>): DeviceInfoMessage {
  return {
    appId: 'DEVICE',
    messageType: 'DATA',
    ts,
    data: {
      networkInfo: {
        networkCode: '10',
        areaCode: '1234',
        mccmnc: '44010',
        ipAddress: '10.0.0.1',
        cellID: 'ABCD1234',
        rsrp: -85,
      },
      simInfo: { iccid: '8981100000000000000', imsi: SIM_IMSI },
      appVersion,
      config: { ...config },
    },
  };
}

/**
 * Normal operation over an already-connected session: subscribe to c2d,
 * announce the device, start telemetry, then serve commands until `quit`
 * or until the session gives up reconnecting.
 */
export class NormalRunner {
  private keyboard: KeyboardProducer | null = null;
  private server: Server | null = null;
  private shuttingDown: Promise<void> | null = null;
  private readonly detach: Array<() => void> = [];

  constructor(private readonly deps: NormalRunnerDeps) {}

  run(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const { session, bus } = this.deps;

      this.detach.push(session.onMessage((m) => this.deps.control.handle(m)));
      this.detach.push(
        session.onFatal((err: ConnectionError) => {
          this.shutdown().then(
            () => reject(err),
            (e: unknown) => reject(e),
          );
        }),
      );
      bus.setHandler(async (entry) => {
        if (entry.command === 'quit') {
          await this.shutdown();
          resolve();
          return;
        }
        this.dispatch(entry);
      });

      this.start().catch((err: unknown) => {
        this.shutdown().then(
          () => reject(err),
          (e: unknown) => reject(e),
        );
      });
    });
  }

  private async start(): Promise<void> {
    const { session, scheduler, clock } = this.deps;

    await session.subscribeControlTopic();
    session.publishRaw(deviceInfoMessage(clock.now(), this.deps.appVersion, scheduler.deviceConfig));
    console.log(`[device] sent DEVICE info (app ${this.deps.appVersion})`);
    scheduler.sendAlert(STARTUP_ALERT);
    scheduler.start();

    if (this.deps.startKeyboard) this.keyboard = this.deps.startKeyboard();
    if (this.deps.startControlApi) this.server = await this.deps.startControlApi();
  }

  private dispatch({ command, source }: QueuedCommand): void {
    const { scheduler, route } = this.deps;
    console.log(`[commands] ${command} (${source})`);
    switch (command) {
      case 'alert':
        scheduler.sendAlert();
        break;
      case 'temperature':
        scheduler.sendTemperature();
        break;
      case 'gnss':
        scheduler.sendGnss();
        break;
      case 'counter':
        scheduler.sendCounter();
        break;
      case 'show-config':
        console.log(`[config] ${JSON.stringify(scheduler.deviceConfig)}`);
        break;
      case 'route-info': {
        const p = route.describe(scheduler.elapsedSeconds());
        console.log(
          `[route] segment ${p.segmentIndex + 1}/${p.segmentCount}: ${p.from} → ${p.to} ` +
            `(${Math.round(p.fraction * 100)}%), interval ${scheduler.deviceConfig.locationInterval}s`,
        );
        break;
      }
      case 'quit':
        break;
    }
  }

  /** Stops timers and producers, then closes the session. Idempotent. */
  shutdown(): Promise<void> {
    this.shuttingDown ??= this.doShutdown();
    return this.shuttingDown;
  }

  private async doShutdown(): Promise<void> {
    console.log('[runner] shutting down...');
    this.deps.bus.close();
    this.deps.scheduler.stop();
    this.keyboard?.close();
    this.keyboard = null;
    if (this.server && this.deps.stopControlApi) {
      await this.deps.stopControlApi(this.server).catch((err: unknown) => {
        console.warn(`[control] close failed: ${errorMessage(err)}`);
      });
    }
    this.server = null;
    this.detach.forEach((d) => d());
    await this.deps.session.disconnect();
  }
}
