import {
  MAX_INTERVAL_SECONDS,
  alertMessage,
  counterMessage,
  errorMessage,
  gnssMessage,
  temperatureMessage,
  type AlertData,
  type Clock,
  type DeviceConfig,
  type DeviceConfigPatch,
  type PublishError,
  type TelemetryMessage,
} from '@cellsim/domain';
import type { RouteInterpolator } from '../route/route-interpolator.js';
import { localHour, type TemperatureModel } from './temperature-model.js';

/** The part of SessionManager the scheduler talks to. */
export interface TelemetrySink {
  publish(message: TelemetryMessage): void;
  recover(message: string): Promise<void>;
  onPublishFailure(listener: (err: PublishError) => void): () => void;
}

export interface TelemetrySchedulerOptions {
  temperatureIntervalSeconds: number;
  /** consecutive failures before the session is asked to reconnect */
  publishFailureThreshold?: number;
}

export const BUTTON_ALERT: AlertData = { type: 0, value: 0, description: 'Button pressed' };
export const STARTUP_ALERT: AlertData = { type: 1, value: 0, description: 'Device simulator started' };

type Cadence = 'location' | 'temperature' | 'counter';

function assertInterval(name: string, seconds: number): void {
  if (!Number.isInteger(seconds) || seconds < 1 || seconds > MAX_INTERVAL_SECONDS) {
    throw new RangeError(
      `${name} must be a whole number of seconds between 1 and ${MAX_INTERVAL_SECONDS}, got ${seconds}`,
    );
  }
}

/**
 * Periodic GNSS / TEMP / COUNT emission plus on-demand sends. Manual sends
 * never touch the interval timers.
 */
export class TelemetryScheduler {
  private readonly timers = new Map<Cadence, ReturnType<typeof setInterval>>();
  private readonly config: DeviceConfig;
  private readonly temperatureIntervalMs: number;
  private readonly failureThreshold: number;
  private startedAt: number | null = null;
  private counter = 0;
  private consecutiveFailures = 0;
  private readonly detachFailures: () => void;

  constructor(
    private readonly sink: TelemetrySink,
    private readonly route: RouteInterpolator,
    private readonly temperature: TemperatureModel,
    private readonly clock: Clock,
    initialConfig: DeviceConfig,
    opts: TelemetrySchedulerOptions,
  ) {
    assertInterval('locationInterval', initialConfig.locationInterval);
    assertInterval('temperatureInterval', opts.temperatureIntervalSeconds);
    this.config = { ...initialConfig };
    this.temperatureIntervalMs = opts.temperatureIntervalSeconds * 1_000;
    this.failureThreshold = opts.publishFailureThreshold ?? 3;
    this.detachFailures = sink.onPublishFailure((err) => this.recordFailure('mqtt', err));
  }

  get running(): boolean {
    return this.startedAt !== null;
  }

  get counterValue(): number {
    return this.counter;
  }

  get deviceConfig(): Readonly<DeviceConfig> {
    return { ...this.config };
  }

  /** Seconds since `start`, which is where the route loop begins. */
  elapsedSeconds(): number {
    return this.startedAt === null ? 0 : (this.clock.now() - this.startedAt) / 1_000;
  }

  start(): void {
    if (this.running) return;
    this.startedAt = this.clock.now();
    this.armLocation();
    this.arm('temperature', this.temperatureIntervalMs, () => this.sendTemperature());
    this.armCounter();
    console.log(
      `[scheduler] started: location every ${this.config.locationInterval}s, ` +
        `temperature every ${this.temperatureIntervalMs / 1_000}s`,
    );
  }

  stop(): void {
    for (const timer of this.timers.values()) clearInterval(timer);
    this.timers.clear();
    this.startedAt = null;
    this.detachFailures();
    console.log('[scheduler] stopped');
  }

  /** Throws RangeError, leaving the config untouched, on an interval no timer can hold. */
  applyConfig(patch: DeviceConfigPatch): void {
    if (patch.locationInterval !== undefined) assertInterval('locationInterval', patch.locationInterval);
    const intervalChanged =
      patch.locationInterval !== undefined && patch.locationInterval !== this.config.locationInterval;
    const counterChanged = patch.counterEnable !== undefined && patch.counterEnable !== this.config.counterEnable;
    Object.assign(this.config, patch);
    if (!this.running) return;
    if (intervalChanged) this.armLocation();
    if (intervalChanged || counterChanged) this.armCounter();
  }

  sendGnss(): boolean {
    const elapsed = this.elapsedSeconds();
    const pos = this.route.sample(elapsed);
    const ok = this.emit('gnss', gnssMessage(this.clock.now(), pos.lat, pos.lon, pos.accuracyM));
    if (ok) {
      const progress = this.route.describe(elapsed);
      console.log(
        `[gnss] sent ${pos.lat.toFixed(6)}N ${pos.lon.toFixed(6)}E (acc ${pos.accuracyM.toFixed(1)} m) ` +
          `${progress.from} → ${progress.to}`,
      );
    }
    return ok;
  }

  sendTemperature(): boolean {
    const now = this.clock.now();
    const celsius = this.temperature.read(localHour(now));
    const message = temperatureMessage(now, celsius);
    const ok = this.emit('temp', message);
    if (ok) console.log(`[temp] sent ${message.data} C`);
    return ok;
  }

  sendAlert(alert: AlertData = BUTTON_ALERT): boolean {
    const ok = this.emit('alert', alertMessage(this.clock.now(), alert));
    if (ok) console.log(`[alert] sent type=${alert.type} "${alert.description}"`);
    return ok;
  }

  /** Publishes the current count, then increments it whatever the outcome. */
  sendCounter(): boolean {
    const value = this.counter++;
    const ok = this.emit('count', counterMessage(this.clock.now(), value));
    if (ok) console.log(`[count] sent ${value}`);
    return ok;
  }

  // ── internals ────────────────────────────────────────────────────────────

  private armLocation(): void {
    this.arm('location', this.config.locationInterval * 1_000, () => this.sendGnss());
  }

  private armCounter(): void {
    if (this.config.counterEnable) {
      this.arm('counter', this.config.locationInterval * 1_000, () => this.sendCounter());
    } else {
      this.disarm('counter');
    }
  }

  private arm(cadence: Cadence, everyMs: number, tick: () => void): void {
    this.disarm(cadence);
    this.timers.set(cadence, setInterval(tick, everyMs));
  }

  private disarm(cadence: Cadence): void {
    const timer = this.timers.get(cadence);
    if (timer !== undefined) clearInterval(timer);
    this.timers.delete(cadence);
  }

  private emit(tag: string, message: TelemetryMessage): boolean {
    try {
      this.sink.publish(message);
      this.consecutiveFailures = 0;
      return true;
    } catch (err) {
      this.recordFailure(tag, err);
      return false;
    }
  }

  private recordFailure(tag: string, err: unknown): void {
    this.consecutiveFailures++;
    console.warn(`[${tag}] publish failed (${this.consecutiveFailures} in a row): ${errorMessage(err)}`);
    if (this.consecutiveFailures < this.failureThreshold) return;
    this.consecutiveFailures = 0;
    console.warn('[scheduler] repeated publish failures, asking the session to reconnect');
    this.sink.recover('repeated publish failures').catch((e: unknown) => {
      console.error(`[scheduler] recovery failed: ${errorMessage(e)}`);
    });
  }
}
