import {
  ConnectionError,
  ProvisioningError,
  PublishError,
  TransportOpenError,
  encodeTelemetry,
  errorMessage,
  isIdentityConflict,
  type CertificateBundle,
  type ConnectionInfo,
  type DeviceMessage,
  type DisconnectInfo,
  type InboundMessage,
  type MqttTransportPort,
  type SessionState,
  type TelemetryMessage,
  type TransportLink,
} from '@cellsim/domain';
import type { DeviceSessionContext } from '../../context/device-session-context.js';
import { DEFAULT_BACKOFF, backoffDelay, type BackoffPolicy } from './backoff.js';

/** Supplies connection info again after it was invalidated (re-registration). */
export interface ConnectionInfoResolver {
  resolve(context: DeviceSessionContext): Promise<ConnectionInfo>;
}

export interface SessionManagerOptions {
  keepaliveSeconds?: number;
  connectTimeoutMs?: number;
  backoff?: BackoffPolicy;
  /** When false an unexpected drop leaves the session degraded (diagnostics). */
  autoReconnect?: boolean;
  sleep?: (ms: number) => Promise<void>;
}

type Listener<T> = (value: T) => void;

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Owns the broker session:
 *
 *   disconnected → connecting → connected → degraded → connected | disconnected
 *
 * At most one establishment runs at a time; `connecting` and `degraded`
 * share the same in-flight promise.
 */
export class SessionManager {
  private _state: SessionState = 'disconnected';
  private link: TransportLink | null = null;
  private info: ConnectionInfo | null = null;
  private bundle: CertificateBundle | null = null;
  private inFlight: Promise<void> | null = null;
  private subscribed = false;
  private closeRequested = false;
  /** bumps whenever a link is retired so its late callbacks are ignored */
  private generation = 0;

  private readonly keepaliveSeconds: number;
  private readonly connectTimeoutMs: number;
  private readonly backoff: BackoffPolicy;
  private readonly autoReconnect: boolean;
  private readonly sleep: (ms: number) => Promise<void>;

  private readonly stateListeners = new Set<Listener<SessionState>>();
  private readonly messageListeners = new Set<Listener<InboundMessage>>();
  private readonly fatalListeners = new Set<Listener<ConnectionError>>();
  private readonly publishFailureListeners = new Set<Listener<PublishError>>();

  constructor(
    private readonly transport: MqttTransportPort,
    private readonly context: DeviceSessionContext,
    private readonly resolver: ConnectionInfoResolver,
    opts: SessionManagerOptions = {},
  ) {
    this.keepaliveSeconds = opts.keepaliveSeconds ?? 120;
    this.connectTimeoutMs = opts.connectTimeoutMs ?? 30_000;
    this.backoff = opts.backoff ?? DEFAULT_BACKOFF;
    this.autoReconnect = opts.autoReconnect ?? true;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  get state(): SessionState {
    return this._state;
  }

  get connectionInfo(): ConnectionInfo | null {
    return this.info;
  }

  onStateChange(listener: Listener<SessionState>): () => void {
    this.stateListeners.add(listener);
    return () => this.stateListeners.delete(listener);
  }

  onMessage(listener: Listener<InboundMessage>): () => void {
    this.messageListeners.add(listener);
    return () => this.messageListeners.delete(listener);
  }

  /** Reconnect gave up; the session is `disconnected` for good. */
  onFatal(listener: Listener<ConnectionError>): () => void {
    this.fatalListeners.add(listener);
    return () => this.fatalListeners.delete(listener);
  }

  /** A fire-and-forget publish was rejected by the transport. */
  onPublishFailure(listener: Listener<PublishError>): () => void {
    this.publishFailureListeners.add(listener);
    return () => this.publishFailureListeners.delete(listener);
  }

  /** Resolves once connected; rejects with ConnectionError once every attempt has failed. */
  connect(bundle: CertificateBundle, info: ConnectionInfo): Promise<void> {
    if (this.inFlight) return this.inFlight;
    if (this._state === 'connected') return Promise.resolve();

    this.bundle = bundle;
    this.info = info;
    this.closeRequested = false;
    this.setState('connecting');
    return this.runEstablish(false);
  }

  publish(message: TelemetryMessage): void {
    this.send(encodeTelemetry(message), message.appId);
  }

  /** DEVICE / MODEM messages on the same topic. */
  publishRaw(message: DeviceMessage): void {
    this.send(JSON.stringify(message), message.appId);
  }

  async subscribeControlTopic(): Promise<void> {
    const { link, info } = this;
    if (this._state !== 'connected' || !link || !info) {
      throw new ConnectionError(`cannot subscribe: session is ${this._state}`, 0);
    }
    await link.subscribe(info.topics.c2d, 1);
    this.subscribed = true;
    console.log(`[mqtt] subscribed to ${info.topics.c2d}`);
  }

  /**
   * Drop the current link and go through the reconnect path, as if the
   * broker had closed it. Used when publishes keep failing.
   */
  async recover(message: string): Promise<void> {
    if (this._state !== 'connected' || this.inFlight) return;
    const link = this.retireLink();
    this.setState('degraded');
    if (link) await link.end().catch((err: unknown) => console.warn(`[mqtt] closing stale link: ${errorMessage(err)}`));
    await this.reconnectAfter({ reason: 'unknown', message });
  }

  /**
   * Clean, terminal close. During a backoff wait the request is honoured
   * once the wait (and the attempt it guards) has settled.
   */
  async disconnect(): Promise<void> {
    this.closeRequested = true;
    if (this.inFlight) {
      console.log('[mqtt] disconnect queued behind the pending connection attempt');
      await this.inFlight.catch(() => undefined);
    }
    const link = this.retireLink();
    if (link) {
      await link.end();
      console.log('[mqtt] disconnected');
    }
    this.setState('disconnected');
  }

  // ── internals ────────────────────────────────────────────────────────────

  private send(payload: string, label: string): void {
    const { link, info } = this;
    if (this._state !== 'connected' || !link || !info) {
      throw new PublishError(`cannot publish ${label}: session is ${this._state}`);
    }
    // QoS 1 but no wait for PUBACK; failures only get logged
    link.publish(info.topics.d2c, payload, 1).catch((err: unknown) => {
      console.warn(`[mqtt] ${label} publish failed: ${errorMessage(err)}`);
      const failure = new PublishError(`${label} publish failed: ${errorMessage(err)}`, { cause: err });
      this.publishFailureListeners.forEach((l) => l(failure));
    });
  }

  private runEstablish(delayFirst: boolean): Promise<void> {
    const run = this.establish(delayFirst).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  private async establish(delayFirst: boolean): Promise<void> {
    const max = this.backoff.maxAttempts;
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= max; attempt++) {
      if (attempt > 1 || delayFirst) {
        const delay = backoffDelay(this.backoff, delayFirst ? attempt : attempt - 1);
        console.log(`[mqtt] retrying in ${delay} ms (attempt ${attempt}/${max})`);
        await this.sleep(delay);
      }
      if (this.closeRequested) {
        this.setState('disconnected');
        throw new ConnectionError('connection abandoned: disconnect requested', attempt - 1);
      }

      try {
        await this.openOnce();
        return;
      } catch (err) {
        if (err instanceof ProvisioningError) {
          this.setState('disconnected');
          throw err;
        }
        lastError = err;
        console.warn(`[mqtt] connection attempt ${attempt}/${max} failed: ${errorMessage(err)}`);
        if (err instanceof TransportOpenError && isIdentityConflict(err.info.reason)) {
          await this.invalidateRouting();
        }
      }
    }

    this.setState('disconnected');
    throw new ConnectionError(`could not connect after ${max} attempts: ${errorMessage(lastError)}`, max, {
      cause: lastError,
    });
  }

  private async openOnce(): Promise<void> {
    if (!this.info) {
      console.log('[mqtt] no connection info, registering again');
      this.info = await this.resolver.resolve(this.context);
    }
    const info = this.info;
    const bundle = this.bundle ?? this.context.bundle;

    console.log(`[mqtt] connecting to ${info.brokerHost}:${info.brokerPort} as ${this.context.deviceId}`);
    const link = await this.transport.open({
      host: info.brokerHost,
      port: info.brokerPort,
      clientId: this.context.deviceId,
      keepaliveSeconds: this.keepaliveSeconds,
      connectTimeoutMs: this.connectTimeoutMs,
      tls: { key: bundle.privateKey, cert: bundle.certificate, ca: bundle.rootCa },
    });

    const gen = ++this.generation;
    this.link = link;
    link.onDisconnect((d) => this.handleDisconnect(gen, d));
    link.onMessage((m) => {
      if (gen === this.generation) this.messageListeners.forEach((l) => l(m));
    });

    if (this.subscribed) {
      try {
        await link.subscribe(info.topics.c2d, 1);
        console.log(`[mqtt] re-subscribed to ${info.topics.c2d}`);
      } catch (err) {
        console.warn(`[mqtt] re-subscribe failed: ${errorMessage(err)}`);
      }
    }

    this.setState('connected');
    console.log(`[mqtt] connected to ${info.brokerHost}`);
  }

  private handleDisconnect(gen: number, d: DisconnectInfo): void {
    if (gen !== this.generation) return;
    this.link = null;
    if (this.closeRequested) {
      this.setState('disconnected');
      return;
    }
    const code = d.code !== undefined ? ` code=${d.code}` : '';
    console.warn(`[mqtt] unexpected disconnect (${d.reason}${code}${d.message ? `: ${d.message}` : ''})`);
    this.setState('degraded');
    void this.reconnectAfter(d);
  }

  private async reconnectAfter(d: DisconnectInfo): Promise<void> {
    if (isIdentityConflict(d.reason)) {
      console.warn('[mqtt] identity conflict, discarding cached connection info');
      await this.invalidateRouting();
    }
    if (!this.autoReconnect || this.inFlight) return;

    try {
      await this.runEstablish(true);
    } catch (err) {
      if (this.closeRequested) return;
      const fatal =
        err instanceof ConnectionError
          ? err
          : new ConnectionError(`reconnect failed: ${errorMessage(err)}`, this.backoff.maxAttempts, { cause: err });
      console.error(`[mqtt] giving up: ${fatal.message}`);
      this.fatalListeners.forEach((l) => l(fatal));
    }
  }

  private async invalidateRouting(): Promise<void> {
    this.info = null;
    try {
      await this.context.invalidateConnectionInfo();
    } catch (err) {
      console.error(`[mqtt] could not clear connection cache: ${errorMessage(err)}`);
    }
  }

  private retireLink(): TransportLink | null {
    const link = this.link;
    this.link = null;
    this.generation++;
    return link;
  }

  private setState(next: SessionState): void {
    if (next === this._state) return;
    this._state = next;
    this.stateListeners.forEach((l) => l(next));
  }
}
