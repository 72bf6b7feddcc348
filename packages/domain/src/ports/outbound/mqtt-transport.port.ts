import type { DisconnectInfo } from '../../entities/session-state.js';

export type QoS = 0 | 1;

export interface TransportOpenOptions {
  readonly host: string;
  readonly port: number;
  readonly clientId: string;
  readonly keepaliveSeconds: number;
  readonly connectTimeoutMs: number;
  readonly tls: {
    readonly key: string;
    readonly cert: string;
    readonly ca: string;
  };
}

export interface InboundMessage {
  readonly topic: string;
  readonly payload: Buffer;
}

/** One established broker connection. It never reconnects by itself. */
export interface TransportLink {
  publish(topic: string, payload: string, qos: QoS): Promise<void>;
  subscribe(topic: string, qos: QoS): Promise<void>;
  /** Clean close; no disconnect callback fires afterwards. */
  end(): Promise<void>;
  onDisconnect(handler: (info: DisconnectInfo) => void): void;
  onMessage(handler: (message: InboundMessage) => void): void;
}

export interface MqttTransportPort {
  /** Resolves once the broker accepted the session; rejects with a `TransportOpenError`. */
  open(options: TransportOpenOptions): Promise<TransportLink>;
}

/** Rejection value of `MqttTransportPort.open`. */
export class TransportOpenError extends Error {
  constructor(readonly info: DisconnectInfo) {
    super(info.message ?? `connection refused (${info.reason})`);
    this.name = 'TransportOpenError';
  }
}
