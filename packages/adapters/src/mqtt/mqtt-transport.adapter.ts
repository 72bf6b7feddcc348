import { connect, type IClientOptions, type IDisconnectPacket, type MqttClient } from 'mqtt';
import {
  TransportOpenError,
  reasonFromCode,
  type DisconnectInfo,
  type InboundMessage,
  type MqttTransportPort,
  type QoS,
  type TransportLink,
  type TransportOpenOptions,
} from '@cellsim/domain';

/** Subscription grant codes at or above this are refusals. */
const SUBACK_FAILURE = 0x80;

function reasonCodeOf(err: Error): number | undefined {
  return 'code' in err && typeof err.code === 'number' ? err.code : undefined;
}

/**
 * mqtt.js over mutual TLS, MQTT v5 so the broker can tell us why it dropped
 * the session. Built-in reconnect is disabled: the session manager owns it.
 */
export class MqttTransportAdapter implements MqttTransportPort {
  open(opts: TransportOpenOptions): Promise<TransportLink> {
    const clientOpts: IClientOptions = {
      host: opts.host,
      port: opts.port,
      protocol: 'mqtts',
      protocolVersion: 5,
      clientId: opts.clientId,
      clean: true,
      keepalive: opts.keepaliveSeconds,
      connectTimeout: opts.connectTimeoutMs,
      reconnectPeriod: 0,
      key: opts.tls.key,
      cert: opts.tls.cert,
      ca: opts.tls.ca,
      rejectUnauthorized: true,
    };

    return new Promise<TransportLink>((resolve, reject) => {
      const client = connect(clientOpts);
      let lastError: Error | null = null;

      const cleanup = (): void => {
        client.removeListener('connect', onConnect);
        client.removeListener('error', onError);
        client.removeListener('close', onClose);
      };
      const onConnect = (): void => {
        cleanup();
        resolve(new MqttTransportLink(client));
      };
      const onError = (err: Error): void => {
        // a CONNACK refusal arrives as an error carrying the reason code
        lastError = err;
        const code = reasonCodeOf(err);
        if (code === undefined) return;
        cleanup();
        client.end(true);
        reject(new TransportOpenError({ reason: reasonFromCode(code), code, message: err.message }));
      };
      const onClose = (): void => {
        cleanup();
        reject(
          new TransportOpenError({
            reason: 'network_error',
            message: lastError?.message ?? `connection to ${opts.host}:${opts.port} closed before CONNACK`,
          }),
        );
      };

      client.on('connect', onConnect);
      client.on('error', onError);
      client.on('close', onClose);
    });
  }
}

class MqttTransportLink implements TransportLink {
  private ending = false;
  private closed = false;
  private lastInfo: DisconnectInfo | null = null;
  private readonly disconnectHandlers: Array<(info: DisconnectInfo) => void> = [];

  constructor(private readonly client: MqttClient) {
    client.on('disconnect', (packet: IDisconnectPacket) => {
      const code = packet.reasonCode;
      this.lastInfo = {
        reason: reasonFromCode(code),
        ...(code !== undefined ? { code } : {}),
        ...(packet.properties?.reasonString ? { message: packet.properties.reasonString } : {}),
      };
    });
    client.on('error', (err: Error) => {
      const code = reasonCodeOf(err);
      const keepAlive = /keepalive/i.test(err.message);
      this.lastInfo ??= {
        reason: keepAlive ? 'keep_alive_timeout' : code !== undefined ? reasonFromCode(code) : 'network_error',
        ...(code !== undefined ? { code } : {}),
        message: err.message,
      };
    });
    client.on('close', () => {
      if (this.ending || this.closed) return;
      this.closed = true;
      const info: DisconnectInfo = this.lastInfo ?? { reason: 'network_error', message: 'connection closed' };
      for (const handler of this.disconnectHandlers) handler(info);
    });
  }

  async publish(topic: string, payload: string, qos: QoS): Promise<void> {
    await this.client.publishAsync(topic, payload, { qos });
  }

  async subscribe(topic: string, qos: QoS): Promise<void> {
    const grants = await this.client.subscribeAsync(topic, { qos });
    const refused = grants.find((g) => g.qos >= SUBACK_FAILURE);
    if (refused) throw new Error(`subscription to ${topic} refused (code ${refused.qos})`);
  }

  async end(): Promise<void> {
    this.ending = true;
    await this.client.endAsync();
  }

  onDisconnect(handler: (info: DisconnectInfo) => void): void {
    this.disconnectHandlers.push(handler);
  }

  onMessage(handler: (message: InboundMessage) => void): void {
    this.client.on('message', (topic: string, payload: Buffer) => handler({ topic, payload }));
  }
}
