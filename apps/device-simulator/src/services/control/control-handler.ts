import { z } from 'zod';
import {
  MAX_INTERVAL_SECONDS,
  isControlTopic,
  type Clock,
  type DeviceConfigPatch,
  type DeviceMessage,
  type InboundMessage,
} from '@cellsim/domain';

export const MODEM_FIRMWARE = 'mfw_nrf91x1_2.0.2';
export const HARDWARE_VERSION = 'nRF9151 LACA AAA (simulator)';
export const SIM_IMSI = '440100000000000';

/** Where answers go and where config changes land. */
export interface ControlTarget {
  publishRaw(message: DeviceMessage): void;
  applyConfig(patch: DeviceConfigPatch): void;
}

const c2dEnvelope = z.object({
  appId: z.string().default(''),
  messageType: z.string().default(''),
  data: z.unknown(),
});

const configPatch = z
  .object({
    locationInterval: z.coerce.number().int().min(1).max(MAX_INTERVAL_SECONDS).optional(),
    counterEnable: z.boolean().optional(),
  })
  .passthrough();

/** Handles cloud-to-device requests: CONFIG updates and modem AT commands. */
export class ControlHandler {
  private readonly atResponses: Readonly<Record<string, string>>;

  constructor(
    private readonly deviceId: string,
    private readonly target: ControlTarget,
    private readonly clock: Clock,
  ) {
    this.atResponses = {
      'AT+CGMR': MODEM_FIRMWARE,
      'AT+CGSN': deviceId,
      'AT%HWVERSION': HARDWARE_VERSION,
      'AT+CIMI': SIM_IMSI,
    };
  }

  handle(message: InboundMessage): void {
    if (!isControlTopic(message.topic, this.deviceId)) {
      console.log(`[c2d] ignoring message on ${message.topic}`);
      return;
    }

    let body: unknown;
    try {
      body = JSON.parse(message.payload.toString('utf8'));
    } catch {
      console.warn(`[c2d] non-JSON payload on ${message.topic}: ${message.payload.toString('utf8').slice(0, 100)}`);
      return;
    }

    const envelope = c2dEnvelope.safeParse(body);
    if (!envelope.success) {
      console.warn(`[c2d] unexpected payload shape on ${message.topic}`);
      return;
    }
    const { appId, messageType, data } = envelope.data;
    console.log(`[c2d] received appId=${appId} messageType=${messageType}`);

    if (appId === 'MODEM' && messageType === 'CMD') {
      this.answerAt(typeof data === 'string' ? data : '');
    } else if (appId === 'CONFIG') {
      this.updateConfig(data);
    }
  }

  answerFor(command: string): string {
    return this.atResponses[command.trim()] ?? 'ERROR';
  }

  private answerAt(command: string): void {
    const response = this.answerFor(command);
    this.target.publishRaw({ appId: 'MODEM', messageType: 'DATA', ts: this.clock.now(), data: response });
    console.log(`[at] ${command.trim() || '<empty>'} -> ${response}`);
  }

  private updateConfig(data: unknown): void {
    const parsed = configPatch.safeParse(data ?? {});
    if (!parsed.success) {
      console.warn(`[config] rejected update: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
      return;
    }
    const patch: DeviceConfigPatch = {};
    if (parsed.data.locationInterval !== undefined) patch.locationInterval = parsed.data.locationInterval;
    if (parsed.data.counterEnable !== undefined) patch.counterEnable = parsed.data.counterEnable;
    if (Object.keys(patch).length === 0) return;

    this.target.applyConfig(patch);
    console.log(`[config] updated ${JSON.stringify(patch)}`);
  }
}
