import { fetch, type Dispatcher, type Response } from 'undici';
import { z } from 'zod';
import {
  DirectoryError,
  deriveTopics,
  errorMessage,
  stageOf,
  type AccountInfo,
  type CloudDirectoryPort,
  type ConnectionInfo,
  type DeviceStatus,
  type DeviceTopics,
} from '@cellsim/domain';

const accountSchema = z.object({
  mqttEndpoint: z.string().min(1),
  mqttTopicPrefix: z.string().default(''),
  teamId: z.string().optional(),
  tenantId: z.string().optional(),
});

const deviceSchema = z.object({
  id: z.string(),
  state: z
    .object({
      reported: z.record(z.unknown()).optional(),
      desired: z
        .object({
          pairing: z
            .object({
              topics: z.object({ d2c: z.string(), c2d: z.string() }).partial().optional(),
            })
            .passthrough()
            .optional(),
        })
        .passthrough()
        .optional(),
    })
    .passthrough()
    .default({}),
  firmware: z.record(z.unknown()).optional(),
  tags: z.array(z.string()).default([]),
  connected: z.boolean().optional(),
});

type DeviceBody = z.infer<typeof deviceSchema>;

export interface NrfCloudDirectoryOptions {
  apiKey: string;
  apiHost?: string;
  mqttPort?: number;
  timeoutMs?: number;
  /** undici dispatcher override; tests pass a MockAgent */
  dispatcher?: Dispatcher;
}

/** Keep logged/raised response bodies short. */
const BODY_PREVIEW = 300;

export class NrfCloudDirectoryAdapter implements CloudDirectoryPort {
  private readonly apiHost: string;
  private readonly mqttPort: number;
  private readonly timeoutMs: number;

  constructor(private readonly opts: NrfCloudDirectoryOptions) {
    this.apiHost = (opts.apiHost ?? 'https://api.nrfcloud.com').replace(/\/+$/, '');
    this.mqttPort = opts.mqttPort ?? 8883;
    this.timeoutMs = opts.timeoutMs ?? 10_000;
  }

  async register(deviceId: string, certificatePem: string): Promise<ConnectionInfo> {
    // nRF Cloud onboarding CSV: deviceId,[subType],[tags],[fwTypes],"certPem"
    const csv = `${deviceId},,simulator,,"${certificatePem.trim()}\n"`;
    try {
      await this.request('POST', '/v1/devices', csv, 'application/octet-stream');
      console.log(`[nrf-cloud] onboarded ${deviceId}`);
    } catch (err) {
      if (!(err instanceof DirectoryError && err.statusCode === 409)) throw err;
      console.log(`[nrf-cloud] ${deviceId} already onboarded, re-registering`);
    }
    return this.lookup(deviceId);
  }

  async lookup(deviceId: string): Promise<ConnectionInfo> {
    const account = await this.getAccount();
    const device = deviceSchema.safeParse(await this.request('GET', `/v1/devices/${encodeURIComponent(deviceId)}`));
    const shadowTopics = device.success ? topicsFromShadow(device.data) : null;
    if (!shadowTopics) console.log('[nrf-cloud] topics not in device shadow, deriving from account prefix');

    return {
      deviceId,
      brokerHost: account.mqttEndpoint,
      brokerPort: this.mqttPort,
      topicPrefix: account.mqttTopicPrefix,
      stage: stageOf(account.mqttTopicPrefix),
      topics: shadowTopics ?? deriveTopics(account.mqttTopicPrefix, deviceId),
    };
  }

  async fetchStatus(deviceId: string): Promise<DeviceStatus> {
    const body = await this.request('GET', `/v1/devices/${encodeURIComponent(deviceId)}`);
    const device = parse(deviceSchema, body, `/v1/devices/${deviceId}`);
    return {
      id: device.id,
      connected: device.connected,
      state: device.state,
      firmware: device.firmware,
      tags: device.tags,
    };
  }

  async getAccount(): Promise<AccountInfo> {
    const body = await this.request('GET', '/v1/account');
    const account = parse(accountSchema, body, '/v1/account');
    const teamId = account.teamId ?? account.tenantId ?? prefixSegment(account.mqttTopicPrefix, 1);
    return {
      mqttEndpoint: account.mqttEndpoint,
      mqttTopicPrefix: account.mqttTopicPrefix,
      ...(teamId ? { teamId } : {}),
    };
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    body?: string,
    contentType = 'application/json',
  ): Promise<unknown> {
    let res: Response;
    try {
      res = await fetch(`${this.apiHost}${path}`, {
        method,
        headers: {
          Authorization: `Bearer ${this.opts.apiKey}`,
          'Content-Type': contentType,
        },
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
        ...(this.opts.dispatcher ? { dispatcher: this.opts.dispatcher } : {}),
      });
    } catch (err) {
      throw new DirectoryError(`${method} ${path} failed: ${errorMessage(err)}`, null, '', { cause: err });
    }

    const text = await res.text();
    if (!res.ok) {
      const preview = text.slice(0, BODY_PREVIEW);
      console.error(`[nrf-cloud] ${method} ${path} -> HTTP ${res.status}: ${preview}`);
      throw new DirectoryError(`${method} ${path} returned HTTP ${res.status}`, res.status, preview);
    }
    if (text.trim().length === 0) return {};
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (err) {
      throw new DirectoryError(`${method} ${path} returned non-JSON body`, res.status, text.slice(0, BODY_PREVIEW), {
        cause: err,
      });
    }
  }
}

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, path: string): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new DirectoryError(
      `unexpected response shape from ${path}: ${result.error.issues.map((i) => i.message).join('; ')}`,
      200,
      JSON.stringify(body).slice(0, BODY_PREVIEW),
    );
  }
  return result.data;
}

function topicsFromShadow(device: DeviceBody): DeviceTopics | null {
  const topics = device.state.desired?.pairing?.topics;
  if (!topics?.d2c || !topics.c2d) return null;
  return { d2c: topics.d2c, c2d: topics.c2d };
}

function prefixSegment(prefix: string, index: number): string | undefined {
  const segment = prefix.split('/').filter((s) => s.length > 0)[index];
  return segment && segment.length > 0 ? segment : undefined;
}
