/** Who the simulated device claims to be. Supplied by setup, never mutated. */
export interface DeviceIdentity {
  readonly deviceId: string;
  readonly apiKey: string;
}

/** PEM-encoded client credentials plus the broker trust anchor. */
export interface CertificateBundle {
  readonly privateKey: string;
  readonly certificate: string;
  readonly rootCa: string;
}

export interface DeviceTopics {
  /** device-to-cloud telemetry topic */
  readonly d2c: string;
  /** cloud-to-device subscription filter (may contain `+`) */
  readonly c2d: string;
}

export interface ConnectionInfo {
  readonly deviceId: string;
  readonly brokerHost: string;
  readonly brokerPort: number;
  readonly topicPrefix: string;
  readonly stage: string;
  readonly topics: DeviceTopics;
}

export interface DeviceStatus {
  readonly id: string;
  readonly connected?: boolean;
  readonly state: Record<string, unknown>;
  readonly firmware?: Record<string, unknown>;
  readonly tags: string[];
}

export interface AccountInfo {
  readonly mqttEndpoint: string;
  readonly mqttTopicPrefix: string;
  readonly teamId?: string;
}

/**
 * Derive the per-device topics from an account topic prefix such as
 * `prod/3f1c.../`. Used when the device shadow does not list them.
 */
export function deriveTopics(topicPrefix: string, deviceId: string): DeviceTopics {
  const prefix = topicPrefix.replace(/\/+$/, '');
  return {
    d2c: `${prefix}/m/d/${deviceId}/d2c`,
    c2d: `${prefix}/m/d/${deviceId}/+/r`,
  };
}

/** First segment of the topic prefix, e.g. `prod`. */
export function stageOf(topicPrefix: string): string {
  return topicPrefix.split('/').find((s) => s.length > 0) ?? '';
}

/** True when `topic` is a concrete c2d topic for `deviceId` (`.../m/d/<id>/<x>/r`). */
export function isControlTopic(topic: string, deviceId: string): boolean {
  return topic.endsWith('/r') && topic.includes(`/m/d/${deviceId}/`);
}
