/**
 * Simulator configuration, read from the environment (and `.env` through
 * dotenv in main). The setup routine that writes these values is external.
 */

import { z } from 'zod';
import { ConfigError, MAX_INTERVAL_SECONDS } from '@cellsim/domain';

const intFromEnv = (fallback: number, min = 1) => z.coerce.number().int().min(min).default(fallback);
const intervalFromEnv = (fallback: number) =>
  z.coerce.number().int().min(1).max(MAX_INTERVAL_SECONDS).default(fallback);
const numFromEnv = (fallback: number) => z.coerce.number().finite().default(fallback);

const envSchema = z.object({
  NRF_CLOUD_API_KEY: z
    .string({ required_error: 'NRF_CLOUD_API_KEY is required' })
    .min(1, 'NRF_CLOUD_API_KEY is required')
    .refine((v) => !v.includes('<YOUR_'), 'NRF_CLOUD_API_KEY still holds the template placeholder'),
  DEVICE_ID: z.string().regex(/^[A-Za-z0-9_-]{1,128}$/, 'DEVICE_ID may only contain letters, digits, - and _').default('kid-gps-sim-001'),
  NRF_CLOUD_API_HOST: z.string().url().default('https://api.nrfcloud.com'),
  CERTS_DIR: z.string().min(1).default('./certs'),
  MQTT_PORT: intFromEnv(8883),
  MQTT_KEEPALIVE_SECONDS: intFromEnv(120),
  LOCATION_INTERVAL_SECONDS: intervalFromEnv(300),
  TEMPERATURE_INTERVAL_SECONDS: intervalFromEnv(300),
  TEMPERATURE_BASE: numFromEnv(22),
  TEMPERATURE_VARIATION: z.coerce.number().finite().min(0).default(5),
  APP_VERSION: z.string().default('0.0.1'),
  REQUEST_TIMEOUT_MS: intFromEnv(10_000),
  CONTROL_PORT: z.coerce.number().int().min(1).max(65_535).optional(),
});

export interface SimulatorConfig {
  readonly deviceId: string;
  readonly apiKey: string;
  readonly apiHost: string;
  readonly certsDir: string;
  readonly mqttPort: number;
  readonly keepaliveSeconds: number;
  readonly locationIntervalSeconds: number;
  readonly temperatureIntervalSeconds: number;
  readonly temperatureBase: number;
  readonly temperatureVariation: number;
  readonly appVersion: string;
  readonly requestTimeoutMs: number;
  readonly controlPort?: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SimulatorConfig {
  // empty strings mean "unset", as in a half-filled .env
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(details, 'Run the setup step or edit .env, then start the simulator again.');
  }
  const e = parsed.data;
  return {
    deviceId: e.DEVICE_ID,
    apiKey: e.NRF_CLOUD_API_KEY,
    apiHost: e.NRF_CLOUD_API_HOST,
    certsDir: e.CERTS_DIR,
    mqttPort: e.MQTT_PORT,
    keepaliveSeconds: e.MQTT_KEEPALIVE_SECONDS,
    locationIntervalSeconds: e.LOCATION_INTERVAL_SECONDS,
    temperatureIntervalSeconds: e.TEMPERATURE_INTERVAL_SECONDS,
    temperatureBase: e.TEMPERATURE_BASE,
    temperatureVariation: e.TEMPERATURE_VARIATION,
    appVersion: e.APP_VERSION,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    ...(e.CONTROL_PORT !== undefined ? { controlPort: e.CONTROL_PORT } : {}),
  };
}
