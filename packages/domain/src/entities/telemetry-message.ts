export interface GnssData {
  readonly lat: number;
  readonly lon: number;
  readonly acc: number;
}

export interface AlertData {
  readonly type: number;
  readonly value: number;
  readonly description: string;
}

export type TelemetryMessage =
  | { readonly appId: 'GNSS'; readonly ts: number; readonly data: GnssData }
  | { readonly appId: 'TEMP'; readonly ts: number; readonly data: number }
  | { readonly appId: 'ALERT'; readonly ts: number; readonly data: AlertData }
  | { readonly appId: 'COUNT'; readonly ts: number; readonly data: number };

/** Device-level messages that travel on the same d2c topic but are not telemetry. */
export interface DeviceInfoMessage {
  readonly appId: 'DEVICE';
  readonly messageType: 'DATA';
  readonly ts: number;
  readonly data: {
    readonly networkInfo: Record<string, string | number>;
    readonly simInfo: Record<string, string>;
    readonly appVersion: string;
    readonly config: Record<string, unknown>;
  };
}

export interface ModemResponseMessage {
  readonly appId: 'MODEM';
  readonly messageType: 'DATA';
  readonly ts: number;
  readonly data: string;
}

export type DeviceMessage = DeviceInfoMessage | ModemResponseMessage;

export function round(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

/**
 * Serialize a telemetry message to the exact wire JSON. Key order is fixed
 * (`appId`, `ts`, `data`) and `ts` is an integer epoch-ms value. Whole-valued
 * floats are written the way JSON.stringify writes them (`22`, not `22.0`).
 */
export function encodeTelemetry(message: TelemetryMessage): string {
  const ts = Math.trunc(message.ts);
  switch (message.appId) {
    case 'GNSS':
      return JSON.stringify({
        appId: message.appId,
        ts,
        data: { lat: message.data.lat, lon: message.data.lon, acc: message.data.acc },
      });
    case 'ALERT':
      return JSON.stringify({
        appId: message.appId,
        ts,
        data: {
          type: message.data.type,
          value: message.data.value,
          description: message.data.description,
        },
      });
    case 'TEMP':
    case 'COUNT':
      return JSON.stringify({ appId: message.appId, ts, data: message.data });
  }
}

export function gnssMessage(ts: number, lat: number, lon: number, acc: number): TelemetryMessage {
  return {
    appId: 'GNSS',
    ts,
    data: { lat: round(lat, 6), lon: round(lon, 6), acc: round(acc, 1) },
  };
}

export function temperatureMessage(ts: number, celsius: number): TelemetryMessage {
  return { appId: 'TEMP', ts, data: round(celsius, 1) };
}

export function alertMessage(ts: number, alert: AlertData): TelemetryMessage {
  return {
    appId: 'ALERT',
    ts,
    data: { type: Math.trunc(alert.type), value: Math.trunc(alert.value), description: alert.description },
  };
}

export function counterMessage(ts: number, count: number): TelemetryMessage {
  return { appId: 'COUNT', ts, data: Math.trunc(count) };
}
