/** Runtime settings the cloud can change through a c2d CONFIG message. */
export interface DeviceConfig {
  /** seconds between GNSS fixes */
  locationInterval: number;
  counterEnable: boolean;
}

export type DeviceConfigPatch = Partial<DeviceConfig>;

/** Longest period a Node timer holds (2^31-1 ms), in whole seconds. */
export const MAX_INTERVAL_SECONDS = 2_147_483;
