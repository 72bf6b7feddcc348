export interface RoutePoint {
  readonly lat: number;
  readonly lon: number;
}

export interface Waypoint extends RoutePoint {
  readonly name: string;
}

export interface PositionSample {
  readonly lat: number;
  readonly lon: number;
  /** Estimated horizontal error in metres; equals the applied jitter radius. */
  readonly accuracyM: number;
  /** Index of the waypoint the current segment starts at. */
  readonly segmentIndex: number;
  /** Progress along the current segment, in [0, 1). */
  readonly fraction: number;
}
