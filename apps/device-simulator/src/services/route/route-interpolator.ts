import type { PositionSample, RoutePoint, Rng, Waypoint } from '@cellsim/domain';
import { TOKYO_LOOP } from './tokyo-loop.js';

/** Metres per degree of latitude (spherical approximation). */
const METERS_PER_DEG_LAT = 111_320;

export interface RouteInterpolatorOptions {
  waypoints?: readonly Waypoint[];
  /** time to walk from one waypoint to the next */
  segmentSeconds?: number;
  minJitterM?: number;
  maxJitterM?: number;
}

export interface RouteProgress {
  readonly segmentIndex: number;
  readonly segmentCount: number;
  readonly from: string;
  readonly to: string;
  readonly fraction: number;
}

interface BasePosition extends RoutePoint {
  readonly segmentIndex: number;
  readonly fraction: number;
}

/**
 * Continuous position along a closed loop of waypoints. The base point is a
 * pure function of elapsed time; each sample adds fresh, non-accumulating
 * jitter inside a disc of radius [minJitterM, maxJitterM].
 */
export class RouteInterpolator {
  readonly waypoints: readonly Waypoint[];
  readonly segmentSeconds: number;
  readonly maxJitterM: number;
  private readonly minJitterM: number;

  constructor(
    private readonly rng: Rng,
    opts: RouteInterpolatorOptions = {},
  ) {
    this.waypoints = opts.waypoints ?? TOKYO_LOOP;
    if (this.waypoints.length < 2) throw new RangeError('a route needs at least two waypoints');
    this.segmentSeconds = opts.segmentSeconds ?? 1_200;
    this.minJitterM = opts.minJitterM ?? 2;
    this.maxJitterM = opts.maxJitterM ?? 15;
    if (this.segmentSeconds <= 0) throw new RangeError('segmentSeconds must be positive');
    if (this.minJitterM <= 0 || this.maxJitterM < this.minJitterM) {
      throw new RangeError('jitter bounds must satisfy 0 < min <= max');
    }
  }

  get segmentCount(): number {
    return this.waypoints.length - 1;
  }

  get loopSeconds(): number {
    return this.segmentCount * this.segmentSeconds;
  }

  basePosition(elapsedSeconds: number): BasePosition {
    const loop = this.loopSeconds;
    const t = ((elapsedSeconds % loop) + loop) % loop;
    const exact = t / this.segmentSeconds;
    const segmentIndex = Math.min(Math.floor(exact), this.segmentCount - 1);
    const fraction = exact - segmentIndex;
    const from = this.point(segmentIndex);
    const to = this.point(segmentIndex + 1);
    return {
      lat: from.lat + (to.lat - from.lat) * fraction,
      lon: from.lon + (to.lon - from.lon) * fraction,
      segmentIndex,
      fraction,
    };
  }

  sample(elapsedSeconds: number): PositionSample {
    const base = this.basePosition(elapsedSeconds);
    // uniform over the annulus: radius ∝ sqrt of a uniform draw
    const r2min = this.minJitterM ** 2;
    const r2max = this.maxJitterM ** 2;
    const radius = Math.sqrt(r2min + this.rng.next() * (r2max - r2min));
    const bearing = this.rng.next() * 2 * Math.PI;
    const dNorth = radius * Math.cos(bearing);
    const dEast = radius * Math.sin(bearing);
    const metersPerDegLon = METERS_PER_DEG_LAT * Math.cos((base.lat * Math.PI) / 180);

    return {
      lat: base.lat + dNorth / METERS_PER_DEG_LAT,
      lon: base.lon + dEast / metersPerDegLon,
      accuracyM: Math.min(this.maxJitterM, Math.max(this.minJitterM, Math.round(radius * 10) / 10)),
      segmentIndex: base.segmentIndex,
      fraction: base.fraction,
    };
  }

  describe(elapsedSeconds: number): RouteProgress {
    const { segmentIndex, fraction } = this.basePosition(elapsedSeconds);
    return {
      segmentIndex,
      segmentCount: this.segmentCount,
      from: this.point(segmentIndex).name,
      to: this.point(segmentIndex + 1).name,
      fraction,
    };
  }

  private point(index: number): Waypoint {
    const wp = this.waypoints[index];
    if (!wp) throw new RangeError(`waypoint ${index} out of range`);
    return wp;
  }
}
