import { gaussian } from '@cellsim/adapters';
import type { Rng } from '@cellsim/domain';

export interface TemperatureModelOptions {
  base: number;
  variation: number;
  /** standard deviation of the sensor noise, °C */
  noiseSd?: number;
  /** hour of the daily maximum */
  peakHour?: number;
}

/**
 * Diurnal temperature: a 24 h sine with its maximum at `peakHour` (15:00)
 * and minimum twelve hours later, plus clamped gaussian noise.
 */
export class TemperatureModel {
  readonly base: number;
  readonly variation: number;
  readonly noiseSd: number;
  private readonly peakHour: number;

  constructor(
    private readonly rng: Rng,
    opts: TemperatureModelOptions,
  ) {
    this.base = opts.base;
    this.variation = opts.variation;
    this.noiseSd = opts.noiseSd ?? 0.5;
    this.peakHour = opts.peakHour ?? 15;
  }

  /** Largest absolute noise ever added. */
  get noiseBound(): number {
    return 3 * this.noiseSd;
  }

  diurnalOffset(hourOfDay: number): number {
    return this.variation * Math.sin(((hourOfDay - (this.peakHour - 6)) * Math.PI) / 12);
  }

  read(hourOfDay: number): number {
    return this.base + this.diurnalOffset(hourOfDay) + this.noise();
  }

  private noise(): number {
    const n = gaussian(this.rng, 0, this.noiseSd);
    return Math.max(-this.noiseBound, Math.min(this.noiseBound, n));
  }
}

/** Fractional local hour, e.g. 14.5 for 14:30. */
export function localHour(epochMs: number): number {
  const d = new Date(epochMs);
  return d.getHours() + d.getMinutes() / 60 + d.getSeconds() / 3600;
}
