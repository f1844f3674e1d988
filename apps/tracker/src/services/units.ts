/** Multiplicative factors from device encoding to meters, m/s and seconds. */
export interface UnitScales {
  distance: number;
  altitudeGain: number;
  maxSpeed: number;
  movingTime: number;
}

/**
 * Older firmware reports the top speed of the interval, newer firmware the
 * time spent moving. Both only describe how intense the interval was.
 */
export type RawMovement =
  | { kind: 'max_speed'; value: number }
  | { kind: 'moving_time'; value: number };

/** A probe as the device encodes it. */
export interface RawReading {
  seq: number;
  lat: number;
  lng: number;
  alt: number | null;
  dist: number;
  altGain: number;
  movement: RawMovement;
}

export interface NormalizedReading {
  seq: number;
  lat: number;
  lng: number;
  alt: number | null;
  dist: number;
  altGain: number;
  maxSpeed: number | null;
  movingTime: number | null;
}

export class UnitNormalizer {
  constructor(private readonly scales: UnitScales) {}

  normalize(raw: RawReading): NormalizedReading {
    const { movement } = raw;
    return {
      seq: raw.seq,
      lat: raw.lat,
      lng: raw.lng,
      alt: raw.alt,
      dist: raw.dist * this.scales.distance,
      altGain: raw.altGain * this.scales.altitudeGain,
      maxSpeed: movement.kind === 'max_speed' ? movement.value * this.scales.maxSpeed : null,
      movingTime: movement.kind === 'moving_time' ? movement.value * this.scales.movingTime : null,
    };
  }
}
