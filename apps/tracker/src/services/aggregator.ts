import { formatLocalDateTime } from '../utils/time';
import { isIdleProbe, Probe } from './store/types';

export interface ActivitySummary {
  startTime: Date;
  endTime: Date;
  startLocal: string;
  endLocal: string;
  durationSec: number;
  /** Meters */
  totalDistance: number;
  /** Meters */
  totalAltGain: number;
  /** m/s, null when no probe reports a max speed */
  maxSpeed: number | null;
  /** Seconds, null when no probe reports moving time */
  totalMovingTime: number | null;
  probeCount: number;
  idleProbeCount: number;
}

/**
 * Folds an activity's probes (in id order) into its statistics.
 * Returns null for an empty list.
 */
export function summarizeActivity(probes: Probe[], timeZone: string): ActivitySummary | null {
  const first = probes[0];
  const last = probes[probes.length - 1];
  if (!first || !last) return null;

  let totalDistance = 0;
  let totalAltGain = 0;
  let maxSpeed: number | null = null;
  let totalMovingTime: number | null = null;
  let idleProbeCount = 0;

  for (const probe of probes) {
    totalDistance += probe.dist;
    totalAltGain += probe.altGain;
    if (probe.maxSpeed !== null) {
      maxSpeed = maxSpeed === null ? probe.maxSpeed : Math.max(maxSpeed, probe.maxSpeed);
    }
    if (probe.movingTime !== null) {
      totalMovingTime = (totalMovingTime ?? 0) + probe.movingTime;
    }
    if (isIdleProbe(probe)) idleProbeCount += 1;
  }

  return {
    startTime: first.receivedAt,
    endTime: last.receivedAt,
    startLocal: formatLocalDateTime(first.receivedAt, timeZone),
    endLocal: formatLocalDateTime(last.receivedAt, timeZone),
    durationSec: Math.round((last.receivedAt.getTime() - first.receivedAt.getTime()) / 1000),
    totalDistance,
    totalAltGain,
    maxSpeed,
    totalMovingTime,
    probeCount: probes.length,
    idleProbeCount,
  };
}
