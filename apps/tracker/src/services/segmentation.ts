import { isIdleProbe, Probe, TrackerStores } from './store/types';

export interface SegmentationOptions {
  /** Smallest gap between two moving probes that starts a new activity. */
  inactivityThresholdMs: number;
}

/**
 * Groups probes into activities as they arrive.
 *
 * A moving probe either extends the most recent activity, claiming every probe
 * stored since that activity's last one (the idle probes of a pause), or opens
 * a new activity when the gap reaches the inactivity threshold. Idle probes
 * never open or extend an activity on their own. Closed activities are never
 * revisited, so the work per probe is bounded by the probes stored since the
 * last moving one.
 *
 * `assign` must run exactly once per probe, in the transaction that inserted
 * it: the read-then-write sequence below is not safe against a concurrent
 * writer and is not idempotent.
 */
export class SegmentationEngine {
  constructor(private readonly options: SegmentationOptions) {}

  async assign(probe: Probe, stores: TrackerStores): Promise<number | null> {
    if (isIdleProbe(probe)) return null;

    const latest = await stores.activities.findLatest();
    if (!latest) {
      return this.startActivity(probe, stores);
    }

    const last = await stores.probes.findLastOfActivity(latest.id);
    if (!last) {
      throw new Error(`Activity ${latest.id} has no probes`);
    }

    const gapMs = probe.receivedAt.getTime() - last.receivedAt.getTime();
    if (gapMs >= this.options.inactivityThresholdMs) {
      return this.startActivity(probe, stores);
    }

    // Ordered by storage id, never by the device sequence number
    const paused = await stores.probes.listBetween(last.id, probe.id);
    await stores.probes.assignToActivity([...paused.map((p) => p.id), probe.id], latest.id);
    return latest.id;
  }

  private async startActivity(probe: Probe, stores: TrackerStores): Promise<number> {
    const activity = await stores.activities.create();
    await stores.probes.assignToActivity([probe.id], activity.id);
    return activity.id;
  }
}
