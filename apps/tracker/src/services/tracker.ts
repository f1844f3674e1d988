import type { TrackerConfig } from './config';
import { ActivitySummary, summarizeActivity } from './aggregator';
import { buildActivityGpx } from './gpxExporter';
import { NotFoundError, UploadError, UploadUnavailableError, ValidationError } from './errors';
import { parseProbeForm } from './probeForm';
import { SegmentationEngine } from './segmentation';
import { RawReading, UnitNormalizer } from './units';
import type { UploadAdapterRegistry } from './adapters/registry';
import type { Activity, Probe, TrackerStore } from './store/types';

export type TrackerServiceConfig = Pick<
  TrackerConfig,
  'deviceId' | 'timezone' | 'inactivityThresholdMs' | 'dedupWindowMs' | 'dashboardLimit' | 'scales'
>;

export interface TrackerServiceDeps {
  config: TrackerServiceConfig;
  store: TrackerStore;
  adapters: UploadAdapterRegistry;
  now?: () => Date;
}

export interface IngestResult {
  deviceId: string;
  probe: Probe;
  activityId: number | null;
  /** True when the probe was a retransmission and nothing was stored. */
  duplicate: boolean;
  ackToken: string;
}

export interface ActivityOverview {
  activity: Activity;
  summary: ActivitySummary | null;
}

export interface ActivityDetail {
  activity: Activity;
  summary: ActivitySummary;
  probes: Probe[];
}

export interface MergeResult {
  sourceId: number;
  targetId: number;
  movedProbes: number;
}

export interface UploadResult {
  activityId: number;
  externalRef: string;
  alreadyUploaded: boolean;
  adapterId: string | null;
}

export interface UploadBatchResult {
  attempted: number;
  uploaded: number;
  failed: number;
}

/** Downlink payload for the device: the probe id as 8 bytes of hex. */
export const buildAckToken = (probeId: number): string => probeId.toString(16).padStart(16, '0');

export const buildActivityName = (activity: Activity, summary: ActivitySummary | null): string => {
  if (!summary) return `Ride #${activity.id}`;
  return `Ride #${activity.id} (${summary.startLocal.slice(0, 16).replace('T', ' ')})`;
};

export class TrackerService {
  private readonly config: TrackerServiceConfig;
  private readonly store: TrackerStore;
  private readonly adapters: UploadAdapterRegistry;
  private readonly normalizer: UnitNormalizer;
  private readonly engine: SegmentationEngine;
  private readonly now: () => Date;

  constructor(deps: TrackerServiceDeps) {
    this.config = deps.config;
    this.store = deps.store;
    this.adapters = deps.adapters;
    this.now = deps.now ?? (() => new Date());
    this.normalizer = new UnitNormalizer(deps.config.scales);
    this.engine = new SegmentationEngine({ inactivityThresholdMs: deps.config.inactivityThresholdMs });
  }

  get adapterRegistry(): UploadAdapterRegistry {
    return this.adapters;
  }

  get dashboardLimit(): number {
    return this.config.dashboardLimit;
  }

  checkStore(): Promise<boolean> {
    return this.store.testConnection();
  }

  async ingestForm(body: unknown): Promise<IngestResult> {
    const form = parseProbeForm(body, this.config.deviceId);
    return this.ingest(form.reading);
  }

  /**
   * Stores one reading and segments it, in a single transaction. A reading
   * whose sequence number was already received within the dedup window is
   * acknowledged again without being stored.
   */
  async ingest(reading: RawReading): Promise<IngestResult> {
    const normalized = this.normalizer.normalize(reading);

    return this.store.withTransaction(async (stores) => {
      const receivedAt = this.now();

      if (this.config.dedupWindowMs > 0) {
        const since = new Date(receivedAt.getTime() - this.config.dedupWindowMs);
        const existing = await stores.probes.findRecentBySequence(normalized.seq, since);
        if (existing) {
          console.log(`🔁 Duplicate probe seq=${normalized.seq} (already stored as #${existing.id})`);
          return {
            deviceId: this.config.deviceId,
            probe: existing,
            activityId: existing.activityId,
            duplicate: true,
            ackToken: buildAckToken(existing.id),
          };
        }
      }

      const inserted = await stores.probes.insert({ ...normalized, receivedAt });
      const activityId = await this.engine.assign(inserted, stores);
      const probe: Probe = { ...inserted, activityId };

      console.log(
        `📍 Probe #${probe.id} seq=${probe.seq} dist=${probe.dist}m -> ${activityId === null ? 'idle' : `activity #${activityId}`}`
      );

      return {
        deviceId: this.config.deviceId,
        probe,
        activityId,
        duplicate: false,
        ackToken: buildAckToken(probe.id),
      };
    });
  }

  async listRecentProbes(limit: number = this.config.dashboardLimit): Promise<Probe[]> {
    return this.store.probes.listRecent(limit);
  }

  async listProbesBetween(from: Date, to: Date): Promise<Probe[]> {
    if (from.getTime() >= to.getTime()) {
      throw new ValidationError('Invalid time range', ['from must be before to']);
    }
    return this.store.probes.listByTimeRange(from, to);
  }

  async listActivities(limit: number): Promise<ActivityOverview[]> {
    const activities = await this.store.activities.list(limit);
    return Promise.all(activities.map(async (activity) => {
      const probes = await this.store.probes.listByActivity(activity.id);
      return { activity, summary: summarizeActivity(probes, this.config.timezone) };
    }));
  }

  async getActivity(id: number): Promise<ActivityDetail> {
    const activity = await this.store.activities.findById(id);
    if (!activity) throw new NotFoundError('Activity', id);

    const probes = await this.store.probes.listByActivity(id);
    const summary = summarizeActivity(probes, this.config.timezone);
    if (!summary) {
      throw new Error(`Activity ${id} has no probes`);
    }
    return { activity, summary, probes };
  }

  /**
   * Moves every probe of `sourceId` to `targetId` and discards the source.
   */
  async mergeActivities(sourceId: number, targetId: number): Promise<MergeResult> {
    if (sourceId === targetId) {
      throw new ValidationError('Cannot merge an activity into itself');
    }

    return this.store.withTransaction(async (stores) => {
      const [source, target] = await Promise.all([
        stores.activities.findById(sourceId),
        stores.activities.findById(targetId),
      ]);
      if (!source) throw new NotFoundError('Activity', sourceId);
      if (!target) throw new NotFoundError('Activity', targetId);

      const movedProbes = await stores.probes.reassignActivity(sourceId, targetId);
      await stores.activities.delete(sourceId);

      console.log(`🔀 Merged activity #${sourceId} into #${targetId} (${movedProbes} probes)`);
      return { sourceId, targetId, movedProbes };
    });
  }

  async exportGpx(id: number): Promise<{ filename: string; gpx: string }> {
    const { activity, summary, probes } = await this.getActivity(id);
    return {
      filename: `activity-${activity.id}.gpx`,
      gpx: buildActivityGpx(probes, { name: buildActivityName(activity, summary) }),
    };
  }

  /**
   * Pushes an activity to an upload adapter. The external reference is stored
   * only after the adapter confirms; an activity that already has one is left
   * alone.
   */
  async uploadActivity(id: number, adapterId?: string): Promise<UploadResult> {
    const { activity, summary, probes } = await this.getActivity(id);
    if (activity.externalRef !== null) {
      return { activityId: id, externalRef: activity.externalRef, alreadyUploaded: true, adapterId: null };
    }

    const adapter = adapterId ? this.adapters.getAdapter(adapterId) : this.adapters.getDefaultAdapter();
    if (!adapter || !adapter.enabled) {
      throw new UploadUnavailableError(adapterId ? `Upload adapter "${adapterId}" is not enabled` : 'No upload adapter is enabled');
    }

    const name = buildActivityName(activity, summary);
    let externalRef: string;
    try {
      externalRef = await adapter.upload({
        activity,
        summary,
        probes,
        name,
        gpx: buildActivityGpx(probes, { name }),
      });
    } catch (error) {
      if (error instanceof UploadError) throw error;
      throw new UploadError(error instanceof Error ? error.message : String(error), { cause: error });
    }

    const stored = await this.store.withTransaction((stores) =>
      stores.activities.setExternalRef(id, externalRef, this.now())
    );
    if (!stored) {
      // Another upload finished first; keep its reference
      const current = await this.store.activities.findById(id);
      return {
        activityId: id,
        externalRef: current?.externalRef ?? externalRef,
        alreadyUploaded: true,
        adapterId: adapter.id,
      };
    }

    console.log(`📤 Uploaded activity #${id} to ${adapter.name} (${externalRef})`);
    return { activityId: id, externalRef, alreadyUploaded: false, adapterId: adapter.id };
  }

  /**
   * Uploads every activity whose last probe is older than the inactivity
   * threshold and that has no external reference yet. Failures are logged and
   * retried on the next call.
   */
  async uploadClosedActivities(limit: number = 20): Promise<UploadBatchResult> {
    const result: UploadBatchResult = { attempted: 0, uploaded: 0, failed: 0 };
    if (!this.adapters.getDefaultAdapter()) return result;

    const closedBefore = new Date(this.now().getTime() - this.config.inactivityThresholdMs);
    const pending = await this.store.activities.listPendingUpload(closedBefore, limit);

    for (const activity of pending) {
      result.attempted += 1;
      try {
        const upload = await this.uploadActivity(activity.id);
        if (!upload.alreadyUploaded) result.uploaded += 1;
      } catch (error) {
        result.failed += 1;
        console.error(`❌ Upload of activity #${activity.id} failed:`, error instanceof Error ? error.message : error);
      }
    }

    return result;
  }
}
