export interface Probe {
  id: number;
  seq: number;
  receivedAt: Date;
  lat: number;
  lng: number;
  alt: number | null;
  /** Meters travelled since the previous report. */
  dist: number;
  /** Positive elevation gain since the previous report, in meters. */
  altGain: number;
  /** m/s; null on firmware that reports moving time instead. */
  maxSpeed: number | null;
  /** Seconds; null on firmware that reports max speed instead. */
  movingTime: number | null;
  activityId: number | null;
}

export type NewProbe = Omit<Probe, 'id' | 'activityId'>;

export interface Activity {
  id: number;
  createdAt: Date;
  externalRef: string | null;
  uploadedAt: Date | null;
}

export const isIdleProbe = (probe: Pick<Probe, 'dist'>): boolean => probe.dist === 0;

export interface ProbeStore {
  /** Always stores the probe without an activity. */
  insert(probe: NewProbe): Promise<Probe>;
  findById(id: number): Promise<Probe | null>;
  /** Latest probe with this sequence number received at or after `since`. */
  findRecentBySequence(seq: number, since: Date): Promise<Probe | null>;
  /** Probes with `afterId < id < beforeId`, in id order. */
  listBetween(afterId: number, beforeId: number): Promise<Probe[]>;
  /** Most recently received first. */
  listRecent(limit: number): Promise<Probe[]>;
  /** Probes with `from <= receivedAt < to`, in id order. */
  listByTimeRange(from: Date, to: Date): Promise<Probe[]>;
  listByActivity(activityId: number): Promise<Probe[]>;
  findLastOfActivity(activityId: number): Promise<Probe | null>;
  assignToActivity(probeIds: number[], activityId: number): Promise<void>;
  /** Moves every probe of `fromActivityId` to `toActivityId`, returns how many moved. */
  reassignActivity(fromActivityId: number, toActivityId: number): Promise<number>;
}

export interface ActivityStore {
  create(): Promise<Activity>;
  findById(id: number): Promise<Activity | null>;
  /** Activity with the greatest id. */
  findLatest(): Promise<Activity | null>;
  /** Newest first. */
  list(limit: number): Promise<Activity[]>;
  /** Activities without an external reference whose last probe was received before `closedBefore`, oldest first. */
  listPendingUpload(closedBefore: Date, limit: number): Promise<Activity[]>;
  /** Only succeeds while no reference is stored; returns whether it was written. */
  setExternalRef(id: number, externalRef: string, uploadedAt: Date): Promise<boolean>;
  /** The activity must no longer own probes. */
  delete(id: number): Promise<void>;
}

export interface TrackerStores {
  probes: ProbeStore;
  activities: ActivityStore;
}

/**
 * Reads go through `probes`/`activities` directly. Writes that must not
 * interleave (ingestion, merge, upload bookkeeping) run in `withTransaction`,
 * which executes one callback at a time and commits or discards it as a whole.
 */
export interface TrackerStore extends TrackerStores {
  readonly driver: 'postgres' | 'memory';
  withTransaction<T>(run: (stores: TrackerStores) => Promise<T>): Promise<T>;
  testConnection(): Promise<boolean>;
  close(): Promise<void>;
}
