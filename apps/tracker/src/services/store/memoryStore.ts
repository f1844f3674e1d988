import {
  Activity,
  ActivityStore,
  NewProbe,
  Probe,
  ProbeStore,
  TrackerStore,
  TrackerStores,
} from './types';

interface MemoryState {
  probes: Map<number, Probe>;
  activities: Map<number, Activity>;
  nextProbeId: number;
  nextActivityId: number;
}

const copyProbe = (probe: Probe): Probe => ({ ...probe, receivedAt: new Date(probe.receivedAt) });

const copyActivity = (activity: Activity): Activity => ({
  ...activity,
  createdAt: new Date(activity.createdAt),
  uploadedAt: activity.uploadedAt ? new Date(activity.uploadedAt) : null,
});

const byIdAsc = (a: { id: number }, b: { id: number }) => a.id - b.id;

class MemoryProbeStore implements ProbeStore {
  constructor(private readonly state: () => MemoryState) {}

  private all(): Probe[] {
    return Array.from(this.state().probes.values()).sort(byIdAsc);
  }

  async insert(probe: NewProbe): Promise<Probe> {
    const state = this.state();
    const stored: Probe = { ...probe, id: state.nextProbeId, activityId: null };
    state.nextProbeId += 1;
    state.probes.set(stored.id, stored);
    return copyProbe(stored);
  }

  async findById(id: number): Promise<Probe | null> {
    const probe = this.state().probes.get(id);
    return probe ? copyProbe(probe) : null;
  }

  async findRecentBySequence(seq: number, since: Date): Promise<Probe | null> {
    const matches = this.all().filter(
      (probe) => probe.seq === seq && probe.receivedAt.getTime() >= since.getTime()
    );
    const latest = matches[matches.length - 1];
    return latest ? copyProbe(latest) : null;
  }

  async listBetween(afterId: number, beforeId: number): Promise<Probe[]> {
    return this.all()
      .filter((probe) => probe.id > afterId && probe.id < beforeId)
      .map(copyProbe);
  }

  async listRecent(limit: number): Promise<Probe[]> {
    return this.all()
      .sort((a, b) => b.receivedAt.getTime() - a.receivedAt.getTime() || b.id - a.id)
      .slice(0, limit)
      .map(copyProbe);
  }

  async listByTimeRange(from: Date, to: Date): Promise<Probe[]> {
    return this.all()
      .filter((probe) => {
        const time = probe.receivedAt.getTime();
        return time >= from.getTime() && time < to.getTime();
      })
      .map(copyProbe);
  }

  async listByActivity(activityId: number): Promise<Probe[]> {
    return this.all().filter((probe) => probe.activityId === activityId).map(copyProbe);
  }

  async findLastOfActivity(activityId: number): Promise<Probe | null> {
    const probes = await this.listByActivity(activityId);
    return probes[probes.length - 1] ?? null;
  }

  async assignToActivity(probeIds: number[], activityId: number): Promise<void> {
    const { probes, activities } = this.state();
    if (!activities.has(activityId)) {
      throw new Error(`Activity ${activityId} does not exist`);
    }
    for (const id of probeIds) {
      const probe = probes.get(id);
      if (!probe) throw new Error(`Probe ${id} does not exist`);
      probe.activityId = activityId;
    }
  }

  async reassignActivity(fromActivityId: number, toActivityId: number): Promise<number> {
    const { probes, activities } = this.state();
    if (!activities.has(toActivityId)) {
      throw new Error(`Activity ${toActivityId} does not exist`);
    }
    let moved = 0;
    for (const probe of probes.values()) {
      if (probe.activityId === fromActivityId) {
        probe.activityId = toActivityId;
        moved += 1;
      }
    }
    return moved;
  }
}

class MemoryActivityStore implements ActivityStore {
  constructor(
    private readonly state: () => MemoryState,
    private readonly now: () => Date
  ) {}

  private lastProbeTime(activityId: number): number | null {
    let last: number | null = null;
    for (const probe of this.state().probes.values()) {
      if (probe.activityId !== activityId) continue;
      const time = probe.receivedAt.getTime();
      if (last === null || time > last) last = time;
    }
    return last;
  }

  async create(): Promise<Activity> {
    const state = this.state();
    const activity: Activity = {
      id: state.nextActivityId,
      createdAt: this.now(),
      externalRef: null,
      uploadedAt: null,
    };
    state.nextActivityId += 1;
    state.activities.set(activity.id, activity);
    return copyActivity(activity);
  }

  async findById(id: number): Promise<Activity | null> {
    const activity = this.state().activities.get(id);
    return activity ? copyActivity(activity) : null;
  }

  async findLatest(): Promise<Activity | null> {
    const [latest] = await this.list(1);
    return latest ?? null;
  }

  async list(limit: number): Promise<Activity[]> {
    return Array.from(this.state().activities.values())
      .sort((a, b) => b.id - a.id)
      .slice(0, limit)
      .map(copyActivity);
  }

  async listPendingUpload(closedBefore: Date, limit: number): Promise<Activity[]> {
    return Array.from(this.state().activities.values())
      .sort(byIdAsc)
      .filter((activity) => {
        if (activity.externalRef !== null) return false;
        const last = this.lastProbeTime(activity.id);
        return last !== null && last < closedBefore.getTime();
      })
      .slice(0, limit)
      .map(copyActivity);
  }

  async setExternalRef(id: number, externalRef: string, uploadedAt: Date): Promise<boolean> {
    const activity = this.state().activities.get(id);
    if (!activity || activity.externalRef !== null) return false;
    activity.externalRef = externalRef;
    activity.uploadedAt = new Date(uploadedAt);
    return true;
  }

  async delete(id: number): Promise<void> {
    const state = this.state();
    for (const probe of state.probes.values()) {
      if (probe.activityId === id) {
        throw new Error(`Activity ${id} still owns probe ${probe.id}`);
      }
    }
    state.activities.delete(id);
  }
}

/**
 * Process-local store, used by the tests and by `STORE_DRIVER=memory`.
 * Transactions run one after another on a private copy of the state, which
 * replaces the committed state only when the callback succeeds. Reads outside
 * a transaction see committed data only.
 */
export class MemoryTrackerStore implements TrackerStore {
  readonly driver = 'memory' as const;
  readonly probes: ProbeStore;
  readonly activities: ActivityStore;

  private state: MemoryState = {
    probes: new Map(),
    activities: new Map(),
    nextProbeId: 1,
    nextActivityId: 1,
  };
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly now: () => Date = () => new Date()) {
    const getState = () => this.state;
    this.probes = new MemoryProbeStore(getState);
    this.activities = new MemoryActivityStore(getState, now);
  }

  withTransaction<T>(run: (stores: TrackerStores) => Promise<T>): Promise<T> {
    const result = this.queue.then(async () => {
      const working = structuredClone(this.state);
      const getWorking = () => working;
      const value = await run({
        probes: new MemoryProbeStore(getWorking),
        activities: new MemoryActivityStore(getWorking, this.now),
      });
      this.state = working;
      return value;
    });
    // The caller sees failures through `result`; the queue only orders work.
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  async testConnection(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    return;
  }
}
