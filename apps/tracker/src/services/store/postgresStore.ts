import type { PoolClient } from 'pg';
import DatabaseService from '../database';
import type { DatabaseConfig } from '../config';
import {
  Activity,
  ActivityStore,
  NewProbe,
  Probe,
  ProbeStore,
  TrackerStore,
  TrackerStores,
} from './types';

// Type aliases, not interfaces: pg requires rows to be indexable
type ProbeRow = {
  id: number;
  seq: number;
  received_at: Date;
  lat: number;
  lng: number;
  alt: number | null;
  dist: number;
  alt_gain: number;
  max_speed: number | null;
  moving_time: number | null;
  activity_id: number | null;
};

type ActivityRow = {
  id: number;
  created_at: Date;
  external_ref: string | null;
  uploaded_at: Date | null;
};

const PROBE_COLUMNS = 'id, seq, received_at, lat, lng, alt, dist, alt_gain, max_speed, moving_time, activity_id';
const ACTIVITY_COLUMNS = 'id, created_at, external_ref, uploaded_at';

const toProbe = (row: ProbeRow): Probe => ({
  id: row.id,
  seq: row.seq,
  receivedAt: row.received_at,
  lat: row.lat,
  lng: row.lng,
  alt: row.alt,
  dist: row.dist,
  altGain: row.alt_gain,
  maxSpeed: row.max_speed,
  movingTime: row.moving_time,
  activityId: row.activity_id,
});

const toActivity = (row: ActivityRow): Activity => ({
  id: row.id,
  createdAt: row.created_at,
  externalRef: row.external_ref,
  uploadedAt: row.uploaded_at,
});

/**
 * Every call gets a client from `connection`: the transaction's client inside
 * `withTransaction`, a pooled one otherwise.
 */
type Connection = <T>(work: (client: PoolClient) => Promise<T>) => Promise<T>;

class PostgresProbeStore implements ProbeStore {
  constructor(private readonly connection: Connection) {}

  private async many(sql: string, params: unknown[]): Promise<Probe[]> {
    const result = await this.connection((client) => client.query<ProbeRow>(sql, params));
    return result.rows.map(toProbe);
  }

  private async one(sql: string, params: unknown[]): Promise<Probe | null> {
    const [probe] = await this.many(sql, params);
    return probe ?? null;
  }

  async insert(probe: NewProbe): Promise<Probe> {
    const inserted = await this.one(
      `
      INSERT INTO probes (seq, received_at, lat, lng, alt, dist, alt_gain, max_speed, moving_time)
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
      RETURNING ${PROBE_COLUMNS}
      `,
      [
        probe.seq,
        probe.receivedAt,
        probe.lat,
        probe.lng,
        probe.alt,
        probe.dist,
        probe.altGain,
        probe.maxSpeed,
        probe.movingTime,
      ]
    );
    if (!inserted) throw new Error('Probe insert returned no row');
    return inserted;
  }

  async findById(id: number): Promise<Probe | null> {
    return this.one(`SELECT ${PROBE_COLUMNS} FROM probes WHERE id = $1`, [id]);
  }

  async findRecentBySequence(seq: number, since: Date): Promise<Probe | null> {
    return this.one(
      `
      SELECT ${PROBE_COLUMNS}
      FROM probes
      WHERE seq = $1 AND received_at >= $2
      ORDER BY id DESC
      LIMIT 1
      `,
      [seq, since]
    );
  }

  async listBetween(afterId: number, beforeId: number): Promise<Probe[]> {
    return this.many(
      `SELECT ${PROBE_COLUMNS} FROM probes WHERE id > $1 AND id < $2 ORDER BY id`,
      [afterId, beforeId]
    );
  }

  async listRecent(limit: number): Promise<Probe[]> {
    return this.many(
      `SELECT ${PROBE_COLUMNS} FROM probes ORDER BY received_at DESC, id DESC LIMIT $1`,
      [limit]
    );
  }

  async listByTimeRange(from: Date, to: Date): Promise<Probe[]> {
    return this.many(
      `SELECT ${PROBE_COLUMNS} FROM probes WHERE received_at >= $1 AND received_at < $2 ORDER BY id`,
      [from, to]
    );
  }

  async listByActivity(activityId: number): Promise<Probe[]> {
    return this.many(
      `SELECT ${PROBE_COLUMNS} FROM probes WHERE activity_id = $1 ORDER BY id`,
      [activityId]
    );
  }

  async findLastOfActivity(activityId: number): Promise<Probe | null> {
    return this.one(
      `SELECT ${PROBE_COLUMNS} FROM probes WHERE activity_id = $1 ORDER BY id DESC LIMIT 1`,
      [activityId]
    );
  }

  async assignToActivity(probeIds: number[], activityId: number): Promise<void> {
    if (probeIds.length === 0) return;
    await this.connection((client) => client.query(
      'UPDATE probes SET activity_id = $1 WHERE id = ANY($2::int[])',
      [activityId, probeIds]
    ));
  }

  async reassignActivity(fromActivityId: number, toActivityId: number): Promise<number> {
    const result = await this.connection((client) => client.query(
      'UPDATE probes SET activity_id = $2 WHERE activity_id = $1',
      [fromActivityId, toActivityId]
    ));
    return result.rowCount ?? 0;
  }
}

class PostgresActivityStore implements ActivityStore {
  constructor(private readonly connection: Connection) {}

  private async many(sql: string, params: unknown[]): Promise<Activity[]> {
    const result = await this.connection((client) => client.query<ActivityRow>(sql, params));
    return result.rows.map(toActivity);
  }

  async create(): Promise<Activity> {
    const [activity] = await this.many(
      `INSERT INTO activities DEFAULT VALUES RETURNING ${ACTIVITY_COLUMNS}`,
      []
    );
    if (!activity) throw new Error('Activity insert returned no row');
    return activity;
  }

  async findById(id: number): Promise<Activity | null> {
    const [activity] = await this.many(
      `SELECT ${ACTIVITY_COLUMNS} FROM activities WHERE id = $1`,
      [id]
    );
    return activity ?? null;
  }

  async findLatest(): Promise<Activity | null> {
    const [activity] = await this.list(1);
    return activity ?? null;
  }

  async list(limit: number): Promise<Activity[]> {
    return this.many(
      `SELECT ${ACTIVITY_COLUMNS} FROM activities ORDER BY id DESC LIMIT $1`,
      [limit]
    );
  }

  async listPendingUpload(closedBefore: Date, limit: number): Promise<Activity[]> {
    return this.many(
      `
      SELECT a.id, a.created_at, a.external_ref, a.uploaded_at
      FROM activities a
      JOIN probes p ON p.activity_id = a.id
      WHERE a.external_ref IS NULL
      GROUP BY a.id
      HAVING MAX(p.received_at) < $1
      ORDER BY a.id
      LIMIT $2
      `,
      [closedBefore, limit]
    );
  }

  async setExternalRef(id: number, externalRef: string, uploadedAt: Date): Promise<boolean> {
    const result = await this.connection((client) => client.query(
      `
      UPDATE activities
      SET external_ref = $2, uploaded_at = $3
      WHERE id = $1 AND external_ref IS NULL
      `,
      [id, externalRef, uploadedAt]
    ));
    return (result.rowCount ?? 0) > 0;
  }

  async delete(id: number): Promise<void> {
    await this.connection((client) => client.query('DELETE FROM activities WHERE id = $1', [id]));
  }
}

const bindStores = (connection: Connection): TrackerStores => ({
  probes: new PostgresProbeStore(connection),
  activities: new PostgresActivityStore(connection),
});

export class PostgresTrackerStore implements TrackerStore {
  readonly driver = 'postgres' as const;
  readonly probes: ProbeStore;
  readonly activities: ActivityStore;
  private readonly db: DatabaseService;

  constructor(config: DatabaseConfig) {
    this.db = new DatabaseService(config);
    const pooled = bindStores((work) => this.db.withClient(work));
    this.probes = pooled.probes;
    this.activities = pooled.activities;
  }

  withTransaction<T>(run: (stores: TrackerStores) => Promise<T>): Promise<T> {
    return this.db.withTransaction((client) => run(bindStores((work) => work(client))));
  }

  testConnection(): Promise<boolean> {
    return this.db.testConnection();
  }

  close(): Promise<void> {
    return this.db.close();
  }
}
