import type { UnitScales } from './units';

export type StoreDriver = 'postgres' | 'memory';
export type StravaUploadMode = 'summary' | 'gpx';

export interface DatabaseConfig {
  host: string | undefined;
  port: number;
  name: string | undefined;
  user: string | undefined;
  password: string | undefined;
  schema: string;
}

export interface StravaConfig {
  enabled: boolean;
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  mode: StravaUploadMode;
  sportType: string;
  uploadPollAttempts: number;
  uploadPollIntervalMs: number;
}

export interface TrackerConfig {
  port: number;
  deviceId: string;
  timezone: string;
  inactivityThresholdMs: number;
  dedupWindowMs: number;
  dashboardLimit: number;
  scales: UnitScales;
  store: StoreDriver;
  migrateOnStart: boolean;
  database: DatabaseConfig;
  strava: StravaConfig;
  autoUpload: {
    enabled: boolean;
    cron: string;
  };
}

type Env = Record<string, string | undefined>;

const MINUTE_MS = 60 * 1000;

export const DEFAULT_UNIT_SCALES: UnitScales = {
  distance: 16,
  altitudeGain: 2,
  // The device reports a third of a km/h
  maxSpeed: 1 / 10.8,
  movingTime: 1,
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === null) return fallback;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return fallback;
}

export function parseNumber(value: string | undefined, fallback: number, min: number, max: number): number {
  if (value === undefined || value === null || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.min(max, Math.max(min, parsed));
}

export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch (error) {
    if (error instanceof RangeError) return false;
    throw error;
  }
}

const parseStoreDriver = (value: string | undefined): StoreDriver => {
  const normalized = (value || 'postgres').trim().toLowerCase();
  if (normalized === 'postgres' || normalized === 'memory') return normalized;
  throw new ConfigError(`Unknown STORE_DRIVER "${value}" (expected postgres or memory)`);
};

const parseUploadMode = (value: string | undefined): StravaUploadMode => {
  const normalized = (value || 'summary').trim().toLowerCase();
  if (normalized === 'summary' || normalized === 'gpx') return normalized;
  throw new ConfigError(`Unknown STRAVA_UPLOAD_MODE "${value}" (expected summary or gpx)`);
};

const parseSchema = (value: string | undefined): string => {
  const schema = (value || 'public').trim();
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(schema)) {
    throw new ConfigError(`Invalid DB_SCHEMA "${value}"`);
  }
  return schema;
};

export function loadDatabaseConfig(env: Env = process.env): DatabaseConfig {
  return {
    host: env.DB_HOST,
    port: parseNumber(env.DB_PORT, 5432, 1, 65535),
    name: env.DB_NAME,
    user: env.DB_USER,
    password: env.DB_PASSWORD,
    schema: parseSchema(env.DB_SCHEMA),
  };
}

/**
 * Reads every setting once; the result is passed to the services that need it.
 */
export function loadTrackerConfig(env: Env = process.env): TrackerConfig {
  const deviceId = (env.DEVICE_ID || '').trim();
  if (!deviceId) {
    throw new ConfigError('DEVICE_ID is required');
  }

  const timezone = (env.TRACKER_TIMEZONE || env.TZ || 'UTC').trim();
  if (!isValidTimezone(timezone)) {
    throw new ConfigError(`Unknown timezone "${timezone}"`);
  }

  const clientId = (env.STRAVA_CLIENT_ID || '').trim();
  const clientSecret = (env.STRAVA_CLIENT_SECRET || '').trim();
  const refreshToken = (env.STRAVA_REFRESH_TOKEN || '').trim();

  return {
    port: parseNumber(env.API_PORT, 3001, 1, 65535),
    deviceId,
    timezone,
    inactivityThresholdMs: parseNumber(env.INACTIVITY_THRESHOLD_MINUTES, 60, 1, 24 * 60) * MINUTE_MS,
    dedupWindowMs: parseNumber(env.SEQUENCE_DEDUP_WINDOW_MINUTES, 60, 0, 7 * 24 * 60) * MINUTE_MS,
    dashboardLimit: Math.round(parseNumber(env.DASHBOARD_PROBE_LIMIT, 50, 1, 500)),
    scales: {
      distance: parseNumber(env.SCALE_DISTANCE, DEFAULT_UNIT_SCALES.distance, 0, Number.MAX_VALUE),
      altitudeGain: parseNumber(env.SCALE_ALTITUDE_GAIN, DEFAULT_UNIT_SCALES.altitudeGain, 0, Number.MAX_VALUE),
      maxSpeed: parseNumber(env.SCALE_MAX_SPEED, DEFAULT_UNIT_SCALES.maxSpeed, 0, Number.MAX_VALUE),
      movingTime: parseNumber(env.SCALE_MOVING_TIME, DEFAULT_UNIT_SCALES.movingTime, 0, Number.MAX_VALUE),
    },
    store: parseStoreDriver(env.STORE_DRIVER),
    migrateOnStart: parseBoolean(env.MIGRATE_ON_START, false),
    database: loadDatabaseConfig(env),
    strava: {
      enabled: parseBoolean(env.ADAPTER_STRAVA_ENABLED, true) && Boolean(clientId && clientSecret && refreshToken),
      clientId,
      clientSecret,
      refreshToken,
      mode: parseUploadMode(env.STRAVA_UPLOAD_MODE),
      sportType: (env.STRAVA_SPORT_TYPE || 'Ride').trim(),
      uploadPollAttempts: Math.round(parseNumber(env.STRAVA_UPLOAD_POLL_ATTEMPTS, 10, 0, 60)),
      uploadPollIntervalMs: parseNumber(env.STRAVA_UPLOAD_POLL_INTERVAL_MS, 2000, 0, 60 * 1000),
    },
    autoUpload: {
      enabled: parseBoolean(env.AUTO_UPLOAD_ENABLED, false),
      cron: (env.AUTO_UPLOAD_CRON || '*/15 * * * *').trim(),
    },
  };
}
