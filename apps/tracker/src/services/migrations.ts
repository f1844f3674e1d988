import fs from 'fs';
import path from 'path';
import type { Pool } from 'pg';
import type { DatabaseConfig } from './config';
import { createPool } from './database';

export type MigrationFile = {
  version: string;
  name: string;
  filename: string;
  fullPath: string;
};

type AppliedRow = { version: string };

const getMigrationDirectory = () => path.join(__dirname, '..', '..', 'migrations');

export const parseMigrationName = (filename: string): { version: string; name: string } => {
  const base = filename.replace(/\.sql$/i, '');
  const [versionPart, ...rest] = base.split('_');
  if (/^\d+$/.test(versionPart)) {
    return { version: versionPart, name: rest.join('_') || base };
  }
  return { version: base, name: base };
};

export const listMigrationFiles = (dir: string = getMigrationDirectory()): MigrationFile[] => {
  if (!fs.existsSync(dir)) return [];
  const files = fs.readdirSync(dir).filter((file) => file.endsWith('.sql')).sort();
  return files.map((filename) => {
    const parsed = parseMigrationName(filename);
    return {
      version: parsed.version,
      name: parsed.name,
      filename,
      fullPath: path.join(dir, filename),
    };
  });
};

const ensureMigrationsTable = async (pool: Pool, schema: string) => {
  await pool.query(`CREATE SCHEMA IF NOT EXISTS ${schema}`);
  await pool.query(`
    CREATE TABLE IF NOT EXISTS ${schema}.schema_migrations (
      version VARCHAR(50) PRIMARY KEY,
      name TEXT,
      applied_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP
    )
  `);
};

const fetchAppliedMigrations = async (pool: Pool, schema: string) => {
  const result = await pool.query<AppliedRow>(`SELECT version FROM ${schema}.schema_migrations`);
  return new Set(result.rows.map((row) => String(row.version)));
};

export const checkPendingMigrations = async (config: DatabaseConfig) => {
  const pool = createPool(config);
  try {
    await ensureMigrationsTable(pool, config.schema);
    const migrations = listMigrationFiles();
    const applied = await fetchAppliedMigrations(pool, config.schema);
    return {
      pending: migrations.filter((migration) => !applied.has(migration.version)),
      applied: migrations.filter((migration) => applied.has(migration.version)),
    };
  } finally {
    await pool.end();
  }
};

/**
 * Applies every pending file in version order, each in its own transaction.
 * Stops at the first failure; earlier files stay applied.
 */
export const runMigrations = async (config: DatabaseConfig) => {
  const { schema } = config;
  const pool = createPool(config);
  try {
    await ensureMigrationsTable(pool, schema);
    const migrations = listMigrationFiles();
    const applied = await fetchAppliedMigrations(pool, schema);
    const pending = migrations.filter((migration) => !applied.has(migration.version));
    const skipped = migrations.filter((migration) => applied.has(migration.version));
    const appliedNow: MigrationFile[] = [];

    for (const migration of pending) {
      const sql = fs.readFileSync(migration.fullPath, 'utf8');
      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        await client.query(`SET LOCAL search_path TO ${schema}, public`);
        if (sql.trim().length > 0) {
          await client.query(sql);
        }
        await client.query(
          `INSERT INTO ${schema}.schema_migrations (version, name) VALUES ($1, $2)`,
          [migration.version, migration.name]
        );
        await client.query('COMMIT');
        appliedNow.push(migration);
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      } finally {
        client.release();
      }
    }

    return { applied: appliedNow, skipped };
  } finally {
    await pool.end();
  }
};
