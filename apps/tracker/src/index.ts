import * as dotenv from 'dotenv';
import * as path from 'path';
import { createApp } from './app';
import { buildDefaultRegistry } from './services/adapters/registry';
import { AutoUploadScheduler } from './services/autoUpload';
import { loadTrackerConfig, TrackerConfig } from './services/config';
import { checkPendingMigrations, runMigrations } from './services/migrations';
import { MemoryTrackerStore } from './services/store/memoryStore';
import { PostgresTrackerStore } from './services/store/postgresStore';
import type { TrackerStore } from './services/store/types';
import { TrackerService } from './services/tracker';

// Load .env from project root (apps/tracker) - override existing env vars
dotenv.config({ path: path.join(__dirname, '../.env'), override: true });

const config = loadTrackerConfig();

const createStore = (settings: TrackerConfig): TrackerStore => {
  if (settings.store === 'memory') {
    console.warn('⚠️  STORE_DRIVER=memory: probes are lost on restart');
    return new MemoryTrackerStore();
  }
  return new PostgresTrackerStore(settings.database);
};

async function prepareDatabase(settings: TrackerConfig): Promise<void> {
  if (settings.store !== 'postgres') return;

  if (settings.migrateOnStart) {
    try {
      const result = await runMigrations(settings.database);
      if (result.applied.length > 0) {
        console.log(`✅ Applied ${result.applied.length} migration(s) on startup.`);
      }
    } catch (error) {
      console.warn('⚠️  Auto-migrate failed:', error instanceof Error ? error.message : error);
    }
  }

  try {
    const result = await checkPendingMigrations(settings.database);
    if (result.pending.length > 0) {
      console.warn(`⚠️  Database is missing ${result.pending.length} migration(s). Run: npm run db:migrate`);
      console.warn(`   Pending: ${result.pending.map((migration) => migration.filename).join(', ')}`);
    } else {
      console.log('✅ Database migrations up to date.');
    }
  } catch (error) {
    console.warn('⚠️  Could not check database migrations:', error instanceof Error ? error.message : error);
  }
}

const store = createStore(config);
const service = new TrackerService({
  config,
  store,
  adapters: buildDefaultRegistry(config),
});
const scheduler = new AutoUploadScheduler(service, {
  enabled: config.autoUpload.enabled,
  cron: config.autoUpload.cron,
  timezone: config.timezone,
});
const app = createApp({ service });

// Start server
const server = app.listen(config.port, () => {
  console.log(`🚀 Bike Tracker API running on port ${config.port}`);
  console.log(`📡 Device callback: http://localhost:${config.port}/new-probe`);
  console.log(`💚 Health check: http://localhost:${config.port}/api/health`);
  console.log(`⏱️  Inactivity threshold: ${config.inactivityThresholdMs / 60000} min (${config.timezone})`);

  prepareDatabase(config)
    .then(() => {
      scheduler.start();
    })
    .catch((error: unknown) => {
      console.error('❌ Startup tasks failed:', error instanceof Error ? error.message : error);
    });
});

// Graceful shutdown
const shutdown = () => {
  console.log('\n👋 Shutting down gracefully...');
  scheduler.stop();
  server.close(() => {
    store.close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('❌ Failed to close store:', error instanceof Error ? error.message : error);
        process.exit(1);
      });
  });
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
