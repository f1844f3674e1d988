import * as cron from 'node-cron';
import type { TrackerService } from './tracker';

export interface AutoUploadSettings {
  enabled: boolean;
  cron: string;
  timezone: string;
}

/**
 * Periodically uploads closed activities. Runs never overlap: a tick that
 * fires while the previous run is still busy is skipped.
 */
export class AutoUploadScheduler {
  private task: cron.ScheduledTask | null = null;
  private running = false;

  constructor(
    private readonly service: TrackerService,
    private readonly settings: AutoUploadSettings
  ) {}

  start(): boolean {
    this.stop();

    if (!this.settings.enabled) {
      console.log('⏸️  Auto-upload schedule disabled');
      return false;
    }
    if (!cron.validate(this.settings.cron)) {
      console.warn(`⚠️  Invalid auto-upload cron expression: ${this.settings.cron}`);
      return false;
    }

    this.task = cron.schedule(
      this.settings.cron,
      () => {
        this.runOnce().catch((error: unknown) => {
          console.error('❌ Auto-upload failed:', error instanceof Error ? error.message : error);
        });
      },
      { timezone: this.settings.timezone }
    );
    console.log(`⏰ Auto-upload schedule: ${this.settings.cron} (${this.settings.timezone})`);
    return true;
  }

  async runOnce(): Promise<boolean> {
    if (this.running) {
      console.log('⏭️  Skip auto-upload: previous run still busy');
      return false;
    }

    this.running = true;
    try {
      const result = await this.service.uploadClosedActivities();
      if (result.attempted > 0) {
        console.log(`✅ Auto-upload: ${result.uploaded} uploaded, ${result.failed} failed`);
      }
      return true;
    } finally {
      this.running = false;
    }
  }

  isScheduled(): boolean {
    return this.task !== null;
  }

  stop(): void {
    if (!this.task) return;
    this.task.stop();
    this.task = null;
  }
}
