import type { StravaConfig } from '../config';
import type { ActivitySummary } from '../aggregator';
import { UploadError } from '../errors';
import { formatStravaError, StravaAPIService } from '../stravaAPI';
import type { UploadAdapter, UploadCapabilities, UploadRequest } from './types';

export const buildStravaDescription = (summary: ActivitySummary): string => {
  const lines = [`Elevation gain: ${Math.round(summary.totalAltGain)} m`];
  if (summary.maxSpeed !== null) {
    lines.push(`Max speed: ${(summary.maxSpeed * 3.6).toFixed(1)} km/h`);
  }
  if (summary.totalMovingTime !== null) {
    lines.push(`Moving time: ${Math.round(summary.totalMovingTime / 60)} min`);
  }
  lines.push(`Recorded by GPS tracker (${summary.probeCount} probes)`);
  return lines.join('\n');
};

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class StravaUploadAdapter implements UploadAdapter {
  readonly id = 'strava';
  readonly name = 'Strava';
  readonly enabled: boolean;
  readonly capabilities: UploadCapabilities;

  private api: StravaAPIService | null = null;

  constructor(
    private readonly config: StravaConfig,
    private readonly createApi: (config: StravaConfig) => StravaAPIService = (cfg) => new StravaAPIService(cfg)
  ) {
    this.enabled = config.enabled;
    this.capabilities = {
      supportsSummaryUpload: config.enabled && config.mode === 'summary',
      supportsTrackUpload: config.enabled && config.mode === 'gpx',
    };
  }

  private getApi(): StravaAPIService {
    if (!this.api) this.api = this.createApi(this.config);
    return this.api;
  }

  async upload(request: UploadRequest): Promise<string> {
    try {
      return this.config.mode === 'gpx'
        ? await this.uploadTrack(request)
        : await this.uploadSummary(request);
    } catch (error) {
      if (error instanceof UploadError) throw error;
      throw new UploadError(formatStravaError(error), { cause: error });
    }
  }

  private async uploadSummary(request: UploadRequest): Promise<string> {
    const created = await this.getApi().createActivity({
      name: request.name,
      sport_type: this.config.sportType,
      start_date_local: request.summary.startLocal,
      // Strava rejects zero-length activities
      elapsed_time: Math.max(1, request.summary.durationSec),
      distance: request.summary.totalDistance,
      description: buildStravaDescription(request.summary),
      trainer: 0,
      commute: 0,
    });
    return String(created.id);
  }

  private async uploadTrack(request: UploadRequest): Promise<string> {
    const api = this.getApi();
    const upload = await api.uploadFile(request.gpx, {
      name: request.name,
      externalId: `tracker-activity-${request.activity.id}`,
      description: buildStravaDescription(request.summary),
    });

    let current = upload;
    for (
      let attempt = 0;
      attempt < this.config.uploadPollAttempts && current.activity_id === null && !current.error;
      attempt += 1
    ) {
      await sleep(this.config.uploadPollIntervalMs);
      current = await api.getUpload(upload.id);
    }

    if (current.error) {
      throw new UploadError(`Strava rejected the upload: ${current.error}`);
    }
    if (current.activity_id !== null) {
      return String(current.activity_id);
    }
    console.warn(`⏳ Strava upload ${upload.id} still processing (${current.status})`);
    return `upload/${upload.id}`;
  }
}
