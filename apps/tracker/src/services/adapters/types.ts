import type { ActivitySummary } from '../aggregator';
import type { Activity, Probe } from '../store/types';

export type AdapterId = string;

export interface UploadCapabilities {
  supportsSummaryUpload: boolean;
  supportsTrackUpload: boolean;
}

export interface UploadRequest {
  activity: Activity;
  summary: ActivitySummary;
  probes: Probe[];
  name: string;
  /** GPX export of `probes` */
  gpx: string;
}

export interface UploadAdapter {
  id: AdapterId;
  name: string;
  enabled: boolean;
  capabilities: UploadCapabilities;
  /** Resolves with the external reference of the created item, rejects on failure. */
  upload: (request: UploadRequest) => Promise<string>;
}

export interface UploadAdapterInfo {
  id: AdapterId;
  name: string;
  enabled: boolean;
  capabilities: UploadCapabilities;
}

export interface UploadCapabilitiesResponse {
  adapters: UploadAdapterInfo[];
  active_adapters: AdapterId[];
  capabilities: UploadCapabilities;
}

export const emptyCapabilities = (): UploadCapabilities => ({
  supportsSummaryUpload: false,
  supportsTrackUpload: false,
});
