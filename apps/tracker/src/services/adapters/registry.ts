import type { TrackerConfig } from '../config';
import { StravaUploadAdapter } from './stravaUploadAdapter';
import {
  AdapterId,
  emptyCapabilities,
  UploadAdapter,
  UploadCapabilities,
  UploadCapabilitiesResponse,
} from './types';

export class UploadAdapterRegistry {
  private readonly adapters = new Map<AdapterId, UploadAdapter>();

  registerAdapter(adapter: UploadAdapter): void {
    this.adapters.set(adapter.id, adapter);
  }

  getAdapter(id: AdapterId): UploadAdapter | undefined {
    return this.adapters.get(id);
  }

  getAdapters(): UploadAdapter[] {
    return Array.from(this.adapters.values());
  }

  getEnabledAdapters(): UploadAdapter[] {
    return this.getAdapters().filter((adapter) => adapter.enabled);
  }

  /** First enabled adapter, in registration order. */
  getDefaultAdapter(): UploadAdapter | null {
    return this.getEnabledAdapters()[0] || null;
  }

  getCapabilities(): UploadCapabilitiesResponse {
    const enabled = this.getEnabledAdapters();
    const merged = enabled.reduce<UploadCapabilities>((acc, adapter) => {
      acc.supportsSummaryUpload = acc.supportsSummaryUpload || adapter.capabilities.supportsSummaryUpload;
      acc.supportsTrackUpload = acc.supportsTrackUpload || adapter.capabilities.supportsTrackUpload;
      return acc;
    }, emptyCapabilities());

    return {
      adapters: this.getAdapters().map(({ id, name, enabled: isEnabled, capabilities }) => ({
        id,
        name,
        enabled: isEnabled,
        capabilities,
      })),
      active_adapters: enabled.map((adapter) => adapter.id),
      capabilities: merged,
    };
  }
}

export const buildDefaultRegistry = (config: Pick<TrackerConfig, 'strava'>): UploadAdapterRegistry => {
  const registry = new UploadAdapterRegistry();

  const strava = new StravaUploadAdapter(config.strava);
  if (!strava.enabled) {
    console.log('🔌 Strava upload disabled (set ADAPTER_STRAVA_ENABLED and STRAVA_* credentials)');
  }
  registry.registerAdapter(strava);

  return registry;
};
