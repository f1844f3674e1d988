import { Router, Request, RequestHandler, Response } from 'express';
import multer from 'multer';
import type { ActivitySummary } from '../services/aggregator';
import {
  NotFoundError,
  UploadError,
  UploadUnavailableError,
  ValidationError,
} from '../services/errors';
import type { Activity, Probe } from '../services/store/types';
import type { TrackerService } from '../services/tracker';

const MAX_LIST_LIMIT = 500;

// Multipart forms carry only fields
const multipartFields = multer({ limits: { fields: 32, fieldSize: 1024 } }).none();

export const serializeProbe = (probe: Probe) => ({
  id: probe.id,
  seq: probe.seq,
  received_at: probe.receivedAt.toISOString(),
  lat: probe.lat,
  lng: probe.lng,
  alt: probe.alt,
  dist: probe.dist,
  alt_gain: probe.altGain,
  max_speed: probe.maxSpeed,
  moving_time: probe.movingTime,
  idle: probe.dist === 0,
  activity_id: probe.activityId,
});

export const serializeActivity = (activity: Activity) => ({
  id: activity.id,
  created_at: activity.createdAt.toISOString(),
  external_ref: activity.externalRef,
  uploaded_at: activity.uploadedAt ? activity.uploadedAt.toISOString() : null,
});

export const serializeSummary = (summary: ActivitySummary) => ({
  start_time: summary.startTime.toISOString(),
  end_time: summary.endTime.toISOString(),
  start_local: summary.startLocal,
  end_local: summary.endLocal,
  duration_sec: summary.durationSec,
  distance_m: summary.totalDistance,
  distance_km: summary.totalDistance / 1000,
  alt_gain_m: summary.totalAltGain,
  max_speed_ms: summary.maxSpeed,
  max_speed_kmh: summary.maxSpeed === null ? null : summary.maxSpeed * 3.6,
  moving_time_sec: summary.totalMovingTime,
  probe_count: summary.probeCount,
  idle_probe_count: summary.idleProbeCount,
});

const parseId = (value: string): number => {
  const id = Number(value);
  if (!Number.isInteger(id) || id <= 0) {
    throw new ValidationError('Invalid activity id');
  }
  return id;
};

const parseLimit = (value: unknown, fallback: number): number => {
  if (typeof value !== 'string' || value.trim() === '') return fallback;
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ValidationError('Invalid limit');
  }
  return Math.min(limit, MAX_LIST_LIMIT);
};

const parseDate = (value: unknown, name: string): Date => {
  const date = typeof value === 'string' ? new Date(value) : new Date(NaN);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`Invalid ${name}`, [`${name} must be an ISO 8601 timestamp`]);
  }
  return date;
};

const sendError = (res: Response, error: unknown, fallbackMessage: string) => {
  if (error instanceof ValidationError) {
    return res.status(400).json({ error: error.message, details: error.details });
  }
  if (error instanceof NotFoundError) {
    return res.status(404).json({ error: error.message });
  }
  if (error instanceof UploadUnavailableError) {
    return res.status(501).json({ error: error.message });
  }
  if (error instanceof UploadError) {
    console.error(`${fallbackMessage}:`, error.message);
    return res.status(502).json({ error: error.message });
  }
  console.error(`${fallbackMessage}:`, error);
  return res.status(500).json({ error: fallbackMessage });
};

/**
 * Multipart body parser for both ingestion paths. Oversized forms are a 400
 * like any other malformed probe.
 */
export const formFields: RequestHandler = (req, res, next) => {
  multipartFields(req, res, (error?: unknown) => {
    if (error instanceof multer.MulterError) {
      const detail = error.field ? `${error.field}: ${error.message}` : error.message;
      sendError(res, new ValidationError('Bad request', [detail]), 'Failed to store probe');
      return;
    }
    next(error);
  });
};

/**
 * Ingestion handler, mounted both at `/new-probe` (device callback URL) and
 * `/api/probes`.
 */
export function createIngestHandler(service: TrackerService) {
  return async (req: Request, res: Response) => {
    try {
      const result = await service.ingestForm(req.body);
      res.status(result.duplicate ? 200 : 201).json({
        [result.deviceId]: { downlinkData: result.ackToken },
      });
    } catch (error) {
      if (error instanceof ValidationError) {
        console.warn(`⚠️  Rejected probe: ${error.details.join(', ')}`);
      }
      sendError(res, error, 'Failed to store probe');
    }
  };
}

export default function createTrackerRoutes(service: TrackerService): Router {
  const router = Router();

  /**
   * GET /api/health
   */
  router.get('/health', async (req: Request, res: Response) => {
    try {
      const database = await service.checkStore();
      res.status(database ? 200 : 503).json({
        status: database ? 'ok' : 'degraded',
        store: database ? 'connected' : 'unreachable',
      });
    } catch (error) {
      sendError(res, error, 'Health check failed');
    }
  });

  /**
   * GET /api/capabilities
   * Registered upload adapters
   */
  router.get('/capabilities', (req: Request, res: Response) => {
    res.json(service.adapterRegistry.getCapabilities());
  });

  /**
   * POST /api/probes
   * Form fields: device, seq, lat, lng, alt?, dist, alt_gain, max_speed | moving_time
   */
  router.post('/probes', formFields, createIngestHandler(service));

  /**
   * GET /api/probes?limit=50
   * GET /api/probes?from=...&to=...
   * Most recent probes, regardless of activity
   */
  router.get('/probes', async (req: Request, res: Response) => {
    try {
      const { from, to } = req.query;
      const probes = from !== undefined || to !== undefined
        ? await service.listProbesBetween(parseDate(from, 'from'), parseDate(to, 'to'))
        : await service.listRecentProbes(parseLimit(req.query.limit, service.dashboardLimit));
      res.json(probes.map(serializeProbe));
    } catch (error) {
      sendError(res, error, 'Failed to fetch probes');
    }
  });

  /**
   * GET /api/activities?limit=20
   */
  router.get('/activities', async (req: Request, res: Response) => {
    try {
      const overviews = await service.listActivities(parseLimit(req.query.limit, 20));
      res.json(overviews.map(({ activity, summary }) => ({
        ...serializeActivity(activity),
        summary: summary ? serializeSummary(summary) : null,
      })));
    } catch (error) {
      sendError(res, error, 'Failed to fetch activities');
    }
  });

  /**
   * GET /api/activities/:id
   */
  router.get('/activities/:id', async (req: Request, res: Response) => {
    try {
      const detail = await service.getActivity(parseId(req.params.id));
      res.json({
        ...serializeActivity(detail.activity),
        summary: serializeSummary(detail.summary),
        probes: detail.probes.map(serializeProbe),
      });
    } catch (error) {
      sendError(res, error, 'Failed to fetch activity');
    }
  });

  /**
   * POST /api/activities/:id/merge-into/:targetId
   * Moves every probe of :id to :targetId and removes :id
   */
  router.post('/activities/:id/merge-into/:targetId', async (req: Request, res: Response) => {
    try {
      const result = await service.mergeActivities(parseId(req.params.id), parseId(req.params.targetId));
      res.json({
        success: true,
        merged_activity_id: result.sourceId,
        target_activity_id: result.targetId,
        moved_probes: result.movedProbes,
      });
    } catch (error) {
      sendError(res, error, 'Failed to merge activities');
    }
  });

  /**
   * GET /api/activities/:id/gpx
   */
  router.get('/activities/:id/gpx', async (req: Request, res: Response) => {
    try {
      const { filename, gpx } = await service.exportGpx(parseId(req.params.id));
      res.setHeader('Content-Type', 'application/gpx+xml; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
      res.send(gpx);
    } catch (error) {
      sendError(res, error, 'Failed to export activity');
    }
  });

  /**
   * POST /api/activities/:id/upload
   * Body: { adapter?: string }
   */
  router.post('/activities/:id/upload', async (req: Request, res: Response) => {
    try {
      const rawAdapter: unknown = req.body?.adapter;
      const adapterId = typeof rawAdapter === 'string' && rawAdapter.trim() ? rawAdapter.trim() : undefined;
      const result = await service.uploadActivity(parseId(req.params.id), adapterId);
      res.json({
        activity_id: result.activityId,
        external_ref: result.externalRef,
        already_uploaded: result.alreadyUploaded,
        adapter: result.adapterId,
      });
    } catch (error) {
      sendError(res, error, 'Failed to upload activity');
    }
  });

  return router;
}
