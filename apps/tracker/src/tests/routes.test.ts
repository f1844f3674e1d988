import test from 'node:test';
import assert from 'node:assert/strict';
import { once } from 'node:events';
import { createApp } from '../app';
import { serializeActivity, serializeProbe } from '../api/routes';
import { UploadAdapterRegistry } from '../services/adapters/registry';
import type { UploadAdapter } from '../services/adapters/types';
import { DEFAULT_UNIT_SCALES } from '../services/config';
import { UploadError } from '../services/errors';
import { MemoryTrackerStore } from '../services/store/memoryStore';
import { TrackerService } from '../services/tracker';

const DEVICE = 'test-device';
const MINUTE = 60 * 1000;
const T0 = Date.parse('2024-05-04T08:00:00.000Z');

const setup = (adapter?: UploadAdapter) => {
  let now = T0;
  const clock = () => new Date(now);
  const adapters = new UploadAdapterRegistry();
  if (adapter) adapters.registerAdapter(adapter);
  const service = new TrackerService({
    config: {
      deviceId: DEVICE,
      timezone: 'UTC',
      inactivityThresholdMs: 20 * MINUTE,
      dedupWindowMs: 60 * MINUTE,
      dashboardLimit: 50,
      scales: DEFAULT_UNIT_SCALES,
    },
    store: new MemoryTrackerStore(clock),
    adapters,
    now: clock,
  });
  return {
    service,
    at: (minutes: number) => {
      now = T0 + minutes * MINUTE;
    },
  };
};

/** Serves the app on an ephemeral loopback port for the duration of `run`. */
const withServer = async (service: TrackerService, run: (baseUrl: string) => Promise<void>) => {
  const server = createApp({ service }).listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('Server has no TCP address');

  try {
    await run(`http://127.0.0.1:${address.port}`);
  } finally {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
};

const probeFields = (seq: number, dist: number): Record<string, string> => ({
  device: DEVICE,
  seq: String(seq),
  lat: '47.5596',
  lng: '7.5886',
  dist: String(dist),
  alt_gain: '2',
  max_speed: '27',
});

const field = (value: unknown, key: string): unknown =>
  typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;

const seqs = (value: unknown): unknown[] =>
  Array.isArray(value) ? value.map((item) => field(item, 'seq')) : [];

const postForm = (url: string, fields: Record<string, string>) =>
  fetch(url, { method: 'POST', body: new URLSearchParams(fields) });

test('POST /new-probe acknowledges new probes with 201 and retransmissions with 200', async () => {
  const { service } = setup();

  await withServer(service, async (baseUrl) => {
    const created = await postForm(`${baseUrl}/new-probe`, probeFields(1, 10));
    assert.equal(created.status, 201);
    assert.deepEqual(await created.json(), { [DEVICE]: { downlinkData: '0000000000000001' } });

    const repeated = await postForm(`${baseUrl}/new-probe`, probeFields(1, 10));
    assert.equal(repeated.status, 200);
    assert.deepEqual(await repeated.json(), { [DEVICE]: { downlinkData: '0000000000000001' } });
  });

  assert.equal((await service.listRecentProbes()).length, 1);
});

test('POST /api/probes accepts multipart forms', async () => {
  const { service } = setup();

  await withServer(service, async (baseUrl) => {
    const body = new FormData();
    for (const [name, value] of Object.entries(probeFields(4, 3))) {
      body.append(name, value);
    }
    const response = await fetch(`${baseUrl}/api/probes`, { method: 'POST', body });

    assert.equal(response.status, 201);
    assert.deepEqual(await response.json(), { [DEVICE]: { downlinkData: '0000000000000001' } });
  });

  const [stored] = await service.listRecentProbes();
  assert.equal(stored?.dist, 48);
  assert.equal(stored?.altGain, 4);
});

test('both ingestion paths reject an oversized multipart field with 400', async () => {
  const { service } = setup();

  await withServer(service, async (baseUrl) => {
    for (const path of ['/new-probe', '/api/probes']) {
      const body = new FormData();
      for (const [name, value] of Object.entries({ ...probeFields(2, 5), lat: `47.${'5'.repeat(2000)}` })) {
        body.append(name, value);
      }
      const response = await fetch(`${baseUrl}${path}`, { method: 'POST', body });

      assert.equal(response.status, 400);
      assert.deepEqual(await response.json(), { error: 'Bad request', details: ['lat: Field value too long'] });
    }
  });

  assert.deepEqual(await service.listRecentProbes(), []);
});

test('POST /new-probe answers 400 with field errors and stores nothing', async () => {
  const { service } = setup();

  await withServer(service, async (baseUrl) => {
    const wrongDevice = await postForm(`${baseUrl}/new-probe`, { ...probeFields(1, 10), device: 'other' });
    assert.equal(wrongDevice.status, 400);
    assert.deepEqual(await wrongDevice.json(), { error: 'Bad request', details: ['Invalid device ID.'] });

    const { dist: _dist, ...withoutDist } = probeFields(1, 10);
    const missing = await postForm(`${baseUrl}/new-probe`, withoutDist);
    assert.equal(missing.status, 400);
    assert.deepEqual(await missing.json(), { error: 'Bad request', details: ['dist is required'] });
  });

  assert.deepEqual(await service.listRecentProbes(), []);
});

test('GET /api/probes returns the most recent probes in snake_case', async () => {
  const { service, at } = setup();
  await service.ingestForm(probeFields(1, 0));
  at(5);
  await service.ingestForm(probeFields(2, 10));

  await withServer(service, async (baseUrl) => {
    const response = await fetch(`${baseUrl}/api/probes?limit=1`);
    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), [{
      id: 2,
      seq: 2,
      received_at: '2024-05-04T08:05:00.000Z',
      lat: 47.5596,
      lng: 7.5886,
      alt: null,
      dist: 160,
      alt_gain: 4,
      max_speed: 2.5,
      moving_time: null,
      idle: false,
      activity_id: 1,
    }]);

    const all = await fetch(`${baseUrl}/api/probes`);
    assert.deepEqual(seqs(await all.json()), [2, 1]);

    const range = await fetch(`${baseUrl}/api/probes?from=2024-05-04T08:00:00Z&to=2024-05-04T08:05:00Z`);
    assert.deepEqual(seqs(await range.json()), [1]);

    const badLimit = await fetch(`${baseUrl}/api/probes?limit=abc`);
    assert.equal(badLimit.status, 400);

    const badRange = await fetch(`${baseUrl}/api/probes?from=yesterday`);
    assert.equal(badRange.status, 400);
  });
});

test('GET /api/activities/:id returns the activity, its summary and its probes', async () => {
  const { service, at } = setup();
  await service.ingestForm(probeFields(1, 5));
  at(10);
  await service.ingestForm(probeFields(2, 0));
  at(15);
  await service.ingestForm(probeFields(3, 3));

  await withServer(service, async (baseUrl) => {
    const response = await fetch(`${baseUrl}/api/activities/1`);
    assert.equal(response.status, 200);

    const { activity, probes } = await service.getActivity(1);
    const summary = {
      start_time: '2024-05-04T08:00:00.000Z',
      end_time: '2024-05-04T08:15:00.000Z',
      start_local: '2024-05-04T08:00:00',
      end_local: '2024-05-04T08:15:00',
      duration_sec: 900,
      distance_m: 128,
      distance_km: 0.128,
      alt_gain_m: 12,
      max_speed_ms: 2.5,
      max_speed_kmh: 9,
      moving_time_sec: null,
      probe_count: 3,
      idle_probe_count: 1,
    };
    assert.deepEqual(probes.map((probe) => probe.id), [1, 2, 3]);
    assert.deepEqual(await response.json(), {
      ...serializeActivity(activity),
      summary,
      probes: probes.map(serializeProbe),
    });

    const list = await fetch(`${baseUrl}/api/activities`);
    assert.deepEqual(await list.json(), [{ ...serializeActivity(activity), summary }]);

    const unknown = await fetch(`${baseUrl}/api/activities/99`);
    assert.equal(unknown.status, 404);
    assert.deepEqual(await unknown.json(), { error: 'Activity not found' });

    const invalid = await fetch(`${baseUrl}/api/activities/abc`);
    assert.equal(invalid.status, 400);
  });
});

test('POST /api/activities/:id/merge-into/:targetId merges and validates', async () => {
  const { service, at } = setup();
  await service.ingestForm(probeFields(1, 5));
  at(60);
  await service.ingestForm(probeFields(2, 5));

  await withServer(service, async (baseUrl) => {
    const same = await fetch(`${baseUrl}/api/activities/1/merge-into/1`, { method: 'POST' });
    assert.equal(same.status, 400);

    const missing = await fetch(`${baseUrl}/api/activities/2/merge-into/7`, { method: 'POST' });
    assert.equal(missing.status, 404);

    const merged = await fetch(`${baseUrl}/api/activities/2/merge-into/1`, { method: 'POST' });
    assert.equal(merged.status, 200);
    assert.deepEqual(await merged.json(), {
      success: true,
      merged_activity_id: 2,
      target_activity_id: 1,
      moved_probes: 1,
    });

    const gone = await fetch(`${baseUrl}/api/activities/2`);
    assert.equal(gone.status, 404);
  });
});

test('GET /api/activities/:id/gpx serves a GPX attachment', async () => {
  const { service } = setup();
  await service.ingestForm(probeFields(1, 5));

  await withServer(service, async (baseUrl) => {
    const response = await fetch(`${baseUrl}/api/activities/1/gpx`);

    assert.equal(response.status, 200);
    assert.equal(response.headers.get('content-type'), 'application/gpx+xml; charset=utf-8');
    assert.equal(response.headers.get('content-disposition'), 'attachment; filename="activity-1.gpx"');
    const gpx = await response.text();
    assert.ok(gpx.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n'));
    assert.ok(gpx.includes('<trkpt lat="47.5596" lon="7.5886"><time>2024-05-04T08:00:00.000Z</time></trkpt>'));
  });
});

test('POST /api/activities/:id/upload maps upload failures to 501 and 502', async () => {
  const unavailable = setup();
  await unavailable.service.ingestForm(probeFields(1, 5));
  await withServer(unavailable.service, async (baseUrl) => {
    const response = await fetch(`${baseUrl}/api/activities/1/upload`, { method: 'POST' });
    assert.equal(response.status, 501);
    assert.deepEqual(await response.json(), { error: 'No upload adapter is enabled' });
  });

  const failing = setup({
    id: 'fake',
    name: 'Fake',
    enabled: true,
    capabilities: { supportsSummaryUpload: true, supportsTrackUpload: false },
    upload: async () => {
      throw new UploadError('STRAVA_ERROR: Strava API is unavailable. Please try again later.');
    },
  });
  await failing.service.ingestForm(probeFields(1, 5));
  await withServer(failing.service, async (baseUrl) => {
    const response = await fetch(`${baseUrl}/api/activities/1/upload`, { method: 'POST' });
    assert.equal(response.status, 502);
    assert.deepEqual(await response.json(), {
      error: 'STRAVA_ERROR: Strava API is unavailable. Please try again later.',
    });
  });
});

test('POST /api/activities/:id/upload stores the reference and reports repeats', async () => {
  const uploads: string[] = [];
  const { service } = setup({
    id: 'fake',
    name: 'Fake',
    enabled: true,
    capabilities: { supportsSummaryUpload: true, supportsTrackUpload: false },
    upload: async (request) => {
      uploads.push(request.name);
      return 'ext-42';
    },
  });
  await service.ingestForm(probeFields(1, 5));

  await withServer(service, async (baseUrl) => {
    const first = await fetch(`${baseUrl}/api/activities/1/upload`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ adapter: 'fake' }),
    });
    assert.equal(first.status, 200);
    assert.deepEqual(await first.json(), {
      activity_id: 1,
      external_ref: 'ext-42',
      already_uploaded: false,
      adapter: 'fake',
    });

    const second = await fetch(`${baseUrl}/api/activities/1/upload`, { method: 'POST' });
    assert.deepEqual(await second.json(), {
      activity_id: 1,
      external_ref: 'ext-42',
      already_uploaded: true,
      adapter: null,
    });
  });

  assert.deepEqual(uploads, ['Ride #1 (2024-05-04 08:00)']);
});

test('GET /api/capabilities and /api/health describe the service', async () => {
  const { service } = setup();

  await withServer(service, async (baseUrl) => {
    const capabilities = await fetch(`${baseUrl}/api/capabilities`);
    assert.deepEqual(await capabilities.json(), {
      adapters: [],
      active_adapters: [],
      capabilities: { supportsSummaryUpload: false, supportsTrackUpload: false },
    });

    const health = await fetch(`${baseUrl}/api/health`);
    assert.equal(health.status, 200);
    assert.deepEqual(await health.json(), { status: 'ok', store: 'connected' });

    const root = await fetch(`${baseUrl}/`);
    assert.equal(field(field(await root.json(), 'endpoints'), 'newProbe'), '/new-probe');
  });
});
