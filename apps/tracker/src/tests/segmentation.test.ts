import test from 'node:test';
import assert from 'node:assert/strict';
import { SegmentationEngine } from '../services/segmentation';
import { MemoryTrackerStore } from '../services/store/memoryStore';
import type { Probe } from '../services/store/types';

const MINUTE = 60 * 1000;
const T0 = Date.parse('2024-05-04T08:00:00.000Z');

const engine = new SegmentationEngine({ inactivityThresholdMs: 20 * MINUTE });

/** Inserts a probe `minutes` after T0 and segments it, like one ingestion request. */
const ingest = (store: MemoryTrackerStore, minutes: number, dist: number, seq: number = minutes) =>
  store.withTransaction(async (stores) => {
    const probe = await stores.probes.insert({
      seq,
      receivedAt: new Date(T0 + minutes * MINUTE),
      lat: 47.0,
      lng: 8.0,
      alt: null,
      dist,
      altGain: 0,
      maxSpeed: null,
      movingTime: null,
    });
    const activityId = await engine.assign(probe, stores);
    return { probe, activityId };
  });

const memberIds = async (store: MemoryTrackerStore, activityId: number) =>
  (await store.probes.listByActivity(activityId)).map((probe: Probe) => probe.id);

test('assign groups a pause and its idle probes into one activity, then splits on a long gap', async () => {
  const store = new MemoryTrackerStore();

  const first = await ingest(store, 0, 5);
  const idle = await ingest(store, 10, 0);
  const resumed = await ingest(store, 15, 3);

  assert.equal(first.activityId, 1);
  assert.equal(idle.activityId, null);
  assert.equal(resumed.activityId, 1);
  assert.deepEqual(await memberIds(store, 1), [first.probe.id, idle.probe.id, resumed.probe.id]);

  const next = await ingest(store, 50, 4);
  assert.equal(next.activityId, 2);
  assert.deepEqual(await memberIds(store, 1), [1, 2, 3]);
  assert.deepEqual(await memberIds(store, 2), [4]);
});

test('assign leaves idle probes after a closed activity unassigned', async () => {
  const store = new MemoryTrackerStore();

  await ingest(store, 0, 5);
  const trailingIdle = await ingest(store, 30, 0);
  const nextRide = await ingest(store, 60, 2);

  assert.equal(nextRide.activityId, 2);
  assert.equal((await store.probes.findById(trailingIdle.probe.id))?.activityId, null);
  assert.deepEqual(await memberIds(store, 2), [nextRide.probe.id]);
});

test('assign starts a new activity when the gap equals the threshold', async () => {
  const store = new MemoryTrackerStore();

  await ingest(store, 0, 5);
  const justBelow = await ingest(store, 19, 1);
  const atThreshold = await ingest(store, 39, 1);

  assert.equal(justBelow.activityId, 1);
  assert.equal(atThreshold.activityId, 2);
});

test('assign keeps a dense ride in one activity in id order', async () => {
  const store = new MemoryTrackerStore();

  const ids: number[] = [];
  for (let minute = 0; minute <= 120; minute += 10) {
    const { probe, activityId } = await ingest(store, minute, 1);
    assert.equal(activityId, 1);
    ids.push(probe.id);
  }

  assert.deepEqual(await memberIds(store, 1), ids);
});

test('assign returns null for idle probes while no activity exists', async () => {
  const store = new MemoryTrackerStore();

  const idle = await ingest(store, 0, 0);

  assert.equal(idle.activityId, null);
  assert.equal(await store.activities.findLatest(), null);
});

test('assign backfills by storage id even when sequence numbers wrap', async () => {
  const store = new MemoryTrackerStore();

  await ingest(store, 0, 5, 65534);
  const idle = await ingest(store, 5, 0, 65535);
  const wrapped = await ingest(store, 10, 2, 0);

  assert.equal(wrapped.activityId, 1);
  assert.deepEqual(await memberIds(store, 1), [1, idle.probe.id, wrapped.probe.id]);
});

test('assign rejects a latest activity without probes', async () => {
  const store = new MemoryTrackerStore();
  await store.activities.create();

  await assert.rejects(() => ingest(store, 0, 5), /Activity 1 has no probes/);
  // The failed transaction is rolled back
  assert.deepEqual(await store.probes.listRecent(10), []);
});
