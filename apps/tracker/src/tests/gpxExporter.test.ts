import test from 'node:test';
import assert from 'node:assert/strict';
import { buildActivityGpx } from '../services/gpxExporter';
import type { Probe } from '../services/store/types';

const probe = (id: number, iso: string, lat: number, alt: number | null, dist: number): Probe => ({
  id,
  seq: id,
  receivedAt: new Date(iso),
  lat,
  lng: 7.25,
  alt,
  dist,
  altGain: 0,
  maxSpeed: null,
  movingTime: null,
  activityId: 3,
});

test('buildActivityGpx writes every probe as a track point, idle ones included', () => {
  const gpx = buildActivityGpx(
    [
      probe(1, '2024-08-10T07:00:00.000Z', 46.501, 1200, 64),
      probe(2, '2024-08-10T07:10:00.000Z', 46.502, null, 0),
    ],
    { name: 'Ride #3' }
  );

  assert.equal(gpx, [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<gpx version="1.1" creator="bike-tracker" xmlns="http://www.topografix.com/GPX/1/1">',
    '  <metadata><time>2024-08-10T07:00:00.000Z</time></metadata>',
    '  <trk>',
    '    <name>Ride #3</name>',
    '    <trkseg>',
    '      <trkpt lat="46.501" lon="7.25"><ele>1200</ele><time>2024-08-10T07:00:00.000Z</time></trkpt>',
    '      <trkpt lat="46.502" lon="7.25"><time>2024-08-10T07:10:00.000Z</time></trkpt>',
    '    </trkseg>',
    '  </trk>',
    '</gpx>',
    '',
  ].join('\n'));
});

test('buildActivityGpx escapes the track name and creator', () => {
  const gpx = buildActivityGpx([probe(1, '2024-08-10T07:00:00.000Z', 46.5, 5, 16)], {
    name: 'Tom & Jerry <"hill">',
    creator: "o'brien",
  });

  assert.ok(gpx.includes('    <name>Tom &amp; Jerry &lt;&quot;hill&quot;&gt;</name>\n'));
  assert.ok(gpx.includes('creator="o&apos;brien"'));
});

test('buildActivityGpx writes coordinates near zero as plain decimals', () => {
  const point = { ...probe(1, '2024-08-10T07:00:00.000Z', -0.00001234, 0.5, 16), lng: 4e-7 };
  const gpx = buildActivityGpx([point, { ...point, id: 2, lat: -4e-8, lng: 12.25 }], { name: 'Equator' });

  assert.ok(gpx.includes('<trkpt lat="-0.0000123" lon="0.0000004"><ele>0.5</ele>'));
  assert.ok(gpx.includes('<trkpt lat="0" lon="12.25"><ele>0.5</ele>'));
});

test('buildActivityGpx omits metadata for an empty track', () => {
  const gpx = buildActivityGpx([], { name: 'Empty' });

  assert.equal(gpx.split('\n')[2], '  <trk>');
  assert.ok(gpx.includes('    <trkseg>\n    </trkseg>\n'));
});
