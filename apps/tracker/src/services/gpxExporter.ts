import { Probe } from './store/types';

export interface GpxOptions {
  name: string;
  creator?: string;
}

const escapeXml = (value: string): string => value
  .replace(/&/g, '&amp;')
  .replace(/</g, '&lt;')
  .replace(/>/g, '&gt;')
  .replace(/"/g, '&quot;')
  .replace(/'/g, '&apos;');

// xsd:decimal, never exponent notation
const formatDecimal = (value: number): string => {
  const fixed = value.toFixed(7).replace(/\.?0+$/, '');
  return fixed === '-0' ? '0' : fixed;
};

const buildTrackPoint = (probe: Probe): string => {
  const ele = probe.alt !== null ? `<ele>${formatDecimal(probe.alt)}</ele>` : '';
  return `      <trkpt lat="${formatDecimal(probe.lat)}" lon="${formatDecimal(probe.lng)}">${ele}<time>${probe.receivedAt.toISOString()}</time></trkpt>`;
};

/**
 * GPX 1.1 document with one track segment holding every probe, idle ones
 * included, in the given order.
 */
export function buildActivityGpx(probes: Probe[], options: GpxOptions): string {
  const creator = escapeXml(options.creator || 'bike-tracker');
  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<gpx version="1.1" creator="${creator}" xmlns="http://www.topografix.com/GPX/1/1">`,
  ];

  const first = probes[0];
  if (first) {
    lines.push(`  <metadata><time>${first.receivedAt.toISOString()}</time></metadata>`);
  }

  lines.push(
    '  <trk>',
    `    <name>${escapeXml(options.name)}</name>`,
    '    <trkseg>',
    ...probes.map(buildTrackPoint),
    '    </trkseg>',
    '  </trk>',
    '</gpx>',
  );

  return `${lines.join('\n')}\n`;
}
