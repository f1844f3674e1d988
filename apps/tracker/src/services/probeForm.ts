import { ValidationError } from './errors';
import type { RawMovement, RawReading } from './units';

export interface ProbeForm {
  deviceId: string;
  reading: RawReading;
}

type FormBody = Record<string, unknown>;

const isFormBody = (value: unknown): value is FormBody =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readField = (body: FormBody, name: string): string | undefined => {
  const value = body[name];
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
};

const INTEGER_PATTERN = /^[+-]?\d+$/;

interface NumberRule {
  integer?: boolean;
  min?: number;
  max?: number;
}

// Stored in a 32-bit INTEGER column
const MAX_SEQUENCE = 2147483647;

class FieldReader {
  readonly errors: string[] = [];

  constructor(private readonly body: FormBody) {}

  has(name: string): boolean {
    return readField(this.body, name) !== undefined;
  }

  number(name: string, rule: NumberRule = {}): number {
    const raw = readField(this.body, name);
    if (raw === undefined) {
      this.errors.push(`${name} is required`);
      return 0;
    }
    return this.check(name, raw, rule);
  }

  optionalNumber(name: string, rule: NumberRule = {}): number | null {
    const raw = readField(this.body, name);
    return raw === undefined ? null : this.check(name, raw, rule);
  }

  private check(name: string, raw: string, rule: NumberRule): number {
    if (rule.integer && !INTEGER_PATTERN.test(raw)) {
      this.errors.push(`${name} must be an integer`);
      return 0;
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      this.errors.push(`${name} must be a number`);
      return 0;
    }
    if (rule.min !== undefined && value < rule.min) {
      this.errors.push(`${name} must be >= ${rule.min}`);
    } else if (rule.max !== undefined && value > rule.max) {
      this.errors.push(`${name} must be <= ${rule.max}`);
    }
    return value;
  }
}

/**
 * Validates an ingestion form (`device`, `seq`, `lat`, `lng`, optional `alt`,
 * `dist`, `alt_gain` and one of `max_speed`/`moving_time`). Values stay in the
 * device's encoding. Throws a ValidationError listing every problem.
 */
export function parseProbeForm(body: unknown, expectedDeviceId: string): ProbeForm {
  const form = isFormBody(body) ? body : {};
  const fields = new FieldReader(form);

  const deviceId = readField(form, 'device');
  if (deviceId === undefined) {
    fields.errors.push('device is required');
  } else if (deviceId !== expectedDeviceId) {
    fields.errors.push('Invalid device ID.');
  }

  const seq = fields.number('seq', { integer: true, min: 0, max: MAX_SEQUENCE });
  const lat = fields.number('lat', { min: -90, max: 90 });
  const lng = fields.number('lng', { min: -180, max: 180 });
  const alt = fields.optionalNumber('alt');
  const dist = fields.number('dist', { integer: true, min: 0 });
  const altGain = fields.number('alt_gain', { integer: true, min: 0 });

  let movement: RawMovement = { kind: 'max_speed', value: 0 };
  const hasMaxSpeed = fields.has('max_speed');
  const hasMovingTime = fields.has('moving_time');
  if (hasMaxSpeed && hasMovingTime) {
    fields.errors.push('Provide only one of max_speed or moving_time');
  } else if (hasMovingTime) {
    movement = { kind: 'moving_time', value: fields.number('moving_time', { integer: true, min: 0 }) };
  } else if (hasMaxSpeed) {
    movement = { kind: 'max_speed', value: fields.number('max_speed', { integer: true, min: 0 }) };
  } else {
    fields.errors.push('max_speed or moving_time is required');
  }

  if (fields.errors.length > 0 || deviceId === undefined) {
    throw new ValidationError('Bad request', fields.errors);
  }

  return {
    deviceId,
    reading: { seq, lat, lng, alt, dist, altGain, movement },
  };
}
