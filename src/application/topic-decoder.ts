import type { z } from 'zod';
import { DecodeError } from '../domain/index.js';
import type { SensorRecord, SensorVariant } from '../domain/index.js';
import {
  environmentalSchema,
  locationSchema,
  normalizePayload,
  plantMetricSchema,
  spectralSchema,
  thermalSchema,
  transformSchema,
} from './record-schema.js';

/**
 * Static channel table. A channel is the last topic segment on the
 * per-device topics, or the `msg_type` field on the legacy aggregate topic.
 * Matching is exact.
 */
export const CHANNEL_VARIANTS = {
  gps: 'location',
  temperature: 'thermal',
  ndvi: 'spectral',
  environment: 'environmental',
  ambient_temperature: 'environmental',
  relative_humidity: 'environmental',
  absolute_humidity: 'environmental',
  dew_point: 'environmental',
  tf_position: 'transform',
  plant: 'plant_metric',
  area: 'plant_metric',
  location: 'plant_metric',
  biomass: 'plant_metric',
  light_state: 'plant_metric',
  crop_type: 'plant_metric',
} as const satisfies Record<string, SensorVariant>;

export type Channel = keyof typeof CHANNEL_VARIANTS;

/** Matches the `device_id` column width of both sinks. */
export const MAX_DEVICE_ID_LENGTH = 255;

export type DecodeResult =
  | { ok: true; record: SensorRecord }
  | { ok: false; error: DecodeError };

export interface TopicDecoderOptions {
  /** First segment of per-device topics: `<prefix>/<device_id>/<channel>`. */
  topicPrefix: string;
  /** Aggregate topic whose payloads carry `msg_type` (and optionally `device_id`). */
  legacyTopic: string;
  /** Device identity for legacy payloads that carry none. */
  legacyDeviceId: string;
  now?: () => number;
}

interface Route {
  channel: string;
  deviceId: string | undefined;
  legacy: boolean;
}

/**
 * Turns a raw MQTT message into a typed `SensorRecord`, or explains why not.
 *
 * Never throws and keeps no state between calls, so it can be invoked from
 * any number of concurrent delivery callbacks.
 */
export class TopicDecoder {
  private readonly now: () => number;

  constructor(private readonly options: TopicDecoderOptions) {
    this.now = options.now ?? Date.now;
  }

  /** Topic filters to subscribe to for this decoder's layout. */
  subscriptionTopics(): string[] {
    return [`${this.options.topicPrefix}/+/+`, this.options.legacyTopic];
  }

  decode(topic: string, payload: Buffer | Uint8Array | string): DecodeResult {
    const isLegacy = topic === this.options.legacyTopic;
    const segments = topic.split('/');
    if (!isLegacy && (segments.length !== 3 || segments[0] !== this.options.topicPrefix)) {
      return reject('unknown_topic', topic, `Unrecognized topic "${topic}"`);
    }

    let body: unknown;
    try {
      const text = typeof payload === 'string' ? payload : Buffer.from(payload).toString('utf-8');
      body = JSON.parse(text);
    } catch {
      return reject('malformed_payload', topic, 'Payload is not valid JSON');
    }

    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
      return reject('malformed_payload', topic, 'Payload must be a JSON object');
    }
    const raw = normalizePayload(body);

    let route: Route;
    if (isLegacy) {
      const msgType = raw['msg_type'];
      if (typeof msgType !== 'string' || msgType === '') {
        return reject('malformed_payload', topic, 'Legacy payload is missing msg_type');
      }
      const deviceField = raw['device_id'];
      route = {
        channel: msgType,
        deviceId: typeof deviceField === 'string' && deviceField !== '' ? deviceField : this.options.legacyDeviceId,
        legacy: true,
      };
    } else {
      route = { channel: segments[2] ?? '', deviceId: segments[1], legacy: false };
    }

    if (!isChannel(route.channel)) {
      return reject('unknown_topic', topic, `Unknown channel "${route.channel}"`);
    }
    if (route.deviceId === undefined || route.deviceId === '') {
      return reject('malformed_payload', topic, 'Missing device identity');
    }
    if (route.deviceId.length > MAX_DEVICE_ID_LENGTH) {
      return reject('malformed_payload', topic, `Device id exceeds ${MAX_DEVICE_ID_LENGTH} characters`);
    }

    const timestamp = parseTimestamp(raw['timestamp']) ?? (route.legacy ? this.now() : null);
    if (timestamp === null) {
      return reject('malformed_payload', topic, 'Missing or invalid timestamp');
    }

    return buildRecord(CHANNEL_VARIANTS[route.channel], { device_id: route.deviceId, topic, timestamp }, raw);
  }
}

function isChannel(value: string): value is Channel {
  return Object.prototype.hasOwnProperty.call(CHANNEL_VARIANTS, value);
}

/** Epoch milliseconds from a number or an ISO-8601 string. */
function parseTimestamp(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }
  if (typeof value === 'string' && value !== '') {
    const ms = Date.parse(value);
    return Number.isFinite(ms) ? ms : null;
  }
  return null;
}

interface Identity {
  device_id: string;
  topic: string;
  timestamp: number;
}

function buildRecord(
  variant: SensorVariant,
  identity: Identity,
  raw: Record<string, unknown>,
): DecodeResult {
  switch (variant) {
    case 'location':
      return wrap(identity.topic, locationSchema.safeParse(raw), (fields) => ({ ...identity, variant: 'location', fields }));
    case 'thermal':
      return wrap(identity.topic, thermalSchema.safeParse(raw), (fields) => ({ ...identity, variant: 'thermal', fields }));
    case 'spectral':
      return wrap(identity.topic, spectralSchema.safeParse(raw), (fields) => ({ ...identity, variant: 'spectral', fields }));
    case 'environmental':
      return wrap(identity.topic, environmentalSchema.safeParse(raw), (fields) => ({ ...identity, variant: 'environmental', fields }));
    case 'transform':
      return wrap(identity.topic, transformSchema.safeParse(raw), (fields) => ({ ...identity, variant: 'transform', fields }));
    case 'plant_metric':
      return wrap(identity.topic, plantMetricSchema.safeParse(raw), (fields) => ({ ...identity, variant: 'plant_metric', fields }));
    default: {
      const unreachable: never = variant;
      return reject('unknown_topic', identity.topic, `Unhandled variant ${String(unreachable)}`);
    }
  }
}

function wrap<T>(
  topic: string,
  parsed: z.SafeParseReturnType<unknown, T>,
  build: (fields: T) => SensorRecord,
): DecodeResult {
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message,
    );
    return reject('malformed_payload', topic, 'Payload failed schema validation', issues);
  }
  return { ok: true, record: build(parsed.data) };
}

function reject(
  kind: DecodeError['kind'],
  topic: string,
  message: string,
  issues: readonly string[] = [],
): DecodeResult {
  return { ok: false, error: new DecodeError(kind, topic, message, issues) };
}
