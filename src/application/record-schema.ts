import { z } from 'zod';
import type {
  EnvironmentalFields,
  LocationFields,
  PlantMetricFields,
  PlantTemperature,
  SpectralFields,
  ThermalFields,
  TransformFields,
} from '../domain/index.js';

/**
 * Zod schemas for the field payload of each sensor variant.
 *
 * Payloads are normalized before parsing (see `normalizePayload`):
 * null and NaN samples are removed and legacy key aliases are folded
 * into their canonical names, so the schemas only ever see absent keys,
 * never explicit `undefined`.
 */

/** Accepts numbers and numeric strings; rejects NaN and infinities. */
const numeric = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
  z.number().finite(),
);

const bounded = (min: number, max: number) =>
  z.preprocess(
    (v) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
    z.number().finite().min(min).max(max),
  );

const label = z.string().min(1).max(255);

const atLeastOneField = (value: object) => Object.keys(value).length > 0;

export const locationSchema: z.ZodType<LocationFields, z.ZodTypeDef, unknown> = z.object({
  latitude: bounded(-90, 90),
  longitude: bounded(-180, 180),
  altitude: numeric.optional(),
  fix_status: numeric.optional(),
  service: numeric.optional(),
});

const plantSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).optional(),
  canopy_temperature: numeric,
  cwsi: numeric.optional(),
});

export const thermalSchema: z.ZodType<ThermalFields, z.ZodTypeDef, unknown> = z
  .object({
    canopy_temperature: numeric.optional(),
    cwsi: numeric.optional(),
    entity_count: numeric.optional(),
    ambient_temperature: numeric.optional(),
    plants: z.array(plantSchema).optional(),
  })
  .refine(
    (v) => v.canopy_temperature !== undefined || (v.plants !== undefined && v.plants.length > 0),
    { message: 'canopy_temperature or a non-empty plants list is required' },
  )
  .transform(summarizePlants);

export const spectralSchema: z.ZodType<SpectralFields, z.ZodTypeDef, unknown> = z
  .object({
    ndvi: numeric.optional(),
    ndvi_3d: numeric.optional(),
    infrared: numeric.optional(),
    visible: numeric.optional(),
  })
  .refine(atLeastOneField, { message: 'at least one spectral measurement is required' });

export const environmentalSchema: z.ZodType<EnvironmentalFields, z.ZodTypeDef, unknown> = z
  .object({
    ambient_temperature: numeric.optional(),
    relative_humidity: numeric.optional(),
    absolute_humidity: numeric.optional(),
    dew_point: numeric.optional(),
  })
  .refine(atLeastOneField, { message: 'at least one environmental measurement is required' });

export const transformSchema: z.ZodType<TransformFields, z.ZodTypeDef, unknown> = z.object({
  x: numeric,
  y: numeric,
  z: numeric,
});

export const plantMetricSchema: z.ZodType<PlantMetricFields, z.ZodTypeDef, unknown> = z
  .object({
    biomass: numeric.optional(),
    area: numeric.optional(),
    crop_type: label.optional(),
    light_state: label.optional(),
    location_label: label.optional(),
  })
  .refine(atLeastOneField, { message: 'at least one plant metric is required' });

/**
 * Folds a per-plant list into the flat thermal fields.
 *
 * Plants sharing an `id` are collapsed (last entry wins), then
 * canopy temperature and CWSI are averaged over what remains.
 */
function summarizePlants(fields: ThermalFields): ThermalFields {
  if (fields.plants === undefined || fields.plants.length === 0) return fields;

  const byId = new Map<string | number, PlantTemperature>();
  const anonymous: PlantTemperature[] = [];
  for (const plant of fields.plants) {
    if (plant.id === undefined) anonymous.push(plant);
    else byId.set(plant.id, plant);
  }
  const plants = [...byId.values(), ...anonymous];

  const canopy = plants.reduce((sum, p) => sum + p.canopy_temperature, 0) / plants.length;
  const cwsiSamples = plants.flatMap((p) => (p.cwsi === undefined ? [] : [p.cwsi]));
  const cwsi = cwsiSamples.length > 0
    ? cwsiSamples.reduce((sum, c) => sum + c, 0) / cwsiSamples.length
    : undefined;

  return {
    ...fields,
    plants,
    canopy_temperature: canopy,
    entity_count: plants.length,
    ...(cwsi === undefined ? {} : { cwsi }),
  };
}

/** Legacy key names accepted per canonical field. */
const FIELD_ALIASES: Readonly<Record<string, readonly string[]>> = {
  fix_status: ['status'],
  infrared: ['ir'],
  ambient_temperature: ['ambientTemp', 'ambient'],
  location_label: ['location'],
};

/**
 * Prepares a raw JSON object for schema parsing.
 *
 * - drops null / NaN samples so they count as absent
 * - copies legacy aliases onto canonical keys (canonical wins)
 * - lifts a nested `point: { x, y, z }` to the top level
 */
export function normalizePayload(raw: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === null || (typeof value === 'number' && Number.isNaN(value))) continue;
    out[key] = value;
  }

  for (const [canonical, aliases] of Object.entries(FIELD_ALIASES)) {
    if (canonical in out) continue;
    const alias = aliases.find((a) => a in out);
    if (alias !== undefined) out[canonical] = out[alias];
  }

  const point = out['point'];
  if (!('x' in out) && typeof point === 'object' && point !== null && !Array.isArray(point)) {
    for (const [axis, value] of Object.entries(point)) {
      if (axis === 'x' || axis === 'y' || axis === 'z') out[axis] = value;
    }
  }

  return out;
}
