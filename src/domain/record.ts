/**
 * Core domain types for decoded sensor readings.
 *
 * A `SensorRecord` is one message from one device, already validated.
 * Each sensor family gets its own variant so that field combinations
 * are checked by the compiler rather than by null checks downstream.
 * These types carry no framework dependencies.
 */

/** Canonical variant order. Used wherever variants are listed or sorted. */
export const SENSOR_VARIANTS = [
  'location',
  'thermal',
  'spectral',
  'environmental',
  'transform',
  'plant_metric',
] as const;

export type SensorVariant = (typeof SENSOR_VARIANTS)[number];

export interface LocationFields {
  latitude: number;
  longitude: number;
  altitude?: number;
  fix_status?: number;
  service?: number;
}

export interface PlantTemperature {
  id?: string | number;
  canopy_temperature: number;
  cwsi?: number;
}

export interface ThermalFields {
  canopy_temperature?: number;
  cwsi?: number;
  entity_count?: number;
  ambient_temperature?: number;
  plants?: PlantTemperature[];
}

export interface SpectralFields {
  ndvi?: number;
  ndvi_3d?: number;
  infrared?: number;
  visible?: number;
}

export interface EnvironmentalFields {
  ambient_temperature?: number;
  relative_humidity?: number;
  absolute_humidity?: number;
  dew_point?: number;
}

export interface TransformFields {
  x: number;
  y: number;
  z: number;
}

export interface PlantMetricFields {
  biomass?: number;
  area?: number;
  crop_type?: string;
  light_state?: string;
  location_label?: string;
}

/** Field shape per variant. */
export interface VariantFields {
  location: LocationFields;
  thermal: ThermalFields;
  spectral: SpectralFields;
  environmental: EnvironmentalFields;
  transform: TransformFields;
  plant_metric: PlantMetricFields;
}

interface RecordOf<V extends SensorVariant> {
  readonly variant: V;
  readonly device_id: string;
  readonly topic: string;
  /** Capture time, epoch milliseconds. */
  readonly timestamp: number;
  readonly fields: Readonly<VariantFields[V]>;
}

/** One decoded sensor reading, tagged by variant. */
export type SensorRecord = { [V in SensorVariant]: RecordOf<V> }[SensorVariant];

/** Merged fields per variant, as accumulated for one reading. */
export type Measurements = { [V in SensorVariant]?: VariantFields[V] };

/** Sorts variants into canonical order and drops duplicates. */
export function sortVariants(variants: Iterable<SensorVariant>): SensorVariant[] {
  const present = new Set(variants);
  return SENSOR_VARIANTS.filter((v) => present.has(v));
}

export function isSensorVariant(value: string): value is SensorVariant {
  return SENSOR_VARIANTS.some((v) => v === value);
}
