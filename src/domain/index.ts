export { SENSOR_VARIANTS, sortVariants, isSensorVariant } from './record.js';
export type {
  SensorVariant,
  SensorRecord,
  Measurements,
  VariantFields,
  LocationFields,
  ThermalFields,
  PlantTemperature,
  SpectralFields,
  EnvironmentalFields,
  TransformFields,
  PlantMetricFields,
} from './record.js';
export { readingKey, bucketTimestamp } from './reading.js';
export type { SealReason, SealedEntry, CommitRecord } from './reading.js';
export {
  DecodeError,
  AggregationError,
  SinkWriteError,
  TransportError,
  LaunchPreconditionError,
} from './errors.js';
export type { DecodeErrorKind, SinkName, SinkErrorKind } from './errors.js';
