import type { SealedEntry } from '../../src/domain/index.js';

export function sealedEntry(overrides: Partial<SealedEntry> = {}): SealedEntry {
  return {
    key: 'rover-1:1000',
    device_id: 'rover-1',
    device_class: 'default',
    reading_epoch: 1000,
    captured_at: 1200,
    measurements: {
      location: { latitude: 41.3, longitude: 2.1 },
      thermal: { canopy_temperature: 24.5 },
    },
    variants: ['location', 'thermal'],
    expected_variants: ['location', 'thermal'],
    complete: true,
    seal_reason: 'complete',
    record_count: 2,
    ...overrides,
  };
}
