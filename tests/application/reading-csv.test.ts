import { describe, it, expect } from 'vitest';
import { renderReadingsCsv } from '../../src/application/reading-csv.js';
import { toReadingView } from '../../src/application/query-readings.js';
import { readingRow } from '../support/rows.js';

const HEADER =
  'idempotency_key,device_id,device_class,reading_epoch,captured_at,variants,missing_variants,partial,seal_reason,record_count';

describe('renderReadingsCsv', () => {
  it('renders only the header for an empty page', () => {
    expect(renderReadingsCsv([])).toBe(`${HEADER}\n`);
  });

  it('adds one column per measurement field, ordered by variant then field', () => {
    const csv = renderReadingsCsv([toReadingView(readingRow())]);

    expect(csv).toBe(
      `${HEADER},location.latitude,location.longitude,thermal.canopy_temperature\n` +
        'rover-1:1000,rover-1,default,2026-03-01T10:00:00.000Z,2026-03-01T10:00:00.400Z,' +
        'location;thermal,,false,complete,2,41.3,2.1,24.5\n',
    );
  });

  it('leaves cells empty for fields a reading does not carry', () => {
    const csv = renderReadingsCsv([
      toReadingView(readingRow({
        idempotency_key: 'rover-1:1000',
        variants: ['location'],
        missing_variants: ['thermal'],
        partial: true,
        seal_reason: 'timeout',
        record_count: 1,
        measurements: { location: { latitude: 41.3, longitude: 2.1 } },
      })),
      toReadingView(readingRow({
        idempotency_key: 'station-1:1000',
        device_id: 'station-1',
        device_class: 'station',
        variants: ['environmental'],
        record_count: 1,
        measurements: { environmental: { ambient_temperature: 18 } },
      })),
    ]);

    const lines = csv.split('\n');
    expect(lines[0]).toBe(`${HEADER},location.latitude,location.longitude,environmental.ambient_temperature`);
    expect(lines[1]).toBe(
      'rover-1:1000,rover-1,default,2026-03-01T10:00:00.000Z,2026-03-01T10:00:00.400Z,location,thermal,true,timeout,1,41.3,2.1,',
    );
    expect(lines[2]).toBe(
      'station-1:1000,station-1,station,2026-03-01T10:00:00.000Z,2026-03-01T10:00:00.400Z,environmental,,false,complete,1,,,18',
    );
  });

  it('JSON-encodes nested values and quotes cells that need it', () => {
    const csv = renderReadingsCsv([
      toReadingView(readingRow({
        variants: ['thermal'],
        measurements: {
          thermal: { canopy_temperature: 24, plants: [{ id: 'p1', canopy_temperature: 24 }] },
        },
      })),
    ]);

    const lines = csv.split('\n');
    expect(lines[0]).toBe(`${HEADER},thermal.canopy_temperature,thermal.plants`);
    expect(lines[1]?.endsWith(',24,"[{""id"":""p1"",""canopy_temperature"":24}]"')).toBe(true);
  });
});
