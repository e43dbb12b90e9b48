import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import { buildEventUid, materializeCalendarEvents, toCalendarEvent } from './calendar.events.js';
import { Weekday } from '../schedule/schedule.types.js';
import { buildShift } from '../../test/fixtures/test-data.js';

const createdAt = DateTime.fromISO('2026-01-02T09:00:00', { zone: 'utc' });

describe('buildEventUid', () => {
  it('should combine the start, person and layer', () => {
    const start = DateTime.fromISO('2026-01-05T08:00:00', { zone: 'utc' });
    expect(buildEventUid(start, 'Mary  Ann', 'layer_1')).toBe(
      '20260105T080000-Mary-Ann-layer_1-oncall@rotation-scheduler',
    );
  });
});

describe('toCalendarEvent', () => {
  it('should place the window on the shift date', () => {
    const event = toCalendarEvent(buildShift({ startTime: '13:00', endTime: '15:30' }), createdAt);

    expect(event.uid).toBe('20260105T130000-Alice-layer_1-oncall@rotation-scheduler');
    expect(event.start.toISO({ includeOffset: false })).toBe('2026-01-05T13:00:00.000');
    expect(event.end.toISO({ includeOffset: false })).toBe('2026-01-05T15:30:00.000');
    expect(event.layerName).toBe('Layer 1');
    expect(event.createdAt).toBe(createdAt);
  });
});

describe('materializeCalendarEvents', () => {
  it('should group one event per shift by person', () => {
    const shifts = [
      buildShift({ person: 'Bob' }),
      buildShift({ person: 'Alice', startTime: '10:30', endTime: '13:00' }),
      buildShift({ person: 'Bob', date: '2026-01-06', weekday: Weekday.Tuesday }),
    ];

    const events = materializeCalendarEvents(shifts, { generatedAt: createdAt });

    expect([...events.keys()]).toEqual(['Bob', 'Alice']);
    expect(events.get('Bob')?.map((event) => event.uid)).toEqual([
      '20260105T080000-Bob-layer_1-oncall@rotation-scheduler',
      '20260106T080000-Bob-layer_1-oncall@rotation-scheduler',
    ]);
  });

  it('should keep back-to-back shifts as separate events', () => {
    const shifts = [buildShift(), buildShift({ startTime: '10:30', endTime: '13:00', layerId: 'layer_2' })];
    expect(materializeCalendarEvents(shifts, { generatedAt: createdAt }).get('Alice')).toHaveLength(2);
  });

  it('should produce identical UIDs across runs', () => {
    const shifts = [buildShift()];
    const first = materializeCalendarEvents(shifts, { generatedAt: createdAt }).get('Alice');
    const second = materializeCalendarEvents(shifts, { generatedAt: createdAt.plus({ days: 3 }) }).get('Alice');

    expect(second?.map((event) => event.uid)).toEqual(first?.map((event) => event.uid));
  });
});
