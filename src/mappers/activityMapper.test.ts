import { describe, expect, it } from 'vitest';

import { MissingColumnError } from '../errors';
import { buildRawActivity, createTestLogger } from '../test/factories';
import {
  ACTIVITY_COLUMNS,
  mapActivity,
  parseActivityDate,
  toActivityBatch,
  transformActivities,
} from './activityMapper';

describe('parseActivityDate', () => {
  it('keeps the UTC calendar date', () => {
    expect(parseActivityDate('2023-05-15T08:30:00Z')).toBe('2023-05-15');
  });

  it.each([
    undefined,
    null,
    '',
    '2023-05-15',
    '2023-05-15T08:30:00',
    '2023-05-15T08:30:00.000Z',
    '2023-02-30T08:30:00Z',
    '2023-05-15T25:00:00Z',
    'not a date',
  ])('returns null for %s', (value) => {
    expect(parseActivityDate(value)).toBeNull();
  });
});

describe('mapActivity', () => {
  it('normalizes a complete activity', () => {
    const { activity, defaultedFields } = mapActivity(buildRawActivity());

    expect(activity).toEqual({
      athlete_id: 12_345,
      activity_id: 1001,
      name: 'Morning Run',
      distance: 5,
      moving_time: 25,
      elapsed_time: 26.67,
      sport: 'Run',
      date: '2023-05-15',
      average_speed: 3.33,
      max_speed: 4.1,
      average_cadence: 85.57,
      calories: 120,
      has_heartrate: true,
      average_heartrate: 145.7,
      max_heartrate: 180.2,
      elev_high: 100.57,
      elev_low: 50.23,
      pace: '5:00/km',
    });
    expect(defaultedFields).toEqual([]);
  });

  it('emits columns in table order', () => {
    const { activity } = mapActivity(buildRawActivity());
    expect(Object.keys(activity)).toEqual(ACTIVITY_COLUMNS);
  });

  it('prefers sport_type over type', () => {
    const { activity } = mapActivity(buildRawActivity({ sport_type: 'TrailRun', type: 'Run' }));
    expect(activity.sport).toBe('TrailRun');
  });

  it('defaults missing numeric fields to zero and records them', () => {
    const { activity, defaultedFields } = mapActivity({
      id: 7,
      athlete: { id: 1 },
      distance: null,
      moving_time: null,
      elapsed_time: null,
      average_speed: null,
      max_speed: null,
      average_cadence: null,
      average_heartrate: null,
      max_heartrate: null,
      elev_high: null,
      elev_low: null,
      has_heartrate: null,
    });

    expect(activity).toMatchObject({
      distance: 0,
      moving_time: 0,
      elapsed_time: 0,
      average_speed: 0,
      max_speed: 0,
      average_cadence: 0,
      calories: 0,
      has_heartrate: false,
      average_heartrate: 0,
      max_heartrate: 0,
      elev_high: 0,
      elev_low: 0,
      pace: 'N/A',
      sport: null,
      date: null,
      name: '',
    });
    expect(defaultedFields).toContain('calories');
    expect(defaultedFields).toContain('has_heartrate');
    expect(defaultedFields).toContain('sport');
  });

  it('maps an athlete without an id to a null athlete_id', () => {
    const { activity, defaultedFields } = mapActivity(buildRawActivity({ athlete: {} }));
    expect(activity.athlete_id).toBeNull();
    expect(defaultedFields).toContain('athlete_id');
  });

  it('rounds calories half to even', () => {
    // 10 kJ * 0.239 = 2.39 kcal
    expect(mapActivity(buildRawActivity({ kilojoules: 10 })).activity.calories).toBe(2);
    expect(mapActivity(buildRawActivity({ kilojoules: 0 })).activity.calories).toBe(0);
  });

  it('maps a malformed start date to null without failing', () => {
    const { activity } = mapActivity(buildRawActivity({ start_date_local: '15/05/2023' }));
    expect(activity.date).toBeNull();
    expect(activity.distance).toBe(5);
  });
});

describe('transformActivities', () => {
  const log = createTestLogger();

  it('returns an empty list for an empty batch', () => {
    expect(transformActivities([], log)).toEqual([]);
  });

  it('throws when no record carries an athlete', () => {
    const { athlete: _athlete, ...withoutAthlete } = buildRawActivity();
    expect(() => transformActivities([withoutAthlete], log)).toThrow(MissingColumnError);
  });

  it('accepts a batch where only some records carry an athlete', () => {
    const { athlete: _athlete, ...withoutAthlete } = buildRawActivity({ id: 2 });
    const activities = transformActivities([buildRawActivity(), withoutAthlete], log);
    expect(activities.map((activity) => activity.athlete_id)).toEqual([12_345, null]);
  });

  it('preserves input order', () => {
    const ids = transformActivities(
      [buildRawActivity({ id: 3 }), buildRawActivity({ id: 1 }), buildRawActivity({ id: 2 })],
      log,
    ).map((activity) => activity.activity_id);
    expect(ids).toEqual([3, 1, 2]);
  });

  it('produces identical output for identical input', () => {
    const raw = [buildRawActivity()];
    expect(transformActivities(raw, log)).toEqual(transformActivities(raw, log));
  });
});

describe('toActivityBatch', () => {
  it('attaches the activity schema', () => {
    const batch = toActivityBatch([]);
    expect(batch.schema.calories).toBe('integer');
    expect(batch.schema.date).toBe('date');
    expect(Object.keys(batch.schema)).toEqual(ACTIVITY_COLUMNS);
  });
});
