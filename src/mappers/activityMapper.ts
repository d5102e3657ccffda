/**
 * Activity transformation utilities.
 * Transforms raw Strava activities into fixed-schema rows for the activities table.
 */

import { MissingColumnError } from '../errors';
import { debugTransform, isDebugEnabled } from '../utils/debugLogger';
import { formatPace } from '../utils/pace';
import { roundHalfEven } from '../utils/rounding';

import type {
  ActivityField,
  BatchSchema,
  MappedActivity,
  NormalizedActivity,
  RawActivity,
  RecordBatch,
} from '../types';
import type { Logger } from '../utils/logger';

const KILOJOULES_TO_KILOCALORIES = 0.239;

// Exact shape of start_date_local; anything else maps to a null date
const START_DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;

/**
 * Column order and semantic types of the activities table.
 */
export const ACTIVITY_SCHEMA = {
  athlete_id: 'integer',
  activity_id: 'integer',
  name: 'string',
  distance: 'float',
  moving_time: 'float',
  elapsed_time: 'float',
  sport: 'string',
  date: 'date',
  average_speed: 'float',
  max_speed: 'float',
  average_cadence: 'float',
  calories: 'integer',
  has_heartrate: 'boolean',
  average_heartrate: 'float',
  max_heartrate: 'float',
  elev_high: 'float',
  elev_low: 'float',
  pace: 'string',
} as const satisfies Record<ActivityField, BatchSchema[string]>;

export const ACTIVITY_COLUMNS = Object.keys(ACTIVITY_SCHEMA);

/**
 * Tracks which output fields fell back to a default while mapping one record.
 */
class FieldDefaults {
  readonly fields: ActivityField[] = [];

  number(field: ActivityField, value: number | null | undefined): number {
    if (value === null || value === undefined || !Number.isFinite(value)) {
      this.fields.push(field);
      return 0;
    }
    return value;
  }

  boolean(field: ActivityField, value: boolean | null | undefined): boolean {
    if (value === null || value === undefined) {
      this.fields.push(field);
      return false;
    }
    return value;
  }

  nullable<T>(field: ActivityField, value: T | null): T | null {
    if (value === null) this.fields.push(field);
    return value;
  }
}

function extractAthleteId(raw: RawActivity): number | null {
  const id = raw.athlete?.id;
  return typeof id === 'number' && Number.isInteger(id) ? id : null;
}

/**
 * Parse start_date_local ("2023-05-15T08:30:00Z") and keep only the UTC calendar date.
 * Returns null for malformed or impossible timestamps instead of throwing.
 */
export function parseActivityDate(value: string | null | undefined): string | null {
  if (!value) return null;
  const match = START_DATE_REGEX.exec(value);
  if (!match) return null;

  const [, year, month, day, hour, minute, second] = match.map(Number);
  const timestamp = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  if (
    timestamp.getUTCFullYear() !== year ||
    timestamp.getUTCMonth() !== month - 1 ||
    timestamp.getUTCDate() !== day ||
    timestamp.getUTCHours() !== hour ||
    timestamp.getUTCMinutes() !== minute ||
    timestamp.getUTCSeconds() !== second
  ) {
    return null;
  }

  return timestamp.toISOString().slice(0, 10);
}

/**
 * Map one raw activity to a normalized row.
 * Never throws: every nullable numeric source field becomes 0 and is listed in
 * `defaultedFields`.
 */
export function mapActivity(raw: RawActivity): MappedActivity {
  const defaults = new FieldDefaults();

  const averageSpeed = roundHalfEven(defaults.number('average_speed', raw.average_speed), 2);
  const kilojoules = defaults.number('calories', raw.kilojoules);

  const activity: NormalizedActivity = {
    athlete_id: defaults.nullable('athlete_id', extractAthleteId(raw)),
    activity_id: Math.trunc(raw.id),
    name: raw.name ?? '',
    distance: roundHalfEven(defaults.number('distance', raw.distance) / 1000, 2),
    moving_time: roundHalfEven(defaults.number('moving_time', raw.moving_time) / 60, 2),
    elapsed_time: roundHalfEven(defaults.number('elapsed_time', raw.elapsed_time) / 60, 2),
    sport: defaults.nullable('sport', raw.sport_type ?? raw.type ?? null),
    date: defaults.nullable('date', parseActivityDate(raw.start_date_local)),
    average_speed: averageSpeed,
    max_speed: roundHalfEven(defaults.number('max_speed', raw.max_speed), 2),
    average_cadence: roundHalfEven(defaults.number('average_cadence', raw.average_cadence), 2),
    calories: roundHalfEven(kilojoules * KILOJOULES_TO_KILOCALORIES),
    has_heartrate: defaults.boolean('has_heartrate', raw.has_heartrate),
    average_heartrate: roundHalfEven(
      defaults.number('average_heartrate', raw.average_heartrate),
      1,
    ),
    max_heartrate: roundHalfEven(defaults.number('max_heartrate', raw.max_heartrate), 1),
    elev_high: roundHalfEven(defaults.number('elev_high', raw.elev_high), 2),
    elev_low: roundHalfEven(defaults.number('elev_low', raw.elev_low), 2),
    pace: formatPace(averageSpeed),
  };

  return { activity, defaultedFields: defaults.fields };
}

/**
 * Transform a batch of raw activities.
 *
 * @throws MissingColumnError when the batch is non-empty and no record has an
 *   `athlete` key at all, since athlete_id is part of the table's primary key
 */
export function transformActivities(raw: readonly RawActivity[], log?: Logger): NormalizedActivity[] {
  if (raw.length > 0 && !raw.some((record) => 'athlete' in record)) {
    throw new MissingColumnError('athlete');
  }

  const defaultedCounts: Partial<Record<ActivityField, number>> = {};
  const activities = raw.map((record) => {
    const { activity, defaultedFields } = mapActivity(record);
    for (const field of defaultedFields) {
      defaultedCounts[field] = (defaultedCounts[field] ?? 0) + 1;
    }
    return activity;
  });

  if (isDebugEnabled()) {
    debugTransform(log, 'Mapped activities', raw[0], activities[0], {
      count: activities.length,
      defaultedCounts,
    });
  }

  const missingAthletes = defaultedCounts.athlete_id ?? 0;
  if (missingAthletes > 0) {
    log?.warn('Activities without athlete id', {
      count: missingAthletes,
      total: activities.length,
    });
  }

  return activities;
}

/**
 * Wrap normalized activities with their column types for the loader.
 */
export function toActivityBatch(activities: NormalizedActivity[]): RecordBatch<NormalizedActivity> {
  return { rows: activities, schema: { ...ACTIVITY_SCHEMA } };
}
