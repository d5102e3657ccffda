/**
 * Activity type definitions.
 * Types for activity records as returned by the Strava API and as stored in PostgreSQL.
 */

export interface IAthleteRef {
  id?: number | null;
}

/**
 * Activity as returned by `GET /athlete/activities` and `GET /activities/{id}`.
 * Only the fields the mapper reads are typed; the API sends many more.
 */
export interface RawActivity {
  id: number;
  name?: string | null;
  athlete?: IAthleteRef | null;
  distance?: number | null;
  moving_time?: number | null;
  elapsed_time?: number | null;
  start_date_local?: string | null;
  average_speed?: number | null;
  max_speed?: number | null;
  average_cadence?: number | null;
  average_heartrate?: number | null;
  max_heartrate?: number | null;
  elev_high?: number | null;
  elev_low?: number | null;
  has_heartrate?: boolean | null;
  kilojoules?: number | null;
  sport_type?: string | null;
  type?: string | null;
  [key: string]: unknown;
}

// Declared as a type alias so it stays assignable to `Row`.
export type NormalizedActivity = {
  athlete_id: number | null;
  activity_id: number;
  name: string;
  distance: number;
  moving_time: number;
  elapsed_time: number;
  sport: string | null;
  date: string | null; // YYYY-MM-DD (UTC calendar date of start_date_local)
  average_speed: number;
  max_speed: number;
  average_cadence: number;
  calories: number;
  has_heartrate: boolean;
  average_heartrate: number;
  max_heartrate: number;
  elev_high: number;
  elev_low: number;
  pace: string;
};

export type ActivityField = keyof NormalizedActivity;

export interface MappedActivity {
  activity: NormalizedActivity;
  /** Output fields whose source value was missing and replaced by a default. */
  defaultedFields: ActivityField[];
}
