/**
 * Data mapper exports.
 * Functions for transforming raw API data into typed objects.
 */

export {
  ACTIVITY_COLUMNS,
  ACTIVITY_SCHEMA,
  mapActivity,
  parseActivityDate,
  toActivityBatch,
  transformActivities,
} from './activityMapper';
