/**
 * Centralized type exports.
 * All type definitions are exported from this index for consistent imports.
 */

// Activity types
export type {
  ActivityField,
  IAthleteRef,
  MappedActivity,
  NormalizedActivity,
  RawActivity,
} from './activity';

// Storage types
export type {
  BatchSchema,
  CellValue,
  ColumnDescription,
  KeyTuple,
  LoadOptions,
  LoadResult,
  RecordBatch,
  Row,
  SchemaCheckResult,
  SchemaMismatch,
  SemanticType,
  TableDescription,
} from './storage';

// Webhook types
export type { AspectType, EventAction, EventOutcome, WebhookEvent } from './webhook';
