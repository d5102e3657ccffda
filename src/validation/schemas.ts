import { z } from 'zod';

const nullableNumber = z.number().nullish();

// Strava sends far more fields than the mapper reads; keep them all
const AthleteRefSchema = z
  .object({
    id: nullableNumber,
  })
  .passthrough();

export const RawActivitySchema = z
  .object({
    id: z.number().int(),
    name: z.string().nullish(),
    athlete: AthleteRefSchema.nullish(),
    distance: nullableNumber,
    moving_time: nullableNumber,
    elapsed_time: nullableNumber,
    start_date_local: z.string().nullish(),
    average_speed: nullableNumber,
    max_speed: nullableNumber,
    average_cadence: nullableNumber,
    average_heartrate: nullableNumber,
    max_heartrate: nullableNumber,
    elev_high: nullableNumber,
    elev_low: nullableNumber,
    has_heartrate: z.boolean().nullish(),
    kilojoules: nullableNumber,
    sport_type: z.string().nullish(),
    type: z.string().nullish(),
  })
  .passthrough();

export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_at: z.number(),
  refresh_token: z.string().optional(),
});

// Webhook event as posted by Strava
export const WebhookEventSchema = z.object({
  aspect_type: z.string(),
  object_id: z.number().int(),
  object_type: z.string(),
  owner_id: z.number().int(),
  event_time: z.number().optional(),
  subscription_id: z.number().optional(),
  updates: z.record(z.string(), z.unknown()).optional(),
});

// Subscription verification query (GET /webhook)
export const VerificationQuerySchema = z.object({
  'hub.challenge': z.string().min(1),
  'hub.mode': z.string().min(1),
  'hub.verify_token': z.string().min(1),
});
