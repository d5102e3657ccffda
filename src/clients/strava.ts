/**
 * Strava API client: refresh-token authentication, paginated activity listing
 * and single-activity lookup. Responses are validated before they reach the mapper.
 */

import axios, { isAxiosError } from 'axios';

import { RetryConfig, StravaConfig, validateStravaEnv } from '../config';
import { StravaApiError } from '../errors';
import { debugApi } from '../utils/debugLogger';
import { logger as defaultLogger } from '../utils/logger';
import { withRetry } from '../utils/retry';
import { RawActivitySchema, TokenResponseSchema } from '../validation/schemas';

import type { RawActivity } from '../types';
import type { Logger } from '../utils/logger';
import type { AxiosInstance, AxiosRequestConfig } from 'axios';

export interface StravaCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export interface FetchActivitiesOptions {
  /** Only activities that started after this instant. */
  after?: Date;
  maxPages?: number;
  perPage?: number;
}

/**
 * What the pipelines need from the activity API.
 */
export interface ActivitySource {
  fetchActivity(activityId: number): Promise<RawActivity | null>;
  fetchAllActivities(options?: FetchActivitiesOptions): Promise<RawActivity[]>;
}

export interface StravaClientOptions {
  http?: AxiosInstance;
  log?: Logger;
  retry?: { baseDelayMs: number; maxRetries: number };
}

interface CachedToken {
  accessToken: string;
  expiresAt: number; // epoch seconds
}

/**
 * Read credentials from STRAVA_CLIENT_ID / STRAVA_CLIENT_SECRET / STRAVA_REFRESH_TOKEN.
 */
export function credentialsFromEnv(): StravaCredentials {
  validateStravaEnv();
  return {
    clientId: process.env.STRAVA_CLIENT_ID ?? '',
    clientSecret: process.env.STRAVA_CLIENT_SECRET ?? '',
    refreshToken: process.env.STRAVA_REFRESH_TOKEN ?? '',
  };
}

function statusOf(error: unknown): number | undefined {
  if (error instanceof StravaApiError) return error.statusCode;
  if (isAxiosError(error)) return error.response?.status;
  return undefined;
}

/**
 * Network errors, rate limiting and server errors are worth another attempt.
 */
function isRetryable(error: Error): boolean {
  const status = statusOf(error);
  return status === undefined || status === 429 || status >= 500;
}

function toApiError(error: unknown, operation: string): StravaApiError {
  if (error instanceof StravaApiError) return error;
  const status = statusOf(error);
  const detail = error instanceof Error ? error.message : String(error);
  return new StravaApiError(`${operation} failed: ${detail}`, status, { cause: error });
}

export class StravaClient implements ActivitySource {
  private readonly credentials: StravaCredentials;
  private readonly http: AxiosInstance;
  private readonly log: Logger;
  private readonly retry: { baseDelayMs: number; maxRetries: number };
  private token?: CachedToken;

  constructor(credentials: StravaCredentials, options: StravaClientOptions = {}) {
    this.credentials = { ...credentials };
    this.http = options.http ?? axios.create({ timeout: StravaConfig.timeoutMs });
    this.log = options.log ?? defaultLogger;
    this.retry = options.retry ?? {
      baseDelayMs: RetryConfig.baseDelayMs,
      maxRetries: RetryConfig.maxRetries,
    };
  }

  /**
   * Fetch one activity by id. Returns null when Strava answers 404
   * (deleted, private or never existed).
   */
  async fetchActivity(activityId: number): Promise<RawActivity | null> {
    try {
      const data = await this.authorizedGet(`/activities/${String(activityId)}`, {}, 'fetchActivity');
      const parsed = RawActivitySchema.safeParse(data);
      if (!parsed.success) {
        this.log.warn('Activity response failed validation', {
          activityId,
          issues: parsed.error.issues,
        });
        return null;
      }
      const activity: RawActivity = parsed.data;
      return activity;
    } catch (error) {
      if (statusOf(error) === 404) {
        this.log.warn('Activity not found', { activityId });
        return null;
      }
      throw toApiError(error, `Fetching activity ${String(activityId)}`);
    }
  }

  /**
   * Page through the athlete's activities until an empty or short page,
   * or until `maxPages` pages have been read.
   */
  async fetchAllActivities(options: FetchActivitiesOptions = {}): Promise<RawActivity[]> {
    const perPage = options.perPage ?? StravaConfig.perPage;
    const maxPages = options.maxPages ?? StravaConfig.maxPages;
    const activities: RawActivity[] = [];

    for (let page = 1; page <= maxPages; page++) {
      const batch = await this.fetchActivitiesPage(page, perPage, options.after);
      activities.push(...batch.activities);

      if (batch.received < perPage) break;
      if (page === maxPages) {
        this.log.warn('Stopped paging at page limit', { maxPages, perPage });
      }
    }

    this.log.info('Fetched activities', { count: activities.length });
    return activities;
  }

  /**
   * Fetch one page of `GET /athlete/activities`.
   * Elements failing validation are logged and dropped; `received` counts them anyway
   * so paging still stops at the right page.
   */
  async fetchActivitiesPage(
    page: number,
    perPage: number,
    after?: Date,
  ): Promise<{ activities: RawActivity[]; received: number }> {
    const params: Record<string, number> = { page, per_page: perPage };
    if (after) params.after = Math.floor(after.getTime() / 1000);

    let data: unknown;
    try {
      data = await this.authorizedGet('/athlete/activities', { params }, 'fetchActivitiesPage');
    } catch (error) {
      throw toApiError(error, `Fetching activities page ${String(page)}`);
    }

    if (!Array.isArray(data)) {
      throw new StravaApiError(`Expected an array of activities on page ${String(page)}`);
    }

    const activities: RawActivity[] = [];
    for (const item of data) {
      const parsed = RawActivitySchema.safeParse(item);
      if (parsed.success) {
        activities.push(parsed.data);
      } else {
        this.log.warn('Dropping activity that failed validation', {
          issues: parsed.error.issues,
          page,
        });
      }
    }

    debugApi(this.log, 'Fetched activities page', {
      page,
      perPage,
      received: data.length,
      valid: activities.length,
    });

    return { activities, received: data.length };
  }

  /**
   * Return a cached access token, refreshing it shortly before it expires.
   */
  async getAccessToken(): Promise<string> {
    const now = Math.floor(Date.now() / 1000);
    if (this.token && this.token.expiresAt > now + StravaConfig.tokenExpirySkewSeconds) {
      return this.token.accessToken;
    }
    return this.refreshAccessToken();
  }

  async refreshAccessToken(): Promise<string> {
    const data = await withRetry(
      async () => {
        const response = await this.http.post<unknown>(StravaConfig.tokenUrl, undefined, {
          params: {
            client_id: this.credentials.clientId,
            client_secret: this.credentials.clientSecret,
            grant_type: 'refresh_token',
            refresh_token: this.credentials.refreshToken,
          },
        });
        return response.data;
      },
      { ...this.retry, log: this.log, operationName: 'Token refresh', shouldRetry: isRetryable },
    ).catch((error: unknown) => {
      throw toApiError(error, 'Token refresh');
    });

    const parsed = TokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new StravaApiError('Token response did not contain an access token');
    }

    // Strava may rotate the refresh token
    if (parsed.data.refresh_token) {
      this.credentials.refreshToken = parsed.data.refresh_token;
    }
    this.token = { accessToken: parsed.data.access_token, expiresAt: parsed.data.expires_at };
    this.log.info('Access token refreshed', { expiresAt: parsed.data.expires_at });

    return parsed.data.access_token;
  }

  /**
   * GET with bearer auth and retries. A 401 invalidates the cached token and
   * is retried once with a fresh one.
   */
  private async authorizedGet(
    path: string,
    config: AxiosRequestConfig,
    operationName: string,
  ): Promise<unknown> {
    const get = async (accessToken: string): Promise<unknown> =>
      withRetry(
        async () => {
          const response = await this.http.get<unknown>(`${StravaConfig.apiBaseUrl}${path}`, {
            ...config,
            headers: { Authorization: `Bearer ${accessToken}` },
          });
          return response.data;
        },
        { ...this.retry, log: this.log, operationName, shouldRetry: isRetryable },
      );

    try {
      return await get(await this.getAccessToken());
    } catch (error) {
      if (statusOf(error) !== 401) throw error;
      this.log.warn('Access token rejected, refreshing', { operationName });
      this.token = undefined;
      return get(await this.refreshAccessToken());
    }
  }
}
