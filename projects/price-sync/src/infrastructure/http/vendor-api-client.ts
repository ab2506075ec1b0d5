// src/infrastructure/http/vendor-api-client.ts
import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { ApiConfig, Credentials } from '../../config';
import { Logger } from '../logging';
import { AuthFailure, FetchFailure, RateLimitResponse } from '../../utils/error';
import { isPlainObject } from '../../utils/object';
import { describeHttpError, getErrorStatus, isAuthStatus } from './http-errors';
import { Clock, Sleep, Throttle, sleep } from './throttle';

export type QueryValue = string | number | boolean;

export interface PageRequest {
  endpoint: string;
  /** 1-based */
  page: number;
  priceListId?: number;
  query?: Record<string, QueryValue>;
}

/** What a request is about, for retries and error reports */
export interface RequestTarget {
  endpoint: string;
  page?: number;
  priceListId?: number;
}

export interface PageResult {
  records: unknown[];
  isLastPage: boolean;
}

export interface PageFetcher {
  fetchPage(request: PageRequest): Promise<PageResult>;
}

export interface VendorApi extends PageFetcher {
  login(credentials: Credentials): Promise<void>;
}

export interface VendorApiClientOptions {
  baseUrl: string;
  loginPath: string;
  timeoutMs: number;
  /** Total attempts per request, the first one included */
  maxRetries: number;
  rateLimitDelayMs: number;
  logger: Logger;
  http?: AxiosInstance;
  sleep?: Sleep;
  clock?: Clock;
}

const RecordListSchema = z.array(z.unknown());

const PageEnvelopeSchema = z.object({
  body: z.unknown().optional()
});

const TokenFieldsSchema = z.object({
  token: z.string().min(1).optional().catch(undefined),
  access_token: z.string().min(1).optional().catch(undefined)
});

const LoginResponseSchema = TokenFieldsSchema.extend({
  body: TokenFieldsSchema.optional().catch(undefined)
});

/**
 * Create an axios instance for the vendor's JSON API.
 */
export function createHttpClient(baseUrl: string, timeoutMs: number): AxiosInstance {
  return axios.create({
    baseURL: baseUrl.replace(/\/+$/, ''),
    timeout: timeoutMs,
    headers: {
      Accept: 'application/json',
      'Content-Type': 'application/json'
    },
    maxRedirects: 5
  });
}

/**
 * Records of a page: `body` is either the list itself or an object holding it under `articulos`.
 */
export function extractRecords(payload: unknown): unknown[] {
  const envelope = PageEnvelopeSchema.safeParse(payload);
  if (!envelope.success) {
    throw new Error('Unexpected response payload, expected a JSON object');
  }

  const { body } = envelope.data;
  const direct = RecordListSchema.safeParse(body);
  if (direct.success) {
    return direct.data;
  }

  if (isPlainObject(body)) {
    const nested = RecordListSchema.safeParse(body.articulos);
    if (nested.success) {
      return nested.data;
    }
  }

  return [];
}

export function extractToken(payload: unknown): string | null {
  const parsed = LoginResponseSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }
  const { token, access_token, body } = parsed.data;
  return token ?? access_token ?? body?.token ?? body?.access_token ?? null;
}

/**
 * Client for the Caddis REST API: bearer login, paginated GETs with
 * a fixed-delay retry policy and a throttle shared by every call.
 */
export class VendorApiClient implements VendorApi {
  private readonly http: AxiosInstance;
  private readonly throttle: Throttle;
  private readonly logger: Logger;
  private token: string | null = null;

  constructor(private readonly options: VendorApiClientOptions) {
    this.http = options.http ?? createHttpClient(options.baseUrl, options.timeoutMs);
    this.throttle = new Throttle(options.rateLimitDelayMs, options.sleep ?? sleep, options.clock ?? Date.now);
    this.logger = options.logger;
  }

  static fromConfig(api: ApiConfig, logger: Logger): VendorApiClient {
    return new VendorApiClient({
      baseUrl: api.baseUrl,
      loginPath: api.loginPath,
      timeoutMs: api.requestTimeoutSeconds * 1000,
      maxRetries: api.maxRetries,
      rateLimitDelayMs: api.rateLimitDelaySeconds * 1000,
      logger
    });
  }

  /**
   * Exchange the credentials for a bearer token used by every later request.
   * Transient errors are retried like page requests; 401/403 and a missing token are AuthFailure.
   */
  async login(credentials: Credentials): Promise<void> {
    const endpoint = this.options.loginPath;
    this.logger.info('Authenticating with Caddis API...');

    const payload = await this.withRetries({ endpoint }, async () => {
      const response = await this.http.post<unknown>(endpoint, {
        usuario: credentials.username,
        password: credentials.password
      });
      return response.data;
    });

    const token = extractToken(payload);
    if (!token) {
      throw new AuthFailure('Could not find token in authentication response', {
        endpoint,
        responseKeys: isPlainObject(payload) ? Object.keys(payload) : []
      });
    }

    this.token = token;
    this.logger.info('Successfully authenticated with Caddis API');
  }

  /**
   * GET one page. A 404 or an empty record list marks the last page.
   */
  async fetchPage(request: PageRequest): Promise<PageResult> {
    const params = this.buildParams(request);

    return this.withRetries<PageResult>(
      request,
      async () => {
        const response = await this.http.get<unknown>(request.endpoint, { params, headers: this.authHeaders() });
        const records = extractRecords(response.data);
        return { records, isLastPage: records.length === 0 };
      },
      (status) => {
        if (status !== 404) {
          return undefined;
        }
        this.logger.debug(`No more pages at ${request.endpoint} page ${request.page} (404 response)`, {
          priceListId: request.priceListId
        });
        return { records: [], isLastPage: true };
      }
    );
  }

  /**
   * Run a call through the throttle up to `maxRetries` times.
   * `recover` may turn an error status into a result; 401/403 are never retried.
   */
  private async withRetries<T>(
    target: RequestTarget,
    call: () => Promise<T>,
    recover?: (status: number | null) => T | undefined
  ): Promise<T> {
    const maxAttempts = Math.max(1, this.options.maxRetries);
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await this.throttle.run(call);
      } catch (error) {
        const status = getErrorStatus(error);

        const recovered = recover?.(status);
        if (recovered !== undefined) {
          return recovered;
        }

        if (isAuthStatus(status)) {
          throw new AuthFailure(`Request to ${target.endpoint} was rejected: ${describeHttpError(error)}`, {
            endpoint: target.endpoint,
            page: target.page,
            priceListId: target.priceListId,
            status
          });
        }

        lastError = error;
        if (attempt < maxAttempts) {
          this.logger.warn(`Error calling ${describeTarget(target)}, retrying (${attempt}/${maxAttempts})`, {
            status,
            error: describeHttpError(error)
          });
        }
      }
    }

    throw this.toFetchFailure(target, lastError, maxAttempts);
  }

  private buildParams(request: PageRequest): Record<string, QueryValue> {
    const params: Record<string, QueryValue> = { pagina: request.page };
    if (request.priceListId !== undefined) {
      params.lista = request.priceListId;
    }
    return { ...params, ...request.query };
  }

  private authHeaders(): Record<string, string> {
    return this.token ? { Authorization: `Bearer ${this.token}` } : {};
  }

  private toFetchFailure(target: RequestTarget, error: unknown, attempts: number): FetchFailure {
    const status = getErrorStatus(error);
    const context = {
      endpoint: target.endpoint,
      page: target.page,
      priceListId: target.priceListId,
      attempts,
      status,
      lastError: describeHttpError(error)
    };
    const message = `Failed to fetch ${describeTarget(target)} after ${attempts} attempts: ${context.lastError}`;

    return status === 429 ? new RateLimitResponse(message, context) : new FetchFailure(message, context);
  }
}

function describeTarget(target: RequestTarget): string {
  let description = target.endpoint;
  if (target.page !== undefined) {
    description += ` page ${target.page}`;
  }
  if (target.priceListId !== undefined) {
    description += ` (price list ${target.priceListId})`;
  }
  return description;
}
