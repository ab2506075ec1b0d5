// src/testing/stub-http.ts
/**
 * In-process stand-in for the Caddis API, plugged into axios as a custom adapter
 */
import axios, { AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { isPlainObject } from '../utils/object';

export interface RecordedRequest {
  method: string;
  url: string;
  params: Record<string, unknown>;
  data: unknown;
  authorization: string | null;
}

export type StubReply =
  | { status: number; data?: unknown }
  | { networkError: string };

export type StubHandler = (request: RecordedRequest) => StubReply;

export const STUB_BASE_URL = 'https://caddis.test';
export const STUB_TOKEN = 'test-token';

function parseBody(data: unknown): unknown {
  if (typeof data !== 'string') {
    return data;
  }
  try {
    return JSON.parse(data);
  } catch {
    return data;
  }
}

export class StubHttp {
  readonly requests: RecordedRequest[] = [];
  readonly client: AxiosInstance;

  constructor(private readonly handler: StubHandler) {
    this.client = axios.create({
      baseURL: STUB_BASE_URL,
      adapter: (config) => this.handle(config)
    });
  }

  /** Requests sent to one endpoint, in order */
  requestsTo(url: string): RecordedRequest[] {
    return this.requests.filter((request) => request.url === url);
  }

  private async handle(config: InternalAxiosRequestConfig): Promise<AxiosResponse> {
    const authorization = config.headers.get('Authorization');
    const request: RecordedRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      params: isPlainObject(config.params) ? { ...config.params } : {},
      data: parseBody(config.data),
      authorization: typeof authorization === 'string' ? authorization : null
    };
    this.requests.push(request);

    const reply = this.handler(request);
    if ('networkError' in reply) {
      throw new AxiosError(`connect ${reply.networkError}`, reply.networkError, config);
    }

    const response: AxiosResponse = {
      data: reply.data ?? {},
      status: reply.status,
      statusText: reply.status >= 400 ? 'Error' : 'OK',
      headers: {},
      config
    };

    if (reply.status < 200 || reply.status >= 300) {
      const code = reply.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST;
      throw new AxiosError(`Request failed with status code ${reply.status}`, code, config, null, response);
    }
    return response;
  }
}

export interface CaddisFixture {
  /** Article pages in order; every page after the last one is empty */
  articles: unknown[][];
  /** Price pages per price list ID */
  prices?: Record<number, unknown[][]>;
  token?: string;
}

/**
 * Handler answering login, catalog and price requests from fixture pages
 */
export function caddisHandler(fixture: CaddisFixture): StubHandler {
  return (request) => {
    if (request.method === 'POST' && request.url === '/v1/login') {
      return { status: 200, data: { token: fixture.token ?? STUB_TOKEN } };
    }

    const page = Number(request.params.pagina);
    if (request.url === '/v1/articulos') {
      return { status: 200, data: { body: fixture.articles[page - 1] ?? [] } };
    }
    if (request.url === '/v1/articulos/precios') {
      const pages = fixture.prices?.[Number(request.params.lista)] ?? [];
      return { status: 200, data: { body: { articulos: pages[page - 1] ?? [] } } };
    }
    return { status: 404 };
  };
}
