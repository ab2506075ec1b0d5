// src/infrastructure/http/http-errors.ts
import { AxiosError } from 'axios';

/**
 * Extract a human-readable error message from a failed request.
 */
export function describeHttpError(err: unknown): string {
  if (err instanceof AxiosError) {
    if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') return 'Request timed out';
    if (err.code === 'ENOTFOUND')
      return `DNS lookup failed: ${err.config?.baseURL ?? 'unknown host'}`;
    if (err.code === 'ECONNRESET') return 'Connection reset by server';
    if (err.code === 'ECONNREFUSED') return 'Connection refused';
    if (err.response)
      return `HTTP ${err.response.status}: ${err.response.statusText}`;
    return err.message;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * HTTP status code of a failed request, if the server answered at all.
 */
export function getErrorStatus(err: unknown): number | null {
  if (err instanceof AxiosError && err.response) {
    return err.response.status;
  }
  return null;
}

export function isAuthStatus(status: number | null): boolean {
  return status === 401 || status === 403;
}
