import { ResultResponse } from './types';
import {
  OekoboxApiError,
  OekoboxAuthenticationError,
  OekoboxConnectionError,
  OekoboxError,
  OekoboxValidationError,
} from './errors';

export type QueryParams = Record<string, string | number | undefined>;

export interface RequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  query?: QueryParams;
  fetchImpl?: typeof fetch;
  /** Request timeout in milliseconds. Default: 30000 (30s). */
  timeoutMs?: number;
  /** When false the body is returned as text, unparsed. Default: true */
  expectJson?: boolean;
  /** Caller cancellation, combined with the timeout */
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  headers: Headers;
  /** Parsed JSON (`null` for an empty body), or the raw text when `expectJson` is false */
  data: unknown;
}

const AUTH_RESULTS = new Set(['no_such_user', 'wrong_password', 'blocked', 'duplicate_user']);
const VALIDATION_RESULTS: Record<string, string> = {
  empty: 'Validation error: empty',
  no_data: 'Validation error: no_data',
  no_ddate: 'Validation error: no_ddate (select a delivery date before adding items to the cart)',
};

// Query parameters never echoed into error messages
const SECRET_PARAMS = ['pass', 'x-oekobox-sid'];

export function buildUrl(base: string, query?: QueryParams): string {
  if (!query) return base;
  const params = new URLSearchParams();
  for (const [k, v] of Object.entries(query)) {
    if (v !== undefined) params.set(k, String(v));
  }
  const qs = params.toString();
  return qs ? `${base}?${qs}` : base;
}

/** The URL with secret query values masked, for messages */
export function displayUrl(url: string): string {
  const parsed = new URL(url);
  for (const name of SECRET_PARAMS) {
    if (parsed.searchParams.has(name)) parsed.searchParams.set(name, '***');
  }
  return parsed.toString();
}

export function isResultResponse(value: unknown): value is ResultResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    typeof (value as Record<string, unknown>).result === 'string'
  );
}

function describeFailure(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? ` (${err.cause.message})` : '';
    return `${err.message}${cause}`;
  }
  return String(err);
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function serverMessage(body: unknown, text: string, statusText: string): string {
  if (typeof body === 'object' && body !== null) {
    const error = (body as Record<string, unknown>).error;
    if (typeof error === 'string' && error) return error;
  }
  return text.trim() || statusText || 'unknown error';
}

/** Map a `result` code other than `ok` onto the error taxonomy */
export function resultError(result: string, status: number, internalError?: string, data?: unknown): OekoboxError {
  if (AUTH_RESULTS.has(result)) {
    return new OekoboxAuthenticationError(`Authentication failed: ${result}`, status, internalError);
  }
  if (result in VALIDATION_RESULTS) {
    return new OekoboxValidationError(VALIDATION_RESULTS[result], status, internalError);
  }
  return new OekoboxApiError(`API error: ${result}`, status, internalError, data);
}

export async function request(
  url: string,
  opts: RequestOptions = {},
): Promise<HttpResponse> {
  const {
    method = 'GET',
    headers = {},
    query,
    fetchImpl = fetch,
    timeoutMs = 30_000,
    expectJson = true,
    signal,
  } = opts;

  const fullUrl = buildUrl(url, query);
  if (signal?.aborted) {
    throw new OekoboxConnectionError(`Request to ${displayUrl(fullUrl)} was aborted`, signal.reason);
  }

  const init: RequestInit = {
    method,
    headers: {
      Accept: expectJson ? 'application/json' : '*/*',
      ...headers,
    },
  };

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const forwardAbort = () => controller.abort(signal?.reason);
  signal?.addEventListener('abort', forwardAbort, { once: true });

  let res: globalThis.Response;
  let text: string;
  try {
    res = await fetchImpl(fullUrl, { ...init, signal: controller.signal });
    text = await res.text();
  } catch (err) {
    if (timedOut) {
      throw new OekoboxConnectionError(
        `Request to ${displayUrl(fullUrl)} timed out after ${timeoutMs}ms`,
        err,
      );
    }
    if (controller.signal.aborted) {
      throw new OekoboxConnectionError(`Request to ${displayUrl(fullUrl)} was aborted`, err);
    }
    throw new OekoboxConnectionError(`Connection error: ${describeFailure(err)}`, err);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', forwardAbort);
  }

  const internalError = res.headers.get('X-oekobox-error') ?? undefined;

  if (res.status === 401) {
    throw new OekoboxAuthenticationError('HTTP 401: Authentication failed', 401, internalError);
  }
  if (res.status === 403) {
    throw new OekoboxAuthenticationError('HTTP 403: Access forbidden', 403, internalError);
  }
  if (!res.ok) {
    const parsed = parseJson(text);
    const body = parsed.ok ? parsed.value : text;
    throw new OekoboxApiError(
      `HTTP ${res.status}: ${serverMessage(body, text, res.statusText)}`,
      res.status,
      internalError,
      body,
    );
  }

  if (!expectJson) {
    return { status: res.status, headers: res.headers, data: text };
  }

  let data: unknown = null;
  if (text.trim() !== '') {
    const parsed = parseJson(text);
    if (!parsed.ok) {
      throw new OekoboxApiError(
        `Invalid JSON response from ${displayUrl(fullUrl)} (HTTP ${res.status})`,
        res.status,
        internalError,
        text,
      );
    }
    data = parsed.value;
  }

  if (isResultResponse(data) && data.result !== 'ok') {
    throw resultError(data.result, res.status, internalError, data);
  }

  return { status: res.status, headers: res.headers, data };
}
