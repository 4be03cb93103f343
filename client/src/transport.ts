import { QueryParams, request } from './http';
import { extractSessionId } from './session';

export interface TransportOptions {
  /** Shop URL, without trailing slash */
  baseUrl: string;
  /** Request timeout in seconds */
  timeout: number;
  fetchImpl: typeof fetch;
  userAgent: string;
  signal?: AbortSignal;
}

export interface CallOptions {
  query?: QueryParams;
  /** Resolve the path against the shop URL instead of its `/api` endpoint */
  root?: boolean;
  /** When false the body is returned as text, unparsed */
  expectJson?: boolean;
}

/** Query parameter the shop accepts in place of the session cookie */
export const SESSION_PARAM = 'x-oekobox-sid';

/**
 * HTTP access to one shop. Owns the session id: it is captured from the
 * first response that sets a session cookie and sent with every request
 * until cleared.
 */
export class Transport {
  readonly baseUrl: string;
  readonly apiBaseUrl: string;
  readonly timeout: number;
  private fetchImpl: typeof fetch;
  private userAgent: string;
  private signal: AbortSignal | undefined;
  private sessionId: string | null = null;

  constructor(options: TransportOptions) {
    this.baseUrl = options.baseUrl;
    this.apiBaseUrl = `${options.baseUrl}/api`;
    this.timeout = options.timeout;
    this.fetchImpl = options.fetchImpl;
    this.userAgent = options.userAgent;
    this.signal = options.signal;
  }

  get session(): string | null {
    return this.sessionId;
  }

  clearSession(): void {
    this.sessionId = null;
  }

  async get(path: string, options: CallOptions = {}): Promise<unknown> {
    return this.send('GET', path, options);
  }

  /** The shop takes POST arguments as query parameters, not as a body */
  async post(path: string, options: CallOptions = {}): Promise<unknown> {
    return this.send('POST', path, options);
  }

  private async send(method: 'GET' | 'POST', path: string, options: CallOptions): Promise<unknown> {
    const base = options.root ? this.baseUrl : this.apiBaseUrl;
    const url = `${base}/${path.replace(/^\/+/, '')}`;
    const query: QueryParams = { ...options.query };
    if (this.sessionId) {
      query[SESSION_PARAM] = this.sessionId;
    }

    const res = await request(url, {
      method,
      query,
      headers: { 'User-Agent': this.userAgent },
      fetchImpl: this.fetchImpl,
      timeoutMs: this.timeout * 1000,
      expectJson: options.expectJson,
      signal: this.signal,
    });

    if (!this.sessionId) {
      this.sessionId = extractSessionId(res.headers);
    }
    return res.data;
  }
}
