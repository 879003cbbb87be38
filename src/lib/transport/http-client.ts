import { request, type Dispatcher } from 'undici';

import { HTTP_TIMEOUT_MS } from '../constants/defaults.js';
import { debugHttp } from '../utils/debug.js';
import type { HeaderMap } from '../utils/index.js';
import { buildUserAgent } from '../utils/user-agent.js';

/** Response with its body already read and parsed */
export interface ParsedResponseData {
  statusCode: number;
  headers: HeaderMap;
  body: unknown;
}

export interface AcmeRequestOptions {
  headers?: Record<string, string>;
  /** Aborts the in-flight request */
  signal?: AbortSignal;
}

/**
 * Transport consumed by the directory client and the registrar
 *
 * {@link AcmeHttpClient} is the production implementation; tests substitute an
 * in-process fake.
 */
export interface AcmeHttp {
  get(url: string, options?: AcmeRequestOptions): Promise<ParsedResponseData>;
  head(url: string, options?: AcmeRequestOptions): Promise<ParsedResponseData>;
  post(url: string, body: unknown, options?: AcmeRequestOptions): Promise<ParsedResponseData>;
}

export interface AcmeHttpClientOptions {
  /** Header and body timeout per request. Defaults to 30 seconds. */
  timeoutMs?: number;
  /** Custom undici dispatcher (proxy agent, mock agent) */
  dispatcher?: Dispatcher;
  /** Overrides the generated User-Agent */
  userAgent?: string;
}

/**
 * RFC 8555 HTTP transport
 *
 * Undici-based client for ACME protocol communication:
 * - Automatic User-Agent injection
 * - Content-type aware body parsing (JSON, problem+json, text, binary)
 * - Per-request timeout and AbortSignal cancellation
 * - Debug logging of every exchange
 */
export class AcmeHttpClient implements AcmeHttp {
  private readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;
  private readonly userAgent: string;

  constructor(opts: AcmeHttpClientOptions = {}) {
    this.timeoutMs = opts.timeoutMs ?? HTTP_TIMEOUT_MS;
    this.dispatcher = opts.dispatcher;
    this.userAgent = opts.userAgent ?? buildUserAgent();
  }

  async get(url: string, options: AcmeRequestOptions = {}): Promise<ParsedResponseData> {
    return this.send('GET', url, null, options);
  }

  async head(url: string, options: AcmeRequestOptions = {}): Promise<ParsedResponseData> {
    return this.send('HEAD', url, null, options);
  }

  async post(
    url: string,
    body: unknown,
    options: AcmeRequestOptions = {},
  ): Promise<ParsedResponseData> {
    const serialized =
      body === undefined || body === null
        ? null
        : typeof body === 'string' || body instanceof Uint8Array
          ? body
          : JSON.stringify(body);
    return this.send('POST', url, serialized, options);
  }

  private ensureUserAgent(headers: Record<string, string>): Record<string, string> {
    const hasUA = Object.keys(headers).some((k) => k.toLowerCase() === 'user-agent');
    if (!hasUA) {
      headers['User-Agent'] = this.userAgent;
    }
    return headers;
  }

  private async send(
    method: 'GET' | 'HEAD' | 'POST',
    url: string,
    body: string | Uint8Array | null,
    options: AcmeRequestOptions,
  ): Promise<ParsedResponseData> {
    const headers = this.ensureUserAgent({ ...options.headers });
    debugHttp('%s %s init headers=%j bodyLength=%d', method, url, headers, body?.length ?? 0);
    const start = Date.now();

    try {
      const res = await request(url, {
        method,
        headers,
        body,
        signal: options.signal,
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
        dispatcher: this.dispatcher,
      });
      debugHttp(
        '%s %s response status=%d durationMs=%d content-type=%s headers=%j',
        method,
        url,
        res.statusCode,
        Date.now() - start,
        res.headers['content-type'],
        res.headers,
      );

      if (method === 'HEAD') {
        await res.body.dump();
        return { statusCode: res.statusCode, headers: res.headers, body: undefined };
      }

      const data = await this.parseResponseBody(res.headers, res.body);
      debugHttp('%s %s response body=%j', method, url, data);

      return { statusCode: res.statusCode, headers: res.headers, body: data };
    } catch (err) {
      debugHttp('%s %s network error: %s', method, url, err instanceof Error ? err.message : err);
      throw err;
    }
  }

  private async parseResponseBody(
    headers: HeaderMap,
    body: Dispatcher.ResponseData['body'],
  ): Promise<unknown> {
    const rawCt = headers['content-type'];
    const ct = (Array.isArray(rawCt) ? rawCt[0] : rawCt)?.toLowerCase() ?? '';

    if (ct.includes('application/json') || ct.includes('application/problem+json')) {
      const text = await body.text();
      return text === '' ? null : JSON.parse(text);
    }
    if (ct.startsWith('text/')) {
      return body.text();
    }
    // Binary fallback
    const buf = await body.arrayBuffer();
    return Buffer.from(buf);
  }
}
