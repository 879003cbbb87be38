/**
 * In-process stand-in for the ACME transport.
 *
 * Routes are keyed by method and URL; every request is recorded so tests can
 * assert on what was sent and on how many round trips were made.
 */
import type {
  AcmeHttp,
  AcmeRequestOptions,
  JwsEnvelope,
  ParsedResponseData,
} from '../../src/index.js';

export type HttpMethod = 'GET' | 'HEAD' | 'POST';

export interface RecordedCall {
  method: HttpMethod;
  url: string;
  body: unknown;
  options: AcmeRequestOptions;
}

export type MockRoute =
  | ParsedResponseData
  | ((call: RecordedCall) => ParsedResponseData | Promise<ParsedResponseData>);

export class MockHttpClient implements AcmeHttp {
  readonly calls: RecordedCall[] = [];
  private readonly routes = new Map<string, MockRoute>();

  on(method: HttpMethod, url: string, route: MockRoute): this {
    this.routes.set(`${method} ${url}`, route);
    return this;
  }

  async get(url: string, options: AcmeRequestOptions = {}): Promise<ParsedResponseData> {
    return this.dispatch({ method: 'GET', url, body: undefined, options });
  }

  async head(url: string, options: AcmeRequestOptions = {}): Promise<ParsedResponseData> {
    return this.dispatch({ method: 'HEAD', url, body: undefined, options });
  }

  async post(
    url: string,
    body: unknown,
    options: AcmeRequestOptions = {},
  ): Promise<ParsedResponseData> {
    return this.dispatch({ method: 'POST', url, body, options });
  }

  /** Signed bodies POSTed so far, in order */
  postedEnvelopes(): JwsEnvelope[] {
    return this.calls.filter((c) => c.method === 'POST').map((c) => asEnvelope(c.body));
  }

  private async dispatch(call: RecordedCall): Promise<ParsedResponseData> {
    this.calls.push(call);
    const route = this.routes.get(`${call.method} ${call.url}`);
    if (!route) {
      throw new Error(`No mock response for ${call.method} ${call.url}`);
    }
    return typeof route === 'function' ? route(call) : route;
  }
}

export function asEnvelope(body: unknown): JwsEnvelope {
  if (
    typeof body === 'object' &&
    body !== null &&
    'protected' in body &&
    'payload' in body &&
    'signature' in body &&
    typeof body.protected === 'string' &&
    typeof body.payload === 'string' &&
    typeof body.signature === 'string'
  ) {
    return { protected: body.protected, payload: body.payload, signature: body.signature };
  }
  throw new Error(`Not a JWS envelope: ${JSON.stringify(body)}`);
}

export const CA = {
  directoryUrl: 'https://ca.test/directory',
  newNonce: 'https://ca.test/acme/new-nonce',
  newAccount: 'https://ca.test/acme/new-acct',
  newOrder: 'https://ca.test/acme/new-order',
  termsOfService: 'https://ca.test/terms.pdf',
  accountUri: 'https://ca/acct/123',
} as const;

export function directoryDocument(
  urls: { newNonce: string; newAccount: string; newOrder: string } = CA,
  meta: Record<string, unknown> = { termsOfService: CA.termsOfService },
): Record<string, unknown> {
  return {
    newNonce: urls.newNonce,
    newAccount: urls.newAccount,
    newOrder: urls.newOrder,
    revokeCert: 'https://ca.test/acme/revoke-cert',
    keyChange: 'https://ca.test/acme/key-change',
    meta,
  };
}

/** JSON response as AcmeHttpClient returns it */
export function json(
  statusCode: number,
  body: unknown,
  headers: Record<string, string> = {},
): ParsedResponseData {
  return { statusCode, headers: { 'content-type': 'application/json', ...headers }, body };
}

/**
 * Serves newNonce with an increasing counter: nonce-1, nonce-2, ...
 */
export function nonceRoute(): MockRoute {
  let counter = 0;
  return () => {
    counter += 1;
    return { statusCode: 200, headers: { 'replay-nonce': `nonce-${counter}` }, body: undefined };
  };
}

/**
 * Fake CA with a directory and nonce endpoint; callers add the newAccount route.
 */
export function createMockCa(
  urls: { directoryUrl: string; newNonce: string; newAccount: string; newOrder: string } = CA,
  meta?: Record<string, unknown>,
): MockHttpClient {
  return new MockHttpClient()
    .on('GET', urls.directoryUrl, json(200, directoryDocument(urls, meta)))
    .on('HEAD', urls.newNonce, nonceRoute());
}

export function decodeJson(bytes: Uint8Array): unknown {
  return JSON.parse(new TextDecoder().decode(bytes));
}
