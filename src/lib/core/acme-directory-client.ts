/**
 * ACME directory discovery and replay-nonce acquisition
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.1.1
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.2
 */

import { DirectoryError, NonceError } from '../errors/registration-errors.js';
import type { AcmeHttp, ParsedResponseData } from '../transport/http-client.js';
import {
  acmeDirectorySchema,
  REQUIRED_DIRECTORY_ENTRIES,
  type AcmeDirectory,
} from '../types/directory.js';
import { debugNonce } from '../utils/debug.js';
import { headerValue } from '../utils/index.js';

export interface DirectoryRequestOptions {
  signal?: AbortSignal;
}

/**
 * Read the nonce the CA issued with a response
 *
 * Every ACME response carries a replacement nonce; capturing it saves a newNonce
 * round trip on the next signed request.
 */
export function readReplayNonce(res: Pick<ParsedResponseData, 'headers'>): string | undefined {
  return headerValue(res.headers, 'replay-nonce');
}

/**
 * Client for the two unauthenticated ACME endpoints a registration needs
 *
 * Holds no per-run state: the directory and nonces it returns belong to the caller.
 */
export class AcmeDirectoryClient {
  constructor(private readonly http: AcmeHttp) {}

  /**
   * Fetch and validate the directory document
   *
   * @throws {DirectoryError} On transport failure, non-2xx status, a body that is
   *   not a JSON object, or missing newNonce / newAccount entries
   */
  async fetchDirectory(
    directoryUrl: string,
    opts: DirectoryRequestOptions = {},
  ): Promise<AcmeDirectory> {
    let res: ParsedResponseData;
    try {
      res = await this.http.get(directoryUrl, { signal: opts.signal });
    } catch (err) {
      throw new DirectoryError(`The ACME directory at ${directoryUrl} could not be fetched.`, {
        context: { directoryUrl },
        cause: err,
      });
    }

    if (res.statusCode < 200 || res.statusCode >= 300) {
      throw new DirectoryError(
        `The ACME directory at ${directoryUrl} returned HTTP ${res.statusCode}.`,
        { context: { directoryUrl, statusCode: res.statusCode } },
      );
    }

    const body = res.body;
    if (!body || typeof body !== 'object' || Array.isArray(body) || Buffer.isBuffer(body)) {
      throw new DirectoryError(`The ACME directory at ${directoryUrl} is not a JSON object.`, {
        context: { directoryUrl },
      });
    }

    const parsed = acmeDirectorySchema.safeParse(body);
    if (!parsed.success) {
      const invalid = new Set(parsed.error.issues.map((issue) => String(issue.path[0])));
      const missing = REQUIRED_DIRECTORY_ENTRIES.filter((entry) => invalid.has(entry));
      if (missing.length > 0) {
        throw DirectoryError.missingEndpoints(directoryUrl, missing);
      }
      throw new DirectoryError(`The ACME directory at ${directoryUrl} is malformed.`, {
        context: { directoryUrl },
        cause: parsed.error,
      });
    }

    return parsed.data;
  }

  /**
   * Obtain a fresh nonce from the newNonce endpoint with a HEAD request
   *
   * @throws {NonceError} On transport failure, an unexpected status or a missing
   *   Replay-Nonce header
   */
  async fetchNonce(directory: AcmeDirectory, opts: DirectoryRequestOptions = {}): Promise<string> {
    const url = directory.newNonce;
    debugNonce('fetching nonce url=%s', url);

    let res: ParsedResponseData;
    try {
      res = await this.http.head(url, { signal: opts.signal });
    } catch (err) {
      throw new NonceError(`A nonce could not be fetched from ${url}.`, {
        context: { url },
        cause: err,
      });
    }

    if (res.statusCode !== 200 && res.statusCode !== 204) {
      throw new NonceError(`The newNonce endpoint ${url} returned HTTP ${res.statusCode}.`, {
        context: { url, statusCode: res.statusCode },
      });
    }

    const nonce = readReplayNonce(res);
    if (!nonce) {
      throw NonceError.missingHeader(url, res.statusCode);
    }
    debugNonce('nonce acquired url=%s', url);
    return nonce;
  }
}
