/**
 * HTTP transport: one JSON POST per remote call.
 *
 * Request body: `{ method, params, credential, transaction, environment }`.
 * Response body: `{ result }` on success, or `{ error: { code, message } }`
 * (or `{ error: '[CODE] message' }`) on failure.
 */

import { RemoteOperationError, TransportFailureError, parseRemoteError, toChronoKvError } from '../errors.js';
import type { Logger } from '../logger.js';
import { isAccessToken } from '../tokens.js';
import type { AccessToken, OperationDescriptor, TransactionToken } from '../types.js';
import type { Transport, WireParam } from './types.js';

export interface HttpTransportOptions {
  /** Base URL of the server, e.g. `http://localhost:1717`. */
  baseUrl: string;
  timeoutMs: number;
  headers?: Record<string, string>;
  /** Injected for tests; defaults to the global fetch. */
  fetch?: typeof fetch;
  logger?: Logger;
}

interface RpcRequest {
  method: string;
  params: readonly WireParam[];
  credential: AccessToken | null;
  transaction: TransactionToken | null;
  environment: string;
}

function cleanBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '');
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class HttpTransport implements Transport {
  readonly #url: string;
  readonly #timeoutMs: number;
  readonly #headers: Record<string, string>;
  readonly #fetch: typeof fetch;
  readonly #logger: Logger | undefined;
  #closed = false;

  constructor(options: HttpTransportOptions) {
    this.#url = `${cleanBaseUrl(options.baseUrl)}/rpc`;
    this.#timeoutMs = options.timeoutMs;
    this.#headers = { 'Content-Type': 'application/json', ...options.headers };
    this.#fetch = options.fetch ?? fetch;
    this.#logger = options.logger;
  }

  get closed(): boolean {
    return this.#closed;
  }

  async login(username: string, password: string, environment: string): Promise<AccessToken> {
    const result = await this.#post({
      method: 'login',
      params: [username, password],
      credential: null,
      transaction: null,
      environment,
    });
    if (!isAccessToken(result)) {
      throw new RemoteOperationError('MALFORMED_RESPONSE', 'login returned a value that is not an access token');
    }
    return result;
  }

  async logout(credential: AccessToken, environment: string): Promise<void> {
    await this.#post({ method: 'logout', params: [], credential, transaction: null, environment });
  }

  async invoke(
    descriptor: OperationDescriptor,
    params: readonly WireParam[],
    credential: AccessToken,
    transaction: TransactionToken | null,
    environment: string,
  ): Promise<unknown> {
    return this.#post({ method: descriptor.name, params, credential, transaction, environment });
  }

  async close(): Promise<void> {
    this.#closed = true;
  }

  async #post(request: RpcRequest): Promise<unknown> {
    if (this.#closed) {
      throw new TransportFailureError('Transport is closed');
    }

    this.#logger?.debug(`POST ${this.#url} ${request.method}`);

    let response: Response;
    try {
      response = await this.#fetch(this.#url, {
        method: 'POST',
        headers: this.#headers,
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(this.#timeoutMs),
      });
    } catch (err) {
      throw new TransportFailureError(`Request to ${this.#url} failed: ${errorMessage(err)}`, { cause: err });
    }

    let body: unknown;
    try {
      body = JSON.parse(await response.text());
    } catch (err) {
      throw new TransportFailureError(`HTTP ${response.status}: response is not JSON`, { cause: err });
    }

    if (typeof body === 'object' && body !== null) {
      if ('error' in body && typeof body.error === 'object' && body.error !== null) {
        const error = body.error;
        const code = 'code' in error && typeof error.code === 'string' ? error.code : 'UNKNOWN';
        const message = 'message' in error && typeof error.message === 'string' ? error.message : `${request.method} failed`;
        throw toChronoKvError(code, message);
      }
      if ('error' in body && typeof body.error === 'string') {
        throw parseRemoteError(body.error);
      }
      if (response.ok && 'result' in body) {
        return body.result;
      }
    }
    throw new TransportFailureError(`HTTP ${response.status}: ${response.statusText}`);
  }
}
