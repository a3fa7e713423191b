/**
 * DispatchExecutor: the seam between the resolution engine and the transport.
 *
 * Orders normalized values by the descriptor's slots, encodes values, attaches
 * the credential and the current transaction token, invokes, and decodes the
 * result. It also backs the TransactionContext with the session descriptors.
 */

import type { ResolvedTime, ResolvedValues } from '../args/types.js';
import { decodeResult, type ValueCodec } from '../codec/value-codec.js';
import {
  AuthenticationFailureError,
  RemoteOperationError,
  TransportFailureError,
  UnsupportedShapeError,
} from '../errors.js';
import type { Logger } from '../logger.js';
import { TransactionContext, type TransactionBackend } from '../transaction/context.js';
import type { RemoteOperationInvoker, WireParam } from '../transport/types.js';
import type { AccessToken, OperationDescriptor, ParamSlot, QueryResult, TransactionToken } from '../types.js';
import { isTransactionToken } from '../tokens.js';
import { SESSION_DESCRIPTORS } from './table.js';

export interface DispatchExecutorOptions {
  invoker: RemoteOperationInvoker;
  codec: ValueCodec;
  environment: string;
  logger: Logger;
}

function timeParam(time: ResolvedTime): number | string {
  return time.kind === 'absoluteInstant' ? time.micros : time.text;
}

function malformed(descriptor: OperationDescriptor, expected: string): RemoteOperationError {
  return new RemoteOperationError('MALFORMED_RESPONSE', `${descriptor.name} returned a value that is not ${expected}`);
}

export class DispatchExecutor implements TransactionBackend {
  readonly transactions: TransactionContext;
  private credential: AccessToken | null = null;
  private failure: TransportFailureError | null = null;

  constructor(private readonly options: DispatchExecutorOptions) {
    this.transactions = new TransactionContext(this);
  }

  get environment(): string {
    return this.options.environment;
  }

  setCredential(credential: AccessToken | null): void {
    this.credential = credential;
  }

  getCredential(): AccessToken | null {
    return this.credential;
  }

  /** Whether an earlier transport failure has made the connection unusable. */
  get usable(): boolean {
    return this.failure === null;
  }

  /** Put values in descriptor order, encoding the value slot. */
  orderParams(descriptor: OperationDescriptor, values: ResolvedValues): WireParam[] {
    return descriptor.params.map((slot) => this.paramFor(descriptor, slot, values));
  }

  private paramFor(descriptor: OperationDescriptor, slot: ParamSlot, values: ResolvedValues): WireParam {
    let param: WireParam;
    switch (slot) {
      case 'value':
        param = values.value === undefined ? undefined : this.options.codec.encode(values.value);
        break;
      case 'timestamp':
      case 'start':
      case 'end': {
        const time = values[slot];
        param = time === undefined ? undefined : timeParam(time);
        break;
      }
      case 'phrase':
        param = undefined;
        break;
      default:
        param = values[slot];
    }
    if (param === undefined) {
      throw new UnsupportedShapeError(descriptor.family, `${descriptor.name} without ${slot}`);
    }
    return param;
  }

  /** Dispatch a resolved data operation and decode its result. */
  async execute(descriptor: OperationDescriptor, values: ResolvedValues): Promise<QueryResult> {
    const params = this.orderParams(descriptor, values);
    const raw = await this.call(descriptor, params, this.transactions.token());
    return decodeResult(raw, this.options.codec);
  }

  /**
   * Invoke one descriptor with already-ordered params. Any transport failure
   * marks the connection unusable; later calls fail without a round trip.
   */
  async call(
    descriptor: OperationDescriptor,
    params: readonly WireParam[],
    transaction: TransactionToken | null,
  ): Promise<unknown> {
    if (this.failure !== null) {
      throw new TransportFailureError(`Connection is unusable after an earlier failure: ${this.failure.message}`, {
        cause: this.failure,
      });
    }
    const credential = this.credential;
    if (credential === null) {
      throw new AuthenticationFailureError('Not logged in');
    }

    this.options.logger.debug(`${descriptor.name}${transaction === null ? '' : ' (staged)'}`);
    try {
      return await this.options.invoker.invoke(descriptor, params, credential, transaction, this.options.environment);
    } catch (err) {
      if (err instanceof TransportFailureError) {
        this.failure = err;
        this.transactions.reset();
      }
      throw err;
    }
  }

  /** Invoke a session descriptor in the current transaction. */
  async session(descriptor: OperationDescriptor, params: readonly WireParam[] = []): Promise<unknown> {
    return this.call(descriptor, params, this.transactions.token());
  }

  // ─── TransactionBackend ──────────────────────────────────────────────────

  async stage(): Promise<TransactionToken> {
    const token = await this.call(SESSION_DESCRIPTORS.stage, [], null);
    if (!isTransactionToken(token)) {
      throw malformed(SESSION_DESCRIPTORS.stage, 'a transaction token');
    }
    return token;
  }

  async commit(token: TransactionToken): Promise<boolean> {
    const committed = await this.call(SESSION_DESCRIPTORS.commit, [], token);
    if (typeof committed !== 'boolean') {
      throw malformed(SESSION_DESCRIPTORS.commit, 'a boolean');
    }
    return committed;
  }

  async abort(token: TransactionToken): Promise<void> {
    await this.call(SESSION_DESCRIPTORS.abort, [], token);
  }
}
