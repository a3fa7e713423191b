/**
 * Collaborator contracts between the client core and whatever carries calls
 * to the server.
 */

import type { AccessToken, OperationDescriptor, TransactionToken } from '../types.js';

/** A parameter as it travels: already encoded, in descriptor order. */
export type WireParam = unknown;

/** Performs one remote call. Calls issued in order complete in order. */
export interface RemoteOperationInvoker {
  invoke(
    descriptor: OperationDescriptor,
    params: readonly WireParam[],
    credential: AccessToken,
    transaction: TransactionToken | null,
    environment: string,
  ): Promise<unknown>;
}

export interface SessionHandshake {
  login(username: string, password: string, environment: string): Promise<AccessToken>;
  logout(credential: AccessToken, environment: string): Promise<void>;
}

/** A connection: invoker plus handshake, released by close(). */
export interface Transport extends RemoteOperationInvoker, SessionHandshake {
  close(): Promise<void>;
}
