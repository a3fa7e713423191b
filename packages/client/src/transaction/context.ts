/**
 * TransactionContext: autocommit/staged state machine for one session.
 *
 * The token is the only mutable state and changes only through stage(),
 * commit(), abort() and reset(). commit() and abort() detach the token before
 * the remote call, so every call dispatched afterwards runs in autocommit
 * whatever the server answers.
 */

import { IllegalStateTransitionError } from '../errors.js';
import type { TransactionState, TransactionToken } from '../types.js';

/** Remote side of the transaction lifecycle. */
export interface TransactionBackend {
  stage(): Promise<TransactionToken>;
  commit(token: TransactionToken): Promise<boolean>;
  abort(token: TransactionToken): Promise<void>;
}

export class TransactionContext {
  private current: TransactionToken | null = null;
  private staging = false;

  constructor(private readonly backend: TransactionBackend) {}

  get state(): TransactionState {
    return this.current === null ? 'autocommit' : 'staged';
  }

  /** The token every dispatched call must carry right now; null in autocommit. */
  token(): TransactionToken | null {
    return this.current;
  }

  /**
   * Start staging. Nested staging is not supported.
   * If the server cannot issue a token the state stays autocommit.
   */
  async stage(): Promise<TransactionToken> {
    if (this.current !== null) {
      throw new IllegalStateTransitionError('A transaction is already staged; commit or abort it first');
    }
    if (this.staging) {
      throw new IllegalStateTransitionError('A transaction is already being staged');
    }
    this.staging = true;
    try {
      const token = await this.backend.stage();
      this.current = token;
      return token;
    } finally {
      this.staging = false;
    }
  }

  /**
   * Commit staged work as one unit. Resolves false without a remote call when
   * nothing is staged. Conflicts propagate; the state is autocommit either way.
   */
  async commit(): Promise<boolean> {
    const token = this.reset();
    if (token === null) {
      return false;
    }
    return this.backend.commit(token);
  }

  /** Discard staged work. A no-op in autocommit. */
  async abort(): Promise<void> {
    const token = this.reset();
    if (token === null) {
      return;
    }
    await this.backend.abort(token);
  }

  /** Drop the token locally without telling the server. Returns the dropped token. */
  reset(): TransactionToken | null {
    const token = this.current;
    this.current = null;
    return token;
  }
}
