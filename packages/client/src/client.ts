/**
 * ChronoClient: logical operations over a time-versioned record store.
 *
 * Each read, write or audit call is resolved to one remote operation variant
 * before anything goes over the wire, then dispatched with the session
 * credential and the current transaction token.
 *
 * By default every operation autocommits. Group operations into an atomic
 * unit with stage(), then commit() or abort():
 *
 * ```typescript
 * await client.stage();
 * try {
 *   await client.get({ key: 'name', record: 1 });
 *   await client.add({ key: 'name', value: 'Ada', record: 1 });
 *   await client.commit();
 * } catch (err) {
 *   await client.abort();
 *   throw err;
 * }
 * ```
 */

import { resolveCall } from './args/resolver.js';
import type { AddArgs, AuditArgs, CallArguments, GetArgs, SelectArgs, SetArgs } from './args/types.js';
import { JsonValueCodec, type ValueCodec } from './codec/value-codec.js';
import { loadClientConfig, type ClientConfig, type LoadClientConfigOptions } from './config/loader.js';
import { DispatchExecutor } from './dispatch/executor.js';
import { lookupDescriptor, SESSION_DESCRIPTORS } from './dispatch/table.js';
import { RemoteOperationError, TransportFailureError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { HttpTransport } from './transport/http.js';
import type { Transport } from './transport/types.js';
import type { OperationFamily, QueryResult, TransactionState } from './types.js';

export interface ConnectOptions extends LoadClientConfigOptions {
  /** Use this transport instead of HTTP to `host:port`. */
  transport?: Transport;
  codec?: ValueCodec;
  logger?: Logger;
  /** fetch implementation for the default HTTP transport. */
  fetch?: typeof fetch;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ChronoClient {
  #closed = false;

  private constructor(
    private readonly transport: Transport,
    private readonly executor: DispatchExecutor,
    private readonly config: ClientConfig,
    private readonly logger: Logger,
  ) {}

  /**
   * Open a session. Login failures are fatal: the transport is closed and
   * the error propagates.
   */
  static async connect(options: ConnectOptions = {}): Promise<ChronoClient> {
    const config = await loadClientConfig(options);
    const logger = options.logger ?? createLogger(config.debug);
    const transport =
      options.transport ??
      new HttpTransport({
        baseUrl: `http://${config.host}:${config.port}`,
        timeoutMs: config.timeoutMs,
        fetch: options.fetch,
        logger,
      });
    const executor = new DispatchExecutor({
      invoker: transport,
      codec: options.codec ?? new JsonValueCodec(),
      environment: config.environment,
      logger,
    });

    try {
      executor.setCredential(await transport.login(config.username, config.password, config.environment));
    } catch (err) {
      await transport.close();
      throw err;
    }

    logger.info(`Connected to ${config.host}:${config.port} as ${config.username}`);
    return new ChronoClient(transport, executor, config, logger);
  }

  get transactionState(): TransactionState {
    return this.executor.transactions.state;
  }

  get environment(): string {
    return this.config.environment;
  }

  get closed(): boolean {
    return this.#closed;
  }

  // ─── Data operations ─────────────────────────────────────────────────────

  /** Most recent value in each requested field. */
  async get(args: GetArgs): Promise<QueryResult> {
    return this.dispatch('get', args);
  }

  /** Every value in each requested field. */
  async select(args: SelectArgs): Promise<QueryResult> {
    return this.dispatch('select', args);
  }

  /** Changes to a record, or to one field in it, keyed by timestamp. */
  async audit(args: AuditArgs): Promise<QueryResult> {
    return this.dispatch('audit', args);
  }

  /**
   * Add a value. Without a record, returns the id of a new record holding it;
   * with one record, whether it was added; with several, a map of record to
   * that flag.
   */
  async add(args: AddArgs): Promise<QueryResult> {
    return this.dispatch('add', args);
  }

  /** Replace every value in a field with one value. Without a record, returns a new record id. */
  async set(args: SetArgs): Promise<QueryResult> {
    return this.dispatch('set', args);
  }

  private async dispatch<F extends OperationFamily>(family: F, args: CallArguments<F>): Promise<QueryResult> {
    this.assertOpen();
    const resolved = resolveCall(family, args);
    const descriptor = lookupDescriptor(family, resolved.tag);
    return this.executor.execute(descriptor, resolved.values);
  }

  // ─── Transactions ────────────────────────────────────────────────────────

  /** Start staging. Every call until commit() or abort() joins the transaction. */
  async stage(): Promise<void> {
    this.assertOpen();
    await this.executor.transactions.stage();
    this.logger.debug('Staging started');
  }

  /** Commit staged work. Resolves false when nothing was staged. */
  async commit(): Promise<boolean> {
    this.assertOpen();
    return this.executor.transactions.commit();
  }

  /** Discard staged work. A no-op in autocommit. */
  async abort(): Promise<void> {
    this.assertOpen();
    await this.executor.transactions.abort();
  }

  // ─── Server info ─────────────────────────────────────────────────────────

  /** Server time in microseconds, or the instant a phrase such as "3 weeks ago" denotes. */
  async time(phrase?: string): Promise<number> {
    this.assertOpen();
    const result =
      phrase === undefined
        ? await this.executor.session(SESSION_DESCRIPTORS.time)
        : await this.executor.session(SESSION_DESCRIPTORS.timePhrase, [phrase]);
    if (typeof result !== 'number') {
      throw new RemoteOperationError('MALFORMED_RESPONSE', 'time returned a value that is not a number');
    }
    return result;
  }

  async getServerVersion(): Promise<string> {
    this.assertOpen();
    return String(await this.executor.session(SESSION_DESCRIPTORS.getServerVersion));
  }

  async getServerEnvironment(): Promise<string> {
    this.assertOpen();
    return String(await this.executor.session(SESSION_DESCRIPTORS.getServerEnvironment));
  }

  // ─── Lifecycle ───────────────────────────────────────────────────────────

  /** End the session on the server but keep the transport open. */
  async logout(): Promise<void> {
    const credential = this.executor.getCredential();
    if (credential === null) return;
    await this.transport.logout(credential, this.config.environment);
    this.executor.setCredential(null);
  }

  /**
   * Abort any open transaction, log out, and release the transport. The
   * transport is closed even when the abort or logout fails.
   */
  async close(): Promise<void> {
    if (this.#closed) return;
    this.#closed = true;
    try {
      if (this.transactionState === 'staged') {
        try {
          await this.executor.transactions.abort();
        } catch (err) {
          this.logger.warn(`Open transaction could not be aborted on close: ${errorMessage(err)}`);
        }
      }
      if (this.executor.usable) {
        await this.logout();
      }
    } finally {
      await this.transport.close();
    }
  }

  private assertOpen(): void {
    if (this.#closed) {
      throw new TransportFailureError('Client is closed');
    }
  }
}
