/**
 * In-process stand-in for a chronokv server.
 *
 * Implements the client's Transport contract directly, so a ChronoClient can
 * be exercised end to end without a network. Every descriptor in the dispatch
 * table is served generically from its family and parameter slots.
 */

import { randomUUID } from 'node:crypto';

import {
  AuthenticationFailureError,
  RemoteOperationError,
  TransactionConflictError,
  TransportFailureError,
  findDescriptorByName,
  isTObject,
  type AccessToken,
  type Logger,
  type OperationDescriptor,
  type ParamSlot,
  type TObject,
  type TransactionToken,
  type Transport,
  type WireParam,
} from '@chronokv/client';

import { createClock, type Clock } from './clock.js';
import { findRecords, parseCriteria } from './criteria.js';
import { resolvePhrase } from './phrases.js';
import { RevisionStore, describeRevision, sameValue, type Snapshot, type Write } from './store.js';

// ============================================================================
// Options
// ============================================================================

export interface MockServerOptions {
  /** username → password. Defaults to admin/admin. */
  users?: Record<string, string>;
  /** Time source in microseconds; readings are forced to strictly increase. */
  now?: Clock;
  version?: string;
  /** Name reported for the empty environment. */
  defaultEnvironment?: string;
  logger?: Logger;
}

export type MockServerResult =
  | TObject
  | TObject[]
  | TransactionToken
  | boolean
  | number
  | string
  | null
  | { [key: string]: MockServerResult };

// ============================================================================
// Sessions
// ============================================================================

interface Session {
  readonly username: string;
}

interface Transaction {
  readonly startedAt: number;
  readonly pending: Write[];
  readonly touched: Set<number>;
}

function transactionId(token: TransactionToken): string {
  return `${token.accessToken.data}:${token.timestamp}`;
}

// ============================================================================
// Params
// ============================================================================

interface BoundParams {
  key?: string;
  keys?: string[];
  value?: TObject;
  criteria?: string;
  record?: number;
  records?: number[];
  timestamp?: number;
  start?: number;
  end?: number;
  phrase?: string;
}

function badParam(descriptor: OperationDescriptor, slot: ParamSlot): RemoteOperationError {
  return new RemoteOperationError('INVALID_ARGUMENT', `${descriptor.name}: invalid ${slot}`);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isRecordArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => Number.isSafeInteger(item));
}

// ============================================================================
// Server
// ============================================================================

export class MockServer implements Transport {
  private readonly clock: Clock;
  private readonly users: Record<string, string>;
  private readonly version: string;
  private readonly defaultEnvironment: string;
  private readonly logger: Logger | undefined;
  private readonly sessions = new Map<string, Session>();
  private readonly transactions = new Map<string, Transaction>();
  private readonly stores = new Map<string, RevisionStore>();
  private closed = false;

  constructor(options: MockServerOptions = {}) {
    this.clock = createClock(options.now);
    this.users = options.users ?? { admin: 'admin' };
    this.version = options.version ?? '0.1.0';
    this.defaultEnvironment = options.defaultEnvironment ?? 'default';
    this.logger = options.logger;
  }

  /** The revision store for an environment, created on first use. */
  store(environment = ''): RevisionStore {
    const name = this.environmentName(environment);
    let store = this.stores.get(name);
    if (!store) {
      store = new RevisionStore(this.clock);
      this.stores.set(name, store);
    }
    return store;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  // ==========================================================================
  // SessionHandshake
  // ==========================================================================

  async login(username: string, password: string, environment: string): Promise<AccessToken> {
    this.ensureOpen();
    if (this.users[username] !== password) {
      throw new AuthenticationFailureError(`Invalid username or password for '${username}'`);
    }
    const token: AccessToken = { data: randomUUID() };
    this.sessions.set(token.data, { username });
    this.logger?.debug(`login ${username} (${this.environmentName(environment)})`);
    return token;
  }

  async logout(credential: AccessToken, _environment: string): Promise<void> {
    this.ensureOpen();
    this.authenticate(credential);
    this.sessions.delete(credential.data);
    for (const [id] of this.transactions) {
      if (id.startsWith(`${credential.data}:`)) {
        this.transactions.delete(id);
      }
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /**
   * A Transport onto this server whose close() releases only itself, so
   * several clients can share one server.
   */
  connection(): Transport {
    let closed = false;
    const ensureOpen = (): void => {
      if (closed) {
        throw new TransportFailureError('Connection is closed');
      }
    };
    return {
      login: async (username, password, environment) => {
        ensureOpen();
        return this.login(username, password, environment);
      },
      logout: async (credential, environment) => {
        ensureOpen();
        return this.logout(credential, environment);
      },
      invoke: async (descriptor, params, credential, transaction, environment) => {
        ensureOpen();
        return this.invoke(descriptor, params, credential, transaction, environment);
      },
      close: async () => {
        closed = true;
      },
    };
  }

  // ==========================================================================
  // RemoteOperationInvoker
  // ==========================================================================

  async invoke(
    descriptor: OperationDescriptor,
    params: readonly WireParam[],
    credential: AccessToken,
    transaction: TransactionToken | null,
    environment: string,
  ): Promise<MockServerResult> {
    this.ensureOpen();
    this.authenticate(credential);
    if (findDescriptorByName(descriptor.name) === undefined) {
      throw new RemoteOperationError('UNKNOWN_METHOD', `Unknown method '${descriptor.name}'`);
    }
    this.logger?.debug(`${descriptor.name}(${params.length} params)`);

    const store = this.store(environment);
    const bound = this.bind(descriptor, params, store);

    if (descriptor.family === 'session') {
      return this.session(descriptor, bound, credential, transaction, environment, store);
    }

    const txn = transaction === null ? undefined : this.transactionFor(transaction);
    switch (descriptor.family) {
      case 'get':
      case 'select':
        return this.read(descriptor.family, bound, store, txn);
      case 'audit':
        return this.audit(descriptor, bound, store, txn);
      case 'add':
      case 'set':
        return this.write(descriptor.family, descriptor, bound, store, txn);
    }
  }

  // ==========================================================================
  // Session operations
  // ==========================================================================

  private session(
    descriptor: OperationDescriptor,
    bound: BoundParams,
    credential: AccessToken,
    transaction: TransactionToken | null,
    environment: string,
    store: RevisionStore,
  ): MockServerResult {
    switch (descriptor.name) {
      case 'stage': {
        const token: TransactionToken = { accessToken: credential, timestamp: store.now() };
        this.transactions.set(transactionId(token), {
          startedAt: token.timestamp,
          pending: [],
          touched: new Set(),
        });
        return token;
      }
      case 'commit':
        return this.commit(this.takeTransaction(transaction), store);
      case 'abort':
        this.takeTransaction(transaction);
        return null;
      case 'time':
        return store.now();
      case 'timePhrase':
        if (bound.phrase === undefined) {
          throw badParam(descriptor, 'phrase');
        }
        return resolvePhrase(bound.phrase, store.now());
      case 'getServerVersion':
        return this.version;
      case 'getServerEnvironment':
        return this.environmentName(environment);
      default:
        throw new RemoteOperationError('UNKNOWN_METHOD', `Unknown method '${descriptor.name}'`);
    }
  }

  private commit(txn: Transaction, store: RevisionStore): boolean {
    for (const record of txn.touched) {
      const changed = store.lastChange(record);
      if (changed !== undefined && changed > txn.startedAt) {
        throw new TransactionConflictError();
      }
    }
    for (const write of txn.pending) {
      store.append(write);
    }
    return true;
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  private read(
    family: 'get' | 'select',
    bound: BoundParams,
    store: RevisionStore,
    txn: Transaction | undefined,
  ): MockServerResult {
    const snapshot =
      bound.timestamp !== undefined ? store.snapshot(bound.timestamp) : store.snapshot(undefined, txn?.pending);
    const pick = (values: TObject[]): MockServerResult =>
      family === 'get' ? (values[values.length - 1] ?? null) : values;

    const forRecord = (record: number): MockServerResult => {
      txn?.touched.add(record);
      if (bound.key !== undefined) {
        return pick(snapshot.values(record, bound.key));
      }
      const out: { [key: string]: MockServerResult } = {};
      for (const key of bound.keys ?? snapshot.keys(record)) {
        const values = snapshot.values(record, key);
        if (values.length > 0) {
          out[key] = pick(values);
        }
      }
      return out;
    };

    if (bound.record !== undefined) {
      return forRecord(bound.record);
    }

    const records = bound.records ?? (bound.criteria !== undefined ? this.select(bound.criteria, snapshot) : []);
    const out: { [record: string]: MockServerResult } = {};
    for (const record of records) {
      const result = forRecord(record);
      if (result !== null && !(Array.isArray(result) && result.length === 0) && !isEmptyMap(result)) {
        out[String(record)] = result;
      }
    }
    return out;
  }

  private select(criteria: string, snapshot: Snapshot): number[] {
    return findRecords(parseCriteria(criteria), snapshot);
  }

  // ==========================================================================
  // Audit
  // ==========================================================================

  private audit(
    descriptor: OperationDescriptor,
    bound: BoundParams,
    store: RevisionStore,
    txn: Transaction | undefined,
  ): MockServerResult {
    if (bound.record === undefined) {
      throw badParam(descriptor, 'record');
    }
    txn?.touched.add(bound.record);
    const out: { [timestamp: string]: MockServerResult } = {};
    for (const revision of store.audit(bound.record, bound.key, bound.start, bound.end)) {
      out[String(revision.timestamp)] = describeRevision(revision);
    }
    return out;
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  private write(
    family: 'add' | 'set',
    descriptor: OperationDescriptor,
    bound: BoundParams,
    store: RevisionStore,
    txn: Transaction | undefined,
  ): MockServerResult {
    const { key, value } = bound;
    if (key === undefined) throw badParam(descriptor, 'key');
    if (value === undefined) throw badParam(descriptor, 'value');

    const commitWrite = (write: Write): void => {
      if (txn) {
        txn.touched.add(write.record);
        txn.pending.push(write);
      } else {
        store.append(write);
      }
    };
    const current = (record: number): TObject[] => store.snapshot(undefined, txn?.pending).values(record, key);

    const writeOne = (record: number): boolean => {
      const existing = current(record);
      if (family === 'add') {
        if (existing.some((stored) => sameValue(stored, value))) {
          txn?.touched.add(record);
          return false;
        }
      } else {
        for (const stored of existing) {
          commitWrite({ action: 'REMOVE', key, value: stored, record });
        }
      }
      commitWrite({ action: 'ADD', key, value, record });
      return true;
    };

    if (bound.record !== undefined) {
      const added = writeOne(bound.record);
      return family === 'add' ? added : null;
    }
    if (bound.records !== undefined) {
      const out: { [record: string]: MockServerResult } = {};
      for (const record of bound.records) {
        out[String(record)] = writeOne(record);
      }
      return family === 'add' ? out : null;
    }
    const record = store.allocateRecord();
    writeOne(record);
    return record;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private bind(descriptor: OperationDescriptor, params: readonly WireParam[], store: RevisionStore): BoundParams {
    if (params.length !== descriptor.params.length) {
      throw new RemoteOperationError(
        'INVALID_ARGUMENT',
        `${descriptor.name} takes ${descriptor.params.length} params, got ${params.length}`,
      );
    }
    const bound: BoundParams = {};
    descriptor.params.forEach((slot, index) => {
      const param = params[index];
      switch (slot) {
        case 'key':
        case 'criteria':
        case 'phrase':
          if (typeof param !== 'string') throw badParam(descriptor, slot);
          bound[slot] = param;
          break;
        case 'keys':
          if (!isStringArray(param)) throw badParam(descriptor, slot);
          bound.keys = param;
          break;
        case 'value':
          if (!isTObject(param)) throw badParam(descriptor, slot);
          bound.value = param;
          break;
        case 'record':
          if (typeof param !== 'number' || !Number.isSafeInteger(param)) throw badParam(descriptor, slot);
          bound.record = param;
          break;
        case 'records':
          if (!isRecordArray(param)) throw badParam(descriptor, slot);
          bound.records = param;
          break;
        case 'timestamp':
        case 'start':
        case 'end':
          if (typeof param === 'number') {
            bound[slot] = param;
          } else if (typeof param === 'string') {
            bound[slot] = resolvePhrase(param, store.now());
          } else {
            throw badParam(descriptor, slot);
          }
          break;
      }
    });
    return bound;
  }

  private authenticate(credential: AccessToken): Session {
    const session = this.sessions.get(credential.data);
    if (!session) {
      throw new AuthenticationFailureError('Invalid or expired access token');
    }
    return session;
  }

  private transactionFor(token: TransactionToken): Transaction {
    const txn = this.transactions.get(transactionId(token));
    if (!txn) {
      throw new TransactionConflictError('Transaction is no longer active');
    }
    return txn;
  }

  private takeTransaction(token: TransactionToken | null): Transaction {
    if (token === null) {
      throw new RemoteOperationError('NO_TRANSACTION', 'No transaction is staged');
    }
    const txn = this.transactionFor(token);
    this.transactions.delete(transactionId(token));
    return txn;
  }

  private environmentName(environment: string): string {
    return environment === '' ? this.defaultEnvironment : environment;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new TransportFailureError('Mock server is closed');
    }
  }
}

function isEmptyMap(result: MockServerResult): boolean {
  if (typeof result !== 'object' || result === null || Array.isArray(result) || isTObject(result)) {
    return false;
  }
  return Object.keys(result).length === 0;
}

export function createMockServer(options: MockServerOptions = {}): MockServer {
  return new MockServer(options);
}
