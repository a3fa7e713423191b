/**
 * DispatchExecutor tests: parameter order, token propagation, and the
 * connection becoming unusable after a transport failure.
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { resolveCall } from '../src/args/resolver.js';
import { JsonValueCodec } from '../src/codec/value-codec.js';
import { Link } from '../src/codec/values.js';
import { DispatchExecutor } from '../src/dispatch/executor.js';
import { lookupDescriptor, SESSION_DESCRIPTORS } from '../src/dispatch/table.js';
import {
  AuthenticationFailureError,
  RemoteOperationError,
  TransactionConflictError,
  TransportFailureError,
  UnsupportedShapeError,
} from '../src/errors.js';
import type { Logger } from '../src/logger.js';
import type { RemoteOperationInvoker, WireParam } from '../src/transport/types.js';
import type { AccessToken, OperationDescriptor, OperationFamily, TransactionToken } from '../src/types.js';
import type { CallArguments } from '../src/args/types.js';

const CREDENTIAL: AccessToken = { data: 'test-credential' };
const TOKEN: TransactionToken = { accessToken: CREDENTIAL, timestamp: 42 };

type InvokeFn = RemoteOperationInvoker['invoke'];

function createLogger(): Logger {
  return { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
}

describe('DispatchExecutor', () => {
  let invoke: Mock<InvokeFn>;
  let executor: DispatchExecutor;

  /** Answers session calls the way a server would and data calls with null. */
  function respond(descriptor: OperationDescriptor): unknown {
    if (descriptor.name === 'stage') return TOKEN;
    if (descriptor.name === 'commit') return true;
    return null;
  }

  async function run<F extends OperationFamily>(family: F, args: CallArguments<F>) {
    const resolved = resolveCall(family, args);
    return executor.execute(lookupDescriptor(family, resolved.tag), resolved.values);
  }

  function lastCall(): Parameters<InvokeFn> {
    const call = invoke.mock.lastCall;
    if (call === undefined) throw new Error('invoker was not called');
    return call;
  }

  beforeEach(() => {
    invoke = vi.fn<InvokeFn>(async (descriptor) => respond(descriptor));
    executor = new DispatchExecutor({
      invoker: { invoke },
      codec: new JsonValueCodec(),
      environment: 'test-env',
      logger: createLogger(),
    });
    executor.setCredential(CREDENTIAL);
  });

  describe('execute', () => {
    it('calls getKeyRecord with the key, the record, the credential and no token', async () => {
      await run('get', { key: 'name', record: 1 });
      const [descriptor, params, credential, transaction, environment] = lastCall();
      expect(descriptor.name).toBe('getKeyRecord');
      expect(params).toEqual(['name', 1]);
      expect(credential).toBe(CREDENTIAL);
      expect(transaction).toBeNull();
      expect(environment).toBe('test-env');
    });

    it('passes absolute timestamps as microseconds', async () => {
      await run('select', { keys: ['name', 'age'], records: [1, 2, 3], timestamp: 1609459200000000 });
      const [descriptor, params] = lastCall();
      expect(descriptor.name).toBe('selectKeysRecordsTime');
      expect(params).toEqual([['name', 'age'], [1, 2, 3], 1609459200000000]);
    });

    it('passes phrases as text to the phrase variant', async () => {
      await run('get', { criteria: 'age > 30', timestamp: 'last month' });
      const [descriptor, params] = lastCall();
      expect(descriptor.name).toBe('getCclTimestr');
      expect(params).toEqual(['age > 30', 'last month']);
    });

    it('encodes the value slot', async () => {
      await run('add', { key: 'friend', value: Link.to(9), record: 1 });
      const [descriptor, params] = lastCall();
      expect(descriptor.name).toBe('addKeyValueRecord');
      expect(params).toEqual(['friend', { type: 'LINK', data: '9' }, 1]);
    });

    it('decodes wire values in the result', async () => {
      invoke.mockResolvedValueOnce({ 1: { type: 'STRING', data: 'Ada' }, 2: { type: 'INTEGER', data: '36' } });
      await expect(run('get', { key: 'name', records: [1, 2] })).resolves.toEqual({ 1: 'Ada', 2: 36 });
    });

    it('throws UnsupportedShapeError when a slot the descriptor needs is missing', async () => {
      await expect(executor.execute(lookupDescriptor('get', 'keys=scalar, records=scalar'), { key: 'a' })).rejects.toThrow(
        UnsupportedShapeError,
      );
      expect(invoke).not.toHaveBeenCalled();
    });

    it('requires a credential', async () => {
      executor.setCredential(null);
      await expect(run('get', { record: 1 })).rejects.toThrow(AuthenticationFailureError);
      expect(invoke).not.toHaveBeenCalled();
    });
  });

  describe('token propagation', () => {
    it('attaches the staged token to every call until commit', async () => {
      await executor.transactions.stage();
      await run('add', { key: 'a', value: 1, record: 1 });
      expect(lastCall()[3]).toBe(TOKEN);
      await run('get', { key: 'a', record: 1 });
      expect(lastCall()[3]).toBe(TOKEN);

      await executor.transactions.commit();
      const [commitDescriptor, , , commitToken] = lastCall();
      expect(commitDescriptor).toBe(SESSION_DESCRIPTORS.commit);
      expect(commitToken).toBe(TOKEN);

      await run('get', { key: 'a', record: 1 });
      expect(lastCall()[3]).toBeNull();
    });

    it('stages without a token', async () => {
      await executor.transactions.stage();
      expect(invoke).toHaveBeenCalledWith(SESSION_DESCRIPTORS.stage, [], CREDENTIAL, null, 'test-env');
    });

    it('drops the token after an abort', async () => {
      await executor.transactions.stage();
      await executor.transactions.abort();
      expect(lastCall()[0]).toBe(SESSION_DESCRIPTORS.abort);
      await run('select', { record: 3 });
      expect(lastCall()[3]).toBeNull();
    });

    it('returns to autocommit when commit conflicts', async () => {
      await executor.transactions.stage();
      invoke.mockRejectedValueOnce(new TransactionConflictError());
      await expect(executor.transactions.commit()).rejects.toThrow(TransactionConflictError);
      expect(executor.transactions.state).toBe('autocommit');
      expect(executor.usable).toBe(true);
    });

    it('rejects a stage response that is not a token', async () => {
      invoke.mockResolvedValueOnce('not-a-token');
      await expect(executor.transactions.stage()).rejects.toThrow(RemoteOperationError);
      expect(executor.transactions.state).toBe('autocommit');
    });
  });

  describe('transport failure', () => {
    it('marks the connection unusable and fails later calls without a round trip', async () => {
      await executor.transactions.stage();
      invoke.mockRejectedValueOnce(new TransportFailureError('connection reset'));
      await expect(executor.transactions.commit()).rejects.toThrow('connection reset');

      expect(executor.usable).toBe(false);
      expect(executor.transactions.state).toBe('autocommit');

      const callsBefore = invoke.mock.calls.length;
      await expect(run('get', { record: 1 })).rejects.toThrow(
        'Connection is unusable after an earlier failure: connection reset',
      );
      expect(invoke.mock.calls.length).toBe(callsBefore);
    });

    it('resets a staged transaction when a data call fails', async () => {
      await executor.transactions.stage();
      invoke.mockRejectedValueOnce(new TransportFailureError('timeout'));
      await expect(run('get', { record: 1 })).rejects.toThrow(TransportFailureError);
      expect(executor.transactions.state).toBe('autocommit');
    });

    it('keeps the connection usable after a remote rejection', async () => {
      invoke.mockRejectedValueOnce(new RemoteOperationError('PARSE_ERROR', 'bad criteria'));
      await expect(run('select', { criteria: 'a ~ b' })).rejects.toThrow('bad criteria');
      expect(executor.usable).toBe(true);
    });
  });

  it('orders params by descriptor slot', () => {
    const descriptor = lookupDescriptor('audit', 'keys=scalar, records=scalar, start=absoluteInstant, end=absoluteInstant');
    const params: WireParam[] = executor.orderParams(descriptor, {
      key: 'name',
      record: 5,
      start: { kind: 'absoluteInstant', micros: 10 },
      end: { kind: 'absoluteInstant', micros: 20 },
    });
    expect(params).toEqual(['name', 5, 10, 20]);
  });
});
