/**
 * End-to-end tests: ChronoClient against the in-process server.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  AuthenticationFailureError,
  ChronoClient,
  Link,
  RemoteOperationError,
  TransactionConflictError,
  TransportFailureError,
  type Logger,
} from '@chronokv/client';
import { MockServer, createMockServer } from '../src/server.js';

function silentLogger(): Logger {
  return { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
}

describe('ChronoClient with MockServer', () => {
  let server: MockServer;
  let clients: ChronoClient[];

  async function connect(password = 'test-secret'): Promise<ChronoClient> {
    const client = await ChronoClient.connect({
      transport: server.connection(),
      logger: silentLogger(),
      env: {},
      username: 'admin',
      password,
    });
    clients.push(client);
    return client;
  }

  beforeEach(() => {
    server = createMockServer({ users: { admin: 'test-secret' }, now: () => 1_000 });
    clients = [];
  });

  afterEach(async () => {
    for (const client of clients) {
      await client.close();
    }
  });

  describe('session', () => {
    it('rejects a wrong password', async () => {
      await expect(connect('wrong')).rejects.toThrow(AuthenticationFailureError);
    });

    it('reports server info', async () => {
      const client = await connect();
      await expect(client.getServerVersion()).resolves.toBe('0.1.0');
      await expect(client.getServerEnvironment()).resolves.toBe('default');
    });

    it('ends the session on close', async () => {
      const client = await connect();
      expect(server.sessionCount).toBe(1);
      await client.close();
      expect(server.sessionCount).toBe(0);
    });

    it('rejects calls after logout', async () => {
      const client = await connect();
      await client.logout();
      await expect(client.get({ record: 1 })).rejects.toThrow(AuthenticationFailureError);
    });
  });

  describe('reads and writes', () => {
    it('adds to a new record and reads it back', async () => {
      const client = await connect();
      const record = await client.add({ key: 'name', value: 'Ada' });
      expect(record).toBe(1);
      await expect(client.get({ key: 'name', record: 1 })).resolves.toBe('Ada');
    });

    it('reports whether an add changed anything', async () => {
      const client = await connect();
      await client.add({ key: 'name', value: 'Ada', record: 1 });
      await expect(client.add({ key: 'name', value: 'Ada', record: 1 })).resolves.toBe(false);
      await expect(client.add({ key: 'age', value: 36, records: [1, 2] })).resolves.toEqual({ 1: true, 2: true });
    });

    it('returns all keys of a record', async () => {
      const client = await connect();
      await client.add({ key: 'name', value: 'Ada', record: 1 });
      await client.add({ key: 'age', value: 36, record: 1 });
      await client.add({ key: 'friend', value: Link.to(2), record: 1 });
      const result = await client.get({ record: 1 });
      expect(result).toMatchObject({ name: 'Ada', age: 36 });
      expect(Link.to(2).equals(await client.get({ key: 'friend', record: 1 }))).toBe(true);
    });

    it('selects every value of a field', async () => {
      const client = await connect();
      await client.add({ key: 'tag', value: 'red', record: 1 });
      await client.add({ key: 'tag', value: 'blue', record: 1 });
      await expect(client.select({ key: 'tag', record: 1 })).resolves.toEqual(['red', 'blue']);
      await expect(client.get({ key: 'tag', record: 1 })).resolves.toBe('blue');
    });

    it('replaces values with set', async () => {
      const client = await connect();
      await client.add({ key: 'tag', value: 'red', record: 1 });
      await client.add({ key: 'tag', value: 'blue', record: 1 });
      await expect(client.set({ key: 'tag', value: 'green', record: 1 })).resolves.toBeNull();
      await expect(client.select({ key: 'tag', record: 1 })).resolves.toEqual(['green']);
    });

    it('finds records by criteria', async () => {
      const client = await connect();
      await client.add({ key: 'name', value: 'Ada', record: 1 });
      await client.add({ key: 'age', value: 36, record: 1 });
      await client.add({ key: 'name', value: 'Grace', record: 2 });
      await client.add({ key: 'age', value: 45, record: 2 });

      await expect(client.select({ keys: ['name'], criteria: 'age > 40' })).resolves.toEqual({ 2: { name: ['Grace'] } });
      await expect(client.get({ key: 'name', where: 'age > 30' })).resolves.toEqual({ 1: 'Ada', 2: 'Grace' });
    });

    it('surfaces a criteria syntax error and stays usable', async () => {
      const client = await connect();
      await expect(client.select({ criteria: 'age >' })).rejects.toMatchObject({ code: 'PARSE_ERROR' });
      await expect(client.get({ key: 'name', record: 1 })).resolves.toBeNull();
    });
  });

  describe('time travel', () => {
    it('reads a field as it was at an earlier instant', async () => {
      const client = await connect();
      await client.add({ key: 'name', value: 'Ada', record: 1 });
      const before = await client.time();
      await client.set({ key: 'name', value: 'Augusta', record: 1 });

      await expect(client.get({ key: 'name', record: 1, timestamp: before })).resolves.toBe('Ada');
      await expect(client.get({ key: 'name', record: 1 })).resolves.toBe('Augusta');
    });

    it('resolves phrases on the server', async () => {
      const client = await connect();
      await client.add({ key: 'name', value: 'Ada', record: 1 });
      await expect(client.get({ key: 'name', record: 1, ts: 'now' })).resolves.toBe('Ada');
      await expect(client.get({ key: 'name', record: 1, ts: '1 hour ago' })).resolves.toBeNull();
      await expect(client.time('soon')).rejects.toThrow(RemoteOperationError);
    });
  });

  describe('audit', () => {
    it('lists changes to a field in order', async () => {
      const client = await connect();
      await client.add({ key: 'name', value: 'Ada', record: 1 });
      await client.set({ key: 'name', value: 'Augusta', record: 1 });
      await client.add({ key: 'age', value: 36, record: 1 });

      const audit = await client.audit({ key: 'name', record: 1 });
      expect(Object.values(audit ?? {})).toEqual([
        'ADD name AS Ada IN 1',
        'REMOVE name AS Ada IN 1',
        'ADD name AS Augusta IN 1',
      ]);
    });

    it('limits a whole-record audit to a range', async () => {
      const client = await connect();
      await client.add({ key: 'name', value: 'Ada', record: 1 });
      const start = await client.time();
      await client.add({ key: 'age', value: 36, record: 1 });
      const end = await client.time();
      await client.add({ key: 'city', value: 'London', record: 1 });

      const audit = await client.audit({ key: 1, start, end });
      expect(Object.values(audit ?? {})).toEqual(['ADD age AS 36 IN 1']);
      const everything = await client.audit({ record: 1, start: '1 day ago', end: 'now' });
      expect(Object.keys(everything ?? {})).toHaveLength(3);
    });
  });

  describe('transactions', () => {
    it('keeps staged writes private until commit', async () => {
      const writer = await connect();
      const reader = await connect();

      await writer.stage();
      await writer.add({ key: 'draft', value: 'x', record: 7 });
      await expect(writer.get({ key: 'draft', record: 7 })).resolves.toBe('x');
      await expect(reader.get({ key: 'draft', record: 7 })).resolves.toBeNull();

      await expect(writer.commit()).resolves.toBe(true);
      await expect(reader.get({ key: 'draft', record: 7 })).resolves.toBe('x');
    });

    it('discards staged writes on abort', async () => {
      const client = await connect();
      await client.stage();
      await client.add({ key: 'draft', value: 'x', record: 7 });
      await client.abort();
      expect(client.transactionState).toBe('autocommit');
      await expect(client.get({ key: 'draft', record: 7 })).resolves.toBeNull();
    });

    it('fails a commit that conflicts and succeeds on retry with a fresh stage', async () => {
      const first = await connect();
      const second = await connect();
      await first.set({ key: 'balance', value: 1, record: 1 });

      await first.stage();
      await first.get({ key: 'balance', record: 1 });
      await second.set({ key: 'balance', value: 5, record: 1 });
      await first.set({ key: 'balance', value: 10, record: 1 });

      await expect(first.commit()).rejects.toThrow(TransactionConflictError);
      expect(first.transactionState).toBe('autocommit');
      await expect(first.get({ key: 'balance', record: 1 })).resolves.toBe(5);

      await first.stage();
      await first.set({ key: 'balance', value: 10, record: 1 });
      await expect(first.commit()).resolves.toBe(true);
      await expect(second.get({ key: 'balance', record: 1 })).resolves.toBe(10);
    });

    it('aborts an open transaction on close', async () => {
      const client = await connect();
      await client.stage();
      await client.add({ key: 'draft', value: 'x', record: 7 });
      await client.close();

      const other = await connect();
      await expect(other.get({ key: 'draft', record: 7 })).resolves.toBeNull();
    });
  });

  it('fails fast once the connection is closed underneath the client', async () => {
    const transport = server.connection();
    const client = await ChronoClient.connect({ transport, logger: silentLogger(), env: {}, password: 'test-secret' });
    clients.push(client);
    await transport.close();

    await expect(client.get({ record: 1 })).rejects.toThrow(TransportFailureError);
    await expect(client.get({ record: 1 })).rejects.toThrow('Connection is unusable after an earlier failure');
  });
});
