import { describe, it, expect } from 'vitest';
import {
  AmbiguousArgumentsError,
  AuthenticationFailureError,
  ChronoKvError,
  MissingRequiredArgumentsError,
  RemoteOperationError,
  TransactionConflictError,
  TransportFailureError,
  parseRemoteError,
  toChronoKvError,
} from '../src/errors.js';

describe('errors', () => {
  it('formats resolution errors', () => {
    expect(new MissingRequiredArgumentsError('criteria or record').message).toBe('Must specify criteria or record');
    expect(new AmbiguousArgumentsError(['record', 'records']).message).toBe('Cannot specify record and records together');
  });

  it('sets name and code', () => {
    const err = new TransportFailureError('down');
    expect(err).toBeInstanceOf(ChronoKvError);
    expect(err.name).toBe('TransportFailureError');
    expect(err.code).toBe('TRANSPORT_FAILURE');
  });

  it('keeps the cause', () => {
    const cause = new Error('socket hang up');
    expect(new TransportFailureError('down', { cause }).cause).toBe(cause);
  });

  describe('toChronoKvError', () => {
    it('maps known codes to their classes', () => {
      expect(toChronoKvError('TRANSACTION_CONFLICT', 'x')).toBeInstanceOf(TransactionConflictError);
      expect(toChronoKvError('AUTHENTICATION_FAILURE', 'x')).toBeInstanceOf(AuthenticationFailureError);
      expect(toChronoKvError('TRANSPORT_FAILURE', 'x')).toBeInstanceOf(TransportFailureError);
    });

    it('keeps unknown codes on a RemoteOperationError', () => {
      const err = toChronoKvError('PARSE_ERROR', 'Unexpected token');
      expect(err).toBeInstanceOf(RemoteOperationError);
      expect(err.code).toBe('PARSE_ERROR');
    });
  });

  describe('parseRemoteError', () => {
    it('parses bracketed codes', () => {
      const err = parseRemoteError(new Error('[TRANSACTION_CONFLICT] record 4 changed'));
      expect(err).toBeInstanceOf(TransactionConflictError);
      expect(err.message).toBe('record 4 changed');
    });

    it('returns client errors unchanged', () => {
      const original = new AuthenticationFailureError('expired');
      expect(parseRemoteError(original)).toBe(original);
    });

    it('falls back to UNKNOWN', () => {
      expect(parseRemoteError('boom')).toMatchObject({ code: 'UNKNOWN', message: 'boom' });
    });
  });
});
