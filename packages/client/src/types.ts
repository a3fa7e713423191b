/**
 * Shared types for the chronokv client.
 *
 * Wire-level shapes (tokens, TObject) mirror what the server speaks; the
 * descriptor types are the vocabulary of the dispatch table.
 */

import type { Link, Tag } from './codec/values.js';

// ============================================================================
// Session tokens
// ============================================================================

/** Opaque credential issued by login. Lives as long as the connection. */
export interface AccessToken {
  readonly data: string;
}

/** Opaque handle issued by the server when staging begins. */
export interface TransactionToken {
  readonly accessToken: AccessToken;
  readonly timestamp: number;
}

// ============================================================================
// Values
// ============================================================================

export type WireType = 'BOOLEAN' | 'INTEGER' | 'LONG' | 'DOUBLE' | 'STRING' | 'TAG' | 'LINK' | 'NULL';

/** Wire representation of a single value. */
export interface TObject {
  readonly type: WireType;
  readonly data: string;
}

/** A dynamically typed value stored in a field. */
export type Value = boolean | number | bigint | string | Link | Tag;

/** Decoded result tree returned by read operations. */
export type QueryResult = Value | null | QueryResult[] | { [key: string]: QueryResult };

// ============================================================================
// Dispatch vocabulary
// ============================================================================

export type OperationFamily = 'get' | 'select' | 'audit' | 'add' | 'set';

export type SessionOperation =
  | 'stage'
  | 'commit'
  | 'abort'
  | 'time'
  | 'timePhrase'
  | 'getServerVersion'
  | 'getServerEnvironment';

export type ParamSlot =
  | 'key'
  | 'keys'
  | 'value'
  | 'criteria'
  | 'record'
  | 'records'
  | 'timestamp'
  | 'start'
  | 'end'
  | 'phrase';

/** One remote-call variant: its method name and ordered parameter slots. */
export interface OperationDescriptor {
  readonly family: OperationFamily | 'session';
  readonly name: string;
  readonly params: readonly ParamSlot[];
}

export type TransactionState = 'autocommit' | 'staged';
