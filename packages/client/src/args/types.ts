/**
 * Call arguments accepted by each logical operation, and the normalized
 * values the resolver extracts from them.
 */

import type { OperationFamily } from '../types.js';
import type { ShapeTagOf } from '../dispatch/shapes.js';

/** A point in time: microseconds since the epoch, a Date, or a phrase such as "last week". */
export type TimeArgument = number | string | Date;

/** Accepted spellings for criteria. */
export interface CriteriaArgs {
  criteria?: string | number;
  ccl?: string | number;
  where?: string | number;
  query?: string | number;
}

/** Accepted spellings for the timestamp of a historical read. */
export interface TimestampArgs {
  timestamp?: TimeArgument;
  time?: TimeArgument;
  ts?: TimeArgument;
}

export interface ReadArgs extends CriteriaArgs, TimestampArgs {
  key?: string | readonly string[];
  keys?: string | readonly string[];
  record?: number | readonly number[];
  records?: number | readonly number[];
}

export type GetArgs = ReadArgs;
export type SelectArgs = ReadArgs;

export interface AuditArgs extends TimestampArgs {
  /** A key, or an integer record id when auditing a whole record. */
  key?: string | number;
  record?: number;
  start?: TimeArgument;
  end?: TimeArgument;
}

export interface WriteArgs {
  key?: string;
  value?: unknown;
  record?: number | readonly number[];
  records?: number | readonly number[];
}

export type AddArgs = WriteArgs;
export type SetArgs = WriteArgs;

export interface CallArgumentsMap {
  get: GetArgs;
  select: SelectArgs;
  audit: AuditArgs;
  add: AddArgs;
  set: SetArgs;
}

export type CallArguments<F extends OperationFamily> = CallArgumentsMap[F];

/** A time slot after resolution. */
export type ResolvedTime =
  | { readonly kind: 'absoluteInstant'; readonly micros: number }
  | { readonly kind: 'phrase'; readonly text: string };

export interface ResolvedValues {
  key?: string;
  keys?: readonly string[];
  value?: unknown;
  criteria?: string;
  record?: number;
  records?: readonly number[];
  timestamp?: ResolvedTime;
  start?: ResolvedTime;
  end?: ResolvedTime;
}

export interface ResolvedCall<F extends OperationFamily = OperationFamily> {
  readonly family: F;
  readonly tag: ShapeTagOf<F>;
  readonly values: ResolvedValues;
}
