/**
 * ArgumentResolver: classifies a call's arguments into one shape tag.
 *
 * Resolution is a pure function of the arguments: no I/O, no session state.
 * Rules run in a fixed order: alias folding, exclusivity, numeric criteria,
 * type normalization, then a membership check against the family's
 * registered shapes.
 */

import { AmbiguousArgumentsError, InvalidArgumentsError, MissingRequiredArgumentsError } from '../errors.js';
import { buildShapeTag, isRegisteredShape, type Plurality, type ShapedSlot, type TimeShape } from '../dispatch/shapes.js';
import type { OperationFamily } from '../types.js';
import type { CallArguments, ResolvedCall, ResolvedTime, ResolvedValues } from './types.js';

/** Every slot name any family reads, typed loosely so runtime input is checked rather than trusted. */
interface LooseArgs {
  key?: unknown;
  keys?: unknown;
  value?: unknown;
  record?: unknown;
  records?: unknown;
  criteria?: unknown;
  ccl?: unknown;
  where?: unknown;
  query?: unknown;
  timestamp?: unknown;
  time?: unknown;
  ts?: unknown;
  start?: unknown;
  end?: unknown;
}

type LooseName = keyof LooseArgs;

/** Minimum argument combination named when nothing matches. */
export const REQUIRED_ARGUMENTS: Readonly<Record<OperationFamily, string>> = {
  get: 'record or (key and criteria)',
  select: 'criteria or record',
  audit: 'record',
  add: 'key and value',
  set: 'key and value',
};

const CRITERIA_ALIASES: readonly LooseName[] = ['criteria', 'ccl', 'where', 'query'];
const TIMESTAMP_ALIASES: readonly LooseName[] = ['timestamp', 'time', 'ts'];

interface Supplied {
  name: LooseName;
  value: unknown;
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

/**
 * Return the one populated slot among `names`, or undefined when none is.
 * More than one populated slot is ambiguous.
 */
function pickOne(args: LooseArgs, names: readonly LooseName[]): Supplied | undefined {
  const present = names.filter((name) => isPresent(args[name]));
  if (present.length > 1) {
    throw new AmbiguousArgumentsError(present);
  }
  const name = present[0];
  return name === undefined ? undefined : { name, value: args[name] };
}

/** Reject the collection spelling of a slot the family only takes as a scalar. */
function requireScalarSlot(supplied: Supplied | undefined, family: OperationFamily, scalar: LooseName): void {
  if (supplied !== undefined && supplied.name !== scalar) {
    throw new InvalidArgumentsError(supplied.name, `omitted: ${family} takes a single '${scalar}'`);
  }
}

function normalizeKeys(supplied: Supplied, values: ResolvedValues): void {
  const { value } = supplied;
  if (typeof value === 'string') {
    values.key = value;
  } else if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    values.keys = [...value];
  } else {
    throw new InvalidArgumentsError(supplied.name, 'a string or an array of strings');
  }
}

function normalizeRecords(supplied: Supplied, values: ResolvedValues): void {
  const { value } = supplied;
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    values.record = value;
  } else if (Array.isArray(value) && value.every((item): item is number => Number.isSafeInteger(item))) {
    values.records = [...value];
  } else {
    throw new InvalidArgumentsError(supplied.name, 'an integer record id or an array of them');
  }
}

/** Numbers and Dates are absolute instants in microseconds; strings are phrases. */
function resolveTime(supplied: Supplied): ResolvedTime {
  const { value } = supplied;
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return { kind: 'absoluteInstant', micros: value };
  }
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return { kind: 'absoluteInstant', micros: value.getTime() * 1000 };
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    return { kind: 'phrase', text: value };
  }
  throw new InvalidArgumentsError(supplied.name, 'an integer number of microseconds, a Date, or a phrase');
}

// ============================================================================
// Per-family extraction
// ============================================================================

function extractRead(args: LooseArgs): ResolvedValues {
  let criteria = pickOne(args, CRITERIA_ALIASES);
  const timestamp = pickOne(args, TIMESTAMP_ALIASES);
  const keys = pickOne(args, ['key', 'keys']);
  let records = pickOne(args, ['record', 'records']);

  // A numeric criteria is a record id when integral, otherwise criteria text.
  if (criteria !== undefined && typeof criteria.value === 'number') {
    if (Number.isInteger(criteria.value)) {
      if (records !== undefined) {
        throw new AmbiguousArgumentsError([criteria.name, records.name]);
      }
      records = { name: 'record', value: criteria.value };
      criteria = undefined;
    } else {
      criteria = { name: criteria.name, value: String(criteria.value) };
    }
  }

  if (criteria !== undefined && records !== undefined) {
    throw new AmbiguousArgumentsError([criteria.name, records.name]);
  }

  const values: ResolvedValues = {};
  if (keys !== undefined) normalizeKeys(keys, values);
  if (records !== undefined) normalizeRecords(records, values);
  if (criteria !== undefined) {
    if (typeof criteria.value !== 'string') {
      throw new InvalidArgumentsError(criteria.name, 'a string');
    }
    values.criteria = criteria.value;
  }
  if (timestamp !== undefined) values.timestamp = resolveTime(timestamp);
  return values;
}

function extractAudit(args: LooseArgs): ResolvedValues {
  let key = pickOne(args, ['key', 'keys']);
  let record = pickOne(args, ['record', 'records']);
  const start = pickOne(args, ['start', ...TIMESTAMP_ALIASES]);
  const end = pickOne(args, ['end']);
  requireScalarSlot(key, 'audit', 'key');
  requireScalarSlot(record, 'audit', 'record');

  // An integer key means the whole record is audited.
  if (key !== undefined && typeof key.value === 'number') {
    if (!Number.isInteger(key.value)) {
      throw new InvalidArgumentsError('key', 'a string or an integer record id');
    }
    if (record !== undefined) {
      throw new AmbiguousArgumentsError(['key', 'record']);
    }
    record = { name: 'record', value: key.value };
    key = undefined;
  }

  const values: ResolvedValues = {};
  if (key !== undefined) normalizeKeys(key, values);
  if (record !== undefined) normalizeRecords(record, values);
  if (start !== undefined) values.start = resolveTime(start);
  if (end !== undefined) values.end = resolveTime(end);
  return values;
}

function extractWrite(family: OperationFamily, args: LooseArgs): ResolvedValues {
  const key = pickOne(args, ['key', 'keys']);
  const records = pickOne(args, ['record', 'records']);
  requireScalarSlot(key, family, 'key');

  const values: ResolvedValues = {};
  if (key !== undefined) normalizeKeys(key, values);
  if (records !== undefined) normalizeRecords(records, values);
  if (isPresent(args.value)) values.value = args.value;
  return values;
}

// ============================================================================
// Shape
// ============================================================================

function plurality(scalar: unknown, collection: unknown): Plurality | undefined {
  if (scalar !== undefined) return 'scalar';
  if (collection !== undefined) return 'collection';
  return undefined;
}

/**
 * What is missing for an unregistered shape. An audit that names its record
 * can only fail on its range.
 */
function missingArguments(family: OperationFamily, values: ResolvedValues): string {
  if (family === 'audit' && values.record !== undefined && values.keys === undefined) {
    if (values.start === undefined && values.end !== undefined) {
      return 'start when end is given';
    }
    if (values.start !== undefined && values.end !== undefined && values.start.kind !== values.end.kind) {
      return 'start and end of the same kind (both instants or both phrases)';
    }
  }
  return REQUIRED_ARGUMENTS[family];
}

/** Per-slot shape of a set of normalized values. */
export function shapeOf(values: ResolvedValues): Partial<Record<ShapedSlot, Plurality | TimeShape>> {
  const shape: Partial<Record<ShapedSlot, Plurality | TimeShape>> = {};
  const keys = plurality(values.key, values.keys);
  if (keys !== undefined) shape.keys = keys;
  if (values.value !== undefined) shape.value = Array.isArray(values.value) ? 'collection' : 'scalar';
  if (values.criteria !== undefined) shape.criteria = 'scalar';
  const records = plurality(values.record, values.records);
  if (records !== undefined) shape.records = records;
  if (values.timestamp !== undefined) shape.timestamp = values.timestamp.kind;
  if (values.start !== undefined) shape.start = values.start.kind;
  if (values.end !== undefined) shape.end = values.end.kind;
  return shape;
}

/**
 * Resolve the arguments of one logical operation to its shape tag and
 * normalized values.
 *
 * @throws AmbiguousArgumentsError when mutually exclusive slots are populated
 * @throws InvalidArgumentsError when a slot holds a value of the wrong type
 * @throws MissingRequiredArgumentsError when no registered shape matches
 */
export function resolveCall<F extends OperationFamily>(family: F, args: CallArguments<F>): ResolvedCall<F> {
  const loose: LooseArgs = args;
  let values: ResolvedValues;
  switch (family) {
    case 'audit':
      values = extractAudit(loose);
      break;
    case 'add':
    case 'set':
      values = extractWrite(family, loose);
      break;
    default:
      values = extractRead(loose);
  }

  const tag = buildShapeTag(shapeOf(values));
  if (!isRegisteredShape(family, tag)) {
    throw new MissingRequiredArgumentsError(missingArguments(family, values));
  }
  return { family, tag, values };
}
