/**
 * Operation dispatch table: (family, shape tag) → remote-call descriptor.
 *
 * Each family's table is an object literal checked against the family's
 * shape union, so a missing or extra entry is a compile error. Entries are
 * data only: the remote method name and the order of its parameters.
 */

import { UnsupportedShapeError } from '../errors.js';
import type { OperationDescriptor, OperationFamily, ParamSlot, SessionOperation } from '../types.js';
import type { AuditShape, ReadShape, ShapeTagOf, WriteShape } from './shapes.js';

function op(family: OperationDescriptor['family'], name: string, ...params: ParamSlot[]): OperationDescriptor {
  return Object.freeze({ family, name, params: Object.freeze(params) });
}

// ─── get ─────────────────────────────────────────────────────────────────────

const GET_TABLE = {
  'records=collection': op('get', 'getRecords', 'records'),
  'records=collection, timestamp=absoluteInstant': op('get', 'getRecordsTime', 'records', 'timestamp'),
  'records=collection, timestamp=phrase': op('get', 'getRecordsTimestr', 'records', 'timestamp'),
  'keys=collection, records=collection': op('get', 'getKeysRecords', 'keys', 'records'),
  'keys=collection, records=collection, timestamp=absoluteInstant': op('get', 'getKeysRecordsTime', 'keys', 'records', 'timestamp'),
  'keys=collection, records=collection, timestamp=phrase': op('get', 'getKeysRecordsTimestr', 'keys', 'records', 'timestamp'),
  'keys=collection, criteria=scalar': op('get', 'getKeysCcl', 'keys', 'criteria'),
  'keys=collection, criteria=scalar, timestamp=absoluteInstant': op('get', 'getKeysCclTime', 'keys', 'criteria', 'timestamp'),
  'keys=collection, criteria=scalar, timestamp=phrase': op('get', 'getKeysCclTimestr', 'keys', 'criteria', 'timestamp'),
  'keys=collection, records=scalar': op('get', 'getKeysRecord', 'keys', 'record'),
  'keys=collection, records=scalar, timestamp=absoluteInstant': op('get', 'getKeysRecordTime', 'keys', 'record', 'timestamp'),
  'keys=collection, records=scalar, timestamp=phrase': op('get', 'getKeysRecordTimestr', 'keys', 'record', 'timestamp'),
  'criteria=scalar': op('get', 'getCcl', 'criteria'),
  'criteria=scalar, timestamp=absoluteInstant': op('get', 'getCclTime', 'criteria', 'timestamp'),
  'criteria=scalar, timestamp=phrase': op('get', 'getCclTimestr', 'criteria', 'timestamp'),
  'records=scalar': op('get', 'getRecord', 'record'),
  'records=scalar, timestamp=absoluteInstant': op('get', 'getRecordTime', 'record', 'timestamp'),
  'records=scalar, timestamp=phrase': op('get', 'getRecordTimestr', 'record', 'timestamp'),
  'keys=scalar, criteria=scalar': op('get', 'getKeyCcl', 'key', 'criteria'),
  'keys=scalar, criteria=scalar, timestamp=absoluteInstant': op('get', 'getKeyCclTime', 'key', 'criteria', 'timestamp'),
  'keys=scalar, criteria=scalar, timestamp=phrase': op('get', 'getKeyCclTimestr', 'key', 'criteria', 'timestamp'),
  'keys=scalar, records=collection': op('get', 'getKeyRecords', 'key', 'records'),
  'keys=scalar, records=collection, timestamp=absoluteInstant': op('get', 'getKeyRecordsTime', 'key', 'records', 'timestamp'),
  'keys=scalar, records=collection, timestamp=phrase': op('get', 'getKeyRecordsTimestr', 'key', 'records', 'timestamp'),
  'keys=scalar, records=scalar': op('get', 'getKeyRecord', 'key', 'record'),
  'keys=scalar, records=scalar, timestamp=absoluteInstant': op('get', 'getKeyRecordTime', 'key', 'record', 'timestamp'),
  'keys=scalar, records=scalar, timestamp=phrase': op('get', 'getKeyRecordTimestr', 'key', 'record', 'timestamp'),
} satisfies Record<ReadShape, OperationDescriptor>;

// ─── select ──────────────────────────────────────────────────────────────────

const SELECT_TABLE = {
  'records=collection': op('select', 'selectRecords', 'records'),
  'records=collection, timestamp=absoluteInstant': op('select', 'selectRecordsTime', 'records', 'timestamp'),
  'records=collection, timestamp=phrase': op('select', 'selectRecordsTimestr', 'records', 'timestamp'),
  'keys=collection, records=collection': op('select', 'selectKeysRecords', 'keys', 'records'),
  'keys=collection, records=collection, timestamp=absoluteInstant': op('select', 'selectKeysRecordsTime', 'keys', 'records', 'timestamp'),
  'keys=collection, records=collection, timestamp=phrase': op('select', 'selectKeysRecordsTimestr', 'keys', 'records', 'timestamp'),
  'keys=collection, criteria=scalar': op('select', 'selectKeysCcl', 'keys', 'criteria'),
  'keys=collection, criteria=scalar, timestamp=absoluteInstant': op('select', 'selectKeysCclTime', 'keys', 'criteria', 'timestamp'),
  'keys=collection, criteria=scalar, timestamp=phrase': op('select', 'selectKeysCclTimestr', 'keys', 'criteria', 'timestamp'),
  'keys=collection, records=scalar': op('select', 'selectKeysRecord', 'keys', 'record'),
  'keys=collection, records=scalar, timestamp=absoluteInstant': op('select', 'selectKeysRecordTime', 'keys', 'record', 'timestamp'),
  'keys=collection, records=scalar, timestamp=phrase': op('select', 'selectKeysRecordTimestr', 'keys', 'record', 'timestamp'),
  'criteria=scalar': op('select', 'selectCcl', 'criteria'),
  'criteria=scalar, timestamp=absoluteInstant': op('select', 'selectCclTime', 'criteria', 'timestamp'),
  'criteria=scalar, timestamp=phrase': op('select', 'selectCclTimestr', 'criteria', 'timestamp'),
  'records=scalar': op('select', 'selectRecord', 'record'),
  'records=scalar, timestamp=absoluteInstant': op('select', 'selectRecordTime', 'record', 'timestamp'),
  'records=scalar, timestamp=phrase': op('select', 'selectRecordTimestr', 'record', 'timestamp'),
  'keys=scalar, criteria=scalar': op('select', 'selectKeyCcl', 'key', 'criteria'),
  'keys=scalar, criteria=scalar, timestamp=absoluteInstant': op('select', 'selectKeyCclTime', 'key', 'criteria', 'timestamp'),
  'keys=scalar, criteria=scalar, timestamp=phrase': op('select', 'selectKeyCclTimestr', 'key', 'criteria', 'timestamp'),
  'keys=scalar, records=collection': op('select', 'selectKeyRecords', 'key', 'records'),
  'keys=scalar, records=collection, timestamp=absoluteInstant': op('select', 'selectKeyRecordsTime', 'key', 'records', 'timestamp'),
  'keys=scalar, records=collection, timestamp=phrase': op('select', 'selectKeyRecordsTimestr', 'key', 'records', 'timestamp'),
  'keys=scalar, records=scalar': op('select', 'selectKeyRecord', 'key', 'record'),
  'keys=scalar, records=scalar, timestamp=absoluteInstant': op('select', 'selectKeyRecordTime', 'key', 'record', 'timestamp'),
  'keys=scalar, records=scalar, timestamp=phrase': op('select', 'selectKeyRecordTimestr', 'key', 'record', 'timestamp'),
} satisfies Record<ReadShape, OperationDescriptor>;

// ─── audit ───────────────────────────────────────────────────────────────────

const AUDIT_TABLE = {
  'keys=scalar, records=scalar': op('audit', 'auditKeyRecord', 'key', 'record'),
  'keys=scalar, records=scalar, start=absoluteInstant': op('audit', 'auditKeyRecordStart', 'key', 'record', 'start'),
  'keys=scalar, records=scalar, start=phrase': op('audit', 'auditKeyRecordStartstr', 'key', 'record', 'start'),
  'keys=scalar, records=scalar, start=absoluteInstant, end=absoluteInstant': op('audit', 'auditKeyRecordStartEnd', 'key', 'record', 'start', 'end'),
  'keys=scalar, records=scalar, start=phrase, end=phrase': op('audit', 'auditKeyRecordStartstrEndstr', 'key', 'record', 'start', 'end'),
  'records=scalar': op('audit', 'auditRecord', 'record'),
  'records=scalar, start=absoluteInstant': op('audit', 'auditRecordStart', 'record', 'start'),
  'records=scalar, start=phrase': op('audit', 'auditRecordStartstr', 'record', 'start'),
  'records=scalar, start=absoluteInstant, end=absoluteInstant': op('audit', 'auditRecordStartEnd', 'record', 'start', 'end'),
  'records=scalar, start=phrase, end=phrase': op('audit', 'auditRecordStartstrEndstr', 'record', 'start', 'end'),
} satisfies Record<AuditShape, OperationDescriptor>;

// ─── add / set ───────────────────────────────────────────────────────────────

const ADD_TABLE = {
  'keys=scalar, value=scalar': op('add', 'addKeyValue', 'key', 'value'),
  'keys=scalar, value=scalar, records=scalar': op('add', 'addKeyValueRecord', 'key', 'value', 'record'),
  'keys=scalar, value=scalar, records=collection': op('add', 'addKeyValueRecords', 'key', 'value', 'records'),
} satisfies Record<WriteShape, OperationDescriptor>;

const SET_TABLE = {
  'keys=scalar, value=scalar': op('set', 'setKeyValue', 'key', 'value'),
  'keys=scalar, value=scalar, records=scalar': op('set', 'setKeyValueRecord', 'key', 'value', 'record'),
  'keys=scalar, value=scalar, records=collection': op('set', 'setKeyValueRecords', 'key', 'value', 'records'),
} satisfies Record<WriteShape, OperationDescriptor>;

export const OPERATION_DISPATCH_TABLE: {
  readonly [F in OperationFamily]: Readonly<Record<ShapeTagOf<F>, OperationDescriptor>>;
} = {
  get: GET_TABLE,
  select: SELECT_TABLE,
  audit: AUDIT_TABLE,
  add: ADD_TABLE,
  set: SET_TABLE,
};

// ─── session operations ──────────────────────────────────────────────────────

export const SESSION_DESCRIPTORS: { readonly [S in SessionOperation]: OperationDescriptor } = {
  stage: op('session', 'stage'),
  commit: op('session', 'commit'),
  abort: op('session', 'abort'),
  time: op('session', 'time'),
  timePhrase: op('session', 'timePhrase', 'phrase'),
  getServerVersion: op('session', 'getServerVersion'),
  getServerEnvironment: op('session', 'getServerEnvironment'),
};

// ─── lookup ──────────────────────────────────────────────────────────────────

const LOOKUP: { readonly [F in OperationFamily]: ReadonlyMap<string, OperationDescriptor> } = {
  get: new Map(Object.entries(GET_TABLE)),
  select: new Map(Object.entries(SELECT_TABLE)),
  audit: new Map(Object.entries(AUDIT_TABLE)),
  add: new Map(Object.entries(ADD_TABLE)),
  set: new Map(Object.entries(SET_TABLE)),
};

/**
 * Resolve a family and shape tag to exactly one descriptor.
 * Throws UnsupportedShapeError when the tag has no entry for the family.
 */
export function lookupDescriptor(family: OperationFamily, tag: string): OperationDescriptor {
  const descriptor = LOOKUP[family].get(tag);
  if (descriptor === undefined) {
    throw new UnsupportedShapeError(family, tag);
  }
  return descriptor;
}

/** Find a descriptor by its remote method name. */
export function findDescriptorByName(name: string): OperationDescriptor | undefined {
  for (const table of Object.values(LOOKUP)) {
    for (const descriptor of table.values()) {
      if (descriptor.name === name) return descriptor;
    }
  }
  return Object.values(SESSION_DESCRIPTORS).find((descriptor) => descriptor.name === name);
}

/** Every remote entry point the client may call, besides login and logout. */
export const REMOTE_METHOD_NAMES: readonly string[] = Object.freeze([
  ...new Set([
    ...Object.values(LOOKUP).flatMap((table) => [...table.values()].map((descriptor) => descriptor.name)),
    ...Object.values(SESSION_DESCRIPTORS).map((descriptor) => descriptor.name),
  ]),
]);
