/**
 * Shape tags: the closed set of argument shapes each operation family accepts.
 *
 * A tag lists the present slots in a fixed order (keys, value, criteria,
 * records, timestamp, start, end) with their shape, e.g.
 * `keys=collection, records=scalar, timestamp=phrase`. The types below are the
 * design-time enumeration; the arrays are the same sets at run time.
 */

import type { OperationFamily } from '../types.js';

/** Slot order used when building a tag. */
export const SLOT_ORDER = ['keys', 'value', 'criteria', 'records', 'timestamp', 'start', 'end'] as const;

export type ShapedSlot = (typeof SLOT_ORDER)[number];

export type Plurality = 'scalar' | 'collection';
export type TimeShape = 'absoluteInstant' | 'phrase';

// ============================================================================
// get / select
// ============================================================================

const READ_SELECTORS = [
  'records=collection',
  'keys=collection, records=collection',
  'keys=collection, criteria=scalar',
  'keys=collection, records=scalar',
  'criteria=scalar',
  'records=scalar',
  'keys=scalar, criteria=scalar',
  'keys=scalar, records=collection',
  'keys=scalar, records=scalar',
] as const;

const READ_TIMES = ['', ', timestamp=absoluteInstant', ', timestamp=phrase'] as const;

export type ReadShape = `${(typeof READ_SELECTORS)[number]}${(typeof READ_TIMES)[number]}`;

// ============================================================================
// audit
// ============================================================================

const AUDIT_SELECTORS = ['keys=scalar, records=scalar', 'records=scalar'] as const;

const AUDIT_RANGES = [
  '',
  ', start=absoluteInstant',
  ', start=phrase',
  ', start=absoluteInstant, end=absoluteInstant',
  ', start=phrase, end=phrase',
] as const;

export type AuditShape = `${(typeof AUDIT_SELECTORS)[number]}${(typeof AUDIT_RANGES)[number]}`;

// ============================================================================
// add / set
// ============================================================================

const WRITE_TARGETS = ['', ', records=scalar', ', records=collection'] as const;

export type WriteShape = `keys=scalar, value=scalar${(typeof WRITE_TARGETS)[number]}`;

// ============================================================================
// Per-family registry
// ============================================================================

export interface ShapeTagMap {
  get: ReadShape;
  select: ReadShape;
  audit: AuditShape;
  add: WriteShape;
  set: WriteShape;
}

export type ShapeTagOf<F extends OperationFamily> = ShapeTagMap[F];

const READ_SHAPES: readonly ReadShape[] = READ_SELECTORS.flatMap((selector) =>
  READ_TIMES.map((time) => `${selector}${time}` as const),
);

const AUDIT_SHAPES: readonly AuditShape[] = AUDIT_SELECTORS.flatMap((selector) =>
  AUDIT_RANGES.map((range) => `${selector}${range}` as const),
);

const WRITE_SHAPES: readonly WriteShape[] = WRITE_TARGETS.map(
  (target) => `keys=scalar, value=scalar${target}` as const,
);

export const REGISTERED_SHAPES: { readonly [F in OperationFamily]: readonly ShapeTagOf<F>[] } = {
  get: READ_SHAPES,
  select: READ_SHAPES,
  audit: AUDIT_SHAPES,
  add: WRITE_SHAPES,
  set: WRITE_SHAPES,
};

/** Narrow a computed tag to the family's registered shapes. */
export function isRegisteredShape<F extends OperationFamily>(family: F, tag: string): tag is ShapeTagOf<F> {
  const shapes: readonly string[] = REGISTERED_SHAPES[family];
  return shapes.includes(tag);
}

/** Build the canonical tag from per-slot shapes. Absent slots are omitted. */
export function buildShapeTag(shape: Partial<Record<ShapedSlot, Plurality | TimeShape>>): string {
  const parts: string[] = [];
  for (const slot of SLOT_ORDER) {
    const slotShape = shape[slot];
    if (slotShape !== undefined) {
      parts.push(`${slot}=${slotShape}`);
    }
  }
  return parts.join(', ');
}
