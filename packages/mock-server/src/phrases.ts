/**
 * Natural-language time phrases, resolved to microseconds relative to "now".
 */

import { RemoteOperationError } from '@chronokv/client';

const MICROS_PER_UNIT = {
  microsecond: 1,
  millisecond: 1_000,
  second: 1_000_000,
  minute: 60 * 1_000_000,
  hour: 60 * 60 * 1_000_000,
  day: 24 * 60 * 60 * 1_000_000,
  week: 7 * 24 * 60 * 60 * 1_000_000,
  month: 30 * 24 * 60 * 60 * 1_000_000,
  year: 365 * 24 * 60 * 60 * 1_000_000,
} as const;

type Unit = keyof typeof MICROS_PER_UNIT;

function isUnit(text: string): text is Unit {
  return Object.hasOwn(MICROS_PER_UNIT, text);
}

const AGO = /^(\d+)\s+([a-z]+?)s?\s+ago$/;

/**
 * Supported: `now`, `today` (start of the UTC day), `yesterday`, `last week`,
 * `last month`, and `N <unit>(s) ago`.
 */
export function resolvePhrase(phrase: string, now: number): number {
  const text = phrase.trim().toLowerCase().replace(/\s+/g, ' ');
  switch (text) {
    case 'now':
      return now;
    case 'today':
      return now - (now % MICROS_PER_UNIT.day);
    case 'yesterday':
      return now - MICROS_PER_UNIT.day;
    case 'last week':
      return now - MICROS_PER_UNIT.week;
    case 'last month':
      return now - MICROS_PER_UNIT.month;
  }

  const match = AGO.exec(text);
  const amount = match?.[1];
  const unit = match?.[2];
  if (amount !== undefined && unit !== undefined && isUnit(unit)) {
    return now - Number(amount) * MICROS_PER_UNIT[unit];
  }
  throw new RemoteOperationError('PARSE_ERROR', `Unable to resolve time phrase '${phrase}'`);
}
