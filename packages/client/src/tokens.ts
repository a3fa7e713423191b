/**
 * Runtime guards for the opaque session tokens the server hands out.
 */

import type { AccessToken, TransactionToken } from './types.js';

export function isAccessToken(value: unknown): value is AccessToken {
  return typeof value === 'object' && value !== null && 'data' in value && typeof value.data === 'string';
}

export function isTransactionToken(value: unknown): value is TransactionToken {
  return (
    typeof value === 'object' &&
    value !== null &&
    'accessToken' in value &&
    'timestamp' in value &&
    isAccessToken(value.accessToken) &&
    typeof value.timestamp === 'number'
  );
}
