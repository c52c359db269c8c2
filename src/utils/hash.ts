import { createHash } from 'node:crypto';

export function sha256Hex(value: string): string {
  return createHash('sha256').update(value, 'utf-8').digest('hex');
}

// Log-safe fingerprint of a token or storage key; never log the value itself.
export function hashKeyForLogging(value: string): string {
  return sha256Hex(value).substring(0, 32);
}
