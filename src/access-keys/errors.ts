import type { DenialReason } from './types';

export abstract class AccessKeyError extends Error {
  abstract readonly reason: DenialReason | 'invalid-scope' | 'unknown-tenant';

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MalformedTokenError extends AccessKeyError {
  readonly reason = 'malformed-token';
}

export class DecryptionError extends AccessKeyError {
  readonly reason = 'malformed-token';
}

export class TenantNotFoundError extends AccessKeyError {
  readonly reason = 'user-not-found';
}

export class KeyNotFoundError extends AccessKeyError {
  readonly reason = 'key-not-found';
}

export class ExpiredError extends AccessKeyError {
  readonly reason = 'expired';
}

export class OutOfScopeError extends AccessKeyError {
  constructor(
    message: string,
    readonly reason: 'out-of-scope' | 'no-query' = 'out-of-scope',
  ) {
    super(message);
  }
}

export class RevokedError extends AccessKeyError {
  readonly reason = 'revoked';
}

// Transient: callers may retry. Every other denial is terminal for the token.
export class StoreUnavailableError extends AccessKeyError {
  readonly reason = 'store-unavailable';
}

// Issuance only; surfaced to the authenticated issuer.
export class InvalidScopeError extends AccessKeyError {
  readonly reason = 'invalid-scope';
}

export class UnknownTenantError extends AccessKeyError {
  readonly reason = 'unknown-tenant';
}
