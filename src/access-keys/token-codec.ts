import { Inject, Injectable } from '@nestjs/common';

import { CryptoService } from '../crypto/crypto.service';
import { ACCESS_KEYS_SECRET } from './access-keys.constants';
import { MalformedTokenError } from './errors';
import type { IssuedToken, KeyKind, TokenPayload } from './types';

const KIND_NAMES: Record<KeyKind, string> = {
  endpoint: 'EndpointKey',
  query: 'QueryKey',
};

const ID_PATTERN = /^\d+$/;

/**
 * Client-facing token: the encrypted string `Id:<n>,Type:<kind-name>`.
 * The SHA-256 of the token is what gets persisted as its access record.
 */
@Injectable()
export class TokenCodec {
  constructor(
    private readonly cryptoService: CryptoService,
    @Inject(ACCESS_KEYS_SECRET) private readonly secret: string,
  ) {}

  issue(recordId: number, recordKind: KeyKind): IssuedToken {
    if (!Number.isSafeInteger(recordId) || recordId < 0) {
      throw new MalformedTokenError(`Invalid record id: ${recordId}`);
    }

    const payload = `Id:${recordId},Type:${KIND_NAMES[recordKind]}`;
    const token = this.cryptoService.encrypt(payload, this.secret);
    return { token, verificationHash: this.verificationHash(token) };
  }

  /**
   * @throws DecryptionError when the token cannot be decrypted
   * @throws MalformedTokenError when the payload lacks a valid id or kind
   */
  decode(token: string): TokenPayload {
    const payload = this.cryptoService.decrypt(token.trim(), this.secret);
    return parseTokenPayload(payload);
  }

  verificationHash(token: string): string {
    return this.cryptoService.hash(token.trim());
  }
}

export function parseTokenPayload(payload: string): TokenPayload {
  const fields = new Map<string, string>();
  for (const part of payload.split(',')) {
    const separator = part.indexOf(':');
    if (separator < 0) {
      continue;
    }
    const name = part.slice(0, separator).trim();
    if (fields.has(name)) {
      throw new MalformedTokenError(`Duplicate token field: ${name}`);
    }
    fields.set(name, part.slice(separator + 1).trim());
  }

  const rawId = fields.get('Id');
  const rawType = fields.get('Type');
  if (rawId === undefined || rawType === undefined) {
    throw new MalformedTokenError('Token payload requires Id and Type');
  }

  const recordId = Number(rawId);
  if (!ID_PATTERN.test(rawId) || !Number.isSafeInteger(recordId)) {
    throw new MalformedTokenError('Token id is not a non-negative integer');
  }

  const recordKind = parseKindName(rawType);
  if (!recordKind) {
    throw new MalformedTokenError(`Unknown key type: ${rawType}`);
  }

  return { recordId, recordKind };
}

function parseKindName(value: string): KeyKind | null {
  const normalized = value.toLowerCase();
  if (normalized === KIND_NAMES.endpoint.toLowerCase()) {
    return 'endpoint';
  }
  if (normalized === KIND_NAMES.query.toLowerCase()) {
    return 'query';
  }
  return null;
}
