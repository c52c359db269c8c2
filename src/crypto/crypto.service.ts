import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'node:crypto';

import { Injectable } from '@nestjs/common';

import { DecryptionError } from '../access-keys/errors';
import { sha256Hex } from '../utils/hash';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
const BASE64URL_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * AES-256-GCM over short payload strings. Output is
 * base64url(iv || authTag || ciphertext); a fresh IV per call means the same
 * plaintext never encrypts to the same string twice.
 */
@Injectable()
export class CryptoService {
  encrypt(plaintext: string, secret: string): string {
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, this.deriveKey(secret), iv, {
      authTagLength: AUTH_TAG_LENGTH,
    });

    const encrypted = Buffer.concat([cipher.update(plaintext, 'utf-8'), cipher.final()]);
    const authTag = cipher.getAuthTag();

    return Buffer.concat([iv, authTag, encrypted]).toString('base64url');
  }

  /**
   * @throws DecryptionError when the input is not canonical base64url, is too
   * short, or fails GCM authentication (tampering or wrong secret).
   */
  decrypt(ciphertext: string, secret: string): string {
    if (!BASE64URL_PATTERN.test(ciphertext)) {
      throw new DecryptionError('Ciphertext is not base64url encoded');
    }

    const envelope = Buffer.from(ciphertext, 'base64url');
    // Trailing bits of the last character are ignored by the decoder.
    if (envelope.toString('base64url') !== ciphertext) {
      throw new DecryptionError('Ciphertext is not canonically encoded');
    }
    if (envelope.length <= IV_LENGTH + AUTH_TAG_LENGTH) {
      throw new DecryptionError('Ciphertext is too short');
    }

    const iv = envelope.subarray(0, IV_LENGTH);
    const authTag = envelope.subarray(IV_LENGTH, IV_LENGTH + AUTH_TAG_LENGTH);
    const encrypted = envelope.subarray(IV_LENGTH + AUTH_TAG_LENGTH);

    const decipher = createDecipheriv(ALGORITHM, this.deriveKey(secret), iv, {
      authTagLength: AUTH_TAG_LENGTH,
    });
    decipher.setAuthTag(authTag);

    try {
      return Buffer.concat([decipher.update(encrypted), decipher.final()]).toString('utf-8');
    } catch (error) {
      throw new DecryptionError('Ciphertext failed authentication', { cause: error });
    }
  }

  hash(input: string): string {
    return sha256Hex(input);
  }

  private deriveKey(secret: string): Buffer {
    return createHash('sha256').update(secret, 'utf-8').digest();
  }
}
