import { randomBytes, timingSafeEqual } from 'node:crypto';

import { Injectable } from '@nestjs/common';

import { sha256Hex } from '../utils/hash';

export const SECRET_PREFIX = 'ocr_';
const SECRET_BYTES = 32;
// base64url of 32 bytes, unpadded.
const SECRET_BODY_LENGTH = 43;
const SECRET_PATTERN = /^[A-Za-z0-9_-]+$/;

export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationError';
  }
}

export type GeneratedSecret = {
  secret: string;
  hash: string;
};

@Injectable()
export class SecretGenerator {
  generate(): GeneratedSecret {
    let bytes: Buffer;
    try {
      bytes = randomBytes(SECRET_BYTES);
    } catch (error) {
      throw new GenerationError('Secure random source unavailable', { cause: error });
    }

    const secret = `${SECRET_PREFIX}${bytes.toString('base64url')}`;
    return { secret, hash: this.hash(secret) };
  }

  hash(secret: string): string {
    return sha256Hex(secret);
  }

  verify(secret: string, digest: string): boolean {
    const candidate = Buffer.from(this.hash(secret), 'hex');
    const expected = Buffer.from(digest, 'hex');
    if (candidate.length !== expected.length) {
      return false;
    }

    return timingSafeEqual(candidate, expected);
  }

  /** Cheap shape check so unrelated tokens are rejected before hashing. */
  looksLikeSecret(value: string): boolean {
    if (!value.startsWith(SECRET_PREFIX)) {
      return false;
    }

    const body = value.slice(SECRET_PREFIX.length);
    return body.length === SECRET_BODY_LENGTH && SECRET_PATTERN.test(body);
  }
}
