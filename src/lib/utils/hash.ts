import { createHash } from 'crypto';

export function hashBuffer(buffer: Buffer): string {
  return createHash('sha256').update(buffer).digest('hex');
}

export function hashString(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

/** Stable 32-bit FNV-1a hash, used for feature hashing. */
export function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
