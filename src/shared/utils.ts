// shared/utils.ts — ID generation, numeric helpers

import { randomBytes } from 'node:crypto';
import { v4 as uuidv4 } from 'uuid';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

function nanoid(size: number): string {
  const bytes = randomBytes(size);
  let id = '';
  for (const byte of bytes) {
    id += ALPHABET.charAt(byte % ALPHABET.length);
  }
  return id;
}

export function generateActorId(): string {
  return `actor_${nanoid(8)}`;
}

export function generateEncounterId(): string {
  return uuidv4();
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function sign(value: number): -1 | 0 | 1 {
  if (value > 0) return 1;
  if (value < 0) return -1;
  return 0;
}
