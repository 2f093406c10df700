import { createHash, randomUUID } from 'node:crypto';

export const randomId = (): string => {
  try {
    return randomUUID();
  } catch {
    return `run_${Date.now()}_${Math.random().toString(16).slice(2)}`;
  }
};

export const sha256Hex = (value: string | Buffer): string => createHash('sha256').update(value).digest('hex');

/** Stable article identifier derived from a normalized URL. */
export const articleIdFor = (normalizedUrl: string): string => sha256Hex(normalizedUrl).slice(0, 16);
