import { randomUUID } from 'node:crypto';

export const randomId = (): string => randomUUID();

const toHex = (value: number) => value.toString(16).padStart(8, '0');

/** FNV-1a; stable ids for hits that arrive without one. */
export const hashString = (value: string): string => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i += 1) {
    hash ^= value.charCodeAt(i);
    hash = (hash * 0x01000193) >>> 0;
  }
  return toHex(hash);
};
