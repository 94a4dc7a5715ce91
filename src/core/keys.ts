import { z } from "zod";

/**
 * Persistent reservation key. SCSI keys are 8 bytes wide, so they are
 * carried as bigint end to end rather than squeezed into a number.
 */
export type Key = bigint;

export const UNREGISTERED: Key = 0n;

const MAX_KEY = (1n << 64n) - 1n;

export const KeySchema = z
  .string()
  .trim()
  .regex(/^0x[0-9a-f]+$/i, "Expected a 0x-prefixed hexadecimal key")
  .transform((value) => BigInt(value))
  .refine((value) => value <= MAX_KEY, "Key does not fit in 64 bits");

export function parseKey(value: string): Key {
  return KeySchema.parse(value);
}

export function formatKey(key: Key): string {
  return `0x${key.toString(16)}`;
}
