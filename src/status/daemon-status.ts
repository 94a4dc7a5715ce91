import { z } from "zod";
import { StatusParseError } from "../core/errors.js";
import { parseKey, type Key } from "../core/keys.js";

export const PrFlagSchema = z.enum(["set", "unset", "unknown"]);
export type PrFlag = z.infer<typeof PrFlagSchema>;

/**
 * `multipathd getprkey map <map>`: the key multipathd registers on new
 * paths, or "none". Newer releases append ":aptpl" when APTPL is set.
 */
export function parsePrKey(text: string): Key | null {
  const value = text.trim();
  if (value === "none") return null;
  const match = /^(0x[0-9a-f]+)(?::aptpl)?$/i.exec(value);
  if (!match?.[1]) {
    throw new StatusParseError("Unrecognised multipathd prkey reply", text);
  }
  return parseKey(match[1]);
}

/** `multipathd getprstatus` / `getprhold`. */
export function parsePrFlag(text: string): PrFlag {
  const result = PrFlagSchema.safeParse(text.trim());
  if (!result.success) {
    throw new StatusParseError("Unrecognised multipathd flag reply", text);
  }
  return result.data;
}

/** `multipathd show maps raw format "%n %w"`. */
export function parseMapWwids(text: string): Map<string, string> {
  const maps = new Map<string, string>();
  for (const line of text.split("\n")) {
    const [name, wwid] = line.trim().split(/\s+/);
    if (name && wwid) maps.set(name, wwid);
  }
  return maps;
}
