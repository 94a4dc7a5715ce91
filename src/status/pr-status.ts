/**
 * Parsers for `sg_persist` / `mpathpersist` PR IN reports.
 *
 * Both tools describe the same READ KEYS and READ RESERVATION data with
 * slightly different wording; everything downstream only sees the typed
 * reports returned here.
 */

import { StatusParseError } from "../core/errors.js";
import { parseKey, type Key } from "../core/keys.js";

export interface RegistrationReport {
  generation: number | null;
  /** One entry per registered I_T nexus, so a multipath key repeats per path. */
  keys: Key[];
}

export interface ReservationDescriptor {
  key: Key;
  scope: string | null;
  type: string | null;
}

export interface ReservationReport {
  generation: number | null;
  reservation: ReservationDescriptor | null;
}

export interface PrStatus {
  registeredKeys: ReadonlySet<Key>;
  reservation: { key: Key; type: string | null } | null;
}

const GENERATION = /PR generation=(0x[0-9a-f]+)/i;
const NO_KEYS = /there are NO registered reservation keys/i;
const KEY_COUNT = /(\d+)\s+registered reservation keys?/i;
const KEY_LINE = /^\s*(0x[0-9a-f]+)\s*$/i;
const NO_RESERVATION = /there is NO reservation held/i;
const RESERVATION_KEY = /Key\s*=\s*(0x[0-9a-f]+)/i;
const SCOPE_TYPE = /scope\s*[:=]\s*([^,]+),\s*type\s*[:=]\s*(.+)$/i;

function parseGeneration(text: string): number | null {
  const match = GENERATION.exec(text);
  return match?.[1] ? Number.parseInt(match[1], 16) : null;
}

export function parseRegistrations(text: string): RegistrationReport {
  const generation = parseGeneration(text);
  const keys = text
    .split("\n")
    .map((line) => KEY_LINE.exec(line)?.[1])
    .filter((value): value is string => value !== undefined)
    .map(parseKey);

  if (NO_KEYS.test(text)) {
    if (keys.length > 0) {
      throw new StatusParseError(
        "Registration report says no keys but lists some",
        text,
      );
    }
    return { generation, keys };
  }

  const count = KEY_COUNT.exec(text);
  if (!count?.[1]) {
    throw new StatusParseError("Unrecognised registration report", text);
  }
  const expected = Number.parseInt(count[1], 10);
  if (expected !== keys.length) {
    throw new StatusParseError(
      `Registration report announces ${expected} keys but lists ${keys.length}`,
      text,
    );
  }
  return { generation, keys };
}

export function parseReservation(text: string): ReservationReport {
  const generation = parseGeneration(text);
  if (NO_RESERVATION.test(text)) {
    return { generation, reservation: null };
  }

  const key = RESERVATION_KEY.exec(text)?.[1];
  if (!key) {
    throw new StatusParseError("Unrecognised reservation report", text);
  }

  let scope: string | null = null;
  let type: string | null = null;
  for (const line of text.split("\n")) {
    const match = SCOPE_TYPE.exec(line.trim());
    if (match?.[1] && match[2]) {
      scope = match[1].trim();
      type = match[2].trim();
      break;
    }
  }

  return { generation, reservation: { key: parseKey(key), scope, type } };
}

export function toPrStatus(
  registrations: RegistrationReport,
  reservation: ReservationReport,
): PrStatus {
  return {
    registeredKeys: new Set(registrations.keys),
    reservation: reservation.reservation
      ? {
          key: reservation.reservation.key,
          type: reservation.reservation.type,
        }
      : null,
  };
}
