/**
 * Transport modes and the OSM tags that identify their facilities.
 */

import { TRANSPORT_MODES, type TagFilter, type TransportMode } from "@hubline/types";
import { UnknownModeError } from "../errors.js";

export const MODE_TAGS: Readonly<Record<TransportMode, TagFilter>> = {
  auto: { building: ["warehouse", "depot", "industrial"] },
  aero: { aeroway: ["terminal", "hangar", "cargo"] },
  sea: { harbour: true, man_made: ["pier", "dock"] },
  rail: { railway: ["station", "yard", "cargo_terminal"] },
};

export function isTransportMode(value: string): value is TransportMode {
  return TRANSPORT_MODES.some((mode) => mode === value);
}

/**
 * Normalize a mode name (case-insensitive, surrounding whitespace ignored).
 *
 * @throws UnknownModeError
 */
export function parseMode(value: string): TransportMode {
  const normalized = value.trim().toLowerCase();
  if (!isTransportMode(normalized)) throw new UnknownModeError(value);
  return normalized;
}

/**
 * Tag filter for a mode name.
 *
 * @throws UnknownModeError
 */
export function getModeTags(mode: string): TagFilter {
  return MODE_TAGS[parseMode(mode)];
}
