/**
 * Terminal Type Names
 * Static lookup of wTerminalType codes from terminal-types.json
 */

import terminalTypes from "./terminal-types.json" with { type: "json" };

// JSON keys are hex codes ("0x0101", "0x02")
function codeTable(entries: Record<string, string>): ReadonlyMap<number, string> {
  return new Map(Object.entries(entries).map(([code, name]): [number, string] => [parseInt(code, 16), name]));
}

const TERMINAL_TYPE_NAMES = codeTable(terminalTypes.names);
const TERMINAL_CATEGORIES = codeTable(terminalTypes.categories);

/**
 * Human-readable name for a terminal type code.
 * Unknown codes fall back to their high-byte category, e.g. "Input (0x02FF)".
 */
export function terminalTypeName(code: number): string {
  const known = TERMINAL_TYPE_NAMES.get(code);
  if (known) return known;

  const category = TERMINAL_CATEGORIES.get((code >> 8) & 0xff) ?? "Unknown";
  return `${category} (0x${hex(code, 4)})`;
}

export function hex(value: number, digits: number): string {
  return value.toString(16).toUpperCase().padStart(digits, "0");
}
