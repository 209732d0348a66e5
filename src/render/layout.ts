/**
 * Text layout helpers shared by the renderers
 */

export function rule(width: number, char = "-"): string {
  return char.repeat(Math.max(width, 0));
}

/**
 * Center text in width columns; odd padding goes to the right
 */
export function center(text: string, width: number): string {
  const pad = Math.max(width - text.length, 0);
  const left = Math.floor(pad / 2);
  return " ".repeat(left) + text + " ".repeat(pad - left);
}

export function heading(title: string, width: number): string[] {
  return [rule(width, "="), title, rule(width, "=")];
}

export function section(title: string): string[] {
  return [title, rule(40)];
}

/**
 * "UAC x.y" note for the other configurations a device offers
 */
export function otherVersionsNote(current: string, available: readonly string[]): string | null {
  const others = available.filter((version) => version !== current).sort().reverse();
  if (others.length === 0) return null;
  return `Note: Device also supports UAC ${others.join(", ")}. Use --uac-version to select.`;
}
