/**
 * Port-name matching against role patterns.
 */

import type { PortDeclaration, RolePattern, SignalRole, WidthRange } from '../types/index.js';

const DIRECTION_DECORATION = /_(?:i|o|io|in|out|pad)$/;

/** Lower-case and drop a trailing direction decoration: `PADDR_i` → `paddr` */
export function normalizePortName(name: string): string {
  return name.toLowerCase().replace(DIRECTION_DECORATION, '');
}

/** `=name` matches exactly; anything else matches as a suffix */
export function aliasMatches(alias: string, normalized: string): boolean {
  const a = alias.toLowerCase();
  if (a.startsWith('=')) return normalized === a.slice(1);
  return normalized.endsWith(a);
}

export function widthInRange(width: number, range: WidthRange): boolean {
  return width >= range.min && (range.max === undefined || width <= range.max);
}

/** Active-low when the name ends in n / _b / _l / _ni or starts with n */
export function inferResetPolarity(portName: string): SignalRole {
  const n = normalizePortName(portName);
  return /(?:n|_b|_l|_ni)$/.test(n) || n.startsWith('n') ? 'reset-active-low' : 'reset-active-high';
}

/** The role a pattern assigns to a concrete port */
export function roleFor(pattern: RolePattern, portName: string): SignalRole {
  return pattern.polarity === 'infer' ? inferResetPolarity(portName) : pattern.role;
}

/** Whether `role` satisfies the pattern (either reset polarity for inferred resets) */
export function roleSatisfies(pattern: RolePattern, role: SignalRole): boolean {
  if (pattern.polarity === 'infer') return role === 'reset-active-low' || role === 'reset-active-high';
  return role === pattern.role;
}

/**
 * First port, in declaration order, matched by the pattern's aliases in
 * priority order and not already taken.
 */
export function findPort(
  pattern: RolePattern,
  ports: readonly PortDeclaration[],
  taken: ReadonlySet<string>,
): PortDeclaration | undefined {
  for (const alias of pattern.aliases) {
    for (const port of ports) {
      if (taken.has(port.name)) continue;
      if (aliasMatches(alias, normalizePortName(port.name))) return port;
    }
  }
  return undefined;
}
