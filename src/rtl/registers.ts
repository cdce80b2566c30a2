/**
 * Register map recovery from address constants.
 *
 * Designs commonly name their register offsets (`localparam CTRL_ADDR = 8'h00`);
 * each such constant becomes a read-write register with no fields. Widths,
 * depths and sizes that share the naming scheme are ignored.
 */

import type { Register, RtlParameter } from '../types/index.js';

const ADDRESS_NAME = /^(?:(?:ADDR|REG|OFFSET)_(?<pre>\w+)|(?<post>\w+?)_(?:ADDR|ADDRESS|OFFSET|OFFS|REG))$/i;
const NOT_AN_ADDRESS = /WIDTH|BITS|SIZE|DEPTH|COUNT|^(?:ADDR|REG)_?W$/i;

function registerName(param: string): string | undefined {
  if (NOT_AN_ADDRESS.test(param)) return undefined;
  const m = param.match(ADDRESS_NAME);
  const name = m?.groups?.pre ?? m?.groups?.post;
  return name ? name.toUpperCase() : undefined;
}

/**
 * Registers named by evaluated address constants, in declaration order.
 * Shared addresses are kept as written; the validator reports them.
 */
export function recoverRegisters(parameters: RtlParameter[]): Register[] {
  const registers: Register[] = [];
  const names = new Set<string>();

  for (const p of parameters) {
    if (p.value === undefined || p.value < 0) continue;
    const name = registerName(p.name);
    if (!name || names.has(name)) continue;
    names.add(name);
    registers.push({
      name,
      address: p.value,
      access: 'read-write',
      description: `Recovered from ${p.kind} ${p.name}`,
      fields: [],
    });
  }

  return registers;
}
