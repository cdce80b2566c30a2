import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { RoleAssignment, SignalRole, VerificationSpec } from '../src/types/index.js';

export function fixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url)), 'utf-8');
}

export function declared(role: SignalRole, port: string): RoleAssignment {
  return { role, port, source: 'declared' };
}

/** A text-derived APB3 spec that passes validation as-is */
export function apbSpec(overrides: Partial<VerificationSpec> = {}): VerificationSpec {
  return {
    protocol: 'apb',
    signature: 'apb3',
    origin: 'text',
    moduleName: 'timer',
    bus: { dataWidth: 32, addressWidth: 12, parameters: {} },
    registers: [
      {
        name: 'CTRL',
        address: 0x0,
        access: 'read-write',
        fields: [
          { name: 'EN', offset: 0, width: 1, access: 'read-write', defaultValue: 0 },
          { name: 'MODE', offset: 1, width: 2, access: 'read-write', defaultValue: 1 },
        ],
      },
      { name: 'STATUS', address: 0x4, access: 'read-only', fields: [] },
    ],
    roles: {
      pclk: declared('clock', 'pclk'),
      presetn: declared('reset-active-low', 'presetn'),
      psel: declared('select', 'psel'),
      penable: declared('enable', 'penable'),
      pwrite: declared('write-enable', 'pwrite'),
      paddr: declared('address', 'paddr'),
      pwdata: declared('data', 'pwdata'),
      prdata: declared('data', 'prdata'),
      pready: declared('ready', 'pready'),
      pslverr: declared('response', 'pslverr'),
    },
    features: ['ral', 'scoreboard'],
    ...overrides,
  };
}
