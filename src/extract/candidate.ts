/**
 * tbforge — Text-derived spec candidates.
 *
 * A language model (or the offline quick extractor) describes a design as a
 * flat snake_case JSON object. This module checks that object and maps it onto
 * a raw verification spec with origin "text". The result still goes through
 * the validator like any other spec.
 */

import { z } from 'zod';
import type {
  AccessMode, ParameterValue, Protocol, ProtocolSignature, Register, RegisterField, RoleAssignment,
  VerificationSpec,
} from '../types/index.js';
import type { SignatureRegistry } from '../protocols/registry.js';
import { inferResetPolarity } from '../protocols/match.js';
import { numberish } from '../spec/schema.js';
import { formatIssues } from '../util/issues.js';

// ─── Normalization tables ────────────────────────────────────────────

const PROTOCOL_ALIASES: Record<string, Protocol> = {
  apb: 'apb', apb2: 'apb', apb3: 'apb', apb4: 'apb',
  axi: 'axi4-lite', axi4: 'axi4-lite', axi4lite: 'axi4-lite', axilite: 'axi4-lite',
  uart: 'uart', serial: 'uart', rs232: 'uart',
  spi: 'spi', qspi: 'spi',
  i2c: 'i2c', iic: 'i2c',
};

const ACCESS_ALIASES: Record<string, AccessMode> = {
  ro: 'read-only', readonly: 'read-only',
  wo: 'write-only', writeonly: 'write-only',
  rw: 'read-write', readwrite: 'read-write',
  w1c: 'write-1-to-clear', write1toclear: 'write-1-to-clear',
  w1s: 'write-1-to-set', write1toset: 'write-1-to-set',
};

/** Candidate key → signature parameter name */
const PARAMETER_KEYS: Record<string, string> = {
  baud_rate: 'baudRate',
  data_bits: 'dataBits',
  stop_bits: 'stopBits',
  parity: 'parity',
  fifo_depth: 'fifoDepth',
  clock_frequency: 'clockFrequency',
  spi_mode: 'mode',
  spi_num_slaves: 'numSlaves',
  spi_msb_first: 'msbFirst',
  spi_clock_divider: 'clockDivider',
  i2c_speed_mode: 'speedMode',
  i2c_address_bits: 'addressBits',
  i2c_clock_stretching: 'clockStretching',
  device_address: 'deviceAddress',
  axi_outstanding: 'outstanding',
};

/** Boolean candidate flags that switch on a feature */
const FEATURE_FLAGS: Record<string, string> = {
  has_rts_cts: 'flow-control',
  has_fifo: 'fifo',
  spi_supports_qspi: 'qspi',
  i2c_multi_master: 'multi-master',
};

export const DEFAULT_TEXT_FEATURES = ['scoreboard', 'coverage', 'sequences'];

function squash(s: string): string {
  return s.toLowerCase().replace(/[\s_-]/g, '');
}

// ─── Schema ──────────────────────────────────────────────────────────

const accessField = z.string().transform((s, ctx) => {
  const mode = ACCESS_ALIASES[squash(s)];
  if (!mode) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown access type '${s}'` });
    return z.NEVER;
  }
  return mode;
});

const candidateFieldSchema = z.object({
  name: z.string().min(1),
  offset: numberish.optional(),
  bit_offset: numberish.optional(),
  width: numberish.optional(),
  bits: numberish.optional(),
  access: accessField.optional(),
  reset_value: numberish.optional(),
});

const candidateRegisterSchema = z.object({
  name: z.string().min(1),
  address: numberish,
  access: accessField.optional(),
  reset_value: numberish.optional(),
  width: numberish.optional(),
  description: z.string().optional(),
  fields: z.array(candidateFieldSchema).optional(),
});

export const candidateSchema = z.object({
  protocol: z.string().transform((s, ctx) => {
    const protocol = PROTOCOL_ALIASES[squash(s)];
    if (!protocol) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unsupported protocol '${s}'` });
      return z.NEVER;
    }
    return { protocol, variant: squash(s) };
  }),
  apb_version: z.union([z.literal(2), z.literal(3), z.literal(4)]).optional(),
  module_name: z.string().optional(),
  data_width: numberish.optional(),
  addr_width: numberish.optional(),
  registers: z.array(candidateRegisterSchema).default([]),
  features: z.array(z.string()).default([]),
  clock_name: z.string().optional(),
  reset_name: z.string().optional(),
  reset_active_low: z.boolean().optional(),
  /** Role instance → port name */
  roles: z.record(z.string()).optional(),
  baud_rate: numberish.optional(),
  data_bits: numberish.optional(),
  stop_bits: z.number().optional(),
  parity: z.string().optional(),
  fifo_depth: numberish.optional(),
  clock_frequency: numberish.optional(),
  has_rts_cts: z.boolean().optional(),
  has_fifo: z.boolean().optional(),
  spi_mode: numberish.optional(),
  spi_num_slaves: numberish.optional(),
  spi_msb_first: z.boolean().optional(),
  spi_clock_divider: numberish.optional(),
  spi_supports_qspi: z.boolean().optional(),
  i2c_speed_mode: z.string().transform(s => s.toLowerCase().replace(/_/g, '-')).optional(),
  i2c_address_bits: numberish.optional(),
  i2c_clock_stretching: z.boolean().optional(),
  i2c_multi_master: z.boolean().optional(),
  device_address: numberish.optional(),
  axi_outstanding: numberish.optional(),
});

export type CandidateInput = z.input<typeof candidateSchema>;
export type SpecCandidate = z.output<typeof candidateSchema>;

/** Check a candidate document; throws with every issue listed */
export function parseCandidate(document: unknown, source = 'spec candidate'): SpecCandidate {
  const parsed = candidateSchema.safeParse(document);
  if (!parsed.success) throw new Error(formatIssues(parsed.error, source));
  return parsed.data;
}

// ─── Mapping ─────────────────────────────────────────────────────────

function resolveSignature(candidate: SpecCandidate, registry: SignatureRegistry): ProtocolSignature | undefined {
  const { protocol, variant } = candidate.protocol;
  if (protocol === 'apb') {
    const version = candidate.apb_version ?? (/^apb[234]$/.test(variant) ? Number(variant.slice(3)) : undefined);
    if (version !== undefined) return registry.resolve('apb', `apb${version}`) ?? registry.resolve('apb');
  }
  return registry.resolve(protocol);
}

function mapField(f: z.output<typeof candidateFieldSchema>): RegisterField {
  return {
    name: f.name.toUpperCase(),
    offset: f.offset ?? f.bit_offset ?? 0,
    width: f.width ?? f.bits ?? 1,
    access: f.access ?? 'read-write',
    defaultValue: f.reset_value ?? 0,
  };
}

function mapRegisters(candidate: SpecCandidate): Register[] {
  return candidate.registers.map(r => {
    const reg: Register = {
      name: r.name.toUpperCase(),
      address: r.address,
      access: r.access ?? 'read-write',
      fields: (r.fields ?? []).map(mapField),
    };
    if (r.width !== undefined) reg.width = r.width;
    if (r.reset_value !== undefined) reg.resetValue = r.reset_value;
    if (r.description) reg.description = r.description;
    return reg;
  });
}

function mapRoles(candidate: SpecCandidate, signature: ProtocolSignature | undefined): Record<string, RoleAssignment> {
  const roles: Record<string, RoleAssignment> = {};
  if (!signature) return roles;
  const patterns = [...signature.required, ...signature.optional];

  // System clock: the pattern that accepts a bare `clk`, not a serial clock such as SPI sclk
  const clock = patterns.find(p => p.role === 'clock' && p.aliases.includes('=clk'))
    ?? patterns.find(p => p.role === 'clock');
  if (candidate.clock_name && clock) {
    roles[clock.name] = { role: 'clock', port: candidate.clock_name, source: 'declared' };
  }
  const reset = patterns.find(p => p.polarity === 'infer');
  if (candidate.reset_name && reset) {
    const role = candidate.reset_active_low === undefined
      ? inferResetPolarity(candidate.reset_name)
      : candidate.reset_active_low ? 'reset-active-low' : 'reset-active-high';
    roles[reset.name] = { role, port: candidate.reset_name, source: 'declared' };
  }

  for (const [instance, port] of Object.entries(candidate.roles ?? {})) {
    const pattern = patterns.find(p => p.name === instance);
    const role = pattern
      ? (pattern.polarity === 'infer' ? inferResetPolarity(port) : pattern.role)
      : 'data';
    roles[instance] = { role, port, source: 'declared' };
  }
  return roles;
}

function mapParameters(candidate: SpecCandidate, signature: ProtocolSignature | undefined): Record<string, ParameterValue> {
  const out: Record<string, ParameterValue> = {};
  if (!signature) return out;
  const record: Record<string, unknown> = candidate;
  for (const [key, name] of Object.entries(PARAMETER_KEYS)) {
    const value = record[key];
    if (!(name in signature.parameters)) continue;
    if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') out[name] = value;
  }
  return out;
}

function mapFeatures(candidate: SpecCandidate, registers: Register[]): string[] {
  const features = [...candidate.features];
  const add = (f: string) => { if (!features.includes(f)) features.push(f); };
  for (const f of DEFAULT_TEXT_FEATURES) add(f);
  if (registers.length > 0) add('ral');
  const record: Record<string, unknown> = candidate;
  for (const [flag, feature] of Object.entries(FEATURE_FLAGS)) {
    if (record[flag] === true) add(feature);
  }
  if (candidate.spi_msb_first === false) add('lsb-first');
  return features;
}

/** Map a checked candidate onto a raw spec (origin "text") */
export function specFromCandidate(candidate: SpecCandidate, registry: SignatureRegistry): VerificationSpec {
  const signature = resolveSignature(candidate, registry);
  const { protocol } = candidate.protocol;
  const registers = mapRegisters(candidate);

  const spec: VerificationSpec = {
    protocol,
    origin: 'text',
    moduleName: candidate.module_name ?? `${protocol.replace(/-/g, '')}_dut`,
    bus: {
      dataWidth: candidate.data_width ?? signature?.bus.dataWidth.default ?? 32,
      addressWidth: candidate.addr_width ?? signature?.bus.addressWidth.default ?? 32,
      parameters: mapParameters(candidate, signature),
    },
    registers,
    roles: mapRoles(candidate, signature),
    features: mapFeatures(candidate, registers),
  };
  if (signature) spec.signature = signature.id;
  return spec;
}

// ─── Model replies ───────────────────────────────────────────────────

/**
 * Pull the JSON object out of a model reply: a fenced block if there is one,
 * otherwise the outermost braces.
 */
export function extractJson(text: string): unknown {
  let body = text;
  const fenced = body.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced) body = fenced[1];
  const braces = body.match(/\{[\s\S]*\}/);
  if (braces) body = braces[0];
  try {
    return JSON.parse(body);
  } catch (err) {
    throw new Error(`Reply is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/** Natural-language → candidate collaborator (a model client, or the offline extractor) */
export interface SpecExtractor {
  extract(text: string): Promise<unknown>;
}

/** Run an extractor and map its candidate; validation is left to the caller */
export async function extractSpec(
  text: string,
  extractor: SpecExtractor,
  registry: SignatureRegistry,
): Promise<VerificationSpec> {
  const document = await extractor.extract(text);
  return specFromCandidate(parseCandidate(document), registry);
}
