/**
 * tbforge — Protocol signature registry.
 *
 * Signatures are data: a versioned JSON document listing, per protocol variant,
 * the role patterns a port list must bind, bus bounds, legal features and
 * typed parameters. The registry is built once, frozen, and passed explicitly
 * to the classifier, validator and plan builder.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { Protocol, ProtocolSignature } from '../types/index.js';
import { formatIssues } from '../util/issues.js';
import { deepFreeze } from '../util/freeze.js';

// ─── Schema ──────────────────────────────────────────────────────────

const protocolSchema = z.enum(['apb', 'axi4-lite', 'uart', 'spi', 'i2c']);

const roleSchema = z.enum([
  'clock', 'reset-active-low', 'reset-active-high', 'select', 'enable', 'ready', 'valid',
  'write-enable', 'address', 'data', 'strobe', 'response',
]);

const widthSchema = z.object({
  min: z.number().int().positive(),
  max: z.number().int().positive().optional(),
}).refine(w => w.max === undefined || w.max >= w.min, { message: 'max must be >= min' });

const rolePatternSchema = z.object({
  name: z.string().min(1),
  role: roleSchema,
  aliases: z.array(z.string().min(1)).min(1),
  width: widthSchema,
  default: z.string().min(1),
  polarity: z.literal('infer').optional(),
});

const busBoundSchema = z.object({
  min: z.number().int().positive(),
  max: z.number().int().positive(),
  default: z.number().int().positive(),
}).refine(b => b.min <= b.default && b.default <= b.max, { message: 'default must lie within [min, max]' });

const aliasesSchema = z.array(z.string().min(1)).optional();

const parameterSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('integer'),
    min: z.number().int().optional(),
    max: z.number().int().optional(),
    allowed: z.array(z.number().int()).optional(),
    default: z.number().int(),
    aliases: aliasesSchema,
  }),
  z.object({
    kind: z.literal('number'),
    min: z.number().optional(),
    max: z.number().optional(),
    allowed: z.array(z.number()).optional(),
    default: z.number(),
    aliases: aliasesSchema,
  }),
  z.object({ kind: z.literal('boolean'), default: z.boolean(), aliases: aliasesSchema }),
  z.object({
    kind: z.literal('enum'),
    allowed: z.array(z.string()).min(1),
    default: z.string(),
    aliases: aliasesSchema,
  }),
]);

const signatureSchema = z.object({
  id: z.string().regex(/^[a-z][a-z0-9-]*$/, 'lower-case id'),
  protocol: protocolSchema,
  label: z.string(),
  minScore: z.number().min(0).max(1),
  addressing: z.enum(['byte', 'index']),
  bus: z.object({ dataWidth: busBoundSchema, addressWidth: busBoundSchema }),
  required: z.array(rolePatternSchema).min(1),
  optional: z.array(rolePatternSchema),
  features: z.array(z.string()),
  parameters: z.record(parameterSchema),
}).superRefine((sig, ctx) => {
  const seen = new Set<string>();
  for (const p of [...sig.required, ...sig.optional]) {
    if (seen.has(p.name)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate role instance '${p.name}'` });
    }
    seen.add(p.name);
  }
});

const registrySchema = z.object({
  version: z.literal(1),
  defaults: z.record(z.string()),
  signatures: z.array(signatureSchema).min(1),
}).superRefine((doc, ctx) => {
  const ids = new Set<string>();
  for (const sig of doc.signatures) {
    if (ids.has(sig.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['signatures'], message: `duplicate signature id '${sig.id}'` });
    }
    ids.add(sig.id);
  }
  for (const [protocol, id] of Object.entries(doc.defaults)) {
    const sig = doc.signatures.find(s => s.id === id);
    if (!sig || sig.protocol !== protocol) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['defaults', protocol],
        message: `default '${id}' is not a signature of protocol '${protocol}'`,
      });
    }
  }
});

export type RegistryDocument = z.infer<typeof registrySchema>;

// ─── Registry ────────────────────────────────────────────────────────

export interface SignatureRegistry {
  readonly version: number;
  /** Declaration order; classification ties resolve in this order */
  readonly signatures: readonly ProtocolSignature[];
  get(id: string): ProtocolSignature | undefined;
  forProtocol(protocol: Protocol): ProtocolSignature[];
  /** The named variant when it belongs to `protocol`, else the protocol's default */
  resolve(protocol: Protocol, id?: string): ProtocolSignature | undefined;
}

/**
 * Build a frozen registry from a parsed signature document.
 * Throws with every schema issue listed when the document is malformed.
 */
export function createRegistry(document: unknown, source = 'signature registry'): SignatureRegistry {
  const parsed = registrySchema.safeParse(document);
  if (!parsed.success) throw new Error(formatIssues(parsed.error, source));

  const signatures: ProtocolSignature[] = parsed.data.signatures.map(s => ({
    ...s,
    required: s.required.map(p => ({ ...p })),
    optional: s.optional.map(p => ({ ...p })),
  }));
  const defaults = new Map(Object.entries(parsed.data.defaults));
  const byId = new Map(signatures.map(s => [s.id, s]));
  deepFreeze(signatures);

  const registry: SignatureRegistry = {
    version: parsed.data.version,
    signatures,
    get: id => byId.get(id),
    forProtocol: protocol => signatures.filter(s => s.protocol === protocol),
    resolve(protocol, id) {
      if (id !== undefined) {
        const sig = byId.get(id);
        return sig && sig.protocol === protocol ? sig : undefined;
      }
      const fallback = defaults.get(protocol);
      return (fallback !== undefined ? byId.get(fallback) : undefined) ?? signatures.find(s => s.protocol === protocol);
    },
  };
  return Object.freeze(registry);
}

export const BUNDLED_SIGNATURES_PATH = fileURLToPath(new URL('../../data/signatures.json', import.meta.url));

/** Read and build a registry from a JSON file (the bundled one by default) */
export function loadRegistry(path: string = BUNDLED_SIGNATURES_PATH): SignatureRegistry {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new Error(`Cannot read signature registry ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    throw new Error(`Signature registry ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return createRegistry(document, path);
}

let bundled: SignatureRegistry | undefined;

/** The bundled registry, loaded on first use */
export function defaultRegistry(): SignatureRegistry {
  bundled ??= loadRegistry();
  return bundled;
}
