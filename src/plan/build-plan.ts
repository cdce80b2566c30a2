/**
 * tbforge — Generation plan builder.
 *
 * Turns a validated spec into the ordered list of artifact requests handed to
 * the renderer. Every request carries the resolved names of the whole plan, so
 * emission order only matters for readability; it still follows references
 * (interface and package first, Makefile last).
 */

import type {
  ArtifactIr, ArtifactKind, ArtifactRequest, GenerationPlan, IncompleteSpec, ParameterValue,
  ProtocolSignature, Result, VerificationSpec,
} from '../types/index.js';
import type { SignatureRegistry } from '../protocols/registry.js';

export interface CatalogEntry {
  kind: ArtifactKind;
  suffix: string;
  /** Output file; `{name}` expands to the artifact name */
  file: string;
  references: ArtifactKind[];
  /** Included only when the spec requests this feature */
  feature?: string;
  /** Needs every required role bound to a port */
  signals?: boolean;
  /** Needs at least one register */
  registers?: boolean;
  ir: (spec: VerificationSpec) => ArtifactIr;
}

const core = (spec: VerificationSpec): ArtifactIr => ({ protocol: spec.protocol });

function withStateGraph(spec: VerificationSpec, ir: ArtifactIr): ArtifactIr {
  if (spec.stateGraph) ir.stateGraph = spec.stateGraph;
  return ir;
}

function withSignature(spec: VerificationSpec, ir: ArtifactIr): ArtifactIr {
  if (spec.signature !== undefined) ir.signature = spec.signature;
  return ir;
}

export const DEFAULT_CATALOG: readonly CatalogEntry[] = [
  {
    kind: 'interface', suffix: 'if', file: '{name}.sv', references: [], signals: true,
    ir: spec => withSignature(spec, { protocol: spec.protocol, bus: spec.bus, roles: spec.roles }),
  },
  {
    kind: 'package', suffix: 'pkg', file: '{name}.sv', references: [],
    ir: spec => withStateGraph(spec, withSignature(spec, {
      protocol: spec.protocol, bus: spec.bus, registers: spec.registers, features: spec.features,
    })),
  },
  {
    kind: 'transaction', suffix: 'seq_item', file: '{name}.sv', references: ['package'],
    ir: spec => ({ protocol: spec.protocol, bus: spec.bus }),
  },
  {
    kind: 'config', suffix: 'agent_cfg', file: '{name}.sv', references: ['interface', 'package'],
    ir: spec => ({ protocol: spec.protocol, bus: spec.bus }),
  },
  { kind: 'sequencer', suffix: 'sequencer', file: '{name}.sv', references: ['transaction'], ir: core },
  {
    kind: 'driver', suffix: 'driver', file: '{name}.sv', references: ['interface', 'transaction', 'config'],
    signals: true, ir: spec => ({ protocol: spec.protocol, bus: spec.bus, roles: spec.roles }),
  },
  {
    kind: 'monitor', suffix: 'monitor', file: '{name}.sv', references: ['interface', 'transaction', 'config'],
    signals: true, ir: spec => ({ protocol: spec.protocol, bus: spec.bus, roles: spec.roles }),
  },
  {
    kind: 'agent', suffix: 'agent', file: '{name}.sv', references: ['driver', 'monitor', 'sequencer', 'config'],
    ir: core,
  },
  {
    kind: 'register-model', suffix: 'reg_block', file: '{name}.sv', references: ['package'],
    feature: 'ral', registers: true, ir: spec => ({ bus: spec.bus, registers: spec.registers }),
  },
  {
    kind: 'sequence-library', suffix: 'seq_lib', file: '{name}.sv',
    references: ['transaction', 'sequencer', 'register-model'], feature: 'sequences',
    ir: spec => withStateGraph(spec, { protocol: spec.protocol, registers: spec.registers }),
  },
  {
    kind: 'scoreboard', suffix: 'scoreboard', file: '{name}.sv', references: ['transaction', 'package'],
    feature: 'scoreboard', ir: spec => ({ protocol: spec.protocol, registers: spec.registers }),
  },
  {
    kind: 'coverage', suffix: 'coverage', file: '{name}.sv', references: ['transaction'], feature: 'coverage',
    ir: spec => withStateGraph(spec, { protocol: spec.protocol, bus: spec.bus, registers: spec.registers }),
  },
  {
    kind: 'assertions', suffix: 'sva', file: '{name}.sv', references: ['interface'], feature: 'assertions',
    signals: true, ir: spec => withStateGraph(spec, { protocol: spec.protocol, roles: spec.roles }),
  },
  {
    kind: 'environment', suffix: 'env', file: '{name}.sv',
    references: ['agent', 'register-model', 'scoreboard', 'coverage', 'config'],
    ir: spec => ({ protocol: spec.protocol, features: spec.features }),
  },
  { kind: 'test', suffix: 'base_test', file: '{name}.sv', references: ['environment', 'sequence-library'], ir: core },
  { kind: 'top', suffix: 'tb_top', file: '{name}.sv', references: ['interface', 'test', 'assertions'], ir: core },
  {
    kind: 'makefile', suffix: 'makefile', file: 'Makefile',
    references: [
      'interface', 'package', 'transaction', 'config', 'sequencer', 'driver', 'monitor', 'agent',
      'register-model', 'sequence-library', 'scoreboard', 'coverage', 'assertions', 'environment', 'test', 'top',
    ],
    ir: () => ({}),
  },
];

function incomplete(message: string, missing: string[], context: Record<string, unknown>, artifact?: string): IncompleteSpec {
  const error: IncompleteSpec = { kind: 'IncompleteSpec', message, missing, context };
  if (artifact !== undefined) error.artifact = artifact;
  return error;
}

function mergedParameters(spec: VerificationSpec, signature: ProtocolSignature): Record<string, ParameterValue> {
  const out: Record<string, ParameterValue> = {};
  for (const [name, param] of Object.entries(signature.parameters)) out[name] = param.default;
  return { ...out, ...spec.bus.parameters };
}

function unboundRoles(spec: VerificationSpec, signature: ProtocolSignature): string[] {
  return signature.required
    .filter(p => {
      const assigned = spec.roles[p.name];
      return !assigned || !assigned.port;
    })
    .map(p => `roles.${p.name}`);
}

/**
 * Topological order, always taking the earliest ready entry in catalog order.
 * Returns the entries that could not be placed when references form a cycle.
 */
function orderEntries(entries: CatalogEntry[]): { ordered: CatalogEntry[]; stuck: CatalogEntry[] } {
  const present = new Set(entries.map(e => e.kind));
  const pending = new Map<ArtifactKind, number>();
  for (const e of entries) {
    pending.set(e.kind, new Set(e.references.filter(r => present.has(r) && r !== e.kind)).size);
  }

  const ordered: CatalogEntry[] = [];
  const placed = new Set<ArtifactKind>();
  while (ordered.length < entries.length) {
    const next = entries.find(e => !placed.has(e.kind) && pending.get(e.kind) === 0);
    if (!next) break;
    ordered.push(next);
    placed.add(next.kind);
    for (const e of entries) {
      if (!placed.has(e.kind) && e.references.includes(next.kind)) {
        pending.set(e.kind, (pending.get(e.kind) ?? 0) - 1);
      }
    }
  }
  return { ordered, stuck: entries.filter(e => !placed.has(e.kind)) };
}

/**
 * Build the ordered artifact requests for a validated spec. An IncompleteSpec
 * here means the spec skipped validation or the catalog is inconsistent.
 */
export function buildGenerationPlan(
  spec: VerificationSpec,
  registry: SignatureRegistry,
  catalog: readonly CatalogEntry[] = DEFAULT_CATALOG,
): Result<GenerationPlan, IncompleteSpec> {
  const signature = registry.resolve(spec.protocol, spec.signature);
  if (!signature) {
    return {
      ok: false,
      error: incomplete(
        `No signature '${spec.signature ?? spec.protocol}' for protocol ${spec.protocol}`,
        ['signature'],
        { protocol: spec.protocol, signature: spec.signature ?? null },
      ),
    };
  }

  const entries = catalog.filter(e => e.feature === undefined || spec.features.includes(e.feature));
  const names: Partial<Record<ArtifactKind, string>> = {};
  for (const e of entries) names[e.kind] = `${spec.moduleName}_${e.suffix}`;

  const missingRoles = unboundRoles(spec, signature);
  for (const e of entries) {
    const name = `${spec.moduleName}_${e.suffix}`;
    if (e.signals && missingRoles.length > 0) {
      return {
        ok: false,
        error: incomplete(
          `${name} needs every required role of ${signature.id} bound to a port`,
          missingRoles,
          { signature: signature.id, roles: Object.keys(spec.roles) },
          name,
        ),
      };
    }
    if (e.registers && spec.registers.length === 0) {
      return {
        ok: false,
        error: incomplete(
          `${name} needs at least one register`,
          ['registers'],
          { features: spec.features },
          name,
        ),
      };
    }
  }

  const { ordered, stuck } = orderEntries(entries);
  if (stuck.length > 0) {
    return {
      ok: false,
      error: incomplete(
        `Artifact references form a cycle: ${stuck.map(e => e.kind).join(', ')}`,
        stuck.map(e => e.kind),
        { references: Object.fromEntries(stuck.map(e => [e.kind, e.references])) },
      ),
    };
  }

  const parameters = mergedParameters(spec, signature);
  const requests: ArtifactRequest[] = ordered.map(e => {
    const name = `${spec.moduleName}_${e.suffix}`;
    const dependsOn: string[] = [];
    for (const ref of e.references) {
      const refName = names[ref];
      if (refName !== undefined && ref !== e.kind && !dependsOn.includes(refName)) dependsOn.push(refName);
    }
    return {
      name,
      kind: e.kind,
      file: e.file.replace('{name}', name),
      dependsOn,
      names: { ...names },
      parameters: { ...parameters },
      ir: structuredClone(e.ir(spec)),
    };
  });

  return {
    ok: true,
    value: {
      moduleName: spec.moduleName,
      protocol: spec.protocol,
      signature: signature.id,
      origin: spec.origin,
      features: [...spec.features],
      requests,
    },
  };
}

/**
 * Re-derive the spec from the plan's package and interface requests. Lossless
 * for every field the plan consumed.
 */
export function specFromPlan(plan: GenerationPlan): Result<VerificationSpec, IncompleteSpec> {
  const pkg = plan.requests.find(r => r.kind === 'package');
  const iface = plan.requests.find(r => r.kind === 'interface');
  const bus = pkg?.ir.bus;
  if (!pkg || !iface || !bus) {
    const missing = [
      ...(pkg ? [] : ['package']),
      ...(iface ? [] : ['interface']),
      ...(pkg && !bus ? ['package.ir.bus'] : []),
    ];
    return {
      ok: false,
      error: incomplete(
        'Plan lacks the package or interface request needed to rebuild the spec',
        missing,
        { requests: plan.requests.map(r => r.kind) },
      ),
    };
  }

  const spec: VerificationSpec = {
    protocol: plan.protocol,
    origin: plan.origin,
    moduleName: plan.moduleName,
    bus: structuredClone(bus),
    registers: structuredClone(pkg.ir.registers ?? []),
    roles: structuredClone(iface.ir.roles ?? {}),
    features: [...plan.features],
  };
  if (pkg.ir.signature !== undefined) spec.signature = pkg.ir.signature;
  if (pkg.ir.stateGraph) spec.stateGraph = structuredClone(pkg.ir.stateGraph);
  return { ok: true, value: spec };
}
