import { describe, it, expect } from 'vitest';
import { defaultRegistry } from '../src/protocols/registry.js';
import { validateSpec } from '../src/spec/validate.js';
import { buildGenerationPlan, specFromPlan, type CatalogEntry } from '../src/plan/build-plan.js';
import { apbSpec, declared } from './helpers.js';
import type { GenerationPlan, VerificationSpec } from '../src/types/index.js';

const registry = defaultRegistry();

function validated(spec: VerificationSpec): VerificationSpec {
  const result = validateSpec(spec, registry);
  if (!result.ok) throw new Error(result.violations.map(v => v.message).join('\n'));
  return result.spec;
}

function planFor(spec: VerificationSpec): GenerationPlan {
  const result = buildGenerationPlan(spec, registry);
  if (!result.ok) throw new Error(result.error.message);
  return result.value;
}

const FULL_FEATURES = ['ral', 'scoreboard', 'coverage', 'sequences', 'assertions'];

describe('buildGenerationPlan', () => {
  it('orders artifacts so references come first', () => {
    const plan = planFor(validated(apbSpec()));
    expect(plan.signature).toBe('apb3');
    expect(plan.requests.map(r => r.name)).toEqual([
      'timer_if', 'timer_pkg', 'timer_seq_item', 'timer_agent_cfg', 'timer_sequencer', 'timer_driver',
      'timer_monitor', 'timer_agent', 'timer_reg_block', 'timer_scoreboard', 'timer_env', 'timer_base_test',
      'timer_tb_top', 'timer_makefile',
    ]);

    const seen = new Set<string>();
    for (const request of plan.requests) {
      for (const dep of request.dependsOn) expect(seen.has(dep)).toBe(true);
      seen.add(request.name);
    }
  });

  it('names files and dependencies of included artifacts only', () => {
    const plan = planFor(validated(apbSpec()));
    const byKind = new Map(plan.requests.map(r => [r.kind, r]));
    expect(byKind.get('driver')?.file).toBe('timer_driver.sv');
    expect(byKind.get('makefile')?.file).toBe('Makefile');
    expect(byKind.get('environment')?.dependsOn).toEqual(['timer_agent', 'timer_reg_block', 'timer_scoreboard', 'timer_agent_cfg']);
    expect(byKind.get('test')?.dependsOn).toEqual(['timer_env']);
    expect(byKind.get('top')?.dependsOn).toEqual(['timer_if', 'timer_base_test']);
    expect(byKind.get('makefile')?.dependsOn).toHaveLength(13);
    expect(byKind.has('coverage')).toBe(false);
    expect(byKind.get('agent')?.names.coverage).toBeUndefined();
    expect(byKind.get('agent')?.names['register-model']).toBe('timer_reg_block');
  });

  it('hands each artifact its own slice of the spec', () => {
    const spec = validated(apbSpec());
    const plan = planFor(spec);
    const [iface, pkg] = plan.requests;
    expect(iface.ir).toEqual({ protocol: 'apb', bus: spec.bus, roles: spec.roles, signature: 'apb3' });
    expect(plan.requests.find(r => r.kind === 'register-model')?.ir).toEqual({ bus: spec.bus, registers: spec.registers });
    expect(plan.requests.find(r => r.kind === 'makefile')?.ir).toEqual({});

    pkg.ir.registers?.pop();
    expect(spec.registers).toHaveLength(2);
    expect(plan.requests.find(r => r.kind === 'register-model')?.ir.registers).toHaveLength(2);
  });

  it('includes every feature-gated artifact when requested', () => {
    const plan = planFor(validated(apbSpec({ features: FULL_FEATURES })));
    expect(plan.requests.map(r => r.kind)).toEqual([
      'interface', 'package', 'transaction', 'config', 'sequencer', 'driver', 'monitor', 'agent',
      'register-model', 'sequence-library', 'scoreboard', 'coverage', 'assertions', 'environment', 'test', 'top',
      'makefile',
    ]);
  });

  it('overlays spec parameters on signature defaults', () => {
    const plan = planFor(validated({
      protocol: 'uart',
      origin: 'text',
      moduleName: 'uart0',
      bus: { dataWidth: 8, addressWidth: 8, parameters: { baudRate: 9600 } },
      registers: [],
      roles: { tx: declared('data', 'tx'), rx: declared('data', 'rx') },
      features: ['scoreboard'],
    }));
    expect(plan.signature).toBe('uart');
    expect(plan.requests[0].parameters).toEqual({
      baudRate: 9600, dataBits: 8, stopBits: 1, parity: 'none', fifoDepth: 16, clockFrequency: 50000000,
    });
  });

  it('reports unbound roles for signal-level artifacts', () => {
    const result = buildGenerationPlan(apbSpec({ roles: { pclk: declared('clock', 'pclk') } }), registry);
    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'IncompleteSpec',
        message: 'timer_if needs every required role of apb3 bound to a port',
        artifact: 'timer_if',
        missing: [
          'roles.presetn', 'roles.psel', 'roles.penable', 'roles.pwrite', 'roles.paddr',
          'roles.pwdata', 'roles.prdata', 'roles.pready', 'roles.pslverr',
        ],
        context: { signature: 'apb3', roles: ['pclk'] },
      },
    });
  });

  it('reports a register model without registers', () => {
    const result = buildGenerationPlan(apbSpec({ registers: [] }), registry);
    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'IncompleteSpec',
        message: 'timer_reg_block needs at least one register',
        artifact: 'timer_reg_block',
        missing: ['registers'],
        context: { features: ['ral', 'scoreboard'] },
      },
    });
  });

  it('reports a signature the registry cannot resolve', () => {
    const result = buildGenerationPlan(apbSpec({ signature: 'axi4-lite' }), registry);
    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'IncompleteSpec',
        message: "No signature 'axi4-lite' for protocol apb",
        missing: ['signature'],
        context: { protocol: 'apb', signature: 'axi4-lite' },
      },
    });
  });

  it('reports reference cycles in a custom catalog', () => {
    const catalog: CatalogEntry[] = [
      { kind: 'interface', suffix: 'if', file: '{name}.sv', references: ['package'], ir: () => ({}) },
      { kind: 'package', suffix: 'pkg', file: '{name}.sv', references: ['interface'], ir: () => ({}) },
      { kind: 'makefile', suffix: 'makefile', file: 'Makefile', references: ['interface'], ir: () => ({}) },
    ];
    const result = buildGenerationPlan(validated(apbSpec()), registry, catalog);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Artifact references form a cycle: interface, package, makefile');
    expect(result.error.missing).toEqual(['interface', 'package', 'makefile']);
  });
});

describe('specFromPlan', () => {
  it('rebuilds the spec the plan was made from', () => {
    const spec = validated(apbSpec({
      features: FULL_FEATURES,
      stateGraph: {
        variable: 'state',
        nodes: [{ name: 'IDLE', encoding: 0, exits: 'observed' }, { name: 'BUSY', encoding: 1, exits: 'observed' }],
        edges: [{ from: 'IDLE', to: 'BUSY', guard: 'start', line: 4 }, { from: 'BUSY', to: 'IDLE', line: 5 }],
        initial: 'IDLE',
        initialSource: 'reset',
        encoding: 'binary',
      },
    }));
    const rebuilt = specFromPlan(planFor(spec));
    expect(rebuilt).toEqual({ ok: true, value: spec });
  });

  it('needs the package and interface requests', () => {
    const plan = planFor(validated(apbSpec()));
    const result = specFromPlan({ ...plan, requests: plan.requests.filter(r => r.kind !== 'package') });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.missing).toEqual(['package']);
  });
});
