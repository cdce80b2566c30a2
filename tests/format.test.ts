import { describe, it, expect } from 'vitest';
import { bar, formatTable, formatPlan, formatViolations, trunc } from '../src/cli/format.js';
import { defaultRegistry } from '../src/protocols/registry.js';
import { buildGenerationPlan } from '../src/plan/build-plan.js';
import { apbSpec } from './helpers.js';

const plain = (s: string) => s.replace(/\u001b\[[0-9;]*m/g, '');

describe('formatTable', () => {
  it('pads, aligns and truncates cells', () => {
    const lines = formatTable(
      [{ header: 'A', width: 3 }, { header: 'B', width: 4, align: 'right' }],
      [['abcdef', '7'], ['x']],
    ).map(plain);
    expect(lines).toEqual([
      'A       B',
      '───  ────',
      'ab…     7',
      'x',
    ]);
  });

  it('leaves short strings alone', () => {
    expect(trunc('abc', 3)).toBe('abc');
    expect(trunc('abcd', 3)).toBe('ab…');
  });
});

describe('bar', () => {
  it('fills in proportion and clamps', () => {
    expect(plain(bar(50, 4))).toBe('██░░');
    expect(plain(bar(150, 4))).toBe('████');
    expect(plain(bar(-5, 4))).toBe('░░░░');
  });
});

describe('result renderers', () => {
  it('heads a plan with its module and artifact count', () => {
    const result = buildGenerationPlan(apbSpec(), defaultRegistry());
    if (!result.ok) throw new Error(result.error.message);
    const lines = formatPlan(result.value).map(plain);
    expect(lines[0]).toBe('timer apb3, 14 artifacts');
    expect(lines[3]).toBe('  1  interface         timer_if.sv                   —');
  });

  it('lists violations by kind', () => {
    const lines = formatViolations([{
      kind: 'UnsupportedFeature', message: "Feature 'qspi' is not supported by apb3", signature: 'apb3', feature: 'qspi',
    }]).map(plain);
    expect(lines).toEqual(["✗ UnsupportedFeature Feature 'qspi' is not supported by apb3"]);
  });
});
