import { describe, it, expect } from 'vitest';
import {
  binPercentage, matchTarget, parseCoverageDocument, rankCoverageGaps, severityOf,
} from '../src/coverage/gaps.js';
import { apbSpec } from './helpers.js';

const spec = apbSpec({
  stateGraph: {
    variable: 'state',
    nodes: [{ name: 'IDLE', encoding: 0, exits: 'observed' }, { name: 'BUSY', encoding: 1, exits: 'observed' }],
    edges: [{ from: 'IDLE', to: 'BUSY', line: 3 }, { from: 'BUSY', to: 'IDLE', line: 4 }],
    initial: 'IDLE',
  },
});

describe('parseCoverageDocument', () => {
  it('reads a flat bin map and caps percentages', () => {
    expect(parseCoverageDocument({ protocol: 'apb', bins: { a: 40, b: 120 } })).toEqual({
      protocol: 'apb',
      bins: [{ id: 'a', percentage: 40 }, { id: 'b', percentage: 100 }],
    });
  });

  it('flattens covergroups into dotted bin ids', () => {
    const report = parseCoverageDocument({
      covergroups: [{
        name: 'regs_cg',
        coverpoints: [{ name: 'addr', bins: [{ name: 'ctrl', hits: 3, goal: 4 }, { name: 'status', hits: 0 }] }],
      }],
    });
    expect(report).toEqual({
      bins: [
        { id: 'regs_cg.addr.ctrl', percentage: 75, hits: 3, goal: 4 },
        { id: 'regs_cg.addr.status', percentage: 0, hits: 0, goal: 1 },
      ],
    });
  });

  it('rejects malformed documents', () => {
    expect(() => parseCoverageDocument({ bins: { a: -1 } })).toThrow(/^Invalid coverage report:/);
    expect(() => parseCoverageDocument({ protocol: 'apb' }, 'cov.json')).toThrow(/^Invalid cov\.json:/);
  });
});

describe('gap helpers', () => {
  it('treats a zero goal as covered', () => {
    expect(binPercentage(0, 0)).toBe(100);
    expect(binPercentage(5, 4)).toBe(100);
    expect(binPercentage(1, 4)).toBe(25);
  });

  it('grades severity by coverage and boundary names', () => {
    expect(severityOf({ id: 'anything', percentage: 0 })).toBe('critical');
    expect(severityOf({ id: 'fifo_overflow', percentage: 90 })).toBe('high');
    expect(severityOf({ id: 'addr_max', percentage: 90 })).toBe('high');
    expect(severityOf({ id: 'addr_mid', percentage: 49 })).toBe('medium');
    expect(severityOf({ id: 'addr_mid', percentage: 50 })).toBe('low');
  });

  it('matches whole name runs, most specific first', () => {
    expect(matchTarget('cg_ctrl.ctrl_mode', spec)).toEqual({ kind: 'field', register: 'CTRL', name: 'MODE' });
    expect(matchTarget('cg_ctrl.write', spec)).toEqual({ kind: 'register', name: 'CTRL' });
    expect(matchTarget('fsm.state_busy', spec)).toEqual({ kind: 'state', name: 'BUSY' });
    expect(matchTarget('pslverr_seen', spec)).toEqual({ kind: 'port', name: 'pslverr', role: 'pslverr' });
    expect(matchTarget('controller_status2', spec)).toBeUndefined();
  });
});

describe('rankCoverageGaps', () => {
  it('ranks open bins by severity then coverage', () => {
    const report = parseCoverageDocument({
      protocol: 'APB3',
      bins: {
        'cg_ctrl.ctrl_en': 100,
        'cg_ctrl.ctrl_mode': 40,
        status_read: 0,
        pslverr_error: 50,
        'misc.toggle_x': 60,
        'fsm.state_busy': 75,
      },
    });
    const result = rankCoverageGaps(report, spec);

    expect(result.protocol).toBe('APB3');
    expect(result.protocolMismatch).toBe(false);
    expect(result.totals).toEqual({ bins: 6, covered: 1, percentage: 54.17 });
    expect(result.gaps).toEqual([
      {
        id: 'status_read', percentage: 0, severity: 'critical',
        target: { kind: 'register', name: 'STATUS' }, suggestedSequence: 'timer_status_seq',
      },
      {
        id: 'pslverr_error', percentage: 50, severity: 'high',
        target: { kind: 'port', name: 'pslverr', role: 'pslverr' }, suggestedSequence: 'timer_pslverr_seq',
      },
      {
        id: 'cg_ctrl.ctrl_mode', percentage: 40, severity: 'medium',
        target: { kind: 'field', register: 'CTRL', name: 'MODE' }, suggestedSequence: 'timer_ctrl_mode_seq',
      },
      { id: 'misc.toggle_x', percentage: 60, severity: 'low', suggestedSequence: 'timer_misc_toggle_x_seq' },
      {
        id: 'fsm.state_busy', percentage: 75, severity: 'low',
        target: { kind: 'state', name: 'BUSY' }, suggestedSequence: 'timer_state_busy_seq',
      },
    ]);
  });

  it('reports hits still needed for covergroup input', () => {
    const report = parseCoverageDocument({
      protocol: 'apb',
      covergroups: [{
        name: 'regs_cg',
        coverpoints: [{ name: 'addr', bins: [{ name: 'ctrl', hits: 3, goal: 4 }, { name: 'status', hits: 0 }] }],
      }],
    });
    const result = rankCoverageGaps(report, spec);
    expect(result.totals).toEqual({ bins: 2, covered: 0, percentage: 37.5 });
    expect(result.gaps.map(g => [g.id, g.severity, g.hitsNeeded])).toEqual([
      ['regs_cg.addr.status', 'critical', 1],
      ['regs_cg.addr.ctrl', 'low', 1],
    ]);
  });

  it('flags reports for another protocol', () => {
    const result = rankCoverageGaps({ protocol: 'uart', bins: [] }, spec);
    expect(result.protocolMismatch).toBe(true);
    expect(result.totals).toEqual({ bins: 0, covered: 0, percentage: 100 });
    expect(rankCoverageGaps({ bins: [] }, spec).protocolMismatch).toBe(false);
  });
});
