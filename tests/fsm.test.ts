import { describe, it, expect } from 'vitest';
import { recoverStateGraph, emptyStateGraph } from '../src/rtl/fsm.js';
import type { StateGraph } from '../src/types/index.js';
import { fixture } from './helpers.js';

const rtl = (name: string) => fixture(`rtl/${name}`);

function transitions(graph: StateGraph) {
  return graph.edges.map(({ from, to, guard }) => ({ from, to, guard }));
}

describe('recoverStateGraph', () => {
  it('recovers a two-block machine through its next-state variable', () => {
    const graph = recoverStateGraph(rtl('handshake_fsm.v'));
    expect(graph.variable).toBe('state');
    expect(graph.nodes).toEqual([
      { name: 'IDLE', encoding: 0, exits: 'observed' },
      { name: 'RUN', encoding: 1, exits: 'observed' },
      { name: 'DONE', encoding: 2, exits: 'observed' },
    ]);
    expect(transitions(graph)).toEqual([
      { from: 'IDLE', to: 'RUN', guard: 'start' },
      { from: 'RUN', to: 'DONE', guard: 'done' },
      { from: 'DONE', to: 'IDLE', guard: undefined },
    ]);
    expect(graph.initial).toBe('IDLE');
    expect(graph.initialSource).toBe('reset');
    expect(graph.encoding).toBe('binary');
  });

  it('recovers a one-block enum machine with negated else guards', () => {
    const graph = recoverStateGraph(rtl('seq_detect.sv'));
    expect(graph.variable).toBe('cs');
    expect(graph.nodes.map(n => [n.name, n.encoding])).toEqual([['WAIT', 0], ['GOT1', 1], ['GOT10', 2]]);
    expect(transitions(graph)).toEqual([
      { from: 'WAIT', to: 'GOT1', guard: 'bit_in' },
      { from: 'GOT1', to: 'GOT10', guard: '!bit_in' },
      { from: 'GOT10', to: 'GOT1', guard: 'bit_in' },
      { from: 'GOT10', to: 'WAIT', guard: '!(bit_in)' },
    ]);
    expect(graph.initial).toBe('WAIT');
    expect(graph.initialSource).toBe('reset');
  });

  it('detects one-hot encodings', () => {
    const source = `
      module ring (input clk, input rst);
        localparam A = 3'b001, B = 3'b010, C = 3'b100;
        reg [2:0] state;
        always @(posedge clk)
          if (rst) state <= A;
          else case (state)
            A: state <= B;
            B: state <= C;
            C: state <= A;
          endcase
      endmodule`;
    const graph = recoverStateGraph(source);
    expect(graph.encoding).toBe('one-hot');
    expect(graph.nodes.map(n => n.encoding)).toEqual([1, 2, 4]);
    expect(transitions(graph)).toEqual([
      { from: 'A', to: 'B', guard: undefined },
      { from: 'B', to: 'C', guard: undefined },
      { from: 'C', to: 'A', guard: undefined },
    ]);
  });

  it('keeps edges guarded by names that merely contain rst', () => {
    const source = `
      module burst_fsm (input clk, input rst_n, input burst, input done);
        localparam IDLE = 2'd0, XFER = 2'd1, WAIT = 2'd2;
        reg [1:0] state;
        always @(posedge clk or negedge rst_n)
          if (!rst_n) state <= IDLE;
          else case (state)
            IDLE: if (burst) state <= XFER;
            XFER: if (done) state <= WAIT;
            WAIT: state <= IDLE;
          endcase
      endmodule`;
    const graph = recoverStateGraph(source);
    expect(transitions(graph)).toEqual([
      { from: 'IDLE', to: 'XFER', guard: 'burst' },
      { from: 'XFER', to: 'WAIT', guard: 'done' },
      { from: 'WAIT', to: 'IDLE', guard: undefined },
    ]);
    expect(graph.initial).toBe('IDLE');
  });

  it('takes the else branch as reset when the condition releases an active-low reset', () => {
    const source = `
      module hold_fsm (input clk, input rst_n, input go);
        localparam IDLE = 2'd0, RUN = 2'd1, FIN = 2'd2;
        reg [1:0] state;
        always @(posedge clk or negedge rst_n)
          if (rst_n) begin
            case (state)
              IDLE: if (go) state <= RUN;
              RUN: state <= FIN;
              FIN: state <= IDLE;
            endcase
          end else state <= FIN;
      endmodule`;
    const graph = recoverStateGraph(source);
    expect(transitions(graph)).toEqual([
      { from: 'IDLE', to: 'RUN', guard: 'go' },
      { from: 'RUN', to: 'FIN', guard: undefined },
      { from: 'FIN', to: 'IDLE', guard: undefined },
    ]);
    expect(graph.initial).toBe('FIN');
    expect(graph.initialSource).toBe('reset');
  });

  it('reads reset comparisons against a literal', () => {
    const source = `
      module toggle (input clk, input reset);
        localparam A = 1'b0, B = 1'b1;
        reg state;
        always @(posedge clk)
          if (reset == 1'b0) begin
            case (state)
              A: state <= B;
              B: state <= A;
            endcase
          end else state <= B;
      endmodule`;
    const graph = recoverStateGraph(source);
    expect(transitions(graph)).toEqual([
      { from: 'A', to: 'B', guard: undefined },
      { from: 'B', to: 'A', guard: undefined },
    ]);
    expect(graph.initial).toBe('B');
  });

  it('skips variables wider than the state width limit', () => {
    const graph = recoverStateGraph(rtl('handshake_fsm.v'), { maxStateWidth: 1 });
    expect(graph).toEqual(emptyStateGraph());
  });

  it('returns an empty graph for modules without a state machine', () => {
    expect(recoverStateGraph(rtl('apb_regs.v'))).toEqual({ nodes: [], edges: [] });
    expect(recoverStateGraph(rtl('handshake_fsm.v'), { module: 'missing' })).toEqual({ nodes: [], edges: [] });
  });
});
