import { describe, it, expect } from 'vitest';
import { tokenize, joinTokens } from '../src/rtl/lexer.js';
import { parseLiteral, evaluate, clog2 } from '../src/rtl/constants.js';
import { extractPorts } from '../src/rtl/extract-ports.js';
import type { PortExtraction } from '../src/types/index.js';
import { fixture } from './helpers.js';

const rtl = (name: string) => fixture(`rtl/${name}`);

function extracted(source: string, module?: string): PortExtraction {
  const result = extractPorts(source, { file: 'dut.sv', module });
  if (!result.ok) throw new Error(result.error.message);
  return result.value;
}

// ─── Lexer ───────────────────────────────────────────────────────────

describe('tokenize', () => {
  it('drops comments, attributes and directives but keeps line numbers', () => {
    const tokens = tokenize('`timescale 1ns/1ps\n(* keep *) module m; // trailing\n/* a\n b */ endmodule');
    expect(tokens.map(t => t.text)).toEqual(['module', 'm', ';', 'endmodule']);
    expect(tokens.map(t => t.line)).toEqual([2, 2, 2, 4]);
  });

  it('reads sized literals and multi-character operators as single tokens', () => {
    const tokens = tokenize("x <= 8'hFF >>> 2;");
    expect(tokens.map(t => t.text)).toEqual(['x', '<=', "8'hFF", '>>>', '2', ';']);
    expect(tokens[2].kind).toBe('number');
  });

  it('keeps @(*) as a sensitivity list', () => {
    expect(tokenize('always @(*)').map(t => t.text)).toEqual(['always', '@', '(', '*', ')']);
  });
});

describe('joinTokens', () => {
  it('spaces binary operators and keeps brackets tight', () => {
    expect(joinTokens(tokenize('WIDTH-1:0'))).toBe('WIDTH - 1 : 0');
    expect(joinTokens(tokenize('!(a && b)'))).toBe('!(a && b)');
    expect(joinTokens(tokenize('mem[3]'))).toBe('mem[3]');
  });
});

// ─── Constants ───────────────────────────────────────────────────────

describe('parseLiteral', () => {
  it('evaluates decimal, based and unbased literals', () => {
    expect(parseLiteral('42')).toBe(42);
    expect(parseLiteral('1_000')).toBe(1000);
    expect(parseLiteral("8'hFF")).toBe(255);
    expect(parseLiteral("'b101")).toBe(5);
    expect(parseLiteral("4'sd3")).toBe(3);
    expect(parseLiteral("'0")).toBe(0);
  });

  it('rejects literals with unknown bits', () => {
    expect(parseLiteral("4'bx01z")).toBeUndefined();
    expect(parseLiteral("'1")).toBeUndefined();
  });
});

describe('evaluate', () => {
  it('folds arithmetic over known constants', () => {
    const scope = new Map([['DEPTH', 16], ['W', 8]]);
    expect(evaluate(tokenize('$clog2(DEPTH) + 1'), scope)).toBe(5);
    expect(evaluate(tokenize('W * 2 - 1'), scope)).toBe(15);
    expect(evaluate(tokenize('2 ** 3'), scope)).toBe(8);
    expect(evaluate(tokenize('1 << W'), scope)).toBe(256);
  });

  it('is undefined for unknown names or division by zero', () => {
    expect(evaluate(tokenize('UNKNOWN - 1'), new Map())).toBeUndefined();
    expect(evaluate(tokenize('4 / 0'), new Map())).toBeUndefined();
  });

  it('follows $clog2 at the edges', () => {
    expect(clog2(0)).toBe(0);
    expect(clog2(1)).toBe(0);
    expect(clog2(5)).toBe(3);
  });
});

// ─── Port extraction ─────────────────────────────────────────────────

describe('extractPorts', () => {
  it('lists ANSI ports in source order with parameterized widths', () => {
    const { module, ports, parameters, diagnostics } = extracted(rtl('apb_regs.v'));
    expect(module).toBe('apb_regs');
    expect(ports.map(p => p.name)).toEqual([
      'pclk', 'presetn', 'psel', 'penable', 'pwrite', 'paddr', 'pwdata', 'prdata', 'pready', 'pslverr',
    ]);
    const paddr = ports[5];
    expect(paddr).toEqual({
      name: 'paddr', direction: 'input', width: 8, msb: 7, lsb: 0,
      range: '[ADDR_WIDTH - 1 : 0]', lowConfidence: false, line: 11,
    });
    expect(ports[7].direction).toBe('output');
    expect(ports[7].width).toBe(32);
    expect(parameters.map(p => [p.name, p.value])).toEqual([
      ['ADDR_WIDTH', 8], ['DATA_WIDTH', 32], ['CTRL_ADDR', 0], ['STATUS_ADDR', 4], ['DATA_ADDR', 8],
    ]);
    expect(parameters[3].expression).toBe("8'h04");
    expect(diagnostics).toEqual([]);
  });

  it('reads non-ANSI declarations from the module body', () => {
    const source = [
      'module legacy(clk, data_in, data_out); // header',
      '  input clk;',
      '  /* block',
      '     comment */',
      '  input [7:0] data_in;',
      '  output [15:0] data_out;',
      '  reg [15:0] data_out;',
      'endmodule',
    ].join('\n');
    const { ports } = extracted(source);
    expect(ports.map(p => [p.name, p.direction, p.width, p.line])).toEqual([
      ['clk', 'input', 1, 2],
      ['data_in', 'input', 8, 5],
      ['data_out', 'output', 16, 6],
    ]);
  });

  it('multiplies packed dimensions and ignores unpacked ones', () => {
    const { ports } = extracted(
      'module m (input logic [3:0][7:0] bytes_in, input logic [7:0] mem [0:3], input integer count); endmodule',
    );
    expect(ports[0].width).toBe(32);
    expect(ports[0].range).toBe('[3 : 0][7 : 0]');
    expect(ports[0].msb).toBeUndefined();
    expect(ports[1].width).toBe(8);
    expect(ports[2].width).toBe(32);
  });

  it('switches type mid-list under the same direction', () => {
    const { ports } = extracted('module m (input logic a, logic [3:0] b, output c); endmodule');
    expect(ports.map(p => [p.name, p.direction, p.width])).toEqual([
      ['a', 'input', 1],
      ['b', 'input', 4],
      ['c', 'output', 1],
    ]);
  });

  it('flags widths it cannot evaluate', () => {
    const { ports, diagnostics } = extracted('module m (input [UNKNOWN_W-1:0] x); endmodule');
    expect(ports[0].width).toBe(1);
    expect(ports[0].lowConfidence).toBe(true);
    expect(diagnostics).toEqual([{
      level: 'warning',
      message: "Could not evaluate width of port 'x' [UNKNOWN_W - 1 : 0]; assuming 1",
      file: 'dut.sv',
      line: 1,
    }]);
  });

  it('keeps the first of duplicate declarations', () => {
    const { ports, diagnostics } = extracted('module d(a);\n  input a;\n  input [3:0] a;\nendmodule');
    expect(ports).toHaveLength(1);
    expect(ports[0].width).toBe(1);
    expect(diagnostics[0].message).toBe("Port 'a' declared more than once; keeping the first declaration");
    expect(diagnostics[0].line).toBe(3);
  });

  it('selects a named module', () => {
    const source = 'module m1 (input a); endmodule\nmodule m2 (output [1:0] y); endmodule';
    expect(extracted(source, 'm2').ports.map(p => p.name)).toEqual(['y']);
  });

  it('fails without a usable module', () => {
    expect(extractPorts('wire x;', { file: 'x.v' })).toEqual({
      ok: false,
      error: { kind: 'ParseFailure', message: 'No module declaration found', file: 'x.v' },
    });

    const missing = extractPorts('module m1 (input a); endmodule\nmodule m2 (input b); endmodule', { module: 'nope' });
    expect(missing.ok).toBe(false);
    if (!missing.ok) expect(missing.error.message).toBe("Module 'nope' not found (available: m1, m2)");

    const empty = extractPorts('\nmodule empty;\nendmodule');
    expect(empty).toEqual({
      ok: false,
      error: { kind: 'ParseFailure', message: "Module 'empty' declares no ports", file: '<input>', line: 2 },
    });
  });
});
