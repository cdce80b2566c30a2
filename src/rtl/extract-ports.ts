/**
 * tbforge — Port extraction.
 * Finds the module header of an HDL source and lists its port declarations in
 * source order, with widths evaluated against the module's parameters.
 */

import type {
  ParseFailure, PortDeclaration, PortDirection, PortExtraction, Result,
  RtlDiagnostic, RtlParameter,
} from '../types/index.js';
import { tokenize, findClosing, joinTokens, type Token } from './lexer.js';
import { evaluate, type ConstantScope } from './constants.js';

export interface ExtractPortsOptions {
  /** File name used in diagnostics */
  file?: string;
  /** Module to extract; defaults to the first module in the file */
  module?: string;
}

export interface ModuleSpan {
  name: string;
  line: number;
  /** Token index of the module keyword */
  start: number;
  /** Token index of endmodule, or tokens.length when missing */
  end: number;
}

const DIRECTIONS = new Set(['input', 'output', 'inout']);

/** Net / data-type keywords allowed between a direction and the port name */
const TYPE_KEYWORDS = new Set([
  'wire', 'reg', 'logic', 'bit', 'tri', 'tri0', 'tri1', 'triand', 'trior', 'wand', 'wor',
  'supply0', 'supply1', 'uwire', 'var', 'signed', 'unsigned', 'interconnect',
  'integer', 'int', 'byte', 'shortint', 'longint',
]);

/** Built-in types whose width is implied */
const IMPLIED_WIDTH: Record<string, number> = {
  integer: 32, int: 32, byte: 8, shortint: 16, longint: 64,
};

const RESERVED = new Set([
  ...DIRECTIONS, ...TYPE_KEYWORDS,
  'module', 'endmodule', 'parameter', 'localparam', 'function', 'endfunction', 'task', 'endtask',
  'begin', 'end', 'assign', 'always', 'always_ff', 'always_comb', 'always_latch', 'initial',
]);

// ─── Module location ─────────────────────────────────────────────────

export function locateModules(tokens: Token[]): ModuleSpan[] {
  const spans: ModuleSpan[] = [];
  for (let i = 0; i < tokens.length; i++) {
    const t = tokens[i];
    if (t.kind !== 'ident' || (t.text !== 'module' && t.text !== 'macromodule')) continue;
    let j = i + 1;
    // SystemVerilog lifetime qualifier: module automatic foo
    if (tokens[j]?.text === 'automatic' || tokens[j]?.text === 'static') j++;
    const nameTok = tokens[j];
    if (!nameTok || nameTok.kind !== 'ident') continue;
    let end = tokens.length;
    for (let k = j + 1; k < tokens.length; k++) {
      if (tokens[k].text === 'endmodule') { end = k; break; }
    }
    spans.push({ name: nameTok.text, line: t.line, start: i, end });
    i = end;
  }
  return spans;
}

// ─── Parameters ──────────────────────────────────────────────────────

/** Index of the first `,` `;` or `)` at bracket depth 0 from `from`, bounded by `limit` */
export function expressionEnd(tokens: Token[], from: number, limit: number): number {
  let depth = 0;
  for (let i = from; i < limit; i++) {
    const t = tokens[i].text;
    if (tokens[i].kind !== 'op') continue;
    if (t === '(' || t === '[' || t === '{') depth++;
    else if (t === ')' || t === ']' || t === '}') {
      if (depth === 0) return i;
      depth--;
    } else if ((t === ',' || t === ';') && depth === 0) return i;
  }
  return limit;
}

/**
 * Collect parameter / localparam constants within [start, end) and evaluate
 * them in declaration order. Returns the declarations and the resulting scope.
 */
export function collectParameters(
  tokens: Token[],
  start: number,
  end: number,
  inherited: ConstantScope = new Map(),
): { parameters: RtlParameter[]; scope: Map<string, number> } {
  const parameters: RtlParameter[] = [];
  const scope = new Map<string, number>(inherited);

  for (let i = start; i < end; i++) {
    const t = tokens[i];
    if (t.kind !== 'ident' || (t.text !== 'parameter' && t.text !== 'localparam')) continue;
    const kind = t.text;
    let j = i + 1;

    // One keyword may introduce several NAME = expr pairs
    while (j < end) {
      while (j < end && (TYPE_KEYWORDS.has(tokens[j].text) || tokens[j].text === 'real' || tokens[j].text === 'string')) j++;
      if (tokens[j]?.text === '[') {
        const close = findClosing(tokens, j);
        if (close === -1) break;
        j = close + 1;
      }
      // Typed parameter with a user type: parameter my_t NAME = ...
      if (tokens[j]?.kind === 'ident' && tokens[j + 1]?.kind === 'ident' && tokens[j + 2]?.text === '=') j++;
      const nameTok = tokens[j];
      if (!nameTok || nameTok.kind !== 'ident' || tokens[j + 1]?.text !== '=') break;
      const exprStart = j + 2;
      const exprEnd = expressionEnd(tokens, exprStart, end);
      const exprTokens = tokens.slice(exprStart, exprEnd);
      const value = evaluate(exprTokens, scope);
      if (value !== undefined) scope.set(nameTok.text, value);
      parameters.push({
        name: nameTok.text,
        kind,
        expression: joinTokens(exprTokens),
        ...(value !== undefined ? { value } : {}),
        line: nameTok.line,
      });
      j = exprEnd;
      // `, NAME = ...` continues; a new `parameter` keyword restarts the outer loop
      if (tokens[j]?.text === ',' && tokens[j + 1]?.kind === 'ident' && tokens[j + 2]?.text === '=') {
        j++;
        continue;
      }
      break;
    }
    i = j - 1;
  }

  return { parameters, scope };
}

// ─── Ranges ──────────────────────────────────────────────────────────

export interface PackedRange {
  text: string;
  width?: number;
  msb?: number;
  lsb?: number;
}

export function evaluateRange(inner: Token[], scope: ConstantScope): PackedRange {
  const text = `[${joinTokens(inner)}]`;
  let depth = 0;
  let colon = -1;
  for (let k = 0; k < inner.length; k++) {
    const t = inner[k].text;
    if (t === '(' || t === '[' || t === '{') depth++;
    else if (t === ')' || t === ']' || t === '}') depth--;
    else if (t === ':' && depth === 0) { colon = k; break; }
  }
  if (colon === -1) {
    // [N] size form
    const size = evaluate(inner, scope);
    return size !== undefined && size > 0 ? { text, width: size, msb: size - 1, lsb: 0 } : { text };
  }
  const msb = evaluate(inner.slice(0, colon), scope);
  const lsb = evaluate(inner.slice(colon + 1), scope);
  if (msb === undefined || lsb === undefined) return { text };
  return { text, width: Math.abs(msb - lsb) + 1, msb, lsb };
}

// ─── Declarations ────────────────────────────────────────────────────

interface DeclType {
  width: number;
  lowConfidence: boolean;
  msb?: number;
  lsb?: number;
  range?: string;
}

/** Parse type keywords and packed dimensions starting at `j` */
function parseDeclType(tokens: Token[], j: number, end: number, scope: ConstantScope): { type: DeclType; next: number } {
  let width = 1;
  let lowConfidence = false;
  let sawImplied = false;
  const ranges: PackedRange[] = [];

  while (j < end) {
    const t = tokens[j];
    if (t.kind === 'ident' && TYPE_KEYWORDS.has(t.text)) {
      if (IMPLIED_WIDTH[t.text] !== undefined) {
        width = IMPLIED_WIDTH[t.text];
        sawImplied = true;
      }
      j++;
      continue;
    }
    // User-defined type (enum typedef, struct): `input state_t s`
    if (t.kind === 'ident' && !RESERVED.has(t.text) && tokens[j + 1]?.kind === 'ident') {
      lowConfidence = true;
      j++;
      continue;
    }
    break;
  }

  while (tokens[j]?.text === '[' && j < end) {
    const close = findClosing(tokens, j);
    if (close === -1 || close >= end) break;
    ranges.push(evaluateRange(tokens.slice(j + 1, close), scope));
    j = close + 1;
  }

  if (ranges.length > 0) {
    if (ranges.every(r => r.width !== undefined)) {
      width = ranges.reduce((acc, r) => acc * (r.width ?? 1), sawImplied ? width : 1);
    } else {
      width = 1;
      lowConfidence = true;
    }
  }

  const last = ranges.length === 1 ? ranges[0] : undefined;
  const type: DeclType = {
    width,
    lowConfidence,
    ...(ranges.length > 0 ? { range: ranges.map(r => r.text).join('') } : {}),
    ...(last?.msb !== undefined && last.lsb !== undefined ? { msb: last.msb, lsb: last.lsb } : {}),
  };
  return { type, next: j };
}

/**
 * Parse one direction declaration starting at the direction keyword.
 * Returns the ports it declares and the index where scanning should resume.
 */
function parseDirectionDecl(
  tokens: Token[],
  at: number,
  end: number,
  scope: ConstantScope,
): { ports: PortDeclaration[]; next: number } {
  const direction = tokens[at].text;
  if (direction !== 'input' && direction !== 'output' && direction !== 'inout') {
    return { ports: [], next: at + 1 };
  }
  const dir: PortDirection = direction;
  const ports: PortDeclaration[] = [];
  let { type, next: j } = parseDeclType(tokens, at + 1, end, scope);

  while (j < end) {
    const nameTok = tokens[j];
    if (nameTok.kind !== 'ident' || RESERVED.has(nameTok.text)) break;
    j++;
    // Unpacked dimensions after the name do not change the port's bit width
    while (tokens[j]?.text === '[' && j < end) {
      const close = findClosing(tokens, j);
      if (close === -1) break;
      j = close + 1;
    }
    if (tokens[j]?.text === '=') j = expressionEnd(tokens, j + 1, end);

    ports.push(Object.freeze({
      name: nameTok.text,
      direction: dir,
      width: type.width,
      ...(type.msb !== undefined && type.lsb !== undefined ? { msb: type.msb, lsb: type.lsb } : {}),
      ...(type.range !== undefined ? { range: type.range } : {}),
      lowConfidence: type.lowConfidence,
      line: nameTok.line,
    }));

    if (tokens[j]?.text !== ',') break;
    const after = tokens[j + 1];
    if (!after || DIRECTIONS.has(after.text)) break;
    j++;
    // `input logic a, logic [3:0] b`: new type, same direction
    if (after.text === '[' || TYPE_KEYWORDS.has(after.text)) {
      ({ type, next: j } = parseDeclType(tokens, j, end, scope));
    }
  }

  return { ports, next: j };
}

// ─── Public API ──────────────────────────────────────────────────────

/**
 * Extract the ordered port list of a module.
 * Fails when the text has no module or the module declares no ports.
 */
export function extractPorts(
  source: string,
  options: ExtractPortsOptions = {},
): Result<PortExtraction, ParseFailure> {
  const file = options.file ?? '<input>';
  const tokens = tokenize(source);
  return extractPortsFromTokens(tokens, file, options.module);
}

export function extractPortsFromTokens(
  tokens: Token[],
  file: string,
  moduleName?: string,
): Result<PortExtraction, ParseFailure> {
  const modules = locateModules(tokens);
  if (modules.length === 0) {
    return { ok: false, error: { kind: 'ParseFailure', message: 'No module declaration found', file } };
  }
  const span = moduleName ? modules.find(m => m.name === moduleName) : modules[0];
  if (!span) {
    return {
      ok: false,
      error: {
        kind: 'ParseFailure',
        message: `Module '${moduleName}' not found (available: ${modules.map(m => m.name).join(', ')})`,
        file,
      },
    };
  }

  const { parameters, scope } = collectParameters(tokens, span.start, span.end);
  const diagnostics: RtlDiagnostic[] = [];
  const ports: PortDeclaration[] = [];
  const seen = new Set<string>();

  for (let i = span.start + 1; i < span.end; i++) {
    const t = tokens[i];
    if (t.kind !== 'ident') continue;

    if (t.text === 'function' || t.text === 'task') {
      const closer = t.text === 'function' ? 'endfunction' : 'endtask';
      while (i < span.end && tokens[i].text !== closer) i++;
      continue;
    }
    if (!DIRECTIONS.has(t.text)) continue;

    const { ports: declared, next } = parseDirectionDecl(tokens, i, span.end, scope);
    for (const port of declared) {
      if (seen.has(port.name)) {
        diagnostics.push({
          level: 'warning',
          message: `Port '${port.name}' declared more than once; keeping the first declaration`,
          file,
          line: port.line,
        });
        continue;
      }
      seen.add(port.name);
      ports.push(port);
      if (port.lowConfidence) {
        diagnostics.push({
          level: 'warning',
          message: `Could not evaluate width of port '${port.name}'${port.range ? ` ${port.range}` : ''}; assuming 1`,
          file,
          line: port.line,
        });
      }
    }
    i = Math.max(i, next - 1);
  }

  if (ports.length === 0) {
    return {
      ok: false,
      error: { kind: 'ParseFailure', message: `Module '${span.name}' declares no ports`, file, line: span.line },
    };
  }

  return { ok: true, value: { module: span.name, ports, parameters, diagnostics } };
}
