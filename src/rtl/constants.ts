/**
 * Constant-expression evaluation for widths, parameters and state encodings.
 * Only integer arithmetic over literals and already-known constants; anything
 * else evaluates to undefined so callers can flag it instead of guessing.
 */

import type { Token } from './lexer.js';

export type ConstantScope = ReadonlyMap<string, number>;

/**
 * Value of a Verilog integer literal: 42, 1_000, 8'hFF, 'b101, 4'sd3, '0.
 * Literals containing x/z/? digits, reals and '1 (width-dependent) are undefined.
 */
export function parseLiteral(text: string): number | undefined {
  if (/^[0-9][0-9_]*$/.test(text)) {
    return Number.parseInt(text.replace(/_/g, ''), 10);
  }
  if (text === "'0") return 0;
  const m = text.match(/^([0-9][0-9_]*)?'[sS]?([bBoOdDhH])([0-9a-fA-F_]+)$/);
  if (!m) return undefined;
  const radix = { b: 2, o: 8, d: 10, h: 16 }[m[2].toLowerCase()];
  const digits = m[3].replace(/_/g, '');
  if (radix === undefined || digits.length === 0) return undefined;
  const valid = { 2: /^[01]+$/, 8: /^[0-7]+$/, 10: /^[0-9]+$/, 16: /^[0-9a-fA-F]+$/ }[radix];
  if (!valid?.test(digits)) return undefined;
  const value = Number.parseInt(digits, radix);
  return Number.isSafeInteger(value) ? value : undefined;
}

/** Declared size of a sized literal (the 2 in 2'b01), if any */
export function literalSize(text: string): number | undefined {
  const m = text.match(/^([0-9][0-9_]*)'/);
  return m ? Number.parseInt(m[1].replace(/_/g, ''), 10) : undefined;
}

/** ceil(log2(n)) with $clog2(0) = 0, as the system function defines it */
export function clog2(n: number): number {
  if (n <= 1) return 0;
  return Math.ceil(Math.log2(n));
}

/**
 * Evaluate a token slice as an integer constant expression.
 * Supports + - * / % ** << >>, unary +/-, parentheses, $clog2 and named constants.
 */
export function evaluate(tokens: Token[], scope: ConstantScope): number | undefined {
  if (tokens.length === 0) return undefined;
  let pos = 0;

  const peek = (): string | undefined => tokens[pos]?.text;

  function shift(): number | undefined {
    let left = additive();
    while (left !== undefined && (peek() === '<<' || peek() === '>>' || peek() === '<<<' || peek() === '>>>')) {
      const op = tokens[pos++].text;
      const right = additive();
      if (right === undefined) return undefined;
      left = op.startsWith('<<') ? left * 2 ** right : Math.floor(left / 2 ** right);
    }
    return left;
  }

  function additive(): number | undefined {
    let left = multiplicative();
    while (left !== undefined && (peek() === '+' || peek() === '-')) {
      const op = tokens[pos++].text;
      const right = multiplicative();
      if (right === undefined) return undefined;
      left = op === '+' ? left + right : left - right;
    }
    return left;
  }

  function multiplicative(): number | undefined {
    let left = power();
    while (left !== undefined && (peek() === '*' || peek() === '/' || peek() === '%')) {
      const op = tokens[pos++].text;
      const right = power();
      if (right === undefined || ((op === '/' || op === '%') && right === 0)) return undefined;
      if (op === '*') left = left * right;
      else if (op === '/') left = Math.trunc(left / right);
      else left = left % right;
    }
    return left;
  }

  function power(): number | undefined {
    const base = unary();
    if (base === undefined || peek() !== '**') return base;
    pos++;
    const exp = power();
    return exp === undefined || exp < 0 ? undefined : base ** exp;
  }

  function unary(): number | undefined {
    if (peek() === '-') { pos++; const v = unary(); return v === undefined ? undefined : -v; }
    if (peek() === '+') { pos++; return unary(); }
    return primary();
  }

  function primary(): number | undefined {
    const tok = tokens[pos];
    if (!tok) return undefined;
    if (tok.kind === 'number') {
      pos++;
      return parseLiteral(tok.text);
    }
    if (tok.text === '(') {
      pos++;
      const v = shift();
      if (peek() !== ')') return undefined;
      pos++;
      return v;
    }
    if (tok.kind === 'ident') {
      pos++;
      if (tok.text === '$clog2') {
        if (peek() !== '(') return undefined;
        pos++;
        const arg = shift();
        if (arg === undefined || peek() !== ')') return undefined;
        pos++;
        return clog2(arg);
      }
      // Package-scoped constant: pkg::NAME
      if (peek() === '::' && tokens[pos + 1]?.kind === 'ident') {
        pos += 2;
        return scope.get(tokens[pos - 1].text);
      }
      return scope.get(tok.text);
    }
    return undefined;
  }

  const value = shift();
  if (value === undefined || pos !== tokens.length || !Number.isFinite(value)) return undefined;
  return value;
}
