/**
 * HDL lexer for Verilog / SystemVerilog sources.
 *
 * Comments, attributes and compiler directives are dropped; every token keeps
 * the 1-indexed line it started on so diagnostics point back into the file.
 */

export type TokenKind = 'ident' | 'number' | 'string' | 'op';

export interface Token {
  kind: TokenKind;
  text: string;
  line: number;
}

// Longest operators first
const OPERATORS = [
  '<<<', '>>>', '===', '!==', '==?', '!=?',
  '<=', '>=', '==', '!=', '&&', '||', '**', '<<', '>>', '::', '->', '+:', '-:',
  '++', '--', '+=', '-=', '~&', '~|', '~^', '^~',
];

/** Directives whose whole line is skipped (`define bodies honour backslash continuation) */
const LINE_DIRECTIVES = new Set([
  'define', 'undef', 'undefineall', 'include', 'timescale', 'ifdef', 'ifndef', 'elsif',
  'else', 'endif', 'default_nettype', 'resetall', 'celldefine', 'endcelldefine',
  'pragma', 'line', 'unconnected_drive', 'nounconnected_drive', 'begin_keywords', 'end_keywords',
]);

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_$]/;
const DIGIT = /[0-9]/;
const BASED_DIGIT = /[0-9a-fA-FxXzZ?_]/;

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  const n = source.length;
  let i = 0;
  let line = 1;

  const advanceTo = (end: number) => {
    for (let k = i; k < end && k < n; k++) {
      if (source[k] === '\n') line++;
    }
    i = Math.min(end, n);
  };

  while (i < n) {
    const ch = source[i];
    const next = source[i + 1];

    if (ch === '\n') { line++; i++; continue; }
    if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\f') { i++; continue; }

    // Line comment
    if (ch === '/' && next === '/') {
      const end = source.indexOf('\n', i);
      i = end === -1 ? n : end;
      continue;
    }

    // Block comment
    if (ch === '/' && next === '*') {
      const end = source.indexOf('*/', i + 2);
      advanceTo(end === -1 ? n : end + 2);
      continue;
    }

    // Attribute instance (* ... *), but not the @(*) sensitivity list
    if (ch === '(' && next === '*' && source[i + 2] !== ')') {
      const end = source.indexOf('*)', i + 2);
      advanceTo(end === -1 ? n : end + 2);
      continue;
    }

    // Compiler directive or macro usage
    if (ch === '`') {
      let j = i + 1;
      while (j < n && IDENT_PART.test(source[j])) j++;
      const name = source.slice(i + 1, j);
      if (LINE_DIRECTIVES.has(name)) {
        let end = j;
        while (end < n) {
          const nl = source.indexOf('\n', end);
          if (nl === -1) { end = n; break; }
          if (name === 'define' && source.slice(end, nl).trimEnd().endsWith('\\')) {
            end = nl + 1;
            continue;
          }
          end = nl;
          break;
        }
        advanceTo(end);
      } else {
        tokens.push({ kind: 'ident', text: source.slice(i, j), line });
        i = j;
      }
      continue;
    }

    // String literal
    if (ch === '"') {
      let j = i + 1;
      while (j < n && source[j] !== '"' && source[j] !== '\n') {
        j += source[j] === '\\' ? 2 : 1;
      }
      tokens.push({ kind: 'string', text: source.slice(i, j + 1), line });
      i = j + 1;
      continue;
    }

    // Escaped identifier: \name terminated by whitespace
    if (ch === '\\') {
      let j = i + 1;
      while (j < n && !/\s/.test(source[j])) j++;
      tokens.push({ kind: 'ident', text: source.slice(i + 1, j), line });
      i = j;
      continue;
    }

    // Identifier, keyword or system task ($clog2)
    if (IDENT_START.test(ch) || (ch === '$' && next !== undefined && IDENT_START.test(next))) {
      let j = i + 1;
      while (j < n && IDENT_PART.test(source[j])) j++;
      tokens.push({ kind: 'ident', text: source.slice(i, j), line });
      i = j;
      continue;
    }

    // Number: decimal, real, sized/based (8'hFF) or unbased ('0, 'b1)
    if (DIGIT.test(ch) || (ch === "'" && next !== undefined && /[sSbBoOdDhH01xXzZ]/.test(next))) {
      let j = i;
      while (j < n && /[0-9_]/.test(source[j])) j++;
      if (source[j] === '.' && DIGIT.test(source[j + 1] ?? '')) {
        j++;
        while (j < n && /[0-9_]/.test(source[j])) j++;
      }
      if ((source[j] === 'e' || source[j] === 'E') && /[0-9+-]/.test(source[j + 1] ?? '')) {
        j += 2;
        while (j < n && DIGIT.test(source[j])) j++;
      }
      if (source[j] === "'") {
        let k = j + 1;
        if (source[k] === 's' || source[k] === 'S') k++;
        if (/[bBoOdDhH]/.test(source[k] ?? '')) {
          k++;
          while (k < n && (source[k] === ' ' || source[k] === '\t')) k++;
          while (k < n && BASED_DIGIT.test(source[k])) k++;
          j = k;
        } else if (j === i && /[01xXzZ]/.test(source[k] ?? '')) {
          j = k + 1;
        }
      }
      if (j > i) {
        tokens.push({ kind: 'number', text: source.slice(i, j).replace(/\s+/g, ''), line });
        i = j;
        continue;
      }
    }

    const op = OPERATORS.find(o => source.startsWith(o, i));
    if (op) {
      tokens.push({ kind: 'op', text: op, line });
      i += op.length;
      continue;
    }

    tokens.push({ kind: 'op', text: ch, line });
    i++;
  }

  return tokens;
}

/**
 * Index of the bracket closing the one at `open`, or -1.
 * Works for (), [] and {} and skips nested pairs of any kind.
 */
export function findClosing(tokens: Token[], open: number): number {
  let depth = 0;
  for (let i = open; i < tokens.length; i++) {
    const t = tokens[i].text;
    if (tokens[i].kind !== 'op') continue;
    if (t === '(' || t === '[' || t === '{') depth++;
    else if (t === ')' || t === ']' || t === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** Join tokens back into readable source text */
export function joinTokens(tokens: Token[]): string {
  let out = '';
  for (let i = 0; i < tokens.length; i++) {
    const t = tokens[i];
    const prev = tokens[i - 1];
    const tight =
      prev === undefined ||
      t.text === ')' || t.text === ']' || t.text === ',' || t.text === ';' ||
      prev.text === '(' || prev.text === '[' || prev.text === '!' || prev.text === '~' ||
      (t.text === '[' && prev.kind === 'ident') ||
      (t.text === '(' && prev.kind === 'ident' && prev.text.startsWith('$'));
    out += tight ? t.text : ' ' + t.text;
  }
  return out;
}
