/**
 * tbforge — State machine recovery.
 *
 * Reads the procedural blocks of a module, finds the narrow variable that is
 * assigned enumerated constants under conditions on itself, and rebuilds its
 * transition graph. Only transitions written as "in state A, assign B" become
 * edges; nothing is inferred from default items or unconditioned assignments.
 */

import type { StateEdge, StateGraph, StateNode } from '../types/index.js';
import { tokenize, findClosing, joinTokens, type Token } from './lexer.js';
import { evaluate, clog2 } from './constants.js';
import { collectParameters, evaluateRange, expressionEnd, locateModules } from './extract-ports.js';
import { inferResetPolarity } from '../protocols/match.js';

export interface RecoverStateGraphOptions {
  /** Widest variable still considered a state register (bits) */
  maxStateWidth?: number;
  /** Module to analyze; defaults to the first module in the file */
  module?: string;
}

export const DEFAULT_MAX_STATE_WIDTH = 8;

export function emptyStateGraph(): StateGraph {
  return { nodes: [], edges: [] };
}

// ─── Statement tree ──────────────────────────────────────────────────

type Statement =
  | { kind: 'block'; body: Statement[] }
  | { kind: 'if'; cond: Token[]; then: Statement; else?: Statement }
  | { kind: 'case'; subject: Token[]; items: CaseItem[] }
  | { kind: 'assign'; target: string; rhs: Token[]; line: number }
  | { kind: 'other' };

interface CaseItem {
  /** null for the default item */
  labels: Token[][] | null;
  body: Statement;
}

const ALWAYS = new Set(['always', 'always_ff', 'always_comb', 'always_latch']);
const BLOCK_END = new Set(['end', 'endcase', 'join', 'join_any', 'join_none', 'endmodule', 'endfunction', 'endtask']);
const LOOPS = new Set(['for', 'foreach', 'while', 'repeat']);

function parseProcedure(tokens: Token[], start: number, limit: number): { stmt: Statement; next: number } {
  let pos = start;

  const skipLabel = () => {
    if (tokens[pos]?.text === ':' && tokens[pos + 1]?.kind === 'ident') pos += 2;
  };

  function statement(): Statement {
    const t = tokens[pos];
    if (!t || pos >= limit) return { kind: 'other' };

    switch (t.text) {
      case 'begin':
      case 'fork': {
        pos++;
        skipLabel();
        const body: Statement[] = [];
        while (pos < limit && !BLOCK_END.has(tokens[pos].text)) {
          const before = pos;
          body.push(statement());
          if (pos === before) pos++;
        }
        pos++;
        skipLabel();
        return { kind: 'block', body };
      }
      case 'unique':
      case 'unique0':
      case 'priority':
        pos++;
        return statement();
      case 'if': {
        pos++;
        if (tokens[pos]?.text !== '(') return { kind: 'other' };
        const close = findClosing(tokens, pos);
        if (close === -1) { pos = limit; return { kind: 'other' }; }
        const cond = tokens.slice(pos + 1, close);
        pos = close + 1;
        const then = statement();
        if (tokens[pos]?.text === 'else') {
          pos++;
          return { kind: 'if', cond, then, else: statement() };
        }
        return { kind: 'if', cond, then };
      }
      case 'case':
      case 'casez':
      case 'casex':
        return caseStatement();
      case 'forever':
        pos++;
        return statement();
      case '@': {
        pos++;
        if (tokens[pos]?.text === '(') {
          const close = findClosing(tokens, pos);
          pos = close === -1 ? limit : close + 1;
        } else {
          pos++;
        }
        return statement();
      }
      case '#':
        pos += tokens[pos + 1]?.text === '(' ? Math.max(findClosing(tokens, pos + 1) - pos + 1, 2) : 2;
        return statement();
      case ';':
        pos++;
        return { kind: 'other' };
    }

    if (LOOPS.has(t.text)) {
      pos++;
      if (tokens[pos]?.text === '(') {
        const close = findClosing(tokens, pos);
        pos = close === -1 ? limit : close + 1;
      }
      return statement();
    }

    if (t.kind === 'ident') {
      let j = pos + 1;
      let indexed = false;
      while (tokens[j]?.text === '[') {
        const close = findClosing(tokens, j);
        if (close === -1) break;
        j = close + 1;
        indexed = true;
      }
      const op = tokens[j]?.text;
      if (op === '<=' || op === '=') {
        const end = expressionEnd(tokens, j + 1, limit);
        const rhs = tokens.slice(j + 1, end);
        const line = t.line;
        pos = tokens[end]?.text === ';' ? end + 1 : end;
        return indexed ? { kind: 'other' } : { kind: 'assign', target: t.text, rhs, line };
      }
    }

    // Anything else: skip to the end of the statement
    while (pos < limit && tokens[pos].text !== ';' && !BLOCK_END.has(tokens[pos].text)) {
      if (tokens[pos].text === '(' || tokens[pos].text === '{') {
        const close = findClosing(tokens, pos);
        pos = close === -1 ? limit : close + 1;
      } else {
        pos++;
      }
    }
    if (tokens[pos]?.text === ';') pos++;
    return { kind: 'other' };
  }

  function caseStatement(): Statement {
    pos++;
    if (tokens[pos]?.text !== '(') return { kind: 'other' };
    const close = findClosing(tokens, pos);
    if (close === -1) { pos = limit; return { kind: 'other' }; }
    const subject = tokens.slice(pos + 1, close);
    pos = close + 1;
    if (tokens[pos]?.text === 'inside') pos++;

    const items: CaseItem[] = [];
    while (pos < limit && tokens[pos].text !== 'endcase') {
      const before = pos;
      if (tokens[pos].text === 'default') {
        pos++;
        if (tokens[pos]?.text === ':') pos++;
        items.push({ labels: null, body: statement() });
      } else {
        const labels: Token[][] = [];
        let current: Token[] = [];
        let depth = 0;
        while (pos < limit) {
          const tok = tokens[pos];
          if (tok.text === '(' || tok.text === '[' || tok.text === '{') depth++;
          else if (tok.text === ')' || tok.text === ']' || tok.text === '}') depth--;
          else if (depth === 0 && tok.text === ':') break;
          else if (depth === 0 && tok.text === ',') { labels.push(current); current = []; pos++; continue; }
          current.push(tok);
          pos++;
        }
        labels.push(current);
        pos++;
        items.push({ labels, body: statement() });
      }
      if (pos === before) pos++;
    }
    pos++;
    return { kind: 'case', subject, items };
  }

  const stmt = statement();
  return { stmt, next: pos };
}

// ─── Declarations: enums, typedefs, variable widths ──────────────────

const VAR_KEYWORDS = new Set([
  'input', 'output', 'inout', 'reg', 'logic', 'bit', 'wire', 'var',
  'integer', 'int', 'byte', 'shortint', 'longint',
]);
const MODIFIERS = new Set(['signed', 'unsigned', 'wire', 'reg', 'logic', 'bit', 'var', 'automatic', 'static']);
const IMPLIED: Record<string, number> = { integer: 32, int: 32, byte: 8, shortint: 16, longint: 64 };

function packedWidth(tokens: Token[], j: number, scope: ReadonlyMap<string, number>): { width?: number; next: number } {
  let width = 1;
  let seen = false;
  let known = true;
  while (tokens[j]?.text === '[') {
    const close = findClosing(tokens, j);
    if (close === -1) break;
    const range = evaluateRange(tokens.slice(j + 1, close), scope);
    if (range.width === undefined) known = false;
    else width *= range.width;
    seen = true;
    j = close + 1;
  }
  return seen && known ? { width, next: j } : { next: j };
}

interface Declarations {
  widths: Map<string, number>;
  typedefs: Map<string, number>;
}

function collectEnums(
  tokens: Token[],
  start: number,
  end: number,
  scope: Map<string, number>,
  decls: Declarations,
): void {
  for (let i = start; i < end; i++) {
    if (tokens[i].text !== 'enum') continue;
    let j = i + 1;
    let base: number | undefined;
    while (j < end && tokens[j].text !== '{') {
      const implied = IMPLIED[tokens[j].text];
      if (implied !== undefined) base = implied;
      if (tokens[j].text === '[') {
        const packed = packedWidth(tokens, j, scope);
        if (packed.width !== undefined) base = packed.width;
        j = packed.next;
        continue;
      }
      j++;
    }
    const close = findClosing(tokens, j);
    if (close === -1) continue;

    let next = 0;
    let count = 0;
    let k = j + 1;
    while (k < close) {
      const nameTok = tokens[k];
      if (nameTok.kind !== 'ident') { k++; continue; }
      const memberEnd = expressionEnd(tokens, k + 1, close);
      if (tokens[k + 1]?.text === '=') {
        const value = evaluate(tokens.slice(k + 2, memberEnd), scope);
        if (value !== undefined) next = value;
      }
      scope.set(nameTok.text, next);
      next++;
      count++;
      k = memberEnd + 1;
    }

    const width = base ?? Math.max(clog2(count), 1);
    let m = close + 1;
    if (tokens[i - 1]?.text === 'typedef') {
      const nameTok = tokens[m];
      if (nameTok?.kind === 'ident') decls.typedefs.set(nameTok.text, width);
    } else {
      while (m < end && tokens[m].kind === 'ident') {
        if (!decls.widths.has(tokens[m].text)) decls.widths.set(tokens[m].text, width);
        m = expressionEnd(tokens, m + 1, end);
        if (tokens[m]?.text !== ',') break;
        m++;
      }
    }
    i = close;
  }
}

function collectWidths(
  tokens: Token[],
  start: number,
  end: number,
  scope: ReadonlyMap<string, number>,
  decls: Declarations,
): void {
  for (let i = start; i < end; i++) {
    const t = tokens[i];
    if (t.kind !== 'ident') continue;

    // typedef logic [1:0] state_t;
    if (t.text === 'typedef' && tokens[i + 1]?.text !== 'enum') {
      let j = i + 1;
      let width = 1;
      while (j < end && MODIFIERS.has(tokens[j].text)) j++;
      const implied = IMPLIED[tokens[j]?.text ?? ''];
      if (implied !== undefined) { width = implied; j++; }
      const packed = packedWidth(tokens, j, scope);
      if (packed.width !== undefined) width = packed.width;
      const nameTok = tokens[packed.next];
      if (nameTok?.kind === 'ident' && tokens[packed.next + 1]?.text === ';') decls.typedefs.set(nameTok.text, width);
      continue;
    }

    const userType = decls.typedefs.get(t.text);
    if (!VAR_KEYWORDS.has(t.text) && userType === undefined) continue;
    if (userType !== undefined && tokens[i + 1]?.kind !== 'ident') continue;

    let width = userType ?? IMPLIED[t.text] ?? 1;
    let j = i + 1;
    while (j < end) {
      const text = tokens[j].text;
      if (MODIFIERS.has(text)) { j++; continue; }
      const implied = IMPLIED[text];
      const typed = decls.typedefs.get(text);
      if (implied !== undefined) { width = implied; j++; continue; }
      if (typed !== undefined) { width = typed; j++; continue; }
      break;
    }
    const packed = packedWidth(tokens, j, scope);
    if (packed.width !== undefined) width = packed.width;
    j = packed.next;

    while (j < end && tokens[j].kind === 'ident' && !VAR_KEYWORDS.has(tokens[j].text)) {
      if (!decls.widths.has(tokens[j].text)) decls.widths.set(tokens[j].text, width);
      j++;
      while (tokens[j]?.text === '[') {
        const close = findClosing(tokens, j);
        if (close === -1) break;
        j = close + 1;
      }
      if (tokens[j]?.text === '=') j = expressionEnd(tokens, j + 1, end);
      if (tokens[j]?.text !== ',') break;
      j++;
    }
    i = Math.max(i, j - 1);
  }
}

// ─── Assignment collection ───────────────────────────────────────────

interface Condition {
  /** Guard text as written (negated for else branches) */
  text: string;
  /** Set when the condition tests `variable == value` */
  variable?: string;
  value?: number;
  name?: string;
}

interface AssignmentRecord {
  target: string;
  value?: number;
  /** Symbolic constant the value was written as */
  name?: string;
  /** Single identifier on the right-hand side, for `state <= next_state` */
  source?: string;
  conditions: Condition[];
  reset: boolean;
  inDefault: boolean;
  line: number;
  order: number;
}

interface WalkContext {
  conditions: Condition[];
  reset: boolean;
  inDefault: boolean;
}

/** Whole reset identifiers: rst, rst_n, nrst, areset_n, presetn, sys_rst_n; not burst or first */
const RESET_NAME = /^(?:[nasp]_?)?(?:rst|reset)(?:_?(?:n|b|l|ni))?$|_(?:rst|reset)(?:_?(?:n|b|l|ni))?$/i;

/** Whether an `if` condition holds while its reset is asserted */
type ResetSense = 'asserted' | 'released';

function flipSense(sense: ResetSense): ResetSense {
  return sense === 'asserted' ? 'released' : 'asserted';
}

function stripParens(tokens: Token[]): Token[] {
  let out = tokens;
  while (out.length >= 2 && out[0].text === '(' && findClosing(out, 0) === out.length - 1) {
    out = out.slice(1, -1);
  }
  return out;
}

function splitTopLevel(tokens: Token[], operator: '&&' | '||'): Token[][] {
  const parts: Token[][] = [];
  let current: Token[] = [];
  let depth = 0;
  for (const tok of tokens) {
    if (tok.text === '(' || tok.text === '[' || tok.text === '{') depth++;
    else if (tok.text === ')' || tok.text === ']' || tok.text === '}') depth--;
    if (depth === 0 && tok.text === operator) {
      parts.push(current);
      current = [];
      continue;
    }
    current.push(tok);
  }
  parts.push(current);
  return parts.map(stripParens).filter(p => p.length > 0);
}

function splitConjuncts(tokens: Token[]): Token[][] {
  return splitTopLevel(tokens, '&&');
}

/** Name a value was written as: IDLE, or pkg::IDLE */
function symbolicName(tokens: Token[]): string | undefined {
  if (tokens.length === 1 && tokens[0].kind === 'ident') return tokens[0].text;
  if (tokens.length === 3 && tokens[1].text === '::' && tokens[2].kind === 'ident') return tokens[2].text;
  return undefined;
}

function constantValue(tokens: Token[], scope: ReadonlyMap<string, number>): { value?: number; name?: string } {
  const value = evaluate(tokens, scope);
  if (value === undefined) return {};
  const name = symbolicName(tokens);
  return name !== undefined && scope.has(name) ? { value, name } : { value };
}

function comparison(tokens: Token[], scope: ReadonlyMap<string, number>): Condition | undefined {
  const text = joinTokens(tokens);
  const eq = tokens.findIndex(t => t.text === '==' || t.text === '===');
  if (eq <= 0) return undefined;
  const left = tokens.slice(0, eq);
  const right = tokens.slice(eq + 1);
  const isVariable = (side: Token[]) =>
    side.length === 1 && side[0].kind === 'ident' && !scope.has(side[0].text);

  if (isVariable(left)) {
    const c = constantValue(right, scope);
    if (c.value !== undefined) return { text, variable: left[0].text, ...c };
  }
  if (isVariable(right)) {
    const c = constantValue(left, scope);
    if (c.value !== undefined) return { text, variable: right[0].text, ...c };
  }
  return undefined;
}

/**
 * How a condition relates to reset: `!rst_n`, `rst`, `rst_n == 0` assert it,
 * `rst_n`, `!rst` release it. Undefined when the condition tests anything else.
 * A disjunction asserts reset only when every term does.
 */
function resetSense(tokens: Token[], scope: ReadonlyMap<string, number>): ResetSense | undefined {
  const terms = splitTopLevel(tokens, '||');
  if (terms.length > 1) {
    return terms.every(t => resetSense(t, scope) === 'asserted') ? 'asserted' : undefined;
  }

  const t = stripParens(tokens);
  if (t.length === 0) return undefined;
  if (t.length >= 2 && (t[0].text === '!' || t[0].text === '~')) {
    const inner = resetSense(t.slice(1), scope);
    return inner === undefined ? undefined : flipSense(inner);
  }
  if (t.length === 1) {
    const name = t[0];
    if (name.kind !== 'ident' || scope.has(name.text) || !RESET_NAME.test(name.text)) return undefined;
    return inferResetPolarity(name.text) === 'reset-active-low' ? 'released' : 'asserted';
  }
  if (t.length === 3 && ['==', '===', '!=', '!=='].includes(t[1].text)) {
    const [left, op, right] = t;
    const [signal, literal] = left.kind === 'ident' ? [left, right] : [right, left];
    const bare = resetSense([signal], scope);
    const value = evaluate([literal], scope);
    if (bare === undefined || value === undefined) return undefined;
    const high = value !== 0 ? bare : flipSense(bare);
    return op.text.startsWith('!') ? flipSense(high) : high;
  }
  return undefined;
}

function collectAssignments(
  stmt: Statement,
  ctx: WalkContext,
  scope: ReadonlyMap<string, number>,
  out: AssignmentRecord[],
): void {
  switch (stmt.kind) {
    case 'block':
      for (const s of stmt.body) collectAssignments(s, ctx, scope, out);
      return;

    case 'assign': {
      const c = constantValue(stmt.rhs, scope);
      const source = stmt.rhs.length === 1 && stmt.rhs[0].kind === 'ident' && !scope.has(stmt.rhs[0].text)
        ? stmt.rhs[0].text
        : undefined;
      out.push({
        target: stmt.target,
        ...c,
        ...(source !== undefined ? { source } : {}),
        conditions: ctx.conditions,
        reset: ctx.reset,
        inDefault: ctx.inDefault,
        line: stmt.line,
        order: out.length,
      });
      return;
    }

    case 'if': {
      const cond = stripParens(stmt.cond);
      const sense = resetSense(cond, scope);
      if (sense !== undefined) {
        collectAssignments(stmt.then, { ...ctx, reset: ctx.reset || sense === 'asserted' }, scope, out);
        if (stmt.else) collectAssignments(stmt.else, { ...ctx, reset: ctx.reset || sense === 'released' }, scope, out);
        return;
      }
      const thenConds = splitConjuncts(cond).map(part => comparison(part, scope) ?? { text: joinTokens(part) });
      collectAssignments(stmt.then, { ...ctx, conditions: [...ctx.conditions, ...thenConds] }, scope, out);
      if (stmt.else) {
        const negated: Condition = { text: `!(${joinTokens(cond)})` };
        collectAssignments(stmt.else, { ...ctx, conditions: [...ctx.conditions, negated] }, scope, out);
      }
      return;
    }

    case 'case': {
      const subject = stripParens(stmt.subject);
      const subjectText = joinTokens(subject);
      const variable = subject.length === 1 && subject[0].kind === 'ident' && !scope.has(subject[0].text)
        ? subject[0].text
        : undefined;
      const allLabels: string[] = [];

      for (const item of stmt.items) {
        if (item.labels === null) continue;
        for (const label of item.labels) {
          const labelText = joinTokens(label);
          allLabels.push(labelText);
          const c = constantValue(label, scope);
          const condition: Condition = variable !== undefined && c.value !== undefined
            ? { text: `${subjectText} == ${labelText}`, variable, ...c }
            : { text: `${subjectText} == ${labelText}` };
          collectAssignments(item.body, { ...ctx, conditions: [...ctx.conditions, condition] }, scope, out);
        }
      }

      for (const item of stmt.items) {
        if (item.labels !== null) continue;
        const others = allLabels.map(l => `${subjectText} != ${l}`).join(' && ');
        const conditions = others ? [...ctx.conditions, { text: others }] : ctx.conditions;
        collectAssignments(item.body, { ...ctx, conditions, inDefault: true }, scope, out);
      }
      return;
    }

    case 'other':
      return;
  }
}

// ─── Candidate selection ─────────────────────────────────────────────

const STATE_NAME = /state|fsm|^(cs|ns|ps)$/i;

interface Candidate {
  variable: string;
  group: Set<string>;
  literals: AssignmentRecord[];
  conditioned: number;
  first: number;
}

function buildCandidates(records: AssignmentRecord[], widths: ReadonlyMap<string, number>, maxWidth: number): Candidate[] {
  // T is driven by S when `T <= S` and S is assigned constants under conditions on T
  const drivers = new Map<string, Set<string>>();
  for (const r of records) {
    const src = r.source;
    if (src === undefined || src === r.target) continue;
    const feedsBack = records.some(a =>
      a.target === src && a.value !== undefined && a.conditions.some(c => c.variable === r.target));
    if (!feedsBack) continue;
    const set = drivers.get(r.target) ?? new Set<string>();
    set.add(src);
    drivers.set(r.target, set);
  }

  // A variable that only feeds another register is that register's next-state
  const feeding = new Set<string>();
  for (const [target, sources] of drivers) {
    for (const s of sources) if (s !== target) feeding.add(s);
  }

  const candidates: Candidate[] = [];
  const seen = new Set<string>();
  for (const r of records) {
    const variable = r.target;
    if (seen.has(variable)) continue;
    seen.add(variable);
    if (feeding.has(variable)) continue;

    const group = new Set([variable, ...(drivers.get(variable) ?? [])]);
    const literals = records.filter(a => group.has(a.target) && a.value !== undefined);
    const values = new Set(literals.map(a => a.value));
    if (values.size < 2) continue;

    const width = widths.get(variable);
    if (width !== undefined && width > maxWidth) continue;
    if (width === undefined && literals.some(a => (a.value ?? 0) < 0 || (a.value ?? 0) >= 2 ** maxWidth)) continue;

    const conditioned = literals.filter(a => a.conditions.some(c => c.variable !== undefined && group.has(c.variable))).length;
    if (conditioned === 0 && !STATE_NAME.test(variable)) continue;

    candidates.push({ variable, group, literals, conditioned, first: r.order });
  }

  return candidates.sort((a, b) => b.conditioned - a.conditioned || a.first - b.first);
}

function graphFor(candidate: Candidate): StateGraph {
  const { group, literals } = candidate;

  // Value → display name; symbolic names win over raw literals
  const names = new Map<number, string>();
  const note = (value: number, name?: string) => {
    const existing = names.get(value);
    if (name !== undefined && (existing === undefined || existing === `S${value}`)) names.set(value, name);
    else if (existing === undefined) names.set(value, `S${value}`);
  };

  const edges: StateEdge[] = [];
  const edgeKeys = new Set<string>();
  const pending: Array<{ from: number; to: number; guard?: string; line: number }> = [];

  for (const a of literals) {
    if (a.value === undefined) continue;
    note(a.value, a.name);
    if (a.reset || a.inDefault) continue;

    let stateIdx = -1;
    for (let k = a.conditions.length - 1; k >= 0; k--) {
      const v = a.conditions[k].variable;
      if (v !== undefined && group.has(v)) { stateIdx = k; break; }
    }
    if (stateIdx === -1) continue;
    const from = a.conditions[stateIdx];
    if (from.value === undefined) continue;
    note(from.value, from.name);

    const guard = a.conditions
      .filter((c, k) => k !== stateIdx && !(c.variable !== undefined && group.has(c.variable)))
      .map(c => c.text)
      .join(' && ');
    pending.push({ from: from.value, to: a.value, ...(guard ? { guard } : {}), line: a.line });
  }

  for (const p of pending) {
    const from = names.get(p.from) ?? `S${p.from}`;
    const to = names.get(p.to) ?? `S${p.to}`;
    const key = `${from}\u0000${to}\u0000${p.guard ?? ''}`;
    if (edgeKeys.has(key)) continue;
    edgeKeys.add(key);
    edges.push({ from, to, ...(p.guard !== undefined ? { guard: p.guard } : {}), line: p.line });
  }

  const withExits = new Set(edges.map(e => e.from));
  const nodes = [...names.entries()]
    .sort((a, b) => a[0] - b[0])
    .map(([encoding, name]): StateNode => ({ name, encoding, exits: withExits.has(name) ? 'observed' : 'unknown' }));

  const resetAssignment =
    literals.find(a => a.reset && a.target === candidate.variable) ?? literals.find(a => a.reset);
  const initialRecord = resetAssignment ?? literals[0];
  const initial = initialRecord.value !== undefined ? names.get(initialRecord.value) : undefined;

  const oneHot = nodes.length >= 3 && nodes.every(n => n.encoding > 0 && (n.encoding & (n.encoding - 1)) === 0);

  const graph: StateGraph = { variable: candidate.variable, nodes, edges, encoding: oneHot ? 'one-hot' : 'binary' };
  if (initial !== undefined) {
    graph.initial = initial;
    graph.initialSource = resetAssignment ? 'reset' : 'first-observed';
  }
  return graph;
}

// ─── Public API ──────────────────────────────────────────────────────

/**
 * Recover the state-transition graph of the strongest state-machine candidate.
 * Returns an empty graph when the module has none.
 */
export function recoverStateGraph(source: string, options: RecoverStateGraphOptions = {}): StateGraph {
  return recoverStateGraphFromTokens(tokenize(source), options);
}

export function recoverStateGraphFromTokens(tokens: Token[], options: RecoverStateGraphOptions = {}): StateGraph {
  const maxWidth = options.maxStateWidth ?? DEFAULT_MAX_STATE_WIDTH;
  const modules = locateModules(tokens);
  const span = options.module ? modules.find(m => m.name === options.module) : modules[0];
  if (options.module && !span) return emptyStateGraph();
  const start = span?.start ?? 0;
  const end = span?.end ?? tokens.length;

  const { scope } = collectParameters(tokens, 0, end);
  const decls: Declarations = { widths: new Map(), typedefs: new Map() };
  collectEnums(tokens, 0, end, scope, decls);
  collectWidths(tokens, start, end, scope, decls);

  const records: AssignmentRecord[] = [];
  for (let i = start; i < end; i++) {
    if (!ALWAYS.has(tokens[i].text)) continue;
    const { stmt, next } = parseProcedure(tokens, i + 1, end);
    collectAssignments(stmt, { conditions: [], reset: false, inDefault: false }, scope, records);
    i = Math.max(i, next - 1);
  }

  const [best] = buildCandidates(records, decls.widths, maxWidth);
  return best ? graphFor(best) : emptyStateGraph();
}
