/**
 * tbforge CLI — Terminal formatting utilities.
 * Color tokens, severity badges, tables, and the renderers for each result type.
 */

import chalk from 'chalk';
import type {
  AmbiguousProtocol, ClassificationResult, GenerationPlan, IncompleteSpec, ParseFailure,
  PortDeclaration, ProtocolSignature, RtlDiagnostic, SpecViolation, StateGraph, ValidationWarning,
  VerificationSpec,
} from '../types/index.js';
import type { CoverageGapReport, GapSeverity } from '../coverage/gaps.js';
import type { RtlAnalysis } from '../rtl/analyze.js';
import { hex } from '../spec/validate.js';

// ─── Color tokens ────────────────────────────────────────────────────

export const C = {
  critical: chalk.bgRed.white.bold,
  high:     chalk.bgYellow.black.bold,
  medium:   chalk.yellow,
  low:      chalk.blue,

  dim:      chalk.dim,
  bold:     chalk.bold,
  green:    chalk.green,
  red:      chalk.red,
  yellow:   chalk.yellow,
  gray:     chalk.gray,
  accent:   chalk.hex('#2dd4a7'),

  success:  chalk.green,
  warn:     chalk.yellow,
  error:    chalk.red,
};

// ─── Badges ──────────────────────────────────────────────────────────

export function severityBadge(severity: GapSeverity): string {
  switch (severity) {
    case 'critical': return C.critical(' CRIT ');
    case 'high': return C.high(' HIGH ');
    case 'medium': return C.medium('  MED ');
    case 'low': return C.low('  LOW ');
  }
}

/** Confidence as a percentage, colored by how far it clears the threshold */
export function confidenceText(confidence: number, threshold: number): string {
  const label = `${(confidence * 100).toFixed(1)}%`;
  if (confidence > threshold) return C.green.bold(label);
  if (confidence > 0) return C.yellow(label);
  return C.gray(label);
}

// ─── Table formatter ─────────────────────────────────────────────────

export interface Column {
  header: string;
  width: number;
  align?: 'left' | 'right';
}

export function formatTable(columns: Column[], rows: string[][]): string[] {
  const lines: string[] = [];

  const headerLine = columns.map(c =>
    c.align === 'right' ? c.header.padStart(c.width) : c.header.padEnd(c.width),
  ).join('  ');
  lines.push(C.dim(headerLine));
  lines.push(C.dim(columns.map(c => '─'.repeat(c.width)).join('  ')));

  for (const row of rows) {
    const cells = columns.map((c, i) => {
      const val = trunc(row[i] ?? '', c.width);
      return c.align === 'right' ? val.padStart(c.width) : val.padEnd(c.width);
    });
    lines.push(cells.join('  ').trimEnd());
  }
  return lines;
}

/** Truncate string to max width with ellipsis */
export function trunc(s: string, max: number): string {
  if (s.length <= max) return s;
  return s.slice(0, max - 1) + '…';
}

/** Horizontal bar for coverage percentages */
export function bar(percentage: number, width = 20): string {
  const filled = Math.max(0, Math.min(width, Math.round((percentage / 100) * width)));
  return '█'.repeat(filled) + C.dim('░'.repeat(width - filled));
}

// ─── Result renderers ────────────────────────────────────────────────

export function formatPorts(ports: readonly PortDeclaration[]): string[] {
  return formatTable(
    [
      { header: 'PORT', width: 20 },
      { header: 'DIR', width: 6 },
      { header: 'WIDTH', width: 5, align: 'right' },
      { header: 'RANGE', width: 16 },
    ],
    ports.map(p => [p.name, p.direction, String(p.width), p.range ?? '']),
  );
}

export function formatCandidates(candidates: readonly ClassificationResult[], threshold: number): string[] {
  if (candidates.length === 0) return [C.gray('  no signature above the score floor')];
  return candidates.map(c => {
    const missing = c.unmatchedOptional.length > 0 ? C.dim(` (no ${c.unmatchedOptional.join(', ')})`) : '';
    return `  ${c.signature.padEnd(10)} ${confidenceText(c.confidence, threshold)}${missing}`;
  });
}

export function formatAmbiguous(error: AmbiguousProtocol): string[] {
  const lines = [C.warn(`⚠  ${error.message}`)];
  for (const near of error.nearMisses) {
    lines.push(C.dim(`   ${near.signature}: missing ${near.unmatchedRequired.join(', ')}`));
  }
  return lines;
}

export function formatStateGraph(graph: StateGraph): string[] {
  if (graph.nodes.length === 0) return [C.gray('  no state machine recovered')];
  const lines = [
    `  ${C.bold(graph.variable ?? 'state')}: ${graph.nodes.length} states, ${graph.edges.length} transitions`
      + C.dim(` (${graph.encoding ?? 'binary'}, initial ${graph.initial ?? '?'} from ${graph.initialSource ?? 'unknown'})`),
  ];
  for (const edge of graph.edges) {
    lines.push(`    ${edge.from} → ${edge.to}${edge.guard ? C.dim(` when ${edge.guard}`) : ''}`);
  }
  return lines;
}

export function formatDiagnostics(diagnostics: readonly RtlDiagnostic[], file: string): string[] {
  return diagnostics.map(d => {
    const prefix = d.level === 'error' ? C.error('✗') : C.warn('⚠');
    return `${prefix} ${file}:${d.line}: ${d.message}`;
  });
}

export function formatParseFailure(failure: ParseFailure): string {
  const where = failure.line !== undefined ? `${failure.file}:${failure.line}` : failure.file;
  return `${C.error('✗')} ${where}: ${failure.message}`;
}

export function formatAnalysis(analysis: RtlAnalysis, threshold: number): string[] {
  const lines = [
    `${C.accent.bold(analysis.module)} ${C.dim(analysis.file)}`,
    ...formatPorts(analysis.ports),
    '',
    C.bold('Protocol'),
  ];
  if (analysis.classification.ok) {
    const c = analysis.classification.value;
    lines.push(`  ${C.success('✓')} ${c.signature} ${confidenceText(c.confidence, threshold)}`);
  } else {
    lines.push(...formatAmbiguous(analysis.classification.error).map(l => `  ${l}`));
  }
  lines.push(...formatCandidates(analysis.candidates, threshold));
  lines.push('', C.bold('State machine'), ...formatStateGraph(analysis.stateGraph));
  if (analysis.registers.length > 0) {
    lines.push('', C.bold('Registers'));
    for (const r of analysis.registers) lines.push(`  ${hex(r.address).padEnd(8)} ${r.name}`);
  }
  return lines;
}

export function formatViolations(violations: readonly SpecViolation[]): string[] {
  return violations.map(v => `${C.error('✗')} ${C.dim(v.kind.padEnd(18))} ${v.message}`);
}

export function formatWarnings(warnings: readonly ValidationWarning[]): string[] {
  return warnings.map(w => `${C.warn('⚠')} ${w.message}`);
}

export function formatSpecSummary(spec: VerificationSpec): string[] {
  return [
    `${C.accent.bold(spec.moduleName)} ${C.dim(`${spec.signature ?? spec.protocol}, from ${spec.origin}`)}`,
    `  data ${spec.bus.dataWidth} bits, address ${spec.bus.addressWidth} bits`,
    `  ${spec.registers.length} register(s), ${Object.keys(spec.roles).length} role(s)`,
    `  features: ${spec.features.join(', ') || C.gray('none')}`,
  ];
}

export function formatPlan(plan: GenerationPlan): string[] {
  const rows = plan.requests.map((r, i) => [
    String(i + 1),
    r.kind,
    r.file,
    r.dependsOn.length > 0 ? r.dependsOn.join(', ') : '—',
  ]);
  return [
    `${C.accent.bold(plan.moduleName)} ${C.dim(`${plan.signature}, ${plan.requests.length} artifacts`)}`,
    ...formatTable(
      [
        { header: '#', width: 3, align: 'right' },
        { header: 'KIND', width: 16 },
        { header: 'FILE', width: 28 },
        { header: 'DEPENDS ON', width: 60 },
      ],
      rows,
    ),
  ];
}

export function formatIncomplete(error: IncompleteSpec): string {
  return JSON.stringify(error, null, 2);
}

export function formatGaps(report: CoverageGapReport): string[] {
  const lines: string[] = [];
  if (report.protocolMismatch) {
    lines.push(C.warn(`⚠  Coverage report is for ${report.protocol ?? 'another protocol'}, not this spec's protocol`));
  }
  const { totals } = report;
  lines.push(`${bar(totals.percentage)} ${totals.percentage.toFixed(1)}%  ${C.dim(`${totals.covered}/${totals.bins} bins closed`)}`);
  if (report.gaps.length === 0) {
    lines.push(C.success('✓ No open coverage bins.'));
    return lines;
  }
  lines.push('');
  lines.push(...formatTable(
    [
      { header: 'SEV', width: 6 },
      { header: 'BIN', width: 36 },
      { header: '%', width: 6, align: 'right' },
      { header: 'TARGET', width: 20 },
      { header: 'SEQUENCE', width: 36 },
    ],
    report.gaps.map(g => [
      g.severity,
      g.id,
      g.percentage.toFixed(1),
      g.target ? `${g.target.kind} ${g.target.kind === 'field' ? `${g.target.register}.${g.target.name}` : g.target.name}` : '',
      g.suggestedSequence,
    ]),
  ).map((line, i) => {
    const gap = report.gaps[i - 2];
    return gap ? severityBadge(gap.severity) + line.slice(6) : line;
  }));
  return lines;
}

export function formatSignature(sig: ProtocolSignature, isDefault: boolean): string[] {
  const roles = (patterns: ProtocolSignature['required']) => patterns.map(p => p.name).join(' ');
  return [
    `${C.accent.bold(sig.id.padEnd(10))} ${sig.label}${isDefault ? C.dim(' (default)') : ''}`,
    `  required  ${roles(sig.required)}`,
    ...(sig.optional.length > 0 ? [`  optional  ${C.dim(roles(sig.optional))}`] : []),
    `  features  ${sig.features.join(', ')}`,
  ];
}
