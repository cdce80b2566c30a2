/**
 * tbforge — Coverage gap ranking.
 *
 * Reads a coverage summary (a flat bin → percentage map, or covergroups with
 * per-bin hit counts) and ranks the bins that are not yet closed, pointing each
 * one at the register, field, state or port it most likely exercises.
 */

import { z } from 'zod';
import type { VerificationSpec } from '../types/index.js';
import { formatIssues } from '../util/issues.js';

export type GapSeverity = 'critical' | 'high' | 'medium' | 'low';

export interface CoverageBin {
  id: string;
  /** 0–100 */
  percentage: number;
  hits?: number;
  goal?: number;
}

export interface CoverageReport {
  protocol?: string;
  bins: CoverageBin[];
}

export type GapTarget =
  | { kind: 'field'; register: string; name: string }
  | { kind: 'register'; name: string }
  | { kind: 'state'; name: string }
  | { kind: 'port'; name: string; role: string };

export interface CoverageGap {
  id: string;
  percentage: number;
  severity: GapSeverity;
  target?: GapTarget;
  suggestedSequence: string;
  /** Hits still missing, when the report gave hit counts */
  hitsNeeded?: number;
}

export interface CoverageGapReport {
  protocol?: string;
  protocolMismatch: boolean;
  totals: { bins: number; covered: number; percentage: number };
  gaps: CoverageGap[];
}

// ─── Input ───────────────────────────────────────────────────────────

const binMapSchema = z.object({
  protocol: z.string().optional(),
  bins: z.record(z.number().min(0)),
});

const covergroupSchema = z.object({
  protocol: z.string().optional(),
  covergroups: z.array(z.object({
    name: z.string(),
    coverpoints: z.array(z.object({
      name: z.string(),
      bins: z.array(z.object({
        name: z.string(),
        hits: z.number().int().min(0),
        goal: z.number().int().min(0).default(1),
      })).default([]),
    })).default([]),
  })),
});

const coverageDocumentSchema = z.union([binMapSchema, covergroupSchema]);

/** Bin completion; a zero goal counts as covered */
export function binPercentage(hits: number, goal: number): number {
  if (goal === 0) return 100;
  return Math.min(100, (hits / goal) * 100);
}

/** Check a coverage summary document and flatten it to bins */
export function parseCoverageDocument(document: unknown, source = 'coverage report'): CoverageReport {
  const parsed = coverageDocumentSchema.safeParse(document);
  if (!parsed.success) throw new Error(formatIssues(parsed.error, source));
  const data = parsed.data;

  const report: CoverageReport = { bins: [] };
  if (data.protocol !== undefined) report.protocol = data.protocol;

  if ('bins' in data) {
    for (const [id, percentage] of Object.entries(data.bins)) {
      report.bins.push({ id, percentage: Math.min(100, percentage) });
    }
    return report;
  }
  for (const group of data.covergroups) {
    for (const point of group.coverpoints) {
      for (const bin of point.bins) {
        report.bins.push({
          id: `${group.name}.${point.name}.${bin.name}`,
          percentage: binPercentage(bin.hits, bin.goal),
          hits: bin.hits,
          goal: bin.goal,
        });
      }
    }
  }
  return report;
}

// ─── Ranking ─────────────────────────────────────────────────────────

const SEVERITY_ORDER: Record<GapSeverity, number> = { critical: 0, high: 1, medium: 2, low: 3 };

const BOUNDARY_TOKEN = /^(boundary|edge|corner|error|err|overflow|underflow|illegal|timeout|fail|min|max)/;

function tokens(text: string): string[] {
  return text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);
}

function containsRun(haystack: string[], needle: string[]): boolean {
  if (needle.length === 0 || needle.length > haystack.length) return false;
  for (let i = 0; i + needle.length <= haystack.length; i++) {
    if (needle.every((t, j) => haystack[i + j] === t)) return true;
  }
  return false;
}

export function severityOf(bin: CoverageBin): GapSeverity {
  if (bin.percentage === 0) return 'critical';
  if (tokens(bin.id).some(t => BOUNDARY_TOKEN.test(t))) return 'high';
  if (bin.percentage < 50) return 'medium';
  return 'low';
}

/** Most specific spec element named in a bin id: field, then register, state, port */
export function matchTarget(id: string, spec: VerificationSpec): GapTarget | undefined {
  const idTokens = tokens(id);

  for (const reg of spec.registers) {
    for (const field of reg.fields) {
      if (containsRun(idTokens, tokens(`${reg.name}_${field.name}`))) {
        return { kind: 'field', register: reg.name, name: field.name };
      }
    }
  }
  for (const reg of spec.registers) {
    if (containsRun(idTokens, tokens(reg.name))) return { kind: 'register', name: reg.name };
  }
  for (const node of spec.stateGraph?.nodes ?? []) {
    if (containsRun(idTokens, tokens(node.name))) return { kind: 'state', name: node.name };
  }
  for (const [instance, assignment] of Object.entries(spec.roles)) {
    if (containsRun(idTokens, tokens(assignment.port))) {
      return { kind: 'port', name: assignment.port, role: instance };
    }
  }
  return undefined;
}

function sequenceName(spec: VerificationSpec, id: string, target: GapTarget | undefined): string {
  let stem: string;
  switch (target?.kind) {
    case 'field': stem = `${target.register}_${target.name}`; break;
    case 'register': stem = target.name; break;
    case 'state': stem = `state_${target.name}`; break;
    case 'port': stem = target.name; break;
    default: stem = tokens(id).join('_');
  }
  return `${spec.moduleName}_${tokens(stem).join('_')}_seq`;
}

function sameProtocol(reported: string, spec: VerificationSpec): boolean {
  const squash = (s: string) => s.toLowerCase().replace(/[^a-z0-9]/g, '');
  const r = squash(reported);
  return r === squash(spec.protocol) || (spec.signature !== undefined && r === squash(spec.signature));
}

/**
 * Rank the open bins of a coverage report against a validated spec.
 * Closed bins (100%) are left out; ties order by percentage, then bin id.
 */
export function rankCoverageGaps(report: CoverageReport, spec: VerificationSpec): CoverageGapReport {
  const gaps: CoverageGap[] = [];
  for (const bin of report.bins) {
    if (bin.percentage >= 100) continue;
    const target = matchTarget(bin.id, spec);
    const gap: CoverageGap = {
      id: bin.id,
      percentage: Math.round(bin.percentage * 100) / 100,
      severity: severityOf(bin),
      suggestedSequence: sequenceName(spec, bin.id, target),
    };
    if (target) gap.target = target;
    if (bin.hits !== undefined && bin.goal !== undefined) gap.hitsNeeded = Math.max(1, bin.goal - bin.hits);
    gaps.push(gap);
  }

  gaps.sort((a, b) =>
    SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity]
    || a.percentage - b.percentage
    || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

  const total = report.bins.length;
  const mean = total === 0 ? 100 : report.bins.reduce((sum, b) => sum + b.percentage, 0) / total;

  const result: CoverageGapReport = {
    protocolMismatch: report.protocol !== undefined && !sameProtocol(report.protocol, spec),
    totals: {
      bins: total,
      covered: report.bins.filter(b => b.percentage >= 100).length,
      percentage: Math.round(mean * 100) / 100,
    },
    gaps,
  };
  if (report.protocol !== undefined) result.protocol = report.protocol;
  return result;
}
