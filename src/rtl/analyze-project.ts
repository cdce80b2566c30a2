/**
 * tbforge — Directory analysis.
 * Finds every Verilog / SystemVerilog file under a root and analyzes each one.
 */

import fg from 'fast-glob';
import { relative } from 'node:path';
import type { ParseFailure } from '../types/index.js';
import type { SignatureRegistry } from '../protocols/registry.js';
import { analyzeFile, type AnalyzeOptions, type RtlAnalysis } from './analyze.js';

export interface AnalyzeProjectOptions extends Omit<AnalyzeOptions, 'file' | 'module'> {
  /** Root directory to scan */
  root: string;
  /** Glob patterns to include (default: .v, .sv, .vh, .svh) */
  include?: string[];
  /** Glob patterns to exclude (default: build output, simulator work dirs) */
  exclude?: string[];
}

const DEFAULT_INCLUDE = ['**/*.v', '**/*.sv', '**/*.vh', '**/*.svh'];

const DEFAULT_EXCLUDE = [
  '**/node_modules/**', '**/dist/**', '**/build/**', '**/.git/**',
  '**/work/**', '**/xsim.dir/**', '**/obj_dir/**', '**/sim_build/**',
];

export interface ProjectAnalysis {
  analyses: RtlAnalysis[];
  /** Files with no usable module, reported with root-relative paths */
  failures: ParseFailure[];
}

export async function analyzeProject(
  options: AnalyzeProjectOptions,
  registry: SignatureRegistry,
): Promise<ProjectAnalysis> {
  const { root, include = DEFAULT_INCLUDE, exclude = DEFAULT_EXCLUDE, ...analyzeOptions } = options;

  const files = await fg(include, {
    cwd: root,
    ignore: exclude,
    absolute: true,
    onlyFiles: true,
  });
  files.sort();

  const analyses: RtlAnalysis[] = [];
  const failures: ParseFailure[] = [];

  for (const file of files) {
    const result = await analyzeFile(file, registry, analyzeOptions);
    const rel = relative(root, file);
    if (result.ok) analyses.push({ ...result.value, file: rel });
    else failures.push({ ...result.error, file: rel });
  }

  return { analyses, failures };
}
