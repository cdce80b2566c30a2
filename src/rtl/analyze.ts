/**
 * tbforge — RTL analysis.
 * Runs port extraction, protocol classification, state machine recovery and
 * register recovery over one source text.
 */

import { readFile } from 'node:fs/promises';
import type {
  AmbiguousProtocol, ClassificationResult, ParseFailure, PortExtraction, Register, Result, StateGraph,
} from '../types/index.js';
import type { SignatureRegistry } from '../protocols/registry.js';
import { classifyPorts, resolveProtocol } from '../protocols/classify.js';
import { tokenize } from './lexer.js';
import { extractPortsFromTokens } from './extract-ports.js';
import { recoverStateGraphFromTokens } from './fsm.js';
import { recoverRegisters } from './registers.js';

export interface AnalyzeOptions {
  /** File name used in diagnostics */
  file?: string;
  /** Module to analyze; defaults to the first module */
  module?: string;
  floor?: number;
  acceptThreshold?: number;
  maxStateWidth?: number;
}

export interface RtlAnalysis extends PortExtraction {
  file: string;
  /** Every signature above the score floor, best first */
  candidates: ClassificationResult[];
  /** The accepted classification, or why none was accepted */
  classification: Result<ClassificationResult, AmbiguousProtocol>;
  stateGraph: StateGraph;
  registers: Register[];
}

/**
 * Analyze a source string. Fails only when no ports can be extracted;
 * an unclassifiable port list is reported inside the analysis.
 */
export function analyzeRtl(
  source: string,
  registry: SignatureRegistry,
  options: AnalyzeOptions = {},
): Result<RtlAnalysis, ParseFailure> {
  const file = options.file ?? '<input>';
  const tokens = tokenize(source);
  const extracted = extractPortsFromTokens(tokens, file, options.module);
  if (!extracted.ok) return extracted;

  const { ports, parameters, module } = extracted.value;
  const scoring = { floor: options.floor, acceptThreshold: options.acceptThreshold };
  return {
    ok: true,
    value: {
      ...extracted.value,
      file,
      candidates: classifyPorts(ports, registry, scoring),
      classification: resolveProtocol(ports, registry, scoring),
      stateGraph: recoverStateGraphFromTokens(tokens, { module, maxStateWidth: options.maxStateWidth }),
      registers: recoverRegisters(parameters),
    },
  };
}

/** Read and analyze one HDL file */
export async function analyzeFile(
  filePath: string,
  registry: SignatureRegistry,
  options: Omit<AnalyzeOptions, 'file'> = {},
): Promise<Result<RtlAnalysis, ParseFailure>> {
  const content = await readFile(filePath, 'utf-8');
  return analyzeRtl(content, registry, { ...options, file: filePath });
}
