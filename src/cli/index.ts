#!/usr/bin/env node

/**
 * tbforge CLI
 *
 * Usage:
 *   tbforge analyze <path>               Extract ports, classify the protocol, recover FSM and registers
 *   tbforge spec <file>                  Build and validate a verification spec from an HDL file
 *   tbforge extract <text...>            Build and validate a spec from a plain-language description
 *   tbforge validate <spec.json>         Check a spec and list every violation
 *   tbforge plan <spec.json>             Print the ordered artifact requests for a spec
 *   tbforge gaps <spec.json> <cov.json>  Rank open coverage bins against a spec
 *   tbforge signatures                   List the protocol signature registry
 *   tbforge config                       Show the resolved configuration
 *
 * Exit codes: 0 success, 1 invalid input or failed validation, 2 internal inconsistency.
 */

import { Command } from 'commander';
import { readFile, stat, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import gradient from 'gradient-string';
import type { ValidationResult, VerificationSpec } from '../types/index.js';
import { resolveConfig, describeConfigSource, type ConfigFlags, type TbforgeConfig } from '../config/index.js';
import { defaultRegistry, loadRegistry, type SignatureRegistry } from '../protocols/registry.js';
import { analyzeFile } from '../rtl/analyze.js';
import { analyzeProject } from '../rtl/analyze-project.js';
import { parseSpecDocument } from '../spec/schema.js';
import { validateSpec } from '../spec/validate.js';
import { specFromRtl } from '../spec/from-rtl.js';
import { extractJson, extractSpec, parseCandidate, specFromCandidate } from '../extract/candidate.js';
import { quickExtractor } from '../extract/quick.js';
import { buildGenerationPlan } from '../plan/build-plan.js';
import { parseCoverageDocument, rankCoverageGaps } from '../coverage/gaps.js';
import {
  C, formatAmbiguous, formatAnalysis, formatDiagnostics, formatGaps, formatIncomplete, formatParseFailure,
  formatPlan, formatSignature, formatSpecSummary, formatViolations, formatWarnings,
} from './format.js';

const program = new Command();

const ASCII_LOGO = `
 ████████ ██████  ███████  ██████  ██████   ██████  ███████
    ██    ██   ██ ██      ██    ██ ██   ██ ██       ██
    ██    ██████  █████   ██    ██ ██████  ██   ███ █████
    ██    ██   ██ ██      ██    ██ ██   ██ ██    ██ ██
    ██    ██████  ██       ██████  ██   ██  ██████  ███████
`;

interface GlobalOptions {
  signatures?: string;
  floor?: number;
  threshold?: number;
  maxStateWidth?: number;
  roleDefaults?: boolean;
}

interface Context {
  config: TbforgeConfig;
  registry: SignatureRegistry;
}

function parseFraction(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0 || n > 1) throw new Error(`expected a number between 0 and 1, got '${value}'`);
  return n;
}

function parseWidth(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1 || n > 32) throw new Error(`expected an integer between 1 and 32, got '${value}'`);
  return n;
}

program
  .name('tbforge')
  .description('tbforge — Verification specs and testbench plans from RTL or plain-language bus descriptions.')
  .version('0.1.0')
  .option('--signatures <file>', 'Signature registry JSON (default: bundled registry)')
  .option('--floor <score>', 'Classification score floor', parseFraction)
  .option('--threshold <score>', 'Classification acceptance threshold', parseFraction)
  .option('--max-state-width <bits>', 'Widest register considered a state variable', parseWidth)
  .option('--role-defaults', 'Fill missing roles of text-derived specs with the signature defaults')
  .addHelpText('before', gradient(['#00ff41', '#00d4ff'])(ASCII_LOGO));

function globalFlags(): ConfigFlags {
  const opts = program.opts<GlobalOptions>();
  const flags: ConfigFlags = {};
  if (opts.signatures !== undefined) flags.signatures = opts.signatures;
  if (opts.floor !== undefined) flags.scoreFloor = opts.floor;
  if (opts.threshold !== undefined) flags.acceptThreshold = opts.threshold;
  if (opts.maxStateWidth !== undefined) flags.maxStateWidth = opts.maxStateWidth;
  if (opts.roleDefaults) flags.allowRoleDefaults = true;
  return flags;
}

/** Resolve config (flags > env > project > global > defaults) and load the registry */
function loadContext(): Context {
  const { config } = resolveConfig(process.cwd(), globalFlags());
  const registry = config.signatures ? loadRegistry(config.signatures) : defaultRegistry();
  return { config, registry };
}

async function readJson(path: string, label: string): Promise<unknown> {
  const content = await readFile(resolve(path), 'utf-8');
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new Error(`${label} ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

async function emit(json: string, output?: string): Promise<void> {
  if (output) {
    await writeFile(output, json + '\n');
    console.error(`Wrote ${output}`);
  } else {
    console.log(json);
  }
}

/** Print validation results to stderr; returns the spec when valid */
function reportValidation(result: ValidationResult): VerificationSpec | undefined {
  for (const line of formatWarnings(result.warnings)) console.error(line);
  if (result.ok) return result.spec;
  for (const line of formatViolations(result.violations)) console.error(line);
  console.error(`\n${result.violations.length} violation(s)`);
  return undefined;
}

// ─── analyze ─────────────────────────────────────────────────────────

program
  .command('analyze')
  .description('Extract ports, classify the bus protocol, recover the state machine and register map')
  .argument('<path>', 'HDL file or directory to scan')
  .option('-m, --module <name>', 'Module to analyze (file input only; default: first module)')
  .option('--json', 'Output the analysis as JSON')
  .action(async (path: string, opts: { module?: string; json?: boolean }) => {
    const { config, registry } = loadContext();
    const options = {
      floor: config.scoreFloor,
      acceptThreshold: config.acceptThreshold,
      maxStateWidth: config.maxStateWidth,
    };
    const target = resolve(path);

    if ((await stat(target)).isDirectory()) {
      const { analyses, failures } = await analyzeProject({ root: target, ...options }, registry);
      if (opts.json) {
        console.log(JSON.stringify({ analyses, failures }, null, 2));
      } else {
        for (const analysis of analyses) {
          for (const line of formatDiagnostics(analysis.diagnostics, analysis.file)) console.error(line);
          console.log(formatAnalysis(analysis, config.acceptThreshold).join('\n') + '\n');
        }
        for (const failure of failures) console.error(formatParseFailure(failure));
        console.error(`${analyses.length} module(s) analyzed, ${failures.length} file(s) skipped`);
      }
      process.exit(analyses.length === 0 ? 1 : 0);
    }

    const result = await analyzeFile(target, registry, { ...options, module: opts.module });
    if (!result.ok) {
      console.error(formatParseFailure(result.error));
      process.exit(1);
    }
    const analysis = result.value;
    if (opts.json) {
      console.log(JSON.stringify(analysis, null, 2));
    } else {
      for (const line of formatDiagnostics(analysis.diagnostics, path)) console.error(line);
      console.log(formatAnalysis(analysis, config.acceptThreshold).join('\n'));
    }
  });

// ─── spec ────────────────────────────────────────────────────────────

program
  .command('spec')
  .description('Build a validated verification spec from an HDL file')
  .argument('<file>', 'Verilog / SystemVerilog source')
  .option('-m, --module <name>', 'Module to analyze (default: first module)')
  .option('-f, --features <list>', 'Comma-separated feature flags (default: per signature)')
  .option('-o, --output <file>', 'Write the spec JSON to a file instead of stdout')
  .action(async (file: string, opts: { module?: string; features?: string; output?: string }) => {
    const { config, registry } = loadContext();
    const result = await analyzeFile(resolve(file), registry, {
      module: opts.module,
      floor: config.scoreFloor,
      acceptThreshold: config.acceptThreshold,
      maxStateWidth: config.maxStateWidth,
    });
    if (!result.ok) {
      console.error(formatParseFailure(result.error));
      process.exit(1);
    }
    for (const line of formatDiagnostics(result.value.diagnostics, file)) console.error(line);

    const features = opts.features?.split(',').map(s => s.trim()).filter(Boolean);
    const raw = specFromRtl(result.value, registry, features ? { features } : {});
    if (!raw.ok) {
      for (const line of formatAmbiguous(raw.error)) console.error(line);
      process.exit(1);
    }

    const spec = reportValidation(validateSpec(raw.value, registry));
    if (!spec) process.exit(1);
    await emit(JSON.stringify(spec, null, 2), opts.output);
  });

// ─── extract ─────────────────────────────────────────────────────────

program
  .command('extract')
  .description('Build a validated verification spec from a plain-language description')
  .argument('[text...]', 'Description, e.g. "APB3 slave with CTRL at 0x00 and STATUS at 0x04 (RO)"')
  .option('-r, --reply <file>', 'Read a language-model reply (JSON candidate) instead of the offline extractor')
  .option('-o, --output <file>', 'Write the spec JSON to a file instead of stdout')
  .action(async (words: string[], opts: { reply?: string; output?: string }) => {
    const { config, registry } = loadContext();

    let raw: VerificationSpec;
    if (opts.reply) {
      const reply = await readFile(resolve(opts.reply), 'utf-8');
      raw = specFromCandidate(parseCandidate(extractJson(reply), opts.reply), registry);
    } else {
      const text = words.join(' ').trim();
      if (!text) {
        console.error('Provide a description or --reply <file>.');
        process.exit(1);
      }
      raw = await extractSpec(text, quickExtractor, registry);
    }

    const spec = reportValidation(validateSpec(raw, registry, { allowRoleDefaults: config.allowRoleDefaults }));
    if (!spec) {
      console.error(C.dim('Declared roles can be supplied in the spec JSON, or use --role-defaults.'));
      process.exit(1);
    }
    for (const line of formatSpecSummary(spec)) console.error(line);
    await emit(JSON.stringify(spec, null, 2), opts.output);
  });

// ─── validate ────────────────────────────────────────────────────────

program
  .command('validate')
  .description('Check a verification spec and report every violation')
  .argument('<spec>', 'Spec JSON file')
  .option('--json', 'Output the validation result as JSON')
  .action(async (file: string, opts: { json?: boolean }) => {
    const { config, registry } = loadContext();
    const raw = parseSpecDocument(await readJson(file, 'Spec'), file);
    const result = validateSpec(raw, registry, { allowRoleDefaults: config.allowRoleDefaults });

    if (opts.json) {
      console.log(JSON.stringify(result, null, 2));
      process.exit(result.ok ? 0 : 1);
    }
    const spec = reportValidation(result);
    if (!spec) process.exit(1);
    for (const line of formatSpecSummary(spec)) console.log(line);
    console.log(C.success('\n✓ Spec is valid.'));
  });

// ─── plan ────────────────────────────────────────────────────────────

program
  .command('plan')
  .description('Validate a spec and print the ordered artifact requests')
  .argument('<spec>', 'Spec JSON file')
  .option('--json', 'Output the plan as JSON')
  .action(async (file: string, opts: { json?: boolean }) => {
    const { config, registry } = loadContext();
    const raw = parseSpecDocument(await readJson(file, 'Spec'), file);
    const spec = reportValidation(validateSpec(raw, registry, { allowRoleDefaults: config.allowRoleDefaults }));
    if (!spec) process.exit(1);

    const plan = buildGenerationPlan(spec, registry);
    if (!plan.ok) {
      console.error(formatIncomplete(plan.error));
      process.exit(2);
    }
    if (opts.json) console.log(JSON.stringify(plan.value, null, 2));
    else console.log(formatPlan(plan.value).join('\n'));
  });

// ─── gaps ────────────────────────────────────────────────────────────

program
  .command('gaps')
  .description('Rank open coverage bins against a spec and suggest sequences')
  .argument('<spec>', 'Spec JSON file')
  .argument('<coverage>', 'Coverage summary JSON (bin map or covergroups)')
  .option('--json', 'Output the ranking as JSON')
  .action(async (specFile: string, coverageFile: string, opts: { json?: boolean }) => {
    const { config, registry } = loadContext();
    const raw = parseSpecDocument(await readJson(specFile, 'Spec'), specFile);
    const spec = reportValidation(validateSpec(raw, registry, { allowRoleDefaults: config.allowRoleDefaults }));
    if (!spec) process.exit(1);

    const coverage = parseCoverageDocument(await readJson(coverageFile, 'Coverage report'), coverageFile);
    const report = rankCoverageGaps(coverage, spec);
    if (opts.json) console.log(JSON.stringify(report, null, 2));
    else console.log(formatGaps(report).join('\n'));
  });

// ─── signatures ──────────────────────────────────────────────────────

program
  .command('signatures')
  .description('List the protocol signatures classification scores against')
  .option('--json', 'Output the registry as JSON')
  .action((opts: { json?: boolean }) => {
    const { registry } = loadContext();
    if (opts.json) {
      console.log(JSON.stringify(registry.signatures, null, 2));
      return;
    }
    for (const sig of registry.signatures) {
      const isDefault = registry.resolve(sig.protocol)?.id === sig.id;
      console.log(formatSignature(sig, isDefault).join('\n') + '\n');
    }
  });

// ─── config ──────────────────────────────────────────────────────────

program
  .command('config')
  .description('Show the resolved configuration and where each setting came from')
  .action(() => {
    const { config, sources } = resolveConfig(process.cwd(), globalFlags());
    const row = (label: string, value: string, key: keyof TbforgeConfig) =>
      `${label.padEnd(18)} ${value.padEnd(12)} ${C.dim(describeConfigSource(sources[key]))}`;
    console.log(row('scoreFloor', String(config.scoreFloor), 'scoreFloor'));
    console.log(row('acceptThreshold', String(config.acceptThreshold), 'acceptThreshold'));
    console.log(row('maxStateWidth', String(config.maxStateWidth), 'maxStateWidth'));
    console.log(row('allowRoleDefaults', String(config.allowRoleDefaults), 'allowRoleDefaults'));
    console.log(row('signatures', config.signatures ?? 'bundled', 'signatures'));
  });

program.parseAsync().catch((err: unknown) => {
  console.error(C.error(`Error: ${err instanceof Error ? err.message : String(err)}`));
  process.exit(1);
});
