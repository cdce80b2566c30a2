/**
 * tbforge
 *
 * Library entry point. Re-exports the RTL analyzer, protocol classifier, spec
 * validator, text extraction, plan builder, coverage ranking and config.
 *
 * Usage:
 *   import { analyzeRtl, defaultRegistry, specFromRtl, validateSpec } from 'tbforge';
 *   import { buildGenerationPlan } from 'tbforge';
 *   import type { VerificationSpec, GenerationPlan } from 'tbforge';
 */

export * from './types/index.js';
export * from './rtl/index.js';
export * from './protocols/index.js';
export * from './spec/index.js';
export * from './extract/index.js';
export * from './plan/index.js';
export * from './coverage/index.js';
export {
  resolveConfig, describeConfigSource, loadProjectConfig, loadGlobalConfig, projectConfigPath, globalConfigPath,
  DEFAULT_CONFIG,
} from './config/index.js';
export type {
  TbforgeConfig, SavedConfig, ConfigFlags, ConfigSource, ResolvedConfig, ConfigContext,
} from './config/index.js';
