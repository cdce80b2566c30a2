/**
 * tbforge — Configuration resolution.
 *
 * Resolution order (highest to lowest priority):
 *   1. Explicit CLI flags
 *   2. TBFORGE_* environment variables
 *   3. Project config: .tbforge/config.json
 *   4. Global config: ~/.config/tbforge/config.json
 *   5. Built-in defaults
 *
 * Each setting resolves on its own, so a project file can set the floor while
 * an env var overrides only the threshold.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { DEFAULT_ACCEPT_THRESHOLD, DEFAULT_SCORE_FLOOR } from '../protocols/classify.js';
import { DEFAULT_MAX_STATE_WIDTH } from '../rtl/fsm.js';
import { formatIssues } from '../util/issues.js';

// ─── Types ───────────────────────────────────────────────────────────

const savedConfigSchema = z.object({
  scoreFloor: z.number().min(0).max(1).optional(),
  acceptThreshold: z.number().min(0).max(1).optional(),
  maxStateWidth: z.number().int().min(1).max(32).optional(),
  /** Signature registry file; relative paths resolve against the config file's directory */
  signatures: z.string().min(1).optional(),
  allowRoleDefaults: z.boolean().optional(),
}).strict();

export type SavedConfig = z.infer<typeof savedConfigSchema>;

export interface TbforgeConfig {
  scoreFloor: number;
  acceptThreshold: number;
  maxStateWidth: number;
  /** Absolute path, or undefined for the bundled registry */
  signatures?: string;
  allowRoleDefaults: boolean;
}

export type ConfigFlags = Partial<TbforgeConfig>;

export type ConfigSource = 'flag' | 'env' | 'project' | 'global' | 'default';

export interface ResolvedConfig {
  config: TbforgeConfig;
  sources: Record<keyof TbforgeConfig, ConfigSource>;
}

export interface ConfigContext {
  env?: NodeJS.ProcessEnv;
  /** Home directory holding .config/tbforge */
  home?: string;
}

export const DEFAULT_CONFIG: TbforgeConfig = {
  scoreFloor: DEFAULT_SCORE_FLOOR,
  acceptThreshold: DEFAULT_ACCEPT_THRESHOLD,
  maxStateWidth: DEFAULT_MAX_STATE_WIDTH,
  allowRoleDefaults: false,
};

const CONFIG_FILE = 'config.json';

// ─── Config file paths ───────────────────────────────────────────────

/** Project-level config: <root>/.tbforge/config.json */
export function projectConfigPath(root: string): string {
  return join(root, '.tbforge', CONFIG_FILE);
}

/** Global config: ~/.config/tbforge/config.json */
export function globalConfigPath(home: string = homedir()): string {
  return join(home, '.config', 'tbforge', CONFIG_FILE);
}

// ─── Read helpers ────────────────────────────────────────────────────

/** Read and check a config file; null when absent, throws when malformed */
function readConfigFile(path: string): SavedConfig | null {
  if (!existsSync(path)) return null;
  let document: unknown;
  try {
    document = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new Error(`Cannot read config ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = savedConfigSchema.safeParse(document);
  if (!parsed.success) throw new Error(formatIssues(parsed.error, `config ${path}`));
  const config = parsed.data;
  if (config.signatures !== undefined) {
    config.signatures = resolve(dirname(path), config.signatures);
  }
  return config;
}

export function loadProjectConfig(root: string): SavedConfig | null {
  return readConfigFile(projectConfigPath(root));
}

export function loadGlobalConfig(home?: string): SavedConfig | null {
  return readConfigFile(globalConfigPath(home));
}

function envNumber(env: NodeJS.ProcessEnv, name: string, schema: z.ZodNumber): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const parsed = schema.safeParse(Number(raw));
  if (!parsed.success) throw new Error(`${name}=${raw} is not valid: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  return parsed.data;
}

function envBoolean(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return undefined;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new Error(`${name}=${raw} is not a boolean`);
}

function fromEnv(env: NodeJS.ProcessEnv, root: string): SavedConfig {
  const out: SavedConfig = {};
  const floor = envNumber(env, 'TBFORGE_SCORE_FLOOR', z.number().min(0).max(1));
  if (floor !== undefined) out.scoreFloor = floor;
  const threshold = envNumber(env, 'TBFORGE_ACCEPT_THRESHOLD', z.number().min(0).max(1));
  if (threshold !== undefined) out.acceptThreshold = threshold;
  const width = envNumber(env, 'TBFORGE_MAX_STATE_WIDTH', z.number().int().min(1).max(32));
  if (width !== undefined) out.maxStateWidth = width;
  const signatures = env.TBFORGE_SIGNATURES?.trim();
  if (signatures) out.signatures = resolve(root, signatures);
  const defaults = envBoolean(env, 'TBFORGE_ROLE_DEFAULTS');
  if (defaults !== undefined) out.allowRoleDefaults = defaults;
  return out;
}

// ─── Unified resolution ──────────────────────────────────────────────

/**
 * Resolve every setting through the priority chain.
 *
 * @param root  - Project root directory (for project-level config)
 * @param flags - Explicit CLI flags (highest priority)
 */
export function resolveConfig(root: string, flags: ConfigFlags = {}, context: ConfigContext = {}): ResolvedConfig {
  const layers: Array<[ConfigSource, SavedConfig]> = [
    ['flag', flags.signatures !== undefined ? { ...flags, signatures: resolve(root, flags.signatures) } : flags],
    ['env', fromEnv(context.env ?? process.env, root)],
    ['project', loadProjectConfig(root) ?? {}],
    ['global', loadGlobalConfig(context.home) ?? {}],
  ];

  const pick = <K extends keyof TbforgeConfig>(key: K): [SavedConfig[K] | undefined, ConfigSource] => {
    for (const [source, layer] of layers) {
      const value = layer[key];
      if (value !== undefined) return [value, source];
    }
    return [undefined, 'default'];
  };

  const [scoreFloor, floorSource] = pick('scoreFloor');
  const [acceptThreshold, thresholdSource] = pick('acceptThreshold');
  const [maxStateWidth, widthSource] = pick('maxStateWidth');
  const [signatures, signaturesSource] = pick('signatures');
  const [allowRoleDefaults, defaultsSource] = pick('allowRoleDefaults');

  const config: TbforgeConfig = {
    scoreFloor: scoreFloor ?? DEFAULT_CONFIG.scoreFloor,
    acceptThreshold: acceptThreshold ?? DEFAULT_CONFIG.acceptThreshold,
    maxStateWidth: maxStateWidth ?? DEFAULT_CONFIG.maxStateWidth,
    allowRoleDefaults: allowRoleDefaults ?? DEFAULT_CONFIG.allowRoleDefaults,
  };
  if (signatures !== undefined) config.signatures = signatures;

  return {
    config,
    sources: {
      scoreFloor: floorSource,
      acceptThreshold: thresholdSource,
      maxStateWidth: widthSource,
      signatures: signaturesSource,
      allowRoleDefaults: defaultsSource,
    },
  };
}

// ─── Display helpers ─────────────────────────────────────────────────

/** Human label for where a setting came from */
export function describeConfigSource(source: ConfigSource): string {
  switch (source) {
    case 'flag': return 'CLI flag';
    case 'env': return 'environment';
    case 'project': return `.tbforge/${CONFIG_FILE}`;
    case 'global': return `~/.config/tbforge/${CONFIG_FILE}`;
    case 'default': return 'default';
  }
}
