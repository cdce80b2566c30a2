import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  DEFAULT_CONFIG, describeConfigSource, globalConfigPath, projectConfigPath, resolveConfig,
} from '../src/config/index.js';

let root: string;
let home: string;

function writeJson(path: string, content: unknown): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, typeof content === 'string' ? content : JSON.stringify(content));
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'tbforge-root-'));
  home = mkdtempSync(join(tmpdir(), 'tbforge-home-'));
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
  rmSync(home, { recursive: true, force: true });
});

describe('resolveConfig', () => {
  it('falls back to defaults when nothing is set', () => {
    const { config, sources } = resolveConfig(root, {}, { env: {}, home });
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(Object.values(sources)).toEqual(['default', 'default', 'default', 'default', 'default']);
  });

  it('resolves each setting through flags, env, project and global config', () => {
    writeJson(globalConfigPath(home), { scoreFloor: 0.3, acceptThreshold: 0.7, maxStateWidth: 4 });
    writeJson(projectConfigPath(root), { scoreFloor: 0.4, signatures: 'sigs.json' });

    const { config, sources } = resolveConfig(
      root,
      { maxStateWidth: 6 },
      { env: { TBFORGE_ACCEPT_THRESHOLD: '0.9', TBFORGE_ROLE_DEFAULTS: ' ' }, home },
    );
    expect(config).toEqual({
      scoreFloor: 0.4,
      acceptThreshold: 0.9,
      maxStateWidth: 6,
      signatures: join(root, '.tbforge', 'sigs.json'),
      allowRoleDefaults: false,
    });
    expect(sources).toEqual({
      scoreFloor: 'project',
      acceptThreshold: 'env',
      maxStateWidth: 'flag',
      signatures: 'project',
      allowRoleDefaults: 'default',
    });
  });

  it('resolves flag and env signature paths against the project root', () => {
    expect(resolveConfig(root, { signatures: 'custom.json' }, { env: {}, home }).config.signatures)
      .toBe(join(root, 'custom.json'));
    expect(resolveConfig(root, {}, { env: { TBFORGE_SIGNATURES: 'env/sigs.json' }, home }).config.signatures)
      .toBe(join(root, 'env', 'sigs.json'));
  });

  it('reads boolean env values loosely', () => {
    const { config, sources } = resolveConfig(root, {}, { env: { TBFORGE_ROLE_DEFAULTS: 'YES' }, home });
    expect(config.allowRoleDefaults).toBe(true);
    expect(sources.allowRoleDefaults).toBe('env');
  });

  it('rejects env values out of range', () => {
    expect(() => resolveConfig(root, {}, { env: { TBFORGE_SCORE_FLOOR: '1.5' }, home }))
      .toThrow(/^TBFORGE_SCORE_FLOOR=1\.5 is not valid/);
    expect(() => resolveConfig(root, {}, { env: { TBFORGE_ROLE_DEFAULTS: 'maybe' }, home }))
      .toThrow('TBFORGE_ROLE_DEFAULTS=maybe is not a boolean');
  });

  it('rejects malformed config files', () => {
    writeJson(projectConfigPath(root), { colour: 'blue' });
    expect(() => resolveConfig(root, {}, { env: {}, home })).toThrow(/Unrecognized key/);

    writeJson(projectConfigPath(root), '{ not json');
    expect(() => resolveConfig(root, {}, { env: {}, home })).toThrow(/^Cannot read config /);
  });
});

describe('describeConfigSource', () => {
  it('names where a setting came from', () => {
    expect(describeConfigSource('flag')).toBe('CLI flag');
    expect(describeConfigSource('project')).toBe('.tbforge/config.json');
    expect(describeConfigSource('global')).toBe('~/.config/tbforge/config.json');
  });
});
