import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { ConfigError } from '../../src/analyzer/errors.js';
import { DEFAULT_EXCLUDE, findConfigFile, resolveConfig } from '../../src/cli/config.js';

describe('Config resolution', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), 'deadrun-config-'));
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  it('should apply defaults', () => {
    const config = resolveConfig(cwd, {}, {});
    expect(config).toEqual({
      cwd: resolve(cwd),
      traceDir: resolve(cwd, '.deadrun'),
      exclude: DEFAULT_EXCLUDE,
      numlines: 25,
      sortBy: 'cumtime',
      nameWidth: 28,
      nodeArgs: [],
    });
  });

  it('should take the trace directory from the environment', () => {
    const config = resolveConfig(cwd, {}, { DEADRUN_DIR: 'cache/traces' });
    expect(config.traceDir).toBe(resolve(cwd, 'cache/traces'));
  });

  it('should prefer the --dir option over the environment', () => {
    const config = resolveConfig(cwd, { dir: '/explicit' }, { DEADRUN_DIR: '/from-env' });
    expect(config.traceDir).toBe('/explicit');
  });

  it('should load a YAML config file from the working directory', () => {
    writeFileSync(
      join(cwd, 'deadrun.config.yaml'),
      ['numlines: 10', 'sortBy: tottime', 'exclude:', '  - vendor/**', 'nodeArgs:', '  - --import=tsx', ''].join('\n')
    );

    const config = resolveConfig(cwd, {}, {});
    expect(findConfigFile(cwd)).toBe(join(cwd, 'deadrun.config.yaml'));
    expect(config.numlines).toBe(10);
    expect(config.sortBy).toBe('tottime');
    expect(config.exclude).toEqual([...DEFAULT_EXCLUDE, 'vendor/**']);
    expect(config.nodeArgs).toEqual(['--import=tsx']);
  });

  it('should let CLI options override the config file', () => {
    writeFileSync(join(cwd, 'deadrun.config.json'), JSON.stringify({ numlines: 10, sortBy: 'tottime', traceDir: 'from-file' }));

    const config = resolveConfig(cwd, { numlines: '5', sortby: 'NCALLS', exclude: ['gen/**'], nodeArg: ['--trace-warnings'] }, {});
    expect(config.numlines).toBe(5);
    expect(config.sortBy).toBe('ncalls');
    expect(config.traceDir).toBe(resolve(cwd, 'from-file'));
    expect(config.exclude).toEqual([...DEFAULT_EXCLUDE, 'gen/**']);
    expect(config.nodeArgs).toEqual(['--trace-warnings']);
  });

  it('should load an explicitly named config file', () => {
    writeFileSync(join(cwd, 'custom.json'), JSON.stringify({ nameWidth: 40 }));
    expect(resolveConfig(cwd, { config: 'custom.json' }, {}).nameWidth).toBe(40);
  });

  it('should reject a missing explicit config file', () => {
    expect(() => resolveConfig(cwd, { config: 'absent.json' }, {})).toThrow(ConfigError);
  });

  it('should reject invalid values', () => {
    expect(() => resolveConfig(cwd, { numlines: '0' }, {})).toThrow(ConfigError);
    expect(() => resolveConfig(cwd, { numlines: 'many' }, {})).toThrow(ConfigError);
    expect(() => resolveConfig(cwd, { sortby: 'fastest' }, {})).toThrow(ConfigError);
  });

  it('should reject a config file with the wrong types', () => {
    writeFileSync(join(cwd, 'deadrun.config.json'), JSON.stringify({ numlines: 'ten' }));
    expect(() => resolveConfig(cwd, {}, {})).toThrow('Invalid');
  });
});
