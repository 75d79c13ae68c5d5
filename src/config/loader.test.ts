import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join, resolve } from 'node:path';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { ConfigValidationError, loadConfig, resolveConfig } from './loader.js';
import { DEFAULT_CONFIG } from './types.js';

describe('resolveConfig', () => {
  it('returns the defaults for an empty document', () => {
    expect(resolveConfig(null)).toEqual(DEFAULT_CONFIG);
    expect(resolveConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('merges overrides over the defaults', () => {
    const config = resolveConfig({
      server: { port: 8080, cors: { origins: ['http://lab.local'] } },
      generator: {
        templatePath: './protocols/mixing.py',
        outputDir: './generated',
        template: { multipleRegions: 'first', labelLiteral: '' },
      },
    });
    expect(config.server.port).toBe(8080);
    expect(config.server.host).toBe('0.0.0.0');
    expect(config.server.cors).toEqual({ enabled: true, origins: ['http://lab.local'] });
    expect(config.generator.templatePath).toBe('./protocols/mixing.py');
    expect(config.generator.outputDir).toBe('./generated');
    expect(config.generator.template.multipleRegions).toBe('first');
    expect(config.generator.template.labelLiteral).toBe('');
    expect(config.generator.template.variable).toBe('BO_DATA');
  });

  it('rejects an out-of-range port', () => {
    const act = () => resolveConfig({ server: { port: 70000 } });
    expect(act).toThrow(ConfigValidationError);
    expect(act).toThrow("Config validation error at 'server.port': port must be a number between 1 and 65535");
  });

  it('rejects an unknown log level', () => {
    expect(() => resolveConfig({ server: { logLevel: 'verbose' } })).toThrow(
      "Config validation error at 'server.logLevel': logLevel must be one of: debug, info, warn, error, silent",
    );
  });

  it('rejects a section that is not an object', () => {
    expect(() => resolveConfig({ generator: 'color_mixing.py' })).toThrow(
      "Config validation error at 'generator': must be an object",
    );
  });

  it('rejects an invalid iteration pattern', () => {
    expect(() => resolveConfig({ generator: { iterationPattern: 'BO_R(' } })).toThrow(
      "Config validation error at 'generator.iterationPattern': iterationPattern is not a valid regular expression",
    );
  });

  it('rejects a variable that is not an identifier', () => {
    expect(() => resolveConfig({ generator: { template: { variable: 'BO DATA' } } })).toThrow(
      "Config validation error at 'generator.template.variable': variable must be an identifier",
    );
  });
});

describe('loadConfig', () => {
  const testDir = resolve(process.cwd(), 'tmp/config-test');
  const configPath = join(testDir, 'config.yaml');

  beforeEach(async () => {
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  it('loads YAML with environment substitution', async () => {
    vi.stubEnv('BO_TEST_PORT', '4010');
    await writeFile(
      configPath,
      [
        'server:',
        '  port: "${BO_TEST_PORT}"',
        '  cors:',
        '    enabled: false',
        'generator:',
        '  templatePath: "${BO_TEST_UNSET_TEMPLATE:-./fallback.py}"',
        '  iterationPattern: "round_(\\\\d+)"',
        '',
      ].join('\n'),
    );

    const config = await loadConfig({ configPath });

    expect(config.server.port).toBe(4010);
    expect(config.server.cors.enabled).toBe(false);
    expect(config.generator.templatePath).toBe('./fallback.py');
    expect(config.generator.iterationPattern).toBe('round_(\\d+)');
  });

  it('falls back to the defaults when the file is missing', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const config = await loadConfig({ configPath: join(testDir, 'missing.yaml') });
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(warn).toHaveBeenCalledWith(`Config file not found at ${join(testDir, 'missing.yaml')}, using defaults`);
  });

  it('reports YAML syntax errors', async () => {
    await writeFile(configPath, 'server: [\n');
    await expect(loadConfig({ configPath })).rejects.toThrow('Failed to parse config file: ');
  });
});
