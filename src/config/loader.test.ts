/**
 * Tests for config loading.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigValidationError, loadConfig, parseConfig } from './loader.js';
import { DEFAULT_CONFIG } from './types.js';

function validationError(fn: () => unknown): ConfigValidationError | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof ConfigValidationError ? err : undefined;
  }
  return undefined;
}

describe('parseConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('returns the defaults for an empty document', () => {
    expect(parseConfig('')).toEqual(DEFAULT_CONFIG);
  });

  it('merges sections over the defaults', () => {
    const config = parseConfig(
      ['jsonld:', '  prefixes:', '    ex: https://ex.org/', 'logLevel: debug'].join('\n')
    );

    expect(config).toEqual({
      namespace: { baseUri: 'http://example.com/', prefix: 'base' },
      jsonld: { prefixes: { ex: 'https://ex.org/' } },
      registry: { duplicatePolicy: 'overwrite' },
      graph: { requireKnownClasses: false },
      logLevel: 'debug',
    });
  });

  it('substitutes environment variables and their defaults', () => {
    vi.stubEnv('CG_TEST_BASE', 'https://env.example.org/');

    const config = parseConfig(
      ['namespace:', '  baseUri: ${CG_TEST_BASE}', '  prefix: ${CG_TEST_PREFIX_UNSET:-env}'].join('\n')
    );

    expect(config.namespace).toEqual({ baseUri: 'https://env.example.org/', prefix: 'env' });
  });

  it('reads substituted booleans', () => {
    vi.stubEnv('CG_TEST_STRICT', 'true');

    expect(parseConfig('graph:\n  requireKnownClasses: ${CG_TEST_STRICT}').graph.requireKnownClasses).toBe(true);
    expect(parseConfig('graph:\n  requireKnownClasses: ${CG_TEST_LAX_UNSET:-false}').graph.requireKnownClasses).toBe(
      false
    );
  });

  it('names the offending path and value', () => {
    const err = validationError(() => parseConfig('registry:\n  duplicatePolicy: ignore'));

    expect(err?.code).toBe('CONFIG_INVALID');
    expect(err?.path).toBe('registry.duplicatePolicy');
    expect(err?.value).toBe('ignore');
    expect(err?.message.startsWith("Config validation error at 'registry.duplicatePolicy': ")).toBe(true);
  });

  it('rejects unknown keys', () => {
    const err = validationError(() => parseConfig('colour: blue'));

    expect(err?.path).toBe('');
    expect(err?.value).toEqual({ colour: 'blue' });
  });

  it('rejects a base URI that is not a URL', () => {
    const err = validationError(() => parseConfig('namespace:\n  baseUri: not a url'));

    expect(err?.path).toBe('namespace.baseUri');
    expect(err?.value).toBe('not a url');
  });

  it('wraps YAML syntax errors', () => {
    const err = validationError(() => parseConfig('namespace: [unclosed'));

    expect(err?.path).toBe('');
    expect(err?.message.startsWith("Config validation error at '': invalid YAML: ")).toBe(true);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'crate-graph-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('falls back to the defaults when the file is missing', async () => {
    await expect(loadConfig({ configPath: join(dir, 'missing.yaml') })).resolves.toEqual(DEFAULT_CONFIG);
  });

  it('loads a file from disk', async () => {
    const configPath = join(dir, 'crate-graph.yaml');
    await writeFile(configPath, ['namespace:', '  prefix: lab', 'registry:', '  duplicatePolicy: reject'].join('\n'));

    const config = await loadConfig({ configPath });
    expect(config.namespace).toEqual({ baseUri: 'http://example.com/', prefix: 'lab' });
    expect(config.registry.duplicatePolicy).toBe('reject');
  });
});
