import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  DEFAULT_SKIP_EXTENSIONS,
  loadConfigFile,
  resolveConfig,
  validateSeedUrl,
} from '../config.js';
import { ConfigError } from '../errors.js';

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConfigError) return e.issues;
    throw e;
  }
  throw new Error('expected a ConfigError');
}

describe('resolveConfig', () => {
  it('fills in defaults', () => {
    expect(resolveConfig()).toEqual({
      baseDelay: 2,
      maxRetries: 3,
      timeout: 30,
      maxDepth: 3,
      maxPages: 50,
      exportFormats: ['json'],
      maxConcurrentFetches: 5,
      maxBackoff: 30,
      jitter: 0,
      allowCrossDomain: false,
      includeSubdomains: false,
      respectRobots: true,
      maxCrawlDelay: 30,
      skipExtensions: DEFAULT_SKIP_EXTENSIONS,
    });
  });

  it('keeps supplied values', () => {
    const config = resolveConfig({
      baseDelay: 0.5,
      maxDepth: 0,
      exportFormats: ['csv', 'excel'],
      include: ['/docs/**'],
    });
    expect(config).toMatchObject({
      baseDelay: 0.5,
      maxDepth: 0,
      exportFormats: ['csv', 'excel'],
      include: ['/docs/**'],
    });
  });

  it('lists every invalid field', () => {
    expect(issuesOf(() => resolveConfig({ baseDelay: -1, maxPages: 0, maxRetries: 1.5 }))).toHaveLength(3);
  });

  it('prefixes issues with the field path', () => {
    const [issue] = issuesOf(() => resolveConfig({ exportFormats: ['pdf'] }));
    expect(issue.startsWith('exportFormats.0: ')).toBe(true);
  });

  it('rejects unknown keys', () => {
    const [issue] = issuesOf(() => resolveConfig({ maxDepthh: 2 }));
    expect(issue).toContain('maxDepthh');
  });

  it('rejects an empty format list', () => {
    expect(issuesOf(() => resolveConfig({ exportFormats: [] }))).toHaveLength(1);
  });

  it('rejects malformed skip extensions', () => {
    expect(issuesOf(() => resolveConfig({ skipExtensions: ['pdf'] }))).toEqual([
      'skipExtensions.0: extensions look like ".pdf"',
    ]);
  });

  it('treats null as empty input', () => {
    expect(resolveConfig(null)).toEqual(resolveConfig({}));
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'harvest-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads and validates a JSON file', async () => {
    const path = join(dir, 'config.json');
    await writeFile(path, JSON.stringify({ maxPages: 10, respectRobots: false }));

    expect(loadConfigFile(path)).toMatchObject({ maxPages: 10, respectRobots: false, maxDepth: 3 });
  });

  it('raises ConfigError for invalid JSON', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ not json');

    const [issue] = issuesOf(() => loadConfigFile(path));
    expect(issue.startsWith(`cannot read config file ${path}: `)).toBe(true);
  });

  it('raises ConfigError for a missing file', () => {
    expect(() => loadConfigFile(join(dir, 'absent.json'))).toThrow(ConfigError);
  });

  it('raises ConfigError for invalid values', async () => {
    const path = join(dir, 'config.json');
    await writeFile(path, JSON.stringify({ timeout: 0 }));

    expect(issuesOf(() => loadConfigFile(path))).toHaveLength(1);
  });
});

describe('validateSeedUrl', () => {
  it('accepts http and https URLs', () => {
    expect(validateSeedUrl('https://example.com').href).toBe('https://example.com/');
    expect(validateSeedUrl('http://example.com/a?b=1').href).toBe('http://example.com/a?b=1');
  });

  it('rejects malformed URLs', () => {
    expect(issuesOf(() => validateSeedUrl('example.com'))).toEqual(['malformed URL: example.com']);
  });

  it('rejects other schemes', () => {
    expect(issuesOf(() => validateSeedUrl('file:///etc/hosts'))).toEqual([
      'URL must use http or https: file:///etc/hosts',
    ]);
  });
});
