import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { ConfigError } from '@callflow/parser';
import { parseConfig, loadConfig, applyOverrides, CONFIG_FILENAME } from './loader.js';

describe('parseConfig', () => {
  it('should use defaults for an empty file', () => {
    expect(parseConfig('')).toEqual({
      language: 'go',
      onLexError: 'skip-file',
      truncation: 'lenient',
      extensions: ['.go'],
      layout: 'sfdp',
    });
  });

  it('should read every supported key', () => {
    const config = parseConfig(
      [
        'language: go',
        'onLexError: abort-run',
        'truncation: strict',
        "extensions: ['.go', '.gox']",
        'layout: dot',
      ].join('\n'),
    );

    expect(config).toEqual({
      language: 'go',
      onLexError: 'abort-run',
      truncation: 'strict',
      extensions: ['.go', '.gox'],
      layout: 'dot',
    });
  });

  it('should reject unknown policies', () => {
    expect(() => parseConfig('onLexError: retry')).toThrow(ConfigError);
  });

  it('should reject unknown keys', () => {
    expect(() => parseConfig('verbose: true')).toThrow(ConfigError);
  });

  it('should name the offending key', () => {
    expect(() => parseConfig("extensions: ['go']", 'custom.yml')).toThrow(
      'Invalid config in custom.yml: extensions.0: extensions must look like ".go"',
    );
  });

  it('should reject malformed YAML', () => {
    expect(() => parseConfig('layout: [dot')).toThrow(/^Invalid YAML in \.callflow\.yml/);
  });
});

describe('loadConfig', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'callflow-config-'));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('should return defaults when the default file is missing', async () => {
    const config = await loadConfig({ rootDir: testDir });

    expect(config.onLexError).toBe('skip-file');
  });

  it('should read the default file from the root directory', async () => {
    await fs.writeFile(path.join(testDir, CONFIG_FILENAME), 'layout: neato\n');

    const config = await loadConfig({ rootDir: testDir });

    expect(config.layout).toBe('neato');
  });

  it('should fail when an explicit path is missing', async () => {
    await expect(loadConfig({ configPath: path.join(testDir, 'missing.yml') })).rejects.toBeInstanceOf(
      ConfigError,
    );
  });
});

describe('applyOverrides', () => {
  it('should let switches tighten the policies', () => {
    const config = applyOverrides(parseConfig(''), { abortOnError: true, strict: true });

    expect(config.onLexError).toBe('abort-run');
    expect(config.truncation).toBe('strict');
  });

  it('should keep file settings without switches', () => {
    const config = applyOverrides(parseConfig('onLexError: abort-run'), {});

    expect(config.onLexError).toBe('abort-run');
    expect(config.truncation).toBe('lenient');
  });
});
