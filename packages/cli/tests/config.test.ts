import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError, expandEnvVars, loadConfig, parseConfig } from '../src/config.js';

describe('expandEnvVars', () => {
  const env = { HOST: 'db.internal', EMPTY: '' };

  it('expands placeholders in nested strings', () => {
    expect(expandEnvVars({ a: '${HOST}', b: ['${PORT:-5432}', 'x'], c: 3, d: null }, { env })).toEqual({
      a: 'db.internal',
      b: ['5432', 'x'],
      c: 3,
      d: null,
    });
  });

  it('uses the default for empty variables', () => {
    expect(expandEnvVars('${EMPTY:-fallback}', { env })).toBe('fallback');
  });

  it('fails on missing variables unless allowed', () => {
    expect(() => expandEnvVars('Bearer ${API_TOKEN}', { env })).toThrow(
      new ConfigError('Missing required environment variable: API_TOKEN')
    );
    expect(expandEnvVars('Bearer ${API_TOKEN}', { env, allowMissing: true })).toBe('Bearer ${API_TOKEN}');
  });
});

describe('parseConfig', () => {
  it('applies defaults', () => {
    expect(parseConfig({ source: { endpoint: 'items' } })).toEqual({
      source: { endpoint: 'items', method: 'GET' },
      mapping: {},
    });
  });

  it('resolves mapping options and targets', () => {
    const config = parseConfig({
      source: { baseUrl: 'https://api.example.test', endpoint: 'items' },
      mapping: { options: { titleField: 'name' } },
      target: { type: 'postgresql', table: 'items', primaryKey: 'ref', primaryKeyType: 'VARCHAR', schema: 'imports' },
      logging: { level: 'debug', format: 'json' },
    });

    expect(config.mapping.options).toEqual({
      titleField: 'name',
      contentField: 'content',
      detectImages: true,
      maxDepth: 3,
    });
    expect(config.target).toEqual({
      type: 'postgresql',
      table: 'items',
      primaryKey: 'ref',
      primaryKeyType: 'VARCHAR',
      schema: 'imports',
    });
  });

  it('rejects unsafe table names', () => {
    expect(() =>
      parseConfig({ source: { endpoint: 'items' }, target: { type: 'mysql', table: 'bad-name' } })
    ).toThrow(
      'Invalid config file:\n- target.table: Must be alphanumeric with underscores, starting with a letter or underscore'
    );
  });

  it('rejects unsafe PostgreSQL schema names', () => {
    expect(() =>
      parseConfig({
        source: { endpoint: 'items' },
        target: { type: 'postgresql', table: 'items', schema: 'public; DROP' },
      })
    ).toThrow(
      'Invalid config file:\n- target.schema: Must be alphanumeric with underscores, starting with a letter or underscore'
    );
  });

  it('rejects unknown keys and target types', () => {
    expect(() => parseConfig({ source: { endpoint: 'items' }, extra: true })).toThrow(ConfigError);
    expect(() => parseConfig({ source: { endpoint: 'items' }, target: { type: 'sqlite', table: 'x' } })).toThrow(
      /- target\.type: /
    );
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'schemabridge-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads files with a byte order mark', async () => {
    const path = join(dir, 'config.json');
    const body = JSON.stringify({
      source: { endpoint: 'items', headers: { Authorization: 'Bearer ${API_TOKEN}' } },
    });
    await writeFile(path, `\uFEFF${body}`, 'utf-8');

    const config = await loadConfig(path, { env: { API_TOKEN: 'test-secret' } });

    expect(config.source.headers).toEqual({ Authorization: 'Bearer test-secret' });
  });

  it('reports malformed JSON', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ "source": ', 'utf-8');

    await expect(loadConfig(path)).rejects.toBeInstanceOf(ConfigError);
    await expect(loadConfig(path)).rejects.toThrow(`Config file ${path} is not valid JSON`);
  });
});
