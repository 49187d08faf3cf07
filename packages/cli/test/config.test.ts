import { mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError, loadConfig, parseEnvFile } from '../src/config';
import { createCasesDir, removeDir } from './helpers';

describe('parseEnvFile', () => {
  it('reads keys, skipping comments and blank lines', () => {
    const content = '# settings\n\nTESSERA_UNDEFINED=strict\n  TESSERA_CASES_DIR = "fixtures dir"  \nNOT_A_PAIR\n';

    expect(parseEnvFile(content)).toEqual({
      TESSERA_UNDEFINED: 'strict',
      TESSERA_CASES_DIR: 'fixtures dir',
    });
  });

  it('strips matching single quotes only', () => {
    expect(parseEnvFile(`A='x'\nB="y'\nC="`)).toEqual({ A: 'x', B: `"y'`, C: '"' });
  });
});

describe('loadConfig', () => {
  let root: string;

  beforeEach(async () => {
    root = await createCasesDir({});
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('uses defaults without a .env file', () => {
    expect(loadConfig(root, {})).toEqual({
      casesDir: resolve(root, 'cases'),
      undefinedBehavior: 'lenient',
      logEnvironment: 'production',
      autoescape: undefined,
    });
  });

  it('finds .env in a parent directory and resolves paths against it', async () => {
    const nested = join(root, 'a', 'b');
    await mkdir(nested, { recursive: true });
    await writeFile(
      join(root, '.env'),
      'TESSERA_CASES_DIR=fixtures\nTESSERA_UNDEFINED=strict\nTESSERA_AUTOESCAPE=false\n',
      'utf8',
    );

    const config = loadConfig(nested, {});

    expect(config.casesDir).toBe(join(root, 'fixtures'));
    expect(config.undefinedBehavior).toBe('strict');
    expect(config.autoescape).toBe(false);
  });

  it('lets the process environment override the .env file', async () => {
    await writeFile(join(root, '.env'), 'TESSERA_UNDEFINED=strict\nTESSERA_CASES_DIR=fixtures\n', 'utf8');

    const config = loadConfig(root, { TESSERA_UNDEFINED: 'lenient', TESSERA_CASES_DIR: 'other', TESSERA_LOG_LEVEL_ENV: 'test' });

    expect(config.undefinedBehavior).toBe('lenient');
    expect(config.casesDir).toBe(join(root, 'other'));
    expect(config.logEnvironment).toBe('test');
  });

  it('ignores empty process variables', async () => {
    await writeFile(join(root, '.env'), 'TESSERA_UNDEFINED=strict\n', 'utf8');

    expect(loadConfig(root, { TESSERA_UNDEFINED: '' }).undefinedBehavior).toBe('strict');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig(root, { TESSERA_UNDEFINED: 'loose' })).toThrow(ConfigError);
    expect(() => loadConfig(root, { TESSERA_AUTOESCAPE: 'yes' })).toThrow(/^Invalid configuration: TESSERA_AUTOESCAPE: /);
  });
});
