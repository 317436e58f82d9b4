import test from 'node:test';
import assert from 'node:assert/strict';
import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import {
  CONFIG_FILE_NAME,
  createAnalysisConfig,
  DEFAULT_CONFIG,
  findConfigFile,
  loadAnalysisConfig,
} from '../src/core/config';
import { ConfigError } from '../src/core/errors';

test('defaults match the documented thresholds', () => {
  assert.deepEqual(DEFAULT_CONFIG.smells, {
    long_function_lines: 50,
    too_many_params: 5,
    deep_nesting_level: 4,
    god_class_methods: 20,
  });
  assert.equal(DEFAULT_CONFIG.security.min_secret_length, 6);
  assert.deepEqual(DEFAULT_CONFIG.security.shell_rule, {
    module: 'subprocess',
    functions: ['run', 'call', 'Popen'],
    keyword: 'shell',
  });
});

test('overrides replace single fields and keep the rest', () => {
  const config = createAnalysisConfig({ smells: { too_many_params: 3 }, security: { min_secret_length: 10 } });
  assert.equal(config.smells.too_many_params, 3);
  assert.equal(config.smells.long_function_lines, 50);
  assert.equal(config.security.min_secret_length, 10);
  assert.deepEqual(config.security.dangerous_calls, DEFAULT_CONFIG.security.dangerous_calls);
});

test('configuration objects are frozen', () => {
  assert.ok(Object.isFrozen(DEFAULT_CONFIG));
  assert.ok(Object.isFrozen(DEFAULT_CONFIG.smells));
  assert.ok(Object.isFrozen(DEFAULT_CONFIG.security.risky_modules));
});

test('invalid configuration is rejected with its issues', () => {
  assert.throws(
    () => createAnalysisConfig({ smells: { bogus: 1 } }),
    (e: unknown) => e instanceof ConfigError && e.issues[0]?.code === 'unrecognized_keys',
  );
  assert.throws(
    () => createAnalysisConfig({ smells: { long_function_lines: 0 } }),
    (e: unknown) => e instanceof ConfigError && e.issues[0]?.path === 'smells.long_function_lines',
  );
  assert.throws(
    () => createAnalysisConfig({ security: { secret_patterns: ['('] } }),
    (e: unknown) => e instanceof ConfigError && e.issues[0]?.message === 'Invalid regular expression',
  );
});

test('loadAnalysisConfig layers file values under explicit overrides', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pydelta-config-'));
  try {
    const file = path.join(dir, CONFIG_FILE_NAME);
    await fs.writeJSON(file, { smells: { long_function_lines: 30, too_many_params: 8 } });
    const config = await loadAnalysisConfig(file, { smells: { too_many_params: 2 } });
    assert.deepEqual(config.smells, {
      long_function_lines: 30,
      too_many_params: 2,
      deep_nesting_level: 4,
      god_class_methods: 20,
    });

    const broken = path.join(dir, 'broken.json');
    await fs.writeFile(broken, '{ not json');
    await assert.rejects(loadAnalysisConfig(broken), (e: unknown) => e instanceof ConfigError && e.message.startsWith('Cannot read config file'));
  } finally {
    await fs.remove(dir);
  }
});

test('findConfigFile prefers the explicit path, then the search directory', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pydelta-find-'));
  try {
    assert.equal(await findConfigFile(dir), null);
    await fs.writeJSON(path.join(dir, CONFIG_FILE_NAME), {});
    assert.equal(await findConfigFile(dir), path.join(dir, CONFIG_FILE_NAME));
    assert.equal(await findConfigFile(dir, 'custom.json'), path.resolve('custom.json'));
  } finally {
    await fs.remove(dir);
  }
});
