import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { loadConfig, parseConfigFile, resolveConfig, DEFAULTS } from '../config.js';
import { NavConfigError } from '../errors.js';

const { describe, it, beforeEach, afterEach } = test;

describe('resolveConfig', () => {

  it('should apply the Antora defaults', () => {
    const config = resolveConfig({}, '/project');

    assert.strictEqual(config.pagesDir, '/project/src/modules/ROOT/pages');
    assert.strictEqual(config.partialsDir, '/project/src/modules/ROOT/partials');
    assert.strictEqual(config.navFile, '/project/src/modules/ROOT/nav.adoc');
    assert.deepStrictEqual(config.masters, DEFAULTS.masters);
    assert.strictEqual(config.maxDepth, 4);
    assert.deepStrictEqual(config.sectionLevels, [3]);
    assert.ok(config.ignoredTitles.includes('see also'));
  });

  it('should resolve overrides against the module root', () => {
    const config = resolveConfig({ moduleRoot: 'docs', pagesDir: 'content', maxDepth: 3 }, '/project');

    assert.strictEqual(config.pagesDir, '/project/docs/content');
    assert.strictEqual(config.navFile, '/project/docs/nav.adoc');
    assert.strictEqual(config.maxDepth, 3);
  });
});

describe('parseConfigFile', () => {

  it('should accept a valid file', () => {
    const parsed = parseConfigFile({
      masters: ['a/a.adoc'],
      aliases: { 'a.adoc': { 'shared/x.adoc': 'a/x-alias.adoc' } }
    }, 'test.json');

    assert.deepStrictEqual(parsed.masters, ['a/a.adoc']);
  });

  it('should list every invalid field', () => {
    assert.throws(
      () => parseConfigFile({ masters: [], maxDepth: 0 }, 'test.json'),
      (err: unknown) => err instanceof NavConfigError &&
        err.message.startsWith('Invalid configuration in test.json:\n') &&
        err.message.includes('  masters: At least one master file is required') &&
        err.message.includes('  maxDepth: ')
    );
  });

  it('should reject unknown keys', () => {
    assert.throws(() => parseConfigFile({ master: ['a.adoc'] }, 'test.json'), NavConfigError);
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'navgen-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should fall back to defaults without a config file', async () => {
    const config = await loadConfig(tempDir);
    assert.strictEqual(config.pagesDir, path.join(tempDir, 'src/modules/ROOT/pages'));
  });

  it('should read navgen.config.json', async () => {
    fs.writeFileSync(path.join(tempDir, 'navgen.config.json'), JSON.stringify({ masters: ['one/one.adoc'] }));

    const config = await loadConfig(tempDir);

    assert.deepStrictEqual(config.masters, ['one/one.adoc']);
  });

  it('should fail on a missing explicit config file', async () => {
    await assert.rejects(loadConfig(tempDir, 'custom.json'), NavConfigError);
  });

  it('should fail on malformed JSON', async () => {
    fs.writeFileSync(path.join(tempDir, 'navgen.config.json'), '{ "masters": [');
    await assert.rejects(loadConfig(tempDir), NavConfigError);
  });
});
