import * as test from 'node:test';
import * as assert from 'node:assert';
import { resolveDocumentTitle, resolvePageTitle, isUntitled, UNTITLED } from '../titles.js';
import { slugify } from '../parser.js';

const { describe, it } = test;

describe('resolveDocumentTitle', () => {

  it('should use the level-1 heading without deriving an anchor', () => {
    const lines = [':doctype: book', '', '= TAU User Guide', '== Introduction'];
    assert.deepStrictEqual(resolveDocumentTitle(lines), { title: 'TAU User Guide', anchor: '' });
  });

  it('should keep an explicit anchor', () => {
    const lines = ['// generated', '[[users-guide]]', '= TAU User Guide'];
    assert.deepStrictEqual(resolveDocumentTitle(lines), { title: 'TAU User Guide', anchor: 'users-guide' });
  });

  it('should skip deeper headings before the title', () => {
    const lines = ['== Preface', '= Real Title'];
    assert.strictEqual(resolveDocumentTitle(lines).title, 'Real Title');
  });
});

describe('resolvePageTitle', () => {

  it('should use the first heading of level 2 or deeper', () => {
    const lines = ['= Ignored Document Title', 'text', '=== Compiling with TAU', '== Later'];
    assert.deepStrictEqual(resolvePageTitle(lines), {
      title: 'Compiling with TAU',
      anchor: 'compiling-with-tau'
    });
  });

  it('should use a preceding anchor verbatim', () => {
    const lines = ['[[Install_TAU]]', ':sectnums:', '== Installing TAU'];
    assert.deepStrictEqual(resolvePageTitle(lines), { title: 'Installing TAU', anchor: 'Install_TAU' });
  });

  it('should derive anchors that are already slugs', () => {
    const { anchor } = resolvePageTitle(['== Profiling: A Quick Tour']);
    assert.strictEqual(anchor, 'profiling-a-quick-tour');
    assert.strictEqual(slugify(anchor), anchor);
  });
});

describe('untitled pages', () => {

  it('should report Untitled for files without headings', () => {
    const lines = ['Just a paragraph.', 'include::other.adoc[]'];
    assert.deepStrictEqual(resolvePageTitle(lines), { title: UNTITLED, anchor: '' });
    assert.deepStrictEqual(resolveDocumentTitle(lines), { title: UNTITLED, anchor: '' });
    assert.deepStrictEqual(resolvePageTitle([]), { title: UNTITLED, anchor: '' });
  });

  it('should report Untitled for a page with only a document title', () => {
    assert.strictEqual(isUntitled(resolvePageTitle(['= Only A Book Title'])), true);
  });

  it('should treat the sentinel case-insensitively', () => {
    assert.strictEqual(isUntitled({ title: 'untitled', anchor: 'untitled' }), true);
    assert.strictEqual(isUntitled({ title: 'Overview', anchor: 'overview' }), false);
  });
});
