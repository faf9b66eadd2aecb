/**
 * Site Loading Tests
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { SiteLoadResult } from './site.js';
import { buildSite, loadSite } from './site.js';

function readFailure(result: SiteLoadResult): { path: string; reason: string } {
  assert.ok(!result.success);
  assert.ok(result.error.code === 'SITE_READ_FAILED');
  return result.error;
}

describe('loadSite', () => {
  let dir: string;
  let sitePath: string;

  function writeSite(site: unknown): void {
    writeFileSync(sitePath, JSON.stringify(site), 'utf-8');
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'rendition-site-'));
    sitePath = join(dir, 'site.json');
    mkdirSync(join(dir, 'content'));
    writeFileSync(join(dir, 'content', 'index.txt'), 'Hello {{ title }}', 'utf-8');
    writeFileSync(join(dir, 'logo.png'), new Uint8Array([137, 80, 78, 71]));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should build items, layouts and reps relative to the site file', async () => {
    writeSite({
      outputDir: 'public',
      layouts: [{ identifier: '/default/', content: '<main>{{ content }}</main>' }],
      items: [
        {
          identifier: '/',
          file: 'content/index.txt',
          attributes: { title: 'Home' },
          reps: [
            { name: 'default', paths: { last: '/index.html' }, rule: [{ filter: 'template' }, { layout: '/default/' }] },
            { name: 'raw', paths: { last: '/index.txt' }, rule: [] },
          ],
        },
        { identifier: '/logo/', file: 'logo.png', binary: true, reps: [{ name: 'default', rule: [] }] },
      ],
    });

    const result = await loadSite(sitePath);

    assert.ok(result.success);
    const { site } = result;
    assert.equal(site.outputDir, join(dir, 'public'));
    assert.deepEqual(site.layouts, [
      { kind: 'layout', identifier: '/default/', rawContent: '<main>{{ content }}</main>', filter: 'template' },
    ]);
    assert.deepEqual(site.items, [
      { kind: 'item', identifier: '/', binary: false, rawContent: 'Hello {{ title }}', attributes: { title: 'Home' } },
      { kind: 'item', identifier: '/logo/', binary: true, rawFilename: join(dir, 'logo.png'), attributes: {} },
    ]);
    assert.deepEqual(
      site.reps.map((rep) => [rep.item.identifier, rep.name, rep.paths]),
      [
        ['/', 'default', { last: '/index.html' }],
        ['/', 'raw', { last: '/index.txt' }],
        ['/logo/', 'default', {}],
      ]
    );
    assert.equal(site.reps[0].item, site.items[0]);
  });

  it('should default the output directory', async () => {
    writeSite({ items: [] });

    const result = await loadSite(sitePath);

    assert.ok(result.success);
    assert.equal(result.site.outputDir, join(dir, 'output'));
  });

  it('should let the caller override the output directory', async () => {
    writeSite({ outputDir: 'public', items: [] });

    const result = await loadSite(sitePath, join(dir, 'elsewhere'));

    assert.ok(result.success);
    assert.equal(result.site.outputDir, join(dir, 'elsewhere'));
  });

  it('should pass validation errors through', async () => {
    writeSite({ items: [{ identifier: 'nope', content: 'x', reps: [] }] });

    const result = await loadSite(sitePath);

    assert.deepEqual(result, {
      success: false,
      error: { code: 'INVALID_SITE', message: 'Identifier must match ^\\/(?:[^/\\s]+\\/)*$', path: 'items[0].identifier' },
    });
  });

  it('should fail on unreadable site files', async () => {
    const failure = readFailure(await loadSite(join(dir, 'missing.json')));

    assert.equal(failure.path, join(dir, 'missing.json'));
    assert.match(failure.reason, /ENOENT/);
  });

  it('should fail on malformed JSON', async () => {
    writeFileSync(sitePath, '{ "items": [', 'utf-8');

    const failure = readFailure(await loadSite(sitePath));

    assert.equal(failure.path, sitePath);
  });

  it('should fail on missing text item files', async () => {
    writeSite({ items: [{ identifier: '/a/', file: 'content/missing.txt', reps: [] }] });

    const failure = readFailure(await loadSite(sitePath));

    assert.equal(failure.path, join(dir, 'content', 'missing.txt'));
  });

  it('should fail on missing binary item files', async () => {
    writeSite({ items: [{ identifier: '/logo/', file: 'missing.png', binary: true, reps: [] }] });

    const failure = readFailure(await loadSite(sitePath));

    assert.equal(failure.path, join(dir, 'missing.png'));
    assert.match(failure.reason, /ENOENT/);
  });

  it('should fail on binary items that name a directory', async () => {
    writeSite({ items: [{ identifier: '/content/', file: 'content', binary: true, reps: [] }] });

    const failure = readFailure(await loadSite(sitePath));

    assert.deepEqual(failure, { path: join(dir, 'content'), reason: 'Not a file' });
  });

  it('should let layout steps name their filter', async () => {
    writeSite({
      layouts: [{ identifier: '/default/', content: '<main>{{ content }}</main>', filter: 'normalize-newlines' }],
      items: [
        {
          identifier: '/',
          content: 'Home',
          reps: [{ name: 'default', rule: [{ layout: '/default/', filter: 'template' }] }],
        },
      ],
    });

    const result = await loadSite(sitePath);

    assert.ok(result.success);
    assert.deepEqual(result.site.reps[0].rule, [{ layout: '/default/', filter: 'template', args: undefined }]);
  });
});

describe('buildSite', () => {
  it('should take inline content and keep rules as given', async () => {
    const result = await buildSite(
      {
        outputDir: '/srv/site',
        items: [{ identifier: '/a/', content: 'a', reps: [{ name: 'default', rule: [{ snapshot: 'raw' }] }] }],
      },
      '/unused'
    );

    assert.ok(result.success);
    assert.equal(result.site.outputDir, '/srv/site');
    assert.deepEqual(result.site.reps[0].rule, [{ snapshot: 'raw' }]);
    assert.deepEqual(result.site.layouts, []);
  });
});
