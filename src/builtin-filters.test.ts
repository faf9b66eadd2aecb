/**
 * Built-in Filter Tests
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Assigns, FilterContext, FilterDescriptor } from './types.js';
import { BUILTIN_FILTERS } from './builtin-filters.js';
import { FilterRegistry, createDefaultRegistry } from './filters.js';
import { Representation } from './representation.js';
import { RepIndex } from './compiler.js';
import { NotificationCenter } from './events.js';
import { TempFilenameFactory } from './temp-files.js';
import { textItem } from './site.js';

function builtin(name: string): FilterDescriptor {
  const descriptor = BUILTIN_FILTERS[name];
  assert.ok(descriptor !== undefined, `missing built-in filter ${name}`);
  return descriptor;
}

function contextFor(assigns: Assigns, outputFilename = ''): FilterContext {
  return { filterName: 'test', assigns, outputFilename };
}

describe('FilterRegistry', () => {
  it('should list built-in filters in order', () => {
    assert.deepEqual(createDefaultRegistry().names(), [
      'copy',
      'decode-utf8',
      'encode-utf8',
      'normalize-newlines',
      'template',
    ]);
  });

  it('should register and resolve filters', () => {
    const descriptor: FilterDescriptor = { from: 'text', to: 'text', run: (source) => source };
    const registry = new FilterRegistry().register('identity', descriptor);

    assert.equal(registry.resolve('identity'), descriptor);
    assert.equal(registry.has('identity'), true);
    assert.equal(registry.resolve('missing'), undefined);
    assert.equal(registry.has('missing'), false);
  });
});

describe('template filter', () => {
  const template = builtin('template');

  it('should substitute assigns', () => {
    const output = template.run('<h1>{{ title }}</h1>{{count}}', {}, contextFor({ title: 'Home', count: 3 }));

    assert.equal(output, '<h1>Home</h1>3');
  });

  it('should prefer args over assigns', () => {
    const output = template.run('{{ title }}', { title: 'From args' }, contextFor({ title: 'From assigns' }));

    assert.equal(output, 'From args');
  });

  it('should render missing and structured values as nothing', () => {
    const output = template.run('[{{ missing }}][{{ tags }}]', {}, contextFor({ tags: ['a', 'b'] }));

    assert.equal(output, '[][]');
  });

  it('should leave text without placeholders alone', () => {
    assert.equal(template.run('plain { text }', {}, contextFor({})), 'plain { text }');
  });

  describe('with other representations', () => {
    let dir: string;
    let events: NotificationCenter;
    let tempFiles: TempFilenameFactory;
    let other: Representation;
    let feed: Representation;
    let reps: RepIndex;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'rendition-template-'));
      events = new NotificationCenter();
      tempFiles = new TempFilenameFactory(dir);
      const context = { filters: createDefaultRegistry(), events, tempFiles };
      const item = textItem('/other/', 'other content');
      other = new Representation(item, 'default', context);
      feed = new Representation(item, 'feed', context);
      other.paths = { last: '/other/index.html' };
      feed.paths = { last: '/other/feed.xml' };
      reps = new RepIndex([other, feed]);
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should include compiled content', () => {
      other.compiled = true;

      assert.equal(template.run('<{{ include /other/ }}>', {}, contextFor({ reps })), '<other content>');
    });

    it('should hand back an unmet dependency', () => {
      assert.deepEqual(template.run('{{ include /other/ }}', {}, contextFor({ reps })), {
        success: false,
        error: { code: 'UNMET_DEPENDENCY', rep: '/other/ (default)' },
      });
    });

    it('should hand back a missing snapshot', () => {
      other.compiled = true;

      assert.deepEqual(template.run('{{ include /other/ default draft }}', {}, contextFor({ reps })), {
        success: false,
        error: { code: 'NO_SUCH_SNAPSHOT', rep: '/other/ (default)', snapshot: 'draft' },
      });
    });

    it('should link to paths by rep name', () => {
      const output = template.run('{{ path /other/ }} {{ path /other/ feed }}', {}, contextFor({ reps }));

      assert.equal(output, '/other/index.html /other/feed.xml');
    });

    it('should render unknown representations as nothing', () => {
      const output = template.run('[{{ include /nope/ }}][{{ path /other/ amp }}]', {}, contextFor({ reps }));

      assert.equal(output, '[][]');
    });
  });
});

describe('normalize-newlines filter', () => {
  it('should convert CRLF and CR to LF', () => {
    assert.equal(builtin('normalize-newlines').run('a\r\nb\rc\n', {}, contextFor({})), 'a\nb\nc\n');
  });
});

describe('binary filters', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'rendition-binary-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should copy files into the output file', () => {
    const source = join(dir, 'in.bin');
    const output = join(dir, 'out.bin');
    writeFileSync(source, new Uint8Array([4, 5, 6]));

    assert.equal(builtin('copy').run(source, {}, contextFor({}, output)), undefined);
    assert.deepEqual([...readFileSync(output)], [4, 5, 6]);
  });

  it('should decode UTF-8 files', () => {
    const source = join(dir, 'in.txt');
    writeFileSync(source, 'ünïcode', 'utf8');

    assert.equal(builtin('decode-utf8').run(source, {}, contextFor({})), 'ünïcode');
  });

  it('should encode text into the output file', () => {
    const output = join(dir, 'out.txt');

    assert.equal(builtin('encode-utf8').run('ünïcode', {}, contextFor({}, output)), undefined);
    assert.equal(readFileSync(output, 'utf8'), 'ünïcode');
  });
});
