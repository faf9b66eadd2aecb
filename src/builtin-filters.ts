/**
 * Built-in Filters
 *
 * A small set of filters that ship with the compiler. Anything richer
 * (markdown, image processing, ...) is registered by the caller.
 */

import { copyFileSync, readFileSync, writeFileSync } from 'node:fs';
import type {
  Assigns,
  Failure,
  FilterArgs,
  FilterContext,
  FilterDescriptor,
  FilterOutput,
} from './types.js';
import { DEFAULT_REP_NAME } from './types.js';
import { normalizeLineEndings } from './measure.js';

const PLACEHOLDER = /\{\{\s*(.*?)\s*\}\}/g;

function renderValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return '';
}

/**
 * Expand one placeholder expression.
 *
 * - `include <identifier> [rep] [snapshot]`: compiled content of another rep
 * - `path <identifier> [rep]`: public path of another rep
 * - anything else: a key looked up in args, then in assigns
 */
function expand(expression: string, args: FilterArgs, assigns: Assigns): string | Failure {
  const [keyword, identifier, repName, snapshot] = expression.split(/\s+/);

  if ((keyword === 'include' || keyword === 'path') && identifier !== undefined) {
    const rep = assigns.reps?.find(identifier, repName ?? DEFAULT_REP_NAME);
    if (rep === undefined) return '';
    if (keyword === 'path') return rep.path() ?? '';

    const result = rep.compiledContent(snapshot);
    return result.success ? result.content : result;
  }

  return renderValue(args[expression] ?? assigns[expression]);
}

function renderTemplate(source: string, args: FilterArgs, context: FilterContext): FilterOutput {
  let rendered = '';
  let lastIndex = 0;

  for (const match of source.matchAll(PLACEHOLDER)) {
    const index = match.index ?? 0;
    rendered += source.slice(lastIndex, index);

    const expansion = expand(match[1], args, context.assigns);
    if (typeof expansion !== 'string') return expansion;

    rendered += expansion;
    lastIndex = index + match[0].length;
  }

  return rendered + source.slice(lastIndex);
}

export const BUILTIN_FILTERS: Readonly<Record<string, FilterDescriptor>> = {
  template: {
    from: 'text',
    to: 'text',
    description: 'Substitutes {{ key }}, {{ include /id/ }} and {{ path /id/ }} placeholders',
    run: renderTemplate,
  },

  'normalize-newlines': {
    from: 'text',
    to: 'text',
    description: 'Converts CRLF and CR line endings to LF',
    run: (source) => normalizeLineEndings(source),
  },

  copy: {
    from: 'binary',
    to: 'binary',
    description: 'Copies binary content unchanged',
    run: (source, _args, context) => {
      copyFileSync(source, context.outputFilename);
      return undefined;
    },
  },

  'decode-utf8': {
    from: 'binary',
    to: 'text',
    description: 'Reads binary content as UTF-8 text',
    run: (source) => readFileSync(source, 'utf8'),
  },

  'encode-utf8': {
    from: 'text',
    to: 'binary',
    description: 'Writes text content as UTF-8 bytes',
    run: (source, _args, context) => {
      writeFileSync(context.outputFilename, source, 'utf8');
      return undefined;
    },
  },
};
