/**
 * Site Loading
 *
 * Turns a site description into items, layouts and rep definitions.
 * Strictly separates file I/O from compilation.
 */

import { readFile, stat } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type {
  Attributes,
  BinaryItem,
  CompilerError,
  Item,
  Layout,
  RuleStep,
  SiteInput,
  TextItem,
} from './types.js';
import { DEFAULT_LAYOUT_FILTER, DEFAULT_OUTPUT_DIR } from './types.js';
import { validateSite } from './validate.js';

export interface RepDefinition {
  item: Item;
  name: string;
  /** Snapshot name to public path */
  paths: Record<string, string>;
  rule: RuleStep[];
}

export interface Site {
  /** Absolute */
  outputDir: string;
  items: Item[];
  layouts: Layout[];
  reps: RepDefinition[];
}

export type SiteLoadResult = { success: true; site: Site } | { success: false; error: CompilerError };

export function textItem(identifier: string, content: string, attributes: Attributes = {}): TextItem {
  return { kind: 'item', identifier, binary: false, rawContent: content, attributes };
}

export function binaryItem(identifier: string, filename: string, attributes: Attributes = {}): BinaryItem {
  return { kind: 'item', identifier, binary: true, rawFilename: filename, attributes };
}

export function createLayout(identifier: string, content: string, filter: string = DEFAULT_LAYOUT_FILTER): Layout {
  return { kind: 'layout', identifier, rawContent: content, filter };
}

function errorReason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Build a site from a validated description. Relative paths are resolved
 * against `baseDir`; text items given by file are read here, binary ones
 * only checked for existence.
 */
export async function buildSite(input: SiteInput, baseDir: string): Promise<SiteLoadResult> {
  const layouts = (input.layouts ?? []).map((layout) =>
    createLayout(layout.identifier, layout.content, layout.filter)
  );

  const items: Item[] = [];
  const reps: RepDefinition[] = [];

  for (const itemInput of input.items) {
    let item: Item;
    const attributes = itemInput.attributes ?? {};

    if (itemInput.file !== undefined) {
      const filename = resolve(baseDir, itemInput.file);
      if (itemInput.binary === true) {
        // Binary content is only read when written or filtered
        let reason: string | undefined;
        try {
          if (!(await stat(filename)).isFile()) reason = 'Not a file';
        } catch (error) {
          reason = errorReason(error);
        }
        if (reason !== undefined) {
          return { success: false, error: { code: 'SITE_READ_FAILED', path: filename, reason } };
        }
        item = binaryItem(itemInput.identifier, filename, attributes);
      } else {
        try {
          item = textItem(itemInput.identifier, await readFile(filename, 'utf-8'), attributes);
        } catch (error) {
          return { success: false, error: { code: 'SITE_READ_FAILED', path: filename, reason: errorReason(error) } };
        }
      }
    } else {
      item = textItem(itemInput.identifier, itemInput.content ?? '', attributes);
    }

    items.push(item);
    for (const rep of itemInput.reps) {
      reps.push({ item, name: rep.name, paths: rep.paths ?? {}, rule: rep.rule });
    }
  }

  return {
    success: true,
    site: {
      outputDir: resolve(baseDir, input.outputDir ?? DEFAULT_OUTPUT_DIR),
      items,
      layouts,
      reps,
    },
  };
}

/**
 * Load, validate and build a site from a JSON file.
 *
 * @param outputDir Overrides the output directory named in the file
 */
export async function loadSite(path: string, outputDir?: string): Promise<SiteLoadResult> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    return { success: false, error: { code: 'SITE_READ_FAILED', path, reason: errorReason(error) } };
  }

  const validation = validateSite(parsed);
  if (!validation.valid) {
    return { success: false, error: validation.error };
  }

  const input: SiteInput =
    outputDir === undefined ? validation.value : { ...validation.value, outputDir: resolve(outputDir) };
  return buildSite(input, dirname(resolve(path)));
}
