/**
 * Site Validation
 *
 * Validates a parsed site description before anything is built from it.
 * All validation is strict - no coercion. The first error wins.
 */

import type {
  CompilerError,
  ItemInput,
  LayoutInput,
  RepInput,
  RuleStep,
  SiteInput,
} from './types.js';

/** Identifier pattern: starts and ends with a slash, e.g. `/`, `/blog/first/` */
const IDENTIFIER_PATTERN = /^\/(?:[^/\s]+\/)*$/;

/** Public path pattern: absolute, no whitespace, no parent segments */
const PUBLIC_PATH_PATTERN = /^(?!.*\/\.\.(?:\/|$))\/\S*$/;

/**
 * Result of validation.
 */
export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; error: CompilerError };

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(message: string, path: string): { valid: false; error: CompilerError } {
  return { valid: false, error: { code: 'INVALID_SITE', message, path } };
}

function optionalString(fields: Fields, key: string): string | undefined | null {
  const value = fields[key];
  if (value === undefined) return undefined;
  return typeof value === 'string' ? value : null;
}

/**
 * Validate a complete site description.
 */
export function validateSite(input: unknown): ValidationResult<SiteInput> {
  if (!isRecord(input)) {
    return invalid('Site must be an object', '$');
  }

  const outputDir = optionalString(input, 'outputDir');
  if (outputDir === null || outputDir === '') {
    return invalid('outputDir must be a non-empty string', 'outputDir');
  }

  const layouts: LayoutInput[] = [];
  if (input.layouts !== undefined) {
    if (!Array.isArray(input.layouts)) {
      return invalid('layouts must be an array', 'layouts');
    }
    const seen = new Set<string>();
    for (let i = 0; i < input.layouts.length; i++) {
      const result = validateLayout(input.layouts[i], `layouts[${i}]`);
      if (!result.valid) return result;
      if (seen.has(result.value.identifier)) {
        return invalid(`Duplicate layout identifier: ${result.value.identifier}`, `layouts[${i}].identifier`);
      }
      seen.add(result.value.identifier);
      layouts.push(result.value);
    }
  }

  if (!Array.isArray(input.items)) {
    return invalid('items must be an array', 'items');
  }
  const items: ItemInput[] = [];
  const seen = new Set<string>();
  for (let i = 0; i < input.items.length; i++) {
    const result = validateItem(input.items[i], `items[${i}]`);
    if (!result.valid) return result;
    if (seen.has(result.value.identifier)) {
      return invalid(`Duplicate item identifier: ${result.value.identifier}`, `items[${i}].identifier`);
    }
    seen.add(result.value.identifier);
    items.push(result.value);
  }

  return { valid: true, value: { outputDir, layouts, items } };
}

/**
 * Validate an item or layout identifier.
 */
export function validateIdentifier(identifier: unknown, path: string): ValidationResult<string> {
  if (typeof identifier !== 'string' || !IDENTIFIER_PATTERN.test(identifier)) {
    return invalid(`Identifier must match ${IDENTIFIER_PATTERN.source}`, path);
  }
  return { valid: true, value: identifier };
}

function validateLayout(input: unknown, path: string): ValidationResult<LayoutInput> {
  if (!isRecord(input)) {
    return invalid('Layout must be an object', path);
  }

  const identifier = validateIdentifier(input.identifier, `${path}.identifier`);
  if (!identifier.valid) return identifier;

  if (typeof input.content !== 'string') {
    return invalid('Layout content must be a string', `${path}.content`);
  }

  const filter = optionalString(input, 'filter');
  if (filter === null) {
    return invalid('Layout filter must be a string', `${path}.filter`);
  }

  return {
    valid: true,
    value: { identifier: identifier.value, content: input.content, filter },
  };
}

function validateItem(input: unknown, path: string): ValidationResult<ItemInput> {
  if (!isRecord(input)) {
    return invalid('Item must be an object', path);
  }

  const identifier = validateIdentifier(input.identifier, `${path}.identifier`);
  if (!identifier.valid) return identifier;

  const content = optionalString(input, 'content');
  const file = optionalString(input, 'file');
  if (content === null) return invalid('content must be a string', `${path}.content`);
  if (file === null) return invalid('file must be a string', `${path}.file`);
  if ((content === undefined) === (file === undefined)) {
    return invalid('Exactly one of content and file is required', path);
  }

  if (input.binary !== undefined && typeof input.binary !== 'boolean') {
    return invalid('binary must be a boolean', `${path}.binary`);
  }
  const binary = input.binary === true;
  if (binary && file === undefined) {
    return invalid('Binary items must be given by file', `${path}.content`);
  }

  let attributes: Record<string, unknown> = {};
  if (input.attributes !== undefined) {
    if (!isRecord(input.attributes)) {
      return invalid('attributes must be an object', `${path}.attributes`);
    }
    attributes = input.attributes;
  }

  if (!Array.isArray(input.reps)) {
    return invalid('reps must be an array', `${path}.reps`);
  }
  const reps: RepInput[] = [];
  const names = new Set<string>();
  for (let i = 0; i < input.reps.length; i++) {
    const result = validateRep(input.reps[i], `${path}.reps[${i}]`);
    if (!result.valid) return result;
    if (names.has(result.value.name)) {
      return invalid(`Duplicate rep name: ${result.value.name}`, `${path}.reps[${i}].name`);
    }
    names.add(result.value.name);
    reps.push(result.value);
  }

  return {
    valid: true,
    value: { identifier: identifier.value, content, file, binary, attributes, reps },
  };
}

function validateRep(input: unknown, path: string): ValidationResult<RepInput> {
  if (!isRecord(input)) {
    return invalid('Rep must be an object', path);
  }

  if (typeof input.name !== 'string' || input.name.length === 0) {
    return invalid('Rep name must be a non-empty string', `${path}.name`);
  }

  const paths: Record<string, string> = {};
  if (input.paths !== undefined) {
    if (!isRecord(input.paths)) {
      return invalid('paths must be an object', `${path}.paths`);
    }
    for (const [snapshot, publicPath] of Object.entries(input.paths)) {
      if (typeof publicPath !== 'string' || !PUBLIC_PATH_PATTERN.test(publicPath)) {
        return invalid('Path must be absolute, without whitespace or ".." segments', `${path}.paths.${snapshot}`);
      }
      paths[snapshot] = publicPath;
    }
  }

  if (!Array.isArray(input.rule)) {
    return invalid('rule must be an array', `${path}.rule`);
  }
  const rule: RuleStep[] = [];
  for (let i = 0; i < input.rule.length; i++) {
    const result = validateRuleStep(input.rule[i], `${path}.rule[${i}]`);
    if (!result.valid) return result;
    rule.push(result.value);
  }

  return { valid: true, value: { name: input.name, paths, rule } };
}

const STEP_KINDS = ['filter', 'layout', 'snapshot', 'write'] as const;

/**
 * Validate one rule step. Each step names exactly one operation; on a
 * layout step, `filter` names the layout's filter.
 */
export function validateRuleStep(input: unknown, path: string): ValidationResult<RuleStep> {
  if (!isRecord(input)) {
    return invalid('Rule step must be an object', path);
  }

  const kinds = STEP_KINDS.filter(
    (kind) => input[kind] !== undefined && !(kind === 'filter' && input.layout !== undefined)
  );
  if (kinds.length !== 1) {
    return invalid(`Rule step must name exactly one of ${STEP_KINDS.join(', ')}`, path);
  }
  const kind = kinds[0];
  const target = input[kind];
  if (typeof target !== 'string' || target.length === 0) {
    return invalid(`${kind} must be a non-empty string`, `${path}.${kind}`);
  }

  let args: Record<string, unknown> | undefined;
  if (input.args !== undefined) {
    if (kind !== 'filter' && kind !== 'layout') {
      return invalid('args are only allowed on filter and layout steps', `${path}.args`);
    }
    if (!isRecord(input.args)) {
      return invalid('args must be an object', `${path}.args`);
    }
    args = input.args;
  }

  switch (kind) {
    case 'filter':
      return { valid: true, value: { filter: target, args } };

    case 'layout': {
      const filter = optionalString(input, 'filter');
      if (filter === null) {
        return invalid('filter must be a string', `${path}.filter`);
      }
      return { valid: true, value: { layout: target, filter, args } };
    }

    case 'snapshot': {
      const final = input.final;
      if (final === undefined || typeof final === 'boolean') {
        return { valid: true, value: { snapshot: target, final } };
      }
      return invalid('final must be a boolean', `${path}.final`);
    }

    case 'write':
      return { valid: true, value: { write: target } };
  }
}
