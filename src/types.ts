/**
 * Rendition Type Definitions
 *
 * Types shared across the compilation pipeline.
 * Runtime values are limited to constants.
 */

import type { Representation } from './representation.js';

// =============================================================================
// CONSTANTS
// =============================================================================

/** Snapshot that always holds the most recently produced content */
export const LAST = 'last';
/** Snapshot taken before the first layout */
export const PRE = 'pre';
/** Snapshot taken after a layout has been applied */
export const POST = 'post';

/** Snapshots that keep changing until the representation has compiled */
export const MOVING_SNAPSHOTS: readonly string[] = [PRE, POST, LAST];

export const DEFAULT_REP_NAME = 'default';
export const DEFAULT_OUTPUT_DIR = 'output';
export const DEFAULT_LAYOUT_FILTER = 'template';

// =============================================================================
// SOURCE MODEL
// =============================================================================

export type ContentKind = 'text' | 'binary';

export type Attributes = Readonly<Record<string, unknown>>;

interface ItemBase {
  kind: 'item';
  /** Starts and ends with a slash, e.g. `/about/` */
  identifier: string;
  attributes: Attributes;
}

export interface TextItem extends ItemBase {
  binary: false;
  rawContent: string;
}

export interface BinaryItem extends ItemBase {
  binary: true;
  /** Path of the file holding the item's bytes */
  rawFilename: string;
}

export type Item = TextItem | BinaryItem;

export interface Layout {
  kind: 'layout';
  identifier: string;
  rawContent: string;
  /** Filter used when a rule does not name one */
  filter: string;
}

/** Anything whose identity can be read during compilation */
export type Visitable = Item | Layout;

// =============================================================================
// SNAPSHOTS
// =============================================================================

export interface SnapshotDeclaration {
  name: string;
  /** False for snapshots that may still be overwritten */
  final: boolean;
}

export interface SnapshotOptions {
  /** Defaults to true */
  final?: boolean;
}

// =============================================================================
// FILTERS
// =============================================================================

export type FilterArgs = Readonly<Record<string, unknown>>;

/**
 * Looks up representations of other items, so that filters can read their
 * compiled content and paths.
 */
export interface RepLookup {
  find(identifier: string, name?: string): Representation | undefined;
}

/**
 * Named values exposed to the next filter or layout invocation.
 * Replaced wholesale by the driver between calls.
 */
export interface Assigns {
  readonly item?: Item;
  readonly rep?: Representation;
  readonly layout?: Layout;
  /** Current textual content of the representation being laid out */
  readonly content?: string;
  readonly reps?: RepLookup;
  readonly [key: string]: unknown;
}

export interface FilterContext {
  readonly filterName: string;
  readonly assigns: Assigns;
  /** Where a binary-output filter must write its result */
  readonly outputFilename: string;
}

/**
 * Text filters return the new content; binary-output filters write to
 * `context.outputFilename` and return undefined. Either may hand back a
 * failure, e.g. an unmet dependency met while reading another rep.
 */
export type FilterOutput = string | undefined | Failure;

export interface FilterDescriptor {
  from: ContentKind;
  to: ContentKind;
  /** One-line summary, shown by the CLI */
  description?: string;
  run(source: string, args: FilterArgs, context: FilterContext): FilterOutput;
}

// =============================================================================
// WRITING
// =============================================================================

export interface WriteReport {
  rep: string;
  snapshot: string;
  rawPath: string;
  /** Output file did not exist before */
  created: boolean;
  /** Output file bytes changed */
  modified: boolean;
  bytes: number;
  /** SHA-256 of the written bytes */
  hash: string;
}

// =============================================================================
// ERRORS
// =============================================================================

export type CompilerError =
  // Representation errors
  | { code: 'UNKNOWN_FILTER'; filterName: string }
  | { code: 'CANNOT_USE_BINARY_FILTER'; rep: string; filterName: string }
  | { code: 'CANNOT_USE_TEXTUAL_FILTER'; rep: string; filterName: string }
  | { code: 'CANNOT_LAYOUT_BINARY_ITEM'; rep: string }
  | { code: 'CANNOT_GET_COMPILED_CONTENT_OF_BINARY_ITEM'; rep: string }
  | { code: 'NO_SUCH_SNAPSHOT'; rep: string; snapshot: string }
  | { code: 'UNMET_DEPENDENCY'; rep: string }
  | { code: 'FILTER_OUTPUT_MISSING'; filterName: string; outputFilename: string; message: string }
  // Driver errors
  | { code: 'DEPENDENCY_CYCLE'; reps: string[] }
  | { code: 'LAYOUT_NOT_FOUND'; layout: string; rep: string }
  // Site errors
  | { code: 'INVALID_SITE'; message: string; path: string }
  | { code: 'SITE_READ_FAILED'; path: string; reason: string };

export type CompilerErrorCode = CompilerError['code'];

export interface Failure {
  success: false;
  error: CompilerError;
}

export type Outcome = { success: true } | Failure;

export type ContentResult = { success: true; content: string } | Failure;

// =============================================================================
// SITE INPUT
// =============================================================================

export type RuleStep =
  | { filter: string; args?: Record<string, unknown> }
  | { layout: string; filter?: string; args?: Record<string, unknown> }
  | { snapshot: string; final?: boolean }
  | { write: string };

export interface RepInput {
  name: string;
  /** Snapshot name to public path, e.g. `{ "last": "/about/index.html" }` */
  paths?: Record<string, string>;
  rule: RuleStep[];
}

export interface ItemInput {
  identifier: string;
  content?: string;
  file?: string;
  binary?: boolean;
  attributes?: Record<string, unknown>;
  reps: RepInput[];
}

export interface LayoutInput {
  identifier: string;
  content: string;
  filter?: string;
}

export interface SiteInput {
  outputDir?: string;
  layouts?: LayoutInput[];
  items: ItemInput[];
}

// =============================================================================
// COMPILER OUTPUT
// =============================================================================

export interface DependencyEdge {
  from: string;
  to: string;
}

export interface CompileSuccess {
  success: true;
  /** ISO 8601 */
  timestamp: string;
  writes: WriteReport[];
  dependencies: DependencyEdge[];
  totals: {
    repCount: number;
    passes: number;
    created: number;
    updated: number;
    identical: number;
  };
}

export interface CompileFailure {
  success: false;
  /** ISO 8601 */
  timestamp: string;
  error: CompilerError;
  /** Writes that happened before the failure */
  writes: WriteReport[];
}

export type CompileResult = CompileSuccess | CompileFailure;
