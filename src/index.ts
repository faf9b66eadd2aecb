/**
 * rendition - Public API
 *
 * Exports all public interfaces for programmatic use.
 */

// Core compiler
export {
  compileSite,
  compileRepresentation,
  createRepresentation,
  declaredSnapshots,
  summarizeWrites,
  formatResult,
  RepIndex,
} from './compiler.js';
export type { CompileOptions } from './compiler.js';

// Representations
export { Representation } from './representation.js';
export type { CompilationContext } from './representation.js';
export { writeRepresentation } from './writer.js';
export { resolveCompiledContent, isMovingSnapshot, isSealed, isStillMoving } from './snapshots.js';
export type { ContentState, TextState, BinaryState, SnapshotMap } from './content.js';

// Types
export type {
  Attributes,
  Item,
  TextItem,
  BinaryItem,
  Layout,
  Visitable,
  SnapshotDeclaration,
  SnapshotOptions,
  FilterArgs,
  FilterContext,
  FilterDescriptor,
  FilterOutput,
  Assigns,
  RepLookup,
  WriteReport,
  CompilerError,
  CompilerErrorCode,
  Failure,
  Outcome,
  ContentResult,
  RuleStep,
  RepInput,
  ItemInput,
  LayoutInput,
  SiteInput,
  DependencyEdge,
  CompileResult,
  CompileSuccess,
  CompileFailure,
} from './types.js';

export {
  LAST,
  PRE,
  POST,
  MOVING_SNAPSHOTS,
  DEFAULT_REP_NAME,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_LAYOUT_FILTER,
} from './types.js';

// Errors
export { fail, isFailure, isRetryable, describeError } from './errors.js';

// Events and listeners
export { NotificationCenter } from './events.js';
export type { CompilationEvents, EventName, Listener } from './events.js';
export {
  CompilationListener,
  FileActionPrinter,
  TimingRecorder,
  DebugPrinter,
  formatFileAction,
} from './listeners.js';
export type { LineSink, Clock, ListenerOptions, FileAction } from './listeners.js';
export { DependencyTracker } from './dependencies.js';

// Filters
export { FilterRegistry, createDefaultRegistry } from './filters.js';
export { BUILTIN_FILTERS } from './builtin-filters.js';
export { TempFilenameFactory } from './temp-files.js';

// Sites
export { loadSite, buildSite, textItem, binaryItem, createLayout } from './site.js';
export type { Site, RepDefinition, SiteLoadResult } from './site.js';

// Validation
export { validateSite, validateIdentifier, validateRuleStep } from './validate.js';
export type { ValidationResult } from './validate.js';

// Measurement
export { computeHash, normalizeLineEndings } from './measure.js';
