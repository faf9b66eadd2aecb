/**
 * Representation
 *
 * One compiled output variant of an item. An item may have several, each
 * run through its own filters and layouts and written to its own file.
 */

import type { ContentState } from './content.js';
import type { FilterRegistry } from './filters.js';
import type { NotificationCenter } from './events.js';
import type { TempFilenameFactory } from './temp-files.js';
import type {
  Assigns,
  ContentResult,
  FilterArgs,
  Item,
  Layout,
  Outcome,
  SnapshotDeclaration,
  SnapshotOptions,
  WriteReport,
} from './types.js';
import { LAST, PRE } from './types.js';
import { contentAt, initialContent, temporaryFilenameAt, withContent } from './content.js';
import { runFilter, runLayout } from './filtering.js';
import { resolveCompiledContent } from './snapshots.js';
import { writeRepresentation } from './writer.js';
import { fail } from './errors.js';

/**
 * Collaborators shared by every representation of one build.
 */
export interface CompilationContext {
  filters: FilterRegistry;
  events: NotificationCenter;
  tempFiles: TempFilenameFactory;
}

export class Representation {
  /** Snapshot name to output file path, set by routing */
  rawPaths: Record<string, string> = {};
  /** Snapshot name to public path, set by routing */
  paths: Record<string, string> = {};
  /** Snapshot declarations; `final` ones are sealed */
  snapshots: SnapshotDeclaration[] = [];
  /** True once a full compilation pass has completed */
  compiled = false;
  /** Values exposed to the next filter or layout */
  assigns: Assigns = {};

  private state: ContentState;

  constructor(
    readonly item: Item,
    readonly name: string,
    private readonly context: CompilationContext
  ) {
    this.state = initialContent(item);
  }

  get binary(): boolean {
    return this.state.binary;
  }

  get contentState(): ContentState {
    return this.state;
  }

  /** e.g. `/about/ (default)` */
  get label(): string {
    return `${this.item.identifier} (${this.name})`;
  }

  filter(filterName: string, args: FilterArgs = {}): Outcome {
    return runFilter(this, this.context, (state) => this.commit(state), filterName, args);
  }

  layout(layout: Layout, filterName: string, args: FilterArgs = {}): Outcome {
    return runLayout(this, this.context, (state) => this.commit(state), layout, filterName, args);
  }

  /**
   * Record the current content under a snapshot name. Final snapshots are
   * written straight away; moving ones never are.
   */
  snapshot(name: string, options: SnapshotOptions = {}): WriteReport | null {
    const final = options.final ?? true;

    if (!this.state.binary) {
      this.state = withContent(this.state, name, this.state.content[LAST]);
    }

    if (name === PRE && final) {
      this.snapshots.push({ name: PRE, final: true });
    }

    return final ? this.write(name) : null;
  }

  /**
   * Compiled content at a snapshot; defaults to `pre` when it exists, so
   * that other items see content before any layout.
   */
  compiledContent(snapshot?: string): ContentResult {
    const state = this.state;
    if (state.binary) {
      return fail({ code: 'CANNOT_GET_COMPILED_CONTENT_OF_BINARY_ITEM', rep: this.label });
    }

    this.visit();

    return resolveCompiledContent({
      rep: this.label,
      state,
      snapshots: this.snapshots,
      compiled: this.compiled,
      snapshot,
    });
  }

  hasSnapshot(name: string): boolean {
    return contentAt(this.state, name) !== undefined;
  }

  /**
   * Output file path for a snapshot. Reading it counts as a dependency on
   * the item, even when no path is set.
   */
  rawPath(snapshot: string = LAST): string | undefined {
    this.visit();
    return this.rawPaths[snapshot];
  }

  /**
   * Public path for a snapshot, as used in links.
   */
  path(snapshot: string = LAST): string | undefined {
    this.visit();
    return this.paths[snapshot];
  }

  contentAt(name: string): string | undefined {
    return contentAt(this.state, name);
  }

  temporaryFilename(name: string): string | undefined {
    return temporaryFilenameAt(this.state, name);
  }

  write(snapshot: string = LAST): WriteReport | null {
    return writeRepresentation(this, snapshot, this.context.events);
  }

  /**
   * Throw away all content produced so far, back to the item's own content
   * and mode. Paths and snapshot declarations are kept.
   */
  forgetProgress(): void {
    this.state = initialContent(this.item);
  }

  toString(): string {
    return `<Representation name="${this.name}" binary=${this.binary} item="${this.item.identifier}">`;
  }

  private commit(state: ContentState): void {
    this.state = state;
  }

  private visit(): void {
    this.context.events.emit('visit_started', this.item);
    this.context.events.emit('visit_ended', this.item);
  }
}
