/**
 * Compilation Driver
 *
 * Compiles every representation of a site, retrying representations that
 * stalled on another one's content until nothing is left or no progress
 * is made.
 */

import { join } from 'node:path';
import type {
  Assigns,
  CompileResult,
  Layout,
  Outcome,
  RepLookup,
  RuleStep,
  SnapshotDeclaration,
  WriteReport,
} from './types.js';
import { DEFAULT_REP_NAME, LAST } from './types.js';
import type { CompilationContext } from './representation.js';
import type { RepDefinition, Site } from './site.js';
import type { FilterRegistry } from './filters.js';
import { Representation } from './representation.js';
import { NotificationCenter } from './events.js';
import { createDefaultRegistry } from './filters.js';
import { TempFilenameFactory } from './temp-files.js';
import { DependencyTracker } from './dependencies.js';
import { fail, isRetryable } from './errors.js';

export interface CompileOptions {
  filters?: FilterRegistry;
  events?: NotificationCenter;
  /** When given, the caller owns cleanup */
  tempFiles?: TempFilenameFactory;
}

/**
 * Finds representations by item identifier and rep name.
 */
export class RepIndex implements RepLookup {
  private readonly byKey = new Map<string, Representation>();

  constructor(reps: Iterable<Representation>) {
    for (const rep of reps) {
      this.byKey.set(RepIndex.key(rep.item.identifier, rep.name), rep);
    }
  }

  find(identifier: string, name: string = DEFAULT_REP_NAME): Representation | undefined {
    return this.byKey.get(RepIndex.key(identifier, name));
  }

  get size(): number {
    return this.byKey.size;
  }

  private static key(identifier: string, name: string): string {
    return `${identifier}\u0000${name}`;
  }
}

/**
 * Snapshots a rule will take, in order.
 */
export function declaredSnapshots(rule: readonly RuleStep[]): SnapshotDeclaration[] {
  const declarations: SnapshotDeclaration[] = [];
  for (const step of rule) {
    if ('snapshot' in step) {
      declarations.push({ name: step.snapshot, final: step.final ?? true });
    }
  }
  return declarations;
}

/**
 * Create a representation for a definition, routed into the output dir.
 */
export function createRepresentation(
  definition: RepDefinition,
  outputDir: string,
  context: CompilationContext
): Representation {
  const rep = new Representation(definition.item, definition.name, context);
  for (const [snapshot, publicPath] of Object.entries(definition.paths)) {
    rep.paths[snapshot] = publicPath;
    rep.rawPaths[snapshot] = join(outputDir, publicPath);
  }
  rep.snapshots = declaredSnapshots(definition.rule);
  return rep;
}

function assignsFor(rep: Representation, reps: RepLookup): Assigns {
  return {
    ...rep.item.attributes,
    item: rep.item,
    rep,
    identifier: rep.item.identifier,
    repName: rep.name,
    reps,
    content: rep.contentAt(LAST),
  };
}

function applyStep(
  rep: Representation,
  step: RuleStep,
  layouts: readonly Layout[],
  reps: RepLookup
): Outcome {
  if ('layout' in step) {
    const layout = layouts.find((l) => l.identifier === step.layout);
    if (layout === undefined) {
      return fail({ code: 'LAYOUT_NOT_FOUND', layout: step.layout, rep: rep.label });
    }
    rep.assigns = assignsFor(rep, reps);
    return rep.layout(layout, step.filter ?? layout.filter, step.args);
  }

  if ('snapshot' in step) {
    rep.snapshot(step.snapshot, { final: step.final ?? true });
    return { success: true };
  }

  if ('write' in step) {
    rep.write(step.write);
    return { success: true };
  }

  rep.assigns = assignsFor(rep, reps);
  return rep.filter(step.filter, step.args);
}

/**
 * Run a rule over one representation, then seal and write `last`.
 */
export function compileRepresentation(
  rep: Representation,
  rule: readonly RuleStep[],
  layouts: readonly Layout[],
  reps: RepLookup,
  events: NotificationCenter
): Outcome {
  events.emit('compilation_started', rep);
  events.emit('visit_started', rep.item);
  try {
    for (const step of rule) {
      const outcome = applyStep(rep, step, layouts, reps);
      if (!outcome.success) return outcome;
    }

    rep.snapshot(LAST);
    rep.compiled = true;
    events.emit('compilation_ended', rep);
    return { success: true };
  } finally {
    events.emit('visit_ended', rep.item);
  }
}

/**
 * Count output files by what happened to them. A file written more than
 * once (e.g. by a retried representation) counts once.
 */
export function summarizeWrites(writes: readonly WriteReport[]): {
  created: number;
  updated: number;
  identical: number;
} {
  const byPath = new Map<string, { created: boolean; modified: boolean }>();
  for (const write of writes) {
    const previous = byPath.get(write.rawPath);
    byPath.set(write.rawPath, {
      created: (previous?.created ?? false) || write.created,
      modified: (previous?.modified ?? false) || write.modified,
    });
  }

  const totals = { created: 0, updated: 0, identical: 0 };
  for (const { created, modified } of byPath.values()) {
    if (created) totals.created += 1;
    else if (modified) totals.updated += 1;
    else totals.identical += 1;
  }
  return totals;
}

/**
 * Compile a whole site.
 *
 * Pipeline:
 * 1. Create and route one representation per rep definition
 * 2. Compile pending representations in order
 * 3. Reset and requeue those that hit an unmet dependency
 * 4. Fail on any other error, or when a pass makes no progress
 */
export function compileSite(site: Site, options: CompileOptions = {}): CompileResult {
  const timestamp = new Date().toISOString();
  const events = options.events ?? new NotificationCenter();
  const tempFiles = options.tempFiles ?? new TempFilenameFactory();
  const context: CompilationContext = {
    filters: options.filters ?? createDefaultRegistry(),
    events,
    tempFiles,
  };

  const writes: WriteReport[] = [];
  const stopCollecting = events.on('rep_written', (_rep, _path, _created, _modified, report) => {
    writes.push(report);
  });
  const tracker = new DependencyTracker();
  tracker.start(events);

  try {
    const entries = site.reps.map((definition) => ({
      definition,
      rep: createRepresentation(definition, site.outputDir, context),
    }));
    const lookup = new RepIndex(entries.map((e) => e.rep));

    let pending = entries;
    let passes = 0;
    while (pending.length > 0) {
      passes += 1;
      const stalled: typeof entries = [];

      for (const entry of pending) {
        const outcome = compileRepresentation(entry.rep, entry.definition.rule, site.layouts, lookup, events);
        if (outcome.success) continue;

        if (!isRetryable(outcome.error)) {
          return { success: false, timestamp, error: outcome.error, writes };
        }
        events.emit('compilation_suspended', entry.rep, outcome.error);
        entry.rep.forgetProgress();
        stalled.push(entry);
      }

      if (stalled.length === pending.length) {
        return {
          success: false,
          timestamp,
          error: { code: 'DEPENDENCY_CYCLE', reps: stalled.map((e) => e.rep.label) },
          writes,
        };
      }
      pending = stalled;
    }

    return {
      success: true,
      timestamp,
      writes,
      dependencies: tracker.toEdges(),
      totals: {
        repCount: entries.length,
        passes,
        ...summarizeWrites(writes),
      },
    };
  } finally {
    tracker.stop();
    stopCollecting();
    if (options.tempFiles === undefined) {
      tempFiles.cleanup();
    }
  }
}

/**
 * Format compile result for display.
 */
export function formatResult(result: CompileResult): string {
  if (!result.success) {
    return `Compilation failed: ${result.error.code}\n${JSON.stringify(result.error, null, 2)}`;
  }

  const { totals } = result;
  return [
    `Compiled ${totals.repCount} representation${totals.repCount === 1 ? '' : 's'} in ${totals.passes} pass${
      totals.passes === 1 ? '' : 'es'
    }`,
    `  Created: ${totals.created}`,
    `  Updated: ${totals.updated}`,
    `  Identical: ${totals.identical}`,
  ].join('\n');
}
