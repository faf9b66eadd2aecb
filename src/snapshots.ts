/**
 * Snapshot Rules
 *
 * Decides which snapshot a compiled-content read refers to and whether
 * its content can be handed out yet.
 */

import type { TextState } from './content.js';
import type { ContentResult, SnapshotDeclaration } from './types.js';
import { LAST, MOVING_SNAPSHOTS, POST, PRE } from './types.js';
import { fail } from './errors.js';

export function isMovingSnapshot(name: string): boolean {
  return MOVING_SNAPSHOTS.includes(name);
}

/**
 * `pre` when content exists for it, `last` otherwise.
 */
export function defaultSnapshotName(state: TextState): string {
  return state.content[PRE] !== undefined ? PRE : LAST;
}

/**
 * Whether a sealed (final) declaration exists for the name.
 * Only the first declaration with that name counts.
 */
export function isSealed(snapshots: readonly SnapshotDeclaration[], name: string): boolean {
  const declaration = snapshots.find((s) => s.name === name);
  return declaration !== undefined && declaration.final;
}

/**
 * A snapshot is still moving while later steps may overwrite it:
 * `post` and `last` until the pass completes, `pre` until sealed.
 */
export function isStillMoving(snapshots: readonly SnapshotDeclaration[], name: string): boolean {
  if (name === POST || name === LAST) return true;
  if (name === PRE) return !isSealed(snapshots, PRE);
  return false;
}

export interface CompiledContentQuery {
  rep: string;
  state: TextState;
  snapshots: readonly SnapshotDeclaration[];
  compiled: boolean;
  snapshot?: string;
}

/**
 * Resolve a compiled-content read against the current textual state.
 */
export function resolveCompiledContent(query: CompiledContentQuery): ContentResult {
  const { rep, state, snapshots, compiled } = query;
  const name = query.snapshot ?? defaultSnapshotName(state);

  if (!isMovingSnapshot(name) && !isSealed(snapshots, name)) {
    return fail({ code: 'NO_SUCH_SNAPSHOT', rep, snapshot: name });
  }

  const content = state.content[name];
  const usable = content !== undefined && (compiled || !isStillMoving(snapshots, name));
  if (!usable) {
    return fail({ code: 'UNMET_DEPENDENCY', rep });
  }

  return { success: true, content };
}
