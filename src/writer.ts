/**
 * Representation Writer
 *
 * Flushes a representation's content to its output file.
 * Unchanged files are left alone, so their modification time survives
 * repeated runs and incremental rebuild detection keeps working.
 */

import { copyFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Representation } from './representation.js';
import type { NotificationCenter } from './events.js';
import type { WriteReport } from './types.js';
import { LAST } from './types.js';
import { computeHash } from './measure.js';

/**
 * Write the given snapshot of a representation.
 *
 * Textual representations always write their `last` content; binary ones
 * copy the file recorded for the snapshot (or `last`).
 * Returns null when the snapshot has no raw path.
 */
export function writeRepresentation(
  rep: Representation,
  snapshot: string,
  events: NotificationCenter
): WriteReport | null {
  const rawPath = rep.rawPaths[snapshot];
  if (rawPath === undefined) {
    return null;
  }

  events.emit('will_write_rep', rep, snapshot);

  const state = rep.contentState;
  let sourceFilename: string | null = null;
  let candidate: Buffer;
  if (state.binary) {
    sourceFilename = state.temporaryFilenames[snapshot] ?? state.temporaryFilenames[LAST];
    candidate = readFileSync(sourceFilename);
  } else {
    candidate = Buffer.from(state.content[LAST], 'utf8');
  }

  const isCreated = !existsSync(rawPath);
  const isModified = isCreated || !readFileSync(rawPath).equals(candidate);

  if (isModified) {
    mkdirSync(dirname(rawPath), { recursive: true });
    if (sourceFilename !== null) {
      copyFileSync(sourceFilename, rawPath);
    } else {
      writeFileSync(rawPath, candidate);
    }
  }

  const report: WriteReport = {
    rep: rep.label,
    snapshot,
    rawPath,
    created: isCreated,
    modified: isModified,
    bytes: candidate.length,
    hash: computeHash(candidate),
  };
  events.emit('rep_written', rep, rawPath, isCreated, isModified, report);
  return report;
}
