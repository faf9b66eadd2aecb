/**
 * Content Store
 *
 * Holds a representation's content per snapshot name.
 * Textual and binary content live in disjoint maps, selected by mode.
 * States are frozen values; every change produces a new state.
 */

import type { Item } from './types.js';
import { LAST } from './types.js';

export type SnapshotMap = Readonly<Record<string, string>>;

export interface TextState {
  readonly binary: false;
  /** Snapshot name to content */
  readonly content: SnapshotMap;
}

export interface BinaryState {
  readonly binary: true;
  /** Snapshot name to the file holding the bytes */
  readonly temporaryFilenames: SnapshotMap;
}

export type ContentState = TextState | BinaryState;

function freezeMap(map: Record<string, string>): SnapshotMap {
  return Object.freeze(map);
}

/**
 * Initial state for an item, in the item's own mode.
 */
export function initialContent(item: Item): ContentState {
  if (item.binary) {
    return binaryState(item.rawFilename);
  }
  return textState(item.rawContent);
}

/**
 * Fresh textual state holding only `last`.
 */
export function textState(last: string): TextState {
  const state: TextState = { binary: false, content: freezeMap({ [LAST]: last }) };
  return Object.freeze(state);
}

/**
 * Fresh binary state holding only `last`.
 */
export function binaryState(lastFilename: string): BinaryState {
  const state: BinaryState = {
    binary: true,
    temporaryFilenames: freezeMap({ [LAST]: lastFilename }),
  };
  return Object.freeze(state);
}

/**
 * Replace the content stored under a snapshot name.
 */
export function withContent(state: TextState, name: string, value: string): TextState {
  const next: TextState = {
    binary: false,
    content: freezeMap({ ...state.content, [name]: value }),
  };
  return Object.freeze(next);
}

/**
 * Replace the file stored under a snapshot name.
 */
export function withTemporaryFilename(
  state: BinaryState,
  name: string,
  filename: string
): BinaryState {
  const next: BinaryState = {
    binary: true,
    temporaryFilenames: freezeMap({ ...state.temporaryFilenames, [name]: filename }),
  };
  return Object.freeze(next);
}

export function setLast(state: TextState, value: string): TextState {
  return withContent(state, LAST, value);
}

/**
 * Textual filter output as the new `last`. Binary content is left behind.
 */
export function setLastText(state: ContentState, value: string): TextState {
  return state.binary ? textState(value) : setLast(state, value);
}

export function setLastFile(state: BinaryState, filename: string): BinaryState {
  return withTemporaryFilename(state, LAST, filename);
}

/**
 * Content currently held under `last`: text in textual mode, a filename in
 * binary mode.
 */
export function lastSource(state: ContentState): string {
  return state.binary ? state.temporaryFilenames[LAST] : state.content[LAST];
}

export function contentAt(state: ContentState, name: string): string | undefined {
  return state.binary ? undefined : state.content[name];
}

export function temporaryFilenameAt(state: ContentState, name: string): string | undefined {
  return state.binary ? state.temporaryFilenames[name] : undefined;
}
