/**
 * Filter and Layout Execution
 *
 * Runs one filter (or the filter behind a layout) against a
 * representation's `last` content and commits the result.
 * Start/end notifications are always paired, whatever the outcome.
 */

import { statSync } from 'node:fs';
import type { Representation, CompilationContext } from './representation.js';
import type { ContentState } from './content.js';
import type { FilterArgs, FilterContext, FilterDescriptor, Layout, Outcome } from './types.js';
import { POST, PRE } from './types.js';
import { binaryState, lastSource, setLastFile, setLastText } from './content.js';
import { fail, isFailure } from './errors.js';

export type CommitState = (state: ContentState) => void;

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/**
 * Context handed to a filter. The output filename is only reserved when a
 * filter asks for it.
 */
function createFilterContext(
  rep: Representation,
  context: CompilationContext,
  filterName: string,
  assigns: FilterContext['assigns']
): FilterContext & { readonly reserved: string | undefined } {
  let reserved: string | undefined;
  return {
    filterName,
    assigns,
    get outputFilename(): string {
      reserved ??= context.tempFiles.create(`${rep.label}-${filterName}`);
      return reserved;
    },
    get reserved(): string | undefined {
      return reserved;
    },
  };
}

function checkCompatibility(
  rep: Representation,
  filterName: string,
  descriptor: FilterDescriptor
): Outcome {
  if (descriptor.from === 'binary' && !rep.binary) {
    return fail({ code: 'CANNOT_USE_BINARY_FILTER', rep: rep.label, filterName });
  }
  if (descriptor.from === 'text' && rep.binary) {
    return fail({ code: 'CANNOT_USE_TEXTUAL_FILTER', rep: rep.label, filterName });
  }
  return { success: true };
}

/**
 * Run a named filter over the representation's current content.
 *
 * Nothing is committed unless the filter produced its declared output.
 * Textual results are recorded as a moving `pre` (or `post`, once a layout
 * has run) snapshot.
 */
export function runFilter(
  rep: Representation,
  context: CompilationContext,
  commit: CommitState,
  filterName: string,
  args: FilterArgs
): Outcome {
  const descriptor = context.filters.resolve(filterName);
  if (descriptor === undefined) {
    return fail({ code: 'UNKNOWN_FILTER', filterName });
  }

  const compatibility = checkCompatibility(rep, filterName, descriptor);
  if (!compatibility.success) return compatibility;

  context.events.emit('filtering_started', rep, filterName);
  try {
    const state = rep.contentState;
    const filterContext = createFilterContext(rep, context, filterName, rep.assigns);
    const output = descriptor.run(lastSource(state), args, filterContext);
    if (isFailure(output)) return output;

    let next: ContentState;
    if (descriptor.to === 'binary') {
      const outputFilename = filterContext.reserved;
      if (outputFilename === undefined || !isFile(outputFilename)) {
        return fail({
          code: 'FILTER_OUTPUT_MISSING',
          filterName,
          outputFilename: outputFilename ?? '',
          message: `The "${filterName}" filter did not write anything to the required output file${
            outputFilename === undefined ? '' : `, ${outputFilename}`
          }.`,
        });
      }
      next = state.binary ? setLastFile(state, outputFilename) : binaryState(outputFilename);
    } else {
      if (typeof output !== 'string') {
        return fail({
          code: 'FILTER_OUTPUT_MISSING',
          filterName,
          outputFilename: '',
          message: `The "${filterName}" filter did not return any content.`,
        });
      }
      next = setLastText(state, output);
    }

    commit(next);

    if (!next.binary) {
      rep.snapshot(next.content[POST] !== undefined ? POST : PRE, { final: false });
    }
    return { success: true };
  } finally {
    context.events.emit('filtering_ended', rep, filterName);
  }
}

/**
 * Lay out the representation: run the named filter over the layout's raw
 * content, with the layout added to the assigns.
 *
 * The first layout seals `pre`, so that content before any layout stays
 * readable by other items.
 */
export function runLayout(
  rep: Representation,
  context: CompilationContext,
  commit: CommitState,
  layout: Layout,
  filterName: string,
  args: FilterArgs
): Outcome {
  if (rep.binary) {
    return fail({ code: 'CANNOT_LAYOUT_BINARY_ITEM', rep: rep.label });
  }

  if (!rep.hasSnapshot(POST)) {
    rep.snapshot(PRE, { final: true });
  }

  const descriptor = context.filters.resolve(filterName);
  if (descriptor === undefined) {
    return fail({ code: 'UNKNOWN_FILTER', filterName });
  }
  if (descriptor.from === 'binary' || descriptor.to === 'binary') {
    return fail({ code: 'CANNOT_USE_BINARY_FILTER', rep: rep.label, filterName });
  }

  const assigns = { ...rep.assigns, layout };

  context.events.emit('visit_started', layout);
  context.events.emit('visit_ended', layout);

  context.events.emit('processing_started', layout);
  context.events.emit('filtering_started', rep, filterName);
  try {
    const filterContext = createFilterContext(rep, context, filterName, assigns);
    const output = descriptor.run(layout.rawContent, args, filterContext);
    if (isFailure(output)) return output;
    if (typeof output !== 'string') {
      return fail({
        code: 'FILTER_OUTPUT_MISSING',
        filterName,
        outputFilename: '',
        message: `The "${filterName}" filter did not return any content for layout ${layout.identifier}.`,
      });
    }

    commit(setLastText(rep.contentState, output));
    rep.snapshot(POST, { final: false });
    return { success: true };
  } finally {
    context.events.emit('filtering_ended', rep, filterName);
    context.events.emit('processing_ended', layout);
  }
}
