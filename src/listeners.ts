/**
 * Compilation Listeners
 *
 * Console reporting attached to the notification center: file actions,
 * filter timings and debug traces. Each listener writes whole lines to a
 * sink, console.log unless told otherwise.
 */

import type { NotificationCenter } from './events.js';
import type { Representation } from './representation.js';
import { describeError } from './errors.js';

export type LineSink = (line: string) => void;

/** Milliseconds from an arbitrary origin */
export type Clock = () => number;

export interface ListenerOptions {
  write?: LineSink;
  now?: Clock;
}

const defaultSink: LineSink = (line) => console.log(line);
const defaultClock: Clock = () => performance.now();

/**
 * Base class: subclasses subscribe in start(); stop() unsubscribes.
 */
export abstract class CompilationListener {
  protected readonly write: LineSink;
  protected readonly now: Clock;
  private unsubscribers: Array<() => void> = [];

  constructor(options: ListenerOptions = {}) {
    this.write = options.write ?? defaultSink;
    this.now = options.now ?? defaultClock;
  }

  abstract start(events: NotificationCenter): void;

  stop(): void {
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
  }

  protected track(unsubscribe: () => void): void {
    this.unsubscribers.push(unsubscribe);
  }
}

export type FileAction = 'create' | 'update' | 'identical' | 'skip';

/**
 * One file action line, e.g. `      create  [0.12s]  output/index.html`.
 */
export function formatFileAction(action: FileAction, path: string, seconds?: number): string {
  const duration = seconds === undefined ? '' : `[${seconds.toFixed(2)}s]  `;
  return `${action.padStart(12)}  ${duration}${path}`;
}

/**
 * Prints what happened to every output file.
 */
export class FileActionPrinter extends CompilationListener {
  private readonly startTimes = new Map<Representation, number>();
  private readonly showIdentical: boolean;

  constructor(options: ListenerOptions & { showIdentical?: boolean } = {}) {
    super(options);
    this.showIdentical = options.showIdentical ?? false;
  }

  start(events: NotificationCenter): void {
    this.track(
      events.on('compilation_started', (rep) => {
        this.startTimes.set(rep, this.now());
      })
    );
    this.track(
      events.on('rep_written', (rep, rawPath, isCreated, isModified) => {
        const action: FileAction = isCreated ? 'create' : isModified ? 'update' : 'identical';
        if (action === 'identical' && !this.showIdentical) return;

        const startedAt = this.startTimes.get(rep);
        const seconds = startedAt === undefined ? undefined : (this.now() - startedAt) / 1000;
        this.write(formatFileAction(action, rawPath, seconds));
      })
    );
  }

  /**
   * Also reports, as skipped, the output files of representations that
   * started but never finished compiling.
   */
  stop(): void {
    super.stop();
    for (const rep of this.startTimes.keys()) {
      if (rep.compiled) continue;
      for (const rawPath of Object.values(rep.rawPaths)) {
        this.write(formatFileAction('skip', rawPath));
      }
    }
    this.startTimes.clear();
  }
}

/**
 * Records the time spent per filter and prints a table on stop.
 */
export class TimingRecorder extends CompilationListener {
  private readonly running = new Map<string, number[]>();
  private readonly samples = new Map<string, number[]>();
  private readonly reps = new Set<Representation>();

  start(events: NotificationCenter): void {
    this.track(events.on('compilation_started', (rep) => this.reps.add(rep)));
    this.track(
      events.on('filtering_started', (_rep, filterName) => {
        this.running.set(filterName, [...(this.running.get(filterName) ?? []), this.now()]);
      })
    );
    this.track(
      events.on('filtering_ended', (_rep, filterName) => {
        const starts = this.running.get(filterName) ?? [];
        const startedAt = starts.pop();
        if (startedAt === undefined) return;
        this.running.set(filterName, starts);
        const elapsed = (this.now() - startedAt) / 1000;
        this.samples.set(filterName, [...(this.samples.get(filterName) ?? []), elapsed]);
      })
    );
  }

  stop(): void {
    super.stop();
    for (const line of this.report()) {
      this.write(line);
    }
  }

  /**
   * Table lines, slowest filter last. Empty when nothing was filtered.
   */
  report(): string[] {
    const names = [...this.samples.keys()];
    if (names.length === 0) return [];

    const lines: string[] = [];
    if ([...this.reps].some((rep) => !rep.compiled)) {
      lines.push('Warning: profiling information may not be accurate because some items were not compiled.');
    }

    const width = Math.max(...names.map((name) => name.length));
    lines.push(`${' '.repeat(width)} | count    min    avg    max     tot`);
    lines.push(`${'-'.repeat(width)}-+-----------------------------------`);

    const rows = names.map((name) => {
      const samples = this.samples.get(name) ?? [];
      const total = samples.reduce((sum, s) => sum + s, 0);
      return { name, samples, total };
    });
    rows.sort((a, b) => a.total - b.total);

    for (const { name, samples, total } of rows) {
      const count = String(samples.length).padStart(4);
      const min = Math.min(...samples).toFixed(2).padStart(4);
      const avg = (total / samples.length).toFixed(2).padStart(4);
      const max = Math.max(...samples).toFixed(2).padStart(4);
      const tot = total.toFixed(2).padStart(5);
      lines.push(`${name.padStart(width)} |  ${count}  ${min}s  ${avg}s  ${max}s  ${tot}s`);
    }
    return lines;
  }
}

/**
 * Prints a line for every compilation, filtering and visit event.
 */
export class DebugPrinter extends CompilationListener {
  start(events: NotificationCenter): void {
    this.track(
      events.on('compilation_started', (rep) => this.write(`*** Started compilation of ${rep}`))
    );
    this.track(
      events.on('compilation_ended', (rep) => this.write(`*** Ended compilation of ${rep}`))
    );
    this.track(
      events.on('compilation_suspended', (rep, error) =>
        this.write(`*** Suspended compilation of ${rep}: ${describeError(error)}`)
      )
    );
    this.track(
      events.on('filtering_started', (rep, filterName) =>
        this.write(`*** Started filtering ${rep} with ${filterName}`)
      )
    );
    this.track(
      events.on('filtering_ended', (rep, filterName) =>
        this.write(`*** Ended filtering ${rep} with ${filterName}`)
      )
    );
    this.track(
      events.on('visit_started', (subject) =>
        this.write(`*** Started visiting ${subject.kind} ${subject.identifier}`)
      )
    );
    this.track(
      events.on('visit_ended', (subject) =>
        this.write(`*** Ended visiting ${subject.kind} ${subject.identifier}`)
      )
    );
  }
}
