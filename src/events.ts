/**
 * Notification Center
 *
 * Typed, explicitly constructed event bus.
 * Listeners run synchronously, in registration order.
 */

import type { Representation } from './representation.js';
import type { CompilerError, Layout, Visitable, WriteReport } from './types.js';

export interface CompilationEvents {
  filtering_started: [rep: Representation, filterName: string];
  filtering_ended: [rep: Representation, filterName: string];
  processing_started: [subject: Layout];
  processing_ended: [subject: Layout];
  visit_started: [subject: Visitable];
  visit_ended: [subject: Visitable];
  will_write_rep: [rep: Representation, snapshot: string];
  rep_written: [
    rep: Representation,
    rawPath: string,
    isCreated: boolean,
    isModified: boolean,
    report: WriteReport,
  ];
  compilation_started: [rep: Representation];
  compilation_ended: [rep: Representation];
  compilation_suspended: [rep: Representation, error: CompilerError];
}

export type EventName = keyof CompilationEvents;

export type Listener<E extends EventName> = (...args: CompilationEvents[E]) => void;

type ListenerTable = { [E in EventName]: Listener<E>[] };

function createListenerTable(): ListenerTable {
  return {
    filtering_started: [],
    filtering_ended: [],
    processing_started: [],
    processing_ended: [],
    visit_started: [],
    visit_ended: [],
    will_write_rep: [],
    rep_written: [],
    compilation_started: [],
    compilation_ended: [],
    compilation_suspended: [],
  };
}

export class NotificationCenter {
  private listeners: ListenerTable = createListenerTable();

  /**
   * Register a listener. Returns a function that removes it again.
   */
  on<E extends EventName>(event: E, listener: Listener<E>): () => void {
    this.listeners[event].push(listener);
    let registered = true;
    return () => {
      if (!registered) return;
      registered = false;
      const list: Listener<E>[] = this.listeners[event];
      const index = list.indexOf(listener);
      if (index !== -1) list.splice(index, 1);
    };
  }

  emit<E extends EventName>(event: E, ...args: CompilationEvents[E]): void {
    // Copied, so unsubscribing mid-emit is safe
    const list: Listener<E>[] = [...this.listeners[event]];
    for (const listener of list) {
      listener(...args);
    }
  }

  listenerCount(event: EventName): number {
    return this.listeners[event].length;
  }

  removeAll(): void {
    this.listeners = createListenerTable();
  }
}
