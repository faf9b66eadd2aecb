/**
 * Dependency Tracker
 *
 * Builds dependency edges from visit notifications: whatever is visited
 * while another subject is being visited becomes a dependency of it.
 */

import type { NotificationCenter } from './events.js';
import type { DependencyEdge, Visitable } from './types.js';

export class DependencyTracker {
  private readonly stack: Visitable[] = [];
  private readonly edges = new Map<Visitable, Visitable[]>();
  private unsubscribers: Array<() => void> = [];

  start(events: NotificationCenter): void {
    this.stop();
    this.unsubscribers = [
      events.on('visit_started', (subject) => this.visitStarted(subject)),
      events.on('visit_ended', () => this.visitEnded()),
    ];
  }

  stop(): void {
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
    this.stack.length = 0;
  }

  /**
   * Subjects the given subject depends on, in first-seen order.
   */
  dependenciesOf(subject: Visitable): Visitable[] {
    return [...(this.edges.get(subject) ?? [])];
  }

  /**
   * All edges, by identifier.
   */
  toEdges(): DependencyEdge[] {
    const result: DependencyEdge[] = [];
    for (const [from, targets] of this.edges) {
      for (const to of targets) {
        result.push({ from: from.identifier, to: to.identifier });
      }
    }
    return result;
  }

  private visitStarted(subject: Visitable): void {
    const current = this.stack[this.stack.length - 1];
    if (current !== undefined && current !== subject) {
      const targets = this.edges.get(current) ?? [];
      if (!targets.includes(subject)) {
        this.edges.set(current, [...targets, subject]);
      }
    }
    this.stack.push(subject);
  }

  private visitEnded(): void {
    this.stack.pop();
  }
}
