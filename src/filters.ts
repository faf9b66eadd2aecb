/**
 * Filter Registry
 *
 * Maps filter names to descriptors. The default registry carries the
 * built-in filters.
 */

import type { FilterDescriptor } from './types.js';
import { BUILTIN_FILTERS } from './builtin-filters.js';

export class FilterRegistry {
  private readonly descriptors = new Map<string, FilterDescriptor>();

  register(name: string, descriptor: FilterDescriptor): this {
    this.descriptors.set(name, descriptor);
    return this;
  }

  resolve(name: string): FilterDescriptor | undefined {
    return this.descriptors.get(name);
  }

  has(name: string): boolean {
    return this.descriptors.has(name);
  }

  /** Sorted */
  names(): string[] {
    return [...this.descriptors.keys()].sort();
  }
}

/**
 * Registry holding every built-in filter.
 */
export function createDefaultRegistry(): FilterRegistry {
  const registry = new FilterRegistry();
  for (const [name, descriptor] of Object.entries(BUILTIN_FILTERS)) {
    registry.register(name, descriptor);
  }
  return registry;
}
