/**
 * Ordered, mutable list of search path templates.
 *
 * Insertion order is precedence order. The registry never deduplicates or
 * reorders entries; readers take a snapshot with `entries()`.
 */

import { SearchPathTemplate } from './template.js';

export class SearchPathRegistry {
  private templates: SearchPathTemplate[] = [];

  constructor(initial: Iterable<SearchPathTemplate | string> = []) {
    for (const template of initial) {
      this.add(template);
    }
  }

  /**
   * Append a template. Strings are parsed and must hold exactly one `%s`.
   */
  add(template: SearchPathTemplate | string): this {
    this.templates.push(SearchPathTemplate.from(template));
    return this;
  }

  /**
   * Insert a template ahead of every existing entry.
   */
  prepend(template: SearchPathTemplate | string): this {
    this.templates.unshift(SearchPathTemplate.from(template));
    return this;
  }

  /**
   * Remove the first entry equal to the given template.
   *
   * @returns True if an entry was removed
   */
  remove(template: SearchPathTemplate | string): boolean {
    const target = SearchPathTemplate.from(template);
    const index = this.templates.findIndex((entry) => entry.equals(target));
    if (index === -1) {
      return false;
    }
    this.templates.splice(index, 1);
    return true;
  }

  clear(): void {
    this.templates = [];
  }

  /**
   * Snapshot of the current entries, in precedence order.
   */
  entries(): SearchPathTemplate[] {
    return [...this.templates];
  }

  /**
   * Expand every template for a module name, in precedence order.
   */
  expand(name: string): string[] {
    return this.templates.map((template) => template.expand(name));
  }

  get size(): number {
    return this.templates.length;
  }

  toStrings(): string[] {
    return this.templates.map((template) => template.toString());
  }
}
