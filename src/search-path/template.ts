/**
 * Search path templates.
 *
 * A template is a prefix/suffix pair around one substitution slot. Templates
 * are written as strings with a single `%s` (e.g. "./lib/%s.js"), but the
 * module name is only ever concatenated, never run through a formatter.
 */

import { InvalidTemplateError } from '../errors/index.js';

export const TEMPLATE_SLOT = '%s';

export class SearchPathTemplate {
  readonly prefix: string;
  readonly suffix: string;

  constructor(prefix: string, suffix = '') {
    this.prefix = prefix;
    this.suffix = suffix;
  }

  /**
   * Parse a template string containing exactly one `%s`.
   *
   * @throws InvalidTemplateError when the slot count is not one
   */
  static parse(text: string): SearchPathTemplate {
    const parts = text.split(TEMPLATE_SLOT);
    if (parts.length !== 2) {
      throw new InvalidTemplateError(text, parts.length - 1);
    }
    const [prefix, suffix] = parts;
    return new SearchPathTemplate(prefix ?? '', suffix ?? '');
  }

  /**
   * Accept either a template value or its string form.
   */
  static from(template: SearchPathTemplate | string): SearchPathTemplate {
    return typeof template === 'string' ? SearchPathTemplate.parse(template) : template;
  }

  /**
   * Substitute a module name into the slot.
   */
  expand(name: string): string {
    return `${this.prefix}${name}${this.suffix}`;
  }

  equals(other: SearchPathTemplate): boolean {
    return this.prefix === other.prefix && this.suffix === other.suffix;
  }

  toString(): string {
    return `${this.prefix}${TEMPLATE_SLOT}${this.suffix}`;
  }
}
