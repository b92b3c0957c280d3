/**
 * Node load primitive.
 *
 * Imports the resolved file by URL. When the module's default export is a
 * function, or it exports a function named `main`, that function is called
 * with the forwarded arguments and its (awaited) return value is the load
 * result. Otherwise the module namespace is returned. A default export that
 * is a class is not an entry function.
 *
 * Every load imports a fresh instance of the module, so its top-level code
 * runs again on each `source` of the same path.
 *
 * @example
 * ```typescript
 * // ./greet.js
 * export function main(args) {
 *   console.log(`Hello ${args[0] ?? 'World'}!`);
 * }
 * ```
 */

import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { LoadPrimitive } from './load-primitive.js';

type EntryFunction = (args: readonly string[]) => unknown;

const CLASS_SOURCE = /^class[\s{]/;

function isEntryFunction(value: unknown): value is EntryFunction {
  return typeof value === 'function' && !CLASS_SOURCE.test(Function.prototype.toString.call(value));
}

function isModuleNamespace(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export class HostLoader implements LoadPrimitive {
  readonly cwd: string;

  private loadCount = 0;

  constructor(cwd: string = process.cwd()) {
    this.cwd = cwd;
  }

  async load(path: string, args: readonly string[]): Promise<unknown> {
    const url = pathToFileURL(resolve(this.cwd, path));
    this.loadCount += 1;
    url.searchParams.set('load', String(this.loadCount));

    const loaded: unknown = await import(url.href);

    if (!isModuleNamespace(loaded)) {
      return loaded;
    }

    const entry = this.findEntry(loaded);
    if (!entry) {
      return loaded;
    }

    return await entry(args);
  }

  /**
   * Default export first, then a named `main`.
   */
  private findEntry(module: Record<string, unknown>): EntryFunction | null {
    if (isEntryFunction(module.default)) {
      return module.default;
    }
    if (isEntryFunction(module.main)) {
      return module.main;
    }
    return null;
  }
}
