/**
 * Filesystem existence checks used by searchers.
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

/**
 * One-shot existence check for a candidate path.
 */
export interface PathProbe {
  exists(path: string): boolean;
}

/**
 * Probe backed by the local filesystem.
 *
 * Relative candidates are checked against `cwd`; the candidate string itself
 * is what searchers report, so "./mod.js" stays "./mod.js".
 */
export class NodePathProbe implements PathProbe {
  readonly cwd: string;

  constructor(cwd: string = process.cwd()) {
    this.cwd = cwd;
  }

  exists(path: string): boolean {
    return existsSync(resolve(this.cwd, path));
  }
}
