import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { NodePathProbe } from '../../../src/searcher/path-probe.js';

describe('NodePathProbe', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'modsource-probe-'));
    mkdirSync(join(root, 'lib'));
    writeFileSync(join(root, 'lib', 'util.js'), 'export {};\n');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('checks relative paths against its working directory', () => {
    const probe = new NodePathProbe(root);

    expect(probe.exists('./lib/util.js')).toBe(true);
    expect(probe.exists('lib/util.js')).toBe(true);
    expect(probe.exists('./lib/missing.js')).toBe(false);
  });

  it('checks absolute paths as given', () => {
    const probe = new NodePathProbe('/');

    expect(probe.exists(join(root, 'lib', 'util.js'))).toBe(true);
  });

  it('reports directories as existing', () => {
    expect(new NodePathProbe(root).exists('./lib')).toBe(true);
  });

  it('defaults to the process working directory', () => {
    expect(new NodePathProbe().cwd).toBe(process.cwd());
  });
});
