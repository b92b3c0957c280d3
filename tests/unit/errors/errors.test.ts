import { describe, expect, it } from 'vitest';
import {
  DiagnosticError,
  DuplicateSearcherError,
  formatDiagnostics,
  InvalidTemplateError,
  ModsourceError,
  ResolutionExhaustedError,
  UsageError,
} from '../../../src/errors/index.js';

describe('errors', () => {
  describe('UsageError', () => {
    it('carries status 2 and the usage line', () => {
      const error = new UsageError('source');

      expect(error).toBeInstanceOf(DiagnosticError);
      expect(error).toBeInstanceOf(ModsourceError);
      expect(error.name).toBe('UsageError');
      expect(error.exitStatus).toBe(2);
      expect(error.diagnosticLines()).toEqual(['source: error: script name is required']);
    });
  });

  describe('ResolutionExhaustedError', () => {
    it('reports a header and one line per failed candidate', () => {
      const error = new ResolutionExhaustedError('.', 'util', [
        { searcher: 'default', path: './util' },
        { searcher: 'default', path: './util.js' },
        { searcher: 'vendor', path: './vendor/util/index.js' },
      ]);

      expect(error.name).toBe('ResolutionExhaustedError');
      expect(error.exitStatus).toBe(1);
      expect(error.moduleName).toBe('util');
      expect(formatDiagnostics(error)).toEqual([
        ".: error: no script called 'util'",
        "\tno file './util'",
        "\tno file './util.js'",
        "\tno file './vendor/util/index.js'",
      ]);
    });

    it('reports only the header when nothing was tried', () => {
      const error = new ResolutionExhaustedError('source', 'util', []);

      expect(formatDiagnostics(error)).toEqual(["source: error: no script called 'util'"]);
    });
  });

  it('InvalidTemplateError names the template', () => {
    const error = new InvalidTemplateError('./util.js', 0);

    expect(error.name).toBe('InvalidTemplateError');
    expect(error.template).toBe('./util.js');
    expect(error.message).toBe(
      "Search path template './util.js' must contain exactly one '%s' (found 0)"
    );
  });

  it('DuplicateSearcherError names the searcher', () => {
    const error = new DuplicateSearcherError('vendor');

    expect(error.name).toBe('DuplicateSearcherError');
    expect(error.searcherName).toBe('vendor');
  });
});
