import { describe, expect, it } from 'vitest';

import {
  compareDiagnostics,
  errorCount,
  formatDiagnostic,
  hasErrors,
} from '../src/diagnostics/format.js';
import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';

const d = (over: Partial<Diagnostic>): Diagnostic => ({
  id: DiagnosticIds.UnresolvedName,
  severity: 'error',
  message: 'm',
  file: 'a.ll',
  ...over,
});

describe('formatDiagnostic', () => {
  it('prefixes located diagnostics with file, line and column', () => {
    expect(
      formatDiagnostic(d({ line: 3, column: 14, message: 'Unable to locate value "%x".' })),
    ).toBe('a.ll:3:14: error: [IRL100] Unable to locate value "%x".');
  });

  it('uses the bare file name without a location', () => {
    expect(
      formatDiagnostic(
        d({ id: DiagnosticIds.LoweringAborted, severity: 'info', message: 'stopped' }),
      ),
    ).toBe('a.ll: info: [IRL002] stopped');
  });
});

describe('compareDiagnostics', () => {
  it('orders by file, position, severity, id, then message', () => {
    const sorted = [
      d({ file: 'b.ll', line: 1, column: 1 }),
      d({ line: 2, column: 5, message: 'z' }),
      d({ line: 2, column: 5, message: 'a' }),
      d({ line: 2, column: 5, severity: 'warning' }),
      d({ line: 2, column: 5, id: DiagnosticIds.TypeMismatch }),
      d({ line: 2, column: 1 }),
      d({ severity: 'info' }),
    ].sort(compareDiagnostics);
    expect(sorted.map((x) => [x.file, x.line, x.column, x.severity, x.id, x.message])).toEqual([
      ['a.ll', undefined, undefined, 'info', 'IRL100', 'm'],
      ['a.ll', 2, 1, 'error', 'IRL100', 'm'],
      ['a.ll', 2, 5, 'error', 'IRL100', 'a'],
      ['a.ll', 2, 5, 'error', 'IRL100', 'z'],
      ['a.ll', 2, 5, 'error', 'IRL110', 'm'],
      ['a.ll', 2, 5, 'warning', 'IRL100', 'm'],
      ['b.ll', 1, 1, 'error', 'IRL100', 'm'],
    ]);
  });
});

describe('error counting', () => {
  it('counts only errors', () => {
    const ds = [d({}), d({ severity: 'warning' }), d({ severity: 'info' }), d({})];
    expect(errorCount(ds)).toBe(2);
    expect(hasErrors(ds)).toBe(true);
    expect(hasErrors([d({ severity: 'warning' })])).toBe(false);
  });
});
