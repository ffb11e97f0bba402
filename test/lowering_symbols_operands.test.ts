import { describe, expect, it } from 'vitest';

import { InternalInvariantError } from '../src/diagnostics/errors.js';
import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import type { FloatLitNode, NullLitNode } from '../src/frontend/ast.js';
import type { GlobalVar, LocalValue } from '../src/ir/model.js';
import { newBasicBlock } from '../src/ir/model.js';
import { VOID } from '../src/ir/types.js';
import { intConstRange, lowerConstant } from '../src/lowering/constants.js';
import type { FunctionScope } from '../src/lowering/operands.js';
import { lowerCase, lowerIncoming, lowerValue } from '../src/lowering/operands.js';
import { SymbolTableBuilder } from '../src/lowering/symbols.js';
import { caseOf, gid, i, inc, int, lid, s } from './helpers/ast.js';

const i8 = { kind: 'int', bits: 8 } as const;
const i32 = { kind: 'int', bits: 32 } as const;
const i64 = { kind: 'int', bits: 64 } as const;
const ptr0 = { kind: 'ptr', addrSpace: 0 } as const;

const gvar = (name: string): GlobalVar => ({
  kind: 'GlobalVar',
  name,
  linkage: 'None',
  preemption: 'None',
  visibility: 'None',
  dllStorageClass: 'None',
  unnamedAddr: 'None',
  addrSpace: 0,
  align: 0,
  type: ptr0,
  contentType: i32,
  immutable: false,
  tlsModel: 'None',
  externallyInitialized: false,
});

function fixture() {
  const setup: Diagnostic[] = [];
  const entry = newBasicBlock('entry');
  const v: LocalValue = { kind: 'Local', name: 'v', type: i32 };
  const g = gvar('g');

  const locals = new SymbolTableBuilder('function @f');
  locals.declare('entry', { kind: 'block', block: entry }, s(), setup);
  locals.declare('v', { kind: 'value', value: v }, s(), setup);
  const globals = new SymbolTableBuilder('module');
  globals.declare('g', { kind: 'value', value: g }, s(), setup, '@');

  const scope: FunctionScope = {
    locals: locals.freeze(),
    globals: globals.freeze(),
    retType: VOID,
  };
  expect(setup).toEqual([]);
  return { entry, v, g, scope };
}

describe('symbol tables', () => {
  it('keeps the first entry and reports a redefinition', () => {
    const diagnostics: Diagnostic[] = [];
    const b = new SymbolTableBuilder('function @f');
    const first = newBasicBlock('x');
    expect(b.declare('x', { kind: 'block', block: first }, s(3, 1), diagnostics)).toBe(true);
    expect(b.declare('x', { kind: 'block', block: newBasicBlock('x') }, s(7, 1), diagnostics)).toBe(
      false,
    );
    expect(b.freeze().resolveBlock('x', s(), 'br target', diagnostics)).toBe(first);
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.Redefinition,
        severity: 'error',
        message: 'Redefinition of "%x" in function @f.',
        file: 'test.ll',
        line: 7,
        column: 1,
        subject: '%x',
        construct: 'basic block declaration',
      },
    ]);
  });

  it('refuses declarations once frozen', () => {
    const b = new SymbolTableBuilder('function @f');
    const table = b.freeze();
    expect(() => b.declare('y', { kind: 'block', block: newBasicBlock('y') }, s(), [])).toThrow(
      InternalInvariantError,
    );
    expect(() => b.declare('y', { kind: 'block', block: newBasicBlock('y') }, s(), [])).toThrow(
      'cannot declare "y" in function @f after its table is frozen',
    );
    expect(table.size).toBe(0);
  });

  it('tells an unknown name from a name of the wrong kind', () => {
    const { scope } = fixture();
    const diagnostics: Diagnostic[] = [];
    expect(scope.locals.resolveBlock('nope', s(2, 5), 'br target', diagnostics)).toBeUndefined();
    expect(scope.locals.resolveBlock('v', s(2, 9), 'br target', diagnostics)).toBeUndefined();
    expect(scope.locals.resolveValue('entry', s(2, 13), 'ret value', diagnostics)).toBeUndefined();
    expect(diagnostics.map((d) => [d.id, d.message])).toEqual([
      [
        DiagnosticIds.UnresolvedName,
        'Unable to locate basic block "%nope" in function @f (br target).',
      ],
      [
        DiagnosticIds.SymbolKindMismatch,
        'Invalid br target: "%v" is a value, expected a basic block.',
      ],
      [
        DiagnosticIds.SymbolKindMismatch,
        'Invalid ret value: "%entry" is a basic block, expected a value.',
      ],
    ]);
  });

  it('lists declared names in declaration order', () => {
    const { scope } = fixture();
    expect(scope.locals.names()).toEqual(['entry', 'v']);
    expect(scope.locals.has('v')).toBe(true);
    expect(scope.locals.get('entry')?.kind).toBe('block');
  });
});

describe('constants', () => {
  it('accepts signed and unsigned spellings within the width', () => {
    expect(intConstRange(8)).toEqual({ min: -128n, max: 255n });
    expect(intConstRange(1)).toEqual({ min: -1n, max: 1n });
  });

  it('lowers integer constants against their type', () => {
    const { scope } = fixture();
    const diagnostics: Diagnostic[] = [];
    expect(lowerConstant(i8, int('255'), scope.globals, 'test', diagnostics)).toEqual({
      kind: 'IntConst',
      type: i8,
      value: 255n,
    });
    expect(lowerConstant(i8, int('-129'), scope.globals, 'test', diagnostics)).toBeUndefined();
    expect(lowerConstant(ptr0, int('1'), scope.globals, 'test', diagnostics)).toBeUndefined();
    expect(diagnostics.map((d) => [d.id, d.message])).toEqual([
      [DiagnosticIds.ConstantOutOfRange, 'Integer constant -129 does not fit in i8.'],
      [DiagnosticIds.TypeMismatch, 'Integer constant 1 used with non-integer type ptr.'],
    ]);
  });

  it('lowers null, floats and global addresses', () => {
    const { scope, g } = fixture();
    const diagnostics: Diagnostic[] = [];
    const nul: NullLitNode = { kind: 'NullLit', span: s() };
    const half: FloatLitNode = { kind: 'FloatLit', span: s(), text: '0.5' };
    const dbl = { kind: 'float', float: 'Double' } as const;
    expect(lowerConstant(ptr0, nul, scope.globals, 'test', diagnostics)).toEqual({
      kind: 'NullConst',
      type: ptr0,
    });
    expect(lowerConstant(dbl, half, scope.globals, 'test', diagnostics)).toEqual({
      kind: 'FloatConst',
      type: dbl,
      value: 0.5,
    });
    expect(lowerConstant(ptr0, gid('@g'), scope.globals, 'test', diagnostics)).toBe(g);
    expect(diagnostics).toEqual([]);
  });

  it('accepts decimal float spellings only', () => {
    const { scope } = fixture();
    const dbl = { kind: 'float', float: 'Double' } as const;
    const float = (text: string): FloatLitNode => ({ kind: 'FloatLit', span: s(), text });
    const lowered = ['1.', '.5', '-2.5e-3', '1E2'].map((text) => {
      const c = lowerConstant(dbl, float(text), scope.globals, 'test', []);
      return c?.kind === 'FloatConst' ? c.value : undefined;
    });
    expect(lowered).toEqual([1, 0.5, -0.0025, 100]);
    for (const text of ['0x3FF0000000000000', '', '  ', 'Infinity', 'nan', '1e']) {
      expect(() => lowerConstant(dbl, float(text), scope.globals, 'test', [])).toThrow(
        InternalInvariantError,
      );
    }
  });

  it('reports a decimal float too large for its type', () => {
    const { scope } = fixture();
    const diagnostics: Diagnostic[] = [];
    const huge: FloatLitNode = { kind: 'FloatLit', span: s(2), text: '1e999' };
    const dbl = { kind: 'float', float: 'Double' } as const;
    expect(lowerConstant(dbl, huge, scope.globals, 'test', diagnostics)).toBeUndefined();
    expect(diagnostics.map((d) => [d.id, d.line, d.message])).toEqual([
      [
        DiagnosticIds.ConstantOutOfRange,
        2,
        'Floating-point constant 1e999 does not fit in double.',
      ],
    ]);
  });

  it('reports unknown globals with the @ sigil', () => {
    const { scope } = fixture();
    const diagnostics: Diagnostic[] = [];
    expect(lowerConstant(ptr0, gid('@h'), scope.globals, 'callee', diagnostics)).toBeUndefined();
    expect(diagnostics[0]?.message).toBe('Unable to locate value "@h" in module (callee).');
    expect(diagnostics[0]?.subject).toBe('@h');
  });
});

describe('operands', () => {
  it('checks the type of local values', () => {
    const { scope, v } = fixture();
    const diagnostics: Diagnostic[] = [];
    expect(lowerValue(i32, lid('%v'), scope, 'add operand', diagnostics)).toBe(v);
    expect(lowerValue(i64, lid('%v'), scope, 'add operand', diagnostics)).toBeUndefined();
    expect(diagnostics.map((d) => d.message)).toEqual(['"%v" has type i32, used as i64.']);
  });

  it('lowers a phi incoming pair', () => {
    const { scope, v, entry } = fixture();
    const diagnostics: Diagnostic[] = [];
    expect(lowerIncoming(i32, inc(lid('%v'), '%entry'), scope, diagnostics)).toEqual({
      x: v,
      pred: entry,
    });
    expect(diagnostics).toEqual([]);
  });

  it('requires a phi predecessor to name a block', () => {
    const { scope } = fixture();
    const diagnostics: Diagnostic[] = [];
    expect(lowerIncoming(i32, inc(int('5'), '%v'), scope, diagnostics)).toBeUndefined();
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]?.id).toBe(DiagnosticIds.SymbolKindMismatch);
    expect(diagnostics[0]?.construct).toBe('phi predecessor');
    expect(diagnostics[0]?.message).toBe(
      'Invalid phi predecessor: "%v" is a value, expected a basic block.',
    );
  });

  it('fails a forward predecessor when the table was frozen before it was declared', () => {
    const diagnostics: Diagnostic[] = [];
    const b = new SymbolTableBuilder('function @f');
    b.declare('entry', { kind: 'block', block: newBasicBlock('entry') }, s(), diagnostics);
    const early = b.freeze();
    const scope: FunctionScope = {
      locals: early,
      globals: new SymbolTableBuilder('module').freeze(),
      retType: VOID,
    };
    expect(lowerIncoming(i32, inc(int('0'), '%later'), scope, diagnostics)).toBeUndefined();
    expect(diagnostics.map((d) => d.id)).toEqual([DiagnosticIds.UnresolvedName]);
  });

  it('lowers a switch case', () => {
    const { scope, entry } = fixture();
    const diagnostics: Diagnostic[] = [];
    expect(lowerCase(caseOf(i(32), int('1'), '%entry'), scope, diagnostics)).toEqual({
      x: { kind: 'IntConst', type: i32, value: 1n },
      target: entry,
    });
    expect(diagnostics).toEqual([]);
  });

  it('produces no case when only the target fails', () => {
    const { scope } = fixture();
    const diagnostics: Diagnostic[] = [];
    expect(lowerCase(caseOf(i(32), int('1'), '%missing'), scope, diagnostics)).toBeUndefined();
    expect(diagnostics.map((d) => [d.id, d.construct])).toEqual([
      [DiagnosticIds.UnresolvedName, 'switch case target'],
    ]);
  });

  it('produces no case when the constant fails', () => {
    const { scope } = fixture();
    const diagnostics: Diagnostic[] = [];
    expect(lowerCase(caseOf(i(8), int('300'), '%entry'), scope, diagnostics)).toBeUndefined();
    expect(diagnostics.map((d) => [d.id, d.construct])).toEqual([
      [DiagnosticIds.ConstantOutOfRange, 'switch case value'],
    ]);
  });

  it('reports both halves of a broken phi incoming pair', () => {
    const { scope } = fixture();
    const diagnostics: Diagnostic[] = [];
    expect(lowerIncoming(i32, inc(lid('%nope'), '%v'), scope, diagnostics)).toBeUndefined();
    expect(diagnostics.map((d) => [d.id, d.construct])).toEqual([
      [DiagnosticIds.UnresolvedName, 'phi incoming value'],
      [DiagnosticIds.SymbolKindMismatch, 'phi predecessor'],
    ]);
  });

  it('reports both halves of a broken switch case', () => {
    const { scope } = fixture();
    const diagnostics: Diagnostic[] = [];
    expect(lowerCase(caseOf(i(8), int('300'), '%missing'), scope, diagnostics)).toBeUndefined();
    expect(diagnostics.map((d) => [d.id, d.construct])).toEqual([
      [DiagnosticIds.ConstantOutOfRange, 'switch case value'],
      [DiagnosticIds.UnresolvedName, 'switch case target'],
    ]);
  });
});
