import { invariant } from '../diagnostics/errors.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type {
  ConstantNode,
  GlobalIdentNode,
  SourceSpan,
  TypeConstNode,
} from '../frontend/ast.js';
import type { Constant } from '../ir/model.js';
import type { IrType } from '../ir/types.js';
import { typeName, typesEqual } from '../ir/types.js';
import { global } from './identifiers.js';
import { boolLit } from './literals.js';
import { errorAt } from './report.js';
import type { SymbolTable } from './symbols.js';
import { lowerType } from './types.js';

function typeMismatch(
  diagnostics: Diagnostic[],
  span: SourceSpan,
  subject: string,
  construct: string,
  message: string,
): undefined {
  errorAt(diagnostics, DiagnosticIds.TypeMismatch, span, message, { subject, construct });
  return undefined;
}

const DECIMAL_FLOAT = /^[-+]?(?:[0-9]+\.?[0-9]*|\.[0-9]+)(?:[eE][-+]?[0-9]+)?$/;

/**
 * Range of values an `iN` constant may be spelled with: signed or unsigned readings are both
 * accepted, so `i8 -1` and `i8 255` denote the same bits.
 */
export function intConstRange(bits: number): { min: bigint; max: bigint } {
  const b = BigInt(bits);
  return { min: -(1n << (b - 1n)), max: (1n << b) - 1n };
}

/**
 * Lower a constant operand against the type it is used with.
 *
 * Global names are resolved through the module's table and must be used at pointer type.
 */
export function lowerConstant(
  type: IrType,
  n: ConstantNode | GlobalIdentNode,
  globals: SymbolTable,
  construct: string,
  diagnostics: Diagnostic[],
): Constant | undefined {
  switch (n.kind) {
    case 'IntLit': {
      invariant(/^[-+]?[0-9]+$/.test(n.text), `invalid integer literal ${JSON.stringify(n.text)}`);
      if (type.kind !== 'int') {
        return typeMismatch(
          diagnostics,
          n.span,
          n.text,
          construct,
          `Integer constant ${n.text} used with non-integer type ${typeName(type)}.`,
        );
      }
      const value = BigInt(n.text);
      const { min, max } = intConstRange(type.bits);
      if (value < min || value > max) {
        errorAt(
          diagnostics,
          DiagnosticIds.ConstantOutOfRange,
          n.span,
          `Integer constant ${n.text} does not fit in ${typeName(type)}.`,
          { subject: n.text, construct },
        );
        return undefined;
      }
      return { kind: 'IntConst', type, value };
    }
    case 'BoolLit': {
      const b = boolLit(n);
      if (type.kind !== 'int' || type.bits !== 1) {
        return typeMismatch(
          diagnostics,
          n.span,
          n.text,
          construct,
          `Boolean constant ${n.text} used with type ${typeName(type)}; expected i1.`,
        );
      }
      return { kind: 'IntConst', type, value: b ? 1n : 0n };
    }
    case 'FloatLit': {
      invariant(
        DECIMAL_FLOAT.test(n.text),
        `invalid floating-point literal ${JSON.stringify(n.text)}`,
      );
      if (type.kind !== 'float') {
        return typeMismatch(
          diagnostics,
          n.span,
          n.text,
          construct,
          `Floating-point constant ${n.text} used with non-floating-point type ${typeName(type)}.`,
        );
      }
      const value = Number(n.text);
      if (!Number.isFinite(value)) {
        errorAt(
          diagnostics,
          DiagnosticIds.ConstantOutOfRange,
          n.span,
          `Floating-point constant ${n.text} does not fit in ${typeName(type)}.`,
          { subject: n.text, construct },
        );
        return undefined;
      }
      return { kind: 'FloatConst', type, value };
    }
    case 'NullLit':
      if (type.kind !== 'ptr') {
        return typeMismatch(
          diagnostics,
          n.span,
          'null',
          construct,
          `null used with non-pointer type ${typeName(type)}.`,
        );
      }
      return { kind: 'NullConst', type };
    case 'UndefLit':
      if (type.kind === 'void' || type.kind === 'label') {
        return typeMismatch(
          diagnostics,
          n.span,
          'undef',
          construct,
          `undef used with type ${typeName(type)}.`,
        );
      }
      return { kind: 'UndefConst', type };
    case 'GlobalIdent': {
      const name = global(n);
      const v = globals.resolveValue(name, n.span, construct, diagnostics, '@');
      if (!v) return undefined;
      invariant(
        v.kind === 'GlobalVar' || v.kind === 'Func',
        `module table entry "@${name}" is not a global`,
      );
      if (!typesEqual(v.type, type)) {
        return typeMismatch(
          diagnostics,
          n.span,
          `@${name}`,
          construct,
          `Global "@${name}" has type ${typeName(v.type)}, used as ${typeName(type)}.`,
        );
      }
      return v;
    }
  }
}

/** `<type> <constant>`: lower the type, then the constant against it. */
export function lowerTypeConst(
  n: TypeConstNode,
  globals: SymbolTable,
  construct: string,
  diagnostics: Diagnostic[],
): Constant | undefined {
  return lowerConstant(lowerType(n.type), n.value, globals, construct, diagnostics);
}
