import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type {
  CaseNode,
  IncomingNode,
  LabelRefNode,
  TypeValueNode,
  ValueNode,
} from '../frontend/ast.js';
import type { BasicBlock, Case, Incoming, Value } from '../ir/model.js';
import { newCase, newIncoming } from '../ir/model.js';
import type { IrType } from '../ir/types.js';
import { typeName, typesEqual } from '../ir/types.js';
import { lowerConstant, lowerTypeConst } from './constants.js';
import { local } from './identifiers.js';
import { errorAt } from './report.js';
import type { SymbolTable } from './symbols.js';
import { lowerType } from './types.js';

/**
 * Name tables visible while lowering one function body: the function's own (frozen) locals
 * and the module's globals. Owned by a single function lowering and dropped with it.
 */
export interface FunctionScope {
  locals: SymbolTable;
  globals: SymbolTable;
  /** Declared return type, for `ret`. */
  retType: IrType;
}

/**
 * Lower a value operand used at `type`.
 */
export function lowerValue(
  type: IrType,
  n: ValueNode,
  scope: FunctionScope,
  construct: string,
  diagnostics: Diagnostic[],
): Value | undefined {
  if (n.kind !== 'LocalIdent') {
    return lowerConstant(type, n, scope.globals, construct, diagnostics);
  }
  const name = local(n);
  const v = scope.locals.resolveValue(name, n.span, construct, diagnostics);
  if (!v) return undefined;
  if (!typesEqual(v.type, type)) {
    errorAt(
      diagnostics,
      DiagnosticIds.TypeMismatch,
      n.span,
      `"%${name}" has type ${typeName(v.type)}, used as ${typeName(type)}.`,
      { subject: `%${name}`, construct },
    );
    return undefined;
  }
  return v;
}

export function lowerTypeValue(
  n: TypeValueNode,
  scope: FunctionScope,
  construct: string,
  diagnostics: Diagnostic[],
): Value | undefined {
  return lowerValue(lowerType(n.type), n.value, scope, construct, diagnostics);
}

/** `label %name` -> the block declared under that name. */
export function lowerBlockRef(
  n: LabelRefNode,
  scope: FunctionScope,
  construct: string,
  diagnostics: Diagnostic[],
): BasicBlock | undefined {
  return scope.locals.resolveBlock(local(n.name), n.name.span, construct, diagnostics);
}

/**
 * One `[value, %pred]` pair of a `phi` of type `type`.
 *
 * The predecessor must name a basic block; a value of the same name is a kind mismatch. Both
 * halves are lowered and reported before either failure drops the pair.
 */
export function lowerIncoming(
  type: IrType,
  n: IncomingNode,
  scope: FunctionScope,
  diagnostics: Diagnostic[],
): Incoming | undefined {
  const x = lowerValue(type, n.x, scope, 'phi incoming value', diagnostics);
  const pred = scope.locals.resolveBlock(
    local(n.pred),
    n.pred.span,
    'phi predecessor',
    diagnostics,
  );
  if (!x || !pred) return undefined;
  return newIncoming(x, pred);
}

/**
 * One `<type> <constant>, label %target` arm of a `switch`. Both halves are lowered and
 * reported; either failing produces no case.
 */
export function lowerCase(
  n: CaseNode,
  scope: FunctionScope,
  diagnostics: Diagnostic[],
): Case | undefined {
  const x = lowerTypeConst(n.x, scope.globals, 'switch case value', diagnostics);
  const target = lowerBlockRef(n.target, scope, 'switch case target', diagnostics);
  if (!x || !target) return undefined;
  return newCase(x, target);
}
