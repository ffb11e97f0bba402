import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type {
  InstructionNode,
  SourceSpan,
  TerminatorNode,
  TypeValueNode,
} from '../frontend/ast.js';
import type { Instruction, LocalValue, Terminator, Value } from '../ir/model.js';
import type { IrType } from '../ir/types.js';
import { I1, typeName, typesEqual } from '../ir/types.js';
import {
  atomicOp,
  atomicOrdering,
  binaryOp,
  fastMathFlags,
  floatBinaryOp,
  fpred,
  ipred,
  optionalTail,
  overflowFlags,
  present,
} from './attributes.js';
import { optionalCallingConv } from './callconv.js';
import type { FunctionScope } from './operands.js';
import {
  lowerBlockRef,
  lowerCase,
  lowerIncoming,
  lowerTypeValue,
  lowerValue,
} from './operands.js';
import { errorAt } from './report.js';
import { lowerType } from './types.js';

/** `xs` when every element lowered, otherwise `undefined`. */
function allLowered<T>(xs: (T | undefined)[]): T[] | undefined {
  const out: T[] = [];
  for (const x of xs) {
    if (x === undefined) return undefined;
    out.push(x);
  }
  return out;
}

function requireType(
  type: IrType,
  ok: boolean,
  expected: string,
  span: SourceSpan,
  construct: string,
  diagnostics: Diagnostic[],
): boolean {
  if (ok) return true;
  errorAt(
    diagnostics,
    DiagnosticIds.TypeMismatch,
    span,
    `Invalid operand type ${typeName(type)} for ${construct}; expected ${expected}.`,
    { subject: typeName(type), construct },
  );
  return false;
}

/**
 * Type of the value an instruction produces, or `undefined` when it produces none. Computed
 * from syntax alone so results can be declared before any operand is lowered.
 */
export function resultTypeOf(n: InstructionNode): IrType | undefined {
  switch (n.kind) {
    case 'PhiInst':
      return lowerType(n.type);
    case 'BinaryInst':
    case 'FloatBinaryInst':
      return lowerType(n.x.type);
    case 'ICmpInst':
    case 'FCmpInst':
      return I1;
    case 'AtomicRMWInst':
      return lowerType(n.x.type);
    case 'CallInst': {
      const t = lowerType(n.retType);
      return t.kind === 'void' ? undefined : t;
    }
    case 'FenceInst':
      return undefined;
  }
}

/** Lower the two operands of a binary-shaped instruction; `y` takes the type of `x`. */
function lowerOperandPair(
  x: TypeValueNode,
  y: TypeValueNode['value'],
  scope: FunctionScope,
  construct: string,
  diagnostics: Diagnostic[],
): { type: IrType; x: Value; y: Value } | undefined {
  const type = lowerType(x.type);
  const lx = lowerValue(type, x.value, scope, `${construct} operand`, diagnostics);
  if (!lx) return undefined;
  const ly = lowerValue(type, y, scope, `${construct} operand`, diagnostics);
  if (!ly) return undefined;
  return { type, x: lx, y: ly };
}

/**
 * Lower one instruction body. `result` is the slot declared for it in the declaration pass.
 */
export function lowerInstruction(
  n: InstructionNode,
  result: LocalValue | undefined,
  scope: FunctionScope,
  diagnostics: Diagnostic[],
): Instruction | undefined {
  const withResult = (inst: Instruction): Instruction => {
    if (result) {
      inst.result = result;
      result.def = inst;
    }
    return inst;
  };

  switch (n.kind) {
    case 'PhiInst': {
      const type = lowerType(n.type);
      const incs = allLowered(n.incs.map((inc) => lowerIncoming(type, inc, scope, diagnostics)));
      if (!incs) return undefined;
      return withResult({ kind: 'Phi', type, incs });
    }
    case 'BinaryInst': {
      const op = binaryOp(n.op);
      const ops = lowerOperandPair(n.x, n.y, scope, n.op.text, diagnostics);
      if (!ops) return undefined;
      const ok = ops.type.kind === 'int';
      if (!requireType(ops.type, ok, 'integer', n.x.span, n.op.text, diagnostics)) {
        return undefined;
      }
      return withResult({
        kind: 'Binary',
        op,
        overflowFlags: overflowFlags(n.overflowFlags),
        exact: present(n.exact),
        x: ops.x,
        y: ops.y,
      });
    }
    case 'FloatBinaryInst': {
      const op = floatBinaryOp(n.op);
      const ops = lowerOperandPair(n.x, n.y, scope, n.op.text, diagnostics);
      if (!ops) return undefined;
      const ok = ops.type.kind === 'float';
      if (!requireType(ops.type, ok, 'floating-point', n.x.span, n.op.text, diagnostics)) {
        return undefined;
      }
      return withResult({
        kind: 'FloatBinary',
        op,
        fastMathFlags: fastMathFlags(n.fastMathFlags),
        x: ops.x,
        y: ops.y,
      });
    }
    case 'ICmpInst': {
      const pred = ipred(n.pred);
      const ops = lowerOperandPair(n.x, n.y, scope, 'icmp', diagnostics);
      if (!ops) return undefined;
      const ok = ops.type.kind === 'int' || ops.type.kind === 'ptr';
      if (!requireType(ops.type, ok, 'integer or pointer', n.x.span, 'icmp', diagnostics)) {
        return undefined;
      }
      return withResult({ kind: 'ICmp', pred, x: ops.x, y: ops.y });
    }
    case 'FCmpInst': {
      const pred = fpred(n.pred);
      const ops = lowerOperandPair(n.x, n.y, scope, 'fcmp', diagnostics);
      if (!ops) return undefined;
      const ok = ops.type.kind === 'float';
      if (!requireType(ops.type, ok, 'floating-point', n.x.span, 'fcmp', diagnostics)) {
        return undefined;
      }
      return withResult({
        kind: 'FCmp',
        pred,
        fastMathFlags: fastMathFlags(n.fastMathFlags),
        x: ops.x,
        y: ops.y,
      });
    }
    case 'CallInst': {
      const callingConv = optionalCallingConv(n.callingConv, diagnostics);
      if (callingConv === undefined) return undefined;
      const retType = lowerType(n.retType);
      const calleeType: IrType = { kind: 'ptr', addrSpace: 0 };
      const callee = lowerValue(calleeType, n.callee, scope, 'callee', diagnostics);
      if (!callee) return undefined;
      const args = allLowered(
        n.args.map((a) => lowerTypeValue(a, scope, 'call argument', diagnostics)),
      );
      if (!args) return undefined;
      if (callee.kind === 'Func') {
        const sig = callee.sig;
        const arityOk = sig.variadic
          ? args.length >= sig.params.length
          : args.length === sig.params.length;
        if (!arityOk || !typesEqual(sig.retType, retType)) {
          const arity = `${sig.params.length}${sig.variadic ? '+' : ''}`;
          errorAt(
            diagnostics,
            DiagnosticIds.TypeMismatch,
            n.span,
            `Call to "@${callee.name}" does not match its signature ` +
              `(${arity} parameter(s) returning ${typeName(sig.retType)}).`,
            { subject: `@${callee.name}`, construct: 'call' },
          );
          return undefined;
        }
        let argsOk = true;
        for (const [k, paramType] of sig.params.entries()) {
          const arg = args[k];
          if (!arg || typesEqual(arg.type, paramType)) continue;
          argsOk = false;
          errorAt(
            diagnostics,
            DiagnosticIds.TypeMismatch,
            n.args[k]?.span ?? n.span,
            `Argument ${k + 1} of call to "@${callee.name}" has type ${typeName(arg.type)}; ` +
              `expected ${typeName(paramType)}.`,
            { subject: typeName(arg.type), construct: 'call argument' },
          );
        }
        if (!argsOk) return undefined;
      }
      return withResult({
        kind: 'Call',
        tail: optionalTail(n.tail),
        callingConv,
        fastMathFlags: fastMathFlags(n.fastMathFlags),
        retType,
        callee,
        args,
      });
    }
    case 'AtomicRMWInst': {
      const op = atomicOp(n.op);
      const ordering = atomicOrdering(n.ordering);
      const dst = lowerTypeValue(n.dst, scope, 'atomicrmw address', diagnostics);
      if (!dst) return undefined;
      const ok = dst.type.kind === 'ptr';
      if (!requireType(dst.type, ok, 'pointer', n.dst.span, 'atomicrmw address', diagnostics)) {
        return undefined;
      }
      const x = lowerTypeValue(n.x, scope, 'atomicrmw operand', diagnostics);
      if (!x) return undefined;
      return withResult({ kind: 'AtomicRMW', volatile: present(n.volatile), op, dst, x, ordering });
    }
    case 'FenceInst':
      return withResult({ kind: 'Fence', ordering: atomicOrdering(n.ordering) });
  }
}

export function lowerTerminator(
  n: TerminatorNode,
  scope: FunctionScope,
  diagnostics: Diagnostic[],
): Terminator | undefined {
  switch (n.kind) {
    case 'RetTerm': {
      if (!n.x) {
        if (scope.retType.kind !== 'void') {
          errorAt(
            diagnostics,
            DiagnosticIds.TypeMismatch,
            n.span,
            `ret without a value in a function returning ${typeName(scope.retType)}.`,
            { subject: 'ret', construct: 'ret' },
          );
          return undefined;
        }
        return { kind: 'Ret' };
      }
      const type = lowerType(n.x.type);
      if (!typesEqual(type, scope.retType)) {
        errorAt(
          diagnostics,
          DiagnosticIds.TypeMismatch,
          n.x.span,
          `ret of type ${typeName(type)} in a function returning ${typeName(scope.retType)}.`,
          { subject: typeName(type), construct: 'ret value' },
        );
        return undefined;
      }
      const x = lowerValue(type, n.x.value, scope, 'ret value', diagnostics);
      if (!x) return undefined;
      return { kind: 'Ret', x };
    }
    case 'BrTerm': {
      const target = lowerBlockRef(n.target, scope, 'br target', diagnostics);
      if (!target) return undefined;
      return { kind: 'Br', target };
    }
    case 'CondBrTerm': {
      const condType = lowerType(n.cond.type);
      const isBool = condType.kind === 'int' && condType.bits === 1;
      if (!requireType(condType, isBool, 'i1', n.cond.span, 'br condition', diagnostics)) {
        return undefined;
      }
      const cond = lowerValue(I1, n.cond.value, scope, 'br condition', diagnostics);
      if (!cond) return undefined;
      const targetTrue = lowerBlockRef(n.targetTrue, scope, 'br target', diagnostics);
      if (!targetTrue) return undefined;
      const targetFalse = lowerBlockRef(n.targetFalse, scope, 'br target', diagnostics);
      if (!targetFalse) return undefined;
      return { kind: 'CondBr', cond, targetTrue, targetFalse };
    }
    case 'SwitchTerm': {
      const type = lowerType(n.x.type);
      if (!requireType(type, type.kind === 'int', 'integer', n.x.span, 'switch', diagnostics)) {
        return undefined;
      }
      const x = lowerValue(type, n.x.value, scope, 'switch condition', diagnostics);
      if (!x) return undefined;
      const targetDefault = lowerBlockRef(
        n.targetDefault,
        scope,
        'switch default target',
        diagnostics,
      );
      if (!targetDefault) return undefined;
      const cases = allLowered(n.cases.map((c) => lowerCase(c, scope, diagnostics)));
      if (!cases) return undefined;
      for (const [i, c] of cases.entries()) {
        if (typesEqual(c.x.type, type)) continue;
        const span = n.cases[i]?.span ?? n.span;
        errorAt(
          diagnostics,
          DiagnosticIds.TypeMismatch,
          span,
          `switch case of type ${typeName(c.x.type)} on a ${typeName(type)} condition.`,
          { subject: typeName(c.x.type), construct: 'switch case value' },
        );
        return undefined;
      }
      // Signed and unsigned spellings of the same bits are the same case.
      const seen = new Set<bigint>();
      let unique = true;
      for (const [i, c] of cases.entries()) {
        if (c.x.kind !== 'IntConst' || type.kind !== 'int') continue;
        const bits = BigInt.asUintN(type.bits, c.x.value);
        if (!seen.has(bits)) {
          seen.add(bits);
          continue;
        }
        unique = false;
        errorAt(
          diagnostics,
          DiagnosticIds.DuplicateCase,
          n.cases[i]?.span ?? n.span,
          `Switch case value ${typeName(type)} ${c.x.value} duplicates an earlier case.`,
          { subject: String(c.x.value), construct: 'switch case value' },
        );
      }
      if (!unique) return undefined;
      return { kind: 'Switch', x, targetDefault, cases };
    }
    case 'UnreachableTerm':
      return { kind: 'Unreachable' };
  }
}
