/**
 * Attribute resolvers built on the keyword tables.
 *
 * `optional*` resolvers take the possibly absent syntax node and map absence to the
 * category's `None` sentinel, so callers have a single path for "not written".
 */
import type { KeywordNode, ThreadLocalNode } from '../frontend/ast.js';
import {
  AtomicOp,
  AtomicOrdering,
  BinaryOp,
  DLLStorageClass,
  FastMathFlag,
  FloatBinaryOp,
  FPred,
  IPred,
  Linkage,
  OverflowFlag,
  Preemption,
  SelectionKind,
  Tail,
  TLSModel,
  UnnamedAddr,
  Visibility,
} from '../ir/enums.js';
import {
  atomicOps,
  atomicOrderings,
  binaryOps,
  dllStorageClasses,
  fastMathFlags as fastMathFlagTable,
  floatBinaryOps,
  fpreds,
  immutables,
  ipreds,
  linkages,
  overflowFlags as overflowFlagTable,
  preemptions,
  selectionKinds,
  tails,
  tlsModels,
  unnamedAddrs,
  visibilities,
} from './enums.js';

export function optionalLinkage(n: KeywordNode | undefined): Linkage {
  if (!n) return Linkage.None;
  return linkages.resolve(n.text);
}

export function optionalVisibility(n: KeywordNode | undefined): Visibility {
  if (!n) return Visibility.None;
  return visibilities.resolve(n.text);
}

export function optionalDLLStorageClass(n: KeywordNode | undefined): DLLStorageClass {
  if (!n) return DLLStorageClass.None;
  return dllStorageClasses.resolve(n.text);
}

export function optionalPreemption(n: KeywordNode | undefined): Preemption {
  if (!n) return Preemption.None;
  return preemptions.resolve(n.text);
}

export function optionalUnnamedAddr(n: KeywordNode | undefined): UnnamedAddr {
  if (!n) return UnnamedAddr.None;
  return unnamedAddrs.resolve(n.text);
}

/** A comdat written without a selection kind selects `any`. */
export function optionalSelectionKind(n: KeywordNode | undefined): SelectionKind {
  if (!n) return SelectionKind.Any;
  return selectionKinds.resolve(n.text);
}

export function optionalTail(n: KeywordNode | undefined): Tail {
  if (!n) return Tail.None;
  return tails.resolve(n.text);
}

export function optionalTLSModel(n: KeywordNode | undefined): TLSModel {
  if (!n) return TLSModel.None;
  return tlsModels.resolve(n.text);
}

/**
 * TLS model of an optional `thread_local` marker.
 *
 *     (no marker)                 -> None
 *     thread_local                -> GeneralDynamic
 *     thread_local(initialexec)   -> InitialExec
 */
export function tlsModelFromThreadLocal(n: ThreadLocalNode | undefined): TLSModel {
  if (!n) return TLSModel.None;
  const model = optionalTLSModel(n.model);
  if (model === TLSModel.None) return TLSModel.GeneralDynamic;
  return model;
}

export function atomicOrdering(n: KeywordNode): AtomicOrdering {
  return atomicOrderings.resolve(n.text);
}

export function atomicOp(n: KeywordNode): AtomicOp {
  return atomicOps.resolve(n.text);
}

export function ipred(n: KeywordNode): IPred {
  return ipreds.resolve(n.text);
}

export function fpred(n: KeywordNode): FPred {
  return fpreds.resolve(n.text);
}

export function binaryOp(n: KeywordNode): BinaryOp {
  return binaryOps.resolve(n.text);
}

export function floatBinaryOp(n: KeywordNode): FloatBinaryOp {
  return floatBinaryOps.resolve(n.text);
}

/** Fast-math flags in source order. */
export function fastMathFlags(ns: KeywordNode[]): FastMathFlag[] {
  return ns.map((n) => fastMathFlagTable.resolve(n.text));
}

/** Overflow flags in source order. */
export function overflowFlags(ns: KeywordNode[]): OverflowFlag[] {
  return ns.map((n) => overflowFlagTable.resolve(n.text));
}

/** `constant` -> true, `global` -> false. */
export function immutable(n: KeywordNode): boolean {
  return immutables.resolve(n.text) === 'constant';
}

/**
 * Presence flags: `exact`, `volatile`, `externally_initialized`, a variadic `...`.
 */
export function present(n: KeywordNode | undefined): boolean {
  return n !== undefined;
}
