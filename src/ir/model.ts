/**
 * In-memory program model populated by the lowering.
 *
 * Objects are plain records. Entities that can be referenced before their definition is
 * lowered (basic blocks, instruction results, globals, functions) are created as shells in a
 * declaration pass and filled in later, so references always point at the final object.
 */
import type {
  AtomicOp,
  AtomicOrdering,
  BinaryOp,
  CallingConv,
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
} from './enums.js';
import type { IntType, IrType, PointerType } from './types.js';

// --- Constants ---------------------------------------------------------------

export interface IntConst {
  kind: 'IntConst';
  type: IntType;
  /** Two's-complement value interpreted as signed when the literal was negative. */
  value: bigint;
}

export interface FloatConst {
  kind: 'FloatConst';
  type: IrType;
  value: number;
}

export interface NullConst {
  kind: 'NullConst';
  type: PointerType;
}

export interface UndefConst {
  kind: 'UndefConst';
  type: IrType;
}

export type Constant = IntConst | FloatConst | NullConst | UndefConst | GlobalVar | Func;

// --- Values ------------------------------------------------------------------

export interface Param {
  kind: 'Param';
  /** Absent for an unnamed parameter of a declaration; definitions number theirs. */
  name?: string;
  type: IrType;
}

/**
 * Result of a value-producing instruction. Created in the declaration pass so that operands
 * lowered earlier in source order can point at it; `def` is set once the instruction is lowered.
 */
export interface LocalValue {
  kind: 'Local';
  name: string;
  type: IrType;
  def?: Instruction;
}

export type Value = Constant | Param | LocalValue;

// --- Composite operands ------------------------------------------------------

/** One `(value, predecessor)` pair of a `phi`. */
export interface Incoming {
  x: Value;
  pred: BasicBlock;
}

/** One `(constant, target)` arm of a `switch`. */
export interface Case {
  x: Constant;
  target: BasicBlock;
}

export function newIncoming(x: Value, pred: BasicBlock): Incoming {
  return { x, pred };
}

export function newCase(x: Constant, target: BasicBlock): Case {
  return { x, target };
}

// --- Instructions ------------------------------------------------------------

interface InstCommon {
  /** Result slot; absent for instructions producing no value. */
  result?: LocalValue;
}

export interface PhiInst extends InstCommon {
  kind: 'Phi';
  type: IrType;
  incs: Incoming[];
}

export interface BinaryInst extends InstCommon {
  kind: 'Binary';
  op: BinaryOp;
  overflowFlags: OverflowFlag[];
  exact: boolean;
  x: Value;
  y: Value;
}

export interface FloatBinaryInst extends InstCommon {
  kind: 'FloatBinary';
  op: FloatBinaryOp;
  fastMathFlags: FastMathFlag[];
  x: Value;
  y: Value;
}

export interface ICmpInst extends InstCommon {
  kind: 'ICmp';
  pred: IPred;
  x: Value;
  y: Value;
}

export interface FCmpInst extends InstCommon {
  kind: 'FCmp';
  pred: FPred;
  fastMathFlags: FastMathFlag[];
  x: Value;
  y: Value;
}

export interface CallInst extends InstCommon {
  kind: 'Call';
  tail: Tail;
  callingConv: CallingConv;
  fastMathFlags: FastMathFlag[];
  retType: IrType;
  callee: Value;
  args: Value[];
}

export interface AtomicRMWInst extends InstCommon {
  kind: 'AtomicRMW';
  volatile: boolean;
  op: AtomicOp;
  dst: Value;
  x: Value;
  ordering: AtomicOrdering;
}

export interface FenceInst extends InstCommon {
  kind: 'Fence';
  ordering: AtomicOrdering;
}

export type Instruction =
  | PhiInst
  | BinaryInst
  | FloatBinaryInst
  | ICmpInst
  | FCmpInst
  | CallInst
  | AtomicRMWInst
  | FenceInst;

// --- Terminators -------------------------------------------------------------

export type Terminator =
  | { kind: 'Ret'; x?: Value }
  | { kind: 'Br'; target: BasicBlock }
  | { kind: 'CondBr'; cond: Value; targetTrue: BasicBlock; targetFalse: BasicBlock }
  | { kind: 'Switch'; x: Value; targetDefault: BasicBlock; cases: Case[] }
  | { kind: 'Unreachable' };

// --- Blocks, functions, globals ----------------------------------------------

export interface BasicBlock {
  kind: 'BasicBlock';
  name: string;
  insts: Instruction[];
  /** Unset until the block body has been lowered. */
  term?: Terminator;
}

export function newBasicBlock(name: string): BasicBlock {
  return { kind: 'BasicBlock', name, insts: [] };
}

export interface ComdatDef {
  kind: 'ComdatDef';
  name: string;
  selectionKind: SelectionKind;
}

/** Linkage-related attributes shared by globals and functions. */
export interface GlobalAttributes {
  linkage: Linkage;
  preemption: Preemption;
  visibility: Visibility;
  dllStorageClass: DLLStorageClass;
  unnamedAddr: UnnamedAddr;
  addrSpace: number;
  comdat?: ComdatDef;
  /** Alignment in bytes; 0 when unspecified. */
  align: number;
}

export interface GlobalVar extends GlobalAttributes {
  kind: 'GlobalVar';
  name: string;
  /** Address type of the global itself. */
  type: PointerType;
  contentType: IrType;
  immutable: boolean;
  tlsModel: TLSModel;
  externallyInitialized: boolean;
  /** Unset for declarations and until pass 2 lowers the initializer. */
  init?: Constant;
  section?: string;
}

export interface FuncSig {
  retType: IrType;
  params: IrType[];
  variadic: boolean;
}

export interface Func extends GlobalAttributes {
  kind: 'Func';
  name: string;
  type: PointerType;
  sig: FuncSig;
  callingConv: CallingConv;
  params: Param[];
  /** Empty for declarations. */
  blocks: BasicBlock[];
}

export interface IrModule {
  sourceFilename?: string;
  comdats: ComdatDef[];
  globals: GlobalVar[];
  funcs: Func[];
}

