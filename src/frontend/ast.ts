/**
 * Syntax-tree contracts for the textual IR.
 *
 * This module defines types/interfaces only. The parser that produces these nodes lives
 * upstream and is assumed to be grammar-conformant: identifier nodes always carry their sigil,
 * keyword nodes always carry a spelling from their vocabulary, and so on.
 */
export interface SourcePosition {
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
  /** 0-based byte offset in the file. */
  offset: number;
}

/**
 * Source span with inclusive start and end positions.
 */
export interface SourceSpan {
  /** User-facing file path (as provided on input). */
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

/**
 * Base shape for all syntax nodes.
 */
export interface BaseNode {
  kind: string;
  span: SourceSpan;
}

// --- Identifiers -------------------------------------------------------------

/** `@name` or `@"quoted name"`. */
export interface GlobalIdentNode extends BaseNode {
  kind: 'GlobalIdent';
  text: string;
}

/** `%name`, `%"quoted name"` or `%7`. */
export interface LocalIdentNode extends BaseNode {
  kind: 'LocalIdent';
  text: string;
}

/** `name:` or `"quoted name":` at the head of a basic block. */
export interface LabelIdentNode extends BaseNode {
  kind: 'LabelIdent';
  text: string;
}

/** `$name` naming a comdat. */
export interface ComdatIdentNode extends BaseNode {
  kind: 'ComdatIdent';
  text: string;
}

// --- Literals ----------------------------------------------------------------

export interface BoolLitNode extends BaseNode {
  kind: 'BoolLit';
  text: string;
}

/** Unsigned decimal literal used for alignments, address spaces, `cc N` and index lists. */
export interface UintLitNode extends BaseNode {
  kind: 'UintLit';
  text: string;
}

/** Possibly signed decimal integer constant. */
export interface IntLitNode extends BaseNode {
  kind: 'IntLit';
  text: string;
}

/** Decimal floating-point constant. */
export interface FloatLitNode extends BaseNode {
  kind: 'FloatLit';
  text: string;
}

/** Quoted string literal, including the surrounding quotes. */
export interface StringLitNode extends BaseNode {
  kind: 'StringLit';
  text: string;
}

export interface NullLitNode extends BaseNode {
  kind: 'NullLit';
}

export interface UndefLitNode extends BaseNode {
  kind: 'UndefLit';
}

/**
 * A keyword token from one closed vocabulary (linkage, ordering, predicate, flag, ...).
 *
 * Which vocabulary applies is determined by the field the node sits in.
 */
export interface KeywordNode extends BaseNode {
  kind: 'Keyword';
  text: string;
}

// --- Attributes --------------------------------------------------------------

/** Named calling convention keyword, e.g. `fastcc`. */
export interface CallingConvEnumNode extends BaseNode {
  kind: 'CallingConvEnum';
  text: string;
}

/** Numeric calling convention, `cc N`. */
export interface CallingConvIntNode extends BaseNode {
  kind: 'CallingConvInt';
  code: UintLitNode;
}

export type CallingConvNode = CallingConvEnumNode | CallingConvIntNode;

/** `thread_local` with an optional `(model)` suffix. */
export interface ThreadLocalNode extends BaseNode {
  kind: 'ThreadLocal';
  model?: KeywordNode;
}

/** `align N`. */
export interface AlignmentNode extends BaseNode {
  kind: 'Alignment';
  n: UintLitNode;
}

/** `addrspace(N)`. */
export interface AddrSpaceNode extends BaseNode {
  kind: 'AddrSpace';
  n: UintLitNode;
}

/** `comdat` or `comdat($name)` attached to a global or function. */
export interface ComdatRefNode extends BaseNode {
  kind: 'ComdatRef';
  name?: ComdatIdentNode;
}

// --- Types -------------------------------------------------------------------

export interface VoidTypeNode extends BaseNode {
  kind: 'VoidType';
}

/** `iN`; `text` holds the full spelling (e.g. `i32`). */
export interface IntTypeNode extends BaseNode {
  kind: 'IntType';
  text: string;
}

/** `half`, `float` or `double`. */
export interface FloatTypeNode extends BaseNode {
  kind: 'FloatType';
  text: string;
}

export interface PointerTypeNode extends BaseNode {
  kind: 'PointerType';
  addrSpace?: AddrSpaceNode;
}

export interface LabelTypeNode extends BaseNode {
  kind: 'LabelType';
}

export type TypeNode =
  | VoidTypeNode
  | IntTypeNode
  | FloatTypeNode
  | PointerTypeNode
  | LabelTypeNode;

// --- Values ------------------------------------------------------------------

export type ConstantNode = IntLitNode | FloatLitNode | BoolLitNode | NullLitNode | UndefLitNode;

export type ValueNode = LocalIdentNode | GlobalIdentNode | ConstantNode;

/** `<type> <value>` operand. */
export interface TypeValueNode extends BaseNode {
  kind: 'TypeValue';
  type: TypeNode;
  value: ValueNode;
}

/** `<type> <constant>`; global names are allowed as address constants. */
export interface TypeConstNode extends BaseNode {
  kind: 'TypeConst';
  type: TypeNode;
  value: ConstantNode | GlobalIdentNode;
}

/** `label %name` operand. */
export interface LabelRefNode extends BaseNode {
  kind: 'LabelRef';
  name: LocalIdentNode;
}

/** `[ value, %pred ]` in a `phi`. */
export interface IncomingNode extends BaseNode {
  kind: 'Incoming';
  x: ValueNode;
  pred: LocalIdentNode;
}

/** `<type> <constant>, label %target` in a `switch`. */
export interface CaseNode extends BaseNode {
  kind: 'Case';
  x: TypeConstNode;
  target: LabelRefNode;
}

// --- Instructions ------------------------------------------------------------

interface InstBase extends BaseNode {
  /** Result name; absent for unnamed results, which receive the next numeric ID. */
  name?: LocalIdentNode;
}

export interface PhiInstNode extends InstBase {
  kind: 'PhiInst';
  type: TypeNode;
  incs: IncomingNode[];
}

/** `add`, `sub`, `mul`, `shl`, `udiv`, `sdiv`, `lshr`, `ashr`, `and`, `or`, `xor`, ... */
export interface BinaryInstNode extends InstBase {
  kind: 'BinaryInst';
  op: KeywordNode;
  overflowFlags: KeywordNode[];
  exact?: KeywordNode;
  x: TypeValueNode;
  y: ValueNode;
}

/** `fadd`, `fsub`, `fmul`, `fdiv`, `frem`. */
export interface FloatBinaryInstNode extends InstBase {
  kind: 'FloatBinaryInst';
  op: KeywordNode;
  fastMathFlags: KeywordNode[];
  x: TypeValueNode;
  y: ValueNode;
}

export interface ICmpInstNode extends InstBase {
  kind: 'ICmpInst';
  pred: KeywordNode;
  x: TypeValueNode;
  y: ValueNode;
}

export interface FCmpInstNode extends InstBase {
  kind: 'FCmpInst';
  fastMathFlags: KeywordNode[];
  pred: KeywordNode;
  x: TypeValueNode;
  y: ValueNode;
}

export interface CallInstNode extends InstBase {
  kind: 'CallInst';
  tail?: KeywordNode;
  fastMathFlags: KeywordNode[];
  callingConv?: CallingConvNode;
  retType: TypeNode;
  callee: ValueNode;
  args: TypeValueNode[];
}

export interface AtomicRMWInstNode extends InstBase {
  kind: 'AtomicRMWInst';
  volatile?: KeywordNode;
  op: KeywordNode;
  dst: TypeValueNode;
  x: TypeValueNode;
  ordering: KeywordNode;
}

export interface FenceInstNode extends InstBase {
  kind: 'FenceInst';
  ordering: KeywordNode;
}

export type InstructionNode =
  | PhiInstNode
  | BinaryInstNode
  | FloatBinaryInstNode
  | ICmpInstNode
  | FCmpInstNode
  | CallInstNode
  | AtomicRMWInstNode
  | FenceInstNode;

// --- Terminators -------------------------------------------------------------

export interface RetTermNode extends BaseNode {
  kind: 'RetTerm';
  x?: TypeValueNode;
}

export interface BrTermNode extends BaseNode {
  kind: 'BrTerm';
  target: LabelRefNode;
}

export interface CondBrTermNode extends BaseNode {
  kind: 'CondBrTerm';
  cond: TypeValueNode;
  targetTrue: LabelRefNode;
  targetFalse: LabelRefNode;
}

export interface SwitchTermNode extends BaseNode {
  kind: 'SwitchTerm';
  x: TypeValueNode;
  targetDefault: LabelRefNode;
  cases: CaseNode[];
}

export interface UnreachableTermNode extends BaseNode {
  kind: 'UnreachableTerm';
}

export type TerminatorNode =
  | RetTermNode
  | BrTermNode
  | CondBrTermNode
  | SwitchTermNode
  | UnreachableTermNode;

// --- Functions ---------------------------------------------------------------

export interface BasicBlockNode extends BaseNode {
  kind: 'BasicBlock';
  label?: LabelIdentNode;
  insts: InstructionNode[];
  term: TerminatorNode;
}

export interface ParamNode extends BaseNode {
  kind: 'Param';
  type: TypeNode;
  name?: LocalIdentNode;
}

/**
 * Function header shared by `define` and `declare`.
 *
 * Optional attribute fields are absent when the keyword does not appear in source.
 */
export interface FuncHeaderNode extends BaseNode {
  kind: 'FuncHeader';
  linkage?: KeywordNode;
  preemption?: KeywordNode;
  visibility?: KeywordNode;
  dllStorageClass?: KeywordNode;
  callingConv?: CallingConvNode;
  retType: TypeNode;
  name: GlobalIdentNode;
  params: ParamNode[];
  /** `...` at the end of the parameter list. */
  variadic?: KeywordNode;
  unnamedAddr?: KeywordNode;
  addrSpace?: AddrSpaceNode;
  comdat?: ComdatRefNode;
  alignment?: AlignmentNode;
}

export interface FuncDefNode extends BaseNode {
  kind: 'FuncDef';
  header: FuncHeaderNode;
  blocks: BasicBlockNode[];
}

export interface FuncDeclNode extends BaseNode {
  kind: 'FuncDecl';
  header: FuncHeaderNode;
}

// --- Module ------------------------------------------------------------------

/** `$name = comdat <selection kind>`. */
export interface ComdatDefNode extends BaseNode {
  kind: 'ComdatDef';
  name: ComdatIdentNode;
  selectionKind?: KeywordNode;
}

/** `@name = [attrs] global|constant <type> [init] [, attrs]`. */
export interface GlobalDeclNode extends BaseNode {
  kind: 'GlobalDecl';
  name: GlobalIdentNode;
  linkage?: KeywordNode;
  preemption?: KeywordNode;
  visibility?: KeywordNode;
  dllStorageClass?: KeywordNode;
  threadLocal?: ThreadLocalNode;
  unnamedAddr?: KeywordNode;
  addrSpace?: AddrSpaceNode;
  externallyInitialized?: KeywordNode;
  immutable: KeywordNode;
  type: TypeNode;
  init?: ConstantNode | GlobalIdentNode;
  section?: StringLitNode;
  comdat?: ComdatRefNode;
  alignment?: AlignmentNode;
}

/** `source_filename = "..."`. */
export interface SourceFilenameNode extends BaseNode {
  kind: 'SourceFilename';
  name: StringLitNode;
}

export type TopLevelNode =
  | SourceFilenameNode
  | ComdatDefNode
  | GlobalDeclNode
  | FuncDeclNode
  | FuncDefNode;

/**
 * One parsed IR module.
 */
export interface ModuleNode extends BaseNode {
  kind: 'Module';
  items: TopLevelNode[];
}
