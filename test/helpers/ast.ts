import type {
  BasicBlockNode,
  BinaryInstNode,
  CaseNode,
  ComdatIdentNode,
  ConstantNode,
  FuncDefNode,
  FuncHeaderNode,
  GlobalDeclNode,
  GlobalIdentNode,
  IncomingNode,
  InstructionNode,
  IntLitNode,
  KeywordNode,
  LabelIdentNode,
  LabelRefNode,
  LocalIdentNode,
  ModuleNode,
  ParamNode,
  SourceSpan,
  StringLitNode,
  TerminatorNode,
  TopLevelNode,
  TypeNode,
  TypeValueNode,
  UintLitNode,
  ValueNode,
} from '../../src/frontend/ast.js';

export const s = (line = 1, column = 1, file = 'test.ll'): SourceSpan => ({
  file,
  start: { line, column, offset: 0 },
  end: { line, column, offset: 0 },
});

export const kw = (text: string, line = 1): KeywordNode => ({
  kind: 'Keyword',
  span: s(line),
  text,
});
export const uint = (text: string): UintLitNode => ({ kind: 'UintLit', span: s(), text });
export const int = (text: string, line = 1): IntLitNode => ({
  kind: 'IntLit',
  span: s(line),
  text,
});
export const str = (text: string): StringLitNode => ({ kind: 'StringLit', span: s(), text });

export const gid = (text: string, line = 1): GlobalIdentNode => ({
  kind: 'GlobalIdent',
  span: s(line),
  text,
});
export const lid = (text: string, line = 1): LocalIdentNode => ({
  kind: 'LocalIdent',
  span: s(line),
  text,
});
export const lbl = (text: string, line = 1): LabelIdentNode => ({
  kind: 'LabelIdent',
  span: s(line),
  text,
});
export const cid = (text: string): ComdatIdentNode => ({ kind: 'ComdatIdent', span: s(), text });

export const i = (bits: number): TypeNode => ({ kind: 'IntType', span: s(), text: `i${bits}` });
export const ptr = (): TypeNode => ({ kind: 'PointerType', span: s() });
export const voidT = (): TypeNode => ({ kind: 'VoidType', span: s() });
export const dbl = (): TypeNode => ({ kind: 'FloatType', span: s(), text: 'double' });

export const tv = (type: TypeNode, value: ValueNode, line = 1): TypeValueNode => ({
  kind: 'TypeValue',
  span: s(line),
  type,
  value,
});

export const labelRef = (text: string, line = 1): LabelRefNode => ({
  kind: 'LabelRef',
  span: s(line),
  name: lid(text, line),
});

export const inc = (x: ValueNode, pred: string, line = 1): IncomingNode => ({
  kind: 'Incoming',
  span: s(line),
  x,
  pred: lid(pred, line),
});

export const caseOf = (type: TypeNode, x: ConstantNode, target: string, line = 1): CaseNode => ({
  kind: 'Case',
  span: s(line),
  x: { kind: 'TypeConst', span: s(line), type, value: x },
  target: labelRef(target, line),
});

export const add = (
  x: TypeValueNode,
  y: ValueNode,
  name?: string,
  line = 1,
): BinaryInstNode => ({
  kind: 'BinaryInst',
  span: s(line),
  ...(name === undefined ? {} : { name: lid(name, line) }),
  op: kw('add', line),
  overflowFlags: [],
  x,
  y,
});

export const ret = (x?: TypeValueNode, line = 1): TerminatorNode => ({
  kind: 'RetTerm',
  span: s(line),
  ...(x === undefined ? {} : { x }),
});

export const br = (target: string, line = 1): TerminatorNode => ({
  kind: 'BrTerm',
  span: s(line),
  target: labelRef(target, line),
});

export const block = (
  label: string | undefined,
  insts: InstructionNode[],
  term: TerminatorNode,
  line = 1,
): BasicBlockNode => ({
  kind: 'BasicBlock',
  span: s(line),
  ...(label === undefined ? {} : { label: lbl(label, line) }),
  insts,
  term,
});

export const param = (type: TypeNode, name?: string): ParamNode => ({
  kind: 'Param',
  span: s(),
  type,
  ...(name === undefined ? {} : { name: lid(name) }),
});

export const header = (
  name: string,
  retType: TypeNode,
  params: ParamNode[] = [],
  extra: Partial<FuncHeaderNode> = {},
): FuncHeaderNode => ({
  kind: 'FuncHeader',
  span: s(),
  retType,
  name: gid(name),
  params,
  ...extra,
});

export const define = (h: FuncHeaderNode, blocks: BasicBlockNode[], line = 1): FuncDefNode => ({
  kind: 'FuncDef',
  span: s(line),
  header: h,
  blocks,
});

export const globalVar = (
  name: string,
  type: TypeNode,
  extra: Partial<GlobalDeclNode> = {},
  line = 1,
): GlobalDeclNode => ({
  kind: 'GlobalDecl',
  span: s(line),
  name: gid(name, line),
  immutable: kw('global'),
  type,
  ...extra,
});

export const mod = (items: TopLevelNode[]): ModuleNode => ({ kind: 'Module', span: s(), items });
