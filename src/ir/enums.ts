/**
 * Semantic enumerations of the program model.
 *
 * Each category is a frozen object of values plus a union type of the same name. Categories
 * that may be absent in source carry an explicit `None` member; absence never maps to one of
 * the real values.
 */

export const Linkage = {
  None: 'None',
  Private: 'Private',
  Internal: 'Internal',
  AvailableExternally: 'AvailableExternally',
  LinkOnce: 'LinkOnce',
  Weak: 'Weak',
  Common: 'Common',
  Appending: 'Appending',
  ExternWeak: 'ExternWeak',
  LinkOnceODR: 'LinkOnceODR',
  WeakODR: 'WeakODR',
  External: 'External',
} as const;
export type Linkage = (typeof Linkage)[keyof typeof Linkage];

export const Visibility = {
  None: 'None',
  Default: 'Default',
  Hidden: 'Hidden',
  Protected: 'Protected',
} as const;
export type Visibility = (typeof Visibility)[keyof typeof Visibility];

export const DLLStorageClass = {
  None: 'None',
  DLLImport: 'DLLImport',
  DLLExport: 'DLLExport',
} as const;
export type DLLStorageClass = (typeof DLLStorageClass)[keyof typeof DLLStorageClass];

export const Preemption = {
  None: 'None',
  DSOLocal: 'DSOLocal',
  DSOPreemptable: 'DSOPreemptable',
} as const;
export type Preemption = (typeof Preemption)[keyof typeof Preemption];

export const SelectionKind = {
  Any: 'Any',
  ExactMatch: 'ExactMatch',
  Largest: 'Largest',
  NoDuplicates: 'NoDuplicates',
  SameSize: 'SameSize',
} as const;
export type SelectionKind = (typeof SelectionKind)[keyof typeof SelectionKind];

export const Tail = {
  None: 'None',
  Tail: 'Tail',
  MustTail: 'MustTail',
  NoTail: 'NoTail',
} as const;
export type Tail = (typeof Tail)[keyof typeof Tail];

export const TLSModel = {
  None: 'None',
  /** Plain `thread_local` without a model. */
  GeneralDynamic: 'GeneralDynamic',
  LocalDynamic: 'LocalDynamic',
  InitialExec: 'InitialExec',
  LocalExec: 'LocalExec',
} as const;
export type TLSModel = (typeof TLSModel)[keyof typeof TLSModel];

export const UnnamedAddr = {
  None: 'None',
  UnnamedAddr: 'UnnamedAddr',
  LocalUnnamedAddr: 'LocalUnnamedAddr',
} as const;
export type UnnamedAddr = (typeof UnnamedAddr)[keyof typeof UnnamedAddr];

export const AtomicOrdering = {
  Unordered: 'Unordered',
  Monotonic: 'Monotonic',
  Acquire: 'Acquire',
  Release: 'Release',
  AcquireRelease: 'AcquireRelease',
  SequentiallyConsistent: 'SequentiallyConsistent',
} as const;
export type AtomicOrdering = (typeof AtomicOrdering)[keyof typeof AtomicOrdering];

export const AtomicOp = {
  Xchg: 'Xchg',
  Add: 'Add',
  Sub: 'Sub',
  And: 'And',
  NAnd: 'NAnd',
  Or: 'Or',
  Xor: 'Xor',
  Max: 'Max',
  Min: 'Min',
  UMax: 'UMax',
  UMin: 'UMin',
  FAdd: 'FAdd',
  FSub: 'FSub',
} as const;
export type AtomicOp = (typeof AtomicOp)[keyof typeof AtomicOp];

/** Integer comparison predicates. */
export const IPred = {
  EQ: 'EQ',
  NE: 'NE',
  SGE: 'SGE',
  SGT: 'SGT',
  SLE: 'SLE',
  SLT: 'SLT',
  UGE: 'UGE',
  UGT: 'UGT',
  ULE: 'ULE',
  ULT: 'ULT',
} as const;
export type IPred = (typeof IPred)[keyof typeof IPred];

/** Floating-point comparison predicates. */
export const FPred = {
  False: 'False',
  OEQ: 'OEQ',
  OGE: 'OGE',
  OGT: 'OGT',
  OLE: 'OLE',
  OLT: 'OLT',
  ONE: 'ONE',
  ORD: 'ORD',
  True: 'True',
  UEQ: 'UEQ',
  UGE: 'UGE',
  UGT: 'UGT',
  ULE: 'ULE',
  ULT: 'ULT',
  UNE: 'UNE',
  UNO: 'UNO',
} as const;
export type FPred = (typeof FPred)[keyof typeof FPred];

export const FastMathFlag = {
  AFn: 'AFn',
  ARcp: 'ARcp',
  Contract: 'Contract',
  Fast: 'Fast',
  NInf: 'NInf',
  NNaN: 'NNaN',
  NSZ: 'NSZ',
  Reassoc: 'Reassoc',
} as const;
export type FastMathFlag = (typeof FastMathFlag)[keyof typeof FastMathFlag];

export const OverflowFlag = {
  NSW: 'NSW',
  NUW: 'NUW',
} as const;
export type OverflowFlag = (typeof OverflowFlag)[keyof typeof OverflowFlag];

export const BinaryOp = {
  Add: 'Add',
  Sub: 'Sub',
  Mul: 'Mul',
  UDiv: 'UDiv',
  SDiv: 'SDiv',
  URem: 'URem',
  SRem: 'SRem',
  Shl: 'Shl',
  LShr: 'LShr',
  AShr: 'AShr',
  And: 'And',
  Or: 'Or',
  Xor: 'Xor',
} as const;
export type BinaryOp = (typeof BinaryOp)[keyof typeof BinaryOp];

export const FloatBinaryOp = {
  FAdd: 'FAdd',
  FSub: 'FSub',
  FMul: 'FMul',
  FDiv: 'FDiv',
  FRem: 'FRem',
} as const;
export type FloatBinaryOp = (typeof FloatBinaryOp)[keyof typeof FloatBinaryOp];

export const FloatKind = {
  Half: 'Half',
  Float: 'Float',
  Double: 'Double',
} as const;
export type FloatKind = (typeof FloatKind)[keyof typeof FloatKind];

/**
 * Calling conventions.
 *
 * Most have a keyword spelling; a few vendor conventions are reachable only through the
 * numeric `cc N` form.
 */
export const CallingConv = {
  None: 'None',
  C: 'C',
  Fast: 'Fast',
  Cold: 'Cold',
  GHC: 'GHC',
  HiPE: 'HiPE',
  WebKitJS: 'WebKitJS',
  AnyReg: 'AnyReg',
  PreserveMost: 'PreserveMost',
  PreserveAll: 'PreserveAll',
  Swift: 'Swift',
  CXXFastTLS: 'CXXFastTLS',
  X86StdCall: 'X86StdCall',
  X86FastCall: 'X86FastCall',
  ARMAPCS: 'ARMAPCS',
  ARMAAPCS: 'ARMAAPCS',
  ARMAAPCSVFP: 'ARMAAPCSVFP',
  MSP430Intr: 'MSP430Intr',
  X86ThisCall: 'X86ThisCall',
  PTXKernel: 'PTXKernel',
  PTXDevice: 'PTXDevice',
  SPIRFunc: 'SPIRFunc',
  SPIRKernel: 'SPIRKernel',
  IntelOCLBI: 'IntelOCLBI',
  X86_64SysV: 'X86_64SysV',
  Win64: 'Win64',
  X86VectorCall: 'X86VectorCall',
  HHVM: 'HHVM',
  HHVMC: 'HHVMC',
  X86Intr: 'X86Intr',
  AVRIntr: 'AVRIntr',
  AVRSignal: 'AVRSignal',
  AVRBuiltin: 'AVRBuiltin',
  AMDGPUVS: 'AMDGPUVS',
  AMDGPUGS: 'AMDGPUGS',
  AMDGPUPS: 'AMDGPUPS',
  AMDGPUCS: 'AMDGPUCS',
  AMDGPUKernel: 'AMDGPUKernel',
  X86RegCall: 'X86RegCall',
  AMDGPUHS: 'AMDGPUHS',
  MSP430Builtin: 'MSP430Builtin',
  AMDGPULS: 'AMDGPULS',
  AMDGPUES: 'AMDGPUES',
} as const;
export type CallingConv = (typeof CallingConv)[keyof typeof CallingConv];
