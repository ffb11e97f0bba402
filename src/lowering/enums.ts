/**
 * Keyword vocabularies: one closed spelling <-> value table per attribute category.
 *
 * Tables are keyed by semantic value so the compiler checks that every value of a category has
 * a spelling; the reverse direction is built and checked for collisions at load time.
 */
import { InternalInvariantError, invariant } from '../diagnostics/errors.js';
import {
  AtomicOp,
  AtomicOrdering,
  BinaryOp,
  DLLStorageClass,
  FastMathFlag,
  FloatBinaryOp,
  FloatKind,
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

export class KeywordTable<V extends string> {
  private readonly byText = new Map<string, V>();
  private readonly byValue = new Map<V, string>();

  constructor(
    readonly category: string,
    values: readonly V[],
    spellings: Readonly<Record<V, string>>,
  ) {
    for (const value of values) {
      const text = spellings[value];
      invariant(!this.byText.has(text), `${category} spelling "${text}" is used twice`);
      this.byText.set(text, value);
      this.byValue.set(value, text);
    }
  }

  /**
   * Value denoted by `text`. A spelling outside the vocabulary breaks the parser contract and
   * throws {@link InternalInvariantError}.
   */
  resolve(text: string): V {
    const value = this.byText.get(text);
    if (value === undefined) {
      throw new InternalInvariantError(`unknown ${this.category} keyword "${text}"`);
    }
    return value;
  }

  has(text: string): boolean {
    return this.byText.has(text);
  }

  spell(value: V): string | undefined {
    return this.byValue.get(value);
  }

  spellings(): string[] {
    return Array.from(this.byText.keys());
  }

  values(): V[] {
    return Array.from(this.byValue.keys());
  }
}

/** All values of an enumeration object except the listed ones. */
export function valuesExcept<V extends string, E extends V = never>(
  all: Readonly<Record<string, V>>,
  ...excluded: E[]
): Exclude<V, E>[] {
  const skip: readonly V[] = excluded;
  return Object.values(all).filter((v): v is Exclude<V, E> => !skip.includes(v));
}

export const linkages = new KeywordTable('linkage', valuesExcept(Linkage, Linkage.None), {
  Private: 'private',
  Internal: 'internal',
  AvailableExternally: 'available_externally',
  LinkOnce: 'linkonce',
  Weak: 'weak',
  Common: 'common',
  Appending: 'appending',
  ExternWeak: 'extern_weak',
  LinkOnceODR: 'linkonce_odr',
  WeakODR: 'weak_odr',
  External: 'external',
});

export const visibilities = new KeywordTable(
  'visibility',
  valuesExcept(Visibility, Visibility.None),
  { Default: 'default', Hidden: 'hidden', Protected: 'protected' },
);

export const dllStorageClasses = new KeywordTable(
  'DLL storage class',
  valuesExcept(DLLStorageClass, DLLStorageClass.None),
  { DLLImport: 'dllimport', DLLExport: 'dllexport' },
);

export const preemptions = new KeywordTable(
  'preemption',
  valuesExcept(Preemption, Preemption.None),
  { DSOLocal: 'dso_local', DSOPreemptable: 'dso_preemptable' },
);

export const selectionKinds = new KeywordTable('selection kind', valuesExcept(SelectionKind), {
  Any: 'any',
  ExactMatch: 'exactmatch',
  Largest: 'largest',
  NoDuplicates: 'noduplicates',
  SameSize: 'samesize',
});

export const tails = new KeywordTable('tail', valuesExcept(Tail, Tail.None), {
  Tail: 'tail',
  MustTail: 'musttail',
  NoTail: 'notail',
});

// `GeneralDynamic` has no keyword: it is what a bare `thread_local` means.
export const tlsModels = new KeywordTable(
  'TLS model',
  valuesExcept(TLSModel, TLSModel.None, TLSModel.GeneralDynamic),
  { LocalDynamic: 'localdynamic', InitialExec: 'initialexec', LocalExec: 'localexec' },
);

export const unnamedAddrs = new KeywordTable(
  'unnamed address',
  valuesExcept(UnnamedAddr, UnnamedAddr.None),
  { UnnamedAddr: 'unnamed_addr', LocalUnnamedAddr: 'local_unnamed_addr' },
);

export const atomicOrderings = new KeywordTable('atomic ordering', valuesExcept(AtomicOrdering), {
  Unordered: 'unordered',
  Monotonic: 'monotonic',
  Acquire: 'acquire',
  Release: 'release',
  AcquireRelease: 'acq_rel',
  SequentiallyConsistent: 'seq_cst',
});

export const atomicOps = new KeywordTable('atomic operation', valuesExcept(AtomicOp), {
  Xchg: 'xchg',
  Add: 'add',
  Sub: 'sub',
  And: 'and',
  NAnd: 'nand',
  Or: 'or',
  Xor: 'xor',
  Max: 'max',
  Min: 'min',
  UMax: 'umax',
  UMin: 'umin',
  FAdd: 'fadd',
  FSub: 'fsub',
});

export const ipreds = new KeywordTable('integer predicate', valuesExcept(IPred), {
  EQ: 'eq',
  NE: 'ne',
  SGE: 'sge',
  SGT: 'sgt',
  SLE: 'sle',
  SLT: 'slt',
  UGE: 'uge',
  UGT: 'ugt',
  ULE: 'ule',
  ULT: 'ult',
});

export const fpreds = new KeywordTable('floating-point predicate', valuesExcept(FPred), {
  False: 'false',
  OEQ: 'oeq',
  OGE: 'oge',
  OGT: 'ogt',
  OLE: 'ole',
  OLT: 'olt',
  ONE: 'one',
  ORD: 'ord',
  True: 'true',
  UEQ: 'ueq',
  UGE: 'uge',
  UGT: 'ugt',
  ULE: 'ule',
  ULT: 'ult',
  UNE: 'une',
  UNO: 'uno',
});

export const fastMathFlags = new KeywordTable('fast-math flag', valuesExcept(FastMathFlag), {
  AFn: 'afn',
  ARcp: 'arcp',
  Contract: 'contract',
  Fast: 'fast',
  NInf: 'ninf',
  NNaN: 'nnan',
  NSZ: 'nsz',
  Reassoc: 'reassoc',
});

export const overflowFlags = new KeywordTable('overflow flag', valuesExcept(OverflowFlag), {
  NSW: 'nsw',
  NUW: 'nuw',
});

export const binaryOps = new KeywordTable('binary operation', valuesExcept(BinaryOp), {
  Add: 'add',
  Sub: 'sub',
  Mul: 'mul',
  UDiv: 'udiv',
  SDiv: 'sdiv',
  URem: 'urem',
  SRem: 'srem',
  Shl: 'shl',
  LShr: 'lshr',
  AShr: 'ashr',
  And: 'and',
  Or: 'or',
  Xor: 'xor',
});

export const floatBinaryOps = new KeywordTable(
  'floating-point binary operation',
  valuesExcept(FloatBinaryOp),
  { FAdd: 'fadd', FSub: 'fsub', FMul: 'fmul', FDiv: 'fdiv', FRem: 'frem' },
);

export const floatKinds = new KeywordTable('floating-point type', valuesExcept(FloatKind), {
  Half: 'half',
  Float: 'float',
  Double: 'double',
});

export const immutables = new KeywordTable<'constant' | 'global'>(
  'immutability',
  ['constant', 'global'],
  { constant: 'constant', global: 'global' },
);
