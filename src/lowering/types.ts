import { invariant } from '../diagnostics/errors.js';
import type { TypeNode } from '../frontend/ast.js';
import type { IrType } from '../ir/types.js';
import { LABEL, VOID } from '../ir/types.js';
import { floatKinds } from './enums.js';
import { optionalAddrSpace } from './literals.js';

/** Largest integer width the format admits. */
export const MAX_INT_BITS = (1 << 23) - 1;

export function lowerType(n: TypeNode): IrType {
  switch (n.kind) {
    case 'VoidType':
      return VOID;
    case 'LabelType':
      return LABEL;
    case 'IntType': {
      const digits = /^i([0-9]+)$/.exec(n.text)?.[1];
      const bits = digits === undefined ? Number.NaN : Number.parseInt(digits, 10);
      invariant(
        bits >= 1 && bits <= MAX_INT_BITS,
        `invalid integer type ${JSON.stringify(n.text)}; expected i1..i${MAX_INT_BITS}`,
      );
      return { kind: 'int', bits };
    }
    case 'FloatType':
      return { kind: 'float', float: floatKinds.resolve(n.text) };
    case 'PointerType':
      return { kind: 'ptr', addrSpace: optionalAddrSpace(n.addrSpace) };
  }
}
