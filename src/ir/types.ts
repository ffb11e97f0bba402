import type { FloatKind } from './enums.js';

export interface VoidType {
  kind: 'void';
}

export interface IntType {
  kind: 'int';
  bits: number;
}

export interface FloatType {
  kind: 'float';
  float: FloatKind;
}

export interface PointerType {
  kind: 'ptr';
  addrSpace: number;
}

export interface LabelType {
  kind: 'label';
}

export type IrType = VoidType | IntType | FloatType | PointerType | LabelType;

export const VOID: VoidType = { kind: 'void' };
export const LABEL: LabelType = { kind: 'label' };
export const I1: IntType = { kind: 'int', bits: 1 };

export function typesEqual(a: IrType, b: IrType): boolean {
  switch (a.kind) {
    case 'int':
      return b.kind === 'int' && a.bits === b.bits;
    case 'float':
      return b.kind === 'float' && a.float === b.float;
    case 'ptr':
      return b.kind === 'ptr' && a.addrSpace === b.addrSpace;
    case 'void':
    case 'label':
      return a.kind === b.kind;
  }
}

/**
 * Short human-readable spelling of a type, used in diagnostics.
 */
export function typeName(t: IrType): string {
  switch (t.kind) {
    case 'void':
      return 'void';
    case 'label':
      return 'label';
    case 'int':
      return `i${t.bits}`;
    case 'float':
      return t.float.toLowerCase();
    case 'ptr':
      return t.addrSpace === 0 ? 'ptr' : `ptr addrspace(${t.addrSpace})`;
  }
}
