import { InternalInvariantError, invariant } from '../diagnostics/errors.js';
import type {
  AddrSpaceNode,
  AlignmentNode,
  BoolLitNode,
  StringLitNode,
  UintLitNode,
} from '../frontend/ast.js';
import { decodeUtf8, unquoteBytes } from './escape.js';

const UINT64_MAX = (1n << 64n) - 1n;

/** Boolean value of a `true` / `false` literal. */
export function boolLit(n: BoolLitNode): boolean {
  switch (n.text) {
    case 'true':
      return true;
    case 'false':
      return false;
    default:
      throw new InternalInvariantError(
        `invalid boolean literal; expected \`true\` or \`false\`, got \`${n.text}\``,
      );
  }
}

/**
 * Value of an unsigned decimal literal as a 64-bit unsigned integer.
 *
 * Only plain digits are accepted: a leading sign is rejected even though the upstream grammar
 * currently admits one.
 */
export function uintLit(n: UintLitNode): bigint {
  const text = n.text;
  invariant(
    /^[0-9]+$/.test(text),
    `unable to parse unsigned integer literal ${JSON.stringify(text)}; invalid syntax`,
  );
  const x = BigInt(text);
  invariant(
    x <= UINT64_MAX,
    `unable to parse unsigned integer literal ${JSON.stringify(text)}; value out of range`,
  );
  return x;
}

/** Values of an ordered list of unsigned literals (e.g. an index list). */
export function uintList(ns: UintLitNode[]): bigint[] {
  return ns.map(uintLit);
}

/**
 * Both decodings of a string literal. Literal contents are arbitrary bytes; `text` is their
 * UTF-8 reading and may contain replacement characters.
 */
export interface DecodedString {
  text: string;
  bytes: Uint8Array;
}

export function stringLit(n: StringLitNode): DecodedString {
  const bytes = unquoteBytes(n.text);
  return { text: decodeUtf8(bytes), bytes };
}

export function stringLitBytes(n: StringLitNode): Uint8Array {
  return unquoteBytes(n.text);
}

function smallUint(what: string, n: UintLitNode): number {
  const x = uintLit(n);
  invariant(x <= BigInt(0xffffffff), `${what} ${x} does not fit in 32 bits`);
  return Number(x);
}

export function alignment(n: AlignmentNode): number {
  return smallUint('alignment', n.n);
}

export function addrSpace(n: AddrSpaceNode): number {
  return smallUint('address space', n.n);
}

/** Address space of an optional `addrspace(N)`; the default address space is 0. */
export function optionalAddrSpace(n: AddrSpaceNode | undefined): number {
  if (!n) return 0;
  return addrSpace(n);
}
