import { describe, expect, it } from 'vitest';

import { InternalInvariantError } from '../src/diagnostics/errors.js';
import type { BoolLitNode } from '../src/frontend/ast.js';
import {
  comdat,
  global,
  label,
  local,
  optionalLabel,
  optionalLocal,
} from '../src/lowering/identifiers.js';
import {
  addrSpace,
  alignment,
  boolLit,
  optionalAddrSpace,
  stringLit,
  stringLitBytes,
  uintLit,
  uintList,
} from '../src/lowering/literals.js';
import { cid, gid, lbl, lid, s, str, uint } from './helpers/ast.js';

const bool = (text: string): BoolLitNode => ({ kind: 'BoolLit', span: s(), text });

describe('identifiers', () => {
  it('strips the sigil of bare names', () => {
    expect(global(gid('@main'))).toBe('main');
    expect(local(lid('%x'))).toBe('x');
    expect(local(lid('%7'))).toBe('7');
    expect(label(lbl('entry:'))).toBe('entry');
    expect(comdat(cid('$grp'))).toBe('grp');
  });

  it('decodes quoted names', () => {
    expect(global(gid('@"hello world"'))).toBe('hello world');
    expect(local(lid('%"a\\22b"'))).toBe('a"b');
    expect(label(lbl('"bb 1":'))).toBe('bb 1');
  });

  it('reports a missing sigil as a contract violation', () => {
    expect(() => global(gid('main'))).toThrow(InternalInvariantError);
    expect(() => global(gid('main'))).toThrow(
      `invalid global identifier "main"; missing '@' prefix`,
    );
    expect(() => local(lid('@x'))).toThrow(`invalid local identifier "@x"; missing '%' prefix`);
    expect(() => label(lbl('entry'))).toThrow(
      `invalid label identifier "entry"; missing ':' suffix`,
    );
  });

  it('maps an absent identifier to undefined', () => {
    expect(optionalLocal(undefined)).toBeUndefined();
    expect(optionalLabel(undefined)).toBeUndefined();
    expect(optionalLocal(lid('%v'))).toBe('v');
  });

  it('keeps an empty quoted name apart from an absent one', () => {
    expect(optionalLocal(lid('%""'))).toBe('');
    expect(optionalLabel(lbl('"":'))).toBe('');
  });

  it('decodes names idempotently', () => {
    const once = global(gid('@"\\41bc"'));
    expect(once).toBe('Abc');
    expect(global(gid(`@${once}`))).toBe(once);
  });
});

describe('literals', () => {
  it('reads booleans', () => {
    expect(boolLit(bool('true'))).toBe(true);
    expect(boolLit(bool('false'))).toBe(false);
    expect(() => boolLit(bool('TRUE'))).toThrow(InternalInvariantError);
  });

  it('reads unsigned integers up to 2^64-1', () => {
    expect(uintLit(uint('0'))).toBe(0n);
    expect(uintLit(uint('42'))).toBe(42n);
    expect(uintLit(uint('18446744073709551615'))).toBe(18446744073709551615n);
    expect(() => uintLit(uint('18446744073709551616'))).toThrow('value out of range');
  });

  it('rejects signed spellings of unsigned integers', () => {
    expect(() => uintLit(uint('-1'))).toThrow(
      'unable to parse unsigned integer literal "-1"; invalid syntax',
    );
    expect(() => uintLit(uint('+1'))).toThrow(InternalInvariantError);
    expect(() => uintLit(uint(''))).toThrow(InternalInvariantError);
  });

  it('reads unsigned lists in order', () => {
    expect(uintList([uint('3'), uint('1'), uint('2')])).toEqual([3n, 1n, 2n]);
    expect(uintList([])).toEqual([]);
  });

  it('reads string literals as bytes and text', () => {
    const v = stringLit(str('"hi\\0A"'));
    expect(v.text).toBe('hi\n');
    expect(Array.from(v.bytes)).toEqual([0x68, 0x69, 0x0a]);
    expect(Array.from(stringLitBytes(str('"\\00\\FF"')))).toEqual([0x00, 0xff]);
  });

  it('replaces invalid UTF-8 in the text reading only', () => {
    const v = stringLit(str('"\\FF"'));
    expect(v.text).toBe('\uFFFD');
    expect(Array.from(v.bytes)).toEqual([0xff]);
  });

  it('reads alignments and address spaces', () => {
    expect(alignment({ kind: 'Alignment', span: s(), n: uint('16') })).toBe(16);
    expect(addrSpace({ kind: 'AddrSpace', span: s(), n: uint('3') })).toBe(3);
    expect(optionalAddrSpace(undefined)).toBe(0);
    expect(() => addrSpace({ kind: 'AddrSpace', span: s(), n: uint('4294967296') })).toThrow(
      'address space 4294967296 does not fit in 32 bits',
    );
  });
});
