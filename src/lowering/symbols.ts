import { invariant } from '../diagnostics/errors.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { SourceSpan } from '../frontend/ast.js';
import type { BasicBlock, Value } from '../ir/model.js';
import { errorAt } from './report.js';

/**
 * A name-table entry: the already-created model entity, tagged with its kind.
 */
export type SymbolEntry = { kind: 'value'; value: Value } | { kind: 'block'; block: BasicBlock };

export type SymbolKind = SymbolEntry['kind'];

const kindNames: Record<SymbolKind, string> = {
  value: 'value',
  block: 'basic block',
};

/**
 * Read-only name table produced by {@link SymbolTableBuilder.freeze}.
 *
 * Lookups report two distinct failures: the name is not declared at all (`UnresolvedName`),
 * or it is declared as an entity of another kind (`SymbolKindMismatch`).
 */
export class SymbolTable {
  constructor(
    /** Scope description used in diagnostics, e.g. `function @main`. */
    readonly scope: string,
    private readonly entries: ReadonlyMap<string, SymbolEntry>,
  ) {}

  get size(): number {
    return this.entries.size;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): SymbolEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return Array.from(this.entries.keys());
  }

  /**
   * Resolve `name` to an entity of the expected kind.
   *
   * @param sigil Prefix used when echoing the name in messages (`%` or `@`).
   * @param construct What is being lowered, e.g. `phi predecessor`.
   */
  resolve<K extends SymbolKind>(
    name: string,
    expected: K,
    span: SourceSpan,
    construct: string,
    diagnostics: Diagnostic[],
    sigil = '%',
  ): Extract<SymbolEntry, { kind: K }> | undefined {
    const spelled = `${sigil}${name}`;
    const entry = this.entries.get(name);
    if (!entry) {
      errorAt(
        diagnostics,
        DiagnosticIds.UnresolvedName,
        span,
        `Unable to locate ${kindNames[expected]} "${spelled}" in ${this.scope} (${construct}).`,
        { subject: spelled, construct },
      );
      return undefined;
    }
    if (!isKind(entry, expected)) {
      errorAt(
        diagnostics,
        DiagnosticIds.SymbolKindMismatch,
        span,
        `Invalid ${construct}: "${spelled}" is a ${kindNames[entry.kind]}, ` +
          `expected a ${kindNames[expected]}.`,
        { subject: spelled, construct },
      );
      return undefined;
    }
    return entry;
  }

  resolveBlock(
    name: string,
    span: SourceSpan,
    construct: string,
    diagnostics: Diagnostic[],
  ): BasicBlock | undefined {
    return this.resolve(name, 'block', span, construct, diagnostics)?.block;
  }

  resolveValue(
    name: string,
    span: SourceSpan,
    construct: string,
    diagnostics: Diagnostic[],
    sigil = '%',
  ): Value | undefined {
    return this.resolve(name, 'value', span, construct, diagnostics, sigil)?.value;
  }
}

function isKind<K extends SymbolKind>(
  entry: SymbolEntry,
  kind: K,
): entry is Extract<SymbolEntry, { kind: K }> {
  return entry.kind === kind;
}

/**
 * Declaration phase of a scope's name table.
 *
 * Every forward-referenceable name is declared here before any reference is lowered; then
 * {@link freeze} yields the read-only {@link SymbolTable}. Declaring after freezing is a
 * contract violation of the lowering itself.
 */
export class SymbolTableBuilder {
  private readonly entries = new Map<string, SymbolEntry>();
  private frozen = false;

  constructor(readonly scope: string) {}

  /**
   * Declare `name`. Reports `Redefinition` and keeps the first entry when the name is taken.
   */
  declare(
    name: string,
    entry: SymbolEntry,
    span: SourceSpan,
    diagnostics: Diagnostic[],
    sigil = '%',
  ): boolean {
    invariant(!this.frozen, `cannot declare "${name}" in ${this.scope} after its table is frozen`);
    const spelled = `${sigil}${name}`;
    if (this.entries.has(name)) {
      errorAt(
        diagnostics,
        DiagnosticIds.Redefinition,
        span,
        `Redefinition of "${spelled}" in ${this.scope}.`,
        { subject: spelled, construct: `${kindNames[entry.kind]} declaration` },
      );
      return false;
    }
    this.entries.set(name, entry);
    return true;
  }

  freeze(): SymbolTable {
    this.frozen = true;
    return new SymbolTable(this.scope, new Map(this.entries));
  }
}
