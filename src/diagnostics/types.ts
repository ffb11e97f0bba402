/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A lowering diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `IRL100`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
  /** Offending spelling or decoded name, when the diagnostic is about one. */
  subject?: string;
  /** The construct being lowered when the diagnostic was raised (e.g. `phi predecessor`). */
  construct?: string;
}

/**
 * Known diagnostic IDs.
 *
 * Ranges:
 * - `IRL0xx` driver / contract failures
 * - `IRL1xx` semantic failures (program-invalid input)
 * - `IRL9xx` unimplemented features
 */
export const DiagnosticIds = {
  /** Unknown/unclassified diagnostic. */
  Unknown: 'IRL000',

  /**
   * A syntax node violated the parser contract (missing sigil, unknown keyword spelling, ...).
   *
   * Raised when an {@link InternalInvariantError} escapes a lowering unit.
   */
  InternalLoweringError: 'IRL001',

  /** The driver stopped lowering further units after reaching `maxErrors`. */
  LoweringAborted: 'IRL002',

  /** A name reference could not be resolved in its scope. */
  UnresolvedName: 'IRL100',

  /** A name resolved to an entity of the wrong kind (e.g. a value where a block is required). */
  SymbolKindMismatch: 'IRL101',

  /** A name was declared twice in the same scope. */
  Redefinition: 'IRL102',

  /** An explicit numeric local name does not match the next sequential ID. */
  LocalIdMismatch: 'IRL103',

  /** An operand or constant does not fit the type it is used with. */
  TypeMismatch: 'IRL110',

  /** A numeric constant does not fit its type. */
  ConstantOutOfRange: 'IRL111',

  /** A `switch` lists the same case value twice. */
  DuplicateCase: 'IRL112',

  /** A construct whose mapping is deliberately not wired up yet (e.g. an unknown `cc N`). */
  Unimplemented: 'IRL900',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];
