/**
 * Thrown when a syntax node breaks the parser/lowering contract: a missing sigil, a keyword
 * spelling outside its vocabulary, a malformed literal. The grammar is assumed to exclude all
 * of these, so they are never reported as user diagnostics from the point of failure; the
 * driver converts them at the lowering-unit boundary.
 */
export class InternalInvariantError extends Error {
  override readonly name = 'InternalInvariantError';

  constructor(message: string) {
    super(message);
  }
}

export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) throw new InternalInvariantError(message);
}

export function isInternalInvariantError(err: unknown): err is InternalInvariantError {
  return err instanceof InternalInvariantError;
}
