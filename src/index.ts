export { lowerModule } from './lower.js';
export type { LowerFn, LowerResult, LoweringOptions } from './pipeline.js';

export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
export { DiagnosticIds } from './diagnostics/types.js';
export {
  compareDiagnostics,
  errorCount,
  formatDiagnostic,
  hasErrors,
} from './diagnostics/format.js';
export { InternalInvariantError, isInternalInvariantError } from './diagnostics/errors.js';

export type * from './frontend/ast.js';
export * from './ir/enums.js';
export type * from './ir/model.js';
export { newBasicBlock, newCase, newIncoming } from './ir/model.js';
export type * from './ir/types.js';
export { I1, LABEL, VOID, typeName, typesEqual } from './ir/types.js';

export { escapeBytes, quote, unescapeBytes, unquoteBytes, unquoteName } from './lowering/escape.js';
export {
  comdat,
  global,
  label,
  local,
  optionalLabel,
  optionalLocal,
} from './lowering/identifiers.js';
export {
  addrSpace,
  alignment,
  boolLit,
  optionalAddrSpace,
  stringLit,
  stringLitBytes,
  uintLit,
  uintList,
} from './lowering/literals.js';
export type { DecodedString } from './lowering/literals.js';
export { callingConv, optionalCallingConv } from './lowering/callconv.js';
export { SymbolTable, SymbolTableBuilder } from './lowering/symbols.js';
export type { SymbolEntry, SymbolKind } from './lowering/symbols.js';
