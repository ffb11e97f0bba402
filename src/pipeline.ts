import type { Diagnostic } from './diagnostics/types.js';
import type { ModuleNode } from './frontend/ast.js';
import type { IrModule } from './ir/model.js';

/**
 * Options that influence how a module is lowered.
 */
export interface LoweringOptions {
  /**
   * Stop lowering further declarations once this many errors have been reported.
   *
   * Units already lowered keep their diagnostics; an `info` diagnostic records the stop.
   * Unlimited when unset or not positive.
   */
  maxErrors?: number;
  /**
   * File name used for diagnostics that are not tied to a node span (e.g. the abort notice).
   * Defaults to the module node's span file.
   */
  file?: string;
}

/**
 * Result of a lowering run: diagnostics (sorted) plus the module when no error was reported.
 */
export interface LowerResult {
  diagnostics: Diagnostic[];
  module?: IrModule;
}

/**
 * Top-level lowering function signature.
 */
export type LowerFn = (node: ModuleNode, options?: LoweringOptions) => LowerResult;
