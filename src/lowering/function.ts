import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { FuncDefNode, InstructionNode, SourceSpan } from '../frontend/ast.js';
import type { BasicBlock, Func, LocalValue } from '../ir/model.js';
import { newBasicBlock } from '../ir/model.js';
import { optionalLabel, optionalLocal } from './identifiers.js';
import { lowerInstruction, lowerTerminator, resultTypeOf } from './instructions.js';
import type { FunctionScope } from './operands.js';
import { errorAt } from './report.js';
import type { SymbolTable } from './symbols.js';
import { SymbolTableBuilder } from './symbols.js';

/**
 * Output of the declaration pass: the frozen local table plus the shells it points at.
 */
export interface DeclaredLocals {
  table: SymbolTable;
  blocks: BasicBlock[];
  /** Result slot of each value-producing instruction. */
  results: Map<InstructionNode, LocalValue>;
}

/**
 * Hands out local names: explicit names are kept, unnamed entities get the next sequential ID,
 * and an explicit numeric name must be exactly that next ID.
 */
class LocalIds {
  private next = 0;

  constructor(private readonly diagnostics: Diagnostic[]) {}

  assign(name: string | undefined, span: SourceSpan, construct: string): string | undefined {
    if (name === undefined) return String(this.next++);
    if (!/^[0-9]+$/.test(name)) return name;
    const expected = String(this.next);
    if (name !== expected) {
      errorAt(
        this.diagnostics,
        DiagnosticIds.LocalIdMismatch,
        span,
        `Invalid local ID "%${name}"; expected "%${expected}".`,
        { subject: `%${name}`, construct },
      );
      return undefined;
    }
    this.next++;
    return name;
  }
}

/**
 * Pass 1: declare every forward-referenceable local of a function definition (parameters,
 * basic blocks, instruction results) and freeze the table.
 *
 * Parameters are taken from `fn.params`, which were created from the header; unnamed ones are
 * given their numeric IDs here. Block shells are appended to `fn.blocks` in source order.
 */
export function declareLocals(
  node: FuncDefNode,
  fn: Func,
  diagnostics: Diagnostic[],
): DeclaredLocals {
  const builder = new SymbolTableBuilder(`function @${fn.name}`);
  const ids = new LocalIds(diagnostics);
  const results = new Map<InstructionNode, LocalValue>();
  const blocks: BasicBlock[] = [];

  for (const [i, param] of fn.params.entries()) {
    const span = node.header.params[i]?.span ?? node.header.span;
    const name = ids.assign(param.name, span, 'parameter');
    if (name === undefined) continue;
    param.name = name;
    builder.declare(name, { kind: 'value', value: param }, span, diagnostics);
  }

  for (const b of node.blocks) {
    const labelSpan = b.label?.span ?? b.span;
    const explicit = optionalLabel(b.label);
    const blockName = ids.assign(explicit, labelSpan, 'basic block label');
    const block = newBasicBlock(blockName ?? explicit ?? '');
    blocks.push(block);
    if (blockName !== undefined) {
      builder.declare(blockName, { kind: 'block', block }, labelSpan, diagnostics);
    }

    for (const inst of b.insts) {
      const type = resultTypeOf(inst);
      const span = inst.name?.span ?? inst.span;
      if (type === undefined) {
        if (inst.name) {
          errorAt(
            diagnostics,
            DiagnosticIds.TypeMismatch,
            span,
            `Instruction producing no value cannot be named "${inst.name.text}".`,
            { subject: inst.name.text, construct: 'instruction result' },
          );
        }
        continue;
      }
      const name = ids.assign(optionalLocal(inst.name), span, 'instruction result');
      if (name === undefined) continue;
      const result: LocalValue = { kind: 'Local', name, type };
      results.set(inst, result);
      builder.declare(name, { kind: 'value', value: result }, span, diagnostics);
    }
  }

  fn.blocks.push(...blocks);
  return { table: builder.freeze(), blocks, results };
}

/**
 * Lower a function body in two passes: {@link declareLocals}, then every instruction and
 * terminator against the frozen table. Failures are reported to `diagnostics`; whatever
 * lowered is kept on `fn.blocks`.
 */
export function lowerFunctionBody(
  node: FuncDefNode,
  fn: Func,
  globals: SymbolTable,
  diagnostics: Diagnostic[],
): void {
  const { table, blocks, results } = declareLocals(node, fn, diagnostics);
  const scope: FunctionScope = { locals: table, globals, retType: fn.sig.retType };

  for (const [i, b] of node.blocks.entries()) {
    const block = blocks[i];
    if (!block) continue;
    for (const inst of b.insts) {
      const lowered = lowerInstruction(inst, results.get(inst), scope, diagnostics);
      if (lowered) block.insts.push(lowered);
    }
    const term = lowerTerminator(b.term, scope, diagnostics);
    if (term) block.term = term;
  }
}
