import { isInternalInvariantError } from './diagnostics/errors.js';
import { compareDiagnostics, errorCount, hasErrors } from './diagnostics/format.js';
import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import type {
  ComdatRefNode,
  FuncDefNode,
  FuncHeaderNode,
  GlobalDeclNode,
  KeywordNode,
  ModuleNode,
  SourceSpan,
  AddrSpaceNode,
  AlignmentNode,
} from './frontend/ast.js';
import type {
  ComdatDef,
  Func,
  GlobalAttributes,
  GlobalVar,
  IrModule,
  Param,
} from './ir/model.js';
import {
  immutable,
  optionalDLLStorageClass,
  optionalLinkage,
  optionalPreemption,
  optionalSelectionKind,
  optionalUnnamedAddr,
  optionalVisibility,
  present,
  tlsModelFromThreadLocal,
} from './lowering/attributes.js';
import { optionalCallingConv } from './lowering/callconv.js';
import { lowerConstant } from './lowering/constants.js';
import { lowerFunctionBody } from './lowering/function.js';
import { comdat, global, optionalLocal } from './lowering/identifiers.js';
import { alignment, optionalAddrSpace, stringLit } from './lowering/literals.js';
import { errorAt } from './lowering/report.js';
import type { SymbolTable } from './lowering/symbols.js';
import { SymbolTableBuilder } from './lowering/symbols.js';
import { lowerType } from './lowering/types.js';
import type { LowerFn, LoweringOptions } from './pipeline.js';

function withDefaults(options: LoweringOptions, node: ModuleNode): Required<LoweringOptions> {
  const { maxErrors = 0, file = node.span.file } = options;
  return { maxErrors: maxErrors > 0 ? maxErrors : 0, file };
}

interface AttributeFields {
  linkage?: KeywordNode;
  preemption?: KeywordNode;
  visibility?: KeywordNode;
  dllStorageClass?: KeywordNode;
  unnamedAddr?: KeywordNode;
  addrSpace?: AddrSpaceNode;
  comdat?: ComdatRefNode;
  alignment?: AlignmentNode;
}

/**
 * Resolve `comdat` / `comdat($name)`. A bare `comdat` names the comdat after its owner.
 */
function resolveComdat(
  ref: ComdatRefNode,
  ownerName: string,
  comdats: ReadonlyMap<string, ComdatDef>,
  diagnostics: Diagnostic[],
): ComdatDef | undefined {
  const name = ref.name ? comdat(ref.name) : ownerName;
  const def = comdats.get(name);
  if (!def) {
    errorAt(
      diagnostics,
      DiagnosticIds.UnresolvedName,
      ref.span,
      `Unable to locate comdat "$${name}".`,
      { subject: `$${name}`, construct: 'comdat reference' },
    );
  }
  return def;
}

function globalAttributes(
  n: AttributeFields,
  ownerName: string,
  comdats: ReadonlyMap<string, ComdatDef>,
  diagnostics: Diagnostic[],
): GlobalAttributes {
  const attrs: GlobalAttributes = {
    linkage: optionalLinkage(n.linkage),
    preemption: optionalPreemption(n.preemption),
    visibility: optionalVisibility(n.visibility),
    dllStorageClass: optionalDLLStorageClass(n.dllStorageClass),
    unnamedAddr: optionalUnnamedAddr(n.unnamedAddr),
    addrSpace: optionalAddrSpace(n.addrSpace),
    align: n.alignment ? alignment(n.alignment) : 0,
  };
  if (n.comdat) {
    const def = resolveComdat(n.comdat, ownerName, comdats, diagnostics);
    if (def) attrs.comdat = def;
  }
  return attrs;
}

function declareGlobal(
  n: GlobalDeclNode,
  comdats: ReadonlyMap<string, ComdatDef>,
  diagnostics: Diagnostic[],
): GlobalVar | undefined {
  const before = errorCount(diagnostics);
  const name = global(n.name);
  const attrs = globalAttributes(n, name, comdats, diagnostics);
  const g: GlobalVar = {
    kind: 'GlobalVar',
    name,
    ...attrs,
    type: { kind: 'ptr', addrSpace: attrs.addrSpace },
    contentType: lowerType(n.type),
    immutable: immutable(n.immutable),
    tlsModel: tlsModelFromThreadLocal(n.threadLocal),
    externallyInitialized: present(n.externallyInitialized),
  };
  if (n.section) g.section = stringLit(n.section).text;
  return errorCount(diagnostics) === before ? g : undefined;
}

function declareFunc(
  h: FuncHeaderNode,
  comdats: ReadonlyMap<string, ComdatDef>,
  diagnostics: Diagnostic[],
): Func | undefined {
  const before = errorCount(diagnostics);
  const name = global(h.name);
  const attrs = globalAttributes(h, name, comdats, diagnostics);
  const callingConv = optionalCallingConv(h.callingConv, diagnostics);
  if (callingConv === undefined) return undefined;
  const params = h.params.map((p): Param => {
    const paramName = optionalLocal(p.name);
    const type = lowerType(p.type);
    if (paramName === undefined) return { kind: 'Param', type };
    return { kind: 'Param', name: paramName, type };
  });
  const fn: Func = {
    kind: 'Func',
    name,
    ...attrs,
    type: { kind: 'ptr', addrSpace: attrs.addrSpace },
    sig: {
      retType: lowerType(h.retType),
      params: params.map((p) => p.type),
      variadic: present(h.variadic),
    },
    callingConv,
    params,
    blocks: [],
  };
  return errorCount(diagnostics) === before ? fn : undefined;
}

/**
 * Lower a parsed module into the program model.
 *
 * Pass 1 declares comdats, then every global variable and function (attributes resolved,
 * signatures lowered) into the module table; pass 2 lowers global initializers and function
 * bodies against the frozen table, so any of them may refer to a later global.
 *
 * Each declaration is one lowering unit: a parser-contract violation inside it is reported as
 * `InternalLoweringError` and the unit yields nothing. With `maxErrors` set, units after the
 * limit is reached are skipped.
 */
export const lowerModule: LowerFn = (node, options = {}) => {
  const opts = withDefaults(options, node);
  const diagnostics: Diagnostic[] = [];
  const module: IrModule = { comdats: [], globals: [], funcs: [] };
  let aborted = false;

  const runUnit = (what: string, span: SourceSpan, body: () => void): void => {
    if (aborted) return;
    const errors = errorCount(diagnostics);
    if (opts.maxErrors > 0 && errors >= opts.maxErrors) {
      aborted = true;
      diagnostics.push({
        id: DiagnosticIds.LoweringAborted,
        severity: 'info',
        message:
          `Lowering stopped after ${errors} error(s); ` +
          `skipped ${what} and everything after it.`,
        file: opts.file,
      });
      return;
    }
    try {
      body();
    } catch (err) {
      if (!isInternalInvariantError(err)) throw err;
      diagnostics.push({
        id: DiagnosticIds.InternalLoweringError,
        severity: 'error',
        message: `Internal error while lowering ${what}: ${err.message}`,
        file: span.file,
        line: span.start.line,
        column: span.start.column,
      });
    }
  };

  // Pass 1: declarations.
  const comdats = new Map<string, ComdatDef>();
  for (const item of node.items) {
    if (item.kind === 'SourceFilename') {
      runUnit('source_filename', item.span, () => {
        module.sourceFilename = stringLit(item.name).text;
      });
    } else if (item.kind === 'ComdatDef') {
      runUnit(`comdat ${item.name.text}`, item.span, () => {
        const name = comdat(item.name);
        if (comdats.has(name)) {
          errorAt(
            diagnostics,
            DiagnosticIds.Redefinition,
            item.span,
            `Redefinition of comdat "$${name}".`,
            { subject: `$${name}`, construct: 'comdat definition' },
          );
          return;
        }
        const def: ComdatDef = {
          kind: 'ComdatDef',
          name,
          selectionKind: optionalSelectionKind(item.selectionKind),
        };
        comdats.set(name, def);
        module.comdats.push(def);
      });
    }
  }

  const builder = new SymbolTableBuilder('module');
  const pendingGlobals: { node: GlobalDeclNode; global: GlobalVar }[] = [];
  const pendingFuncs: { node: FuncDefNode; func: Func }[] = [];

  for (const item of node.items) {
    switch (item.kind) {
      case 'GlobalDecl':
        runUnit(`global ${item.name.text}`, item.span, () => {
          const g = declareGlobal(item, comdats, diagnostics);
          if (!g) return;
          const entry = { kind: 'value', value: g } as const;
          if (!builder.declare(g.name, entry, item.name.span, diagnostics, '@')) return;
          module.globals.push(g);
          pendingGlobals.push({ node: item, global: g });
        });
        break;
      case 'FuncDecl':
      case 'FuncDef':
        runUnit(`function ${item.header.name.text}`, item.span, () => {
          const fn = declareFunc(item.header, comdats, diagnostics);
          if (!fn) return;
          const entry = { kind: 'value', value: fn } as const;
          if (!builder.declare(fn.name, entry, item.header.name.span, diagnostics, '@')) return;
          module.funcs.push(fn);
          if (item.kind === 'FuncDef') pendingFuncs.push({ node: item, func: fn });
        });
        break;
      default:
        break;
    }
  }

  const globals: SymbolTable = builder.freeze();

  // Pass 2: initializers and bodies.
  for (const { node: g, global: gv } of pendingGlobals) {
    const init = g.init;
    if (!init) continue;
    runUnit(`initializer of ${g.name.text}`, g.span, () => {
      const c = lowerConstant(gv.contentType, init, globals, 'global initializer', diagnostics);
      if (c) gv.init = c;
    });
  }
  for (const { node: f, func } of pendingFuncs) {
    runUnit(`function ${f.header.name.text}`, f.span, () => {
      lowerFunctionBody(f, func, globals, diagnostics);
    });
  }

  diagnostics.sort(compareDiagnostics);
  if (hasErrors(diagnostics)) return { diagnostics };
  return { diagnostics, module };
};
