import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { CallingConvNode } from '../frontend/ast.js';
import { CallingConv } from '../ir/enums.js';
import { KeywordTable, valuesExcept } from './enums.js';
import { uintLit } from './literals.js';
import { errorAt } from './report.js';

/** Conventions that exist only as `cc N` and have no keyword spelling. */
type NumericOnlyCallingConv =
  | typeof CallingConv.HiPE
  | typeof CallingConv.AVRBuiltin
  | typeof CallingConv.MSP430Builtin;

export const callingConvs = new KeywordTable(
  'calling convention',
  valuesExcept(
    CallingConv,
    CallingConv.None,
    CallingConv.HiPE,
    CallingConv.AVRBuiltin,
    CallingConv.MSP430Builtin,
  ),
  {
    C: 'ccc',
    Fast: 'fastcc',
    Cold: 'coldcc',
    GHC: 'ghccc',
    WebKitJS: 'webkit_jscc',
    AnyReg: 'anyregcc',
    PreserveMost: 'preserve_mostcc',
    PreserveAll: 'preserve_allcc',
    Swift: 'swiftcc',
    CXXFastTLS: 'cxx_fast_tlscc',
    X86StdCall: 'x86_stdcallcc',
    X86FastCall: 'x86_fastcallcc',
    ARMAPCS: 'arm_apcscc',
    ARMAAPCS: 'arm_aapcscc',
    ARMAAPCSVFP: 'arm_aapcs_vfpcc',
    MSP430Intr: 'msp430_intrcc',
    X86ThisCall: 'x86_thiscallcc',
    PTXKernel: 'ptx_kernel',
    PTXDevice: 'ptx_device',
    SPIRFunc: 'spir_func',
    SPIRKernel: 'spir_kernel',
    IntelOCLBI: 'intel_ocl_bicc',
    X86_64SysV: 'x86_64_sysvcc',
    Win64: 'win64cc',
    X86VectorCall: 'x86_vectorcallcc',
    HHVM: 'hhvmcc',
    HHVMC: 'hhvm_ccc',
    X86Intr: 'x86_intrcc',
    AVRIntr: 'avr_intrcc',
    AVRSignal: 'avr_signalcc',
    AMDGPUVS: 'amdgpu_vs',
    AMDGPUGS: 'amdgpu_gs',
    AMDGPUPS: 'amdgpu_ps',
    AMDGPUCS: 'amdgpu_cs',
    AMDGPUKernel: 'amdgpu_kernel',
    X86RegCall: 'x86_regcallcc',
    AMDGPUHS: 'amdgpu_hs',
    AMDGPULS: 'amdgpu_ls',
    AMDGPUES: 'amdgpu_es',
  },
);

/**
 * Vendor calling conventions reachable through `cc N`, grouped by reserved code range.
 *
 * Ranges are disjoint. Codes outside every range are reported as unimplemented rather than
 * invalid, so new ranges can be added here without changing callers.
 */
const numericRanges: readonly { first: number; convs: readonly CallingConv[] }[] = [
  { first: 11, convs: [CallingConv.HiPE] },
  {
    first: 86,
    convs: [
      CallingConv.AVRBuiltin,
      CallingConv.AMDGPUVS,
      CallingConv.AMDGPUGS,
      CallingConv.AMDGPUPS,
      CallingConv.AMDGPUCS,
      CallingConv.AMDGPUKernel,
    ],
  },
  {
    first: 93,
    convs: [
      CallingConv.AMDGPUHS,
      CallingConv.MSP430Builtin,
      CallingConv.AMDGPULS,
      CallingConv.AMDGPUES,
    ],
  },
];

export const numericCallingConvs: ReadonlyMap<bigint, CallingConv> = new Map(
  numericRanges.flatMap(({ first, convs }) =>
    convs.map((cc, i): [bigint, CallingConv] => [BigInt(first + i), cc]),
  ),
);

/** Keyword-less conventions; each must be reachable from the numeric table. */
export const numericOnlyCallingConvs: readonly NumericOnlyCallingConv[] = [
  CallingConv.HiPE,
  CallingConv.AVRBuiltin,
  CallingConv.MSP430Builtin,
];

/**
 * Calling convention denoted by a keyword or a `cc N` code.
 *
 * Returns `undefined` after reporting an `Unimplemented` diagnostic when `N` is outside the
 * numeric table.
 */
export function callingConv(
  n: CallingConvNode,
  diagnostics: Diagnostic[],
): CallingConv | undefined {
  switch (n.kind) {
    case 'CallingConvEnum':
      return callingConvs.resolve(n.text);
    case 'CallingConvInt': {
      const code = uintLit(n.code);
      const cc = numericCallingConvs.get(code);
      if (cc === undefined) {
        errorAt(
          diagnostics,
          DiagnosticIds.Unimplemented,
          n.span,
          `Support for calling convention ${code} is not yet implemented.`,
          { subject: `cc ${code}`, construct: 'calling convention' },
        );
        return undefined;
      }
      return cc;
    }
  }
}

export function optionalCallingConv(
  n: CallingConvNode | undefined,
  diagnostics: Diagnostic[],
): CallingConv | undefined {
  if (!n) return CallingConv.None;
  return callingConv(n, diagnostics);
}
