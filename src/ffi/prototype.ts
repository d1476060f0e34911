import koffi, { type IKoffiCType, type IKoffiLib } from 'koffi';

import type { FunctionSignature } from '../parser/functionSignature.js';
import type { SignatureArgument } from '../parser/parserTypes.js';

export type NativeFunction = ReturnType<IKoffiLib['func']>;

let astrom: IKoffiCType | undefined;

/**
 * The `eraASTROM` star-independent astrometry parameters, registered with
 * koffi once per process (koffi refuses a second type with the same name).
 */
export function astromType(): IKoffiCType {
  if (astrom) return astrom;
  const vec3 = koffi.array('double', 3);
  astrom = koffi.struct('eraASTROM', {
    pmt: 'double',
    eb: vec3,
    eh: vec3,
    em: 'double',
    v: vec3,
    bm1: 'double',
    bpn: koffi.array(vec3, 3),
    along: 'double',
    phi: 'double',
    xpl: 'double',
    ypl: 'double',
    sphi: 'double',
    cphi: 'double',
    diurab: 'double',
    eral: 'double',
    refa: 'double',
    refb: 'double',
  });
  return astrom;
}

function formatParameter(arg: SignatureArgument): string {
  const pointer = arg.callType.endsWith('*');
  const qualifier =
    pointer && arg.direction === 'out' ? '_Out_ ' : pointer && arg.direction === 'inout' ? '_Inout_ ' : '';
  // `double *` + `ra` -> `double *ra`
  const sep = pointer ? '' : ' ';
  return `${qualifier}${arg.callType}${sep}${arg.name}`;
}

/** koffi prototype for the native call, e.g. `double eraSepp(double *a, double *b)`. */
export function formatPrototype(sig: FunctionSignature): string {
  const params = sig.params.map(formatParameter);
  return `${sig.declaredReturnType} ${sig.name}(${params.length ? params.join(', ') : 'void'})`;
}

function usesAstrom(sig: FunctionSignature): boolean {
  return sig.params.some((p) => p.callType === 'eraASTROM *');
}

export function declareFunctionType(sig: FunctionSignature): IKoffiCType {
  if (usesAstrom(sig)) astromType();
  return koffi.proto(formatPrototype(sig));
}

/** Anything that turns a prototype string into a callable, such as a koffi library. */
export type FunctionBinder<F> = {
  func(definition: string): F;
};

export function bindFunction<F>(lib: FunctionBinder<F>, sig: FunctionSignature): F {
  if (usesAstrom(sig)) astromType();
  return lib.func(formatPrototype(sig));
}

/** Bind every signature, keyed by short name (`eraSepp` -> `sepp`). */
export function bindAll<F>(
  lib: FunctionBinder<F>,
  signatures: readonly FunctionSignature[],
): Record<string, F> {
  const exports: Record<string, F> = {};
  for (const sig of signatures) {
    exports[sig.shortName] = bindFunction(lib, sig);
  }
  return exports;
}
