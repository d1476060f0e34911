import { loadLibrary } from './createLibrary.js';
import { bindAll, type NativeFunction } from './prototype.js';
import type { FunctionSignature } from '../parser/functionSignature.js';

/** Bind every signature against a compiled ERFA library, keyed by short name. */
export function loadFfi(
  libPath: string,
  signatures: readonly FunctionSignature[],
): Record<string, NativeFunction> {
  return bindAll<NativeFunction>(loadLibrary(libPath), signatures);
}

export { loadLibrary } from './createLibrary.js';
export { astromType, bindAll, bindFunction, declareFunctionType, formatPrototype } from './prototype.js';
export type { FunctionBinder, NativeFunction } from './prototype.js';
export { createTypeMapper, erfaTypeTable } from './typeMap.js';
export type { StorageDescriptor, StorageKind, TypeMapper, TypeTable } from './typeMap.js';
