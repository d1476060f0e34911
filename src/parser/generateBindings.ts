import type { FunctionSignature } from './functionSignature.js';
import type { Direction } from './parserTypes.js';
import type { StorageDescriptor } from '../ffi/typeMap.js';

export type BindingArgument = {
  name: string;
  baseType: string;
  callType: string;
  direction: Direction;
  storage: StorageDescriptor;
};

export type BindingFunction = {
  name: string;
  shortName: string;
  returns: string;
  /** Declared parameters, then the `ret` slot when there is one. */
  args: BindingArgument[];
  returnSlot?: BindingArgument;
};

/**
 * Everything a binding template reads about one function. Storage is
 * resolved here, so an unsupported C type fails before anything is rendered.
 */
export function describeForBinding(sig: FunctionSignature): BindingFunction {
  const args = sig.args.map((a) => ({
    name: a.name,
    baseType: a.baseType,
    callType: a.callType,
    direction: a.direction,
    storage: sig.storageOf(a),
  }));

  return {
    name: sig.name,
    shortName: sig.shortName,
    returns: sig.declaredReturnType,
    args,
    returnSlot: args.find((a) => a.direction === 'ret'),
  };
}

export function generateBindings(signatures: readonly FunctionSignature[]) {
  const entries = signatures.map((s) => [s.name, describeForBinding(s)] as const);

  return {
    functions: Object.fromEntries(entries),
  };
}
