export {
  FunctionSignature,
  loadFunctionSignature,
  parseDirectionFilter,
  parseFunctionSignature,
} from './functionSignature.js';
export type { DirectionFilter, LoadSignatureOptions, SignatureOptions } from './functionSignature.js';
export { parseDocumentationBlock, parseArgumentEntry } from './docBlock.js';
export { parseParameter, resolveDirection, splitParameterList } from './argument.js';
export { applyAnchor, locateDeclaration, shortNameOf, sourceFileFor } from './locate.js';
export { scanHeader } from './scanHeader.js';
export { describeForBinding, generateBindings } from './generateBindings.js';
export type { BindingArgument, BindingFunction } from './generateBindings.js';
export * from './errors.js';
export type * from './parserTypes.js';
