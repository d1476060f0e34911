import { documentedNames } from './docBlock.js';
import { UnsupportedDeclarationError } from './errors.js';
import type {
  ArgDirection,
  DocumentationBlock,
  ReturnSlot,
  SignatureArgument,
} from './parserTypes.js';
import type { TypeMapper } from '../ffi/typeMap.js';

export type ParsedParameter = {
  rawDeclaration: string;
  name: string;
  baseType: string;
};

/**
 * Split the text between a declaration's parentheses into parameter fragments.
 *
 * Parameters in the target library never nest parentheses, so a plain comma
 * split is enough. A fragment that carries one (a function pointer) is
 * rejected rather than mis-split.
 */
export function splitParameterList(text: string, functionName?: string): string[] {
  const fragments = text.split(',').map((f) => f.trim());
  if (fragments.length === 1 && (fragments[0] === 'void' || fragments[0] === '')) {
    return [];
  }

  for (const fragment of fragments) {
    if (/[()]/.test(fragment)) {
      throw new UnsupportedDeclarationError(
        `Unsupported parameter declaration: function pointers are not supported (${fragment})`,
        { fragment, functionName },
      );
    }
  }
  return fragments;
}

export function parseParameter(fragment: string, functionName?: string): ParsedParameter {
  const rawDeclaration = fragment.trim();

  let baseType: string;
  let name: string;

  const star = rawDeclaration.indexOf('*');
  if (star !== -1) {
    baseType = `${rawDeclaration.slice(0, star).trimEnd()} *`;
    name = rawDeclaration.slice(star + 1).trim();
  } else {
    const m = /^(.*\S)\s+(\S+)$/s.exec(rawDeclaration);
    if (!m?.[1] || !m[2]) {
      throw new UnsupportedDeclarationError(
        `Unsupported parameter declaration: no parameter name in "${rawDeclaration}"`,
        { fragment: rawDeclaration, functionName },
      );
    }
    baseType = m[1];
    name = m[2];

    const bracket = name.indexOf('[');
    if (bracket !== -1) {
      baseType += name.slice(bracket);
      name = name.slice(0, bracket);
    }
  }

  if (!name) {
    throw new UnsupportedDeclarationError(
      `Unsupported parameter declaration: no parameter name in "${rawDeclaration}"`,
      { fragment: rawDeclaration, functionName },
    );
  }

  return { rawDeclaration, name, baseType };
}

/**
 * Direction of a parameter according to its documentation block. Parameters
 * that no section mentions (internal work arrays, for instance) come back as
 * `unknown`.
 */
export function resolveDirection(name: string, doc: DocumentationBlock): ArgDirection {
  const isInput = documentedNames(doc.inputs).has(name);
  const isOutput = documentedNames(doc.outputs).has(name);

  if (isInput && isOutput) return 'inout';
  if (isInput) return 'in';
  if (isOutput) return 'out';
  return 'unknown';
}

export function createSignatureArgument(
  parsed: ParsedParameter,
  doc: DocumentationBlock,
  types: TypeMapper,
): SignatureArgument {
  return Object.freeze({
    kind: 'param',
    rawDeclaration: parsed.rawDeclaration,
    name: parsed.name,
    baseType: parsed.baseType,
    callType: types.callType(parsed.baseType),
    direction: resolveDirection(parsed.name, doc),
  });
}

export function createReturnSlot(returnType: string, types: TypeMapper): ReturnSlot {
  return Object.freeze({
    kind: 'return',
    name: 'ret',
    baseType: returnType,
    callType: types.callType(returnType),
    direction: 'ret',
  });
}
