import { readFileSync } from 'node:fs';

import {
  createReturnSlot,
  createSignatureArgument,
  parseParameter,
  splitParameterList,
} from './argument.js';
import { parseDocumentationBlock } from './docBlock.js';
import { InvalidDirectionError } from './errors.js';
import {
  applyAnchor,
  locateDeclaration,
  normalizeLineEndings,
  shortNameOf,
  sourceFileFor,
} from './locate.js';
import type {
  ArgumentField,
  Direction,
  DocumentationBlock,
  FunctionArgument,
  ReturnSlot,
  SignatureArgument,
} from './parserTypes.js';
import { createTypeMapper, type StorageDescriptor, type TypeMapper } from '../ffi/typeMap.js';
import { warn } from '../dx/warnings.js';

export type SignatureOptions = {
  /** Library name prefix, stripped for file names and short names. */
  prefix?: string;
  /** Return type that gets a synthetic `ret` slot. */
  scalarReturnType?: string;
  typeMap?: TypeMapper;
  /** Path reported in errors; informational. */
  filePath?: string;
};

export type LoadSignatureOptions = Omit<SignatureOptions, 'filePath'> & {
  /** Skip to the first line starting with this text before searching. */
  anchor?: string;
};

export type DirectionFilter = Direction | readonly Direction[];

const DIRECTIONS: readonly Direction[] = ['in', 'out', 'inout', 'unknown', 'ret'];

function isDirection(v: string): v is Direction {
  return DIRECTIONS.some((d) => d === v);
}

/** Parse the `in|inout` filter syntax used by binding templates. */
export function parseDirectionFilter(filter: string): Direction[] {
  return filter.split('|').map((part) => {
    const d = part.trim();
    if (!isDirection(d)) {
      throw new InvalidDirectionError(`Invalid direction "${d}" (expected: ${DIRECTIONS.join('|')})`, {
        direction: d,
      });
    }
    return d;
  });
}

export class FunctionSignature {
  readonly name: string;
  readonly shortName: string;
  readonly declaredReturnType: string;
  readonly declaration: string;
  readonly filePath: string;
  readonly documentation: DocumentationBlock;
  readonly args: readonly FunctionArgument[];
  private readonly types: TypeMapper;

  constructor(init: {
    name: string;
    shortName: string;
    declaredReturnType: string;
    declaration: string;
    filePath: string;
    documentation: DocumentationBlock;
    args: readonly FunctionArgument[];
    types: TypeMapper;
  }) {
    this.name = init.name;
    this.shortName = init.shortName;
    this.declaredReturnType = init.declaredReturnType;
    this.declaration = init.declaration;
    this.filePath = init.filePath;
    this.documentation = init.documentation;
    this.args = Object.freeze([...init.args]);
    this.types = init.types;
    Object.freeze(this);
  }

  get params(): SignatureArgument[] {
    return this.args.filter((a): a is SignatureArgument => a.kind === 'param');
  }

  get returnSlot(): ReturnSlot | undefined {
    return this.args.find((a): a is ReturnSlot => a.kind === 'return');
  }

  /**
   * Arguments whose direction is in `filter`, in declared order. With
   * `field`, project each to that field; with `join`, join the projection.
   */
  selectByDirection(filter: DirectionFilter): FunctionArgument[];
  selectByDirection(filter: DirectionFilter, field: ArgumentField): string[];
  selectByDirection(filter: DirectionFilter, field: ArgumentField, join: string): string;
  selectByDirection(
    filter: DirectionFilter,
    field?: ArgumentField,
    join?: string,
  ): FunctionArgument[] | string[] | string {
    const wanted: readonly Direction[] = typeof filter === 'string' ? [filter] : filter;
    const selected = this.args.filter((a) => wanted.includes(a.direction));
    if (field === undefined) return selected;

    const projected = selected.map((a) => a[field]);
    return join === undefined ? projected : projected.join(join);
  }

  storageOf(arg: FunctionArgument): StorageDescriptor {
    return this.types.resolve(arg.baseType, this.name);
  }
}

/**
 * Build the signature of `name` from a source buffer holding its definition
 * followed by its documentation comment.
 */
export function parseFunctionSignature(
  name: string,
  buffer: string,
  options: SignatureOptions = {},
): FunctionSignature {
  const prefix = options.prefix ?? 'era';
  const scalarReturnType = options.scalarReturnType ?? 'double';
  const types = options.typeMap ?? createTypeMapper();
  const filePath = options.filePath ?? '<buffer>';

  const located = locateDeclaration(normalizeLineEndings(buffer), name, filePath);
  const documentation = parseDocumentationBlock(located.comment);

  const open = located.declaration.indexOf('(');
  const close = located.declaration.lastIndexOf(')');
  const paramText = located.declaration.slice(open + 1, close);

  const args: FunctionArgument[] = splitParameterList(paramText, name).map((fragment) =>
    createSignatureArgument(parseParameter(fragment, name), documentation, types),
  );

  for (const arg of args) {
    if (arg.direction === 'unknown') {
      warn({
        code: 'UNDOCUMENTED_PARAMETER',
        message: `${name}: parameter "${arg.name}" is not listed in any documentation section`,
      });
    }
  }

  const firstLine = located.declaration.split('\n')[0] ?? '';
  const declaredReturnType = firstLine.slice(0, firstLine.lastIndexOf(name)).trim();
  if (declaredReturnType === scalarReturnType) {
    args.push(createReturnSlot(declaredReturnType, types));
  }

  return new FunctionSignature({
    name,
    shortName: shortNameOf(name, prefix),
    declaredReturnType,
    declaration: located.declaration,
    filePath,
    documentation,
    args,
    types,
  });
}

/**
 * Read and parse the signature of `name` from `sourcePath`: a directory with
 * one file per function, or a single combined source file (pass `anchor`
 * there so a call site is not mistaken for the definition).
 */
export function loadFunctionSignature(
  name: string,
  sourcePath: string,
  options: LoadSignatureOptions = {},
): FunctionSignature {
  const prefix = options.prefix ?? 'era';
  const filePath = sourceFileFor(name, sourcePath, prefix);
  const contents = normalizeLineEndings(readFileSync(filePath, 'utf8'));
  const buffer =
    options.anchor === undefined ? contents : applyAnchor(contents, options.anchor, name, filePath);

  return parseFunctionSignature(name, buffer, { ...options, prefix, filePath });
}
