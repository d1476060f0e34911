import { UnknownTypeError } from '../parser/errors.js';

export type StorageKind = 'scalar' | 'array' | 'struct' | 'bytes';

/** How the binding layer allocates a buffer for one C parameter. */
export type StorageDescriptor = {
  /** Short spelling of element + shape, e.g. `f8[2,3]`. */
  token: string;
  kind: StorageKind;
  element: 'double' | 'int' | 'char' | 'eraASTROM';
  shape: readonly number[];
};

export type TypeTable = Readonly<Record<string, StorageDescriptor>>;

function descriptor(
  kind: StorageKind,
  element: StorageDescriptor['element'],
  token: string,
  shape: number[] = [],
): StorageDescriptor {
  return Object.freeze({ token, kind, element, shape: Object.freeze(shape) });
}

/**
 * The complete type vocabulary of the ERFA astronomy routines. Anything
 * outside it is an error, not a fallback.
 */
export const erfaTypeTable: TypeTable = Object.freeze({
  'double': descriptor('scalar', 'double', 'f8'),
  'double *': descriptor('scalar', 'double', 'f8*'),
  'int': descriptor('scalar', 'int', 'i4'),
  'int *': descriptor('scalar', 'int', 'i4*'),
  'int[4]': descriptor('array', 'int', 'i4[4]', [4]),
  'double[2]': descriptor('array', 'double', 'f8[2]', [2]),
  'double[3]': descriptor('array', 'double', 'f8[3]', [3]),
  'double[2][3]': descriptor('array', 'double', 'f8[2,3]', [2, 3]),
  'double[3][3]': descriptor('array', 'double', 'f8[3,3]', [3, 3]),
  'eraASTROM *': descriptor('struct', 'eraASTROM', 'eraASTROM'),
  'char *': descriptor('bytes', 'char', 'S1'),
});

export type TypeMapper = {
  readonly table: TypeTable;
  normalize(type: string): string;
  has(type: string): boolean;
  resolve(type: string, functionName?: string): StorageDescriptor;
  callType(type: string): string;
};

function normalizeType(type: string): string {
  return type
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^const /, '')
    .replace(/ ?\*$/, ' *')
    .replace(/ (?=\[)/g, '');
}

export function createTypeMapper(table: TypeTable = erfaTypeTable): TypeMapper {
  const frozen = Object.isFrozen(table) ? table : Object.freeze({ ...table });

  return Object.freeze({
    table: frozen,
    normalize: normalizeType,
    has(type: string) {
      return Object.hasOwn(frozen, normalizeType(type));
    },
    resolve(type: string, functionName?: string) {
      const key = normalizeType(type);
      const found = Object.hasOwn(frozen, key) ? frozen[key] : undefined;
      if (!found) {
        const where = functionName ? ` (in ${functionName})` : '';
        throw new UnknownTypeError(`Unsupported C type: ${type}${where}`, {
          type,
          functionName,
        });
      }
      return found;
    },
    // Array shape is erased at the call boundary: `double[3]` is passed as `double *`.
    callType(type: string) {
      const key = normalizeType(type);
      const bracket = key.indexOf('[');
      if (bracket !== -1) return `${key.slice(0, bracket)} *`;
      return key;
    },
  });
}
