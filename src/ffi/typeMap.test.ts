import { describe, it, expect } from 'vitest';

import { createTypeMapper, erfaTypeTable } from './typeMap.js';
import { UnknownTypeError } from '../parser/errors.js';

describe('type map', () => {
  const types = createTypeMapper();

  it('keeps pointer and array spellings apart', () => {
    expect(types.resolve('double *').token).toBe('f8*');
    expect(types.resolve('double[3]').token).toBe('f8[3]');
    expect(types.resolve('int[4]')).toEqual({ token: 'i4[4]', kind: 'array', element: 'int', shape: [4] });
    expect(types.resolve('int *')).toEqual({ token: 'i4*', kind: 'scalar', element: 'int', shape: [] });
  });

  it('normalizes spacing and const before lookup', () => {
    expect(types.resolve('double*').token).toBe('f8*');
    expect(types.resolve('const char *').token).toBe('S1');
    expect(types.resolve('eraASTROM  *').kind).toBe('struct');
  });

  it('gives the pointer form used at the call boundary', () => {
    expect(types.callType('double[2][3]')).toBe('double *');
    expect(types.callType('int[4]')).toBe('int *');
    expect(types.callType('const char *')).toBe('char *');
    expect(types.callType('double')).toBe('double');
  });

  it('fails on a type outside the table', () => {
    expect(types.has('float')).toBe(false);
    try {
      types.resolve('float', 'eraFoo');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(UnknownTypeError);
      if (e instanceof UnknownTypeError) {
        expect(e.message).toBe('Unsupported C type: float (in eraFoo)');
        expect(e.details).toEqual({ type: 'float', functionName: 'eraFoo' });
      }
    }
  });

  it('lets differently configured mappers coexist', () => {
    const extended = createTypeMapper({
      ...erfaTypeTable,
      float: { token: 'f4', kind: 'scalar', element: 'double', shape: [] },
    });
    expect(extended.resolve('float').token).toBe('f4');
    expect(types.has('float')).toBe(false);
    expect(Object.isFrozen(extended.table)).toBe(true);
  });
});
