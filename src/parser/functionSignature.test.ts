import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { InvalidDirectionError, LocationError } from './errors.js';
import {
  loadFunctionSignature,
  parseDirectionFilter,
  parseFunctionSignature,
} from './functionSignature.js';
import { describeForBinding } from './generateBindings.js';
import { locateDeclaration } from './locate.js';

const fixtures = fileURLToPath(new URL('../../fixtures/', import.meta.url));
const erfaDir = join(fixtures, 'erfa');
const combined = join(fixtures, 'combined', 'erfa.c');

const SEPP = [
  'double eraSepp(double a[3], double b[3])',
  '/*',
  'Given:',
  '    a        double[3]    first vector',
  '    b        double[3]    second vector',
  '  ',
  '*/',
  '{',
  '   return 0.0;',
  '}',
].join('\n');

describe('function signature', () => {
  it('builds arguments, directions and the return slot from a declaration', () => {
    const sig = parseFunctionSignature('eraSepp', SEPP);

    expect(sig.name).toBe('eraSepp');
    expect(sig.shortName).toBe('sepp');
    expect(sig.declaredReturnType).toBe('double');
    expect(sig.params.map((a) => [a.name, a.baseType, a.direction])).toEqual([
      ['a', 'double[3]', 'in'],
      ['b', 'double[3]', 'in'],
    ]);
    expect(sig.args).toHaveLength(3);
    expect(sig.args[2]).toEqual({
      kind: 'return',
      name: 'ret',
      baseType: 'double',
      callType: 'double',
      direction: 'ret',
    });
    expect(sig.returnSlot?.name).toBe('ret');
    expect(sig.selectByDirection('in', 'name', ',')).toBe('a,b');
  });

  it('loads a function from its own file in a source directory', () => {
    const sig = loadFunctionSignature('eraRx', erfaDir);

    expect(sig.filePath).toBe(join(erfaDir, 'rx.c'));
    expect(sig.declaredReturnType).toBe('void');
    expect(sig.returnSlot).toBeUndefined();
    expect(sig.args.map((a) => `${a.name}:${a.baseType}:${a.direction}`)).toEqual([
      'phi:double:in',
      'r:double[3][3]:inout',
    ]);
    expect(sig.documentation.inputs.map((e) => e.name)).toEqual(['phi', 'r']);
    expect(sig.documentation.outputs.map((e) => e.name)).toEqual(['r']);
  });

  it('matches parameters documented together under one entry', () => {
    const sig = loadFunctionSignature('eraCal2jd', erfaDir);

    expect(sig.declaredReturnType).toBe('int');
    expect(sig.returnSlot).toBeUndefined();
    expect(sig.selectByDirection('in', 'name')).toEqual(['iy', 'im', 'id']);
    expect(sig.selectByDirection('out', 'name')).toEqual(['djm0', 'djm']);
    expect(sig.selectByDirection(['out', 'in'], 'name', ', ')).toBe('iy, im, id, djm0, djm');
    expect(sig.selectByDirection('out', 'callType')).toEqual(['double *', 'double *']);
  });

  it('produces one argument per declared parameter, in order', () => {
    const sig = loadFunctionSignature('eraCal2jd', erfaDir);
    expect(sig.params.map((a) => a.rawDeclaration)).toEqual([
      'int iy',
      'int im',
      'int id',
      'double *djm0',
      'double *djm',
    ]);
  });

  it('leaves undocumented parameters without a direction', () => {
    const src = [
      'double eraWork(double a, double w[3])',
      '/*',
      '**  Given:',
      '**     a      double    value',
      '**',
      '*/',
    ].join('\n');
    const sig = parseFunctionSignature('eraWork', src);

    expect(sig.params.map((a) => a.direction)).toEqual(['in', 'unknown']);
    expect(sig.selectByDirection('unknown', 'name')).toEqual(['w']);
    expect(sig.selectByDirection(parseDirectionFilter('in|ret'), 'name', ',')).toBe('a,ret');
  });

  it('starts at the anchor line in a combined source file', () => {
    const source = readFileSync(combined, 'utf8');
    // Without the anchor, the call inside eraRx is found first.
    expect(locateDeclaration(source, 'eraSepp', combined).declaration).toBe(
      '   (void) eraSepp(r[0], r[1])',
    );

    const sig = loadFunctionSignature('eraSepp', combined, { anchor: 'double eraSepp' });
    expect(sig.declaration).toBe('double eraSepp(double a[3], double b[3])');
    expect(sig.selectByDirection('in', 'name', ',')).toBe('a,b');
    expect(sig.returnSlot?.direction).toBe('ret');
  });

  it('reports a missing anchor line as a location error', () => {
    try {
      loadFunctionSignature('eraSepp', combined, { anchor: 'float eraSepp' });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(LocationError);
      if (e instanceof LocationError) {
        expect(e.details).toEqual({
          functionName: 'eraSepp',
          filePath: combined,
          anchor: 'float eraSepp',
        });
      }
    }
  });

  it('reports a missing declaration with the pattern it searched for', () => {
    try {
      parseFunctionSignature('eraNope', SEPP, { filePath: 'nope.c' });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(LocationError);
      if (e instanceof LocationError) {
        expect(e.code).toBe('LOCATION_FAILED');
        expect(e.details.functionName).toBe('eraNope');
        expect(e.details.filePath).toBe('nope.c');
        expect(e.details.pattern).toBe('\\n([^\\n]+eraNope ?\\([^)]+\\)).+?(\\/\\*.+?\\*\\/)');
      }
    }
  });

  it('rejects unknown direction names in a filter', () => {
    expect(() => parseDirectionFilter('in|sideways')).toThrow(
      'Invalid direction "sideways" (expected: in|out|inout|unknown|ret)',
    );
    try {
      parseDirectionFilter('sideways');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidDirectionError);
      if (e instanceof InvalidDirectionError) {
        expect(e.code).toBe('INVALID_DIRECTION');
        expect(e.details).toEqual({ direction: 'sideways' });
      }
    }
  });

  it('reads directions from CRLF sources', () => {
    const src =
      'double eraSepp(double a[3], double b[3])\r\n/*\r\n**  Given:\r\n' +
      '**     a   double[3]  v\r\n**     b   double[3]  v\r\n**\r\n*/\r\n';
    const sig = parseFunctionSignature('eraSepp', src);

    expect(sig.params.map((a) => `${a.name}:${a.direction}`)).toEqual(['a:in', 'b:in']);
    expect(sig.declaration).toBe('double eraSepp(double a[3], double b[3])');
  });

  it('describes each argument for the binding layer', () => {
    const view = describeForBinding(loadFunctionSignature('eraRx', erfaDir));

    expect(view.name).toBe('eraRx');
    expect(view.shortName).toBe('rx');
    expect(view.returns).toBe('void');
    expect(view.returnSlot).toBeUndefined();
    expect(view.args[1]).toEqual({
      name: 'r',
      baseType: 'double[3][3]',
      callType: 'double *',
      direction: 'inout',
      storage: { token: 'f8[3,3]', kind: 'array', element: 'double', shape: [3, 3] },
    });
  });
});
