import { describe, it, expect, afterEach } from 'vitest';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { collectSignatures, loadCollectOptions } from './collect.js';
import { __resetConfigCacheForTests } from './dx/config.js';
import { generateBindings } from './parser/generateBindings.js';

const fixtures = fileURLToPath(new URL('../fixtures/', import.meta.url));

describe('signature collection', () => {
  afterEach(() => {
    __resetConfigCacheForTests();
  });

  it('collects one section from a directory of per-function files', () => {
    const sigs = collectSignatures({ sourcePath: join(fixtures, 'erfa'), section: 'Astronomy' });

    expect(sigs.map((s) => s.name)).toEqual(['eraCal2jd', 'eraSepp', 'eraRx']);
    expect(sigs.map((s) => s.filePath)).toEqual([
      join(fixtures, 'erfa', 'cal2jd.c'),
      join(fixtures, 'erfa', 'sepp.c'),
      join(fixtures, 'erfa', 'rx.c'),
    ]);
  });

  it('collects from a combined source file using header anchors', () => {
    const sigs = collectSignatures({ sourcePath: join(fixtures, 'combined', 'erfa.c') });

    expect(sigs.map((s) => s.declaration)).toEqual([
      'double eraSepp(double a[3], double b[3])',
      'void eraRx(double phi, double r[3][3])',
    ]);
    expect(sigs[0]?.selectByDirection('in', 'name', ',')).toBe('a,b');
  });

  it('keys binding views by function name', () => {
    const sigs = collectSignatures({ sourcePath: join(fixtures, 'combined', 'erfa.c') });
    const bindings = generateBindings(sigs);

    expect(Object.keys(bindings.functions)).toEqual(['eraSepp', 'eraRx']);
    expect(bindings.functions.eraSepp?.returnSlot).toEqual({
      name: 'ret',
      baseType: 'double',
      callType: 'double',
      direction: 'ret',
      storage: { token: 'f8', kind: 'scalar', element: 'double', shape: [] },
    });
  });

  it('uses the defaults when no config file exists', async () => {
    const opts = await loadCollectOptions('erfa.c', join(fixtures, 'erfa'));
    expect(opts).toEqual({
      sourcePath: 'erfa.c',
      section: 'Astronomy',
      prefix: 'era',
      headerName: 'erfa.h',
      scalarReturnType: 'double',
    });
  });
});
