import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { loadLibrary } from './createLibrary.js';
import { loadFfi } from './index.js';

const missing = join(tmpdir(), 'erfa-signatures-missing', 'liberfa.so');

describe('native library loading', () => {
  it('wraps load failures with the library path and the cause', () => {
    try {
      loadLibrary(missing);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(Error);
      if (e instanceof Error) {
        expect(e.message).toBe(`Failed to load native library: ${missing}`);
        expect(e.cause).toBeDefined();
      }
    }
  });

  it('fails before binding anything when the library is missing', () => {
    expect(() => loadFfi(missing, [])).toThrow(`Failed to load native library: ${missing}`);
  });
});
