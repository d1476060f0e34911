import { readFileSync, statSync } from 'node:fs';
import { dirname, join, normalize } from 'node:path';

import { loadOptionalConfig, resolveConfig, type SignatureRuntimeConfig } from './dx/config.js';
import { logDebug } from './dx/logger.js';
import { createTypeMapper, type TypeMapper } from './ffi/typeMap.js';
import { FunctionSignature, loadFunctionSignature } from './parser/functionSignature.js';
import { scanHeader } from './parser/scanHeader.js';

export type CollectOptions = {
  /** A directory of one-file-per-function sources, or a single combined `.c` file. */
  sourcePath: string;
  section?: string;
  prefix?: string;
  headerName?: string;
  scalarReturnType?: string;
  typeMap?: TypeMapper;
};

/**
 * Signatures of every function the header lists under `section`, in header
 * order.
 *
 * In a directory each function has its own file. A combined file can call a
 * function before defining it, so the search starts from the header's own
 * `return-type name` text.
 */
export function collectSignatures(options: CollectOptions): FunctionSignature[] {
  const cfg = resolveConfig(options);
  const typeMap = options.typeMap ?? createTypeMapper();

  const perFunctionFiles = statSync(options.sourcePath).isDirectory();
  const headerPath = perFunctionFiles
    ? join(normalize(options.sourcePath), cfg.headerName)
    : join(dirname(options.sourcePath), cfg.headerName);

  const header = readFileSync(headerPath, 'utf8');
  const signatures: FunctionSignature[] = [];

  for (const fn of scanHeader(header, { section: cfg.section })) {
    logDebug(`${fn.section}.${fn.subsection}.${fn.name}...`);
    signatures.push(
      loadFunctionSignature(fn.name, options.sourcePath, {
        anchor: perFunctionFiles ? undefined : fn.anchor,
        prefix: cfg.prefix,
        scalarReturnType: cfg.scalarReturnType,
        typeMap,
      }),
    );
  }

  logDebug('collected', { count: signatures.length, header: headerPath });
  return signatures;
}

/** Collect options for `sourcePath`, with `erfa-signatures.config.js` applied. */
export async function loadCollectOptions(
  sourcePath: string,
  projectRoot: string = process.cwd(),
): Promise<CollectOptions> {
  const cfg: SignatureRuntimeConfig = resolveConfig(await loadOptionalConfig(projectRoot));
  return {
    sourcePath,
    section: cfg.section,
    prefix: cfg.prefix,
    headerName: cfg.headerName,
    scalarReturnType: cfg.scalarReturnType,
  };
}
