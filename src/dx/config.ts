import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { logDebug, setDebugEnabled } from './logger.js';

export type SignatureRuntimeConfig = {
  /** Enable debug logs without env var */
  debug?: boolean;
  /** Top-level header section whose functions are collected (default `Astronomy`) */
  section?: string;
  /** Library name prefix (default `era`) */
  prefix?: string;
  /** Header file name looked up beside the sources (default `erfa.h`) */
  headerName?: string;
  /** Return type that gets a synthetic `ret` slot (default `double`) */
  scalarReturnType?: string;
};

export const defaultConfig: Required<SignatureRuntimeConfig> = Object.freeze({
  debug: false,
  section: 'Astronomy',
  prefix: 'era',
  headerName: 'erfa.h',
  scalarReturnType: 'double',
});

let cached:
  | { loaded: true; config: SignatureRuntimeConfig | null }
  | { loaded: false } = { loaded: false };

function configPath(projectRoot: string) {
  return join(projectRoot, 'erfa-signatures.config.js');
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null;
}

function pickString(obj: Record<string, unknown>, key: string): string | undefined {
  const v = obj[key];
  if (v === undefined) return undefined;
  if (typeof v !== 'string') {
    throw new Error(`Invalid erfa-signatures config: "${key}" must be a string`);
  }
  return v;
}

function toConfig(mod: unknown): SignatureRuntimeConfig | null {
  const raw = isRecord(mod) && 'default' in mod ? mod.default : mod;
  if (!isRecord(raw)) return null;

  if (raw.debug !== undefined && typeof raw.debug !== 'boolean') {
    throw new Error('Invalid erfa-signatures config: "debug" must be a boolean');
  }

  return {
    debug: typeof raw.debug === 'boolean' ? raw.debug : undefined,
    section: pickString(raw, 'section'),
    prefix: pickString(raw, 'prefix'),
    headerName: pickString(raw, 'headerName'),
    scalarReturnType: pickString(raw, 'scalarReturnType'),
  };
}

/**
 * Loads optional `erfa-signatures.config.js` from the project root.
 *
 * - Optional: if missing, returns null
 * - Cached: reads at most once per process
 */
export async function loadOptionalConfig(
  projectRoot: string = process.cwd(),
): Promise<SignatureRuntimeConfig | null> {
  if (cached.loaded) return cached.config;

  const p = configPath(projectRoot);
  if (!existsSync(p)) {
    cached = { loaded: true, config: null };
    return null;
  }

  // Dynamic import so there is zero cost when config isn't present.
  const url = pathToFileURL(resolve(p)).href;
  const mod: unknown = await import(url);
  const cfg = toConfig(mod);
  cached = { loaded: true, config: cfg };
  if (cfg?.debug) setDebugEnabled(true);
  logDebug('loaded config', { path: p });
  return cfg;
}

/** Config file values over the defaults; unset keys fall back. */
export function resolveConfig(
  cfg: SignatureRuntimeConfig | null,
): Required<SignatureRuntimeConfig> {
  return {
    debug: cfg?.debug ?? defaultConfig.debug,
    section: cfg?.section ?? defaultConfig.section,
    prefix: cfg?.prefix ?? defaultConfig.prefix,
    headerName: cfg?.headerName ?? defaultConfig.headerName,
    scalarReturnType: cfg?.scalarReturnType ?? defaultConfig.scalarReturnType,
  };
}

/** For tests only. */
export function __resetConfigCacheForTests() {
  cached = { loaded: false };
}
