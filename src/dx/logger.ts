let enabled = false;

// Keep this extremely low overhead when disabled.
export function isDebugEnabled(): boolean {
  return enabled || process.env.ERFA_SIGNATURES_DEBUG === '1';
}

/**
 * Enable/disable debug logging programmatically.
 *
 * Also driven by the `debug` field of the config file.
 */
export function setDebugEnabled(v: boolean) {
  enabled = v;
}

export function logDebug(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.log('[erfa-signatures]', ...args);
}

export function logWarn(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.warn('[erfa-signatures]', ...args);
}
