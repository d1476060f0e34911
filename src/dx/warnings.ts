import { logWarn } from './logger.js';

export type SignatureWarningCode =
  | 'UNDOCUMENTED_PARAMETER'
  | 'EMPTY_SUBSECTION';

export type SignatureWarning = {
  code: SignatureWarningCode;
  message: string;
  hint?: string;
};

/**
 * Emit a non-fatal warning.
 *
 * This must never throw and must not print unless debug logging is enabled.
 */
export function warn(w: SignatureWarning) {
  try {
    const hint = w.hint ? ` Hint: ${w.hint}` : '';
    logWarn(`warning(${w.code}): ${w.message}${hint}`);
  } catch {
    // Never throw from warnings.
  }
}
