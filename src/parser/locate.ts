import { statSync } from 'node:fs';
import { join, normalize } from 'node:path';

import { LocationError } from './errors.js';

export type LocatedDeclaration = {
  /** The declaration line(s) up to the closing parenthesis. */
  declaration: string;
  /** The first block comment after the declaration, delimiters included. */
  comment: string;
  pattern: string;
};

/** Sections and declarations are matched on `\n`; CRLF files are read as LF. */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** `eraSepp` -> `sepp` */
export function shortNameOf(name: string, prefix: string): string {
  const bare = prefix && name.startsWith(prefix) ? name.slice(prefix.length) : name;
  return bare.toLowerCase();
}

/**
 * One-file-per-function layout when `sourcePath` is a directory
 * (`<dir>/sepp.c` for `eraSepp`), otherwise the combined source file itself.
 */
export function sourceFileFor(name: string, sourcePath: string, prefix: string): string {
  if (statSync(sourcePath).isDirectory()) {
    return join(normalize(sourcePath), `${shortNameOf(name, prefix)}.c`);
  }
  return sourcePath;
}

/**
 * Drop everything before the first line starting with `anchor`. Used on a
 * combined source file where the function may be called before it is defined.
 */
export function applyAnchor(
  buffer: string,
  anchor: string,
  functionName: string,
  filePath: string,
): string {
  const lines = buffer.split('\n');
  const idx = lines.findIndex((line) => line.startsWith(anchor));
  if (idx === -1) {
    throw new LocationError(
      `Could not find the anchor line "${anchor}" for ${functionName} in ${filePath}`,
      { functionName, filePath, anchor },
    );
  }
  return `\n${lines.slice(idx).join('\n')}`;
}

export function declarationPattern(name: string): RegExp {
  return new RegExp(`\\n([^\\n]+${escapeRegExp(name)} ?\\([^)]+\\)).+?(/\\*.+?\\*/)`, 's');
}

/**
 * Find the first line naming `name` with a parenthesized list, and the
 * nearest block comment after it.
 */
export function locateDeclaration(
  buffer: string,
  name: string,
  filePath: string,
): LocatedDeclaration {
  const re = declarationPattern(name);
  const text = buffer.startsWith('\n') ? buffer : `\n${buffer}`;
  const m = re.exec(text);

  if (!m?.[1] || !m[2]) {
    throw new LocationError(
      `Could not locate the declaration of ${name} in ${filePath} (pattern: ${re.source})`,
      { functionName: name, filePath, pattern: re.source },
    );
  }

  return { declaration: m[1], comment: m[2], pattern: re.source };
}
