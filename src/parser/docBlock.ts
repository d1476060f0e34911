import type { ArgumentEntry, DocumentationBlock } from './parserTypes.js';

// A section body ends at the first line made of two spaces (an empty `**` line
// once the comment is normalized).
const GIVEN = /Given(?! and returned)[^\n]*:\n(.+?) {2}\n/s;
const RETURNED = /Returned[^\n]*:\n(.+?) {2}\n/s;
const GIVEN_AND_RETURNED = /Given and returned[^\n]*:\n(.+?) {2}\n/s;

const ENTRY = /^ +([^ ]+) +([^ ]+) +(.+)/;

export function normalizeComment(raw: string): string {
  return raw.replace(/\*\*|\/\*|\*\//g, '  ');
}

export function parseArgumentEntry(line: string): ArgumentEntry | null {
  const m = ENTRY.exec(line);
  if (!m) return null;
  const [, name, declaredType, description] = m;
  if (!name || !declaredType || !description) return null;
  return { name, declaredType, description };
}

function parseSection(doc: string, header: RegExp): ArgumentEntry[] {
  const body = header.exec(doc)?.[1];
  if (body == null) return [];

  const entries: ArgumentEntry[] = [];
  for (const line of body.split('\n')) {
    const entry = parseArgumentEntry(line);
    if (entry) entries.push(entry);
  }
  return entries;
}

/**
 * Parse the Given / Returned / Given and returned sections of a function's
 * block comment. Missing sections and lines outside the
 * `name  type  description` layout yield nothing; this never throws.
 */
export function parseDocumentationBlock(raw: string): DocumentationBlock {
  const doc = normalizeComment(raw);
  const both = parseSection(doc, GIVEN_AND_RETURNED);

  return {
    inputs: Object.freeze([...parseSection(doc, GIVEN), ...both]),
    outputs: Object.freeze([...parseSection(doc, RETURNED), ...both]),
  };
}

export function documentedNames(entries: readonly ArgumentEntry[]): Set<string> {
  const names = new Set<string>();
  for (const e of entries) {
    for (const n of e.name.split(',')) names.add(n);
  }
  return names;
}
