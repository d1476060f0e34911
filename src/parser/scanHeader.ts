import type Parser from 'tree-sitter';

import { EnumerationInvariantError } from './errors.js';
import { normalizeLineEndings } from './locate.js';
import { parseCSource } from './loadParser.js';
import type { HeaderFunction } from './parserTypes.js';
import { logDebug } from '../dx/logger.js';
import { warn } from '../dx/warnings.js';

type SyntaxNode = Parser.SyntaxNode;

export type ScanHeaderOptions = {
  /** Keep only functions under this top-level section (e.g. `Astronomy`). */
  section?: string;
};

export type HeaderBlock = {
  section: string;
  subsection: string;
  lastRow: number;
  count: number;
};

const SECTION_MARKER = /^\/\* (\w*)\/(\w*) \*\/$/;

function functionNameOf(declaration: SyntaxNode): string | null {
  let d = declaration.childForFieldName('declarator');
  // `double *eraFoo(...)` nests the function declarator in a pointer declarator.
  while (d && d.type === 'pointer_declarator') d = d.childForFieldName('declarator');
  if (!d || d.type !== 'function_declarator') return null;
  const id = d.childForFieldName('declarator');
  return id?.type === 'identifier' ? id.text : null;
}

/**
 * Header line naming the function, cut before its parameter list. `rows` is
 * the declaration's first and last line.
 */
export function anchorFor(
  lines: readonly string[],
  rows: readonly [number, number],
  name: string,
  block: Pick<HeaderBlock, 'section' | 'subsection'>,
): string {
  const own = lines.slice(rows[0], rows[1] + 1);
  const line = own.find((l) => l.includes(name));
  if (line === undefined) {
    throw new EnumerationInvariantError(
      `${block.section}/${block.subsection}: ${name} is missing from the header text it was read from`,
      { section: block.section, subsection: block.subsection, functionName: name },
    );
  }
  return line.replace(/;\s*$/, '').split('(')[0]?.trimEnd() ?? '';
}

/**
 * Enumerate the functions declared in a header, grouped by the
 * `Section/Subsection` marker comments that open each block of declarations.
 * A block ends at the first blank line.
 */
export function scanHeader(header: string, options: ScanHeaderOptions = {}): HeaderFunction[] {
  const source = normalizeLineEndings(header);
  const lines = source.split('\n');
  const tree = parseCSource(source);
  const found: HeaderFunction[] = [];
  let block: HeaderBlock | null = null;

  function close() {
    if (block && block.count === 0 && (!options.section || block.section === options.section)) {
      warn({
        code: 'EMPTY_SUBSECTION',
        message: `${block.section}/${block.subsection} declares no functions`,
      });
    }
    block = null;
  }

  function visit(node: SyntaxNode) {
    if (node.type === 'comment') {
      const m = SECTION_MARKER.exec(node.text);
      if (m) {
        close();
        block = { section: m[1] ?? '', subsection: m[2] ?? '', lastRow: node.endPosition.row, count: 0 };
        logDebug(`${block.section}.${block.subsection}`);
        return;
      }
      if (block && node.startPosition.row <= block.lastRow + 1) block.lastRow = node.endPosition.row;
      return;
    }

    if (node.type === 'declaration') {
      if (block && node.startPosition.row > block.lastRow + 1) close();
      if (block) {
        const current: HeaderBlock = block;
        current.lastRow = node.endPosition.row;
        const name = functionNameOf(node);
        if (name) {
          current.count++;
          if (!options.section || current.section === options.section) {
            found.push({
              section: current.section,
              subsection: current.subsection,
              name,
              anchor: anchorFor(lines, [node.startPosition.row, node.endPosition.row], name, current),
            });
          }
        }
      }
      return;
    }

    for (const child of node.children) visit(child);
  }

  visit(tree.rootNode);
  close();
  return found;
}
