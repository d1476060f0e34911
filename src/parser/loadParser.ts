import Parser from 'tree-sitter';

import C from 'tree-sitter-c';

export function createParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(C);
  return parser;
}

/**
 * Parse a whole C file. The source is fed in chunks: the native binding
 * rejects a single string argument above its default buffer size.
 */
export function parseCSource(source: string): Parser.Tree {
  const parser = createParser();
  return parser.parse((index: number) => (index < source.length ? source.slice(index, index + 4096) : null));
}
