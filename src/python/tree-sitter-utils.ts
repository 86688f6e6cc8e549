/**
 * Shared tree-sitter helpers: parser construction, traversal and node positions.
 */
import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import type { SourceSpan } from './types.js';

/** Parse buffer floor; tree-sitter's default is too small for sources of 32 KiB and up */
const MIN_BUFFER_SIZE = 32 * 1024;

/**
 * Creates a Python parser instance.
 */
export function createPythonParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Python);
  return parser;
}

/**
 * Parses source text with a buffer sized to the input.
 */
export function parseSource(parser: Parser, source: string): Parser.Tree {
  return parser.parse(source, undefined, {
    bufferSize: Math.max(MIN_BUFFER_SIZE, source.length * 2 + 1),
  });
}

let sharedParser: Parser | null = null;

/**
 * Returns the process-wide Python parser, creating it on first use.
 */
export function getSharedPythonParser(): Parser {
  if (!sharedParser) {
    sharedParser = createPythonParser();
  }
  return sharedParser;
}

/**
 * Gets the source text of a syntax node.
 */
export function getNodeText(
  node: Parser.SyntaxNode,
  sourceCode: string
): string {
  return sourceCode.slice(node.startIndex, node.endIndex);
}

/**
 * Converts a node's start and end points to a SourceSpan.
 */
export function getSpan(node: Parser.SyntaxNode): SourceSpan {
  return {
    startLine: node.startPosition.row,
    startColumn: node.startPosition.column,
    endLine: node.endPosition.row,
    endColumn: node.endPosition.column,
  };
}

/**
 * Walks the tree depth-first in document order, yielding every node once.
 * Parents come before their children.
 */
export function* walkTree(root: Parser.SyntaxNode): Generator<Parser.SyntaxNode> {
  const stack: Parser.SyntaxNode[] = [root];
  let node = stack.pop();
  while (node) {
    yield node;
    const { children } = node;
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
    node = stack.pop();
  }
}

/**
 * Finds the first node satisfying the predicate, in document order.
 */
export function findFirst(
  root: Parser.SyntaxNode,
  predicate: (node: Parser.SyntaxNode) => boolean
): Parser.SyntaxNode | null {
  for (const node of walkTree(root)) {
    if (predicate(node)) {
      return node;
    }
  }
  return null;
}

/**
 * Gets the meaningful children of a node, dropping punctuation and comments.
 */
export function getSignificantChildren(
  node: Parser.SyntaxNode,
  skipTypes: ReadonlySet<string>
): Parser.SyntaxNode[] {
  return node.children.filter((child) => !skipTypes.has(child.type));
}
