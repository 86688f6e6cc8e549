/**
 * Parsed Python source with in-place literal mutation and regeneration.
 *
 * A PythonTree is owned by exactly one lint or apply invocation. Literal
 * mutations are recorded against node positions and only become visible
 * through `literalValue()` and `unparse()`; the syntax tree itself is
 * never edited.
 */
import type Parser from 'tree-sitter';
import { SystemError, ErrorCodes } from '../utils/errors.js';
import {
  getNodeText,
  getSharedPythonParser,
  findFirst,
  getSignificantChildren,
  parseSource,
} from './tree-sitter-utils.js';
import { decodeStringLiteral, renderStringLiteral } from './string-literal.js';
import { PyExpressionNodes, PyStatementNodes, TREE_SITTER_ERROR_NODE } from './types.js';

/**
 * Replacement of one string literal node's value.
 */
export interface LiteralMutation {
  readonly node: Parser.SyntaxNode;
  readonly value: string;
}

/**
 * A string constant argument, resolved to the node that carries it.
 */
export interface StringConstant {
  node: Parser.SyntaxNode;
  value: string;
}

const PARENTHESES = new Set(['(', ')', 'comment']);

function nodeKey(node: Parser.SyntaxNode): string {
  return `${node.startIndex}:${node.endIndex}`;
}

export class PythonTree {
  private readonly mutations = new Map<string, LiteralMutation>();

  constructor(
    readonly source: string,
    readonly syntax: Parser.Tree
  ) {}

  get root(): Parser.SyntaxNode {
    return this.syntax.rootNode;
  }

  /**
   * The expression of the first statement, or the statement itself when it
   * is not an expression statement.
   */
  firstExpression(): Parser.SyntaxNode | null {
    const statement = this.root.children.find((c) => c.type !== 'comment');
    if (!statement) return null;
    if (statement.type === PyStatementNodes.EXPRESSION_STATEMENT) {
      return statement.children[0] ?? null;
    }
    return statement;
  }

  textOf(node: Parser.SyntaxNode): string {
    return getNodeText(node, this.source);
  }

  /**
   * Resolves an expression to a string constant.
   * Plain and implicitly concatenated strings qualify, also inside
   * parentheses; anything else (f-strings, names, calls, operators) does not.
   */
  stringConstant(node: Parser.SyntaxNode): StringConstant | null {
    let current = node;
    while (current.type === PyExpressionNodes.PARENTHESIZED_EXPRESSION) {
      const inner = getSignificantChildren(current, PARENTHESES);
      if (inner.length !== 1) return null;
      current = inner[0];
    }

    const value = this.literalValue(current);
    return value === null ? null : { node: current, value };
  }

  /**
   * Current value of a string literal node, including any recorded mutation.
   */
  literalValue(node: Parser.SyntaxNode): string | null {
    const mutation = this.mutations.get(nodeKey(node));
    if (mutation) return mutation.value;

    if (node.type === PyExpressionNodes.STRING) {
      return decodeStringLiteral(this.textOf(node));
    }

    if (node.type === PyExpressionNodes.CONCATENATED_STRING) {
      let value = '';
      for (const part of node.children) {
        if (part.type === 'comment') continue;
        if (part.type !== PyExpressionNodes.STRING) return null;
        const decoded = decodeStringLiteral(this.textOf(part));
        if (decoded === null) return null;
        value += decoded;
      }
      return value;
    }

    return null;
  }

  /**
   * Records a new value for a string literal node.
   */
  replaceLiteral(node: Parser.SyntaxNode, value: string): void {
    this.mutations.set(nodeKey(node), { node, value });
  }

  get mutationCount(): number {
    return this.mutations.size;
  }

  /**
   * Regenerates source text. Untouched regions are emitted verbatim;
   * mutated literals are re-rendered with repr-style quoting.
   */
  unparse(): string {
    if (this.mutations.size === 0) return this.source;

    const ordered = [...this.mutations.values()].sort(
      (a, b) => a.node.startIndex - b.node.startIndex
    );

    let out = '';
    let cursor = 0;
    for (const { node, value } of ordered) {
      out += this.source.slice(cursor, node.startIndex);
      out += renderStringLiteral(value);
      cursor = node.endIndex;
    }
    return out + this.source.slice(cursor);
  }
}

/**
 * Parses Python source into a PythonTree.
 * Throws a SystemError when the source does not parse cleanly.
 */
export function parsePython(source: string, parser: Parser = getSharedPythonParser()): PythonTree {
  const syntax = parseSource(parser, source);

  if (syntax.rootNode.hasError) {
    // hasError also covers MISSING nodes, which carry no ERROR node
    const errorNode =
      findFirst(syntax.rootNode, (node) => node.type === TREE_SITTER_ERROR_NODE || node.isMissing) ??
      syntax.rootNode;
    const { row, column } = errorNode.startPosition;
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse Python source: syntax error at line ${row + 1}, column ${column + 1}`,
      { line: row, column }
    );
  }

  return new PythonTree(source, syntax);
}
