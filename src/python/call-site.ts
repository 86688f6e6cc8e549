/**
 * Call-site view over tree-sitter `call` nodes, including the resolution of
 * a call's full dotted name across chained receivers.
 */
import type Parser from 'tree-sitter';
import type { PythonTree, StringConstant } from './python-tree.js';
import type { SourceSpan } from './types.js';
import { getSpan, getSignificantChildren } from './tree-sitter-utils.js';
import { PyArgumentNodes, PyExpressionNodes } from './types.js';

/**
 * Where a matcher looks for an argument: by position, by keyword, or both.
 * When the call supplies the keyword, the keyword argument is used.
 */
export interface ArgumentSlot {
  readonly position: number | null;
  readonly keyword: string | null;
}

/**
 * A slot that resolved to a string constant.
 */
export interface SlotValue extends StringConstant {
  slot: ArgumentSlot;
}

const ARGUMENT_PUNCTUATION = new Set(['(', ')', ',', PyArgumentNodes.COMMENT]);

/**
 * Resolves an expression to the identifier segments of its dotted path.
 *
 * - `name` resolves to `['name']`
 * - `base.attr` resolves to the path of `base` plus `attr`
 * - `base(...)` resolves to the path of `base`: call parentheses are dropped
 *
 * Any other expression (subscripts, literals, operators, parentheses) makes
 * the whole path unresolvable.
 */
export function resolveExpressionPath(node: Parser.SyntaxNode): string[] | null {
  switch (node.type) {
    case PyExpressionNodes.IDENTIFIER:
      return [node.text];
    case PyExpressionNodes.ATTRIBUTE: {
      const object = node.childForFieldName('object');
      const attribute = node.childForFieldName('attribute');
      if (!object || !attribute) return null;
      const base = resolveExpressionPath(object);
      return base ? [...base, attribute.text] : null;
    }
    case PyExpressionNodes.CALL: {
      const callee = node.childForFieldName('function');
      return callee ? resolveExpressionPath(callee) : null;
    }
    default:
      return null;
  }
}

/**
 * Full dotted name of a call expression (`value.attr1().attr2()` gives
 * `value.attr1.attr2`). Non-call nodes and unresolvable receivers give null.
 */
export function getFullFunctionName(node: Parser.SyntaxNode): string | null {
  if (node.type !== PyExpressionNodes.CALL) return null;
  const path = resolveExpressionPath(node);
  return path ? path.join('.') : null;
}

/**
 * Read-only view over a call expression.
 */
export class CallSite {
  private constructor(
    readonly tree: PythonTree,
    readonly node: Parser.SyntaxNode,
    /** Dotted invocation chain, or null when the receiver is not statically resolvable */
    readonly fullName: readonly string[] | null,
    /** Last segment of the callee, known even when the receiver chain is not */
    readonly methodName: string | null,
    readonly positionalArgs: readonly Parser.SyntaxNode[],
    readonly keywordArgs: ReadonlyMap<string, Parser.SyntaxNode>
  ) {}

  /**
   * Builds a call site for a `call` node; any other node gives null.
   */
  static from(tree: PythonTree, node: Parser.SyntaxNode): CallSite | null {
    if (node.type !== PyExpressionNodes.CALL) return null;
    const callee = node.childForFieldName('function');
    if (!callee) return null;

    const { positional, keywords } = collectArguments(node.childForFieldName('arguments'));

    return new CallSite(
      tree,
      node,
      resolveExpressionPath(node),
      calleeName(callee),
      positional,
      keywords
    );
  }

  get span(): SourceSpan {
    return getSpan(this.node);
  }

  get dottedName(): string | null {
    return this.fullName ? this.fullName.join('.') : null;
  }

  /**
   * True when the resolved path ends with the given segments.
   */
  endsWith(segments: readonly string[]): boolean {
    if (!this.fullName || segments.length > this.fullName.length) return false;
    const offset = this.fullName.length - segments.length;
    return segments.every((segment, i) => this.fullName?.[offset + i] === segment);
  }

  /**
   * The argument expression filling a slot. A keyword argument takes
   * precedence over a positional one.
   */
  argument(slot: ArgumentSlot): Parser.SyntaxNode | null {
    if (slot.keyword !== null) {
      const byKeyword = this.keywordArgs.get(slot.keyword);
      if (byKeyword) return byKeyword;
    }
    if (slot.position !== null) {
      return this.positionalArgs[slot.position] ?? null;
    }
    return null;
  }

  /**
   * The string constant filling a slot, or null when the slot is empty or
   * holds anything other than a literal string.
   */
  literalArgument(slot: ArgumentSlot): SlotValue | null {
    const argument = this.argument(slot);
    if (!argument) return null;
    const constant = this.tree.stringConstant(argument);
    return constant ? { ...constant, slot } : null;
  }
}

function calleeName(callee: Parser.SyntaxNode): string | null {
  if (callee.type === PyExpressionNodes.IDENTIFIER) {
    return callee.text;
  }
  if (callee.type === PyExpressionNodes.ATTRIBUTE) {
    return callee.childForFieldName('attribute')?.text ?? null;
  }
  return null;
}

function collectArguments(argumentList: Parser.SyntaxNode | null): {
  positional: Parser.SyntaxNode[];
  keywords: Map<string, Parser.SyntaxNode>;
} {
  const positional: Parser.SyntaxNode[] = [];
  const keywords = new Map<string, Parser.SyntaxNode>();

  // `f(x for x in y)` passes a generator_expression instead of an argument_list
  if (!argumentList || argumentList.type !== PyArgumentNodes.ARGUMENT_LIST) {
    return { positional, keywords };
  }

  // After a *splat, positions are no longer known statically
  let positionsKnown = true;

  for (const arg of getSignificantChildren(argumentList, ARGUMENT_PUNCTUATION)) {
    switch (arg.type) {
      case PyArgumentNodes.KEYWORD_ARGUMENT: {
        const name = arg.childForFieldName('name');
        const value = arg.childForFieldName('value');
        if (name && value) {
          keywords.set(name.text, value);
        }
        break;
      }
      case PyArgumentNodes.LIST_SPLAT:
        positionsKnown = false;
        break;
      case PyArgumentNodes.DICTIONARY_SPLAT:
        break;
      default:
        if (positionsKnown) {
          positional.push(arg);
        }
    }
  }

  return { positional, keywords };
}
