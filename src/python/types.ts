/**
 * Shared types and tree-sitter node names for the Python front end.
 */

/**
 * A region of source text. Lines and columns are 0-based, columns count
 * UTF-16 code units, and the end position is exclusive.
 */
export interface SourceSpan {
  startLine: number;
  startColumn: number;
  endLine: number;
  endColumn: number;
}

/** Python tree-sitter node types for expressions */
export const PyExpressionNodes = {
  CALL: 'call',
  ATTRIBUTE: 'attribute',
  IDENTIFIER: 'identifier',
  STRING: 'string',
  CONCATENATED_STRING: 'concatenated_string',
  PARENTHESIZED_EXPRESSION: 'parenthesized_expression',
} as const;

/** Python tree-sitter node types found inside an argument list */
export const PyArgumentNodes = {
  ARGUMENT_LIST: 'argument_list',
  KEYWORD_ARGUMENT: 'keyword_argument',
  LIST_SPLAT: 'list_splat',
  DICTIONARY_SPLAT: 'dictionary_splat',
  COMMENT: 'comment',
} as const;

/** Python tree-sitter node types for statements */
export const PyStatementNodes = {
  MODULE: 'module',
  EXPRESSION_STATEMENT: 'expression_statement',
} as const;

/** Node type tree-sitter inserts where the grammar failed to match */
export const TREE_SITTER_ERROR_NODE = 'ERROR';
