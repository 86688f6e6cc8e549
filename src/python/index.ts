export * from './types.js';
export * from './tree-sitter-utils.js';
export * from './string-literal.js';
export * from './python-tree.js';
export * from './call-site.js';
