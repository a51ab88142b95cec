export * from './token.js';
export * from './ast.js';
export * from './bytecode.js';
export * from './result.js';
