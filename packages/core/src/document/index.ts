export { assembleStatement, resolveAccountId } from './assemble.js';
export type { AssembledStatement, StatementOptions } from './assemble.js';
export { renderStatement } from './render.js';
export { convertStatement } from './convert.js';
export type { ConversionResult } from './convert.js';
