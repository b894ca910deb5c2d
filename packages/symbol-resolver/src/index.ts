/**
 * @marketsync/symbol-resolver
 *
 * Symbol parsing and resolution against the local symbol directory
 */

export { parseSymbol } from './parse.js';
export { resolveExchange, isKnownExchange } from './aliases.js';
export { SymbolResolver, type SymbolResolverOptions } from './resolver.js';
export type { ParsedSymbol, SymbolDirectory, ValidityResult } from './types.js';
