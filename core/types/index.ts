/**
 * Core types
 *
 * Single export point for the token, node and symbol types shared across
 * the lexer, the parser and the public API.
 */

export * from './primitives';
export * from './tokens';
export * from './nodes';
export * from './symbols';
