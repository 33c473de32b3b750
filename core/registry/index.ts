export { SymbolTable, toArity } from './SymbolTable';
