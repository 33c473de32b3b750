export { tokenize } from './tokenize';
export { TokenStream } from './TokenStream';
