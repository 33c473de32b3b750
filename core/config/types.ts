/**
 * Configuration types for texast
 */

import type { Arity } from '@core/types';
import type { OptionalArgumentSpacing } from '@core/parser/types';

export interface TexastConfig {
  parser?: ParserConfig;
}

export interface ParserConfig {
  optionalArgumentSpacing?: OptionalArgumentSpacing;
  /** Extra command arities, e.g. `{ "affil": [1, 1] }` */
  commands?: Record<string, Arity>;
  environments?: Record<string, Arity>;
}
