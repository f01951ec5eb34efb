import type { Buffer } from 'node:buffer';

import type { Logger } from 'pino';

/**
 * Result of a grammar step: the produced value and the unconsumed rest of the
 * input. `rest` is always a view over the same memory as the input.
 */
export interface ParseResult<T> {
  value: T;
  rest: Buffer;
}

export interface HeaderParseLimits {
  maxHeaderNameBytes: number;
  maxValuesPerHeader: number;
}

export interface HeaderParseOptions {
  limits?: Partial<HeaderParseLimits>;
  logger?: Logger;
}
