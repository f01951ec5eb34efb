import type { Buffer } from 'node:buffer';

import { isGenValueChar, isLineTerminatorStart, isTokenChar } from '../bnf/char-class.js';
import { fail, skipWsp, takeQuotedString, takeSwsToken, takeWhile1 } from '../bnf/scanners.js';
import { SipParseErrorCode } from '../errors.js';
import { COMMA, DQUOTE, EQUAL, SEMI } from '../specs.js';
import type { ParseResult } from '../types.js';
import { decodeUtf8 } from '../utf8.js';

export interface GenericParam {
  name: Buffer;
  /** Absent for a bare `;name`. Quoted values exclude the quotes. */
  value?: Buffer;
  quoted: boolean;
}

/** Ordered `;name[=value]` list; names compare ASCII case-insensitively. */
export class GenericParams implements Iterable<GenericParam> {
  readonly raw: Buffer;

  private readonly params: readonly GenericParam[];

  constructor(params: readonly GenericParam[], raw: Buffer) {
    this.params = params;
    this.raw = raw;
  }

  get size(): number {
    return this.params.length;
  }

  get(name: string): GenericParam | undefined {
    const wanted = name.toLowerCase();
    return this.params.find((param) => param.name.toString('latin1').toLowerCase() === wanted);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /** `null` for a parameter without a value, `undefined` when absent. */
  getValue(name: string): string | null | undefined {
    const param = this.get(name);
    if (param === undefined) {
      return undefined;
    }
    return param.value === undefined ? null : decodeUtf8(param.value);
  }

  [Symbol.iterator](): IterableIterator<GenericParam> {
    return this.params[Symbol.iterator]();
  }

  toJSON(): Array<[name: string, value: string | null]> {
    return this.params.map((param) => [
      decodeUtf8(param.name),
      param.value === undefined ? null : decodeUtf8(param.value),
    ]);
  }
}

function takeParam(input: Buffer): ParseResult<GenericParam> {
  const name = takeWhile1(input, isTokenChar, SipParseErrorCode.INVALID_PARAMETERS, 'Expected parameter name');
  if (skipWsp(name.rest)[0] !== EQUAL) {
    return { value: { name: name.value, quoted: false }, rest: name.rest };
  }

  const valueStart = takeSwsToken(name.rest, EQUAL, SipParseErrorCode.INVALID_PARAMETERS);
  if (valueStart[0] === DQUOTE) {
    const quoted = takeQuotedString(valueStart, SipParseErrorCode.INVALID_PARAMETERS);
    return { value: { name: name.value, value: quoted.value, quoted: true }, rest: quoted.rest };
  }

  const value = takeWhile1(valueStart, isGenValueChar, SipParseErrorCode.INVALID_PARAMETERS, 'Expected parameter value');
  return { value: { name: name.value, value: value.value, quoted: false }, rest: value.rest };
}

/**
 * Parses `*( SEMI generic-param )` starting at a `;`. Stops before a comma,
 * a line terminator or the end of input, with trailing whitespace consumed.
 */
export function parseGenericParams(input: Buffer): ParseResult<GenericParams> {
  if (input[0] !== SEMI) {
    fail(SipParseErrorCode.INVALID_PARAMETERS, 'Expected ";"', input);
  }

  const params: GenericParam[] = [];
  let rest = input;

  while (true) {
    rest = takeSwsToken(rest, SEMI, SipParseErrorCode.INVALID_PARAMETERS);
    const param = takeParam(rest);
    params.push(param.value);
    rest = skipWsp(param.rest);

    const next = rest[0];
    if (next === SEMI) {
      continue;
    }
    if (next === undefined || next === COMMA || isLineTerminatorStart(next)) {
      break;
    }
    fail(SipParseErrorCode.INVALID_PARAMETERS, 'Unexpected byte after parameter', rest);
  }

  const raw = input.subarray(0, input.length - rest.length);
  return { value: new GenericParams(params, raw), rest };
}
