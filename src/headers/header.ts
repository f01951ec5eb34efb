import { Buffer } from 'node:buffer';

import { isCrlf, isTokenChar } from '../bnf/char-class.js';
import { fail, skipWsp, takeSwsToken, takeWhile } from '../bnf/scanners.js';
import { SipParseError, SipParseErrorCode } from '../errors.js';
import { getDefaultLogger } from '../logger.js';
import { COLON, COMMA, DEFAULT_HEADER_PARSE_LIMITS, SEMI, SP } from '../specs.js';
import type { HeaderParseLimits, HeaderParseOptions, ParseResult } from '../types.js';
import { decodeUtf8 } from '../utf8.js';
import { type GenericParams, parseGenericParams } from './generic-params.js';
import { createEmptyHeaderValue, type HeaderValue, type HeaderValueParser } from './header-value.js';
import { findValueParser, type SipRFCHeader } from './rfc-header.js';

/** One comma-separated occurrence of a header. */
export interface Header {
  /** As written; compare with {@link headerNameEquals}. */
  readonly name: string;
  readonly value: HeaderValue;
  readonly parameters?: GenericParams;
  /** Value and parameters exactly as they appear in the input. */
  readonly rawValueParam: Buffer;
}

export interface HeaderGroup {
  readonly name: string;
  /** `null` for extension headers. */
  readonly rfcHeader: SipRFCHeader | null;
  readonly headers: readonly Header[];
}

export interface TakenValue {
  value: HeaderValue;
  parameters?: GenericParams;
}

export function createHeader(
  name: string,
  value: HeaderValue,
  parameters: GenericParams | undefined,
  rawValueParam: Buffer,
): Header {
  return {
    name,
    value,
    ...(parameters === undefined ? {} : { parameters }),
    rawValueParam,
  };
}

export function headerNameEquals(a: string, b: string): boolean {
  return a.length === b.length && a.toLowerCase() === b.toLowerCase();
}

export function takeHeaderName(
  input: Buffer,
  limits: HeaderParseLimits = DEFAULT_HEADER_PARSE_LIMITS,
): ParseResult<string> {
  const { value: nameBytes, rest } = takeWhile(input, isTokenChar);
  if (nameBytes.length === 0) {
    fail(SipParseErrorCode.INVALID_HEADER_NAME, 'Bad header name', input);
  }
  if (nameBytes.length > limits.maxHeaderNameBytes) {
    fail(
      SipParseErrorCode.HEADER_NAME_TOO_LARGE,
      `Header name too large: exceeds limit of ${limits.maxHeaderNameBytes} bytes`,
    );
  }
  const afterColon = takeSwsToken(rest, COLON, SipParseErrorCode.INVALID_HEADER_NAME);

  let name: string;
  try {
    name = decodeUtf8(nameBytes);
  } catch (error) {
    throw new SipParseError({
      code: SipParseErrorCode.INVALID_HEADER_NAME,
      message: 'Bad header name',
      cause: error,
    });
  }
  return { value: name, rest: afterColon };
}

/**
 * Takes one value and its parameters. On return `rest` starts with a comma,
 * a line terminator or is empty (the latter only after parameters).
 */
export function takeHeaderValue(input: Buffer, parser: HeaderValueParser): ParseResult<TakenValue> {
  if (isCrlf(input)) {
    return { value: { value: createEmptyHeaderValue(input) }, rest: input };
  }

  const { value, rest: afterValue } = parser(input);
  const rest = skipWsp(afterValue);
  const next = rest[0];
  if (next === undefined) {
    fail(SipParseErrorCode.INVALID_VALUE_TERMINATOR, 'Header value is not terminated');
  }
  if (next !== COMMA && next !== SEMI && next !== SP && !isCrlf(rest)) {
    fail(SipParseErrorCode.INVALID_VALUE_TERMINATOR, 'Unexpected byte after header value', rest);
  }

  if (next === SEMI) {
    const params = parseGenericParams(rest);
    return { value: { value, parameters: params.value }, rest: params.rest };
  }
  return { value: { value }, rest };
}

function resolveLimits(limits: Partial<HeaderParseLimits> | undefined): HeaderParseLimits {
  return { ...DEFAULT_HEADER_PARSE_LIMITS, ...limits };
}

/**
 * Parses one header line from its name up to (not including) the line
 * terminator, producing a record per comma-separated value. Every span in
 * the result is a view into `input`; keep `input` unchanged while the result
 * is in use. On success `rest` starts with CRLF.
 *
 * Limits apply unless overridden through `options.limits`: at most
 * `maxValuesPerHeader` (default 256) comma-separated values, beyond which
 * the group fails with `HEADER_TOO_MANY_VALUES`, and at most
 * `maxHeaderNameBytes` (default 256) name bytes.
 */
export function parseHeader(input: Buffer, options: HeaderParseOptions = {}): ParseResult<HeaderGroup> {
  if (!Buffer.isBuffer(input)) {
    throw new TypeError('input must be a Buffer');
  }
  const limits = resolveLimits(options.limits);
  const logger = options.logger ?? getDefaultLogger();

  try {
    const { value: name, rest: valueStart } = takeHeaderName(input, limits);
    const { rfcHeader, parser } = findValueParser(name);
    const headers: Header[] = [];

    let rest = valueStart;
    while (true) {
      if (headers.length >= limits.maxValuesPerHeader) {
        fail(
          SipParseErrorCode.HEADER_TOO_MANY_VALUES,
          `Too many ${name} values: exceeds limit of ${limits.maxValuesPerHeader}`,
        );
      }
      const taken = takeHeaderValue(rest, parser);
      const rawValueParam = rest.subarray(0, rest.length - taken.rest.length);
      headers.push(createHeader(name, taken.value.value, taken.value.parameters, rawValueParam));

      if (taken.rest.length === 0) {
        fail(SipParseErrorCode.EMPTY_INPUT, 'Header input is empty');
      }
      if (taken.rest[0] === COMMA) {
        rest = takeSwsToken(taken.rest, COMMA, SipParseErrorCode.INVALID_VALUE_TERMINATOR);
        continue;
      }
      if (!isCrlf(taken.rest)) {
        fail(SipParseErrorCode.INVALID_VALUE_TERMINATOR, 'Expected CRLF after header value', taken.rest);
      }
      rest = taken.rest;
      break;
    }

    logger.trace({ header: name, rfcHeader, count: headers.length }, 'parsed header');
    return { value: { name, rfcHeader, headers }, rest };
  } catch (error) {
    if (error instanceof SipParseError) {
      logger.debug({ code: error.code }, `header parse failed: ${error.message}`);
    }
    throw error;
  }
}
