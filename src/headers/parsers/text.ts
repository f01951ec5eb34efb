import type { Buffer } from 'node:buffer';

import { isDigit, isTokenChar } from '../../bnf/char-class.js';
import { fail, takeLine, takeQuotedString, takeSwsToken, takeWhile1 } from '../../bnf/scanners.js';
import { isValidSipDate } from '../../date/index.js';
import { SipParseErrorCode } from '../../errors.js';
import { SLASH } from '../../specs.js';
import type { ParseResult } from '../../types.js';
import { HeaderTags } from '../header-tags.js';
import { HeaderTagType, HeaderValueType } from '../header-types.js';
import { consumedValue, type HeaderValue } from '../header-value.js';

const CODE = SipParseErrorCode.INVALID_HEADER_VALUE;

export function takeTokenValue(input: Buffer): ParseResult<HeaderValue> {
  const { rest } = takeWhile1(input, isTokenChar, CODE, 'Expected token');
  return consumedValue(input, rest, HeaderValueType.TokenValue);
}

/** m-type SLASH m-subtype, e.g. `application/sdp` or `*\/*`. */
export function takeMediaType(input: Buffer): ParseResult<HeaderValue> {
  const type = takeWhile1(input, isTokenChar, CODE, 'Expected media type');
  const afterSlash = takeSwsToken(type.rest, SLASH, CODE);
  const { rest } = takeWhile1(afterSlash, isTokenChar, CODE, 'Expected media subtype');
  return consumedValue(input, rest, HeaderValueType.TokenValue);
}

export function takeDigitValue(input: Buffer): ParseResult<HeaderValue> {
  const { rest } = takeWhile1(input, isDigit, CODE, 'Expected digits');
  return consumedValue(input, rest, HeaderValueType.Digit);
}

/** Subject, Organization: free text to the end of the line. */
export function takeUtf8Text(input: Buffer): ParseResult<HeaderValue> {
  const { rest } = takeLine(input);
  return consumedValue(input, rest, HeaderValueType.Utf8Text);
}

/** Server, User-Agent: product and comment list, kept as text. */
export function takeUserAgent(input: Buffer): ParseResult<HeaderValue> {
  const { rest } = takeLine(input);
  return consumedValue(input, rest, HeaderValueType.UserAgent);
}

export function takeDateValue(input: Buffer): ParseResult<HeaderValue> {
  const { value, rest } = takeLine(input);
  if (!isValidSipDate(value.toString('latin1'))) {
    fail(CODE, 'Invalid SIP-date', input);
  }
  return consumedValue(input, rest, HeaderValueType.DateString);
}

export function takeQuotedValue(input: Buffer): ParseResult<HeaderValue> {
  const { value, rest } = takeQuotedString(input, CODE);
  const tags = HeaderTags.from([[HeaderTagType.PureValue, value]]);
  return consumedValue(input, rest, HeaderValueType.QuotedValue, tags);
}

/**
 * Fallback for headers missing from the registry: accepts any bytes up to
 * the line terminator, commas and semicolons included.
 */
export function takeExtensionValue(input: Buffer): ParseResult<HeaderValue> {
  const { rest } = takeLine(input);
  return consumedValue(input, rest, HeaderValueType.ExtensionHeader);
}
