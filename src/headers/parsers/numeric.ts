import type { Buffer } from 'node:buffer';

import { isDigit, isTokenChar } from '../../bnf/char-class.js';
import { fail, skipWsp, skipWsp1, takeComment, takeWhile, takeWhile1 } from '../../bnf/scanners.js';
import { SipParseErrorCode } from '../../errors.js';
import { DOT, LPAREN, MAX_CSEQ_NUMBER } from '../../specs.js';
import type { ParseResult } from '../../types.js';
import { parseDigits } from '../../utils/number.js';
import { type HeaderTagEntry, HeaderTags } from '../header-tags.js';
import { HeaderTagType, HeaderValueType } from '../header-types.js';
import { consumedValue, type HeaderValue } from '../header-value.js';

const CODE = SipParseErrorCode.INVALID_HEADER_VALUE;

/** 1*DIGIT [ "." *DIGIT ] as used by Timestamp. */
function takeDecimal(input: Buffer): ParseResult<Buffer> {
  const integer = takeWhile1(input, isDigit, CODE, 'Expected digits');
  if (integer.rest[0] !== DOT) {
    return integer;
  }
  const fraction = takeWhile(integer.rest.subarray(1), isDigit);
  return { value: input.subarray(0, input.length - fraction.rest.length), rest: fraction.rest };
}

/** MIME-Version: 1*DIGIT [ "." 1*DIGIT ] */
export function takeVersion(input: Buffer): ParseResult<HeaderValue> {
  const major = takeWhile1(input, isDigit, CODE, 'Expected major version');
  const entries: HeaderTagEntry[] = [[HeaderTagType.Major, major.value]];
  let rest = major.rest;
  if (rest[0] === DOT) {
    const minor = takeWhile1(rest.subarray(1), isDigit, CODE, 'Expected minor version');
    entries.push([HeaderTagType.Minor, minor.value]);
    rest = minor.rest;
  }
  return consumedValue(input, rest, HeaderValueType.Version, HeaderTags.from(entries));
}

/** CSeq: 1*DIGIT LWS Method */
export function takeCSeq(input: Buffer): ParseResult<HeaderValue> {
  const number = takeWhile1(input, isDigit, CODE, 'Expected CSeq number');
  const value = parseDigits(number.value.toString('latin1'));
  if (value === null || value > MAX_CSEQ_NUMBER) {
    fail(CODE, 'CSeq number out of range', input);
  }
  const afterSpace = skipWsp1(number.rest, CODE, 'Expected whitespace before CSeq method');
  const method = takeWhile1(afterSpace, isTokenChar, CODE, 'Expected CSeq method');
  const tags = HeaderTags.from([
    [HeaderTagType.Number, number.value],
    [HeaderTagType.Method, method.value],
  ]);
  return consumedValue(input, method.rest, HeaderValueType.CSeq, tags);
}

/** Timestamp: 1*DIGIT [ "." *DIGIT ] [ LWS delay ] */
export function takeTimestamp(input: Buffer): ParseResult<HeaderValue> {
  const time = takeDecimal(input);
  const entries: HeaderTagEntry[] = [[HeaderTagType.TimeVal, time.value]];
  let rest = time.rest;
  const afterSpace = skipWsp(rest);
  if (afterSpace.length < rest.length && isDigit(afterSpace[0])) {
    const delay = takeDecimal(afterSpace);
    entries.push([HeaderTagType.Delay, delay.value]);
    rest = delay.rest;
  }
  return consumedValue(input, rest, HeaderValueType.Timestamp, HeaderTags.from(entries));
}

/** Retry-After: delta-seconds [ comment ]; parameters are generic. */
export function takeRetryAfter(input: Buffer): ParseResult<HeaderValue> {
  const seconds = takeWhile1(input, isDigit, CODE, 'Expected delta-seconds');
  const entries: HeaderTagEntry[] = [[HeaderTagType.Seconds, seconds.value]];
  let rest = seconds.rest;
  const afterSpace = skipWsp(rest);
  if (afterSpace[0] === LPAREN) {
    const comment = takeComment(afterSpace, CODE);
    entries.push([HeaderTagType.Comment, comment.value]);
    rest = comment.rest;
  }
  return consumedValue(input, rest, HeaderValueType.RetryAfter, HeaderTags.from(entries));
}
