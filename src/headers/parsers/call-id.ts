import type { Buffer } from 'node:buffer';

import { isWordChar } from '../../bnf/char-class.js';
import { takeWhile1 } from '../../bnf/scanners.js';
import { SipParseErrorCode } from '../../errors.js';
import { AT } from '../../specs.js';
import type { ParseResult } from '../../types.js';
import { type HeaderTagEntry, HeaderTags } from '../header-tags.js';
import { HeaderTagType, HeaderValueType } from '../header-types.js';
import { consumedValue, type HeaderValue } from '../header-value.js';

const CODE = SipParseErrorCode.INVALID_HEADER_VALUE;

/** callid = word [ "@" word ] */
export function takeCallId(input: Buffer): ParseResult<HeaderValue> {
  const id = takeWhile1(input, isWordChar, CODE, 'Expected Call-ID');
  const entries: HeaderTagEntry[] = [[HeaderTagType.ID, id.value]];
  let rest = id.rest;
  if (rest[0] === AT) {
    const host = takeWhile1(rest.subarray(1), isWordChar, CODE, 'Expected Call-ID host');
    entries.push([HeaderTagType.Host, host.value]);
    rest = host.rest;
  }
  return consumedValue(input, rest, HeaderValueType.CallID, HeaderTags.from(entries));
}
