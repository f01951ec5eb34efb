import type { Buffer } from 'node:buffer';

import { isDigit, isTokenChar } from '../../bnf/char-class.js';
import { fail, skipWsp1, takeQuotedString, takeWhile1 } from '../../bnf/scanners.js';
import { SipParseErrorCode } from '../../errors.js';
import { COLON, LBRACKET, RBRACKET } from '../../specs.js';
import type { ParseResult } from '../../types.js';
import { HeaderTags } from '../header-tags.js';
import { HeaderTagType, HeaderValueType } from '../header-types.js';
import { consumedValue, type HeaderValue } from '../header-value.js';

const CODE = SipParseErrorCode.INVALID_HEADER_VALUE;
const WARN_CODE_LENGTH = 3;

// hostport or pseudonym
const isWarnAgentChar = (byte: number | undefined): boolean =>
  isTokenChar(byte) || byte === COLON || byte === LBRACKET || byte === RBRACKET;

/** warning-value = warn-code SP warn-agent SP warn-text */
export function takeWarning(input: Buffer): ParseResult<HeaderValue> {
  const code = takeWhile1(input, isDigit, CODE, 'Expected warn-code');
  if (code.value.length !== WARN_CODE_LENGTH) {
    fail(CODE, 'warn-code must be 3 digits', input);
  }
  const agent = takeWhile1(
    skipWsp1(code.rest, CODE, 'Expected whitespace after warn-code'),
    isWarnAgentChar,
    CODE,
    'Expected warn-agent',
  );
  const text = takeQuotedString(
    skipWsp1(agent.rest, CODE, 'Expected whitespace after warn-agent'),
    CODE,
  );
  const tags = HeaderTags.from([
    [HeaderTagType.WarnCode, code.value],
    [HeaderTagType.WarnAgent, agent.value],
    [HeaderTagType.WarnText, text.value],
  ]);
  return consumedValue(input, text.rest, HeaderValueType.Warning, tags);
}
