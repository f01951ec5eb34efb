import type { Buffer } from 'node:buffer';

import { isDigit, isTokenChar } from '../../bnf/char-class.js';
import { fail, skipWsp1, takeSwsToken, takeWhile, takeWhile1 } from '../../bnf/scanners.js';
import { SipParseErrorCode } from '../../errors.js';
import { COLON, SLASH } from '../../specs.js';
import type { ParseResult } from '../../types.js';
import { isValidPort } from '../../utils/number.js';
import { type HeaderTagEntry, HeaderTags } from '../header-tags.js';
import { HeaderTagType, HeaderValueType } from '../header-types.js';
import { consumedValue, type HeaderValue } from '../header-value.js';
import { takeHost } from '../sip-uri.js';

const CODE = SipParseErrorCode.INVALID_HEADER_VALUE;

/**
 * via-parm without its parameters:
 * protocol-name SLASH protocol-version SLASH transport LWS sent-by
 */
export function takeVia(input: Buffer): ParseResult<HeaderValue> {
  const name = takeWhile1(input, isTokenChar, CODE, 'Expected protocol name');
  const version = takeWhile1(
    takeSwsToken(name.rest, SLASH, CODE),
    isTokenChar,
    CODE,
    'Expected protocol version',
  );
  const transport = takeWhile1(
    takeSwsToken(version.rest, SLASH, CODE),
    isTokenChar,
    CODE,
    'Expected transport',
  );

  const sentBy = skipWsp1(transport.rest, CODE, 'Expected whitespace before sent-by');
  const { host, rest: afterHost } = takeHost(sentBy);
  const entries: HeaderTagEntry[] = [
    [HeaderTagType.ProtocolName, name.value],
    [HeaderTagType.ProtocolVersion, version.value],
    [HeaderTagType.ProtocolTransport, transport.value],
    [HeaderTagType.Host, host],
  ];

  let rest = afterHost;
  if (rest[0] === COLON) {
    const port = takeWhile(rest.subarray(1), isDigit);
    if (!isValidPort(port.value.toString('latin1'))) {
      fail(CODE, 'Invalid Via port', rest);
    }
    entries.push([HeaderTagType.Port, port.value]);
    rest = port.rest;
  }

  return consumedValue(input, rest, HeaderValueType.Via, HeaderTags.from(entries));
}
