import type { Buffer } from 'node:buffer';

import { isLineTerminatorStart, isTokenChar, isWsp } from '../../bnf/char-class.js';
import { expectByte, fail, skipWsp, takeQuotedString, takeWhile } from '../../bnf/scanners.js';
import { SipParseErrorCode } from '../../errors.js';
import { COMMA, DQUOTE, LAQUOT, RAQUOT, SEMI, STAR } from '../../specs.js';
import type { ParseResult } from '../../types.js';
import { type HeaderTagEntry, HeaderTags } from '../header-tags.js';
import { HeaderTagType, HeaderValueType } from '../header-types.js';
import { consumedValue, type HeaderValue } from '../header-value.js';
import { isSipScheme, parseSipUri, type SipUri, takeScheme } from '../sip-uri.js';

const CODE = SipParseErrorCode.INVALID_HEADER_VALUE;

interface ClassifiedUri {
  sipUri?: SipUri;
  absoluteUri?: Buffer;
}

/** `<` URI `>`; the value is the span between the brackets. */
function takeBracketedUri(input: Buffer): ParseResult<Buffer> {
  const body = expectByte(input, LAQUOT, CODE, 'Expected "<"');
  const end = body.indexOf(RAQUOT);
  if (end === -1 || body.subarray(0, end).some(isLineTerminatorStart)) {
    fail(CODE, 'Missing ">"', input);
  }
  if (end === 0) {
    fail(CODE, 'Empty URI', input);
  }
  return { value: body.subarray(0, end), rest: body.subarray(end + 1) };
}

function classifyUri(uri: Buffer): ClassifiedUri {
  const scheme = takeScheme(uri);
  if (scheme === null) {
    return fail(CODE, 'Expected URI scheme', uri);
  }
  if (isSipScheme(scheme)) {
    return { sipUri: parseSipUri(uri) };
  }
  if (uri.length === scheme.length + 1) {
    fail(CODE, 'Empty URI after scheme', uri);
  }
  return { absoluteUri: uri };
}

const isAddrSpecChar = (byte: number | undefined): boolean =>
  byte !== undefined && byte !== SEMI && byte !== COMMA && !isWsp(byte) && !isLineTerminatorStart(byte);

function isStar(input: Buffer): boolean {
  if (input[0] !== STAR) {
    return false;
  }
  const next = skipWsp(input.subarray(1))[0];
  return !isTokenChar(next) && next !== LAQUOT && next !== DQUOTE;
}

/**
 * Contact, From, To, Route-like values:
 * `*` / name-addr ( [ display-name ] `<` URI `>` ) / addr-spec.
 */
export function takeNameAddr(input: Buffer): ParseResult<HeaderValue> {
  if (isStar(input)) {
    const tags = HeaderTags.from([[HeaderTagType.Star, input.subarray(0, 1)]]);
    return consumedValue(input, input.subarray(1), HeaderValueType.NameAddr, tags);
  }

  const entries: HeaderTagEntry[] = [];
  let uriSpan: Buffer;
  let rest: Buffer;

  if (input[0] !== DQUOTE && input[0] !== LAQUOT && takeScheme(input) !== null) {
    const addrSpec = takeWhile(input, isAddrSpecChar);
    uriSpan = addrSpec.value;
    rest = addrSpec.rest;
  } else {
    let bracketStart = input;
    if (input[0] === DQUOTE) {
      const displayName = takeQuotedString(input, CODE);
      entries.push([HeaderTagType.DisplayName, displayName.value]);
      bracketStart = skipWsp(displayName.rest);
    } else if (input[0] !== LAQUOT) {
      const tokens = takeWhile(input, (byte) => isTokenChar(byte) || isWsp(byte));
      let nameEnd = tokens.value.length;
      while (nameEnd > 0 && isWsp(tokens.value[nameEnd - 1])) {
        nameEnd--;
      }
      if (nameEnd === 0) {
        fail(CODE, 'Expected name-addr or addr-spec', input);
      }
      entries.push([HeaderTagType.DisplayName, input.subarray(0, nameEnd)]);
      bracketStart = tokens.rest;
    }
    const bracketed = takeBracketedUri(bracketStart);
    uriSpan = bracketed.value;
    rest = bracketed.rest;
  }

  const { sipUri, absoluteUri } = classifyUri(uriSpan);
  if (absoluteUri !== undefined) {
    entries.push([HeaderTagType.AbsoluteURI, absoluteUri]);
  }
  const tags = entries.length === 0 ? undefined : HeaderTags.from(entries);
  return consumedValue(input, rest, HeaderValueType.NameAddr, tags, sipUri);
}

/** Call-Info: `<` absoluteURI `>` */
export function takeCallInfo(input: Buffer): ParseResult<HeaderValue> {
  const { value, rest } = takeBracketedUri(input);
  classifyUri(value);
  const tags = HeaderTags.from([[HeaderTagType.PureValue, value]]);
  return consumedValue(input, rest, HeaderValueType.CallInfo, tags);
}

/** Alert-Info, Error-Info, Identity-Info: `<` absoluteURI `>` */
export function takeAbsoluteUriValue(input: Buffer): ParseResult<HeaderValue> {
  const { value, rest } = takeBracketedUri(input);
  const { sipUri } = classifyUri(value);
  const tags = HeaderTags.from([[HeaderTagType.AbsoluteURI, value]]);
  return consumedValue(input, rest, HeaderValueType.AbsoluteURI, tags, sipUri);
}
