import type { Buffer } from 'node:buffer';

import { isTokenChar } from '../../bnf/char-class.js';
import { fail, skipWsp, skipWsp1, takeQuotedString, takeSwsToken, takeWhile1 } from '../../bnf/scanners.js';
import { SipParseErrorCode } from '../../errors.js';
import { COMMA, DQUOTE, EQUAL } from '../../specs.js';
import type { ParseResult } from '../../types.js';
import { type HeaderTagEntry, HeaderTags } from '../header-tags.js';
import { HeaderTagType, HeaderValueType } from '../header-types.js';
import { consumedValue, type HeaderValue } from '../header-value.js';

const CODE = SipParseErrorCode.INVALID_HEADER_VALUE;

const DIGEST_PARAM_TAGS: ReadonlyMap<string, HeaderTagType> = new Map([
  ['username', HeaderTagType.Username],
  ['realm', HeaderTagType.Realm],
  ['domain', HeaderTagType.Domain],
  ['nonce', HeaderTagType.Nonce],
  ['uri', HeaderTagType.DigestUri],
  ['response', HeaderTagType.Dresponse],
  ['algorithm', HeaderTagType.Algorithm],
  ['cnonce', HeaderTagType.Cnonce],
  ['opaque', HeaderTagType.Opaque],
  ['stale', HeaderTagType.Stale],
  ['qop', HeaderTagType.QopValue],
  ['nc', HeaderTagType.NonceCount],
]);

interface AuthParam {
  name: Buffer;
  value: Buffer;
}

/** auth-param = token EQUAL ( token / quoted-string ); quoted values are unquoted. */
function takeAuthParam(input: Buffer): ParseResult<AuthParam> {
  const name = takeWhile1(input, isTokenChar, CODE, 'Expected parameter name');
  const valueStart = takeSwsToken(name.rest, EQUAL, CODE);
  const value = valueStart[0] === DQUOTE
    ? takeQuotedString(valueStart, CODE)
    : takeWhile1(valueStart, isTokenChar, CODE, 'Expected parameter value');
  return { value: { name: name.value, value: value.value }, rest: value.rest };
}

/** True when `input` begins with `token SWS "="`, i.e. another auth-param. */
function startsAuthParam(input: Buffer): boolean {
  let index = 0;
  while (isTokenChar(input[index])) {
    index++;
  }
  return index > 0 && skipWsp(input.subarray(index))[0] === EQUAL;
}

/** Authentication-Info: one `ainfo` per occurrence, e.g. `nextnonce="47364c23432d2e131a5fb210812c"`. */
export function takeAuthenticationInfo(input: Buffer): ParseResult<HeaderValue> {
  const { value, rest } = takeAuthParam(input);
  const tags = HeaderTags.from([
    [HeaderTagType.AinfoType, value.name],
    [HeaderTagType.AinfoValue, value.value],
  ]);
  return consumedValue(input, rest, HeaderValueType.AuthenticationInfo, tags);
}

/**
 * credentials / challenge: auth-scheme LWS auth-param *(COMMA auth-param).
 * Commas between auth-params belong to the value; a comma followed by
 * anything else is left for the next header occurrence.
 */
export function takeCredentials(input: Buffer): ParseResult<HeaderValue> {
  const scheme = takeWhile1(input, isTokenChar, CODE, 'Expected auth scheme');
  const entries: HeaderTagEntry[] = [[HeaderTagType.AuthSchema, scheme.value]];
  const seen = new Set<string>();

  let rest = skipWsp1(scheme.rest, CODE, 'Expected whitespace after auth scheme');
  while (true) {
    const param = takeAuthParam(rest);
    const key = param.value.name.toString('latin1').toLowerCase();
    if (seen.has(key)) {
      fail(CODE, `Duplicate auth parameter ${key}`, rest);
    }
    seen.add(key);
    const tag = DIGEST_PARAM_TAGS.get(key);
    if (tag !== undefined) {
      entries.push([tag, param.value.value]);
    }
    rest = param.rest;

    const next = skipWsp(rest);
    if (next[0] !== COMMA) {
      break;
    }
    const afterComma = takeSwsToken(next, COMMA, CODE);
    if (!startsAuthParam(afterComma)) {
      break;
    }
    rest = afterComma;
  }

  return consumedValue(input, rest, HeaderValueType.AuthorizationDigest, HeaderTags.from(entries));
}
