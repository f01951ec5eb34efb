import type { Buffer } from 'node:buffer';

import { isAlpha, isDigit, isHostChar, isIpv6Char, isSchemeChar } from '../bnf/char-class.js';
import { fail, takeWhile, takeWhile1 } from '../bnf/scanners.js';
import { SipParseErrorCode } from '../errors.js';
import { AT, COLON, EQUAL, LBRACKET, QUESTION, RBRACKET, SEMI } from '../specs.js';
import { isValidPort, parseDigits } from '../utils/number.js';
import { type GenericParam, GenericParams } from './generic-params.js';

export type SipScheme = 'sip' | 'sips';

/** Parsed `sip:` / `sips:` URI. Every span is a view into the parsed buffer. */
export interface SipUri {
  raw: Buffer;
  scheme: SipScheme;
  user?: Buffer;
  password?: Buffer;
  host: Buffer;
  port?: number;
  params: GenericParams;
  headers?: Buffer;
}

function uriError(message: string, input: Buffer): never {
  return fail(SipParseErrorCode.INVALID_HEADER_VALUE, `Invalid SIP URI: ${message}`, input);
}

/**
 * Returns the scheme span when `input` starts with `scheme ":"`
 * (ALPHA *( ALPHA / DIGIT / "+" / "-" / "." )), otherwise `null`.
 */
export function takeScheme(input: Buffer): Buffer | null {
  if (!isAlpha(input[0])) {
    return null;
  }
  const { value, rest } = takeWhile(input, isSchemeChar);
  return rest[0] === COLON ? value : null;
}

export function isSipScheme(scheme: Buffer): boolean {
  const name = scheme.toString('latin1').toLowerCase();
  return name === 'sip' || name === 'sips';
}

function splitUserinfo(userinfo: Buffer): { user: Buffer; password?: Buffer } {
  const colon = userinfo.indexOf(COLON);
  const user = colon === -1 ? userinfo : userinfo.subarray(0, colon);
  if (user.length === 0) {
    uriError('empty user', userinfo);
  }
  return colon === -1 ? { user } : { user, password: userinfo.subarray(colon + 1) };
}

export function takeHost(input: Buffer): { host: Buffer; rest: Buffer } {
  if (input[0] === LBRACKET) {
    const inner = takeWhile(input.subarray(1), isIpv6Char);
    if (inner.value.length === 0 || inner.rest[0] !== RBRACKET) {
      uriError('bad IPv6 reference', input);
    }
    const end = inner.value.length + 2;
    return { host: input.subarray(0, end), rest: input.subarray(end) };
  }
  const { value, rest } = takeWhile1(input, isHostChar, SipParseErrorCode.INVALID_HEADER_VALUE, 'Invalid SIP URI: expected host');
  return { host: value, rest };
}

function splitUriParams(input: Buffer): GenericParams {
  const params: GenericParam[] = [];
  let offset = 0;
  while (offset < input.length) {
    // input[offset] is ';'
    let end = input.indexOf(SEMI, offset + 1);
    if (end === -1) {
      end = input.length;
    }
    const segment = input.subarray(offset + 1, end);
    const eq = segment.indexOf(EQUAL);
    const name = eq === -1 ? segment : segment.subarray(0, eq);
    if (name.length === 0) {
      uriError('empty parameter name', segment);
    }
    params.push(eq === -1
      ? { name, quoted: false }
      : { name, value: segment.subarray(eq + 1), quoted: false });
    offset = end;
  }
  return new GenericParams(params, input);
}

/** Parses an already isolated URI span such as `sip:alice@atlanta.com;transport=tcp`. */
export function parseSipUri(bytes: Buffer): SipUri {
  const scheme = takeScheme(bytes);
  if (scheme === null || !isSipScheme(scheme)) {
    return uriError('expected sip or sips scheme', bytes);
  }

  const afterScheme = bytes.subarray(scheme.length + 1);
  const at = afterScheme.indexOf(AT);
  const userinfo = at === -1 ? undefined : splitUserinfo(afterScheme.subarray(0, at));
  const hostPart = at === -1 ? afterScheme : afterScheme.subarray(at + 1);

  const { host, rest: afterHost } = takeHost(hostPart);
  let rest = afterHost;

  let port: number | undefined;
  if (rest[0] === COLON) {
    const digits = takeWhile(rest.subarray(1), isDigit);
    const portText = digits.value.toString('latin1');
    if (!isValidPort(portText)) {
      uriError('bad port', rest);
    }
    port = parseDigits(portText) ?? undefined;
    rest = digits.rest;
  }

  const question = rest.indexOf(QUESTION);
  const paramsPart = question === -1 ? rest : rest.subarray(0, question);
  if (paramsPart.length > 0 && paramsPart[0] !== SEMI) {
    uriError('unexpected characters after host', paramsPart);
  }

  const uri: SipUri = {
    raw: bytes,
    scheme: scheme.toString('latin1').toLowerCase() === 'sips' ? 'sips' : 'sip',
    host,
    params: splitUriParams(paramsPart),
  };
  if (userinfo !== undefined) {
    uri.user = userinfo.user;
    if (userinfo.password !== undefined) {
      uri.password = userinfo.password;
    }
  }
  if (port !== undefined) {
    uri.port = port;
  }
  if (question !== -1) {
    uri.headers = rest.subarray(question + 1);
  }
  return uri;
}
