import type { Buffer } from 'node:buffer';

import type { ParseResult } from '../types.js';
import { decodeUtf8 } from '../utf8.js';
import type { HeaderTags } from './header-tags.js';
import { HeaderValueType } from './header-types.js';
import type { SipUri } from './sip-uri.js';

/**
 * One parsed value occurrence. `raw` is the exact span the value grammar
 * consumed (parameters excluded) and `vstr` is its strict UTF-8 decoding.
 */
export interface HeaderValue {
  readonly vstr: string;
  readonly vtype: HeaderValueType;
  readonly raw: Buffer;
  readonly tags?: HeaderTags;
  readonly sipUri?: SipUri;
}

export type HeaderValueParser = (input: Buffer) => ParseResult<HeaderValue>;

export function createHeaderValue(
  raw: Buffer,
  vtype: HeaderValueType,
  tags?: HeaderTags,
  sipUri?: SipUri,
): HeaderValue {
  const vstr = decodeUtf8(raw);
  return {
    vstr,
    vtype,
    raw,
    ...(tags === undefined ? {} : { tags }),
    ...(sipUri === undefined ? {} : { sipUri }),
  };
}

/** Value of a header written as `Name:` CRLF. `at` positions the empty span. */
export function createEmptyHeaderValue(at: Buffer): HeaderValue {
  return {
    vstr: '',
    vtype: HeaderValueType.EmptyValue,
    raw: at.subarray(0, 0),
  };
}

/** Builds the value from the bytes between `input` and `rest`. */
export function consumedValue(
  input: Buffer,
  rest: Buffer,
  vtype: HeaderValueType,
  tags?: HeaderTags,
  sipUri?: SipUri,
): ParseResult<HeaderValue> {
  const raw = input.subarray(0, input.length - rest.length);
  return { value: createHeaderValue(raw, vtype, tags, sipUri), rest };
}
