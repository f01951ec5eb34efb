import type { Buffer } from 'node:buffer';

import { isCrlf } from '../bnf/char-class.js';
import { fail } from '../bnf/scanners.js';
import { SipParseErrorCode } from '../errors.js';
import { CRLF } from '../specs.js';
import type { HeaderParseOptions, ParseResult } from '../types.js';
import { type Header, type HeaderGroup, headerNameEquals, parseHeader } from './header.js';
import { findRFCHeader } from './rfc-header.js';

/**
 * Parses header lines up to and including the empty line that ends the
 * header section. `rest` is the message body.
 */
export function parseHeaderBlock(input: Buffer, options: HeaderParseOptions = {}): ParseResult<SipHeaders> {
  const groups: HeaderGroup[] = [];
  let rest = input;

  while (!isCrlf(rest)) {
    if (rest.length === 0) {
      fail(SipParseErrorCode.EMPTY_INPUT, 'Header block is not terminated');
    }
    const parsed = parseHeader(rest, options);
    if (!isCrlf(parsed.rest)) {
      fail(SipParseErrorCode.INVALID_VALUE_TERMINATOR, 'Expected CRLF after header', parsed.rest);
    }
    groups.push(parsed.value);
    rest = parsed.rest.subarray(CRLF.length);
  }

  return { value: new SipHeaders(groups), rest: rest.subarray(CRLF.length) };
}

function matches(group: HeaderGroup, name: string): boolean {
  const rfcHeader = findRFCHeader(name);
  return rfcHeader === null
    ? group.rfcHeader === null && headerNameEquals(group.name, name)
    : group.rfcHeader === rfcHeader;
}

/**
 * Header groups in message order. Lookups accept any spelling of a name,
 * compact forms included, and return occurrences across repeated lines.
 */
export class SipHeaders implements Iterable<HeaderGroup> {
  readonly groups: readonly HeaderGroup[];

  constructor(groups: readonly HeaderGroup[]) {
    this.groups = groups;
  }

  get size(): number {
    return this.groups.length;
  }

  get(name: string): Header[] {
    return this.groups
      .filter((group) => matches(group, name))
      .flatMap((group) => group.headers);
  }

  first(name: string): Header | undefined {
    return this.get(name)[0];
  }

  has(name: string): boolean {
    return this.groups.some((group) => matches(group, name));
  }

  /** Distinct names in first-seen order; registered headers use their full name. */
  names(): string[] {
    const names: string[] = [];
    for (const group of this.groups) {
      const name = group.rfcHeader ?? group.name;
      if (!names.some((seen) => headerNameEquals(seen, name))) {
        names.push(name);
      }
    }
    return names;
  }

  [Symbol.iterator](): IterableIterator<HeaderGroup> {
    return this.groups[Symbol.iterator]();
  }
}
