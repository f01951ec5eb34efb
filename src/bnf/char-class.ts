import type { Buffer } from 'node:buffer';

import { CR, HTAB, LF, SP } from '../specs.js';

type Byte = number | undefined;

function buildTable(ranges: Array<[from: string, to: string]>, extra: string): Uint8Array {
  const table = new Uint8Array(256);
  for (const [from, to] of ranges) {
    for (let code = from.charCodeAt(0); code <= to.charCodeAt(0); code++) {
      table[code] = 1;
    }
  }
  for (const char of extra) {
    table[char.charCodeAt(0)] = 1;
  }
  return table;
}

const ALPHANUM_RANGES: Array<[string, string]> = [['a', 'z'], ['A', 'Z'], ['0', '9']];

const TOKEN_TABLE = buildTable(ALPHANUM_RANGES, '-.!%*_+`\'~');
const WORD_TABLE = buildTable(ALPHANUM_RANGES, '-.!%*_+`\'~()<>:\\"/[]?{}');
const HOST_TABLE = buildTable(ALPHANUM_RANGES, '-.');
const IPV6_TABLE = buildTable([['a', 'f'], ['A', 'F'], ['0', '9']], ':.');
const GEN_VALUE_TABLE = buildTable(ALPHANUM_RANGES, '-.!%*_+`\'~[]:');
const SCHEME_TABLE = buildTable(ALPHANUM_RANGES, '+-.');

const lookup = (table: Uint8Array, byte: Byte): boolean => byte !== undefined && table[byte] === 1;

export const isTokenChar = (byte: Byte): boolean => lookup(TOKEN_TABLE, byte);

/** Characters of a Call-ID `word`. */
export const isWordChar = (byte: Byte): boolean => lookup(WORD_TABLE, byte);

/** hostname and IPv4address characters. */
export const isHostChar = (byte: Byte): boolean => lookup(HOST_TABLE, byte);

export const isIpv6Char = (byte: Byte): boolean => lookup(IPV6_TABLE, byte);

/** Unquoted `gen-value`: token or host, including IPv6 references. */
export const isGenValueChar = (byte: Byte): boolean => lookup(GEN_VALUE_TABLE, byte);

export const isSchemeChar = (byte: Byte): boolean => lookup(SCHEME_TABLE, byte);

export const isWsp = (byte: Byte): boolean => byte === SP || byte === HTAB;

export const isDigit = (byte: Byte): boolean => byte !== undefined && byte >= 0x30 && byte <= 0x39;

export const isAlpha = (byte: Byte): boolean =>
  byte !== undefined && ((byte >= 0x41 && byte <= 0x5a) || (byte >= 0x61 && byte <= 0x7a));

export function isCrlf(input: Buffer): boolean {
  return input.length >= 2 && input[0] === CR && input[1] === LF;
}

/** True when the byte can only begin a line terminator. */
export const isLineTerminatorStart = (byte: Byte): boolean => byte === CR || byte === LF;
