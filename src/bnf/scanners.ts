import type { Buffer } from 'node:buffer';

import { SipParseError, type SipParseErrorCode } from '../errors.js';
import { BACKSLASH, CR, DQUOTE, LF, LPAREN, RPAREN } from '../specs.js';
import type { ParseResult } from '../types.js';
import { isWsp } from './char-class.js';

const ERROR_PREVIEW_LENGTH = 32;

export function previewBytes(input: Buffer, maxLength: number = ERROR_PREVIEW_LENGTH): string {
  const text = input.subarray(0, maxLength).toString('latin1');
  return JSON.stringify(input.length > maxLength ? `${text}...` : text);
}

export function fail(code: SipParseErrorCode, message: string, input?: Buffer): never {
  throw new SipParseError({
    code,
    message: input === undefined ? message : `${message} at ${previewBytes(input)}`,
  });
}

function scan(input: Buffer, predicate: (byte: number | undefined) => boolean): number {
  let index = 0;
  while (index < input.length && predicate(input[index])) {
    index++;
  }
  return index;
}

export function takeWhile(
  input: Buffer,
  predicate: (byte: number | undefined) => boolean,
): ParseResult<Buffer> {
  const index = scan(input, predicate);
  return { value: input.subarray(0, index), rest: input.subarray(index) };
}

export function takeWhile1(
  input: Buffer,
  predicate: (byte: number | undefined) => boolean,
  code: SipParseErrorCode,
  message: string,
): ParseResult<Buffer> {
  const result = takeWhile(input, predicate);
  if (result.value.length === 0) {
    fail(code, message, input);
  }
  return result;
}

export function skipWsp(input: Buffer): Buffer {
  return input.subarray(scan(input, isWsp));
}

/** Requires at least one WSP byte. */
export function skipWsp1(input: Buffer, code: SipParseErrorCode, message: string): Buffer {
  const index = scan(input, isWsp);
  if (index === 0) {
    fail(code, message, input);
  }
  return input.subarray(index);
}

export function expectByte(
  input: Buffer,
  byte: number,
  code: SipParseErrorCode,
  message: string,
): Buffer {
  if (input[0] !== byte) {
    fail(code, message, input);
  }
  return input.subarray(1);
}

/**
 * SWS token SWS around a single punctuation byte (HCOLON, COMMA, SEMI,
 * EQUAL, SLASH, ...). Line folding is not recognised here.
 */
export function takeSwsToken(input: Buffer, token: number, code: SipParseErrorCode): Buffer {
  const afterLeading = skipWsp(input);
  const rest = expectByte(
    afterLeading,
    token,
    code,
    `Expected ${JSON.stringify(String.fromCharCode(token))}`,
  );
  return skipWsp(rest);
}

/**
 * quoted-string with optional leading whitespace. The value is the span
 * between the quotes; quoted-pairs stay escaped.
 */
export function takeQuotedString(input: Buffer, code: SipParseErrorCode): ParseResult<Buffer> {
  const start = skipWsp(input);
  const body = expectByte(start, DQUOTE, code, 'Expected quoted string');
  let index = 0;
  while (index < body.length) {
    const byte = body[index];
    if (byte === DQUOTE) {
      return { value: body.subarray(0, index), rest: body.subarray(index + 1) };
    }
    if (byte === CR || byte === LF) {
      break;
    }
    if (byte === BACKSLASH) {
      const escaped = body[index + 1];
      if (escaped === undefined || escaped === CR || escaped === LF || escaped > 0x7f) {
        break;
      }
      index += 2;
      continue;
    }
    index++;
  }
  return fail(code, 'Unterminated quoted string', start);
}

/** comment = LPAREN *(ctext / quoted-pair / comment) RPAREN; value excludes the outer parentheses. */
export function takeComment(input: Buffer, code: SipParseErrorCode): ParseResult<Buffer> {
  const body = expectByte(input, LPAREN, code, 'Expected comment');
  let depth = 1;
  let index = 0;
  while (index < body.length) {
    const byte = body[index];
    if (byte === CR || byte === LF) {
      break;
    }
    if (byte === BACKSLASH) {
      index += 2;
      continue;
    }
    if (byte === LPAREN) {
      depth++;
    } else if (byte === RPAREN) {
      depth--;
      if (depth === 0) {
        return { value: body.subarray(0, index), rest: body.subarray(index + 1) };
      }
    }
    index++;
  }
  return fail(code, 'Unterminated comment', input);
}

/**
 * Everything up to the line terminator (or the end of input), excluding
 * trailing whitespace, which is left in `rest`.
 */
export function takeLine(input: Buffer): ParseResult<Buffer> {
  let end = 0;
  while (end < input.length && input[end] !== CR && input[end] !== LF) {
    end++;
  }
  let valueEnd = end;
  while (valueEnd > 0 && isWsp(input[valueEnd - 1])) {
    valueEnd--;
  }
  return { value: input.subarray(0, valueEnd), rest: input.subarray(valueEnd) };
}
