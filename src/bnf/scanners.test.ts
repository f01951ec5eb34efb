import * as assert from 'node:assert';
import { Buffer } from 'node:buffer';
import { describe, it } from 'node:test';

import { SipParseErrorCode } from '../errors.js';
import { COLON, COMMA } from '../specs.js';
import { isDigit, isTokenChar } from './char-class.js';
import {
  previewBytes,
  skipWsp,
  takeComment,
  takeLine,
  takeQuotedString,
  takeSwsToken,
  takeWhile,
  takeWhile1,
} from './scanners.js';

const CODE = SipParseErrorCode.INVALID_HEADER_VALUE;

describe('takeWhile / takeWhile1', () => {
  it('should split at the first non-matching byte', () => {
    const { value, rest } = takeWhile(Buffer.from('123abc'), isDigit);
    assert.strictEqual(value.toString(), '123');
    assert.strictEqual(rest.toString(), 'abc');
  });

  it('should return an empty span when nothing matches', () => {
    const { value, rest } = takeWhile(Buffer.from('abc'), isDigit);
    assert.strictEqual(value.length, 0);
    assert.strictEqual(rest.toString(), 'abc');
  });

  it('should fail takeWhile1 on an empty match', () => {
    assert.throws(
      () => takeWhile1(Buffer.from(':x'), isTokenChar, CODE, 'Expected token'),
      { code: CODE, message: 'Expected token at ":x"' },
    );
  });

  it('should return views over the same memory', () => {
    const input = Buffer.from('Via: x');
    const { value } = takeWhile(input, isTokenChar);
    assert.strictEqual(value.buffer, input.buffer);
    assert.strictEqual(value.byteOffset, input.byteOffset);
  });
});

describe('skipWsp', () => {
  it('should skip spaces and tabs only', () => {
    assert.strictEqual(skipWsp(Buffer.from(' \t x')).toString(), 'x');
    assert.strictEqual(skipWsp(Buffer.from('\r\n')).toString(), '\r\n');
  });
});

describe('takeSwsToken', () => {
  it('should consume whitespace around the token', () => {
    assert.strictEqual(takeSwsToken(Buffer.from('  :  value'), COLON, CODE).toString(), 'value');
    assert.strictEqual(takeSwsToken(Buffer.from(',next'), COMMA, CODE).toString(), 'next');
  });

  it('should fail when the token is missing', () => {
    assert.throws(
      () => takeSwsToken(Buffer.from(' value'), COLON, SipParseErrorCode.INVALID_HEADER_NAME),
      { code: SipParseErrorCode.INVALID_HEADER_NAME, message: 'Expected ":" at "value"' },
    );
  });
});

describe('takeQuotedString', () => {
  it('should return the inner span', () => {
    const { value, rest } = takeQuotedString(Buffer.from(' "Alice Smith" <sip:a@b>'), CODE);
    assert.strictEqual(value.toString(), 'Alice Smith');
    assert.strictEqual(rest.toString(), ' <sip:a@b>');
  });

  it('should keep quoted pairs escaped', () => {
    const { value } = takeQuotedString(Buffer.from('"a \\"b\\" c"'), CODE);
    assert.strictEqual(value.toString(), 'a \\"b\\" c');
  });

  it('should fail on an unterminated string', () => {
    assert.throws(
      () => takeQuotedString(Buffer.from('"abc\r\n'), CODE),
      { code: CODE, message: 'Unterminated quoted string at "\\"abc\\r\\n"' },
    );
  });
});

describe('takeComment', () => {
  it('should handle nested comments', () => {
    const { value, rest } = takeComment(Buffer.from('(in (a) meeting);x'), CODE);
    assert.strictEqual(value.toString(), 'in (a) meeting');
    assert.strictEqual(rest.toString(), ';x');
  });

  it('should fail on an unterminated comment', () => {
    assert.throws(() => takeComment(Buffer.from('(abc\r\n'), CODE), { code: CODE });
  });
});

describe('takeLine', () => {
  it('should stop at CRLF and leave trailing whitespace in rest', () => {
    const { value, rest } = takeLine(Buffer.from('free, text  \r\nNext'));
    assert.strictEqual(value.toString(), 'free, text');
    assert.strictEqual(rest.toString(), '  \r\nNext');
  });

  it('should take everything when there is no terminator', () => {
    const { value, rest } = takeLine(Buffer.from('abc'));
    assert.strictEqual(value.toString(), 'abc');
    assert.strictEqual(rest.length, 0);
  });
});

describe('previewBytes', () => {
  it('should truncate long input', () => {
    assert.strictEqual(previewBytes(Buffer.from('abcdef'), 3), '"abc..."');
  });
});
