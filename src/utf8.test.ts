import * as assert from 'node:assert';
import { Buffer } from 'node:buffer';
import { describe, it } from 'node:test';

import { SipParseError, SipParseErrorCode } from './errors.js';
import { decodeUtf8 } from './utf8.js';

describe('decodeUtf8', () => {
  it('should decode ascii and multi-byte text', () => {
    assert.strictEqual(decodeUtf8(Buffer.from('Alice')), 'Alice');
    assert.strictEqual(decodeUtf8(Buffer.from('Привет мир')), 'Привет мир');
  });

  it('should decode an empty span', () => {
    assert.strictEqual(decodeUtf8(Buffer.alloc(0)), '');
  });

  it('should keep a leading byte order mark', () => {
    assert.strictEqual(decodeUtf8(Buffer.from([0xef, 0xbb, 0xbf, 0x61])), '\ufeffa');
  });

  it('should reject malformed sequences instead of replacing them', () => {
    assert.throws(
      () => decodeUtf8(Buffer.from([0x61, 0xff, 0xfe])),
      (error: unknown) => error instanceof SipParseError && error.code === SipParseErrorCode.INVALID_UTF8,
    );
  });

  it('should reject a truncated multi-byte sequence', () => {
    assert.throws(
      () => decodeUtf8(Buffer.from([0xd0])),
      { code: SipParseErrorCode.INVALID_UTF8 },
    );
  });
});
