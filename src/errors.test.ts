import * as assert from 'node:assert';
import { describe, it } from 'node:test';

import { isSipParseError, SipParseError, SipParseErrorCode } from './errors.js';

describe('SipParseError', () => {
  it('should use the default message of its code', () => {
    const error = new SipParseError({ code: SipParseErrorCode.EMPTY_INPUT });

    assert.strictEqual(error.message, 'Header input is empty');
    assert.strictEqual(error.code, 'ERR_SIP_EMPTY_INPUT');
    assert.strictEqual(error.name, 'SipParseError');
    assert.ok(error instanceof Error);
  });

  it('should keep a custom message', () => {
    const error = new SipParseError({
      code: SipParseErrorCode.INVALID_HEADER_NAME,
      message: 'Header name is empty',
    });

    assert.strictEqual(error.message, 'Header name is empty');
    assert.strictEqual(error.code, SipParseErrorCode.INVALID_HEADER_NAME);
  });

  it('should carry the cause', () => {
    const cause = new TypeError('The encoded data was not valid for encoding utf-8');
    const error = new SipParseError({ code: SipParseErrorCode.INVALID_UTF8, cause });

    assert.strictEqual(error.cause, cause);
  });

  it('should have a stack trace', () => {
    const error = new SipParseError({ code: SipParseErrorCode.INVALID_PARAMETERS });

    assert.ok(error.stack?.includes('SipParseError'));
  });
});

describe('isSipParseError', () => {
  it('should narrow by class and optional code', () => {
    const error = new SipParseError({ code: SipParseErrorCode.INVALID_VALUE_TERMINATOR });

    assert.strictEqual(isSipParseError(error), true);
    assert.strictEqual(isSipParseError(error, SipParseErrorCode.INVALID_VALUE_TERMINATOR), true);
    assert.strictEqual(isSipParseError(error, SipParseErrorCode.EMPTY_INPUT), false);
    assert.strictEqual(isSipParseError(new Error('x')), false);
  });
});
