import * as assert from 'node:assert';
import { Buffer } from 'node:buffer';
import { describe, it } from 'node:test';

import { SipParseErrorCode } from '../../errors.js';
import { HeaderTagType, HeaderValueType } from '../header-types.js';
import { takeCallId } from './call-id.js';

describe('takeCallId', () => {
  it('should tag id and host', () => {
    const { value, rest } = takeCallId(Buffer.from('a84b4c76e66710@pc33.atlanta.com\r\n'));

    assert.strictEqual(value.vstr, 'a84b4c76e66710@pc33.atlanta.com');
    assert.strictEqual(value.vtype, HeaderValueType.CallID);
    assert.deepStrictEqual(value.tags?.toJSON(), { ID: 'a84b4c76e66710', Host: 'pc33.atlanta.com' });
    assert.strictEqual(rest.toString(), '\r\n');
  });

  it('should accept an id without host and word punctuation', () => {
    const { value } = takeCallId(Buffer.from('f81d4fae-7dec-11d0-a765-00a0c91e6bf6{x}[y]\r\n'));

    assert.strictEqual(value.tags?.getString(HeaderTagType.ID), 'f81d4fae-7dec-11d0-a765-00a0c91e6bf6{x}[y]');
    assert.strictEqual(value.tags?.has(HeaderTagType.Host), false);
  });

  it('should stop at a comma for In-Reply-To lists', () => {
    const { value, rest } = takeCallId(Buffer.from('70710@saturn.bell-tel.com, 17320@saturn.bell-tel.com\r\n'));

    assert.strictEqual(value.vstr, '70710@saturn.bell-tel.com');
    assert.strictEqual(rest.toString(), ', 17320@saturn.bell-tel.com\r\n');
  });

  it('should reject an empty host', () => {
    assert.throws(
      () => takeCallId(Buffer.from('abc@\r\n')),
      { code: SipParseErrorCode.INVALID_HEADER_VALUE },
    );
  });
});
