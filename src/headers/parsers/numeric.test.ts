import * as assert from 'node:assert';
import { Buffer } from 'node:buffer';
import { describe, it } from 'node:test';

import { SipParseErrorCode } from '../../errors.js';
import { HeaderTagType, HeaderValueType } from '../header-types.js';
import { takeCSeq, takeRetryAfter, takeTimestamp, takeVersion } from './numeric.js';

const INVALID = { code: SipParseErrorCode.INVALID_HEADER_VALUE };

describe('takeCSeq', () => {
  it('should tag number and method', () => {
    const { value, rest } = takeCSeq(Buffer.from('314159 INVITE\r\n'));

    assert.strictEqual(value.vstr, '314159 INVITE');
    assert.strictEqual(value.vtype, HeaderValueType.CSeq);
    assert.deepStrictEqual(value.tags?.toJSON(), { Number: '314159', Method: 'INVITE' });
    assert.strictEqual(rest.toString(), '\r\n');
  });

  it('should reject a missing method or separator', () => {
    assert.throws(() => takeCSeq(Buffer.from('1\r\n')), INVALID);
    assert.throws(() => takeCSeq(Buffer.from('1INVITE\r\n')), INVALID);
    assert.throws(() => takeCSeq(Buffer.from('INVITE 1\r\n')), INVALID);
  });

  it('should accept leading zeros in the number', () => {
    const { value } = takeCSeq(Buffer.from('0001 INVITE\r\n'));

    assert.strictEqual(value.vstr, '0001 INVITE');
    assert.deepStrictEqual(value.tags?.toJSON(), { Number: '0001', Method: 'INVITE' });
    assert.throws(() => takeCSeq(Buffer.from('02147483648 ACK\r\n')), INVALID);
  });

  it('should reject numbers of 2**31 and above', () => {
    assert.throws(() => takeCSeq(Buffer.from('2147483648 ACK\r\n')), INVALID);
    assert.strictEqual(
      takeCSeq(Buffer.from('2147483647 ACK\r\n')).value.tags?.getString(HeaderTagType.Number),
      '2147483647',
    );
  });
});

describe('takeVersion', () => {
  it('should tag major and minor', () => {
    const { value } = takeVersion(Buffer.from('1.0\r\n'));
    assert.strictEqual(value.vtype, HeaderValueType.Version);
    assert.deepStrictEqual(value.tags?.toJSON(), { Major: '1', Minor: '0' });
  });

  it('should allow a missing minor', () => {
    const { value } = takeVersion(Buffer.from('2\r\n'));
    assert.deepStrictEqual(value.tags?.keys(), [HeaderTagType.Major]);
  });

  it('should reject a dangling dot', () => {
    assert.throws(() => takeVersion(Buffer.from('1.\r\n')), INVALID);
  });
});

describe('takeTimestamp', () => {
  it('should tag time and delay', () => {
    const { value, rest } = takeTimestamp(Buffer.from('54.21 0.5\r\n'));

    assert.strictEqual(value.vstr, '54.21 0.5');
    assert.strictEqual(value.vtype, HeaderValueType.Timestamp);
    assert.deepStrictEqual(value.tags?.toJSON(), { TimeVal: '54.21', Delay: '0.5' });
    assert.strictEqual(rest.toString(), '\r\n');
  });

  it('should leave trailing whitespace when there is no delay', () => {
    const { value, rest } = takeTimestamp(Buffer.from('54. \r\n'));

    assert.strictEqual(value.vstr, '54.');
    assert.deepStrictEqual(value.tags?.keys(), [HeaderTagType.TimeVal]);
    assert.strictEqual(rest.toString(), ' \r\n');
  });
});

describe('takeRetryAfter', () => {
  it('should tag seconds and comment', () => {
    const { value, rest } = takeRetryAfter(Buffer.from('120 (I\'m in a meeting);duration=3600\r\n'));

    assert.strictEqual(value.vstr, '120 (I\'m in a meeting)');
    assert.strictEqual(value.vtype, HeaderValueType.RetryAfter);
    assert.deepStrictEqual(value.tags?.toJSON(), { Seconds: '120', Comment: 'I\'m in a meeting' });
    assert.strictEqual(rest.toString(), ';duration=3600\r\n');
  });

  it('should accept bare seconds', () => {
    const { value } = takeRetryAfter(Buffer.from('18000\r\n'));
    assert.deepStrictEqual(value.tags?.toJSON(), { Seconds: '18000' });
  });

  it('should reject a non-numeric value', () => {
    assert.throws(() => takeRetryAfter(Buffer.from('soon\r\n')), INVALID);
  });
});
