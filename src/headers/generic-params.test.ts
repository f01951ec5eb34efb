import * as assert from 'node:assert';
import { Buffer } from 'node:buffer';
import { describe, it } from 'node:test';

import { SipParseErrorCode } from '../errors.js';
import { parseGenericParams } from './generic-params.js';

describe('parseGenericParams', () => {
  it('should parse name=value pairs in order', () => {
    const { value: params, rest } = parseGenericParams(Buffer.from(';branch=z9hG4bK776;received=192.0.2.1\r\n'));

    assert.strictEqual(params.size, 2);
    assert.deepStrictEqual(params.toJSON(), [
      ['branch', 'z9hG4bK776'],
      ['received', '192.0.2.1'],
    ]);
    assert.strictEqual(params.raw.toString(), ';branch=z9hG4bK776;received=192.0.2.1');
    assert.strictEqual(rest.toString(), '\r\n');
  });

  it('should accept flags, quoted values and whitespace around separators', () => {
    const { value: params } = parseGenericParams(Buffer.from('; lr ;purpose = "info, icon" ;rport\r\n'));

    assert.deepStrictEqual(params.toJSON(), [
      ['lr', null],
      ['purpose', 'info, icon'],
      ['rport', null],
    ]);
    assert.strictEqual(params.get('purpose')?.quoted, true);
  });

  it('should accept IPv6 references as values', () => {
    const { value: params } = parseGenericParams(Buffer.from(';received=[2001:db8::9]\r\n'));
    assert.strictEqual(params.getValue('received'), '[2001:db8::9]');
  });

  it('should look names up case-insensitively', () => {
    const { value: params } = parseGenericParams(Buffer.from(';Tag=a48s;Expires=3600\r\n'));

    assert.strictEqual(params.getValue('tag'), 'a48s');
    assert.strictEqual(params.getValue('EXPIRES'), '3600');
    assert.strictEqual(params.getValue('q'), undefined);
    assert.strictEqual(params.has('TAG'), true);
  });

  it('should stop before a comma and consume trailing whitespace', () => {
    const { value: params, rest } = parseGenericParams(Buffer.from(';q=0.7  , <sip:b@c>'));

    assert.strictEqual(params.getValue('q'), '0.7');
    assert.strictEqual(rest.toString(), ', <sip:b@c>');
  });

  it('should stop at the end of input', () => {
    const { rest } = parseGenericParams(Buffer.from(';lr'));
    assert.strictEqual(rest.length, 0);
  });

  it('should return views over the input', () => {
    const input = Buffer.from(';tag=1928301774\r\n');
    const { value: params } = parseGenericParams(input);
    const [param] = [...params];

    assert.ok(param?.value);
    assert.strictEqual(param.value.buffer, input.buffer);
    assert.strictEqual(param.value.byteOffset - input.byteOffset, 5);
  });

  it('should reject malformed parameter lists', () => {
    const cases = [
      'branch=1',
      ';=value\r\n',
      ';tag=\r\n',
      ';tag="open\r\n',
      ';tag=a#b\r\n',
      ';tag=a b\r\n',
    ];
    for (const input of cases) {
      assert.throws(
        () => parseGenericParams(Buffer.from(input)),
        { code: SipParseErrorCode.INVALID_PARAMETERS },
        input,
      );
    }
  });
});
