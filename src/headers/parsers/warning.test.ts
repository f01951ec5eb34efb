import * as assert from 'node:assert';
import { Buffer } from 'node:buffer';
import { describe, it } from 'node:test';

import { SipParseErrorCode } from '../../errors.js';
import { HeaderValueType } from '../header-types.js';
import { takeWarning } from './warning.js';

describe('takeWarning', () => {
  it('should tag code, agent and text', () => {
    const { value, rest } = takeWarning(
      Buffer.from('307 isi.edu "Session parameter \'foo\' not understood", 301 [2001:db8::1]:5060 ""\r\n'),
    );

    assert.strictEqual(value.vstr, '307 isi.edu "Session parameter \'foo\' not understood"');
    assert.strictEqual(value.vtype, HeaderValueType.Warning);
    assert.deepStrictEqual(value.tags?.toJSON(), {
      WarnCode: '307',
      WarnAgent: 'isi.edu',
      WarnText: 'Session parameter \'foo\' not understood',
    });
    assert.strictEqual(rest.toString(), ', 301 [2001:db8::1]:5060 ""\r\n');
  });

  it('should accept an IPv6 hostport agent and empty text', () => {
    const { value } = takeWarning(Buffer.from('301 [2001:db8::1]:5060 ""\r\n'));

    assert.deepStrictEqual(value.tags?.toJSON(), {
      WarnCode: '301',
      WarnAgent: '[2001:db8::1]:5060',
      WarnText: '',
    });
  });

  it('should reject malformed warnings', () => {
    const cases = [
      '30 isi.edu "x"\r\n',
      '3070 isi.edu "x"\r\n',
      '307 isi.edu\r\n',
      '307 isi.edu x\r\n',
      '307"x"\r\n',
    ];
    for (const input of cases) {
      assert.throws(
        () => takeWarning(Buffer.from(input)),
        { code: SipParseErrorCode.INVALID_HEADER_VALUE },
        input,
      );
    }
  });
});
