import type { Buffer } from 'node:buffer';
import { TextDecoder } from 'node:util';

import { SipParseError, SipParseErrorCode } from './errors.js';

const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

export function decodeUtf8(bytes: Buffer): string {
  if (bytes.length === 0) {
    return '';
  }
  try {
    return decoder.decode(bytes);
  } catch (error) {
    throw new SipParseError({
      code: SipParseErrorCode.INVALID_UTF8,
      message: `Invalid UTF-8 sequence in ${bytes.length} byte span`,
      cause: error,
    });
  }
}
