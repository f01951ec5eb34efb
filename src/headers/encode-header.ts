import { Buffer } from 'node:buffer';

import { CRLF } from '../specs.js';
import type { HeaderGroup } from './header.js';
import { getCompactForm } from './rfc-header.js';

export interface EncodeHeaderOptions {
  /** Write registered headers under their compact name where one exists. */
  compact?: boolean;
}

const COMMA = Buffer.from(',');
const SPACE = Buffer.from(' ');

function encodeHeaderName(group: HeaderGroup, options?: EncodeHeaderOptions): string {
  if (group.rfcHeader === null) {
    return group.name;
  }
  const shouldCompact = options?.compact ?? false;
  return (shouldCompact ? getCompactForm(group.rfcHeader) : null) ?? group.rfcHeader;
}

/**
 * Writes a group back as one header line from the raw value spans. Values
 * are joined with `", "`, so a line that used that separator encodes to the
 * bytes it was parsed from, up to the name spelling. Empty occurrences are
 * kept as a bare comma.
 */
export function encodeHeaderGroup(group: HeaderGroup, options?: EncodeHeaderOptions): Buffer {
  const chunks: Buffer[] = [Buffer.from(`${encodeHeaderName(group, options)}:`)];

  group.headers.forEach((header, index) => {
    if (index > 0) {
      chunks.push(COMMA);
    }
    if (header.rawValueParam.length > 0) {
      chunks.push(SPACE, header.rawValueParam);
    }
  });
  chunks.push(Buffer.from(CRLF));

  return Buffer.concat(chunks);
}
