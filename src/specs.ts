import type { HeaderParseLimits } from './types.js';

export const CR = 0x0d;
export const LF = 0x0a;
export const CRLF = '\r\n';

export const SP = 0x20;
export const HTAB = 0x09;
export const DQUOTE = 0x22;
export const BACKSLASH = 0x5c;
export const COMMA = 0x2c;
export const SEMI = 0x3b;
export const COLON = 0x3a;
export const EQUAL = 0x3d;
export const SLASH = 0x2f;
export const DOT = 0x2e;
export const AT = 0x40;
export const STAR = 0x2a;
export const QUESTION = 0x3f;
export const LAQUOT = 0x3c;
export const RAQUOT = 0x3e;
export const LPAREN = 0x28;
export const RPAREN = 0x29;
export const LBRACKET = 0x5b;
export const RBRACKET = 0x5d;

export const MAX_PORT = 65535;

/** CSeq sequence numbers must stay below 2**31. */
export const MAX_CSEQ_NUMBER = 2 ** 31 - 1;

export const DEFAULT_HEADER_PARSE_LIMITS: HeaderParseLimits = {
  maxHeaderNameBytes: 256,
  maxValuesPerHeader: 256,
} as const;

export const LOG_LEVEL_ENV = 'SIP_HEADER_PARSER_LOG_LEVEL';
