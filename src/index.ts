export { formatSipDate, isValidSipDate, parseSipDate } from './date/index.js';
export {
  isSipParseError,
  SipParseError,
  SipParseErrorCode,
  type SipParseErrorOptions,
} from './errors.js';
export { encodeHeaderGroup, type EncodeHeaderOptions } from './headers/encode-header.js';
export { type GenericParam, GenericParams, parseGenericParams } from './headers/generic-params.js';
export {
  type Header,
  type HeaderGroup,
  headerNameEquals,
  parseHeader,
  takeHeaderName,
  takeHeaderValue,
  type TakenValue,
} from './headers/header.js';
export { parseHeaderBlock, SipHeaders } from './headers/header-block.js';
export { type HeaderTagEntry, HeaderTags } from './headers/header-tags.js';
export { HeaderTagType, HeaderValueType } from './headers/header-types.js';
export { type HeaderValue, type HeaderValueParser } from './headers/header-value.js';
export * from './headers/parsers/index.js';
export {
  findRFCHeader,
  findValueParser,
  getCompactForm,
  getValueParser,
  SipRFCHeader,
  type ValueParserSelection,
} from './headers/rfc-header.js';
export { parseSipUri, type SipScheme, type SipUri } from './headers/sip-uri.js';
export { createLogger } from './logger.js';
export { DEFAULT_HEADER_PARSE_LIMITS } from './specs.js';
export type { HeaderParseLimits, HeaderParseOptions, ParseResult } from './types.js';
