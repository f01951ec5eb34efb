export { takeAuthenticationInfo, takeCredentials } from './auth.js';
export { takeCallId } from './call-id.js';
export { takeAbsoluteUriValue, takeCallInfo, takeNameAddr } from './name-addr.js';
export { takeCSeq, takeRetryAfter, takeTimestamp, takeVersion } from './numeric.js';
export {
  takeDateValue,
  takeDigitValue,
  takeExtensionValue,
  takeMediaType,
  takeQuotedValue,
  takeTokenValue,
  takeUserAgent,
  takeUtf8Text,
} from './text.js';
export { takeVia } from './via.js';
export { takeWarning } from './warning.js';
