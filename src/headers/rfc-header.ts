import type { HeaderValueParser } from './header-value.js';
import {
  takeAbsoluteUriValue,
  takeAuthenticationInfo,
  takeCallId,
  takeCallInfo,
  takeCredentials,
  takeCSeq,
  takeDateValue,
  takeDigitValue,
  takeExtensionValue,
  takeMediaType,
  takeNameAddr,
  takeQuotedValue,
  takeRetryAfter,
  takeTimestamp,
  takeTokenValue,
  takeUserAgent,
  takeUtf8Text,
  takeVersion,
  takeVia,
  takeWarning,
} from './parsers/index.js';

/** Standard headers known to the parser; the value is the canonical name. */
export enum SipRFCHeader {
  Accept = 'Accept',
  AcceptEncoding = 'Accept-Encoding',
  AcceptLanguage = 'Accept-Language',
  AlertInfo = 'Alert-Info',
  Allow = 'Allow',
  AllowEvents = 'Allow-Events',
  AuthenticationInfo = 'Authentication-Info',
  Authorization = 'Authorization',
  CallID = 'Call-ID',
  CallInfo = 'Call-Info',
  Contact = 'Contact',
  ContentDisposition = 'Content-Disposition',
  ContentEncoding = 'Content-Encoding',
  ContentLanguage = 'Content-Language',
  ContentLength = 'Content-Length',
  ContentType = 'Content-Type',
  CSeq = 'CSeq',
  Date = 'Date',
  ErrorInfo = 'Error-Info',
  Event = 'Event',
  Expires = 'Expires',
  From = 'From',
  Identity = 'Identity',
  IdentityInfo = 'Identity-Info',
  InReplyTo = 'In-Reply-To',
  MaxForwards = 'Max-Forwards',
  MimeVersion = 'MIME-Version',
  MinExpires = 'Min-Expires',
  MinSE = 'Min-SE',
  Organization = 'Organization',
  PAssertedIdentity = 'P-Asserted-Identity',
  Path = 'Path',
  Priority = 'Priority',
  ProxyAuthenticate = 'Proxy-Authenticate',
  ProxyAuthorization = 'Proxy-Authorization',
  ProxyRequire = 'Proxy-Require',
  RecordRoute = 'Record-Route',
  ReferTo = 'Refer-To',
  ReferredBy = 'Referred-By',
  ReplyTo = 'Reply-To',
  Require = 'Require',
  RetryAfter = 'Retry-After',
  Route = 'Route',
  RSeq = 'RSeq',
  Server = 'Server',
  ServiceRoute = 'Service-Route',
  SessionExpires = 'Session-Expires',
  Subject = 'Subject',
  SubscriptionState = 'Subscription-State',
  Supported = 'Supported',
  Timestamp = 'Timestamp',
  To = 'To',
  Unsupported = 'Unsupported',
  UserAgent = 'User-Agent',
  Via = 'Via',
  Warning = 'Warning',
  WWWAuthenticate = 'WWW-Authenticate',
}

interface RFCHeaderEntry {
  parser: HeaderValueParser;
  compact?: string;
}

const RFC_HEADERS: Readonly<Record<SipRFCHeader, RFCHeaderEntry>> = {
  [SipRFCHeader.Accept]: { parser: takeMediaType },
  [SipRFCHeader.AcceptEncoding]: { parser: takeTokenValue },
  [SipRFCHeader.AcceptLanguage]: { parser: takeTokenValue },
  [SipRFCHeader.AlertInfo]: { parser: takeAbsoluteUriValue },
  [SipRFCHeader.Allow]: { parser: takeTokenValue },
  [SipRFCHeader.AllowEvents]: { parser: takeTokenValue, compact: 'u' },
  [SipRFCHeader.AuthenticationInfo]: { parser: takeAuthenticationInfo },
  [SipRFCHeader.Authorization]: { parser: takeCredentials },
  [SipRFCHeader.CallID]: { parser: takeCallId, compact: 'i' },
  [SipRFCHeader.CallInfo]: { parser: takeCallInfo },
  [SipRFCHeader.Contact]: { parser: takeNameAddr, compact: 'm' },
  [SipRFCHeader.ContentDisposition]: { parser: takeTokenValue },
  [SipRFCHeader.ContentEncoding]: { parser: takeTokenValue, compact: 'e' },
  [SipRFCHeader.ContentLanguage]: { parser: takeTokenValue },
  [SipRFCHeader.ContentLength]: { parser: takeDigitValue, compact: 'l' },
  [SipRFCHeader.ContentType]: { parser: takeMediaType, compact: 'c' },
  [SipRFCHeader.CSeq]: { parser: takeCSeq },
  [SipRFCHeader.Date]: { parser: takeDateValue },
  [SipRFCHeader.ErrorInfo]: { parser: takeAbsoluteUriValue },
  [SipRFCHeader.Event]: { parser: takeTokenValue, compact: 'o' },
  [SipRFCHeader.Expires]: { parser: takeDigitValue },
  [SipRFCHeader.From]: { parser: takeNameAddr, compact: 'f' },
  [SipRFCHeader.Identity]: { parser: takeQuotedValue, compact: 'y' },
  [SipRFCHeader.IdentityInfo]: { parser: takeAbsoluteUriValue, compact: 'n' },
  [SipRFCHeader.InReplyTo]: { parser: takeCallId },
  [SipRFCHeader.MaxForwards]: { parser: takeDigitValue },
  [SipRFCHeader.MimeVersion]: { parser: takeVersion },
  [SipRFCHeader.MinExpires]: { parser: takeDigitValue },
  [SipRFCHeader.MinSE]: { parser: takeDigitValue },
  [SipRFCHeader.Organization]: { parser: takeUtf8Text },
  [SipRFCHeader.PAssertedIdentity]: { parser: takeNameAddr },
  [SipRFCHeader.Path]: { parser: takeNameAddr },
  [SipRFCHeader.Priority]: { parser: takeTokenValue },
  [SipRFCHeader.ProxyAuthenticate]: { parser: takeCredentials },
  [SipRFCHeader.ProxyAuthorization]: { parser: takeCredentials },
  [SipRFCHeader.ProxyRequire]: { parser: takeTokenValue },
  [SipRFCHeader.RecordRoute]: { parser: takeNameAddr },
  [SipRFCHeader.ReferTo]: { parser: takeNameAddr, compact: 'r' },
  [SipRFCHeader.ReferredBy]: { parser: takeNameAddr, compact: 'b' },
  [SipRFCHeader.ReplyTo]: { parser: takeNameAddr },
  [SipRFCHeader.Require]: { parser: takeTokenValue },
  [SipRFCHeader.RetryAfter]: { parser: takeRetryAfter },
  [SipRFCHeader.Route]: { parser: takeNameAddr },
  [SipRFCHeader.RSeq]: { parser: takeDigitValue },
  [SipRFCHeader.Server]: { parser: takeUserAgent },
  [SipRFCHeader.ServiceRoute]: { parser: takeNameAddr },
  [SipRFCHeader.SessionExpires]: { parser: takeDigitValue, compact: 'x' },
  [SipRFCHeader.Subject]: { parser: takeUtf8Text, compact: 's' },
  [SipRFCHeader.SubscriptionState]: { parser: takeTokenValue },
  [SipRFCHeader.Supported]: { parser: takeTokenValue, compact: 'k' },
  [SipRFCHeader.Timestamp]: { parser: takeTimestamp },
  [SipRFCHeader.To]: { parser: takeNameAddr, compact: 't' },
  [SipRFCHeader.Unsupported]: { parser: takeTokenValue },
  [SipRFCHeader.UserAgent]: { parser: takeUserAgent },
  [SipRFCHeader.Via]: { parser: takeVia, compact: 'v' },
  [SipRFCHeader.Warning]: { parser: takeWarning },
  [SipRFCHeader.WWWAuthenticate]: { parser: takeCredentials },
};

const LOOKUP = new Map<string, SipRFCHeader>();
for (const header of Object.values(SipRFCHeader)) {
  LOOKUP.set(header.toLowerCase(), header);
  const { compact } = RFC_HEADERS[header];
  if (compact !== undefined) {
    LOOKUP.set(compact, header);
  }
}

/** Case-insensitive lookup by full or compact name. */
export function findRFCHeader(name: string): SipRFCHeader | null {
  return LOOKUP.get(name.toLowerCase()) ?? null;
}

export function getCompactForm(header: SipRFCHeader): string | null {
  return RFC_HEADERS[header].compact ?? null;
}

export function getValueParser(header: SipRFCHeader): HeaderValueParser {
  return RFC_HEADERS[header].parser;
}

export interface ValueParserSelection {
  rfcHeader: SipRFCHeader | null;
  parser: HeaderValueParser;
}

/**
 * Picks the value grammar for a header name. Names outside the registry are
 * extension headers: they get `rfcHeader: null` and the permissive extension
 * grammar instead of an error, so unknown headers still parse.
 */
export function findValueParser(name: string): ValueParserSelection {
  const rfcHeader = findRFCHeader(name);
  if (rfcHeader === null) {
    return { rfcHeader: null, parser: takeExtensionValue };
  }
  return { rfcHeader, parser: getValueParser(rfcHeader) };
}
