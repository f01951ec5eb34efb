/**
 * Shape of a parsed header value. Shapes noted "tags" carry a
 * {@link HeaderTags} map; the rest expose only `vstr`.
 */
export enum HeaderValueType {
  EmptyValue = 'empty',
  TokenValue = 'token',
  Digit = 'digit',
  /** tags: AbsoluteURI */
  AbsoluteURI = 'absolute-uri',
  /** tags: PureValue */
  QuotedValue = 'quoted',
  /** tags: AinfoType, AinfoValue */
  AuthenticationInfo = 'authentication-info',
  /** tags: Number, Method */
  CSeq = 'cseq',
  DateString = 'date',
  Utf8Text = 'utf8-text',
  /** tags: Major, Minor (optional) */
  Version = 'version',
  /**
   * credentials / challenge. tags: AuthSchema plus any of Username, Realm,
   * Domain, Nonce, DigestUri, Dresponse, Algorithm, Cnonce, Opaque, Stale,
   * QopValue, NonceCount
   */
  AuthorizationDigest = 'authorization-digest',
  /** tags: ID, Host (optional) */
  CallID = 'call-id',
  /** tags: PureValue */
  CallInfo = 'call-info',
  /** Contact, From, To, Route, Record-Route. tags: Star, DisplayName, AbsoluteURI (all optional) */
  NameAddr = 'name-addr',
  /** tags: TimeVal, Delay (optional) */
  Timestamp = 'timestamp',
  /** tags: Seconds, Comment (optional) */
  RetryAfter = 'retry-after',
  UserAgent = 'user-agent',
  /** tags: ProtocolName, ProtocolVersion, ProtocolTransport, Host, Port (optional) */
  Via = 'via',
  /** tags: WarnCode, WarnAgent, WarnText */
  Warning = 'warning',
  ExtensionHeader = 'extension',
}

/**
 * Named sub-fields of a header value. The numeric order is the iteration
 * order of {@link HeaderTags}; append new members at the end.
 */
export enum HeaderTagType {
  PureValue,
  /** nextnonce, qop, rspauth, ... */
  AinfoType,
  AinfoValue,
  AbsoluteURI,

  AuthSchema,
  Username,
  Domain,
  Realm,
  Nonce,
  DigestUri,
  Dresponse,
  Algorithm,
  Cnonce,
  Opaque,
  Stale,
  QopValue,
  NonceCount,

  Number,
  Method,
  ID,
  Host,
  Port,
  /** always `*` */
  Star,
  DisplayName,
  Seconds,
  Comment,
  Major,
  Minor,
  TimeVal,
  Delay,

  ProtocolName,
  ProtocolVersion,
  ProtocolTransport,

  WarnCode,
  WarnAgent,
  WarnText,
}
