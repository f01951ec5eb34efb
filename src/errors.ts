export enum SipParseErrorCode {
  INVALID_HEADER_NAME = 'ERR_SIP_INVALID_HEADER_NAME',
  INVALID_HEADER_VALUE = 'ERR_SIP_INVALID_HEADER_VALUE',
  INVALID_VALUE_TERMINATOR = 'ERR_SIP_INVALID_VALUE_TERMINATOR',
  EMPTY_INPUT = 'ERR_SIP_EMPTY_INPUT',
  INVALID_PARAMETERS = 'ERR_SIP_INVALID_PARAMETERS',
  INVALID_UTF8 = 'ERR_SIP_INVALID_UTF8',
  HEADER_NAME_TOO_LARGE = 'ERR_SIP_HEADER_NAME_TOO_LARGE',
  HEADER_TOO_MANY_VALUES = 'ERR_SIP_HEADER_TOO_MANY_VALUES',
}

const DEFAULT_MESSAGES: Record<SipParseErrorCode, string> = {
  [SipParseErrorCode.INVALID_HEADER_NAME]: 'Bad header name',
  [SipParseErrorCode.INVALID_HEADER_VALUE]: 'Error parse header value',
  [SipParseErrorCode.INVALID_VALUE_TERMINATOR]: 'Unexpected byte after header value',
  [SipParseErrorCode.EMPTY_INPUT]: 'Header input is empty',
  [SipParseErrorCode.INVALID_PARAMETERS]: 'Error parse header parameters',
  [SipParseErrorCode.INVALID_UTF8]: 'Invalid UTF-8 sequence',
  [SipParseErrorCode.HEADER_NAME_TOO_LARGE]: 'Header name too large',
  [SipParseErrorCode.HEADER_TOO_MANY_VALUES]: 'Too many header values',
};

export interface SipParseErrorOptions {
  code: SipParseErrorCode;
  message?: string;
  cause?: unknown;
}

function createCustomError(defaultMessage: string) {
  return class extends Error {
    constructor(message?: string, options?: ErrorOptions) {
      super(message ?? defaultMessage, options);
      this.name = this.constructor.name;
      if (Error.captureStackTrace) {
        Error.captureStackTrace(this, this.constructor);
      }
    }
  };
}

export class SipParseError extends createCustomError('Sip Parse Error') {
  public readonly code: SipParseErrorCode;

  constructor({ code, message, cause }: SipParseErrorOptions) {
    super(message ?? DEFAULT_MESSAGES[code], cause === undefined ? undefined : { cause });
    this.code = code;
  }
}

export function isSipParseError(error: unknown, code?: SipParseErrorCode): error is SipParseError {
  return error instanceof SipParseError && (code === undefined || error.code === code);
}
