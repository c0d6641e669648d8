export class HeaderParseError extends Error {
  suggestions: string[];

  constructor(message: string, suggestions: string[] = [], options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HeaderParseError';
    this.suggestions = suggestions;
  }
}

/**
 * A single header element could not be parsed (bad quoting, missing
 * delimiter, invalid quality numeral)
 */
export class MalformedValueError extends HeaderParseError {
  headerName: string;
  headerValue: string;
  reason: string;

  constructor(
    headerName: string,
    headerValue: string,
    reason: string,
    suggestions: string[] = [
      'Check the header value against the grammar of the header field.',
      'Parse with strict mode disabled to skip the malformed elements.'
    ],
    options?: { cause?: unknown }
  ) {
    super(`Malformed ${headerName} value ${JSON.stringify(headerValue)}: ${reason}`, suggestions, options);
    this.name = 'MalformedValueError';
    this.headerName = headerName;
    this.headerValue = headerValue;
    this.reason = reason;
  }
}

export class MalformedParameterListError extends MalformedValueError {
  /**
   * Offset in the scanned text where the problem was detected
   */
  offset: number;

  constructor(parameterList: string, reason: string, offset: number) {
    super('parameter list', parameterList, reason, [
      'Close every quoted string and comment.',
      'Write parameters as name=value pairs separated by semicolons.'
    ]);
    this.name = 'MalformedParameterListError';
    this.offset = offset;
  }
}

export class MalformedContentTypeError extends MalformedValueError {
  constructor(headerValue: string, reason = 'expected type/subtype', options?: { cause?: unknown }) {
    super(
      'content-type',
      headerValue,
      reason,
      [
        'A media type is written as type "/" subtype, for example text/plain.',
        'Use */* rather than * for the full wildcard.'
      ],
      options
    );
    this.name = 'MalformedContentTypeError';
  }
}

export class MalformedLinkValueError extends MalformedValueError {
  constructor(headerValue: string, reason: string, options?: { cause?: unknown }) {
    super(
      'link',
      headerValue,
      reason,
      [
        'Enclose each link target in angle brackets: <https://example.com/>.',
        'Separate the target from its parameters with a semicolon.'
      ],
      options
    );
    this.name = 'MalformedLinkValueError';
  }
}

/**
 * An element that lenient parsing would have skipped was rejected because
 * strict mode is enabled
 */
export class StrictModeViolationError extends MalformedValueError {
  segment: string;

  constructor(
    headerName: string,
    headerValue: string,
    segment: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(
      headerName,
      headerValue,
      `${reason} in ${JSON.stringify(segment)}`,
      ['Fix the offending element or disable strict mode to skip it.'],
      options
    );
    this.name = 'StrictModeViolationError';
    this.segment = segment;
    this.reason = reason;
  }
}

/**
 * Content negotiation found no mutually acceptable pair
 */
export class NoMatchError extends HeaderParseError {
  requested: string[];
  available: string[];

  constructor(requested: readonly { toString(): string }[], available: readonly { toString(): string }[]) {
    const requestedText = requested.map(String);
    const availableText = available.map(String);
    super(
      `No acceptable content type: requested [${requestedText.join(', ')}], available [${availableText.join(', ')}]`,
      [
        'Respond with 406 Not Acceptable, or pass a default content type.',
        'Add the requested media type to the list the server can produce.'
      ]
    );
    this.name = 'NoMatchError';
    this.requested = requestedText;
    this.available = availableText;
  }
}

export class UnsupportedHeaderError extends HeaderParseError {
  headerName: string;

  constructor(headerName: string, supported: readonly string[]) {
    super(`No parser registered for header ${JSON.stringify(headerName)}`, [
      `Supported headers: ${supported.join(', ')}.`,
      'Use parseList for other comma-separated header fields.'
    ]);
    this.name = 'UnsupportedHeaderError';
    this.headerName = headerName;
  }
}

/**
 * A URL could not be split or a replacement part is not acceptable
 */
export class InvalidUrlError extends HeaderParseError {
  url: string;
  reason: string;

  constructor(url: string, reason: string, options?: { cause?: unknown }) {
    super(
      `Invalid URL ${JSON.stringify(url)}: ${reason}`,
      [
        'Host labels are limited to 63 characters and host names to 255.',
        'Ports are non-negative integers.'
      ],
      options
    );
    this.name = 'InvalidUrlError';
    this.url = url;
    this.reason = reason;
  }
}
