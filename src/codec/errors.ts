/**
 * Base class for errors raised by the codec
 */
export class CodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised when a caller asks for a representation kind the codec cannot produce
 */
export class UnsupportedConversionError extends CodecError {
  constructor(readonly kind: string) {
    super(`Unsupported conversion to ${kind}`);
  }
}

/**
 * Raised when a value's text cannot be read as the requested kind
 */
export class InvalidValueError extends CodecError {
  constructor(
    readonly kind: string,
    readonly value: string,
  ) {
    super(`Bad value for type ${kind}: ${value}`);
  }
}

/**
 * Raised by temporal parsers for text that is not a date, time or timestamp
 */
export class TemporalParseError extends CodecError {
  constructor(
    readonly target: 'date' | 'time' | 'timestamp',
    readonly value: string,
  ) {
    super(`Unable to parse ${target} from: ${value}`);
  }
}
