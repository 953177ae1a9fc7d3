/**
 * Errors raised by the code page encoder
 *
 * Everything derives from CodePageError so callers can catch the whole
 * family with one `instanceof` check.
 */

export class CodePageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "CodePageError"
  }
}

/**
 * Invalid session or profile setup (e.g. pinned mode without an encoding)
 */
export class ConfigurationError extends CodePageError {
  constructor(message: string) {
    super(message)
    this.name = "ConfigurationError"
  }
}

export class UnsupportedEncodingError extends CodePageError {
  readonly encoding: string
  readonly validEncodings: string[]

  constructor(encoding: string, validEncodings: string[]) {
    super(
      `Encoding "${encoding}" cannot be used for the current profile. ` +
        `Valid encodings are: ${validEncodings.join(",")}`,
    )
    this.name = "UnsupportedEncodingError"
    this.encoding = encoding
    this.validEncodings = validEncodings
  }
}

export class InvalidInputTypeError extends CodePageError {
  readonly receivedType: string

  constructor(value: unknown) {
    const receivedType = describeType(value)
    super(`The supplied text has to be a string, but is of type ${receivedType}.`)
    this.name = "InvalidInputTypeError"
    this.receivedType = receivedType
  }
}

/**
 * No page in the profile can encode a character, nor the fallback symbol
 * that should have replaced it.
 */
export class UnencodableFallbackError extends CodePageError {
  readonly symbol: string
  readonly character: string

  constructor(symbol: string, character: string) {
    super(
      `No code page in the profile can encode "${character}" ` +
        `or its fallback symbol "${symbol}".`,
    )
    this.name = "UnencodableFallbackError"
    this.symbol = symbol
    this.character = character
  }
}

function describeType(value: unknown): string {
  if (value === null) return "null"
  if (typeof value === "object") {
    return value.constructor?.name ?? "object"
  }
  return typeof value
}
