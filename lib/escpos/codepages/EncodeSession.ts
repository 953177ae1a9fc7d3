/**
 * EncodeSession - Writes text to a printer, switching code pages as needed
 *
 * For each character the session keeps the active page if it can print it,
 * otherwise asks the Encoder for another page and emits an ESC t switch
 * before the character's byte. Characters no page can print are replaced by
 * the fallback symbol.
 *
 * A pinned session never searches: everything goes out in the fixed page,
 * with the page's own replacement byte for characters it lacks.
 *
 * Usage:
 * ```typescript
 * const sink = new BufferSink()
 * const session = new EncodeSession(sink, CodePageProfile.default())
 * session.write("Żółć, €5")
 * transport.send(sink.toBytes())
 * ```
 */

import { env } from "../../../env"
import { baseLogger } from "../../logger"
import { CODEPAGE_CHANGE } from "./constants"
import type CodePageProfile from "./CodePageProfile"
import Encoder from "./Encoder"
import {
  ConfigurationError,
  InvalidInputTypeError,
  UnencodableFallbackError,
  UnsupportedEncodingError,
} from "./errors"
import type { ByteSink } from "./sinks"

const logger = baseLogger.child({ module: "encode-session" })

export interface EncodeSessionOptions {
  /** Page the printer is known to have active already; nothing is emitted for it */
  encoding?: string
  /** Disable automatic switching; requires `encoding` */
  pinned?: boolean
  /** Written in place of characters no page can encode */
  fallbackSymbol?: string
  /** Share usage memory with other sessions on the same printer */
  encoder?: Encoder
}

export type SessionMode = { kind: "auto" } | { kind: "pinned"; encoding: string }

class EncodeSession {
  readonly sink: ByteSink
  readonly encoder: Encoder
  readonly fallbackSymbol: string
  _mode: SessionMode
  _encoding: string | undefined

  constructor(sink: ByteSink, profile: CodePageProfile, options: EncodeSessionOptions = {}) {
    if (options.pinned && !options.encoding) {
      throw new ConfigurationError(
        "A pinned session needs an encoding; pass `encoding` together with `pinned`",
      )
    }
    if (options.fallbackSymbol === "") {
      throw new ConfigurationError("The fallback symbol must contain at least one character")
    }
    if (options.encoder && options.encoder.profile !== profile) {
      throw new ConfigurationError("The injected encoder was built for a different profile")
    }

    this.sink = sink
    this.encoder = options.encoder ?? new Encoder(profile)
    this.fallbackSymbol = options.fallbackSymbol ?? env.CODEPAGE_FALLBACK_SYMBOL
    this._encoding = options.encoding ? this.encoder.getEncoding(options.encoding) : undefined
    this._mode =
      options.pinned && this._encoding
        ? { kind: "pinned", encoding: this._encoding }
        : { kind: "auto" }
  }

  /**
   * Page the printer currently has active, as far as this session emitted
   */
  get encoding(): string | undefined {
    return this._encoding
  }

  get pinned(): boolean {
    return this._mode.kind === "pinned"
  }

  /**
   * Fix the code page; the switch is emitted right away.
   * Passing nothing resumes automatic switching from the current page.
   */
  pin(encoding?: string | null): void {
    if (!encoding) {
      this._mode = { kind: "auto" }
      return
    }
    const resolved = this.encoder.getEncoding(encoding)
    this.writeWithEncoding(resolved)
    this._mode = { kind: "pinned", encoding: resolved }
  }

  /**
   * Write text, switching code pages where needed.
   * @throws InvalidInputTypeError when `text` is not a string
   * @throws UnencodableFallbackError when neither a character nor the fallback symbol fits any page
   */
  write(text: string): void {
    if (typeof text !== "string") {
      throw new InvalidInputTypeError(text)
    }

    if (this._mode.kind === "pinned") {
      this.writeWithEncoding(this._mode.encoding, text)
      return
    }

    // TODO: emit runs of characters sharing a page in one sink write instead of one per character
    for (const char of text) {
      if (!this._writeChar(char)) {
        this._writeFallback(char)
      }
    }
  }

  /**
   * Emit `text` in `encoding`, preceded by a switch command if that page is
   * not the active one. Characters the page lacks become its replacement byte.
   */
  writeWithEncoding(encoding: string, text?: string): void {
    if (text !== undefined && typeof text !== "string") {
      throw new InvalidInputTypeError(text)
    }
    const page = this.encoder.profile.get(encoding)
    if (!page) {
      throw new UnsupportedEncodingError(encoding, this.encoder.profile.names())
    }

    if (encoding !== this._encoding) {
      logger.debug(
        { from: this._encoding ?? null, to: encoding, selector: page.selector },
        "switching code page",
      )
      this.sink.write(Uint8Array.from([...CODEPAGE_CHANGE, page.selector]))
      this._encoding = encoding
    }

    if (text) {
      this.sink.write(page.encode(text))
    }
  }

  /**
   * @returns false when no page in the profile can print `char`
   */
  _writeChar(char: string): boolean {
    if (this._encoding && this.encoder.canEncode(this._encoding, char)) {
      this.writeWithEncoding(this._encoding, char)
      return true
    }

    const encoding = this.encoder.findSuitableEncoding(char)
    if (!encoding) {
      return false
    }
    this.writeWithEncoding(encoding, char)
    return true
  }

  /**
   * Substitute the fallback symbol for an unprintable character. The symbol
   * goes through the same page search, once; it is never substituted itself.
   */
  _writeFallback(char: string): void {
    logger.debug(
      { codePoint: char.codePointAt(0), symbol: this.fallbackSymbol },
      "no code page for character, writing fallback symbol",
    )
    for (const symbolChar of this.fallbackSymbol) {
      if (!this._writeChar(symbolChar)) {
        throw new UnencodableFallbackError(this.fallbackSymbol, char)
      }
    }
  }
}

export default EncodeSession
export { EncodeSession }
