/**
 * ESC/POS Code Page Encoding Module
 *
 * Streams multi-script text to receipt printers that render through a single
 * active single-byte code page. The session picks a page per character,
 * emits ESC t switches only when the page changes, and falls back to a
 * substitute symbol when no page the printer offers has the character.
 *
 * Quick Start:
 * ```typescript
 * import { BufferSink, CodePageProfile, EncodeSession } from "escpos-codepage-encoder"
 *
 * const profile = CodePageProfile.fromTable({ cp437: 0, cp852: 18 })
 * const sink = new BufferSink()
 * const session = new EncodeSession(sink, profile)
 *
 * session.write("Łódź")
 * const bytes = sink.toBytes()
 * ```
 *
 * @module lib/escpos
 */

// Core components
export {
  default as CodePage,
  normalizeEncodingName,
  isKnownEncoding,
} from "./codepages/CodePage"
export type { CharacterTable } from "./codepages/CodePage"
export { default as CodePageProfile, codePageTableSchema } from "./codepages/CodePageProfile"
export type { CodePageTable } from "./codepages/CodePageProfile"
export { default as Encoder } from "./codepages/Encoder"

// Session
export { default as EncodeSession } from "./codepages/EncodeSession"
export type { EncodeSessionOptions, SessionMode } from "./codepages/EncodeSession"

// Sinks
export { default as BufferSink } from "./codepages/sinks"
export type { ByteSink } from "./codepages/sinks"

// Protocol constants
export { CODEPAGE_CHANGE, REPLACEMENT_BYTE, ESC } from "./codepages/constants"

// Errors
export {
  CodePageError,
  ConfigurationError,
  UnsupportedEncodingError,
  InvalidInputTypeError,
  UnencodableFallbackError,
} from "./codepages/errors"
