/**
 * CodePage - A single-byte character table the printer can switch to
 *
 * A page knows its canonical name, the selector byte the printer uses to
 * activate it, and how to turn characters into bytes. Tables for named
 * encodings are derived from iconv-lite on first use: every byte 0-255 is
 * decoded and kept only if it encodes back to itself. A name the registry
 * does not know gets an empty table.
 */

import * as iconv from "iconv-lite"

import { MAX_SELECTOR, REPLACEMENT_BYTE } from "./constants"
import { ConfigurationError } from "./errors"

export type CharacterTable = ReadonlyMap<string, number>

/**
 * Canonical form used by the encoding registry: lower case, alphanumerics only
 * ("CP-437" and "cp_437" both become "cp437").
 */
export function normalizeEncodingName(name: string): string {
  return name.toLowerCase().replace(/[^0-9a-z]/g, "")
}

/**
 * Whether the encoding registry can produce a table for this name
 */
export function isKnownEncoding(name: string): boolean {
  return iconv.encodingExists(normalizeEncodingName(name))
}

function buildTable(encoding: string): Map<string, number> {
  const table = new Map<string, number>()
  if (!iconv.encodingExists(encoding)) return table
  for (let byte = 0; byte <= MAX_SELECTOR; byte++) {
    const char = iconv.decode(Buffer.of(byte), encoding)
    if (char.length !== 1 || char === "\ufffd" || table.has(char)) continue
    const encoded = iconv.encode(char, encoding)
    if (encoded.length === 1 && encoded[0] === byte) {
      table.set(char, byte)
    }
  }
  return table
}

class CodePage {
  readonly name: string
  readonly selector: number
  _table: CharacterTable | null

  /**
   * @param name - Canonical encoding name
   * @param selector - ESC t argument that activates this page
   * @param table - Explicit character map; derived from the registry when omitted
   */
  constructor(name: string, selector: number, table?: CharacterTable) {
    if (!Number.isInteger(selector) || selector < 0 || selector > MAX_SELECTOR) {
      throw new ConfigurationError(
        `Selector for "${name}" must be an integer between 0 and ${MAX_SELECTOR}, got ${selector}`,
      )
    }
    this.name = name
    this.selector = selector
    this._table = table ?? null
  }

  /**
   * Look up the byte for exactly one character.
   * @returns The byte, or undefined when the character is outside this page
   */
  encodeChar(char: string): number | undefined {
    return this._getTable().get(char)
  }

  canEncode(char: string): boolean {
    return this.encodeChar(char) !== undefined
  }

  /**
   * Encode a whole string; characters without a slot become REPLACEMENT_BYTE.
   */
  encode(text: string): Uint8Array {
    const bytes: number[] = []
    for (const char of text) {
      bytes.push(this.encodeChar(char) ?? REPLACEMENT_BYTE)
    }
    return Uint8Array.from(bytes)
  }

  _getTable(): CharacterTable {
    if (!this._table) {
      this._table = buildTable(this.name)
    }
    return this._table
  }
}

export default CodePage
export { CodePage }
