/**
 * Encoder - Picks the code page that can print a given character
 *
 * The encoder remembers which pages have already encoded something
 * successfully. The memory only grows, and belongs to this instance: share an
 * Encoder between sessions to share it, never between concurrent writers.
 */

import type CodePage from "./CodePage"
import type CodePageProfile from "./CodePageProfile"

class Encoder {
  readonly profile: CodePageProfile
  _usedEncodings: Set<string>

  constructor(profile: CodePageProfile) {
    this.profile = profile
    this._usedEncodings = new Set()
  }

  /**
   * Canonical name for a user-supplied encoding, validated against the profile
   * @throws UnsupportedEncodingError
   */
  getEncoding(encoding: string): string {
    return this.profile.resolve(encoding)
  }

  /**
   * Selector byte for a page of this profile
   * @throws UnsupportedEncodingError
   */
  getSequence(encoding: string): number {
    return this.profile.getSelector(encoding)
  }

  /**
   * Pages that have encoded at least one character so far
   */
  get usedEncodings(): ReadonlySet<string> {
    return this._usedEncodings
  }

  /**
   * Whether `encoding` can represent `char`. Unknown pages answer false.
   * Never touches the usage memory.
   */
  canEncode(encoding: string, char: string): boolean {
    const page = this.profile.get(encoding)
    return page ? page.canEncode(char) : false
  }

  /**
   * Find a page for a character the current page cannot print.
   *
   * Search order:
   * 1. pages that already worked once; reusing them saves switch commands.
   *    This dominates the selector value.
   * 2. lower selectors first; low slots are the ones most printers actually
   *    implement when the profile is incomplete.
   *
   * @returns The page name, or undefined when no page has the character
   */
  findSuitableEncoding(char: string): string | undefined {
    const candidates = Array.from(this.profile).sort((a, b) => this._compareEncodings(a, b))

    for (const page of candidates) {
      if (this.canEncode(page.name, char)) {
        this._usedEncodings.add(page.name)
        return page.name
      }
    }
    return undefined
  }

  /**
   * Orders by the tuple (usedBefore ? 0 : 1, selector)
   */
  _compareEncodings(a: CodePage, b: CodePage): number {
    const usedA = this._usedEncodings.has(a.name) ? 0 : 1
    const usedB = this._usedEncodings.has(b.name) ? 0 : 1
    if (usedA !== usedB) return usedA - usedB
    return a.selector - b.selector
  }
}

export default Encoder
export { Encoder }
