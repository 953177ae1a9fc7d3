/**
 * CodePageProfile - The code pages a printer declares support for
 *
 * Built once per printer from its capability table ({ name: selector }) and
 * read-only afterwards. Iteration follows declaration order; callers that
 * care about selector order must compare selectors themselves.
 */

import { z } from "zod"

import { baseLogger } from "../../logger"
import CodePage, { isKnownEncoding, normalizeEncodingName } from "./CodePage"
import { MAX_SELECTOR } from "./constants"
import { ConfigurationError, UnsupportedEncodingError } from "./errors"
import defaultTable from "./profiles/default.json"

const logger = baseLogger.child({ module: "codepage-profile" })

export const codePageTableSchema = z.record(
  z.string().min(1),
  z.number().int().min(0).max(MAX_SELECTOR),
)

export type CodePageTable = z.infer<typeof codePageTableSchema>

class CodePageProfile implements Iterable<CodePage> {
  _pages: Map<string, CodePage>

  constructor(pages: Iterable<CodePage> = []) {
    this._pages = new Map()
    for (const page of pages) {
      if (this._pages.has(page.name)) {
        throw new ConfigurationError(`Code page "${page.name}" is declared more than once`)
      }
      this._pages.set(page.name, page)
    }
  }

  /**
   * Build a profile from a capability table.
   * Names the encoding registry does not know are skipped with a warning.
   */
  static fromTable(table: unknown): CodePageProfile {
    const entries = codePageTableSchema.parse(table)
    const pages: CodePage[] = []
    for (const [rawName, selector] of Object.entries(entries)) {
      if (!isKnownEncoding(rawName)) {
        logger.warn({ encoding: rawName, selector }, "skipping unknown code page")
        continue
      }
      pages.push(new CodePage(normalizeEncodingName(rawName), selector))
    }
    return new CodePageProfile(pages)
  }

  /**
   * Profile of the common single-byte ESC/POS code pages
   */
  static default(): CodePageProfile {
    return CodePageProfile.fromTable(defaultTable)
  }

  get size(): number {
    return this._pages.size
  }

  has(name: string): boolean {
    return this._pages.has(name)
  }

  get(name: string): CodePage | undefined {
    return this._pages.get(name)
  }

  /**
   * @throws UnsupportedEncodingError when the page is not in this profile
   */
  getSelector(name: string): number {
    const page = this._pages.get(name)
    if (!page) {
      throw new UnsupportedEncodingError(name, this.names())
    }
    return page.selector
  }

  names(): string[] {
    return Array.from(this._pages.keys())
  }

  /**
   * Turn a user-supplied encoding name into the canonical name this profile
   * uses, validating that the printer offers it.
   */
  resolve(name: string): string {
    const canonical = normalizeEncodingName(name)
    if (!this._pages.has(canonical)) {
      throw new UnsupportedEncodingError(name, this.names())
    }
    return canonical
  }

  [Symbol.iterator](): Iterator<CodePage> {
    return this._pages.values()
  }
}

export default CodePageProfile
export { CodePageProfile }
