/**
 * ESC/POS protocol bytes used by the code page switcher
 */

export const ESC = 0x1b

/**
 * Select character code table: ESC t n
 * The selector byte `n` follows the prefix.
 */
export const CODEPAGE_CHANGE: readonly number[] = [ESC, 0x74]

/**
 * Byte written for a character the target page has no slot for ("?")
 */
export const REPLACEMENT_BYTE = 0x3f

export const MAX_SELECTOR = 0xff
