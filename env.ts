/**
 * Type-safe environment variable validation
 *
 * All environment variables read by the encoder are validated here once, at
 * import time. Import `env` instead of accessing `process.env` directly.
 *
 * @module env
 */

import { z } from "zod"

export const envSchema = z.object({
  // --- Logging ---
  LOGLEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),

  // --- Text encoding ---
  CODEPAGE_FALLBACK_SYMBOL: z.string().min(1).default("?"),
})

export type Env = z.infer<typeof envSchema>

/**
 * Parse and validate an environment source.
 * Throws a ZodError listing every invalid variable.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse({
    LOGLEVEL: source.LOGLEVEL,
    CODEPAGE_FALLBACK_SYMBOL: source.CODEPAGE_FALLBACK_SYMBOL,
  })
}

export const env: Env = parseEnv(process.env)
