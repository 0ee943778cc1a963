/**
 * Extensions page configuration
 *
 * Hosts pass a partial config; missing fields take the defaults below.
 */
import { z } from 'zod'
import { formatZodErrors } from './extensions/manifest'
import type { ValidationError } from './extensions/types'

export const extensionsPageConfigSchema = z.object({
  /** Delay before a non-empty search query triggers a fetch */
  searchDebounceMs: z.number().int().nonnegative().default(250),
  searchPlaceholder: z.string().default('Search extensions...'),
  /** Cap on dev extensions kept after fuzzy matching; unlimited when unset */
  maxDevMatches: z.number().int().positive().optional(),
})

export type ExtensionsPageConfig = z.output<typeof extensionsPageConfigSchema>
export type ExtensionsPageConfigInput = z.input<typeof extensionsPageConfigSchema>

export const DEFAULT_CONFIG: ExtensionsPageConfig = extensionsPageConfigSchema.parse({})

export class ConfigError extends Error {
  public readonly errors: ValidationError[]

  constructor(errors: ValidationError[]) {
    const details = errors.map(e => `  - ${e.path}: ${e.message}`).join('\n')
    super(`Invalid extensions page config:\n${details}`)
    this.name = 'ConfigError'
    this.errors = errors
  }
}

/**
 * @throws {ConfigError} If a field is invalid
 */
export function resolveConfig(input: ExtensionsPageConfigInput = {}): ExtensionsPageConfig {
  const result = extensionsPageConfigSchema.safeParse(input)
  if (!result.success) {
    throw new ConfigError(formatZodErrors(result.error))
  }
  return result.data
}
