/**
 * Extension manifest and registry entry validation
 *
 * Uses Zod for runtime validation of dev extension manifests and registry
 * payloads. Errors carry JSON paths for debugging.
 *
 * @module extensions/manifest
 */

import { z } from 'zod'
import type {
  ExtensionManifest,
  RemoteExtension,
  ValidationError,
  ValidationResult,
} from './types'

// ═══════════════════════════════════════════════════════════════════════════════
// ZOD SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Extension ID: lowercase letters, digits, hyphens and underscores
 */
const extensionIdSchema = z
  .string()
  .regex(
    /^[a-z0-9][a-z0-9_-]*$/,
    'Extension ID must use lowercase letters, numbers, hyphens and underscores'
  )

const versionSchema = z
  .string()
  .regex(
    /^\d+\.\d+\.\d+(-[a-zA-Z0-9.-]+)?(\+[a-zA-Z0-9.-]+)?$/,
    'Version must be a valid semantic version (e.g., "1.2.3")'
  )

const authorsSchema = z.array(z.string().min(1, 'Author name is required'))

export const extensionManifestSchema = z.object({
  id: extensionIdSchema,
  name: z.string().min(1, 'Extension name is required').max(100, 'Name too long'),
  version: versionSchema,
  authors: authorsSchema.default([]),
  description: z.string().max(500, 'Description too long').optional(),
  repository: z.string().url('Repository must be a valid URL').optional(),
})

export const remoteExtensionSchema = z.object({
  id: extensionIdSchema,
  name: z.string().min(1, 'Extension name is required'),
  version: versionSchema,
  authors: authorsSchema,
  description: z.string().optional(),
  repository: z.string().url('Repository must be a valid URL'),
  downloadCount: z.number().int().nonnegative(),
})

const remoteExtensionListSchema = z.array(remoteExtensionSchema)

// ═══════════════════════════════════════════════════════════════════════════════
// PARSERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Parse and validate a dev extension manifest.
 *
 * @throws {ManifestParseError} If validation fails
 */
export function parseManifest(json: unknown): ExtensionManifest {
  const result = extensionManifestSchema.safeParse(json)
  if (!result.success) {
    throw new ManifestParseError(formatZodErrors(result.error))
  }
  return result.data
}

export function validateManifest(json: unknown): ValidationResult<ExtensionManifest> {
  const result = extensionManifestSchema.safeParse(json)
  if (result.success) {
    return { valid: true, value: result.data }
  }
  return { valid: false, errors: formatZodErrors(result.error) }
}

/**
 * Parse a registry payload (an array of entries).
 *
 * @throws {ManifestParseError} If any entry is invalid
 */
export function parseRemoteExtensions(json: unknown): RemoteExtension[] {
  const result = remoteExtensionListSchema.safeParse(json)
  if (!result.success) {
    throw new ManifestParseError(formatZodErrors(result.error))
  }
  return result.data
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLING
// ═══════════════════════════════════════════════════════════════════════════════

export class ManifestParseError extends Error {
  public readonly errors: ValidationError[]

  constructor(errors: ValidationError[]) {
    const summary = errors.slice(0, 3).map(e => `  - ${e.path}: ${e.message}`).join('\n')
    const more = errors.length > 3 ? `\n  ... and ${errors.length - 3} more errors` : ''

    super(`Invalid extension data:\n${summary}${more}`)
    this.name = 'ManifestParseError'
    this.errors = errors
  }
}

export function formatZodErrors(zodError: z.ZodError): ValidationError[] {
  return zodError.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
  }))
}
