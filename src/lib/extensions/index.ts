/**
 * Extension data model - Public API
 *
 * Types, validation, matching and the reference store behind the
 * Extensions page.
 *
 * @module extensions
 *
 * @example
 * import { InMemoryExtensionStore, parseManifest } from '@/lib/extensions'
 */

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  ExtensionManifest,
  RemoteExtension,
  ExtensionStatus,
  ExtensionState,
  ExtensionFilter,
  ExtensionStore,
  ExtensionStoreEvent,
  ExtensionStoreListener,
  Unsubscribe,
  CommandResult,
  ValidationError,
  ValidationResult,
} from './types'

export { EXTENSION_FILTERS, includeDevExtensions } from './types'

// ═══════════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════════

export {
  extensionManifestSchema,
  remoteExtensionSchema,
  parseManifest,
  validateManifest,
  parseRemoteExtensions,
  ManifestParseError,
} from './manifest'

// ═══════════════════════════════════════════════════════════════════════════════
// MATCHING & STATUS
// ═══════════════════════════════════════════════════════════════════════════════

export { matchStrings } from './fuzzy'
export type { StringMatch, StringMatchCandidate, MatchOptions } from './fuzzy'

export { matchesFilter, isBusy, statusLabel } from './status'

// ═══════════════════════════════════════════════════════════════════════════════
// REFERENCE STORE
// ═══════════════════════════════════════════════════════════════════════════════

export { InMemoryExtensionStore } from './InMemoryExtensionStore'
export type { ExtensionStoreSeed, InMemoryExtensionStoreOptions } from './InMemoryExtensionStore'
