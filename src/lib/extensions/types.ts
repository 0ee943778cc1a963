/**
 * Extensions page types
 *
 * The page is a view over an {@link ExtensionStore}: the store owns fetching,
 * installation, dev-extension builds and persistence; the page only filters,
 * searches and forwards commands.
 *
 * @module extensions/types
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Manifest of a dev extension, loaded from a local source directory.
 */
export interface ExtensionManifest {
  /** Unique ID (e.g., "gleam") */
  id: string
  /** Display name */
  name: string
  /** Semantic version */
  version: string
  authors: string[]
  description?: string
  /** Source repository URL */
  repository?: string
}

/**
 * Entry returned by the remote extension registry.
 */
export interface RemoteExtension {
  id: string
  name: string
  /** Latest published version */
  version: string
  authors: string[]
  description?: string
  repository: string
  downloadCount: number
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATUS
// ═══════════════════════════════════════════════════════════════════════════════

export type ExtensionStatus =
  | { state: 'not-installed' }
  | { state: 'installing' }
  | { state: 'installed'; version: string }
  | { state: 'upgrading' }
  | { state: 'removing' }

export type ExtensionState = ExtensionStatus['state']

// ═══════════════════════════════════════════════════════════════════════════════
// FILTER
// ═══════════════════════════════════════════════════════════════════════════════

export type ExtensionFilter = 'all' | 'installed' | 'not-installed'

export const EXTENSION_FILTERS: readonly ExtensionFilter[] = ['all', 'installed', 'not-installed']

/**
 * Dev extensions are always installed, so they are hidden under "Not Installed".
 */
export function includeDevExtensions(filter: ExtensionFilter): boolean {
  return filter !== 'not-installed'
}

// ═══════════════════════════════════════════════════════════════════════════════
// STORE COLLABORATOR
// ═══════════════════════════════════════════════════════════════════════════════

export type ExtensionStoreEvent =
  /** An extension's status changed; views should re-render */
  | { type: 'status-changed'; extensionId: string }
  /** The installed set changed; views should re-fetch */
  | { type: 'extensions-updated' }

export type ExtensionStoreListener = (event: ExtensionStoreEvent) => void

export type Unsubscribe = () => void

/**
 * The extension-management subsystem the page delegates to.
 *
 * Command methods resolve once the store has accepted the request; progress
 * is reported through {@link ExtensionStore.subscribe}.
 */
export interface ExtensionStore {
  /**
   * Fetch registry entries, narrowed by `search` when given.
   * Implementations should reject with an `AbortError` when `signal` aborts.
   */
  fetchExtensions(search: string | undefined, signal?: AbortSignal): Promise<RemoteExtension[]>

  /** Snapshot of the loaded dev extension manifests */
  devExtensions(): ExtensionManifest[]

  extensionStatus(extensionId: string): ExtensionStatus

  installExtension(extensionId: string, version: string): Promise<void>
  uninstallExtension(extensionId: string): Promise<void>
  upgradeExtension(extensionId: string, version: string): Promise<void>
  rebuildDevExtension(extensionId: string): Promise<void>
  /** Install a dev extension from a local source directory */
  installDevExtension(path: string): Promise<void>

  /** The single change-notification channel */
  subscribe(listener: ExtensionStoreListener): Unsubscribe
}

/**
 * Result shape for page commands. Commands never throw into event handlers.
 */
export interface CommandResult {
  success: boolean
  error?: string
}

// ═══════════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════════

export interface ValidationError {
  /** JSON path to the invalid field (e.g., "authors.0") */
  path: string
  message: string
}

export interface ValidationResult<T> {
  valid: boolean
  value?: T
  errors?: ValidationError[]
}
