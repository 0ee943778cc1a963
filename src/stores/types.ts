import type {
  CommandResult,
  ExtensionFilter,
  ExtensionManifest,
  ExtensionStatus,
  ExtensionStore,
  ExtensionStoreEvent,
  RemoteExtension,
  Unsubscribe,
} from '@/lib/extensions/types'
import type { ExtensionsPageConfig } from '@/lib/config'
import type { Telemetry } from '@/lib/telemetry'

// ============================================================================
// Dependencies
// ============================================================================

/** Collaborators a page store is bound to for its whole lifetime */
export interface ExtensionsPageDeps {
  store: ExtensionStore
  telemetry: Telemetry
  config: ExtensionsPageConfig
}

// ============================================================================
// Entries
// ============================================================================

/** A row in the page list: dev extensions first, then filtered remote entries */
export type PageEntry =
  | { kind: 'dev'; manifest: ExtensionManifest }
  | { kind: 'remote'; extension: RemoteExtension }

// ============================================================================
// Toasts Slice
// ============================================================================

export type ToastType = 'error' | 'success' | 'info'

export interface ToastMessage {
  id: string
  type: ToastType
  message: string
  /** Auto-dismiss delay; 0 keeps the toast until removed */
  duration: number
}

export interface ToastsSlice {
  toasts: ToastMessage[]
  addToast: (type: ToastType, message: string, duration?: number) => void
  removeToast: (id: string) => void
}

// ============================================================================
// Extensions Page Slice
// ============================================================================

export interface ExtensionsPageSlice {
  // ═══════════════════════════════════════════════════════════════
  // State
  // ═══════════════════════════════════════════════════════════════
  /** Resolved page configuration, fixed for the store's lifetime */
  readonly config: ExtensionsPageConfig
  filter: ExtensionFilter
  /** Raw text of the search box */
  searchQuery: string
  isFetchingExtensions: boolean
  remoteExtensionEntries: RemoteExtension[]
  devExtensionEntries: ExtensionManifest[]
  /** Indices into remoteExtensionEntries that pass the active filter, ascending */
  filteredRemoteExtensionIndices: number[]
  /** Set when a search fetch failed; cleared on the next edit */
  queryContainsError: boolean
  fetchError: string | null
  /** Bumped on every store notification so status-dependent views re-render */
  statusRevision: number

  // ═══════════════════════════════════════════════════════════════
  // Actions
  // ═══════════════════════════════════════════════════════════════
  setFilter: (filter: ExtensionFilter) => void
  setSearchQuery: (text: string) => void
  filterExtensionEntries: () => void
  fetchExtensions: (search?: string) => Promise<void>
  fetchExtensionsDebounced: () => void
  handleStoreEvent: (event: ExtensionStoreEvent) => void

  installExtension: (extensionId: string, version: string) => Promise<CommandResult>
  uninstallExtension: (extensionId: string) => Promise<CommandResult>
  upgradeExtension: (extensionId: string, version: string) => Promise<CommandResult>
  uninstallDevExtension: (extensionId: string) => Promise<CommandResult>
  rebuildDevExtension: (extensionId: string) => Promise<CommandResult>
  installDevExtension: (path: string) => Promise<CommandResult>

  /** Subscribe to the store and run the initial fetch; returns the teardown */
  connect: () => Unsubscribe
  /** Cancel the pending debounced fetch and any in-flight fetch */
  dispose: () => void

  // ═══════════════════════════════════════════════════════════════
  // Getters
  // ═══════════════════════════════════════════════════════════════
  /** The query to search with, or undefined when it is blank */
  searchText: () => string | undefined
  getExtensionStatus: (extensionId: string) => ExtensionStatus
}

export type ExtensionsPageState = ExtensionsPageSlice & ToastsSlice
