/**
 * Extensions Page Slice - state for one Extensions page
 *
 * This slice manages:
 * - Remote entries fetched from the ExtensionStore and the filtered view of them
 * - Dev extension manifests, fuzzy-matched against the search text
 * - Debounced re-fetching as the search query changes
 * - Forwarding install / uninstall / upgrade / rebuild commands to the store
 *
 * The ExtensionStore does the actual work; nothing here is persisted.
 */
import type { StateCreator } from 'zustand'
import type {
  CommandResult,
  ExtensionFilter,
  ExtensionManifest,
  ExtensionStoreEvent,
} from '@/lib/extensions/types'
import type { ExtensionsPageDeps, ExtensionsPageSlice, ExtensionsPageState } from '../types'
import { matchStrings } from '@/lib/extensions/fuzzy'
import { matchesFilter } from '@/lib/extensions/status'
import { TELEMETRY_EVENTS } from '@/lib/telemetry'
import { errorMessage, log } from '@/lib/logger'

// Initial state
const initialState: Pick<
  ExtensionsPageSlice,
  | 'filter'
  | 'searchQuery'
  | 'isFetchingExtensions'
  | 'remoteExtensionEntries'
  | 'devExtensionEntries'
  | 'filteredRemoteExtensionIndices'
  | 'queryContainsError'
  | 'fetchError'
  | 'statusRevision'
> = {
  filter: 'all',
  searchQuery: '',
  isFetchingExtensions: false,
  remoteExtensionEntries: [],
  devExtensionEntries: [],
  filteredRemoteExtensionIndices: [],
  queryContainsError: false,
  fetchError: null,
  statusRevision: 0,
}

export function createExtensionsPageSlice({
  store,
  telemetry,
  config,
}: ExtensionsPageDeps): StateCreator<ExtensionsPageState, [], [], ExtensionsPageSlice> {
  return (set, get) => {
    let debounceTimer: ReturnType<typeof setTimeout> | null = null
    let fetchController: AbortController | null = null
    // Only the latest fetch may write its result
    let fetchGeneration = 0

    const cancelDebounce = () => {
      if (debounceTimer !== null) {
        clearTimeout(debounceTimer)
        debounceTimer = null
      }
    }

    const matchDevExtensions = (manifests: ExtensionManifest[], search: string) => {
      const candidates = manifests.map((manifest, id) => ({ id, string: manifest.name }))
      return matchStrings(candidates, search, { maxResults: config.maxDevMatches })
        .map(match => manifests[match.candidateId])
    }

    const runCommand = async (
      action: string,
      target: string,
      run: () => Promise<void>,
      { toast = true }: { toast?: boolean } = {}
    ): Promise<CommandResult> => {
      try {
        log.info('[Extensions]', `Requesting ${action}`, { target })
        await run()
        return { success: true }
      } catch (err) {
        const error = errorMessage(err)
        log.error('[Extensions]', `Failed to ${action}`, { target, error })
        if (toast) get().addToast('error', `Failed to ${action} ${target}: ${error}`)
        return { success: false, error }
      }
    }

    return {
      // Initial state
      ...initialState,
      config,

      // ═══════════════════════════════════════════════════════════════════════
      // Filtering & Search
      // ═══════════════════════════════════════════════════════════════════════

      setFilter: (filter: ExtensionFilter) => {
        set({ filter })
        get().filterExtensionEntries()
      },

      setSearchQuery: (text: string) => {
        set({ searchQuery: text, queryContainsError: false })
        get().fetchExtensionsDebounced()
      },

      filterExtensionEntries: () => {
        const { remoteExtensionEntries, filter } = get()
        const indices: number[] = []
        remoteExtensionEntries.forEach((extension, ix) => {
          if (matchesFilter(filter, store.extensionStatus(extension.id))) {
            indices.push(ix)
          }
        })
        set({ filteredRemoteExtensionIndices: indices })
      },

      // ═══════════════════════════════════════════════════════════════════════
      // Fetching
      // ═══════════════════════════════════════════════════════════════════════

      fetchExtensions: async (search?: string) => {
        const generation = ++fetchGeneration
        fetchController?.abort()
        const controller = new AbortController()
        fetchController = controller

        set({ isFetchingExtensions: true })

        const devManifests = store.devExtensions()
        const devEntries = search !== undefined ? matchDevExtensions(devManifests, search) : devManifests

        try {
          const remote = await store.fetchExtensions(search, controller.signal)
          if (generation !== fetchGeneration) return

          set({
            devExtensionEntries: devEntries,
            isFetchingExtensions: false,
            remoteExtensionEntries: remote,
            fetchError: null,
          })
          get().filterExtensionEntries()
          log.debug('[Extensions]', 'Fetched extensions', {
            search,
            remote: remote.length,
            dev: devEntries.length,
          })
        } catch (err) {
          // Superseded or disposed; the newer fetch owns the state
          if (generation !== fetchGeneration) return

          const error = errorMessage(err)
          log.error('[Extensions]', 'Failed to fetch extensions', { search, error })
          set({
            devExtensionEntries: devEntries,
            isFetchingExtensions: false,
            fetchError: error,
            queryContainsError: search !== undefined,
          })
        } finally {
          if (fetchController === controller) fetchController = null
        }
      },

      fetchExtensionsDebounced: () => {
        cancelDebounce()
        const search = get().searchText()

        // A cleared search reloads at once, so the list never flashes empty
        if (search === undefined) {
          void get().fetchExtensions()
          return
        }

        debounceTimer = setTimeout(() => {
          debounceTimer = null
          void get().fetchExtensions(search)
        }, config.searchDebounceMs)
      },

      handleStoreEvent: (event: ExtensionStoreEvent) => {
        set(state => ({ statusRevision: state.statusRevision + 1 }))
        if (event.type === 'extensions-updated') {
          get().fetchExtensionsDebounced()
        }
      },

      // ═══════════════════════════════════════════════════════════════════════
      // Commands
      // ═══════════════════════════════════════════════════════════════════════

      installExtension: (extensionId: string, version: string) => {
        telemetry.reportAppEvent(TELEMETRY_EVENTS.INSTALL_EXTENSION)
        return runCommand('install', extensionId, () => store.installExtension(extensionId, version))
      },

      uninstallExtension: (extensionId: string) => {
        telemetry.reportAppEvent(TELEMETRY_EVENTS.UNINSTALL_EXTENSION)
        return runCommand('uninstall', extensionId, () => store.uninstallExtension(extensionId))
      },

      upgradeExtension: (extensionId: string, version: string) => {
        telemetry.reportAppEvent(TELEMETRY_EVENTS.INSTALL_EXTENSION)
        return runCommand('upgrade', extensionId, () => store.upgradeExtension(extensionId, version))
      },

      uninstallDevExtension: (extensionId: string) =>
        runCommand('uninstall', extensionId, () => store.uninstallExtension(extensionId)),

      rebuildDevExtension: (extensionId: string) =>
        runCommand('rebuild', extensionId, () => store.rebuildDevExtension(extensionId)),

      // The Add Dev Extension dialog shows the failure itself
      installDevExtension: (path: string) =>
        runCommand('install dev extension from', path, () => store.installDevExtension(path), {
          toast: false,
        }),

      // ═══════════════════════════════════════════════════════════════════════
      // Lifecycle
      // ═══════════════════════════════════════════════════════════════════════

      connect: () => {
        const unsubscribe = store.subscribe(event => get().handleStoreEvent(event))
        // A remounted page keeps its query; refetch with it
        void get().fetchExtensions(get().searchText())
        return () => {
          unsubscribe()
          get().dispose()
        }
      },

      dispose: () => {
        cancelDebounce()
        fetchGeneration++
        fetchController?.abort()
        fetchController = null
      },

      // ═══════════════════════════════════════════════════════════════════════
      // Getters
      // ═══════════════════════════════════════════════════════════════════════

      searchText: () => {
        const { searchQuery } = get()
        return searchQuery.trim() ? searchQuery : undefined
      },

      getExtensionStatus: (extensionId: string) => store.extensionStatus(extensionId),
    }
  }
}
