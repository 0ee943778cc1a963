import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { InMemoryExtensionStore } from '@/lib/extensions/InMemoryExtensionStore'
import type { RemoteExtension } from '@/lib/extensions/types'
import type { ExtensionsPageConfigInput } from '@/lib/config'
import { createExtensionsPageStore, type ExtensionsPageStore } from '../extensionsPageStore'
import { gleam, myTheme, sampleSeed, zig } from '@/test/fixtures'

let store: InMemoryExtensionStore
let pageStore: ExtensionsPageStore
const reportAppEvent = vi.fn()

function setup(config?: ExtensionsPageConfigInput, seed: unknown = sampleSeed()) {
  store = new InMemoryExtensionStore(seed)
  pageStore = createExtensionsPageStore({ store, telemetry: { reportAppEvent }, config })
}

const state = () => pageStore.getState()

function deferred<T>() {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>(r => {
    resolve = r
  })
  return { promise, resolve }
}

beforeEach(() => {
  vi.useFakeTimers()
  reportAppEvent.mockReset()
  setup()
})

afterEach(() => {
  state().dispose()
  vi.useRealTimers()
  vi.restoreAllMocks()
})

describe('extensionsPageSlice', () => {
  describe('fetchExtensions', () => {
    it('loads remote and dev entries and shows everything under "all"', async () => {
      await state().fetchExtensions()

      expect(state().remoteExtensionEntries.map(e => e.id)).toEqual(['gleam', 'elixir', 'zig'])
      expect(state().devExtensionEntries).toEqual([myTheme])
      expect(state().filteredRemoteExtensionIndices).toEqual([0, 1, 2])
      expect(state().isFetchingExtensions).toBe(false)
      expect(state().fetchError).toBeNull()
    })

    it('marks the page as fetching until the store answers', async () => {
      const pending = deferred<RemoteExtension[]>()
      vi.spyOn(store, 'fetchExtensions').mockReturnValueOnce(pending.promise)

      const fetching = state().fetchExtensions()
      expect(state().isFetchingExtensions).toBe(true)

      pending.resolve([gleam])
      await fetching
      expect(state().isFetchingExtensions).toBe(false)
    })

    it('fuzzy-matches dev extensions by name, best match first', async () => {
      setup(undefined, {
        ...sampleSeed(),
        dev: [myTheme, { id: 'theme-tools', name: 'Theme Tools', version: '1.0.0' }],
      })

      await state().fetchExtensions('theme')

      expect(state().devExtensionEntries.map(m => m.id)).toEqual(['theme-tools', 'my-theme'])
    })

    it('caps dev matches with maxDevMatches', async () => {
      setup({ maxDevMatches: 1 }, {
        ...sampleSeed(),
        dev: [myTheme, { id: 'theme-tools', name: 'Theme Tools', version: '1.0.0' }],
      })

      await state().fetchExtensions('theme')

      expect(state().devExtensionEntries.map(m => m.id)).toEqual(['theme-tools'])
    })

    it('keeps only the newest result when fetches overlap', async () => {
      const first = deferred<RemoteExtension[]>()
      const second = deferred<RemoteExtension[]>()
      const signals: Array<AbortSignal | undefined> = []
      vi.spyOn(store, 'fetchExtensions')
        .mockImplementationOnce((_search, signal) => {
          signals.push(signal)
          return first.promise
        })
        .mockImplementationOnce((_search, signal) => {
          signals.push(signal)
          return second.promise
        })

      const older = state().fetchExtensions('gl')
      const newer = state().fetchExtensions('zig')
      expect(signals.map(s => s?.aborted)).toEqual([true, false])

      second.resolve([zig])
      await newer
      first.resolve([gleam])
      await older

      expect(state().remoteExtensionEntries).toEqual([zig])
      expect(state().isFetchingExtensions).toBe(false)
    })

    it('records a failed search as a query error', async () => {
      vi.spyOn(store, 'fetchExtensions').mockRejectedValueOnce(new Error('registry unavailable'))

      await state().fetchExtensions('zig')

      expect(state().fetchError).toBe('registry unavailable')
      expect(state().queryContainsError).toBe(true)
      expect(state().isFetchingExtensions).toBe(false)
      expect(state().devExtensionEntries).toEqual([])
    })

    it('does not flag the query when an unfiltered fetch fails', async () => {
      vi.spyOn(store, 'fetchExtensions').mockRejectedValueOnce(new Error('registry unavailable'))

      await state().fetchExtensions()

      expect(state().fetchError).toBe('registry unavailable')
      expect(state().queryContainsError).toBe(false)
    })

    it('keeps the previous entries when a fetch fails', async () => {
      await state().fetchExtensions()
      vi.spyOn(store, 'fetchExtensions').mockRejectedValueOnce(new Error('registry unavailable'))

      await state().fetchExtensions('zig')

      expect(state().remoteExtensionEntries.map(e => e.id)).toEqual(['gleam', 'elixir', 'zig'])
      expect(state().filteredRemoteExtensionIndices).toEqual([0, 1, 2])
      expect(state().fetchError).toBe('registry unavailable')
    })

    it('ignores a failure that was superseded', async () => {
      const first = deferred<RemoteExtension[]>()
      vi.spyOn(store, 'fetchExtensions')
        .mockImplementationOnce(() => first.promise.then(() => Promise.reject(new Error('aborted'))))

      const older = state().fetchExtensions('gl')
      await state().fetchExtensions()
      first.resolve([])
      await older

      expect(state().fetchError).toBeNull()
      expect(state().remoteExtensionEntries).toHaveLength(3)
    })
  })

  describe('filter', () => {
    beforeEach(async () => {
      await state().fetchExtensions()
    })

    it('keeps indices of installed entries', () => {
      state().setFilter('installed')
      expect(state().filteredRemoteExtensionIndices).toEqual([1])
    })

    it('keeps indices of not installed entries', () => {
      state().setFilter('not-installed')
      expect(state().filteredRemoteExtensionIndices).toEqual([0, 2])
    })

    it('restores every index under "all"', () => {
      state().setFilter('installed')
      state().setFilter('all')
      expect(state().filteredRemoteExtensionIndices).toEqual([0, 1, 2])
    })
  })

  describe('search', () => {
    beforeEach(async () => {
      await state().fetchExtensions()
    })

    it('waits for the debounce delay before fetching', async () => {
      const fetchSpy = vi.spyOn(store, 'fetchExtensions')

      state().setSearchQuery('eli')
      expect(state().searchQuery).toBe('eli')
      await vi.advanceTimersByTimeAsync(249)
      expect(fetchSpy).not.toHaveBeenCalled()

      await vi.advanceTimersByTimeAsync(1)
      expect(fetchSpy).toHaveBeenCalledTimes(1)
      expect(fetchSpy).toHaveBeenCalledWith('eli', expect.any(AbortSignal))
      expect(state().remoteExtensionEntries.map(e => e.id)).toEqual(['elixir'])
      expect(state().devExtensionEntries).toEqual([])
    })

    it('fetches once for a burst of edits, with the latest text', async () => {
      const fetchSpy = vi.spyOn(store, 'fetchExtensions')

      state().setSearchQuery('g')
      await vi.advanceTimersByTimeAsync(100)
      state().setSearchQuery('gl')
      await vi.advanceTimersByTimeAsync(250)

      expect(fetchSpy).toHaveBeenCalledTimes(1)
      expect(fetchSpy).toHaveBeenCalledWith('gl', expect.any(AbortSignal))
    })

    it('reloads at once when the query is cleared', () => {
      const fetchSpy = vi.spyOn(store, 'fetchExtensions')

      state().setSearchQuery('   ')

      expect(fetchSpy).toHaveBeenCalledWith(undefined, expect.any(AbortSignal))
    })

    it('honours a configured debounce delay', async () => {
      setup({ searchDebounceMs: 50 })
      const fetchSpy = vi.spyOn(store, 'fetchExtensions')

      state().setSearchQuery('zig')
      await vi.advanceTimersByTimeAsync(50)

      expect(fetchSpy).toHaveBeenCalledWith('zig', expect.any(AbortSignal))
    })

    it('clears the query error on the next edit', async () => {
      vi.spyOn(store, 'fetchExtensions').mockRejectedValueOnce(new Error('bad query'))
      await state().fetchExtensions('zig')
      expect(state().queryContainsError).toBe(true)

      state().setSearchQuery('zi')

      expect(state().queryContainsError).toBe(false)
    })

    it('returns the raw query only when it has content', () => {
      state().setSearchQuery('  zig ')
      expect(state().searchText()).toBe('  zig ')
      state().setSearchQuery(' ')
      expect(state().searchText()).toBeUndefined()
    })
  })

  describe('commands', () => {
    it('installs and reports the install event', async () => {
      const result = await state().installExtension('gleam', '0.4.1')

      expect(result).toEqual({ success: true })
      expect(reportAppEvent).toHaveBeenCalledWith('extensions: install extension')
      expect(state().getExtensionStatus('gleam')).toEqual({ state: 'installed', version: '0.4.1' })
    })

    it('reports upgrades as installs', async () => {
      await state().upgradeExtension('elixir', '1.2.0')
      expect(reportAppEvent).toHaveBeenCalledWith('extensions: install extension')
    })

    it('reports uninstalls', async () => {
      await state().uninstallExtension('elixir')
      expect(reportAppEvent).toHaveBeenCalledWith('extensions: uninstall extension')
    })

    it('does not report dev extension commands', async () => {
      await state().rebuildDevExtension('my-theme')
      await state().installDevExtension('/src/lua')
      await state().uninstallDevExtension('my-theme')

      expect(reportAppEvent).not.toHaveBeenCalled()
      expect(store.devExtensions().map(m => m.id)).toEqual(['lua'])
    })

    it('returns failures and shows a toast', async () => {
      const result = await state().installExtension('elixir', '1.2.0')

      expect(result).toEqual({
        success: false,
        error: 'Cannot install "elixir" while it is installed',
      })
      expect(state().toasts).toHaveLength(1)
      expect(state().toasts[0]).toMatchObject({
        type: 'error',
        message: 'Failed to install elixir: Cannot install "elixir" while it is installed',
      })
    })

    it('returns dev install failures without a toast', async () => {
      const result = await state().installDevExtension('/nowhere')

      expect(result).toEqual({
        success: false,
        error: 'No extension manifest found in "/nowhere"',
      })
      expect(state().toasts).toEqual([])
    })
  })

  describe('connect', () => {
    it('fetches on connect and refreshes after store updates', async () => {
      const disconnect = state().connect()
      await vi.runAllTimersAsync()
      state().setFilter('installed')
      expect(state().filteredRemoteExtensionIndices).toEqual([1])

      await state().installExtension('gleam', '0.4.1')
      await vi.runAllTimersAsync()

      expect(state().statusRevision).toBe(3)
      expect(state().filteredRemoteExtensionIndices).toEqual([0, 1])
      disconnect()
    })

    it('only re-renders on a status change', async () => {
      await state().fetchExtensions()
      state().setFilter('installed')
      await store.installExtension('gleam', '0.4.1')
      const fetchSpy = vi.spyOn(store, 'fetchExtensions')

      state().handleStoreEvent({ type: 'status-changed', extensionId: 'gleam' })
      await vi.advanceTimersByTimeAsync(500)

      expect(state().statusRevision).toBe(1)
      expect(state().filteredRemoteExtensionIndices).toEqual([1])
      expect(fetchSpy).not.toHaveBeenCalled()
    })

    it('re-runs the active search when reconnected', async () => {
      let disconnect = state().connect()
      await vi.runAllTimersAsync()
      state().setSearchQuery('zig')
      await vi.advanceTimersByTimeAsync(250)
      expect(state().remoteExtensionEntries.map(e => e.id)).toEqual(['zig'])

      disconnect()
      const fetchSpy = vi.spyOn(store, 'fetchExtensions')
      disconnect = state().connect()
      await vi.runAllTimersAsync()

      expect(fetchSpy).toHaveBeenCalledWith('zig', expect.any(AbortSignal))
      expect(state().searchQuery).toBe('zig')
      expect(state().remoteExtensionEntries.map(e => e.id)).toEqual(['zig'])
      disconnect()
    })

    it('runs a search whose debounce was cancelled by a disconnect', async () => {
      let disconnect = state().connect()
      await vi.runAllTimersAsync()
      state().setSearchQuery('eli')
      disconnect()

      disconnect = state().connect()
      await vi.runAllTimersAsync()

      expect(state().remoteExtensionEntries.map(e => e.id)).toEqual(['elixir'])
      disconnect()
    })

    it('stops listening and cancels a pending search on disconnect', async () => {
      const disconnect = state().connect()
      await vi.runAllTimersAsync()
      const fetchSpy = vi.spyOn(store, 'fetchExtensions')

      state().setSearchQuery('zig')
      disconnect()
      await vi.advanceTimersByTimeAsync(500)
      await store.installExtension('gleam', '0.4.1')

      expect(fetchSpy).not.toHaveBeenCalled()
      expect(state().statusRevision).toBe(0)
    })
  })
})

describe('toasts', () => {
  it('adds and removes toasts', () => {
    state().addToast('info', 'Hello')
    const [toast] = state().toasts
    expect(toast).toMatchObject({ type: 'info', message: 'Hello', duration: 5000 })

    state().removeToast(toast?.id ?? '')
    expect(state().toasts).toEqual([])
  })
})
