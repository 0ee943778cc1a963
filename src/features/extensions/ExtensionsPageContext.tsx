/**
 * ExtensionsPageContext - the page store and host services for one page
 *
 * Each Extensions page owns a store (see createExtensionsPageStore); cards and
 * toolbars read it through usePageStore instead of prop drilling.
 */
import { createContext, useContext, useMemo, type ReactNode } from 'react'
import { useStore } from 'zustand'
import type { ExtensionsPageStore } from '@/stores/extensionsPageStore'
import type { ExtensionsPageState } from '@/stores/types'

/**
 * Services the surrounding editor provides to the page
 */
export interface ExtensionsPageHost {
  openUrl: (url: string) => void
  /** Pick a single directory; resolves null when the user cancels */
  promptForDirectory?: () => Promise<string | null>
}

interface ExtensionsPageContextValue {
  pageStore: ExtensionsPageStore
  host: ExtensionsPageHost
}

const ExtensionsPageContext = createContext<ExtensionsPageContextValue | null>(null)

export interface ExtensionsPageProviderProps {
  pageStore: ExtensionsPageStore
  host: ExtensionsPageHost
  children: ReactNode
}

export function ExtensionsPageProvider({ pageStore, host, children }: ExtensionsPageProviderProps) {
  const value = useMemo(() => ({ pageStore, host }), [pageStore, host])

  return (
    <ExtensionsPageContext.Provider value={value}>
      {children}
    </ExtensionsPageContext.Provider>
  )
}

function useExtensionsPageContext(): ExtensionsPageContextValue {
  const context = useContext(ExtensionsPageContext)
  if (!context) {
    throw new Error('Extensions page hooks must be used within ExtensionsPageProvider')
  }
  return context
}

/**
 * Select from the page store. Use useShallow for object or array selections.
 */
export function usePageStore<T>(selector: (state: ExtensionsPageState) => T): T {
  return useStore(useExtensionsPageContext().pageStore, selector)
}

export function usePageStoreApi(): ExtensionsPageStore {
  return useExtensionsPageContext().pageStore
}

export function useExtensionsPageHost(): ExtensionsPageHost {
  return useExtensionsPageContext().host
}
