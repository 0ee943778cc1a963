/**
 * ExtensionsPage - browse, install and manage extensions
 *
 * Layout: header with "Add Dev Extension", then the search box and filter
 * toggle, then the extension list (or its empty state).
 */
import { useEffect, useRef, useState } from 'react'
import { Blocks, Code2 } from 'lucide-react'
import { useExtensionsPage } from '@/hooks/useExtensionsPage'
import type { ExtensionsPageStore } from '@/stores/extensionsPageStore'
import { ExtensionsPageProvider, usePageStore, type ExtensionsPageHost } from './ExtensionsPageContext'
import { ExtensionSearch } from './ExtensionSearch'
import { FilterToggle } from './FilterToggle'
import { ExtensionList } from './ExtensionList'
import { AddDevExtensionDialog } from './AddDevExtensionDialog'
import { Toasts } from './Toasts'

export interface ExtensionsPageProps {
  pageStore: ExtensionsPageStore
  host: ExtensionsPageHost
}

export function ExtensionsPage({ pageStore, host }: ExtensionsPageProps) {
  return (
    <ExtensionsPageProvider pageStore={pageStore} host={host}>
      <ExtensionsPageBody />
    </ExtensionsPageProvider>
  )
}

function ExtensionsPageBody() {
  const [showDevDialog, setShowDevDialog] = useState(false)
  const searchRef = useRef<HTMLInputElement>(null)
  const placeholder = usePageStore(s => s.config.searchPlaceholder)

  useExtensionsPage()

  // The search box takes focus when the page opens
  useEffect(() => {
    searchRef.current?.focus()
  }, [])

  return (
    <div className="flex flex-col h-full bg-gray-900">
      {/* Header */}
      <div className="px-6 py-4 border-b border-gray-800 flex flex-col gap-4">
        <div className="flex items-center justify-between">
          <div className="flex items-center gap-3">
            <Blocks size={24} className="text-blue-400" />
            <h1 className="text-xl font-semibold text-gray-100">Extensions</h1>
          </div>

          <button
            type="button"
            onClick={() => setShowDevDialog(true)}
            className="flex items-center gap-2 px-3 py-1.5 bg-gray-700/50 text-gray-300 rounded-lg hover:bg-gray-700 transition-colors"
          >
            <Code2 size={16} />
            <span className="text-sm">Add Dev Extension</span>
          </button>
        </div>

        {/* Search & filter */}
        <div className="flex items-center gap-2 w-full">
          <ExtensionSearch ref={searchRef} placeholder={placeholder} />
          <FilterToggle />
        </div>
      </div>

      {/* Content */}
      <div className="flex-1 overflow-hidden px-6 pt-4 flex flex-col">
        <ExtensionList />
      </div>

      <AddDevExtensionDialog open={showDevDialog} onClose={() => setShowDevDialog(false)} />
      <Toasts />
    </div>
  )
}
