/**
 * ExtensionList - rows of the Extensions page, or the empty state
 */
import { RefreshCw } from 'lucide-react'
import { useVisibleEntries } from '@/stores/selectors'
import { usePageStore } from './ExtensionsPageContext'
import { RemoteExtensionCard, DevExtensionCard } from './ExtensionCard'
import { emptyStateMessage } from './emptyState'

export function ExtensionList() {
  const entries = useVisibleEntries()
  const isFetching = usePageStore(s => s.isFetchingExtensions)
  const filter = usePageStore(s => s.filter)
  const hasSearch = usePageStore(s => s.searchQuery.trim().length > 0)

  if (entries.length === 0) {
    return (
      <div className="py-4 flex items-center gap-2 text-gray-400">
        {isFetching && <RefreshCw size={16} className="animate-spin" />}
        <span data-testid="extensions-empty-state">{emptyStateMessage(isFetching, filter, hasSearch)}</span>
      </div>
    )
  }

  return (
    <div role="list" className="flex-1 overflow-y-auto flex flex-col gap-2 pb-4">
      {entries.map(entry =>
        entry.kind === 'dev' ? (
          <div role="listitem" key={`dev-${entry.manifest.id}`}>
            <DevExtensionCard manifest={entry.manifest} />
          </div>
        ) : (
          <div role="listitem" key={`remote-${entry.extension.id}`}>
            <RemoteExtensionCard extension={entry.extension} />
          </div>
        )
      )}
    </div>
  )
}
