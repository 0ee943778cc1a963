/**
 * FilterToggle - All / Installed / Not Installed segmented control
 */
import type { ExtensionFilter } from '@/lib/extensions/types'
import { EXTENSION_FILTERS } from '@/lib/extensions/types'
import { usePageStore } from './ExtensionsPageContext'

const filterConfig: Record<ExtensionFilter, { label: string; tooltip: string }> = {
  'all': { label: 'All', tooltip: 'Show all extensions' },
  'installed': { label: 'Installed', tooltip: 'Show installed extensions' },
  'not-installed': { label: 'Not Installed', tooltip: 'Show not installed extensions' },
}

export function FilterToggle() {
  const filter = usePageStore(s => s.filter)
  const setFilter = usePageStore(s => s.setFilter)

  return (
    <div role="group" aria-label="Filter extensions" className="flex items-center border border-gray-700 rounded-lg overflow-hidden">
      {EXTENSION_FILTERS.map(option => {
        const selected = option === filter
        return (
          <button
            key={option}
            type="button"
            aria-pressed={selected}
            title={filterConfig[option].tooltip}
            onClick={() => setFilter(option)}
            className={`px-4 py-2 text-sm transition-colors ${
              selected ? 'bg-blue-600 text-white' : 'text-gray-400 hover:text-gray-200 hover:bg-gray-800'
            }`}
          >
            {filterConfig[option].label}
          </button>
        )
      })}
    </div>
  )
}
