/**
 * ExtensionSearch - query box for the Extensions page
 *
 * Every edit updates the page store, which debounces the re-fetch.
 * The border turns red when the last search fetch failed.
 */
import { forwardRef } from 'react'
import { Search } from 'lucide-react'
import { usePageStore } from './ExtensionsPageContext'

interface ExtensionSearchProps {
  placeholder: string
}

export const ExtensionSearch = forwardRef<HTMLInputElement, ExtensionSearchProps>(
  function ExtensionSearch({ placeholder }, ref) {
    const searchQuery = usePageStore(s => s.searchQuery)
    const queryContainsError = usePageStore(s => s.queryContainsError)
    const setSearchQuery = usePageStore(s => s.setSearchQuery)

    return (
      <div
        data-error={queryContainsError || undefined}
        className={`flex flex-1 items-center gap-2 px-2 py-1 min-w-[24rem] rounded-lg border ${
          queryContainsError ? 'border-red-500' : 'border-gray-700'
        }`}
      >
        <Search size={16} className="text-gray-500 shrink-0" />
        <input
          ref={ref}
          type="text"
          placeholder={placeholder}
          value={searchQuery}
          onChange={e => setSearchQuery(e.target.value)}
          className="w-full bg-transparent text-sm text-gray-200 placeholder-gray-500 focus:outline-none"
        />
      </div>
    )
  }
)
