import type { ExtensionFilter } from '@/lib/extensions/types'

const FILTER_NOUNS: Record<ExtensionFilter, string> = {
  'all': 'extensions',
  'installed': 'installed extensions',
  'not-installed': 'not installed extensions',
}

/**
 * Message shown in place of the list when it has no rows.
 */
export function emptyStateMessage(isFetching: boolean, filter: ExtensionFilter, hasSearch: boolean): string {
  if (isFetching) return 'Loading extensions...'

  const noun = FILTER_NOUNS[filter]
  return hasSearch ? `No ${noun} that match your search.` : `No ${noun}.`
}
