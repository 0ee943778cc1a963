import type { TabLabel, WorkspaceItem } from '@/lib/workspace'
import { PAGE_TELEMETRY_TEXT } from '@/lib/telemetry'
import type { ExtensionsPageStore } from '@/stores/extensionsPageStore'

export const EXTENSIONS_PAGE_KIND = 'extensions'

export interface ExtensionsPageItem extends WorkspaceItem {
  readonly kind: typeof EXTENSIONS_PAGE_KIND
  readonly pageStore: ExtensionsPageStore
}

/**
 * Wrap a page store as a workspace item. The page has no toolbar and is not
 * duplicated when its pane splits.
 */
export function createExtensionsPageItem(pageStore: ExtensionsPageStore): ExtensionsPageItem {
  return {
    kind: EXTENSIONS_PAGE_KIND,
    pageStore,
    telemetryEventText: PAGE_TELEMETRY_TEXT,
    showToolbar: false,
    tabLabel(selected: boolean): TabLabel {
      return { text: 'Extensions', muted: !selected }
    },
    cloneOnSplit() {
      return null
    },
  }
}

export function isExtensionsPageItem(item: WorkspaceItem): item is ExtensionsPageItem {
  return item.kind === EXTENSIONS_PAGE_KIND
}
