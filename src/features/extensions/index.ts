/**
 * Extensions Feature - browse, install and manage editor extensions
 */

// Main view
export { ExtensionsPage } from './ExtensionsPage'
export type { ExtensionsPageProps } from './ExtensionsPage'
export { ExtensionsPageProvider, usePageStore, usePageStoreApi, useExtensionsPageHost } from './ExtensionsPageContext'
export type { ExtensionsPageHost } from './ExtensionsPageContext'

// Components
export { ExtensionList } from './ExtensionList'
export { RemoteExtensionCard, DevExtensionCard } from './ExtensionCard'
export { StatusBadge, DevBadge } from './StatusBadge'
export { ExtensionSearch } from './ExtensionSearch'
export { FilterToggle } from './FilterToggle'

// Dialogs
export { AddDevExtensionDialog } from './AddDevExtensionDialog'

// Workspace integration
export { createExtensionsPageItem, isExtensionsPageItem, EXTENSIONS_PAGE_KIND } from './item'
export type { ExtensionsPageItem } from './item'
export { registerExtensionsActions, EXTENSIONS_ACTIONS } from './actions'
export type { ExtensionsActionsOptions } from './actions'
