/**
 * useExtensionsPage - bind a page store to the ExtensionStore while mounted
 *
 * Subscribes to store notifications and runs the initial fetch on mount;
 * unsubscribes and cancels pending fetches on unmount.
 *
 * @example
 * ```tsx
 * function ExtensionsPageBody() {
 *   useExtensionsPage()
 *   return <ExtensionList />
 * }
 * ```
 */
import { useEffect } from 'react'
import { usePageStoreApi } from '@/features/extensions/ExtensionsPageContext'

export function useExtensionsPage(): void {
  const pageStore = usePageStoreApi()

  useEffect(() => pageStore.getState().connect(), [pageStore])
}
