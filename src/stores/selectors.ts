// Derived state for the Extensions page.
//
// Components select the raw slices with usePageStore(useShallow(...)) and
// derive the row list here under useMemo, so the selector output stays
// referentially stable between renders.

import { useMemo } from 'react'
import { useShallow } from 'zustand/react/shallow'
import { includeDevExtensions, type ExtensionFilter, type ExtensionManifest, type RemoteExtension } from '@/lib/extensions/types'
import { usePageStore } from '@/features/extensions/ExtensionsPageContext'
import type { PageEntry } from './types'

/**
 * Rows in display order: dev extensions (when the filter shows them), then
 * the remote entries at the filtered indices.
 */
export function buildVisibleEntries(
  devEntries: ExtensionManifest[],
  remoteEntries: RemoteExtension[],
  filteredIndices: number[],
  filter: ExtensionFilter
): PageEntry[] {
  const rows: PageEntry[] = []
  if (includeDevExtensions(filter)) {
    for (const manifest of devEntries) {
      rows.push({ kind: 'dev', manifest })
    }
  }
  for (const ix of filteredIndices) {
    const extension = remoteEntries[ix]
    if (extension) rows.push({ kind: 'remote', extension })
  }
  return rows
}

/**
 * Get the rows the list should render
 */
export function useVisibleEntries(): PageEntry[] {
  const { devExtensionEntries, remoteExtensionEntries, filteredRemoteExtensionIndices, filter } = usePageStore(
    useShallow(s => ({
      devExtensionEntries: s.devExtensionEntries,
      remoteExtensionEntries: s.remoteExtensionEntries,
      filteredRemoteExtensionIndices: s.filteredRemoteExtensionIndices,
      filter: s.filter,
    }))
  )

  return useMemo(
    () => buildVisibleEntries(devExtensionEntries, remoteExtensionEntries, filteredRemoteExtensionIndices, filter),
    [devExtensionEntries, remoteExtensionEntries, filteredRemoteExtensionIndices, filter]
  )
}

/**
 * Get an extension's current status, re-rendering on every store notification
 */
export function useExtensionStatus(extensionId: string) {
  usePageStore(s => s.statusRevision)
  const getExtensionStatus = usePageStore(s => s.getExtensionStatus)
  return getExtensionStatus(extensionId)
}
