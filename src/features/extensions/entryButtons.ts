/**
 * Button model for extension cards.
 *
 * Kept free of React so the status → button mapping can be checked directly.
 */
import type { ExtensionManifest, ExtensionStatus, RemoteExtension } from '@/lib/extensions/types'

export type EntryAction =
  | { kind: 'install'; extensionId: string; version: string }
  | { kind: 'uninstall'; extensionId: string }
  | { kind: 'upgrade'; extensionId: string; version: string }
  | { kind: 'rebuild'; extensionId: string }
  | { kind: 'uninstall-dev'; extensionId: string }

export interface EntryButton {
  /** Stable element ID, unique per card */
  id: string
  label: 'Install' | 'Uninstall' | 'Upgrade' | 'Rebuild'
  disabled: boolean
  /** Present only on enabled buttons */
  action?: EntryAction
}

export interface RemoteEntryButtons {
  primary: EntryButton
  upgrade: EntryButton | null
}

export interface DevEntryButtons {
  rebuild: EntryButton
  uninstall: EntryButton
}

function disabledButton(id: string, label: EntryButton['label']): EntryButton {
  return { id, label, disabled: true }
}

/**
 * Install/uninstall button plus the optional upgrade button for a registry entry.
 * An upgrade is offered only when the installed version differs from the
 * registry's version.
 */
export function buttonsForEntry(extension: RemoteExtension, status: ExtensionStatus): RemoteEntryButtons {
  const { id: extensionId, version } = extension

  switch (status.state) {
    case 'not-installed':
      return {
        primary: {
          id: extensionId,
          label: 'Install',
          disabled: false,
          action: { kind: 'install', extensionId, version },
        },
        upgrade: null,
      }
    case 'installing':
      return { primary: disabledButton(extensionId, 'Install'), upgrade: null }
    case 'upgrading':
      return {
        primary: disabledButton(extensionId, 'Uninstall'),
        upgrade: disabledButton(`upgrade-${extensionId}`, 'Upgrade'),
      }
    case 'installed':
      return {
        primary: {
          id: extensionId,
          label: 'Uninstall',
          disabled: false,
          action: { kind: 'uninstall', extensionId },
        },
        upgrade: status.version === version
          ? null
          : {
              id: `upgrade-${extensionId}`,
              label: 'Upgrade',
              disabled: false,
              action: { kind: 'upgrade', extensionId, version },
            },
      }
    case 'removing':
      return { primary: disabledButton(extensionId, 'Uninstall'), upgrade: null }
  }
}

/**
 * Rebuild is blocked while a build is running; uninstall while removal is.
 */
export function devButtonsForEntry(manifest: ExtensionManifest, status: ExtensionStatus): DevEntryButtons {
  const extensionId = manifest.id
  const rebuildDisabled = status.state === 'upgrading'
  const uninstallDisabled = status.state === 'removing'

  return {
    rebuild: {
      id: `rebuild-${extensionId}`,
      label: 'Rebuild',
      disabled: rebuildDisabled,
      action: rebuildDisabled ? undefined : { kind: 'rebuild', extensionId },
    },
    uninstall: {
      id: extensionId,
      label: 'Uninstall',
      disabled: uninstallDisabled,
      action: uninstallDisabled ? undefined : { kind: 'uninstall-dev', extensionId },
    },
  }
}

export function authorsLabel(authors: string[]): string {
  return `${authors.length > 1 ? 'Authors' : 'Author'}: ${authors.join(', ')}`
}
