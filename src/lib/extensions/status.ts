import type { ExtensionFilter, ExtensionStatus } from './types'

/**
 * Whether an entry with `status` belongs in the list for `filter`.
 * Transitional states (installing, upgrading, removing) only show under "All".
 */
export function matchesFilter(filter: ExtensionFilter, status: ExtensionStatus): boolean {
  switch (filter) {
    case 'all':
      return true
    case 'installed':
      return status.state === 'installed'
    case 'not-installed':
      return status.state === 'not-installed'
  }
}

export function isBusy(status: ExtensionStatus): boolean {
  return status.state === 'installing' || status.state === 'upgrading' || status.state === 'removing'
}

export function statusLabel(status: ExtensionStatus): string {
  switch (status.state) {
    case 'not-installed':
      return 'Not installed'
    case 'installing':
      return 'Installing'
    case 'installed':
      return `Installed v${status.version}`
    case 'upgrading':
      return 'Upgrading'
    case 'removing':
      return 'Removing'
  }
}
