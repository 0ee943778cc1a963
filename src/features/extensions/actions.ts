/**
 * Workspace actions for the Extensions page
 *
 * - `extensions` opens a new Extensions page in the active pane
 * - `install-dev-extension` installs an extension from a local directory
 */
import type { ExtensionStore } from '@/lib/extensions/types'
import type { ExtensionsPageConfigInput } from '@/lib/config'
import type { Telemetry } from '@/lib/telemetry'
import type { Workspace } from '@/lib/workspace'
import { registerAction } from '@/lib/actions/registry'
import { errorMessage, log } from '@/lib/logger'
import { createExtensionsPageStore } from '@/stores/extensionsPageStore'
import { createExtensionsPageItem } from './item'

export const EXTENSIONS_ACTIONS = {
  OPEN: 'extensions',
  INSTALL_DEV_EXTENSION: 'install-dev-extension',
} as const

export interface ExtensionsActionsOptions {
  telemetry?: Telemetry
  config?: ExtensionsPageConfigInput
}

/**
 * Register the Extensions actions; returns a function that unregisters them
 */
export function registerExtensionsActions(
  workspace: Workspace,
  store: ExtensionStore,
  { telemetry, config }: ExtensionsActionsOptions = {}
): () => void {
  const unregisterOpen = registerAction(
    { id: EXTENSIONS_ACTIONS.OPEN, description: 'Open the Extensions page' },
    () => {
      const pageStore = createExtensionsPageStore({ store, telemetry, config })
      workspace.addItemToActivePane(createExtensionsPageItem(pageStore))
    }
  )

  const unregisterInstallDev = registerAction(
    { id: EXTENSIONS_ACTIONS.INSTALL_DEV_EXTENSION, description: 'Install a dev extension from a directory' },
    async () => {
      const path = await workspace.promptForDirectory()
      if (path === null) return

      try {
        log.info('[Extensions]', 'Installing dev extension', { path })
        await store.installDevExtension(path)
      } catch (err) {
        log.error('[Extensions]', 'Failed to install dev extension', { path, error: errorMessage(err) })
      }
    }
  )

  return () => {
    unregisterOpen()
    unregisterInstallDev()
  }
}
