import { createStore } from 'zustand/vanilla'
import type { ExtensionStore } from '@/lib/extensions/types'
import { resolveConfig, type ExtensionsPageConfigInput } from '@/lib/config'
import { noopTelemetry, type Telemetry } from '@/lib/telemetry'
import type { ExtensionsPageState } from './types'
import { createExtensionsPageSlice } from './slices/extensionsPageSlice'
import { createToastsSlice } from './slices/toastsSlice'

export interface CreateExtensionsPageStoreOptions {
  store: ExtensionStore
  telemetry?: Telemetry
  config?: ExtensionsPageConfigInput
}

/**
 * Create the state container for one Extensions page.
 * Each open page gets its own store; they share the ExtensionStore.
 *
 * @throws {ConfigError} If `config` is invalid
 */
export function createExtensionsPageStore({
  store,
  telemetry = noopTelemetry,
  config,
}: CreateExtensionsPageStoreOptions) {
  const deps = { store, telemetry, config: resolveConfig(config) }

  return createStore<ExtensionsPageState>()((...a) => ({
    ...createExtensionsPageSlice(deps)(...a),
    ...createToastsSlice(...a),
  }))
}

export type ExtensionsPageStore = ReturnType<typeof createExtensionsPageStore>
