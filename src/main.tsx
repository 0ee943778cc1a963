// Dev playground: one Extensions page over an in-memory store.
import React from 'react'
import ReactDOM from 'react-dom/client'
import { InMemoryExtensionStore } from '@/lib/extensions'
import { log } from '@/lib/logger'
import type { Telemetry } from '@/lib/telemetry'
import { createExtensionsPageStore } from '@/stores/extensionsPageStore'
import { ExtensionsPage, type ExtensionsPageHost } from '@/features/extensions'
import sampleExtensions from '@/demo/sample-extensions.json'

const store = new InMemoryExtensionStore(sampleExtensions, { latencyMs: 400 })

const telemetry: Telemetry = {
  reportAppEvent(name) {
    log.info('[Telemetry]', 'App event', { name })
  },
}

const host: ExtensionsPageHost = {
  openUrl(url) {
    window.open(url, '_blank', 'noopener')
  },
  async promptForDirectory() {
    return window.prompt('Extension directory', '/home/dev/extensions/lua')
  },
}

const pageStore = createExtensionsPageStore({ store, telemetry })

log.info('[Playground]', 'Starting', { version: import.meta.env.PACKAGE_VERSION })

const container = document.getElementById('root')
if (!container) {
  throw new Error('Missing #root element')
}

ReactDOM.createRoot(container).render(
  <React.StrictMode>
    <ExtensionsPage pageStore={pageStore} host={host} />
  </React.StrictMode>
)
