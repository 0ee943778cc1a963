import type { ExtensionManifest, RemoteExtension } from '@/lib/extensions/types'
import type { ExtensionStoreSeed } from '@/lib/extensions/InMemoryExtensionStore'

export const gleam: RemoteExtension = {
  id: 'gleam',
  name: 'Gleam',
  version: '0.4.1',
  authors: ['Ada Example'],
  description: 'Gleam language support',
  repository: 'https://example.com/extensions/gleam',
  downloadCount: 120,
}

export const elixir: RemoteExtension = {
  id: 'elixir',
  name: 'Elixir',
  version: '1.2.0',
  authors: ['Ada Example', 'Grace Sample'],
  description: 'Elixir language server',
  repository: 'https://example.com/extensions/elixir',
  downloadCount: 340,
}

export const zig: RemoteExtension = {
  id: 'zig',
  name: 'Zig',
  version: '0.2.3',
  authors: ['Linus Placeholder'],
  repository: 'https://example.com/extensions/zig',
  downloadCount: 5,
}

export const myTheme: ExtensionManifest = {
  id: 'my-theme',
  name: 'My Theme',
  version: '0.0.1',
  authors: ['You'],
  description: 'A theme under development',
}

/**
 * Three registry entries (elixir installed at an older version), one dev
 * extension, and two dev source directories: `/src/lua` (valid) and
 * `/src/broken` (invalid manifest).
 */
export function sampleSeed(): ExtensionStoreSeed {
  return {
    remote: [gleam, elixir, zig],
    dev: [myTheme],
    installed: { elixir: '1.1.0' },
    devSources: {
      '/src/lua': { id: 'lua', name: 'Lua', version: '0.1.0', authors: ['You'] },
      '/src/broken': { id: 'Broken', name: '', version: 'latest' },
    },
  }
}
