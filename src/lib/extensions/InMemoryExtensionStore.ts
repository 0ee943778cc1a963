/**
 * InMemoryExtensionStore - reference ExtensionStore without network or disk
 *
 * Backs the dev playground and the tests. Status changes follow the same
 * transitions a real store reports:
 *   install:   not-installed → installing → installed(version)
 *   upgrade:   installed → upgrading → installed(version)
 *   rebuild:   installed → upgrading → installed(version)   (dev only)
 *   uninstall: installed → removing → not-installed
 * Each transition emits `status-changed`; each completed command then emits
 * `extensions-updated`.
 */
import { z } from 'zod'
import type {
  ExtensionManifest,
  ExtensionStatus,
  ExtensionStore,
  ExtensionStoreEvent,
  ExtensionStoreListener,
  RemoteExtension,
  Unsubscribe,
} from './types'
import {
  extensionManifestSchema,
  formatZodErrors,
  ManifestParseError,
  parseManifest,
  remoteExtensionSchema,
} from './manifest'
import { log } from '@/lib/logger'

const seedSchema = z.object({
  remote: z.array(remoteExtensionSchema).default([]),
  dev: z.array(extensionManifestSchema).default([]),
  /** extension ID → installed version */
  installed: z.record(z.string(), z.string()).default({}),
  /** directory path → manifest, resolved by installDevExtension */
  devSources: z.record(z.string(), z.unknown()).default({}),
})

export type ExtensionStoreSeed = z.input<typeof seedSchema>

export interface InMemoryExtensionStoreOptions {
  /** Simulated latency of every fetch and command step */
  latencyMs?: number
}

function abortError(): DOMException {
  return new DOMException('The operation was aborted', 'AbortError')
}

export class InMemoryExtensionStore implements ExtensionStore {
  private remote: RemoteExtension[]
  private dev: ExtensionManifest[]
  private statuses = new Map<string, ExtensionStatus>()
  private devSources: Record<string, unknown>
  private listeners = new Set<ExtensionStoreListener>()
  private readonly latencyMs: number

  /**
   * @param seed - Usually parsed JSON; validated against the seed schema
   * @throws {ManifestParseError} If the seed is invalid
   */
  constructor(seed: unknown = {}, options: InMemoryExtensionStoreOptions = {}) {
    const parsed = seedSchema.safeParse(seed)
    if (!parsed.success) {
      throw new ManifestParseError(formatZodErrors(parsed.error))
    }

    this.remote = parsed.data.remote
    this.dev = parsed.data.dev
    this.devSources = parsed.data.devSources
    this.latencyMs = options.latencyMs ?? 0

    for (const [id, version] of Object.entries(parsed.data.installed)) {
      this.statuses.set(id, { state: 'installed', version })
    }
    for (const manifest of this.dev) {
      this.statuses.set(manifest.id, { state: 'installed', version: manifest.version })
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Queries
  // ═══════════════════════════════════════════════════════════════════════════

  async fetchExtensions(search: string | undefined, signal?: AbortSignal): Promise<RemoteExtension[]> {
    if (signal?.aborted) throw abortError()
    await this.delay()
    if (signal?.aborted) throw abortError()

    const query = search?.trim().toLowerCase()
    const result = query
      ? this.remote.filter(ext =>
          ext.id.toLowerCase().includes(query) ||
          ext.name.toLowerCase().includes(query) ||
          ext.description?.toLowerCase().includes(query)
        )
      : this.remote

    return result.map(ext => ({ ...ext, authors: [...ext.authors] }))
  }

  devExtensions(): ExtensionManifest[] {
    return [...this.dev]
  }

  extensionStatus(extensionId: string): ExtensionStatus {
    return this.statuses.get(extensionId) ?? { state: 'not-installed' }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Commands
  // ═══════════════════════════════════════════════════════════════════════════

  async installExtension(extensionId: string, version: string): Promise<void> {
    this.expectState(extensionId, 'not-installed', 'install')
    await this.transition(extensionId, { state: 'installing' }, { state: 'installed', version })
  }

  async uninstallExtension(extensionId: string): Promise<void> {
    this.expectState(extensionId, 'installed', 'uninstall')
    await this.transition(extensionId, { state: 'removing' }, { state: 'not-installed' }, () => {
      this.dev = this.dev.filter(m => m.id !== extensionId)
    })
  }

  async upgradeExtension(extensionId: string, version: string): Promise<void> {
    this.expectState(extensionId, 'installed', 'upgrade')
    await this.transition(extensionId, { state: 'upgrading' }, { state: 'installed', version })
  }

  async rebuildDevExtension(extensionId: string): Promise<void> {
    const manifest = this.dev.find(m => m.id === extensionId)
    if (!manifest) {
      throw new Error(`No dev extension with ID "${extensionId}"`)
    }
    this.expectState(extensionId, 'installed', 'rebuild')
    await this.transition(extensionId, { state: 'upgrading' }, () =>
      this.dev.some(m => m.id === extensionId)
        ? { state: 'installed', version: manifest.version }
        : { state: 'not-installed' }
    )
  }

  async installDevExtension(path: string): Promise<void> {
    if (!(path in this.devSources)) {
      throw new Error(`No extension manifest found in "${path}"`)
    }
    const manifest = parseManifest(this.devSources[path])
    if (this.dev.some(m => m.id === manifest.id)) {
      throw new Error(`Dev extension "${manifest.id}" is already installed`)
    }

    this.dev = [...this.dev, manifest]
    await this.transition(
      manifest.id,
      { state: 'installing' },
      { state: 'installed', version: manifest.version }
    )
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Events
  // ═══════════════════════════════════════════════════════════════════════════

  subscribe(listener: ExtensionStoreListener): Unsubscribe {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  private emit(event: ExtensionStoreEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event)
      } catch (error) {
        log.error('[ExtensionStore]', 'Listener threw', { event: event.type, error })
      }
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Helpers
  // ═══════════════════════════════════════════════════════════════════════════

  private expectState(extensionId: string, state: ExtensionStatus['state'], action: string): void {
    const current = this.extensionStatus(extensionId).state
    if (current !== state) {
      throw new Error(`Cannot ${action} "${extensionId}" while it is ${current}`)
    }
  }

  private async transition(
    extensionId: string,
    pending: ExtensionStatus,
    done: ExtensionStatus | (() => ExtensionStatus),
    apply?: () => void
  ): Promise<void> {
    this.setStatus(extensionId, pending)
    await this.delay()
    apply?.()
    // A function reads the final status after the delay
    this.setStatus(extensionId, typeof done === 'function' ? done() : done)
    this.emit({ type: 'extensions-updated' })
  }

  private setStatus(extensionId: string, status: ExtensionStatus): void {
    this.statuses.set(extensionId, status)
    this.emit({ type: 'status-changed', extensionId })
  }

  private delay(): Promise<void> {
    if (this.latencyMs <= 0) return Promise.resolve()
    return new Promise(resolve => setTimeout(resolve, this.latencyMs))
  }
}
