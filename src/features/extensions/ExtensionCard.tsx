/**
 * ExtensionCard - one row of the Extensions page
 *
 * RemoteExtensionCard renders a registry entry with install / uninstall /
 * upgrade buttons; DevExtensionCard renders a locally built extension with
 * rebuild / uninstall buttons.
 */
import { useState, type ReactNode } from 'react'
import { Download, Trash2, RefreshCw, Hammer, ArrowUpCircle, Github } from 'lucide-react'
import type { ExtensionManifest, RemoteExtension } from '@/lib/extensions/types'
import { useExtensionStatus } from '@/stores/selectors'
import { usePageStore, useExtensionsPageHost } from './ExtensionsPageContext'
import { StatusBadge, DevBadge } from './StatusBadge'
import {
  authorsLabel,
  buttonsForEntry,
  devButtonsForEntry,
  type EntryAction,
  type EntryButton,
} from './entryButtons'

const buttonIcons = {
  Install: Download,
  Uninstall: Trash2,
  Upgrade: ArrowUpCircle,
  Rebuild: Hammer,
}

/**
 * Dispatch a card action to the page store, tracking which button is busy
 */
function useEntryActions() {
  const [pendingAction, setPendingAction] = useState<string | null>(null)
  const installExtension = usePageStore(s => s.installExtension)
  const uninstallExtension = usePageStore(s => s.uninstallExtension)
  const upgradeExtension = usePageStore(s => s.upgradeExtension)
  const rebuildDevExtension = usePageStore(s => s.rebuildDevExtension)
  const uninstallDevExtension = usePageStore(s => s.uninstallDevExtension)

  const run = (action: EntryAction) => {
    switch (action.kind) {
      case 'install':
        return installExtension(action.extensionId, action.version)
      case 'uninstall':
        return uninstallExtension(action.extensionId)
      case 'upgrade':
        return upgradeExtension(action.extensionId, action.version)
      case 'rebuild':
        return rebuildDevExtension(action.extensionId)
      case 'uninstall-dev':
        return uninstallDevExtension(action.extensionId)
    }
  }

  const handleAction = async (button: EntryButton) => {
    if (!button.action) return
    setPendingAction(button.id)
    try {
      // Failures are logged and toasted by the store
      await run(button.action)
    } finally {
      setPendingAction(null)
    }
  }

  return { pendingAction, handleAction }
}

function EntryButtonView({
  button,
  pending,
  onClick,
}: {
  button: EntryButton
  pending: boolean
  onClick: () => void
}) {
  const Icon = pending ? RefreshCw : buttonIcons[button.label]
  const destructive = button.label === 'Uninstall'

  return (
    <button
      type="button"
      data-button-id={button.id}
      onClick={onClick}
      disabled={button.disabled || pending}
      className={`px-3 py-1.5 text-sm rounded-lg transition-colors disabled:opacity-50 flex items-center gap-1.5 ${
        destructive
          ? 'bg-red-600/20 hover:bg-red-600/30 text-red-400'
          : 'bg-blue-600 hover:bg-blue-500 text-white'
      }`}
    >
      <Icon size={14} className={pending ? 'animate-spin' : ''} />
      {button.label}
    </button>
  )
}

function RepositoryButton({ extensionId, url }: { extensionId: string; url: string }) {
  const host = useExtensionsPageHost()

  return (
    <button
      type="button"
      data-button-id={`repository-${extensionId}`}
      onClick={() => host.openUrl(url)}
      title={url}
      aria-label="Open repository"
      className="p-1.5 rounded-lg bg-gray-700/50 hover:bg-gray-700 text-blue-400 transition-colors"
    >
      <Github size={14} />
    </button>
  )
}

function CardShell({ extensionId, children }: { extensionId: string; children: ReactNode }) {
  return (
    <div
      data-testid={`extension-card-${extensionId}`}
      className="p-4 rounded-xl bg-gray-800/50 border border-gray-700/50 hover:border-gray-600/50 transition-all flex flex-col gap-2"
    >
      {children}
    </div>
  )
}

function CardTitle({ name, version }: { name: string; version: string }) {
  return (
    <div className="flex items-end gap-2 min-w-0">
      <h3 className="font-semibold text-gray-100 truncate">{name}</h3>
      <span className="text-xs text-gray-400">v{version}</span>
    </div>
  )
}

export function RemoteExtensionCard({ extension }: { extension: RemoteExtension }) {
  const status = useExtensionStatus(extension.id)
  const { pendingAction, handleAction } = useEntryActions()
  const { primary, upgrade } = buttonsForEntry(extension, status)

  return (
    <CardShell extensionId={extension.id}>
      {/* Header */}
      <div className="flex items-center justify-between gap-2">
        <div className="flex items-center gap-2 min-w-0">
          <CardTitle name={extension.name} version={extension.version} />
          <StatusBadge status={status} />
        </div>
        <div className="flex items-center gap-2">
          {upgrade && (
            <EntryButtonView
              button={upgrade}
              pending={pendingAction === upgrade.id}
              onClick={() => void handleAction(upgrade)}
            />
          )}
          <EntryButtonView
            button={primary}
            pending={pendingAction === primary.id}
            onClick={() => void handleAction(primary)}
          />
        </div>
      </div>

      {/* Authors & downloads */}
      <div className="flex items-center justify-between text-xs text-gray-400">
        <span>{authorsLabel(extension.authors)}</span>
        <span>Downloads: {extension.downloadCount}</span>
      </div>

      {/* Description & repository */}
      <div className="flex items-center justify-between gap-2">
        {extension.description && (
          <p className="text-sm text-gray-300 truncate">{extension.description}</p>
        )}
        <RepositoryButton extensionId={extension.id} url={extension.repository} />
      </div>
    </CardShell>
  )
}

export function DevExtensionCard({ manifest }: { manifest: ExtensionManifest }) {
  const status = useExtensionStatus(manifest.id)
  const { pendingAction, handleAction } = useEntryActions()
  const { rebuild, uninstall } = devButtonsForEntry(manifest, status)

  return (
    <CardShell extensionId={manifest.id}>
      <div className="flex items-center justify-between gap-2">
        <div className="flex items-center gap-2 min-w-0">
          <CardTitle name={manifest.name} version={manifest.version} />
          <DevBadge />
          <StatusBadge status={status} />
        </div>
        <div className="flex items-center gap-2">
          <EntryButtonView
            button={rebuild}
            pending={pendingAction === rebuild.id}
            onClick={() => void handleAction(rebuild)}
          />
          <EntryButtonView
            button={uninstall}
            pending={pendingAction === uninstall.id}
            onClick={() => void handleAction(uninstall)}
          />
        </div>
      </div>

      <div className="flex items-center justify-between text-xs text-gray-400">
        <span>{authorsLabel(manifest.authors)}</span>
        <span>{'<>'}</span>
      </div>

      <div className="flex items-center justify-between gap-2">
        {manifest.description && (
          <p className="text-sm text-gray-300 truncate">{manifest.description}</p>
        )}
        {manifest.repository && (
          <RepositoryButton extensionId={manifest.id} url={manifest.repository} />
        )}
      </div>
    </CardShell>
  )
}
