/**
 * StatusBadge - shows an extension's in-progress state
 *
 * Rendered only while the store is working on the extension:
 * - Installing: download and install in progress
 * - Upgrading: new version (or dev rebuild) in progress
 * - Removing: uninstall in progress
 */
import { Download, RefreshCw, Trash2, Code2, type LucideIcon } from 'lucide-react'
import type { ExtensionStatus } from '@/lib/extensions/types'

type BusyState = Extract<ExtensionStatus['state'], 'installing' | 'upgrading' | 'removing'>

const statusConfig: Record<BusyState, {
  icon: LucideIcon
  label: string
  className: string
}> = {
  installing: {
    icon: Download,
    label: 'Installing',
    className: 'bg-blue-500/20 text-blue-400 border-blue-500/30',
  },
  upgrading: {
    icon: RefreshCw,
    label: 'Upgrading',
    className: 'bg-amber-500/20 text-amber-400 border-amber-500/30',
  },
  removing: {
    icon: Trash2,
    label: 'Removing',
    className: 'bg-red-500/20 text-red-400 border-red-500/30',
  },
}

function isBusyState(state: ExtensionStatus['state']): state is BusyState {
  return state in statusConfig
}

export function StatusBadge({ status }: { status: ExtensionStatus }) {
  if (!isBusyState(status.state)) return null

  const config = statusConfig[status.state]
  const Icon = config.icon

  return (
    <div
      role="status"
      className={`inline-flex items-center gap-1 px-1.5 py-0.5 rounded border ${config.className}`}
    >
      <Icon size={12} className="animate-spin" />
      <span className="font-medium text-[10px]">{config.label}</span>
    </div>
  )
}

// Marks extensions loaded from a local source directory
export function DevBadge() {
  return (
    <div
      className="inline-flex items-center gap-1 px-1.5 py-0.5 rounded border bg-purple-500/20 text-purple-400 border-purple-500/30"
      title="Built from a local source directory"
    >
      <Code2 size={12} />
      <span className="font-medium text-[10px]">Dev</span>
    </div>
  )
}
