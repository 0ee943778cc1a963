/**
 * AddDevExtensionDialog - install an extension from a local source directory
 *
 * The directory must contain an extension manifest. Dev extensions are
 * listed above registry entries and can be rebuilt in place.
 */
import { useState, useEffect } from 'react'
import { X, FolderOpen, Code2, CheckCircle2, XCircle, Loader2 } from 'lucide-react'
import { errorMessage } from '@/lib/logger'
import { usePageStore, useExtensionsPageHost } from './ExtensionsPageContext'

interface AddDevExtensionDialogProps {
  open: boolean
  onClose: () => void
}

type DialogState = 'select' | 'installing' | 'success' | 'error'

export function AddDevExtensionDialog({ open, onClose }: AddDevExtensionDialogProps) {
  const [dialogState, setDialogState] = useState<DialogState>('select')
  const [path, setPath] = useState('')
  const [error, setError] = useState<string | null>(null)

  const host = useExtensionsPageHost()
  const installDevExtension = usePageStore(s => s.installDevExtension)
  const addToast = usePageStore(s => s.addToast)

  // Reset state when dialog opens
  useEffect(() => {
    if (open) {
      setDialogState('select')
      setPath('')
      setError(null)
    }
  }, [open])

  const promptForDirectory = host.promptForDirectory
  const handleBrowse = async () => {
    if (!promptForDirectory) return
    try {
      const selected = await promptForDirectory()
      if (selected !== null) setPath(selected)
    } catch (err) {
      setError(errorMessage(err))
      setDialogState('error')
    }
  }

  const handleInstall = async () => {
    const directory = path.trim()
    if (!directory) return

    setDialogState('installing')
    setError(null)

    const result = await installDevExtension(directory)
    if (result.success) {
      setDialogState('success')
      addToast('success', `Dev extension installed from ${directory}`)
    } else {
      setError(result.error ?? 'Installation failed')
      setDialogState('error')
    }
  }

  if (!open) return null

  return (
    <div className="fixed inset-0 z-50 flex items-center justify-center bg-black/70" onClick={onClose}>
      <div
        role="dialog"
        aria-label="Add Dev Extension"
        className="relative w-full max-w-md bg-gray-900 rounded-xl shadow-2xl border border-gray-700 overflow-hidden"
        onClick={e => e.stopPropagation()}
      >
        {/* Header */}
        <div className="p-6 border-b border-gray-800">
          <button
            type="button"
            aria-label="Close"
            onClick={onClose}
            className="absolute top-4 right-4 p-2 text-gray-400 hover:text-gray-200 hover:bg-gray-800 rounded-lg transition-colors"
          >
            <X size={20} />
          </button>

          <div className="flex items-center gap-3">
            <div className="w-12 h-12 rounded-lg bg-purple-500/20 flex items-center justify-center">
              <Code2 size={24} className="text-purple-400" />
            </div>
            <div>
              <h2 className="text-lg font-semibold text-gray-100">Add Dev Extension</h2>
              <p className="text-sm text-gray-400">Install from a local source directory</p>
            </div>
          </div>
        </div>

        {/* Content */}
        <div className="p-6">
          {dialogState === 'select' && (
            <div className="flex items-center gap-2">
              <input
                type="text"
                aria-label="Extension directory"
                placeholder="/path/to/extension"
                value={path}
                onChange={e => setPath(e.target.value)}
                className="flex-1 px-3 py-2 text-sm rounded-lg bg-gray-800 border border-gray-700 text-gray-200 focus:outline-none focus:border-blue-500"
              />
              {promptForDirectory && (
                <button
                  type="button"
                  onClick={() => void handleBrowse()}
                  className="px-3 py-2 text-sm rounded-lg bg-gray-800 hover:bg-gray-700 text-gray-300 flex items-center gap-1.5"
                >
                  <FolderOpen size={14} />
                  Browse
                </button>
              )}
            </div>
          )}

          {dialogState === 'installing' && (
            <div className="flex items-center gap-2 text-gray-300">
              <Loader2 size={20} className="animate-spin text-blue-400" />
              <span>Installing from {path.trim()}...</span>
            </div>
          )}

          {dialogState === 'success' && (
            <div className="flex items-center gap-2 text-green-400">
              <CheckCircle2 size={20} />
              <span>Dev extension installed</span>
            </div>
          )}

          {dialogState === 'error' && (
            <div className="p-3 rounded-lg bg-red-500/10 border border-red-500/30 flex items-start gap-2 text-red-400">
              <XCircle size={20} className="shrink-0" />
              <span data-testid="dev-extension-error">{error}</span>
            </div>
          )}
        </div>

        {/* Footer */}
        <div className="px-6 py-4 border-t border-gray-800 flex justify-end gap-2">
          {dialogState === 'select' && (
            <>
              <button
                type="button"
                onClick={onClose}
                className="px-4 py-2 text-sm text-gray-300 hover:text-gray-100 hover:bg-gray-800 rounded-lg transition-colors"
              >
                Cancel
              </button>
              <button
                type="button"
                onClick={() => void handleInstall()}
                disabled={!path.trim()}
                className="px-4 py-2 text-sm rounded-lg bg-blue-600 hover:bg-blue-500 text-white disabled:opacity-50"
              >
                Install
              </button>
            </>
          )}
          {dialogState === 'error' && (
            <button
              type="button"
              onClick={() => setDialogState('select')}
              className="px-4 py-2 text-sm text-gray-300 hover:text-gray-100 hover:bg-gray-800 rounded-lg transition-colors"
            >
              Try Again
            </button>
          )}
          {(dialogState === 'success' || dialogState === 'error') && (
            <button
              type="button"
              onClick={onClose}
              className="px-4 py-2 text-sm rounded-lg bg-blue-600 hover:bg-blue-500 text-white"
            >
              Done
            </button>
          )}
        </div>
      </div>
    </div>
  )
}
