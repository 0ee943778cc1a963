/**
 * Toasts - command failure and success notices for the page
 */
import { useEffect } from 'react'
import { X, XCircle, CheckCircle2, Info } from 'lucide-react'
import type { ToastMessage } from '@/stores/types'
import { usePageStore } from './ExtensionsPageContext'

const toastConfig = {
  error: { icon: XCircle, className: 'bg-red-500/10 border-red-500/30 text-red-400' },
  success: { icon: CheckCircle2, className: 'bg-green-500/10 border-green-500/30 text-green-400' },
  info: { icon: Info, className: 'bg-blue-500/10 border-blue-500/30 text-blue-400' },
}

function Toast({ toast }: { toast: ToastMessage }) {
  const removeToast = usePageStore(s => s.removeToast)
  const config = toastConfig[toast.type]
  const Icon = config.icon

  useEffect(() => {
    if (toast.duration <= 0) return
    const timer = setTimeout(() => removeToast(toast.id), toast.duration)
    return () => clearTimeout(timer)
  }, [toast.id, toast.duration, removeToast])

  return (
    <div role="alert" className={`flex items-start gap-2 p-3 rounded-lg border text-sm ${config.className}`}>
      <Icon size={16} className="shrink-0 mt-0.5" />
      <span className="flex-1">{toast.message}</span>
      <button
        type="button"
        aria-label="Dismiss"
        onClick={() => removeToast(toast.id)}
        className="text-gray-400 hover:text-gray-200"
      >
        <X size={14} />
      </button>
    </div>
  )
}

export function Toasts() {
  const toasts = usePageStore(s => s.toasts)
  if (toasts.length === 0) return null

  return (
    <div className="fixed bottom-4 right-4 z-50 flex flex-col gap-2 w-80">
      {toasts.map(toast => (
        <Toast key={toast.id} toast={toast} />
      ))}
    </div>
  )
}
