import type { StateCreator } from 'zustand'
import type { ExtensionsPageState, ToastsSlice, ToastType } from '../types'

export const createToastsSlice: StateCreator<
  ExtensionsPageState,
  [],
  [],
  ToastsSlice
> = (set) => ({
  toasts: [],

  addToast: (type: ToastType, message: string, duration = 5000) => {
    const id = `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`
    set(state => ({ toasts: [...state.toasts, { id, type, message, duration }] }))
  },

  removeToast: (id: string) => {
    set(state => ({ toasts: state.toasts.filter(t => t.id !== id) }))
  },
})
