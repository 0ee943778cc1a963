/**
 * Action Registry
 *
 * Central registry for workspace actions (command palette entries, menu items,
 * key bindings). Features register their actions once at startup.
 */

import { errorMessage, log } from '../logger'

// ============================================
// Types
// ============================================

export type ActionHandler = () => void | Promise<void>

/**
 * Action metadata for the command palette
 */
export interface ActionMeta {
  /** Namespaced ID, e.g. `extensions` or `install-dev-extension` */
  id: string
  description: string
}

// ============================================
// Registry Storage
// ============================================

const actionHandlers = new Map<string, ActionHandler>()
const actionMeta = new Map<string, ActionMeta>()

// ============================================
// Registration Functions
// ============================================

/**
 * Register an action; returns a function that removes it again
 */
export function registerAction(meta: ActionMeta, handler: ActionHandler): () => void {
  if (actionHandlers.has(meta.id)) {
    log.warn('[Actions]', 'Action is being overwritten', { id: meta.id })
  }
  actionHandlers.set(meta.id, handler)
  actionMeta.set(meta.id, meta)

  return () => {
    if (actionHandlers.get(meta.id) === handler) {
      actionHandlers.delete(meta.id)
      actionMeta.delete(meta.id)
    }
  }
}

// ============================================
// Execution
// ============================================

/**
 * Run a registered action.
 *
 * Resolves false when the action is unknown or its handler failed; the
 * failure is logged rather than rethrown, since callers are UI event handlers.
 */
export async function executeAction(id: string): Promise<boolean> {
  const handler = actionHandlers.get(id)
  if (!handler) {
    log.warn('[Actions]', 'Unknown action', { id })
    return false
  }

  try {
    await handler()
    return true
  } catch (err) {
    log.error('[Actions]', 'Action failed', { id, error: errorMessage(err) })
    return false
  }
}

// ============================================
// Query Functions
// ============================================

/**
 * Get all registered actions, in registration order
 */
export function getRegisteredActions(): ActionMeta[] {
  return Array.from(actionMeta.values())
}

export function isActionRegistered(id: string): boolean {
  return actionHandlers.has(id)
}
