/**
 * Category logger for the Extensions page
 *
 * Writes to the console and, when the host installs one, to a log sink
 * (the editor forwards these records to its own log file).
 *
 * Usage:
 * ```typescript
 * import { log } from '@/lib/logger'
 *
 * log.error('[Extensions]', 'Failed to fetch extensions', { search, error })
 * log.info('[Extensions]', 'Installing extension', { extensionId, version })
 * log.debug('[Fuzzy]', 'Scored candidates', { count }) // Only when debug enabled
 * ```
 *
 * Debug output is enabled with a pattern, either through `log.enableDebug()`
 * or `localStorage.setItem('debug', ...)`:
 * - 'true' or '*' enables every category
 * - '[Extensions]' enables one category
 */

// ============================================
// Types
// ============================================

type LogLevel = 'error' | 'warn' | 'info' | 'debug'

interface LogData {
  [key: string]: unknown
}

interface LogRecord {
  level: LogLevel
  category: string
  message: string
  data?: LogData
  timestamp: number
}

type LogSink = (record: LogRecord) => void

// ============================================
// Configuration
// ============================================

let sink: LogSink | null = null

// Set when debug is toggled without localStorage (Node, tests)
let debugPattern: string | null = null

function readDebugPattern(): string | null {
  if (debugPattern !== null) return debugPattern
  try {
    return globalThis.localStorage?.getItem('debug') ?? null
  } catch {
    return null
  }
}

function isDebugEnabled(category?: string): boolean {
  const pattern = readDebugPattern()
  if (!pattern) return false
  if (pattern === 'true' || pattern === '*') return true
  return category !== undefined && pattern.includes(category)
}

// ============================================
// Core
// ============================================

function emit(level: LogLevel, category: string, message: string, data?: LogData): void {
  if (level === 'debug' && !isDebugEnabled(category)) return

  const line = `${category} ${message}`
  const payload = data && Object.keys(data).length > 0 ? data : undefined

  if (payload) {
    console[level](line, payload)
  } else {
    console[level](line)
  }

  if (sink) {
    try {
      sink({ level, category, message, data: payload, timestamp: Date.now() })
    } catch (err) {
      console.warn('[Logger] Log sink threw', err)
    }
  }
}

// ============================================
// Public API
// ============================================

export const log = {
  error(category: string, message: string, data?: LogData): void {
    emit('error', category, message, data)
  },

  warn(category: string, message: string, data?: LogData): void {
    emit('warn', category, message, data)
  },

  info(category: string, message: string, data?: LogData): void {
    emit('info', category, message, data)
  },

  /**
   * Only emitted when the category is enabled by the debug pattern.
   */
  debug(category: string, message: string, data?: LogData): void {
    emit('debug', category, message, data)
  },

  isDebugEnabled,

  /**
   * @param pattern - 'true' for all categories, or '[Category]' for one
   */
  enableDebug(pattern: string = 'true'): void {
    debugPattern = pattern
    try {
      globalThis.localStorage?.setItem('debug', pattern)
    } catch {
      // Storage may be blocked; the in-memory pattern still applies
    }
  },

  disableDebug(): void {
    debugPattern = null
    try {
      globalThis.localStorage?.removeItem('debug')
    } catch {
      // Storage may be blocked; the in-memory pattern is already cleared
    }
  },
}

/**
 * Install (or with `null`, remove) the sink that receives every emitted record.
 */
export function setLogSink(next: LogSink | null): void {
  sink = next
}

/** Normalise a thrown value into a message string for logs and results. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export type { LogLevel, LogData, LogRecord, LogSink }
