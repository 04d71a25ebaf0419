// Pipeline logging module - isolated so every service can import it without cycles

export type LogLevel = 'info' | 'warn' | 'debug'

export interface LogEntry {
  level: LogLevel
  message: string
}

export const pipelineLogs: LogEntry[] = []

// Messages that should only be logged once per batch run
const loggedOnceMessages = new Set<string>()

// Last logged message, to drop consecutive duplicates
let lastLoggedMessage: string | null = null

// 'normal' shows progress, skips and warnings; 'verbose' adds per-step detail
let verbosity: 'normal' | 'verbose' = 'normal'

const isTest = typeof process !== 'undefined' && process.env.NODE_ENV === 'test'

// Allow console logs during tests via environment variable
const FORCE_CONSOLE_LOGS = typeof process !== 'undefined' && process.env.GEOKMZ_VERBOSE_TESTS === 'true'

// Callback for real-time log updates (a front end can subscribe to this)
let onLogCallback: ((entry: LogEntry) => void) | null = null

export function setLogCallback(callback: ((entry: LogEntry) => void) | null) {
  onLogCallback = callback
}

export function setVerbosity(level: 'normal' | 'verbose') {
  verbosity = level
}

function emit(level: LogLevel, message: string) {
  if (message === lastLoggedMessage) {
    return
  }
  lastLoggedMessage = message

  const shouldLogToConsole = !isTest || FORCE_CONSOLE_LOGS
  if (shouldLogToConsole) {
    if (level === 'warn') {
      console.warn(message)
    } else {
      console.log(message)
    }
  }

  const entry: LogEntry = { level, message }
  pipelineLogs.push(entry)

  if (onLogCallback) {
    onLogCallback(entry)
  }
}

export function log(message: string) {
  emit('info', message)
}

/**
 * Soft failures: skipped photos, orientation fallbacks, missing bearings.
 */
export function logWarning(message: string) {
  emit('warn', message)
}

/**
 * Only logs when verbosity is 'verbose'.
 */
export function logDebug(message: string) {
  if (verbosity !== 'verbose') {
    return
  }
  emit('debug', message)
}

export function clearPipelineLogs() {
  pipelineLogs.length = 0
  loggedOnceMessages.clear()
  lastLoggedMessage = null
}

/**
 * Log a message only once per batch run, e.g. a config fallback that would
 * otherwise repeat for every photo.
 */
export function logOnce(message: string) {
  if (loggedOnceMessages.has(message)) {
    return
  }
  loggedOnceMessages.add(message)
  log(message)
}
