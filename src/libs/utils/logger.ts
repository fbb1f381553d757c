// Logger utility for Cloud Run Logs Explorer
type LogData = Record<string, unknown>

type Severity = 'INFO' | 'WARNING' | 'ERROR' | 'DEBUG'

interface LogEntry {
  severity: Severity
  message: string
  timestamp: string
  [key: string]: unknown
}

function writeToConsole(entry: LogEntry) {
  const line = JSON.stringify(entry)
  switch (entry.severity) {
    case 'ERROR':
      console.error(line)
      break
    case 'WARNING':
      console.warn(line)
      break
    case 'DEBUG':
      console.debug(line)
      break
    default:
      console.log(line)
  }
}

function emit(entry: LogEntry) {
  // Server side: stdout is picked up by Cloud Run directly
  if (typeof window === 'undefined') {
    writeToConsole(entry)
    return
  }

  // Browser: send to server API
  void fetch('/api/log', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(entry)
  }).catch(() => {
    // Fallback to console if API call fails
    writeToConsole(entry)
  })
}

export const logger = {
  info: (message: string, data?: LogData) => {
    emit({
      severity: 'INFO',
      message,
      ...data && { data },
      timestamp: new Date().toISOString()
    })
  },

  warn: (message: string, data?: LogData) => {
    emit({
      severity: 'WARNING',
      message,
      ...data && { data },
      timestamp: new Date().toISOString()
    })
  },

  error: (message: string, error?: Error | string) => {
    emit({
      severity: 'ERROR',
      message,
      ...(error instanceof Error ? {
        error: error.message,
        stack: error.stack
      } : error !== undefined ? { error } : {}),
      timestamp: new Date().toISOString()
    })
  },

  debug: (message: string, data?: LogData) => {
    emit({
      severity: 'DEBUG',
      message,
      ...data && { data },
      timestamp: new Date().toISOString()
    })
  }
}
