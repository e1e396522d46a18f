import { appendFileSync, mkdirSync } from 'fs'
import { dirname } from 'path'
import { format } from 'util'

type ConsoleMethod = 'log' | 'warn' | 'error'

let installedPath: string | undefined

/**
 * Tees console.log/warn/error into a log file with timestamps.
 * The console output itself is unchanged. Installing twice is a no-op.
 */
export function installFileLogging(logFile: string): void {
  if (installedPath) return
  installedPath = logFile

  mkdirSync(dirname(logFile), { recursive: true })
  let writable = true

  const tee = (method: ConsoleMethod): void => {
    const original = console[method].bind(console)
    console[method] = (...args: unknown[]) => {
      original(...args)
      if (!writable) return

      const level = method === 'log' ? 'INFO' : method.toUpperCase()
      try {
        appendFileSync(logFile, `[${new Date().toISOString()}] ${level} ${format(...args)}\n`)
      } catch (error) {
        writable = false
        original(`[Logging] Disabled file logging to ${logFile}:`, error instanceof Error ? error.message : error)
      }
    }
  }

  tee('log')
  tee('warn')
  tee('error')
}
