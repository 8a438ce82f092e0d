/**
 * Design decisions:
 * - Debug output goes only to a file, and only when DEBUG is set, so stdout stays clean for scripts piping into mail(1)
 * - Use info for lines that are useful to the user - this is our UI
 * - File output location: <home>/logs/<date time>-pid-<pid>.log
 * - Never pass access tokens, passwords or pickles to the logger
 */

import chalk from 'chalk'
import { appendFileSync, existsSync, mkdirSync } from 'node:fs'
import { join } from 'node:path'
import { configuration } from '@/configuration'

function createLogPath(): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-')
  return join(configuration.logsDir, `${timestamp}-pid-${process.pid}.log`)
}

class Logger {
  private readonly logPath: string

  constructor(logPath: string = createLogPath()) {
    this.logPath = logPath
  }

  getLogPath(): string {
    return this.logPath
  }

  debug(message: string, ...args: unknown[]): void {
    this.logToFile(`[${new Date().toISOString()}]`, message, ...args)
  }

  debugLargeJson(
    message: string,
    object: unknown,
    maxStringLength: number = 100,
    maxArrayLength: number = 10,
  ): void {
    // Homeserver responses can be huge (key queries for large rooms), keep the shape readable
    const truncate = (obj: unknown): unknown => {
      if (typeof obj === 'string') {
        return obj.length > maxStringLength
          ? obj.substring(0, maxStringLength) + '... [truncated for logs]'
          : obj
      }

      if (Array.isArray(obj)) {
        const truncatedArray: unknown[] = obj.slice(0, maxArrayLength).map(item => truncate(item))
        if (obj.length > maxArrayLength) {
          truncatedArray.push(`... [truncated array for logs up to ${maxArrayLength} items]`)
        }
        return truncatedArray
      }

      if (obj && typeof obj === 'object') {
        const result: Record<string, unknown> = {}
        for (const [key, value] of Object.entries(obj)) {
          result[key] = truncate(value)
        }
        return result
      }

      return obj
    }

    const json = JSON.stringify(truncate(object), null, 2)
    this.logToFile(`[${new Date().toISOString()}]`, message, '\n', json)
  }

  info(message: string, ...args: unknown[]): void {
    this.logToConsole('info', message, ...args)
    this.debug(message, ...args)
  }

  warn(message: string, ...args: unknown[]): void {
    this.logToConsole('warn', message, ...args)
    this.debug(`[WARN] ${message}`, ...args)
  }

  error(message: string, ...args: unknown[]): void {
    this.logToConsole('error', message, ...args)
    this.debug(`[ERROR] ${message}`, ...args)
  }

  private logToConsole(level: 'error' | 'info' | 'warn', message: string, ...args: unknown[]): void {
    switch (level) {
      case 'error': {
        console.error(chalk.red(message), ...args)
        break
      }

      case 'warn': {
        console.error(chalk.yellow(message), ...args)
        break
      }

      case 'info': {
        console.log(message, ...args)
        break
      }
    }
  }

  private logToFile(prefix: string, message: string, ...args: unknown[]): void {
    if (!process.env.DEBUG) {
      return
    }

    const logLine = `${prefix} ${message} ${args.map(arg =>
      typeof arg === 'string' ? arg : stringifyForLog(arg)
    ).join(' ')}\n`

    try {
      if (!existsSync(configuration.logsDir)) {
        mkdirSync(configuration.logsDir, { recursive: true, mode: 0o700 })
      }
      appendFileSync(this.logPath, logLine)
    } catch (error) {
      console.error('Failed to write log file:', error)
    }
  }
}

function stringifyForLog(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack ?? `${arg.name}: ${arg.message}`
  }
  return JSON.stringify(arg) ?? String(arg)
}

export const logger = new Logger()
