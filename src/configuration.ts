/**
 * Global configuration for matrixmail
 *
 * Centralizes all configuration including environment variables and paths
 */

import { homedir } from 'node:os'
import { join } from 'node:path'

const DEFAULT_HTTP_TIMEOUT_MS = 30_000
const DEFAULT_CONCURRENCY = 4

function positiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback
  }
  const value = Number.parseInt(raw, 10)
  return Number.isFinite(value) && value > 0 ? value : fallback
}

class Configuration {
  public readonly homeDir: string
  public readonly logsDir: string
  public readonly credentialsFile: string
  public readonly cryptoStoreFile: string

  public readonly defaultHomeserver: string
  public readonly httpTimeoutMs: number
  public readonly sendConcurrency: number
  public readonly isDebug: boolean

  constructor() {
    // Directory configuration - Priority: MATRIXMAIL_HOME_DIR > XDG_DATA_HOME > ~/.local/share
    if (process.env.MATRIXMAIL_HOME_DIR) {
      this.homeDir = process.env.MATRIXMAIL_HOME_DIR.replace(/^~/, homedir())
    } else if (process.env.XDG_DATA_HOME) {
      this.homeDir = join(process.env.XDG_DATA_HOME, 'matrixmail')
    } else {
      this.homeDir = join(homedir(), '.local', 'share', 'matrixmail')
    }

    this.logsDir = join(this.homeDir, 'logs')
    this.credentialsFile = join(this.homeDir, 'login')
    this.cryptoStoreFile = join(this.homeDir, 'crypto.json')

    this.defaultHomeserver = 'matrix.org'
    this.httpTimeoutMs = positiveInt(process.env.MATRIXMAIL_HTTP_TIMEOUT_MS, DEFAULT_HTTP_TIMEOUT_MS)
    this.sendConcurrency = positiveInt(process.env.MATRIXMAIL_CONCURRENCY, DEFAULT_CONCURRENCY)
    this.isDebug = Boolean(process.env.DEBUG)
  }
}

export const configuration: Configuration = new Configuration()
