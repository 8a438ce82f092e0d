/**
 * Credential persistence for matrixmail
 *
 * Handles the login record in $XDG_DATA_HOME/matrixmail/ (see configuration.ts).
 * The record is written by setup only; sends never write it.
 */

import { readFile, writeFile, mkdir, rename, unlink } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { dirname } from 'node:path'
import * as z from 'zod'
import { configuration } from '@/configuration'
import { CredentialStoreError } from '@/errors'

/**
 * An authenticated session against one homeserver
 */
export interface Session {
  homeserverUrl: string
  userId: string
  accessToken: string
  deviceId: string
  deviceDisplayName: string
}

/**
 * Session plus the pickled device account it was registered with
 */
export interface StoredCredentials extends Session {
  pickleKey: string
  account: string
}

const credentialsSchema = z.object({
  version: z.literal(1),
  homeserverUrl: z.string().url(),
  userId: z.string().min(1),
  // Token and device are issued together by login, a record with only one of them is corrupt
  accessToken: z.string().min(1),
  deviceId: z.string().min(1),
  deviceDisplayName: z.string(),
  encryption: z.object({
    pickleKey: z.string().base64(),
    account: z.string().min(1),
  }),
})

/**
 * Write `content` next to `file` and rename it into place, so readers see
 * either the old or the new file and never a partial one.
 */
export async function writeFileAtomic(file: string, content: string): Promise<void> {
  const dir = dirname(file)
  if (!existsSync(dir)) {
    await mkdir(dir, { recursive: true, mode: 0o700 })
  }
  const tmpFile = `${file}.${process.pid}.tmp`
  try {
    await writeFile(tmpFile, content, { mode: 0o600 })
    await rename(tmpFile, file) // Atomic on POSIX
  } catch (error) {
    await unlink(tmpFile).catch(() => undefined)
    throw error
  }
}

export async function readCredentials(file: string = configuration.credentialsFile): Promise<StoredCredentials | null> {
  if (!existsSync(file)) {
    return null
  }

  let raw: unknown
  try {
    raw = JSON.parse(await readFile(file, 'utf8'))
  } catch (error) {
    throw new CredentialStoreError(`Cannot read login record ${file}`, { cause: error })
  }

  const parsed = credentialsSchema.safeParse(raw)
  if (!parsed.success) {
    throw new CredentialStoreError(`Login record ${file} is invalid, run matrixmail setup again`, { cause: parsed.error })
  }

  const record = parsed.data
  return {
    homeserverUrl: record.homeserverUrl,
    userId: record.userId,
    accessToken: record.accessToken,
    deviceId: record.deviceId,
    deviceDisplayName: record.deviceDisplayName,
    pickleKey: record.encryption.pickleKey,
    account: record.encryption.account,
  }
}

export async function writeCredentials(credentials: StoredCredentials, file: string = configuration.credentialsFile): Promise<void> {
  const record: z.input<typeof credentialsSchema> = {
    version: 1,
    homeserverUrl: credentials.homeserverUrl,
    userId: credentials.userId,
    accessToken: credentials.accessToken,
    deviceId: credentials.deviceId,
    deviceDisplayName: credentials.deviceDisplayName,
    encryption: {
      pickleKey: credentials.pickleKey,
      account: credentials.account,
    },
  }
  try {
    await writeFileAtomic(file, JSON.stringify(record, null, 2))
  } catch (error) {
    throw new CredentialStoreError(`Cannot write login record ${file}`, { cause: error })
  }
}

export async function clearCredentials(file: string = configuration.credentialsFile): Promise<boolean> {
  if (!existsSync(file)) {
    return false
  }
  await unlink(file)
  return true
}

export function sessionOf(credentials: StoredCredentials): Session {
  return {
    homeserverUrl: credentials.homeserverUrl,
    userId: credentials.userId,
    accessToken: credentials.accessToken,
    deviceId: credentials.deviceId,
    deviceDisplayName: credentials.deviceDisplayName,
  }
}
