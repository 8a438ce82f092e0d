import { existsSync } from 'node:fs'
import { readFile, unlink } from 'node:fs/promises'
import * as z from 'zod'
import { writeFileAtomic } from '@/persistence'
import { logger } from '@/ui/logger'
import { AsyncLock } from '@/utils/lock'

const groupSessionRecordSchema = z.object({
  sessionId: z.string(),
  pickle: z.string(),
  createdAt: z.number(),
  messageCount: z.number().int().nonnegative(),
  /** userId -> deviceIds the room key was delivered to */
  sharedWith: z.record(z.string(), z.array(z.string())),
  rotationPeriodMs: z.number().int().positive(),
  rotationPeriodMsgs: z.number().int().positive(),
})

export type GroupSessionRecord = z.infer<typeof groupSessionRecordSchema>

const cryptoStoreSchema = z.object({
  version: z.literal(1),
  deviceId: z.string(),
  /** Latest account pickle, newer than the one in the login record once one-time keys were topped up */
  account: z.string().optional(),
  /** peer curve25519 key -> pickled Olm session */
  olmSessions: z.record(z.string(), z.string()),
  /** roomId -> outbound group session */
  groupSessions: z.record(z.string(), groupSessionRecordSchema),
})

export type CryptoStoreData = z.infer<typeof cryptoStoreSchema>

/**
 * Mutable encryption state written during sends: the account after key
 * top-ups, pairwise Olm sessions and each room's outbound group session.
 *
 * Updates are copy-on-write: the in-memory view only changes after the new
 * file is in place.
 */
export class CryptoStore {
  private data: CryptoStoreData | null = null
  private readonly lock = new AsyncLock()

  constructor(private readonly file: string, private readonly deviceId: string) { }

  async load(): Promise<CryptoStoreData> {
    if (this.data) {
      return this.data
    }
    this.data = await this.readFromDisk()
    return this.data
  }

  async getGroupSession(roomId: string): Promise<GroupSessionRecord | null> {
    const data = await this.load()
    return data.groupSessions[roomId] ?? null
  }

  update(mutator: (draft: CryptoStoreData) => void): Promise<CryptoStoreData> {
    return this.lock.inLock(async () => {
      const current = await this.load()
      const draft = structuredClone(current)
      mutator(draft)
      await writeFileAtomic(this.file, JSON.stringify(draft))
      this.data = draft
      return draft
    })
  }

  async clear(): Promise<void> {
    await this.lock.inLock(async () => {
      if (existsSync(this.file)) {
        await unlink(this.file)
      }
      this.data = this.empty()
    })
  }

  private empty(): CryptoStoreData {
    return { version: 1, deviceId: this.deviceId, olmSessions: {}, groupSessions: {} }
  }

  private async readFromDisk(): Promise<CryptoStoreData> {
    if (!existsSync(this.file)) {
      return this.empty()
    }
    try {
      const parsed = cryptoStoreSchema.safeParse(JSON.parse(await readFile(this.file, 'utf8')))
      if (!parsed.success) {
        logger.warn(`Ignoring invalid crypto store ${this.file}, encrypted rooms will get new keys`)
        return this.empty()
      }
      if (parsed.data.deviceId !== this.deviceId) {
        logger.debug(`[CRYPTO] Crypto store belongs to device ${parsed.data.deviceId}, starting fresh`)
        return this.empty()
      }
      return parsed.data
    } catch (error) {
      logger.warn(`Ignoring unreadable crypto store ${this.file}, encrypted rooms will get new keys`)
      logger.debug('[CRYPTO] Crypto store read failed', error)
      return this.empty()
    }
  }
}
