import type { CryptoStore, GroupSessionRecord } from '@/crypto/cryptoStore'
import { deviceKey, type DeviceInfo } from '@/crypto/devices'
import type { CryptoMachine, OutboundGroupCipher } from '@/crypto/machine'
import { logger } from '@/ui/logger'

/** Protocol defaults when m.room.encryption does not set its own limits */
export const DEFAULT_ROTATION_PERIOD_MS = 7 * 24 * 60 * 60 * 1000
export const DEFAULT_ROTATION_PERIOD_MSGS = 100

export interface ActiveGroupSession {
  record: GroupSessionRecord
  readonly cipher: OutboundGroupCipher
}

export function sharedWithOf(devices: readonly DeviceInfo[]): Record<string, string[]> {
  const sharedWith: Record<string, string[]> = {}
  for (const device of devices) {
    (sharedWith[device.userId] ??= []).push(device.deviceId)
  }
  return sharedWith
}

/**
 * Why the room's current session must be replaced before the next message,
 * or null when it can be reused. `unqueriedUsers` are members whose devices
 * could not be fetched this time; devices of theirs the session was shared
 * with are not counted as gone.
 */
export function rotationReason(
  record: GroupSessionRecord,
  trustedDevices: readonly DeviceInfo[],
  now: number,
  unqueriedUsers: ReadonlySet<string> = new Set(),
): string | null {
  if (record.messageCount >= record.rotationPeriodMsgs) {
    return `message limit ${record.rotationPeriodMsgs} reached`
  }
  if (now - record.createdAt >= record.rotationPeriodMs) {
    return `session older than ${record.rotationPeriodMs}ms`
  }

  const current = new Set(trustedDevices.map(deviceKey))
  for (const [userId, deviceIds] of Object.entries(record.sharedWith)) {
    if (unqueriedUsers.has(userId)) {
      logger.debug(`[SEND] Keeping ${deviceIds.length} device(s) of ${userId} in the session, their keys could not be fetched`)
      continue
    }
    for (const deviceId of deviceIds) {
      if (!current.has(deviceKey({ userId, deviceId }))) {
        return `device ${userId} ${deviceId} is gone`
      }
    }
  }
  for (const device of trustedDevices) {
    if (!record.sharedWith[device.userId]?.includes(device.deviceId)) {
      return `new device ${device.userId} ${device.deviceId}`
    }
  }
  return null
}

/**
 * One outbound group session per room. Callers hold the room's lock around
 * every method taking a roomId.
 */
export class GroupSessionManager {
  private readonly active = new Map<string, ActiveGroupSession>()

  constructor(
    private readonly machine: CryptoMachine,
    private readonly store: CryptoStore,
  ) { }

  async current(roomId: string): Promise<ActiveGroupSession | null> {
    const cached = this.active.get(roomId)
    if (cached) {
      return cached
    }

    const record = await this.store.getGroupSession(roomId)
    if (!record) {
      return null
    }
    try {
      const session: ActiveGroupSession = { record, cipher: this.machine.restoreGroupSession(record.pickle) }
      this.active.set(roomId, session)
      return session
    } catch (error) {
      logger.debug(`[CRYPTO] Cannot restore group session for ${roomId}, a new one will be created`, error)
      return null
    }
  }

  create(): OutboundGroupCipher {
    return this.machine.createGroupSession()
  }

  /**
   * Make `cipher` the room's session. Called only after its key reached every
   * recipient, so a crash before this point leaves the previous session in place.
   */
  async commit(
    roomId: string,
    cipher: OutboundGroupCipher,
    opts: { sharedWith: Record<string, string[]>, rotationPeriodMs: number, rotationPeriodMsgs: number, createdAt: number },
  ): Promise<ActiveGroupSession> {
    const record: GroupSessionRecord = {
      sessionId: cipher.sessionId,
      pickle: cipher.pickle(),
      createdAt: opts.createdAt,
      messageCount: 0,
      sharedWith: opts.sharedWith,
      rotationPeriodMs: opts.rotationPeriodMs,
      rotationPeriodMsgs: opts.rotationPeriodMsgs,
    }
    await this.store.update(draft => {
      draft.groupSessions[roomId] = record
      draft.olmSessions = this.machine.pickleOlmSessions()
    })

    const previous = this.active.get(roomId)
    const session: ActiveGroupSession = { record, cipher }
    this.active.set(roomId, session)
    previous?.cipher.free()
    logger.debug(`[CRYPTO] Group session ${cipher.sessionId} committed for ${roomId}`)
    return session
  }

  /**
   * Persist the ratchet after an encryption so a message index is never reused
   */
  async recordEncryption(roomId: string, session: ActiveGroupSession): Promise<void> {
    const record: GroupSessionRecord = {
      ...session.record,
      pickle: session.cipher.pickle(),
      messageCount: session.record.messageCount + 1,
    }
    await this.store.update(draft => {
      draft.groupSessions[roomId] = record
    })
    session.record = record
  }

  async saveOlmSessions(): Promise<void> {
    await this.store.update(draft => {
      draft.olmSessions = this.machine.pickleOlmSessions()
    })
  }

  async discard(roomId: string): Promise<void> {
    const session = this.active.get(roomId)
    this.active.delete(roomId)
    session?.cipher.free()
    await this.store.update(draft => {
      delete draft.groupSessions[roomId]
    })
  }
}
