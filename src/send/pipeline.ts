import { MatrixApiError, type MatrixApi } from '@/api/client'
import { RoomEncryptionContentSchema, type RoomEncryptionContent, type ToDeviceMessages } from '@/api/types'
import { claimedOneTimeKey, deviceKey, devicesFromQuery, MEGOLM_ALGORITHM, type DeviceInfo } from '@/crypto/devices'
import type { CryptoMachine } from '@/crypto/machine'
import type { TrustDecision, TrustPolicy } from '@/crypto/trust'
import { isStaleKey, SendError } from '@/errors'
import { messageContent, type Message, type TextMessageContent } from '@/mail/compose'
import type { Session } from '@/persistence'
import type { RoomHandle } from '@/rooms/resolver'
import { logger } from '@/ui/logger'
import { KeyedLocks } from '@/utils/lock'
import {
  DEFAULT_ROTATION_PERIOD_MS,
  DEFAULT_ROTATION_PERIOD_MSGS,
  rotationReason,
  sharedWithOf,
  type ActiveGroupSession,
  type GroupSessionManager,
} from '@/send/groupSessions'

export type SendState =
  | 'Unresolved'
  | 'Resolved'
  | 'EncryptionChecked'
  | 'PlaintextReady'
  | 'GroupSessionReady'
  | 'Sent'
  | 'Failed'

export interface SendResult {
  roomId: string
  eventId: string
  encrypted: boolean
  /** A stale key forced one rotation and a second attempt */
  retried: boolean
}

export interface SecureSendPipelineOptions {
  api: MatrixApi
  session: Session
  machine: CryptoMachine
  groupSessions: GroupSessionManager
  trustPolicy: TrustPolicy
  now?: () => number
}

/**
 * Delivers a message into one joined room, encrypting it when the room asks
 * for it. Work for the same room is serialized; different rooms proceed
 * independently.
 */
export class SecureSendPipeline {
  private readonly api: MatrixApi
  private readonly session: Session
  private readonly machine: CryptoMachine
  private readonly groupSessions: GroupSessionManager
  private readonly trustPolicy: TrustPolicy
  private readonly now: () => number
  private readonly roomLocks = new KeyedLocks()
  private readonly trustDecisions = new Map<string, TrustDecision>()

  constructor(opts: SecureSendPipelineOptions) {
    this.api = opts.api
    this.session = opts.session
    this.machine = opts.machine
    this.groupSessions = opts.groupSessions
    this.trustPolicy = opts.trustPolicy
    this.now = opts.now ?? Date.now
  }

  send(room: RoomHandle, message: Message): Promise<SendResult> {
    return this.roomLocks.inLock(room.roomId, () => this.sendLocked(room, message))
  }

  private async sendLocked(room: RoomHandle, message: Message): Promise<SendResult> {
    const roomId = room.roomId
    const transition = (state: SendState) => logger.debug(`[SEND] ${roomId}: ${state}`)
    transition('Resolved')

    try {
      const encryption = await this.checkEncryption(roomId)
      transition('EncryptionChecked')
      const content = messageContent(message)

      if (!encryption) {
        transition('PlaintextReady')
        const eventId = await this.api.sendEvent(roomId, 'm.room.message', { ...content })
        transition('Sent')
        return { roomId, eventId, encrypted: false, retried: false }
      }

      let retried = false
      let eventId: string
      try {
        eventId = await this.sendEncrypted(roomId, encryption, content, transition)
      } catch (error) {
        if (!isStaleKey(error)) {
          throw error
        }
        logger.debug(`[SEND] ${roomId}: stale key material, rotating and retrying once`, error)
        retried = true
        await this.groupSessions.discard(roomId)
        eventId = await this.sendEncrypted(roomId, encryption, content, transition)
      }
      transition('Sent')
      return { roomId, eventId, encrypted: true, retried }
    } catch (error) {
      transition('Failed')
      throw toSendError(error)
    }
  }

  private async checkEncryption(roomId: string): Promise<RoomEncryptionContent | null> {
    const state = await this.api.getStateEvent(roomId, 'm.room.encryption')
    if (!state) {
      return null
    }
    const parsed = RoomEncryptionContentSchema.safeParse(state)
    if (!parsed.success || parsed.data.algorithm !== MEGOLM_ALGORITHM) {
      const algorithm = parsed.success ? parsed.data.algorithm : 'unknown'
      throw new SendError('Unsupported', `Room ${roomId} uses unsupported encryption ${algorithm}`)
    }
    return parsed.data
  }

  private async sendEncrypted(
    roomId: string,
    encryption: RoomEncryptionContent,
    content: TextMessageContent,
    transition: (state: SendState) => void,
  ): Promise<string> {
    const { devices, unqueriedUsers } = await this.recipientDevices(roomId)
    const trusted = devices.filter(device => this.decide(device) === 'trusted')

    let session = await this.groupSessions.current(roomId)
    const reason = session ? rotationReason(session.record, trusted, this.now(), unqueriedUsers) : 'no session yet'
    if (!session || reason) {
      logger.debug(`[SEND] ${roomId}: new group session (${reason})`)
      session = await this.establishGroupSession(roomId, encryption, trusted)
    }
    transition('GroupSessionReady')

    return this.sendWithGroupSession(roomId, session, content)
  }

  private async sendWithGroupSession(roomId: string, session: ActiveGroupSession, content: TextMessageContent): Promise<string> {
    const ciphertext = session.cipher.encrypt(JSON.stringify({
      type: 'm.room.message',
      content,
      room_id: roomId,
    }))
    await this.groupSessions.recordEncryption(roomId, session)

    return this.api.sendEvent(roomId, 'm.room.encrypted', {
      algorithm: MEGOLM_ALGORITHM,
      sender_key: this.machine.identityKeys().curve25519,
      ciphertext,
      session_id: session.cipher.sessionId,
      device_id: this.session.deviceId,
    })
  }

  private async recipientDevices(roomId: string): Promise<{ devices: DeviceInfo[], unqueriedUsers: Set<string> }> {
    const members = await this.api.joinedMembers(roomId)
    const response = await this.api.queryKeys(members)
    const failedServers = new Set(Object.keys(response.failures))
    for (const server of failedServers) {
      logger.warn(`Could not fetch device keys from ${server}, only its devices that already hold the room key can read the message in ${roomId}`)
    }
    const devices = devicesFromQuery(response).filter(device =>
      !(device.userId === this.session.userId && device.deviceId === this.session.deviceId)
    )
    const unqueriedUsers = new Set(members.filter(userId => failedServers.has(userId.slice(userId.indexOf(':') + 1))))
    return { devices, unqueriedUsers }
  }

  private decide(device: DeviceInfo): TrustDecision {
    // Keyed by identity key too, a device that swapped keys is a new device
    const key = `${deviceKey(device)}|${device.ed25519Key}`
    let decision = this.trustDecisions.get(key)
    if (!decision) {
      decision = this.trustPolicy.decide(device)
      this.trustDecisions.set(key, decision)
      logger.debug(`[TRUST] ${this.trustPolicy.name}: ${device.userId} ${device.deviceId} is ${decision}`)
    }
    return decision
  }

  private async establishGroupSession(
    roomId: string,
    encryption: RoomEncryptionContent,
    trusted: DeviceInfo[],
  ): Promise<ActiveGroupSession> {
    const cipher = this.groupSessions.create()
    try {
      await this.distributeRoomKey(roomId, cipher.sessionId, cipher.sessionKey(), trusted)
      return await this.groupSessions.commit(roomId, cipher, {
        sharedWith: sharedWithOf(trusted),
        rotationPeriodMs: encryption.rotation_period_ms ?? DEFAULT_ROTATION_PERIOD_MS,
        rotationPeriodMsgs: encryption.rotation_period_msgs ?? DEFAULT_ROTATION_PERIOD_MSGS,
        createdAt: this.now(),
      })
    } catch (error) {
      cipher.free()
      throw error
    }
  }

  private async distributeRoomKey(roomId: string, sessionId: string, sessionKey: string, devices: DeviceInfo[]): Promise<void> {
    if (devices.length === 0) {
      logger.debug(`[SEND] ${roomId}: no other trusted devices, nobody to share the room key with`)
      return
    }

    await this.ensureOlmSessions(devices)

    const roomKey = {
      algorithm: MEGOLM_ALGORITHM,
      room_id: roomId,
      session_id: sessionId,
      session_key: sessionKey,
    }
    const messages: ToDeviceMessages = {}
    for (const device of devices) {
      (messages[device.userId] ??= {})[device.deviceId] = { ...this.machine.encryptForDevice(device, 'm.room_key', roomKey) }
    }
    // The Olm ratchets moved, keep them even if delivery fails below
    await this.groupSessions.saveOlmSessions()
    await this.api.sendToDevice('m.room.encrypted', messages)
    logger.debug(`[SEND] ${roomId}: room key ${sessionId} sent to ${devices.length} devices`)
  }

  private async ensureOlmSessions(devices: DeviceInfo[]): Promise<void> {
    const missing = devices.filter(device => !this.machine.hasOlmSession(device.curve25519Key))
    if (missing.length === 0) {
      return
    }

    const request: Record<string, Record<string, string>> = {}
    for (const device of missing) {
      (request[device.userId] ??= {})[device.deviceId] = 'signed_curve25519'
    }
    const claimed = await this.api.claimKeys(request)

    const stale: DeviceInfo[] = []
    for (const device of missing) {
      const oneTimeKey = claimedOneTimeKey(claimed.one_time_keys[device.userId]?.[device.deviceId], device)
      if (!oneTimeKey) {
        stale.push(device)
        continue
      }
      this.machine.createOutboundOlmSession(device.curve25519Key, oneTimeKey)
    }
    if (stale.length > 0) {
      throw new SendError('StaleKey', `No usable one-time key for ${stale.map(device => `${device.userId} ${device.deviceId}`).join(', ')}`)
    }
  }
}

function toSendError(error: unknown): unknown {
  if (!(error instanceof MatrixApiError)) {
    return error
  }
  if (error.isRateLimited()) {
    const wait = error.retryAfterMs !== null ? `, retry after ${error.retryAfterMs}ms` : ''
    return new SendError('RateLimited', `${error.message}${wait}`, { cause: error })
  }
  if (error.isUnknownToken() || error.isForbidden()) {
    return new SendError('Unauthorized', error.message, { cause: error })
  }
  return new SendError('NetworkFailure', error.message, { cause: error })
}
