import { createRequire } from 'node:module'
import type { Account, OutboundGroupSession, Session as OlmSession } from '@matrix-org/olm'
import type { DeviceKeys, SignedKey } from '@/api/types'
import { logger } from '@/ui/logger'
import { canonicalJson } from '@/crypto/canonicalJson'
import { MEGOLM_ALGORITHM, OLM_ALGORITHM, type DeviceInfo } from '@/crypto/devices'
import type { CryptoMachine, IdentityKeys, OlmEncryptedContent, OutboundGroupCipher } from '@/crypto/machine'

// libolm is an emscripten CommonJS bundle that finds its .wasm beside itself
const require = createRequire(import.meta.url)
const Olm: typeof import('@matrix-org/olm') = require('@matrix-org/olm')

let olmReady: Promise<void> | null = null

export function initOlm(): Promise<void> {
  if (!olmReady) {
    olmReady = Olm.init().then(() => {
      logger.debug(`[CRYPTO] libolm ${Olm.get_library_version().join('.')} loaded`)
    })
  }
  return olmReady
}

class OlmOutboundGroupCipher implements OutboundGroupCipher {
  readonly sessionId: string

  constructor(private readonly session: OutboundGroupSession, private readonly pickleKey: string) {
    this.sessionId = session.session_id()
  }

  sessionKey(): string {
    return this.session.session_key()
  }

  messageIndex(): number {
    return this.session.message_index()
  }

  encrypt(plaintext: string): string {
    return this.session.encrypt(plaintext)
  }

  pickle(): string {
    return this.session.pickle(this.pickleKey)
  }

  free(): void {
    this.session.free()
  }
}

export class OlmMachine implements CryptoMachine {
  private readonly sessions = new Map<string, OlmSession>()

  private constructor(
    public readonly userId: string,
    public readonly deviceId: string,
    private readonly account: Account,
    private readonly pickleKey: string,
  ) { }

  /**
   * Create a brand new device identity. Only done by setup.
   */
  static async create(userId: string, deviceId: string, pickleKey: string): Promise<OlmMachine> {
    await initOlm()
    const account = new Olm.Account()
    account.create()
    return new OlmMachine(userId, deviceId, account, pickleKey)
  }

  static async restore(opts: {
    userId: string,
    deviceId: string,
    pickleKey: string,
    account: string,
    olmSessions?: Record<string, string>,
  }): Promise<OlmMachine> {
    await initOlm()
    const account = new Olm.Account()
    account.unpickle(opts.pickleKey, opts.account)
    const machine = new OlmMachine(opts.userId, opts.deviceId, account, opts.pickleKey)
    for (const [curve25519Key, pickle] of Object.entries(opts.olmSessions ?? {})) {
      const session = new Olm.Session()
      session.unpickle(opts.pickleKey, pickle)
      machine.sessions.set(curve25519Key, session)
    }
    return machine
  }

  identityKeys(): IdentityKeys {
    const keys: unknown = JSON.parse(this.account.identity_keys())
    if (!isStringRecord(keys) || !keys.curve25519 || !keys.ed25519) {
      throw new Error('libolm returned malformed identity keys')
    }
    return { curve25519: keys.curve25519, ed25519: keys.ed25519 }
  }

  deviceKeys(): DeviceKeys {
    const identity = this.identityKeys()
    const unsigned = {
      user_id: this.userId,
      device_id: this.deviceId,
      algorithms: [OLM_ALGORITHM, MEGOLM_ALGORITHM],
      keys: {
        [`curve25519:${this.deviceId}`]: identity.curve25519,
        [`ed25519:${this.deviceId}`]: identity.ed25519,
      },
    }
    return { ...unsigned, signatures: this.sign(unsigned) }
  }

  maxOneTimeKeys(): number {
    return this.account.max_number_of_one_time_keys()
  }

  generateOneTimeKeys(count: number): Record<string, SignedKey> {
    if (count > 0) {
      this.account.generate_one_time_keys(count)
    }
    const parsed: unknown = JSON.parse(this.account.one_time_keys())
    const curveKeys = typeof parsed === 'object' && parsed !== null && 'curve25519' in parsed ? parsed.curve25519 : {}
    const signed: Record<string, SignedKey> = {}
    if (!isStringRecord(curveKeys)) {
      return signed
    }
    for (const [keyId, key] of Object.entries(curveKeys)) {
      signed[`signed_curve25519:${keyId}`] = { key, signatures: this.sign({ key }) }
    }
    return signed
  }

  markKeysAsPublished(): void {
    this.account.mark_keys_as_published()
  }

  hasOlmSession(curve25519Key: string): boolean {
    return this.sessions.has(curve25519Key)
  }

  createOutboundOlmSession(curve25519Key: string, oneTimeKey: string): void {
    const session = new Olm.Session()
    try {
      session.create_outbound(this.account, curve25519Key, oneTimeKey)
    } catch (error) {
      session.free()
      throw error
    }
    this.sessions.get(curve25519Key)?.free()
    this.sessions.set(curve25519Key, session)
  }

  encryptForDevice(device: DeviceInfo, eventType: string, content: Record<string, unknown>): OlmEncryptedContent {
    const session = this.sessions.get(device.curve25519Key)
    if (!session) {
      throw new Error(`No Olm session with ${device.userId} ${device.deviceId}`)
    }
    const identity = this.identityKeys()
    const payload = {
      type: eventType,
      content,
      sender: this.userId,
      sender_device: this.deviceId,
      keys: { ed25519: identity.ed25519 },
      recipient: device.userId,
      recipient_keys: { ed25519: device.ed25519Key },
    }
    const message = session.encrypt(JSON.stringify(payload))
    return {
      algorithm: OLM_ALGORITHM,
      sender_key: identity.curve25519,
      ciphertext: { [device.curve25519Key]: { type: message.type, body: message.body } },
    }
  }

  createGroupSession(): OutboundGroupCipher {
    const session = new Olm.OutboundGroupSession()
    session.create()
    return new OlmOutboundGroupCipher(session, this.pickleKey)
  }

  restoreGroupSession(pickle: string): OutboundGroupCipher {
    const session = new Olm.OutboundGroupSession()
    session.unpickle(this.pickleKey, pickle)
    return new OlmOutboundGroupCipher(session, this.pickleKey)
  }

  pickleAccount(): string {
    return this.account.pickle(this.pickleKey)
  }

  pickleOlmSessions(): Record<string, string> {
    const pickles: Record<string, string> = {}
    for (const [curve25519Key, session] of this.sessions) {
      pickles[curve25519Key] = session.pickle(this.pickleKey)
    }
    return pickles
  }

  private sign(object: Record<string, unknown>): Record<string, Record<string, string>> {
    return {
      [this.userId]: {
        [`ed25519:${this.deviceId}`]: this.account.sign(canonicalJson(object)),
      },
    }
  }
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return typeof value === 'object'
    && value !== null
    && Object.values(value).every(member => typeof member === 'string')
}
