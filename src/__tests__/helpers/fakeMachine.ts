import type { DeviceKeys, SignedKey } from '@/api/types'
import { OLM_ALGORITHM, type DeviceInfo } from '@/crypto/devices'
import type { CryptoMachine, IdentityKeys, OlmEncryptedContent, OutboundGroupCipher } from '@/crypto/machine'

let groupCounter = 0

/**
 * Group cipher whose "ciphertext" shows the session, index and plaintext
 */
export class FakeGroupCipher implements OutboundGroupCipher {
  freed = false

  constructor(readonly sessionId: string, private index: number = 0) { }

  sessionKey(): string {
    return `key-${this.sessionId}`
  }

  messageIndex(): number {
    return this.index
  }

  encrypt(plaintext: string): string {
    return `${this.sessionId}/${this.index++}/${plaintext}`
  }

  pickle(): string {
    return JSON.stringify({ sessionId: this.sessionId, index: this.index })
  }

  free(): void {
    this.freed = true
  }
}

export class FakeMachine implements CryptoMachine {
  readonly olmSessions = new Map<string, string>()
  readonly groupCiphers: FakeGroupCipher[] = []
  published = false
  accountVersion = 0

  constructor(
    readonly userId: string = '@alice:example.org',
    readonly deviceId: string = 'LAPTOP',
    readonly olmSessionsAtStart: Record<string, string> = {},
  ) {
    for (const [key, pickle] of Object.entries(olmSessionsAtStart)) {
      this.olmSessions.set(key, pickle)
    }
  }

  identityKeys(): IdentityKeys {
    return { curve25519: 'curve-self', ed25519: 'ed-self' }
  }

  deviceKeys(): DeviceKeys {
    return {
      user_id: this.userId,
      device_id: this.deviceId,
      algorithms: [OLM_ALGORITHM],
      keys: { [`curve25519:${this.deviceId}`]: 'curve-self', [`ed25519:${this.deviceId}`]: 'ed-self' },
      signatures: { [this.userId]: { [`ed25519:${this.deviceId}`]: 'self-signature' } },
    }
  }

  maxOneTimeKeys(): number {
    return 10
  }

  generateOneTimeKeys(count: number): Record<string, SignedKey> {
    this.published = false
    this.accountVersion++
    const keys: Record<string, SignedKey> = {}
    for (let i = 0; i < count; i++) {
      keys[`signed_curve25519:AAAA${i}`] = { key: `own-otk-${i}`, signatures: {} }
    }
    return keys
  }

  markKeysAsPublished(): void {
    this.published = true
  }

  hasOlmSession(curve25519Key: string): boolean {
    return this.olmSessions.has(curve25519Key)
  }

  createOutboundOlmSession(curve25519Key: string, oneTimeKey: string): void {
    this.olmSessions.set(curve25519Key, `olm:${oneTimeKey}`)
  }

  encryptForDevice(device: DeviceInfo, eventType: string, content: Record<string, unknown>): OlmEncryptedContent {
    if (!this.olmSessions.has(device.curve25519Key)) {
      throw new Error(`No Olm session with ${device.deviceId}`)
    }
    return {
      algorithm: OLM_ALGORITHM,
      sender_key: 'curve-self',
      ciphertext: { [device.curve25519Key]: { type: 0, body: JSON.stringify({ type: eventType, content }) } },
    }
  }

  createGroupSession(): OutboundGroupCipher {
    const cipher = new FakeGroupCipher(`group-${++groupCounter}`)
    this.groupCiphers.push(cipher)
    return cipher
  }

  restoreGroupSession(pickle: string): OutboundGroupCipher {
    const parsed: unknown = JSON.parse(pickle)
    if (typeof parsed !== 'object' || parsed === null || !('sessionId' in parsed) || !('index' in parsed)
      || typeof parsed.sessionId !== 'string' || typeof parsed.index !== 'number') {
      throw new Error('bad group session pickle')
    }
    const cipher = new FakeGroupCipher(parsed.sessionId, parsed.index)
    this.groupCiphers.push(cipher)
    return cipher
  }

  pickleAccount(): string {
    return `account-v${this.accountVersion}`
  }

  pickleOlmSessions(): Record<string, string> {
    return Object.fromEntries(this.olmSessions)
  }
}
