import type { DeviceKeys, SignedKey } from '@/api/types'
import type { DeviceInfo } from '@/crypto/devices'

export interface IdentityKeys {
  curve25519: string
  ed25519: string
}

/**
 * Content of an `m.room.encrypted` to-device event carrying Olm ciphertext
 */
export interface OlmEncryptedContent {
  algorithm: 'm.olm.v1.curve25519-aes-sha2'
  sender_key: string
  ciphertext: Record<string, { type: number, body: string }>
}

/**
 * Outbound half of a room's group (Megolm) session
 */
export interface OutboundGroupCipher {
  readonly sessionId: string
  sessionKey(): string
  messageIndex(): number
  encrypt(plaintext: string): string
  pickle(): string
  free(): void
}

/**
 * Our device's encryption state: the long-lived account, pairwise sessions
 * to other devices and the factory for group sessions.
 */
export interface CryptoMachine {
  readonly userId: string
  readonly deviceId: string
  identityKeys(): IdentityKeys
  /** Self-signed device keys for `/keys/upload` */
  deviceKeys(): DeviceKeys
  maxOneTimeKeys(): number
  /** Generate `count` one-time keys and return all unpublished ones, signed */
  generateOneTimeKeys(count: number): Record<string, SignedKey>
  markKeysAsPublished(): void
  hasOlmSession(curve25519Key: string): boolean
  createOutboundOlmSession(curve25519Key: string, oneTimeKey: string): void
  encryptForDevice(device: DeviceInfo, eventType: string, content: Record<string, unknown>): OlmEncryptedContent
  createGroupSession(): OutboundGroupCipher
  restoreGroupSession(pickle: string): OutboundGroupCipher
  pickleAccount(): string
  pickleOlmSessions(): Record<string, string>
}
