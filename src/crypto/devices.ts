import nacl from 'tweetnacl'
import { DeviceKeysSchema, SignedKeySchema, type KeysQueryResponse } from '@/api/types'
import { logger } from '@/ui/logger'
import { canonicalJson } from '@/crypto/canonicalJson'
import { decodeBase64 } from '@/crypto/encoding'

export const OLM_ALGORITHM = 'm.olm.v1.curve25519-aes-sha2'
export const MEGOLM_ALGORITHM = 'm.megolm.v1.aes-sha2'

/**
 * A recipient device whose self-signature checked out
 */
export interface DeviceInfo {
  userId: string
  deviceId: string
  curve25519Key: string
  ed25519Key: string
  displayName?: string
}

export function deviceKey(device: Pick<DeviceInfo, 'userId' | 'deviceId'>): string {
  return `${device.userId}|${device.deviceId}`
}

/**
 * Verify an ed25519 signature made by `userId`/`keyId` over the canonical
 * form of `object` minus its `signatures` and `unsigned` members.
 */
export function verifySignature(
  object: Record<string, unknown>,
  userId: string,
  keyId: string,
  ed25519Key: string,
): boolean {
  const { signatures, unsigned: _unsigned, ...signable } = object
  if (!isSignatureMap(signatures)) {
    return false
  }
  const signature = signatures[userId]?.[keyId]
  if (!signature) {
    return false
  }
  try {
    const message = new TextEncoder().encode(canonicalJson(signable))
    return nacl.sign.detached.verify(message, decodeBase64(signature), decodeBase64(ed25519Key))
  } catch (error) {
    logger.debug(`[CRYPTO] Signature check failed for ${userId} ${keyId}`, error)
    return false
  }
}

/**
 * Turn a `/keys/query` response into verified devices. Entries whose IDs do
 * not match their position, that lack keys, or whose self-signature is bad
 * are dropped.
 */
export function devicesFromQuery(response: KeysQueryResponse): DeviceInfo[] {
  const devices: DeviceInfo[] = []
  for (const [userId, userDevices] of Object.entries(response.device_keys)) {
    for (const [deviceId, raw] of Object.entries(userDevices)) {
      const parsed = DeviceKeysSchema.safeParse(raw)
      if (!parsed.success) {
        logger.debug(`[CRYPTO] Ignoring malformed device ${userId} ${deviceId}`)
        continue
      }
      const keys = parsed.data
      if (keys.user_id !== userId || keys.device_id !== deviceId) {
        logger.debug(`[CRYPTO] Ignoring device ${userId} ${deviceId}: ids do not match`)
        continue
      }
      const curve25519Key = keys.keys[`curve25519:${deviceId}`]
      const ed25519Key = keys.keys[`ed25519:${deviceId}`]
      if (!curve25519Key || !ed25519Key || !keys.algorithms.includes(OLM_ALGORITHM)) {
        logger.debug(`[CRYPTO] Ignoring device ${userId} ${deviceId}: no usable keys`)
        continue
      }
      if (!verifySignature(keys, userId, `ed25519:${deviceId}`, ed25519Key)) {
        logger.debug(`[CRYPTO] Ignoring device ${userId} ${deviceId}: bad self-signature`)
        continue
      }
      const displayName = keys.unsigned?.['device_display_name']
      devices.push({
        userId,
        deviceId,
        curve25519Key,
        ed25519Key,
        displayName: typeof displayName === 'string' ? displayName : undefined,
      })
    }
  }
  return devices
}

/**
 * Pick the signed one-time key claimed for `device`, or null when the
 * homeserver returned none or its signature does not verify.
 */
export function claimedOneTimeKey(claimed: Record<string, unknown> | undefined, device: DeviceInfo): string | null {
  if (!claimed) {
    return null
  }
  for (const [keyId, raw] of Object.entries(claimed)) {
    if (!keyId.startsWith('signed_curve25519:')) {
      continue
    }
    const parsed = SignedKeySchema.safeParse(raw)
    if (parsed.success && verifySignature(parsed.data, device.userId, `ed25519:${device.deviceId}`, device.ed25519Key)) {
      return parsed.data.key
    }
  }
  return null
}

function isSignatureMap(value: unknown): value is Record<string, Record<string, string> | undefined> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
