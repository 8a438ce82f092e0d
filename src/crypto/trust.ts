import type { DeviceInfo } from '@/crypto/devices'

export type TrustDecision = 'trusted' | 'untrusted'

/**
 * Decides whether room keys may be shared with a recipient device.
 * The send pipeline consults it once per device it has not seen before and
 * never looks at device trust any other way.
 */
export interface TrustPolicy {
  readonly name: string
  decide(device: DeviceInfo): TrustDecision
}

/**
 * Share keys with every device that has a valid self-signature, without
 * any verification.
 */
export const trustAllDevices: TrustPolicy = {
  name: 'trust-all',
  decide: () => 'trusted',
}

