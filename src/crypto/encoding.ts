import { randomBytes } from 'node:crypto'

/**
 * Encode a Uint8Array to base64 string
 * @param variant - 'unpadded' drops the trailing '=' characters, as the Matrix protocol does
 */
export function encodeBase64(buffer: Uint8Array, variant: 'base64' | 'unpadded' = 'base64'): string {
  const encoded = Buffer.from(buffer).toString('base64')
  return variant === 'unpadded' ? encoded.replace(/=+$/, '') : encoded
}

/**
 * Decode a base64 string (padded or not) to a Uint8Array
 */
export function decodeBase64(base64: string): Uint8Array {
  return new Uint8Array(Buffer.from(base64, 'base64'))
}

/**
 * Generate secure random bytes
 */
export function getRandomBytes(size: number): Uint8Array {
  return new Uint8Array(randomBytes(size))
}
