import { z } from 'zod'

/**
 * Standard error body returned by the homeserver
 */
export const MatrixErrorBodySchema = z.object({
  errcode: z.string(),
  error: z.string().optional(),
  retry_after_ms: z.number().optional(),
})

export type MatrixErrorBody = z.infer<typeof MatrixErrorBodySchema>

export const WellKnownSchema = z.object({
  'm.homeserver': z.object({
    base_url: z.string().url(),
  }),
})

export const LoginResponseSchema = z.object({
  user_id: z.string(),
  access_token: z.string(),
  device_id: z.string(),
  well_known: WellKnownSchema.partial().optional(),
})

export type LoginResponse = z.infer<typeof LoginResponseSchema>

export type PasswordLoginRequest = {
  type: 'm.login.password'
  identifier: { type: 'm.id.user', user: string }
  password: string
  device_id?: string
  initial_device_display_name?: string
}

export const WhoAmIResponseSchema = z.object({
  user_id: z.string(),
  device_id: z.string().optional(),
})

export type WhoAmIResponse = z.infer<typeof WhoAmIResponseSchema>

//
// Keys
//

/** userId -> keyId -> signature */
export type Signatures = Record<string, Record<string, string>>

export const SignaturesSchema = z.record(z.string(), z.record(z.string(), z.string()))

export const DeviceKeysSchema = z.object({
  user_id: z.string(),
  device_id: z.string(),
  algorithms: z.array(z.string()),
  keys: z.record(z.string(), z.string()),
  signatures: SignaturesSchema.optional(),
  unsigned: z.record(z.string(), z.unknown()).optional(),
}).passthrough()

export type DeviceKeys = z.infer<typeof DeviceKeysSchema>

export type SignedKey = {
  key: string
  signatures: Signatures
}

export const SignedKeySchema = z.object({
  key: z.string(),
  signatures: SignaturesSchema,
}).passthrough()

export type KeysUploadRequest = {
  device_keys?: DeviceKeys
  one_time_keys?: Record<string, SignedKey>
}

export const KeysUploadResponseSchema = z.object({
  one_time_key_counts: z.record(z.string(), z.number()).default({}),
})

export type KeysUploadResponse = z.infer<typeof KeysUploadResponseSchema>

export const KeysQueryResponseSchema = z.object({
  // Entries are validated one by one later, a single malformed device must not hide the others
  device_keys: z.record(z.string(), z.record(z.string(), z.unknown())).default({}),
  failures: z.record(z.string(), z.unknown()).default({}),
})

export type KeysQueryResponse = z.infer<typeof KeysQueryResponseSchema>

export const KeysClaimResponseSchema = z.object({
  one_time_keys: z.record(z.string(), z.record(z.string(), z.record(z.string(), z.unknown()))).default({}),
  failures: z.record(z.string(), z.unknown()).default({}),
})

export type KeysClaimResponse = z.infer<typeof KeysClaimResponseSchema>

//
// Rooms
//

export const ResolveAliasResponseSchema = z.object({
  room_id: z.string(),
  servers: z.array(z.string()).default([]),
})

export type ResolveAliasResponse = z.infer<typeof ResolveAliasResponseSchema>

export const JoinedRoomsResponseSchema = z.object({
  joined_rooms: z.array(z.string()),
})

export const InviteSyncResponseSchema = z.object({
  next_batch: z.string(),
  rooms: z.object({
    invite: z.record(z.string(), z.unknown()).default({}),
  }).partial().optional(),
})

export const JoinResponseSchema = z.object({
  room_id: z.string(),
})

export const JoinedMembersResponseSchema = z.object({
  joined: z.record(z.string(), z.unknown()),
})

export const SendEventResponseSchema = z.object({
  event_id: z.string(),
})

export const RoomEncryptionContentSchema = z.object({
  algorithm: z.string(),
  rotation_period_ms: z.number().int().positive().optional(),
  rotation_period_msgs: z.number().int().positive().optional(),
})

export type RoomEncryptionContent = z.infer<typeof RoomEncryptionContentSchema>

/** userId -> deviceId -> content */
export type ToDeviceMessages = Record<string, Record<string, Record<string, unknown>>>
