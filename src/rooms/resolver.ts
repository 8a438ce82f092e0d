import { MatrixApiError, type MatrixApi } from '@/api/client'
import { ResolveError } from '@/errors'
import type { Session } from '@/persistence'
import { logger } from '@/ui/logger'

export type MembershipState = 'invited' | 'joined' | 'none'

export type RoomAddress =
  | { kind: 'roomId', address: string }
  | { kind: 'alias', address: string }

/**
 * A room ready to receive messages. `previousMembership` is what resolution
 * found before joining.
 */
export interface RoomHandle {
  readonly roomId: string
  readonly address: string
  readonly membershipState: 'joined'
  readonly previousMembership: MembershipState
}

// Room IDs from room version 12 on carry no server name
const ROOM_ID_PATTERN = /^![^:\s]+(:[^\s]+)?$/
const ALIAS_PATTERN = /^#[^:\s]+:[^\s]+$/

export function parseAddress(address: string): RoomAddress {
  const trimmed = address.trim()
  if (ROOM_ID_PATTERN.test(trimmed)) {
    return { kind: 'roomId', address: trimmed }
  }
  if (ALIAS_PATTERN.test(trimmed)) {
    return { kind: 'alias', address: trimmed }
  }
  if (trimmed.startsWith('@')) {
    throw new ResolveError('UnsupportedAddressForm', `${trimmed} is a user ID, only room IDs (!room:server) and aliases (#alias:server) can be addressed`)
  }
  throw new ResolveError('UnsupportedAddressForm', `${trimmed} is not a room ID (!room:server) or alias (#alias:server)`)
}

/**
 * Turns addresses into joined rooms for one session. Each room is joined at
 * most once per resolver, however many addresses point at it and however
 * many resolutions run at the same time.
 */
export class RoomResolver {
  private readonly byAddress = new Map<string, Promise<RoomHandle>>()
  private readonly byRoom = new Map<string, Promise<MembershipState>>()
  private joinedRooms: Promise<Set<string>> | null = null
  private invitedRooms: Promise<Set<string>> | null = null

  constructor(
    private readonly api: MatrixApi,
    private readonly session: Session,
  ) { }

  resolve(address: string): Promise<RoomHandle> {
    let pending = this.byAddress.get(address)
    if (!pending) {
      pending = this.resolveUncached(address)
      this.byAddress.set(address, pending)
    }
    return pending
  }

  private async resolveUncached(address: string): Promise<RoomHandle> {
    const parsed = parseAddress(address)
    const { roomId, servers } = parsed.kind === 'alias'
      ? await this.lookupAlias(parsed.address)
      : { roomId: parsed.address, servers: serverNameOf(parsed.address) }

    let membership = this.byRoom.get(roomId)
    if (!membership) {
      membership = this.ensureJoined(roomId, parsed, servers)
      this.byRoom.set(roomId, membership)
    }
    return { roomId, address: parsed.address, membershipState: 'joined', previousMembership: await membership }
  }

  private async lookupAlias(alias: string): Promise<{ roomId: string, servers: string[] }> {
    try {
      const response = await this.api.resolveAlias(alias)
      logger.debug(`[ROOMS] ${alias} is ${response.room_id}`)
      return { roomId: response.room_id, servers: response.servers }
    } catch (error) {
      if (error instanceof MatrixApiError && error.isNotFound()) {
        throw new ResolveError('AliasNotFound', `Room alias ${alias} does not exist`, { cause: error })
      }
      throw asResolveError(error, `Cannot look up ${alias}`)
    }
  }

  private async membershipOf(roomId: string): Promise<MembershipState> {
    // A failed fetch is dropped from the cache so the next address asks again
    try {
      this.joinedRooms ??= this.api.joinedRooms().then(rooms => new Set(rooms)).catch((error: unknown) => {
        this.joinedRooms = null
        throw error
      })
      if ((await this.joinedRooms).has(roomId)) {
        return 'joined'
      }
      this.invitedRooms ??= this.api.invitedRooms().then(rooms => new Set(rooms)).catch((error: unknown) => {
        this.invitedRooms = null
        throw error
      })
      return (await this.invitedRooms).has(roomId) ? 'invited' : 'none'
    } catch (error) {
      throw asResolveError(error, `Cannot determine membership of ${this.session.userId} in ${roomId}`)
    }
  }

  private async ensureJoined(roomId: string, address: RoomAddress, servers: string[]): Promise<MembershipState> {
    const membership = await this.membershipOf(roomId)
    if (membership === 'joined') {
      logger.debug(`[ROOMS] Already joined ${roomId}`)
      return membership
    }

    // Joining an invited room accepts the invite. Otherwise go through the alias
    // so the homeserver can join over federation.
    const target = membership === 'none' && address.kind === 'alias' ? address.address : roomId
    try {
      await this.api.joinRoom(target, membership === 'none' ? servers : [])
    } catch (error) {
      if (error instanceof MatrixApiError && (error.isForbidden() || error.isNotFound())) {
        throw new ResolveError('JoinDenied', `Cannot join ${address.address}: ${error.message}`, { cause: error })
      }
      throw asResolveError(error, `Cannot join ${address.address}`)
    }
    logger.debug(`[ROOMS] Joined ${roomId} (${membership === 'invited' ? 'accepted invite' : 'joined directly'})`)
    const joined = await this.joinedRooms
    joined?.add(roomId)
    return membership
  }
}

function serverNameOf(roomId: string): string[] {
  const separator = roomId.indexOf(':')
  return separator === -1 ? [] : [roomId.slice(separator + 1)]
}

function asResolveError(error: unknown, context: string): ResolveError {
  if (error instanceof ResolveError) {
    return error
  }
  const detail = error instanceof Error ? error.message : String(error)
  return new ResolveError('NetworkFailure', `${context}: ${detail}`, { cause: error })
}
