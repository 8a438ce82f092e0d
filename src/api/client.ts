import axios, { type AxiosRequestConfig } from 'axios'
import { randomUUID } from 'node:crypto'
import type { z } from 'zod'
import { logger } from '@/ui/logger'
import {
  InviteSyncResponseSchema,
  JoinedMembersResponseSchema,
  JoinedRoomsResponseSchema,
  JoinResponseSchema,
  KeysClaimResponseSchema,
  KeysQueryResponseSchema,
  KeysUploadResponseSchema,
  LoginResponseSchema,
  MatrixErrorBodySchema,
  ResolveAliasResponseSchema,
  SendEventResponseSchema,
  WellKnownSchema,
  WhoAmIResponseSchema,
  type KeysClaimResponse,
  type KeysQueryResponse,
  type KeysUploadRequest,
  type KeysUploadResponse,
  type LoginResponse,
  type PasswordLoginRequest,
  type ResolveAliasResponse,
  type ToDeviceMessages,
  type WhoAmIResponse,
} from '@/api/types'

const CLIENT_PREFIX = '/_matrix/client/v3'

export type MatrixApiErrorKind = 'http' | 'network' | 'timeout' | 'invalid-response'

/**
 * Any failed homeserver call. `status` is 0 when no HTTP response arrived.
 */
export class MatrixApiError extends Error {
  constructor(
    public readonly kind: MatrixApiErrorKind,
    message: string,
    public readonly status: number = 0,
    public readonly errcode: string | null = null,
    public readonly retryAfterMs: number | null = null,
  ) {
    super(message)
    this.name = 'MatrixApiError'
  }

  isNotFound(): boolean {
    return this.status === 404 || this.errcode === 'M_NOT_FOUND'
  }

  isForbidden(): boolean {
    return this.status === 403 || this.errcode === 'M_FORBIDDEN'
  }

  isUnknownToken(): boolean {
    return this.status === 401 || this.errcode === 'M_UNKNOWN_TOKEN' || this.errcode === 'M_MISSING_TOKEN'
  }

  isRateLimited(): boolean {
    return this.status === 429 || this.errcode === 'M_LIMIT_EXCEEDED'
  }

  isUnreachable(): boolean {
    return this.kind === 'network' || this.kind === 'timeout'
  }
}

/**
 * Client-server API calls used by matrixmail. Everything above this interface
 * is tested against an in-process fake.
 */
export interface MatrixApi {
  readonly homeserverUrl: string
  login(request: PasswordLoginRequest): Promise<LoginResponse>
  whoami(): Promise<WhoAmIResponse>
  logout(): Promise<void>
  uploadKeys(request: KeysUploadRequest): Promise<KeysUploadResponse>
  queryKeys(userIds: string[]): Promise<KeysQueryResponse>
  claimKeys(devices: Record<string, Record<string, string>>): Promise<KeysClaimResponse>
  resolveAlias(alias: string): Promise<ResolveAliasResponse>
  joinedRooms(): Promise<string[]>
  invitedRooms(): Promise<string[]>
  joinRoom(roomIdOrAlias: string, serverNames?: string[]): Promise<string>
  getStateEvent(roomId: string, eventType: string, stateKey?: string): Promise<Record<string, unknown> | null>
  joinedMembers(roomId: string): Promise<string[]>
  sendToDevice(eventType: string, messages: ToDeviceMessages): Promise<void>
  sendEvent(roomId: string, eventType: string, content: Record<string, unknown>): Promise<string>
}

export function toMatrixApiError(error: unknown, what: string): MatrixApiError {
  if (error instanceof MatrixApiError) {
    return error
  }
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new MatrixApiError('timeout', `${what}: request timed out`)
    }
    if (!error.response) {
      return new MatrixApiError('network', `${what}: ${error.code ?? error.message}`)
    }
    const status = error.response.status
    const body = MatrixErrorBodySchema.safeParse(error.response.data)
    if (body.success) {
      return new MatrixApiError(
        'http',
        `${what}: ${body.data.errcode}${body.data.error ? ` (${body.data.error})` : ''}`,
        status,
        body.data.errcode,
        body.data.retry_after_ms ?? null,
      )
    }
    return new MatrixApiError('http', `${what}: HTTP ${status}`, status)
  }
  return new MatrixApiError('network', `${what}: ${error instanceof Error ? error.message : String(error)}`)
}

export class MatrixClient implements MatrixApi {
  private txnCounter = 0

  constructor(
    public readonly homeserverUrl: string,
    private readonly accessToken: string | null,
    private readonly timeoutMs: number,
  ) { }

  withAccessToken(accessToken: string): MatrixClient {
    return new MatrixClient(this.homeserverUrl, accessToken, this.timeoutMs)
  }

  async login(request: PasswordLoginRequest): Promise<LoginResponse> {
    return this.request('POST', '/login', LoginResponseSchema, request)
  }

  async whoami(): Promise<WhoAmIResponse> {
    return this.request('GET', '/account/whoami', WhoAmIResponseSchema)
  }

  async logout(): Promise<void> {
    await this.requestRaw('POST', '/logout', {})
  }

  async uploadKeys(request: KeysUploadRequest): Promise<KeysUploadResponse> {
    return this.request('POST', '/keys/upload', KeysUploadResponseSchema, request)
  }

  async queryKeys(userIds: string[]): Promise<KeysQueryResponse> {
    const deviceKeys: Record<string, string[]> = {}
    for (const userId of userIds) {
      deviceKeys[userId] = []
    }
    return this.request('POST', '/keys/query', KeysQueryResponseSchema, { device_keys: deviceKeys })
  }

  async claimKeys(devices: Record<string, Record<string, string>>): Promise<KeysClaimResponse> {
    return this.request('POST', '/keys/claim', KeysClaimResponseSchema, { one_time_keys: devices })
  }

  async resolveAlias(alias: string): Promise<ResolveAliasResponse> {
    return this.request('GET', `/directory/room/${encodeURIComponent(alias)}`, ResolveAliasResponseSchema)
  }

  async joinedRooms(): Promise<string[]> {
    const response = await this.request('GET', '/joined_rooms', JoinedRoomsResponseSchema)
    return response.joined_rooms
  }

  async invitedRooms(): Promise<string[]> {
    // Only the invite section is needed, filter everything else out of the sync
    const filter = {
      presence: { types: [] },
      account_data: { types: [] },
      room: {
        rooms: [],
        timeline: { limit: 0 },
        state: { types: [], lazy_load_members: true },
        ephemeral: { types: [] },
        account_data: { types: [] },
      },
    }
    const response = await this.request('GET', '/sync', InviteSyncResponseSchema, undefined, {
      params: { filter: JSON.stringify(filter), timeout: 0 },
    })
    return Object.keys(response.rooms?.invite ?? {})
  }

  async joinRoom(roomIdOrAlias: string, serverNames: string[] = []): Promise<string> {
    const params = serverNames.length > 0 ? new URLSearchParams(serverNames.map<[string, string]>(name => ['server_name', name])) : undefined
    const response = await this.request('POST', `/join/${encodeURIComponent(roomIdOrAlias)}`, JoinResponseSchema, {}, { params })
    return response.room_id
  }

  async getStateEvent(roomId: string, eventType: string, stateKey: string = ''): Promise<Record<string, unknown> | null> {
    try {
      const data = await this.requestRaw(
        'GET',
        `/rooms/${encodeURIComponent(roomId)}/state/${encodeURIComponent(eventType)}/${encodeURIComponent(stateKey)}`,
      )
      if (!isRecord(data)) {
        throw new MatrixApiError('invalid-response', `GET state ${eventType}: response is not an object`)
      }
      return data
    } catch (error) {
      if (error instanceof MatrixApiError && error.isNotFound()) {
        return null
      }
      throw error
    }
  }

  async joinedMembers(roomId: string): Promise<string[]> {
    const response = await this.request('GET', `/rooms/${encodeURIComponent(roomId)}/joined_members`, JoinedMembersResponseSchema)
    return Object.keys(response.joined)
  }

  async sendToDevice(eventType: string, messages: ToDeviceMessages): Promise<void> {
    await this.requestRaw('PUT', `/sendToDevice/${encodeURIComponent(eventType)}/${this.nextTxnId()}`, { messages })
  }

  async sendEvent(roomId: string, eventType: string, content: Record<string, unknown>): Promise<string> {
    const response = await this.request(
      'PUT',
      `/rooms/${encodeURIComponent(roomId)}/send/${encodeURIComponent(eventType)}/${this.nextTxnId()}`,
      SendEventResponseSchema,
      content,
    )
    return response.event_id
  }

  private nextTxnId(): string {
    return `mm${Date.now()}.${this.txnCounter++}.${randomUUID().slice(0, 8)}`
  }

  private async request<S extends z.ZodTypeAny>(
    method: 'GET' | 'POST' | 'PUT',
    path: string,
    schema: S,
    body?: unknown,
    extra?: Pick<AxiosRequestConfig, 'params'>,
  ): Promise<z.output<S>> {
    const data = await this.requestRaw(method, path, body, extra)
    const parsed = schema.safeParse(data)
    if (!parsed.success) {
      logger.debugLargeJson(`[API] Unexpected response for ${method} ${path}`, data)
      throw new MatrixApiError('invalid-response', `${method} ${path}: unexpected response shape`)
    }
    return parsed.data
  }

  private async requestRaw(
    method: 'GET' | 'POST' | 'PUT',
    path: string,
    body?: unknown,
    extra?: Pick<AxiosRequestConfig, 'params'>,
  ): Promise<unknown> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' }
    if (this.accessToken) {
      headers['Authorization'] = `Bearer ${this.accessToken}`
    }

    logger.debug(`[API] ${method} ${path}`)
    try {
      const response = await axios.request<unknown>({
        method,
        url: `${this.homeserverUrl}${CLIENT_PREFIX}${path}`,
        data: body,
        headers,
        params: extra?.params,
        timeout: this.timeoutMs,
      })
      return response.data
    } catch (error) {
      const apiError = toMatrixApiError(error, `${method} ${path}`)
      logger.debug(`[API] [ERROR] ${apiError.message}`)
      throw apiError
    }
  }
}

/**
 * Turn user input into a homeserver base URL. A bare server name goes through
 * `.well-known/matrix/client` discovery and falls back to `https://<name>`.
 */
export async function discoverHomeserver(input: string, timeoutMs: number): Promise<string> {
  const trimmed = input.trim().replace(/\/+$/, '')
  if (/^https?:\/\//.test(trimmed)) {
    return trimmed
  }

  const fallback = `https://${trimmed}`
  try {
    const response = await axios.get<unknown>(`${fallback}/.well-known/matrix/client`, { timeout: timeoutMs })
    const parsed = WellKnownSchema.safeParse(response.data)
    if (parsed.success) {
      const baseUrl = parsed.data['m.homeserver'].base_url.replace(/\/+$/, '')
      logger.debug(`[API] Discovered homeserver ${baseUrl} for ${trimmed}`)
      return baseUrl
    }
  } catch (error) {
    logger.debug(`[API] No well-known for ${trimmed}, using ${fallback}`, error)
  }
  return fallback
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
