import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { FakeHomeserver } from '@/__tests__/helpers/fakeHomeserver'
import { FakeMachine } from '@/__tests__/helpers/fakeMachine'
import { CryptoStore } from '@/crypto/cryptoStore'
import { trustAllDevices } from '@/crypto/trust'
import { ResolveError, SendError } from '@/errors'
import { compose } from '@/mail/compose'
import type { Session } from '@/persistence'
import { RoomResolver } from '@/rooms/resolver'
import { GroupSessionManager } from '@/send/groupSessions'
import { SecureSendPipeline } from '@/send/pipeline'
import { logger } from '@/ui/logger'
import { describeFailure, reportOutcomes, sendToAddresses, type AddressOutcome } from './run'

const session: Session = {
  homeserverUrl: 'https://matrix.example.org',
  userId: '@alice:example.org',
  accessToken: 'test-token',
  deviceId: 'LAPTOP',
  deviceDisplayName: 'alice@laptop',
}

describe('sendToAddresses', () => {
  let tempDir: string
  let homeserver: FakeHomeserver
  let resolver: RoomResolver
  let pipeline: SecureSendPipeline

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'matrixmail-run-test-'))
    homeserver = new FakeHomeserver()
    homeserver.addRoom('!ops:example.org', { members: ['@alice:example.org'] }, { joined: true, alias: '#ops:example.org' })
    homeserver.addRoom('!dev:example.org', { members: ['@bob:example.org'] }, { invited: true })
    const machine = new FakeMachine()
    resolver = new RoomResolver(homeserver, session)
    pipeline = new SecureSendPipeline({
      api: homeserver,
      session,
      machine,
      groupSessions: new GroupSessionManager(machine, new CryptoStore(join(tempDir, 'crypto.json'), 'LAPTOP')),
      trustPolicy: trustAllDevices,
    })
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  it('should deliver to every good address and keep each failure with its address', async () => {
    const addresses = ['#ops:example.org', '@bob:example.org', '!dev:example.org', '!missing:example.org']

    const outcomes = await sendToAddresses(addresses, compose('disk full\n', 'alert'), { resolver, pipeline, concurrency: 2 })

    expect(outcomes.map(outcome => [outcome.address, outcome.ok])).toEqual([
      ['#ops:example.org', true],
      ['@bob:example.org', false],
      ['!dev:example.org', true],
      ['!missing:example.org', false],
    ])
    expect(outcomes[1]).toMatchObject({ ok: false, error: { kind: 'UnsupportedAddressForm' } })
    expect(outcomes[3]).toMatchObject({ ok: false, error: { kind: 'JoinDenied' } })
    expect(homeserver.events.map(event => [event.roomId, event.content['body']]).sort()).toEqual([
      ['!dev:example.org', 'alert\n\ndisk full\n'],
      ['!ops:example.org', 'alert\n\ndisk full\n'],
    ])
  })

  it('should send twice to a room addressed twice but join it once', async () => {
    const outcomes = await sendToAddresses(['!dev:example.org', '!dev:example.org'], compose('hi\n'), { resolver, pipeline, concurrency: 4 })

    expect(outcomes.every(outcome => outcome.ok)).toBe(true)
    expect(homeserver.callsTo('joinRoom')).toHaveLength(1)
    expect(homeserver.events).toHaveLength(2)
  })
})

describe('reportOutcomes', () => {
  beforeEach(() => {
    vi.spyOn(logger, 'error').mockImplementation(() => undefined)
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  const sent: AddressOutcome = {
    address: '!ops:example.org',
    ok: true,
    result: { roomId: '!ops:example.org', eventId: '$event1', encrypted: true, retried: false },
  }

  it('should exit with 0 when everything was sent', () => {
    expect(reportOutcomes([sent, { ...sent, address: '#ops:example.org' }])).toBe(0)
    expect(logger.error).not.toHaveBeenCalled()
  })

  it('should list every failure and exit with 1', () => {
    const code = reportOutcomes([
      sent,
      { address: '#gone:example.org', ok: false, error: new ResolveError('AliasNotFound', 'Room alias #gone:example.org does not exist') },
      { address: '!busy:example.org', ok: false, error: new SendError('RateLimited', 'M_LIMIT_EXCEEDED') },
    ])

    expect(code).toBe(1)
    expect(vi.mocked(logger.error).mock.calls).toEqual([
      ['#gone:example.org: AliasNotFound: Room alias #gone:example.org does not exist'],
      ['!busy:example.org: RateLimited: M_LIMIT_EXCEEDED'],
    ])
  })

  it('should describe unexpected errors by their message', () => {
    expect(describeFailure(new Error('socket hang up'))).toBe('socket hang up')
    expect(describeFailure('plain string')).toBe('plain string')
  })
})
