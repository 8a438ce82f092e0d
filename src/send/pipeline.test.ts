import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { testDevice } from '@/__tests__/helpers/devices'
import { FakeHomeserver, httpError, networkError } from '@/__tests__/helpers/fakeHomeserver'
import { FakeMachine } from '@/__tests__/helpers/fakeMachine'
import { CryptoStore } from '@/crypto/cryptoStore'
import { MEGOLM_ALGORITHM } from '@/crypto/devices'
import { trustAllDevices, type TrustPolicy } from '@/crypto/trust'
import { SendError } from '@/errors'
import { compose } from '@/mail/compose'
import type { Session } from '@/persistence'
import type { RoomHandle } from '@/rooms/resolver'
import { GroupSessionManager } from './groupSessions'
import { SecureSendPipeline } from './pipeline'

const session: Session = {
  homeserverUrl: 'https://matrix.example.org',
  userId: '@alice:example.org',
  accessToken: 'test-token',
  deviceId: 'LAPTOP',
  deviceDisplayName: 'alice@laptop',
}

const ROOM = '!ops:example.org'
const room: RoomHandle = { roomId: ROOM, address: ROOM, membershipState: 'joined', previousMembership: 'joined' }
const message = compose('hello\n', 'hi')
const plaintext = JSON.stringify({ type: 'm.room.message', content: { msgtype: 'm.text', body: 'hi\n\nhello\n' }, room_id: ROOM })

function decryptFake(body: unknown): unknown {
  return typeof body === 'string' ? JSON.parse(body) : undefined
}

describe('SecureSendPipeline', () => {
  let tempDir: string
  let storeFile: string
  let homeserver: FakeHomeserver
  let machine: FakeMachine

  const aliceLaptop = testDevice('@alice:example.org', 'LAPTOP')
  const aliceDesktop = testDevice('@alice:example.org', 'DESKTOP')
  const bobPhone = testDevice('@bob:example.org', 'PHONE')
  const bobTablet = testDevice('@bob:example.org', 'TABLET')

  function pipelineFor(target: FakeMachine = machine, trustPolicy: TrustPolicy = trustAllDevices): SecureSendPipeline {
    return new SecureSendPipeline({
      api: homeserver,
      session,
      machine: target,
      groupSessions: new GroupSessionManager(target, new CryptoStore(storeFile, 'LAPTOP')),
      trustPolicy,
      now: () => 1000,
    })
  }

  function encryptedRoom(): void {
    homeserver.addRoom(ROOM, {
      members: ['@alice:example.org', '@bob:example.org'],
      encryption: { algorithm: MEGOLM_ALGORITHM },
    }, { joined: true })
    homeserver.addDevice(aliceLaptop)
    homeserver.addDevice(aliceDesktop)
    homeserver.addDevice(bobPhone)
  }

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'matrixmail-pipeline-test-'))
    storeFile = join(tempDir, 'crypto.json')
    homeserver = new FakeHomeserver()
    machine = new FakeMachine()
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  describe('plaintext rooms', () => {
    beforeEach(() => {
      homeserver.addRoom(ROOM, { members: ['@alice:example.org', '@bob:example.org'] }, { joined: true })
    })

    it('should send an m.room.message when the room has no encryption state', async () => {
      const result = await pipelineFor().send(room, message)

      expect(result).toEqual({ roomId: ROOM, eventId: '$event1', encrypted: false, retried: false })
      expect(homeserver.events).toEqual([
        { roomId: ROOM, type: 'm.room.message', content: { msgtype: 'm.text', body: 'hi\n\nhello\n' } },
      ])
      expect(homeserver.callsTo('queryKeys')).toEqual([])
    })

    it('should report rate limiting without retrying', async () => {
      homeserver.failNext('sendEvent', httpError(429, 'M_LIMIT_EXCEEDED', 2000))

      const error = await pipelineFor().send(room, message).catch((e: unknown) => e)

      expect(error).toBeInstanceOf(SendError)
      expect(error).toMatchObject({ kind: 'RateLimited', message: 'M_LIMIT_EXCEEDED (test), retry after 2000ms' })
      expect(homeserver.callsTo('sendEvent')).toHaveLength(1)
    })

    it('should report a refused send as Unauthorized', async () => {
      homeserver.failNext('sendEvent', httpError(403, 'M_FORBIDDEN'))

      await expect(pipelineFor().send(room, message)).rejects.toMatchObject({ kind: 'Unauthorized' })
    })

    it('should report transport failures as NetworkFailure', async () => {
      homeserver.failNext('getStateEvent', networkError())

      await expect(pipelineFor().send(room, message)).rejects.toMatchObject({ kind: 'NetworkFailure' })
      expect(homeserver.events).toEqual([])
    })
  })

  it('should refuse rooms using an unknown encryption algorithm', async () => {
    homeserver.addRoom(ROOM, { members: [], encryption: { algorithm: 'm.example.v9' } }, { joined: true })

    await expect(pipelineFor().send(room, message)).rejects.toMatchObject({
      kind: 'Unsupported',
      message: `Room ${ROOM} uses unsupported encryption m.example.v9`,
    })
  })

  describe('encrypted rooms', () => {
    beforeEach(encryptedRoom)

    it('should share a new room key with every other device and send a Megolm event', async () => {
      const result = await pipelineFor().send(room, message)
      const sessionId = machine.groupCiphers[0].sessionId

      expect(result).toEqual({ roomId: ROOM, eventId: '$event1', encrypted: true, retried: false })

      expect(homeserver.callsTo('claimKeys')).toEqual([[{
        '@alice:example.org': { DESKTOP: 'signed_curve25519' },
        '@bob:example.org': { PHONE: 'signed_curve25519' },
      }]])
      expect(machine.olmSessions).toEqual(new Map([
        ['curve-DESKTOP', 'olm:otk-DESKTOP-0'],
        ['curve-PHONE', 'olm:otk-PHONE-0'],
      ]))

      expect(homeserver.toDevice).toHaveLength(1)
      const { type, messages } = homeserver.toDevice[0]
      expect(type).toBe('m.room.encrypted')
      expect(Object.keys(messages['@alice:example.org'])).toEqual(['DESKTOP'])
      expect(Object.keys(messages['@bob:example.org'])).toEqual(['PHONE'])
      expect(messages['@bob:example.org']['PHONE']).toMatchObject({ algorithm: 'm.olm.v1.curve25519-aes-sha2', sender_key: 'curve-self' })
      const ciphertext = messages['@bob:example.org']['PHONE']['ciphertext']
      const body = typeof ciphertext === 'object' && ciphertext !== null && 'curve-PHONE' in ciphertext ? ciphertext['curve-PHONE'] : undefined
      expect(body).toMatchObject({ type: 0 })
      expect(decryptFake(typeof body === 'object' && body !== null && 'body' in body ? body.body : undefined)).toEqual({
        type: 'm.room_key',
        content: { algorithm: MEGOLM_ALGORITHM, room_id: ROOM, session_id: sessionId, session_key: `key-${sessionId}` },
      })

      expect(homeserver.events).toEqual([{
        roomId: ROOM,
        type: 'm.room.encrypted',
        content: {
          algorithm: MEGOLM_ALGORITHM,
          sender_key: 'curve-self',
          ciphertext: `${sessionId}/0/${plaintext}`,
          session_id: sessionId,
          device_id: 'LAPTOP',
        },
      }])
    })

    it('should reuse the room key for the next message', async () => {
      const pipeline = pipelineFor()
      await pipeline.send(room, message)
      await pipeline.send(room, message)
      const sessionId = machine.groupCiphers[0].sessionId

      expect(machine.groupCiphers).toHaveLength(1)
      expect(homeserver.toDevice).toHaveLength(1)
      expect(homeserver.callsTo('claimKeys')).toHaveLength(1)
      expect(homeserver.events[1].content['ciphertext']).toBe(`${sessionId}/1/${plaintext}`)
    })

    it('should keep using the stored room key in a later run', async () => {
      await pipelineFor().send(room, message)
      const sessionId = machine.groupCiphers[0].sessionId

      const stored = await new CryptoStore(storeFile, 'LAPTOP').load()
      const nextMachine = new FakeMachine('@alice:example.org', 'LAPTOP', stored.olmSessions)
      await pipelineFor(nextMachine).send(room, message)

      expect(nextMachine.groupCiphers.map(cipher => cipher.sessionId)).toEqual([sessionId])
      expect(homeserver.toDevice).toHaveLength(1)
      expect(homeserver.events[1].content['ciphertext']).toBe(`${sessionId}/1/${plaintext}`)
    })

    it('should rotate when a new device joins the conversation', async () => {
      const pipeline = pipelineFor()
      await pipeline.send(room, message)
      homeserver.addDevice(bobTablet)
      await pipeline.send(room, message)

      expect(machine.groupCiphers).toHaveLength(2)
      expect(machine.groupCiphers[0].freed).toBe(true)
      expect(homeserver.callsTo('claimKeys')[1]).toEqual([{ '@bob:example.org': { TABLET: 'signed_curve25519' } }])
      expect(Object.keys(homeserver.toDevice[1].messages['@bob:example.org'])).toEqual(['PHONE', 'TABLET'])
      expect(homeserver.events[1].content['session_id']).toBe(machine.groupCiphers[1].sessionId)
    })

    it('should rotate when a device leaves', async () => {
      const pipeline = pipelineFor()
      await pipeline.send(room, message)
      homeserver.removeDevice('@alice:example.org', 'DESKTOP')
      await pipeline.send(room, message)

      expect(machine.groupCiphers).toHaveLength(2)
      expect(homeserver.toDevice[1].messages['@alice:example.org']).toBeUndefined()
    })

    it('should keep the room key while a member\'s server cannot be queried', async () => {
      homeserver.rooms.get(ROOM)?.members.push('@dave:remote.org')
      homeserver.addDevice(testDevice('@dave:remote.org', 'DAVEPHONE'))
      const pipeline = pipelineFor()
      await pipeline.send(room, message)
      homeserver.unreachableServers.add('remote.org')

      const result = await pipeline.send(room, message)

      expect(result).toMatchObject({ encrypted: true })
      expect(machine.groupCiphers).toHaveLength(1)
      expect(homeserver.toDevice).toHaveLength(1)
      expect(homeserver.toDevice[0].messages['@dave:remote.org']).toHaveProperty('DAVEPHONE')
    })

    it('should rotate when a member on an unreachable server leaves', async () => {
      homeserver.rooms.get(ROOM)?.members.push('@dave:remote.org')
      homeserver.addDevice(testDevice('@dave:remote.org', 'DAVEPHONE'))
      const pipeline = pipelineFor()
      await pipeline.send(room, message)
      homeserver.unreachableServers.add('remote.org')
      homeserver.rooms.get(ROOM)?.members.pop()

      await pipeline.send(room, message)

      expect(machine.groupCiphers).toHaveLength(2)
      expect(homeserver.toDevice[1].messages['@dave:remote.org']).toBeUndefined()
    })

    it('should leave untrusted devices out of key delivery and ask the policy once per device', async () => {
      homeserver.addDevice(bobTablet)
      const decide = vi.fn<TrustPolicy['decide']>(device => device.deviceId === 'PHONE' ? 'untrusted' : 'trusted')
      const pipeline = pipelineFor(machine, { name: 'test-policy', decide })

      await pipeline.send(room, message)
      await pipeline.send(room, message)

      expect(Object.keys(homeserver.toDevice[0].messages['@bob:example.org'])).toEqual(['TABLET'])
      expect(decide).toHaveBeenCalledTimes(3)
      expect(homeserver.toDevice).toHaveLength(1)
    })

    it('should rotate and retry once when a one-time key is missing', async () => {
      const claim = vi.spyOn(homeserver, 'claimKeys').mockResolvedValueOnce({ one_time_keys: {}, failures: {} })

      const result = await pipelineFor().send(room, message)

      expect(result).toMatchObject({ encrypted: true, retried: true })
      expect(claim).toHaveBeenCalledTimes(2)
      expect(machine.groupCiphers).toHaveLength(2)
      expect(machine.groupCiphers[0].freed).toBe(true)
      expect(homeserver.events).toHaveLength(1)
      expect(homeserver.events[0].content['session_id']).toBe(machine.groupCiphers[1].sessionId)
    })

    it('should report a second stale key instead of retrying again', async () => {
      homeserver.addDevice(bobPhone, 0)

      await expect(pipelineFor().send(room, message)).rejects.toMatchObject({
        name: 'SendError',
        kind: 'StaleKey',
        message: 'No usable one-time key for @bob:example.org PHONE',
      })
      expect(homeserver.callsTo('claimKeys')).toHaveLength(2)
      expect(homeserver.toDevice).toEqual([])
      expect(homeserver.events).toEqual([])
    })

    it('should not commit a room key whose delivery failed', async () => {
      homeserver.failNext('sendToDevice', networkError())
      const pipeline = pipelineFor()

      await expect(pipeline.send(room, message)).rejects.toMatchObject({ kind: 'NetworkFailure' })
      const stored = await new CryptoStore(storeFile, 'LAPTOP').load()
      expect(stored.groupSessions).toEqual({})
      // Olm sessions survive, the next attempt needs no new one-time keys
      expect(Object.keys(stored.olmSessions).sort()).toEqual(['curve-DESKTOP', 'curve-PHONE'])

      await pipeline.send(room, message)
      expect(homeserver.callsTo('claimKeys')).toHaveLength(1)
      expect(homeserver.events[0].content['session_id']).toBe(machine.groupCiphers[1].sessionId)
    })

    it('should create one room key when sends to the same room overlap', async () => {
      const pipeline = pipelineFor()

      await Promise.all([pipeline.send(room, message), pipeline.send(room, message)])

      expect(machine.groupCiphers).toHaveLength(1)
      expect(homeserver.toDevice).toHaveLength(1)
      expect(homeserver.events.map(event => event.content['ciphertext'])).toEqual([
        `${machine.groupCiphers[0].sessionId}/0/${plaintext}`,
        `${machine.groupCiphers[0].sessionId}/1/${plaintext}`,
      ])
    })
  })
})
