import { basename } from 'node:path'
import { MatrixApiError, type MatrixApi } from '@/api/client'
import { CryptoStore } from '@/crypto/cryptoStore'
import type { CryptoMachine } from '@/crypto/machine'
import { AuthError } from '@/errors'
import { readCredentials, sessionOf, type Session } from '@/persistence'
import { logger } from '@/ui/logger'
import type { Prompter } from '@/ui/prompt'
import { runSetup } from '@/ui/setup'

/** Program names that select send mode; anything else runs setup */
export const SEND_NAMES: readonly string[] = ['mail', 'mailx']

export function invokedNameOf(argv1: string | undefined): string {
  if (!argv1) {
    return 'matrixmail'
  }
  return basename(argv1).replace(/\.(m?[jt]s|cjs|cts)$/, '')
}

export function isSendInvocation(invokedName: string): boolean {
  return SEND_NAMES.includes(invokedName)
}

export interface MachineFactory {
  create(userId: string, deviceId: string, pickleKey: string): Promise<CryptoMachine>
  restore(opts: {
    userId: string
    deviceId: string
    pickleKey: string
    account: string
    olmSessions?: Record<string, string>
  }): Promise<CryptoMachine>
}

/**
 * Everything session handling touches outside the process. The CLI wires the
 * real homeserver client, libolm and the terminal; tests wire fakes.
 */
export interface SessionDeps {
  createApi(homeserverUrl: string, accessToken: string | null): MatrixApi
  discoverHomeserver(input: string): Promise<string>
  machines: MachineFactory
  /** Created on first use, send mode never reads the terminal */
  prompter(): Prompter
  credentialsFile: string
  cryptoStoreFile: string
  defaultHomeserver: string
  hostname(): string
  localUser(): string
}

/**
 * A loaded session with the device state needed to send
 */
export interface ActiveSession {
  session: Session
  api: MatrixApi
  machine: CryptoMachine
  cryptoStore: CryptoStore
}

/**
 * Send mode loads the stored session and never prompts. Any other invocation
 * name logs in interactively and replaces whatever was stored.
 */
export async function ensureSession(invokedName: string, deps: SessionDeps): Promise<ActiveSession> {
  if (isSendInvocation(invokedName)) {
    return loadSession(deps)
  }
  logger.debug(`[AUTH] Invoked as ${invokedName}, running setup`)
  return runSetup(deps)
}

export async function loadSession(deps: SessionDeps): Promise<ActiveSession> {
  const credentials = await readCredentials(deps.credentialsFile)
  if (!credentials) {
    throw new AuthError('NotLoggedIn', 'Not logged in. Run matrixmail to set up a session first.')
  }
  const session = sessionOf(credentials)
  const api = deps.createApi(session.homeserverUrl, session.accessToken)

  await validateSession(api, session)

  const cryptoStore = new CryptoStore(deps.cryptoStoreFile, session.deviceId)
  const stored = await cryptoStore.load()
  const machine = await deps.machines.restore({
    userId: session.userId,
    deviceId: session.deviceId,
    pickleKey: credentials.pickleKey,
    // One-time key top-ups leave a newer account pickle in the crypto store
    account: stored.account ?? credentials.account,
    olmSessions: stored.olmSessions,
  })
  logger.debug(`[AUTH] Loaded session for ${session.userId} on device ${session.deviceId}`)

  try {
    await topUpOneTimeKeys(api, machine, cryptoStore)
  } catch (error) {
    logger.debug('[AUTH] One-time key top-up failed, continuing', error)
  }

  return { session, api, machine, cryptoStore }
}

async function validateSession(api: MatrixApi, session: Session): Promise<void> {
  const whoami = await api.whoami().catch((error: unknown) => {
    if (error instanceof MatrixApiError && error.isUnknownToken()) {
      throw new AuthError('NotLoggedIn', `The stored session for ${session.userId} is no longer valid. Run matrixmail to log in again.`, { cause: error })
    }
    const detail = error instanceof Error ? error.message : String(error)
    throw new AuthError('Unreachable', `Cannot reach ${session.homeserverUrl}: ${detail}`, { cause: error })
  })

  if (whoami.user_id !== session.userId || (whoami.device_id !== undefined && whoami.device_id !== session.deviceId)) {
    throw new AuthError(
      'Rejected',
      `Homeserver reports ${whoami.user_id}/${whoami.device_id ?? '?'} for the stored ${session.userId}/${session.deviceId}. Run matrixmail to log in again.`,
    )
  }
}

/**
 * Keep at least half of the account's one-time keys published, so other
 * devices can start Olm sessions with us.
 */
export async function topUpOneTimeKeys(api: MatrixApi, machine: CryptoMachine, cryptoStore: CryptoStore): Promise<number> {
  const { one_time_key_counts: counts } = await api.uploadKeys({})
  const published = counts['signed_curve25519'] ?? 0
  const target = Math.floor(machine.maxOneTimeKeys() / 2)
  if (published >= target) {
    return 0
  }

  const oneTimeKeys = machine.generateOneTimeKeys(target - published)
  await api.uploadKeys({ one_time_keys: oneTimeKeys })
  machine.markKeysAsPublished()
  await cryptoStore.update(draft => {
    draft.account = machine.pickleAccount()
  })
  const uploaded = Object.keys(oneTimeKeys).length
  logger.debug(`[AUTH] Uploaded ${uploaded} one-time keys (${published} were left)`)
  return uploaded
}
