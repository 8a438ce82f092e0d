import chalk from 'chalk'
import { MatrixApiError } from '@/api/client'
import type { ActiveSession, SessionDeps } from '@/auth/session'
import { CryptoStore } from '@/crypto/cryptoStore'
import { encodeBase64, getRandomBytes } from '@/crypto/encoding'
import { AuthError, UsageError } from '@/errors'
import { sessionOf, writeCredentials, type StoredCredentials } from '@/persistence'
import { logger } from '@/ui/logger'
import type { Prompter } from '@/ui/prompt'

const MAX_ATTEMPTS = 3

export interface SetupAnswers {
  homeserver: string
  user: string
  password: string
  deviceName: string
  displayName: string
}

export type StepResult = { value: string } | { error: string }

/**
 * One question of the setup dialogue. Steps run in order and later prompts
 * may use earlier answers for their defaults.
 */
export interface SetupStep {
  readonly key: keyof SetupAnswers
  readonly masked?: boolean
  prompt(answers: Partial<SetupAnswers>): string
  validate(input: string, answers: Partial<SetupAnswers>): StepResult
}

function withDefault(input: string, fallback: string): StepResult {
  const trimmed = input.trim()
  return { value: trimmed === '' ? fallback : trimmed }
}

export function setupSteps(env: { defaultHomeserver: string, hostname: string, localUser: string }): SetupStep[] {
  const deviceDefault = (answers: Partial<SetupAnswers>) => `${env.localUser}@${answers.deviceName ?? env.hostname}`
  return [
    {
      key: 'homeserver',
      prompt: () => `Homeserver (default: ${env.defaultHomeserver}): `,
      validate: input => {
        const result = withDefault(input, env.defaultHomeserver)
        if ('value' in result && /\s/.test(result.value)) {
          return { error: 'A homeserver name or URL cannot contain spaces' }
        }
        return result
      },
    },
    {
      key: 'user',
      prompt: () => 'User: ',
      validate: input => input.trim() === '' ? { error: 'A user name is required' } : { value: input.trim() },
    },
    {
      key: 'password',
      masked: true,
      prompt: () => 'Password: ',
      // Passwords are taken as typed, surrounding spaces included
      validate: input => input === '' ? { error: 'A password is required' } : { value: input },
    },
    {
      key: 'deviceName',
      prompt: () => `Device name (default: ${env.hostname}): `,
      validate: input => withDefault(input, env.hostname),
    },
    {
      key: 'displayName',
      prompt: answers => `Display name (default: ${deviceDefault(answers)}): `,
      validate: (input, answers) => withDefault(input, deviceDefault(answers)),
    },
  ]
}

export async function collectAnswers(prompter: Prompter, steps: readonly SetupStep[]): Promise<SetupAnswers> {
  const answers: Partial<SetupAnswers> = {}
  for (const step of steps) {
    answers[step.key] = await askStep(prompter, step, answers)
  }
  const { homeserver, user, password, deviceName, displayName } = answers
  if (homeserver === undefined || user === undefined || password === undefined || deviceName === undefined || displayName === undefined) {
    throw new UsageError('Setup did not collect every answer')
  }
  return { homeserver, user, password, deviceName, displayName }
}

async function askStep(prompter: Prompter, step: SetupStep, answers: Partial<SetupAnswers>): Promise<string> {
  for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
    const input = await prompter.ask(step.prompt(answers), { masked: step.masked })
    const result = step.validate(input, answers)
    if ('value' in result) {
      return result.value
    }
    console.error(chalk.yellow(result.error))
  }
  throw new UsageError(`No valid ${step.key} after ${MAX_ATTEMPTS} attempts`)
}

function loginFailure(error: unknown, homeserverUrl: string): AuthError {
  if (error instanceof MatrixApiError && error.isUnreachable()) {
    return new AuthError('Unreachable', `Cannot reach ${homeserverUrl}: ${error.message}`, { cause: error })
  }
  const detail = error instanceof Error ? error.message : String(error)
  return new AuthError('Rejected', `Login rejected by ${homeserverUrl}: ${detail}`, { cause: error })
}

/**
 * Interactive login: ask for the account, log in, create a new device
 * identity, publish its keys and persist it. Replaces any stored session.
 */
export async function runSetup(deps: SessionDeps): Promise<ActiveSession> {
  const prompter = deps.prompter()
  let answers: SetupAnswers
  try {
    answers = await collectAnswers(prompter, setupSteps({
      defaultHomeserver: deps.defaultHomeserver,
      hostname: deps.hostname(),
      localUser: deps.localUser(),
    }))
  } finally {
    prompter.close()
  }

  let homeserverUrl = await deps.discoverHomeserver(answers.homeserver)
  logger.debug(`[SETUP] Logging in as ${answers.user} on ${homeserverUrl}`)

  const login = await deps.createApi(homeserverUrl, null).login({
    type: 'm.login.password',
    identifier: { type: 'm.id.user', user: answers.user },
    password: answers.password,
    device_id: answers.deviceName,
    initial_device_display_name: answers.displayName,
  }).catch((error: unknown) => {
    throw loginFailure(error, homeserverUrl)
  })

  const advertised = login.well_known?.['m.homeserver']?.base_url
  if (advertised) {
    homeserverUrl = advertised.replace(/\/+$/, '')
  }

  const pickleKey = encodeBase64(getRandomBytes(32))
  const machine = await deps.machines.create(login.user_id, login.device_id, pickleKey)

  // Stored only once the device keys are published
  const api = deps.createApi(homeserverUrl, login.access_token)
  try {
    await api.uploadKeys({
      device_keys: machine.deviceKeys(),
      one_time_keys: machine.generateOneTimeKeys(Math.floor(machine.maxOneTimeKeys() / 2)),
    })
  } catch (error) {
    throw loginFailure(error, homeserverUrl)
  }
  machine.markKeysAsPublished()

  // Keys of a previous device are useless to the new one
  const cryptoStore = new CryptoStore(deps.cryptoStoreFile, login.device_id)
  await cryptoStore.clear()

  const credentials: StoredCredentials = {
    homeserverUrl,
    userId: login.user_id,
    accessToken: login.access_token,
    deviceId: login.device_id,
    deviceDisplayName: answers.displayName,
    pickleKey,
    account: machine.pickleAccount(),
  }
  await writeCredentials(credentials, deps.credentialsFile)
  logger.debug(`[SETUP] Stored session for ${login.user_id} on device ${login.device_id}`)

  return { session: sessionOf(credentials), api, machine, cryptoStore }
}
