import chalk from 'chalk'
import { existsSync, rmSync } from 'node:fs'
import type { SessionDeps } from '@/auth/session'
import { clearCredentials, readCredentials } from '@/persistence'
import { logger } from '@/ui/logger'

/**
 * Log the device out and forget it locally. The homeserver call is best
 * effort; the local record is removed either way.
 */
export async function handleLogout(deps: SessionDeps): Promise<void> {
  const credentials = await readCredentials(deps.credentialsFile)
  if (!credentials) {
    console.log(chalk.gray('Not logged in, nothing to do.'))
    return
  }

  try {
    await deps.createApi(credentials.homeserverUrl, credentials.accessToken).logout()
    logger.debug(`[AUTH] Device ${credentials.deviceId} logged out on the homeserver`)
  } catch (error) {
    logger.debug('[AUTH] Homeserver logout failed, removing local data anyway', error)
    console.log(chalk.yellow(`Could not log out on ${credentials.homeserverUrl}, the device stays registered there.`))
  }

  await clearCredentials(deps.credentialsFile)
  if (existsSync(deps.cryptoStoreFile)) {
    rmSync(deps.cryptoStoreFile)
  }
  console.log(chalk.green(`✓ Logged out ${credentials.userId}`))
}

export async function handleStatus(deps: SessionDeps): Promise<void> {
  const credentials = await readCredentials(deps.credentialsFile)
  if (!credentials) {
    console.log(chalk.gray('Not logged in. Run matrixmail to set up a session.'))
    return
  }

  const machine = await deps.machines.restore({
    userId: credentials.userId,
    deviceId: credentials.deviceId,
    pickleKey: credentials.pickleKey,
    account: credentials.account,
  })

  console.log(chalk.bold('Session'))
  console.log(`  Homeserver:   ${credentials.homeserverUrl}`)
  console.log(`  User:         ${credentials.userId}`)
  console.log(`  Device:       ${credentials.deviceId} (${credentials.deviceDisplayName})`)
  console.log(`  Ed25519 key:  ${machine.identityKeys().ed25519}`)
}
