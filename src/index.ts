/**
 * CLI entry point for matrixmail
 *
 * Invoked as `mail` or `mailx` it sends stdin to Matrix rooms; under any other
 * name it manages the stored session. Simple argument parsing without any
 * CLI framework dependencies.
 */

import chalk from 'chalk'
import { createRequire } from 'node:module'
import { hostname, userInfo } from 'node:os'
import { buffer } from 'node:stream/consumers'
import { z } from 'zod'
import { MatrixClient, discoverHomeserver } from '@/api/client'
import { ensureSession, invokedNameOf, isSendInvocation, type SessionDeps } from '@/auth/session'
import { handleLogout, handleStatus } from '@/commands/auth'
import { configuration } from '@/configuration'
import { OlmMachine } from '@/crypto/olmMachine'
import { trustAllDevices } from '@/crypto/trust'
import { UsageError } from '@/errors'
import { compose } from '@/mail/compose'
import { RoomResolver } from '@/rooms/resolver'
import { reportOutcomes, sendToAddresses } from '@/run'
import { GroupSessionManager } from '@/send/groupSessions'
import { SecureSendPipeline } from '@/send/pipeline'
import { logger } from '@/ui/logger'
import { TerminalPrompter } from '@/ui/prompt'
import { formatErrorForUi } from '@/utils/formatErrorForUi'
import { parseMailArgs, parseSetupArgs } from '@/utils/parseArgs'

const require = createRequire(import.meta.url)
const packageJson = z.object({ version: z.string() }).parse(require('../package.json'))

function localUser(): string {
  if (process.env.USER) {
    return process.env.USER
  }
  try {
    return userInfo().username
  } catch {
    return 'user'
  }
}

function sessionDeps(): SessionDeps {
  return {
    createApi: (homeserverUrl, accessToken) => new MatrixClient(homeserverUrl, accessToken, configuration.httpTimeoutMs),
    discoverHomeserver: input => discoverHomeserver(input, configuration.httpTimeoutMs),
    machines: {
      create: (userId, deviceId, pickleKey) => OlmMachine.create(userId, deviceId, pickleKey),
      restore: opts => OlmMachine.restore(opts),
    },
    prompter: () => new TerminalPrompter(),
    credentialsFile: configuration.credentialsFile,
    cryptoStoreFile: configuration.cryptoStoreFile,
    defaultHomeserver: configuration.defaultHomeserver,
    hostname: () => hostname(),
    localUser,
  }
}

function showMailHelp(name: string): void {
  console.log(`
${chalk.bold(name)} - Send a message from stdin to Matrix rooms

${chalk.bold('Usage:')}
  ${name} [-s subject] <room>...

${chalk.bold('Rooms:')}
  !opaque:server     Room ID
  #alias:server      Room alias

Rooms the account is not in yet are joined, pending invites are accepted.
Lines starting with ~ are left out of the message.

${chalk.bold('Options:')}
  -s <subject>       Put the subject and a blank line before the body
  -h, --help         Show this help
  -v, --version      Show version
`)
}

function showSetupHelp(name: string): void {
  console.log(`
${chalk.bold(name)} - Matrix session for mail and mailx

${chalk.bold('Usage:')}
  ${name} [setup]     Log in and register this device (replaces the stored session)
  ${name} status      Show the stored session
  ${name} logout      Log the device out and remove local data
  ${name} help        Show this help

Session data lives in ${configuration.homeDir}
`)
}

async function runMail(invokedName: string, args: string[]): Promise<number> {
  const command = parseMailArgs(args)
  if (command.kind === 'help') {
    showMailHelp(invokedName)
    return 0
  }
  if (command.kind === 'version') {
    console.log(packageJson.version)
    return 0
  }

  // The whole body is read before anything goes out
  const message = compose(await buffer(process.stdin), command.subject)

  const { session, api, machine, cryptoStore } = await ensureSession(invokedName, sessionDeps())
  const resolver = new RoomResolver(api, session)
  const pipeline = new SecureSendPipeline({
    api,
    session,
    machine,
    groupSessions: new GroupSessionManager(machine, cryptoStore),
    trustPolicy: trustAllDevices,
  })

  const outcomes = await sendToAddresses(command.addresses, message, {
    resolver,
    pipeline,
    concurrency: configuration.sendConcurrency,
  })
  return reportOutcomes(outcomes)
}

async function runSessionCommand(invokedName: string, args: string[]): Promise<number> {
  const command = parseSetupArgs(args)
  const deps = sessionDeps()
  switch (command.kind) {
    case 'help':
      showSetupHelp(invokedName)
      return 0
    case 'version':
      console.log(packageJson.version)
      return 0
    case 'logout':
      await handleLogout(deps)
      return 0
    case 'status':
      await handleStatus(deps)
      return 0
    case 'setup': {
      const { session } = await ensureSession(invokedName, deps)
      console.log(chalk.green(`✓ Logged in as ${session.userId} on device ${session.deviceId}`))
      console.log(chalk.gray('Send with: echo hello | mail -s subject "#room:server"'))
      return 0
    }
  }
}

void (async () => {
  const invokedName = invokedNameOf(process.argv[1])
  const args = process.argv.slice(2)
  logger.debug(`Starting ${invokedName} with args: `, args)

  try {
    const code = isSendInvocation(invokedName)
      ? await runMail(invokedName, args)
      : await runSessionCommand(invokedName, args)
    process.exit(code)
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(chalk.red(error.message))
      console.error(chalk.gray(`Run ${invokedName} --help for usage`))
      process.exit(2)
    }
    console.error(chalk.red('Error:'), formatErrorForUi(error, { stack: configuration.isDebug }))
    logger.debug('Fatal error', error)
    process.exit(1)
  }
})()
