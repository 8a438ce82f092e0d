import { UsageError } from '@/errors'

export type MailCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'send', subject?: string, addresses: string[] }

export type SetupCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'setup' | 'logout' | 'status' }

/**
 * Parse `mail [-s subject] address...` arguments.
 * `-s` takes the next argument or an attached value (`-sHello`); `--` ends options.
 */
export function parseMailArgs(args: readonly string[]): MailCommand {
  let subject: string | undefined
  const addresses: string[] = []

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === '--') {
      addresses.push(...args.slice(i + 1))
      break
    }
    if (arg === '-h' || arg === '--help') {
      return { kind: 'help' }
    }
    if (arg === '-v' || arg === '--version') {
      return { kind: 'version' }
    }
    if (arg === '-s') {
      if (i + 1 >= args.length) {
        throw new UsageError('Option -s needs a subject')
      }
      subject = args[++i]
      continue
    }
    if (arg.startsWith('-s')) {
      subject = arg.slice(2)
      continue
    }
    if (arg.startsWith('-') && arg.length > 1) {
      throw new UsageError(`Unknown option: ${arg}`)
    }
    addresses.push(arg)
  }

  if (addresses.length === 0) {
    throw new UsageError('No recipient rooms given')
  }
  return subject === undefined ? { kind: 'send', addresses } : { kind: 'send', subject, addresses }
}

export function parseSetupArgs(args: readonly string[]): SetupCommand {
  const subcommand: string | undefined = args[0]
  if (args.length > 1) {
    throw new UsageError(`Unexpected argument: ${args[1]}`)
  }
  switch (subcommand) {
    case undefined:
    case 'setup':
      return { kind: 'setup' }
    case 'logout':
    case 'status':
      return { kind: subcommand }
    case 'help':
    case '-h':
    case '--help':
      return { kind: 'help' }
    case '-v':
    case '--version':
      return { kind: 'version' }
    default:
      throw new UsageError(`Unknown command: ${subcommand}`)
  }
}
