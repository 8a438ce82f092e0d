import chalk from 'chalk'
import { AuthError, ResolveError, SendError } from '@/errors'
import type { Message } from '@/mail/compose'
import type { RoomHandle } from '@/rooms/resolver'
import type { SendResult } from '@/send/pipeline'
import { logger } from '@/ui/logger'
import { formatErrorForUi } from '@/utils/formatErrorForUi'
import { runWithConcurrency } from '@/utils/pool'

export type AddressOutcome =
  | { address: string, ok: true, result: SendResult }
  | { address: string, ok: false, error: unknown }

export interface SendTargets {
  resolve(address: string): Promise<RoomHandle>
}

export interface RoomSender {
  send(room: RoomHandle, message: Message): Promise<SendResult>
}

/**
 * Resolve and send to every address. A failure stays with its address; the
 * returned outcomes keep the order of `addresses`.
 */
export function sendToAddresses(
  addresses: readonly string[],
  message: Message,
  deps: { resolver: SendTargets, pipeline: RoomSender, concurrency: number },
): Promise<AddressOutcome[]> {
  return runWithConcurrency(addresses, deps.concurrency, async (address): Promise<AddressOutcome> => {
    try {
      const room = await deps.resolver.resolve(address)
      const result = await deps.pipeline.send(room, message)
      logger.debug(`[RUN] ${address} -> ${result.roomId} ${result.eventId}`)
      return { address, ok: true, result }
    } catch (error) {
      logger.debug(`[RUN] ${address} failed`, error)
      return { address, ok: false, error }
    }
  })
}

export function describeFailure(error: unknown): string {
  if (error instanceof ResolveError || error instanceof SendError || error instanceof AuthError) {
    return `${error.kind}: ${error.message}`
  }
  return formatErrorForUi(error, { stack: false })
}

/**
 * Print one line per address and return the process exit code
 */
export function reportOutcomes(outcomes: readonly AddressOutcome[]): number {
  let failed = 0
  for (const outcome of outcomes) {
    if (outcome.ok) {
      const how = outcome.result.encrypted ? 'encrypted' : 'plaintext'
      logger.debug(`[RUN] Sent to ${outcome.address} (${how})`)
      continue
    }
    failed++
    logger.error(`${outcome.address}: ${describeFailure(outcome.error)}`)
  }
  if (failed > 0) {
    console.error(chalk.red(`${failed} of ${outcomes.length} deliveries failed`))
    return 1
  }
  return 0
}
