import { createInterface, type Interface } from 'node:readline'
import { Writable } from 'node:stream'
import { UsageError } from '@/errors'

/**
 * Line-oriented questions to the user. Setup talks only to this, so tests can
 * script the answers.
 */
export interface Prompter {
  ask(question: string, opts?: { masked?: boolean }): Promise<string>
  close(): void
}

/**
 * Forwards to the target unless muted, which hides the echo of typed passwords
 */
class MutableOutput extends Writable {
  muted = false

  constructor(private readonly target: Writable) {
    super()
  }

  _write(chunk: Buffer | string, encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) {
      this.target.write(chunk, encoding)
    }
    callback()
  }
}

interface PendingAnswer {
  resolve(line: string): void
  reject(error: Error): void
}

export class TerminalPrompter implements Prompter {
  private readonly output: MutableOutput
  private readonly rl: Interface
  // Lines that arrive before their question, as with piped or pasted input
  private readonly lines: string[] = []
  private pending: PendingAnswer | null = null
  private closed = false

  constructor(
    input: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin,
    private readonly target: Writable = process.stdout,
  ) {
    this.output = new MutableOutput(target)
    this.rl = createInterface({
      input,
      output: this.output,
      terminal: Boolean(input.isTTY),
    })
    this.rl.on('line', line => {
      const pending = this.pending
      if (pending) {
        this.pending = null
        pending.resolve(line)
      } else {
        this.lines.push(line)
      }
    })
    this.rl.once('close', () => {
      this.closed = true
      const pending = this.pending
      this.pending = null
      pending?.reject(new UsageError('Input ended before setup finished'))
    })
  }

  async ask(question: string, opts: { masked?: boolean } = {}): Promise<string> {
    if (this.closed && this.lines.length === 0) {
      throw new UsageError('Input ended before setup finished')
    }

    if (this.closed) {
      this.output.write(question)
    } else {
      this.rl.setPrompt(question)
      this.rl.prompt()
    }
    // The prompt itself is already written, mute only what the user types
    if (opts.masked) {
      this.output.muted = true
    }

    try {
      return await this.nextLine()
    } finally {
      if (opts.masked) {
        this.output.muted = false
        this.target.write('\n')
      }
    }
  }

  close(): void {
    if (!this.closed) {
      this.rl.close()
    }
  }

  private nextLine(): Promise<string> {
    const queued = this.lines.shift()
    if (queued !== undefined) {
      return Promise.resolve(queued)
    }
    if (this.closed) {
      return Promise.reject(new UsageError('Input ended before setup finished'))
    }
    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject }
    })
  }
}
