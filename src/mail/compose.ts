import { ComposeError } from '@/errors'

export interface Message {
  readonly subject?: string
  readonly body: string
}

export interface TextMessageContent {
  msgtype: 'm.text'
  body: string
}

/**
 * Remove every line whose first character is `~`, together with its line
 * terminator. Lines are split after `\n`, so `\r\n` endings survive intact.
 */
export function stripTildeLines(text: string): string {
  const lines = text.match(/[^\n]*\n|[^\n]+$/g) ?? []
  return lines.filter(line => !line.startsWith('~')).join('')
}

function decodeInput(raw: Uint8Array | string): string {
  if (typeof raw === 'string') {
    return raw
  }
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(raw)
  } catch {
    throw new ComposeError('Message body is not valid UTF-8')
  }
}

/**
 * Build the message shared by every recipient of this invocation.
 * Tilde lines are removed before the subject is attached.
 */
export function compose(raw: Uint8Array | string, subject?: string): Message {
  const stripped = stripTildeLines(decodeInput(raw))
  if (subject) {
    return Object.freeze({ subject, body: `${subject}\n\n${stripped}` })
  }
  return Object.freeze({ body: stripped })
}

export function messageContent(message: Message): TextMessageContent {
  return { msgtype: 'm.text', body: message.body }
}
