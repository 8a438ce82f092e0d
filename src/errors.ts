/**
 * Error taxonomy
 *
 * AuthError, ComposeError, CredentialStoreError and UsageError end the whole
 * invocation. ResolveError and SendError are scoped to one address and are
 * collected into the final report.
 */

export type AuthErrorKind = 'NotLoggedIn' | 'Rejected' | 'Unreachable'

export class AuthError extends Error {
  constructor(public readonly kind: AuthErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'AuthError'
  }
}

export type ResolveErrorKind = 'UnsupportedAddressForm' | 'JoinDenied' | 'AliasNotFound' | 'NetworkFailure'

export class ResolveError extends Error {
  constructor(public readonly kind: ResolveErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ResolveError'
  }
}

export type SendErrorKind = 'StaleKey' | 'NetworkFailure' | 'Unauthorized' | 'RateLimited' | 'Unsupported'

export class SendError extends Error {
  constructor(public readonly kind: SendErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SendError'
  }
}

export class ComposeError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ComposeError'
  }
}

export class CredentialStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CredentialStoreError'
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

export function isStaleKey(error: unknown): boolean {
  return error instanceof SendError && error.kind === 'StaleKey'
}
