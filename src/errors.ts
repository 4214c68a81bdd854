import { INVALID_DEVICE_TOKEN_REASONS, Reason, parseReasonBody, reasonInfo } from './Reason'

export type ApnsErrorCode =
  | 'invalid-header'
  | 'invalid-field'
  | 'critical-sound-mismatch'
  | 'payload-too-large'
  | 'reserved-key'
  | 'codec'
  | 'invalid-signing-key'
  | 'clock-skew'
  | 'gateway'

export abstract class ApnsError extends Error {
  public abstract readonly code: ApnsErrorCode

  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export class InvalidHeaderError extends ApnsError {
  public readonly code = 'invalid-header'
  public readonly header: string

  public constructor(header: string, detail: string) {
    super(`Invalid ${header} header: ${detail}`)
    this.header = header
  }
}

export class InvalidFieldError extends ApnsError {
  public readonly code = 'invalid-field'
  public readonly field: string

  public constructor(field: string, detail: string, options?: { cause?: unknown }) {
    super(`Invalid ${field}: ${detail}`, options)
    this.field = field
  }
}

export class CriticalSoundMismatchError extends ApnsError {
  public readonly code = 'critical-sound-mismatch'

  public constructor() {
    super('Interruption level does not match sound critical flag')
  }
}

export class PayloadTooLargeError extends ApnsError {
  public readonly code = 'payload-too-large'
  public readonly size: number
  public readonly limit: number

  public constructor(size: number, limit: number) {
    super(`Payload of ${size} bytes exceeds the ${limit} bytes limit`)
    this.size = size
    this.limit = limit
  }
}

export class ReservedKeyError extends ApnsError {
  public readonly code = 'reserved-key'
  public readonly key: string

  public constructor(key: string) {
    super(`User info key "${key}" collides with a reserved payload key`)
    this.key = key
  }
}

export type CodecErrorKind = 'missing-field' | 'unknown-field' | 'invalid-type'

export class CodecError extends ApnsError {
  public readonly code = 'codec'
  public readonly kind: CodecErrorKind
  public readonly field?: string

  public constructor(kind: CodecErrorKind, subject: string, field?: string) {
    super(field ? `${subject}: ${kind} "${field}"` : `${subject}: ${kind}`)
    this.kind = kind
    this.field = field
  }
}

export abstract class CredentialError extends ApnsError {}

export class InvalidSigningKeyError extends CredentialError {
  public readonly code = 'invalid-signing-key'

  public constructor(cause: unknown) {
    super(`Signing key is not usable for ES256: ${cause instanceof Error ? cause.message : String(cause)}`, { cause })
  }
}

export class ClockSkewError extends CredentialError {
  public readonly code = 'clock-skew'
  public readonly issuedAt: number

  public constructor(issuedAt: number) {
    super(`Clock reports a time before the epoch (iat ${issuedAt})`)
    this.issuedAt = issuedAt
  }
}

export class GatewayError extends ApnsError {
  public readonly code = 'gateway'
  public readonly reason: Reason
  public readonly status: number
  public readonly timestamp?: Date
  public readonly apnsId?: string

  public constructor(reason: Reason, status: number, timestamp?: Date, apnsId?: string) {
    super(`APNs rejected the request with ${status} ${reason}: ${reasonInfo(reason).description}`)
    this.reason = reason
    this.status = status
    this.timestamp = timestamp
    this.apnsId = apnsId
  }

  public static fromResponse(status: number, body: string | undefined, apnsId?: string): GatewayError {
    const { reason, timestamp } = parseReasonBody(body)

    return new GatewayError(reason, status, timestamp, apnsId)
  }

  public get isDeviceTokenInvalid(): boolean {
    return INVALID_DEVICE_TOKEN_REASONS.includes(this.reason)
  }
}
