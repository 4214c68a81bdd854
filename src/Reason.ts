import { z } from 'zod'

export interface ReasonInfo {
  status: number
  description: string
}

export const REASONS = {
  BadCollapseId: { status: 400, description: 'The collapse identifier exceeds the maximum allowed size.' },
  BadDeviceToken: { status: 400, description: 'The specified device token is invalid. Verify that the request contains a valid token and that the token matches the environment.' },
  BadExpirationDate: { status: 400, description: 'The apns-expiration value is invalid.' },
  BadMessageId: { status: 400, description: 'The apns-id value is invalid.' },
  BadPriority: { status: 400, description: 'The apns-priority value is invalid.' },
  BadTopic: { status: 400, description: 'The apns-topic value is invalid.' },
  DeviceTokenNotForTopic: { status: 400, description: 'The device token does not match the specified topic.' },
  DuplicateHeaders: { status: 400, description: 'One or more headers are repeated.' },
  IdleTimeout: { status: 400, description: 'Idle timeout.' },
  InvalidPushType: { status: 400, description: 'The apns-push-type value is invalid.' },
  MissingDeviceToken: { status: 400, description: 'The device token is not specified in the request :path.' },
  MissingTopic: { status: 400, description: 'The apns-topic header of the request is not specified and is required.' },
  PayloadEmpty: { status: 400, description: 'The message payload is empty.' },
  TopicDisallowed: { status: 400, description: 'Pushing to this topic is not allowed.' },
  BadCertificate: { status: 403, description: 'The certificate is invalid.' },
  BadCertificateEnvironment: { status: 403, description: 'The client certificate is for the wrong environment.' },
  ExpiredProviderToken: { status: 403, description: 'The provider token is stale and a new token should be generated.' },
  Forbidden: { status: 403, description: 'The specified action is not allowed.' },
  InvalidProviderToken: { status: 403, description: "The provider token is not valid, or the token signature can't be verified." },
  MissingProviderToken: { status: 403, description: 'No provider certificate was used to connect to APNs, and the authorization header is missing or no provider token is specified.' },
  BadPath: { status: 404, description: 'The request contained an invalid :path value.' },
  MethodNotAllowed: { status: 405, description: 'The specified :method value is not POST.' },
  ExpiredToken: { status: 410, description: 'The device token has expired.' },
  Unregistered: { status: 410, description: 'The device token is inactive for the specified topic.' },
  PayloadTooLarge: { status: 413, description: 'The message payload is too large.' },
  TooManyProviderTokenUpdates: { status: 429, description: 'The provider token is being updated too often. Update the token no more than once every 20 minutes.' },
  TooManyRequests: { status: 429, description: 'Too many requests were made consecutively to the same device token.' },
  InternalServerError: { status: 500, description: 'An internal server error occurred.' },
  ServiceUnavailable: { status: 503, description: 'The service is unavailable.' },
  Shutdown: { status: 503, description: 'The APNs server is shutting down.' },
  Unknown: { status: 500, description: 'unknown' }
} as const

export type Reason = keyof typeof REASONS

/** Reasons after which the device token should not be used again. */
export const INVALID_DEVICE_TOKEN_REASONS: readonly Reason[] = ['BadDeviceToken', 'DeviceTokenNotForTopic', 'ExpiredToken', 'Unregistered']

export interface ParsedReason {
  reason: Reason
  /** Moment the gateway confirmed the token stopped being valid, sent with 410 responses. */
  timestamp?: Date
}

const ReasonBodySchema = z.object({
  reason: z.string(),
  timestamp: z.number().optional()
})

export function isReason(value: string): value is Reason {
  return Object.prototype.hasOwnProperty.call(REASONS, value)
}

export function reasonInfo(reason: Reason): ReasonInfo {
  return REASONS[reason]
}

/** Reads a gateway error body. Anything that is not a known reason becomes `Unknown`. */
export function parseReasonBody(body: string | undefined): ParsedReason {
  if (!body) return { reason: 'Unknown' }

  let json: unknown

  try {
    json = JSON.parse(body)
  } catch {
    return { reason: 'Unknown' }
  }

  const parsed = ReasonBodySchema.safeParse(json)

  if (!parsed.success) return { reason: 'Unknown' }

  const reason = isReason(parsed.data.reason) ? parsed.data.reason : 'Unknown'

  return parsed.data.timestamp === undefined ? { reason } : { reason, timestamp: new Date(parsed.data.timestamp) }
}
