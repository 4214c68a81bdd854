import { InterruptionLevel, NotificationRequest, Priority, PushType, UserInfo, WireHeaders, WirePayload } from './Notification.types'
import { encodeAlert, encodeSound } from './PayloadCodec'
import { EncodedRequest, RelevanceScorePolicy, RequestEncoderOptions } from './RequestEncoder.types'
import { CriticalSoundMismatchError, InvalidFieldError, InvalidHeaderError, PayloadTooLargeError, ReservedKeyError } from './errors'

export const PUSH_TYPES: readonly PushType[] = ['alert', 'background', 'location', 'voip', 'complication', 'fileprovider', 'mdm']
export const INTERRUPTION_LEVELS: readonly InterruptionLevel[] = ['active', 'critical', 'passive', 'time-sensitive']
export const PRIORITY_VALUES: Readonly<Record<Priority, string>> = { immediate: '10', 'consider-power': '5', 'prioritize-power': '1' }

export const DEFAULT_PAYLOAD_SIZE_LIMIT = 4096
export const VOIP_PAYLOAD_SIZE_LIMIT = 5120
export const MAX_COLLAPSE_ID_BYTES = 64

export const RESERVED_PAYLOAD_KEYS: readonly string[] = [
  'alert',
  'badge',
  'sound',
  'thread-id',
  'category',
  'content-available',
  'mutable-content',
  'target-content-id',
  'interruption-level',
  'relevance-score'
]

// Hyphenated 8-4-4-4-12, any version.
const CANONICAL_UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i

// Tab, visible ASCII and obs-text.
const HEADER_TEXT = /^[\t\x20-\x7e\x80-\xff]*$/

export function payloadSizeLimit(pushType: PushType): number {
  return pushType === 'voip' ? VOIP_PAYLOAD_SIZE_LIMIT : DEFAULT_PAYLOAD_SIZE_LIMIT
}

/**
 * Turns a {@link NotificationRequest} into the headers and body APNs expects.
 * Every check runs locally, a request that fails here is never sent.
 */
export default class RequestEncoder {
  public readonly relevanceScorePolicy: RelevanceScorePolicy

  public constructor(options?: RequestEncoderOptions) {
    this.relevanceScorePolicy = options?.relevanceScorePolicy ?? 'pass-through'
  }

  public encode(request: NotificationRequest): EncodedRequest {
    if (typeof request.deviceToken !== 'string' || request.deviceToken.length === 0) throw new InvalidFieldError('deviceToken', 'must be a non-empty string')

    const pushType = request.pushType ?? 'alert'
    const headers = this.encodeHeaders(request, pushType)
    const critical = reconcileCriticalSound(request)
    const payload = this.encodePayload(request, critical)
    const body = serialize(payload)
    const size = Buffer.byteLength(body, 'utf8')
    const limit = payloadSizeLimit(pushType)

    if (size > limit) throw new PayloadTooLargeError(size, limit)

    return { deviceToken: request.deviceToken, headers, payload, body, size }
  }

  private encodeHeaders(request: NotificationRequest, pushType: PushType): WireHeaders {
    if (!PUSH_TYPES.includes(pushType)) throw new InvalidHeaderError('apns-push-type', `unknown push type "${pushType}"`)

    const headers: WireHeaders = { 'apns-push-type': pushType }

    if (request.id !== undefined) {
      if (!CANONICAL_UUID.test(request.id)) throw new InvalidHeaderError('apns-id', `"${request.id}" is not a canonical UUID`)

      headers['apns-id'] = request.id.toLowerCase()
    }

    if (request.expiration !== undefined) {
      const time = request.expiration.getTime()

      if (Number.isNaN(time)) throw new InvalidHeaderError('apns-expiration', 'invalid date')

      headers['apns-expiration'] = String(Math.floor(time / 1000))
    }

    const priority = request.priority ?? 'immediate'

    if (!Object.prototype.hasOwnProperty.call(PRIORITY_VALUES, priority)) throw new InvalidHeaderError('apns-priority', `unknown priority "${priority}"`)
    if (priority !== 'immediate') headers['apns-priority'] = PRIORITY_VALUES[priority]

    if (request.topic !== undefined) headers['apns-topic'] = headerText('apns-topic', request.topic)

    if (request.collapseId !== undefined) {
      const collapseId = headerText('apns-collapse-id', request.collapseId)
      const bytes = Buffer.byteLength(collapseId, 'utf8')

      if (bytes > MAX_COLLAPSE_ID_BYTES) throw new InvalidHeaderError('apns-collapse-id', `${bytes} bytes exceeds ${MAX_COLLAPSE_ID_BYTES}`)

      headers['apns-collapse-id'] = collapseId
    }

    return headers
  }

  private encodePayload(request: NotificationRequest, critical: boolean): WirePayload & UserInfo {
    const payload: WirePayload & UserInfo = {}

    if (request.alert !== undefined) {
      if (request.alert.body === undefined && request.alert.locKey === undefined) throw new InvalidFieldError('alert.body', 'an alert needs a body or a loc-key')

      payload.alert = encodeAlert(request.alert)
    }

    if (request.badge !== undefined) {
      if (!Number.isInteger(request.badge) || request.badge < 0) throw new InvalidFieldError('badge', 'must be a non-negative integer')

      payload.badge = request.badge
    }

    if (request.sound !== undefined) {
      if (!Number.isFinite(request.sound.volume)) throw new InvalidFieldError('sound.volume', 'must be a finite number')

      payload.sound = encodeSound({ ...request.sound, critical })
    }

    if (request.threadId !== undefined) payload['thread-id'] = request.threadId
    if (request.category !== undefined) payload.category = request.category
    if (request.contentAvailable) payload['content-available'] = 1
    if (request.mutableContent) payload['mutable-content'] = 1
    if (request.targetContentId !== undefined) payload['target-content-id'] = request.targetContentId

    if (request.interruptionLevel !== undefined) {
      if (!INTERRUPTION_LEVELS.includes(request.interruptionLevel)) throw new InvalidFieldError('interruptionLevel', `unknown level "${request.interruptionLevel}"`)

      payload['interruption-level'] = request.interruptionLevel
    }

    if (request.relevanceScore !== undefined) {
      payload['relevance-score'] = this.checkRelevanceScore(request.relevanceScore)
    }

    if (request.userInfo !== undefined) {
      for (const key of Object.keys(request.userInfo)) {
        if (RESERVED_PAYLOAD_KEYS.includes(key)) throw new ReservedKeyError(key)

        Object.defineProperty(payload, key, { value: request.userInfo[key], enumerable: true, writable: true, configurable: true })
      }
    }

    return payload
  }

  private checkRelevanceScore(score: number): number {
    if (!Number.isFinite(score)) throw new InvalidFieldError('relevanceScore', 'must be a finite number')
    if (this.relevanceScorePolicy === 'validate' && (score < 0 || score > 1)) throw new InvalidFieldError('relevanceScore', `${score} is outside [0, 1]`)

    return score
  }
}

/**
 * The interruption level and the sound's critical flag must agree, a critical
 * sound without the critical level (or the reverse) is rejected here.
 */
function reconcileCriticalSound(request: NotificationRequest): boolean {
  const isCriticalLevel = request.interruptionLevel === 'critical'
  const isCriticalSound = request.sound?.critical ?? false

  if (isCriticalLevel !== isCriticalSound) throw new CriticalSoundMismatchError()

  return isCriticalLevel
}

function headerText(header: string, value: string): string {
  if (!HEADER_TEXT.test(value)) throw new InvalidHeaderError(header, 'contains characters not allowed in a header value')

  return value
}

function serialize(payload: WirePayload & UserInfo): string {
  try {
    return JSON.stringify(payload)
  } catch (error) {
    throw new InvalidFieldError('userInfo', 'is not serializable to JSON', { cause: error })
  }
}
