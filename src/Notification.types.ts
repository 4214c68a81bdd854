/** Tells the receiving OS how to treat the notification. */
export type PushType = 'alert' | 'background' | 'location' | 'voip' | 'complication' | 'fileprovider' | 'mdm'

/**
 * Delivery priority. `immediate` is 10 on the wire, `consider-power` is 5 and
 * `prioritize-power` is 1.
 */
export type Priority = 'immediate' | 'consider-power' | 'prioritize-power'

export type InterruptionLevel = 'active' | 'critical' | 'passive' | 'time-sensitive'

export interface Alert {
  title?: string
  subtitle?: string
  body?: string
  launchImage?: string
  /** Localized replacement for `title`, takes precedence over it. */
  titleLocKey?: string
  titleLocArgs?: string[]
  /** Localized replacement for `subtitle`, takes precedence over it. */
  subtitleLocKey?: string
  subtitleLocArgs?: string[]
  /** Localized replacement for `body`, takes precedence over it. */
  locKey?: string
  locArgs?: string[]
}

export interface Sound {
  /** Critical sounds bypass the mute switch and need the `critical` interruption level. */
  critical: boolean
  name: string
  /** 0 (silent) to 1 (full volume), only sent for critical sounds. */
  volume: number
}

export type UserInfo = Record<string, unknown>

export interface NotificationRequest {
  /** Hex-encoded device token, used as the request path. */
  deviceToken: string
  pushType?: PushType
  /** Canonical UUID, the gateway assigns one when absent. */
  id?: string
  /** Date after which the gateway stops trying. The epoch means a single attempt. */
  expiration?: Date
  priority?: Priority
  topic?: string
  collapseId?: string
  alert?: Alert
  badge?: number
  sound?: Sound
  threadId?: string
  category?: string
  contentAvailable?: boolean
  mutableContent?: boolean
  targetContentId?: string
  interruptionLevel?: InterruptionLevel
  relevanceScore?: number
  userInfo?: UserInfo
}

export interface AlertDictionary {
  title?: string
  subtitle?: string
  body?: string
  'launch-image'?: string
  'title-loc-key'?: string
  'title-loc-args'?: string[]
  'subtitle-loc-key'?: string
  'subtitle-loc-args'?: string[]
  'loc-key'?: string
  'loc-args'?: string[]
}

export interface SoundDictionary {
  critical: number
  name: string
  volume: number
}

/** A bare body string, or the full dictionary. */
export type AlertWire = string | AlertDictionary

/** A bare sound name, or the critical sound dictionary. */
export type SoundWire = string | SoundDictionary

export interface WirePayload {
  alert?: AlertWire
  badge?: number
  sound?: SoundWire
  'thread-id'?: string
  category?: string
  'content-available'?: 1
  'mutable-content'?: 1
  'target-content-id'?: string
  'interruption-level'?: InterruptionLevel
  'relevance-score'?: number
}

export type WireHeaderName = 'apns-push-type' | 'apns-id' | 'apns-expiration' | 'apns-priority' | 'apns-topic' | 'apns-collapse-id'

export type WireHeaders = { 'apns-push-type': PushType } & Partial<Record<Exclude<WireHeaderName, 'apns-push-type'>, string>>
