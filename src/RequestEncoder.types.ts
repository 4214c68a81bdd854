import { UserInfo, WireHeaders, WirePayload } from './Notification.types'

/**
 * `pass-through` sends any relevance score and lets the gateway judge it,
 * `validate` rejects scores outside [0, 1] before sending.
 */
export type RelevanceScorePolicy = 'pass-through' | 'validate'

export interface RequestEncoderOptions {
  relevanceScorePolicy?: RelevanceScorePolicy
}

export interface EncodedRequest {
  deviceToken: string
  headers: WireHeaders
  payload: WirePayload & UserInfo
  /** Serialized payload, ready to be written as the request body. */
  body: string
  /** Byte length of `body` in UTF-8. */
  size: number
}
