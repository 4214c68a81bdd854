import ApnsClient from './ApnsClient'
import { NotificationRequest } from './Notification.types'
import { EncodedRequest, RelevanceScorePolicy } from './RequestEncoder.types'
import { Clock } from './TokenCache.types'

export interface ApnsTokenAuthentication {
  keyLocation?: string
  key?: string
  keyId: string
  teamId: string
}

export interface ApnsCertificateAuthentication {
  certificateLocation?: string
  certificate?: string
  /** Defaults to the certificate file when it holds both. */
  privateKeyLocation?: string
  privateKey?: string
  passphrase?: string
}

export interface ApnsClientOptions {
  token?: ApnsTokenAuthentication
  certificate?: ApnsCertificateAuthentication
  sandbox?: boolean
  /** Overrides the production and sandbox servers, e.g. for a local stand-in. */
  endpoint?: string
  /** Used for requests that carry no topic of their own. */
  topic?: string
  relevanceScorePolicy?: RelevanceScorePolicy
  dryRun?: boolean
  clock?: Clock
}

export type Notification = Omit<NotificationRequest, 'deviceToken'>

export interface PushReport {
  successCount: number
  failureCount: number
  /** Tokens the gateway reported as unusable, safe to forget. */
  invalidTokens: string[]
}

export interface DryPush {
  instance: ApnsClient
  request: NotificationRequest
  encoded: EncodedRequest
}
