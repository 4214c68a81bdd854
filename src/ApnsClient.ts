import { EventEmitter } from '@universal-packages/event-emitter'

import { ApnsCertificateAuthentication, ApnsClientOptions, ApnsTokenAuthentication, DryPush, Notification, PushReport } from './ApnsClient.types'
import { NotificationRequest } from './Notification.types'
import RequestEncoder from './RequestEncoder'
import TokenCache from './TokenCache'
import { GatewayError } from './errors'
import { TlsOptions, fetch } from './fetch'
import { loadPem, normalizePem } from './loadPem'

export const PRODUCTION_SERVER = 'https://api.push.apple.com'
export const DEVELOPMENT_SERVER = 'https://api.sandbox.push.apple.com'

export default class ApnsClient extends EventEmitter {
  public static readonly dryPushes: DryPush[] = []

  public readonly options: ApnsClientOptions
  public readonly encoder: RequestEncoder

  private tokenCache?: TokenCache
  private tls?: TlsOptions

  public constructor(options?: ApnsClientOptions) {
    super()
    this.options = { dryRun: process.env.NODE_ENV === 'test' || process.env.NODE_ENV === 'development', ...options }
    this.encoder = new RequestEncoder({ relevanceScorePolicy: this.options.relevanceScorePolicy })
  }

  public get baseUrl(): string {
    if (this.options.endpoint) return this.options.endpoint.replace(/\/+$/, '')

    return this.options.sandbox ? DEVELOPMENT_SERVER : PRODUCTION_SERVER
  }

  public get authentication(): 'token' | 'certificate' | 'none' {
    if (this.tokenCache) return 'token'
    if (this.tls) return 'certificate'

    return 'none'
  }

  public prepare(): void {
    if (this.options.token) this.prepareToken(this.options.token)
    if (this.options.certificate) this.prepareCertificate(this.options.certificate)

    if (this.authentication === 'none') {
      this.emit('warning', { message: 'No credentials were found. Please check your configuration.' })
    }
  }

  /** Sends one notification and resolves with its apns-id. */
  public async send(request: NotificationRequest): Promise<string | undefined> {
    const withTopic = request.topic === undefined && this.options.topic ? { ...request, topic: this.options.topic } : request
    const encoded = this.encoder.encode(withTopic)

    if (this.options.dryRun) {
      ApnsClient.dryPushes.push({ instance: this, request: withTopic, encoded })

      return encoded.headers['apns-id']
    }

    const headers: Record<string, string> = { 'content-type': 'application/json' }

    for (const [name, value] of Object.entries(encoded.headers)) {
      if (value !== undefined) headers[name] = value
    }

    if (this.tokenCache) headers.authorization = `bearer ${await this.tokenCache.fetch()}`

    const response = await fetch(`${this.baseUrl}/3/device/${encodeURIComponent(encoded.deviceToken)}`, { method: 'POST', headers, body: encoded.body, tls: this.tls })
    const responseId = response.headers['apns-id']
    const apnsId = (Array.isArray(responseId) ? responseId[0] : responseId) || encoded.headers['apns-id']

    if (response.status !== 200) throw GatewayError.fromResponse(response.status, response.body, apnsId)

    return apnsId
  }

  public async pushNotification(deviceTokens: string[], notification: Notification): Promise<PushReport> {
    const report: PushReport = { successCount: 0, failureCount: 0, invalidTokens: [] }

    for (let i = 0; i < deviceTokens.length; i++) {
      const deviceToken = deviceTokens[i]

      try {
        const apnsId = await this.send({ ...notification, deviceToken })

        report.successCount++

        this.emit('push', { payload: { deviceToken, apnsId, notification } })
      } catch (error) {
        report.failureCount++

        if (error instanceof GatewayError && error.isDeviceTokenInvalid) report.invalidTokens.push(deviceToken)

        this.emit('error', { error: error instanceof Error ? error : new Error(String(error)), payload: { deviceToken, notification } })
      }
    }

    return report
  }

  private prepareToken(token: ApnsTokenAuthentication): void {
    const key = readPem(token.key, token.keyLocation)

    if (!key) return

    this.tokenCache = new TokenCache({ keyId: token.keyId, teamId: token.teamId, key, clock: this.options.clock })
  }

  private prepareCertificate(certificate: ApnsCertificateAuthentication): void {
    const cert = readPem(certificate.certificate, certificate.certificateLocation)

    if (!cert) return

    const key = readPem(certificate.privateKey, certificate.privateKeyLocation) || cert

    this.tls = { cert, key, passphrase: certificate.passphrase }
  }
}

function readPem(inline: string | undefined, location: string | undefined): string | undefined {
  if (inline) return normalizePem(inline)
  if (location) return loadPem(location)

  return undefined
}
