import jwt from 'jsonwebtoken'

import SharedCache, { CacheEntry } from './SharedCache'
import { Clock, ProviderTokenClaims, TokenCacheOptions } from './TokenCache.types'
import { ClockSkewError, InvalidSigningKeyError } from './errors'

/**
 * APNs rejects tokens older than an hour and token updates more frequent than
 * every 20 minutes.
 */
export const TOKEN_REFRESH_INTERVAL = 30 * 60 * 1000

export default class TokenCache {
  public readonly keyId: string
  public readonly teamId: string

  private readonly key: string | Buffer
  private readonly clock: Clock
  private readonly cache: SharedCache<string>

  public constructor(options: TokenCacheOptions) {
    this.keyId = options.keyId
    this.teamId = options.teamId
    this.key = options.key
    this.clock = options.clock || Date.now

    this.cache = new SharedCache(this.createTokenSync(), {
      create: () => this.createToken(),
      isFresh: (entry) => this.isFresh(entry)
    })
  }

  /** The entry currently held, without checking its age. */
  public get current(): CacheEntry<string> {
    return this.cache.current
  }

  public async fetch(): Promise<string> {
    const entry = await this.cache.get()

    return entry.value
  }

  public fetchEntry(): Promise<CacheEntry<string>> {
    return this.cache.get()
  }

  public isFresh(entry: CacheEntry<string>): boolean {
    const age = this.clock() - entry.createdAt

    return age >= 0 && age < TOKEN_REFRESH_INTERVAL
  }

  private createTokenSync(): CacheEntry<string> {
    const createdAt = this.clock()
    const claims = this.claims(createdAt)
    let value: string

    try {
      value = jwt.sign(claims, this.key, { algorithm: 'ES256', keyid: this.keyId })
    } catch (error) {
      throw new InvalidSigningKeyError(error)
    }

    return { value, createdAt }
  }

  private createToken(): Promise<CacheEntry<string>> {
    return new Promise((resolve, reject) => {
      const createdAt = this.clock()
      const claims = this.claims(createdAt)

      jwt.sign(claims, this.key, { algorithm: 'ES256', keyid: this.keyId }, (error, value) => {
        if (error || !value) {
          reject(new InvalidSigningKeyError(error || 'no token produced'))
        } else {
          resolve({ value, createdAt })
        }
      })
    })
  }

  private claims(createdAt: number): ProviderTokenClaims {
    const iat = Math.floor(createdAt / 1000)

    if (iat < 0) throw new ClockSkewError(iat)

    return { iss: this.teamId, iat }
  }
}
