/** Milliseconds since the epoch. */
export type Clock = () => number

export interface TokenCacheOptions {
  /** Ten character key identifier from the developer account. */
  keyId: string
  /** Team identifier, sent as the token issuer. */
  teamId: string
  /** PKCS#8 PEM of the P-256 signing key. */
  key: string | Buffer
  clock?: Clock
}

export interface ProviderTokenClaims {
  iss: string
  iat: number
}
