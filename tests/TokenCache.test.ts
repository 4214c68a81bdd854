import { generateKeyPairSync } from 'crypto'
import jwt from 'jsonwebtoken'

import { ClockSkewError, InvalidSigningKeyError, TOKEN_REFRESH_INTERVAL, TokenCache } from '../src'

const { privateKey, publicKey } = generateKeyPairSync('ec', {
  namedCurve: 'prime256v1',
  privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
  publicKeyEncoding: { type: 'spki', format: 'pem' }
})

const START = 1700000000000

describe(TokenCache, (): void => {
  let now: number
  const clock = (): number => now

  beforeEach((): void => {
    now = START
    jest.spyOn(jwt, 'sign')
  })

  afterEach((): void => {
    jest.restoreAllMocks()
  })

  it('signs an ES256 provider token when created', async (): Promise<void> => {
    const tokenCache = new TokenCache({ keyId: 'KEY1234567', teamId: 'TEAM123456', key: privateKey, clock })
    const token = tokenCache.current.value

    expect(jwt.sign).toHaveBeenCalledTimes(1)
    expect(tokenCache.current.createdAt).toEqual(START)
    expect(jwt.decode(token, { complete: true })).toMatchObject({ header: { alg: 'ES256', kid: 'KEY1234567' }, payload: { iss: 'TEAM123456', iat: 1700000000 } })
    expect(jwt.verify(token, publicKey, { algorithms: ['ES256'] })).toEqual({ iss: 'TEAM123456', iat: 1700000000 })
  })

  it('fails fast when the key cannot sign ES256', async (): Promise<void> => {
    const { privateKey: wrongCurve } = generateKeyPairSync('ec', {
      namedCurve: 'secp384r1',
      privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
      publicKeyEncoding: { type: 'spki', format: 'pem' }
    })

    expect(() => new TokenCache({ keyId: 'KEY1234567', teamId: 'TEAM123456', key: 'test-secret', clock })).toThrow(InvalidSigningKeyError)
    expect(() => new TokenCache({ keyId: 'KEY1234567', teamId: 'TEAM123456', key: wrongCurve, clock })).toThrow(InvalidSigningKeyError)
  })

  it('serves the same token until it is 30 minutes old', async (): Promise<void> => {
    const tokenCache = new TokenCache({ keyId: 'KEY1234567', teamId: 'TEAM123456', key: privateKey, clock })
    const first = await tokenCache.fetch()

    now = START + TOKEN_REFRESH_INTERVAL - 1

    const second = await tokenCache.fetch()

    expect(second).toBe(first)
    expect(jwt.sign).toHaveBeenCalledTimes(1)
  })

  it('regenerates the token once it reaches the refresh interval', async (): Promise<void> => {
    const tokenCache = new TokenCache({ keyId: 'KEY1234567', teamId: 'TEAM123456', key: privateKey, clock })
    const first = tokenCache.current.value

    now = START + TOKEN_REFRESH_INTERVAL

    const entry = await tokenCache.fetchEntry()

    expect(jwt.sign).toHaveBeenCalledTimes(2)
    expect(entry.value).not.toEqual(first)
    expect(entry.createdAt).toEqual(START + TOKEN_REFRESH_INTERVAL)
    expect(jwt.verify(entry.value, publicKey, { algorithms: ['ES256'] })).toEqual({ iss: 'TEAM123456', iat: 1700001800 })
  })

  it('regenerates a stale token exactly once for concurrent callers', async (): Promise<void> => {
    const tokenCache = new TokenCache({ keyId: 'KEY1234567', teamId: 'TEAM123456', key: privateKey, clock })

    now = START + 31 * 60 * 1000

    const entries = await Promise.all(Array.from({ length: 10 }, () => tokenCache.fetchEntry()))

    expect(jwt.sign).toHaveBeenCalledTimes(2)
    expect(new Set(entries.map((entry) => entry.value)).size).toEqual(1)
    expect(new Set(entries.map((entry) => entry.createdAt))).toEqual(new Set([START + 31 * 60 * 1000]))
    expect(tokenCache.current).toBe(entries[0])
  })

  it('treats a token from the future as stale', async (): Promise<void> => {
    const tokenCache = new TokenCache({ keyId: 'KEY1234567', teamId: 'TEAM123456', key: privateKey, clock })

    expect(tokenCache.isFresh({ value: 'token', createdAt: START })).toEqual(true)
    expect(tokenCache.isFresh({ value: 'token', createdAt: START + 1 })).toEqual(false)
    expect(tokenCache.isFresh({ value: 'token', createdAt: START - TOKEN_REFRESH_INTERVAL })).toEqual(false)
  })

  it('refuses to sign before the epoch and keeps the last good token', async (): Promise<void> => {
    const tokenCache = new TokenCache({ keyId: 'KEY1234567', teamId: 'TEAM123456', key: privateKey, clock })
    const first = tokenCache.current.value

    now = -5000

    await expect(tokenCache.fetch()).rejects.toBeInstanceOf(ClockSkewError)
    expect(tokenCache.current.value).toBe(first)

    now = START + 1000

    expect(await tokenCache.fetch()).toBe(first)
    expect(() => new TokenCache({ keyId: 'KEY1234567', teamId: 'TEAM123456', key: privateKey, clock: () => -1000 })).toThrow(ClockSkewError)
  })
})
