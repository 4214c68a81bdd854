import { readEnvironment } from '../src'

describe(readEnvironment, (): void => {
  it('builds token options from the environment', async (): Promise<void> => {
    const options = readEnvironment({
      APNS_KEY_ID: 'KEY1234567',
      APNS_TEAM_ID: 'TEAM123456',
      APNS_KEY_LOCATION: './tests/__fixtures__/apns.p8',
      APNS_TOPIC: 'com.example.app',
      APNS_ENVIRONMENT: 'development'
    })

    expect(options).toEqual({
      token: { keyId: 'KEY1234567', teamId: 'TEAM123456', keyLocation: './tests/__fixtures__/apns.p8' },
      topic: 'com.example.app',
      sandbox: true
    })
  })

  it('takes an inline key and a custom endpoint', async (): Promise<void> => {
    const options = readEnvironment({
      APNS_KEY_ID: 'KEY1234567',
      APNS_TEAM_ID: 'TEAM123456',
      APNS_KEY: 'test-secret',
      APNS_ENVIRONMENT: 'production',
      APNS_ENDPOINT: 'http://localhost:8443'
    })

    expect(options).toEqual({ token: { keyId: 'KEY1234567', teamId: 'TEAM123456', key: 'test-secret' }, sandbox: false, endpoint: 'http://localhost:8443' })
  })

  it('returns nothing when no variables are set', async (): Promise<void> => {
    expect(readEnvironment({ PATH: '/usr/bin' })).toEqual({})
  })

  it('rejects incomplete credentials', async (): Promise<void> => {
    expect(() => readEnvironment({ APNS_KEY_ID: 'KEY1234567' })).toThrow('APNS_KEY_ID, APNS_TEAM_ID and APNS_KEY or APNS_KEY_LOCATION must be set together')
    expect(() => readEnvironment({ APNS_KEY_ID: 'KEY1234567', APNS_TEAM_ID: 'TEAM123456' })).toThrow(
      'APNS_KEY_ID, APNS_TEAM_ID and APNS_KEY or APNS_KEY_LOCATION must be set together'
    )
  })

  it('rejects unknown environments', async (): Promise<void> => {
    expect(() => readEnvironment({ APNS_ENVIRONMENT: 'staging' })).toThrow()
  })
})
