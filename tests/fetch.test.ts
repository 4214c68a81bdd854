import http2 from 'http2'

import { fetch } from '../src/fetch'

jest.mock('http2', () => ({
  connect: jest.fn().mockReturnValue({
    on: jest.fn(),
    request: jest.fn().mockReturnValue({
      on: jest.fn().mockImplementation((event, callback) => {
        if (event === 'response') {
          callback({ ':status': 400, 'apns-id': '4d947500-498e-4524-8aa8-7220c4e65d75' })
        }

        if (event === 'data') {
          callback('{"reason":')
          callback(Buffer.from('"BadTopic"}'))
        }

        if (event === 'end') {
          callback()
        }
      }),
      setEncoding: jest.fn(),
      write: jest.fn(),
      end: jest.fn()
    }),
    close: jest.fn()
  })
}))

describe('fetch', (): void => {
  it('sends the request over http2 and collects the response', async (): Promise<void> => {
    const tls = { cert: 'test-certificate', key: 'test-secret' }
    const response = await fetch('https://api.sandbox.push.apple.com/3/device/abc123', {
      method: 'POST',
      headers: { 'apns-topic': 'com.example.app' },
      body: '{"alert":"Hello World!"}',
      tls
    })
    const client = jest.mocked(http2.connect).mock.results[0].value

    expect(http2.connect).toHaveBeenCalledWith('https://api.sandbox.push.apple.com', tls)
    expect(client.request).toHaveBeenCalledWith({ ':method': 'POST', ':scheme': 'https', ':path': '/3/device/abc123', 'apns-topic': 'com.example.app' })
    expect(client.close).toHaveBeenCalled()
    expect(response).toEqual({
      status: 400,
      body: '{"reason":"BadTopic"}',
      headers: { ':status': 400, 'apns-id': '4d947500-498e-4524-8aa8-7220c4e65d75' }
    })
  })
})
