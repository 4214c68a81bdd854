import http2, { IncomingHttpHeaders, SecureClientSessionOptions } from 'http2'

export type TlsOptions = Pick<SecureClientSessionOptions, 'ca' | 'cert' | 'key' | 'passphrase'>

export interface FetchOptions {
  method: 'GET' | 'POST' | 'PUT' | 'DELETE'
  headers?: Record<string, string>
  body?: string
  tls?: TlsOptions
}

export interface Response {
  status: number
  headers: IncomingHttpHeaders
  body: string
}

export function fetch(url: string, options: FetchOptions): Promise<Response> {
  return new Promise((resolve, reject) => {
    const target = new URL(url)
    const scheme = target.protocol.replace(':', '')
    const headers = { ':method': options.method, ':scheme': scheme, ':path': `${target.pathname}${target.search}`, ...options.headers }
    const client = http2.connect(target.origin, options.tls)

    client.on('error', reject)

    const request = client.request(headers)
    const chunks: string[] = []
    let responseHeaders: IncomingHttpHeaders = {}
    let responseStatus = 0

    request.setEncoding('utf8')

    request.on('response', (headers) => {
      responseHeaders = headers
      responseStatus = Number(headers[':status'])
    })

    request.on('data', (chunk: string | Buffer) => {
      chunks.push(chunk.toString())
    })

    request.on('error', (error: Error) => {
      client.close()

      reject(error)
    })

    request.on('end', () => {
      client.close()

      resolve({ status: responseStatus, headers: responseHeaders, body: chunks.join('') })
    })

    if (options.body) request.write(options.body)

    request.end()
  })
}
