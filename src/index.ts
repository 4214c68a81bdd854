export { default as ApnsClient, DEVELOPMENT_SERVER, PRODUCTION_SERVER } from './ApnsClient'
export * from './ApnsClient.types'
export * from './Notification.types'
export * from './PayloadCodec'
export { default as RequestEncoder, DEFAULT_PAYLOAD_SIZE_LIMIT, MAX_COLLAPSE_ID_BYTES, RESERVED_PAYLOAD_KEYS, VOIP_PAYLOAD_SIZE_LIMIT, payloadSizeLimit } from './RequestEncoder'
export * from './RequestEncoder.types'
export { default as ReadWriteLock } from './ReadWriteLock'
export { default as SharedCache } from './SharedCache'
export * from './SharedCache'
export { default as TokenCache, TOKEN_REFRESH_INTERVAL } from './TokenCache'
export * from './TokenCache.types'
export * from './Reason'
export * from './errors'
export { readEnvironment } from './config'
export { loadPem, normalizePem } from './loadPem'
