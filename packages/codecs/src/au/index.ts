export { auReader, decodeAu, isAu, parseAuHeader, parseAuInfo } from './decoder'
export { encodeAu, encodeAuMono } from './encoder'
export { AuEncoding, type AuEncodeOptions, type AuEncodingType, type AuHeader } from './types'
