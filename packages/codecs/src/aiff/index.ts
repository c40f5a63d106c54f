export { aiffReader, decodeAiff, isAiff, parseAiffHeader, parseAiffInfo } from './decoder'
export { encodeAiff, encodeAiffMono } from './encoder'
export type { AiffEncodeOptions, AiffHeader } from './types'
