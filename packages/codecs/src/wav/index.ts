export { decodeWav, isWav, parseWavHeader, parseWavInfo, wavReader } from './decoder'
export { encodeWav, encodeWavMono } from './encoder'
export { WavFormat, type WavEncodeOptions, type WavFormatCode, type WavHeader } from './types'
