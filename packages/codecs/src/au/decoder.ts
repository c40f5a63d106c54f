/**
 * AU audio decoder
 * Reads 16-bit PCM from Sun/NeXT audio files
 */

import {
	InvalidInputError,
	type AudioInfo,
	type AudioReader,
	type PcmAudio,
	type SampleEncoding,
} from '@pcm2upd/core'
import { AU_MAGIC, AU_UNKNOWN_SIZE, AuEncoding, type AuEncodingType, type AuHeader } from './types'

/**
 * Check if data is an AU file
 */
export function isAu(data: Uint8Array): boolean {
	if (data.length < 24) return false
	return readU32BE(data, 0) === AU_MAGIC
}

/**
 * Parse AU header
 */
export function parseAuHeader(data: Uint8Array): AuHeader {
	if (!isAu(data)) {
		throw new InvalidInputError('Invalid AU: bad magic number')
	}

	const dataOffset = readU32BE(data, 4)
	const storedSize = readU32BE(data, 8)
	const encoding = readU32BE(data, 12)
	const sampleRate = readU32BE(data, 16)
	const numChannels = readU32BE(data, 20)

	if (dataOffset < 24 || dataOffset > data.length) {
		throw new InvalidInputError(`Invalid AU: data offset ${dataOffset} out of range`)
	}
	if (numChannels === 0 || sampleRate === 0) {
		throw new InvalidInputError('Invalid AU: missing sample rate or channel count')
	}

	let annotation: string | undefined
	if (dataOffset > 24) {
		const annotationBytes = data.subarray(24, dataOffset)
		// Trim null bytes
		let end = annotationBytes.indexOf(0)
		if (end === -1) end = annotationBytes.length
		annotation = new TextDecoder().decode(annotationBytes.subarray(0, end))
	}

	const available = data.length - dataOffset

	return {
		dataOffset,
		dataSize: storedSize === AU_UNKNOWN_SIZE ? available : Math.min(storedSize, available),
		encoding,
		sampleRate,
		numChannels,
		annotation,
	}
}

/**
 * Parse AU info without decoding samples
 */
export function parseAuInfo(data: Uint8Array): AudioInfo {
	const header = parseAuHeader(data)
	const bitsPerSample = getBitsPerSample(header.encoding)
	const sampleCount = Math.floor(header.dataSize / (header.numChannels * (bitsPerSample / 8)))

	return {
		format: 'au',
		numChannels: header.numChannels,
		sampleRate: header.sampleRate,
		bitsPerSample,
		encoding: getSampleEncoding(header.encoding),
		duration: sampleCount / header.sampleRate,
		sampleCount,
	}
}

/**
 * Decode 16-bit PCM AU audio
 */
export function decodeAu(data: Uint8Array): PcmAudio {
	const header = parseAuHeader(data)
	const info = parseAuInfo(data)

	if (header.encoding !== AuEncoding.LINEAR_16) {
		throw new InvalidInputError(
			`Unsupported AU data: ${info.bitsPerSample}-bit ${info.encoding}, expected 16-bit PCM`
		)
	}

	const samples = new Int16Array(info.sampleCount * info.numChannels)
	let offset = header.dataOffset
	for (let i = 0; i < samples.length; i++) {
		samples[i] = readI16BE(data, offset)
		offset += 2
	}

	return { info, samples }
}

/**
 * AU reader
 */
export const auReader: AudioReader = {
	format: 'au',
	detect: isAu,
	getInfo: parseAuInfo,
	decode: decodeAu,
}

function getBitsPerSample(encoding: AuEncodingType): number {
	switch (encoding) {
		case AuEncoding.MULAW:
		case AuEncoding.ALAW:
		case AuEncoding.LINEAR_8:
			return 8
		case AuEncoding.LINEAR_16:
			return 16
		case AuEncoding.LINEAR_24:
			return 24
		case AuEncoding.LINEAR_32:
		case AuEncoding.FLOAT:
			return 32
		case AuEncoding.DOUBLE:
			return 64
		default:
			return 8
	}
}

function getSampleEncoding(encoding: AuEncodingType): SampleEncoding {
	switch (encoding) {
		case AuEncoding.MULAW:
			return 'mulaw'
		case AuEncoding.ALAW:
			return 'alaw'
		case AuEncoding.LINEAR_8:
		case AuEncoding.LINEAR_16:
		case AuEncoding.LINEAR_24:
		case AuEncoding.LINEAR_32:
			return 'pcm'
		case AuEncoding.FLOAT:
		case AuEncoding.DOUBLE:
			return 'float'
		default:
			return 'compressed'
	}
}

// Binary reading helpers (big-endian)
function readU32BE(data: Uint8Array, offset: number): number {
	return (
		((data[offset]! << 24) |
			(data[offset + 1]! << 16) |
			(data[offset + 2]! << 8) |
			data[offset + 3]!) >>>
		0
	)
}

function readI16BE(data: Uint8Array, offset: number): number {
	const u = (data[offset]! << 8) | data[offset + 1]!
	return u > 0x7fff ? u - 0x10000 : u
}
