/**
 * AIFF audio decoder
 * Reads 16-bit PCM from AIFF and uncompressed AIFF-C files
 */

import {
	InvalidInputError,
	type AudioInfo,
	type AudioReader,
	type PcmAudio,
	type SampleEncoding,
} from '@pcm2upd/core'
import {
	AIFC_MAGIC,
	AIFF_MAGIC,
	COMM_MAGIC,
	FORM_MAGIC,
	PCM_COMPRESSION_TYPES,
	SOWT_COMPRESSION,
	SSND_MAGIC,
	type AiffHeader,
} from './types'

/**
 * Check if data is an AIFF file
 */
export function isAiff(data: Uint8Array): boolean {
	if (data.length < 12) return false
	const form = readU32BE(data, 0)
	const type = readU32BE(data, 8)
	return form === FORM_MAGIC && (type === AIFF_MAGIC || type === AIFC_MAGIC)
}

/**
 * Parse AIFF header
 */
export function parseAiffHeader(data: Uint8Array): AiffHeader {
	if (!isAiff(data)) {
		throw new InvalidInputError('Invalid AIFF: bad magic number')
	}

	const fileSize = readU32BE(data, 4) + 8
	const isAIFC = readU32BE(data, 8) === AIFC_MAGIC

	let offset = 12
	let numChannels = 0
	let numSampleFrames = 0
	let sampleSize = 0
	let sampleRate = 0
	let compressionType: string | undefined
	let dataOffset = -1
	let dataSize = 0
	let blockSize = 0

	while (offset + 8 <= data.length) {
		const chunkId = readU32BE(data, offset)
		const chunkSize = readU32BE(data, offset + 4)

		if (chunkId === COMM_MAGIC && offset + 26 <= data.length) {
			numChannels = readU16BE(data, offset + 8)
			numSampleFrames = readU32BE(data, offset + 10)
			sampleSize = readU16BE(data, offset + 14)
			sampleRate = readExtended(data, offset + 16)

			if (isAIFC && chunkSize >= 22 && offset + 30 <= data.length) {
				compressionType = readFourCC(data, offset + 26)
			}
		} else if (chunkId === SSND_MAGIC && offset + 16 <= data.length) {
			const soundOffset = readU32BE(data, offset + 8)
			blockSize = readU32BE(data, offset + 12)
			// Skip chunk header, offset/blockSize fields and any leading pad
			dataOffset = offset + 16 + soundOffset
			dataSize = Math.max(0, Math.min(chunkSize - 8 - soundOffset, data.length - dataOffset))
		}

		// Move to next chunk (chunks are word-aligned)
		offset += 8 + chunkSize
		if (chunkSize % 2 === 1) offset++
	}

	if (numChannels === 0 || sampleRate === 0) {
		throw new InvalidInputError('Invalid AIFF: missing COMM chunk')
	}

	// SSND may only be left out when there are no sample frames
	if (dataOffset < 0 && numSampleFrames > 0) {
		throw new InvalidInputError('Invalid AIFF: missing SSND chunk')
	}

	return {
		fileSize,
		isAIFC,
		numChannels,
		numSampleFrames,
		sampleSize,
		sampleRate,
		compressionType,
		dataOffset: Math.max(dataOffset, 0),
		dataSize,
		blockSize,
	}
}

/**
 * Parse AIFF info without decoding samples
 */
export function parseAiffInfo(data: Uint8Array): AudioInfo {
	const header = parseAiffHeader(data)
	const bytesPerSample = Math.max(1, Math.ceil(header.sampleSize / 8))
	const available = Math.floor(header.dataSize / (header.numChannels * bytesPerSample))
	const sampleCount = Math.min(header.numSampleFrames, available)

	return {
		format: 'aiff',
		numChannels: header.numChannels,
		sampleRate: header.sampleRate,
		bitsPerSample: header.sampleSize,
		encoding: getSampleEncoding(header),
		duration: sampleCount / header.sampleRate,
		sampleCount,
	}
}

/**
 * Decode 16-bit PCM AIFF audio
 */
export function decodeAiff(data: Uint8Array): PcmAudio {
	const header = parseAiffHeader(data)
	const info = parseAiffInfo(data)

	if (info.encoding !== 'pcm' || info.bitsPerSample !== 16) {
		throw new InvalidInputError(
			`Unsupported AIFF data: ${info.bitsPerSample}-bit ${info.encoding}, expected 16-bit PCM`
		)
	}

	const littleEndian = header.compressionType === SOWT_COMPRESSION
	const samples = new Int16Array(info.sampleCount * info.numChannels)
	let offset = header.dataOffset
	for (let i = 0; i < samples.length; i++) {
		samples[i] = littleEndian ? readI16LE(data, offset) : readI16BE(data, offset)
		offset += 2
	}

	return { info, samples }
}

/**
 * AIFF reader
 */
export const aiffReader: AudioReader = {
	format: 'aiff',
	detect: isAiff,
	getInfo: parseAiffInfo,
	decode: decodeAiff,
}

function getSampleEncoding(header: AiffHeader): SampleEncoding {
	const type = header.compressionType
	if (!header.isAIFC || type === undefined) return 'pcm'
	if (PCM_COMPRESSION_TYPES.some((pcm) => pcm === type)) return 'pcm'
	if (type === 'fl32' || type === 'fl64' || type === 'FL32' || type === 'FL64') return 'float'
	if (type === 'ulaw' || type === 'ULAW') return 'mulaw'
	if (type === 'alaw' || type === 'ALAW') return 'alaw'
	return 'compressed'
}

/**
 * Read 80-bit extended precision float (IEEE 754)
 * Used for sample rate in AIFF
 */
function readExtended(data: Uint8Array, offset: number): number {
	const sign = (data[offset]! >> 7) & 1
	const exponent = ((data[offset]! & 0x7f) << 8) | data[offset + 1]!

	// Read 64-bit mantissa
	let mantissa = 0
	for (let i = 0; i < 8; i++) {
		mantissa = mantissa * 256 + data[offset + 2 + i]!
	}

	if (exponent === 0 && mantissa === 0) {
		return 0
	}

	if (exponent === 0x7fff) {
		return mantissa === 0 ? (sign ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY) : Number.NaN
	}

	// Normalize: exponent is biased by 16383
	const value = mantissa * 2 ** (exponent - 16383 - 63)
	return sign ? -value : value
}

function readFourCC(data: Uint8Array, offset: number): string {
	return String.fromCharCode(data[offset]!, data[offset + 1]!, data[offset + 2]!, data[offset + 3]!)
}

// Binary reading helpers (big-endian unless noted)
function readU16BE(data: Uint8Array, offset: number): number {
	return (data[offset]! << 8) | data[offset + 1]!
}

function readI16BE(data: Uint8Array, offset: number): number {
	const u = readU16BE(data, offset)
	return u > 0x7fff ? u - 0x10000 : u
}

function readI16LE(data: Uint8Array, offset: number): number {
	const u = data[offset]! | (data[offset + 1]! << 8)
	return u > 0x7fff ? u - 0x10000 : u
}

function readU32BE(data: Uint8Array, offset: number): number {
	return (
		((data[offset]! << 24) |
			(data[offset + 1]! << 16) |
			(data[offset + 2]! << 8) |
			data[offset + 3]!) >>>
		0
	)
}
