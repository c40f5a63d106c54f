/**
 * WAV audio decoder
 * Reads 16-bit PCM from RIFF WAVE files
 */

import {
	InvalidInputError,
	type AudioInfo,
	type AudioReader,
	type PcmAudio,
	type SampleEncoding,
} from '@pcm2upd/core'
import {
	DATA_MAGIC,
	FMT_MAGIC,
	RIFF_MAGIC,
	WAVE_MAGIC,
	WavFormat,
	type WavFormatCode,
	type WavHeader,
} from './types'

/**
 * Check if data is a WAV file
 */
export function isWav(data: Uint8Array): boolean {
	if (data.length < 12) return false
	const riff = readU32LE(data, 0)
	const wave = readU32LE(data, 8)
	return riff === RIFF_MAGIC && wave === WAVE_MAGIC
}

/**
 * Parse WAV header
 */
export function parseWavHeader(data: Uint8Array): WavHeader {
	if (!isWav(data)) {
		throw new InvalidInputError('Invalid WAV: bad magic number')
	}

	const fileSize = readU32LE(data, 4) + 8

	let offset = 12
	let audioFormat: WavFormatCode = WavFormat.PCM
	let numChannels = 0
	let sampleRate = 0
	let byteRate = 0
	let blockAlign = 0
	let bitsPerSample = 0
	let dataOffset = -1
	let dataSize = 0

	while (offset + 8 <= data.length) {
		const chunkId = readU32LE(data, offset)
		const chunkSize = readU32LE(data, offset + 4)

		if (chunkId === FMT_MAGIC && offset + 24 <= data.length) {
			audioFormat = readU16LE(data, offset + 8)
			numChannels = readU16LE(data, offset + 10)
			sampleRate = readU32LE(data, offset + 12)
			byteRate = readU32LE(data, offset + 16)
			blockAlign = readU16LE(data, offset + 20)
			bitsPerSample = readU16LE(data, offset + 22)

			// First two bytes of the sub-format GUID hold the real format code
			if (audioFormat === WavFormat.EXTENSIBLE && chunkSize >= 40 && offset + 34 <= data.length) {
				audioFormat = readU16LE(data, offset + 32)
			}
		} else if (chunkId === DATA_MAGIC) {
			dataOffset = offset + 8
			dataSize = Math.min(chunkSize, data.length - dataOffset)
		}

		// Move to next chunk (chunks are word-aligned)
		offset += 8 + chunkSize
		if (chunkSize % 2 === 1) offset++
	}

	if (numChannels === 0 || sampleRate === 0) {
		throw new InvalidInputError('Invalid WAV: missing fmt chunk')
	}
	if (dataOffset < 0) {
		throw new InvalidInputError('Invalid WAV: missing data chunk')
	}

	return {
		fileSize,
		audioFormat,
		numChannels,
		sampleRate,
		byteRate,
		blockAlign,
		bitsPerSample,
		dataOffset,
		dataSize,
	}
}

/**
 * Parse WAV info without decoding samples
 */
export function parseWavInfo(data: Uint8Array): AudioInfo {
	const header = parseWavHeader(data)
	const bytesPerSample = Math.max(1, Math.ceil(header.bitsPerSample / 8))
	const sampleCount = Math.floor(header.dataSize / (header.numChannels * bytesPerSample))

	return {
		format: 'wav',
		numChannels: header.numChannels,
		sampleRate: header.sampleRate,
		bitsPerSample: header.bitsPerSample,
		encoding: getSampleEncoding(header.audioFormat),
		duration: sampleCount / header.sampleRate,
		sampleCount,
	}
}

/**
 * Decode 16-bit PCM WAV audio
 */
export function decodeWav(data: Uint8Array): PcmAudio {
	const header = parseWavHeader(data)
	const info = parseWavInfo(data)

	if (info.encoding !== 'pcm' || info.bitsPerSample !== 16) {
		throw new InvalidInputError(
			`Unsupported WAV data: ${info.bitsPerSample}-bit ${info.encoding}, expected 16-bit PCM`
		)
	}

	const samples = new Int16Array(info.sampleCount * info.numChannels)
	let offset = header.dataOffset
	for (let i = 0; i < samples.length; i++) {
		samples[i] = readI16LE(data, offset)
		offset += 2
	}

	return { info, samples }
}

/**
 * WAV reader
 */
export const wavReader: AudioReader = {
	format: 'wav',
	detect: isWav,
	getInfo: parseWavInfo,
	decode: decodeWav,
}

function getSampleEncoding(format: WavFormatCode): SampleEncoding {
	switch (format) {
		case WavFormat.PCM:
			return 'pcm'
		case WavFormat.IEEE_FLOAT:
			return 'float'
		case WavFormat.ALAW:
			return 'alaw'
		case WavFormat.MULAW:
			return 'mulaw'
		default:
			return 'compressed'
	}
}

// Binary reading helpers
function readU16LE(data: Uint8Array, offset: number): number {
	return data[offset]! | (data[offset + 1]! << 8)
}

function readI16LE(data: Uint8Array, offset: number): number {
	const u = readU16LE(data, offset)
	return u > 0x7fff ? u - 0x10000 : u
}

function readU32LE(data: Uint8Array, offset: number): number {
	return (
		(data[offset]! |
			(data[offset + 1]! << 8) |
			(data[offset + 2]! << 16) |
			(data[offset + 3]! << 24)) >>>
		0
	)
}
