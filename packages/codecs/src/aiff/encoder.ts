/**
 * AIFF audio encoder
 * Writes 16-bit PCM to Audio Interchange File Format
 */

import { AIFF_MAGIC, COMM_MAGIC, FORM_MAGIC, SSND_MAGIC, type AiffEncodeOptions } from './types'

/**
 * Encode audio samples to 16-bit AIFF
 * @param channels One Int16Array per channel, all the same length
 */
export function encodeAiff(channels: Int16Array[], options: AiffEncodeOptions = {}): Uint8Array {
	if (channels.length === 0) {
		return new Uint8Array(0)
	}

	const { sampleRate = 8000 } = options

	const numChannels = channels.length
	const numSampleFrames = channels[0]!.length
	const dataSize = numSampleFrames * numChannels * 2

	const commChunkSize = 18 // Standard COMM chunk
	const ssndChunkSize = 8 + dataSize // offset + blockSize + data

	// FORM size = type + chunks
	const formSize = 4 + (8 + commChunkSize) + (8 + ssndChunkSize)

	const output = new Uint8Array(8 + formSize)
	let offset = 0

	// FORM header
	writeU32BE(output, offset, FORM_MAGIC)
	offset += 4
	writeU32BE(output, offset, formSize)
	offset += 4

	// AIFF type
	writeU32BE(output, offset, AIFF_MAGIC)
	offset += 4

	// COMM chunk
	writeU32BE(output, offset, COMM_MAGIC)
	offset += 4
	writeU32BE(output, offset, commChunkSize)
	offset += 4
	writeU16BE(output, offset, numChannels)
	offset += 2
	writeU32BE(output, offset, numSampleFrames)
	offset += 4
	writeU16BE(output, offset, 16)
	offset += 2
	writeExtended(output, offset, sampleRate)
	offset += 10

	// SSND chunk
	writeU32BE(output, offset, SSND_MAGIC)
	offset += 4
	writeU32BE(output, offset, ssndChunkSize)
	offset += 4
	writeU32BE(output, offset, 0) // offset
	offset += 4
	writeU32BE(output, offset, 0) // blockSize
	offset += 4

	// Write interleaved samples
	for (let i = 0; i < numSampleFrames; i++) {
		for (let c = 0; c < numChannels; c++) {
			writeU16BE(output, offset, (channels[c]![i] ?? 0) & 0xffff)
			offset += 2
		}
	}

	return output
}

/**
 * Create AIFF from mono audio
 */
export function encodeAiffMono(samples: Int16Array, options: AiffEncodeOptions = {}): Uint8Array {
	return encodeAiff([samples], options)
}

/**
 * Write 80-bit extended precision float (IEEE 754)
 */
function writeExtended(data: Uint8Array, offset: number, value: number): void {
	if (value === 0) {
		for (let i = 0; i < 10; i++) data[offset + i] = 0
		return
	}

	const sign = value < 0 ? 1 : 0
	const absValue = Math.abs(value)

	const exp = Math.floor(Math.log2(absValue))
	const biasedExp = exp + 16383

	// Extended precision has explicit integer bit (always 1 for normalized)
	const mantissa = absValue / 2 ** exp
	const mantissaInt = BigInt(Math.round(mantissa * 2 ** 63))

	data[offset] = (sign << 7) | ((biasedExp >> 8) & 0x7f)
	data[offset + 1] = biasedExp & 0xff

	// Mantissa, MSB first
	for (let i = 0; i < 8; i++) {
		data[offset + 2 + i] = Number((mantissaInt >> BigInt((7 - i) * 8)) & 0xffn)
	}
}

// Binary writing helpers (big-endian)
function writeU16BE(data: Uint8Array, offset: number, value: number): void {
	data[offset] = (value >> 8) & 0xff
	data[offset + 1] = value & 0xff
}

function writeU32BE(data: Uint8Array, offset: number, value: number): void {
	data[offset] = (value >> 24) & 0xff
	data[offset + 1] = (value >> 16) & 0xff
	data[offset + 2] = (value >> 8) & 0xff
	data[offset + 3] = value & 0xff
}
