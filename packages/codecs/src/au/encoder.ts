/**
 * AU audio encoder
 * Writes 16-bit PCM to Sun/NeXT audio format
 */

import { AU_MAGIC, AuEncoding, type AuEncodeOptions } from './types'

/**
 * Encode audio samples to 16-bit AU
 * @param channels One Int16Array per channel, all the same length
 */
export function encodeAu(channels: Int16Array[], options: AuEncodeOptions = {}): Uint8Array {
	if (channels.length === 0) {
		return new Uint8Array(0)
	}

	const { sampleRate = 8000, annotation = '' } = options

	const numChannels = channels.length
	const sampleCount = channels[0]!.length
	const dataSize = sampleCount * numChannels * 2

	// Annotation must be null-terminated and the header aligned to 8 bytes
	const annotationBytes = new TextEncoder().encode(annotation)
	const headerSize = Math.ceil((24 + annotationBytes.length + 1) / 8) * 8

	const output = new Uint8Array(headerSize + dataSize)

	writeU32BE(output, 0, AU_MAGIC)
	writeU32BE(output, 4, headerSize)
	writeU32BE(output, 8, dataSize)
	writeU32BE(output, 12, AuEncoding.LINEAR_16)
	writeU32BE(output, 16, sampleRate)
	writeU32BE(output, 20, numChannels)

	if (annotationBytes.length > 0) {
		output.set(annotationBytes, 24)
	}

	// Write interleaved samples
	let offset = headerSize
	for (let i = 0; i < sampleCount; i++) {
		for (let c = 0; c < numChannels; c++) {
			const v = (channels[c]![i] ?? 0) & 0xffff
			output[offset] = (v >> 8) & 0xff
			output[offset + 1] = v & 0xff
			offset += 2
		}
	}

	return output
}

/**
 * Create AU from mono audio
 */
export function encodeAuMono(samples: Int16Array, options: AuEncodeOptions = {}): Uint8Array {
	return encodeAu([samples], options)
}

function writeU32BE(data: Uint8Array, offset: number, value: number): void {
	data[offset] = (value >> 24) & 0xff
	data[offset + 1] = (value >> 16) & 0xff
	data[offset + 2] = (value >> 8) & 0xff
	data[offset + 3] = value & 0xff
}
