/**
 * WAV audio encoder
 * Writes integer PCM to RIFF WAVE format
 */

import { DATA_MAGIC, FMT_MAGIC, RIFF_MAGIC, WAVE_MAGIC, WavFormat, type WavEncodeOptions } from './types'

/**
 * Encode audio samples to WAV
 * @param channels One Int16Array per channel, all the same length
 */
export function encodeWav(channels: Int16Array[], options: WavEncodeOptions = {}): Uint8Array {
	if (channels.length === 0) {
		return new Uint8Array(0)
	}

	const { sampleRate = 8000, bitsPerSample = 16 } = options

	const numChannels = channels.length
	const sampleCount = channels[0]!.length
	const bytesPerSample = bitsPerSample / 8
	const blockAlign = numChannels * bytesPerSample
	const byteRate = sampleRate * blockAlign
	const dataSize = sampleCount * blockAlign

	const fmtChunkSize = 16
	const riffSize = 4 + (8 + fmtChunkSize) + (8 + dataSize) + (dataSize % 2)

	const output = new Uint8Array(8 + riffSize)
	let offset = 0

	// RIFF header
	writeU32LE(output, offset, RIFF_MAGIC)
	offset += 4
	writeU32LE(output, offset, riffSize)
	offset += 4

	// WAVE format
	writeU32LE(output, offset, WAVE_MAGIC)
	offset += 4

	// fmt chunk
	writeU32LE(output, offset, FMT_MAGIC)
	offset += 4
	writeU32LE(output, offset, fmtChunkSize)
	offset += 4
	writeU16LE(output, offset, WavFormat.PCM)
	offset += 2
	writeU16LE(output, offset, numChannels)
	offset += 2
	writeU32LE(output, offset, sampleRate)
	offset += 4
	writeU32LE(output, offset, byteRate)
	offset += 4
	writeU16LE(output, offset, blockAlign)
	offset += 2
	writeU16LE(output, offset, bitsPerSample)
	offset += 2

	// data chunk
	writeU32LE(output, offset, DATA_MAGIC)
	offset += 4
	writeU32LE(output, offset, dataSize)
	offset += 4

	// Write interleaved samples
	for (let i = 0; i < sampleCount; i++) {
		for (let c = 0; c < numChannels; c++) {
			const sample = channels[c]![i] ?? 0
			if (bitsPerSample === 8) {
				// 8-bit is unsigned, centered at 128
				output[offset] = (sample >> 8) + 128
			} else {
				writeU16LE(output, offset, sample & 0xffff)
			}
			offset += bytesPerSample
		}
	}

	return output
}

/**
 * Create WAV from mono audio
 */
export function encodeWavMono(samples: Int16Array, options: WavEncodeOptions = {}): Uint8Array {
	return encodeWav([samples], options)
}

// Binary writing helpers
function writeU16LE(data: Uint8Array, offset: number, value: number): void {
	data[offset] = value & 0xff
	data[offset + 1] = (value >> 8) & 0xff
}

function writeU32LE(data: Uint8Array, offset: number, value: number): void {
	data[offset] = value & 0xff
	data[offset + 1] = (value >> 8) & 0xff
	data[offset + 2] = (value >> 16) & 0xff
	data[offset + 3] = (value >> 24) & 0xff
}
