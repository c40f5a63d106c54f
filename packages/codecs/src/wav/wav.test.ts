import { describe, expect, it } from 'vitest'
import { InvalidInputError } from '@pcm2upd/core'
import { decodeWav, encodeWav, encodeWavMono, isWav, parseWavHeader, parseWavInfo, wavReader } from './index'

describe('WAV Codec', () => {
	function createRamp(sampleCount: number): Int16Array {
		const samples = new Int16Array(sampleCount)
		for (let i = 0; i < sampleCount; i++) {
			samples[i] = i * 256 - 32768
		}
		return samples
	}

	describe('isWav', () => {
		it('should identify WAV files', () => {
			const wav = encodeWavMono(new Int16Array(100))
			expect(isWav(wav)).toBe(true)
			expect(wavReader.detect(wav)).toBe(true)
		})

		it('should reject non-WAV files', () => {
			expect(isWav(new Uint8Array([0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0]))).toBe(false)
			expect(isWav(new Uint8Array([0x89, 0x50, 0x4e, 0x47]))).toBe(false) // PNG
		})

		it('should handle short data', () => {
			expect(isWav(new Uint8Array([]))).toBe(false)
			expect(isWav(new Uint8Array([0x52, 0x49, 0x46, 0x46]))).toBe(false) // Just RIFF
		})
	})

	describe('parseWavInfo', () => {
		it('should parse mono 16-bit info', () => {
			const wav = encodeWavMono(new Int16Array(4000), { sampleRate: 8000 })

			const info = parseWavInfo(wav)

			expect(info.format).toBe('wav')
			expect(info.numChannels).toBe(1)
			expect(info.sampleRate).toBe(8000)
			expect(info.bitsPerSample).toBe(16)
			expect(info.encoding).toBe('pcm')
			expect(info.sampleCount).toBe(4000)
			expect(info.duration).toBe(0.5)
		})

		it('should parse stereo info', () => {
			const wav = encodeWav([new Int16Array(10), new Int16Array(10)], { sampleRate: 6000 })

			const info = parseWavInfo(wav)

			expect(info.numChannels).toBe(2)
			expect(info.sampleRate).toBe(6000)
			expect(info.sampleCount).toBe(10)
		})

		it('should report 8-bit audio', () => {
			const wav = encodeWavMono(createRamp(9), { bitsPerSample: 8 })

			const info = parseWavInfo(wav)

			expect(info.bitsPerSample).toBe(8)
			expect(info.sampleCount).toBe(9)
		})

		it('should report float and extensible formats', () => {
			const wav = encodeWavMono(new Int16Array(4))
			wav[20] = 3 // IEEE float
			expect(parseWavInfo(wav).encoding).toBe('float')

			wav[20] = 0x11 // IMA ADPCM
			expect(parseWavInfo(wav).encoding).toBe('compressed')
		})
	})

	describe('parseWavHeader', () => {
		it('should locate the data chunk', () => {
			const wav = encodeWavMono(new Int16Array(3), { sampleRate: 5000 })

			const header = parseWavHeader(wav)

			expect(header.dataOffset).toBe(44)
			expect(header.dataSize).toBe(6)
			expect(header.blockAlign).toBe(2)
			expect(header.byteRate).toBe(10000)
		})

		it('should find a data chunk with no samples', () => {
			const wav = encodeWavMono(new Int16Array(0))
			expect(parseWavHeader(wav).dataSize).toBe(0)
		})

		it('should clip a truncated data chunk', () => {
			const wav = encodeWavMono(new Int16Array(10)).slice(0, 44 + 7)
			expect(parseWavHeader(wav).dataSize).toBe(7)
			expect(parseWavInfo(wav).sampleCount).toBe(3)
		})

		it('should reject bad magic', () => {
			expect(() => parseWavHeader(new Uint8Array(44))).toThrow(InvalidInputError)
		})

		it('should reject a missing data chunk', () => {
			const wav = encodeWavMono(new Int16Array(2)).slice(0, 36)
			expect(() => parseWavHeader(wav)).toThrow('Invalid WAV: missing data chunk')
		})
	})

	describe('encodeWav', () => {
		it('should handle empty input', () => {
			expect(encodeWav([]).length).toBe(0)
		})

		it('should write a 44 byte header', () => {
			const wav = encodeWavMono(new Int16Array(5))
			expect(wav.length).toBe(44 + 10)
		})

		it('should pad odd 8-bit data', () => {
			const wav = encodeWavMono(new Int16Array(3), { bitsPerSample: 8 })
			expect(wav.length).toBe(44 + 4)
			expect(wav[44]).toBe(128)
		})
	})

	describe('decodeWav', () => {
		it('should preserve sample values exactly', () => {
			const original = new Int16Array([0, 1, -1, 32767, -32768, 640, -1280])
			const decoded = decodeWav(encodeWavMono(original))

			expect(Array.from(decoded.samples)).toEqual(Array.from(original))
		})

		it('should interleave stereo samples', () => {
			const left = new Int16Array([1, 2, 3])
			const right = new Int16Array([-1, -2, -3])
			const decoded = decodeWav(encodeWav([left, right]))

			expect(Array.from(decoded.samples)).toEqual([1, -1, 2, -2, 3, -3])
		})

		it('should reject non-16-bit data', () => {
			const wav = encodeWavMono(createRamp(4), { bitsPerSample: 8 })
			expect(() => decodeWav(wav)).toThrow('Unsupported WAV data: 8-bit pcm, expected 16-bit PCM')
		})
	})
})
