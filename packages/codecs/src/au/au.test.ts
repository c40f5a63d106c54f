import { describe, expect, it } from 'vitest'
import { InvalidInputError } from '@pcm2upd/core'
import { AuEncoding, auReader, decodeAu, encodeAu, encodeAuMono, isAu, parseAuHeader, parseAuInfo } from './index'

describe('AU Codec', () => {
	describe('isAu', () => {
		it('should identify AU files', () => {
			const au = encodeAuMono(new Int16Array(100))
			expect(isAu(au)).toBe(true)
			expect(auReader.detect(au)).toBe(true)
		})

		it('should reject non-AU files', () => {
			expect(isAu(new Uint8Array(24))).toBe(false)
			expect(isAu(new Uint8Array([0x52, 0x49, 0x46, 0x46]))).toBe(false) // RIFF (WAV)
		})

		it('should handle short data', () => {
			expect(isAu(new Uint8Array([]))).toBe(false)
			expect(isAu(new Uint8Array([0x2e, 0x73, 0x6e, 0x64]))).toBe(false) // Just magic
		})
	})

	describe('parseAuHeader', () => {
		it('should parse AU header', () => {
			const au = encodeAuMono(new Int16Array(10), { sampleRate: 8000 })

			const header = parseAuHeader(au)

			expect(header.dataOffset).toBe(32)
			expect(header.dataSize).toBe(20)
			expect(header.sampleRate).toBe(8000)
			expect(header.numChannels).toBe(1)
			expect(header.encoding).toBe(AuEncoding.LINEAR_16)
			expect(header.annotation).toBe('')
		})

		it('should parse annotation', () => {
			const au = encodeAuMono(new Int16Array(4), { annotation: 'Test audio' })

			const header = parseAuHeader(au)

			expect(header.dataOffset).toBe(40)
			expect(header.annotation).toBe('Test audio')
		})

		it('should read to end of file when size is unknown', () => {
			const au = encodeAuMono(new Int16Array(6))
			au.set([0xff, 0xff, 0xff, 0xff], 8)

			expect(parseAuHeader(au).dataSize).toBe(12)
		})

		it('should reject an out-of-range data offset', () => {
			const au = encodeAuMono(new Int16Array(1))
			au.set([0, 0, 0x10, 0], 4)

			expect(() => parseAuHeader(au)).toThrow('Invalid AU: data offset 4096 out of range')
		})

		it('should reject bad magic', () => {
			expect(() => parseAuHeader(new Uint8Array(32))).toThrow(InvalidInputError)
		})
	})

	describe('parseAuInfo', () => {
		it('should parse AU info', () => {
			const au = encodeAuMono(new Int16Array(2500), { sampleRate: 5000 })

			const info = parseAuInfo(au)

			expect(info.format).toBe('au')
			expect(info.numChannels).toBe(1)
			expect(info.sampleRate).toBe(5000)
			expect(info.bitsPerSample).toBe(16)
			expect(info.encoding).toBe('pcm')
			expect(info.sampleCount).toBe(2500)
			expect(info.duration).toBe(0.5)
		})

		it('should report μ-law data', () => {
			const au = encodeAuMono(new Int16Array(4))
			au[15] = AuEncoding.MULAW

			const info = parseAuInfo(au)

			expect(info.encoding).toBe('mulaw')
			expect(info.bitsPerSample).toBe(8)
			expect(info.sampleCount).toBe(8)
		})

		it('should parse stereo AU', () => {
			const au = encodeAu([new Int16Array(3), new Int16Array(3)], { sampleRate: 6000 })
			const info = parseAuInfo(au)

			expect(info.numChannels).toBe(2)
			expect(info.sampleCount).toBe(3)
		})
	})

	describe('decodeAu', () => {
		it('should preserve sample values exactly', () => {
			const original = new Int16Array([0, 1, -1, 32767, -32768, 128])
			const decoded = decodeAu(encodeAuMono(original))

			expect(Array.from(decoded.samples)).toEqual(Array.from(original))
		})

		it('should reject non-16-bit data', () => {
			const au = encodeAuMono(new Int16Array(4))
			au[15] = AuEncoding.FLOAT

			expect(() => decodeAu(au)).toThrow('Unsupported AU data: 32-bit float, expected 16-bit PCM')
		})

		it('should handle empty input', () => {
			expect(encodeAu([]).length).toBe(0)
		})
	})
})
