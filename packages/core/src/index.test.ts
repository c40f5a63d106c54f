import { describe, expect, it, test } from 'vitest'
import {
	ByteBuffer,
	InvalidInputError,
	InvalidSampleRateError,
	SinkWriteError,
	detectFormat,
	errorMessage,
	getExtension,
	getMimeType,
} from './index'

describe('core', () => {
	describe('detectFormat', () => {
		test('detects WAV', () => {
			const data = new Uint8Array([0x52, 0x49, 0x46, 0x46, 0, 0, 0, 0, 0x57, 0x41, 0x56, 0x45])
			expect(detectFormat(data)).toBe('wav')
		})

		test('does not mistake other RIFF files for WAV', () => {
			const data = new Uint8Array([0x52, 0x49, 0x46, 0x46, 0, 0, 0, 0, 0x41, 0x56, 0x49, 0x20])
			expect(detectFormat(data)).toBeNull()
		})

		test('detects AIFF and AIFF-C', () => {
			const aiff = new Uint8Array([0x46, 0x4f, 0x52, 0x4d, 0, 0, 0, 0, 0x41, 0x49, 0x46, 0x46])
			const aifc = new Uint8Array([0x46, 0x4f, 0x52, 0x4d, 0, 0, 0, 0, 0x41, 0x49, 0x46, 0x43])
			expect(detectFormat(aiff)).toBe('aiff')
			expect(detectFormat(aifc)).toBe('aiff')
		})

		test('detects AU only with a full header', () => {
			const header = new Uint8Array(24)
			header.set([0x2e, 0x73, 0x6e, 0x64])
			expect(detectFormat(header)).toBe('au')
			expect(detectFormat(header.slice(0, 4))).toBeNull()
		})

		test('detects UPD7759 streams by marker', () => {
			expect(detectFormat(new Uint8Array([0x5f, 0x00]))).toBe('upd7759')
			expect(detectFormat(new Uint8Array([0x59]))).toBe('upd7759')
			expect(detectFormat(new Uint8Array([0x53, 0x12]))).toBe('upd7759')
		})

		test('returns null for unknown data', () => {
			expect(detectFormat(new Uint8Array([]))).toBeNull()
			expect(detectFormat(new Uint8Array([0x00, 0x01, 0x02]))).toBeNull()
		})
	})

	test('maps formats to extensions and MIME types', () => {
		expect(getExtension('upd7759')).toBe('upd')
		expect(getExtension('aiff')).toBe('aiff')
		expect(getMimeType('wav')).toBe('audio/wav')
		expect(getMimeType('au')).toBe('audio/basic')
	})

	describe('ByteBuffer', () => {
		it('grows past its initial capacity', () => {
			const buffer = new ByteBuffer(2)
			for (let i = 0; i < 5; i++) buffer.write(i + 1)

			expect(buffer.size).toBe(5)
			expect(Array.from(buffer.toUint8Array())).toEqual([1, 2, 3, 4, 5])
		})

		it('keeps only the low byte', () => {
			const buffer = new ByteBuffer()
			buffer.write(0x1ab)
			expect(Array.from(buffer.toUint8Array())).toEqual([0xab])
		})
	})

	describe('errors', () => {
		it('carries a stable code and name', () => {
			const err = new InvalidInputError('Only single channel audio is supported.')
			expect(err.code).toBe('INVALID_INPUT')
			expect(err.name).toBe('InvalidInputError')
			expect(err).toBeInstanceOf(Error)
		})

		it('reports the rejected sample rate', () => {
			const err = new InvalidSampleRateError(11025)
			expect(err.code).toBe('INVALID_SAMPLE_RATE')
			expect(err.sampleRate).toBe(11025)
			expect(err.message).toBe('Unsupported sample rate: 11025 Hz (expected 5000, 6000 or 8000)')
		})

		it('keeps the underlying cause', () => {
			const cause = new Error('disk full')
			const err = new SinkWriteError('write failed', { cause })
			expect(err.cause).toBe(cause)
			expect(errorMessage(err)).toBe('write failed')
			expect(errorMessage('plain')).toBe('plain')
		})
	})
})
